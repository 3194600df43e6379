// Connection establishment: race an inbound accept against an outbound dial.
//
// Both peers run the same logic. Each binds its own port and keeps dialing the
// other's until something connects, so either side may come up first.

import type { ConnectorConfig } from "./config.ts";
import { describeError } from "./link_error.ts";
import type { Logger } from "./logging.ts";
import type { PerfCollector } from "./perf.ts";
import { HandleSlot } from "./slot.ts";
import { settleWithin, sleep } from "./timers.ts";
import type { LinkChannel, LinkListener, TransportBinding } from "./transport.ts";

/** Where a connector listens and which peer it dials. */
export interface Endpoint {
  readonly listenPort: number;
  readonly peerHost: string;
  readonly peerPort: number;
}

/**
 * The channels a connector uses once established.
 *
 * For duplex bindings `reader` and `writer` are the same channel.
 */
export interface EstablishedLink {
  readonly reader: LinkChannel;
  readonly writer: LinkChannel;
}

export interface EstablisherOptions {
  config: ConnectorConfig;
  logger: Logger;
  perf?: PerfCollector;
  /** Called once, synchronously, when the link is complete. */
  onEstablished: (link: EstablishedLink) => void;
}

type Origin = "accepted" | "dialed";

/** A candidate from the non-preferred direction, waiting out its grace period. */
interface HeldCandidate {
  readonly channel: LinkChannel;
  readonly origin: Origin;
  readonly timer: ReturnType<typeof setTimeout>;
}

/**
 * Drives the accept loop and the dial loop for one connector.
 *
 * Candidate channels are installed through HandleSlots: for a duplex binding
 * accepted and dialed channels compete for a single slot, for a paired binding
 * each direction has its own. A refused candidate is closed immediately, so at
 * most one channel per role survives.
 *
 * Two duplex peers started together would each keep whichever of the two
 * crossing connections reached them first, and could end up on different
 * ones. Both know both ports, so they agree on a preferred connection: the one
 * dialed by the peer with the lower listen port. A candidate from the other
 * direction is held for one dial cycle and used only if the preferred
 * connection does not appear by then.
 */
export class Establisher {
  private readonly inbound = new HandleSlot<LinkChannel>();
  private readonly outbound: HandleSlot<LinkChannel>;
  private readonly dialAbort = new AbortController();
  private listening: Promise<LinkListener> | null = null;
  private listener: LinkListener | null = null;
  private listenerClosing: Promise<void> | null = null;
  private dialTask: Promise<void> | null = null;
  private preferred: Origin | null = null;
  private held: HeldCandidate | null = null;
  private established = false;
  private stopped = false;

  constructor(
    private readonly binding: TransportBinding,
    private readonly options: EstablisherOptions,
  ) {
    this.outbound = binding.duplex ? this.inbound : new HandleSlot<LinkChannel>();
  }

  /** Port the listener is bound to, once listening. */
  get localPort(): number | undefined {
    return this.listener?.port;
  }

  /**
   * Bind the listener and spawn the dial loop.
   *
   * Resolves once the listener is bound; rejects if it cannot be. The dial
   * loop keeps running in the background.
   */
  async start(endpoint: Endpoint): Promise<void> {
    const { config, logger } = this.options;

    logger.log("info", `${this.binding.name}: listening on port ${endpoint.listenPort}`);
    const listening = this.binding.listen(
      { port: endpoint.listenPort, host: config.listenHost, maxFrameSize: config.maxFrameSize },
      (channel) => this.onAccepted(channel),
    );
    this.listening = listening;
    this.listener = await listening;

    if (this.stopped || this.established) {
      // Settled before the listener was assigned, so nothing has closed it yet.
      this.listenerClosing = this.closeListener();
      return;
    }

    const port = this.listener.port;
    if (this.binding.duplex && port !== endpoint.peerPort) {
      this.preferred = port < endpoint.peerPort ? "dialed" : "accepted";
    }

    logger.log(
      "info",
      `${this.binding.name}: dialing ${endpoint.peerHost}:${endpoint.peerPort}`,
    );
    this.dialTask = this.dialLoop(endpoint);
  }

  /**
   * Stop both loops and wait for them, bounded by `joinTimeoutMs`.
   *
   * Channels that already won their slot are left to the owner; every other
   * candidate is closed.
   */
  async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;

    this.inbound.cancel();
    this.outbound.cancel();
    this.dialAbort.abort();
    this.releaseHeld();

    const joined = await settleWithin(this.joinLoops(), this.options.config.joinTimeoutMs);
    if (!joined) {
      this.options.logger.log("warn", `${this.binding.name}: background loops did not stop in time`);
    }
  }

  private async joinLoops(): Promise<void> {
    // A bind failure was already reported by start().
    if (this.listening) await Promise.allSettled([this.listening]);
    this.listenerClosing ??= this.closeListener();
    await Promise.allSettled([this.listenerClosing, this.dialTask]);
  }

  /** Channels that won their slot, whether or not the link completed. */
  installed(): LinkChannel[] {
    const channels = new Set<LinkChannel>();
    if (this.inbound.value) channels.add(this.inbound.value);
    if (this.outbound.value) channels.add(this.outbound.value);
    return [...channels];
  }

  private onAccepted(channel: LinkChannel): void {
    this.offerCandidate(channel, "accepted");
  }

  private async dialLoop(endpoint: Endpoint): Promise<void> {
    const { config, logger, perf } = this.options;
    const { signal } = this.dialAbort;
    const target = `${endpoint.peerHost}:${endpoint.peerPort}`;
    let attempt = 0;

    while (!signal.aborted && !this.outbound.settled) {
      // Our own dial is on hold; another one would only cross it again.
      if (this.held?.origin === "dialed") {
        await sleep(config.dialRetryDelayMs, signal);
        continue;
      }

      attempt++;
      const timer = perf?.start("dial");
      try {
        const channel = await this.binding.dial({
          host: endpoint.peerHost,
          port: endpoint.peerPort,
          timeoutMs: config.dialAttemptTimeoutMs,
          signal,
          maxFrameSize: config.maxFrameSize,
        });
        if (timer !== undefined) perf?.stop(timer);
        this.offerCandidate(channel, "dialed");
        continue;
      } catch (e) {
        if (timer !== undefined) perf?.stop(timer);
        if (signal.aborted) return;
        logger.log(
          "debug",
          `${this.binding.name}: dial attempt ${attempt} to ${target} failed, will retry: ${describeError(e)}`,
        );
      }

      await sleep(config.dialRetryDelayMs, signal);
    }
  }

  private offerCandidate(channel: LinkChannel, origin: Origin): void {
    const slot = origin === "accepted" ? this.inbound : this.outbound;
    if (this.stopped || slot.settled) {
      this.closeSurplus(channel, origin);
      return;
    }
    if (this.preferred !== null && origin !== this.preferred) {
      this.hold(channel, origin);
      return;
    }
    this.install(channel, origin);
  }

  private install(channel: LinkChannel, origin: Origin): void {
    const slot = origin === "accepted" ? this.inbound : this.outbound;
    if (!slot.offer(channel)) {
      this.closeSurplus(channel, origin);
      return;
    }
    this.options.logger.log(
      "info",
      origin === "accepted"
        ? `${this.binding.name}: accepted inbound channel from ${channel.remote}`
        : `${this.binding.name}: outbound channel to ${channel.remote} established`,
    );
    this.releaseHeld();
    this.settle();
  }

  private hold(channel: LinkChannel, origin: Origin): void {
    if (this.held) {
      this.closeSurplus(channel, origin);
      return;
    }
    const { config, logger } = this.options;
    const graceMs = config.dialAttemptTimeoutMs + 2 * config.dialRetryDelayMs;
    logger.log(
      "debug",
      `${this.binding.name}: holding ${origin} channel ${channel.remote} for ${graceMs}ms, waiting for the ${this.preferred} one`,
    );
    const timer = setTimeout(() => this.onHeldExpired(), graceMs);
    this.held = { channel, origin, timer };
  }

  private onHeldExpired(): void {
    const held = this.held;
    if (!held) return;
    this.held = null;
    if (!held.channel.isOpen) {
      this.options.logger.log(
        "debug",
        `${this.binding.name}: held ${held.origin} channel ${held.channel.remote} closed while waiting`,
      );
      return;
    }
    this.install(held.channel, held.origin);
  }

  private releaseHeld(): void {
    const held = this.held;
    if (!held) return;
    this.held = null;
    clearTimeout(held.timer);
    this.closeSurplus(held.channel, held.origin);
  }

  private closeSurplus(channel: LinkChannel, origin: Origin): void {
    const direction = origin === "accepted" ? "inbound channel from" : "outbound channel to";
    this.options.logger.log("debug", `${this.binding.name}: closing surplus ${direction} ${channel.remote}`);
    channel.close();
  }

  private settle(): void {
    const reader = this.inbound.value;
    const writer = this.outbound.value;
    if (this.established || !reader || !writer) return;

    this.established = true;
    this.dialAbort.abort();
    // Only one peer is expected; stop accepting.
    this.listenerClosing ??= this.closeListener();
    this.options.onEstablished({ reader, writer });
  }

  private async closeListener(): Promise<void> {
    const listener = this.listener;
    if (!listener) return;
    try {
      await listener.close();
    } catch (e) {
      this.options.logger.log(
        "debug",
        `${this.binding.name}: listener close failed: ${describeError(e)}`,
      );
    }
  }
}
