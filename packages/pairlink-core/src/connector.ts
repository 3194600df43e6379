// Symmetric bidirectional connector.
//
// Generic over TransportBinding to support different transports:
// - TcpBinding for byte streams (length-prefixed frames, one duplex channel)
// - WsBinding for paired WebSocket channels (native framing)

import { type ConnectorConfig, isValidPort, resolveConnectorConfig } from "./config.ts";
import { type Endpoint, type EstablishedLink, Establisher } from "./establisher.ts";
import { createMessage, type Message } from "./frame.ts";
import { LinkError, describeError } from "./link_error.ts";
import { type Logger, debugLogger } from "./logging.ts";
import type { PerfCollector } from "./perf.ts";
import { InboundQueue } from "./queue.ts";
import { HandleSlot } from "./slot.ts";
import { sleep } from "./timers.ts";
import type { LinkChannel, TransportBinding } from "./transport.ts";
import { WriteLock } from "./write_lock.ts";

/** Connection state. `closed` is terminal. */
export type ConnectionState = "idle" | "establishing" | "connected" | "closed";

/** The narrow surface collaborators program against. */
export interface NetworkConnector {
  connect(listenPort: number, targetPort: number, targetHost?: string): Promise<void>;
  send(tag: string, payload?: Uint8Array): Promise<void>;
  receive(): Promise<Message>;
  close(): Promise<void>;
}

/** Options for a connector. */
export interface ConnectorOptions {
  /** Timing and sizing overrides. */
  config?: Partial<ConnectorConfig>;

  /** Logger. Default: debugLogger("pairlink:connector") */
  logger?: Logger;

  /** Timing collector for establish/send/dial. Default: none */
  perf?: PerfCollector;

  /** Called when connection state changes. */
  onStateChange?: (state: ConnectionState) => void;

  /**
   * Called once when an established link ends without `close()` having been
   * called: peer disconnect, I/O error or framing error.
   */
  onConnectionLost?: (error: LinkError) => void;
}

const ALLOWED_TRANSITIONS: Record<ConnectionState, readonly ConnectionState[]> = {
  idle: ["establishing", "closed"],
  establishing: ["connected", "closed"],
  connected: ["closed"],
  closed: [],
};

/**
 * A connector that links this process with exactly one peer.
 *
 * Both peers run identical code: `connect(myPort, theirPort)` binds `myPort`
 * and keeps dialing `theirPort` until one of the two directions connects.
 * Messages are delivered to `receive()` in arrival order.
 *
 * The connector does not reconnect. When the link is lost, `onConnectionLost`
 * fires, messages already received can still be drained, and afterwards
 * `send`/`receive` reject with an `io` LinkError; create a new connector to
 * try again.
 *
 * @example
 * ```typescript
 * const connector = new Connector(new TcpBinding());
 * await connector.connect(20000, 20001);
 * await connector.send("hello", new Uint8Array([1, 2]));
 * const reply = await connector.receive();
 * await connector.close();
 * ```
 */
export class Connector implements NetworkConnector {
  private readonly config: ConnectorConfig;
  private readonly logger: Logger;
  private readonly perf?: PerfCollector;
  private readonly onStateChange?: (state: ConnectionState) => void;
  private readonly onConnectionLost?: (error: LinkError) => void;

  private _state: ConnectionState = "idle";
  private _endpoint: Endpoint | null = null;
  private establisher: Establisher | null = null;
  private establishTimer: number | undefined;
  private readonly link = new HandleSlot<EstablishedLink>();
  private readonly queue = new InboundQueue<Message>();
  private readonly writeLock = new WriteLock();
  private lostError: LinkError | null = null;
  private closing: Promise<void> | null = null;

  constructor(
    private readonly binding: TransportBinding,
    options: ConnectorOptions = {},
  ) {
    this.config = resolveConnectorConfig(options.config);
    this.logger = options.logger ?? debugLogger("pairlink:connector");
    this.perf = options.perf;
    this.onStateChange = options.onStateChange;
    this.onConnectionLost = options.onConnectionLost;
  }

  /** Get the current connection state. */
  get state(): ConnectionState {
    return this._state;
  }

  /** The endpoint passed to `connect()`, or null before it was called. */
  get endpoint(): Endpoint | null {
    return this._endpoint;
  }

  /** Port the listener is bound to, once `connect()` has resolved. */
  get localPort(): number | undefined {
    return this.establisher?.localPort;
  }

  /** Name of the transport binding in use. */
  get transport(): string {
    return this.binding.name;
  }

  /**
   * True iff a link is established, none of its channels has ended, and the
   * connector is not closed.
   */
  get isConnected(): boolean {
    const link = this.link.value;
    return (
      this._state === "connected" &&
      this.lostError === null &&
      link !== undefined &&
      link.reader.isOpen &&
      link.writer.isOpen
    );
  }

  /** True once an established link has ended without `close()`. */
  get isLost(): boolean {
    return this.lostError !== null;
  }

  /** Messages received and not yet handed to `receive()`. */
  get pending(): number {
    return this.queue.size;
  }

  /**
   * Start establishing the link.
   *
   * Throws synchronously for invalid arguments. The returned promise resolves
   * as soon as the listener is bound, while the dial loop keeps running in the
   * background; it rejects if the listener cannot be bound, if the connector
   * is closed, or if `connect()` was already called.
   */
  connect(listenPort: number, targetPort: number, targetHost: string = "127.0.0.1"): Promise<void> {
    if (!isValidPort(listenPort)) {
      throw new RangeError(`invalid listening port: ${listenPort}`);
    }
    if (!isValidPort(targetPort) || targetPort === 0) {
      throw new RangeError(`invalid target port: ${targetPort}`);
    }
    if (typeof targetHost !== "string" || targetHost === "") {
      throw new TypeError("target host must be a non-empty string");
    }

    if (this._state === "closed") {
      return Promise.reject(LinkError.closed());
    }
    if (this._state !== "idle") {
      return Promise.reject(LinkError.state(`connect() called while ${this._state}`));
    }

    const endpoint: Endpoint = Object.freeze({
      listenPort,
      peerHost: targetHost,
      peerPort: targetPort,
    });
    this._endpoint = endpoint;
    this.establisher = new Establisher(this.binding, {
      config: this.config,
      logger: this.logger,
      perf: this.perf,
      onEstablished: (link) => this.onEstablished(link),
    });
    this.setState("establishing");
    this.establishTimer = this.perf?.start("establish");

    return this.start(this.establisher, endpoint);
  }

  /**
   * Send one message.
   *
   * Waits up to `connectWaitMs` for the link, then writes the frame. Frames of
   * concurrent senders are written one after another, never interleaved.
   * Resolves once the transport accepted the bytes.
   */
  async send(tag: string, payload?: Uint8Array): Promise<void> {
    const message = createMessage(tag, payload);
    const link = await this.awaitLink();
    if (this.lostError) throw this.lostError;

    const timer = this.perf?.start("send");
    try {
      await this.writeLock.run(() => {
        if (this._state === "closed") throw LinkError.closed();
        if (this.lostError) throw this.lostError;
        return link.writer.send(message);
      });
      this.logger.log("debug", `sent ${message.tag}`, {
        bytes: message.payload?.length ?? 0,
      });
    } catch (e) {
      const error = LinkError.wrap(e, "send failed");
      if (error.kind === "io" || error.kind === "framing") {
        this.logger.log("error", `send of ${message.tag} failed: ${error.message}`);
      }
      throw error;
    } finally {
      if (timer !== undefined) this.perf?.stop(timer);
    }
  }

  /**
   * Receive the next message in arrival order.
   *
   * Waits up to `connectWaitMs` for the link before failing with
   * not-connected, then waits as long as it takes for a message. Rejects with
   * `closed` if the connector closes while waiting, and with the `io` error
   * that ended the link once everything received before the loss is drained.
   */
  async receive(): Promise<Message> {
    const ready = this.queue.tryRecv();
    if (ready) return ready;

    await this.awaitLink();
    return this.queue.recv();
  }

  /**
   * Close the connector.
   *
   * Stops the accept and dial loops, releases pending `send`/`receive` calls,
   * closes every channel, then pauses for `closeDrainMs` so the ports can be
   * reused. Idempotent and never rejects.
   */
  close(): Promise<void> {
    this.closing ??= this.shutdown();
    return this.closing;
  }

  private async start(establisher: Establisher, endpoint: Endpoint): Promise<void> {
    try {
      await establisher.start(endpoint);
    } catch (e) {
      const error = LinkError.wrap(e, `cannot listen on port ${endpoint.listenPort}`);
      this.logger.log("error", error.message);
      await this.close();
      throw error;
    }
  }

  private async awaitLink(): Promise<EstablishedLink> {
    if (this._state === "closed") throw LinkError.closed();

    const link = await this.link.wait(this.config.connectWaitMs);
    if (this.state === "closed") throw LinkError.closed();
    if (!link) throw LinkError.notConnected(this.config.connectWaitMs);
    return link;
  }

  private onEstablished(link: EstablishedLink): void {
    if (this._state !== "establishing" || !this.link.offer(link)) {
      link.reader.close();
      link.writer.close();
      return;
    }

    if (this.establishTimer !== undefined) this.perf?.stop(this.establishTimer);
    this.setState("connected");
    this.logger.log("info", `connected via ${this.binding.name}`, {
      reader: link.reader.remote,
      writer: link.writer.remote,
    });

    this.startReading(link.reader);
    if (link.writer !== link.reader) this.startReading(link.writer);
  }

  private startReading(channel: LinkChannel): void {
    channel.start({
      message: (message) => {
        if (!this.queue.push(message)) return;
        this.logger.log("debug", `received ${message.tag}`, {
          bytes: message.payload?.length ?? 0,
        });
      },
      end: (error) => this.onChannelEnd(channel, error),
    });
  }

  private onChannelEnd(channel: LinkChannel, error?: Error): void {
    if (this._state === "closed" || this.lostError) return;

    const lost = error
      ? LinkError.wrap(error, `channel to ${channel.remote} failed`)
      : LinkError.io(`peer ${channel.remote} closed the connection`);
    this.lostError = lost;

    this.logger.log(error ? "error" : "info", `connection lost: ${lost.message}`);
    this.queue.end(lost);

    // A paired link is unusable once either half is gone.
    const link = this.link.value;
    if (link) {
      link.reader.close();
      link.writer.close();
    }

    this.onConnectionLost?.(lost);
  }

  private async shutdown(): Promise<void> {
    const previous = this._state;
    this.setState("closed");

    this.link.cancel();
    this.queue.clear(LinkError.closed());

    const establisher = this.establisher;
    if (establisher) {
      await establisher.stop();
      // Loops have stopped; now it is safe to release their handles.
      for (const channel of establisher.installed()) {
        this.closeChannel(channel);
      }
    }

    if (this.establishTimer !== undefined) this.perf?.stop(this.establishTimer);
    this.logger.log("info", `closed (was ${previous})`);

    if (previous !== "idle") {
      await sleep(this.config.closeDrainMs);
    }
  }

  private closeChannel(channel: LinkChannel): void {
    try {
      channel.close();
    } catch (e) {
      this.logger.log("debug", `closing ${channel.remote} failed: ${describeError(e)}`);
    }
  }

  private setState(state: ConnectionState): void {
    if (this._state === state) return;
    if (!ALLOWED_TRANSITIONS[this._state].includes(state)) {
      throw LinkError.state(`invalid transition ${this._state} -> ${state}`);
    }
    this._state = state;
    this.onStateChange?.(state);
  }
}
