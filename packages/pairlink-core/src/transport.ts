/**
 * Transport binding abstraction.
 *
 * This module defines the capability interfaces a connector drives. The
 * connector never touches sockets directly; it asks a TransportBinding to
 * listen and dial, and talks to the resulting LinkChannels.
 *
 * Implementations:
 * - TcpBinding (pairlink-tcp) for byte streams with length-prefix framing
 * - WsBinding (pairlink-ws) for paired WebSocket channels with native framing
 */

import type { Message } from "./frame.ts";

/**
 * Receives what a channel reads.
 *
 * `message` is called once per decoded message, in arrival order. `end` is
 * called exactly once when the channel stops delivering: without an error for
 * a clean close, with one for I/O or framing failures.
 */
export interface ChannelSink {
  message(message: Message): void;
  end(error?: Error): void;
}

/**
 * One established connection to the peer.
 *
 * Handles framing internally:
 * - Byte streams encode each message as a length-prefixed frame
 * - Message-oriented transports carry tag and payload as native parts
 */
export interface LinkChannel {
  /** Human-readable description of the remote side, for logs. */
  readonly remote: string;

  /** True until the channel is closed locally or by the peer. */
  readonly isOpen: boolean;

  /**
   * Begin delivering inbound messages to `sink`. Called at most once; nothing
   * is read before it is called.
   */
  start(sink: ChannelSink): void;

  /**
   * Write one message as a single unit. Resolves once the transport has
   * accepted the bytes; there is no delivery acknowledgment.
   */
  send(message: Message): Promise<void>;

  /** Release the underlying handle. Idempotent. */
  close(): void;
}

/** A bound listening endpoint. */
export interface LinkListener {
  /** The port actually bound (differs from the requested one when it was 0). */
  readonly port: number;

  /** Stop accepting. Channels already accepted stay open. Idempotent. */
  close(): Promise<void>;
}

export interface ListenOptions {
  port: number;
  host: string;
  maxFrameSize: number;
}

export interface DialOptions {
  host: string;
  port: number;
  /** Give up on this attempt after this long. */
  timeoutMs: number;
  /** Aborting cancels the attempt. */
  signal: AbortSignal;
  maxFrameSize: number;
}

/**
 * A transport that can listen for and dial a peer.
 */
export interface TransportBinding {
  readonly name: string;

  /**
   * Whether one channel carries both directions.
   *
   * Duplex bindings race the accepted and the dialed channel and keep one.
   * Paired bindings read from the accepted channel and write to the dialed
   * one, so both must exist before the link is usable.
   */
  readonly duplex: boolean;

  /**
   * Bind a listener; `onChannel` is called for every accepted connection.
   * Rejects if the port cannot be bound.
   */
  listen(options: ListenOptions, onChannel: (channel: LinkChannel) => void): Promise<LinkListener>;

  /** Open one outbound channel. Rejects on refusal, timeout or abort. */
  dial(options: DialOptions): Promise<LinkChannel>;
}
