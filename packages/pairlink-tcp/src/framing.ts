// Length-prefixed framing for TCP streams.
//
// Each message travels as u32le(tagLength) ++ tag ++ u32le(payloadLength) ++ payload.

import net from "node:net";
import {
  type ChannelSink,
  DEFAULT_MAX_FRAME_SIZE,
  FrameAssembler,
  type LinkChannel,
  LinkError,
  type Message,
  encodeFrame,
} from "@pairlink/core";

/**
 * A TCP connection carrying length-prefixed frames.
 *
 * Reassembles frames from socket chunks and writes each message as one
 * buffer. Nothing is read from the socket until `start()` attaches a sink;
 * a close or error that happens earlier is reported as soon as it does.
 */
export class SocketChannel implements LinkChannel {
  readonly remote: string;
  private readonly assembler: FrameAssembler;
  private sink: ChannelSink | null = null;
  private ended = false;
  private endError: Error | undefined;

  constructor(
    private readonly socket: net.Socket,
    private readonly maxFrameSize: number = DEFAULT_MAX_FRAME_SIZE,
  ) {
    this.remote = `tcp://${socket.remoteAddress ?? "?"}:${socket.remotePort ?? "?"}`;
    this.assembler = new FrameAssembler(maxFrameSize);
    socket.setNoDelay(true);

    socket.on("error", (err: Error) => {
      this.finish(LinkError.io(`socket ${this.remote} failed: ${err.message}`, err));
    });

    socket.on("close", () => {
      this.finish();
    });
  }

  get isOpen(): boolean {
    return !this.ended && !this.socket.destroyed && this.socket.writable;
  }

  /** Bytes received that do not yet form a complete frame. */
  get buffered(): number {
    return this.assembler.buffered;
  }

  /** Get the underlying socket. */
  getSocket(): net.Socket {
    return this.socket;
  }

  start(sink: ChannelSink): void {
    if (this.sink) {
      throw LinkError.state("channel already started");
    }
    this.sink = sink;

    if (this.ended) {
      sink.end(this.endError);
      return;
    }

    this.socket.on("data", (chunk: Buffer) => {
      if (this.ended) return;

      try {
        this.assembler.push(chunk, (message) => sink.message(message));
      } catch (e) {
        this.finish(LinkError.wrap(e, `bad frame from ${this.remote}`));
        this.socket.destroy();
      }
    });
  }

  /**
   * Write one frame.
   *
   * The frame goes out in a single socket write, so frames from sequential
   * calls cannot interleave on the wire.
   */
  async send(message: Message): Promise<void> {
    const frame = encodeFrame(message, this.maxFrameSize);
    if (!this.isOpen) {
      throw LinkError.io(`socket ${this.remote} is closed`);
    }

    await new Promise<void>((resolve, reject) => {
      this.socket.write(frame, (err) => {
        if (err) reject(LinkError.io(`write to ${this.remote} failed: ${err.message}`, err));
        else resolve();
      });
    });
  }

  /** Close the connection. */
  close(): void {
    this.socket.destroy();
  }

  private finish(error?: Error): void {
    if (this.ended) return;
    this.ended = true;
    this.endError = error;
    this.sink?.end(error);
  }
}
