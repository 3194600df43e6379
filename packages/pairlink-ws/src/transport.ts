// Paired WebSocket transport for pairlink connectors.
//
// Each peer binds one WebSocket server and dials the other's: the accepted
// socket carries inbound messages, the dialed one outbound. WebSocket provides
// message boundaries, so a message travels as two frames: a text frame with
// the tag followed by a binary frame with the payload (possibly empty).

import WebSocket, { WebSocketServer } from "ws";
import {
  type ChannelSink,
  Connector,
  type ConnectorOptions,
  DEFAULT_MAX_FRAME_SIZE,
  type DialOptions,
  type LinkChannel,
  LinkError,
  type LinkListener,
  type ListenOptions,
  type Logger,
  type Message,
  type TransportBinding,
  decodeParts,
  encodeParts,
  silentLogger,
} from "@pairlink/core";

/** Close code ws uses when an inbound message exceeds maxPayload. */
const MESSAGE_TOO_BIG = 1009;

type Part = { text: true; tag: string } | { text: false; bytes: Uint8Array };

function toBytes(data: WebSocket.RawData): Uint8Array {
  if (Array.isArray(data)) return Buffer.concat(data);
  if (data instanceof ArrayBuffer) return new Uint8Array(data);
  return data;
}

function errorCode(err: Error): string | undefined {
  return "code" in err && typeof err.code === "string" ? err.code : undefined;
}

/** Format host:port for a ws:// URL, bracketing IPv6 literals. */
export function wsUrl(host: string, port: number): string {
  const h = host.includes(":") && !host.startsWith("[") ? `[${host}]` : host;
  return `ws://${h}:${port}`;
}

/**
 * One WebSocket carrying tag/payload frame pairs.
 *
 * Parts that arrive before `start()` are held back and replayed in order.
 */
export class PairedChannel implements LinkChannel {
  private sink: ChannelSink | null = null;
  private early: Part[] = [];
  private pendingTag: string | null = null;
  private ended = false;
  private endError: Error | undefined;

  constructor(
    private readonly ws: WebSocket,
    readonly remote: string,
    private readonly maxFrameSize: number = DEFAULT_MAX_FRAME_SIZE,
  ) {
    ws.on("message", (data: WebSocket.RawData, isBinary: boolean) => {
      const part: Part = isBinary
        ? { text: false, bytes: toBytes(data) }
        : { text: true, tag: Buffer.from(toBytes(data)).toString("utf8") };
      if (this.sink) this.deliver(part, this.sink);
      else this.early.push(part);
    });

    ws.on("error", (err: Error) => {
      if (errorCode(err) === "WS_ERR_UNSUPPORTED_MESSAGE_LENGTH") {
        this.finish(LinkError.framing(`message from ${remote} exceeds ${maxFrameSize} bytes`));
      } else {
        this.finish(LinkError.io(`websocket ${remote} failed: ${err.message}`, err));
      }
    });

    ws.on("close", (code: number) => {
      this.finish(
        code === MESSAGE_TOO_BIG
          ? LinkError.framing(`peer ${remote} rejected an oversized message`)
          : undefined,
      );
    });
  }

  get isOpen(): boolean {
    return !this.ended && this.ws.readyState === WebSocket.OPEN;
  }

  start(sink: ChannelSink): void {
    if (this.sink) {
      throw LinkError.state("channel already started");
    }
    this.sink = sink;

    const early = this.early;
    this.early = [];
    for (const part of early) {
      this.deliver(part, sink);
    }

    if (this.ended) {
      sink.end(this.endError);
    }
  }

  /**
   * Send the tag and payload frames back to back.
   *
   * Both frames are queued in the same tick, so frames of another send can
   * never fall between them.
   */
  async send(message: Message): Promise<void> {
    const [tag, payload] = encodeParts(message);
    const tagBytes = Buffer.byteLength(tag, "utf8");
    if (tagBytes > this.maxFrameSize || payload.length > this.maxFrameSize) {
      throw LinkError.framing(`message ${tag} exceeds maximum part size of ${this.maxFrameSize}`);
    }
    if (!this.isOpen) {
      throw LinkError.io(`websocket ${this.remote} is closed`);
    }

    await new Promise<void>((resolve, reject) => {
      const onSent = (err?: Error) => {
        if (err) reject(LinkError.io(`write to ${this.remote} failed: ${err.message}`, err));
      };
      this.ws.send(tag, { binary: false }, onSent);
      this.ws.send(payload, { binary: true }, (err?: Error) => {
        onSent(err);
        if (!err) resolve();
      });
    });
  }

  close(): void {
    this.ws.terminate();
  }

  private deliver(part: Part, sink: ChannelSink): void {
    if (this.ended) return;

    if (part.text) {
      if (this.pendingTag !== null) {
        this.fail(LinkError.framing(`tag "${this.pendingTag}" from ${this.remote} has no payload part`));
        return;
      }
      this.pendingTag = part.tag;
      return;
    }

    if (this.pendingTag === null) {
      this.fail(LinkError.framing(`payload part from ${this.remote} has no tag part`));
      return;
    }
    const tag = this.pendingTag;
    this.pendingTag = null;
    sink.message(decodeParts(tag, part.bytes));
  }

  private fail(error: LinkError): void {
    this.finish(error);
    this.ws.terminate();
  }

  private finish(error?: Error): void {
    if (this.ended) return;
    this.ended = true;
    this.endError = error;
    this.sink?.end(error);
  }
}

/** A bound WebSocket server. */
class WsListener implements LinkListener {
  readonly port: number;
  private closed = false;

  constructor(
    private readonly server: WebSocketServer,
    requestedPort: number,
  ) {
    const address = server.address();
    this.port = typeof address === "object" && address !== null ? address.port : requestedPort;
  }

  close(): Promise<void> {
    if (!this.closed) {
      this.closed = true;
      // Stops accepting; sockets already accepted stay open.
      this.server.close();
    }
    return Promise.resolve();
  }
}

/**
 * Paired-channel binding over WebSocket.
 *
 * Not duplex: reads come from the accepted socket and writes go to the dialed
 * one, so the link is established only once both exist.
 */
export class WsBinding implements TransportBinding {
  readonly name = "ws";
  readonly duplex = false;

  constructor(private readonly logger: Logger = silentLogger) {}

  listen(options: ListenOptions, onChannel: (channel: LinkChannel) => void): Promise<LinkListener> {
    const { port, host, maxFrameSize } = options;

    return new Promise((resolve, reject) => {
      const server = new WebSocketServer({ port, host, maxPayload: maxFrameSize });

      server.on("connection", (ws, req) => {
        const remote = `ws://${req.socket.remoteAddress ?? "?"}:${req.socket.remotePort ?? "?"}`;
        onChannel(new PairedChannel(ws, remote, maxFrameSize));
      });

      const onListenError = (err: Error) => {
        reject(LinkError.io(`cannot listen on ${host}:${port}: ${err.message}`, err));
      };
      server.once("error", onListenError);

      server.once("listening", () => {
        server.off("error", onListenError);
        const listener = new WsListener(server, port);
        server.on("error", (err: Error) => {
          this.logger.log("warn", `ws listener on port ${listener.port} failed: ${err.message}`);
          void listener.close();
        });
        resolve(listener);
      });
    });
  }

  /**
   * Open the outbound WebSocket to the peer.
   */
  dial(options: DialOptions): Promise<LinkChannel> {
    const { host, port, timeoutMs, signal, maxFrameSize } = options;
    const url = wsUrl(host, port);

    return new Promise((resolve, reject) => {
      if (signal.aborted) {
        reject(LinkError.closed());
        return;
      }

      const ws = new WebSocket(url, { handshakeTimeout: timeoutMs, maxPayload: maxFrameSize });
      let settled = false;

      const settle = () => {
        settled = true;
        clearTimeout(timer);
        signal.removeEventListener("abort", onAbort);
      };
      const fail = (error: LinkError) => {
        if (settled) return;
        settle();
        ws.terminate();
        reject(error);
      };
      const onAbort = () => {
        fail(LinkError.closed());
      };

      const timer = setTimeout(() => {
        fail(LinkError.io(`connect to ${url} timed out after ${timeoutMs}ms`));
      }, timeoutMs);
      signal.addEventListener("abort", onAbort, { once: true });

      // Stays attached after settling: terminating a connecting socket still
      // emits an error, which must not go unhandled.
      ws.on("error", (err: Error) => {
        fail(LinkError.io(`connect to ${url} failed: ${err.message}`, err));
      });

      ws.once("open", () => {
        if (settled) return;
        settle();
        resolve(new PairedChannel(ws, url, maxFrameSize));
      });
    });
  }
}

/**
 * Create a connector over paired WebSockets.
 *
 * @example
 * ```typescript
 * const b = createWsConnector();
 * await b.connect(20001, 20000);
 * const { tag, payload } = await b.receive();
 * ```
 */
export function createWsConnector(options: ConnectorOptions = {}): Connector {
  return new Connector(new WsBinding(options.logger), options);
}
