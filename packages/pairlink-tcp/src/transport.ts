// TCP transport for pairlink connectors.

import net from "node:net";
import {
  Connector,
  type ConnectorOptions,
  type DialOptions,
  type LinkChannel,
  LinkError,
  type LinkListener,
  type ListenOptions,
  type Logger,
  type TransportBinding,
  silentLogger,
} from "@pairlink/core";
import { SocketChannel } from "./framing.ts";

/** A bound TCP server handing accepted sockets to the establisher. */
class TcpListener implements LinkListener {
  readonly port: number;
  private closed = false;

  constructor(
    private readonly server: net.Server,
    requestedPort: number,
  ) {
    const address = server.address();
    this.port = typeof address === "object" && address !== null ? address.port : requestedPort;
  }

  close(): Promise<void> {
    if (!this.closed) {
      this.closed = true;
      // Stops accepting immediately; accepted sockets are not affected.
      this.server.close();
    }
    return Promise.resolve();
  }
}

/**
 * Raw stream-socket binding.
 *
 * One TCP connection carries both directions, so the accepted and the dialed
 * socket race and only one survives.
 */
export class TcpBinding implements TransportBinding {
  readonly name = "tcp";
  readonly duplex = true;

  constructor(private readonly logger: Logger = silentLogger) {}

  listen(options: ListenOptions, onChannel: (channel: LinkChannel) => void): Promise<LinkListener> {
    const { port, host, maxFrameSize } = options;

    return new Promise((resolve, reject) => {
      const server = net.createServer((socket) => {
        onChannel(new SocketChannel(socket, maxFrameSize));
      });

      const onListenError = (err: Error) => {
        reject(LinkError.io(`cannot listen on ${host}:${port}: ${err.message}`, err));
      };
      server.once("error", onListenError);

      server.listen(port, host, () => {
        server.off("error", onListenError);
        const listener = new TcpListener(server, port);
        // Accept failures after binding (e.g. EMFILE) stop the listener; the
        // dial loop may still connect.
        server.on("error", (err: Error) => {
          this.logger.log("warn", `tcp listener on port ${listener.port} failed: ${err.message}`);
          void listener.close();
        });
        resolve(listener);
      });
    });
  }

  /**
   * Connect to a peer.
   */
  dial(options: DialOptions): Promise<LinkChannel> {
    const { host, port, timeoutMs, signal, maxFrameSize } = options;

    return new Promise((resolve, reject) => {
      if (signal.aborted) {
        reject(LinkError.closed());
        return;
      }

      const socket = net.createConnection({ host, port });
      const timer = setTimeout(() => {
        fail(LinkError.io(`connect to ${host}:${port} timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      const cleanup = () => {
        clearTimeout(timer);
        signal.removeEventListener("abort", onAbort);
        socket.off("error", onError);
        socket.off("connect", onConnect);
      };
      const fail = (error: LinkError) => {
        cleanup();
        socket.destroy();
        reject(error);
      };
      const onError = (err: Error) => {
        fail(LinkError.io(`connect to ${host}:${port} failed: ${err.message}`, err));
      };
      const onAbort = () => {
        fail(LinkError.closed());
      };
      const onConnect = () => {
        cleanup();
        resolve(new SocketChannel(socket, maxFrameSize));
      };

      signal.addEventListener("abort", onAbort, { once: true });
      socket.once("error", onError);
      socket.once("connect", onConnect);
    });
  }
}

/**
 * Create a connector over TCP.
 *
 * @example
 * ```typescript
 * const a = createTcpConnector();
 * await a.connect(20000, 20001);
 * await a.send("hello", new Uint8Array([0x01, 0x02]));
 * ```
 */
export function createTcpConnector(options: ConnectorOptions = {}): Connector {
  return new Connector(new TcpBinding(options.logger), options);
}
