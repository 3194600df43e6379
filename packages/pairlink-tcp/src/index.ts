// @pairlink/tcp - TCP transport for pairlink connectors (Node.js only)
//
// Provides TCP-specific I/O: socket framing, listening and dialing.

export { SocketChannel } from "./framing.ts";
export { TcpBinding, createTcpConnector } from "./transport.ts";

// Re-export the connector surface from core
export {
  Connector,
  type ConnectionState,
  type ConnectorOptions,
  type NetworkConnector,
  type Message,
  LinkError,
  type LinkErrorKind,
} from "@pairlink/core";
