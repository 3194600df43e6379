// Paired WebSocket transport for pairlink connectors.
//
// WebSocket provides message framing; each peer binds one socket and dials
// the other.

export { PairedChannel, WsBinding, createWsConnector, wsUrl } from "./transport.ts";

export {
  Connector,
  type ConnectionState,
  type ConnectorOptions,
  type NetworkConnector,
  type Message,
  LinkError,
  type LinkErrorKind,
} from "@pairlink/core";
