// @pairlink/core - transport-agnostic core of the pairlink connector
// This package provides the frame codec, the connector and its building blocks.

// Frame codec
export {
  type Message,
  type DecodeFrameResult,
  type MessageParts,
  LENGTH_PREFIX_SIZE,
  DEFAULT_MAX_FRAME_SIZE,
  createMessage,
  frameSize,
  encodeFrame,
  decodeFrame,
  FrameAssembler,
  encodeParts,
  decodeParts,
} from "./frame.ts";

// Errors
export { LinkError, type LinkErrorKind, describeError, isLinkError } from "./link_error.ts";

// Transport abstraction
export type {
  ChannelSink,
  LinkChannel,
  LinkListener,
  ListenOptions,
  DialOptions,
  TransportBinding,
} from "./transport.ts";

// Connector and establishment
export {
  Connector,
  type ConnectionState,
  type ConnectorOptions,
  type NetworkConnector,
} from "./connector.ts";
export {
  Establisher,
  type Endpoint,
  type EstablishedLink,
  type EstablisherOptions,
} from "./establisher.ts";

// Concurrency primitives
export { InboundQueue } from "./queue.ts";
export { HandleSlot } from "./slot.ts";
export { WriteLock } from "./write_lock.ts";
export { sleep, settleWithin } from "./timers.ts";

// Configuration
export {
  type ConnectorConfig,
  type PeerAddress,
  defaultConnectorConfig,
  resolveConnectorConfig,
  configFromEnv,
  parseEndpoint,
  isValidPort,
} from "./config.ts";

// Logging and timing
export {
  type Logger,
  type LogLevel,
  type LogEntry,
  type DebugLoggerOptions,
  debugLogger,
  isNamespaceEnabled,
  levelEnabled,
  MemoryLogger,
  silentLogger,
} from "./logging.ts";
export { PerfCollector, PerfReport, type Measurement, type PerfCollectorOptions } from "./perf.ts";
