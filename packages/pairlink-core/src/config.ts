// Connector configuration.

import { DEFAULT_MAX_FRAME_SIZE } from "./frame.ts";

/** Timing and sizing knobs for a connector. */
export interface ConnectorConfig {
  /** Per-attempt timeout for outbound dials. */
  dialAttemptTimeoutMs: number;
  /** Pause between failed outbound dials. */
  dialRetryDelayMs: number;
  /** How long send/receive wait for the link before failing with not-connected. */
  connectWaitMs: number;
  /** Upper bound on waiting for background loops during close. */
  joinTimeoutMs: number;
  /** Pause after close so the OS can reclaim the ports. */
  closeDrainMs: number;
  /** Largest frame accepted or produced, in bytes. */
  maxFrameSize: number;
  /** Interface the listener binds to. */
  listenHost: string;
}

/** Default connector configuration. */
export function defaultConnectorConfig(): ConnectorConfig {
  return {
    dialAttemptTimeoutMs: 500,
    dialRetryDelayMs: 200,
    connectWaitMs: 2000,
    joinTimeoutMs: 500,
    closeDrainMs: 250,
    maxFrameSize: DEFAULT_MAX_FRAME_SIZE,
    listenHost: "0.0.0.0",
  };
}

export function resolveConnectorConfig(config?: Partial<ConnectorConfig>): ConnectorConfig {
  return { ...defaultConnectorConfig(), ...config };
}

type NumericField = {
  [K in keyof ConnectorConfig]: ConnectorConfig[K] extends number ? K : never;
}[keyof ConnectorConfig];

const NUMERIC_ENV: ReadonlyArray<readonly [NumericField, string]> = [
  ["dialAttemptTimeoutMs", "PAIRLINK_DIAL_TIMEOUT_MS"],
  ["dialRetryDelayMs", "PAIRLINK_DIAL_RETRY_MS"],
  ["connectWaitMs", "PAIRLINK_CONNECT_WAIT_MS"],
  ["joinTimeoutMs", "PAIRLINK_JOIN_TIMEOUT_MS"],
  ["closeDrainMs", "PAIRLINK_CLOSE_DRAIN_MS"],
  ["maxFrameSize", "PAIRLINK_MAX_FRAME_SIZE"],
];

/**
 * Read configuration overrides from `PAIRLINK_*` environment variables.
 *
 * Only variables that are set appear in the result, so it can be spread over
 * explicit options. Non-numeric or negative values throw a RangeError.
 */
export function configFromEnv(
  env: Record<string, string | undefined> = process.env,
): Partial<ConnectorConfig> {
  const config: Partial<ConnectorConfig> = {};

  for (const [field, key] of NUMERIC_ENV) {
    const raw = env[key];
    if (raw === undefined || raw === "") continue;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < 0) {
      throw new RangeError(`${key} must be a non-negative integer, got "${raw}"`);
    }
    config[field] = value;
  }

  const host = env.PAIRLINK_LISTEN_HOST;
  if (host) config.listenHost = host;

  return config;
}

/** A peer address. */
export interface PeerAddress {
  host: string;
  port: number;
}

/**
 * Parse `host:port` (IPv6 hosts may be bracketed: `[::1]:9000`).
 */
export function parseEndpoint(addr: string): PeerAddress {
  const lastColon = addr.lastIndexOf(":");
  if (lastColon < 0) {
    throw new RangeError(`Invalid address: ${addr}`);
  }
  let host = addr.slice(0, lastColon);
  if (host.startsWith("[") && host.endsWith("]")) {
    host = host.slice(1, -1);
  }
  const port = Number(addr.slice(lastColon + 1));
  if (host === "" || !isValidPort(port) || port === 0) {
    throw new RangeError(`Invalid address: ${addr}`);
  }
  return { host, port };
}

export function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= 0 && port <= 65535;
}
