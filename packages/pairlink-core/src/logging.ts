// Injected logging for connectors.
//
// Connectors never log through process-wide state: each one receives a Logger.
// `debugLogger` follows the DEBUG environment variable pattern of npm's debug
// package, `MemoryLogger` keeps entries for later inspection.

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  log(level: LogLevel, message: string, fields?: Record<string, unknown>): void;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  fields?: Record<string, unknown>;
}

/** True if `level` is at or above `minLevel`. */
export function levelEnabled(level: LogLevel, minLevel: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
}

/**
 * Check if a namespace is enabled by a DEBUG-style pattern list.
 * Supports wildcards (*) and exclusions (-prefix); later patterns win.
 */
export function isNamespaceEnabled(namespace: string, debug: string | undefined): boolean {
  if (!debug) return false;

  const patterns = debug.split(/[\s,]+/).filter(Boolean);
  let enabled = false;

  for (const pattern of patterns) {
    if (pattern.startsWith("-")) {
      if (matchPattern(namespace, pattern.slice(1))) {
        enabled = false;
      }
    } else if (matchPattern(namespace, pattern)) {
      enabled = true;
    }
  }

  return enabled;
}

/**
 * Match a namespace against a pattern with wildcard support.
 */
function matchPattern(namespace: string, pattern: string): boolean {
  if (pattern === "*") return true;

  const regexStr = pattern
    .replace(/[.+?^${}()|[\]\\]/g, "\\$&") // Escape special chars except *
    .replace(/\*/g, ".*");

  return new RegExp(`^${regexStr}$`).test(namespace);
}

export interface DebugLoggerOptions {
  /**
   * Pattern list deciding whether the namespace is enabled.
   * Defaults to `process.env.DEBUG`.
   */
  debug?: string;

  /**
   * Sink for formatted lines. Defaults to console.error so log output never
   * mixes with a program's stdout.
   */
  write?: (line: string, fields?: Record<string, unknown>) => void;
}

/**
 * Create a logger that writes `namespace`-prefixed lines when DEBUG matches.
 *
 * Errors are written even when the namespace is disabled.
 *
 * @example
 * ```typescript
 * // DEBUG=pairlink:* node peer.js
 * const connector = createTcpConnector({ logger: debugLogger("pairlink:peer-a") });
 * ```
 */
export function debugLogger(namespace: string, options: DebugLoggerOptions = {}): Logger {
  const enabled = isNamespaceEnabled(namespace, options.debug ?? process.env.DEBUG);
  const write =
    options.write ??
    ((line: string, fields?: Record<string, unknown>) => {
      if (fields) console.error(line, fields);
      else console.error(line);
    });

  return {
    log(level, message, fields) {
      if (!enabled && level !== "error") return;
      write(`${namespace} [${level}] ${message}`, fields);
    },
  };
}

/** A logger that keeps entries in memory until drained. */
export class MemoryLogger implements Logger {
  private entries: LogEntry[] = [];

  constructor(private readonly minLevel: LogLevel = "debug") {}

  get count(): number {
    return this.entries.length;
  }

  log(level: LogLevel, message: string, fields?: Record<string, unknown>): void {
    if (!levelEnabled(level, this.minLevel)) return;
    this.entries.push(fields ? { level, message, fields } : { level, message });
  }

  /** Remove and return every entry, oldest first. */
  drain(): LogEntry[] {
    const entries = this.entries;
    this.entries = [];
    return entries;
  }
}

export const silentLogger: Logger = {
  log() {},
};
