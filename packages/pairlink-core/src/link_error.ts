// Error taxonomy for the link layer.
//
// Callers tell "never connected" apart from "was connected, now broken" by
// the error kind, never by parsing messages.

export type LinkErrorKind =
  /** send/receive invoked without a live link after the bounded wait */
  | "not-connected"
  /** read/write failure, peer disconnect, or listener bind failure */
  | "io"
  /** malformed or oversized frame; fatal for the connection */
  | "framing"
  /** the connector has been closed */
  | "closed"
  /** operation not valid in the current connection state */
  | "state";

/** Error raised by connectors, channels and the frame codec. */
export class LinkError extends Error {
  constructor(
    public readonly kind: LinkErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "LinkError";
  }

  static notConnected(waitedMs: number): LinkError {
    return new LinkError("not-connected", `not connected to peer after waiting ${waitedMs}ms`);
  }

  static io(message: string, cause?: unknown): LinkError {
    return new LinkError("io", message, cause === undefined ? undefined : { cause });
  }

  static framing(message: string): LinkError {
    return new LinkError("framing", message);
  }

  static closed(): LinkError {
    return new LinkError("closed", "connector closed");
  }

  static state(message: string): LinkError {
    return new LinkError("state", message);
  }

  /**
   * Normalize anything thrown by a socket or library into a LinkError.
   * LinkErrors pass through unchanged.
   */
  static wrap(error: unknown, context: string): LinkError {
    if (error instanceof LinkError) return error;
    return LinkError.io(`${context}: ${describeError(error)}`, error);
  }
}

/** Human-readable message for an unknown thrown value. */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function isLinkError(error: unknown, kind?: LinkErrorKind): error is LinkError {
  return error instanceof LinkError && (kind === undefined || error.kind === kind);
}
