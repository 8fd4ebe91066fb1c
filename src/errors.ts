/**
 * Error taxonomy for the pipe.
 * Every failure carries a machine-readable `code`; transport failures
 * additionally carry the reason and any bytes received before a close.
 */

export type PipeErrorCode =
  | "NOT_INITIALIZED"
  | "NOT_READY"
  | "NOT_READY_FOR_BODY"
  | "INVALID_VERSION"
  | "INVALID_ARGUMENT_COUNT"
  | "INVALID_HEADER"
  | "INVALID_METHOD"
  | "INVALID_TARGET"
  | "INVALID_CHUNK_SIZE"
  | "MALFORMED_STATUS_LINE"
  | "PREMATURE_CLOSE"
  | "BODY_LENGTH_MISMATCH"
  | "LINE_TOO_LONG"
  | "BAD_STATE"
  | "TRANSPORT";

export class PipeError extends Error {
  readonly code: PipeErrorCode;

  constructor(code: PipeErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PipeError";
    this.code = code;
  }
}

export type TransportErrorReason = "closed" | "timeout" | "connect" | "send" | "error";

export class TransportError extends PipeError {
  readonly reason: TransportErrorReason;
  /** Bytes received before the peer closed (only for reason "closed") */
  readonly partial: Uint8Array | null;

  constructor(
    reason: TransportErrorReason,
    message: string,
    options?: { cause?: unknown; partial?: Uint8Array | null },
  ) {
    super("TRANSPORT", message, options);
    this.name = "TransportError";
    this.reason = reason;
    this.partial = options?.partial && options.partial.byteLength > 0 ? options.partial : null;
  }
}

/** A status line that does not look like `HTTP/x.y NNN`; the raw line is kept. */
export class MalformedStatusLineError extends PipeError {
  readonly line: string;

  constructor(line: string) {
    super("MALFORMED_STATUS_LINE", `Malformed status line: ${JSON.stringify(line)}`);
    this.name = "MalformedStatusLineError";
    this.line = line;
  }
}

export function isTransportClosed(err: unknown): err is TransportError {
  return err instanceof TransportError && err.reason === "closed";
}

export function notInitialized(): PipeError {
  return new PipeError("NOT_INITIALIZED", "Pipe not initialized: no transport bound");
}
