/**
 * HTTP/1.x response state machine.
 * Pulls the response off the transport one event at a time:
 *
 *   BEGIN -> READING_HEADER -> READING_BODY -> EOF
 *
 * A 100 Continue status loops back to BEGIN once. Each state has one
 * handler; `readEvent` picks the handler from the current state.
 */
import { Buffer } from "node:buffer";
import { PipeError, isTransportClosed, notInitialized } from "../errors.js";
import type { LineReader, Transport } from "../socket/transport.js";
import { normalizeHeaderName } from "../utils/headers.js";
import { parseChunkSize } from "./chunked.js";
import { PipeState, type ParseEvent, type PipeContext } from "./context.js";
import { finalize } from "./lifecycle.js";

type StateHandler = (ctx: PipeContext, transport: Transport) => Promise<ParseEvent>;

const STATUS_LINE_RE = /^HTTP\/(\d*\.\d*) (\d{3})/;
const HEADER_LINE_RE = /^([^:]*):\s*([\s\S]*)$/;
const CONTENT_LENGTH_RE = /^\d+$/;

const HEADER_END: ParseEvent = { type: "header_end" };
const BODY_END: ParseEvent = { type: "body_end" };
const EOF: ParseEvent = { type: "eof" };

function lineReader(ctx: PipeContext, transport: Transport): LineReader {
  if (!ctx.readLine) {
    ctx.readLine = transport.receiveUntil("\r\n");
  }
  return ctx.readLine;
}

/** Comma-separated Connection tokens, lowercased */
function connectionTokens(value: string): string[] {
  return value.split(",").map(token => token.trim().toLowerCase());
}

async function readStatusLine(ctx: PipeContext, transport: Transport): Promise<ParseEvent> {
  const readLine = lineReader(ctx, transport);
  const line = await readLine();

  const match = STATUS_LINE_RE.exec(line);
  if (!match) {
    return { type: "malformed_statusline", line };
  }

  const version = match[1];
  const status = Number(match[2]);

  if (status === 100) {
    // Interim response: skip its blank line, the real status line follows
    await readLine();
    ctx.state = PipeState.Begin;
  } else {
    ctx.status = status;
    ctx.state = PipeState.ReadingHeader;
    if (version === "1.0") {
      ctx.keepalive = false;
    }
  }

  return { type: "statusline", status, version, line };
}

async function readHeaderPart(ctx: PipeContext, transport: Transport): Promise<ParseEvent> {
  const line = await lineReader(ctx, transport)();

  if (line === "") {
    // Transfer-Encoding overrides Content-Length (RFC 7230 3.3.3)
    if (ctx.chunked) {
      ctx.remaining = 0;
    }
    ctx.state = PipeState.ReadingBody;
    return HEADER_END;
  }

  const match = HEADER_LINE_RE.exec(line);
  if (!match) {
    return { type: "header", field: null, line };
  }

  const name = match[1];
  const value = match[2];
  const token = value.trim();

  switch (name.toLowerCase()) {
    case "content-length":
      if (ctx.chunked) {
        console.debug("[pipe] ignoring content-length on a chunked response");
      } else if (CONTENT_LENGTH_RE.test(token)) {
        ctx.remaining = Number(token);
      } else {
        console.debug(`[pipe] ignoring invalid content-length: ${JSON.stringify(value)}`);
      }
      break;
    case "transfer-encoding":
      if (token.toLowerCase() !== "identity") {
        ctx.chunked = true;
      }
      break;
    case "connection": {
      const tokens = connectionTokens(token);
      if (tokens.includes("close")) {
        ctx.keepalive = false;
      } else if (tokens.includes("keep-alive")) {
        ctx.keepalive = true;
      }
      break;
    }
  }

  return { type: "header", field: { name: normalizeHeaderName(name), value }, line };
}

/** Responses that never carry a body, whatever their headers say */
function isBodyless(ctx: PipeContext): boolean {
  return ctx.method === "HEAD" || ctx.status === 204 || ctx.status === 304;
}

async function readChunkHeader(ctx: PipeContext, transport: Transport): Promise<boolean> {
  const readLine = lineReader(ctx, transport);

  // The CRLF closing the previous chunk's data
  let line = await readLine();
  if (line === "") {
    line = await readLine();
  }

  const size = parseChunkSize(line);
  if (size === 0) {
    // Skip trailer fields up to the terminating blank line
    while ((await readLine()) !== "") {
      // discard
    }
    return false;
  }

  ctx.remaining = size;
  return true;
}

async function readBodyPart(ctx: PipeContext, transport: Transport): Promise<ParseEvent> {
  if (isBodyless(ctx)) {
    ctx.state = PipeState.Eof;
    return BODY_END;
  }

  if (ctx.chunked && ctx.remaining === 0) {
    let more: boolean;
    try {
      more = await readChunkHeader(ctx, transport);
    } catch (err) {
      if (!isTransportClosed(err)) throw err;
      throw prematureClose(ctx, "Connection closed before the last chunk", err);
    }
    if (!more) {
      ctx.state = PipeState.Eof;
      return BODY_END;
    }
  }

  if (ctx.remaining === 0) {
    ctx.state = PipeState.Eof;
    return BODY_END;
  }

  const size = Math.min(ctx.remaining, ctx.chunkSize);
  try {
    const chunk = await transport.receive(size);
    ctx.remaining -= chunk.byteLength;
    return { type: "body", chunk };
  } catch (err) {
    if (!isTransportClosed(err)) throw err;

    const partial = err.partial;
    if (!partial || partial.byteLength < ctx.remaining) {
      ctx.remaining -= partial ? partial.byteLength : 0;
      throw prematureClose(
        ctx,
        `Connection closed with ${ctx.remaining} body bytes outstanding`,
        err,
      );
    }

    // The last bytes arrived with the close; body_end follows on the next read
    const chunk = Buffer.from(partial).subarray(0, ctx.remaining);
    ctx.keepalive = false;
    ctx.remaining = 0;
    return { type: "body", chunk };
  }
}

/** The transport is gone mid-body; nothing goes back to the pool */
function prematureClose(ctx: PipeContext, message: string, cause: unknown): PipeError {
  ctx.state = PipeState.Eof;
  ctx.keepalive = false;
  return new PipeError("PREMATURE_CLOSE", message, { cause });
}

async function readEof(ctx: PipeContext): Promise<ParseEvent> {
  finalize(ctx);
  return EOF;
}

function handlerFor(state: PipeState): StateHandler | undefined {
  switch (state) {
    case PipeState.Begin:
      return readStatusLine;
    case PipeState.ReadingHeader:
      return readHeaderPart;
    case PipeState.ReadingBody:
      return readBodyPart;
    case PipeState.Eof:
      return readEof;
    default:
      return undefined;
  }
}

/**
 * Read the next response event.
 * Transport failures reject as-is; a malformed status line comes back
 * as a `malformed_statusline` event.
 */
export async function readEvent(ctx: PipeContext): Promise<ParseEvent> {
  const transport = ctx.transport;
  if (!transport) throw notInitialized();

  if (ctx.state === PipeState.NotReady) {
    throw new PipeError("NOT_READY", "Pipe not ready: no request dispatched");
  }

  if (ctx.readTimeout !== undefined) {
    transport.setTimeout(ctx.readTimeout);
  }

  const handler = handlerFor(ctx.state);
  if (!handler) {
    throw new PipeError("BAD_STATE", `Bad state: ${String(ctx.state)}`);
  }
  return handler(ctx, transport);
}
