/**
 * HTTP/1.1 chunked transfer encoding helpers.
 *
 * Chunked format:
 *   <hex-size>[;ext]\r\n
 *   <data>\r\n
 *   ...
 *   0\r\n
 *   [trailer lines]\r\n
 *
 * The body handler in parser.ts pulls size lines through the transport's
 * line reader and reads chunk data in `remaining`-bounded pieces.
 */
import { Buffer } from "node:buffer";
import { PipeError } from "../errors.js";

const HEX_RE = /^[0-9a-fA-F]+$/;

/** Parse a chunk-size line, ignoring chunk extensions after ";" */
export function parseChunkSize(line: string): number {
  const semiIdx = line.indexOf(";");
  const sizeStr = (semiIdx === -1 ? line : line.substring(0, semiIdx)).trim();

  if (!HEX_RE.test(sizeStr)) {
    throw new PipeError("INVALID_CHUNK_SIZE", `Invalid chunk size: "${sizeStr}"`);
  }
  const size = parseInt(sizeStr, 16);
  if (!Number.isSafeInteger(size)) {
    throw new PipeError("INVALID_CHUNK_SIZE", `Chunk size too large: "${sizeStr}"`);
  }
  return size;
}

/** Encode one request body chunk in chunked framing */
export function encodeChunk(data: Uint8Array): Buffer {
  return Buffer.concat([
    Buffer.from(`${data.byteLength.toString(16)}\r\n`, "latin1"),
    data,
    Buffer.from("\r\n", "latin1"),
  ]);
}
