/**
 * HTTP/1.x request encoder.
 * Turns request options into the request line and header block bytes.
 */
import { Buffer } from "node:buffer";
import { PipeError } from "../errors.js";
import {
  normalizeHeaderName,
  serializeHttp1Headers,
  validateMethod,
  validateRequestTarget,
  type HeaderValue,
  type NormalizedHeaders,
} from "../utils/headers.js";
import { encodeQuery, escapePath, type QueryValue } from "../utils/url.js";

export const VERSION = "0.1.0";
export const USER_AGENT = `h1pipe/${VERSION}`;

/** 0 selects HTTP/1.0, 1 selects HTTP/1.1 */
export type HttpVersion = 0 | 1;

/**
 * Pull-based request body: each call yields the next chunk;
 * null, undefined or an empty chunk ends the body.
 */
export type BodyProducer = () =>
  | string
  | Uint8Array
  | null
  | undefined
  | Promise<string | Uint8Array | null | undefined>;

export type RequestBody = string | Uint8Array | BodyProducer;

export interface EncodeOptions {
  /** HTTP method (default: GET) */
  method?: string;
  /** Request path, escaped segment by segment (default: "/") */
  path?: string;
  /** Query table, or a pre-encoded query string appended verbatim */
  query?: Readonly<Record<string, QueryValue>> | string;
  /** Request headers; names are case-insensitive */
  headers?: Readonly<Record<string, HeaderValue>>;
  body?: RequestBody;
  /** HTTP version selector (default: 1) */
  version?: number;
}

export interface EncodedRequest {
  /** Request line and header block, ending with the blank line */
  head: string;
  headers: NormalizedHeaders;
  /** Uppercased method */
  method: string;
}

const HTTP_1_1 = " HTTP/1.1\r\n";
const HTTP_1_0 = " HTTP/1.0\r\n";

export function isHttpVersion(version: unknown): version is HttpVersion {
  return version === 0 || version === 1;
}

/** Whether the caller asked for chunked request framing */
export function isChunkedRequest(headers: NormalizedHeaders): boolean {
  const te = headers["Transfer-Encoding"];
  return te !== undefined && String(te).toLowerCase().includes("chunked");
}

function bodyLength(body: string | Uint8Array): number {
  return typeof body === "string" ? Buffer.byteLength(body, "utf-8") : body.byteLength;
}

/** Content-Length as a number; absent or non-numeric values count as 0 */
export function toContentLength(value: HeaderValue | undefined): number {
  const n = Number(Array.isArray(value) ? value[0] : value);
  return value !== undefined && value !== "" && Number.isFinite(n) && n >= 0 ? n : 0;
}

/**
 * Build the request head.
 * @param host Connection target, used as the default Host header
 */
export function encodeRequest(options: EncodeOptions, host: string): EncodedRequest {
  const version = options.version ?? 1;
  if (!isHttpVersion(version)) {
    throw new PipeError("INVALID_VERSION", `Unknown HTTP version: ${String(version)}`);
  }

  const method = (options.method ?? "GET").toUpperCase();
  validateMethod(method);

  let path = options.path ?? "/";
  if (!path.startsWith("/")) {
    path = `/${path}`;
  }
  let target = escapePath(path);

  const query =
    typeof options.query === "string"
      ? options.query
      : options.query && encodeQuery(options.query);
  if (query !== undefined) {
    validateRequestTarget(query);
    target += `?${query}`;
  }

  const headers: NormalizedHeaders = {};
  for (const [name, value] of Object.entries(options.headers ?? {})) {
    headers[normalizeHeaderName(name)] = value;
  }

  // Transfer-Encoding takes precedence over Content-Length (RFC 7230 Section 3.3.3)
  const chunked = isChunkedRequest(headers);
  const body = options.body;
  if (chunked) {
    delete headers["Content-Length"];
  } else if (typeof body === "string" || body instanceof Uint8Array) {
    headers["Content-Length"] = bodyLength(body);
  }

  if ((method === "PUT" || method === "POST") && !chunked) {
    headers["Content-Length"] = toContentLength(headers["Content-Length"]);
  }

  if (headers["Host"] === undefined) {
    headers["Host"] = host;
  }
  if (headers["User-Agent"] === undefined) {
    headers["User-Agent"] = USER_AGENT;
  }
  if (headers["Accept"] === undefined) {
    headers["Accept"] = "*/*";
  }
  if (version === 0 && headers["Connection"] === undefined) {
    headers["Connection"] = "Keep-Alive";
  }

  const requestLine = `${method} ${target}${version === 1 ? HTTP_1_1 : HTTP_1_0}`;
  const head = `${requestLine}${serializeHttp1Headers(headers)}\r\n`;

  return { head, headers, method };
}
