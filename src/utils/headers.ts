/**
 * Header utilities for HTTP/1.x.
 * Canonical name casing, injection checks and wire serialization.
 */
import { PipeError } from "../errors.js";

/** One header value, or several values emitted as separate lines */
export type HeaderValue = string | number | Array<string | number>;

/** Header map keyed by canonical header name, in emission order */
export type NormalizedHeaders = Record<string, HeaderValue>;

const COMMON_HEADERS: ReadonlyMap<string, string> = new Map(
  [
    "Cache-Control",
    "Content-Length",
    "Content-Type",
    "Date",
    "ETag",
    "Expires",
    "Host",
    "Location",
    "User-Agent",
  ].map(name => [name.toLowerCase(), name] as const),
);

const TITLE_CASE_RE = /(^|-)([a-z])/g;

/**
 * Canonical display form of a header name.
 * Well-known names come from a fixed table ("etag" -> "ETag"); anything else
 * gets its first letter and each letter after a hyphen uppercased, with the
 * remaining characters left as given.
 */
export function normalizeHeaderName(name: string): string {
  const common = COMMON_HEADERS.get(name.toLowerCase());
  if (common) return common;
  return name.replace(TITLE_CASE_RE, (_, sep: string, ch: string) => sep + ch.toUpperCase());
}

const INVALID_HEADER_CHAR_RE = /[\r\n\0]/;

// RFC 7230 3.2.6. Field Value Components: token = 1*tchar
// tchar = "!" / "#" / "$" / "%" / "&" / "'" / "*" / "+" / "-" / "." / "^" / "_" / "`" / "|" / "~" / DIGIT / ALPHA
const TOKEN_RE = /^[a-zA-Z0-9!#$%&'*+.^_`|~-]+$/;

/**
 * Validate header name against RFC 7230 token characters.
 */
export function validateHeaderName(name: string): void {
  if (!TOKEN_RE.test(name)) {
    throw new PipeError(
      "INVALID_HEADER",
      `Invalid header name: ${JSON.stringify(name)} contains invalid characters`,
    );
  }
}

/**
 * Validate header value against CR/LF/NUL injection.
 */
export function validateHeaderValue(name: string, value: string): void {
  if (INVALID_HEADER_CHAR_RE.test(value)) {
    throw new PipeError("INVALID_HEADER", `Invalid header value for "${name}": contains CR/LF/NUL`);
  }
}

/**
 * Validate HTTP method to prevent CRLF injection and ensure valid token characters.
 */
export function validateMethod(method: string): void {
  if (!TOKEN_RE.test(method)) {
    throw new PipeError(
      "INVALID_METHOD",
      `Invalid method: ${JSON.stringify(method)} contains invalid characters`,
    );
  }
}

// RFC 7230 3.1.1 request-target cannot contain whitespace (SP/HTAB) or CR/LF
const INVALID_TARGET_RE = /[\r\n\s]/;

/**
 * Validate a pre-encoded request-target fragment (e.g. a query string)
 * to prevent request splitting.
 */
export function validateRequestTarget(target: string): void {
  if (INVALID_TARGET_RE.test(target)) {
    throw new PipeError(
      "INVALID_TARGET",
      `Invalid request target: ${JSON.stringify(target)} contains whitespace or control characters`,
    );
  }
}

/** Flatten a header value into the list of values to emit */
export function headerValues(value: HeaderValue): string[] {
  return Array.isArray(value) ? value.map(String) : [String(value)];
}

/**
 * Serialize headers into HTTP/1.x format: "Name: Value\r\n".
 * A multi-valued header repeats its name once per value.
 */
export function serializeHttp1Headers(headers: NormalizedHeaders): string {
  let result = "";
  for (const [name, value] of Object.entries(headers)) {
    validateHeaderName(name);
    for (const v of headerValues(value)) {
      validateHeaderValue(name, v);
      result += `${name}: ${v}\r\n`;
    }
  }
  return result;
}
