/**
 * h1pipe: HTTP/1.x client protocol engine over a byte-stream connection,
 * with incremental response reads and keepalive reuse.
 */

// Main API
export { Pipe, StreamMode, DEFAULT_CHUNK_SIZE } from "./pipe.js";
export type {
  PipeOptions,
  RequestOptions,
  ResponseCallbacks,
  ResponseHeaders,
  PipeResponse,
} from "./pipe.js";

// Errors
export { PipeError, TransportError, MalformedStatusLineError } from "./errors.js";
export type { PipeErrorCode, TransportErrorReason } from "./errors.js";

// Protocol building blocks (advanced usage)
export { PipeState } from "./http1/context.js";
export type { ParseEvent, HeaderField } from "./http1/context.js";
export { encodeRequest, USER_AGENT } from "./http1/encoder.js";
export type { BodyProducer, RequestBody, EncodeOptions, HttpVersion } from "./http1/encoder.js";
export { parseChunkSize } from "./http1/chunked.js";
export { normalizeHeaderName } from "./utils/headers.js";
export type { HeaderValue, NormalizedHeaders } from "./utils/headers.js";
export { escapePath, encodeQuery } from "./utils/url.js";
export type { QueryValue, ConnectTarget } from "./utils/url.js";

// Transport layer (advanced usage)
export { SocketTransport } from "./socket/transport.js";
export type { Transport, LineReader, KeepaliveOptions } from "./socket/transport.js";
export { createRawSocket, DEFAULT_CONNECT_TIMEOUT } from "./socket/raw-socket.js";
export type { RawSocket, Connector } from "./socket/raw-socket.js";

// Connection pool (advanced usage)
export { clearPool, DEFAULT_KEEPALIVE_TIMEOUT, DEFAULT_POOL_SIZE } from "./connection-pool.js";
