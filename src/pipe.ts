/**
 * HTTP/1.x pipe: one request/response cycle at a time over a single
 * transport, with keepalive reuse between cycles.
 *
 * `request()` connects, sends and (unless streaming) drains the response;
 * `read()` and `readBody()` expose the underlying event stream for callers
 * that take over reading themselves.
 */
import { Buffer } from "node:buffer";
import { MalformedStatusLineError, PipeError, notInitialized } from "./errors.js";
import { encodeChunk } from "./http1/chunked.js";
import {
  PipeState,
  createContext,
  resetContext,
  type HeaderField,
  type ParseEvent,
  type PipeContext,
} from "./http1/context.js";
import {
  encodeRequest,
  isChunkedRequest,
  toContentLength,
  type BodyProducer,
  type EncodeOptions,
} from "./http1/encoder.js";
import { closePipe, finalize, getReusedTimes } from "./http1/lifecycle.js";
import { readEvent } from "./http1/parser.js";
import { DEFAULT_CONNECT_TIMEOUT } from "./socket/raw-socket.js";
import { SocketTransport, type KeepaliveOptions, type Transport } from "./socket/transport.js";
import { parseTarget } from "./utils/url.js";

export const DEFAULT_CHUNK_SIZE = 8192;

export enum StreamMode {
  /** Read and buffer the whole response */
  None = 0,
  /** Return right after sending; the caller reads everything */
  Full = 1,
  /** Read status and headers; the caller reads the body */
  Body = 2,
}

export interface RequestOptions extends EncodeOptions {
  stream?: StreamMode;
  /** Connect timeout in ms (default: 5000) */
  timeout?: number;
  /** Send timeout in ms; defaults to the connect timeout */
  sendTimeout?: number;
  /** Timeout for every response read in ms */
  readTimeout?: number;
  /** Pool settings used when the response completes */
  keepalive?: KeepaliveOptions;
}

/** Response headers; a repeated header keeps every value in wire order */
export type ResponseHeaders = Record<string, string | string[]>;

export interface ResponseCallbacks {
  /** Called once headers are complete; returning true stops reading */
  headerFilter?: (status: number | undefined, headers: ResponseHeaders) => boolean | void;
  /** Called per body chunk instead of buffering it; returning true stops reading */
  bodyFilter?: (chunk: Buffer) => boolean | void;
}

export interface PipeResponse {
  /** Undefined when reading stopped before a status line */
  status: number | undefined;
  headers: ResponseHeaders;
  body: Buffer;
  /** Whether the connection was released for this cycle */
  eof: boolean;
}

export interface PipeOptions {
  /** Max bytes per body read (default: 8192) */
  chunkSize?: number;
  /** Transport to drive (default: a new SocketTransport); null leaves the pipe unbound */
  transport?: Transport | null;
}

type RequestArg = string | number | RequestOptions | undefined;

function addHeader(headers: ResponseHeaders, field: HeaderField): void {
  const existing = headers[field.name];
  if (existing === undefined) {
    headers[field.name] = field.value;
  } else if (Array.isArray(existing)) {
    existing.push(field.value);
  } else {
    headers[field.name] = [existing, field.value];
  }
}

function toBytes(chunk: string | Uint8Array): Uint8Array {
  return typeof chunk === "string" ? Buffer.from(chunk, "utf-8") : chunk;
}

/** Producer yielding a literal body once */
function singleChunk(data: string | Uint8Array): BodyProducer {
  let sent = false;
  return () => {
    if (sent) return null;
    sent = true;
    return data;
  };
}

export class Pipe {
  private readonly ctx: PipeContext;

  constructor(options: PipeOptions = {}) {
    const transport = options.transport === undefined ? new SocketTransport() : options.transport;
    this.ctx = createContext(transport, options.chunkSize ?? DEFAULT_CHUNK_SIZE);
  }

  get state(): PipeState {
    return this.ctx.state;
  }

  /** Whether the transport has been released or closed for the current cycle */
  get eof(): boolean {
    return this.ctx.eof;
  }

  get keepalive(): boolean {
    return this.ctx.keepalive;
  }

  setTimeout(ms: number | undefined): void {
    this.requireTransport().setTimeout(ms);
  }

  /**
   * Send a request and, unless streaming, read the whole response.
   *
   *   await pipe.request("example.com", 80, { path: "/" });
   *   await pipe.request("unix:/run/app.sock", { method: "POST", body: "x" });
   */
  request(host: string, options?: RequestOptions): Promise<PipeResponse>;
  request(host: string, port: number, options?: RequestOptions): Promise<PipeResponse>;
  async request(...args: RequestArg[]): Promise<PipeResponse> {
    const transport = this.requireTransport();

    if (args.length < 1 || args.length > 3) {
      throw new PipeError(
        "INVALID_ARGUMENT_COUNT",
        `Expecting 1, 2, or 3 arguments, but seen ${args.length}`,
      );
    }

    const [host, second] = args;
    const port = typeof second === "number" ? second : undefined;
    const last = args[args.length - 1];
    const options: RequestOptions = typeof last === "object" ? last : {};
    if (typeof host !== "string") {
      throw new PipeError("INVALID_TARGET", "Expecting a host or unix socket path");
    }

    // Encoding validates everything before a connection is opened
    const encoded = encodeRequest(options, host);
    const target = parseTarget(host, port);

    transport.setTimeout(options.timeout ?? DEFAULT_CONNECT_TIMEOUT);
    await transport.connect(target);

    if (options.sendTimeout !== undefined) {
      transport.setTimeout(options.sendTimeout);
    }
    if (options.readTimeout !== undefined) {
      this.ctx.readTimeout = options.readTimeout;
    }
    this.ctx.keepaliveOptions = options.keepalive;

    console.debug(`[pipe] ${encoded.method} ${host}${port ? `:${port}` : ""}`);
    await transport.send(encoded.head);

    const body = options.body;
    if (body !== undefined) {
      if (isChunkedRequest(encoded.headers)) {
        await this.sendChunked(transport, typeof body === "function" ? body : singleChunk(body));
      } else if (typeof body === "function") {
        const length = toContentLength(encoded.headers["Content-Length"]);
        await this.sendProducer(transport, body, length);
      } else {
        await transport.send(body);
      }
    }

    resetContext(this.ctx, encoded.method);

    if (options.stream === StreamMode.Full) {
      return { status: undefined, headers: {}, body: Buffer.alloc(0), eof: false };
    }

    return this.response({
      headerFilter: () => options.stream === StreamMode.Body,
    });
  }

  /**
   * Drain response events until the response ends or a callback stops it.
   * Rejects with MalformedStatusLineError when the status line is garbage.
   */
  async response(callbacks: ResponseCallbacks = {}): Promise<PipeResponse> {
    this.requireTransport();

    let status: number | undefined;
    const headers: ResponseHeaders = {};
    const chunks: Buffer[] = [];

    const result = (): PipeResponse => ({
      status,
      headers,
      body: Buffer.concat(chunks),
      eof: this.ctx.eof,
    });

    while (!this.ctx.eof) {
      const event = await readEvent(this.ctx);

      switch (event.type) {
        case "statusline":
          status = event.status;
          break;
        case "malformed_statusline":
          throw new MalformedStatusLineError(event.line);
        case "header":
          if (event.field) addHeader(headers, event.field);
          break;
        case "header_end":
          if (callbacks.headerFilter?.(status, headers)) return result();
          break;
        case "body":
          if (callbacks.bodyFilter) {
            if (callbacks.bodyFilter(event.chunk)) return result();
          } else {
            chunks.push(event.chunk);
          }
          break;
        case "body_end":
          break;
        case "eof":
          return result();
      }
    }

    return result();
  }

  /** Read the next raw response event */
  read(): Promise<ParseEvent> {
    return readEvent(this.ctx);
  }

  /**
   * Read the next body chunk; null once the body is done, at which point
   * the connection has been released.
   */
  async readBody(): Promise<Buffer | null> {
    this.requireTransport();
    if (this.ctx.state < PipeState.ReadingBody) {
      throw new PipeError("NOT_READY_FOR_BODY", "Not ready for reading body");
    }

    const event = await readEvent(this.ctx);
    if (event.type === "body") {
      return event.chunk;
    }
    if (event.type === "body_end") {
      finalize(this.ctx);
    }
    return null;
  }

  /** Release the connection: pooled if reusable, closed otherwise */
  setKeepalive(options?: KeepaliveOptions): void {
    finalize(this.ctx, options);
  }

  close(): void {
    closePipe(this.ctx);
  }

  getReusedTimes(): number {
    return getReusedTimes(this.ctx);
  }

  private requireTransport(): Transport {
    if (!this.ctx.transport) throw notInitialized();
    return this.ctx.transport;
  }

  /** Send exactly `length` bytes pulled from the producer */
  private async sendProducer(
    transport: Transport,
    producer: BodyProducer,
    length: number,
  ): Promise<void> {
    let remaining = length;
    while (remaining > 0) {
      const chunk = await producer();
      const data = chunk ? toBytes(chunk) : null;
      if (!data || data.byteLength === 0) {
        throw this.bodyMismatch(
          `Request body ended ${remaining} bytes short of Content-Length ${length}`,
        );
      }
      if (data.byteLength > remaining) {
        throw this.bodyMismatch(`Request body exceeds Content-Length ${length}`);
      }
      await transport.send(data);
      remaining -= data.byteLength;
    }
  }

  /** Send producer output with chunked framing until it ends */
  private async sendChunked(transport: Transport, producer: BodyProducer): Promise<void> {
    for (;;) {
      const chunk = await producer();
      const data = chunk ? toBytes(chunk) : null;
      if (!data || data.byteLength === 0) break;
      await transport.send(encodeChunk(data));
    }
    await transport.send("0\r\n\r\n");
  }

  private bodyMismatch(message: string): PipeError {
    // The peer is left waiting on the declared length; the connection is unusable
    closePipe(this.ctx);
    return new PipeError("BODY_LENGTH_MISMATCH", message);
  }
}
