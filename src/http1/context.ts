/**
 * Per-connection parser state shared by the state machine,
 * the lifecycle manager and the pipe.
 */
import type { Buffer } from "node:buffer";
import type { KeepaliveOptions, LineReader, Transport } from "../socket/transport.js";

export enum PipeState {
  NotReady = 0,
  Begin = 1,
  ReadingHeader = 2,
  ReadingBody = 3,
  Eof = 4,
}

export interface PipeContext {
  /** null when the pipe was built without a transport */
  transport: Transport | null;
  /** Upper bound for a single body read */
  chunkSize: number;
  state: PipeState;
  /** "\r\n" line reader, created on the first status line */
  readLine: LineReader | null;
  /** Re-applied to the transport before every read */
  readTimeout: number | undefined;
  /**
   * Bytes left in the current body unit. Only meaningful while reading the
   * body; with chunked framing 0 means "read the next size line".
   */
  remaining: number;
  chunked: boolean;
  keepalive: boolean;
  /** Uppercased method of the in-flight request */
  method: string | null;
  /** Status code of the current response */
  status: number | null;
  /** Set once the transport has been released or closed for this cycle */
  eof: boolean;
  /** Passed to the pool when the response completes */
  keepaliveOptions: KeepaliveOptions | undefined;
}

export interface HeaderField {
  name: string;
  value: string;
}

export type ParseEvent =
  | { type: "statusline"; status: number; version: string; line: string }
  | { type: "malformed_statusline"; line: string }
  /** `field` is null for a line without a colon; `line` is always the raw line */
  | { type: "header"; field: HeaderField | null; line: string }
  | { type: "header_end" }
  | { type: "body"; chunk: Buffer }
  | { type: "body_end" }
  | { type: "eof" };

export function createContext(transport: Transport | null, chunkSize: number): PipeContext {
  return {
    transport,
    chunkSize,
    state: PipeState.NotReady,
    readLine: null,
    readTimeout: undefined,
    remaining: 0,
    chunked: false,
    keepalive: true,
    method: null,
    status: null,
    eof: false,
    keepaliveOptions: undefined,
  };
}

/** Reset per-response fields before dispatching a new request */
export function resetContext(ctx: PipeContext, method: string): void {
  ctx.state = PipeState.Begin;
  ctx.remaining = 0;
  ctx.chunked = false;
  ctx.keepalive = true;
  ctx.method = method;
  ctx.status = null;
  ctx.eof = false;
}
