/**
 * Buffered byte-stream transport the pipe drives.
 * Adds exact-size reads, a reusable line reader, per-operation timeouts
 * and keepalive pooling on top of a RawSocket.
 */
import { Buffer } from "node:buffer";
import { PipeError, TransportError } from "../errors.js";
import { acquireSocket, releaseSocket, type PoolOptions } from "../connection-pool.js";
import { targetKey, type ConnectTarget } from "../utils/url.js";
import { createRawSocket, type Connector, type RawReadResult, type RawSocket } from "./raw-socket.js";

/** Reads the next line, without its delimiter */
export type LineReader = () => Promise<string>;

export type KeepaliveOptions = PoolOptions;

/**
 * Capability set the pipe needs from a connection.
 * Every async method is a suspension point; failures reject with TransportError.
 */
export interface Transport {
  connect(target: ConnectTarget): Promise<void>;
  /** Returns the number of bytes sent */
  send(data: Uint8Array | string): Promise<number>;
  /** Reads exactly `size` bytes; a close first rejects with reason "closed" and the partial bytes */
  receive(size: number): Promise<Buffer>;
  receiveUntil(delimiter: string): LineReader;
  /** Timeout applied to subsequent connect/send/receive calls; undefined or 0 disables it */
  setTimeout(ms: number | undefined): void;
  close(): void;
  /** Hand the connection to the keepalive pool */
  setKeepalive(options?: KeepaliveOptions): void;
  getReusedTimes(): number;
}

/** Longest line the line reader buffers before giving up (80KB) */
export const MAX_LINE_LENGTH = 81920;

export interface SocketTransportOptions {
  /** Opens new sockets (default: createRawSocket over node:net) */
  connector?: Connector;
}

export class SocketTransport implements Transport {
  private socket: RawSocket | null = null;
  private target: ConnectTarget | null = null;
  private buffer: Buffer = Buffer.alloc(0);
  private pendingRead: Promise<RawReadResult> | null = null;
  private timeout: number | undefined;
  private reusedTimes = 0;
  private readonly connector: Connector;

  constructor(options: SocketTransportOptions = {}) {
    this.connector = options.connector ?? createRawSocket;
  }

  /** Whether a socket is currently bound */
  get isConnected(): boolean {
    return this.socket !== null && !this.socket.closed;
  }

  setTimeout(ms: number | undefined): void {
    this.timeout = ms;
  }

  async connect(target: ConnectTarget): Promise<void> {
    if (this.socket) {
      this.close();
    }

    const key = targetKey(target);
    const pooled = acquireSocket(key);
    if (pooled) {
      this.bind(pooled.socket, target, pooled.reusedTimes);
      return;
    }

    const socket = await this.connector(target, { timeout: this.timeout });
    this.bind(socket, target, 0);
  }

  async send(data: Uint8Array | string): Promise<number> {
    const socket = this.requireSocket();
    const buf = typeof data === "string" ? Buffer.from(data, "utf-8") : data;
    if (buf.byteLength === 0) return 0;
    await this.withTimeout(socket.write(buf), "send");
    return buf.byteLength;
  }

  async receive(size: number): Promise<Buffer> {
    while (this.buffer.length < size) {
      if (!(await this.fill())) {
        throw this.closedError();
      }
    }
    return this.take(size);
  }

  receiveUntil(delimiter: string): LineReader {
    const needle = Buffer.from(delimiter, "latin1");
    return async () => {
      let searchFrom = 0;
      for (;;) {
        const idx = this.buffer.indexOf(needle, searchFrom);
        if (idx !== -1) {
          const line = this.take(idx).toString("latin1");
          this.take(needle.length);
          return line;
        }
        if (this.buffer.length > MAX_LINE_LENGTH) {
          throw new PipeError("LINE_TOO_LONG", `Line too long (>${MAX_LINE_LENGTH} bytes)`);
        }
        searchFrom = Math.max(0, this.buffer.length - needle.length + 1);
        if (!(await this.fill())) {
          throw this.closedError();
        }
      }
    };
  }

  close(): void {
    const socket = this.socket;
    this.unbind();
    socket?.close();
  }

  setKeepalive(options?: KeepaliveOptions): void {
    const socket = this.socket;
    const target = this.target;
    if (!socket || !target) return;

    // Unread bytes or an abandoned read mean the socket is mid-message
    const dirty = this.buffer.length > 0 || this.pendingRead !== null;
    const reusedTimes = this.reusedTimes;
    this.unbind();

    if (dirty || socket.closed) {
      console.debug(`[socket] not reusable(${targetKey(target)}) dirty=${dirty}`);
      socket.close();
      return;
    }
    releaseSocket(targetKey(target), { socket, reusedTimes }, options);
  }

  getReusedTimes(): number {
    return this.reusedTimes;
  }

  private bind(socket: RawSocket, target: ConnectTarget, reusedTimes: number): void {
    this.socket = socket;
    this.target = target;
    this.reusedTimes = reusedTimes;
    this.buffer = Buffer.alloc(0);
    this.pendingRead = null;
  }

  private unbind(): void {
    this.socket = null;
    this.buffer = Buffer.alloc(0);
    this.pendingRead = null;
  }

  private requireSocket(): RawSocket {
    if (!this.socket) {
      throw new TransportError("closed", "Socket not connected");
    }
    return this.socket;
  }

  /** Pull the next chunk into the buffer; false once the peer has closed */
  private async fill(): Promise<boolean> {
    const socket = this.requireSocket();
    if (!this.pendingRead) {
      const pending = socket.read();
      // A read abandoned by a timeout may still reject later
      pending.catch(() => {});
      this.pendingRead = pending;
    }
    const result = await this.withTimeout(this.pendingRead, "read");
    this.pendingRead = null;
    if (result.done) return false;
    this.buffer =
      this.buffer.length > 0 ? Buffer.concat([this.buffer, result.value]) : Buffer.from(result.value);
    return true;
  }

  private take(n: number): Buffer {
    const out = this.buffer.subarray(0, n);
    this.buffer = this.buffer.subarray(n);
    return out;
  }

  private closedError(): TransportError {
    const partial = this.take(this.buffer.length);
    this.close();
    return new TransportError("closed", "Connection closed by peer", { partial });
  }

  private withTimeout<T>(promise: Promise<T>, what: string): Promise<T> {
    const ms = this.timeout;
    if (ms === undefined || ms <= 0 || ms === Infinity) return promise;

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new TransportError("timeout", `${what} timeout after ${ms}ms`)),
        ms,
      );
    });
    return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
  }
}
