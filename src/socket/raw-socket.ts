/**
 * Minimal pull-based socket abstraction over node:net.
 * Reads hand out whatever chunk arrived next; the socket is paused
 * between reads so unread data stays in the kernel buffer.
 */
import { Buffer } from "node:buffer";
import { connect, type Socket } from "node:net";
import { TransportError } from "../errors.js";
import { targetKey, type ConnectTarget } from "../utils/url.js";

export type RawReadResult = { done: false; value: Uint8Array } | { done: true; value?: undefined };

export interface RawSocket {
  /** Write data to the socket. */
  write(data: Uint8Array): Promise<void>;
  /** Read the next chunk from the socket. */
  read(): Promise<RawReadResult>;
  /** Close the socket and release resources. */
  close(): void;
  /** Whether the socket has been closed. */
  readonly closed: boolean;
}

export interface RawSocketOptions {
  /** Connect timeout in ms (default: 5000) */
  timeout?: number;
}

export const DEFAULT_CONNECT_TIMEOUT = 5000;

/** Opens a RawSocket to a target; injectable for tests */
export type Connector = (target: ConnectTarget, options: RawSocketOptions) => Promise<RawSocket>;

/**
 * Create a raw TCP or Unix-domain socket via node:net.
 * Waits for the connection to establish before returning.
 */
export async function createRawSocket(
  target: ConnectTarget,
  options: RawSocketOptions = {},
): Promise<RawSocket> {
  const key = targetKey(target);
  const timeout = options.timeout ?? DEFAULT_CONNECT_TIMEOUT;
  console.debug(`[socket] connect(${key} timeout=${timeout})`);

  const socket =
    target.kind === "unix"
      ? connect({ path: target.path })
      : connect({ host: target.hostname, port: target.port });

  await waitForConnect(socket, key, timeout);
  return wrapSocket(socket, key);
}

function waitForConnect(socket: Socket, key: string, timeout: number): Promise<void> {
  return new Promise((resolve, reject) => {
    let connectTimer: ReturnType<typeof setTimeout> | undefined;

    const cleanup = () => {
      clearTimeout(connectTimer);
      socket.removeListener("connect", onConnect);
      socket.removeListener("error", onError);
    };
    const onConnect = () => {
      cleanup();
      resolve();
    };
    const onError = (err: Error) => {
      cleanup();
      socket.destroy();
      reject(new TransportError("connect", `Connect failed (${key}): ${err.message}`, { cause: err }));
    };

    if (timeout > 0 && timeout < Infinity) {
      connectTimer = setTimeout(() => {
        cleanup();
        socket.destroy();
        reject(new TransportError("timeout", `TCP connect timeout (${key})`));
      }, timeout);
    }
    socket.once("connect", onConnect);
    socket.once("error", onError);
  });
}

function wrapSocket(socket: Socket, key: string): RawSocket {
  const queue: Buffer[] = [];
  let ended = false;
  let failure: Error | null = null;
  let _closed = false;
  let wake: (() => void) | null = null;

  const notify = () => {
    const resolve = wake;
    wake = null;
    resolve?.();
  };

  socket.pause();
  socket.on("data", (chunk: Buffer) => {
    queue.push(chunk);
    socket.pause();
    notify();
  });
  socket.on("end", () => {
    ended = true;
    notify();
  });
  socket.on("error", (err: Error) => {
    console.debug(`[socket] error(${key}) ${err.message}`);
    failure = err;
    notify();
  });
  socket.on("close", () => {
    console.debug(`[socket] closed(${key})`);
    _closed = true;
    ended = true;
    notify();
  });

  return {
    write(data: Uint8Array): Promise<void> {
      return new Promise((resolve, reject) => {
        if (_closed) {
          reject(new TransportError("closed", "Socket closed"));
          return;
        }
        socket.write(data, (err?: Error | null) => {
          if (err) reject(new TransportError("send", `Send failed (${key}): ${err.message}`, { cause: err }));
          else resolve();
        });
      });
    },
    async read(): Promise<RawReadResult> {
      for (;;) {
        const chunk = queue.shift();
        if (chunk) return { done: false, value: chunk };
        if (failure) {
          throw new TransportError("error", `Receive failed (${key}): ${failure.message}`, {
            cause: failure,
          });
        }
        if (ended) return { done: true };
        await new Promise<void>(resolve => {
          wake = resolve;
          socket.resume();
        });
      }
    },
    close() {
      if (!_closed) {
        _closed = true;
        socket.destroy();
      }
    },
    get closed() {
      return _closed;
    },
  };
}
