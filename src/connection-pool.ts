/**
 * Process-level keepalive pool of idle HTTP/1.x sockets.
 * Sockets are keyed by target ("host:port" or "unix:/path") and handed out
 * most-recently-released first. Each socket remembers how many times the
 * pool has handed it out.
 *
 * Only the pipe's lifecycle manager releases sockets into the pool.
 */
import type { RawSocket } from "./socket/raw-socket.js";

export interface PoolOptions {
  /** Idle timeout in ms; 0 keeps the socket until evicted (default: 60000) */
  timeout?: number;
  /** Max idle sockets per target (default: 30) */
  poolSize?: number;
}

export interface PooledSocket {
  socket: RawSocket;
  /** Times this socket has been handed out by the pool */
  reusedTimes: number;
}

interface PoolEntry extends PooledSocket {
  timer: ReturnType<typeof setTimeout> | null;
}

export const DEFAULT_KEEPALIVE_TIMEOUT = 60_000;
export const DEFAULT_POOL_SIZE = 30;

const pool = new Map<string, PoolEntry[]>();

function dispose(entry: PoolEntry): void {
  if (entry.timer) clearTimeout(entry.timer);
  entry.socket.close();
}

function removeEntry(key: string, entry: PoolEntry): void {
  const entries = pool.get(key);
  if (!entries) return;
  const idx = entries.indexOf(entry);
  if (idx !== -1) entries.splice(idx, 1);
  if (entries.length === 0) pool.delete(key);
}

/**
 * Take an idle socket for the given target.
 * Returns null if no usable connection exists.
 */
export function acquireSocket(key: string): PooledSocket | null {
  const entries = pool.get(key);
  if (!entries) return null;

  let entry = entries.pop();
  while (entry) {
    if (entry.timer) clearTimeout(entry.timer);
    if (!entry.socket.closed) {
      if (entries.length === 0) pool.delete(key);
      console.debug(`[pool] reuse(${key}) reused=${entry.reusedTimes + 1}`);
      return { socket: entry.socket, reusedTimes: entry.reusedTimes + 1 };
    }
    // Peer closed it while idle
    entry = entries.pop();
  }

  pool.delete(key);
  return null;
}

/**
 * Put a socket back for reuse. The least recently released socket is
 * closed when the target's pool is full.
 */
export function releaseSocket(
  key: string,
  pooled: PooledSocket,
  options: PoolOptions = {},
): void {
  const timeout = options.timeout ?? DEFAULT_KEEPALIVE_TIMEOUT;
  const poolSize = options.poolSize ?? DEFAULT_POOL_SIZE;

  if (pooled.socket.closed || poolSize <= 0) {
    pooled.socket.close();
    return;
  }

  let entries = pool.get(key);
  if (!entries) {
    entries = [];
    pool.set(key, entries);
  }

  while (entries.length >= poolSize) {
    const evicted = entries.shift();
    if (evicted) {
      console.debug(`[pool] evict(${key})`);
      dispose(evicted);
    }
  }

  const entry: PoolEntry = { ...pooled, timer: null };
  if (timeout > 0 && timeout < Infinity) {
    entry.timer = setTimeout(() => {
      console.debug(`[pool] idle-timeout(${key})`);
      removeEntry(key, entry);
      entry.socket.close();
    }, timeout);
    entry.timer.unref?.();
  }
  entries.push(entry);
}

/** Number of idle sockets held for a target, or across all targets */
export function pooledCount(key?: string): number {
  if (key !== undefined) return pool.get(key)?.length ?? 0;
  let total = 0;
  for (const entries of pool.values()) total += entries.length;
  return total;
}

/**
 * Close and drop all pooled connections. Useful for testing.
 */
export function clearPool(): void {
  for (const entries of pool.values()) {
    for (const entry of entries) dispose(entry);
  }
  pool.clear();
}
