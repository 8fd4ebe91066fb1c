/**
 * Request-target helpers: path escaping, query encoding and
 * connection target parsing.
 */

export type QueryValue = string | number | boolean | Array<string | number>;

/** Percent-encode a single URI component */
export function escapeUri(component: string): string {
  return encodeURIComponent(component);
}

/**
 * Percent-encode a URL path segment by segment.
 * Slash structure is preserved: "/a b/c/" -> "/a%20b/c/".
 * Empty segments collapse, a missing leading slash is added.
 */
export function escapePath(path: string): string {
  const segments = path.split("/").filter(s => s.length > 0);
  if (segments.length === 0) return "/";

  let escaped = `/${segments.map(escapeUri).join("/")}`;
  if (path.endsWith("/")) {
    escaped += "/";
  }
  return escaped;
}

/**
 * Serialize a query table into "k=v&k2=v2".
 * `true` emits the bare key, `false` is skipped, arrays repeat the key.
 */
export function encodeQuery(query: Readonly<Record<string, QueryValue>>): string {
  const parts: string[] = [];
  for (const [key, value] of Object.entries(query)) {
    const k = escapeUri(key);
    if (value === true) {
      parts.push(k);
    } else if (value === false) {
      continue;
    } else if (Array.isArray(value)) {
      for (const v of value) parts.push(`${k}=${escapeUri(String(v))}`);
    } else {
      parts.push(`${k}=${escapeUri(String(value))}`);
    }
  }
  return parts.join("&");
}

export type ConnectTarget =
  | { kind: "tcp"; hostname: string; port: number }
  | { kind: "unix"; path: string };

const UNIX_PREFIX = "unix:";

/** Resolve "host" + port or "unix:/path/to.sock" into a connect target */
export function parseTarget(host: string, port?: number): ConnectTarget {
  if (host.startsWith(UNIX_PREFIX)) {
    return { kind: "unix", path: host.slice(UNIX_PREFIX.length) };
  }
  return { kind: "tcp", hostname: host, port: port ?? 80 };
}

/** Key identifying a target in the keepalive pool */
export function targetKey(target: ConnectTarget): string {
  return target.kind === "unix" ? `unix:${target.path}` : `${target.hostname}:${target.port}`;
}
