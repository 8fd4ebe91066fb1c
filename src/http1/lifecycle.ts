/**
 * Connection lifecycle: decides whether a finished connection goes back
 * to the keepalive pool or gets closed. This is the only place that
 * releases a transport, and it does so at most once per response.
 */
import { notInitialized } from "../errors.js";
import type { KeepaliveOptions, Transport } from "../socket/transport.js";
import { PipeState, type PipeContext } from "./context.js";

function requireTransport(ctx: PipeContext): Transport {
  if (!ctx.transport) throw notInitialized();
  return ctx.transport;
}

/**
 * Mark the pipe finished and release its transport: pooled when the
 * response was read to the end and the server allows keepalive,
 * closed otherwise. Repeated calls are no-ops.
 */
export function finalize(ctx: PipeContext, options?: KeepaliveOptions): void {
  const transport = requireTransport(ctx);
  if (ctx.eof) {
    console.debug("[pipe] finalize skipped: already released");
    return;
  }
  ctx.eof = true;

  if (ctx.keepalive && ctx.state === PipeState.Eof) {
    transport.setKeepalive(options ?? ctx.keepaliveOptions);
  } else {
    transport.close();
  }
}

/** Close the transport unconditionally */
export function closePipe(ctx: PipeContext): void {
  const transport = requireTransport(ctx);
  ctx.eof = true;
  transport.close();
}

/** How many times the pool has handed out the current connection */
export function getReusedTimes(ctx: PipeContext): number {
  return requireTransport(ctx).getReusedTimes();
}
