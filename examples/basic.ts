/**
 * Minimal usage example for h1pipe.
 *
 * Starts a local HTTP server, then:
 *   1. sends a buffered GET and prints the response
 *   2. sends a second GET over the pooled connection
 *   3. streams a chunked response body piece by piece
 *   4. uploads a body from a producer with chunked framing
 */
import { Buffer } from "node:buffer";
import { createServer } from "node:http";
import { Pipe, StreamMode, clearPool } from "../src/index.js";

const server = createServer((req, res) => {
  if (req.url === "/stream") {
    res.writeHead(200, { "Content-Type": "text/plain" });
    for (const word of ["alpha ", "beta ", "gamma"]) res.write(word);
    res.end();
    return;
  }
  let received = 0;
  req.on("data", (chunk: Buffer) => {
    received += chunk.length;
  });
  req.on("end", () => {
    res.setHeader("Content-Type", "application/json");
    res.end(JSON.stringify({ method: req.method, url: req.url, received }));
  });
});

async function main(): Promise<void> {
  await new Promise<void>(resolve => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("server has no TCP address");
  const { port } = address;
  const pipe = new Pipe();

  // ── Buffered request ──
  const first = await pipe.request("127.0.0.1", port, {
    path: "/hello world",
    query: { lang: "en", verbose: true },
  });
  console.log(first.status, first.headers["Content-Type"], first.body.toString());

  // ── Keepalive reuse ──
  await pipe.request("127.0.0.1", port, { path: "/again" });
  console.log("reused times:", pipe.getReusedTimes());

  // ── Streaming body ──
  const head = await pipe.request("127.0.0.1", port, {
    path: "/stream",
    stream: StreamMode.Body,
  });
  console.log("stream status:", head.status);
  for (let chunk = await pipe.readBody(); chunk; chunk = await pipe.readBody()) {
    console.log("chunk:", JSON.stringify(chunk.toString()));
  }

  // ── Producer upload ──
  const parts = ["one,", "two,", "three"];
  const upload = await pipe.request("127.0.0.1", port, {
    method: "POST",
    path: "/upload",
    headers: { "Transfer-Encoding": "chunked" },
    body: () => parts.shift(),
  });
  console.log(upload.body.toString());

  clearPool();
  server.close();
}

main().catch((err: unknown) => {
  console.error(err);
  server.close();
  process.exitCode = 1;
});
