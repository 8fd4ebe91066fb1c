import { describe, it, expect } from "vitest";
import { encodeChunk, parseChunkSize } from "../../../src/http1/chunked.js";
import { PipeError } from "../../../src/errors.js";

describe("parseChunkSize", () => {
  it("should parse lowercase and uppercase hex", () => {
    expect(parseChunkSize("4")).toBe(4);
    expect(parseChunkSize("a")).toBe(10);
    expect(parseChunkSize("FF")).toBe(255);
  });

  it("should parse the final zero chunk", () => {
    expect(parseChunkSize("0")).toBe(0);
    expect(parseChunkSize("000")).toBe(0);
  });

  it("should ignore chunk extensions", () => {
    expect(parseChunkSize("5;ext=val")).toBe(5);
    expect(parseChunkSize("1a ; name")).toBe(26);
  });

  it("should reject non-hex sizes", () => {
    expect(() => parseChunkSize("zz")).toThrow(PipeError);
    expect(() => parseChunkSize("")).toThrow(/Invalid chunk size/);
    expect(() => parseChunkSize("-1")).toThrow(/Invalid chunk size/);
  });

  it("should reject sizes beyond safe integers", () => {
    expect(() => parseChunkSize("fffffffffffffffff")).toThrow(/Chunk size too large/);
  });
});

describe("encodeChunk", () => {
  it("should frame data with its hex length", () => {
    expect(encodeChunk(new TextEncoder().encode("hello world!")).toString()).toBe(
      "c\r\nhello world!\r\n",
    );
  });
});
