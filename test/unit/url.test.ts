import { describe, it, expect } from "vitest";
import { encodeQuery, escapePath, parseTarget, targetKey } from "../../src/utils/url.js";

describe("escapePath", () => {
  it("should return / for the root path", () => {
    expect(escapePath("/")).toBe("/");
    expect(escapePath("")).toBe("/");
    expect(escapePath("///")).toBe("/");
  });

  it("should preserve a trailing slash", () => {
    expect(escapePath("/a/b/")).toBe("/a/b/");
  });

  it("should escape each segment independently", () => {
    expect(escapePath("/a b/c")).toBe("/a%20b/c");
    expect(escapePath("/100%/ü")).toBe("/100%25/%C3%BC");
  });

  it("should prefix a relative path with /", () => {
    const escaped = escapePath("a b/c");
    expect(escaped).toBe("/a%20b/c");
    expect(escaped.split("/")).toEqual(["", "a%20b", "c"]);
  });

  it("should never reintroduce reserved characters inside a segment", () => {
    expect(escapePath("/q?x=1#frag")).toBe("/q%3Fx%3D1%23frag");
  });

  it("should collapse repeated slashes", () => {
    expect(escapePath("//a//b")).toBe("/a/b");
  });
});

describe("encodeQuery", () => {
  it("should serialize key=value pairs in insertion order", () => {
    expect(encodeQuery({ b: "2", a: 1 })).toBe("b=2&a=1");
  });

  it("should escape keys and values", () => {
    expect(encodeQuery({ "a b": "c&d" })).toBe("a%20b=c%26d");
  });

  it("should emit bare keys for true and skip false", () => {
    expect(encodeQuery({ flag: true, off: false, x: "y" })).toBe("flag&x=y");
  });

  it("should repeat the key for array values", () => {
    expect(encodeQuery({ id: [1, 2] })).toBe("id=1&id=2");
  });

  it("should return an empty string for an empty table", () => {
    expect(encodeQuery({})).toBe("");
  });
});

describe("parseTarget", () => {
  it("should parse host and port", () => {
    expect(parseTarget("example.com", 8080)).toEqual({
      kind: "tcp",
      hostname: "example.com",
      port: 8080,
    });
  });

  it("should default to port 80", () => {
    expect(parseTarget("example.com")).toEqual({ kind: "tcp", hostname: "example.com", port: 80 });
  });

  it("should parse unix socket paths", () => {
    expect(parseTarget("unix:/tmp/app.sock")).toEqual({ kind: "unix", path: "/tmp/app.sock" });
  });

  it("should build pool keys", () => {
    expect(targetKey(parseTarget("example.com", 81))).toBe("example.com:81");
    expect(targetKey(parseTarget("unix:/tmp/app.sock"))).toBe("unix:/tmp/app.sock");
  });
});
