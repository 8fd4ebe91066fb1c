import { describe, it, expect } from "vitest";
import { PipeError } from "../../src/errors.js";
import {
  normalizeHeaderName,
  serializeHttp1Headers,
  validateMethod,
  validateRequestTarget,
} from "../../src/utils/headers.js";

describe("normalizeHeaderName", () => {
  it("should map common headers case-insensitively", () => {
    expect(normalizeHeaderName("content-type")).toBe("Content-Type");
    expect(normalizeHeaderName("CONTENT-LENGTH")).toBe("Content-Length");
    expect(normalizeHeaderName("etag")).toBe("ETag");
    expect(normalizeHeaderName("user-agent")).toBe("User-Agent");
  });

  it("should title-case unknown headers", () => {
    expect(normalizeHeaderName("x-custom-header")).toBe("X-Custom-Header");
    expect(normalizeHeaderName("accept")).toBe("Accept");
  });

  it("should leave non-significant positions unchanged", () => {
    expect(normalizeHeaderName("x-reQUEST-id")).toBe("X-ReQUEST-Id");
    expect(normalizeHeaderName("WWW-Authenticate")).toBe("WWW-Authenticate");
  });

  it("should be idempotent", () => {
    for (const name of ["content-type", "x-custom-header", "etag", "x-reQUEST-id", "a--b"]) {
      const once = normalizeHeaderName(name);
      expect(normalizeHeaderName(once)).toBe(once);
    }
  });
});

describe("Header Security Validation (CR/LF/NUL)", () => {
  describe("serializeHttp1Headers", () => {
    it("should serialize valid headers correctly", () => {
      const result = serializeHttp1Headers({
        "Content-Type": "application/json",
        "X-Custom": "hello",
      });
      expect(result).toBe("Content-Type: application/json\r\nX-Custom: hello\r\n");
    });

    it("should repeat the name line for each value of a multi-valued header", () => {
      const result = serializeHttp1Headers({
        "X-Tag": ["a", "b"],
        "Content-Length": 3,
      });
      expect(result).toBe("X-Tag: a\r\nX-Tag: b\r\nContent-Length: 3\r\n");
    });

    it("should reject header name containing CR (\\r)", () => {
      expect(() => serializeHttp1Headers({ "Bad\rName": "value" })).toThrow(/Invalid header name/);
    });

    it("should reject header name containing NUL (\\0)", () => {
      expect(() => serializeHttp1Headers({ "Bad\0Name": "value" })).toThrow(/Invalid header name/);
    });

    it("should reject CRLF injection attempt in value", () => {
      expect(() => serializeHttp1Headers({ "X-Inject": "ok\r\nEvil-Header: pwned" })).toThrow(
        /Invalid header.*CR\/LF\/NUL/,
      );
    });

    it("should reject injection hidden in one value of a list", () => {
      expect(() => serializeHttp1Headers({ "X-Inject": ["ok", "bad\nEvil: 1"] })).toThrow(
        /Invalid header.*CR\/LF\/NUL/,
      );
    });

    it("should throw PipeError with INVALID_HEADER code", () => {
      let caught: unknown;
      try {
        serializeHttp1Headers({ "Bad Name": "v" });
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(PipeError);
      expect(caught).toMatchObject({ code: "INVALID_HEADER" });
    });

    it("should handle empty headers object", () => {
      expect(serializeHttp1Headers({})).toBe("");
    });
  });

  describe("validateMethod", () => {
    it("should accept token methods", () => {
      expect(() => validateMethod("PATCH")).not.toThrow();
    });

    it("should reject CRLF injection in method", () => {
      expect(() => validateMethod("GET / HTTP/1.1\r\nX-Evil: 1\r\n\r\nPOST")).toThrow(
        /Invalid method/,
      );
    });
  });

  describe("validateRequestTarget", () => {
    it("should accept an encoded query", () => {
      expect(() => validateRequestTarget("a=1&b=%20")).not.toThrow();
    });

    it("should reject whitespace and line breaks", () => {
      expect(() => validateRequestTarget("a=1 HTTP/1.1\r\nX: y")).toThrow(/Invalid request target/);
    });
  });
});
