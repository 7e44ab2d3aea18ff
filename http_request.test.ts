import { describe, it, expect } from "vitest";
import { applyHeaderPolicy, HTTPRequest, parseHeaders, parseRequestLine } from "./http_request";
import { kDefaultLimits, readerFromConn } from "./tcp_conn";
import { testConn } from "./test_socket";

function readerOf(chunks: string[]) {
  return readerFromConn(testConn(chunks).conn);
}

describe("parseRequestLine", () => {
  it("splits method, path, query and protocol", () => {
    expect(parseRequestLine(Buffer.from("GET /a/b?x=1&y HTTP/1.0\r\n"))).toEqual({
      method: "GET",
      path: "/a/b",
      qs: "x=1&y",
      proto: "HTTP/1.0",
    });
  });

  it("splits the target on the first '?' only", () => {
    expect(parseRequestLine(Buffer.from("GET /s?q=a?b HTTP/1.0\r\n")).qs).toBe("q=a?b");
  });

  it("rejects lines without three tokens", () => {
    expect(() => parseRequestLine(Buffer.from("GET /\r\n"))).toThrow("bad request line");
    expect(() => parseRequestLine(Buffer.from("GET / HTTP/1.0 extra\r\n"))).toThrow("bad request line");
  });
});

describe("parseHeaders", () => {
  it("lower-cases names, trims values and stops at the blank line", async () => {
    const reader = readerOf(["Host:  example.test \r\nX-Thing: a:b\r\n\r\nBODY"]);
    const headers = await parseHeaders(reader, kDefaultLimits);
    expect([...headers]).toEqual([
      ["host", "example.test"],
      ["x-thing", "a:b"],
    ]);
    expect((await reader.readline()).toString()).toBe("BODY");
  });

  it("accepts bare LF line endings", async () => {
    const headers = await parseHeaders(readerOf(["A: 1\n\n"]), kDefaultLimits);
    expect(headers.get("a")).toBe("1");
  });

  it("rejects a line without a colon", async () => {
    await expect(parseHeaders(readerOf(["NoColon\r\n\r\n"]), kDefaultLimits)).rejects.toMatchObject({
      kind: "MalformedHeaderLine",
    });
  });

  it("rejects EOF before the blank line", async () => {
    await expect(parseHeaders(readerOf(["A: 1\r\n"]), kDefaultLimits)).rejects.toMatchObject({
      kind: "UnexpectedEOF",
    });
  });

  it("caps the number of header lines", async () => {
    const limits = { ...kDefaultLimits, maxHeaderCount: 2 };
    await expect(parseHeaders(readerOf(["A: 1\r\nB: 2\r\nC: 3\r\n\r\n"]), limits)).rejects.toMatchObject({
      kind: "HeaderTooLarge",
      code: 413,
    });
  });
});

describe("applyHeaderPolicy", () => {
  const raw = "Host: a\r\nBad line\r\n\r\nrest\r\n";

  it("skip drains headers without building or validating them", async () => {
    const reader = readerOf([raw]);
    expect(await applyHeaderPolicy("skip", reader, kDefaultLimits)).toBeNull();
    expect((await reader.readline()).toString()).toBe("rest\r\n");
  });

  it("leave reads nothing", async () => {
    const reader = readerOf([raw]);
    expect(await applyHeaderPolicy("leave", reader, kDefaultLimits)).toBeNull();
    expect((await reader.readline()).toString()).toBe("Host: a\r\n");
  });
});

describe("HTTPRequest", () => {
  it("parses its query string into form", () => {
    const req = new HTTPRequest(readerOf([]));
    req.qs = "a=1&b";
    expect(req.parseQs()).toEqual({ a: { kind: "scalar", value: "1" }, b: { kind: "flag" } });
    expect(req.form).toEqual(req.parseQs());
  });

  it("reads a url-encoded body of Content-Length bytes", async () => {
    const req = new HTTPRequest(readerOf(["name=Ada+L&x=%21", "ignored"]));
    req.headers = new Map([["content-length", "16"]]);
    expect(await req.readFormData()).toEqual({
      name: { kind: "scalar", value: "Ada L" },
      x: { kind: "scalar", value: "!" },
    });
  });

  it("needs a Content-Length header to read a form", async () => {
    const req = new HTTPRequest(readerOf([]));
    await expect(req.readFormData()).rejects.toMatchObject({ kind: "LengthRequired", code: 411 });
  });
});
