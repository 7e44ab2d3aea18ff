import { describe, it, expect } from "vitest";
import { parseQueryString, queryValueToPlain, unquotePlus } from "./query_string";

describe("unquotePlus", () => {
  it("decodes plus and percent escapes", () => {
    expect(unquotePlus("a+b%20c%2Fd")).toBe("a b c/d");
  });

  it("leaves plain ascii unchanged", () => {
    const plain = "hello-world_1.txt";
    expect(unquotePlus(plain)).toBe(plain);
    expect(unquotePlus(unquotePlus(plain))).toBe(plain);
  });

  it("decodes each escape to a single code point", () => {
    expect(unquotePlus("%C3%A9")).toBe("Ã©");
  });

  it("throws on non-hex escapes", () => {
    expect(() => unquotePlus("%zz")).toThrow("bad percent escape: %zz");
  });

  it("throws on a truncated escape at the end", () => {
    expect(() => unquotePlus("abc%4")).toThrow("bad percent escape: %4");
    expect(() => unquotePlus("abc%")).toThrow("bad percent escape: %");
  });
});

describe("parseQueryString", () => {
  it("returns an empty mapping for empty input", () => {
    expect(parseQueryString("")).toEqual({});
  });

  it("parses scalar pairs", () => {
    expect(parseQueryString("a=1&b=x+y")).toEqual({
      a: { kind: "scalar", value: "1" },
      b: { kind: "scalar", value: "x y" },
    });
  });

  it("treats a key without '=' as a flag", () => {
    expect(parseQueryString("flag")).toEqual({ flag: { kind: "flag" } });
  });

  it("splits on the first '=' only", () => {
    expect(parseQueryString("expr=a=b")).toEqual({ expr: { kind: "scalar", value: "a=b" } });
  });

  it("accumulates repeated keys in order", () => {
    expect(parseQueryString("a=1&a=2&a=3")).toEqual({ a: { kind: "multi", values: ["1", "2", "3"] } });
  });

  it("folds a repeated flag into a multi value as an empty string", () => {
    expect(parseQueryString("a&a=2")).toEqual({ a: { kind: "multi", values: ["", "2"] } });
  });

  it("keeps __proto__ as an ordinary key", () => {
    const res = parseQueryString("__proto__=x");
    expect(Object.keys(res)).toEqual(["__proto__"]);
    expect(res["__proto__"]).toEqual({ kind: "scalar", value: "x" });
  });
});

describe("queryValueToPlain", () => {
  it("unwraps each kind", () => {
    const res = parseQueryString("a=1&a=2&f&s=v");
    expect(queryValueToPlain(res["a"] ?? { kind: "flag" })).toEqual(["1", "2"]);
    expect(queryValueToPlain(res["f"] ?? { kind: "scalar", value: "" })).toBe(true);
    expect(queryValueToPlain(res["s"] ?? { kind: "flag" })).toBe("v");
  });
});
