import { HTTPError } from "./errors";

// flag: key without '='; multi: key seen more than once, in order
export type QueryValue =
  | { kind: "scalar"; value: string }
  | { kind: "flag" }
  | { kind: "multi"; values: string[] };

export type QueryDict = Record<string, QueryValue>;

const kHexPair = /^[0-9A-Fa-f]{2}/;

/**
 * Decode `+` as space and every `%XX` escape as the character with code
 * point 0xXX. Escapes are decoded one at a time, so multi-byte UTF-8
 * sequences come out as one character per byte.
 *
 * Throws `MalformedEscape` when a `%` is not followed by two hex digits,
 * including a truncated escape at the end of the input.
 */
export function unquotePlus(s: string): string {
  const parts = s.replace(/\+/g, " ").split("%");
  let out = parts[0] ?? "";
  for (let i = 1; i < parts.length; i++) {
    const part = parts[i] ?? "";
    if (!kHexPair.test(part)) {
      throw new HTTPError("MalformedEscape", `bad percent escape: %${part.slice(0, 2)}`);
    }
    out += String.fromCharCode(parseInt(part.slice(0, 2), 16)) + part.slice(2);
  }
  return out;
}

function scalarOf(value: string | true): QueryValue {
  return value === true ? { kind: "flag" } : { kind: "scalar", value };
}

function plainOf(value: QueryValue): string {
  return value.kind === "scalar" ? value.value : "";
}

export function parseQueryString(s: string): QueryDict {
  // no prototype, so keys like "__proto__" stay plain entries
  const res: QueryDict = Object.create(null);
  if (!s) return res;
  for (const pair of s.split("&")) {
    const eq = pair.indexOf("=");
    const key = unquotePlus(eq < 0 ? pair : pair.slice(0, eq));
    const value: string | true = eq < 0 ? true : unquotePlus(pair.slice(eq + 1));

    const old = res[key];
    if (old === undefined) {
      res[key] = scalarOf(value);
    } else if (old.kind === "multi") {
      old.values.push(value === true ? "" : value);
    } else {
      res[key] = { kind: "multi", values: [plainOf(old), value === true ? "" : value] };
    }
  }
  return res;
}

// untagged view: "1", true, or ["1", "2"]
export function queryValueToPlain(v: QueryValue): string | true | string[] {
  switch (v.kind) {
    case "scalar":
      return v.value;
    case "flag":
      return true;
    case "multi":
      return [...v.values];
  }
}
