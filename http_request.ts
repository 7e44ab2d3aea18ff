import { HTTPError } from "./errors";
import { parseQueryString, type QueryDict } from "./query_string";
import type { ConnLimits, ConnReader } from "./tcp_conn";
import type { HeadersMode } from "./types";

/* ==================== REQUEST ==================== */

export class HTTPRequest {
  method = "";
  // path relative to the application that handles it
  path = "";
  // raw query string, without '?'
  qs = "";
  // lower-cased names; only filled under the "parse" headers mode
  headers: Map<string, string> | null = null;
  urlMatch: RegExpExecArray | null = null;
  form: QueryDict | null = null;

  constructor(readonly reader: ConnReader) {}

  parseQs(): QueryDict {
    this.form = parseQueryString(this.qs);
    return this.form;
  }

  async readFormData(): Promise<QueryDict> {
    const raw = this.headers?.get("content-length");
    if (raw === undefined) throw new HTTPError("LengthRequired", "no Content-Length header");
    const size = Number(raw);
    if (!Number.isInteger(size) || size < 0) throw new HTTPError("LengthRequired", `bad Content-Length: ${raw}`);
    const data = await this.reader.readexactly(size);
    this.form = parseQueryString(data.toString("latin1"));
    return this.form;
  }
}

/* ==================== PARSING ==================== */

export type RequestLine = { method: string; path: string; qs: string; proto: string };

// an empty buffer means the peer closed before sending anything
export function readRequestLine(reader: ConnReader): Promise<Buffer> {
  return reader.readline();
}

export function parseRequestLine(line: Buffer): RequestLine {
  const parts = line.toString("latin1").trim().split(/\s+/);
  if (parts.length !== 3) throw new HTTPError("MalformedRequestLine", "bad request line");
  const [method = "", target = "", proto = ""] = parts;
  const q = target.indexOf("?");
  return {
    method,
    path: q < 0 ? target : target.slice(0, q),
    qs: q < 0 ? "" : target.slice(q + 1),
    proto,
  };
}

function isBlankLine(line: Buffer): boolean {
  const s = line.toString("latin1");
  return s === "\r\n" || s === "\n";
}

async function readHeaderLines(
  reader: ConnReader,
  limits: ConnLimits,
  onLine: (line: string) => void,
): Promise<void> {
  let count = 0;
  while (true) {
    const line = await reader.readline();
    if (line.length === 0) throw new HTTPError("UnexpectedEOF", "connection closed inside headers");
    if (isBlankLine(line)) return;
    if (++count > limits.maxHeaderCount) throw new HTTPError("HeaderTooLarge", "too many header lines");
    onLine(line.toString("latin1"));
  }
}

export async function parseHeaders(reader: ConnReader, limits: ConnLimits): Promise<Map<string, string>> {
  const headers = new Map<string, string>();
  await readHeaderLines(reader, limits, (line) => {
    const colon = line.indexOf(":");
    if (colon < 0) throw new HTTPError("MalformedHeaderLine", "header line without ':'");
    headers.set(line.slice(0, colon).trim().toLowerCase(), line.slice(colon + 1).trim());
  });
  return headers;
}

export function skipHeaders(reader: ConnReader, limits: ConnLimits): Promise<void> {
  return readHeaderLines(reader, limits, () => {});
}

// parse: build the mapping; skip: drain to the blank line;
// leave: read nothing, the handler consumes the rest
export async function applyHeaderPolicy(
  mode: HeadersMode,
  reader: ConnReader,
  limits: ConnLimits,
): Promise<Map<string, string> | null> {
  switch (mode) {
    case "parse":
      return parseHeaders(reader, limits);
    case "skip":
      await skipHeaders(reader, limits);
      return null;
    case "leave":
      return null;
  }
}
