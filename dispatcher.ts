import { errorKindOf, type ErrorKind } from "./errors";
import { applyHeaderPolicy, HTTPRequest, parseRequestLine, readRequestLine } from "./http_request";
import type { MountTable } from "./mount_table";
import { startResponse } from "./response";
import type { RouteTable } from "./route_table";
import type { ConnLimits, ConnReader, ConnWriter } from "./tcp_conn";
import type { HeadersMode } from "./types";

// what the dispatcher needs from an application
export interface DispatchTarget {
  readonly routes: RouteTable;
  readonly mounts: MountTable<DispatchTarget>;
  readonly inited: boolean;
  readonly headersMode: HeadersMode;
  readonly limits: ConnLimits;
  init(): boolean;
  handleExc(req: HTTPRequest | null, writer: ConnWriter, err: unknown): Promise<void> | void;
}

export type DispatchOutcome = "ClosedEmpty" | "Dispatched" | "NotFound" | "HandlerError";

export type DispatchReport = {
  outcome: DispatchOutcome;
  // set only for "HandlerError"
  errorKind: ErrorKind | null;
};

type Result<T> = { ok: true; value: T } | { ok: false; kind: ErrorKind; error: unknown };

// steps that completed without error
type Exchange =
  | { state: "ClosedEmpty" }
  | { state: "NotFound" }
  | { state: "Dispatched"; close: boolean };

async function attempt<T>(step: () => Promise<T>): Promise<Result<T>> {
  try {
    return { ok: true, value: await step() };
  } catch (error) {
    return { ok: false, kind: errorKindOf(error), error };
  }
}

/**
 * Follow mounts from `root`, longest prefix first, until none matches.
 * Every mount prefix is at least two characters, so the path shrinks on
 * each hop and the loop ends.
 */
export function resolveMounts<T extends { readonly mounts: MountTable<T> }>(
  root: T,
  path: string,
): { app: T; path: string } {
  let app = root;
  while (true) {
    const hit = app.mounts.longestPrefix(path);
    if (!hit) return { app, path };
    app = hit.target;
    path = path.slice(hit.prefix.length);
    if (!path.startsWith("/")) path = "/" + path;
  }
}

// the request exists once a line has been read, even if it fails to parse
type Slot = { req: HTTPRequest | null };

async function exchange(
  root: DispatchTarget,
  reader: ConnReader,
  writer: ConnWriter,
  slot: Slot,
): Promise<Exchange> {
  // AwaitRequestLine
  const line = await readRequestLine(reader);
  if (line.length === 0) return { state: "ClosedEmpty" };
  const req = new HTTPRequest(reader);
  slot.req = req;
  const { method, path, qs } = parseRequestLine(line);
  req.method = method;
  req.qs = qs;

  // ResolveMounts
  const target = resolveMounts(root, path);
  const app = target.app;
  req.path = target.path;
  if (!app.inited) app.init();

  // ResolveRoute
  const hit = app.routes.resolve(req.path);
  req.urlMatch = hit?.match ?? null;

  // ApplyHeaderPolicy
  const mode: HeadersMode = hit ? hit.entry.options.headers ?? app.headersMode : "skip";
  req.headers = await applyHeaderPolicy(mode, reader, root.limits);

  if (!hit) {
    await startResponse(writer, undefined, "404");
    await writer.awrite("404\r\n");
    return { state: "NotFound" };
  }

  // Invoke
  const result = await hit.entry.handler(req, writer);
  return { state: "Dispatched", close: result !== false };
}

// One request per connection. Any failure goes to the root app's handleExc
// once; req is null only if reading the request line failed. The
// connection is closed even if the hook throws, and its error is rethrown.
export async function dispatch(
  root: DispatchTarget,
  reader: ConnReader,
  writer: ConnWriter,
): Promise<DispatchReport> {
  const slot: Slot = { req: null };
  const result = await attempt(() => exchange(root, reader, writer, slot));

  // Close
  const close = !(result.ok && result.value.state === "Dispatched" && !result.value.close);
  try {
    if (!result.ok) {
      await root.handleExc(slot.req, writer, result.error);
    }
  } finally {
    if (close) await writer.aclose();
  }
  return result.ok
    ? { outcome: result.value.state, errorKind: null }
    : { outcome: "HandlerError", errorKind: result.kind };
}
