import type { HTTPRequest } from "./http_request";
import type { ConnWriter } from "./tcp_conn";

/* ==================== TYPES ==================== */

// how request headers are handled before the handler runs
export type HeadersMode = "parse" | "skip" | "leave";

export type RouteOptions = {
  headers?: HeadersMode;
};

/**
 * Request handler. Returning exactly `false` keeps the connection open; the
 * handler then owns closing it. Any other result closes it.
 */
export type Handler = (req: HTTPRequest, writer: ConnWriter) => Promise<boolean | void> | boolean | void;

// exact path, or a pattern whose match is exposed as req.urlMatch
export type Matcher = string | RegExp;

export type RouteSpec = readonly [Matcher, Handler] | readonly [Matcher, Handler, RouteOptions];
