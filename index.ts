export { resolveServerConfig, type ServerConfig } from "./config";
export { dispatch, resolveMounts, type DispatchOutcome, type DispatchReport, type DispatchTarget } from "./dispatcher";
export { HTTPError, isHTTPError, type ErrorKind } from "./errors";
export {
  applyHeaderPolicy,
  HTTPRequest,
  parseHeaders,
  parseRequestLine,
  readRequestLine,
  skipHeaders,
  type RequestLine,
} from "./http_request";
export { newConn, serve } from "./http_server";
export { MountTable, type MountEntry } from "./mount_table";
export { parseQueryString, queryValueToPlain, unquotePlus, type QueryDict, type QueryValue } from "./query_string";
export { httpError, jsonify, sendStream, startResponse, type ExtraHeaders } from "./response";
export { RouteTable, type RouteEntry, type RouteHit } from "./route_table";
export { fsResourceLoader, getMimeType, type ResourceLoader } from "./static_files";
export {
  kDefaultLimits,
  readerFromConn,
  soInit,
  soRead,
  soWrite,
  writerFromConn,
  type ConnLimits,
  type ConnReader,
  type ConnWriter,
  type TCPConn,
} from "./tcp_conn";
export type { Handler, HeadersMode, Matcher, RouteOptions, RouteSpec } from "./types";
export { WebApp, type RunOptions, type Template, type TemplateLoader, type WebAppOptions } from "./web_app";
