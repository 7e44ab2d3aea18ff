/* ==================== ERRORS ==================== */

export type ErrorKind =
  | "MalformedRequestLine"
  | "MalformedHeaderLine"
  | "MalformedEscape"
  | "UnexpectedEOF"
  | "HeaderTooLarge"
  | "ReadTimeout"
  | "LengthRequired"
  | "ResourceIOError"
  | "HandlerFailure";

const kStatusByKind: Record<ErrorKind, number> = {
  MalformedRequestLine: 400,
  MalformedHeaderLine: 400,
  MalformedEscape: 400,
  UnexpectedEOF: 400,
  HeaderTooLarge: 413,
  ReadTimeout: 408,
  LengthRequired: 411,
  ResourceIOError: 500,
  HandlerFailure: 500,
};

export class HTTPError extends Error {
  readonly kind: ErrorKind;
  readonly code: number;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "HTTPError";
    this.kind = kind;
    this.code = kStatusByKind[kind];
  }
}

export function isHTTPError(err: unknown): err is HTTPError {
  return err instanceof HTTPError;
}

// kind of an arbitrary thrown value, for the dispatcher's result channel
export function errorKindOf(err: unknown): ErrorKind {
  return isHTTPError(err) ? err.kind : "HandlerFailure";
}
