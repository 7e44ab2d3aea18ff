import type { Readable } from "stream";
import type { ConnWriter } from "./tcp_conn";

/* ==================== RESPONSE HELPERS ==================== */

export type ExtraHeaders = string | Buffer | Record<string, string>;

function isEmpty(headers: ExtraHeaders | undefined): boolean {
  if (!headers) return true;
  if (typeof headers === "string" || Buffer.isBuffer(headers)) return headers.length === 0;
  return Object.keys(headers).length === 0;
}

// "NA" stands in for the reason phrase; clients only look at the status code
export async function startResponse(
  writer: ConnWriter,
  contentType = "text/html; charset=utf-8",
  status = "200",
  headers?: ExtraHeaders,
): Promise<void> {
  await writer.awrite(`HTTP/1.0 ${status} NA\r\n`);
  await writer.awrite("Content-Type: ");
  await writer.awrite(contentType);
  if (isEmpty(headers)) {
    await writer.awrite("\r\n\r\n");
    return;
  }
  await writer.awrite("\r\n");
  if (typeof headers === "string" || Buffer.isBuffer(headers)) {
    await writer.awrite(headers);
  } else if (headers) {
    for (const [k, v] of Object.entries(headers)) {
      await writer.awrite(`${k}: ${v}\r\n`);
    }
  }
  await writer.awrite("\r\n");
}

export async function httpError(writer: ConnWriter, status: string): Promise<void> {
  await startResponse(writer, undefined, status);
  await writer.awrite(status);
}

export async function jsonify(writer: ConnWriter, value: unknown): Promise<void> {
  await startResponse(writer, "application/json");
  await writer.awrite(JSON.stringify(value));
}

export async function sendStream(writer: ConnWriter, stream: Readable): Promise<void> {
  for await (const chunk of stream) {
    await writer.awrite(typeof chunk === "string" ? chunk : Buffer.from(chunk));
  }
}
