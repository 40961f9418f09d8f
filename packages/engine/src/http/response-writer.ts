import type { ITcpSocket } from "../interfaces/socket.js";
import { concat, fromString } from "../utils/buffer.js";
import { type HttpResponse, STATUS_TEXT } from "./types.js";

export const TEXT_PLAIN = "text/plain";

export function createResponse(
  status: number,
  contentType: string,
  body: Uint8Array | string,
): HttpResponse {
  return Object.freeze({
    status,
    statusText: STATUS_TEXT[status] ?? "Unknown",
    contentType,
    body: typeof body === "string" ? fromString(body) : body,
  });
}

export function textResponse(status: number, body: string): HttpResponse {
  return createResponse(status, TEXT_PLAIN, body);
}

/**
 * Serialize a response to wire bytes. The header set is exactly
 * Content-Type and Content-Length, with the length taken from the body bytes.
 */
export function serializeResponse(response: HttpResponse): Uint8Array {
  const head = [
    `HTTP/1.1 ${response.status} ${response.statusText}`,
    `Content-Type: ${response.contentType}`,
    `Content-Length: ${response.body.byteLength}`,
    "",
    "",
  ].join("\r\n");
  return concat([fromString(head), response.body]);
}

/**
 * Write a complete response in one send. Resolves once the socket has
 * accepted it; rejects if the socket fails during the write.
 */
export async function sendResponse(
  socket: ITcpSocket,
  response: HttpResponse,
): Promise<void> {
  const bytes = serializeResponse(response);
  if (socket.sendAndWait) {
    await socket.sendAndWait(bytes);
    return;
  }
  socket.send(bytes);
}
