import type { ITcpSocket } from "../interfaces/socket.js";
import { decodeToString } from "../utils/buffer.js";
import type { HttpRequest } from "./types.js";

export const DEFAULT_READ_BUFFER_SIZE = 4096;

const HEADER_SEPARATOR = ": ";

export interface ReadRequestOptions {
  /** Bytes kept from the first read. Anything past this is dropped. */
  bufferSize?: number;
  /** 0 waits forever. */
  timeoutMs?: number;
}

export type RequestReadErrorCode =
  | "CONNECTION_CLOSED"
  | "IDLE_TIMEOUT"
  | "SOCKET_ERROR";

export class RequestReadError extends Error {
  constructor(
    readonly code: RequestReadErrorCode,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "RequestReadError";
  }
}

/**
 * Parse one request out of a single read buffer.
 *
 * Never throws: a missing method or path becomes "", header lines without
 * ": " are dropped, and without a blank line the body stays empty. The body
 * is everything after the blank line; Content-Length is not consulted.
 */
export function parseHttpRequest(raw: Uint8Array | string): HttpRequest {
  const text = typeof raw === "string" ? raw : decodeToString(raw);
  const lines = splitLines(text);

  const [method = "", path = ""] = (lines[0] ?? "")
    .split(/\s+/)
    .filter((token) => token.length > 0);

  const headers = new Map<string, string>();
  let body = "";

  for (let i = 1; i < lines.length; i++) {
    const line = lines[i];
    if (line === "") {
      body = lines.slice(i + 1).join("\n");
      break;
    }
    const sep = line.indexOf(HEADER_SEPARATOR);
    if (sep === -1) continue;
    headers.set(
      line.substring(0, sep),
      line.substring(sep + HEADER_SEPARATOR.length),
    );
  }

  return Object.freeze({ method, path, headers, body });
}

function splitLines(text: string): string[] {
  if (text === "") return [];
  const lines = text.split("\n").map((line) => line.replace(/\r$/, ""));
  // A terminating newline does not start another line.
  if (text.endsWith("\n")) {
    lines.pop();
  }
  return lines;
}

/**
 * Wait for the first chunk of data on a socket and return at most
 * `bufferSize` bytes of it. There is no second read, so a request larger
 * than the buffer (or split across packets) arrives truncated.
 */
export function readRequestBuffer(
  socket: ITcpSocket,
  options?: ReadRequestOptions,
): Promise<Uint8Array> {
  const bufferSize = options?.bufferSize ?? DEFAULT_READ_BUFFER_SIZE;
  const timeoutMs = options?.timeoutMs ?? 0;

  return new Promise((resolve, reject) => {
    let settled = false;
    let timer: ReturnType<typeof setTimeout> | undefined;

    const settle = (fn: () => void) => {
      if (settled) return;
      settled = true;
      if (timer !== undefined) clearTimeout(timer);
      fn();
    };

    socket.onData((data) => {
      settle(() => resolve(data.slice(0, bufferSize)));
    });

    socket.onClose(() => {
      settle(() =>
        reject(
          new RequestReadError(
            "CONNECTION_CLOSED",
            "Connection closed before any data was read",
          ),
        ),
      );
    });

    socket.onError((err) => {
      settle(() =>
        reject(
          new RequestReadError("SOCKET_ERROR", err.message, { cause: err }),
        ),
      );
    });

    if (timeoutMs > 0) {
      timer = setTimeout(() => {
        settle(() =>
          reject(
            new RequestReadError("IDLE_TIMEOUT", "Connection idle timed out"),
          ),
        );
      }, timeoutMs);
    }
  });
}
