import * as fs from "node:fs/promises";
import * as net from "node:net";
import * as os from "node:os";
import * as path from "node:path";
import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";
import { defaultConfig } from "../config/server-config.js";
import { LogStore, storeLogger } from "../logging/logger.js";
import { createNodeServer } from "../presets/node.js";

let tmpDir: string;

beforeAll(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "plainserve-node-socket-"));
  await fs.mkdir(path.join(tmpDir, "static"));
  await fs.writeFile(path.join(tmpDir, "static", "hello.txt"), "hello");
});

afterAll(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

/**
 * Write raw bytes and collect everything until the server closes. With
 * `halfClose` the client ends its write side right after the payload.
 */
function rawRequest(
  port: number,
  payload: string,
  halfClose = false,
): Promise<string> {
  return new Promise((resolve, reject) => {
    const socket = net.connect(port, "127.0.0.1", () => {
      if (halfClose) {
        socket.end(payload);
      } else {
        socket.write(payload);
      }
    });
    let data = "";
    socket.setEncoding("utf8");
    socket.on("data", (chunk: string) => {
      data += chunk;
    });
    socket.on("end", () => resolve(data));
    socket.on("error", reject);
  });
}

describe("WebServer Node adapter (real socket)", () => {
  it(
    "binds to an ephemeral port and serves requests",
    async () => {
      const server = createNodeServer({
        config: { ...defaultConfig(tmpDir), port: 0, quiet: true },
        logger: storeLogger(new LogStore()),
      });

      const port = await server.start();
      try {
        const res = await fetch(`http://127.0.0.1:${port}/static/hello.txt`);
        expect(res.status).toBe(200);
        expect(res.headers.get("content-type")).toBe("text/plain");
        expect(await res.text()).toBe("hello");

        expect(await rawRequest(port, "DELETE /x HTTP/1.1\r\n\r\n")).toBe(
          "HTTP/1.1 405 Method Not Allowed\r\n" +
            "Content-Type: text/plain\r\n" +
            "Content-Length: 22\r\n" +
            "\r\n" +
            "405 Method Not Allowed",
        );
      } finally {
        await server.stop();
      }
    },
    10000,
  );

  it(
    "rejects start() when the port is taken",
    async () => {
      const first = createNodeServer({
        config: { ...defaultConfig(tmpDir), port: 0, quiet: true },
        logger: storeLogger(new LogStore()),
      });
      const port = await first.start();
      try {
        const second = createNodeServer({
          config: { ...defaultConfig(tmpDir), port, quiet: true },
          logger: storeLogger(new LogStore()),
        });
        await expect(second.start()).rejects.toMatchObject({
          code: "EADDRINUSE",
        });
      } finally {
        await first.stop();
      }
    },
    10000,
  );

  it(
    "answers clients that half-close after sending the request",
    async () => {
      const server = createNodeServer({
        config: { ...defaultConfig(tmpDir), port: 0, quiet: true },
        logger: storeLogger(new LogStore()),
      });

      const port = await server.start();
      try {
        expect(await rawRequest(port, "GET / HTTP/1.1\r\n\r\n", true)).toBe(
          "HTTP/1.1 200 OK\r\n" +
            "Content-Type: text/plain\r\n" +
            "Content-Length: 24\r\n" +
            "\r\n" +
            "Welcome to the homepage!",
        );
        expect(
          await rawRequest(port, "GET /static/hello.txt HTTP/1.1\r\n\r\n", true),
        ).toBe(
          "HTTP/1.1 200 OK\r\n" +
            "Content-Type: text/plain\r\n" +
            "Content-Length: 5\r\n" +
            "\r\n" +
            "hello",
        );
      } finally {
        await server.stop();
      }
    },
    10000,
  );

  it(
    "closes connections that end without sending anything",
    async () => {
      const store = new LogStore();
      const server = createNodeServer({
        config: { ...defaultConfig(tmpDir), port: 0, quiet: true },
        logger: storeLogger(store),
      });

      const port = await server.start();
      try {
        expect(await rawRequest(port, "", true)).toBe("");
        await vi.waitFor(() => {
          expect(
            store
              .getEntries()
              .some(
                (entry) =>
                  entry.level === "warn" &&
                  entry.message.startsWith(
                    "Connection closed before any data was read (",
                  ),
              ),
          ).toBe(true);
        });
        await vi.waitFor(() => {
          expect(server.connectionCount).toBe(0);
        });
      } finally {
        await server.stop();
      }
    },
    10000,
  );
});
