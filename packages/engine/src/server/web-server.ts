import type { ServerConfig } from "../config/server-config.js";
import {
  parseHttpRequest,
  RequestReadError,
  readRequestBuffer,
} from "../http/request-parser.js";
import { sendResponse } from "../http/response-writer.js";
import type { HttpRequest, HttpResponse } from "../http/types.js";
import type { IFileSystem } from "../interfaces/filesystem.js";
import type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "../interfaces/socket.js";
import type { Logger } from "../logging/logger.js";
import { basicLogger } from "../logging/logger.js";
import { EventEmitter } from "../utils/event-emitter.js";
import { Router } from "./router.js";
import { StaticServer } from "./static-server.js";
import { SubmitHandler } from "./submit-handler.js";

export interface WebServerOptions {
  socketFactory: ISocketFactory;
  fileSystem: IFileSystem;
  config: ServerConfig;
  logger?: Logger;
}

export type WebServerEvents = {
  listening: [port: number];
  close: [];
  error: [err: Error];
  response: [request: HttpRequest, response: HttpResponse];
};

/**
 * Accepts connections and answers exactly one request on each. Every
 * connection is handled independently: read once, route, write, close.
 * There is no cap on concurrent connections.
 */
export class WebServer extends EventEmitter<WebServerEvents> {
  private socketFactory: ISocketFactory;
  private config: ServerConfig;
  private logger: Logger;
  private tcpServer: ITcpServer | null = null;
  private router: Router;
  private activeConnections: Set<ITcpSocket> = new Set();

  constructor(options: WebServerOptions) {
    super();
    this.socketFactory = options.socketFactory;
    this.config = options.config;
    this.logger = options.logger ?? basicLogger();

    this.router = new Router({
      staticPrefix: this.config.staticPrefix,
      staticServer: new StaticServer({
        root: this.config.root,
        prefix: this.config.staticPrefix,
        fs: options.fileSystem,
        logger: this.logger,
      }),
      submitHandler: new SubmitHandler({
        path: this.config.submitPath,
        logger: this.logger,
      }),
      logger: this.logger,
    });
  }

  get connectionCount(): number {
    return this.activeConnections.size;
  }

  start(): Promise<number> {
    if (this.tcpServer) {
      return Promise.reject(new Error("Server is already started"));
    }

    return new Promise((resolve, reject) => {
      const server = this.socketFactory.createTcpServer();
      this.tcpServer = server;

      let settled = false;

      server.on("connection", (rawSocket) => {
        const socket = this.socketFactory.wrapTcpSocket(rawSocket);
        this.handleConnection(socket).catch((err: unknown) => {
          this.logger.error("Unhandled connection failure:", err);
        });
      });

      server.on("error", (err) => {
        if (!settled) {
          settled = true;
          this.tcpServer = null;
          reject(err);
          return;
        }

        this.logger.error("TCP server error:", err);
        this.emit("error", err);
      });

      server.listen(this.config.port, this.config.host, () => {
        if (settled) return;
        settled = true;
        const addr = server.address();
        const port = addr?.port ?? this.config.port;
        this.emit("listening", port);
        resolve(port);
      });
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve) => {
      const server = this.tcpServer;
      this.tcpServer = null;

      for (const socket of this.activeConnections) {
        socket.close();
      }
      this.activeConnections.clear();

      if (!server) {
        this.emit("close");
        resolve();
        return;
      }

      server.close(() => {
        this.emit("close");
        resolve();
      });
    });
  }

  private async handleConnection(socket: ITcpSocket): Promise<void> {
    this.activeConnections.add(socket);

    socket.onClose(() => {
      this.activeConnections.delete(socket);
    });

    socket.onError(() => {
      this.activeConnections.delete(socket);
    });

    const addr = `${socket.remoteAddress ?? "?"}:${socket.remotePort ?? "?"}`;
    if (!this.config.quiet) {
      this.logger.info(`New connection from ${addr}`);
    }

    try {
      let raw: Uint8Array;
      try {
        raw = await readRequestBuffer(socket, {
          bufferSize: this.config.readBufferSize,
          timeoutMs: this.config.requestTimeoutMs,
        });
      } catch (err) {
        this.logReadFailure(err, addr);
        return;
      }

      const request = parseHttpRequest(raw);
      if (!this.config.quiet) {
        this.logger.info(`${request.method} ${request.path} - ${addr}`);
      }

      const response = await this.router.route(request);

      try {
        await sendResponse(socket, response);
      } catch (err) {
        this.logger.error(`Failed to send response to ${addr}:`, err);
        return;
      }

      if (!this.config.quiet) {
        this.logger.info(
          `${response.status} ${response.statusText} - ${request.method} ${request.path}`,
        );
      }
      this.emit("response", request, response);
    } finally {
      this.activeConnections.delete(socket);
      socket.close();
    }
  }

  private logReadFailure(err: unknown, addr: string): void {
    if (classifyReadFailure(err) === "quiet") {
      const reason = err instanceof Error ? err.message : String(err);
      this.logger.warn(`${reason} (${addr})`);
      return;
    }
    this.logger.error(`Failed to read request from ${addr}:`, err);
  }
}

/**
 * A peer that hangs up or goes idle is routine; anything else reading
 * the request is a real error.
 */
export function classifyReadFailure(err: unknown): "quiet" | "error" {
  if (
    err instanceof RequestReadError &&
    (err.code === "CONNECTION_CLOSED" || err.code === "IDLE_TIMEOUT")
  ) {
    return "quiet";
  }
  return "error";
}
