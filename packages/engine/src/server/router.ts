import { textResponse } from "../http/response-writer.js";
import type { HttpRequest, HttpResponse } from "../http/types.js";
import type { Logger } from "../logging/logger.js";
import type { StaticServer } from "./static-server.js";
import { NOT_FOUND_BODY, type SubmitHandler } from "./submit-handler.js";

export const WELCOME_BODY = "Welcome to the homepage!";
export const METHOD_NOT_ALLOWED_BODY = "405 Method Not Allowed";
export const INTERNAL_ERROR_BODY = "500 Internal Server Error";

export interface RouterOptions {
  staticServer: StaticServer;
  submitHandler: SubmitHandler;
  /** Paths starting with this go to the static server. */
  staticPrefix: string;
  logger?: Logger;
}

/**
 * Maps a parsed request to exactly one response:
 *
 * | method | path           | result                 |
 * |--------|----------------|------------------------|
 * | GET    | /              | 200 welcome text       |
 * | GET    | static prefix  | static file server     |
 * | GET    | other          | 404                    |
 * | POST   | any            | submit handler         |
 * | other  | any            | 405                    |
 */
export class Router {
  private staticServer: StaticServer;
  private submitHandler: SubmitHandler;
  private staticPrefix: string;
  private logger?: Logger;

  constructor(options: RouterOptions) {
    this.staticServer = options.staticServer;
    this.submitHandler = options.submitHandler;
    this.staticPrefix = options.staticPrefix;
    this.logger = options.logger;
  }

  async route(request: HttpRequest): Promise<HttpResponse> {
    try {
      return await this.dispatch(request);
    } catch (err) {
      this.logger?.error(
        `Handler failed for ${request.method} ${request.path}:`,
        err,
      );
      return textResponse(500, INTERNAL_ERROR_BODY);
    }
  }

  private async dispatch(request: HttpRequest): Promise<HttpResponse> {
    switch (request.method) {
      case "GET":
        if (request.path === "/") {
          return textResponse(200, WELCOME_BODY);
        }
        if (request.path.startsWith(this.staticPrefix)) {
          return this.staticServer.serve(request.path);
        }
        return textResponse(404, NOT_FOUND_BODY);
      case "POST":
        return this.submitHandler.handle(request);
      default:
        return textResponse(405, METHOD_NOT_ALLOWED_BODY);
    }
  }
}
