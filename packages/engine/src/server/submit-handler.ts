import { textResponse } from "../http/response-writer.js";
import type { HttpRequest, HttpResponse } from "../http/types.js";
import type { Logger } from "../logging/logger.js";

export const NOT_FOUND_BODY = "404 Not Found";
export const UNSUPPORTED_CONTENT_TYPE_BODY = "Unsupported Content-Type";

/** Header looked up by exact, case-sensitive key. */
const CONTENT_TYPE_HEADER = "Content-Type";

const PAYLOAD_DESCRIPTIONS: Record<string, string> = {
  "application/json": "JSON",
  "application/x-www-form-urlencoded": "form data",
};

export interface SubmitHandlerOptions {
  /** Path that accepts submissions, e.g. `/submit`. */
  path: string;
  logger?: Logger;
}

/**
 * Echoes POSTed JSON or form bodies back as plain text. The body is never
 * parsed or size-checked.
 */
export class SubmitHandler {
  private path: string;
  private logger?: Logger;

  constructor(options: SubmitHandlerOptions) {
    this.path = options.path;
    this.logger = options.logger;
  }

  handle(request: HttpRequest): HttpResponse {
    if (request.path !== this.path) {
      return textResponse(404, NOT_FOUND_BODY);
    }

    this.logger?.info(
      `Processing POST request to ${this.path} with body: ${request.body}`,
    );

    const contentType = request.headers.get(CONTENT_TYPE_HEADER);
    const description =
      contentType !== undefined && Object.hasOwn(PAYLOAD_DESCRIPTIONS, contentType)
        ? PAYLOAD_DESCRIPTIONS[contentType]
        : undefined;

    if (description === undefined) {
      this.logger?.warn(
        `Unsupported Content-Type: ${contentType ?? "(none)"}`,
      );
      return textResponse(415, UNSUPPORTED_CONTENT_TYPE_BODY);
    }

    this.logger?.info(`Received ${description} payload`);
    return textResponse(200, `Received ${description}: ${request.body}`);
  }
}
