// Node adapters
export {
  NodeFileSystem,
  NodeSocketFactory,
  NodeTcpServer,
  NodeTcpSocket,
} from "./adapters/node/index.js";
// Config
export type { ServerConfig } from "./config/server-config.js";
export { defaultConfig } from "./config/server-config.js";
// HTTP
export type {
  ReadRequestOptions,
  RequestReadErrorCode,
} from "./http/request-parser.js";
export {
  DEFAULT_READ_BUFFER_SIZE,
  parseHttpRequest,
  RequestReadError,
  readRequestBuffer,
} from "./http/request-parser.js";
export {
  createResponse,
  sendResponse,
  serializeResponse,
  textResponse,
} from "./http/response-writer.js";
export type { HttpRequest, HttpResponse } from "./http/types.js";
export { STATUS_TEXT } from "./http/types.js";
// Interfaces
export type { IFileStat, IFileSystem } from "./interfaces/filesystem.js";
export type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "./interfaces/socket.js";
// Logging
export type { LogEntry, Logger, LogLevel } from "./logging/logger.js";
export {
  basicLogger,
  filteredLogger,
  LogStore,
  prefixedLogger,
  storeLogger,
} from "./logging/logger.js";
// Presets
export type { NodeServerOptions } from "./presets/node.js";
export { createNodeServer } from "./presets/node.js";
// Server
export { DEFAULT_MIME_TYPE, getMimeType } from "./server/mime-types.js";
export type { RouterOptions } from "./server/router.js";
export { Router } from "./server/router.js";
export type { StaticServerOptions } from "./server/static-server.js";
export { StaticServer } from "./server/static-server.js";
export type { SubmitHandlerOptions } from "./server/submit-handler.js";
export { SubmitHandler } from "./server/submit-handler.js";
export type { WebServerEvents, WebServerOptions } from "./server/web-server.js";
export { classifyReadFailure, WebServer } from "./server/web-server.js";
// Testing
export { InMemoryFileSystem } from "./testing/in-memory-filesystem.js";
export {
  InMemorySocketFactory,
  InMemoryTcpSocket,
} from "./testing/in-memory-socket-factory.js";
// Utils
export {
  concat,
  decodeStrict,
  decodeToString,
  fromString,
} from "./utils/buffer.js";
export { EventEmitter } from "./utils/event-emitter.js";
