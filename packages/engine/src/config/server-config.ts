import { DEFAULT_READ_BUFFER_SIZE } from "../http/request-parser.js";

export interface ServerConfig {
  /** Port to listen on. Default: 8080 */
  port: number;
  /** Host/IP to bind. Default: '127.0.0.1' */
  host: string;
  /** Directory request paths resolve against. */
  root: string;
  /** GET paths with this prefix are served from `<root><prefix>`. Default: '/static/' */
  staticPrefix: string;
  /** POST endpoint that echoes JSON and form bodies. Default: '/submit' */
  submitPath: string;
  /**
   * Bytes kept from the single read of each request. Requests past this
   * size are truncated, not rejected. Default: 4096
   */
  readBufferSize: number;
  /** Max wait for the request bytes; 0 waits forever. Default: 0 */
  requestTimeoutMs: number;
  /** Suppress per-request logging. Default: false */
  quiet: boolean;
}

export function defaultConfig(root: string): ServerConfig {
  return {
    port: 8080,
    host: "127.0.0.1",
    root,
    staticPrefix: "/static/",
    submitPath: "/submit",
    readBufferSize: DEFAULT_READ_BUFFER_SIZE,
    requestTimeoutMs: 0,
    quiet: false,
  };
}
