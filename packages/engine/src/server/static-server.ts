import type { IFileSystem } from '../interfaces/filesystem.js'
import type { HttpResponse } from '../http/types.js'
import { createResponse, textResponse } from '../http/response-writer.js'
import { getMimeType } from './mime-types.js'
import { decodeStrict } from '../utils/buffer.js'
import type { Logger } from '../logging/logger.js'

export const FILE_NOT_FOUND_BODY = '404 File Not Found'
export const FORBIDDEN_BODY = '403 Forbidden'

export interface StaticServerOptions {
  /** Directory request paths are resolved against. */
  root: string
  /** URL prefix served from `<root>/<prefix>`, e.g. `/static/`. */
  prefix: string
  fs: IFileSystem
  logger?: Logger
}

export class StaticServer {
  private root: string
  private staticDir: string
  private fs: IFileSystem
  private logger?: Logger

  constructor(options: StaticServerOptions) {
    this.root = options.root.replace(/\/+$/, '')
    const prefixDir = options.prefix.replace(/^\/+|\/+$/g, '')
    this.staticDir = prefixDir ? `${this.root}/${prefixDir}` : this.root
    this.fs = options.fs
    this.logger = options.logger
  }

  /**
   * Serve `urlPath` (which starts with the static prefix) as a text file.
   * Missing, unreadable, non-file and non-UTF-8 targets are all 404;
   * anything resolving outside the static directory is 403.
   */
  async serve(urlPath: string): Promise<HttpResponse> {
    const fsPath = resolveUnderRoot(this.root, urlPath)
    if (!fsPath || !isWithin(fsPath, this.staticDir)) {
      this.logger?.warn(`Rejected path outside static directory: ${urlPath}`)
      return textResponse(403, FORBIDDEN_BODY)
    }

    try {
      if (!(await this.fs.exists(fsPath))) {
        return textResponse(404, FILE_NOT_FOUND_BODY)
      }

      // Symlinks must not lead out of the static directory either
      const [realFile, realDir] = await Promise.all([
        this.fs.realpath(fsPath),
        this.fs.realpath(this.staticDir),
      ])
      if (!isWithin(realFile, realDir)) {
        this.logger?.warn(`Rejected symlink outside static directory: ${urlPath}`)
        return textResponse(403, FORBIDDEN_BODY)
      }

      const stat = await this.fs.stat(realFile)
      if (!stat.isFile) {
        return textResponse(404, FILE_NOT_FOUND_BODY)
      }

      const data = await this.fs.readFile(realFile)
      if (decodeStrict(data) === null) {
        this.logger?.debug(`Not valid UTF-8, treating as missing: ${fsPath}`)
        return textResponse(404, FILE_NOT_FOUND_BODY)
      }

      return createResponse(200, getMimeType(fsPath), data)
    } catch (err) {
      this.logger?.error('Error serving static file:', err)
      return textResponse(404, FILE_NOT_FOUND_BODY)
    }
  }
}

/**
 * Join a request path onto `root` after dropping its leading `/`.
 * `.` and empty segments are skipped; `..` pops. Returns null when `..`
 * would climb above root.
 */
export function resolveUnderRoot(root: string, urlPath: string): string | null {
  const relative = urlPath.replace(/^\//, '')
  const resolved: string[] = []
  for (const seg of relative.split('/')) {
    if (seg === '' || seg === '.') continue
    if (seg === '..') {
      if (resolved.length === 0) return null
      resolved.pop()
      continue
    }
    resolved.push(seg)
  }
  return resolved.length > 0 ? `${root}/${resolved.join('/')}` : root
}

function isWithin(path: string, dir: string): boolean {
  return path === dir || path.startsWith(dir === '/' ? '/' : `${dir}/`)
}
