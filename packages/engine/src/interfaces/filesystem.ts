/**
 * Abstract File System Interfaces
 *
 * Static file serving goes through this so tests can swap in an
 * in-memory tree.
 */

export interface IFileStat {
  size: number
  mtime: Date
  isDirectory: boolean
  isFile: boolean
}

export interface IFileSystem {
  /** Get file statistics. Rejects if the path does not exist. */
  stat(path: string): Promise<IFileStat>

  /** Check if a path exists. */
  exists(path: string): Promise<boolean>

  /** Read a whole file. */
  readFile(path: string): Promise<Uint8Array>

  /** Resolve symlinks to a canonical absolute path. */
  realpath(path: string): Promise<string>
}
