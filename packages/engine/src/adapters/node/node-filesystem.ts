import * as fs from "node:fs/promises";
import type { IFileStat, IFileSystem } from "../../interfaces/filesystem.js";

export class NodeFileSystem implements IFileSystem {
  async stat(filePath: string): Promise<IFileStat> {
    const stats = await fs.stat(filePath);
    return {
      size: stats.size,
      mtime: stats.mtime,
      isDirectory: stats.isDirectory(),
      isFile: stats.isFile(),
    };
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  async readFile(filePath: string): Promise<Uint8Array> {
    return new Uint8Array(await fs.readFile(filePath));
  }

  async realpath(filePath: string): Promise<string> {
    return fs.realpath(filePath);
  }
}
