/**
 * Runbook storage backed by a local directory. Paths are relative to the
 * root and always use "/" separators.
 */

import fs from "fs/promises";
import path from "path";
import type { StoragePort } from "../types";

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR" || error.code === "EISDIR")
  );
}

export class LocalRunbookStorage implements StoragePort {
  private rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = path.resolve(rootDir);
  }

  async list(prefix: string): Promise<string[]> {
    const files: string[] = [];
    await this.walk(this.rootDir, files);
    return files.filter((file) => file.startsWith(prefix)).sort();
  }

  async read(relativePath: string): Promise<string | null> {
    const fullPath = path.resolve(this.rootDir, relativePath);
    if (fullPath !== this.rootDir && !fullPath.startsWith(this.rootDir + path.sep)) {
      throw new Error(`Path escapes runbook directory: ${relativePath}`);
    }

    try {
      return await fs.readFile(fullPath, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }
  }

  private async walk(dir: string, files: string[]): Promise<void> {
    const entries = await fs.readdir(dir, { withFileTypes: true });

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await this.walk(fullPath, files);
      } else if (entry.isFile()) {
        files.push(path.relative(this.rootDir, fullPath).split(path.sep).join("/"));
      }
    }
  }
}
