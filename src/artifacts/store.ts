import path from "node:path";
import { mkdir, readFile, readdir, rm, stat, writeFile } from "node:fs/promises";

export interface StoreEntry {
  name: string;
  isDirectory: boolean;
}

/**
 * Everything the pipeline reads or writes goes through this interface, so
 * stage state and cleanup can run against an in-memory store in tests.
 */
export interface ArtifactStore {
  exists(artifactPath: string): Promise<boolean>;
  isDirectory(dirPath: string): Promise<boolean>;
  /** File contents, or null when the file does not exist. */
  readText(artifactPath: string): Promise<string | null>;
  /** Creates parent directories as needed. */
  writeText(artifactPath: string, content: string): Promise<void>;
  /** Direct children of a directory; empty when the directory does not exist. */
  list(dirPath: string): Promise<StoreEntry[]>;
  /** Removes a file or a directory tree. Resolves false when nothing was there. */
  remove(artifactPath: string): Promise<boolean>;
}

function isNotFound(err: unknown): boolean {
  return (
    err instanceof Error &&
    "code" in err &&
    (err.code === "ENOENT" || err.code === "ENOTDIR")
  );
}

export class FsArtifactStore implements ArtifactStore {
  async exists(artifactPath: string): Promise<boolean> {
    try {
      await stat(artifactPath);
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }

  async isDirectory(dirPath: string): Promise<boolean> {
    try {
      return (await stat(dirPath)).isDirectory();
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }

  async readText(artifactPath: string): Promise<string | null> {
    try {
      return await readFile(artifactPath, "utf-8");
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  async writeText(artifactPath: string, content: string): Promise<void> {
    await mkdir(path.dirname(artifactPath), { recursive: true });
    await writeFile(artifactPath, content, "utf-8");
  }

  async list(dirPath: string): Promise<StoreEntry[]> {
    try {
      const entries = await readdir(dirPath, { withFileTypes: true });
      return entries.map((entry) => ({ name: entry.name, isDirectory: entry.isDirectory() }));
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }
  }

  async remove(artifactPath: string): Promise<boolean> {
    if (!(await this.exists(artifactPath))) return false;
    await rm(artifactPath, { recursive: true, force: true });
    return true;
  }
}
