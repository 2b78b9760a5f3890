import { promises as fs } from "fs";
import type { Dirent } from "fs";
import path from "path";
import { errorMessage } from "../types/failure";
import { randomBytes } from "crypto";

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

/**
 * Writes JSON beside the target under a random temp name, then renames it over
 * the target. Readers see the old file or the new one.
 */
export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
  const dir = path.dirname(filePath);
  await ensureDir(dir);
  const tmp = path.join(dir, `.${path.basename(filePath)}.${randomBytes(6).toString("hex")}.tmp`);
  await fs.writeFile(tmp, JSON.stringify(data, null, 2) + "\n", "utf8");
  try {
    await fs.rename(tmp, filePath);
  } catch (error) {
    await fs.rm(tmp, { force: true });
    throw error;
  }
}

export function toPosixPath(relativePath: string): string {
  return relativePath.split(path.sep).join("/");
}

export interface DirectoryListing {
  files: string[];
  symlinks: string[];
  /** Folders that could not be read; the walk continues past them. */
  unreadable: Array<{ path: string; message: string }>;
}

export async function listFilesRecursive(
  rootDir: string,
  predicate: (relativePath: string) => boolean
): Promise<DirectoryListing> {
  const files: string[] = [];
  const symlinks: string[] = [];
  const unreadable: DirectoryListing["unreadable"] = [];
  async function walk(current: string): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(current, { withFileTypes: true });
    } catch (error) {
      const relative = toPosixPath(path.relative(rootDir, current)) || ".";
      unreadable.push({ path: relative, message: errorMessage(error) });
      return;
    }
    for (const entry of entries) {
      const fullPath = path.join(current, entry.name);
      const relative = toPosixPath(path.relative(rootDir, fullPath));
      if (entry.isSymbolicLink()) {
        symlinks.push(relative);
      } else if (entry.isDirectory()) {
        await walk(fullPath);
      } else if (entry.isFile() && predicate(relative)) {
        files.push(relative);
      }
    }
  }
  await walk(rootDir);
  files.sort();
  symlinks.sort();
  return { files, symlinks, unreadable };
}
