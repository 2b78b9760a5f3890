import { promises as fs } from "fs";
import os from "os";
import path from "path";

/** 2023-11-14T22:13:20Z */
export const FIXED_MTIME_SECONDS = 1700000000;
export const FIXED_MTIME_ISO = "2023-11-14T22:13:20Z";

export async function writeDatasetFile(root: string, relativePath: string, content: string): Promise<void> {
  const fullPath = path.join(root, relativePath);
  await fs.mkdir(path.dirname(fullPath), { recursive: true });
  await fs.writeFile(fullPath, content, "utf8");
  await fs.utimes(fullPath, FIXED_MTIME_SECONDS, FIXED_MTIME_SECONDS);
}

/** Creates a temporary dataset directory holding `files` (relative path to content). */
export async function makeDatasetDir(files: Record<string, string>): Promise<string> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "beamline-ingest-"));
  for (const [relativePath, content] of Object.entries(files)) {
    await writeDatasetFile(root, relativePath, content);
  }
  return root;
}

export async function removeDir(root: string): Promise<void> {
  await fs.rm(root, { recursive: true, force: true });
}
