import type { FileManifest, FileManifestEntry } from "../types/descriptor";
import type { Outcome } from "../types/failure";
import { fail } from "../types/failure";
import { ok } from "../types/result";

export function createManifest(entries: FileManifestEntry[]): Outcome<FileManifest> {
  const seen = new Set<string>();
  for (const entry of entries) {
    if (seen.has(entry.path)) {
      return fail("DuplicatePath", `Manifest lists ${entry.path} more than once`);
    }
    seen.add(entry.path);
  }
  return ok({ files: entries.map((entry) => ({ ...entry })) });
}

export function totalSizeBytes(manifest: FileManifest): number {
  return manifest.files.reduce((sum, entry) => sum + entry.size_bytes, 0);
}

export function manifestPaths(manifest: FileManifest): Set<string> {
  return new Set(manifest.files.map((entry) => entry.path));
}

/** The entry recorded for `filePath`, which is relative to the dataset root. */
export function findEntry(manifest: FileManifest, filePath: string): FileManifestEntry | undefined {
  return manifest.files.find((entry) => entry.path === filePath);
}
