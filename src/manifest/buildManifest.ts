import { promises as fs } from "fs";
import type { Stats } from "fs";
import path from "path";
import type { FileManifest, FileManifestEntry, ValidationIssue } from "../types/descriptor";
import type { Outcome } from "../types/failure";
import { errorCode, errorMessage, fail } from "../types/failure";
import { ok } from "../types/result";
import { isDescriptorArtifact } from "../io/paths";
import { listFilesRecursive, toPosixPath } from "../utils/fs";
import { toUtcIsoSeconds } from "../utils/time";

export interface ManifestBuild {
  manifest: FileManifest;
  issues: ValidationIssue[];
}

type Inspection =
  | { kind: "file"; entry: FileManifestEntry }
  | { kind: "skip"; issue: ValidationIssue };

function normalizeRelative(rawPath: string): string | null {
  if (path.isAbsolute(rawPath)) return null;
  const normalized = toPosixPath(path.normalize(rawPath));
  if (normalized === ".." || normalized.startsWith("../") || normalized === ".") return null;
  return normalized;
}

function isInside(realRoot: string, target: string): boolean {
  const relative = path.relative(realRoot, target);
  return relative !== "" && !relative.startsWith("..") && !path.isAbsolute(relative);
}

async function inspect(root: string, realRoot: string, relativePath: string): Promise<Inspection> {
  const fullPath = path.join(root, relativePath);
  let stat: Stats;
  try {
    stat = await fs.lstat(fullPath);
  } catch (error) {
    const message =
      errorCode(error) === "ENOENT" ? `File does not exist: ${fullPath}` : `Cannot read ${fullPath}: ${errorMessage(error)}`;
    return { kind: "skip", issue: { severity: "error", path: relativePath, message } };
  }
  if (stat.isSymbolicLink()) {
    return { kind: "skip", issue: { severity: "error", path: relativePath, message: `Symlink skipped: ${fullPath}` } };
  }
  if (stat.isDirectory()) {
    return {
      kind: "skip",
      issue: { severity: "error", path: relativePath, message: `Path resolves to a folder: ${fullPath}` }
    };
  }
  if (!stat.isFile()) {
    return {
      kind: "skip",
      issue: { severity: "error", path: relativePath, message: `Not a regular file: ${fullPath}` }
    };
  }
  // A listed path can pass through a symlinked folder; lstat only checks the last segment.
  let realPath: string;
  try {
    realPath = await fs.realpath(fullPath);
  } catch (error) {
    return {
      kind: "skip",
      issue: { severity: "error", path: relativePath, message: `Cannot read ${fullPath}: ${errorMessage(error)}` }
    };
  }
  if (!isInside(realRoot, realPath)) {
    return {
      kind: "skip",
      issue: { severity: "error", path: relativePath, message: `Path resolves outside the dataset root: ${fullPath}` }
    };
  }
  return {
    kind: "file",
    entry: {
      path: relativePath,
      size_bytes: stat.size,
      date_last_modified: toUtcIsoSeconds(stat.mtime),
      is_supplemental: false
    }
  };
}

async function candidatePaths(
  root: string,
  files: string[] | null | undefined,
  issues: ValidationIssue[]
): Promise<string[]> {
  if (!files || files.length === 0) {
    const listing = await listFilesRecursive(root, (relative) => !isDescriptorArtifact(relative));
    for (const link of listing.symlinks) {
      issues.push({ severity: "warning", path: link, message: `Symlink skipped: ${path.join(root, link)}` });
    }
    for (const folder of listing.unreadable) {
      issues.push({
        severity: "error",
        path: folder.path,
        message: `Cannot read folder ${path.join(root, folder.path)}: ${folder.message}`
      });
    }
    return listing.files;
  }

  const candidates: string[] = [];
  for (const rawPath of files) {
    const relative = normalizeRelative(rawPath);
    if (relative === null) {
      issues.push({ severity: "error", path: rawPath, message: `Path is outside the dataset root: ${rawPath}` });
      continue;
    }
    if (isDescriptorArtifact(relative)) {
      issues.push({ severity: "info", path: relative, message: "Descriptor file is not part of the manifest" });
      continue;
    }
    candidates.push(relative);
  }
  return candidates;
}

/**
 * Builds a manifest from an explicit list of paths relative to `root`, or from a
 * recursive walk when the list is empty. Bad paths become issues; only an empty
 * result is fatal.
 */
export async function buildManifest(
  root: string,
  files?: string[] | null
): Promise<Outcome<ManifestBuild>> {
  const rootStat = await fs.stat(root).catch(() => null);
  if (!rootStat || !rootStat.isDirectory()) {
    return fail("NoValidFiles", `Dataset root is not a directory: ${root}`);
  }

  const realRoot = await fs.realpath(root);
  const issues: ValidationIssue[] = [];
  const entries = new Map<string, FileManifestEntry>();
  for (const relative of await candidatePaths(root, files, issues)) {
    const inspection = await inspect(root, realRoot, relative);
    if (inspection.kind === "skip") {
      issues.push(inspection.issue);
      continue;
    }
    entries.set(relative, inspection.entry);
  }

  if (entries.size === 0) {
    return fail("NoValidFiles", `No valid files to ingest under ${root}`);
  }
  return ok({ manifest: { files: Array.from(entries.values()) }, issues });
}
