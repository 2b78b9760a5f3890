import { promises as fs } from "fs";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { buildManifest } from "../src/manifest/buildManifest";
import { FIXED_MTIME_ISO, makeDatasetDir, removeDir, writeDatasetFile } from "./support/datasetDir";

describe("buildManifest", () => {
  let root: string;

  beforeEach(async () => {
    root = await makeDatasetDir({ "scan.h5": "abcd", "meta/notes.txt": "hi" });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeDir(root);
  });

  it("walks the whole dataset when no files are listed", async () => {
    const result = await buildManifest(root, []);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.manifest.files).toEqual([
      { path: "meta/notes.txt", size_bytes: 2, date_last_modified: FIXED_MTIME_ISO, is_supplemental: false },
      { path: "scan.h5", size_bytes: 4, date_last_modified: FIXED_MTIME_ISO, is_supplemental: false }
    ]);
    expect(result.value.issues).toEqual([]);
  });

  it("leaves the descriptor and its lock out of a walk", async () => {
    await writeDatasetFile(root, "dataset-descriptor.json", "{}");
    await writeDatasetFile(root, "dataset-descriptor.json.lock", "{}");

    const result = await buildManifest(root);

    expect(result.ok && result.value.manifest.files.map((entry) => entry.path)).toEqual([
      "meta/notes.txt",
      "scan.h5"
    ]);
  });

  it("reports symlinks found during a walk as warnings", async () => {
    await fs.symlink(path.join(root, "scan.h5"), path.join(root, "alias.h5"));

    const result = await buildManifest(root);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.manifest.files.map((entry) => entry.path)).toEqual(["meta/notes.txt", "scan.h5"]);
    expect(result.value.issues).toEqual([
      { severity: "warning", path: "alias.h5", message: `Symlink skipped: ${path.join(root, "alias.h5")}` }
    ]);
  });

  it("keeps valid listed files and reports the rest", async () => {
    const result = await buildManifest(root, ["scan.h5", "missing.dat", "../outside.txt", "meta"]);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.manifest.files.map((entry) => entry.path)).toEqual(["scan.h5"]);
    expect(result.value.issues).toEqual([
      { severity: "error", path: "../outside.txt", message: "Path is outside the dataset root: ../outside.txt" },
      { severity: "error", path: "missing.dat", message: `File does not exist: ${path.join(root, "missing.dat")}` },
      { severity: "error", path: "meta", message: `Path resolves to a folder: ${path.join(root, "meta")}` }
    ]);
  });

  it("lists a path given twice only once", async () => {
    const result = await buildManifest(root, ["scan.h5", "./scan.h5"]);

    expect(result.ok && result.value.manifest.files.map((entry) => entry.path)).toEqual(["scan.h5"]);
  });

  it("notes a listed descriptor file without failing", async () => {
    const result = await buildManifest(root, ["dataset-descriptor.json", "scan.h5"]);

    expect(result.ok && result.value.issues).toEqual([
      { severity: "info", path: "dataset-descriptor.json", message: "Descriptor file is not part of the manifest" }
    ]);
  });

  it("fails with NoValidFiles when nothing survives", async () => {
    const result = await buildManifest(root, ["missing.dat"]);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("NoValidFiles");
    expect(result.error.category).toBe("validation");
  });

  it("fails with NoValidFiles when the root is not a directory", async () => {
    const result = await buildManifest(path.join(root, "scan.h5"));

    expect(result.ok ? null : result.error.kind).toBe("NoValidFiles");
  });

  it("rejects a listed file reached through a symlinked folder outside the root", async () => {
    const outside = await makeDatasetDir({ "secret.txt": "private" });
    try {
      await fs.symlink(outside, path.join(root, "linked"));

      const result = await buildManifest(root, ["scan.h5", "linked/secret.txt"]);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.manifest.files.map((entry) => entry.path)).toEqual(["scan.h5"]);
      expect(result.value.issues).toEqual([
        {
          severity: "error",
          path: "linked/secret.txt",
          message: `Path resolves outside the dataset root: ${path.join(root, "linked/secret.txt")}`
        }
      ]);
    } finally {
      await removeDir(outside);
    }
  });

  it("keeps walking when a folder cannot be read", async () => {
    const readdir = fs.readdir;
    vi.spyOn(fs, "readdir")
      .mockImplementationOnce(readdir)
      .mockRejectedValueOnce(Object.assign(new Error("EACCES: permission denied"), { code: "EACCES" }));

    const result = await buildManifest(root);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.manifest.files.map((entry) => entry.path)).toEqual(["scan.h5"]);
    expect(result.value.issues).toEqual([
      {
        severity: "error",
        path: "meta",
        message: `Cannot read folder ${path.join(root, "meta")}: EACCES: permission denied`
      }
    ]);
  });
});
