import { describe, expect, it } from "vitest";
import { applyFileSync, planFileSync } from "../src/reconcile/fileSync";
import { RunLog, silentSink } from "../src/runlog/runLog";
import type { DatasetInstanceFile } from "../src/tracker/types";
import type { FileManifest } from "../src/types/descriptor";
import { InMemoryTracker } from "./support/inMemoryTracker";
import { entry } from "./support/descriptors";

function record(id: string, filePath: string, size: number, date = "2024-03-01T12:00:00Z"): DatasetInstanceFile {
  return {
    id,
    id_dataset_instance: "inst-1",
    file_path: filePath,
    file_size_bytes: size,
    date_file_last_modified: date,
    is_supplemental: false
  };
}

function paths(values: { path: string }[]): string[] {
  return values.map((value) => value.path).sort();
}

describe("planFileSync", () => {
  it("splits paths into deletes, creates and updates", () => {
    const manifest: FileManifest = { files: [entry("a.txt", 100), entry("c.txt", 50)] };
    const records = [record("1", "a.txt", 100), record("2", "b.txt", 200)];

    const plan = planFileSync(manifest, records);

    expect(plan.deletes.map((item) => item.file_path)).toEqual(["b.txt"]);
    expect(paths(plan.creates)).toEqual(["c.txt"]);
    expect(plan.updates.map((update) => [update.entry.path, update.record.id, update.changed])).toEqual([
      ["a.txt", "1", false]
    ]);
  });

  it("marks an update changed when size, mtime or flag differ", () => {
    const manifest: FileManifest = {
      files: [entry("size.txt", 2), entry("time.txt", 1, "2024-03-02T00:00:00Z"), { ...entry("flag.txt", 1), is_supplemental: true }]
    };
    const records = [record("1", "size.txt", 1), record("2", "time.txt", 1), record("3", "flag.txt", 1)];

    const plan = planFileSync(manifest, records);

    expect(plan.updates.map((update) => update.changed)).toEqual([true, true, true]);
  });

  it("compares modification times by instant, not by spelling", () => {
    const plan = planFileSync({ files: [entry("a.txt", 1)] }, [record("1", "a.txt", 1, "2024-03-01T12:00:00.000Z")]);

    expect(plan.updates[0]?.changed).toBe(false);
  });

  it("deletes records that repeat a path already matched", () => {
    const plan = planFileSync({ files: [entry("a.txt", 1)] }, [record("1", "a.txt", 1), record("2", "a.txt", 1)]);

    expect(plan.deletes.map((item) => item.id)).toEqual(["2"]);
    expect(plan.updates.map((update) => update.record.id)).toEqual(["1"]);
  });

  it("keeps the three path sets disjoint and covering", () => {
    const cases: { manifest: string[]; records: string[] }[] = [
      { manifest: ["a", "b"], records: [] },
      { manifest: ["a"], records: ["a", "b", "c"] },
      { manifest: ["a", "b", "c"], records: ["b", "d"] },
      { manifest: ["x"], records: ["y"] }
    ];

    for (const item of cases) {
      const manifest = { files: item.manifest.map((name) => entry(name, 1)) };
      const plan = planFileSync(manifest, item.records.map((name, index) => record(String(index), name, 1)));
      const deletes = new Set(plan.deletes.map((value) => value.file_path));
      const creates = new Set(plan.creates.map((value) => value.path));
      const updates = new Set(plan.updates.map((value) => value.entry.path));

      for (const name of creates) expect(deletes.has(name) || updates.has(name)).toBe(false);
      for (const name of updates) expect(deletes.has(name)).toBe(false);
      expect([...creates, ...updates].sort()).toEqual([...item.manifest].sort());
      for (const name of [...deletes, ...updates]) expect(item.records).toContain(name);
    }
  });
});

describe("applyFileSync", () => {
  const log = new RunLog({ sink: silentSink });

  it("applies deletes, then creates, then changed updates", async () => {
    const tracker = new InMemoryTracker();
    tracker.files = [record("1", "a.txt", 100), record("2", "b.txt", 200), record("3", "d.txt", 1)];
    const manifest: FileManifest = { files: [entry("a.txt", 100), entry("c.txt", 50), entry("d.txt", 7)] };

    const result = await applyFileSync(tracker, "inst-1", planFileSync(manifest, tracker.files), log);

    expect(result).toEqual({ ok: true, value: { deleted: 1, created: 1, updated: 1, unchanged: 1 } });
    expect(tracker.calls).toEqual([
      "deleteDatasetInstanceFile",
      "createDatasetInstanceFile",
      "updateDatasetInstanceFile"
    ]);
    expect(tracker.filePaths("inst-1")).toEqual(["a.txt", "c.txt", "d.txt"]);
    expect(tracker.files.find((file) => file.file_path === "d.txt")?.file_size_bytes).toBe(7);
  });

  it("stops at the first failed write", async () => {
    const tracker = new InMemoryTracker();
    tracker.failOn("createDatasetInstanceFile", undefined, 1);
    const manifest: FileManifest = { files: [entry("a.txt", 1), entry("b.txt", 2), entry("c.txt", 3)] };

    const result = await applyFileSync(tracker, "inst-1", planFileSync(manifest, []), log);

    expect(result).toEqual({
      ok: false,
      error: {
        kind: "FileSyncFailed",
        category: "reconciliation",
        message: "File sync for instance inst-1 stopped after 1 of 3 writes: createDatasetInstanceFile refused",
        retryable: true
      }
    });
    expect(tracker.calls).toEqual(["createDatasetInstanceFile", "createDatasetInstanceFile"]);
    expect(tracker.filePaths("inst-1")).toEqual(["a.txt"]);
  });
});
