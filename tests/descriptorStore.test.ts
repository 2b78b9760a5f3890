import { promises as fs } from "fs";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  createDescriptor,
  loadDescriptor,
  mergeManifest,
  persistDescriptor,
  toDocument,
  validateForIngestion
} from "../src/descriptor/descriptorStore";
import { acquireDescriptorLock } from "../src/descriptor/descriptorLock";
import { descriptorPath } from "../src/io/paths";
import { findEntry, totalSizeBytes } from "../src/manifest/fileManifest";
import { RunLog, silentSink } from "../src/runlog/runLog";
import { makeDatasetDir, removeDir } from "./support/datasetDir";
import { entry, ingestedDescriptor, preparedDescriptor } from "./support/descriptors";

describe("descriptor persistence", () => {
  let root: string;

  beforeEach(async () => {
    root = await makeDatasetDir({});
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it("reads back exactly what it wrote", async () => {
    const descriptor = ingestedDescriptor([entry("a.h5", 10), entry("b/c.tif", 32)]);
    descriptor.tracker = {
      tracker_dataset_id: "ds-7",
      registry_instance: "http://tracker.test/api",
      instance_record_id: "12",
      instance_comments: ["moved from scratch"]
    };
    const file = descriptorPath(root);

    const written = await persistDescriptor(descriptor, file);
    const loaded = await loadDescriptor(file);

    expect(written).toEqual({ ok: true, value: file });
    expect(loaded).toEqual({ ok: true, value: descriptor });
  });

  it("writes the manifest total and a schema version", async () => {
    const file = descriptorPath(root);
    await persistDescriptor(preparedDescriptor([entry("a.h5", 10), entry("b.h5", 5)]), file);

    const document = JSON.parse(await fs.readFile(file, "utf8"));

    expect(document.schema_version).toBe("1.0");
    expect(document.file_manifest.total_size_bytes).toBe(15);
    expect(await fs.readdir(root)).toEqual(["dataset-descriptor.json"]);
  });

  it("treats a missing descriptor as a first ingestion", async () => {
    expect(await loadDescriptor(descriptorPath(root))).toEqual({ ok: true, value: null });
  });

  it("rejects malformed JSON", async () => {
    await fs.writeFile(descriptorPath(root), "{ not json", "utf8");

    const loaded = await loadDescriptor(descriptorPath(root));

    expect(loaded.ok ? null : loaded.error.kind).toBe("DescriptorInvalid");
  });

  it("rejects a document that breaks the schema", async () => {
    const document = { ...toDocument(createDescriptor()), surprise: true };
    await fs.writeFile(descriptorPath(root), JSON.stringify(document), "utf8");

    const loaded = await loadDescriptor(descriptorPath(root));

    expect(loaded.ok ? null : loaded.error.kind).toBe("DescriptorInvalid");
  });

  it("rejects a stored manifest that repeats a path", async () => {
    const document = toDocument(preparedDescriptor([entry("a.h5", 1), entry("a.h5", 2)]));
    await fs.writeFile(descriptorPath(root), JSON.stringify(document), "utf8");

    const loaded = await loadDescriptor(descriptorPath(root));

    expect(loaded.ok ? null : loaded.error.message).toBe(
      `${descriptorPath(root)}: Manifest lists a.h5 more than once`
    );
  });

  it("recomputes a stale total and warns about it", async () => {
    const document = toDocument(preparedDescriptor([entry("a.h5", 10)]));
    const stale = { ...document, file_manifest: { files: [entry("a.h5", 10)], total_size_bytes: 99 } };
    await fs.writeFile(descriptorPath(root), JSON.stringify(stale), "utf8");
    const log = new RunLog({ sink: silentSink, clock: () => new Date("2024-03-02T08:00:00Z") });

    const loaded = await loadDescriptor(descriptorPath(root), log);

    expect(loaded.ok).toBe(true);
    expect(log.lines()).toEqual([
      `2024-03-02T08:00:00Z [WARN] Descriptor ${descriptorPath(root)} records total_size_bytes 99 but its entries sum to 10; using 10.`
    ]);
  });

  it("reports a failed write as retryable DescriptorWriteFailed", async () => {
    await fs.mkdir(descriptorPath(root));

    const written = await persistDescriptor(createDescriptor(), descriptorPath(root));

    expect(written.ok).toBe(false);
    if (written.ok) return;
    expect(written.error.kind).toBe("DescriptorWriteFailed");
    expect(written.error.category).toBe("persistence");
    expect(written.error.retryable).toBe(true);
  });
});

describe("double-ingestion guard", () => {
  const incoming = { files: [entry("a.h5", 10)] };

  it("allows a first ingestion", () => {
    expect(validateForIngestion(null, incoming).ok).toBe(true);
  });

  it("allows files the prepared manifest declares", () => {
    const prepared = preparedDescriptor([entry("a.h5", 10), entry("b.h5", 20)]);
    expect(validateForIngestion(prepared, incoming).ok).toBe(true);
  });

  it("allows any files when the prepared descriptor has no manifest", () => {
    expect(validateForIngestion(preparedDescriptor(), incoming).ok).toBe(true);
  });

  it("refuses a descriptor that already names a Catalog dataset", () => {
    const result = validateForIngestion(ingestedDescriptor([entry("a.h5", 10)]), incoming);

    expect(result).toEqual({
      ok: false,
      error: {
        kind: "AlreadyIngested",
        category: "validation",
        message: "Descriptor already references Catalog dataset pid/test-1",
        retryable: false
      }
    });
  });

  it("refuses files outside the declared manifest", () => {
    const prepared = preparedDescriptor([entry("b.h5", 20)]);
    const result = validateForIngestion(prepared, { files: [entry("a.h5", 10), entry("b.h5", 20), entry("c.h5", 1)] });

    expect(result.ok ? null : result.error.message).toBe("Files not declared in the existing manifest: a.h5, c.h5");
    expect(result.ok ? null : result.error.kind).toBe("ManifestMismatch");
  });
});

describe("mergeManifest", () => {
  it("keeps existing entries and appends new paths", () => {
    const existing = { files: [entry("a.h5", 10, "2024-01-01T00:00:00Z")] };
    const incoming = { files: [entry("b.h5", 2), entry("a.h5", 999)] };

    expect(mergeManifest(existing, incoming)).toEqual({
      files: [entry("a.h5", 10, "2024-01-01T00:00:00Z"), entry("b.h5", 2)]
    });
  });

  it("takes the incoming manifest when there is none", () => {
    expect(mergeManifest(null, { files: [entry("a.h5", 1)] })).toEqual({ files: [entry("a.h5", 1)] });
  });

  it("keeps the total equal to the sum of entries across repeated merges", () => {
    const first = mergeManifest(null, { files: [entry("a.h5", 10), entry("b.h5", 20)] });
    const second = mergeManifest(first, { files: [entry("b.h5", 500), entry("c.h5", 3)] });
    const third = mergeManifest(second, { files: [entry("a.h5", 7), entry("c.h5", 9), entry("d/e.h5", 4)] });

    expect(third.files.map((file) => file.path)).toEqual(["a.h5", "b.h5", "c.h5", "d/e.h5"]);
    expect(totalSizeBytes(third)).toBe(37);
    expect(toDocument(preparedDescriptor(third.files)).file_manifest?.total_size_bytes).toBe(37);
  });
});

describe("findEntry", () => {
  const manifest = { files: [entry("a.h5", 10), entry("b/c.tif", 32)] };

  it("finds an entry by its relative path", () => {
    expect(findEntry(manifest, "b/c.tif")).toEqual(entry("b/c.tif", 32));
  });

  it("returns undefined for a path the manifest does not list", () => {
    expect(findEntry(manifest, "c.tif")).toBeUndefined();
  });
});

describe("descriptor lock", () => {
  let root: string;

  beforeEach(async () => {
    root = await makeDatasetDir({});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeDir(root);
  });

  it("lets only one run hold the lock at a time", async () => {
    const first = await acquireDescriptorLock(root);
    const second = await acquireDescriptorLock(root);

    expect(first.ok).toBe(true);
    expect(second.ok ? null : second.error.kind).toBe("DescriptorLocked");
    expect(second.ok ? null : second.error.retryable).toBe(true);

    if (first.ok) await first.value.release();
    const third = await acquireDescriptorLock(root);
    expect(third.ok).toBe(true);
    if (third.ok) await third.value.release();
    expect(await fs.readdir(root)).toEqual([]);
  });

  it("records the holder in the lock file", async () => {
    const lock = await acquireDescriptorLock(root);
    if (!lock.ok) throw new Error(lock.error.message);

    const holder = JSON.parse(await fs.readFile(path.join(root, "dataset-descriptor.json.lock"), "utf8"));
    await lock.value.release();

    expect(holder.pid).toBe(process.pid);
  });

  it("removes the lock file when the holder record cannot be written", async () => {
    const open = fs.open;
    vi.spyOn(fs, "open").mockImplementationOnce(async (file, flags, mode) => {
      const handle = await open(file, flags, mode);
      vi.spyOn(handle, "writeFile").mockRejectedValueOnce(new Error("ENOSPC: no space left on device"));
      return handle;
    });

    const lock = await acquireDescriptorLock(root);

    expect(lock.ok ? null : lock.error.kind).toBe("DescriptorLocked");
    expect(lock.ok ? null : lock.error.message).toBe(
      `Cannot write lock ${path.join(root, "dataset-descriptor.json.lock")}: ENOSPC: no space left on device`
    );
    expect(await fs.readdir(root)).toEqual([]);
    const retry = await acquireDescriptorLock(root);
    expect(retry.ok).toBe(true);
    if (retry.ok) await retry.value.release();
  });
});
