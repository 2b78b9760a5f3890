import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { runIngest } from "../src/commands/ingest";
import { runReconcile } from "../src/commands/reconcile";
import { runValidate } from "../src/commands/validate";
import { persistDescriptor } from "../src/descriptor/descriptorStore";
import { descriptorPath } from "../src/io/paths";
import { silentSink } from "../src/runlog/runLog";
import { FIXED_MTIME_ISO, makeDatasetDir, removeDir } from "./support/datasetDir";
import { ingestedDescriptor, preparedDescriptor, entry } from "./support/descriptors";

describe("commands", () => {
  let root: string;
  let stdout: string[];
  let stderr: string[];

  beforeEach(async () => {
    root = await makeDatasetDir({ "a.txt": "abc" });
    stdout = [];
    stderr = [];
    vi.spyOn(console, "log").mockImplementation((line: string) => {
      stdout.push(line);
    });
    vi.spyOn(console, "error").mockImplementation((line: string) => {
      stderr.push(line);
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeDir(root);
  });

  it("validate prints the manifest it would ingest", async () => {
    await persistDescriptor(preparedDescriptor(), descriptorPath(root));

    const code = await runValidate({ datasetPath: root, files: [], env: {}, sink: silentSink });

    expect(code).toBe(0);
    expect(JSON.parse(stdout.join("\n"))).toEqual({
      dataset_root: root,
      files: [{ path: "a.txt", size_bytes: 3, date_last_modified: FIXED_MTIME_ISO, is_supplemental: false }],
      issues: [],
      descriptor_found: true
    });
  });

  it("validate reports an ingested dataset as a validation failure", async () => {
    await persistDescriptor(ingestedDescriptor([entry("a.txt", 3)]), descriptorPath(root));

    const code = await runValidate({ datasetPath: root, files: [], env: {}, sink: silentSink });

    expect(code).toBe(1);
    expect(stderr).toEqual(["validation/AlreadyIngested: Descriptor already references Catalog dataset pid/test-1"]);
  });

  it("ingest names an unknown spec before asking for credentials", async () => {
    const code = await runIngest({ datasetPath: root, files: [], env: { INGEST_SPEC: "nope" } });

    expect(code).toBe(1);
    expect(stderr).toEqual(["configuration/UnknownSpec: Cannot resolve extraction spec nope (known: generic)"]);
    expect(stdout).toEqual([]);
  });

  it("ingest requires Catalog credentials", async () => {
    const code = await runIngest({ datasetPath: root, files: [], spec: "generic", env: {} });

    expect(code).toBe(1);
    expect(stderr).toEqual(["configuration/MissingCredentials: CATALOG_USERNAME and CATALOG_PASSWORD are required"]);
  });

  it("reconcile requires a Tracker URL", async () => {
    const code = await runReconcile({ datasetPath: root, env: {} });

    expect(code).toBe(1);
    expect(stderr).toEqual(["configuration/InvalidConfig: TRACKER_URL is required to reconcile"]);
  });
});
