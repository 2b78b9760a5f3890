import { promises as fs } from "fs";
import type {
  Descriptor,
  DescriptorDocument,
  FileManifest,
  FileManifestEntry
} from "../types/descriptor";
import type { Outcome } from "../types/failure";
import { errorCode, errorMessage, fail } from "../types/failure";
import { ok } from "../types/result";
import { createManifest, manifestPaths, totalSizeBytes } from "../manifest/fileManifest";
import { describeSchemaErrors, getDescriptorValidator } from "../validation/jsonSchema";
import type { Logger } from "../runlog/runLog";
import { writeJsonAtomic } from "../utils/fs";

export function createDescriptor(): Descriptor {
  return {
    beamline_id: null,
    proposal_id: null,
    principal_investigator: null,
    name: null,
    description: null,
    date_of_acquisition: null,
    file_manifest: null,
    catalog: {
      dataset_id: null,
      registry_instance: null,
      date_ingested: null,
      extractor_used: null,
      run_log: []
    },
    tracker: null
  };
}

export function toDocument(descriptor: Descriptor): DescriptorDocument {
  const manifest = descriptor.file_manifest;
  return {
    schema_version: "1.0",
    beamline_id: descriptor.beamline_id,
    proposal_id: descriptor.proposal_id,
    principal_investigator: descriptor.principal_investigator,
    name: descriptor.name,
    description: descriptor.description,
    date_of_acquisition: descriptor.date_of_acquisition,
    file_manifest: manifest
      ? { files: manifest.files.map((entry) => ({ ...entry })), total_size_bytes: totalSizeBytes(manifest) }
      : null,
    catalog: { ...descriptor.catalog, run_log: [...descriptor.catalog.run_log] },
    tracker: descriptor.tracker
      ? { ...descriptor.tracker, instance_comments: [...descriptor.tracker.instance_comments] }
      : null
  };
}

function fromDocument(document: DescriptorDocument, filePath: string, log?: Logger): Outcome<Descriptor> {
  let fileManifest: FileManifest | null = null;
  if (document.file_manifest) {
    const manifest = createManifest(document.file_manifest.files);
    if (!manifest.ok) {
      return fail("DescriptorInvalid", `${filePath}: ${manifest.error.message}`);
    }
    const computed = totalSizeBytes(manifest.value);
    if (computed !== document.file_manifest.total_size_bytes) {
      log?.warn(
        `Descriptor ${filePath} records total_size_bytes ${document.file_manifest.total_size_bytes} ` +
          `but its entries sum to ${computed}; using ${computed}.`
      );
    }
    fileManifest = manifest.value;
  }

  return ok({
    beamline_id: document.beamline_id,
    proposal_id: document.proposal_id,
    principal_investigator: document.principal_investigator,
    name: document.name,
    description: document.description,
    date_of_acquisition: document.date_of_acquisition,
    file_manifest: fileManifest,
    catalog: document.catalog,
    tracker: document.tracker
  });
}

/** Reads the descriptor at `filePath`. A missing file resolves to `null`: a first ingestion. */
export async function loadDescriptor(filePath: string, log?: Logger): Promise<Outcome<Descriptor | null>> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf8");
  } catch (error) {
    if (errorCode(error) === "ENOENT") return ok(null);
    return fail("DescriptorInvalid", `Cannot read descriptor ${filePath}: ${errorMessage(error)}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    return fail("DescriptorInvalid", `Descriptor ${filePath} is not valid JSON: ${errorMessage(error)}`);
  }

  const validator = getDescriptorValidator();
  if (!validator(data)) {
    return fail("DescriptorInvalid", `Descriptor ${filePath} failed schema validation: ${describeSchemaErrors(validator)}`);
  }
  return fromDocument(data, filePath, log);
}

/**
 * Refuses a run over a descriptor that already names a Catalog dataset, and a
 * run that would widen a previously declared manifest.
 */
export function validateForIngestion(descriptor: Descriptor | null, incoming: FileManifest): Outcome<void> {
  if (!descriptor) return ok(undefined);

  if (descriptor.catalog.dataset_id !== null) {
    return fail(
      "AlreadyIngested",
      `Descriptor already references Catalog dataset ${descriptor.catalog.dataset_id}`
    );
  }

  if (descriptor.file_manifest) {
    const declared = manifestPaths(descriptor.file_manifest);
    const undeclared = incoming.files.map((entry) => entry.path).filter((entryPath) => !declared.has(entryPath));
    if (undeclared.length > 0) {
      return fail(
        "ManifestMismatch",
        `Files not declared in the existing manifest: ${undeclared.join(", ")}`
      );
    }
  }
  return ok(undefined);
}

/**
 * Existing entries keep their recorded size and mtime; paths new to the
 * manifest are appended in incoming order.
 */
export function mergeManifest(existing: FileManifest | null, incoming: FileManifest): FileManifest {
  const files: FileManifestEntry[] = existing ? existing.files.map((entry) => ({ ...entry })) : [];
  const known = new Set(files.map((entry) => entry.path));
  for (const entry of incoming.files) {
    if (known.has(entry.path)) continue;
    known.add(entry.path);
    files.push({ ...entry });
  }
  return { files };
}

export async function persistDescriptor(descriptor: Descriptor, filePath: string): Promise<Outcome<string>> {
  try {
    await writeJsonAtomic(filePath, toDocument(descriptor));
    return ok(filePath);
  } catch (error) {
    return fail("DescriptorWriteFailed", `Could not write descriptor ${filePath}: ${errorMessage(error)}`, {
      retryable: true
    });
  }
}
