import { loadDescriptor, validateForIngestion } from "../descriptor/descriptorStore";
import { descriptorPath } from "../io/paths";
import { buildManifest } from "../manifest/buildManifest";
import type { Logger } from "../runlog/runLog";
import type { Descriptor, FileManifest, ValidationIssue } from "../types/descriptor";
import type { Outcome } from "../types/failure";
import { ok } from "../types/result";
import { reportIssues } from "./runSupport";

export interface ValidationReport {
  manifest: FileManifest;
  issues: ValidationIssue[];
  descriptor: Descriptor | null;
}

/**
 * Dry run of the local half of an ingestion: builds the manifest and applies
 * the double-ingestion guard. Makes no remote calls and writes nothing.
 */
export async function validateDataset(
  datasetRoot: string,
  files: string[],
  log: Logger
): Promise<Outcome<ValidationReport>> {
  const built = await buildManifest(datasetRoot, files);
  if (!built.ok) return built;
  reportIssues(log, built.value.issues);

  const loaded = await loadDescriptor(descriptorPath(datasetRoot), log);
  if (!loaded.ok) return loaded;

  const allowed = validateForIngestion(loaded.value, built.value.manifest);
  if (!allowed.ok) return allowed;

  log.info(`${built.value.manifest.files.length} file(s) ready to ingest`);
  return ok({ ...built.value, descriptor: loaded.value });
}
