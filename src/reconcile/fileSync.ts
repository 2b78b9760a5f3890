import type { TrackerApi } from "../tracker/api";
import type { DatasetInstanceFile, DatasetInstanceFileFields } from "../tracker/types";
import type { FileManifest, FileManifestEntry } from "../types/descriptor";
import type { Outcome } from "../types/failure";
import { fail } from "../types/failure";
import { ok } from "../types/result";
import type { Logger } from "../runlog/runLog";
import { sameInstant } from "../utils/time";
import { manifestPaths } from "../manifest/fileManifest";

export interface FileUpdate {
  entry: FileManifestEntry;
  record: DatasetInstanceFile;
  /** False when the record already carries the entry's size, mtime and flag. */
  changed: boolean;
}

export interface FileSyncPlan {
  /** Records whose path left the manifest, then surplus records repeating a path. */
  deletes: DatasetInstanceFile[];
  creates: FileManifestEntry[];
  updates: FileUpdate[];
}

export interface FileSyncReport {
  deleted: number;
  created: number;
  updated: number;
  unchanged: number;
}

export function fieldsFromEntry(entry: FileManifestEntry): DatasetInstanceFileFields {
  return {
    file_size_bytes: entry.size_bytes,
    date_file_last_modified: entry.date_last_modified,
    is_supplemental: entry.is_supplemental
  };
}

export function recordMatchesEntry(record: DatasetInstanceFile, entry: FileManifestEntry): boolean {
  return (
    record.file_size_bytes === entry.size_bytes &&
    record.is_supplemental === entry.is_supplemental &&
    sameInstant(record.date_file_last_modified, entry.date_last_modified)
  );
}

/**
 * Three-way diff of manifest paths M against Tracker file records R:
 * delete R − M, create M − R, update M ∩ R.
 */
export function planFileSync(manifest: FileManifest, records: DatasetInstanceFile[]): FileSyncPlan {
  const recordsByPath = new Map<string, DatasetInstanceFile>();
  const surplus: DatasetInstanceFile[] = [];
  for (const record of records) {
    if (recordsByPath.has(record.file_path)) {
      surplus.push(record);
    } else {
      recordsByPath.set(record.file_path, record);
    }
  }

  const wanted = manifestPaths(manifest);
  const deletes: DatasetInstanceFile[] = [];
  for (const [filePath, record] of recordsByPath) {
    if (!wanted.has(filePath)) deletes.push(record);
  }
  deletes.push(...surplus);

  const creates: FileManifestEntry[] = [];
  const updates: FileUpdate[] = [];
  for (const entry of manifest.files) {
    const record = recordsByPath.get(entry.path);
    if (!record) {
      creates.push(entry);
    } else {
      updates.push({ entry, record, changed: !recordMatchesEntry(record, entry) });
    }
  }

  return { deletes, creates, updates };
}

/**
 * Applies a plan as deletes, then creates, then changed updates, stopping at
 * the first failed write. The plan is rebuilt from the Tracker on every run,
 * so a failed run is retried from wherever it stopped.
 */
export async function applyFileSync(
  tracker: TrackerApi,
  instanceId: string,
  plan: FileSyncPlan,
  log: Logger
): Promise<Outcome<FileSyncReport>> {
  const report: FileSyncReport = { deleted: 0, created: 0, updated: 0, unchanged: 0 };
  const pending = plan.updates.filter((update) => update.changed);
  const total = plan.deletes.length + plan.creates.length + pending.length;
  const stopped = (message: string) =>
    fail(
      "FileSyncFailed",
      `File sync for instance ${instanceId} stopped after ${report.deleted + report.created + report.updated} of ${total} writes: ${message}`,
      { retryable: true }
    );

  for (const record of plan.deletes) {
    const result = await tracker.deleteDatasetInstanceFile(record.id);
    if (!result.ok) return stopped(result.error.message);
    report.deleted++;
  }

  for (const entry of plan.creates) {
    const result = await tracker.createDatasetInstanceFile({
      id_dataset_instance: instanceId,
      file_path: entry.path,
      ...fieldsFromEntry(entry)
    });
    if (!result.ok) return stopped(result.error.message);
    report.created++;
  }

  for (const update of pending) {
    const result = await tracker.updateDatasetInstanceFile(update.record.id, fieldsFromEntry(update.entry));
    if (!result.ok) return stopped(result.error.message);
    report.updated++;
  }
  report.unchanged = plan.updates.length - pending.length;

  log.info(
    `Synced files of instance ${instanceId}: ${report.deleted} deleted, ${report.created} created, ` +
      `${report.updated} updated, ${report.unchanged} unchanged`
  );
  return ok(report);
}
