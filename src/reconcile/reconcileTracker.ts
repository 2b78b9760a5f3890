import type { TrackerApi } from "../tracker/api";
import type {
  Beamline,
  DatasetInstance,
  NamedRecordCreate,
  Proposal,
  ShareSublocation,
  TrackerDataset
} from "../tracker/types";
import type { Descriptor, FileManifest } from "../types/descriptor";
import type { IngestFailure, Outcome } from "../types/failure";
import { fail, failure } from "../types/failure";
import { ok } from "../types/result";
import type { Logger } from "../runlog/runLog";
import { totalSizeBytes } from "../manifest/fileManifest";
import type { FileSyncReport } from "./fileSync";
import { applyFileSync, planFileSync } from "./fileSync";

export interface TrackerContext {
  api: TrackerApi;
  /** Slug of the Share sublocation this engine's storage path belongs to. */
  shareIdentifier: string;
}

export interface ReconcileOptions {
  /** Dataset path within the share, as recorded on the DatasetInstance. */
  datasetPath: string;
  flowRunId: string | null;
  log: Logger;
}

export interface ReconcileReport {
  beamline: Beamline;
  proposal: Proposal;
  dataset: TrackerDataset;
  instance: DatasetInstance;
  createdDataset: boolean;
  createdInstance: boolean;
  files: FileSyncReport;
}

export interface ReconcileResult {
  /** The input descriptor, with Tracker linkage recorded once the instance is resolved. */
  descriptor: Descriptor;
  outcome: Outcome<ReconcileReport>;
}

async function upsertNamed<T>(
  label: string,
  name: string,
  find: (filter: { name: string }) => Promise<Outcome<T[]>>,
  create: (input: NamedRecordCreate) => Promise<Outcome<T>>,
  catalogDatasetId: string,
  log: Logger
): Promise<Outcome<T>> {
  const found = await find({ name });
  if (!found.ok) return found;
  const [existing] = found.value;
  if (existing) return ok(existing);

  // Unknown names are trusted and created; an admin corrects them downstream if needed.
  const created = await create({ name, description: `Auto-created while ingesting Dataset ${catalogDatasetId}` });
  if (created.ok) log.info(`Created Tracker ${label} ${name}`);
  return created;
}

export async function resolveShare(ctx: TrackerContext): Promise<Outcome<ShareSublocation>> {
  const share = await ctx.api.getShareSublocation(ctx.shareIdentifier);
  if (!share.ok) return share;
  if (!share.value) {
    return fail("ShareNotConfigured", `Tracker share sublocation ${ctx.shareIdentifier} does not exist`);
  }
  return ok(share.value);
}

async function upsertDataset(
  ctx: TrackerContext,
  descriptor: Descriptor,
  names: { beamline: Beamline; proposal: Proposal; catalogDatasetId: string },
  options: ReconcileOptions
): Promise<Outcome<{ dataset: TrackerDataset; created: boolean }>> {
  const linkedSlug = descriptor.tracker?.tracker_dataset_id ?? null;
  const catalogFields = {
    catalog_dataset_id: names.catalogDatasetId,
    catalog_date_ingested: descriptor.catalog.date_ingested,
    ingestion_flow_run_id: options.flowRunId
  };

  if (linkedSlug) {
    const existing = await ctx.api.getDataset(linkedSlug);
    if (!existing.ok) return existing;
    if (!existing.value) {
      return fail(
        "TrackerRecordMissing",
        `Descriptor links Tracker dataset ${linkedSlug} but ${ctx.api.baseUrl} has no such record`
      );
    }
    const updated = await ctx.api.updateDataset(linkedSlug, catalogFields);
    if (!updated.ok) return updated;
    options.log.info(`Updated Tracker dataset ${linkedSlug}`);
    return ok({ dataset: updated.value, created: false });
  }

  const created = await ctx.api.createDataset({
    name: descriptor.name ?? names.catalogDatasetId,
    description: descriptor.description,
    slug_beamline: names.beamline.slug,
    slug_proposal: names.proposal.slug,
    date_of_acquisition: descriptor.date_of_acquisition,
    ...catalogFields
  });
  if (!created.ok) return created;
  options.log.info(`Created Tracker dataset ${created.value.slug}`);
  return ok({ dataset: created.value, created: true });
}

function createdAt(instance: DatasetInstance): number | null {
  const time = Date.parse(instance.date_created);
  return Number.isNaN(time) ? null : time;
}

/** Instances with an unreadable creation date go last, in the order the Tracker listed them. */
function newestFirst(instances: DatasetInstance[]): DatasetInstance[] {
  return [...instances].sort((a, b) => {
    const timeA = createdAt(a);
    const timeB = createdAt(b);
    if (timeA === null || timeB === null) return (timeA === null ? 1 : 0) - (timeB === null ? 1 : 0);
    return timeB - timeA;
  });
}

async function upsertInstance(
  ctx: TrackerContext,
  dataset: TrackerDataset,
  share: ShareSublocation,
  manifest: FileManifest,
  options: ReconcileOptions
): Promise<Outcome<{ instance: DatasetInstance; created: boolean }>> {
  const found = await ctx.api.findDatasetInstances({
    slug_dataset: dataset.slug,
    slug_share_sublocation: share.slug,
    path: options.datasetPath,
    date_files_deleted__isnull: true
  });
  if (!found.ok) return found;

  const [newest] = newestFirst(found.value);
  if (newest) {
    if (found.value.length > 1) {
      options.log.warn(
        `${found.value.length} live instances of ${dataset.slug} at ${options.datasetPath}; using newest ${newest.id}`
      );
    } else {
      options.log.info(`Using existing Tracker instance ${newest.id} at ${options.datasetPath}`);
    }
    return ok({ instance: newest, created: false });
  }

  const created = await ctx.api.createDatasetInstance({
    slug_dataset: dataset.slug,
    slug_share_sublocation: share.slug,
    path: options.datasetPath,
    files_size_bytes: totalSizeBytes(manifest),
    flow_run_id: options.flowRunId
  });
  if (!created.ok) return created;
  options.log.info(`Created Tracker instance ${created.value.id} at ${options.datasetPath}`);
  return ok({ instance: created.value, created: true });
}

/**
 * Brings the Tracker in line with a freshly ingested descriptor: beamline and
 * proposal, dataset, instance, then the instance's file records. Every step is
 * an upsert, so a repeated run converges instead of duplicating.
 */
export async function reconcileTracker(
  ctx: TrackerContext,
  descriptor: Descriptor,
  options: ReconcileOptions
): Promise<ReconcileResult> {
  const stop = (error: IngestFailure): ReconcileResult => {
    options.log.error(`Tracker reconciliation failed: ${error.message}`);
    return { descriptor, outcome: { ok: false, error } };
  };

  const catalogDatasetId = descriptor.catalog.dataset_id;
  if (!catalogDatasetId) {
    return stop(failure("NotIngested", "Descriptor has no Catalog dataset id"));
  }
  const manifest = descriptor.file_manifest;
  if (!manifest || manifest.files.length === 0) {
    return stop(failure("DescriptorIncomplete", "Descriptor has no file manifest"));
  }
  if (!descriptor.beamline_id || !descriptor.proposal_id) {
    return stop(failure("DescriptorIncomplete", "Descriptor needs beamline_id and proposal_id"));
  }

  const beamline = await upsertNamed(
    "beamline",
    descriptor.beamline_id,
    (filter) => ctx.api.findBeamlines(filter),
    (input) => ctx.api.createBeamline(input),
    catalogDatasetId,
    options.log
  );
  if (!beamline.ok) return stop(beamline.error);

  const proposal = await upsertNamed(
    "proposal",
    descriptor.proposal_id,
    (filter) => ctx.api.findProposals(filter),
    (input) => ctx.api.createProposal(input),
    catalogDatasetId,
    options.log
  );
  if (!proposal.ok) return stop(proposal.error);

  const share = await resolveShare(ctx);
  if (!share.ok) return stop(share.error);

  const dataset = await upsertDataset(
    ctx,
    descriptor,
    { beamline: beamline.value, proposal: proposal.value, catalogDatasetId },
    options
  );
  if (!dataset.ok) return stop(dataset.error);

  const instance = await upsertInstance(ctx, dataset.value.dataset, share.value, manifest, options);
  if (!instance.ok) return stop(instance.error);

  const linked: Descriptor = {
    ...descriptor,
    tracker: {
      tracker_dataset_id: dataset.value.dataset.slug,
      registry_instance: ctx.api.baseUrl,
      instance_record_id: instance.value.instance.id,
      instance_comments: descriptor.tracker?.instance_comments ?? []
    }
  };

  const records = await ctx.api.listDatasetInstanceFiles(instance.value.instance.id);
  if (!records.ok) {
    options.log.error(`Tracker reconciliation failed: ${records.error.message}`);
    return { descriptor: linked, outcome: records };
  }
  const plan = planFileSync(manifest, records.value);
  const files = await applyFileSync(ctx.api, instance.value.instance.id, plan, options.log);
  if (!files.ok) {
    options.log.error(`Tracker reconciliation failed: ${files.error.message}`);
    return { descriptor: linked, outcome: files };
  }

  return {
    descriptor: linked,
    outcome: ok({
      beamline: beamline.value,
      proposal: proposal.value,
      dataset: dataset.value.dataset,
      instance: instance.value.instance,
      createdDataset: dataset.value.created,
      createdInstance: instance.value.created,
      files: files.value
    })
  };
}
