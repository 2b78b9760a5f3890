import type { CatalogApi } from "../catalog/api";
import { acquireDescriptorLock } from "../descriptor/descriptorLock";
import {
  createDescriptor,
  loadDescriptor,
  mergeManifest,
  persistDescriptor,
  validateForIngestion
} from "../descriptor/descriptorStore";
import { invokeStrategy } from "../extract/dispatch";
import type { StrategyRegistry } from "../extract/registry";
import { resolveStrategy } from "../extract/registry";
import { descriptorPath } from "../io/paths";
import { buildManifest } from "../manifest/buildManifest";
import type { ReconcileReport, TrackerContext } from "../reconcile/reconcileTracker";
import { reconcileTracker, resolveShare } from "../reconcile/reconcileTracker";
import type { RunLog } from "../runlog/runLog";
import type { Descriptor, ValidationIssue } from "../types/descriptor";
import type { IngestFailure } from "../types/failure";
import { errorMessage } from "../types/failure";
import type { Result } from "../types/result";
import { err, ok } from "../types/result";
import { toUtcIsoSeconds } from "../utils/time";
import { reportIssues, withRunLog } from "./runSupport";

export interface IngestContext {
  catalog: CatalogApi;
  /** `null` skips Tracker reconciliation entirely. */
  tracker: TrackerContext | null;
  strategies: StrategyRegistry;
  log: RunLog;
  ownerUsername: string;
  contactEmail: string | null;
  flowRunId: string | null;
  clock?: () => Date;
}

export interface IngestRequest {
  /** Dataset path as given, relative to the share; recorded on the Tracker instance. */
  datasetPath: string;
  /** Local directory the dataset path resolves to. */
  datasetRoot: string;
  /** Relative paths to ingest; empty means every regular file under the root. */
  files: string[];
  spec: string | null;
}

export interface IngestSuccess {
  descriptor: Descriptor;
  descriptorPath: string;
  tracker: ReconcileReport | null;
  issues: ValidationIssue[];
}

export interface IngestRunFailure {
  failure: IngestFailure;
  /** Descriptor as far as the run got; `null` when it stopped before extraction. */
  descriptor: Descriptor | null;
  persisted: boolean;
}

export type IngestResult = Result<IngestSuccess, IngestRunFailure>;

function abort(log: RunLog, failure: IngestFailure): IngestResult {
  log.error(failure.message);
  return err({ failure, descriptor: null, persisted: false });
}

/**
 * One ingestion run: resolve the extraction spec, build the manifest, guard against a
 * repeated Catalog import, extract, reconcile the Tracker, then persist the
 * descriptor. Nothing is written to the dataset unless extraction succeeded.
 */
export async function ingestDataset(ctx: IngestContext, request: IngestRequest): Promise<IngestResult> {
  const { log } = ctx;
  log.info(`Ingesting ${request.datasetPath} from ${request.datasetRoot}`);

  const strategy = resolveStrategy(ctx.strategies, request.spec);
  if (!strategy.ok) return abort(log, strategy.error);
  log.info(`Using extraction spec ${strategy.value.spec}`);

  const built = await buildManifest(request.datasetRoot, request.files);
  if (!built.ok) return abort(log, built.error);
  reportIssues(log, built.value.issues);
  const { manifest, issues } = built.value;
  log.info(`Manifest has ${manifest.files.length} file(s)`);

  const lock = await acquireDescriptorLock(request.datasetRoot);
  if (!lock.ok) return abort(log, lock.error);
  const held = lock.value;

  try {
    const file = descriptorPath(request.datasetRoot);
    const loaded = await loadDescriptor(file, log);
    if (!loaded.ok) return abort(log, loaded.error);
    log.info(loaded.value ? `Found existing descriptor ${file}` : "No existing descriptor; starting a new one");

    const allowed = validateForIngestion(loaded.value, manifest);
    if (!allowed.ok) return abort(log, allowed.error);

    const base = loaded.value ?? createDescriptor();
    const merged = mergeManifest(base.file_manifest, manifest);

    const login = await ctx.catalog.login();
    if (!login.ok) return abort(log, login.error);
    log.info(`Logged in to Catalog ${ctx.catalog.baseUrl}`);

    if (ctx.tracker) {
      const share = await resolveShare(ctx.tracker);
      if (!share.ok) return abort(log, share.error);
      log.info(`Tracker share sublocation ${share.value.slug} resolved`);
    }

    const now = ctx.clock ?? (() => new Date());
    const extracted = await invokeStrategy(
      strategy.value,
      {
        datasetRoot: request.datasetRoot,
        manifest: merged,
        descriptor: { ...base, file_manifest: merged },
        catalog: ctx.catalog,
        ownerUsername: ctx.ownerUsername,
        contactEmail: ctx.contactEmail,
        log
      },
      { registryInstance: ctx.catalog.baseUrl, ingestedAt: toUtcIsoSeconds(now()) }
    );
    if (!extracted.ok) return abort(log, extracted.error);
    log.info(`Extraction finished for Catalog dataset ${extracted.value.catalog.dataset_id ?? "?"}`);

    let descriptor = extracted.value;
    let tracker: ReconcileReport | null = null;
    let trackerFailure: IngestFailure | null = null;
    if (ctx.tracker) {
      const reconciled = await reconcileTracker(ctx.tracker, descriptor, {
        datasetPath: request.datasetPath,
        flowRunId: ctx.flowRunId,
        log
      });
      descriptor = reconciled.descriptor;
      if (reconciled.outcome.ok) tracker = reconciled.outcome.value;
      else trackerFailure = reconciled.outcome.error;
    } else {
      log.info("No Tracker configured; skipping Tracker reconciliation");
    }

    log.info(`Writing descriptor ${file}`);
    descriptor = withRunLog(descriptor, log.lines());
    const persisted = await persistDescriptor(descriptor, file);
    if (!persisted.ok) {
      log.error(persisted.error.message);
      return err({ failure: persisted.error, descriptor, persisted: false });
    }
    if (trackerFailure) {
      return err({ failure: trackerFailure, descriptor, persisted: true });
    }
    return ok({ descriptor, descriptorPath: persisted.value, tracker, issues });
  } finally {
    await held.release().catch((error: unknown) => {
      log.warn(`Could not release ${held.path}: ${errorMessage(error)}`);
    });
  }
}
