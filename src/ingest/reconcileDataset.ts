import { acquireDescriptorLock } from "../descriptor/descriptorLock";
import { loadDescriptor, persistDescriptor } from "../descriptor/descriptorStore";
import { descriptorPath } from "../io/paths";
import type { ReconcileReport, TrackerContext } from "../reconcile/reconcileTracker";
import { reconcileTracker } from "../reconcile/reconcileTracker";
import type { RunLog } from "../runlog/runLog";
import type { Descriptor } from "../types/descriptor";
import type { IngestFailure } from "../types/failure";
import { errorMessage, failure } from "../types/failure";
import type { Result } from "../types/result";
import { err, ok } from "../types/result";
import { withRunLog } from "./runSupport";

export interface ReconcileContext {
  tracker: TrackerContext;
  log: RunLog;
  flowRunId: string | null;
}

export interface ReconcileRequest {
  datasetPath: string;
  datasetRoot: string;
}

export interface ReconcileSuccess {
  descriptor: Descriptor;
  descriptorPath: string;
  tracker: ReconcileReport;
}

export interface ReconcileRunFailure {
  failure: IngestFailure;
  descriptor: Descriptor | null;
  persisted: boolean;
}

export type ReconcileDatasetResult = Result<ReconcileSuccess, ReconcileRunFailure>;

function abort(log: RunLog, error: IngestFailure): ReconcileDatasetResult {
  log.error(error.message);
  return err({ failure: error, descriptor: null, persisted: false });
}

/**
 * Re-runs Tracker reconciliation for a dataset that is already in the Catalog,
 * without touching the Catalog. The run's log lines are appended to the
 * descriptor's existing run log.
 */
export async function reconcileDataset(
  ctx: ReconcileContext,
  request: ReconcileRequest
): Promise<ReconcileDatasetResult> {
  const { log } = ctx;
  log.info(`Reconciling Tracker records for ${request.datasetPath} from ${request.datasetRoot}`);

  const lock = await acquireDescriptorLock(request.datasetRoot);
  if (!lock.ok) return abort(log, lock.error);
  const held = lock.value;

  try {
    const file = descriptorPath(request.datasetRoot);
    const loaded = await loadDescriptor(file, log);
    if (!loaded.ok) return abort(log, loaded.error);
    if (!loaded.value) {
      return abort(log, failure("NotIngested", `No descriptor at ${file}; ingest the dataset first`));
    }
    if (!loaded.value.catalog.dataset_id) {
      return abort(log, failure("NotIngested", `Descriptor ${file} has no Catalog dataset id`));
    }

    const reconciled = await reconcileTracker(ctx.tracker, loaded.value, {
      datasetPath: request.datasetPath,
      flowRunId: ctx.flowRunId,
      log
    });

    log.info(`Writing descriptor ${file}`);
    const descriptor = withRunLog(reconciled.descriptor, log.lines(), true);
    const persisted = await persistDescriptor(descriptor, file);
    if (!persisted.ok) {
      log.error(persisted.error.message);
      return err({ failure: persisted.error, descriptor, persisted: false });
    }
    if (!reconciled.outcome.ok) {
      return err({ failure: reconciled.outcome.error, descriptor, persisted: true });
    }
    return ok({ descriptor, descriptorPath: persisted.value, tracker: reconciled.outcome.value });
  } finally {
    await held.release().catch((error: unknown) => {
      log.warn(`Could not release ${held.path}: ${errorMessage(error)}`);
    });
  }
}
