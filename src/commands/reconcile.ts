import { loadRuntimeConfig, trackerSettings } from "../config/runtimeConfig";
import { reconcileDataset } from "../ingest/reconcileDataset";
import { resolveDatasetRoot } from "../io/paths";
import { RunLog } from "../runlog/runLog";
import { failure } from "../types/failure";
import type { CommandOptions } from "./shared";
import { printDescriptor, reportFailure, trackerContext } from "./shared";

export async function runReconcile(options: CommandOptions): Promise<number> {
  const config = loadRuntimeConfig(options.env ?? process.env, options);
  if (!config.ok) return reportFailure(config.error);

  const tracker = trackerSettings(config.value);
  if (!tracker.ok) return reportFailure(tracker.error);
  if (!tracker.value) {
    return reportFailure(failure("InvalidConfig", "TRACKER_URL is required to reconcile"));
  }

  const result = await reconcileDataset(
    {
      tracker: trackerContext(tracker.value, config.value.requestTimeoutMs),
      log: new RunLog(),
      flowRunId: config.value.flowRunId
    },
    {
      datasetPath: options.datasetPath,
      datasetRoot: resolveDatasetRoot(options.datasetPath, config.value.baseFolders)
    }
  );
  if (!result.ok) return reportFailure(result.error.failure);
  printDescriptor(result.value.descriptor);
  return 0;
}
