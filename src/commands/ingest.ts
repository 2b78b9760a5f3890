import { HttpCatalogClient } from "../catalog/client";
import { DEFAULT_CATALOG_URL, catalogSettings, loadRuntimeConfig, trackerSettings } from "../config/runtimeConfig";
import type { StrategyRegistry } from "../extract/registry";
import { defaultStrategyRegistry, resolveStrategy } from "../extract/registry";
import { ingestDataset } from "../ingest/ingestDataset";
import { resolveDatasetRoot } from "../io/paths";
import { RunLog } from "../runlog/runLog";
import type { CommandOptions } from "./shared";
import { printDescriptor, reportFailure, trackerContext } from "./shared";

export interface IngestCommandOptions extends CommandOptions {
  files: string[];
  strategies?: StrategyRegistry;
}

export async function runIngest(options: IngestCommandOptions): Promise<number> {
  const log = new RunLog();
  const config = loadRuntimeConfig(options.env ?? process.env, options);
  if (!config.ok) return reportFailure(config.error);

  // The extraction spec is checked before any credential is looked at.
  const strategies = options.strategies ?? defaultStrategyRegistry();
  const strategy = resolveStrategy(strategies, config.value.spec);
  if (!strategy.ok) return reportFailure(strategy.error);

  const catalog = catalogSettings(config.value);
  if (!catalog.ok) return reportFailure(catalog.error);
  if (catalog.value.usedDefaultUrl) {
    log.warn(`CATALOG_URL is not set; using ${DEFAULT_CATALOG_URL}`);
  }
  const tracker = trackerSettings(config.value);
  if (!tracker.ok) return reportFailure(tracker.error);

  const timeoutMs = config.value.requestTimeoutMs;
  const result = await ingestDataset(
    {
      catalog: new HttpCatalogClient({
        baseUrl: catalog.value.url,
        username: catalog.value.username,
        password: catalog.value.password,
        timeoutMs
      }),
      tracker: tracker.value ? trackerContext(tracker.value, timeoutMs) : null,
      strategies,
      log,
      ownerUsername: catalog.value.ownerUsername,
      contactEmail: catalog.value.contactEmail,
      flowRunId: config.value.flowRunId
    },
    {
      datasetPath: options.datasetPath,
      datasetRoot: resolveDatasetRoot(options.datasetPath, config.value.baseFolders),
      files: options.files,
      spec: strategy.value.spec
    }
  );

  if (!result.ok) {
    if (result.error.persisted) {
      console.error("Descriptor was written; run `reconcile` to finish the Tracker records.");
    }
    return reportFailure(result.error.failure);
  }
  printDescriptor(result.value.descriptor);
  return 0;
}
