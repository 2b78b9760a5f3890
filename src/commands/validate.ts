import { loadRuntimeConfig } from "../config/runtimeConfig";
import { validateDataset } from "../ingest/validateDataset";
import { resolveDatasetRoot } from "../io/paths";
import { RunLog } from "../runlog/runLog";
import type { LogSink } from "../runlog/runLog";
import type { CommandOptions } from "./shared";
import { reportFailure } from "./shared";

export interface ValidateCommandOptions extends CommandOptions {
  files: string[];
  sink?: LogSink;
}

export async function runValidate(options: ValidateCommandOptions): Promise<number> {
  const config = loadRuntimeConfig(options.env ?? process.env, options);
  if (!config.ok) return reportFailure(config.error);

  const datasetRoot = resolveDatasetRoot(options.datasetPath, config.value.baseFolders);
  const report = await validateDataset(datasetRoot, options.files, new RunLog({ sink: options.sink }));
  if (!report.ok) return reportFailure(report.error);

  console.log(
    JSON.stringify(
      {
        dataset_root: datasetRoot,
        files: report.value.manifest.files,
        issues: report.value.issues,
        descriptor_found: report.value.descriptor !== null
      },
      null,
      2
    )
  );
  return 0;
}
