#!/usr/bin/env node
import path from "path";
import dotenv from "dotenv";
import { Command, InvalidArgumentError } from "commander";
import pkg from "../../package.json";
import { runIngest } from "../commands/ingest";
import { runReconcile } from "../commands/reconcile";
import { runValidate } from "../commands/validate";

function readArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  const inlineArg = argv.find((arg) => arg.startsWith(prefix));
  if (inlineArg) return inlineArg.slice(prefix.length);
  const index = argv.indexOf(flag);
  if (index >= 0) {
    return argv[index + 1];
  }
  return undefined;
}

function resolveEnvPath(argv: string[], fallback: string): string {
  const cliValue = readArgValue(argv, "--env-file");
  if (cliValue) return cliValue;
  return process.env.BEAMLINE_INGEST_ENV_FILE ?? process.env.DOTENV_CONFIG_PATH ?? fallback;
}

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

const defaultEnvPath = path.resolve(process.cwd(), ".env");
const envPath = resolveEnvPath(process.argv.slice(2), defaultEnvPath);
dotenv.config({ path: envPath });

interface RemoteOpts {
  spec?: string;
  catalogUrl?: string;
  trackerUrl?: string;
  share?: string;
  owner?: string;
  flowRunId?: string;
  timeoutMs?: number;
}

const program = new Command();

program
  .name("beamline-ingest")
  .description("Idempotent ingestion of beamline datasets into the Catalog and the Tracker")
  .version(pkg.version);

program.option(
  "--env-file <path>",
  "Path to .env file (overrides BEAMLINE_INGEST_ENV_FILE/DOTENV_CONFIG_PATH)",
  envPath
);

program
  .command("ingest")
  .description("Ingest a dataset folder, or the listed files within it")
  .argument("<datasetPath>", "Dataset folder, relative to the configured base folder")
  .argument("[files...]", "Files relative to the dataset folder; all files when omitted")
  .option("--spec <name>", "Extraction spec (overrides INGEST_SPEC)")
  .option("--catalog-url <url>", "Catalog API base URL (overrides CATALOG_URL)")
  .option("--tracker-url <url>", "Tracker API base URL (overrides TRACKER_URL)")
  .option("--share <slug>", "Tracker share sublocation (overrides TRACKER_SHARE_IDENTIFIER)")
  .option("--owner <username>", "Catalog owner username (overrides CATALOG_OWNER_USERNAME)")
  .option("--flow-run-id <id>", "Orchestration run id recorded in the Tracker")
  .option("--timeout-ms <n>", "Per-request timeout in milliseconds", parsePositiveInt)
  .action(async (datasetPath: string, files: string[], opts: RemoteOpts) => {
    process.exitCode = await runIngest({
      datasetPath,
      files,
      spec: opts.spec,
      catalogUrl: opts.catalogUrl,
      trackerUrl: opts.trackerUrl,
      shareIdentifier: opts.share,
      ownerUsername: opts.owner,
      flowRunId: opts.flowRunId,
      timeoutMs: opts.timeoutMs
    });
  });

program
  .command("reconcile")
  .description("Re-run Tracker reconciliation for an ingested dataset")
  .argument("<datasetPath>", "Dataset folder, relative to the configured base folder")
  .option("--tracker-url <url>", "Tracker API base URL (overrides TRACKER_URL)")
  .option("--share <slug>", "Tracker share sublocation (overrides TRACKER_SHARE_IDENTIFIER)")
  .option("--flow-run-id <id>", "Orchestration run id recorded in the Tracker")
  .option("--timeout-ms <n>", "Per-request timeout in milliseconds", parsePositiveInt)
  .action(async (datasetPath: string, opts: RemoteOpts) => {
    process.exitCode = await runReconcile({
      datasetPath,
      trackerUrl: opts.trackerUrl,
      shareIdentifier: opts.share,
      flowRunId: opts.flowRunId,
      timeoutMs: opts.timeoutMs
    });
  });

program
  .command("validate")
  .description("Build the manifest and check the descriptor without contacting any service")
  .argument("<datasetPath>", "Dataset folder, relative to the configured base folder")
  .argument("[files...]", "Files relative to the dataset folder; all files when omitted")
  .action(async (datasetPath: string, files: string[]) => {
    process.exitCode = await runValidate({ datasetPath, files });
  });

program.parseAsync().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
