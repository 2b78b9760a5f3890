import { HttpTrackerClient } from "../tracker/client";
import type { TrackerContext } from "../reconcile/reconcileTracker";
import type { ConfigOverrides, TrackerSettings } from "../config/runtimeConfig";
import type { Descriptor } from "../types/descriptor";
import type { IngestFailure } from "../types/failure";
import { formatFailure } from "../types/failure";
import { toDocument } from "../descriptor/descriptorStore";

export interface CommandOptions extends ConfigOverrides {
  datasetPath: string;
  /** Defaults to `process.env`. */
  env?: Record<string, string | undefined>;
}

export function trackerContext(settings: TrackerSettings, timeoutMs: number): TrackerContext {
  return {
    api: new HttpTrackerClient({
      baseUrl: settings.url,
      username: settings.username,
      password: settings.password,
      timeoutMs
    }),
    shareIdentifier: settings.shareIdentifier
  };
}

export function printDescriptor(descriptor: Descriptor): void {
  console.log(JSON.stringify(toDocument(descriptor), null, 2));
}

/** Prints the failure line and returns the process exit code. */
export function reportFailure(error: IngestFailure): number {
  console.error(formatFailure(error));
  if (error.retryable) console.error("This failure is transient; re-running the same command is safe.");
  return 1;
}
