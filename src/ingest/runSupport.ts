import type { Logger } from "../runlog/runLog";
import type { Descriptor, ValidationIssue } from "../types/descriptor";

export function reportIssues(log: Logger, issues: ValidationIssue[]): void {
  for (const issue of issues) {
    const line = `${issue.path}: ${issue.message}`;
    if (issue.severity === "error") log.error(line);
    else if (issue.severity === "warning") log.warn(line);
    else log.info(line);
  }
}

/** Replaces or extends the descriptor's captured run log. */
export function withRunLog(descriptor: Descriptor, lines: string[], append = false): Descriptor {
  const runLog = append ? [...descriptor.catalog.run_log, ...lines] : lines;
  return { ...descriptor, catalog: { ...descriptor.catalog, run_log: runLog } };
}
