import type { Result } from "./result";
import { err } from "./result";

export type FailureCategory =
  | "configuration"
  | "validation"
  | "extraction"
  | "reconciliation"
  | "persistence";

const FAILURE_CATEGORIES = {
  UnknownSpec: "configuration",
  MissingCredentials: "configuration",
  ShareNotConfigured: "configuration",
  CatalogLoginFailed: "configuration",
  InvalidConfig: "configuration",
  NoValidFiles: "validation",
  AlreadyIngested: "validation",
  ManifestMismatch: "validation",
  DescriptorInvalid: "validation",
  DescriptorLocked: "validation",
  NotIngested: "validation",
  DuplicatePath: "validation",
  ExtractionError: "extraction",
  TrackerRecordMissing: "reconciliation",
  DescriptorIncomplete: "reconciliation",
  RemoteError: "reconciliation",
  Timeout: "reconciliation",
  FileSyncFailed: "reconciliation",
  DescriptorWriteFailed: "persistence"
} as const satisfies Record<string, FailureCategory>;

export type FailureKind = keyof typeof FAILURE_CATEGORIES;

export interface IngestFailure {
  kind: FailureKind;
  category: FailureCategory;
  message: string;
  retryable: boolean;
  /** HTTP status of the remote response, when the failure came from one. */
  status?: number;
}

export type Outcome<T> = Result<T, IngestFailure>;

export function failure(
  kind: FailureKind,
  message: string,
  extra: { retryable?: boolean; status?: number } = {}
): IngestFailure {
  const result: IngestFailure = {
    kind,
    category: FAILURE_CATEGORIES[kind],
    message,
    retryable: extra.retryable ?? false
  };
  if (extra.status !== undefined) result.status = extra.status;
  return result;
}

export function fail(
  kind: FailureKind,
  message: string,
  extra?: { retryable?: boolean; status?: number }
): { ok: false; error: IngestFailure } {
  return err(failure(kind, message, extra));
}

export function formatFailure(error: IngestFailure): string {
  return `${error.category}/${error.kind}: ${error.message}`;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") return error.code;
  return undefined;
}
