export * from "./types/result";
export * from "./types/failure";
export type * from "./types/descriptor";
export * from "./manifest/fileManifest";
export * from "./manifest/buildManifest";
export * from "./descriptor/descriptorStore";
export * from "./descriptor/descriptorLock";
export * from "./extract/strategy";
export * from "./extract/registry";
export * from "./extract/dispatch";
export * from "./extract/catalogMetadata";
export { GenericStrategy } from "./extract/strategies/generic";
export * from "./reconcile/fileSync";
export * from "./reconcile/reconcileTracker";
export * from "./runlog/runLog";
export * from "./ingest/ingestDataset";
export * from "./ingest/reconcileDataset";
export * from "./ingest/validateDataset";
export * from "./config/runtimeConfig";
export type { CatalogApi } from "./catalog/api";
export { HttpCatalogClient } from "./catalog/client";
export type { TrackerApi } from "./tracker/api";
export { HttpTrackerClient } from "./tracker/client";
export { resolveDatasetRoot, descriptorPath, DESCRIPTOR_FILE_NAME } from "./io/paths";
