import type { CatalogApi } from "../catalog/api";
import type { Logger } from "../runlog/runLog";
import type { Descriptor, FileManifest } from "../types/descriptor";
import type { Result } from "../types/result";

export interface ExtractionInput {
  /** Local directory holding the dataset files. */
  datasetRoot: string;
  manifest: FileManifest;
  /** The descriptor as loaded or freshly created; strategies return an updated copy. */
  descriptor: Descriptor;
  catalog: CatalogApi;
  ownerUsername: string;
  contactEmail: string | null;
  log: Logger;
}

export interface ExtractionProblem {
  message: string;
}

/**
 * Instrument-specific extraction. A strategy creates the Catalog record and
 * returns the descriptor with `catalog.dataset_id` set.
 */
export interface ExtractionStrategy {
  readonly spec: string;
  readonly description: string;
  extract(input: ExtractionInput): Promise<Result<Descriptor, ExtractionProblem>>;
}
