import type { Outcome } from "../types/failure";
import type { CatalogAttachmentInput, CatalogDatablockInput, CatalogDatasetInput } from "./types";

/**
 * The Catalog side used by extraction strategies. `createDataset` is not
 * idempotent on the far side: every call makes a new record.
 */
export interface CatalogApi {
  readonly baseUrl: string;
  login(): Promise<Outcome<void>>;
  createDataset(metadata: CatalogDatasetInput): Promise<Outcome<string>>;
  createDatablock(datasetId: string, datablock: CatalogDatablockInput): Promise<Outcome<void>>;
  createAttachment(datasetId: string, attachment: CatalogAttachmentInput): Promise<Outcome<void>>;
}
