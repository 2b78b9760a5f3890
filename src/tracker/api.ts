import type { Outcome } from "../types/failure";
import type {
  Beamline,
  DatasetInstance,
  DatasetInstanceCreate,
  DatasetInstanceFile,
  DatasetInstanceFileCreate,
  DatasetInstanceFileFields,
  DatasetInstanceFilter,
  NamedRecordCreate,
  Proposal,
  ShareSublocation,
  TrackerDataset,
  TrackerDatasetCreate,
  TrackerDatasetUpdate
} from "./types";

/**
 * Operations the reconciliation engine needs from the Tracker. Lookups by key
 * resolve to `null` when the record does not exist; list operations are the
 * filtered queries every upsert starts from.
 */
export interface TrackerApi {
  readonly baseUrl: string;
  findBeamlines(filter: { name: string }): Promise<Outcome<Beamline[]>>;
  createBeamline(input: NamedRecordCreate): Promise<Outcome<Beamline>>;
  findProposals(filter: { name: string }): Promise<Outcome<Proposal[]>>;
  createProposal(input: NamedRecordCreate): Promise<Outcome<Proposal>>;
  getShareSublocation(slug: string): Promise<Outcome<ShareSublocation | null>>;
  getDataset(slug: string): Promise<Outcome<TrackerDataset | null>>;
  createDataset(input: TrackerDatasetCreate): Promise<Outcome<TrackerDataset>>;
  updateDataset(slug: string, patch: TrackerDatasetUpdate): Promise<Outcome<TrackerDataset>>;
  /** Newest first. */
  findDatasetInstances(filter: DatasetInstanceFilter): Promise<Outcome<DatasetInstance[]>>;
  createDatasetInstance(input: DatasetInstanceCreate): Promise<Outcome<DatasetInstance>>;
  listDatasetInstanceFiles(instanceId: string): Promise<Outcome<DatasetInstanceFile[]>>;
  createDatasetInstanceFile(input: DatasetInstanceFileCreate): Promise<Outcome<DatasetInstanceFile>>;
  updateDatasetInstanceFile(id: string, patch: DatasetInstanceFileFields): Promise<Outcome<DatasetInstanceFile>>;
  deleteDatasetInstanceFile(id: string): Promise<Outcome<void>>;
}
