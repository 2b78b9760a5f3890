import { z } from "zod";

const RecordIdSchema = z.union([z.string(), z.number()]).transform((value) => String(value));

export const NamedRecordSchema = z.object({
  id: RecordIdSchema,
  slug: z.string().min(1),
  name: z.string(),
  description: z.string().nullable().optional()
});

export const ShareSublocationSchema = z.object({
  id: RecordIdSchema,
  slug: z.string().min(1),
  name: z.string().nullable().optional()
});

export const TrackerDatasetSchema = z.object({
  id: RecordIdSchema,
  slug: z.string().min(1),
  name: z.string().nullable(),
  description: z.string().nullable().optional(),
  slug_beamline: z.string().nullable().optional(),
  slug_proposal: z.string().nullable().optional(),
  date_of_acquisition: z.string().nullable().optional(),
  catalog_dataset_id: z.string().nullable().optional(),
  catalog_date_ingested: z.string().nullable().optional(),
  ingestion_flow_run_id: z.string().nullable().optional()
});

export const DatasetInstanceSchema = z.object({
  id: RecordIdSchema,
  slug_dataset: z.string(),
  slug_share_sublocation: z.string(),
  path: z.string(),
  files_size_bytes: z.number().int().nonnegative().nullable().optional(),
  flow_run_id: z.string().nullable().optional(),
  date_created: z.string(),
  date_files_deleted: z.string().nullable().optional()
});

export const DatasetInstanceFileSchema = z.object({
  id: RecordIdSchema,
  id_dataset_instance: RecordIdSchema,
  file_path: z.string(),
  file_size_bytes: z.number().int().nonnegative(),
  date_file_last_modified: z.string(),
  is_supplemental: z.boolean()
});

export type Beamline = z.infer<typeof NamedRecordSchema>;
export type Proposal = z.infer<typeof NamedRecordSchema>;
export type ShareSublocation = z.infer<typeof ShareSublocationSchema>;
export type TrackerDataset = z.infer<typeof TrackerDatasetSchema>;
export type DatasetInstance = z.infer<typeof DatasetInstanceSchema>;
export type DatasetInstanceFile = z.infer<typeof DatasetInstanceFileSchema>;

export interface NamedRecordCreate {
  name: string;
  description: string;
}

export interface TrackerDatasetCreate {
  name: string;
  description: string | null;
  slug_beamline: string;
  slug_proposal: string;
  date_of_acquisition: string | null;
  catalog_dataset_id: string;
  catalog_date_ingested: string | null;
  ingestion_flow_run_id: string | null;
}

export interface TrackerDatasetUpdate {
  catalog_dataset_id: string;
  catalog_date_ingested: string | null;
  ingestion_flow_run_id: string | null;
}

export interface DatasetInstanceFilter {
  slug_dataset: string;
  slug_share_sublocation: string;
  path: string;
  /** Only instances whose files have not been deleted. */
  date_files_deleted__isnull: true;
}

export interface DatasetInstanceCreate {
  slug_dataset: string;
  slug_share_sublocation: string;
  path: string;
  files_size_bytes: number;
  flow_run_id: string | null;
}

export interface DatasetInstanceFileFields {
  file_size_bytes: number;
  date_file_last_modified: string;
  is_supplemental: boolean;
}

export interface DatasetInstanceFileCreate extends DatasetInstanceFileFields {
  id_dataset_instance: string;
  file_path: string;
}
