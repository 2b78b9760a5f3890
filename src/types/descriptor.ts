export interface FileManifestEntry {
  /** Slash-separated, relative to the dataset root. Unique within a manifest. */
  path: string;
  size_bytes: number;
  /** UTC, whole seconds: `YYYY-MM-DDTHH:MM:SSZ`. */
  date_last_modified: string;
  is_supplemental: boolean;
}

export interface FileManifest {
  files: FileManifestEntry[];
}

export interface CatalogLink {
  dataset_id: string | null;
  registry_instance: string | null;
  date_ingested: string | null;
  extractor_used: string | null;
  run_log: string[];
}

export interface TrackerLink {
  tracker_dataset_id: string | null;
  registry_instance: string | null;
  instance_record_id: string | null;
  instance_comments: string[];
}

export interface Descriptor {
  beamline_id: string | null;
  proposal_id: string | null;
  principal_investigator: string | null;
  name: string | null;
  description: string | null;
  date_of_acquisition: string | null;
  file_manifest: FileManifest | null;
  catalog: CatalogLink;
  tracker: TrackerLink | null;
}

/** On-disk form of a descriptor. `total_size_bytes` is derived and recomputed on every write. */
export interface DescriptorDocument extends Omit<Descriptor, "file_manifest"> {
  schema_version: "1.0";
  file_manifest: (FileManifest & { total_size_bytes: number }) | null;
}

export type IssueSeverity = "info" | "warning" | "error";

export interface ValidationIssue {
  severity: IssueSeverity;
  path: string;
  message: string;
}
