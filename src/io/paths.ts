import path from "path";

export const DESCRIPTOR_FILE_NAME = "dataset-descriptor.json";
export const DESCRIPTOR_LOCK_FILE_NAME = `${DESCRIPTOR_FILE_NAME}.lock`;

export function descriptorPath(datasetRoot: string): string {
  return path.join(datasetRoot, DESCRIPTOR_FILE_NAME);
}

export function descriptorLockPath(datasetRoot: string): string {
  return path.join(datasetRoot, DESCRIPTOR_LOCK_FILE_NAME);
}

/** True for the files this engine owns inside a dataset root, which never join a manifest. */
export function isDescriptorArtifact(relativePath: string): boolean {
  if (relativePath === DESCRIPTOR_FILE_NAME || relativePath === DESCRIPTOR_LOCK_FILE_NAME) return true;
  // Temp file of an interrupted atomic write.
  return relativePath.startsWith(`.${DESCRIPTOR_FILE_NAME}.`) && relativePath.endsWith(".tmp");
}

export interface BaseFolders {
  baseFolder?: string | null;
  internalBaseFolder?: string | null;
}

/**
 * Expands a dataset path to the local directory holding it. The internal base
 * folder is where a mounted share appears inside a container and wins over the
 * general base folder.
 */
export function resolveDatasetRoot(datasetPath: string, folders: BaseFolders): string {
  const prefix = folders.internalBaseFolder || folders.baseFolder;
  return prefix ? path.resolve(prefix, datasetPath) : path.resolve(datasetPath);
}
