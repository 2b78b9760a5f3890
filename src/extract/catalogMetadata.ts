import type { Ownable, CatalogDataFile } from "../catalog/types";
import type { FileManifest } from "../types/descriptor";

export const UNKNOWN_EMAIL = "unknown@example.com";

const EDGE_NOISE = /^["'\s,]+|["'\s,]+$/g;

/**
 * Owner group is the proposal when there is one, else the ingesting user. The
 * beamline always gets access, and so does the user, who has to be able to
 * attach further records to the dataset.
 */
export function calculateAccessControls(
  username: string,
  beamline: string | null,
  proposal: string | null
): Ownable {
  const ownerGroup = proposal && proposal !== "None" ? proposal : username;
  const accessGroups: string[] = [];
  if (beamline) {
    const group = beamline.toLowerCase().replace(EDGE_NOISE, "");
    if (group) accessGroups.push(group);
    if (username !== group) accessGroups.push(username);
  }
  return { ownerGroup, accessGroups };
}

export function cleanEmail(email: unknown): string {
  if (typeof email !== "string") return UNKNOWN_EMAIL;
  const cleaned = email.replace(EDGE_NOISE, "").replace(/ /g, "");
  if (!cleaned || cleaned.toUpperCase() === "NONE" || !cleaned.includes("@")) return UNKNOWN_EMAIL;
  return cleaned;
}

export function searchTermsFromName(name: string): string {
  return name
    .split(/[^a-zA-Z0-9]/)
    .filter((term) => term.length > 0)
    .map((term) => term.toLowerCase())
    .join(" ");
}

export function dataFilesFromManifest(manifest: FileManifest): CatalogDataFile[] {
  return manifest.files.map((entry) => ({
    path: entry.path,
    size: entry.size_bytes,
    time: entry.date_last_modified
  }));
}
