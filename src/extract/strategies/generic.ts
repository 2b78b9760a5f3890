import { promises as fs } from "fs";
import path from "path";
import type { ExtractionInput, ExtractionProblem, ExtractionStrategy } from "../strategy";
import {
  calculateAccessControls,
  cleanEmail,
  dataFilesFromManifest,
  searchTermsFromName
} from "../catalogMetadata";
import type { Ownable } from "../../catalog/types";
import type { Descriptor, FileManifest, FileManifestEntry } from "../../types/descriptor";
import { errorMessage } from "../../types/failure";
import type { Result } from "../../types/result";
import { err, ok } from "../../types/result";
import { findEntry, totalSizeBytes } from "../../manifest/fileManifest";
import { nowUtcIsoSeconds } from "../../utils/time";

const THUMBNAIL_NAMES = ["thumbnail.png", "thumbnail.jpg", "thumbnail.jpeg"];

function earliestModification(manifest: FileManifest): string {
  const dates = manifest.files.map((entry) => entry.date_last_modified).sort();
  return dates[0] ?? nowUtcIsoSeconds();
}

function findThumbnail(manifest: FileManifest): FileManifestEntry | undefined {
  for (const name of THUMBNAIL_NAMES) {
    const found = findEntry(manifest, name);
    if (found) return found;
  }
  return undefined;
}

async function encodeThumbnail(filePath: string): Promise<string> {
  const mime = path.extname(filePath).toLowerCase() === ".png" ? "image/png" : "image/jpeg";
  const content = await fs.readFile(filePath);
  return `data:${mime};base64,${content.toString("base64")}`;
}

/**
 * Instrument-agnostic ingestion: one raw Catalog dataset described from the
 * descriptor's own fields, one datablock listing every manifest file, and a
 * thumbnail attachment when the dataset ships a `thumbnail.png` or `.jpg`.
 */
export class GenericStrategy implements ExtractionStrategy {
  readonly spec = "generic";
  readonly description = "Raw dataset and datablock from descriptor fields and the file manifest";

  async extract(input: ExtractionInput): Promise<Result<Descriptor, ExtractionProblem>> {
    const { descriptor, manifest, catalog, log } = input;
    const name = descriptor.name ?? path.basename(input.datasetRoot);
    const terms = searchTermsFromName(name);
    const description = descriptor.description ?? terms;
    const size = totalSizeBytes(manifest);
    const ownable = calculateAccessControls(input.ownerUsername, descriptor.beamline_id, descriptor.proposal_id);
    log.info(
      `Access controls for ${name}: owner group ${ownable.ownerGroup}, ` +
        `access groups [${ownable.accessGroups.join(", ")}]`
    );

    const created = await catalog.createDataset({
      type: "raw",
      datasetName: name,
      description,
      owner: descriptor.principal_investigator ?? "Unknown",
      contactEmail: cleanEmail(input.contactEmail),
      principalInvestigator: descriptor.principal_investigator ?? "Unknown",
      creationLocation: descriptor.beamline_id ?? "Unknown",
      sourceFolder: input.datasetRoot,
      creationTime: descriptor.date_of_acquisition ?? earliestModification(manifest),
      proposalId: descriptor.proposal_id,
      instrumentId: descriptor.beamline_id,
      keywords: terms ? terms.split(" ") : [],
      scientificMetadata: {},
      isPublished: false,
      size,
      numberOfFiles: manifest.files.length,
      ...ownable
    });
    if (!created.ok) {
      return err({ message: `Catalog dataset creation failed: ${created.error.message}` });
    }
    const datasetId = created.value;
    log.info(`Created Catalog dataset ${datasetId} for ${name}`);

    const datablock = await catalog.createDatablock(datasetId, {
      size,
      dataFileList: dataFilesFromManifest(manifest),
      ...ownable
    });
    if (!datablock.ok) {
      return err({
        message: `Catalog dataset ${datasetId} was created but its datablock failed: ${datablock.error.message}`
      });
    }
    log.info(`Created datablock of ${manifest.files.length} files for Catalog dataset ${datasetId}`);

    await this.attachThumbnail(input, datasetId, ownable);

    return ok({
      ...descriptor,
      name,
      description,
      file_manifest: manifest,
      catalog: { ...descriptor.catalog, dataset_id: datasetId }
    });
  }

  private async attachThumbnail(input: ExtractionInput, datasetId: string, ownable: Ownable): Promise<void> {
    const thumbnail = findThumbnail(input.manifest);
    if (!thumbnail) return;

    let encoded: string;
    try {
      encoded = await encodeThumbnail(path.join(input.datasetRoot, thumbnail.path));
    } catch (error) {
      input.log.warn(`Could not read thumbnail ${thumbnail.path}: ${errorMessage(error)}`);
      return;
    }
    const attached = await input.catalog.createAttachment(datasetId, {
      thumbnail: encoded,
      caption: thumbnail.path,
      ...ownable
    });
    if (attached.ok) {
      input.log.info(`Created thumbnail attachment for Catalog dataset ${datasetId} from ${thumbnail.path}`);
    } else {
      input.log.warn(`Thumbnail attachment for Catalog dataset ${datasetId} failed: ${attached.error.message}`);
    }
  }
}
