import { z } from "zod";

export const LoginResponseSchema = z.object({
  access_token: z.string().min(1)
});

export const CreatedDatasetSchema = z.object({
  pid: z.string().min(1)
});

export interface Ownable {
  ownerGroup: string;
  accessGroups: string[];
}

export interface CatalogDataFile {
  path: string;
  size: number;
  time: string;
}

export interface CatalogDatasetInput extends Ownable {
  type: "raw";
  datasetName: string;
  description: string;
  owner: string;
  contactEmail: string;
  principalInvestigator: string;
  creationLocation: string;
  sourceFolder: string;
  creationTime: string;
  proposalId: string | null;
  instrumentId: string | null;
  keywords: string[];
  scientificMetadata: Record<string, unknown>;
  isPublished: boolean;
  size: number;
  numberOfFiles: number;
}

export interface CatalogDatablockInput extends Ownable {
  size: number;
  dataFileList: CatalogDataFile[];
}

export interface CatalogAttachmentInput extends Ownable {
  /** Image as a data URI. */
  thumbnail: string;
  caption: string;
}
