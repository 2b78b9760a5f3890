import { z } from "zod";
import type { CatalogApi } from "./api";
import { CreatedDatasetSchema, LoginResponseSchema } from "./types";
import type { CatalogAttachmentInput, CatalogDatablockInput, CatalogDatasetInput } from "./types";
import { requestJson } from "../http/requestJson";
import type { Outcome } from "../types/failure";
import { fail } from "../types/failure";
import { ok } from "../types/result";

export interface CatalogClientConfig {
  baseUrl: string;
  username: string;
  password: string;
  timeoutMs: number;
}

export class HttpCatalogClient implements CatalogApi {
  readonly baseUrl: string;
  private readonly username: string;
  private readonly password: string;
  private readonly timeoutMs: number;
  private token: string | null = null;

  constructor(config: CatalogClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.username = config.username;
    this.password = config.password;
    this.timeoutMs = config.timeoutMs;
  }

  async login(): Promise<Outcome<void>> {
    const result = await requestJson({
      url: `${this.baseUrl}/auth/login`,
      method: "POST",
      body: { username: this.username, password: this.password },
      timeoutMs: this.timeoutMs,
      schema: LoginResponseSchema,
      label: "Catalog login"
    });
    if (!result.ok) {
      return fail("CatalogLoginFailed", result.error.message, {
        retryable: result.error.retryable,
        status: result.error.status
      });
    }
    this.token = result.value.access_token;
    return ok(undefined);
  }

  async createDataset(metadata: CatalogDatasetInput): Promise<Outcome<string>> {
    const result = await this.post("/datasets", metadata, CreatedDatasetSchema);
    return result.ok ? ok(result.value.pid) : result;
  }

  async createDatablock(datasetId: string, datablock: CatalogDatablockInput): Promise<Outcome<void>> {
    const result = await this.post("/origdatablocks", { datasetId, ...datablock }, z.unknown());
    return result.ok ? ok(undefined) : result;
  }

  async createAttachment(datasetId: string, attachment: CatalogAttachmentInput): Promise<Outcome<void>> {
    const result = await this.post("/attachments", { datasetId, ...attachment }, z.unknown());
    return result.ok ? ok(undefined) : result;
  }

  private async post<T>(
    route: string,
    body: unknown,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<Outcome<T>> {
    if (!this.token) {
      return fail("CatalogLoginFailed", `Catalog POST ${route} attempted before login`);
    }
    return requestJson({
      url: `${this.baseUrl}${route}`,
      method: "POST",
      headers: { Authorization: `Bearer ${this.token}` },
      body,
      timeoutMs: this.timeoutMs,
      schema,
      label: `Catalog POST ${route}`
    });
  }
}
