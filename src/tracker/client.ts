import { z } from "zod";
import type { TrackerApi } from "./api";
import {
  DatasetInstanceFileSchema,
  DatasetInstanceSchema,
  NamedRecordSchema,
  ShareSublocationSchema,
  TrackerDatasetSchema
} from "./types";
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
import type { HttpMethod } from "../http/requestJson";
import { requestJson } from "../http/requestJson";
import type { Outcome } from "../types/failure";
import { ok } from "../types/result";

export interface TrackerClientConfig {
  baseUrl: string;
  username: string;
  password: string;
  timeoutMs: number;
}

type QueryValue = string | number | boolean;

export class HttpTrackerClient implements TrackerApi {
  readonly baseUrl: string;
  private readonly authorization: string;
  private readonly timeoutMs: number;

  constructor(config: TrackerClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.authorization = `Basic ${Buffer.from(`${config.username}:${config.password}`).toString("base64")}`;
    this.timeoutMs = config.timeoutMs;
  }

  findBeamlines(filter: { name: string }): Promise<Outcome<Beamline[]>> {
    return this.call("GET", "/beamlines", z.array(NamedRecordSchema), { query: filter });
  }

  createBeamline(input: NamedRecordCreate): Promise<Outcome<Beamline>> {
    return this.call("POST", "/beamlines", NamedRecordSchema, { body: input });
  }

  findProposals(filter: { name: string }): Promise<Outcome<Proposal[]>> {
    return this.call("GET", "/proposals", z.array(NamedRecordSchema), { query: filter });
  }

  createProposal(input: NamedRecordCreate): Promise<Outcome<Proposal>> {
    return this.call("POST", "/proposals", NamedRecordSchema, { body: input });
  }

  getShareSublocation(slug: string): Promise<Outcome<ShareSublocation | null>> {
    return this.getOne(`/share-sublocations/${encodeURIComponent(slug)}`, ShareSublocationSchema);
  }

  getDataset(slug: string): Promise<Outcome<TrackerDataset | null>> {
    return this.getOne(`/datasets/${encodeURIComponent(slug)}`, TrackerDatasetSchema);
  }

  createDataset(input: TrackerDatasetCreate): Promise<Outcome<TrackerDataset>> {
    return this.call("POST", "/datasets", TrackerDatasetSchema, { body: input });
  }

  updateDataset(slug: string, patch: TrackerDatasetUpdate): Promise<Outcome<TrackerDataset>> {
    return this.call("PATCH", `/datasets/${encodeURIComponent(slug)}`, TrackerDatasetSchema, { body: patch });
  }

  findDatasetInstances(filter: DatasetInstanceFilter): Promise<Outcome<DatasetInstance[]>> {
    return this.call("GET", "/dataset-instances", z.array(DatasetInstanceSchema), {
      query: { ...filter, ordering: "-date_created" }
    });
  }

  createDatasetInstance(input: DatasetInstanceCreate): Promise<Outcome<DatasetInstance>> {
    return this.call("POST", "/dataset-instances", DatasetInstanceSchema, { body: input });
  }

  listDatasetInstanceFiles(instanceId: string): Promise<Outcome<DatasetInstanceFile[]>> {
    return this.call("GET", "/dataset-instance-files", z.array(DatasetInstanceFileSchema), {
      query: { id_dataset_instance: instanceId }
    });
  }

  createDatasetInstanceFile(input: DatasetInstanceFileCreate): Promise<Outcome<DatasetInstanceFile>> {
    return this.call("POST", "/dataset-instance-files", DatasetInstanceFileSchema, { body: input });
  }

  updateDatasetInstanceFile(id: string, patch: DatasetInstanceFileFields): Promise<Outcome<DatasetInstanceFile>> {
    return this.call("PATCH", `/dataset-instance-files/${encodeURIComponent(id)}`, DatasetInstanceFileSchema, {
      body: patch
    });
  }

  async deleteDatasetInstanceFile(id: string): Promise<Outcome<void>> {
    const result = await this.call("DELETE", `/dataset-instance-files/${encodeURIComponent(id)}`, z.unknown());
    return result.ok ? ok(undefined) : result;
  }

  private async getOne<T>(
    route: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<Outcome<T | null>> {
    const result = await this.call("GET", route, schema);
    if (!result.ok && result.error.status === 404) return ok(null);
    return result;
  }

  private call<T>(
    method: HttpMethod,
    route: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: { query?: Record<string, QueryValue>; body?: unknown } = {}
  ): Promise<Outcome<T>> {
    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(options.query ?? {})) {
      params.set(key, String(value));
    }
    const search = params.toString();
    return requestJson({
      url: `${this.baseUrl}${route}${search ? `?${search}` : ""}`,
      method,
      headers: { Authorization: this.authorization },
      body: options.body,
      timeoutMs: this.timeoutMs,
      schema,
      label: `Tracker ${method} ${route}`
    });
  }
}
