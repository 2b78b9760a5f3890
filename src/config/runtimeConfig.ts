import { z } from "zod";
import type { BaseFolders } from "../io/paths";
import type { Outcome } from "../types/failure";
import { fail } from "../types/failure";
import { ok } from "../types/result";

export const DEFAULT_CATALOG_URL = "http://localhost:3000/api/v3";
export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;

const blankToUndefined = (value: unknown): unknown =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const optionalText = z.preprocess(blankToUndefined, z.string().trim().optional());
const optionalUrl = z.preprocess(blankToUndefined, z.string().trim().url().optional());

const EnvSchema = z.object({
  INGEST_SPEC: optionalText,
  INGEST_BASE_FOLDER: optionalText,
  INGEST_INTERNAL_BASE_FOLDER: optionalText,
  INGEST_FLOW_RUN_ID: optionalText,
  CATALOG_URL: optionalUrl,
  CATALOG_USERNAME: optionalText,
  CATALOG_PASSWORD: optionalText,
  CATALOG_OWNER_USERNAME: optionalText,
  CATALOG_CONTACT_EMAIL: optionalText,
  TRACKER_URL: optionalUrl,
  TRACKER_USERNAME: optionalText,
  TRACKER_PASSWORD: optionalText,
  TRACKER_SHARE_IDENTIFIER: optionalText,
  REQUEST_TIMEOUT_MS: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT_MS)
  )
});

export type IngestEnv = z.infer<typeof EnvSchema>;

/** Command-line values that take precedence over the environment. */
export interface ConfigOverrides {
  spec?: string;
  catalogUrl?: string;
  trackerUrl?: string;
  shareIdentifier?: string;
  ownerUsername?: string;
  flowRunId?: string;
  timeoutMs?: number;
}

export interface CatalogSettings {
  url: string;
  usedDefaultUrl: boolean;
  username: string;
  password: string;
  ownerUsername: string;
  contactEmail: string | null;
}

export interface TrackerSettings {
  url: string;
  username: string;
  password: string;
  shareIdentifier: string;
}

export interface RuntimeConfig {
  spec: string | null;
  baseFolders: BaseFolders;
  flowRunId: string | null;
  requestTimeoutMs: number;
  env: IngestEnv;
  overrides: ConfigOverrides;
}

export function loadRuntimeConfig(
  env: Record<string, string | undefined>,
  overrides: ConfigOverrides = {}
): Outcome<RuntimeConfig> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    return fail("InvalidConfig", `Invalid environment: ${issues}`);
  }
  const values = parsed.data;
  return ok({
    spec: overrides.spec ?? values.INGEST_SPEC ?? null,
    baseFolders: {
      baseFolder: values.INGEST_BASE_FOLDER ?? null,
      internalBaseFolder: values.INGEST_INTERNAL_BASE_FOLDER ?? null
    },
    flowRunId: overrides.flowRunId ?? values.INGEST_FLOW_RUN_ID ?? null,
    requestTimeoutMs: overrides.timeoutMs ?? values.REQUEST_TIMEOUT_MS,
    env: values,
    overrides
  });
}

export function catalogSettings(config: RuntimeConfig): Outcome<CatalogSettings> {
  const { env, overrides } = config;
  const username = env.CATALOG_USERNAME;
  const password = env.CATALOG_PASSWORD;
  if (!username || !password) {
    return fail("MissingCredentials", "CATALOG_USERNAME and CATALOG_PASSWORD are required");
  }
  const explicitUrl = overrides.catalogUrl ?? env.CATALOG_URL;
  return ok({
    url: explicitUrl ?? DEFAULT_CATALOG_URL,
    usedDefaultUrl: !explicitUrl,
    username,
    password,
    ownerUsername: overrides.ownerUsername ?? env.CATALOG_OWNER_USERNAME ?? username,
    contactEmail: env.CATALOG_CONTACT_EMAIL ?? null
  });
}

/** `null` when no Tracker URL is configured, which disables Tracker reconciliation. */
export function trackerSettings(config: RuntimeConfig): Outcome<TrackerSettings | null> {
  const { env, overrides } = config;
  const url = overrides.trackerUrl ?? env.TRACKER_URL;
  if (!url) return ok(null);
  if (!env.TRACKER_USERNAME || !env.TRACKER_PASSWORD) {
    return fail("MissingCredentials", "TRACKER_USERNAME and TRACKER_PASSWORD are required when TRACKER_URL is set");
  }
  const shareIdentifier = overrides.shareIdentifier ?? env.TRACKER_SHARE_IDENTIFIER;
  if (!shareIdentifier) {
    return fail("ShareNotConfigured", "TRACKER_SHARE_IDENTIFIER is required when TRACKER_URL is set");
  }
  return ok({ url, username: env.TRACKER_USERNAME, password: env.TRACKER_PASSWORD, shareIdentifier });
}
