import type { z } from "zod";
import type { Outcome } from "../types/failure";
import { errorMessage, fail } from "../types/failure";
import { ok } from "../types/result";

export type HttpMethod = "GET" | "POST" | "PATCH" | "DELETE";

export interface JsonRequest<T> {
  url: string;
  method?: HttpMethod;
  headers?: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** Short description of the call, used in failure messages. */
  label: string;
}

function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

export async function requestJson<T>(request: JsonRequest<T>): Promise<Outcome<T>> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), request.timeoutMs);

  let status: number;
  let statusOk: boolean;
  let text: string;
  try {
    const response = await fetch(request.url, {
      method: request.method ?? "GET",
      headers: {
        Accept: "application/json",
        ...(request.body === undefined ? {} : { "Content-Type": "application/json" }),
        ...request.headers
      },
      body: request.body === undefined ? undefined : JSON.stringify(request.body),
      signal: controller.signal
    });
    status = response.status;
    statusOk = response.ok;
    text = await response.text();
  } catch (error) {
    if (controller.signal.aborted) {
      return fail("Timeout", `${request.label} timed out after ${request.timeoutMs} ms`, { retryable: true });
    }
    return fail("RemoteError", `${request.label} failed: ${errorMessage(error)}`, { retryable: true });
  } finally {
    clearTimeout(timer);
  }

  if (!statusOk) {
    return fail("RemoteError", `${request.label} failed (${status}): ${text}`, {
      retryable: isRetryableStatus(status),
      status
    });
  }

  let data: unknown = null;
  if (text.trim()) {
    try {
      data = JSON.parse(text);
    } catch (error) {
      return fail("RemoteError", `${request.label} returned invalid JSON: ${errorMessage(error)}`, { status });
    }
  }

  const parsed = request.schema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"} ${issue.message}`)
      .join("; ");
    return fail("RemoteError", `Unexpected response shape from ${request.label}: ${issues}`, { status });
  }
  return ok(parsed.data);
}
