import { z } from "zod";

export type ApiResponse<T = unknown> = { status: number; ok: boolean; json: T | null; text: string };
export type ApiInit = { method: "GET" | "POST"; body?: string };
export type ApiClient = (path: string, init?: ApiInit) => Promise<ApiResponse>;

export function createApiClient(baseUrl: string): ApiClient {
  return async function api(path: string, init: ApiInit = { method: "GET" }): Promise<ApiResponse> {
    const res = await fetch(`${baseUrl}${path}`, {
      method: init.method,
      body: init.body,
      headers: { "Content-Type": "application/json" }
    });
    const text = await res.text();
    let json: unknown = null;
    try {
      json = text ? JSON.parse(text) : null;
    } catch {
      json = null;
    }
    return { status: res.status, ok: res.ok, json, text };
  };
}

const errorBody = z.object({ error: z.string().optional(), message: z.string().optional() }).passthrough();

// Reads a typed body from an API response; null when the shape does not match.
export function readJson<T>(r: ApiResponse, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | null {
  const parsed = schema.safeParse(r.json);
  return parsed.success ? parsed.data : null;
}

export function apiErrorMessage(r: ApiResponse, fallback: string): string {
  const body = readJson(r, errorBody);
  return body?.message || body?.error || `${fallback} (HTTP ${r.status})`;
}

export function postJson(api: ApiClient, path: string, body: Record<string, unknown>): Promise<ApiResponse> {
  return api(path, { method: "POST", body: JSON.stringify(body) });
}
