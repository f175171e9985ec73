/**
 * Facebook Graph API HTTP wrapper.
 * Single function for all Graph API calls. Transport failures throw NetworkError;
 * HTTP status and body interpretation is left to the caller.
 */

import { z } from "zod";
import { graphApiBase, DEFAULT_GRAPH_API_VERSION } from "./config.js";
import { NetworkError, UpstreamApiError, errorMessage } from "./errors.js";

export type HttpMethod = "GET" | "POST" | "DELETE";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface GraphResponse {
  status: number;
  ok: boolean;
  /** Parsed JSON, or undefined when the body is not JSON. */
  body: unknown;
  text: string;
}

export type GraphApi = (
  method: HttpMethod,
  endpoint: string,
  token: string | undefined,
  params?: Record<string, string>,
) => Promise<GraphResponse>;

export interface GraphApiOptions {
  version?: string;
  fetch?: FetchLike;
  /** Extra attempts after a transport failure. HTTP errors are never retried. */
  retries?: number;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export function createGraphApi(options: GraphApiOptions = {}): GraphApi {
  const base = graphApiBase(options.version ?? DEFAULT_GRAPH_API_VERSION);
  const doFetch: FetchLike = options.fetch ?? ((input, init) => fetch(input, init));
  const attempts = 1 + (options.retries ?? 0);

  return async (method, endpoint, token, params) => {
    const url = new URL(`${base}/${endpoint}`);
    if (token !== undefined) {
      url.searchParams.set("access_token", token);
    }
    if (params) {
      for (const [k, v] of Object.entries(params)) {
        url.searchParams.set(k, v);
      }
    }

    let lastError: unknown;
    for (let attempt = 1; attempt <= attempts; attempt++) {
      let res: Response;
      let text: string;
      try {
        res = await doFetch(url.toString(), { method });
        // A connection dropped mid-body fails here, and counts as a transport failure.
        text = await res.text();
      } catch (err) {
        lastError = err;
        continue;
      }
      return { status: res.status, ok: res.ok, body: parseJson(text), text };
    }
    // Never echo the URL: it carries the token and, for exchanges, the app secret.
    throw new NetworkError(
      `Request to ${endpoint} failed: ${errorMessage(lastError)}`,
      `${base}/${endpoint}`,
      lastError,
    );
  };
}

export const GraphErrorSchema = z.object({
  error: z.object({
    message: z.string(),
    type: z.string().optional(),
    code: z.number().optional(),
    error_subcode: z.number().optional(),
  }),
});

export type GraphError = z.infer<typeof GraphErrorSchema>["error"];

export function extractGraphError(body: unknown): GraphError | undefined {
  const parsed = GraphErrorSchema.safeParse(body);
  return parsed.success ? parsed.data.error : undefined;
}

/**
 * Validates a response against a schema, turning non-2xx and shape mismatches
 * into UpstreamApiError with the raw body attached.
 */
export function expectOk<T>(res: GraphResponse, schema: z.ZodType<T, z.ZodTypeDef, unknown>, what: string): T {
  if (!res.ok) {
    const err = extractGraphError(res.body);
    throw new UpstreamApiError(
      `${what} failed (${res.status}): ${err?.message ?? res.text}`,
      res.status,
      res.text,
      err?.code,
      err?.error_subcode,
    );
  }
  const parsed = schema.safeParse(res.body);
  if (!parsed.success) {
    throw new UpstreamApiError(`${what} returned an unexpected response`, res.status, res.text);
  }
  return parsed.data;
}
