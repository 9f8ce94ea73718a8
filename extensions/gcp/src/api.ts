/**
 * GCP REST helpers: authenticated `fetch` with Bearer tokens, responses
 * validated with zod.
 */

import { z } from "zod";

export class GcpApiError extends Error {
  readonly statusCode: number;
  readonly code: string;

  constructor(message: string, statusCode: number, code: string) {
    super(message);
    this.name = "GcpApiError";
    this.statusCode = statusCode;
    this.code = code;
  }
}

export type GcpRequestOptions = {
  method?: string;
  body?: unknown;
  headers?: Record<string, string>;
  /** Abort the request after this many ms (default 30s). */
  timeout?: number;
  /** Caller-side cancellation; aborts the in-flight request too. */
  signal?: AbortSignal;
};

type ListOptions = Pick<GcpRequestOptions, "timeout" | "signal">;

const errorBodySchema = z.object({
  error: z
    .object({
      message: z.string().optional(),
      status: z.string().optional(),
      code: z.union([z.string(), z.number()]).optional(),
    })
    .optional(),
});

async function readError(res: Response): Promise<GcpApiError> {
  const raw: unknown = await res.json().catch(() => ({}));
  const parsed = errorBodySchema.safeParse(raw);
  const detail = parsed.success ? parsed.data.error : undefined;
  return new GcpApiError(
    detail?.message ?? `GCP API error: HTTP ${res.status}`,
    res.status,
    String(detail?.status ?? detail?.code ?? ""),
  );
}

/**
 * Make an authenticated request and validate the JSON body against `schema`.
 * Empty (204) responses are validated as `{}`.
 */
export async function gcpRequest<T>(
  url: string,
  token: string,
  schema: z.ZodType<T>,
  opts?: GcpRequestOptions,
): Promise<T> {
  const outer = opts?.signal;
  outer?.throwIfAborted();
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), opts?.timeout ?? 30_000);
  const forward = () => controller.abort(outer?.reason);
  outer?.addEventListener("abort", forward, { once: true });

  try {
    const res = await fetch(url, {
      method: opts?.method ?? "GET",
      headers: {
        Authorization: `Bearer ${token}`,
        "Content-Type": "application/json",
        Accept: "application/json",
        ...opts?.headers,
      },
      body: opts?.body === undefined ? undefined : JSON.stringify(opts.body),
      signal: controller.signal,
    });

    if (!res.ok) throw await readError(res);

    if (res.status === 204 || res.headers.get("content-length") === "0") {
      return schema.parse({});
    }
    const body: unknown = await res.json();
    return schema.parse(body);
  } finally {
    clearTimeout(timer);
    outer?.removeEventListener("abort", forward);
  }
}

function withPageToken(url: string, pageToken: string | undefined): string {
  if (!pageToken) return url;
  const separator = url.includes("?") ? "&" : "?";
  return `${url}${separator}pageToken=${encodeURIComponent(pageToken)}`;
}

const aggregatedPageSchema = z.object({
  items: z.record(z.record(z.unknown())).optional(),
  nextPageToken: z.string().optional(),
});

/**
 * Fetch every item from a Compute Engine aggregated list, e.g.
 * `{ items: { "zones/us-central1-a": { instances: [...] } } }`.
 */
export async function gcpAggregatedList<T>(
  url: string,
  token: string,
  itemKey: string,
  itemSchema: z.ZodType<T>,
  opts?: ListOptions,
): Promise<T[]> {
  const results: T[] = [];
  const itemsSchema = z.array(itemSchema);
  let pageToken: string | undefined;

  do {
    const page = await gcpRequest(withPageToken(url, pageToken), token, aggregatedPageSchema, {
      timeout: opts?.timeout,
      signal: opts?.signal,
    });
    for (const scope of Object.values(page.items ?? {})) {
      results.push(...itemsSchema.parse(scope[itemKey] ?? []));
    }
    pageToken = page.nextPageToken;
  } while (pageToken);

  return results;
}

/**
 * Fetch all pages of a list API whose items sit under `listKey`.
 */
export async function gcpList<T>(
  url: string,
  token: string,
  listKey: string,
  itemSchema: z.ZodType<T>,
  opts?: ListOptions & { maxPages?: number },
): Promise<T[]> {
  const pageSchema = z.record(z.unknown());
  const itemsSchema = z.array(itemSchema);
  const maxPages = opts?.maxPages ?? 50;
  const results: T[] = [];
  let pageToken: string | undefined;
  let page = 0;

  do {
    const data = await gcpRequest(withPageToken(url, pageToken), token, pageSchema, {
      timeout: opts?.timeout,
      signal: opts?.signal,
    });
    results.push(...itemsSchema.parse(data[listKey] ?? []));
    const next = data.nextPageToken;
    pageToken = typeof next === "string" && next.length > 0 ? next : undefined;
    page++;
  } while (pageToken && page < maxPages);

  return results;
}

/**
 * Short name from a self-link or resource path:
 * ".../zones/us-central1-a/machineTypes/e2-medium" → "e2-medium".
 */
export function shortName(fullPath: string): string {
  return fullPath.split("/").pop() ?? fullPath;
}

const operationSchema = z.object({ name: z.string().optional() });

/** Start a long-running mutation and report the operation id. */
export async function gcpMutate(
  url: string,
  token: string,
  opts: { method?: "POST" | "DELETE"; body?: unknown; timeout?: number } = {},
): Promise<{ message: string; operationId?: string }> {
  const data = await gcpRequest(url, token, operationSchema, {
    method: opts.method ?? "POST",
    body: opts.body,
    timeout: opts.timeout,
  });
  return {
    message: data.name ? `Operation ${data.name} initiated` : "Operation initiated",
    operationId: data.name,
  };
}
