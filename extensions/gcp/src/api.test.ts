import { describe, it, expect, vi, beforeEach } from "vitest";
import { z } from "zod";

import { GcpApiError, gcpAggregatedList, gcpList, gcpMutate, gcpRequest, shortName } from "./api.js";

// ---------------------------------------------------------------------------
// Mock fetch
// ---------------------------------------------------------------------------

const mockFetch = vi.fn<typeof fetch>();

beforeEach(() => {
  vi.stubGlobal("fetch", mockFetch);
  mockFetch.mockReset();
});

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function requestedUrl(call: number): string {
  return String(mockFetch.mock.calls[call][0]);
}

const idSchema = z.object({ id: z.string() });
const anySchema = z.record(z.unknown());

// ===========================================================================
// gcpRequest
// ===========================================================================

describe("gcpRequest", () => {
  it("sends a GET with bearer token by default", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ id: "abc" }));

    const result = await gcpRequest("https://compute.googleapis.com/v1/x", "test-token", idSchema);

    expect(result).toEqual({ id: "abc" });
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe("https://compute.googleapis.com/v1/x");
    expect(init?.method).toBe("GET");
    expect(init?.headers).toMatchObject({
      Authorization: "Bearer test-token",
      "Content-Type": "application/json",
    });
    expect(init?.body).toBeUndefined();
  });

  it("sends a POST with JSON body", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({}));

    await gcpRequest("https://example.com/api", "test-token", anySchema, { method: "POST", body: { a: 1 } });

    const [, init] = mockFetch.mock.calls[0];
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe('{"a":1}');
  });

  it("throws GcpApiError with details on non-ok response", async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({ error: { message: "Permission denied", status: "PERMISSION_DENIED" } }, 403),
    );

    const error = await gcpRequest("https://example.com/x", "test-token", anySchema).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GcpApiError);
    if (error instanceof GcpApiError) {
      expect(error.message).toBe("Permission denied");
      expect(error.statusCode).toBe(403);
      expect(error.code).toBe("PERMISSION_DENIED");
    }
  });

  it("falls back to a generic message when the error body is missing", async () => {
    mockFetch.mockResolvedValueOnce(new Response("not json", { status: 500 }));

    await expect(gcpRequest("https://example.com/x", "test-token", anySchema)).rejects.toThrow(
      "GCP API error: HTTP 500",
    );
  });

  it("validates an empty 204 response as an empty object", async () => {
    mockFetch.mockResolvedValueOnce(new Response(null, { status: 204 }));

    const result = await gcpRequest("https://example.com/x", "test-token", z.object({ name: z.string().optional() }));

    expect(result).toEqual({});
  });

  it("rejects bodies that do not match the schema", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ id: 42 }));

    await expect(gcpRequest("https://example.com/x", "test-token", idSchema)).rejects.toBeInstanceOf(z.ZodError);
  });

  it("aborts when the timeout elapses", async () => {
    mockFetch.mockImplementationOnce(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        }),
    );

    await expect(gcpRequest("https://example.com/slow", "test-token", anySchema, { timeout: 10 })).rejects.toThrow(
      "aborted",
    );
  });
  it("does not send when the caller signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort(new Error("cycle gave up"));

    await expect(
      gcpRequest("https://example.com/x", "test-token", anySchema, { signal: controller.signal }),
    ).rejects.toThrow("cycle gave up");
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it("aborts the in-flight request when the caller signal fires", async () => {
    const controller = new AbortController();
    mockFetch.mockImplementationOnce(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(init?.signal?.reason));
          controller.abort(new Error("cycle gave up"));
        }),
    );

    await expect(
      gcpRequest("https://example.com/slow", "test-token", anySchema, { signal: controller.signal }),
    ).rejects.toThrow("cycle gave up");
  });
});

// ===========================================================================
// gcpList
// ===========================================================================

describe("gcpList", () => {
  it("paginates across pages using nextPageToken", async () => {
    mockFetch
      .mockResolvedValueOnce(jsonResponse({ items: [{ id: "a" }], nextPageToken: "p2" }))
      .mockResolvedValueOnce(jsonResponse({ items: [{ id: "b" }] }));

    const items = await gcpList("https://example.com/list", "test-token", "items", idSchema);

    expect(items).toEqual([{ id: "a" }, { id: "b" }]);
    expect(requestedUrl(1)).toBe("https://example.com/list?pageToken=p2");
  });

  it("uses & when the URL already has query params", async () => {
    mockFetch
      .mockResolvedValueOnce(jsonResponse({ items: [], nextPageToken: "next" }))
      .mockResolvedValueOnce(jsonResponse({ items: [] }));

    await gcpList("https://example.com/list?filter=x", "test-token", "items", idSchema);

    expect(requestedUrl(1)).toBe("https://example.com/list?filter=x&pageToken=next");
  });

  it("returns an empty array when the list key is absent", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({}));

    expect(await gcpList("https://example.com/list", "test-token", "items", idSchema)).toEqual([]);
  });

  it("stops at maxPages", async () => {
    mockFetch.mockImplementation(async () => jsonResponse({ items: [{ id: "x" }], nextPageToken: "more" }));

    const items = await gcpList("https://example.com/list", "test-token", "items", idSchema, { maxPages: 3 });

    expect(items).toHaveLength(3);
    expect(mockFetch).toHaveBeenCalledTimes(3);
  });
});

// ===========================================================================
// gcpAggregatedList
// ===========================================================================

describe("gcpAggregatedList", () => {
  it("collects items from every scope and skips scopes without the key", async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({
        items: {
          "zones/us-central1-a": { instances: [{ id: "1" }] },
          "zones/us-east1-b": { warning: { code: "NO_RESULTS_ON_PAGE" } },
          "zones/europe-west1-b": { instances: [{ id: "2" }, { id: "3" }] },
        },
      }),
    );

    const items = await gcpAggregatedList("https://example.com/agg", "test-token", "instances", idSchema);

    expect(items).toEqual([{ id: "1" }, { id: "2" }, { id: "3" }]);
  });

  it("paginates aggregated results", async () => {
    mockFetch
      .mockResolvedValueOnce(jsonResponse({ items: { "zones/a": { disks: [{ id: "d1" }] } }, nextPageToken: "t" }))
      .mockResolvedValueOnce(jsonResponse({ items: { "zones/b": { disks: [{ id: "d2" }] } } }));

    const items = await gcpAggregatedList("https://example.com/agg", "test-token", "disks", idSchema);

    expect(items).toEqual([{ id: "d1" }, { id: "d2" }]);
    expect(requestedUrl(1)).toBe("https://example.com/agg?pageToken=t");
  });
});

// ===========================================================================
// shortName / gcpMutate
// ===========================================================================

describe("shortName", () => {
  it("extracts the last segment of a resource path", () => {
    expect(shortName("projects/p/zones/us-central1-a/machineTypes/e2-medium")).toBe("e2-medium");
  });

  it("returns the input when there are no slashes", () => {
    expect(shortName("e2-micro")).toBe("e2-micro");
  });
});

describe("gcpMutate", () => {
  it("reports the operation id", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ name: "operation-123" }));

    const result = await gcpMutate("https://example.com/stop", "test-token");

    expect(result).toEqual({ message: "Operation operation-123 initiated", operationId: "operation-123" });
    expect(mockFetch.mock.calls[0][1]?.method).toBe("POST");
  });

  it("supports DELETE", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({}));

    const result = await gcpMutate("https://example.com/disk", "test-token", { method: "DELETE" });

    expect(result.message).toBe("Operation initiated");
    expect(mockFetch.mock.calls[0][1]?.method).toBe("DELETE");
  });
});
