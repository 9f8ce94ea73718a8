/**
 * Resource classifier — decides whether one resource sample is underutilized
 * and what stopping it would save per month.
 *
 * Compute-like kinds (COMPUTE, DATABASE) are judged on CPU / memory averages;
 * storage kinds (BLOCK_STORAGE, OBJECT_STORE) only on whether anything is
 * attached to them. A metric that is absent never counts as "low".
 */

import { z } from "zod";
import { ValidationError, type ValidationIssue } from "./errors.js";
import {
  CLOUD_PROVIDERS,
  RESOURCE_KINDS,
  type ClassificationResult,
  type ResourceKind,
  type ResourceSample,
  type Thresholds,
  type UnderutilizationReason,
} from "./types.js";

/** Average hours per month used for every savings estimate. */
export const HOURS_PER_MONTH = 730;

// ── Schemas ─────────────────────────────────────────────────────────────────────

const percentSchema = z.number().min(0).max(100);

export const resourceSampleSchema = z.object({
  resourceId: z.string().min(1),
  provider: z.enum(CLOUD_PROVIDERS),
  kind: z.enum(RESOURCE_KINDS),
  avgCpuPercent: percentSchema.optional(),
  avgMemoryPercent: percentSchema.optional(),
  hourlyCost: z.number().finite().nonnegative(),
  isAttachedOrRunning: z.boolean(),
  observationWindowHours: z.number().int().positive(),
  name: z.string().optional(),
  location: z.string().optional(),
  attributes: z.record(z.string()).optional(),
});

const thresholdPercentSchema = z.number().gt(0).max(100);

export const thresholdsSchema = z.object({
  cpuThresholdPercent: thresholdPercentSchema,
  memoryThresholdPercent: thresholdPercentSchema,
});

function toIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

function peekResourceId(input: unknown): string | undefined {
  if (input === null || typeof input !== "object" || !("resourceId" in input)) return undefined;
  const id = input.resourceId;
  return typeof id === "string" && id.length > 0 ? id : undefined;
}

// ── Validation ──────────────────────────────────────────────────────────────────

/**
 * Check a value against the ResourceSample invariants.
 * @throws ValidationError listing every violated field.
 */
export function validateSample(input: unknown): ResourceSample {
  const parsed = resourceSampleSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(toIssues(parsed.error), peekResourceId(input));
  }
  return parsed.data;
}

/** @throws ValidationError when a threshold is outside (0, 100]. */
export function validateThresholds(input: unknown): Thresholds {
  const parsed = thresholdsSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(toIssues(parsed.error));
  }
  return parsed.data;
}

// ── Classification ──────────────────────────────────────────────────────────────

function isStorageKind(kind: ResourceKind): boolean {
  return kind === "BLOCK_STORAGE" || kind === "OBJECT_STORE";
}

function usageReason(sample: ResourceSample, thresholds: Thresholds): UnderutilizationReason {
  if (!sample.isAttachedOrRunning) return "NONE";

  const lowCpu =
    sample.avgCpuPercent !== undefined && sample.avgCpuPercent < thresholds.cpuThresholdPercent;
  const lowMemory =
    sample.avgMemoryPercent !== undefined &&
    sample.avgMemoryPercent < thresholds.memoryThresholdPercent;

  if (lowCpu && lowMemory) return "LOW_CPU_AND_MEMORY";
  if (lowCpu) return "LOW_CPU";
  if (lowMemory) return "LOW_MEMORY";
  return "NONE";
}

/**
 * Classify a single sample against the given thresholds.
 *
 * Pure: identical arguments always produce an identical (frozen) result.
 * @throws ValidationError when the sample or thresholds are malformed.
 */
export function classify(sample: ResourceSample, thresholds: Thresholds): ClassificationResult {
  const valid = validateSample(sample);
  const limits = validateThresholds(thresholds);

  const reason: UnderutilizationReason = isStorageKind(valid.kind)
    ? valid.isAttachedOrRunning
      ? "NONE"
      : "UNUSED_STORAGE"
    : usageReason(valid, limits);

  const underutilized = reason !== "NONE";

  return Object.freeze({
    resourceId: valid.resourceId,
    provider: valid.provider,
    kind: valid.kind,
    underutilized,
    reason,
    estimatedMonthlySaving: underutilized ? valid.hourlyCost * HOURS_PER_MONTH : 0,
  });
}
