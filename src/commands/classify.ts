/**
 * Offline classification of samples read from a JSON file: no provider calls.
 */

import fs from "node:fs/promises";
import { validateThresholds } from "../optimizer/classifier.js";
import { classifyAll } from "../optimizer/cycle.js";
import { lifecycleAdvisories } from "../optimizer/advisories.js";
import { aggregate } from "../optimizer/aggregator.js";
import { DEFAULT_THRESHOLDS, type Thresholds } from "../optimizer/types.js";
import { serializeReport, type ReportDocument } from "../reports/serialize.js";
import type { RuntimeEnv } from "../runtime.js";
import { formatReportSummary } from "./analyze.js";

export type ClassifyCommandOptions = {
  file: string;
  cpuThreshold?: number;
  memoryThreshold?: number;
  json?: boolean;
  now?: Date;
};

/** Accepts either a bare array of samples or `{ "samples": [...] }`. */
export function extractSamples(raw: unknown): unknown[] {
  if (Array.isArray(raw)) return raw;
  if (raw !== null && typeof raw === "object" && "samples" in raw && Array.isArray(raw.samples)) {
    return raw.samples;
  }
  throw new Error('Expected a JSON array of samples or an object with a "samples" array');
}

export function classifyDocument(raw: unknown, thresholds: Thresholds, now: Date): ReportDocument {
  const { results, samples, skipped } = classifyAll(extractSamples(raw), validateThresholds(thresholds));
  return serializeReport({ report: aggregate(results, now), skipped, advisories: lifecycleAdvisories(samples) });
}

export async function classifyCommand(opts: ClassifyCommandOptions, runtime: RuntimeEnv): Promise<ReportDocument> {
  const raw: unknown = JSON.parse(await fs.readFile(opts.file, "utf-8"));
  const thresholds: Thresholds = {
    cpuThresholdPercent: opts.cpuThreshold ?? DEFAULT_THRESHOLDS.cpuThresholdPercent,
    memoryThresholdPercent: opts.memoryThreshold ?? DEFAULT_THRESHOLDS.memoryThresholdPercent,
  };
  const doc = classifyDocument(raw, thresholds, opts.now ?? new Date());

  if (opts.json) runtime.log(JSON.stringify(doc, null, 2));
  else for (const line of formatReportSummary(doc)) runtime.log(line);
  return doc;
}
