/**
 * Report store — timestamped JSON report files in a directory.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { CLOUD_PROVIDERS, RESOURCE_KINDS } from "../optimizer/types.js";
import { reportFileName, type ReportDocument } from "./serialize.js";

const REPORT_FILE_PATTERN = /^optimization_report_\d{8}_\d{6}\.json$/;

const provider = z.enum(CLOUD_PROVIDERS);
const kind = z.enum(RESOURCE_KINDS);

const reportDocumentSchema = z.object({
  timestamp: z.string(),
  per_provider_results: z.record(
    provider,
    z.array(
      z.object({
        resource_id: z.string(),
        provider,
        kind,
        underutilized: z.boolean(),
        reason: z.enum(["LOW_CPU", "LOW_MEMORY", "LOW_CPU_AND_MEMORY", "UNUSED_STORAGE", "NONE"]),
        estimated_monthly_saving: z.number(),
      }),
    ),
  ),
  estimated_monthly_savings_total: z.number(),
  recommendations: z.array(z.string()),
  skipped_resources: z.array(z.object({ resource_id: z.string(), provider: provider.nullable(), reason: z.string() })),
  failed_providers: z.array(z.object({ provider, error: z.string() })),
  actions: z
    .array(
      z.object({
        resource_id: z.string(),
        provider,
        kind,
        action: z.enum(["stop", "delete", "none"]),
        status: z.enum(["applied", "skipped", "failed", "dry-run"]),
        message: z.string(),
      }),
    )
    .optional(),
  advisories: z.array(z.string()).optional(),
});

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class ReportStore {
  private readonly dir: string;

  constructor(dir: string) {
    this.dir = dir;
  }

  get directory(): string {
    return this.dir;
  }

  /**
   * Write a report as pretty-printed JSON. Without a file name the report's
   * own timestamp names the file. Returns the absolute path written.
   */
  async save(doc: ReportDocument, fileName?: string): Promise<string> {
    const name = fileName ?? reportFileName(new Date(doc.timestamp));
    const target = path.isAbsolute(name) ? name : path.join(this.dir, name);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, `${JSON.stringify(doc, null, 2)}\n`, "utf-8");
    return path.resolve(target);
  }

  /** Saved report file names, newest first. */
  async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.dir);
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }
    return entries.filter((name) => REPORT_FILE_PATTERN.test(name)).sort().reverse();
  }

  /** @throws when the file is missing or is not a report document. */
  async load(name: string): Promise<ReportDocument> {
    const file = path.join(this.dir, path.basename(name));
    const parsed = reportDocumentSchema.safeParse(JSON.parse(await fs.readFile(file, "utf-8")));
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new Error(`${file} is not an optimization report: ${issue.path.join(".")}: ${issue.message}`);
    }
    return parsed.data;
  }
}
