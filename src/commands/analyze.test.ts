import fs from "node:fs/promises";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { setLogSink } from "../logging/subsystem.js";
import type { ReportDocument } from "../reports/serialize.js";
import { analyzeCommand, formatReportSummary } from "./analyze.js";
import { createCommandContext } from "./context.js";
import {
  createCapturingRuntime,
  IDLE_INSTANCE,
  makeFakeAwsPlugin,
  makeTempDir,
  writeConfigFile,
} from "./test-helpers.js";

const emptyDoc: ReportDocument = {
  timestamp: "2026-03-01T12:00:00.000Z",
  per_provider_results: {},
  estimated_monthly_savings_total: 0,
  recommendations: [],
  skipped_resources: [],
  failed_providers: [],
};

describe("formatReportSummary", () => {
  it("summarizes an empty report", () => {
    expect(formatReportSummary(emptyDoc)).toEqual([
      "Report: 2026-03-01T12:00:00.000Z",
      "Resources classified: 0",
      "Estimated monthly savings: $0.00",
      "",
      "No underutilized resources found.",
    ]);
  });

  it("lists advisories after the recommendations", () => {
    expect(
      formatReportSummary({ ...emptyDoc, advisories: ["Add lifecycle rules to AWS OBJECT_STORE logs"] }).slice(3),
    ).toEqual([
      "",
      "No underutilized resources found.",
      "",
      "Advisories:",
      "  - Add lifecycle rules to AWS OBJECT_STORE logs",
    ]);
  });

  it("lists recommendations, skipped samples, failures and actions", () => {
    const lines = formatReportSummary({
      ...emptyDoc,
      per_provider_results: {
        AWS: [
          {
            resource_id: "i-1",
            provider: "AWS",
            kind: "COMPUTE",
            underutilized: true,
            reason: "LOW_CPU",
            estimated_monthly_saving: 146,
          },
        ],
      },
      estimated_monthly_savings_total: 146,
      recommendations: ["Consider stopping AWS COMPUTE i-1 (estimated saving $146.00/month)"],
      skipped_resources: [{ resource_id: "#1", provider: null, reason: "Invalid input: resourceId: Required" }],
      failed_providers: [{ provider: "AZURE", error: "AuthorizationFailed" }],
      actions: [
        { resource_id: "i-1", provider: "AWS", kind: "COMPUTE", action: "stop", status: "dry-run", message: "Would stop AWS COMPUTE i-1" },
      ],
    });

    expect(lines).toEqual([
      "Report: 2026-03-01T12:00:00.000Z",
      "Resources classified: 1",
      "Estimated monthly savings: $146.00",
      "",
      "Recommendations:",
      "  - Consider stopping AWS COMPUTE i-1 (estimated saving $146.00/month)",
      "",
      "Skipped 1 invalid sample(s):",
      "  - #1: Invalid input: resourceId: Required",
      "",
      "Provider failures:",
      "  - AZURE: AuthorizationFailed",
      "",
      "Actions:",
      "  - [DRY-RUN] stop AWS i-1: Would stop AWS COMPUTE i-1",
    ]);
  });
});

describe("analyzeCommand", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    setLogSink(() => {});
  });

  afterEach(async () => {
    setLogSink();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("prints the report as JSON", async () => {
    const configPath = await writeConfigFile(dir, { reportDir: dir, providers: { aws: { enabled: true } } });
    const ctx = createCommandContext({ env: {}, configPath, plugins: [makeFakeAwsPlugin([IDLE_INSTANCE])] });
    const { runtime, logs } = createCapturingRuntime();

    const doc = await analyzeCommand({ json: true, save: false }, runtime, ctx);

    expect(logs).toHaveLength(1);
    expect(JSON.parse(logs[0])).toEqual(doc);
    expect(doc.recommendations).toEqual(["Consider stopping AWS COMPUTE i-idle (estimated saving $73.00/month)"]);
  });

  it("prints the summary and the saved path", async () => {
    const configPath = await writeConfigFile(dir, { reportDir: dir, providers: { aws: { enabled: true } } });
    const ctx = createCommandContext({ env: {}, configPath, plugins: [makeFakeAwsPlugin([IDLE_INSTANCE])] });
    const { runtime, logs } = createCapturingRuntime();

    await analyzeCommand({ output: "latest.json" }, runtime, ctx);

    expect(logs[0]).toMatch(/^Report: /);
    expect(logs.at(-1)).toBe(`\nSaved: ${dir}/latest.json`);
  });
});
