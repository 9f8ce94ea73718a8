import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ReportStore } from "../reports/store.js";
import { configShowCommand, reportsListCommand, reportsShowCommand } from "./reports.js";
import { classifyDocument } from "./classify.js";
import { createCapturingRuntime, IDLE_INSTANCE, makeTempDir, writeConfigFile } from "./test-helpers.js";
import { DEFAULT_THRESHOLDS } from "../optimizer/types.js";

let dir: string;

beforeEach(async () => {
  dir = await makeTempDir();
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe("reportsListCommand", () => {
  it("reports an empty directory", async () => {
    const { runtime, logs } = createCapturingRuntime();

    const names = await reportsListCommand({ dir }, runtime);

    expect(names).toEqual([]);
    expect(logs).toEqual([`No reports in ${dir}`]);
  });

  it("finds the report directory through the config", async () => {
    const reportDir = path.join(dir, "reports");
    const configPath = await writeConfigFile(dir, { reportDir });
    const doc = classifyDocument([IDLE_INSTANCE], DEFAULT_THRESHOLDS, new Date("2026-03-01T12:00:00Z"));
    await new ReportStore(reportDir).save(doc);
    const { runtime, logs } = createCapturingRuntime();

    await reportsListCommand({ configPath }, runtime);

    expect(logs).toEqual(["optimization_report_20260301_120000.json"]);
  });
});

describe("reportsShowCommand", () => {
  it("prints a saved report as JSON", async () => {
    const doc = classifyDocument([IDLE_INSTANCE], DEFAULT_THRESHOLDS, new Date("2026-03-01T12:00:00Z"));
    await new ReportStore(dir).save(doc, "r.json");
    const { runtime, logs } = createCapturingRuntime();

    await reportsShowCommand("r.json", { dir, json: true }, runtime);

    expect(JSON.parse(logs[0])).toEqual(doc);
  });
});

describe("configShowCommand", () => {
  it("prints the config path and masks the access token", async () => {
    const configPath = await writeConfigFile(dir, {
      providers: { gcp: { enabled: true, projectId: "demo-project", accessToken: "test-secret" } },
    });
    const { runtime, logs } = createCapturingRuntime();

    configShowCommand({ configPath }, runtime);

    expect(logs[0]).toBe(`# ${configPath}`);
    const shown = JSON.parse(logs[1]);
    expect(shown.providers.gcp).toEqual({ enabled: true, projectId: "demo-project", accessToken: "***" });
  });
});
