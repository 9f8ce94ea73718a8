import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { DEFAULT_THRESHOLDS } from "../optimizer/types.js";
import { classifyCommand, classifyDocument, extractSamples } from "./classify.js";
import { BUSY_INSTANCE, createCapturingRuntime, IDLE_INSTANCE, makeTempDir } from "./test-helpers.js";

const NOW = new Date("2026-03-01T12:00:00Z");

describe("extractSamples", () => {
  it("accepts a bare array or a samples wrapper", () => {
    expect(extractSamples([1, 2])).toEqual([1, 2]);
    expect(extractSamples({ samples: [3] })).toEqual([3]);
  });

  it("rejects anything else", () => {
    expect(() => extractSamples({ items: [] })).toThrow(
      'Expected a JSON array of samples or an object with a "samples" array',
    );
  });
});

describe("classifyDocument", () => {
  it("classifies valid samples and lists invalid ones", () => {
    const doc = classifyDocument([IDLE_INSTANCE, { provider: "AWS" }], DEFAULT_THRESHOLDS, NOW);

    expect(doc.timestamp).toBe("2026-03-01T12:00:00.000Z");
    expect(doc.estimated_monthly_savings_total).toBe(73);
    expect(doc.skipped_resources).toHaveLength(1);
    expect(doc.skipped_resources[0]).toMatchObject({ resource_id: "#1", provider: "AWS" });
  });

  it("advises lifecycle rules for buckets without them", () => {
    const bucket = {
      resourceId: "logs",
      provider: "AWS",
      kind: "OBJECT_STORE",
      hourlyCost: 0.001,
      isAttachedOrRunning: true,
      observationWindowHours: 24,
      attributes: { objectCount: "12", hasLifecycle: "false" },
    };

    const doc = classifyDocument([bucket], DEFAULT_THRESHOLDS, NOW);

    expect(doc.advisories).toEqual(["Add lifecycle rules to AWS OBJECT_STORE logs"]);
    expect(doc.recommendations).toEqual([]);
  });

  it("validates thresholds", () => {
    expect(() =>
      classifyDocument([], { cpuThresholdPercent: 101, memoryThresholdPercent: 15 }, NOW),
    ).toThrow("Invalid input: cpuThresholdPercent: Number must be less than or equal to 100");
  });
});

describe("classifyCommand", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("applies thresholds from the options", async () => {
    const file = path.join(dir, "samples.json");
    await fs.writeFile(file, JSON.stringify({ samples: [IDLE_INSTANCE, BUSY_INSTANCE] }));
    const { runtime, logs } = createCapturingRuntime();

    const doc = await classifyCommand({ file, cpuThreshold: 80, json: true, now: NOW }, runtime);

    expect(doc.recommendations).toEqual([
      "Consider stopping AWS COMPUTE i-busy (estimated saving $73.00/month)",
      "Consider stopping AWS COMPUTE i-idle (estimated saving $73.00/month)",
    ]);
    expect(JSON.parse(logs[0])).toEqual(doc);
  });

  it("prints a summary by default", async () => {
    const file = path.join(dir, "samples.json");
    await fs.writeFile(file, JSON.stringify([BUSY_INSTANCE]));
    const { runtime, logs } = createCapturingRuntime();

    await classifyCommand({ file, now: NOW }, runtime);

    expect(logs).toEqual([
      "Report: 2026-03-01T12:00:00.000Z",
      "Resources classified: 1",
      "Estimated monthly savings: $0.00",
      "",
      "No underutilized resources found.",
    ]);
  });
});
