import { describe, it, expect } from "vitest";

import { aggregate, compareBySaving, formatRecommendation, groupByProvider } from "./aggregator.js";
import type { ClassificationResult } from "./types.js";

const AT = new Date("2026-03-01T12:00:00Z");

function makeResult(overrides: Partial<ClassificationResult> = {}): ClassificationResult {
  return {
    resourceId: "i-1",
    provider: "AWS",
    kind: "COMPUTE",
    underutilized: true,
    reason: "LOW_CPU",
    estimatedMonthlySaving: 100,
    ...overrides,
  };
}

describe("formatRecommendation", () => {
  it("names the provider, kind, resource and the monthly saving", () => {
    expect(formatRecommendation(makeResult({ estimatedMonthlySaving: 146 }))).toBe(
      "Consider stopping AWS COMPUTE i-1 (estimated saving $146.00/month)",
    );
  });

  it("rounds the amount to cents", () => {
    expect(formatRecommendation(makeResult({ resourceId: "vol-9", kind: "BLOCK_STORAGE", estimatedMonthlySaving: 36.456 }))).toBe(
      "Consider stopping AWS BLOCK_STORAGE vol-9 (estimated saving $36.46/month)",
    );
  });
});

describe("groupByProvider", () => {
  it("orders groups AWS, AZURE, GCP and keeps input order inside each", () => {
    const groups = groupByProvider([
      makeResult({ resourceId: "g-1", provider: "GCP" }),
      makeResult({ resourceId: "a-2" }),
      makeResult({ resourceId: "z-1", provider: "AZURE" }),
      makeResult({ resourceId: "a-1" }),
    ]);

    expect([...groups.keys()]).toEqual(["AWS", "AZURE", "GCP"]);
    expect(groups.get("AWS")?.map((r) => r.resourceId)).toEqual(["a-2", "a-1"]);
  });
});

describe("aggregate", () => {
  it("orders recommendations by saving, largest first", () => {
    const report = aggregate(
      [
        makeResult({ resourceId: "small", estimatedMonthlySaving: 50 }),
        makeResult({ resourceId: "big", provider: "GCP", estimatedMonthlySaving: 100 }),
      ],
      AT,
    );

    expect(report.recommendations).toEqual([
      "Consider stopping GCP COMPUTE big (estimated saving $100.00/month)",
      "Consider stopping AWS COMPUTE small (estimated saving $50.00/month)",
    ]);
    expect(report.estimatedMonthlySavingsTotal).toBe(150);
  });

  it("breaks saving ties by resource id", () => {
    const report = aggregate(
      [makeResult({ resourceId: "b" }), makeResult({ resourceId: "a" }), makeResult({ resourceId: "c" })],
      AT,
    );

    expect(report.recommendations.map((r) => r.split(" ")[4])).toEqual(["a", "b", "c"]);
  });

  it("produces the same report for any permutation of its input", () => {
    const results = [
      makeResult({ resourceId: "i-1", estimatedMonthlySaving: 146 }),
      makeResult({ resourceId: "vol-1", kind: "BLOCK_STORAGE", reason: "UNUSED_STORAGE", estimatedMonthlySaving: 36.5 }),
      makeResult({ resourceId: "vm-1", provider: "AZURE", estimatedMonthlySaving: 30.37 }),
      makeResult({ resourceId: "busy", underutilized: false, reason: "NONE", estimatedMonthlySaving: 0 }),
    ];
    const reversed = [...results].reverse();

    const a = aggregate(results, AT);
    const b = aggregate(reversed, AT);

    expect(b.recommendations).toEqual(a.recommendations);
    expect(b.estimatedMonthlySavingsTotal).toBe(a.estimatedMonthlySavingsTotal);
  });

  it("totals only underutilized results", () => {
    const report = aggregate(
      [
        makeResult({ resourceId: "i-1", estimatedMonthlySaving: 146 }),
        makeResult({ resourceId: "i-2", underutilized: false, reason: "NONE", estimatedMonthlySaving: 0 }),
        makeResult({ resourceId: "vol-1", kind: "BLOCK_STORAGE", reason: "UNUSED_STORAGE", estimatedMonthlySaving: 36.5 }),
      ],
      AT,
    );

    expect(report.estimatedMonthlySavingsTotal).toBe(182.5);
    expect(report.recommendations).toHaveLength(2);
    expect(report.perProviderResults.AWS).toHaveLength(3);
  });

  it("omits providers that produced no results", () => {
    const report = aggregate([makeResult({ provider: "AZURE" })], AT);

    expect(Object.keys(report.perProviderResults)).toEqual(["AZURE"]);
  });

  it("builds an empty report for no input", () => {
    const report = aggregate([], AT);

    expect(report).toEqual({
      timestamp: "2026-03-01T12:00:00.000Z",
      perProviderResults: {},
      estimatedMonthlySavingsTotal: 0,
      recommendations: [],
    });
  });

  it("keeps a string timestamp as given", () => {
    expect(aggregate([], "2026-01-01T00:00:00Z").timestamp).toBe("2026-01-01T00:00:00Z");
  });

  it("freezes the report", () => {
    const report = aggregate([makeResult()], AT);

    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.recommendations)).toBe(true);
  });
});

describe("compareBySaving", () => {
  it("is zero only for identical saving, id, provider and kind", () => {
    expect(compareBySaving(makeResult(), makeResult())).toBe(0);
    expect(compareBySaving(makeResult({ estimatedMonthlySaving: 1 }), makeResult({ estimatedMonthlySaving: 2 }))).toBe(1);
  });

  it("breaks ties on kind when saving and id match", () => {
    const compute = makeResult({ resourceId: "shared", kind: "COMPUTE" });
    const volume = makeResult({ resourceId: "shared", kind: "BLOCK_STORAGE", reason: "UNUSED_STORAGE" });

    expect(compareBySaving(volume, compute)).toBe(-1);
    expect(compareBySaving(compute, volume)).toBe(1);
  });

  it("breaks ties on provider before kind", () => {
    expect(compareBySaving(makeResult({ provider: "GCP" }), makeResult({ provider: "AZURE" }))).toBe(1);
  });
});

describe("recommendation order with colliding ids", () => {
  it("does not depend on input order", () => {
    const compute = makeResult({ resourceId: "shared", kind: "COMPUTE" });
    const volume = makeResult({ resourceId: "shared", kind: "BLOCK_STORAGE", reason: "UNUSED_STORAGE" });

    const forward = aggregate([compute, volume], AT).recommendations;
    const backward = aggregate([volume, compute], AT).recommendations;

    expect(forward).toEqual(backward);
    expect(forward).toEqual([
      "Consider stopping AWS BLOCK_STORAGE shared (estimated saving $100.00/month)",
      "Consider stopping AWS COMPUTE shared (estimated saving $100.00/month)",
    ]);
  });
});
