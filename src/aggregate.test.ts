import { describe, expect, it } from "vitest";
import { aggregateTrials, collaborationVsDisparity, pearson, rate, summarizeBeliefs } from "./aggregate.js";
import { makeRecord } from "./test-support.js";
import type { TrialRecord } from "./types-protocol.js";

const collab = { strategy: "collaborative" as const };
const indiv = { strategy: "individual" as const, choice: "Y" };

function symmetricRecords(): TrialRecord[] {
  return [
    makeRecord({ uValue: 0.66, agent1: { ...collab, initialBelief: 70 }, agent2: { ...collab, initialBelief: 60 } }),
    makeRecord({ uValue: 0.66, agent1: { ...indiv, initialBelief: 40 }, agent2: { ...indiv, initialBelief: 50 } }),
    makeRecord({ uValue: 0.66, agent1: { ...collab, initialBelief: 80 }, agent2: { ...indiv, initialBelief: 30 } }),
    makeRecord({ uValue: 0.66, agent1: { ...indiv, initialBelief: 50 }, agent2: { ...collab, initialBelief: 90 } }),
    makeRecord({ uValue: 0.5, agent1: { ...collab, initialBelief: 55 }, agent2: { ...collab, initialBelief: 65 } }),
  ];
}

describe("summaries", () => {
  it("defines rate as 0 for an empty group", () => {
    expect(rate(0, 0)).toBe(0);
    expect(rate(1, 4)).toBe(0.25);
  });

  it("uses the population standard deviation", () => {
    expect(summarizeBeliefs([60, 70, 80, 50])).toEqual({ count: 4, mean: 65, std: Math.sqrt(125) });
    expect(summarizeBeliefs([])).toEqual({ count: 0, mean: null, std: null });
  });
});

describe("aggregateTrials (symmetric)", () => {
  const report = aggregateTrials(symmetricRecords(), { mode: "symmetric" });

  it("groups by u-value in ascending order", () => {
    if (report.kind !== "groups") throw new Error("expected groups");
    expect(report.groups.map((g) => g.key)).toEqual(["0.50", "0.66"]);
    expect(report.groups.map((g) => g.uValues)).toEqual([[0.5], [0.66]]);
  });

  it("partitions each group into the four outcome categories", () => {
    if (report.kind !== "groups") throw new Error("expected groups");
    for (const g of report.groups) {
      expect(g.bothCollaborative + g.bothIndividual + g.agent1Defects + g.agent2Defects).toBe(g.total);
      expect(g.rates.mismatch).toBeGreaterThanOrEqual(0);
      expect(g.rates.mismatch).toBeLessThanOrEqual(1);
    }
    const g = report.groups[1];
    expect(g).toMatchObject({
      total: 4,
      mismatches: 2,
      bothCollaborative: 1,
      bothIndividual: 1,
      agent1Defects: 1,
      agent2Defects: 1,
      rates: { mismatch: 0.5, bothCollaborative: 0.25, bothIndividual: 0.25, agent1Defects: 0.25, agent2Defects: 0.25 },
    });
    expect(g.beliefs.agent1).toEqual({ count: 4, mean: 60, std: Math.sqrt(250) });
    expect(g.choices.agent1).toEqual({ A: 2, Y: 2 });
    expect(g.choices.agent2).toEqual({ B: 2, Y: 2 });
  });

  it("summarizes across groups", () => {
    if (report.kind !== "groups") throw new Error("expected groups");
    expect(report.overall).toEqual({
      groups: 2,
      total: 5,
      mismatches: 2,
      bothCollaborative: 2,
      mismatchRate: 0.4,
      collaborationRate: 0.4,
    });
  });

  it("gives identical results regardless of record order", () => {
    const reversed = aggregateTrials([...symmetricRecords()].reverse(), { mode: "symmetric" });
    expect(reversed).toEqual(report);
    expect(aggregateTrials(symmetricRecords(), { mode: "symmetric" })).toEqual(report);
  });

  it("merges float drift into one group unless exact keys are requested", () => {
    const drifted = [makeRecord({ uValue: 0.66 }), makeRecord({ uValue: 0.6600000000000001 })];
    const rounded = aggregateTrials(drifted, { mode: "symmetric" });
    const exact = aggregateTrials(drifted, { mode: "symmetric", keyDecimals: null });
    expect(rounded.kind === "groups" && rounded.groups.length).toBe(1);
    expect(exact.kind === "groups" && exact.groups.map((g) => g.key)).toEqual(["0.66", "0.6600000000000001"]);
  });

  it("counts records with fallbacks and averages payoffs", () => {
    const result = aggregateTrials(
      [
        makeRecord({ fallbacks: ["agent2.belief"], agent1: { payoff: 111 }, agent2: { payoff: 92 } }),
        makeRecord({ agent1: { payoff: -90 }, agent2: { payoff: -45 } }),
      ],
      { mode: "symmetric" },
    );
    if (result.kind !== "groups") throw new Error("expected groups");
    expect(result.groups[0].withFallbacks).toBe(1);
    expect(result.groups[0].meanPayoff).toEqual({ agent1: 10.5, agent2: 23.5 });
  });
});

describe("aggregateTrials (asymmetric)", () => {
  it("Scenario B counts as agent 2 defecting", () => {
    const record = makeRecord({
      uValue: null,
      agent1UValue: 0.66,
      agent2UValue: 0.75,
      agent1: { choice: "Y", strategy: "individual" },
      agent2: { choice: "L", strategy: "collaborative" },
    });
    const report = aggregateTrials([record], { mode: "asymmetric" });
    if (report.kind !== "groups") throw new Error("expected groups");
    expect(report.groups).toHaveLength(1);
    expect(report.groups[0]).toMatchObject({
      key: "0.66|0.75",
      uValues: [0.66, 0.75],
      disparity: 0.09,
      mismatches: 1,
      agent1Defects: 0,
      agent2Defects: 1,
    });
  });

  it("skips records without both u-values and reports them", () => {
    const records = [
      makeRecord({ uValue: null, agent1UValue: 0.66, agent2UValue: 0.75 }),
      makeRecord({ taskId: "7", uValue: null, agent1UValue: 0.66 }),
    ];
    const report = aggregateTrials(records, { mode: "asymmetric" });
    if (report.kind !== "groups") throw new Error("expected groups");
    expect(report.overall.total).toBe(1);
    expect(report.skipped.map((s) => [s.index, s.error.message])).toEqual([
      [1, "task 7: asymmetric record without Agent2_U_Value"],
    ]);
  });

  it("returns no-data when every record is skipped", () => {
    const report = aggregateTrials([makeRecord({ uValue: 0.66 })], { mode: "asymmetric" });
    expect(report.kind).toBe("no-data");
    expect(report.skipped).toHaveLength(1);
    expect(aggregateTrials([], { mode: "symmetric" })).toEqual({ kind: "no-data", mode: "symmetric", skipped: [] });
  });

  it("pairs disparity and collaboration rate in group order", () => {
    const both = { agent1: collab, agent2: collab };
    const split = { agent1: collab, agent2: { strategy: "individual" as const } };
    const records = [
      makeRecord({ uValue: null, agent1UValue: 0.5, agent2UValue: 0.9, ...split }),
      makeRecord({ uValue: null, agent1UValue: 0.5, agent2UValue: 0.5, ...both }),
      makeRecord({ uValue: null, agent1UValue: 0.5, agent2UValue: 0.7, ...both }),
      makeRecord({ uValue: null, agent1UValue: 0.5, agent2UValue: 0.7, ...split }),
    ];
    const report = aggregateTrials(records, { mode: "asymmetric" });
    if (report.kind !== "groups") throw new Error("expected groups");

    const series = collaborationVsDisparity(report.groups);
    expect(series.keys).toEqual(["0.50|0.50", "0.50|0.70", "0.50|0.90"]);
    expect(series.disparity).toEqual([0, 0.2, 0.4]);
    expect(series.collaborationRate).toEqual([1, 0.5, 0]);
    expect(series.correlation).toBeCloseTo(-1, 10);
  });
});

describe("pearson", () => {
  it("is null when undefined", () => {
    expect(pearson([1], [2])).toBeNull();
    expect(pearson([1, 1, 1], [1, 2, 3])).toBeNull();
  });

  it("is 1 for a perfect positive relation", () => {
    expect(pearson([1, 2, 3], [2, 4, 6])).toBeCloseTo(1, 10);
  });
});
