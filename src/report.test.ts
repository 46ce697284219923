import { describe, expect, it } from "vitest";
import { aggregateTrials } from "./aggregate.js";
import { formatAggregationReport } from "./report.js";
import { makeRecord } from "./test-support.js";

describe("formatAggregationReport", () => {
  it("renders one block per group and the overall rates", () => {
    const report = aggregateTrials([makeRecord({ agent1: { payoff: 111 }, agent2: { payoff: 92 } })], {
      mode: "symmetric",
    });

    expect(formatAggregationReport(report)).toBe(
      [
        "=== symmetric trials: 1 in 1 group(s) ===",
        "",
        "u=0.66: 1 trial(s)",
        "  mismatch:            0 (0.0%)",
        "  both collaborative:  1 (100.0%)",
        "  both individual:     0 (0.0%)",
        "  agent1 defects:      0 (0.0%)",
        "  agent2 defects:      0 (0.0%)",
        "  beliefs:             agent1 70.0 ± 0.0, agent2 60.0 ± 0.0",
        "  choices:             agent1 A=1, agent2 B=1",
        "  mean payoff:         agent1 111.0, agent2 92.0",
        "",
        "Overall: mismatch 0.0%, both collaborative 100.0%",
      ].join("\n"),
    );
  });

  it("labels asymmetric groups with both u-values and the disparity", () => {
    const report = aggregateTrials(
      [
        makeRecord({
          uValue: null,
          agent1UValue: 0.66,
          agent2UValue: 0.75,
          agent1: { choice: "Y", strategy: "individual" },
          agent2: { choice: "L" },
          fallbacks: ["agent2.belief"],
        }),
      ],
      { mode: "asymmetric" },
    );
    const lines = formatAggregationReport(report).split("\n");

    expect(lines[2]).toBe("u1=0.66 u2=0.75 (disparity 0.09): 1 trial(s)");
    expect(lines).toContain("  agent2 defects:      1 (100.0%)");
    expect(lines).toContain("  with fallbacks:      1");
    expect(lines.at(-1)).toBe("Collaboration vs disparity: r = n/a");
  });

  it("says so when there is nothing to aggregate", () => {
    const report = aggregateTrials([makeRecord({})], { mode: "asymmetric" });
    expect(formatAggregationReport(report)).toBe(
      [
        "No data (asymmetric): no trial records to aggregate",
        "",
        "Skipped 1 record(s):",
        "  #1: task 1: asymmetric record without Agent1_U_Value",
      ].join("\n"),
    );
  });
});
