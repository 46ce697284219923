import { collaborationVsDisparity, type AggregationReport, type BeliefSummary, type GroupStats } from "./aggregate.js";

function pct(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`;
}

function beliefCell(summary: BeliefSummary): string {
  if (summary.mean === null || summary.std === null) return "n/a";
  return `${summary.mean.toFixed(1)} ± ${summary.std.toFixed(1)}`;
}

function choicesCell(choices: Record<string, number>): string {
  const entries = Object.entries(choices);
  return entries.length > 0 ? entries.map(([id, n]) => `${id}=${n}`).join(" ") : "-";
}

function groupLabel(group: GroupStats, mode: AggregationReport["mode"]): string {
  return mode === "symmetric"
    ? `u=${group.key}`
    : `u1=${group.uValues[0]} u2=${group.uValues[1]} (disparity ${group.disparity ?? "n/a"})`;
}

function formatGroup(group: GroupStats, mode: AggregationReport["mode"]): string[] {
  const lines = [
    `${groupLabel(group, mode)}: ${group.total} trial(s)`,
    `  mismatch:            ${group.mismatches} (${pct(group.rates.mismatch)})`,
    `  both collaborative:  ${group.bothCollaborative} (${pct(group.rates.bothCollaborative)})`,
    `  both individual:     ${group.bothIndividual} (${pct(group.rates.bothIndividual)})`,
    `  agent1 defects:      ${group.agent1Defects} (${pct(group.rates.agent1Defects)})`,
    `  agent2 defects:      ${group.agent2Defects} (${pct(group.rates.agent2Defects)})`,
    `  beliefs:             agent1 ${beliefCell(group.beliefs.agent1)}, agent2 ${beliefCell(group.beliefs.agent2)}`,
    `  choices:             agent1 ${choicesCell(group.choices.agent1)}, agent2 ${choicesCell(group.choices.agent2)}`,
  ];
  if (group.withFallbacks > 0) lines.push(`  with fallbacks:      ${group.withFallbacks}`);
  const { agent1, agent2 } = group.meanPayoff;
  if (agent1 !== null || agent2 !== null) {
    lines.push(`  mean payoff:         agent1 ${agent1?.toFixed(1) ?? "n/a"}, agent2 ${agent2?.toFixed(1) ?? "n/a"}`);
  }
  return lines;
}

/** Plain-text rendering of an aggregation report, one block per group. */
export function formatAggregationReport(report: AggregationReport): string {
  const lines: string[] = [];

  if (report.kind === "no-data") {
    lines.push(`No data (${report.mode}): no trial records to aggregate`);
  } else {
    lines.push(`=== ${report.mode} trials: ${report.overall.total} in ${report.overall.groups} group(s) ===`);
    for (const group of report.groups) {
      lines.push("", ...formatGroup(group, report.mode));
    }
    lines.push(
      "",
      `Overall: mismatch ${pct(report.overall.mismatchRate)}, both collaborative ${pct(report.overall.collaborationRate)}`,
    );
    if (report.mode === "asymmetric") {
      const { correlation } = collaborationVsDisparity(report.groups);
      lines.push(`Collaboration vs disparity: r = ${correlation === null ? "n/a" : correlation.toFixed(3)}`);
    }
  }

  if (report.skipped.length > 0) {
    lines.push("", `Skipped ${report.skipped.length} record(s):`);
    for (const s of report.skipped) lines.push(`  #${s.index + 1}: ${s.error.message}`);
  }
  return lines.join("\n");
}
