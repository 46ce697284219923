/**
 * Trial aggregator: groups trial records by u-value (or u-value pair) and
 * folds each group into counts, rates and belief summaries.
 *
 * Pure function of the record set: every statistic is a counting fold, and
 * belief samples are sorted before summing, so the same records give the
 * same report in any order. Records without the key fields for the chosen
 * mode are reported in `skipped`, never silently dropped.
 */

import { AggregationKeyError } from "./errors.js";
import { DEFAULT_KEY_DECIMALS, type TrialRecord } from "./types-protocol.js";

export type GroupingMode = "symmetric" | "asymmetric";

export interface AggregateOpts {
  mode: GroupingMode;
  /** Round u-values to this many decimals before grouping; null = exact float match */
  keyDecimals?: number | null;
}

export interface BeliefSummary {
  count: number;
  mean: number | null;
  /** Population standard deviation */
  std: number | null;
}

export interface GroupRates {
  mismatch: number;
  bothCollaborative: number;
  bothIndividual: number;
  agent1Defects: number;
  agent2Defects: number;
}

export interface GroupStats {
  key: string;
  /** [u] for symmetric groups, [u1, u2] for asymmetric groups */
  uValues: number[];
  /** |u2 - u1|, asymmetric groups only */
  disparity: number | null;
  total: number;
  mismatches: number;
  bothCollaborative: number;
  bothIndividual: number;
  /** Agent 1 collaborative, agent 2 individual */
  agent1Defects: number;
  /** Agent 1 individual, agent 2 collaborative */
  agent2Defects: number;
  rates: GroupRates;
  beliefs: { agent1: BeliefSummary; agent2: BeliefSummary };
  choices: { agent1: Record<string, number>; agent2: Record<string, number> };
  /** Records where at least one protocol step used a fallback */
  withFallbacks: number;
  meanPayoff: { agent1: number | null; agent2: number | null };
}

export interface OverallSummary {
  groups: number;
  total: number;
  mismatches: number;
  bothCollaborative: number;
  mismatchRate: number;
  collaborationRate: number;
}

export interface SkippedRecord {
  index: number;
  error: AggregationKeyError;
}

export type AggregationReport =
  | { kind: "no-data"; mode: GroupingMode; skipped: SkippedRecord[] }
  | {
      kind: "groups";
      mode: GroupingMode;
      groups: GroupStats[];
      overall: OverallSummary;
      skipped: SkippedRecord[];
    };

// ============================================================================
// Helpers
// ============================================================================

/** count / total, 0 when total is 0 */
export function rate(count: number, total: number): number {
  return total > 0 ? count / total : 0;
}

export function summarizeBeliefs(samples: readonly number[]): BeliefSummary {
  if (samples.length === 0) return { count: 0, mean: null, std: null };
  const sorted = [...samples].sort((a, b) => a - b);
  const mean = sorted.reduce((sum, x) => sum + x, 0) / sorted.length;
  const variance = sorted.reduce((sum, x) => sum + (x - mean) ** 2, 0) / sorted.length;
  return { count: sorted.length, mean, std: Math.sqrt(variance) };
}

function mean(samples: readonly number[]): number | null {
  return summarizeBeliefs(samples).mean;
}

function canonical(u: number, decimals: number | null): { value: number; label: string } {
  if (decimals === null) return { value: u, label: String(u) };
  const label = u.toFixed(decimals);
  return { value: Number(label), label };
}

interface GroupKey {
  key: string;
  uValues: number[];
  disparity: number | null;
}

export function groupKeyOf(
  record: TrialRecord,
  mode: GroupingMode,
  decimals: number | null = DEFAULT_KEY_DECIMALS,
): GroupKey {
  if (mode === "symmetric") {
    if (record.task.uValue === null) {
      throw new AggregationKeyError(`task ${record.task.taskId}: symmetric record without U_Value`);
    }
    const u = canonical(record.task.uValue, decimals);
    return { key: u.label, uValues: [u.value], disparity: null };
  }

  const { agent1UValue, agent2UValue } = record.task;
  if (agent1UValue === null || agent2UValue === null) {
    const missing = agent1UValue === null ? "Agent1_U_Value" : "Agent2_U_Value";
    throw new AggregationKeyError(`task ${record.task.taskId}: asymmetric record without ${missing}`);
  }
  const u1 = canonical(agent1UValue, decimals);
  const u2 = canonical(agent2UValue, decimals);
  const gap = Math.abs(u2.value - u1.value);
  return {
    key: `${u1.label}|${u2.label}`,
    uValues: [u1.value, u2.value],
    disparity: decimals === null ? gap : Number(gap.toFixed(decimals)),
  };
}

// ============================================================================
// Bucket fold
// ============================================================================

interface Bucket extends GroupKey {
  total: number;
  mismatches: number;
  bothCollaborative: number;
  bothIndividual: number;
  agent1Defects: number;
  agent2Defects: number;
  beliefs1: number[];
  beliefs2: number[];
  choices1: Map<string, number>;
  choices2: Map<string, number>;
  withFallbacks: number;
  payoffs1: number[];
  payoffs2: number[];
}

function emptyBucket(key: GroupKey): Bucket {
  return {
    ...key,
    total: 0,
    mismatches: 0,
    bothCollaborative: 0,
    bothIndividual: 0,
    agent1Defects: 0,
    agent2Defects: 0,
    beliefs1: [],
    beliefs2: [],
    choices1: new Map(),
    choices2: new Map(),
    withFallbacks: 0,
    payoffs1: [],
    payoffs2: [],
  };
}

function foldRecord(bucket: Bucket, record: TrialRecord): void {
  const s1 = record.agent1.strategy;
  const s2 = record.agent2.strategy;

  bucket.total++;
  bucket.mismatches += record.mismatch;
  if (s1 === "collaborative" && s2 === "collaborative") bucket.bothCollaborative++;
  else if (s1 === "individual" && s2 === "individual") bucket.bothIndividual++;
  else if (s1 === "collaborative") bucket.agent1Defects++;
  else bucket.agent2Defects++;

  if (record.agent1.initialBelief !== null) bucket.beliefs1.push(record.agent1.initialBelief);
  if (record.agent2.initialBelief !== null) bucket.beliefs2.push(record.agent2.initialBelief);
  if (record.agent1.choice) bucket.choices1.set(record.agent1.choice, (bucket.choices1.get(record.agent1.choice) ?? 0) + 1);
  if (record.agent2.choice) bucket.choices2.set(record.agent2.choice, (bucket.choices2.get(record.agent2.choice) ?? 0) + 1);
  if (record.fallbacks.length > 0) bucket.withFallbacks++;
  if (record.agent1.payoff !== null) bucket.payoffs1.push(record.agent1.payoff);
  if (record.agent2.payoff !== null) bucket.payoffs2.push(record.agent2.payoff);
}

function sortedCounts(counts: Map<string, number>): Record<string, number> {
  return Object.fromEntries([...counts.entries()].sort(([a], [b]) => a.localeCompare(b)));
}

function summarizeBucket(bucket: Bucket): GroupStats {
  const { total } = bucket;
  return {
    key: bucket.key,
    uValues: bucket.uValues,
    disparity: bucket.disparity,
    total,
    mismatches: bucket.mismatches,
    bothCollaborative: bucket.bothCollaborative,
    bothIndividual: bucket.bothIndividual,
    agent1Defects: bucket.agent1Defects,
    agent2Defects: bucket.agent2Defects,
    rates: {
      mismatch: rate(bucket.mismatches, total),
      bothCollaborative: rate(bucket.bothCollaborative, total),
      bothIndividual: rate(bucket.bothIndividual, total),
      agent1Defects: rate(bucket.agent1Defects, total),
      agent2Defects: rate(bucket.agent2Defects, total),
    },
    beliefs: { agent1: summarizeBeliefs(bucket.beliefs1), agent2: summarizeBeliefs(bucket.beliefs2) },
    choices: { agent1: sortedCounts(bucket.choices1), agent2: sortedCounts(bucket.choices2) },
    withFallbacks: bucket.withFallbacks,
    meanPayoff: { agent1: mean(bucket.payoffs1), agent2: mean(bucket.payoffs2) },
  };
}

function compareUValues(a: readonly number[], b: readonly number[]): number {
  for (let i = 0; i < Math.min(a.length, b.length); i++) {
    if (a[i] !== b[i]) return a[i] - b[i];
  }
  return a.length - b.length;
}

// ============================================================================
// Public API
// ============================================================================

export function aggregateTrials(records: readonly TrialRecord[], opts: AggregateOpts): AggregationReport {
  const decimals = opts.keyDecimals === undefined ? DEFAULT_KEY_DECIMALS : opts.keyDecimals;
  const buckets = new Map<string, Bucket>();
  const skipped: SkippedRecord[] = [];

  records.forEach((record, index) => {
    let key: GroupKey;
    try {
      key = groupKeyOf(record, opts.mode, decimals);
    } catch (e) {
      if (e instanceof AggregationKeyError) {
        skipped.push({ index, error: e });
        return;
      }
      throw e;
    }
    let bucket = buckets.get(key.key);
    if (!bucket) {
      bucket = emptyBucket(key);
      buckets.set(key.key, bucket);
    }
    foldRecord(bucket, record);
  });

  if (buckets.size === 0) return { kind: "no-data", mode: opts.mode, skipped };

  const groups = [...buckets.values()]
    .map(summarizeBucket)
    .sort((a, b) => compareUValues(a.uValues, b.uValues));

  const total = groups.reduce((sum, g) => sum + g.total, 0);
  const mismatches = groups.reduce((sum, g) => sum + g.mismatches, 0);
  const bothCollaborative = groups.reduce((sum, g) => sum + g.bothCollaborative, 0);

  return {
    kind: "groups",
    mode: opts.mode,
    groups,
    overall: {
      groups: groups.length,
      total,
      mismatches,
      bothCollaborative,
      mismatchRate: rate(mismatches, total),
      collaborationRate: rate(bothCollaborative, total),
    },
    skipped,
  };
}

export interface DisparitySeries {
  keys: string[];
  disparity: number[];
  collaborationRate: number[];
  /** Pearson r between the two series; null with < 2 points or zero variance */
  correlation: number | null;
}

/** Collaboration rate against u-value disparity, paired in group order. */
export function collaborationVsDisparity(groups: readonly GroupStats[]): DisparitySeries {
  const paired = groups.filter((g): g is GroupStats & { disparity: number } => g.disparity !== null);
  const disparity = paired.map((g) => g.disparity);
  const collaborationRate = paired.map((g) => g.rates.bothCollaborative);
  return {
    keys: paired.map((g) => g.key),
    disparity,
    collaborationRate,
    correlation: pearson(disparity, collaborationRate),
  };
}

export function pearson(xs: readonly number[], ys: readonly number[]): number | null {
  const n = Math.min(xs.length, ys.length);
  if (n < 2) return null;
  const mx = xs.slice(0, n).reduce((s, x) => s + x, 0) / n;
  const my = ys.slice(0, n).reduce((s, y) => s + y, 0) / n;
  let cov = 0;
  let vx = 0;
  let vy = 0;
  for (let i = 0; i < n; i++) {
    cov += (xs[i] - mx) * (ys[i] - my);
    vx += (xs[i] - mx) ** 2;
    vy += (ys[i] - my) ** 2;
  }
  if (vx === 0 || vy === 0) return null;
  return cov / Math.sqrt(vx * vy);
}
