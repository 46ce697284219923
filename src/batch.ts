/**
 * Batch launcher: runs N independent trials and persists each completed
 * record to every sink.
 *
 * Trials share no mutable state, so up to `concurrency` run at once; sinks
 * serialize their own writes. An abandoned trial (oracle unavailable) or a
 * failed sink write is logged and counted, and the batch carries on.
 */

import type { Logger } from "./logger.js";
import type { TaskPair, TrialRecord } from "./types-protocol.js";

export interface TrialSink {
  readonly name: string;
  append(record: TrialRecord): Promise<void>;
}

export interface BatchOpts {
  count: number;
  concurrency?: number;
  runTrial: (index: number) => Promise<TrialRecord>;
  sinks: readonly TrialSink[];
  log: Logger;
}

export interface BatchSummary {
  total: number;
  completed: number;
  abandoned: number;
  /** Trials written to every sink */
  persisted: number;
  /** Trials at least one sink failed to write */
  persistFailures: number;
  sinkFailures: Record<string, number>;
}

/** Spread trials over a sweep of task pairs in round-robin order. */
export function roundRobin<T>(items: readonly T[], index: number): T {
  if (items.length === 0) throw new RangeError("roundRobin over an empty list");
  return items[index % items.length];
}

export function describePair(pair: TaskPair): string {
  return pair.kind === "symmetric"
    ? `u=${pair.agent1.uValue}`
    : `u=(${pair.agent1.uValue}, ${pair.agent2.uValue})`;
}

export async function runBatch(opts: BatchOpts): Promise<BatchSummary> {
  const { count, runTrial, sinks, log } = opts;
  const concurrency = Math.max(1, Math.min(opts.concurrency ?? 1, count));

  const summary: BatchSummary = {
    total: count,
    completed: 0,
    abandoned: 0,
    persisted: 0,
    persistFailures: 0,
    sinkFailures: Object.fromEntries(sinks.map((s) => [s.name, 0])),
  };

  async function runOne(index: number): Promise<void> {
    const label = `Trial ${index + 1}/${count}`;
    let record: TrialRecord;
    try {
      record = await runTrial(index);
    } catch (e) {
      summary.abandoned++;
      log.error(`${label} abandoned: ${e instanceof Error ? e.message : String(e)}`);
      return;
    }
    summary.completed++;

    const results = await Promise.allSettled(sinks.map((sink) => sink.append(record)));
    let failed = false;
    results.forEach((result, i) => {
      if (result.status === "rejected") {
        failed = true;
        const name = sinks[i].name;
        summary.sinkFailures[name] = (summary.sinkFailures[name] ?? 0) + 1;
        const detail = result.reason instanceof Error ? result.reason.message : String(result.reason);
        log.error(`${label} not persisted to ${name}: ${detail}`);
      }
    });

    if (failed) {
      summary.persistFailures++;
    } else {
      summary.persisted++;
      log.info(`${label} completed (mismatch=${record.mismatch})`);
    }
  }

  let next = 0;
  async function worker(): Promise<void> {
    while (next < count) {
      const index = next++;
      await runOne(index);
    }
  }

  await Promise.all(Array.from({ length: concurrency }, () => worker()));

  log.info(
    `Batch done: ${summary.completed}/${count} completed, ${summary.abandoned} abandoned, ` +
      `${summary.persisted} persisted, ${summary.persistFailures} persist failure(s)`,
  );
  return summary;
}
