/**
 * Remote trial mirror on a Supabase table.
 *
 * The local trial log stays the source of truth; the mirror lets several
 * machines pool their trials for analysis. Writes reject on failure so the
 * batch can count them, reads are resilient: a failed page is logged and
 * whatever was loaded so far is returned.
 *
 * Expected table (snake_case mirror of the log fields):
 *
 *   create table trial_records (
 *     id bigint generated always as identity primary key,
 *     protocol text not null,
 *     timestamp text not null,
 *     task_id text not null,
 *     u_value double precision,
 *     agent1_u_value double precision,
 *     agent2_u_value double precision,
 *     rounds int,
 *     agent1_belief int, agent2_belief int,
 *     agent1_final_belief int, agent2_final_belief int,
 *     agent1_choice text, agent1_strategy text not null,
 *     agent2_choice text, agent2_strategy text not null,
 *     agent1_payoff int, agent2_payoff int,
 *     mismatch smallint not null,
 *     fallbacks text[] not null default '{}'
 *   );
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import type { TrialSink } from "./batch.js";
import { ResultLogWriteError } from "./errors.js";
import type { Logger } from "./logger.js";
import { PROTOCOL_VERSION, type AgentOutcome, type TrialRecord } from "./types-protocol.js";

export const DEFAULT_TRIAL_TABLE = "trial_records";
const PAGE_SIZE = 500;

// ============================================================================
// Row schema
// ============================================================================

const NullableNumber = Type.Union([Type.Number(), Type.Null()]);
const NullableString = Type.Union([Type.String(), Type.Null()]);
const StrategyColumn = Type.Union([Type.Literal("collaborative"), Type.Literal("individual")]);

export const TrialRowSchema = Type.Object({
  protocol: Type.String(),
  timestamp: Type.String(),
  task_id: Type.String(),
  u_value: NullableNumber,
  agent1_u_value: NullableNumber,
  agent2_u_value: NullableNumber,
  rounds: NullableNumber,
  agent1_belief: NullableNumber,
  agent2_belief: NullableNumber,
  agent1_final_belief: NullableNumber,
  agent2_final_belief: NullableNumber,
  agent1_choice: NullableString,
  agent1_strategy: StrategyColumn,
  agent2_choice: NullableString,
  agent2_strategy: StrategyColumn,
  agent1_payoff: NullableNumber,
  agent2_payoff: NullableNumber,
  mismatch: Type.Union([Type.Literal(0), Type.Literal(1)]),
  fallbacks: Type.Array(Type.String()),
});

export type TrialRow = Static<typeof TrialRowSchema>;

export function toTrialRow(record: TrialRecord): TrialRow {
  return {
    protocol: PROTOCOL_VERSION,
    timestamp: record.timestamp,
    task_id: record.task.taskId,
    u_value: record.task.uValue,
    agent1_u_value: record.task.agent1UValue,
    agent2_u_value: record.task.agent2UValue,
    rounds: record.rounds,
    agent1_belief: record.agent1.initialBelief,
    agent2_belief: record.agent2.initialBelief,
    agent1_final_belief: record.agent1.finalBelief,
    agent2_final_belief: record.agent2.finalBelief,
    agent1_choice: record.agent1.choice,
    agent1_strategy: record.agent1.strategy,
    agent2_choice: record.agent2.choice,
    agent2_strategy: record.agent2.strategy,
    agent1_payoff: record.agent1.payoff,
    agent2_payoff: record.agent2.payoff,
    mismatch: record.mismatch,
    fallbacks: record.fallbacks,
  };
}

export function fromTrialRow(row: TrialRow): TrialRecord {
  const agent = (n: 1 | 2): AgentOutcome =>
    n === 1
      ? {
          initialBelief: row.agent1_belief,
          finalBelief: row.agent1_final_belief,
          choice: row.agent1_choice,
          strategy: row.agent1_strategy,
          payoff: row.agent1_payoff,
        }
      : {
          initialBelief: row.agent2_belief,
          finalBelief: row.agent2_final_belief,
          choice: row.agent2_choice,
          strategy: row.agent2_strategy,
          payoff: row.agent2_payoff,
        };

  return {
    timestamp: row.timestamp,
    task: {
      taskId: row.task_id,
      uValue: row.u_value,
      agent1UValue: row.agent1_u_value,
      agent2UValue: row.agent2_u_value,
    },
    rounds: row.rounds,
    agent1: agent(1),
    agent2: agent(2),
    mismatch: row.mismatch,
    fallbacks: row.fallbacks,
  };
}

// ============================================================================
// Client
// ============================================================================

export interface MirrorClientOpts {
  supabaseUrl: string;
  supabaseKey: string;
  fetch?: typeof fetch;
}

/** Server-side client: no session persistence, no token refresh timer. */
export function createMirrorClient(opts: MirrorClientOpts): SupabaseClient {
  return createClient(opts.supabaseUrl, opts.supabaseKey, {
    auth: { persistSession: false, autoRefreshToken: false },
    global: opts.fetch ? { fetch: opts.fetch } : undefined,
  });
}

// ============================================================================
// writeTrialRecord
// ============================================================================

export async function writeTrialRecord(
  supabase: SupabaseClient,
  table: string,
  record: TrialRecord,
): Promise<void> {
  const { error } = await supabase.from(table).insert(toTrialRow(record));
  if (error) {
    throw new ResultLogWriteError(`supabase:${table}`, new Error(error.message));
  }
}

export function createSupabaseTrialSink(supabase: SupabaseClient, table: string = DEFAULT_TRIAL_TABLE): TrialSink {
  return {
    name: "supabase",
    append: (record) => writeTrialRecord(supabase, table, record),
  };
}

// ============================================================================
// loadTrialRecords
// ============================================================================

export interface LoadTrialRecordsOpts {
  /** Stop after this many rows; default loads the whole table */
  limit?: number;
  pageSize?: number;
  log: Logger;
}

export interface TrialRecordsLoad {
  records: TrialRecord[];
  /** Rows that did not match the row schema */
  invalidRows: number;
  /** false when a page request failed and the load stopped early */
  complete: boolean;
}

/**
 * Load mirrored trials oldest first, one page at a time.
 */
export async function loadTrialRecords(
  supabase: SupabaseClient,
  table: string,
  opts: LoadTrialRecordsOpts,
): Promise<TrialRecordsLoad> {
  const { log } = opts;
  const pageSize = Math.max(1, opts.pageSize ?? PAGE_SIZE);
  const limit = opts.limit ?? Number.POSITIVE_INFINITY;
  const records: TrialRecord[] = [];
  let invalidRows = 0;
  let offset = 0;

  while (offset < limit) {
    const size = Math.min(pageSize, limit - offset);
    const { data, error } = await supabase
      .from(table)
      .select("*")
      .order("timestamp", { ascending: true })
      .range(offset, offset + size - 1);

    if (error) {
      log.error(`loadTrialRecords: ${table} page at ${offset} failed: ${error.message}`);
      return { records, invalidRows, complete: false };
    }

    const rows: unknown[] = data ?? [];
    for (const row of rows) {
      if (Value.Check(TrialRowSchema, row)) {
        records.push(fromTrialRow(row));
      } else {
        invalidRows++;
      }
    }
    if (rows.length < size) break;
    offset += rows.length;
  }

  if (invalidRows > 0) log.warn(`loadTrialRecords: skipped ${invalidRows} row(s) not matching the trial schema`);
  return { records, invalidRows, complete: true };
}
