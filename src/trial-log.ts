/**
 * Append-only trial log: one trial per line, `Key:value` fields joined by " | ".
 *
 *   Timestamp:2026-10-18T09:30:00.000Z | Task_ID:1 | U_Value:0.66 | Rounds:3 | ... | Mismatch:0
 *
 * Readers look fields up by key, tolerate missing optional fields and skip
 * lines they cannot parse. Lines written by the older launcher (bare
 * "YYYY-MM-DD HH:MM:SS" timestamp as the first field) are accepted too.
 */

import { appendFile, mkdir, readFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { TrialSink } from "./batch.js";
import { ResultLogWriteError } from "./errors.js";
import type { Logger } from "./logger.js";
import type { AgentOutcome, Strategy, TrialRecord } from "./types-protocol.js";

const FIELD_SEPARATOR = " | ";
const LEGACY_TIMESTAMP_RE = /^\d{4}-\d{2}-\d{2}[ T]\d{2}:\d{2}:\d{2}/;
const DECIMAL_RE = /^-?\d+(\.\d+)?(e[-+]?\d+)?$/i;
const INTEGER_RE = /^-?\d+$/;

// ============================================================================
// Format
// ============================================================================

export function formatTrialLine(record: TrialRecord): string {
  const fields: Array<[string, string | number | null]> = [
    ["Timestamp", record.timestamp],
    ["Task_ID", record.task.taskId],
    ["U_Value", record.task.uValue],
    ["Agent1_U_Value", record.task.agent1UValue],
    ["Agent2_U_Value", record.task.agent2UValue],
    ["Rounds", record.rounds],
    ["Agent1_Belief", record.agent1.initialBelief],
    ["Agent2_Belief", record.agent2.initialBelief],
    ["Agent1_Final_Belief", record.agent1.finalBelief],
    ["Agent2_Final_Belief", record.agent2.finalBelief],
    ["Agent1_Choice", record.agent1.choice],
    ["Agent1_Strategy", record.agent1.strategy],
    ["Agent2_Choice", record.agent2.choice],
    ["Agent2_Strategy", record.agent2.strategy],
    ["Agent1_Payoff", record.agent1.payoff],
    ["Agent2_Payoff", record.agent2.payoff],
    ["Mismatch", record.mismatch],
    ["Fallbacks", record.fallbacks.length > 0 ? record.fallbacks.join(",") : null],
  ];

  return fields
    .filter((f): f is [string, string | number] => f[1] !== null)
    .map(([key, value]) => `${key}:${value}`)
    .join(FIELD_SEPARATOR);
}

// ============================================================================
// Parse
// ============================================================================

export type LineParseResult =
  | { ok: true; record: TrialRecord }
  | { ok: false; reason: string };

function splitFields(line: string): Map<string, string> {
  const fields = new Map<string, string>();
  const parts = line.split("|").map((p) => p.trim()).filter(Boolean);

  parts.forEach((part, i) => {
    if (i === 0 && LEGACY_TIMESTAMP_RE.test(part) && !part.startsWith("Timestamp:")) {
      fields.set("Timestamp", part);
      return;
    }
    const idx = part.indexOf(":");
    if (idx <= 0) return;
    fields.set(part.slice(0, idx).trim(), part.slice(idx + 1).trim());
  });
  return fields;
}

function optionalNumber(fields: Map<string, string>, key: string, re: RegExp): number | null {
  const raw = fields.get(key);
  return raw !== undefined && re.test(raw) ? Number(raw) : null;
}

function parseStrategy(raw: string | undefined): Strategy | null {
  return raw === "collaborative" || raw === "individual" ? raw : null;
}

function parseAgent(fields: Map<string, string>, agent: 1 | 2): AgentOutcome | string {
  const strategy = parseStrategy(fields.get(`Agent${agent}_Strategy`));
  if (!strategy) return `missing or invalid Agent${agent}_Strategy`;
  return {
    initialBelief: optionalNumber(fields, `Agent${agent}_Belief`, INTEGER_RE),
    finalBelief: optionalNumber(fields, `Agent${agent}_Final_Belief`, INTEGER_RE),
    choice: fields.get(`Agent${agent}_Choice`) || null,
    strategy,
    payoff: optionalNumber(fields, `Agent${agent}_Payoff`, INTEGER_RE),
  };
}

export function parseTrialLine(line: string): LineParseResult {
  const fields = splitFields(line);

  const timestamp = fields.get("Timestamp");
  if (!timestamp) return { ok: false, reason: "missing Timestamp" };
  const taskId = fields.get("Task_ID");
  if (!taskId) return { ok: false, reason: "missing Task_ID" };

  const uValue = optionalNumber(fields, "U_Value", DECIMAL_RE);
  const agent1UValue = optionalNumber(fields, "Agent1_U_Value", DECIMAL_RE);
  const agent2UValue = optionalNumber(fields, "Agent2_U_Value", DECIMAL_RE);
  if (uValue === null && agent1UValue === null && agent2UValue === null) {
    return { ok: false, reason: "no u-value field" };
  }

  const agent1 = parseAgent(fields, 1);
  if (typeof agent1 === "string") return { ok: false, reason: agent1 };
  const agent2 = parseAgent(fields, 2);
  if (typeof agent2 === "string") return { ok: false, reason: agent2 };

  const mismatchRaw = fields.get("Mismatch");
  if (mismatchRaw !== "0" && mismatchRaw !== "1") {
    return { ok: false, reason: "missing or invalid Mismatch" };
  }

  const fallbacksRaw = fields.get("Fallbacks");
  return {
    ok: true,
    record: {
      timestamp,
      task: { taskId, uValue, agent1UValue, agent2UValue },
      rounds: optionalNumber(fields, "Rounds", INTEGER_RE),
      agent1,
      agent2,
      mismatch: mismatchRaw === "1" ? 1 : 0,
      fallbacks: fallbacksRaw ? fallbacksRaw.split(",").filter(Boolean) : [],
    },
  };
}

// ============================================================================
// File sink / reader
// ============================================================================

export interface TrialLog extends TrialSink {
  readonly path: string;
}

/**
 * Single-writer appender: writes are chained so concurrent callers never
 * interleave, and each line goes out in one appendFile call.
 */
export function createLineAppender(path: string): (line: string) => Promise<void> {
  let tail: Promise<void> = Promise.resolve();

  return (text) => {
    const line = `${text}\n`;
    const write = tail
      .then(async () => {
        await mkdir(dirname(path), { recursive: true });
        await appendFile(path, line, "utf-8");
      })
      .catch((e: unknown) => {
        throw new ResultLogWriteError(path, e);
      });
    // Keep the queue moving after a failed write; the caller still sees the rejection
    tail = write.then(
      () => undefined,
      () => undefined,
    );
    return write;
  };
}

export function createTrialLog(path: string): TrialLog {
  const appendLine = createLineAppender(path);
  return { name: "file", path, append: (record) => appendLine(formatTrialLine(record)) };
}

export interface TrialLogRead {
  records: TrialRecord[];
  skipped: Array<{ line: number; reason: string }>;
}

export async function readTrialLog(path: string, log: Logger): Promise<TrialLogRead> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") {
      log.warn(`Results file ${path} not found, nothing to read`);
      return { records: [], skipped: [] };
    }
    throw e;
  }

  const records: TrialRecord[] = [];
  const skipped: TrialLogRead["skipped"] = [];

  content.split(/\r?\n/).forEach((raw, i) => {
    const line = raw.trim();
    if (!line) return;
    const result = parseTrialLine(line);
    if (result.ok) {
      records.push(result.record);
    } else {
      skipped.push({ line: i + 1, reason: result.reason });
    }
  });

  if (skipped.length > 0) log.warn(`Skipped ${skipped.length} unparsable line(s) in ${path}`);
  return { records, skipped };
}
