import { ExperimentConfigSchema } from "./config-schema.js";
import { ConfigError } from "./errors.js";
import type { ExchangeBeliefSource, FinalReply } from "./protocol.js";
import {
  DEFAULT_EXCHANGE_ROUNDS,
  DEFAULT_KEY_DECIMALS,
  DEFAULT_ORACLE_RETRIES,
  DEFAULT_TECH_FAILURE_RATE,
} from "./types-protocol.js";
import { DEFAULT_TRIAL_TABLE } from "./trial-history.js";

export interface ResolvedExperimentConfig {
  rounds: number;
  exchangeBelief: ExchangeBeliefSource;
  finalReply: FinalReply;
  techFailureRate: number;
  oracleRetries: number;
  trials: number;
  concurrency: number;
  resultsFile: string;
  singleResultsFile: string;
  keyDecimals: number | null;
  uValues: number[];
  uValuePairs: Array<[number, number]>;
  gatewayUrl: string;
  /** null when the gateway needs no bearer token */
  gatewayToken: string | null;
  model: string;
  timeoutMs: number;
  /** null when no Supabase mirror is configured */
  supabase: { url: string; key: string; table: string } | null;
}

export const DEFAULT_RESULTS_FILE = "experiment_results.txt";
export const DEFAULT_SINGLE_RESULTS_FILE = "single_agent_results.jsonl";
export const DEFAULT_GATEWAY_URL = "http://localhost:18789";
export const DEFAULT_MODEL = "gpt-5-nano";
export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_TRIALS = 5;

/**
 * Validate raw config and fill every default.
 * Throws ConfigError listing each schema issue as "path: message".
 */
export function resolveExperimentConfig(raw: unknown): ResolvedExperimentConfig {
  const parsed = ExperimentConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
      ),
    );
  }
  const cfg = parsed.data;

  return {
    rounds: cfg.rounds ?? DEFAULT_EXCHANGE_ROUNDS,
    exchangeBelief: cfg.exchangeBelief ?? "latest",
    finalReply: cfg.finalReply ?? "both",
    techFailureRate: cfg.techFailureRate ?? DEFAULT_TECH_FAILURE_RATE,
    oracleRetries: cfg.oracleRetries ?? DEFAULT_ORACLE_RETRIES,
    trials: cfg.trials ?? DEFAULT_TRIALS,
    concurrency: cfg.concurrency ?? 1,
    resultsFile: cfg.resultsFile?.trim() || DEFAULT_RESULTS_FILE,
    singleResultsFile: cfg.singleResultsFile?.trim() || DEFAULT_SINGLE_RESULTS_FILE,
    keyDecimals: cfg.keyDecimals === undefined ? DEFAULT_KEY_DECIMALS : cfg.keyDecimals,
    uValues: cfg.uValues ?? [0.66],
    uValuePairs: cfg.uValuePairs ?? [[0.66, 0.75]],
    gatewayUrl: (cfg.gatewayUrl ?? DEFAULT_GATEWAY_URL).replace(/\/+$/, ""),
    gatewayToken: cfg.gatewayToken?.trim() || null,
    model: cfg.model ?? DEFAULT_MODEL,
    timeoutMs: cfg.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    supabase:
      cfg.supabaseUrl && cfg.supabaseKey
        ? { url: cfg.supabaseUrl, key: cfg.supabaseKey, table: cfg.supabaseTable ?? DEFAULT_TRIAL_TABLE }
        : null,
  };
}

// ============================================================================
// Environment
// ============================================================================

const NUMERIC_RE = /^-?\d+(\.\d+)?$/;

/** Numeric strings become numbers; anything else is passed through for zod to reject. */
function numberish(raw: string): number | string {
  const trimmed = raw.trim();
  return NUMERIC_RE.test(trimmed) ? Number(trimmed) : trimmed;
}

function list(raw: string): string[] {
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

function pair(raw: string): [number | string, number | string] | string {
  const parts = raw.split(":");
  return parts.length === 2 ? [numberish(parts[0]), numberish(parts[1])] : raw;
}

/**
 * Map STAG_* environment variables onto a raw config object.
 *
 *   STAG_ROUNDS=3 STAG_U_VALUES=0.5,0.66 STAG_U_VALUE_PAIRS=0.66:0.75
 *   STAG_KEY_DECIMALS=exact   (group on exact float u-values)
 */
export function readExperimentEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const raw: Record<string, unknown> = {};
  const get = (name: string): string | undefined => {
    const value = env[`STAG_${name}`];
    return value !== undefined && value.trim() !== "" ? value : undefined;
  };

  const numeric: Array<[string, string]> = [
    ["ROUNDS", "rounds"],
    ["TECH_FAILURE_RATE", "techFailureRate"],
    ["ORACLE_RETRIES", "oracleRetries"],
    ["TRIALS", "trials"],
    ["CONCURRENCY", "concurrency"],
    ["TIMEOUT_MS", "timeoutMs"],
  ];
  for (const [name, key] of numeric) {
    const value = get(name);
    if (value !== undefined) raw[key] = numberish(value);
  }

  const text: Array<[string, string]> = [
    ["EXCHANGE_BELIEF", "exchangeBelief"],
    ["FINAL_REPLY", "finalReply"],
    ["RESULTS_FILE", "resultsFile"],
    ["SINGLE_RESULTS_FILE", "singleResultsFile"],
    ["GATEWAY_URL", "gatewayUrl"],
    ["GATEWAY_TOKEN", "gatewayToken"],
    ["MODEL", "model"],
    ["SUPABASE_URL", "supabaseUrl"],
    ["SUPABASE_KEY", "supabaseKey"],
    ["SUPABASE_TABLE", "supabaseTable"],
  ];
  for (const [name, key] of text) {
    const value = get(name);
    if (value !== undefined) raw[key] = value.trim();
  }

  const decimals = get("KEY_DECIMALS");
  if (decimals !== undefined) {
    raw.keyDecimals = decimals.trim().toLowerCase() === "exact" ? null : numberish(decimals);
  }

  const uValues = get("U_VALUES");
  if (uValues !== undefined) raw.uValues = list(uValues).map(numberish);

  const pairs = get("U_VALUE_PAIRS");
  if (pairs !== undefined) raw.uValuePairs = list(pairs).map(pair);

  return raw;
}
