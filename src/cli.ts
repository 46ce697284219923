/**
 * Command-line front end.
 *
 *   stag-hunt-lab run [count] [--asymmetric]
 *   stag-hunt-lab single [count]
 *   stag-hunt-lab analyze [file] [--asymmetric] [--supabase]
 *
 * Configuration comes from STAG_* environment variables (see config.ts).
 */

import { aggregateTrials } from "./aggregate.js";
import { describePair, roundRobin, runBatch, type TrialSink } from "./batch.js";
import { readExperimentEnv, resolveExperimentConfig, type ResolvedExperimentConfig } from "./config.js";
import { ExperimentError } from "./errors.js";
import { createGatewayCaller } from "./gateway.js";
import { createConsoleLogger, scopedLogger, type Logger } from "./logger.js";
import { createGatewayOracle, type BeliefOracle } from "./oracle.js";
import type { RandomSource } from "./outcome.js";
import { buildSystemPrompt } from "./prompts.js";
import { createNegotiationProtocol } from "./protocol.js";
import { formatAggregationReport } from "./report.js";
import { createSingleAgentLog, runSingleAgentTrial } from "./single-agent.js";
import { createAsymmetricSweep, createSymmetricSweep } from "./task.js";
import { createMirrorClient, createSupabaseTrialSink, loadTrialRecords } from "./trial-history.js";
import { createTrialLog, readTrialLog } from "./trial-log.js";
import type { TrialRecord } from "./types-protocol.js";

export const USAGE = `Usage:
  stag-hunt-lab run [count] [--asymmetric]      run two-agent trials and append them to the results file
  stag-hunt-lab single [count]                  run single-agent trials against a simulated partner
  stag-hunt-lab analyze [file] [--asymmetric] [--supabase]
                                                aggregate recorded trials`;

export interface CliDeps {
  env: NodeJS.ProcessEnv;
  log?: Logger;
  /** Report/summary output; defaults to stdout */
  out?: (text: string) => void;
  fetch?: typeof fetch;
  random?: RandomSource;
  /** Replaces the gateway-backed oracle (tests, offline runs) */
  oracle?: BeliefOracle;
}

interface ParsedArgs {
  command: string | undefined;
  positionals: string[];
  flags: Set<string>;
}

function parseArgs(argv: readonly string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags = new Set<string>();
  for (const arg of argv) {
    if (arg.startsWith("--")) flags.add(arg.slice(2));
    else positionals.push(arg);
  }
  const [command, ...rest] = positionals;
  return { command, positionals: rest, flags };
}

function parseCount(raw: string | undefined, fallback: number): number | null {
  if (raw === undefined) return fallback;
  const n = Number(raw);
  return Number.isInteger(n) && n > 0 ? n : null;
}

interface OracleHandle {
  oracle: BeliefOracle;
  stop(): void;
}

function openOracle(cfg: ResolvedExperimentConfig, deps: CliDeps, log: Logger): OracleHandle {
  if (deps.oracle) return { oracle: deps.oracle, stop: () => {} };
  const gateway = createGatewayCaller({
    gatewayUrl: cfg.gatewayUrl,
    gatewayToken: cfg.gatewayToken,
    model: cfg.model,
    systemPrompt: buildSystemPrompt(cfg.techFailureRate),
    maxConcurrent: cfg.concurrency,
    fetch: deps.fetch,
    log: scopedLogger(log, "gateway"),
  });
  return {
    oracle: createGatewayOracle({ gateway, timeoutMs: cfg.timeoutMs, log: scopedLogger(log, "oracle") }),
    stop: () => gateway.stop(),
  };
}

// ============================================================================
// Commands
// ============================================================================

async function runCommand(
  cfg: ResolvedExperimentConfig,
  args: ParsedArgs,
  deps: CliDeps,
  log: Logger,
  out: (text: string) => void,
): Promise<number> {
  const count = parseCount(args.positionals[0], cfg.trials);
  if (count === null) {
    out(USAGE);
    return 1;
  }
  const asymmetric = args.flags.has("asymmetric");
  const pairs = asymmetric ? createAsymmetricSweep(cfg.uValuePairs) : createSymmetricSweep(cfg.uValues);

  const sinks: TrialSink[] = [createTrialLog(cfg.resultsFile)];
  if (cfg.supabase) {
    const client = createMirrorClient({ supabaseUrl: cfg.supabase.url, supabaseKey: cfg.supabase.key, fetch: deps.fetch });
    sinks.push(createSupabaseTrialSink(client, cfg.supabase.table));
  }

  const handle = openOracle(cfg, deps, log);
  try {
    const summary = await runBatch({
      count,
      concurrency: cfg.concurrency,
      sinks,
      log,
      runTrial: async (index) => {
        const pair = roundRobin(pairs, index);
        const trialLog = scopedLogger(log, `trial ${index + 1}`);
        trialLog.info(`Starting ${pair.kind} trial, ${describePair(pair)}`);
        const protocol = createNegotiationProtocol({
          oracle: handle.oracle,
          rounds: cfg.rounds,
          exchangeBelief: cfg.exchangeBelief,
          finalReply: cfg.finalReply,
          techFailureRate: cfg.techFailureRate,
          oracleRetries: cfg.oracleRetries,
          random: deps.random,
          log: trialLog,
        });
        const { record } = await protocol.runTrial(pair);
        return record;
      },
    });

    out(
      `Trials: ${summary.total}, completed: ${summary.completed}, abandoned: ${summary.abandoned}, ` +
        `persisted: ${summary.persisted}, persist failures: ${summary.persistFailures}`,
    );
    return summary.completed === summary.total && summary.persistFailures === 0 ? 0 : 1;
  } finally {
    handle.stop();
  }
}

async function singleCommand(
  cfg: ResolvedExperimentConfig,
  args: ParsedArgs,
  deps: CliDeps,
  log: Logger,
  out: (text: string) => void,
): Promise<number> {
  const count = parseCount(args.positionals[0], cfg.trials);
  if (count === null) {
    out(USAGE);
    return 1;
  }
  const tasks = createSymmetricSweep(cfg.uValues).map((pair) => pair.agent1);
  const results = createSingleAgentLog(cfg.singleResultsFile);
  const handle = openOracle(cfg, deps, log);
  let consistent = 0;
  let completed = 0;
  let persistFailures = 0;

  try {
    for (let i = 0; i < count; i++) {
      const task = roundRobin(tasks, i);
      try {
        const result = await runSingleAgentTrial({
          task,
          oracle: handle.oracle,
          pFail: cfg.techFailureRate,
          retries: cfg.oracleRetries,
          random: deps.random,
          log: scopedLogger(log, `trial ${i + 1}`),
        });
        completed++;
        if (result.consistent) consistent++;
        out(
          `Task ${result.taskId} u=${result.uValue}: belief=${result.belief} choice=${result.decision.choice} ` +
            `(${result.decision.strategy}) payoff=${result.outcome.payoff} consistent=${result.consistent ? "yes" : "no"}`,
        );
        try {
          await results.append(result);
        } catch (e) {
          persistFailures++;
          log.error(`Trial ${i + 1}/${count} not persisted: ${e instanceof Error ? e.message : String(e)}`);
        }
      } catch (e) {
        log.error(`Trial ${i + 1}/${count} abandoned: ${e instanceof Error ? e.message : String(e)}`);
      }
    }
  } finally {
    handle.stop();
  }

  out(`Consistent with threshold rule: ${consistent}/${completed}`);
  return completed === count && persistFailures === 0 ? 0 : 1;
}

async function analyzeCommand(
  cfg: ResolvedExperimentConfig,
  args: ParsedArgs,
  deps: CliDeps,
  log: Logger,
  out: (text: string) => void,
): Promise<number> {
  const mode = args.flags.has("asymmetric") ? "asymmetric" : "symmetric";
  let records: TrialRecord[];

  if (args.flags.has("supabase")) {
    if (!cfg.supabase) {
      log.error("--supabase needs STAG_SUPABASE_URL and STAG_SUPABASE_KEY");
      return 1;
    }
    const client = createMirrorClient({ supabaseUrl: cfg.supabase.url, supabaseKey: cfg.supabase.key, fetch: deps.fetch });
    const load = await loadTrialRecords(client, cfg.supabase.table, { log });
    records = load.records;
  } else {
    const path = args.positionals[0] ?? cfg.resultsFile;
    const read = await readTrialLog(path, log);
    for (const s of read.skipped) log.warn(`line ${s.line}: ${s.reason}`);
    records = read.records;
  }

  out(formatAggregationReport(aggregateTrials(records, { mode, keyDecimals: cfg.keyDecimals })));
  return 0;
}

// ============================================================================
// Entry
// ============================================================================

/** Runs one command and resolves to the process exit code. */
export async function runCli(argv: readonly string[], deps: CliDeps): Promise<number> {
  const log = deps.log ?? createConsoleLogger("stag-hunt");
  const out = deps.out ?? ((text: string) => console.log(text));
  const args = parseArgs(argv);

  if (args.command === undefined || args.command === "help" || args.flags.has("help")) {
    out(USAGE);
    return args.command === undefined ? 1 : 0;
  }

  let cfg: ResolvedExperimentConfig;
  try {
    cfg = resolveExperimentConfig(readExperimentEnv(deps.env));
  } catch (e) {
    if (e instanceof ExperimentError) {
      log.error(e.message);
      return 1;
    }
    throw e;
  }

  switch (args.command) {
    case "run":
      return runCommand(cfg, args, deps, log, out);
    case "single":
      return singleCommand(cfg, args, deps, log, out);
    case "analyze":
      return analyzeCommand(cfg, args, deps, log, out);
    default:
      out(`Unknown command "${args.command}"\n${USAGE}`);
      return 1;
  }
}
