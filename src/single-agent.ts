/**
 * Single-agent variant: one belief, one decision, simulated partner.
 *
 * Partner cooperation and technical failure are independent draws, so the
 * outcome resolver runs in its stochastic mode. The result also reports
 * whether the decision agrees with the threshold rule for the stated belief.
 */

import { MalformedResponseError } from "./errors.js";
import type { Logger } from "./logger.js";
import type { BeliefOracle } from "./oracle.js";
import { resolveSimulatedOutcome, type RandomSource, type SimulatedOutcome } from "./outcome.js";
import { fallbackDecision, validateDecision, type ValidatedDecision } from "./protocol.js";
import { rationalStrategy } from "./task.js";
import { createLineAppender } from "./trial-log.js";
import {
  DEFAULT_ORACLE_RETRIES,
  DEFAULT_TECH_FAILURE_RATE,
  FALLBACK_BELIEF,
  type Decision,
  type Strategy,
  type Task,
} from "./types-protocol.js";

export const DEFAULT_PARTNER_COOPERATION = 0.5;

export interface SingleAgentTrialOpts {
  task: Task;
  oracle: BeliefOracle;
  /** Probability the simulated partner cooperates */
  pCoop?: number;
  pFail?: number;
  retries?: number;
  random?: RandomSource;
  now?: () => Date;
  log: Logger;
}

export interface SingleAgentResult {
  taskId: string;
  timestamp: string;
  uValue: number;
  belief: number;
  decision: Decision;
  /** Strategy the threshold rule prescribes for `belief` */
  rational: Strategy;
  consistent: boolean;
  outcome: SimulatedOutcome;
  fallbacks: string[];
}

export async function runSingleAgentTrial(opts: SingleAgentTrialOpts): Promise<SingleAgentResult> {
  const { task, oracle, log } = opts;
  const pCoop = opts.pCoop ?? DEFAULT_PARTNER_COOPERATION;
  const pFail = opts.pFail ?? DEFAULT_TECH_FAILURE_RATE;
  const retries = opts.retries ?? DEFAULT_ORACLE_RETRIES;
  const random = opts.random ?? Math.random;
  const now = opts.now ?? (() => new Date());
  const fallbacks: string[] = [];

  async function withFallback<T>(label: string, attempt: () => Promise<T>, fallback: () => T): Promise<T> {
    for (let i = 0; i <= retries; i++) {
      try {
        return await attempt();
      } catch (e) {
        if (!(e instanceof MalformedResponseError)) throw e;
        log.warn(`${label}: ${e.message} (attempt ${i + 1}/${retries + 1})`);
      }
    }
    log.warn(`${label}: using fallback`);
    fallbacks.push(label);
    return fallback();
  }

  const { belief } = await withFallback(
    "agent1.belief",
    () => oracle.elicitBelief({ agentId: 1, task, partnerId: null, techFailureRate: pFail }),
    () => ({ belief: FALLBACK_BELIEF, message: "" }),
  );

  const validated = await withFallback<ValidatedDecision>(
    "agent1.decision",
    async () =>
      validateDecision(
        task,
        1,
        await oracle.elicitDecision({
          agentId: 1,
          task,
          finalBelief: belief,
          partnerInitialBelief: null,
          finalPrediction: null,
          history: [],
          techFailureRate: pFail,
        }),
      ),
    () => ({ decision: fallbackDecision(task, 1), coerced: null }),
  );
  if (validated.coerced) {
    log.warn(`agent1: ${validated.coerced.message}; strategy coerced from choice`);
    fallbacks.push("agent1.strategy");
  }

  const { decision } = validated;
  const rational = rationalStrategy(belief, task);
  const outcome = resolveSimulatedOutcome(task, decision, { pCoop, pFail, random });
  log.info(
    `Task ${task.taskId}: belief=${belief}, choice=${decision.choice} (${decision.strategy}), payoff=${outcome.payoff}`,
  );

  return {
    taskId: task.taskId,
    timestamp: now().toISOString(),
    uValue: task.uValue,
    belief,
    decision,
    rational,
    consistent: rational === decision.strategy,
    outcome,
    fallbacks,
  };
}

// ============================================================================
// Result log
// ============================================================================

/** One JSON object per line, snake_case keys. */
export function formatSingleAgentLine(result: SingleAgentResult): string {
  return JSON.stringify({
    task_id: result.taskId,
    timestamp: result.timestamp,
    u_value: result.uValue,
    belief: result.belief,
    decision: {
      choice: result.decision.choice,
      strategy: result.decision.strategy,
      reasoning: result.decision.reasoning,
    },
    rational_strategy: result.rational,
    consistent: result.consistent,
    payoff: result.outcome.payoff,
    partner_cooperated: result.outcome.partnerCooperated,
    technical_ok: result.outcome.technicalOk,
    fallbacks: result.fallbacks,
  });
}

export interface SingleAgentLog {
  readonly path: string;
  append(result: SingleAgentResult): Promise<void>;
}

export function createSingleAgentLog(path: string): SingleAgentLog {
  const appendLine = createLineAppender(path);
  return { path, append: (result) => appendLine(formatSingleAgentLine(result)) };
}
