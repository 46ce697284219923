/**
 * Outcome resolver: mismatch flag and realized payoffs.
 *
 * Two real agents: the partner's actual decision replaces the cooperation
 * draw, and one shared technical-failure draw gates every collaboration in
 * the trial. Simulated partner: independent cooperation and technical draws.
 */

import { StrategyChoiceMismatchError } from "./errors.js";
import { findCollaborativeOption } from "./task.js";
import type { Decision, Strategy, Task, TaskPair } from "./types-protocol.js";

export type RandomSource = () => number;

export function bernoulli(p: number, random: RandomSource): boolean {
  return random() < p;
}

/** 1 iff the two strategies differ. Symmetric in its arguments. */
export function isMismatch(a: Strategy, b: Strategy): 0 | 1 {
  return a !== b ? 1 : 0;
}

function payoffFor(task: Task, decision: Decision, collaborationSucceeded: boolean): number {
  if (decision.strategy === "individual") return task.safe.guaranteed;
  const option = findCollaborativeOption(task, decision.choice);
  if (!option) {
    throw new StrategyChoiceMismatchError(decision.choice, decision.strategy, "individual");
  }
  return collaborationSucceeded ? option.upside : option.downside;
}

export interface TwoAgentOutcome {
  mismatch: 0 | 1;
  technicalOk: boolean;
  agent1Payoff: number;
  agent2Payoff: number;
}

export function resolveTwoAgentOutcome(
  pair: TaskPair,
  agent1: Decision,
  agent2: Decision,
  opts: { techFailureRate: number; random: RandomSource },
): TwoAgentOutcome {
  const technicalOk = bernoulli(1 - opts.techFailureRate, opts.random);
  const bothCollaborate = agent1.strategy === "collaborative" && agent2.strategy === "collaborative";
  const succeeded = bothCollaborate && technicalOk;

  return {
    mismatch: isMismatch(agent1.strategy, agent2.strategy),
    technicalOk,
    agent1Payoff: payoffFor(pair.agent1, agent1, succeeded),
    agent2Payoff: payoffFor(pair.agent2, agent2, succeeded),
  };
}

export interface SimulatedOutcome {
  payoff: number;
  /** null when the agent chose individual and no draw was made */
  partnerCooperated: boolean | null;
  technicalOk: boolean | null;
}

export function resolveSimulatedOutcome(
  task: Task,
  decision: Decision,
  opts: { pCoop: number; pFail: number; random: RandomSource },
): SimulatedOutcome {
  if (decision.strategy === "individual") {
    return { payoff: payoffFor(task, decision, false), partnerCooperated: null, technicalOk: null };
  }
  const partnerCooperated = bernoulli(opts.pCoop, opts.random);
  const technicalOk = bernoulli(1 - opts.pFail, opts.random);
  return {
    payoff: payoffFor(task, decision, partnerCooperated && technicalOk),
    partnerCooperated,
    technicalOk,
  };
}
