// Shared fakes for the test suites. Not part of the public API.

import type { BeliefContext, BeliefOracle, DecisionContext, ReplyContext } from "./oracle.js";
import type { RandomSource } from "./outcome.js";
import type {
  AgentId,
  BeliefResponse,
  DecisionResponse,
  ReplyResponse,
  TrialRecord,
} from "./types-protocol.js";

/** A scripted answer, or the error the oracle should reject with. */
export type Step<T> = T | Error;

export interface OracleScript {
  belief?: Partial<Record<AgentId, Array<Step<BeliefResponse>>>>;
  reply?: Partial<Record<AgentId, Array<Step<ReplyResponse>>>>;
  decision?: Partial<Record<AgentId, Array<Step<DecisionResponse>>>>;
}

export interface ScriptedOracle extends BeliefOracle {
  calls: {
    belief: BeliefContext[];
    reply: ReplyContext[];
    decision: DecisionContext[];
  };
}

function take<T>(queue: Array<Step<T>> | undefined, label: string): T {
  const next = queue?.shift();
  if (next === undefined) throw new Error(`script exhausted: ${label}`);
  if (next instanceof Error) throw next;
  return next;
}

/** Oracle that answers from per-agent queues, consuming one entry per call. */
export function createScriptedOracle(script: OracleScript): ScriptedOracle {
  const calls: ScriptedOracle["calls"] = { belief: [], reply: [], decision: [] };
  return {
    calls,
    async elicitBelief(ctx) {
      calls.belief.push(ctx);
      return take(script.belief?.[ctx.agentId], `agent${ctx.agentId} belief`);
    },
    async elicitReply(ctx) {
      calls.reply.push(ctx);
      return take(script.reply?.[ctx.agentId], `agent${ctx.agentId} reply ${ctx.round}`);
    },
    async elicitDecision(ctx) {
      calls.decision.push(ctx);
      return take(script.decision?.[ctx.agentId], `agent${ctx.agentId} decision`);
    },
  };
}

/** Returns the given values in order, then repeats the last one. */
export function sequenceRandom(values: readonly number[]): RandomSource {
  let i = 0;
  return () => values[Math.min(i++, values.length - 1)];
}

export function makeRecord(overrides: {
  taskId?: string;
  uValue?: number | null;
  agent1UValue?: number | null;
  agent2UValue?: number | null;
  agent1?: Partial<TrialRecord["agent1"]>;
  agent2?: Partial<TrialRecord["agent2"]>;
  mismatch?: 0 | 1;
  fallbacks?: string[];
}): TrialRecord {
  const agent1: TrialRecord["agent1"] = {
    initialBelief: 70,
    finalBelief: 70,
    choice: "A",
    strategy: "collaborative",
    payoff: null,
    ...overrides.agent1,
  };
  const agent2: TrialRecord["agent2"] = {
    initialBelief: 60,
    finalBelief: 60,
    choice: "B",
    strategy: "collaborative",
    payoff: null,
    ...overrides.agent2,
  };
  return {
    timestamp: "2026-10-18T09:30:00.000Z",
    task: {
      taskId: overrides.taskId ?? "1",
      uValue: overrides.uValue === undefined ? 0.66 : overrides.uValue,
      agent1UValue: overrides.agent1UValue ?? null,
      agent2UValue: overrides.agent2UValue ?? null,
    },
    rounds: 3,
    agent1,
    agent2,
    mismatch: overrides.mismatch ?? (agent1.strategy === agent2.strategy ? 0 : 1),
    fallbacks: overrides.fallbacks ?? [],
  };
}
