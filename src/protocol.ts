/**
 * Negotiation protocol state machine for one trial.
 *
 *   INIT -> BELIEF_FORMED(1) -> BELIEF_FORMED(2)
 *        -> EXCHANGE(1, agent2) -> EXCHANGE(1, agent1) -> ... -> EXCHANGE(R, agent1)
 *        -> DECIDED(1) -> DECIDED(2) -> TERMINAL
 *
 * Agent 1 opens the conversation with the message from its belief step.
 * Each round agent 2 replies first, then agent 1. With `finalReply: "agent2"`
 * the last round is agent 2's reply alone, so agent 2 always has the last
 * word before the decisions. Every step's context is
 * built from strictly-prior steps, so steps run one at a time and the
 * sequence is checked against the plan on every transition.
 *
 * Oracle failures:
 *   - MalformedResponseError: retried, then replaced by a flagged fallback
 *   - anything else (e.g. OracleUnavailableError): the trial is abandoned
 */

import { ConfigError, MalformedResponseError, ProtocolSequenceError, StrategyChoiceMismatchError } from "./errors.js";
import type { Logger } from "./logger.js";
import type { BeliefOracle } from "./oracle.js";
import { resolveTwoAgentOutcome, type RandomSource, type TwoAgentOutcome } from "./outcome.js";
import { strategyForChoice, taskParams } from "./task.js";
import {
  DEFAULT_EXCHANGE_ROUNDS,
  DEFAULT_ORACLE_RETRIES,
  DEFAULT_TECH_FAILURE_RATE,
  FALLBACK_BELIEF,
  FALLBACK_REASONING,
  MAX_EXCHANGE_ROUNDS,
  type AgentId,
  type BeliefState,
  type Decision,
  type DecisionResponse,
  type Message,
  type Task,
  type TaskPair,
  type TrialRecord,
} from "./types-protocol.js";

// ============================================================================
// States
// ============================================================================

export type ProtocolState =
  | { phase: "init" }
  | { phase: "belief_formed"; agent: AgentId }
  | { phase: "exchange"; round: number; agent: AgentId }
  | { phase: "decided"; agent: AgentId }
  | { phase: "terminal" };

/** Which belief an agent brings into an exchange turn. */
export type ExchangeBeliefSource = "latest" | "initial";

/** Who replies in the final round: both agents, or agent 2 only. */
export type FinalReply = "both" | "agent2";

export function describeState(state: ProtocolState): string {
  switch (state.phase) {
    case "init":
      return "INIT";
    case "belief_formed":
      return `BELIEF_FORMED(agent${state.agent})`;
    case "exchange":
      return `EXCHANGE(${state.round}, agent${state.agent})`;
    case "decided":
      return `DECIDED(agent${state.agent})`;
    case "terminal":
      return "TERMINAL";
  }
}

export function planStates(rounds: number, finalReply: FinalReply = "both"): ProtocolState[] {
  const plan: ProtocolState[] = [
    { phase: "init" },
    { phase: "belief_formed", agent: 1 },
    { phase: "belief_formed", agent: 2 },
  ];
  for (let round = 1; round <= rounds; round++) {
    plan.push({ phase: "exchange", round, agent: 2 });
    if (round < rounds || finalReply === "both") plan.push({ phase: "exchange", round, agent: 1 });
  }
  plan.push({ phase: "decided", agent: 1 }, { phase: "decided", agent: 2 }, { phase: "terminal" });
  return plan;
}

// ============================================================================
// Decision validation
// ============================================================================

export interface ValidatedDecision {
  decision: Decision;
  /** Set when the strategy contradicted the choice and was replaced */
  coerced: StrategyChoiceMismatchError | null;
}

/**
 * The choice is authoritative: an unknown option id is a malformed response,
 * a strategy that contradicts a known choice is coerced from the choice.
 */
export function validateDecision(task: Task, agentId: AgentId, response: DecisionResponse): ValidatedDecision {
  const implied = strategyForChoice(task, response.choice);
  if (implied === null) {
    throw new MalformedResponseError(`unknown option "${response.choice}" for task ${task.taskId}`, JSON.stringify(response));
  }
  const coerced =
    implied === response.strategy
      ? null
      : new StrategyChoiceMismatchError(response.choice, response.strategy, implied);
  return {
    decision: { agentId, choice: response.choice, strategy: implied, reasoning: response.reasoning },
    coerced,
  };
}

export function fallbackDecision(task: Task, agentId: AgentId): Decision {
  return { agentId, choice: task.safe.id, strategy: "individual", reasoning: FALLBACK_REASONING };
}

// ============================================================================
// Protocol
// ============================================================================

export interface NegotiationProtocolOpts {
  oracle: BeliefOracle;
  rounds?: number;
  exchangeBelief?: ExchangeBeliefSource;
  finalReply?: FinalReply;
  techFailureRate?: number;
  /** Extra attempts per oracle step after a malformed response */
  oracleRetries?: number;
  random?: RandomSource;
  now?: () => Date;
  onTransition?: (state: ProtocolState) => void;
  log: Logger;
}

export interface TrialTranscript {
  states: ProtocolState[];
  beliefs: { agent1: BeliefState; agent2: BeliefState };
  messages: Message[];
  decisions: { agent1: Decision; agent2: Decision };
  outcome: TwoAgentOutcome;
}

export interface TrialResult {
  record: TrialRecord;
  transcript: TrialTranscript;
}

export interface NegotiationProtocol {
  readonly rounds: number;
  runTrial(pair: TaskPair): Promise<TrialResult>;
}

function currentBelief(state: BeliefState): number {
  return state.exchangeBeliefs.length > 0
    ? state.exchangeBeliefs[state.exchangeBeliefs.length - 1]
    : state.initialBelief;
}

function lastPrediction(state: BeliefState): number | null {
  return state.predictionsOfPartner.length > 0
    ? state.predictionsOfPartner[state.predictionsOfPartner.length - 1]
    : null;
}

export function createNegotiationProtocol(opts: NegotiationProtocolOpts): NegotiationProtocol {
  const { oracle, log } = opts;
  const rounds = opts.rounds ?? DEFAULT_EXCHANGE_ROUNDS;
  const exchangeBelief = opts.exchangeBelief ?? "latest";
  const finalReply = opts.finalReply ?? "both";
  const techFailureRate = opts.techFailureRate ?? DEFAULT_TECH_FAILURE_RATE;
  const retries = opts.oracleRetries ?? DEFAULT_ORACLE_RETRIES;
  const random = opts.random ?? Math.random;
  const now = opts.now ?? (() => new Date());

  if (!Number.isInteger(rounds) || rounds < 0 || rounds > MAX_EXCHANGE_ROUNDS) {
    throw new ConfigError([`rounds must be an integer in [0, ${MAX_EXCHANGE_ROUNDS}], got ${rounds}`]);
  }

  async function runTrial(pair: TaskPair): Promise<TrialResult> {
    const plan = planStates(rounds, finalReply);
    const states: ProtocolState[] = [];
    const fallbacks: string[] = [];
    const messages: Message[] = [];

    function advance(next: ProtocolState): void {
      const expected = plan[states.length];
      if (!expected || describeState(expected) !== describeState(next)) {
        throw new ProtocolSequenceError(expected ? describeState(expected) : "end of plan", describeState(next));
      }
      states.push(next);
      log.info(`→ ${describeState(next)}`);
      opts.onTransition?.(next);
    }

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

    const taskFor = (agent: AgentId): Task => (agent === 1 ? pair.agent1 : pair.agent2);

    advance({ phase: "init" });
    log.info(
      `Trial ${pair.agent1.taskId} (${pair.kind}, u=${pair.agent1.uValue}/${pair.agent2.uValue}, rounds=${rounds})`,
    );

    // --- Belief formation ---

    async function formBelief(agent: AgentId): Promise<BeliefState> {
      const response = await withFallback(
        `agent${agent}.belief`,
        () =>
          oracle.elicitBelief({
            agentId: agent,
            task: taskFor(agent),
            partnerId: agent === 1 ? 2 : 1,
            techFailureRate,
          }),
        () => ({ belief: FALLBACK_BELIEF, message: "" }),
      );
      const state: BeliefState = {
        initialBelief: response.belief,
        exchangeBeliefs: [],
        predictionsOfPartner: [],
        openingMessage: response.message,
      };
      advance({ phase: "belief_formed", agent });
      return state;
    }

    try {
      const agent1 = await formBelief(1);
      messages.push({ fromAgent: 1, roundIndex: 0, text: agent1.openingMessage });
      const agent2 = await formBelief(2);
      const beliefFor = (agent: AgentId): BeliefState => (agent === 1 ? agent1 : agent2);

      // --- Exchange rounds ---

      async function exchangeTurn(agent: AgentId, round: number): Promise<void> {
        const own = beliefFor(agent);
        const ownBelief = exchangeBelief === "latest" ? currentBelief(own) : own.initialBelief;
        const previousPrediction = lastPrediction(own);
        const history = [...messages];

        const reply = await withFallback(
          `agent${agent}.exchange${round}`,
          () =>
            oracle.elicitReply({
              agentId: agent,
              partnerId: agent === 1 ? 2 : 1,
              round,
              task: taskFor(agent),
              history,
              ownBelief,
              previousPrediction,
              techFailureRate,
            }),
          () => ({
            replyText: "",
            updatedBelief: currentBelief(own),
            predictedPartnerBelief: previousPrediction ?? FALLBACK_BELIEF,
          }),
        );

        messages.push({ fromAgent: agent, roundIndex: round, text: reply.replyText });
        own.exchangeBeliefs.push(reply.updatedBelief);
        own.predictionsOfPartner.push(reply.predictedPartnerBelief);
        advance({ phase: "exchange", round, agent });
      }

      for (let round = 1; round <= rounds; round++) {
        await exchangeTurn(2, round);
        if (round < rounds || finalReply === "both") await exchangeTurn(1, round);
      }

      // --- Decisions ---

      async function decide(agent: AgentId): Promise<Decision> {
        const own = beliefFor(agent);
        const partner = beliefFor(agent === 1 ? 2 : 1);
        const task = taskFor(agent);
        const label = `agent${agent}`;

        const validated = await withFallback<ValidatedDecision>(
          `${label}.decision`,
          async () =>
            validateDecision(
              task,
              agent,
              await oracle.elicitDecision({
                agentId: agent,
                task,
                finalBelief: currentBelief(own),
                partnerInitialBelief: partner.initialBelief,
                finalPrediction: lastPrediction(own),
                history: [...messages],
                techFailureRate,
              }),
            ),
          () => ({ decision: fallbackDecision(task, agent), coerced: null }),
        );

        if (validated.coerced) {
          log.warn(`${label}: ${validated.coerced.message}; strategy coerced from choice`);
          fallbacks.push(`${label}.strategy`);
        }
        advance({ phase: "decided", agent });
        return validated.decision;
      }

      const decision1 = await decide(1);
      const decision2 = await decide(2);

      const outcome = resolveTwoAgentOutcome(pair, decision1, decision2, { techFailureRate, random });
      advance({ phase: "terminal" });

      log.info(
        `Decisions: agent1=${decision1.choice} (${decision1.strategy}), agent2=${decision2.choice} (${decision2.strategy}), mismatch=${outcome.mismatch}`,
      );

      const record: TrialRecord = {
        timestamp: now().toISOString(),
        task: taskParams(pair),
        rounds,
        agent1: {
          initialBelief: agent1.initialBelief,
          finalBelief: currentBelief(agent1),
          choice: decision1.choice,
          strategy: decision1.strategy,
          payoff: outcome.agent1Payoff,
        },
        agent2: {
          initialBelief: agent2.initialBelief,
          finalBelief: currentBelief(agent2),
          choice: decision2.choice,
          strategy: decision2.strategy,
          payoff: outcome.agent2Payoff,
        },
        mismatch: outcome.mismatch,
        fallbacks,
      };

      return {
        record,
        transcript: {
          states,
          beliefs: { agent1, agent2 },
          messages,
          decisions: { agent1: decision1, agent2: decision2 },
          outcome,
        },
      };
    } catch (e) {
      const detail = e instanceof Error ? e.message : String(e);
      const at = states.length > 0 ? describeState(states[states.length - 1]) : "INIT";
      log.error(`Trial abandoned after ${at}: ${detail}`);
      throw e;
    }
  }

  return { rounds, runTrial };
}
