/**
 * Protocol types for the stag-hunt negotiation engine.
 *
 * One trial: both agents form a belief, exchange a fixed number of
 * message/reply rounds, then commit to a collaborative or individual option.
 */

export const PROTOCOL_VERSION = "stag-hunt-v1";

// --- Protocol tuning ---
export const DEFAULT_EXCHANGE_ROUNDS = 3;
export const MAX_EXCHANGE_ROUNDS = 10;
export const DEFAULT_TECH_FAILURE_RATE = 0.05;
export const DEFAULT_ORACLE_RETRIES = 1;

// --- Fallback values ---
/** Substituted when belief elicitation fails to produce a usable number */
export const FALLBACK_BELIEF = 50;
export const FALLBACK_REASONING = "fallback: no usable decision from oracle";

// --- Aggregation ---
/** Decimals used to canonicalize u-value grouping keys; null = exact float match */
export const DEFAULT_KEY_DECIMALS = 2;

// --- Options / tasks ---

export type AgentId = 1 | 2;
export type Strategy = "collaborative" | "individual";

export interface CollaborativeOption {
  kind: "collaborative";
  id: string;
  upside: number;
  downside: number;
}

export interface SafeOption {
  kind: "safe";
  id: string;
  guaranteed: number;
}

export type Option = CollaborativeOption | SafeOption;

export interface Task {
  taskId: string;
  /** Minimum belief (probability 0-1) at which collaborating beats the safe payoff */
  uValue: number;
  collaborative: readonly CollaborativeOption[];
  safe: SafeOption;
}

/** Each agent holds its own task; symmetric trials pass the same task twice. */
export interface TaskPair {
  kind: "symmetric" | "asymmetric";
  agent1: Task;
  agent2: Task;
}

// --- Conversation ---

export interface Message {
  fromAgent: AgentId;
  /** 0 = opening message, k = exchange round k */
  roundIndex: number;
  text: string;
}

export interface BeliefState {
  initialBelief: number;
  /** One entry per completed exchange turn of this agent */
  exchangeBeliefs: number[];
  predictionsOfPartner: number[];
  openingMessage: string;
}

export interface Decision {
  agentId: AgentId;
  choice: string;
  strategy: Strategy;
  reasoning: string;
}

// --- Oracle payloads (validated, see response-schema.ts) ---

export interface BeliefResponse {
  belief: number;
  message: string;
  reasoning?: string;
}

export interface ReplyResponse {
  replyText: string;
  updatedBelief: number;
  predictedPartnerBelief: number;
}

export interface DecisionResponse {
  choice: string;
  strategy: Strategy;
  reasoning: string;
}

// --- Persisted record ---

/**
 * Task parameters as persisted. Symmetric trials carry `uValue`; asymmetric
 * trials carry the per-agent pair. A parsed record may be missing either.
 */
export interface TrialTaskParams {
  taskId: string;
  uValue: number | null;
  agent1UValue: number | null;
  agent2UValue: number | null;
}

export interface AgentOutcome {
  initialBelief: number | null;
  finalBelief: number | null;
  choice: string | null;
  strategy: Strategy;
  payoff: number | null;
}

export interface TrialRecord {
  timestamp: string;
  task: TrialTaskParams;
  rounds: number | null;
  agent1: AgentOutcome;
  agent2: AgentOutcome;
  mismatch: 0 | 1;
  /** Protocol steps answered by a fallback instead of the oracle */
  fallbacks: string[];
}
