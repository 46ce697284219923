/**
 * Belief oracle contract and its gateway-backed implementation.
 *
 * The protocol only sees the BeliefOracle interface. Every method resolves
 * to a validated payload or rejects with MalformedResponseError (bad reply)
 * or OracleUnavailableError (no reply at all).
 */

import { OracleUnavailableError } from "./errors.js";
import type { GatewayCaller } from "./gateway.js";
import type { Logger } from "./logger.js";
import { buildBeliefPrompt, buildDecisionPrompt, buildReplyPrompt } from "./prompts.js";
import {
  parseBeliefResponse,
  parseDecisionResponse,
  parseReplyResponse,
} from "./response-parser.js";
import type {
  AgentId,
  BeliefResponse,
  DecisionResponse,
  Message,
  ReplyResponse,
  Task,
} from "./types-protocol.js";

export interface BeliefContext {
  agentId: AgentId;
  task: Task;
  /** null in the single-agent variant (simulated partner) */
  partnerId: AgentId | null;
  techFailureRate: number;
}

export interface ReplyContext {
  agentId: AgentId;
  partnerId: AgentId;
  round: number;
  task: Task;
  /** Every message strictly before this turn, in order */
  history: readonly Message[];
  ownBelief: number;
  previousPrediction: number | null;
  techFailureRate: number;
}

export interface DecisionContext {
  agentId: AgentId;
  task: Task;
  finalBelief: number;
  /** Partner's initial (not final) belief; null without a real partner */
  partnerInitialBelief: number | null;
  finalPrediction: number | null;
  history: readonly Message[];
  techFailureRate: number;
}

export interface BeliefOracle {
  elicitBelief(ctx: BeliefContext): Promise<BeliefResponse>;
  elicitReply(ctx: ReplyContext): Promise<ReplyResponse>;
  elicitDecision(ctx: DecisionContext): Promise<DecisionResponse>;
}

export interface GatewayOracleOpts {
  gateway: GatewayCaller;
  timeoutMs: number;
  retries?: number;
  log: Logger;
}

export function createGatewayOracle(opts: GatewayOracleOpts): BeliefOracle {
  const { gateway, timeoutMs, retries, log } = opts;

  async function ask(step: string, prompt: string): Promise<string> {
    const content = await gateway.call(prompt, timeoutMs, retries);
    if (content === null) throw new OracleUnavailableError(step);
    log.info(`${step} response (${content.length} chars)`);
    return content;
  }

  return {
    async elicitBelief(ctx) {
      return parseBeliefResponse(await ask(`agent${ctx.agentId} belief`, buildBeliefPrompt(ctx)));
    },
    async elicitReply(ctx) {
      return parseReplyResponse(
        await ask(`agent${ctx.agentId} exchange ${ctx.round}`, buildReplyPrompt(ctx)),
      );
    },
    async elicitDecision(ctx) {
      return parseDecisionResponse(
        await ask(`agent${ctx.agentId} decision`, buildDecisionPrompt(ctx)),
      );
    },
  };
}
