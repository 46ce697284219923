/**
 * Oracle reply parser.
 *
 * Pulls the JSON object out of free text (models like to wrap it in prose or
 * code fences), converts loosely-typed values ("70" -> 70) and validates the
 * result against the wire schema. Anything that does not fit raises
 * MalformedResponseError at this boundary; nothing untyped leaks past it.
 */

import type { Static, TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { MalformedResponseError } from "./errors.js";
import {
  BeliefPayloadSchema,
  DecisionPayloadSchema,
  ReplyPayloadSchema,
} from "./response-schema.js";
import type { BeliefResponse, DecisionResponse, ReplyResponse } from "./types-protocol.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function extractJsonObject(text: string): Record<string, unknown> {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end <= start) {
    throw new MalformedResponseError("no JSON object found", text);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text.slice(start, end + 1));
  } catch (e) {
    const detail = e instanceof Error ? e.message : String(e);
    throw new MalformedResponseError(`invalid JSON (${detail})`, text);
  }
  if (!isRecord(parsed)) {
    throw new MalformedResponseError("JSON payload is not an object", text);
  }
  return parsed;
}

function validate<T extends TSchema>(schema: T, raw: Record<string, unknown>, text: string): Static<T> {
  const converted = Value.Convert(schema, raw);
  if (Value.Check(schema, converted)) return converted;

  for (const error of Value.Errors(schema, converted)) {
    throw new MalformedResponseError(`${error.path || "/"}: ${error.message}`, text);
  }
  throw new MalformedResponseError("payload does not match schema", text);
}

function toPercent(value: number): number {
  return Math.min(100, Math.max(0, Math.round(value)));
}

export function parseBeliefResponse(text: string): BeliefResponse {
  const payload = validate(BeliefPayloadSchema, extractJsonObject(text), text);
  return {
    belief: toPercent(payload.belief),
    message: payload.message.trim(),
    reasoning: payload.reasoning?.trim(),
  };
}

export function parseReplyResponse(text: string): ReplyResponse {
  const payload = validate(ReplyPayloadSchema, extractJsonObject(text), text);
  return {
    replyText: payload.reply.trim(),
    updatedBelief: toPercent(payload.updated_belief),
    predictedPartnerBelief: toPercent(payload.predicted_partner_belief),
  };
}

export function parseDecisionResponse(text: string): DecisionResponse {
  const raw = extractJsonObject(text);
  // Models vary the casing of the enum and pad option ids
  const normalized: Record<string, unknown> = {
    ...raw,
    choice: typeof raw.choice === "string" ? raw.choice.trim() : raw.choice,
    strategy: typeof raw.strategy === "string" ? raw.strategy.trim().toLowerCase() : raw.strategy,
  };
  const payload = validate(DecisionPayloadSchema, normalized, text);
  return {
    choice: payload.choice,
    strategy: payload.strategy,
    reasoning: payload.reasoning.trim(),
  };
}
