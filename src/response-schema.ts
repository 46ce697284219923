/**
 * Wire schemas for belief-oracle replies.
 *
 * prompts.ts asks for exactly these keys; response-parser.ts validates
 * every reply against them.
 */

import { Type, type Static } from "@sinclair/typebox";

const Percent = (description: string) =>
  Type.Number({ minimum: 0, maximum: 100, description });

export const BeliefPayloadSchema = Type.Object({
  belief: Percent("Likelihood (0-100) that collaboration succeeds"),
  message: Type.String({ description: "One-line message to the partner" }),
  reasoning: Type.Optional(Type.String({ description: "Brief explanation of the belief" })),
});

export const ReplyPayloadSchema = Type.Object({
  reply: Type.String({ description: "One-line reply to the partner" }),
  updated_belief: Percent("Own belief after this exchange"),
  predicted_partner_belief: Percent("Private prediction of the partner's belief"),
});

export const DecisionPayloadSchema = Type.Object({
  choice: Type.String({ minLength: 1, description: "Chosen option id" }),
  strategy: Type.Union([Type.Literal("collaborative"), Type.Literal("individual")]),
  reasoning: Type.String({ description: "Explanation of the decision" }),
});

export type BeliefPayload = Static<typeof BeliefPayloadSchema>;
export type ReplyPayload = Static<typeof ReplyPayloadSchema>;
export type DecisionPayload = Static<typeof DecisionPayloadSchema>;
