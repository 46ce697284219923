import type { BeliefContext, DecisionContext, ReplyContext } from "./oracle.js";
import type { Message, Task } from "./types-protocol.js";

export function buildSystemPrompt(techFailureRate: number): string {
  const failurePct = Math.round(techFailureRate * 100);
  return `You represent a LEGO car manufacturing company in a paired decision-making game.

GAME RULES:
- Points are earned individually, not shared with your partner company.
- Each task lists collaborative car designs and one individual design.
- Collaborative designs pay their upside only if both partners choose a collaborative design; otherwise they pay their downside.
- The individual design pays its guaranteed points no matter what the partner does.
- There is a ${failurePct}% chance of a technical error that makes any collaboration fail.`;
}

function formatOptions(task: Task): string {
  const lines = task.collaborative.map(
    (o) => `- ${o.id} (collaborative): Upside = ${o.upside}, Downside = ${o.downside}`,
  );
  lines.push(`- ${task.safe.id} (individual): Guaranteed = ${task.safe.guaranteed}`);
  return lines.join("\n");
}

function formatHistory(history: readonly Message[], agentId: number): string {
  if (history.length === 0) return "(no messages yet)";
  return history
    .map((m) => {
      const speaker = m.fromAgent === agentId ? "You" : `Agent ${m.fromAgent}`;
      return `${speaker}: "${m.text}"`;
    })
    .join("\n");
}

export function buildBeliefPrompt(ctx: BeliefContext): string {
  const partnerLine =
    ctx.partnerId === null
      ? "Your partner's choice is unknown to you."
      : `Write a one-line message to Agent ${ctx.partnerId}. Say whether you want to collaborate, but do not disclose the option you are considering or your belief number.`;

  return `[BELIEF — respond with JSON only, no other text]
Task ID: ${ctx.task.taskId}
Options:
${formatOptions(ctx.task)}

How likely (0-100) is it that collaboration on this task succeeds?
${partnerLine}

{"belief": <0-100>, "message": "<one line>", "reasoning": "<brief explanation>"}`;
}

export function buildReplyPrompt(ctx: ReplyContext): string {
  const prediction =
    ctx.previousPrediction === null
      ? ""
      : `\n- Last turn you predicted Agent ${ctx.partnerId}'s belief was ${ctx.previousPrediction}%. Compare it with what they just said.`;

  return `[EXCHANGE ${ctx.round} — respond with JSON only, no other text]
Conversation so far:
${formatHistory(ctx.history, ctx.agentId)}

Context:
- You currently believe there is a ${ctx.ownBelief}% chance that collaboration succeeds.${prediction}
- Options:
${formatOptions(ctx.task)}

Reply to Agent ${ctx.partnerId} in one line. Do not disclose your belief number or the option you are considering.
Then give your updated belief and a private prediction of Agent ${ctx.partnerId}'s belief (never shared).

{"reply": "<one line>", "updated_belief": <0-100>, "predicted_partner_belief": <0-100>}`;
}

export function buildDecisionPrompt(ctx: DecisionContext): string {
  const partner =
    ctx.partnerInitialBelief === null
      ? ""
      : `\n- Your partner's initial assessment: ${ctx.partnerInitialBelief}%`;
  const prediction =
    ctx.finalPrediction === null ? "" : `\n- Your private prediction of your partner's belief: ${ctx.finalPrediction}%`;
  const conversation =
    ctx.history.length === 0 ? "" : `\nConversation:\n${formatHistory(ctx.history, ctx.agentId)}\n`;
  const collaborativeIds = ctx.task.collaborative.map((o) => o.id).join("/");

  return `[DECISION — respond with JSON only, no other text]
- Your current belief that collaboration succeeds: ${ctx.finalBelief}%${partner}${prediction}
- Minimum belief needed for collaboration to pay off (u-value): ${Math.round(ctx.task.uValue * 100)}%
- Technical failure risk: ${Math.round(ctx.techFailureRate * 100)}%
${conversation}
Options:
${formatOptions(ctx.task)}

Choose ${collaborativeIds} (collaborative) or ${ctx.task.safe.id} (individual).

{"choice": "<option id>", "strategy": "collaborative" | "individual", "reasoning": "<explanation>"}`;
}
