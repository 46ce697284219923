import { describe, expect, it, vi } from "vitest";
import { MalformedResponseError, OracleUnavailableError } from "./errors.js";
import type { GatewayCaller } from "./gateway.js";
import { silentLogger } from "./logger.js";
import { createGatewayOracle } from "./oracle.js";
import { createTask, DEFAULT_AGENT1_OPTIONS } from "./task.js";

const task = createTask(3, 0.66, DEFAULT_AGENT1_OPTIONS);

function fakeGateway(...replies: Array<string | null>): GatewayCaller & { prompts: string[] } {
  const prompts: string[] = [];
  return {
    prompts,
    call: vi.fn(async (prompt: string) => {
      prompts.push(prompt);
      return replies.shift() ?? null;
    }),
    stop: () => {},
  };
}

describe("createGatewayOracle", () => {
  it("parses a belief from the gateway reply", async () => {
    const gateway = fakeGateway('{"belief": 70, "message": "Shall we team up?"}');
    const oracle = createGatewayOracle({ gateway, timeoutMs: 1000, log: silentLogger });

    const belief = await oracle.elicitBelief({ agentId: 1, task, partnerId: 2, techFailureRate: 0.05 });

    expect(belief).toEqual({ belief: 70, message: "Shall we team up?", reasoning: undefined });
    expect(gateway.prompts[0]).toContain("Task ID: 3");
    expect(gateway.prompts[0]).toContain("- A (collaborative): Upside = 111, Downside = -90");
    expect(gateway.prompts[0]).toContain("- Y (individual): Guaranteed = 50");
  });

  it("puts the conversation and both beliefs into the reply prompt", async () => {
    const gateway = fakeGateway('{"reply": "ok", "updated_belief": 66, "predicted_partner_belief": 61}');
    const oracle = createGatewayOracle({ gateway, timeoutMs: 1000, log: silentLogger });

    await oracle.elicitReply({
      agentId: 2,
      partnerId: 1,
      round: 1,
      task,
      history: [{ fromAgent: 1, roundIndex: 0, text: "Shall we team up?" }],
      ownBelief: 60,
      previousPrediction: null,
      techFailureRate: 0.05,
    });

    expect(gateway.prompts[0]).toContain('Agent 1: "Shall we team up?"');
    expect(gateway.prompts[0]).toContain("You currently believe there is a 60% chance");
    expect(gateway.prompts[0]).not.toContain("Last turn you predicted");
  });

  it("raises MalformedResponseError on a bad reply", async () => {
    const oracle = createGatewayOracle({ gateway: fakeGateway("I'd pick A"), timeoutMs: 1000, log: silentLogger });
    await expect(
      oracle.elicitDecision({
        agentId: 1,
        task,
        finalBelief: 70,
        partnerInitialBelief: 60,
        finalPrediction: 62,
        history: [],
        techFailureRate: 0.05,
      }),
    ).rejects.toBeInstanceOf(MalformedResponseError);
  });

  it("raises OracleUnavailableError when the gateway gives nothing", async () => {
    const oracle = createGatewayOracle({ gateway: fakeGateway(null), timeoutMs: 1000, log: silentLogger });
    await expect(oracle.elicitBelief({ agentId: 2, task, partnerId: 1, techFailureRate: 0.05 })).rejects.toThrow(
      "Oracle unavailable during agent2 belief",
    );
    await expect(
      createGatewayOracle({ gateway: fakeGateway(null), timeoutMs: 1000, log: silentLogger }).elicitBelief({
        agentId: 2,
        task,
        partnerId: 1,
        techFailureRate: 0.05,
      }),
    ).rejects.toBeInstanceOf(OracleUnavailableError);
  });
});
