import { describe, expect, it, vi } from "vitest";
import { createGatewayCaller } from "./gateway.js";
import { silentLogger } from "./logger.js";

function completion(content: string): Response {
  return new Response(JSON.stringify({ choices: [{ message: { role: "assistant", content } }] }), {
    status: 200,
    headers: { "Content-Type": "application/json" },
  });
}

describe("createGatewayCaller", () => {
  it("posts a chat completion with the system prompt and bearer token", async () => {
    const fetch = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => completion('  {"belief": 70}  '));
    const gateway = createGatewayCaller({
      gatewayUrl: "http://localhost:18789",
      gatewayToken: "test-secret",
      model: "gpt-5-nano",
      systemPrompt: "You play a game.",
      fetch,
      log: silentLogger,
    });

    await expect(gateway.call("What is your belief?", 1000)).resolves.toBe('{"belief": 70}');

    expect(fetch).toHaveBeenCalledTimes(1);
    const [url, init] = fetch.mock.calls[0];
    expect(url).toBe("http://localhost:18789/v1/chat/completions");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({ "Content-Type": "application/json", Authorization: "Bearer test-secret" });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "gpt-5-nano",
      messages: [
        { role: "system", content: "You play a game." },
        { role: "user", content: "What is your belief?" },
      ],
    });
  });

  it("omits the authorization header without a token", async () => {
    const fetch = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => completion("ok"));
    const gateway = createGatewayCaller({
      gatewayUrl: "http://localhost:18789",
      gatewayToken: null,
      model: "gpt-5-nano",
      fetch,
      log: silentLogger,
    });

    await gateway.call("hi", 1000);
    expect(fetch.mock.calls[0][1]?.headers).toEqual({ "Content-Type": "application/json" });
  });

  it("retries after an HTTP error and an empty reply, then gives up", async () => {
    const fetch = vi
      .fn(async (_url: string | URL | Request, _init?: RequestInit) => completion("recovered"))
      .mockResolvedValueOnce(new Response("overloaded", { status: 503 }))
      .mockResolvedValueOnce(completion("   "));
    const error = vi.fn();
    const warn = vi.fn();
    const gateway = createGatewayCaller({
      gatewayUrl: "http://localhost:18789",
      gatewayToken: null,
      model: "gpt-5-nano",
      backoffMs: 0,
      fetch,
      log: { ...silentLogger, error, warn },
    });

    await expect(gateway.call("hi", 1000, 1)).resolves.toBeNull();
    expect(error).toHaveBeenCalledWith("Gateway HTTP 503 (attempt 1/2): overloaded");
    expect(warn).toHaveBeenCalledWith("Gateway returned empty (attempt 2/2)");

    await expect(gateway.call("hi", 1000, 0)).resolves.toBe("recovered");
  });

  it("resolves to null after stop()", async () => {
    const fetch = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => completion("ok"));
    const gateway = createGatewayCaller({
      gatewayUrl: "http://localhost:18789",
      gatewayToken: null,
      model: "gpt-5-nano",
      fetch,
      log: silentLogger,
    });
    gateway.stop();
    await expect(gateway.call("hi", 1000)).resolves.toBeNull();
    expect(fetch).not.toHaveBeenCalled();
  });
});
