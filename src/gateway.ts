/**
 * LLM gateway caller (OpenAI-compatible /v1/chat/completions).
 *
 * Returns the assistant text, or null when every attempt failed. Callers
 * decide what a null means; the oracle turns it into OracleUnavailableError.
 */

import type { Logger } from "./logger.js";

export interface GatewayCallerOpts {
  gatewayUrl: string;
  gatewayToken: string | null;
  model: string;
  /** Sent as the system message on every call */
  systemPrompt?: string;
  maxConcurrent?: number;
  /** Base back-off between attempts; attempt n waits backoffMs * n */
  backoffMs?: number;
  fetch?: typeof fetch;
  log: Logger;
}

export interface GatewayCaller {
  call(prompt: string, timeoutMs: number, retries?: number): Promise<string | null>;
  /** Releases queued callers; calls made after stop() resolve to null. */
  stop(): void;
}

const DEFAULT_MAX_CONCURRENT = 3;
const DEFAULT_BACKOFF_MS = 2000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function extractContent(body: unknown): string | null {
  if (!isRecord(body) || !Array.isArray(body.choices)) return null;
  const first: unknown = body.choices[0];
  if (!isRecord(first) || !isRecord(first.message)) return null;
  const content = first.message.content;
  return typeof content === "string" && content.trim() ? content.trim() : null;
}

export function createGatewayCaller(opts: GatewayCallerOpts): GatewayCaller {
  const { gatewayUrl, gatewayToken, model, systemPrompt, log } = opts;
  const doFetch = opts.fetch ?? fetch;
  const maxConcurrent = opts.maxConcurrent ?? DEFAULT_MAX_CONCURRENT;
  const backoffMs = opts.backoffMs ?? DEFAULT_BACKOFF_MS;

  // Concurrency semaphore: parallel trials share one gateway
  let active = 0;
  const queue: Array<() => void> = [];
  let stopped = false;

  async function call(prompt: string, timeoutMs: number, retries: number = 1): Promise<string | null> {
    for (let attempt = 0; attempt <= retries; attempt++) {
      while (active >= maxConcurrent && !stopped) {
        await new Promise<void>((resolve) => queue.push(resolve));
      }
      if (stopped) return null;
      active++;
      try {
        const thisTimeout = attempt === 0 ? timeoutMs : timeoutMs * 2;
        const messages = systemPrompt
          ? [
              { role: "system", content: systemPrompt },
              { role: "user", content: prompt },
            ]
          : [{ role: "user", content: prompt }];

        const headers: Record<string, string> = { "Content-Type": "application/json" };
        if (gatewayToken) headers.Authorization = `Bearer ${gatewayToken}`;

        const res = await doFetch(`${gatewayUrl}/v1/chat/completions`, {
          method: "POST",
          headers,
          body: JSON.stringify({ model, messages }),
          signal: AbortSignal.timeout(thisTimeout),
        });

        if (!res.ok) {
          const errBody = await res.text().catch(() => "");
          log.error(`Gateway HTTP ${res.status} (attempt ${attempt + 1}/${retries + 1}): ${errBody.slice(0, 200)}`);
        } else {
          const content = extractContent(await res.json());
          if (content) return content;
          log.warn(`Gateway returned empty (attempt ${attempt + 1}/${retries + 1})`);
        }
      } catch (e) {
        const detail = e instanceof Error ? e.message : String(e);
        log.error(`Gateway call failed (attempt ${attempt + 1}/${retries + 1}): ${detail}`);
      } finally {
        active--;
        queue.shift()?.();
      }

      if (attempt < retries && backoffMs > 0) {
        await new Promise((r) => setTimeout(r, backoffMs * (attempt + 1)));
      }
    }
    return null;
  }

  function stop(): void {
    stopped = true;
    for (const resolve of queue) resolve();
    queue.length = 0;
  }

  return { call, stop };
}
