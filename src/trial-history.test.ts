import { describe, expect, it, vi } from "vitest";
import { ResultLogWriteError } from "./errors.js";
import { silentLogger } from "./logger.js";
import { makeRecord } from "./test-support.js";
import {
  createMirrorClient,
  createSupabaseTrialSink,
  fromTrialRow,
  loadTrialRecords,
  toTrialRow,
  writeTrialRecord,
} from "./trial-history.js";

interface CapturedRequest {
  method: string;
  url: URL;
  body: unknown;
}

/** In-process stand-in for the PostgREST endpoint behind the Supabase client. */
function fakeRest(handler: (req: CapturedRequest) => Response) {
  const requests: CapturedRequest[] = [];
  const fetch = vi.fn(async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const req: CapturedRequest = {
      method: init?.method ?? "GET",
      url: new URL(input instanceof Request ? input.url : String(input)),
      body: typeof init?.body === "string" ? JSON.parse(init.body) : null,
    };
    requests.push(req);
    return handler(req);
  });
  const client = createMirrorClient({ supabaseUrl: "http://127.0.0.1:54321", supabaseKey: "test-key", fetch });
  return { client, requests };
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

describe("trial rows", () => {
  it("maps records to snake_case rows and back", () => {
    const record = makeRecord({ fallbacks: ["agent1.decision"], agent1: { payoff: 50 } });
    const row = toTrialRow(record);
    expect(row).toMatchObject({
      protocol: "stag-hunt-v1",
      task_id: "1",
      u_value: 0.66,
      agent1_belief: 70,
      agent1_strategy: "collaborative",
      agent1_payoff: 50,
      agent2_payoff: null,
      fallbacks: ["agent1.decision"],
    });
    expect(fromTrialRow(row)).toEqual(record);
  });
});

describe("writeTrialRecord", () => {
  it("inserts one row into the configured table", async () => {
    const { client, requests } = fakeRest(() => new Response(null, { status: 201 }));
    const record = makeRecord({});

    await writeTrialRecord(client, "trial_records", record);

    expect(requests).toHaveLength(1);
    expect(requests[0].method).toBe("POST");
    expect(requests[0].url.pathname).toBe("/rest/v1/trial_records");
    expect(requests[0].body).toEqual(toTrialRow(record));
  });

  it("rejects with ResultLogWriteError so the batch can count it", async () => {
    const { client } = fakeRest(() => json({ message: "permission denied for table trial_records", code: "42501" }, 403));
    const sink = createSupabaseTrialSink(client);

    expect(sink.name).toBe("supabase");
    await expect(sink.append(makeRecord({}))).rejects.toThrow(
      new ResultLogWriteError("supabase:trial_records", new Error("permission denied for table trial_records")),
    );
  });
});

describe("loadTrialRecords", () => {
  it("pages through the table oldest first", async () => {
    const rows = ["1", "2", "3"].map((taskId) => toTrialRow(makeRecord({ taskId })));
    const { client, requests } = fakeRest((req) => {
      const offset = Number(req.url.searchParams.get("offset") ?? 0);
      const limit = Number(req.url.searchParams.get("limit") ?? rows.length);
      return json(rows.slice(offset, offset + limit));
    });

    const load = await loadTrialRecords(client, "trial_records", { pageSize: 2, log: silentLogger });

    expect(load.complete).toBe(true);
    expect(load.records.map((r) => r.task.taskId)).toEqual(["1", "2", "3"]);
    expect(requests).toHaveLength(2);
    expect(requests[0].url.searchParams.get("order")).toBe("timestamp.asc");
  });

  it("skips rows that do not match the trial schema", async () => {
    const good = toTrialRow(makeRecord({}));
    const { client } = fakeRest(() => json([good, { ...good, agent1_strategy: "maybe" }, { id: 3 }]));
    const warn = vi.fn();

    const load = await loadTrialRecords(client, "trial_records", { log: { ...silentLogger, warn } });

    expect(load.records).toHaveLength(1);
    expect(load.invalidRows).toBe(2);
    expect(warn).toHaveBeenCalledWith("loadTrialRecords: skipped 2 row(s) not matching the trial schema");
  });

  it("returns what it has when a page fails", async () => {
    const { client } = fakeRest(() => json({ message: 'relation "trial_records" does not exist', code: "42P01" }, 404));
    const error = vi.fn();

    const load = await loadTrialRecords(client, "trial_records", { log: { ...silentLogger, error } });

    expect(load).toEqual({ records: [], invalidRows: 0, complete: false });
    expect(error).toHaveBeenCalledWith(
      'loadTrialRecords: trial_records page at 0 failed: relation "trial_records" does not exist',
    );
  });
});
