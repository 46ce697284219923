import { describe, expect, it } from "vitest";
import { InvalidTaskError } from "./errors.js";
import {
  createAsymmetricSweep,
  createAsymmetricTaskPair,
  createSymmetricSweep,
  createTask,
  DEFAULT_AGENT1_OPTIONS,
  DEFAULT_AGENT2_OPTIONS,
  rationalStrategy,
  strategyForChoice,
  taskParams,
} from "./task.js";

describe("createTask", () => {
  it("splits options into collaborative and safe", () => {
    const task = createTask(1, 0.66, DEFAULT_AGENT1_OPTIONS);
    expect(task.taskId).toBe("1");
    expect(task.collaborative.map((o) => o.id)).toEqual(["A", "B", "C"]);
    expect(task.safe).toEqual({ kind: "safe", id: "Y", guaranteed: 50 });
  });

  it.each([
    ["u-value above 1", 1.2, DEFAULT_AGENT1_OPTIONS],
    ["u-value below 0", -0.1, DEFAULT_AGENT1_OPTIONS],
    ["no safe option", 0.5, [{ id: "A", upside: 10, downside: -5 }]],
    ["two safe options", 0.5, [{ id: "A", upside: 10, downside: -5 }, { id: "Y", guaranteed: 5 }, { id: "Z", guaranteed: 4 }]],
    ["no collaborative option", 0.5, [{ id: "Y", guaranteed: 5 }]],
    ["duplicate ids", 0.5, [{ id: "A", upside: 10, downside: -5 }, { id: "A", upside: 9, downside: -4 }, { id: "Y", guaranteed: 5 }]],
    ["missing downside", 0.5, [{ id: "A", upside: 10 }, { id: "Y", guaranteed: 5 }]],
    ["non-integer payoff", 0.5, [{ id: "A", upside: 10.5, downside: -5 }, { id: "Y", guaranteed: 5 }]],
    ["bad option id", 0.5, [{ id: "A B", upside: 10, downside: -5 }, { id: "Y", guaranteed: 5 }]],
  ])("rejects %s", (_label, u, options) => {
    expect(() => createTask(1, u, options)).toThrow(InvalidTaskError);
  });
});

describe("task pairs", () => {
  it("requires disjoint collaborative ids but allows a shared safe id", () => {
    const pair = createAsymmetricTaskPair(
      createTask(1, 0.66, DEFAULT_AGENT1_OPTIONS),
      createTask(1, 0.75, DEFAULT_AGENT2_OPTIONS),
    );
    expect(pair.kind).toBe("asymmetric");
    expect(taskParams(pair)).toEqual({ taskId: "1", uValue: null, agent1UValue: 0.66, agent2UValue: 0.75 });

    expect(() =>
      createAsymmetricTaskPair(createTask(1, 0.66, DEFAULT_AGENT1_OPTIONS), createTask(1, 0.5, DEFAULT_AGENT1_OPTIONS)),
    ).toThrow("asymmetric tasks share collaborative option ids: A, B, C");
  });

  it("builds sweeps with numbered task ids", () => {
    const symmetric = createSymmetricSweep([0.5, 0.66]);
    expect(symmetric.map((p) => [p.agent1.taskId, p.agent1.uValue, p.agent2.uValue])).toEqual([
      ["1", 0.5, 0.5],
      ["2", 0.66, 0.66],
    ]);

    const asymmetric = createAsymmetricSweep([[0.66, 0.75]]);
    expect(asymmetric[0].agent2.collaborative.map((o) => o.id)).toEqual(["K", "L", "M"]);
    expect(asymmetric[0].agent2.safe.guaranteed).toBe(45);
  });
});

describe("choice rules", () => {
  const task = createTask(1, 0.66, DEFAULT_AGENT1_OPTIONS);

  it("derives the strategy from the option id", () => {
    expect(strategyForChoice(task, "B")).toBe("collaborative");
    expect(strategyForChoice(task, "Y")).toBe("individual");
    expect(strategyForChoice(task, "K")).toBeNull();
  });

  it("collaborates only above the u-value", () => {
    expect(rationalStrategy(70, task)).toBe("collaborative");
    expect(rationalStrategy(66, task)).toBe("individual");
    expect(rationalStrategy(40, task)).toBe("individual");
  });
});
