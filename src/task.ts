import { InvalidTaskError } from "./errors.js";
import type {
  CollaborativeOption,
  SafeOption,
  Strategy,
  Task,
  TaskPair,
  TrialTaskParams,
} from "./types-protocol.js";

/** Raw option as it appears in experiment configuration. */
export interface OptionInput {
  id: string;
  upside?: number;
  downside?: number;
  guaranteed?: number;
}

const OPTION_ID_RE = /^[A-Za-z0-9_-]+$/;

// Default payoff tables: agent 1 A/B/C/Y, agent 2 K/L/M/Y
export const DEFAULT_AGENT1_OPTIONS: readonly OptionInput[] = [
  { id: "A", upside: 111, downside: -90 },
  { id: "B", upside: 92, downside: -45 },
  { id: "C", upside: 77, downside: -15 },
  { id: "Y", guaranteed: 50 },
];

export const DEFAULT_AGENT2_OPTIONS: readonly OptionInput[] = [
  { id: "K", upside: 90, downside: -90 },
  { id: "L", upside: 75, downside: -45 },
  { id: "M", upside: 65, downside: -15 },
  { id: "Y", guaranteed: 45 },
];

function requireInteger(value: number, label: string): number {
  if (!Number.isInteger(value)) {
    throw new InvalidTaskError(`${label} must be an integer, got ${value}`);
  }
  return value;
}

export function createTask(
  taskId: string | number,
  uValue: number,
  payoffs: readonly OptionInput[],
): Task {
  const id = String(taskId).trim();
  if (!OPTION_ID_RE.test(id)) {
    throw new InvalidTaskError(`task id "${id}" must match ${OPTION_ID_RE}`);
  }
  if (!Number.isFinite(uValue) || uValue < 0 || uValue > 1) {
    throw new InvalidTaskError(`u_value ${uValue} is outside [0, 1]`);
  }

  const seen = new Set<string>();
  const collaborative: CollaborativeOption[] = [];
  let safe: SafeOption | null = null;

  for (const option of payoffs) {
    if (!OPTION_ID_RE.test(option.id)) {
      throw new InvalidTaskError(`option id "${option.id}" must match ${OPTION_ID_RE}`);
    }
    if (seen.has(option.id)) {
      throw new InvalidTaskError(`duplicate option id "${option.id}"`);
    }
    seen.add(option.id);

    if (option.guaranteed !== undefined) {
      if (option.upside !== undefined || option.downside !== undefined) {
        throw new InvalidTaskError(`option "${option.id}" mixes guaranteed and upside/downside payoffs`);
      }
      if (safe) {
        throw new InvalidTaskError(`more than one safe option ("${safe.id}", "${option.id}")`);
      }
      safe = {
        kind: "safe",
        id: option.id,
        guaranteed: requireInteger(option.guaranteed, `${option.id}.guaranteed`),
      };
      continue;
    }

    if (option.upside === undefined || option.downside === undefined) {
      throw new InvalidTaskError(`collaborative option "${option.id}" needs both upside and downside`);
    }
    collaborative.push({
      kind: "collaborative",
      id: option.id,
      upside: requireInteger(option.upside, `${option.id}.upside`),
      downside: requireInteger(option.downside, `${option.id}.downside`),
    });
  }

  if (!safe) throw new InvalidTaskError("no safe option with a guaranteed payoff");
  if (collaborative.length === 0) throw new InvalidTaskError("no collaborative options");

  return { taskId: id, uValue, collaborative, safe };
}

export function createSymmetricTaskPair(task: Task): TaskPair {
  return { kind: "symmetric", agent1: task, agent2: task };
}

/**
 * Asymmetric pair: collaborative option ids must be disjoint between the two
 * agents. The safe option id may be shared (both sides call it "Y").
 */
export function createAsymmetricTaskPair(agent1: Task, agent2: Task): TaskPair {
  const agent1Ids = new Set(agent1.collaborative.map((o) => o.id));
  const shared = agent2.collaborative.filter((o) => agent1Ids.has(o.id)).map((o) => o.id);
  if (shared.length > 0) {
    throw new InvalidTaskError(`asymmetric tasks share collaborative option ids: ${shared.join(", ")}`);
  }
  if (agent1.taskId !== agent2.taskId) {
    throw new InvalidTaskError(`asymmetric tasks disagree on task id ("${agent1.taskId}" vs "${agent2.taskId}")`);
  }
  return { kind: "asymmetric", agent1, agent2 };
}

/** Ground-truth rationality rule: collaborate iff belief/100 > u_value. */
export function rationalStrategy(belief: number, task: Task): Strategy {
  return belief / 100 > task.uValue ? "collaborative" : "individual";
}

/** Strategy implied by an option id, or null if the task has no such option. */
export function strategyForChoice(task: Task, choice: string): Strategy | null {
  if (choice === task.safe.id) return "individual";
  if (task.collaborative.some((o) => o.id === choice)) return "collaborative";
  return null;
}

export function findCollaborativeOption(task: Task, choice: string): CollaborativeOption | null {
  return task.collaborative.find((o) => o.id === choice) ?? null;
}

export function taskParams(pair: TaskPair): TrialTaskParams {
  if (pair.kind === "symmetric") {
    return {
      taskId: pair.agent1.taskId,
      uValue: pair.agent1.uValue,
      agent1UValue: null,
      agent2UValue: null,
    };
  }
  return {
    taskId: pair.agent1.taskId,
    uValue: null,
    agent1UValue: pair.agent1.uValue,
    agent2UValue: pair.agent2.uValue,
  };
}

/** One symmetric task pair per u-value, task ids numbered from 1. */
export function createSymmetricSweep(
  uValues: readonly number[],
  options: readonly OptionInput[] = DEFAULT_AGENT1_OPTIONS,
): TaskPair[] {
  return uValues.map((u, i) => createSymmetricTaskPair(createTask(i + 1, u, options)));
}

export function createAsymmetricSweep(
  uValuePairs: ReadonlyArray<readonly [number, number]>,
  agent1Options: readonly OptionInput[] = DEFAULT_AGENT1_OPTIONS,
  agent2Options: readonly OptionInput[] = DEFAULT_AGENT2_OPTIONS,
): TaskPair[] {
  return uValuePairs.map(([u1, u2], i) =>
    createAsymmetricTaskPair(createTask(i + 1, u1, agent1Options), createTask(i + 1, u2, agent2Options)),
  );
}
