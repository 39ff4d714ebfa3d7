import { StageGraphError } from "./errors";
import type { CheckpointDefinition, TaskDefinition } from "./task";

export type StageGraph = {
  readonly tasks: ReadonlyMap<string, TaskDefinition>;
  /** Task names grouped by stage, in execution order. */
  readonly stages: ReadonlyArray<readonly string[]>;
  readonly checkpoints: readonly CheckpointDefinition[];
  checkpointForValidator(taskName: string): CheckpointDefinition | null;
  dependenciesOf(taskName: string): string[];
};

const uniq = (items: readonly string[]) => Array.from(new Set(items));

export function detectCycle(
  nodes: ReadonlyMap<string, { dependencies: readonly string[] }>
): string[] | null {
  const visiting = new Set<string>();
  const visited = new Set<string>();
  const stack: string[] = [];

  const dfs = (name: string): string[] | null => {
    if (visiting.has(name)) {
      const start = stack.indexOf(name);
      return start >= 0 ? stack.slice(start).concat(name) : [name];
    }
    if (visited.has(name)) return null;
    visiting.add(name);
    stack.push(name);
    for (const dep of nodes.get(name)?.dependencies ?? []) {
      if (!nodes.has(dep)) continue;
      const cycle = dfs(dep);
      if (cycle) return cycle;
    }
    stack.pop();
    visiting.delete(name);
    visited.add(name);
    return null;
  };

  for (const name of nodes.keys()) {
    const cycle = dfs(name);
    if (cycle) return cycle;
  }
  return null;
}

function dependsOn(
  nodes: ReadonlyMap<string, { dependencies: readonly string[] }>,
  from: string,
  target: string
): boolean {
  const seen = new Set<string>();
  const pending = [...(nodes.get(from)?.dependencies ?? [])];
  while (pending.length > 0) {
    const name = pending.pop();
    if (name === undefined || seen.has(name)) continue;
    if (name === target) return true;
    seen.add(name);
    pending.push(...(nodes.get(name)?.dependencies ?? []));
  }
  return false;
}

function validateCheckpoints(
  tasks: ReadonlyMap<string, TaskDefinition>,
  nodes: ReadonlyMap<string, { dependencies: readonly string[] }>,
  checkpoints: readonly CheckpointDefinition[]
) {
  const claimed = new Map<string, string>();
  const names = new Set<string>();

  for (const cp of checkpoints) {
    const fail = (message: string) => {
      throw new StageGraphError("invalid_checkpoint", `checkpoint ${cp.name}: ${message}`, {
        checkpoint: cp.name,
        producer: cp.producer,
        validator: cp.validator,
      });
    };

    if (names.has(cp.name)) fail("duplicate checkpoint name");
    names.add(cp.name);

    const producer = tasks.get(cp.producer);
    const validator = tasks.get(cp.validator);
    if (!producer) fail(`unknown producer ${cp.producer}`);
    if (!validator) fail(`unknown validator ${cp.validator}`);
    if (producer?.kind !== "analysis") fail("producer must be an analysis task");
    if (validator?.kind !== "validator") fail("validator must be a validator task");
    if (!validator?.requires.includes(cp.producer)) fail("validator must require its producer");
    if (cp.maxAttempts !== undefined && (!Number.isInteger(cp.maxAttempts) || cp.maxAttempts < 0)) {
      fail("maxAttempts must be a non-negative integer");
    }

    for (const member of [cp.producer, cp.validator]) {
      const owner = claimed.get(member);
      if (owner) fail(`${member} already belongs to checkpoint ${owner}`);
      claimed.set(member, cp.name);
    }

    // Producer output is provisional until the validator settles it.
    for (const [name, node] of nodes) {
      if (name === cp.validator || !node.dependencies.includes(cp.producer)) continue;
      if (!dependsOn(nodes, name, cp.validator)) {
        fail(`${name} consumes ${cp.producer} without depending on validator ${cp.validator}`);
      }
    }
  }

  for (const task of tasks.values()) {
    if (task.kind === "validator" && !claimed.has(task.name)) {
      throw new StageGraphError(
        "invalid_checkpoint",
        `validator ${task.name} is not attached to a checkpoint`,
        { validator: task.name }
      );
    }
  }
}

/**
 * Builds the static stage graph. Edges are the union of each task's required
 * and preferred dependencies. Stages come from longest-path layering, so every
 * task lands one stage after its deepest dependency.
 */
export function buildStageGraph(args: {
  tasks: readonly TaskDefinition[];
  checkpoints?: readonly CheckpointDefinition[];
}): StageGraph {
  const checkpoints = args.checkpoints ?? [];
  if (args.tasks.length === 0) {
    throw new StageGraphError("empty_graph", "stage graph has no tasks");
  }

  const tasks = new Map<string, TaskDefinition>();
  for (const task of args.tasks) {
    if (tasks.has(task.name)) {
      throw new StageGraphError("duplicate_task", `duplicate task name ${task.name}`, {
        task: task.name,
      });
    }
    tasks.set(task.name, task);
  }

  const nodes = new Map<string, { dependencies: string[] }>();
  for (const task of tasks.values()) {
    const dependencies = uniq([...task.requires, ...task.prefers]);
    for (const dep of dependencies) {
      if (!tasks.has(dep)) {
        throw new StageGraphError(
          "unknown_dependency",
          `task ${task.name} depends on unknown task ${dep}`,
          { task: task.name, dependency: dep }
        );
      }
    }
    nodes.set(task.name, { dependencies });
  }

  const cycle = detectCycle(nodes);
  if (cycle) {
    throw new StageGraphError("cycle_detected", `dependency cycle: ${cycle.join(" -> ")}`, {
      cycle,
    });
  }

  validateCheckpoints(tasks, nodes, checkpoints);

  const levels = new Map<string, number>();
  const levelOf = (name: string): number => {
    const known = levels.get(name);
    if (known !== undefined) return known;
    const deps = nodes.get(name)?.dependencies ?? [];
    const level = deps.length === 0 ? 0 : Math.max(...deps.map(levelOf)) + 1;
    levels.set(name, level);
    return level;
  };

  const stages: string[][] = [];
  for (const name of tasks.keys()) {
    const level = levelOf(name);
    while (stages.length <= level) stages.push([]);
    stages[level].push(name);
  }

  const byValidator = new Map(checkpoints.map((cp) => [cp.validator, cp]));

  return {
    tasks,
    stages,
    checkpoints,
    checkpointForValidator: (name) => byValidator.get(name) ?? null,
    dependenciesOf: (name) => [...(nodes.get(name)?.dependencies ?? [])],
  };
}
