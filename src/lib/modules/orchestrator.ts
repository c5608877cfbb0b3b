import type { StateModule, StateName, StateParams } from "./types.js";
import type { StateContext, StateResult } from "../types.js";
import { hasChanges } from "./result.js";

/** One declaration ready to run; `state` ties the module to its parameter type. */
export type StateStep = {
  [N in StateName]: {
    id: string;
    state: N;
    module: StateModule<N>;
    params: StateParams[N];
  };
}[StateName];

export interface StepResult {
  id: string;
  state: StateName;
  result: StateResult;
}

export interface OrchestratorResult {
  steps: StepResult[];
  summary: {
    succeeded: number;
    failed: number;
    pending: number;
    changed: number;
  };
}

/**
 * Run every step in order against one package manager. With `ctx.dryRun` set,
 * no step mutates anything and changes are reported as pending.
 */
export async function runStates(steps: StateStep[], ctx: StateContext): Promise<OrchestratorResult> {
  const results: StepResult[] = [];

  for (const step of steps) {
    const result = await runStep(step, ctx);
    results.push({ id: step.id, state: step.state, result });
  }

  return buildResult(results);
}

function runStep(step: StateStep, ctx: StateContext): Promise<StateResult> {
  switch (step.state) {
    case "npm.installed":
      return step.module.run(step.params, ctx);
    case "npm.removed":
      return step.module.run(step.params, ctx);
    case "npm.bootstrap":
      return step.module.run(step.params, ctx);
  }
}

function buildResult(steps: StepResult[]): OrchestratorResult {
  const summary = { succeeded: 0, failed: 0, pending: 0, changed: 0 };

  for (const step of steps) {
    if (step.result.result === true) summary.succeeded++;
    else if (step.result.result === false) summary.failed++;
    else summary.pending++;
    if (hasChanges(step.result.changes)) summary.changed++;
  }

  return { steps, summary };
}
