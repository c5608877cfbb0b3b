import type { StateContext, StateResult } from "../types.js";
import type { NpmInstalledParams } from "./npm-installed.js";
import type { NpmRemovedParams } from "./npm-removed.js";
import type { NpmBootstrapParams } from "./npm-bootstrap.js";

/** Parameters accepted by each state function, keyed by state name. */
export interface StateParams {
  "npm.installed": NpmInstalledParams;
  "npm.removed": NpmRemovedParams;
  "npm.bootstrap": NpmBootstrapParams;
}

export type StateName = keyof StateParams;

/**
 * A state function bound to a name. Each call re-queries the package manager,
 * so running it twice against a converged system makes no changes.
 */
export interface StateModule<N extends StateName> {
  readonly name: N;
  run(params: StateParams[N], ctx: StateContext): Promise<StateResult>;
}
