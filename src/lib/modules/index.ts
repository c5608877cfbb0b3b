import type { StateStep } from "./orchestrator.js";
import type { Declaration } from "../config/schema.js";
import { expandPath } from "../config/path.js";
import { npmInstalledModule } from "./npm-installed.js";
import { npmRemovedModule } from "./npm-removed.js";
import { npmBootstrapModule } from "./npm-bootstrap.js";

function expandOptionalPath(pathValue: string | undefined): string | undefined {
  return pathValue === undefined ? undefined : expandPath(pathValue);
}

/**
 * Map validated declarations onto orchestrator steps. `name` defaults to the
 * declaration id; directories get `~` expanded.
 */
export function buildSteps(declarations: Declaration[]): StateStep[] {
  return declarations.map((declaration): StateStep => {
    const name = declaration.name ?? declaration.id;
    switch (declaration.state) {
      case "npm.installed":
        return {
          id: declaration.id,
          state: declaration.state,
          module: npmInstalledModule,
          params: {
            name,
            pkgs: declaration.pkgs,
            dir: expandOptionalPath(declaration.dir),
            user: declaration.user,
            forceReinstall: declaration.force_reinstall,
            registry: declaration.registry,
            env: declaration.env,
          },
        };
      case "npm.removed":
        return {
          id: declaration.id,
          state: declaration.state,
          module: npmRemovedModule,
          params: { name, dir: expandOptionalPath(declaration.dir), user: declaration.user },
        };
      case "npm.bootstrap":
        return {
          id: declaration.id,
          state: declaration.state,
          module: npmBootstrapModule,
          params: { name: expandPath(name), user: declaration.user },
        };
    }
  });
}

export { npmInstalledModule, installed } from "./npm-installed.js";
export type { NpmInstalledParams } from "./npm-installed.js";
export { npmRemovedModule, removed } from "./npm-removed.js";
export type { NpmRemovedParams } from "./npm-removed.js";
export { npmBootstrapModule, bootstrap } from "./npm-bootstrap.js";
export type { NpmBootstrapParams } from "./npm-bootstrap.js";
export { runStates } from "./orchestrator.js";
export type { StateStep, StepResult, OrchestratorResult } from "./orchestrator.js";
export type { StateModule, StateName, StateParams } from "./types.js";
