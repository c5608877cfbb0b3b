import type { StateModule } from "./types.js";
import type { InstallOutcome, StateContext, StateResult } from "../types.js";
import { isCapabilityError } from "../errors.js";
import { logError } from "../validation.js";
import { newResult, quoted } from "./result.js";

export interface NpmBootstrapParams {
  /** Directory containing the package.json to install from. */
  name: string;
  user?: string;
}

/**
 * Install a project's dependencies from its manifest (`npm install` in `name`).
 */
export async function bootstrap(params: NpmBootstrapParams, ctx: StateContext): Promise<StateResult> {
  const { name, user } = params;
  const ret = newResult(name);

  if (ctx.dryRun) {
    ret.comment = `Directory ${quoted(name)} is set to be bootstrapped`;
    return ret;
  }

  let outcome: InstallOutcome;
  try {
    outcome = await ctx.packageManager.install({ dir: name, user });
  } catch (error) {
    if (!isCapabilityError(error)) throw error;
    logError(`npm.bootstrap ${name}`, error);
    ret.result = false;
    ret.comment = `Error Bootstrapping ${quoted(name)}: ${error.message}`;
    return ret;
  }

  switch (outcome.kind) {
    case "no-op":
      ret.result = true;
      ret.comment = "Directory is already bootstrapped";
      break;
    case "parse-failure":
      ret.result = false;
      ret.comment = "Could not bootstrap directory";
      break;
    case "success":
      if (outcome.packages.length === 0) {
        ret.result = true;
        ret.comment = "Directory is already bootstrapped";
        break;
      }
      ret.result = true;
      ret.changes = { [name]: "Bootstrapped" };
      ret.comment = "Directory was successfully bootstrapped";
      break;
  }

  return ret;
}

export const npmBootstrapModule: StateModule<"npm.bootstrap"> = {
  name: "npm.bootstrap",
  run: bootstrap,
};
