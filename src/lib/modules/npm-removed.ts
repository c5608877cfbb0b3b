import type { StateModule } from "./types.js";
import type { InstalledPackages, StateContext, StateResult } from "../types.js";
import { isCapabilityError } from "../errors.js";
import { logError } from "../validation.js";
import { newResult, quoted } from "./result.js";

export interface NpmRemovedParams {
  name: string;
  dir?: string;
  user?: string;
}

/**
 * Ensure the given package is not installed.
 *
 * The lookup only forwards `dir`, and `name` is matched against the listing as
 * given (no lower-casing), unlike `npm.installed`.
 */
export async function removed(params: NpmRemovedParams, ctx: StateContext): Promise<StateResult> {
  const { name, dir, user } = params;
  const ret = newResult(name);

  let installedPkgs: InstalledPackages;
  try {
    installedPkgs = await ctx.packageManager.list({ dir });
  } catch (error) {
    if (!isCapabilityError(error)) throw error;
    logError(`npm.removed ${name}`, error);
    ret.result = false;
    ret.comment = `Error uninstalling ${quoted(name)}: ${error.message}`;
    return ret;
  }

  if (!Object.hasOwn(installedPkgs, name)) {
    ret.result = true;
    ret.comment = `Package ${quoted(name)} is not installed`;
    return ret;
  }

  if (ctx.dryRun) {
    ret.comment = `Package ${quoted(name)} is set to be removed`;
    return ret;
  }

  let uninstalled: boolean;
  try {
    uninstalled = await ctx.packageManager.uninstall({ pkg: name, dir, user });
  } catch (error) {
    if (!isCapabilityError(error)) throw error;
    logError(`npm.removed ${name}`, error);
    ret.result = false;
    ret.comment = `Error removing package ${quoted(name)}: ${error.message}`;
    return ret;
  }

  if (uninstalled) {
    ret.result = true;
    ret.changes = { [name]: "Removed" };
    ret.comment = `Package ${quoted(name)} was successfully removed`;
  } else {
    ret.result = false;
    ret.comment = `Error removing package ${quoted(name)}`;
  }

  return ret;
}

export const npmRemovedModule: StateModule<"npm.removed"> = {
  name: "npm.removed",
  run: removed,
};
