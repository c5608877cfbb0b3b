import type { StateModule } from "./types.js";
import type { EnvAssignment, InstallOptions, InstallOutcome, InstalledPackages, StateContext, StateResult } from "../types.js";
import { isCapabilityError } from "../errors.js";
import { formatPackageSpec, normalizePackageNames, parsePackageSpec } from "../package-spec.js";
import { logError } from "../validation.js";
import { newResult, quoted } from "./result.js";

export interface NpmInstalledParams {
  /** The package spec to install; also the declaration id. */
  name: string;
  /** Packages to install in a single npm invocation. When set, `name` is ignored. */
  pkgs?: string[];
  /** Target directory, or undefined for a global install. */
  dir?: string;
  user?: string;
  forceReinstall?: boolean;
  registry?: string;
  env?: EnvAssignment[];
}

interface InstallPlan {
  toInstall: string[];
  satisfied: string[];
  /** Name of the last spec examined, lower-cased and without its version. */
  lastName: string;
}

function planInstall(
  pkgList: string[],
  installedPkgs: InstalledPackages,
  forceReinstall: boolean
): InstallPlan {
  const toInstall: string[] = [];
  const satisfied: string[] = [];
  let lastName = "";

  for (const pkg of pkgList) {
    const { name, version } = parsePackageSpec(pkg);
    lastName = name;

    if (forceReinstall) {
      toInstall.push(pkg);
      continue;
    }

    if (!Object.hasOwn(installedPkgs, name)) {
      toInstall.push(pkg);
      continue;
    }

    const current = installedPkgs[name];

    if (version && current.version !== version) {
      toInstall.push(pkg);
      continue;
    }

    satisfied.push(formatPackageSpec(name, current.version));
  }

  return { toInstall, satisfied, lastName };
}

function satisfiedComment(pkgList: string[], satisfied: string[]): string {
  return `Package(s) ${quoted(pkgList.join(", "))} satisfied by ${satisfied.join(", ")}`;
}

/**
 * Ensure the given package(s) are installed, at the requested version when one
 * is given.
 */
export async function installed(params: NpmInstalledParams, ctx: StateContext): Promise<StateResult> {
  const { name, pkgs, dir, user, registry, env } = params;
  const forceReinstall = params.forceReinstall ?? false;
  const ret = newResult(name);
  const pkgList = pkgs ?? [name];

  let installedPkgs: InstalledPackages;
  try {
    installedPkgs = normalizePackageNames(await ctx.packageManager.list({ dir, user, env }));
  } catch (error) {
    if (!isCapabilityError(error)) throw error;
    logError(`npm.installed ${name}`, error);
    ret.result = false;
    ret.comment = `Error looking up ${quoted(name)}: ${error.message}`;
    return ret;
  }

  const plan = planInstall(pkgList, installedPkgs, forceReinstall);

  if (ctx.dryRun) {
    const comment: string[] = [];
    if (plan.toInstall.length > 0) {
      comment.push(`NPM package(s) ${quoted(plan.toInstall.join(", "))} are set to be installed`);
      ret.changes = { old: [], new: plan.toInstall };
    }
    if (plan.satisfied.length > 0) {
      comment.push(satisfiedComment(pkgList, plan.satisfied));
    }
    ret.comment = comment.join(". ");
    return ret;
  }

  if (plan.toInstall.length === 0) {
    ret.result = true;
    ret.comment = satisfiedComment(pkgList, plan.satisfied);
    return ret;
  }

  // Without `pkgs` the install targets the last spec examined, stripped of its
  // version, not `name` itself.
  const options: InstallOptions = pkgs !== undefined
    ? { dir, user, registry, env, pkgs }
    : { dir, user, registry, env, pkg: plan.lastName };

  let outcome: InstallOutcome;
  try {
    outcome = await ctx.packageManager.install(options);
  } catch (error) {
    if (!isCapabilityError(error)) throw error;
    logError(`npm.installed ${name}`, error);
    ret.result = false;
    ret.comment = `Error installing ${quoted(pkgList.join(", "))}: ${error.message}`;
    return ret;
  }

  if (outcome.kind === "success" && outcome.packages.length > 0) {
    ret.result = true;
    ret.changes = { old: [], new: plan.toInstall };
    ret.comment = `Package(s) ${quoted(plan.toInstall.join(", "))} successfully installed`;
  } else {
    ret.result = false;
    ret.comment = `Could not install package(s) ${quoted(pkgList.join(", "))}`;
  }

  return ret;
}

export const npmInstalledModule: StateModule<"npm.installed"> = {
  name: "npm.installed",
  run: installed,
};
