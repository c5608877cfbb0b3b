// ─────────────────────────────────────────────────────────────────────────────
// Installed package data (as reported by the package manager)
// ─────────────────────────────────────────────────────────────────────────────

export interface InstalledPackage {
  version: string;
  from?: string;
  resolved?: string;
  path?: string;
}

/** Keyed by package name, exactly as the package manager reports it. */
export type InstalledPackages = Record<string, InstalledPackage>;

/** A single `{ KEY: value }` assignment; order across the list is preserved. */
export type EnvAssignment = Record<string, string>;

// ─────────────────────────────────────────────────────────────────────────────
// Package manager capability
// ─────────────────────────────────────────────────────────────────────────────

export interface ListOptions {
  dir?: string;
  user?: string;
  env?: EnvAssignment[];
}

export interface InstallOptions {
  dir?: string;
  user?: string;
  registry?: string;
  env?: EnvAssignment[];
  /** Single package to install. Omit both `pkg` and `pkgs` to install from the manifest in `dir`. */
  pkg?: string;
  pkgs?: string[];
}

export interface UninstallOptions {
  pkg: string;
  dir?: string;
  user?: string;
}

export interface InstalledPackageInfo {
  name: string;
  version: string;
  path?: string;
}

export type InstallOutcome =
  | { kind: "success"; packages: InstalledPackageInfo[] }
  | { kind: "parse-failure"; raw: string }
  | { kind: "no-op" };

/**
 * Capability the state functions reconcile against.
 * Implementations throw CommandNotFoundError when the npm binary is missing
 * and CommandExecutionError when it ran and failed.
 */
export interface PackageManager {
  list(options: ListOptions): Promise<InstalledPackages>;
  install(options: InstallOptions): Promise<InstallOutcome>;
  uninstall(options: UninstallOptions): Promise<boolean>;
}

// ─────────────────────────────────────────────────────────────────────────────
// State results
// ─────────────────────────────────────────────────────────────────────────────

export type PackageListChanges = {
  old: string[];
  new: string[];
};

/** `{ old, new }` for installs, `{ [name]: action }` for removal and bootstrap. */
export type StateChanges = PackageListChanges | Record<string, string>;

export interface StateResult {
  name: string;
  /** `null` means pending: the change would happen but dry-run is on. */
  result: boolean | null;
  comment: string;
  changes: StateChanges;
}

export interface StateContext {
  packageManager: PackageManager;
  dryRun: boolean;
}
