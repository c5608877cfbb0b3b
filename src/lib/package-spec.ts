export interface PackageSpec {
  /** Trimmed, lower-cased package name used for comparison. */
  name: string;
  /** Exact version requested, or empty when any installed version is acceptable. */
  version: string;
}

/**
 * Split `name@version` into its parts. A leading `@` belongs to a scoped name,
 * so `@scope/pkg@1.2.3` splits at the second `@`. Only the name is trimmed; the
 * version is kept verbatim for exact comparison.
 */
export function parsePackageSpec(spec: string): PackageSpec {
  const nameStart = spec.length - spec.trimStart().length;
  const separator = spec.indexOf("@", spec.startsWith("@", nameStart) ? nameStart + 1 : 0);
  if (separator === -1) {
    return { name: spec.trim().toLowerCase(), version: "" };
  }
  return {
    name: spec.slice(0, separator).trim().toLowerCase(),
    version: spec.slice(separator + 1),
  };
}

export function formatPackageSpec(name: string, version: string): string {
  return `${name}@${version}`;
}

/**
 * Lower-case the keys of a package listing so lookups by parsed spec name match
 * regardless of how the package manager cased them.
 */
export function normalizePackageNames<T>(packages: Record<string, T>): Record<string, T> {
  return Object.fromEntries(
    Object.entries(packages).map(([name, info]): [string, T] => [name.toLowerCase(), info])
  );
}
