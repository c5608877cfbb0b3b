const ENV_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function logError(context: string, error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`${context}: ${message}`);
}

export function validateRegistryUrl(url: string): void {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (error) {
    throw new Error(`Invalid registry URL: ${url}`);
  }

  if (parsed.protocol !== "https:" && parsed.protocol !== "http:") {
    throw new Error(`Unsupported registry URL protocol: ${parsed.protocol}`);
  }
}

export function validateEnvName(name: string): void {
  if (!ENV_NAME_PATTERN.test(name)) {
    throw new Error(`Invalid environment variable name: ${name}`);
  }
}

/**
 * Turn a validator into a boolean predicate, for use in schema refinements.
 */
export function passes(validate: (value: string) => void, value: string): boolean {
  try {
    validate(value);
    return true;
  } catch {
    return false;
  }
}
