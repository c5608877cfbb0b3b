import { readFileSync, existsSync } from "fs";
import { join } from "path";
import { parse as parseYaml } from "yaml";
import { DeclarationFileSchema, type DeclarationFile } from "./schema.js";
import { getConfigDir } from "./path.js";

export interface LoadDeclarationsResult {
  file: DeclarationFile;
  path: string;
  errors: DeclarationLoadError[];
}

export interface DeclarationLoadError {
  source: string;
  message: string;
  path?: string[];
}

/**
 * Determine the default declaration file path.
 */
export function getDeclarationsPath(): string {
  return join(getConfigDir(), "states.yaml");
}

function parseYamlFile(filePath: string): { data: Record<string, unknown>; errors: DeclarationLoadError[] } {
  const errors: DeclarationLoadError[] = [];
  try {
    const content = readFileSync(filePath, "utf-8");
    const data: unknown = parseYaml(content);
    if (data === null || data === undefined) {
      return { data: {}, errors };
    }
    if (typeof data !== "object" || Array.isArray(data)) {
      errors.push({
        source: filePath,
        message: "Declaration file must be a YAML mapping (object), not a scalar or sequence",
      });
      return { data: {}, errors };
    }
    return { data: { ...data }, errors };
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    errors.push({ source: filePath, message: msg });
    return { data: {}, errors };
  }
}

/**
 * Load and validate declarations from YAML.
 * A missing file yields an empty declaration set; parse and schema errors are
 * returned alongside an empty set rather than thrown.
 */
export function loadDeclarations(declarationsPath?: string): LoadDeclarationsResult {
  const path = declarationsPath || getDeclarationsPath();

  if (!existsSync(path)) {
    return { file: DeclarationFileSchema.parse({}), path, errors: [] };
  }

  const parsed = parseYamlFile(path);
  if (parsed.errors.length > 0) {
    return { file: DeclarationFileSchema.parse({}), path, errors: parsed.errors };
  }

  const result = DeclarationFileSchema.safeParse(parsed.data);
  if (!result.success) {
    const errors = result.error.issues.map((issue) => ({
      source: path,
      message: issue.message,
      path: issue.path.map(String),
    }));
    return { file: DeclarationFileSchema.parse({}), path, errors };
  }

  return { file: result.data, path, errors: [] };
}

/**
 * Load declarations, throwing on any parse or validation failure.
 */
export function loadDeclarationsStrict(declarationsPath?: string): DeclarationFile {
  const { file, errors } = loadDeclarations(declarationsPath);
  if (errors.length > 0) {
    const messages = errors.map((e) =>
      e.path ? `${e.source}: ${e.path.join(".")}: ${e.message}` : `${e.source}: ${e.message}`
    );
    throw new Error(`Declaration validation failed:\n${messages.join("\n")}`);
  }
  return file;
}
