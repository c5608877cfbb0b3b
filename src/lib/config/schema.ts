import { z } from "zod";
import { passes, validateEnvName, validateRegistryUrl } from "../validation.js";

// ─────────────────────────────────────────────────────────────────────────────
// Shared argument schemas
// ─────────────────────────────────────────────────────────────────────────────

const EnvAssignmentSchema = z
  .record(z.string(), z.string())
  .refine((assignment) => Object.keys(assignment).every((key) => passes(validateEnvName, key)), {
    message: "Invalid environment variable name",
  });

const RegistrySchema = z.string().refine((url) => passes(validateRegistryUrl, url), {
  message: "Registry must be an http(s) URL",
});

const DeclarationBase = {
  id: z.string().min(1),
  /** Defaults to `id`. */
  name: z.string().min(1).optional(),
};

// ─────────────────────────────────────────────────────────────────────────────
// Per-state declarations, discriminated by `state`
// ─────────────────────────────────────────────────────────────────────────────

export const InstalledDeclarationSchema = z.object({
  ...DeclarationBase,
  state: z.literal("npm.installed"),
  pkgs: z.array(z.string().min(1)).min(1).optional(),
  dir: z.string().min(1).optional(),
  user: z.string().min(1).optional(),
  force_reinstall: z.boolean().default(false),
  registry: RegistrySchema.optional(),
  env: z.array(EnvAssignmentSchema).optional(),
});

export const RemovedDeclarationSchema = z.object({
  ...DeclarationBase,
  state: z.literal("npm.removed"),
  dir: z.string().min(1).optional(),
  user: z.string().min(1).optional(),
});

export const BootstrapDeclarationSchema = z.object({
  ...DeclarationBase,
  state: z.literal("npm.bootstrap"),
  user: z.string().min(1).optional(),
});

export const DeclarationSchema = z.discriminatedUnion("state", [
  InstalledDeclarationSchema,
  RemovedDeclarationSchema,
  BootstrapDeclarationSchema,
]);

export type InstalledDeclaration = z.infer<typeof InstalledDeclarationSchema>;
export type RemovedDeclaration = z.infer<typeof RemovedDeclarationSchema>;
export type BootstrapDeclaration = z.infer<typeof BootstrapDeclarationSchema>;
export type Declaration = z.infer<typeof DeclarationSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Settings
// ─────────────────────────────────────────────────────────────────────────────

export const SettingsSchema = z.object({
  /** Dry-run: report what would change without changing it. */
  test: z.boolean().default(false),
});

export type Settings = z.infer<typeof SettingsSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Top-level declaration file
// ─────────────────────────────────────────────────────────────────────────────

// Use parsed defaults so inner .default() values are applied
const SETTINGS_DEFAULT = SettingsSchema.parse({});

export const DeclarationFileSchema = z
  .object({
    settings: SettingsSchema.default(SETTINGS_DEFAULT),
    states: z.array(DeclarationSchema).default([]),
  })
  .superRefine((file, ctx) => {
    const seen = new Set<string>();
    file.states.forEach((declaration, index) => {
      if (seen.has(declaration.id)) {
        ctx.addIssue({
          code: "custom",
          message: `Duplicate state id: ${declaration.id}`,
          path: ["states", index, "id"],
        });
      }
      seen.add(declaration.id);
    });
  });

export type DeclarationFile = z.infer<typeof DeclarationFileSchema>;
