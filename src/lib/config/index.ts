export {
  DeclarationFileSchema,
  DeclarationSchema,
  InstalledDeclarationSchema,
  RemovedDeclarationSchema,
  BootstrapDeclarationSchema,
  SettingsSchema,
} from "./schema.js";
export type {
  DeclarationFile,
  Declaration,
  InstalledDeclaration,
  RemovedDeclaration,
  BootstrapDeclaration,
  Settings,
} from "./schema.js";
export { loadDeclarations, loadDeclarationsStrict, getDeclarationsPath } from "./loader.js";
export type { LoadDeclarationsResult, DeclarationLoadError } from "./loader.js";
export { expandPath, getConfigDir } from "./path.js";
