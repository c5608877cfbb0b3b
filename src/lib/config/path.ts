import { homedir } from "os";
import { join } from "path";

const APP_DIR_NAME = "npm-state";

/**
 * Expand a leading `~` (alone or followed by `/`) against `home`. `~user`
 * forms are left untouched.
 */
export function expandPath(pathValue: string, home: string = homedir()): string {
  if (pathValue !== "~" && !pathValue.startsWith("~/")) return pathValue;
  return join(home, pathValue.slice(1));
}

/**
 * Directory holding `states.yaml`. `NPM_STATE_CONFIG_DIR` wins outright;
 * otherwise the XDG config home (or `~/.config`) gets an `npm-state` subdirectory.
 */
export function getConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.NPM_STATE_CONFIG_DIR;
  if (override) return expandPath(override);
  return join(env.XDG_CONFIG_HOME || join(homedir(), ".config"), APP_DIR_NAME);
}
