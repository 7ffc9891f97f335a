import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

export const DB_FILENAME = "amicus.db";
/** Accepted by StoreDB in place of a file for a throwaway database. */
export const IN_MEMORY_DB = ":memory:";

type Env = Readonly<Record<string, string | undefined>>;

export function getStateDir(env: Env = process.env): string {
  return env["AMICUS_STATE_DIR"] ?? join(homedir(), ".amicus");
}

export function getConfigPath(env: Env = process.env): string {
  return env["AMICUS_CONFIG_PATH"] ?? "amicus.config.json";
}

/** Database file inside the state directory, which is created on the way. */
export function resolveDatabasePath(stateDir: string = getStateDir()): string {
  if (stateDir === IN_MEMORY_DB) return stateDir;
  mkdirSync(stateDir, { recursive: true });
  return join(stateDir, DB_FILENAME);
}
