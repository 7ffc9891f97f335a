import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { ZodError } from "zod";
import type { AmicusConfig } from "./types.js";
import { getConfigPath } from "./paths.js";
import { parseConfig } from "./schema.js";

const ENV_PATTERN = /\$\{env:([A-Z_][A-Z0-9_]*)\}/g;

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ConfigError";
  }
}

export function substituteEnv(raw: string): string {
  return raw.replace(ENV_PATTERN, (match, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      throw new Error(`Missing environment variable: ${varName} (referenced as ${match})`);
    }
    return value;
  });
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

function describeIssues(err: ZodError): string {
  return err.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/** Parse config text after `${env:NAME}` substitution. */
export function parseConfigText(content: string, path: string): AmicusConfig {
  try {
    const raw: unknown = JSON.parse(substituteEnv(content));
    return parseConfig(raw);
  } catch (err) {
    if (err instanceof ZodError) {
      throw new ConfigError(`Invalid config ${path}: ${describeIssues(err)}`, path, { cause: err });
    }
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Invalid config ${path}: ${reason}`, path, { cause: err });
  }
}

export function loadConfig(path?: string): AmicusConfig {
  const configPath = resolve(path ?? getConfigPath());

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) {
      return parseConfig({});
    }
    throw err;
  }

  return parseConfigText(content, configPath);
}
