import { homedir } from "os";
import { join, resolve } from "path";
import { ConfigError } from "../errors.js";
import { type Config, ConfigSchema } from "./schema.js";

export function expandPath(path: string): string {
  if (path.startsWith("~/")) {
    return join(homedir(), path.slice(2));
  }
  if (path.startsWith("$HOME/")) {
    return join(homedir(), path.slice(6));
  }
  return resolve(path);
}

/**
 * Validates command-line options against the schema. There is no config
 * file; anything not given on the command line takes its default.
 */
export function resolveConfig(options: unknown): Config {
  const result = ConfigSchema.safeParse(options);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid options: ${issues}`);
  }

  return result.data;
}

export function getNotesFilePath(config: Config): string {
  return expandPath(config.notesFile);
}

export function getLogFilePath(config: Config): string | undefined {
  return config.logFile ? expandPath(config.logFile) : undefined;
}

export * from "./schema.js";
