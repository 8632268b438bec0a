/**
 * JSONC configuration file parsing and environment variable expansion.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { parse as parseJsonc, printParseErrorCode, type ParseError } from "jsonc-parser";
import { ConfigurationError, describeError } from "@erpsync/core";
import { configFileSchema, type AppConfig, type ConfigFile } from "./config.js";

type Environment = Record<string, string | undefined>;

/**
 * Load, expand and validate a JSONC configuration file.
 * @throws ConfigurationError if the file cannot be read, parsed or validated
 */
export async function loadConfigFile(
  configPath: string,
  env: Environment = process.env
): Promise<AppConfig> {
  const fullPath = path.resolve(configPath);

  let content: string;
  try {
    content = await fs.readFile(fullPath, "utf-8");
  } catch (error) {
    throw new ConfigurationError(
      `Failed to read config from ${fullPath}: ${describeError(error)}`,
      { cause: error }
    );
  }
  return parseConfigText(content, fullPath, env);
}

/**
 * Parse configuration text. `source` only appears in error messages.
 */
export function parseConfigText(
  content: string,
  source = "config",
  env: Environment = process.env
): AppConfig {
  const errors: ParseError[] = [];
  const raw: unknown = parseJsonc(content, errors, {
    allowTrailingComma: true,
    disallowComments: false,
  });

  if (errors.length > 0) {
    const messages = errors.map(
      (e) => `${printParseErrorCode(e.error)} at offset ${e.offset}`
    );
    throw new ConfigurationError(`Failed to parse ${source}: ${messages.join(", ")}`);
  }
  if (!raw || typeof raw !== "object" || Array.isArray(raw)) {
    throw new ConfigurationError(`${source}: configuration file must contain an object`);
  }

  return toAppConfig(validateConfig(expandEnvironmentVariables(raw, env), source));
}

/**
 * Expand ${VAR} and ${VAR:-default} references in a string.
 * A reference to an unset variable without a default is kept as written,
 * so validation can report it.
 */
export function expandEnvVar(value: string, env: Environment = process.env): string {
  return value.replace(
    /\$\{([^}:]+)(?::-([^}]*))?\}/g,
    (match: string, name: string, fallback: string | undefined) => {
      const envValue = env[name];
      if (envValue !== undefined) {
        return envValue;
      }
      return fallback ?? match;
    }
  );
}

/**
 * Recursively expand environment variables in every string of a parsed document.
 */
export function expandEnvironmentVariables(value: unknown, env: Environment = process.env): unknown {
  if (typeof value === "string") {
    return expandEnvVar(value, env);
  }
  if (Array.isArray(value)) {
    return value.map((item) => expandEnvironmentVariables(item, env));
  }
  if (value && typeof value === "object") {
    const expanded: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      expanded[key] = expandEnvironmentVariables(item, env);
    }
    return expanded;
  }
  return value;
}

/**
 * Validate the structure of an expanded configuration document.
 */
export function validateConfig(raw: unknown, source = "config"): ConfigFile {
  const result = configFileSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    throw new ConfigurationError(`Invalid configuration in ${source}: ${problems.join("; ")}`);
  }
  return result.data;
}

/**
 * Convert the file's snake_case sections to the runtime shape.
 */
export function toAppConfig(file: ConfigFile): AppConfig {
  return {
    store: file.store,
    remote: file.remote,
    outbound: {
      intervalMinutes: file.outbound.interval_minutes,
      runOnStart: file.outbound.run_on_start,
    },
    inbound: {
      batchSize: file.inbound.batch_size,
      maxRecords: file.inbound.max_records,
    },
  };
}
