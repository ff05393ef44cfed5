/**
 * Config loader: reads a YAML (or JSON) file, resolves `${VAR}`
 * references from the environment, applies the `VENDING_LOG_LEVEL`
 * override and validates.
 *
 * A missing file yields the defaults. A file that cannot be parsed or
 * does not validate is an error.
 */

import { readFile } from "node:fs/promises";
import { parse as parseYAML } from "yaml";
import { InvalidInputError } from "../errors/index.js";
import { formatIssues } from "../inventory/index.js";
import { createNoOpLogger, type Logger } from "../logging/index.js";
import type { UnknownRecord } from "../types.js";
import { MachineConfigSchema, type MachineConfig } from "./schema.js";

export const LOG_LEVEL_ENV_VAR = "VENDING_LOG_LEVEL";

export interface LoadConfigOptions {
  /** Defaults to process.env */
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

/**
 * Recursively resolve `${VAR_NAME}` patterns in string values. Unset
 * variables resolve to an empty string.
 */
export function resolveEnvVars(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{(\w+)\}/g, (_match, key: string) => env[key] ?? "");
  }
  if (Array.isArray(value)) {
    return value.map((item) => resolveEnvVars(item, env));
  }
  if (value !== null && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, resolveEnvVars(item, env)])
    );
  }
  return value;
}

function isRecord(value: unknown): value is UnknownRecord {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Validate an already-parsed config document.
 *
 * @throws InvalidInputError listing every schema violation
 */
export function parseMachineConfig(
  raw: unknown,
  env: NodeJS.ProcessEnv = process.env
): MachineConfig {
  const document = raw === null || raw === undefined ? {} : resolveEnvVars(raw, env);
  if (!isRecord(document)) {
    throw new InvalidInputError("Machine config must be a mapping at the top level", {
      received: Array.isArray(document) ? "array" : typeof document,
    });
  }

  const override = env[LOG_LEVEL_ENV_VAR];
  const withOverride: UnknownRecord =
    override !== undefined && override !== ""
      ? {
          ...document,
          logging: { ...(isRecord(document["logging"]) ? document["logging"] : {}), level: override },
        }
      : document;

  const result = MachineConfigSchema.safeParse(withOverride);
  if (!result.success) {
    const errors = formatIssues(result.error);
    throw new InvalidInputError(
      `Invalid machine config: ${errors.map((e) => `${e.path || "(root)"}: ${e.message}`).join("; ")}`,
      { errors }
    );
  }
  return result.data;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Load and validate a machine config file.
 */
export async function loadMachineConfig(
  configPath: string,
  options: LoadConfigOptions = {}
): Promise<MachineConfig> {
  const env = options.env ?? process.env;
  const logger = options.logger ?? createNoOpLogger();

  let text: string;
  try {
    text = await readFile(configPath, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) {
      logger.info("No machine config found, using defaults", { configPath });
      return parseMachineConfig({}, env);
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = parseYAML(text);
  } catch (error) {
    throw new InvalidInputError(
      `Failed to parse machine config ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
      { configPath }
    );
  }

  const config = parseMachineConfig(parsed, env);
  logger.info("Loaded machine config", {
    configPath,
    machineId: config.machineId,
    products: config.products.length,
  });
  return config;
}
