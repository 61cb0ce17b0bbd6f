/**
 * Config loader — optional YAML file validated against TermContextConfig.
 */

import { readFile } from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import { ConfigurationError, describeError } from "../errors.js";
import { TermContextConfig, type FoodsConfig } from "../schemas/config.js";

/**
 * Validate a raw config object, filling defaults.
 * `null`/`undefined` (an empty YAML document) means "all defaults".
 */
export function parseConfig(raw: unknown, source = "config"): TermContextConfig {
  const result = TermContextConfig.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ConfigurationError("CONFIG_INVALID", `Invalid ${source}: ${issues.join("; ")}`, {
      issues,
    });
  }
  return result.data;
}

/**
 * Load configuration from a YAML file, or defaults when no path is given.
 */
export async function loadConfig(configPath?: string): Promise<TermContextConfig> {
  if (!configPath) {
    return parseConfig({});
  }

  let content: string;
  try {
    content = await readFile(configPath, "utf-8");
  } catch (err) {
    throw new ConfigurationError("CONFIG_INVALID", `Cannot read config file: ${configPath}`, {
      cause: describeError(err),
    });
  }

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err) {
    throw new ConfigurationError("CONFIG_INVALID", `YAML parse error in ${configPath}`, {
      cause: describeError(err),
    });
  }

  return parseConfig(raw, configPath);
}

/**
 * Read the structured-search API key from the environment.
 * Throws before any fetch happens when it is missing or blank.
 */
export function resolveApiKey(
  foods: Pick<FoodsConfig, "apiKeyEnv">,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const value = env[foods.apiKeyEnv]?.trim();
  if (!value) {
    throw new ConfigurationError(
      "CONFIG_MISSING_CREDENTIAL",
      `API key not found. Set the ${foods.apiKeyEnv} environment variable.`,
      { variable: foods.apiKeyEnv },
    );
  }
  return value;
}
