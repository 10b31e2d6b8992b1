import fs from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import { ConfigurationError, isNotFoundError } from "../errors.js";
import { validateConfig } from "./config-validator.js";
import type { ContextConfig } from "./types.js";

export const DEFAULT_CONFIG_FILE = "config.yaml";

export async function loadConfig(configPath?: string): Promise<ContextConfig> {
  const resolvedPath = path.resolve(configPath ?? DEFAULT_CONFIG_FILE);
  let raw: string;
  try {
    raw = await fs.readFile(resolvedPath, "utf8");
  } catch (error) {
    if (isNotFoundError(error)) {
      throw new ConfigurationError(
        `Configuration file ${resolvedPath} not found.`,
      );
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(
      `Error parsing configuration file ${resolvedPath}: ${message}`,
    );
  }

  return validateConfig(parsed, path.dirname(resolvedPath));
}
