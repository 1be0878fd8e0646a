/**
 * Configuration file loader
 *
 * Looks for `.stylus-audit.json`, `.stylus-audit.yml` or `.stylus-audit.yaml`
 * at the project root, in that order.
 */

import { existsSync } from "fs";
import { readFile } from "fs/promises";
import { join } from "path";
import { parse as parseYaml } from "yaml";
import { err, type ConfigurationError, type Result } from "../types/index.js";
import { logger } from "../utils/logger.js";
import { configurationError, parseAnalysisOptions, type AnalysisOptions } from "./schema.js";

export const CONFIG_FILE_NAMES = [
  ".stylus-audit.json",
  ".stylus-audit.yml",
  ".stylus-audit.yaml",
] as const;

const log = logger.child({ component: "config" });

export function findConfigFile(projectRoot: string): string | undefined {
  return CONFIG_FILE_NAMES.map((name) => join(projectRoot, name)).find((path) => existsSync(path));
}

/**
 * Load and validate options for a project. A missing file yields the defaults.
 */
export async function loadAnalysisConfig(
  projectRoot: string
): Promise<Result<AnalysisOptions, ConfigurationError>> {
  const configPath = findConfigFile(projectRoot);
  if (configPath === undefined) {
    log.debug("No configuration file found, using defaults", { projectRoot });
    return parseAnalysisOptions({});
  }

  let content: string;
  try {
    content = await readFile(configPath, "utf-8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(configurationError(`Cannot read ${configPath}: ${message}`, [message]));
  }

  let raw: unknown;
  try {
    raw = configPath.endsWith(".json") ? JSON.parse(content) : parseYaml(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(configurationError(`Malformed configuration file ${configPath}`, [message]));
  }

  const result = parseAnalysisOptions(raw);
  if (result.ok) {
    log.info("Loaded analysis configuration", { configPath });
  } else {
    log.warn("Rejected analysis configuration", { configPath, issues: result.error.issues });
  }
  return result;
}
