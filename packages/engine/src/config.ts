/**
 * Configuration loading and resolution (generis.json)
 */

import { existsSync, readFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import type { Result } from "@generis/core";

export const CONFIG_FILE_NAME = "generis.json";

export const DEFAULT_MAX_DEPTH = 64;

/**
 * generis.json contents
 */
export type GenerisConfig = {
  readonly verbose?: boolean;
  /** Nested evaluation depth limit */
  readonly maxDepth?: number;
  /** Initial hint values by hint kind name */
  readonly hints?: Readonly<Record<string, unknown>>;
};

export type ResolvedConfig = {
  readonly verbose: boolean;
  readonly maxDepth: number;
  readonly hints: Readonly<Record<string, unknown>>;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const validateConfig = (
  raw: unknown,
  source: string
): Result<GenerisConfig, string> => {
  if (!isRecord(raw)) {
    return { ok: false, error: `${source}: top level must be an object` };
  }

  const { verbose, maxDepth, hints } = raw;
  if (verbose !== undefined && typeof verbose !== "boolean") {
    return { ok: false, error: `${source}: 'verbose' must be a boolean` };
  }
  if (
    maxDepth !== undefined &&
    (typeof maxDepth !== "number" || !Number.isInteger(maxDepth) || maxDepth < 1)
  ) {
    return { ok: false, error: `${source}: 'maxDepth' must be a positive integer` };
  }
  if (hints !== undefined && !isRecord(hints)) {
    return { ok: false, error: `${source}: 'hints' must be an object` };
  }

  return { ok: true, value: { verbose, maxDepth, hints } };
};

/**
 * Load generis.json
 */
export const loadConfig = (configPath: string): Result<GenerisConfig, string> => {
  if (!existsSync(configPath)) {
    return {
      ok: false,
      error: `Config file not found: ${configPath}`,
    };
  }

  try {
    const content = readFileSync(configPath, "utf-8");
    const raw: unknown = JSON.parse(content);
    return validateConfig(raw, CONFIG_FILE_NAME);
  } catch (error) {
    return {
      ok: false,
      error: `Failed to parse ${CONFIG_FILE_NAME}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
};

/**
 * Find generis.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

/**
 * Merge defaults, file values and programmatic overrides (last wins).
 * Hints merge by name.
 */
export const resolveConfig = (
  config: GenerisConfig = {},
  overrides: GenerisConfig = {}
): ResolvedConfig => ({
  verbose: overrides.verbose ?? config.verbose ?? false,
  maxDepth: overrides.maxDepth ?? config.maxDepth ?? DEFAULT_MAX_DEPTH,
  hints: { ...config.hints, ...overrides.hints },
});
