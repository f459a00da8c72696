import { existsSync, readFileSync } from "fs";
import { createInterface } from "readline";
import { InvalidArgumentError } from "commander";
import { defaultConfig, loadConfig, type FrozenConfig } from "../core/config.js";
import { createLogger, type Logger } from "../core/logger.js";
import { createMemoryManager, type MemoryManager } from "../core/manager.js";

export const DEFAULT_CONFIG_PATH = "config.json";

export interface GlobalOptions {
  config?: string;
}

export function prompt(question: string): Promise<string> {
  return new Promise((resolve) => {
    const rl = createInterface({ input: process.stdin, output: process.stderr });
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

/**
 * An explicit `--config` must exist. Without one, `./config.json` is used
 * when present and built-in defaults otherwise.
 */
export function loadCliConfig(options: GlobalOptions): FrozenConfig {
  if (options.config) return loadConfig(options.config);
  return existsSync(DEFAULT_CONFIG_PATH) ? loadConfig(DEFAULT_CONFIG_PATH) : defaultConfig();
}

export interface CliContext {
  config: FrozenConfig;
  logger: Logger;
  manager: MemoryManager;
}

/** Run `fn` with a memory manager and close its store afterwards. */
export async function withManager<T>(
  options: GlobalOptions,
  fn: (ctx: CliContext) => Promise<T>
): Promise<T> {
  const config = loadCliConfig(options);
  const logger = createLogger(config.logging);
  const manager = createMemoryManager(config, logger);
  try {
    return await fn({ config, logger, manager });
  } finally {
    await manager.close();
  }
}

/** Text from `--text`, else the contents of `--file`. */
export function readInput(options: { text?: string; file?: string }): string {
  if (options.text !== undefined) return options.text;
  if (options.file !== undefined) {
    if (!existsSync(options.file)) {
      throw new InvalidArgumentError(`File not found: ${options.file}`);
    }
    return readFileSync(options.file, "utf-8");
  }
  throw new InvalidArgumentError("Provide --text or --file");
}

/** Collects repeated `--var key=value` options into a map. */
export function collectKeyValue(value: string, previous: Record<string, string> = {}): Record<string, string> {
  const eq = value.indexOf("=");
  if (eq <= 0) {
    throw new InvalidArgumentError(`Expected key=value, got "${value}"`);
  }
  return { ...previous, [value.slice(0, eq).trim()]: value.slice(eq + 1) };
}

export function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}"`);
  }
  return parsed;
}
