import { join } from "path";
import pino, { type Logger } from "pino";
import type { LoggingConfig } from "./config.js";
import { ConfigError } from "./errors.js";

export type { Logger };

export const LOG_FILE_NAME = "factkeeper.log";

const LEVEL_ALIASES: Readonly<Record<string, pino.LevelWithSilent>> = {
  warning: "warn",
  critical: "fatal",
};

const PINO_LEVELS: ReadonlySet<string> = new Set([
  "trace", "debug", "info", "warn", "error", "fatal", "silent",
]);

function isPinoLevel(level: string): level is pino.LevelWithSilent {
  return PINO_LEVELS.has(level);
}

/** Accepts pino level names and the upper-case names used in older configs. */
export function normalizeLevel(level: string): pino.LevelWithSilent {
  const lower = level.toLowerCase();
  const alias = LEVEL_ALIASES[lower];
  if (alias) return alias;
  if (isPinoLevel(lower)) return lower;
  throw new ConfigError(`Unknown log level "${level}"`);
}

export interface RotationOptions {
  frequency?: "daily" | "hourly";
  size?: string;
}

/** "daily", "hourly" or a size such as "10 MB" → pino-roll options. */
export function parseRotation(rotation: string): RotationOptions {
  const value = rotation.trim().toLowerCase();
  if (value === "daily" || value === "hourly") {
    return { frequency: value };
  }
  const size = /^(\d+)\s*([kmg])b?$/.exec(value);
  if (size) {
    return { size: `${size[1]}${size[2]}` };
  }
  throw new ConfigError(`Unsupported log rotation "${rotation}"; use daily, hourly or a size like "10 MB"`);
}

/**
 * Transport targets for the configuration. Empty when plain JSON on stderr
 * is all that is needed, which avoids a worker thread.
 */
export function buildTargets(config: Readonly<LoggingConfig>): pino.TransportTargetOptions[] {
  const level = normalizeLevel(config.level);
  const targets: pino.TransportTargetOptions[] = [];

  if (config.format === "pretty") {
    targets.push({ target: "pino-pretty", level, options: { destination: 2, colorize: false } });
  } else if (config.directory) {
    targets.push({ target: "pino/file", level, options: { destination: 2 } });
  }

  if (config.directory) {
    targets.push({
      target: "pino-roll",
      level,
      options: {
        file: join(config.directory, LOG_FILE_NAME),
        mkdir: true,
        ...parseRotation(config.rotation),
      },
    });
  }

  return targets;
}

// stdout carries command output and the MCP protocol, so logs go to stderr
export function createLogger(config: Readonly<LoggingConfig>, name = "factkeeper"): Logger {
  const options: pino.LoggerOptions = {
    name,
    level: normalizeLevel(config.level),
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
  };

  const targets = buildTargets(config);
  if (targets.length === 0) {
    return pino(options, pino.destination(2));
  }
  // pino rejects custom level formatters when logging through transport targets
  return pino({ ...options, formatters: undefined }, pino.transport({ targets }));
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
