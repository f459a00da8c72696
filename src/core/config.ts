import { existsSync, readFileSync } from "fs";
import { resolve } from "path";
import { z } from "zod";
import { ConfigError, toErrorMessage } from "./errors.js";

const DEFAULT_OLLAMA_URL = "http://localhost:11434";

const VectorStoreSchema = z
  .object({
    provider: z.enum(["qdrant", "sqlite"]).default("sqlite"),
    config: z
      .object({
        collection_name: z.string().min(1).default("factkeeper"),
        host: z.string().min(1).default("localhost"),
        port: z.number().int().positive().default(6333),
        embedding_model_dims: z.number().int().positive().default(768),
        path: z.string().min(1).default("factkeeper.db"),
      })
      .default({}),
  })
  .default({});

const LlmSchema = z
  .object({
    provider: z.literal("ollama").default("ollama"),
    config: z
      .object({
        model: z.string().min(1).default("llama3.1:latest"),
        temperature: z.number().min(0).max(2).default(0.1),
        max_tokens: z.number().int().positive().default(2000),
        ollama_base_url: z.string().url().default(DEFAULT_OLLAMA_URL),
      })
      .default({}),
  })
  .default({});

const EmbedderSchema = z
  .object({
    provider: z.literal("ollama").default("ollama"),
    config: z
      .object({
        model: z.string().min(1).default("nomic-embed-text:latest"),
        ollama_base_url: z.string().url().default(DEFAULT_OLLAMA_URL),
      })
      .default({}),
  })
  .default({});

const LOG_LEVELS = [
  "trace", "debug", "info", "warn", "error", "fatal", "silent",
  "TRACE", "DEBUG", "INFO", "WARN", "WARNING", "ERROR", "CRITICAL", "FATAL", "SILENT",
] as const;

export const ConfigSchema = z.object({
  memory_config: z
    .object({
      vector_store: VectorStoreSchema,
      llm: LlmSchema,
      embedder: EmbedderSchema,
    })
    .default({}),
  markdown_directories: z.array(z.string().min(1)).default([]),
  processing_options: z
    .object({
      recursive: z.boolean().default(true),
      file_extensions: z.array(z.string().regex(/^\./, "must start with a dot")).default([".md", ".markdown"]),
      user_id: z.string().min(1).default("default"),
      batch_size: z.number().int().positive().default(10),
      delay_between_batches: z.number().min(0).default(1),
    })
    .default({}),
  chat_options: z
    .object({
      temperature: z.number().min(0).max(2).default(0.7),
      max_context_memories: z.number().int().positive().default(5),
      response_timeout: z.number().positive().default(60),
      use_llm: z.boolean().default(false),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(LOG_LEVELS).default("info"),
      directory: z.string().min(1).optional(),
      rotation: z.string().min(1).default("daily"),
      format: z.enum(["json", "pretty"]).default("json"),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type LoggingConfig = Config["logging"];

type DeepReadonly<T> = T extends (infer U)[]
  ? readonly DeepReadonly<U>[]
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

export type FrozenConfig = DeepReadonly<Config>;

function deepFreeze<T>(value: T): DeepReadonly<T>;
function deepFreeze(value: unknown): unknown {
  if (value !== null && typeof value === "object") {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

/**
 * Validate a parsed configuration document, fill defaults and freeze it.
 * `source` names the document in error messages.
 */
export function parseConfig(raw: unknown, source = "configuration"): FrozenConfig {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  ${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("\n");
    throw new ConfigError(`Invalid ${source}:\n${issues}`);
  }
  return deepFreeze(result.data);
}

export function loadConfig(path: string): FrozenConfig {
  const fullPath = resolve(path);
  if (!existsSync(fullPath)) {
    throw new ConfigError(`Configuration file not found: ${fullPath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(fullPath, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Invalid JSON in configuration file: ${toErrorMessage(err)}`, { cause: err });
  }

  return parseConfig(raw, `configuration file ${fullPath}`);
}

/** Configuration with every default applied, for running without a file. */
export function defaultConfig(): FrozenConfig {
  return parseConfig({});
}
