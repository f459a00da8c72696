import { resolve } from "path";
import { setTimeout as sleep } from "timers/promises";
import { v4 as uuidv4 } from "uuid";
import type {
  Fact,
  IngestResult,
  IngestSummary,
  MemoryRecord,
  MemorySearchResult,
  ValidationCriteria,
} from "../types.js";
import { QdrantMemoryStore } from "./backends/qdrant.js";
import { SqliteMemoryStore } from "./backends/sqlite.js";
import type { FrozenConfig } from "./config.js";
import { EmptyQueryError, FactkeeperError, TimeoutFailure, toErrorMessage } from "./errors.js";
import { FactExtractor } from "./extractor.js";
import { getLexicon } from "./lexicon.js";
import type { Logger } from "./logger.js";
import { discoverMarkdownFiles, readSections, toBatches } from "./markdown.js";
import { OllamaClient } from "./ollama.js";
import { PromptManager } from "./prompts.js";
import { ChatResponder, unknownAnswer } from "./responder.js";
import type { MemoryStore } from "./storage.js";
import { detectLanguage, displayName } from "./text.js";
import { FactValidator } from "./validator.js";

export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_RETRY_DELAY_MS = 2000;

export const RETRY_LATER_REPLY =
  "Sorry, answering is taking longer than expected right now. Please try again in a moment.";

/** The part of the Ollama client the manager needs for chat. */
export interface TextGenerator {
  generate(prompt: string, overrides?: { temperature?: number }): Promise<string>;
}

export interface MemoryManagerOptions {
  config: FrozenConfig;
  store: MemoryStore;
  logger: Logger;
  llm?: TextGenerator;
  extractor?: FactExtractor;
  validator?: FactValidator;
  prompts?: PromptManager;
  maxRetries?: number;
  retryDelayMs?: number;
  /** Overridden in tests to skip real waiting. */
  wait?: (ms: number) => Promise<void>;
}

export interface AddFactOptions {
  userId?: string;
  metadata?: Record<string, string>;
  context?: string;
  criteria?: ValidationCriteria;
}

export type AddFactOutcome =
  | { status: "stored"; record: MemoryRecord }
  | { status: "rejected"; fact: Fact; reason: string };

export interface RememberOptions {
  userId?: string;
  context?: string;
  timeContext?: string;
  metadata?: Record<string, string>;
  criteria?: ValidationCriteria;
}

/**
 * Ties the pipeline together: extract, validate, store, recall and answer.
 * Writes are retried; reads and chat are not.
 */
export class MemoryManager {
  readonly userId: string;
  private config: FrozenConfig;
  private store: MemoryStore;
  private logger: Logger;
  private llm: TextGenerator | undefined;
  private extractor: FactExtractor;
  private validator: FactValidator;
  private responder: ChatResponder;
  private prompts: PromptManager;
  private maxRetries: number;
  private retryDelayMs: number;
  private wait: (ms: number) => Promise<void>;

  constructor(options: MemoryManagerOptions) {
    this.config = options.config;
    this.store = options.store;
    this.logger = options.logger.child({ component: "memory-manager" });
    this.llm = options.llm;
    this.extractor = options.extractor ?? new FactExtractor();
    this.validator = options.validator ?? new FactValidator();
    this.responder = new ChatResponder({
      maxContextMemories: this.config.chat_options.max_context_memories,
    });
    this.prompts = options.prompts ?? new PromptManager();
    this.maxRetries = Math.max(1, options.maxRetries ?? DEFAULT_MAX_RETRIES);
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.wait = options.wait ?? ((ms) => sleep(ms));
    this.userId = this.config.processing_options.user_id;
  }

  /** Validate a single statement and store it when it passes. */
  async addFact(text: string, options: AddFactOptions = {}): Promise<AddFactOutcome> {
    const fact: Fact = { text: text.trim(), language: detectLanguage(text, getLexicon()) };
    if (options.context) fact.context = options.context;

    const { invalid } = this.validator.validate([fact], { criteria: options.criteria });
    if (invalid.length > 0) {
      const { reason } = invalid[0];
      this.logger.warn({ fact: fact.text, reason }, "Fact rejected");
      return { status: "rejected", fact, reason };
    }

    const record = await this.storeFact(fact, options.userId ?? this.userId, options.metadata ?? {});
    return { status: "stored", record };
  }

  /** Extract facts from conversation text, validate them and store the valid ones. */
  async remember(content: string, options: RememberOptions = {}): Promise<IngestResult> {
    const extracted = this.extractor.extract({
      content,
      context: options.context ?? "",
      timeContext: options.timeContext,
    });
    const validation = this.validator.validate(extracted, { criteria: options.criteria });
    for (const { fact, reason } of validation.invalid) {
      this.logger.debug({ fact: fact.text, reason }, "Extracted fact rejected");
    }

    const stored: MemoryRecord[] = [];
    for (const fact of validation.valid) {
      stored.push(await this.storeFact(fact, options.userId ?? this.userId, options.metadata ?? {}));
    }

    this.logger.info(
      { extracted: extracted.length, stored: stored.length, rejected: validation.invalid.length },
      "Conversation processed"
    );
    return { extracted, validation, stored };
  }

  async searchMemories(
    query: string,
    options: { userId?: string; limit?: number } = {}
  ): Promise<MemorySearchResult[]> {
    if (!query.trim()) throw new EmptyQueryError();
    const userId = options.userId ?? this.userId;
    const results = await this.store.search(query, userId, options.limit ?? 5);
    this.logger.debug({ query, userId, results: results.length }, "Memory search");
    return results;
  }

  async getAllMemories(userId: string = this.userId): Promise<MemoryRecord[]> {
    return this.store.getAll(userId);
  }

  /** Delete every memory of a user. Returns how many were deleted. */
  async resetMemories(userId: string = this.userId): Promise<number> {
    this.logger.info({ userId }, "Resetting memories");
    const records = await this.store.getAll(userId);
    let deleted = 0;
    for (const record of records) {
      try {
        if (await this.store.delete(record.id)) deleted += 1;
      } catch (err) {
        this.logger.error({ err, id: record.id }, "Failed to delete memory");
      }
    }
    this.logger.info({ userId, deleted, total: records.length }, "Memories reset");
    return deleted;
  }

  async chat(query: string, options: { userId?: string; maxContextMemories?: number } = {}): Promise<string> {
    const userId = options.userId ?? this.userId;
    const limit = options.maxContextMemories ?? this.config.chat_options.max_context_memories;
    try {
      const results = await this.searchMemories(query, { userId, limit });
      const facts = results.map((r) => r.record);

      if (this.config.chat_options.use_llm && this.llm) {
        return await this.chatWithLlm(this.llm, query, userId, facts, limit);
      }
      return this.responder.respond({ userId, facts, query }, { maxContextMemories: limit });
    } catch (err) {
      if (err instanceof EmptyQueryError) return unknownAnswer(userId);
      if (err instanceof TimeoutFailure) {
        this.logger.warn({ err }, "Chat timed out");
        return RETRY_LATER_REPLY;
      }
      throw err;
    }
  }

  /** Process every configured markdown directory in rate-limited batches. */
  async ingestDirectories(directories?: readonly string[]): Promise<IngestSummary> {
    const options = this.config.processing_options;
    const { files, missing } = discoverMarkdownFiles(directories ?? this.config.markdown_directories, {
      recursive: options.recursive,
      extensions: options.file_extensions,
    });
    for (const dir of missing) {
      this.logger.warn({ dir }, "Markdown directory not found");
    }

    const summary: IngestSummary = {
      files: files.length,
      sections: 0,
      extracted: 0,
      stored: 0,
      rejected: 0,
      failures: [],
    };

    const sections = files.flatMap((file) => {
      try {
        return readSections(file);
      } catch (err) {
        this.logger.error({ err, file: file.path }, "Failed to read markdown file");
        summary.failures.push({ source: file.relativePath, error: toErrorMessage(err) });
        return [];
      }
    });
    summary.sections = sections.length;

    const batches = toBatches(sections, options.batch_size);
    for (const [index, batch] of batches.entries()) {
      if (index > 0 && options.delay_between_batches > 0) {
        await this.wait(options.delay_between_batches * 1000);
      }
      this.logger.info({ batch: index + 1, of: batches.length, sections: batch.length }, "Processing batch");

      for (const section of batch) {
        const source = `${section.source}#${section.heading}`;
        try {
          const result = await this.remember(section.content, {
            context: section.heading,
            timeContext: section.date,
            metadata: { source: section.source },
          });
          summary.extracted += result.extracted.length;
          summary.stored += result.stored.length;
          summary.rejected += result.validation.invalid.length;
        } catch (err) {
          this.logger.error({ err, source }, "Section failed");
          summary.failures.push({ source, error: toErrorMessage(err) });
        }
      }
    }

    this.logger.info(summary, "Ingestion finished");
    return summary;
  }

  async close(): Promise<void> {
    await this.store.close();
  }

  private async storeFact(fact: Fact, userId: string, metadata: Record<string, string>): Promise<MemoryRecord> {
    const record: MemoryRecord = {
      ...fact,
      id: uuidv4(),
      userId,
      metadata: { ...metadata },
      createdAt: new Date().toISOString(),
    };

    for (let attempt = 1; ; attempt++) {
      try {
        this.logger.debug({ attempt, fact: fact.text }, "Storing memory");
        await this.store.add(record);
        this.logger.info({ id: record.id, userId, fact: fact.text }, "Memory stored");
        return record;
      } catch (err) {
        // timeouts surface to the caller instead of being retried
        if (err instanceof TimeoutFailure || attempt >= this.maxRetries) {
          this.logger.error({ err, attempts: attempt }, "Failed to store memory");
          throw err;
        }
        this.logger.warn({ err, attempt }, `Store failed, retrying in ${this.retryDelayMs}ms`);
        await this.wait(this.retryDelayMs);
      }
    }
  }

  private async chatWithLlm(
    llm: TextGenerator,
    query: string,
    userId: string,
    facts: Fact[],
    limit: number
  ): Promise<string> {
    const name = displayName(userId);
    const bounded = this.responder.buildContext(userId, facts, query, limit);
    const context =
      bounded.facts.length === 0
        ? `No specific information available about ${name}.`
        : `Facts about ${name}:\n${bounded.facts.map((f) => `• ${f.text}`).join("\n")}`;

    let prompt: string;
    try {
      prompt = this.prompts.getPrompt("chat", "user_interaction", { user_id: name, context, query });
    } catch (err) {
      if (!(err instanceof FactkeeperError)) throw err;
      this.logger.error({ err }, "Chat prompt unavailable, using error prompt");
      prompt = this.prompts.getPrompt("chat", "error_response", { query, error_message: err.message });
    }

    return llm.generate(prompt, { temperature: this.config.chat_options.temperature });
  }
}

/** Build the store selected by `memory_config.vector_store.provider`. */
export function createMemoryStore(config: FrozenConfig, embedder: OllamaClient): MemoryStore {
  const store = config.memory_config.vector_store;
  if (store.provider === "qdrant") {
    return new QdrantMemoryStore({
      host: store.config.host,
      port: store.config.port,
      collectionName: store.config.collection_name,
      dimensions: store.config.embedding_model_dims,
      timeoutMs: config.chat_options.response_timeout * 1000,
      embedder,
    });
  }
  return new SqliteMemoryStore(resolve(store.config.path));
}

export function createOllamaClient(config: FrozenConfig): OllamaClient {
  const { llm, embedder } = config.memory_config;
  return new OllamaClient({
    baseUrl: llm.config.ollama_base_url,
    model: llm.config.model,
    embeddingModel: embedder.config.model,
    embeddingBaseUrl: embedder.config.ollama_base_url,
    temperature: llm.config.temperature,
    maxTokens: llm.config.max_tokens,
    timeoutMs: config.chat_options.response_timeout * 1000,
  });
}

export function createMemoryManager(config: FrozenConfig, logger: Logger): MemoryManager {
  const ollama = createOllamaClient(config);
  return new MemoryManager({ config, store: createMemoryStore(config, ollama), logger, llm: ollama });
}
