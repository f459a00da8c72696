import { z } from "zod";
import { ExternalServiceError, TimeoutFailure, toErrorMessage } from "./errors.js";
import type { Embedder } from "./storage.js";

export type FetchLike = typeof fetch;

export interface OllamaClientOptions {
  baseUrl: string;
  model: string;
  embeddingModel: string;
  /** Defaults to `baseUrl`. */
  embeddingBaseUrl?: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
  /** Injected in tests. */
  fetch?: FetchLike;
}

const GenerateResponse = z.object({ response: z.string() });
const EmbeddingResponse = z.object({ embedding: z.array(z.number()).min(1) });

function isAbort(err: unknown): boolean {
  return err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError");
}

/**
 * Minimal client for a local Ollama server: non-streaming completions and
 * embeddings. Every request is bounded by `timeoutMs`.
 */
export class OllamaClient implements Embedder {
  private options: OllamaClientOptions;
  private fetchImpl: FetchLike;

  constructor(options: OllamaClientOptions) {
    this.options = options;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async generate(prompt: string, overrides: { temperature?: number } = {}): Promise<string> {
    const body = await this.post(this.options.baseUrl, "/api/generate", "generate", {
      model: this.options.model,
      prompt,
      stream: false,
      options: {
        temperature: overrides.temperature ?? this.options.temperature,
        num_predict: this.options.maxTokens,
      },
    });
    const parsed = GenerateResponse.safeParse(body);
    if (!parsed.success) {
      throw new ExternalServiceError("ollama", "generate returned no response text");
    }
    return parsed.data.response.trim();
  }

  async embed(text: string): Promise<number[]> {
    const body = await this.post(this.options.embeddingBaseUrl ?? this.options.baseUrl, "/api/embeddings", "embed", {
      model: this.options.embeddingModel,
      prompt: text,
    });
    const parsed = EmbeddingResponse.safeParse(body);
    if (!parsed.success) {
      throw new ExternalServiceError("ollama", "embed returned no embedding");
    }
    return parsed.data.embedding;
  }

  private async post(baseUrl: string, path: string, operation: string, payload: unknown): Promise<unknown> {
    const url = new URL(path, baseUrl);
    try {
      const response = await this.fetchImpl(url, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
      if (!response.ok) {
        const detail = (await response.text()).trim();
        throw new ExternalServiceError(
          "ollama",
          `${operation} failed with HTTP ${response.status}${detail ? `: ${detail}` : ""}`
        );
      }
      return await response.json();
    } catch (err) {
      if (err instanceof ExternalServiceError) throw err;
      if (isAbort(err)) {
        throw new TimeoutFailure(`ollama ${operation}`, this.options.timeoutMs, { cause: err });
      }
      throw new ExternalServiceError("ollama", `${operation} failed: ${toErrorMessage(err)}`, { cause: err });
    }
  }
}
