import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { ExternalServiceError, TimeoutFailure } from "../core/errors.js";
import { OllamaClient, type FetchLike, type OllamaClientOptions } from "../core/ollama.js";

interface Call {
  url: string;
  body: unknown;
}

function fakeFetch(calls: Call[], respond: () => Response): FetchLike {
  return async (input, init) => {
    const body: unknown = typeof init?.body === "string" ? JSON.parse(init.body) : undefined;
    calls.push({ url: input instanceof URL ? input.href : String(input), body });
    return respond();
  };
}

const json = (value: unknown, status = 200) =>
  new Response(JSON.stringify(value), { status, headers: { "content-type": "application/json" } });

function client(fetch: FetchLike, overrides: Partial<OllamaClientOptions> = {}): OllamaClient {
  return new OllamaClient({
    baseUrl: "http://localhost:11434",
    model: "test-model",
    embeddingModel: "test-embedder",
    temperature: 0.1,
    maxTokens: 100,
    timeoutMs: 1000,
    fetch,
    ...overrides,
  });
}

describe("OllamaClient", () => {
  it("posts a non-streaming completion request", async () => {
    const calls: Call[] = [];
    const llm = client(fakeFetch(calls, () => json({ response: "  Ramen.  " })));

    assert.equal(await llm.generate("What's my favorite food?", { temperature: 0.7 }), "Ramen.");
    assert.deepEqual(calls, [
      {
        url: "http://localhost:11434/api/generate",
        body: {
          model: "test-model",
          prompt: "What's my favorite food?",
          stream: false,
          options: { temperature: 0.7, num_predict: 100 },
        },
      },
    ]);
  });

  it("embeds through the embedding server", async () => {
    const calls: Call[] = [];
    const llm = client(fakeFetch(calls, () => json({ embedding: [0.1, 0.2] })), {
      embeddingBaseUrl: "http://embedder:11434",
    });

    assert.deepEqual(await llm.embed("ramen"), [0.1, 0.2]);
    assert.deepEqual(calls, [
      { url: "http://embedder:11434/api/embeddings", body: { model: "test-embedder", prompt: "ramen" } },
    ]);
  });

  it("reports HTTP errors with the response body", async () => {
    const llm = client(fakeFetch([], () => new Response("model not found", { status: 404 })));
    await assert.rejects(
      () => llm.generate("hi"),
      (err: unknown) =>
        err instanceof ExternalServiceError && err.message === "ollama: generate failed with HTTP 404: model not found"
    );
  });

  it("rejects bodies without the expected fields", async () => {
    const llm = client(fakeFetch([], () => json({ done: true })));
    await assert.rejects(
      () => llm.embed("x"),
      (err: unknown) => err instanceof ExternalServiceError && err.message === "ollama: embed returned no embedding"
    );
  });

  it("wraps network failures", async () => {
    const failing: FetchLike = async () => {
      throw new TypeError("fetch failed");
    };
    await assert.rejects(
      () => client(failing).generate("hi"),
      (err: unknown) => err instanceof ExternalServiceError && err.message === "ollama: generate failed: fetch failed"
    );
  });

  it("turns an expired deadline into a timeout", async () => {
    const hanging: FetchLike = (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => {
          const err = new Error("The operation was aborted due to timeout");
          err.name = "TimeoutError";
          reject(err);
        });
      });
    await assert.rejects(
      () => client(hanging, { timeoutMs: 20 }).generate("hi"),
      (err: unknown) => err instanceof TimeoutFailure && err.message === "ollama generate timed out after 20ms"
    );
  });
});
