import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { SqliteMemoryStore } from "../core/backends/sqlite.js";
import { defaultConfig, parseConfig, type FrozenConfig } from "../core/config.js";
import { EmptyQueryError, TimeoutFailure } from "../core/errors.js";
import { silentLogger } from "../core/logger.js";
import { MemoryManager, RETRY_LATER_REPLY, type TextGenerator } from "../core/manager.js";
import type { MemoryStore } from "../core/storage.js";
import type { MemoryRecord, MemorySearchResult } from "../types.js";

/** Fails the first `failures` writes with the given error. */
class FlakyStore implements MemoryStore {
  readonly name = "flaky";
  attempts = 0;
  private inner = new SqliteMemoryStore(":memory:");
  private failures: number;
  private error: Error;

  constructor(failures: number, error: Error = new Error("disk busy")) {
    this.failures = failures;
    this.error = error;
  }

  async add(record: MemoryRecord): Promise<void> {
    this.attempts += 1;
    if (this.attempts <= this.failures) throw this.error;
    await this.inner.add(record);
  }

  search(query: string, userId: string, limit: number): Promise<MemorySearchResult[]> {
    return this.inner.search(query, userId, limit);
  }

  getAll(userId: string): Promise<MemoryRecord[]> {
    return this.inner.getAll(userId);
  }

  delete(id: string): Promise<boolean> {
    return this.inner.delete(id);
  }

  close(): Promise<void> {
    return this.inner.close();
  }
}

interface Harness {
  manager: MemoryManager;
  waits: number[];
}

function harness(store: MemoryStore, config: FrozenConfig = defaultConfig(), llm?: TextGenerator): Harness {
  const waits: number[] = [];
  const manager = new MemoryManager({
    config,
    store,
    logger: silentLogger(),
    llm,
    retryDelayMs: 50,
    wait: async (ms) => {
      waits.push(ms);
    },
  });
  return { manager, waits };
}

describe("MemoryManager", () => {
  let store: SqliteMemoryStore;
  let manager: MemoryManager;

  beforeEach(() => {
    store = new SqliteMemoryStore(":memory:");
    manager = harness(store).manager;
  });

  afterEach(async () => {
    await manager.close();
  });

  it("stores a valid fact", async () => {
    const outcome = await manager.addFact("  Bruce lives in Seattle. ", { userId: "bruce", metadata: { via: "test" } });
    assert.equal(outcome.status, "stored");
    const [stored] = await manager.getAllMemories("bruce");
    assert.equal(stored.text, "Bruce lives in Seattle.");
    assert.equal(stored.userId, "bruce");
    assert.deepEqual(stored.metadata, { via: "test" });
  });

  it("rejects a vague fact without storing it", async () => {
    const outcome = await manager.addFact("The user likes stuff.", { userId: "bruce" });
    assert.deepEqual(outcome, {
      status: "rejected",
      fact: { text: "The user likes stuff.", language: "en" },
      reason: "not specific enough",
    });
    assert.deepEqual(await manager.getAllMemories("bruce"), []);
  });

  it("remembers the valid facts of a conversation", async () => {
    const result = await manager.remember("Met Alice for coffee yesterday, she loves hiking.", {
      userId: "bruce",
      context: "social",
      timeContext: "2024-03-10",
    });
    assert.equal(result.extracted.length, 2);
    assert.deepEqual(
      result.stored.map((r) => r.text),
      ["The user met Alice for coffee on 2024-03-10.", "Alice loves hiking."]
    );
    assert.equal(result.stored[0].temporalContext, "2024-03-10");
    assert.equal(result.stored[0].context, "social");
  });

  it("answers from stored memories", async () => {
    await manager.addFact("Bruce's favorite food is ramen.", { userId: "bruce" });
    assert.equal(await manager.chat("What's my favorite food?", { userId: "bruce" }), "Bruce's favorite food is ramen.");
  });

  it("lets a single chat widen the configured context", async () => {
    const narrow = harness(store, parseConfig({ chat_options: { max_context_memories: 1 } })).manager;
    await narrow.addFact("Bruce's favorite food is ramen.", { userId: "bruce" });
    await narrow.addFact("Bruce eats spicy ramen every Friday.", { userId: "bruce" });

    assert.equal(await narrow.chat("What's my favorite food?", { userId: "bruce" }), "Bruce's favorite food is ramen.");
    assert.equal(
      await narrow.chat("What's my favorite food?", { userId: "bruce", maxContextMemories: 2 }),
      "Bruce's favorite food is ramen. Bruce eats spicy ramen every Friday."
    );
  });

  it("admits not knowing instead of failing on an empty question", async () => {
    assert.equal(await manager.chat("  ", { userId: "bruce" }), "I don't have that information about Bruce.");
  });

  it("refuses to search for nothing", async () => {
    await assert.rejects(() => manager.searchMemories(""), EmptyQueryError);
  });

  it("deletes every memory of a user on reset", async () => {
    await manager.addFact("Bruce lives in Seattle.", { userId: "bruce" });
    await manager.addFact("Bruce plays chess.", { userId: "bruce" });
    await manager.addFact("Alice loves hiking.", { userId: "alice" });

    assert.equal(await manager.resetMemories("bruce"), 2);
    assert.deepEqual(await manager.getAllMemories("bruce"), []);
    assert.equal((await manager.getAllMemories("alice")).length, 1);
  });
});

describe("MemoryManager retries", () => {
  it("retries failed writes after a delay", async () => {
    const flaky = new FlakyStore(2);
    const { manager, waits } = harness(flaky);
    const outcome = await manager.addFact("Bruce lives in Seattle.", { userId: "bruce" });

    assert.equal(outcome.status, "stored");
    assert.equal(flaky.attempts, 3);
    assert.deepEqual(waits, [50, 50]);
    await manager.close();
  });

  it("gives up after the last attempt", async () => {
    const flaky = new FlakyStore(5);
    const { manager } = harness(flaky);
    await assert.rejects(() => manager.addFact("Bruce lives in Seattle.", { userId: "bruce" }), /disk busy/);
    assert.equal(flaky.attempts, 3);
    await manager.close();
  });

  it("does not retry a timeout", async () => {
    const flaky = new FlakyStore(5, new TimeoutFailure("qdrant upsert", 100));
    const { manager, waits } = harness(flaky);
    await assert.rejects(() => manager.addFact("Bruce lives in Seattle.", { userId: "bruce" }), TimeoutFailure);
    assert.equal(flaky.attempts, 1);
    assert.deepEqual(waits, []);
    await manager.close();
  });
});

describe("MemoryManager with a language model", () => {
  const config = parseConfig({ chat_options: { use_llm: true } });

  it("sends the stored facts and the question", async () => {
    const prompts: string[] = [];
    const temperatures: (number | undefined)[] = [];
    const llm: TextGenerator = {
      generate: async (prompt, overrides) => {
        prompts.push(prompt);
        temperatures.push(overrides?.temperature);
        return "Ramen.";
      },
    };
    const { manager } = harness(new SqliteMemoryStore(":memory:"), config, llm);
    await manager.addFact("Bruce's favorite food is ramen.", { userId: "bruce" });

    assert.equal(await manager.chat("What's my favorite food?", { userId: "bruce" }), "Ramen.");
    assert.equal(prompts.length, 1);
    assert.ok(prompts[0].includes("Facts about Bruce:\n• Bruce's favorite food is ramen."));
    assert.ok(prompts[0].includes("Question: What's my favorite food?"));
    assert.deepEqual(temperatures, [0.7]);
    await manager.close();
  });

  it("says so when nothing is known", async () => {
    const prompts: string[] = [];
    const llm: TextGenerator = {
      generate: async (prompt) => {
        prompts.push(prompt);
        return "I don't know.";
      },
    };
    const { manager } = harness(new SqliteMemoryStore(":memory:"), config, llm);
    await manager.chat("Where do I live?", { userId: "bruce" });
    assert.ok(prompts[0].includes("No specific information available about Bruce."));
    await manager.close();
  });

  it("asks to retry later when the model times out", async () => {
    const llm: TextGenerator = {
      generate: async () => {
        throw new TimeoutFailure("ollama generate", 60000);
      },
    };
    const { manager } = harness(new SqliteMemoryStore(":memory:"), config, llm);
    assert.equal(await manager.chat("What's my favorite food?", { userId: "bruce" }), RETRY_LATER_REPLY);
    await manager.close();
  });
});

describe("MemoryManager.ingestDirectories", () => {
  it("processes markdown files in delayed batches", async () => {
    const dir = mkdtempSync(join(tmpdir(), "factkeeper-ingest-"));
    writeFileSync(join(dir, "a.md"), "# 2024-03-10\nMet Alice for coffee yesterday, she loves hiking.\n");
    writeFileSync(join(dir, "b.md"), "# Food\nI love sushi.\n");

    const config = parseConfig({
      markdown_directories: [dir, join(dir, "missing")],
      processing_options: { user_id: "bruce", batch_size: 1, delay_between_batches: 2 },
    });
    const { manager, waits } = harness(new SqliteMemoryStore(":memory:"), config);
    const summary = await manager.ingestDirectories();

    assert.deepEqual(summary, { files: 2, sections: 2, extracted: 3, stored: 3, rejected: 0, failures: [] });
    assert.deepEqual(waits, [2000]);

    const memories = await manager.getAllMemories();
    assert.deepEqual(
      memories.map((m) => [m.text, m.context, m.metadata.source]),
      [
        ["The user met Alice for coffee on 2024-03-10.", "2024-03-10", "a.md"],
        ["Alice loves hiking.", "2024-03-10", "a.md"],
        ["The user loves sushi.", "Food", "b.md"],
      ]
    );
    await manager.close();
  });
});
