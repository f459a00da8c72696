import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync, writeFileSync, mkdirSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { PromptNotFoundError } from "../core/errors.js";
import { PromptManager } from "../core/prompts.js";
import { KNOWN_PLACEHOLDERS, listPlaceholders } from "../core/template.js";

const SHIPPED = [
  ["chat", "user_interaction"],
  ["chat", "error_response"],
  ["extraction", "fact_extraction"],
  ["validation", "fact_validation"],
  ["diagnostics", "error_analysis"],
] as const;

describe("PromptManager", () => {
  const prompts = new PromptManager();

  it("renders every shipped prompt with the shared variables", () => {
    const vars = Object.fromEntries(KNOWN_PLACEHOLDERS.map((name) => [name, `<${name}>`]));
    for (const [category, name] of SHIPPED) {
      const rendered = prompts.getPrompt(category, name, vars);
      assert.deepEqual(listPlaceholders(rendered), [], `${category}/${name}`);
    }
  });

  it("uses exactly the shared placeholder names across shipped prompts", () => {
    const used = new Set<string>();
    for (const [category, name] of SHIPPED) {
      for (const placeholder of listPlaceholders(prompts.getTemplate(category, name))) used.add(placeholder);
    }
    assert.deepEqual([...used].sort(), [...KNOWN_PLACEHOLDERS].sort());
  });

  it("fills the chat prompt", () => {
    const text = prompts.getPrompt("chat", "user_interaction", {
      user_id: "Bruce",
      context: "Facts about Bruce:\n• Bruce's favorite food is ramen.",
      query: "What's my favorite food?",
    });
    assert.ok(text.startsWith("You are a personal assistant answering questions about Bruce."));
    assert.ok(text.includes("\nQuestion: What's my favorite food?\n"));
  });

  it("rejects unknown prompts and path segments", () => {
    assert.throws(() => prompts.getTemplate("chat", "missing"), PromptNotFoundError);
    assert.throws(() => prompts.getTemplate("..", "chat"), PromptNotFoundError);
    assert.throws(() => prompts.getTemplate("chat", "../chat/user_interaction"), PromptNotFoundError);
  });

  it("caches template text after the first read", () => {
    const dir = mkdtempSync(join(tmpdir(), "factkeeper-prompts-"));
    mkdirSync(join(dir, "greeting"));
    const file = join(dir, "greeting", "hello.txt");
    writeFileSync(file, "Hello ${user_id}");

    const manager = new PromptManager(dir);
    assert.equal(manager.getPrompt("greeting", "hello", { user_id: "Bruce" }), "Hello Bruce");
    writeFileSync(file, "Changed");
    assert.equal(manager.getPrompt("greeting", "hello", { user_id: "Bruce" }), "Hello Bruce");
  });
});
