import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { MalformedTemplateError, MissingVariableError } from "../core/errors.js";
import { KNOWN_PLACEHOLDERS, listPlaceholders, renderTemplate } from "../core/template.js";

describe("renderTemplate", () => {
  it("substitutes every placeholder", () => {
    const out = renderTemplate("Hi ${user_id}, you asked: ${query}", { user_id: "Bruce", query: "where?" });
    assert.equal(out, "Hi Bruce, you asked: where?");
  });

  it("trims whitespace inside the braces", () => {
    assert.equal(renderTemplate("[${ query }]", { query: "x" }), "[x]");
  });

  it("treats a lone dollar sign as text", () => {
    assert.equal(renderTemplate("costs $5 and ${item}", { item: "tea" }), "costs $5 and tea");
  });

  it("inserts values literally without re-scanning them", () => {
    assert.equal(renderTemplate("${a}", { a: "${b}" }), "${b}");
  });

  it("leaves fully rendered output unchanged when rendered again", () => {
    const once = renderTemplate("Question: ${query}", { query: "What's my favorite food?" });
    assert.equal(renderTemplate(once, {}), once);
  });

  it("reports the missing variable by name", () => {
    assert.throws(
      () => renderTemplate("Hello ${user_id} and ${query}", { user_id: "Bruce" }),
      (err: unknown) => err instanceof MissingVariableError && err.variable === "query"
    );
  });

  it("rejects an unterminated placeholder with its offset", () => {
    assert.throws(
      () => renderTemplate("Hello ${name", { name: "x" }),
      (err: unknown) => err instanceof MalformedTemplateError && err.position === 6
    );
  });

  it("rejects invalid placeholder names", () => {
    assert.throws(() => renderTemplate("${1abc}", { "1abc": "x" }), MalformedTemplateError);
    assert.throws(() => renderTemplate("${}", {}), MalformedTemplateError);
  });
});

describe("listPlaceholders", () => {
  it("lists names once in order of first appearance", () => {
    assert.deepEqual(listPlaceholders("${b} then ${a} then ${b}"), ["b", "a"]);
  });

  it("returns nothing for plain text", () => {
    assert.deepEqual(listPlaceholders("no variables here"), []);
  });

  it("knows the twelve shared placeholder names", () => {
    assert.equal(KNOWN_PLACEHOLDERS.length, 12);
    assert.ok(KNOWN_PLACEHOLDERS.includes("time_context"));
  });
});
