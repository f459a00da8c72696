import { describe, it } from "node:test";
import assert from "node:assert/strict";
import type { Fact } from "../types.js";
import { EmptyQueryError } from "../core/errors.js";
import { getLexicon, type Lexicon } from "../core/lexicon.js";
import { ChatResponder, personalize, resolvePronouns, unknownAnswer } from "../core/responder.js";

const facts = (...texts: string[]): Fact[] => texts.map((text) => ({ text, language: "en" }));

describe("ChatResponder", () => {
  const responder = new ChatResponder();

  it("answers from a matching fact", () => {
    const answer = responder.respond({
      userId: "bruce",
      facts: facts("Bruce's favorite food is ramen."),
      query: "What's my favorite food?",
    });
    assert.equal(answer, "Bruce's favorite food is ramen.");
  });

  it("connects related concepts and names the user", () => {
    const answer = responder.respond({
      userId: "bruce",
      facts: facts("The user's favorite food is ramen."),
      query: "What do I like to eat?",
    });
    assert.equal(answer, "Bruce's favorite food is ramen.");
  });

  it("quotes the best match first", () => {
    const answer = responder.respond({
      userId: "bruce",
      facts: facts("Bruce eats pasta.", "Bruce's favorite food is ramen."),
      query: "What is my favorite food?",
    });
    assert.equal(answer, "Bruce's favorite food is ramen. Bruce eats pasta.");
  });

  it("admits when it does not know", () => {
    const answer = responder.respond({
      userId: "bruce",
      facts: facts("Bruce's favorite food is ramen."),
      query: "Where does Bruce work?",
    });
    assert.equal(answer, "I don't have that information about Bruce.");
  });

  it("only looks at the bounded context", () => {
    const context = {
      userId: "bruce",
      facts: facts("Bruce lives in Seattle.", "Bruce plays chess.", "Bruce's favorite food is ramen."),
      query: "What's my favorite food?",
    };
    assert.equal(new ChatResponder({ maxContextMemories: 2 }).respond(context), unknownAnswer("bruce"));
    assert.equal(responder.respond(context), "Bruce's favorite food is ramen.");
  });

  it("does not answer from a fact that only shares a generic word", () => {
    const context = {
      userId: "bruce",
      facts: facts("Bruce likes jazz.", "Bruce loves hiking."),
      query: "What do I like to eat?",
    };
    assert.equal(responder.respond(context), unknownAnswer("bruce"));
    assert.equal(responder.respond({ ...context, query: "What's my favorite movie?" }), unknownAnswer("bruce"));
  });

  it("keeps only the facts on the asked topic", () => {
    const answer = responder.respond({
      userId: "bruce",
      facts: facts("Bruce loves hiking.", "Bruce's favorite food is ramen.", "Bruce likes jazz."),
      query: "What's my favorite food?",
    });
    assert.equal(answer, "Bruce's favorite food is ramen.");
  });

  it("answers from generic words when nothing else is asked", () => {
    const answer = responder.respond({
      userId: "bruce",
      facts: facts("Bruce likes jazz.", "Bruce lives in Seattle."),
      query: "What do I like?",
    });
    assert.equal(answer, "Bruce likes jazz.");
  });

  it("widens the context for a single answer", () => {
    const context = {
      userId: "bruce",
      facts: facts("Bruce lives in Seattle.", "Bruce plays chess.", "Bruce's favorite food is ramen."),
      query: "What's my favorite food?",
    };
    const narrow = new ChatResponder({ maxContextMemories: 2 });
    assert.equal(narrow.respond(context, { maxContextMemories: 3 }), "Bruce's favorite food is ramen.");
  });

  it("scores with the lexicon it was given", () => {
    const base = getLexicon();
    const conceptGroups = new Map(base.conceptGroups);
    conceptGroups.set("food", [...(base.conceptGroups.get("food") ?? []), "ramen"]);
    const lexicon: Lexicon = { ...base, conceptGroups };
    const context = { userId: "bruce", facts: facts("Bruce slurps ramen."), query: "Which food do I crave?" };
    assert.equal(new ChatResponder({ lexicon }).respond(context), "Bruce slurps ramen.");
    assert.equal(responder.respond(context), unknownAnswer("bruce"));
  });

  it("rejects an empty query", () => {
    assert.throws(() => responder.respond({ userId: "bruce", facts: [], query: "   " }), EmptyQueryError);
  });
});

describe("resolvePronouns", () => {
  it("replaces first-person forms with the user's name", () => {
    assert.equal(resolvePronouns("I'm sure my cat likes me", "bruce"), "Bruce is sure Bruce's cat likes Bruce");
  });

  it("keeps user ids that are not plain lowercase", () => {
    assert.equal(resolvePronouns("Where do I live?", "user-42"), "Where do user-42 live?");
  });
});

describe("personalize", () => {
  it("swaps the generic subject for the display name", () => {
    assert.equal(personalize("The user met Alice on 2024-03-10.", "bruce"), "Bruce met Alice on 2024-03-10.");
  });
});
