import type { ChatContext, Fact } from "../types.js";
import { EmptyQueryError } from "./errors.js";
import { getLexicon, type Lexicon } from "./lexicon.js";
import { rankByRelevance } from "./relevance.js";
import { displayName, escapeRegExp, possessive } from "./text.js";

export const DEFAULT_MAX_CONTEXT_MEMORIES = 5;

type Substitution = (name: string) => string;

/** First-person forms and what they become once the speaker is known. */
export const PRONOUN_TABLE: Readonly<Record<string, Substitution>> = {
  "i'm": (name) => `${name} is`,
  "i've": (name) => `${name} has`,
  "i'd": (name) => `${name} would`,
  "i'll": (name) => `${name} will`,
  myself: (name) => name,
  mine: (name) => possessive(name),
  my: (name) => possessive(name),
  me: (name) => name,
  i: (name) => name,
};

const PRONOUN_PATTERN = new RegExp(
  `(?<![\\p{L}\\p{N}'])(${Object.keys(PRONOUN_TABLE).map(escapeRegExp).join("|")})(?![\\p{L}\\p{N}'])`,
  "giu"
);

export function resolvePronouns(query: string, userId: string): string {
  const name = displayName(userId);
  return query.replace(/’/g, "'").replace(PRONOUN_PATTERN, (match: string) => {
    const substitute = PRONOUN_TABLE[match.toLowerCase()];
    return substitute ? substitute(name) : match;
  });
}

export function personalize(text: string, userId: string): string {
  return text.replace(/\bthe user\b/gi, displayName(userId));
}

/**
 * Answers a question about a user from the facts handed to it, and only
 * from those. Matching facts are quoted best first.
 */
export interface ChatResponderOptions {
  maxContextMemories?: number;
  lexicon?: Lexicon;
}

export class ChatResponder {
  private maxContextMemories: number;
  private lexicon: Lexicon;

  constructor(options: ChatResponderOptions = {}) {
    this.maxContextMemories = options.maxContextMemories ?? DEFAULT_MAX_CONTEXT_MEMORIES;
    this.lexicon = options.lexicon ?? getLexicon();
  }

  /** The bounded context the answer may draw on. */
  buildContext(
    userId: string,
    facts: readonly Fact[],
    query: string,
    limit: number = this.maxContextMemories
  ): ChatContext {
    if (!query.trim()) {
      throw new EmptyQueryError();
    }
    return { userId, facts: facts.slice(0, limit), query: query.trim() };
  }

  /** Matching facts, best first. */
  relevantFacts(context: ChatContext): Fact[] {
    const resolved = resolvePronouns(context.query, context.userId);
    const exclude = new Set([context.userId.toLowerCase()]);
    return rankByRelevance(resolved, context.facts, (fact) => fact.text, exclude, this.lexicon).map((r) => r.item);
  }

  respond(context: ChatContext, options: { maxContextMemories?: number } = {}): string {
    const bounded = this.buildContext(context.userId, context.facts, context.query, options.maxContextMemories);
    const matches = this.relevantFacts(bounded);
    if (matches.length === 0) {
      return unknownAnswer(context.userId);
    }
    return matches.map((fact) => personalize(fact.text, context.userId)).join(" ");
  }
}

export function unknownAnswer(userId: string): string {
  return `I don't have that information about ${displayName(userId)}.`;
}
