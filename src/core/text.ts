import type { Lexicon } from "./lexicon.js";

const WORD = /[\p{L}\p{N}][\p{L}\p{N}'’-]*/gu;

/** Word tokens with their original casing. Hyphenated dates stay whole. */
export function words(text: string): string[] {
  return text.match(WORD) ?? [];
}

/** Lowercase, drop a possessive `'s`, then drop remaining apostrophes. */
export function normalizeWord(word: string): string {
  return word
    .toLowerCase()
    .replace(/’/g, "'")
    .replace(/'s$/, "")
    .replace(/'/g, "");
}

/** Crude plural stripping, applied the same way to queries and facts. */
export function stem(term: string): string {
  if (term.length > 4 && term.endsWith("ies")) return term.slice(0, -3) + "y";
  if (term.length > 3 && term.endsWith("s") && !term.endsWith("ss")) return term.slice(0, -1);
  return term;
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function phrasePattern(phrase: string): RegExp {
  return new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(phrase)}(?![\\p{L}\\p{N}])`, "iu");
}

export interface PhraseMatch {
  phrase: string;
  index: number;
  length: number;
}

/** First phrase (in list order) found on word boundaries, case-insensitively. */
export function findPhrase(text: string, phrases: readonly string[]): PhraseMatch | null {
  for (const phrase of phrases) {
    const match = phrasePattern(phrase).exec(text);
    if (match) {
      return { phrase, index: match.index, length: match[0].length };
    }
  }
  return null;
}

export function containsPhrase(text: string, phrase: string): boolean {
  return phrasePattern(phrase).test(text);
}

export function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

/** Capitalise, replace trailing punctuation with a single period. */
export function finishSentence(text: string): string {
  const trimmed = text.trim().replace(/[\s.,;:!?]+$/u, "");
  return trimmed ? `${capitalize(trimmed)}.` : "";
}

/**
 * English when any word is a known English function word or lexicon verb,
 * or a gerund. Everything else is `und`.
 */
export function detectLanguage(text: string, lexicon: Lexicon): "en" | "und" {
  for (const word of words(text)) {
    const lower = word.toLowerCase().replace(/’/g, "'");
    if (
      lexicon.englishMarkers.has(lower) ||
      lexicon.implicitPastVerbs.has(lower) ||
      lexicon.implicitBaseVerbs.has(lower) ||
      /^\p{Ll}{3,}ing$/u.test(lower)
    ) {
      return "en";
    }
  }
  return "und";
}

/** Third-person singular of an English base verb. */
export function thirdPerson(verb: string): string {
  if (/[^aeiou]y$/.test(verb)) return verb.slice(0, -1) + "ies";
  if (/(s|sh|ch|x|z|o)$/.test(verb)) return verb + "es";
  return verb + "s";
}

export function isCapitalized(word: string): boolean {
  return /^\p{Lu}/u.test(word);
}

/** Display form of a user id: "bruce" → "Bruce". */
export function displayName(userId: string): string {
  return /^\p{Ll}+$/u.test(userId) ? capitalize(userId) : userId;
}

export function possessive(name: string): string {
  return name.endsWith("s") ? `${name}'` : `${name}'s`;
}
