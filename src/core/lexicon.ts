import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { z } from "zod";

const LEXICON_PATH = fileURLToPath(new URL("../../data/lexicon.json", import.meta.url));

const wordList = z.array(z.string().min(1));

const LexiconSchema = z.object({
  stopwords: wordList,
  englishMarkers: wordList,
  greetings: wordList,
  smallTalk: wordList,
  implicitPastVerbs: wordList,
  implicitBaseVerbs: wordList,
  dayRelativePhrases: wordList,
  spanRelativePhrases: wordList,
  quantityWords: wordList,
  exclusivePredicates: wordList,
  negations: wordList,
  vagueWords: wordList,
  conceptGroups: z.record(wordList),
  genericConcepts: wordList,
});

export interface Lexicon {
  stopwords: ReadonlySet<string>;
  englishMarkers: ReadonlySet<string>;
  greetings: readonly string[];
  smallTalk: readonly string[];
  implicitPastVerbs: ReadonlySet<string>;
  implicitBaseVerbs: ReadonlySet<string>;
  /** Longest phrase first, so "earlier today" wins over "today". */
  dayRelativePhrases: readonly string[];
  spanRelativePhrases: readonly string[];
  quantityWords: ReadonlySet<string>;
  /** Longest predicate first. */
  exclusivePredicates: readonly string[];
  negations: readonly string[];
  /** Words that carry no concrete detail on their own. */
  vagueWords: ReadonlySet<string>;
  conceptGroups: ReadonlyMap<string, readonly string[]>;
  /** Concept groups too broad to make a fact relevant on their own. */
  genericConcepts: ReadonlySet<string>;
}

const byLengthDesc = (a: string, b: string) => b.length - a.length;

let cached: Lexicon | null = null;

export function loadLexicon(path: string = LEXICON_PATH): Lexicon {
  const raw = LexiconSchema.parse(JSON.parse(readFileSync(path, "utf-8")));
  return {
    stopwords: new Set(raw.stopwords),
    englishMarkers: new Set(raw.englishMarkers),
    greetings: raw.greetings,
    smallTalk: raw.smallTalk,
    implicitPastVerbs: new Set(raw.implicitPastVerbs),
    implicitBaseVerbs: new Set(raw.implicitBaseVerbs),
    dayRelativePhrases: [...raw.dayRelativePhrases].sort(byLengthDesc),
    spanRelativePhrases: [...raw.spanRelativePhrases].sort(byLengthDesc),
    quantityWords: new Set(raw.quantityWords),
    exclusivePredicates: [...raw.exclusivePredicates].sort(byLengthDesc),
    negations: [...raw.negations].sort(byLengthDesc),
    vagueWords: new Set(raw.vagueWords),
    conceptGroups: new Map(Object.entries(raw.conceptGroups)),
    genericConcepts: new Set(raw.genericConcepts),
  };
}

/** Shared lexicon, read from disk on first use. */
export function getLexicon(): Lexicon {
  if (!cached) {
    cached = loadLexicon();
  }
  return cached;
}
