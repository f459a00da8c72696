import type { ExtractionInput, Fact } from "../types.js";
import { ExtractionFailure } from "./errors.js";
import { getLexicon, type Lexicon } from "./lexicon.js";
import { findDates } from "./temporal.js";
import {
  containsPhrase,
  detectLanguage,
  findPhrase,
  finishSentence,
  isCapitalized,
  normalizeWord,
  possessive,
  thirdPerson,
  words,
} from "./text.js";

export const MAX_FACTS = 5;

const SENTENCE_BREAK = /(?<=[.!?])\s+|\n+/;

// A comma, semicolon or "and"/"but" followed by a fresh subject starts a new clause.
const CLAUSE_BREAK =
  /\s*[,;]\s+(?:and\s+|but\s+)?(?=(?:she|he|they|i|we|it|my|his|her|their)\b)|\s*;\s*|\s+(?:and|but)\s+(?=(?:she|he|they|i|we)\b)/i;

const NOT_A_PERSON = new Set([
  "monday", "tuesday", "wednesday", "thursday", "friday", "saturday", "sunday",
  "january", "february", "march", "april", "may", "june", "july", "august",
  "september", "october", "november", "december",
]);

const ADVERBS = new Set([
  "really", "also", "never", "always", "usually", "often", "just", "still",
  "sometimes", "actually", "absolutely", "totally", "now", "recently",
  "finally", "mostly", "rarely", "already", "mainly",
]);

// A name after these is a place, not someone a later pronoun refers to.
const PLACE_PREPOSITIONS = new Set(["in", "at", "from", "to", "near", "of", "on", "into", "around"]);

// Finite verbs that show a sentence-initial gerund is the subject: "Swimming is …".
const GERUND_PREDICATES = new Set([
  "is", "was", "isn't", "wasn't", "has", "had", "seems", "feels", "makes",
  "helps", "keeps", "gives", "remains", "became", "becomes", "can", "will",
]);

const AGREEMENT: Record<string, string> = {
  am: "is",
  are: "is",
  have: "has",
  do: "does",
  "don't": "doesn't",
  "haven't": "hasn't",
  "aren't": "isn't",
};

const FIRST_PERSON_CONTRACTIONS: Record<string, string> = {
  "i'm": "is",
  "i've": "has",
  "i'd": "would",
  "i'll": "will",
};

const THIRD_PERSON_CONTRACTIONS: Record<string, string> = {
  "she's": "is",
  "he's": "is",
  "they're": "is",
  "they've": "has",
};

interface Token {
  lead: string;
  core: string;
  trail: string;
}

interface ClauseResult {
  fact: Fact | null;
  entity: string | null;
}

function splitSentences(content: string): string[] {
  return content
    .split(SENTENCE_BREAK)
    .map((s) => s.trim())
    .filter(Boolean);
}

function splitClauses(sentence: string): string[] {
  return sentence
    .split(CLAUSE_BREAK)
    .map((c) => c.trim().replace(/[\s.!;:,]+$/u, ""))
    .filter(Boolean);
}

function tokenize(clause: string): Token[] {
  return clause
    .split(/\s+/)
    .filter(Boolean)
    .map((raw) => {
      const m = /^([^\p{L}\p{N}]*)(.*?)([^\p{L}\p{N}]*)$/u.exec(raw);
      return m ? { lead: m[1], core: m[2], trail: m[3] } : { lead: "", core: raw, trail: "" };
    });
}

/**
 * Rule-based extraction of atomic personal facts from conversation text.
 *
 * Speakers become "The user", third-person pronouns resolve to the most
 * recently named person, and relative day phrases are pinned to the
 * supplied time context. Text in other languages passes through untouched.
 */
export class FactExtractor {
  private lexicon: Lexicon;
  private maxFacts: number;

  constructor(options: { lexicon?: Lexicon; maxFacts?: number } = {}) {
    this.lexicon = options.lexicon ?? getLexicon();
    this.maxFacts = Math.min(options.maxFacts ?? MAX_FACTS, MAX_FACTS);
  }

  extract(input: ExtractionInput): Fact[] {
    const { content, context } = input;
    if (!/\p{L}/u.test(content)) {
      throw new ExtractionFailure(
        content.trim() ? "Content contains no sentence-bearing text" : "Content is empty"
      );
    }

    const timeContext = input.timeContext?.trim() || undefined;
    const facts: Fact[] = [];
    const seen = new Set<string>();
    let entity: string | null = null;

    for (const sentence of splitSentences(content)) {
      if (sentence.endsWith("?")) continue;

      for (const clause of splitClauses(sentence)) {
        const result = this.extractClause(clause, entity, context, timeContext);
        entity = result.entity;
        if (!result.fact) continue;

        const key = result.fact.text.toLowerCase();
        if (seen.has(key)) continue;
        seen.add(key);
        facts.push(result.fact);
        if (facts.length >= this.maxFacts) return facts;
      }
    }

    return facts;
  }

  private extractClause(
    clause: string,
    entity: string | null,
    context: string,
    timeContext: string | undefined
  ): ClauseResult {
    if (this.isChatter(clause)) {
      return { fact: null, entity };
    }

    const clauseWords = words(clause);
    const contentWords = clauseWords
      .map(normalizeWord)
      .filter((w) => w && !this.lexicon.stopwords.has(w));
    if (clauseWords.length < 2 || contentWords.length === 0) {
      return { fact: null, entity };
    }

    const language = detectLanguage(clause, this.lexicon);
    if (language !== "en") {
      return { fact: this.buildFact(finishSentence(clause), clause, language, context), entity };
    }

    const rewritten = this.rewrite(tokenize(clause), entity);
    if (!rewritten.text || !rewritten.anchored) {
      return { fact: null, entity: rewritten.entity };
    }

    let text = rewritten.text;
    let temporalContext: string | undefined;
    if (timeContext) {
      const pinned = this.pinTime(text, timeContext);
      text = pinned.text;
      temporalContext = pinned.temporalContext;
    }
    temporalContext ??= findDates(text)[0];

    const fact = this.buildFact(finishSentence(text), clause, language, context, temporalContext);
    return { fact, entity: rewritten.entity };
  }

  private buildFact(
    text: string,
    excerpt: string,
    language: string,
    context: string,
    temporalContext?: string
  ): Fact {
    const fact: Fact = { text, language, sourceExcerpt: excerpt };
    if (context) fact.context = context;
    if (temporalContext) fact.temporalContext = temporalContext;
    return fact;
  }

  private isChatter(clause: string): boolean {
    const plain = clause
      .toLowerCase()
      .replace(/’/g, "'")
      .replace(/[^\p{L}\p{N}'\s]/gu, " ")
      .replace(/\s+/g, " ")
      .trim();
    if (!plain) return true;
    if (this.lexicon.smallTalk.some((phrase) => containsPhrase(plain, phrase))) return true;

    const wordCount = plain.split(" ").length;
    return this.lexicon.greetings.some((greeting) => {
      if (plain === greeting) return true;
      // a greeting plus at most a name: "hi bruce"
      return plain.startsWith(`${greeting} `) && wordCount - greeting.split(" ").length <= 1;
    });
  }

  private pinTime(text: string, timeContext: string): { text: string; temporalContext?: string } {
    const day = findPhrase(text, this.lexicon.dayRelativePhrases);
    if (day) {
      const before = text.slice(0, day.index).replace(/\b(?:on|at)\s+$/i, "");
      const after = text.slice(day.index + day.length);
      return { text: `${before}on ${timeContext}${after}`, temporalContext: timeContext };
    }

    if (findPhrase(text, this.lexicon.spanRelativePhrases)) {
      return { text: `${text} (as of ${timeContext})`, temporalContext: timeContext };
    }

    return { text };
  }

  private isPersonCandidate(core: string): boolean {
    const normalized = normalizeWord(core);
    return (
      isCapitalized(core) &&
      !this.lexicon.stopwords.has(normalized) &&
      !NOT_A_PERSON.has(normalized) &&
      !this.lexicon.implicitPastVerbs.has(normalized) &&
      !this.lexicon.implicitBaseVerbs.has(normalized)
    );
  }

  private conjugate(word: string): string {
    const lower = word.toLowerCase().replace(/’/g, "'");
    const agreed = AGREEMENT[lower];
    if (agreed) return agreed;
    if (this.lexicon.implicitBaseVerbs.has(lower)) return thirdPerson(lower);
    return word;
  }

  private isGerund(lower: string): boolean {
    return lower.length > 4 && lower.endsWith("ing");
  }

  /** "Cooking relaxes me", "Hiking with Alice was fun": the gerund is the subject. */
  private isGerundSubject(tokens: Token[]): boolean {
    const first = tokens[0].core.toLowerCase();
    if (!this.isGerund(first)) return false;
    const next = tokens[1]?.core.toLowerCase().replace(/’/g, "'");
    if (next !== undefined && /^\p{Ll}+[^s]s$/u.test(next) && !this.lexicon.stopwords.has(next)) return true;
    return tokens.slice(1).some((t) => GERUND_PREDICATES.has(t.core.toLowerCase().replace(/’/g, "'")));
  }

  /**
   * Opening a clause with a bare verb ("Met Alice…") implies the speaker.
   */
  private implicitSubject(token: Token, next: Token | undefined): string | null {
    const lower = token.core.toLowerCase();
    if (this.lexicon.implicitPastVerbs.has(lower)) return `The user ${lower}`;
    if (this.lexicon.implicitBaseVerbs.has(lower)) return `The user ${thirdPerson(lower)}`;
    if (this.isGerund(lower)) return `The user is ${lower}`;
    if (lower.length > 4 && lower.endsWith("ed") && !(next && /^\p{Ll}+s$/u.test(next.core))) {
      return `The user ${lower}`;
    }
    return null;
  }

  private rewrite(
    tokens: Token[],
    inherited: string | null
  ): { text: string; entity: string | null; anchored: boolean } {
    const out: string[] = [];
    let entity = inherited;
    let anchored = false;
    let pendingVerb = false;
    let previousWasEntity = false;
    let previousWord = "";

    for (let i = 0; i < tokens.length; i++) {
      const { lead, core, trail } = tokens[i];
      const next = tokens[i + 1];
      const lower = core.toLowerCase().replace(/’/g, "'");
      const afterPreposition = PLACE_PREPOSITIONS.has(previousWord);
      previousWord = lower;
      const atStart = i === 0;
      const emit = (word: string) => out.push(`${lead}${word}${trail}`);
      const theUser = atStart ? "The user" : "the user";

      if (!core) {
        emit("");
        continue;
      }

      if (pendingVerb) {
        if (ADVERBS.has(lower)) {
          emit(core);
          continue;
        }
        pendingVerb = false;
        emit(this.conjugate(core));
        previousWasEntity = false;
        continue;
      }

      const wasEntity = previousWasEntity;
      previousWasEntity = false;

      if (lower === "i") {
        emit(theUser);
        anchored = true;
        pendingVerb = true;
        continue;
      }
      const firstPersonVerb = FIRST_PERSON_CONTRACTIONS[lower];
      if (firstPersonVerb) {
        emit(`${theUser} ${firstPersonVerb}`);
        anchored = true;
        continue;
      }
      if (lower === "my" || lower === "mine") {
        emit(`${theUser}'s`);
        anchored = true;
        continue;
      }
      if (lower === "me" || lower === "myself") {
        emit(theUser);
        anchored = true;
        continue;
      }

      const thirdPersonVerb = THIRD_PERSON_CONTRACTIONS[lower];
      if (thirdPersonVerb || lower === "she" || lower === "he" || lower === "they") {
        if (!entity) return { text: "", entity, anchored: false };
        emit(thirdPersonVerb ? `${entity} ${thirdPersonVerb}` : entity);
        anchored = true;
        pendingVerb = lower === "they";
        continue;
      }
      if (lower === "him" || lower === "them") {
        if (!entity) return { text: "", entity, anchored: false };
        emit(entity);
        anchored = true;
        continue;
      }
      if (lower === "her") {
        if (!entity) return { text: "", entity, anchored: false };
        const possessiveUse =
          atStart ||
          (next !== undefined &&
            /^\p{Ll}+$/u.test(next.core) &&
            !this.lexicon.stopwords.has(next.core) &&
            !ADVERBS.has(next.core));
        emit(possessiveUse ? possessive(entity) : entity);
        anchored = true;
        continue;
      }
      if (lower === "his" || lower === "their" || lower === "hers" || lower === "theirs") {
        if (!entity) return { text: "", entity, anchored: false };
        emit(possessive(entity));
        anchored = true;
        continue;
      }
      if (lower === "we" || lower === "us") {
        if (!entity) return { text: "", entity, anchored: false };
        emit(`${theUser} and ${entity}`);
        anchored = true;
        continue;
      }
      if (lower === "our" || lower === "ours") {
        return { text: "", entity, anchored: false };
      }
      if (atStart && (lower === "it" || lower === "this" || lower === "that" || lower === "you")) {
        return { text: "", entity, anchored: false };
      }

      if (atStart && this.isGerundSubject(tokens)) {
        emit(core);
        anchored = true;
        continue;
      }

      if (atStart) {
        const implied = this.implicitSubject(tokens[i], next);
        if (implied) {
          emit(implied);
          anchored = true;
          continue;
        }
      }

      if (this.isPersonCandidate(core)) {
        anchored = true;
        const name = core.replace(/['’]s$/, "");
        if (wasEntity && entity) {
          entity = `${entity} ${name}`;
          previousWasEntity = !/['’]s$/.test(core);
        } else if (!afterPreposition) {
          entity = name;
          previousWasEntity = !/['’]s$/.test(core);
        }
      }
      emit(core);
    }

    return { text: out.join(" ").trim(), entity, anchored };
  }
}
