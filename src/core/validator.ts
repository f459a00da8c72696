import type {
  Fact,
  InvalidFact,
  ValidationCriteria,
  ValidationFormat,
  ValidationResult,
  ValidationRule,
} from "../types.js";
import { ValidationInconsistency } from "./errors.js";
import { getLexicon, type Lexicon } from "./lexicon.js";
import { PromptManager } from "./prompts.js";
import { checkTemporal, findDates, hasMonthName } from "./temporal.js";
import { containsPhrase, findPhrase, isCapitalized, normalizeWord, thirdPerson, words } from "./text.js";

export const VALIDATION_RULES: readonly ValidationRule[] = [
  "subject",
  "specificity",
  "consistency",
  "temporal",
];

export const REASONS = {
  subject: "ambiguous subject",
  specificity: "not specific enough",
  temporal: "malformed temporal reference",
} as const;

const FLOATING_PRONOUNS = new Set([
  "he", "she", "they", "it", "him", "her", "them", "his", "hers", "their",
  "theirs", "this", "that", "these", "those", "i", "me", "my", "mine", "we",
  "us", "our", "you", "your", "i'm", "i've", "he's", "she's", "it's",
  "they're", "that's", "we're", "you're",
]);

const SUGGESTIONS = {
  subject: "Name the subject explicitly instead of starting with a pronoun.",
  specificity: "Add a concrete detail such as a name, a number or a date to vague statements.",
  consistency: "Resolve contradicting facts before storing them; stored memories are never rewritten.",
  temporal: "Write dates as YYYY-MM-DD and make sure date ranges run forwards.",
} as const;

/**
 * Decides whether a fact carries enough concrete detail to be worth
 * remembering. Swap in a model-backed implementation for finer judgment.
 */
export interface SpecificityClassifier {
  classify(fact: Fact): boolean;
}

/**
 * Specific means: a number or date, a month name, a quantity word, a
 * capitalised name, or at least two content words that are not vague.
 */
export class LexiconSpecificityClassifier implements SpecificityClassifier {
  private lexicon: Lexicon;

  constructor(lexicon: Lexicon = getLexicon()) {
    this.lexicon = lexicon;
  }

  classify(fact: Fact): boolean {
    const text = fact.text;
    if (/\d/.test(text) || hasMonthName(text)) return true;

    const tokens = words(text);
    const { stopwords, quantityWords, vagueWords } = this.lexicon;

    for (let i = 0; i < tokens.length; i++) {
      const normalized = normalizeWord(tokens[i]);
      if (quantityWords.has(normalized)) return true;
      if (!isCapitalized(tokens[i]) || stopwords.has(normalized)) continue;
      if (i > 0) return true;
      // Sentence-initial capitals only count as a name in "Alice's …" or "Alice loves …".
      const next = tokens[i + 1];
      if (/['’]s$/.test(tokens[i]) || (next !== undefined && /^\p{Ll}+s$/u.test(next))) return true;
    }

    const concrete = tokens
      .map(normalizeWord)
      .filter((w) => w && !stopwords.has(w) && !vagueWords.has(w));
    return concrete.length >= 2;
  }
}

interface Relation {
  subject: string;
  predicate: string;
  object: string;
}

interface Polarity {
  negated: boolean;
  statement: string;
}

// Trailing detail that refines an object rather than replacing it.
const OBJECT_DETAIL = /\s+(?:with|as|since|for|and|because|who|which|where|near|at|in|on|from|until|during)\b.*$/;

function sameObject(a: string, b: string): boolean {
  const coreA = a.replace(OBJECT_DETAIL, "");
  const coreB = b.replace(OBJECT_DETAIL, "");
  if (coreA === coreB) return true;
  // "alice" and "alice smith" name the same person
  return coreA.startsWith(`${coreB} `) || coreB.startsWith(`${coreA} `);
}

const FAVORITE = /^(.+?)['’]s (favou?rite [\p{L} ]+?) (?:is|are) (.+)$/iu;

function stripDates(text: string): string {
  return text
    .replace(/\(as of [^)]*\)/gi, " ")
    .replace(/\b(?:on|in|since|as of)\s+\d{4}-\d{2}-\d{2}\b/gi, " ")
    .replace(/\d{4}-\d{2}-\d{2}|\d{1,2}\/\d{1,2}\/\d{2,4}/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

function bareText(fact: Fact): string {
  return fact.text.replace(/’/g, "'").replace(/[\s.!]+$/, "").trim();
}

function dateOf(fact: Fact): string | undefined {
  return fact.temporalContext ?? findDates(fact.text)[0];
}

/**
 * Validates candidate facts against the enabled rules and partitions them
 * into valid and invalid. Facts are never rewritten.
 */
export class FactValidator {
  private lexicon: Lexicon;
  private classifier: SpecificityClassifier;

  constructor(options: { classifier?: SpecificityClassifier; lexicon?: Lexicon } = {}) {
    this.lexicon = options.lexicon ?? getLexicon();
    this.classifier = options.classifier ?? new LexiconSpecificityClassifier(this.lexicon);
  }

  validate(facts: readonly Fact[], options: { criteria?: ValidationCriteria } = {}): ValidationResult {
    const enabled = (rule: ValidationRule) => options.criteria?.[rule] !== false;
    const reasons = new Map<number, string>();

    facts.forEach((fact, i) => {
      if (enabled("subject") && this.hasFloatingSubject(fact)) {
        reasons.set(i, REASONS.subject);
      } else if (enabled("specificity") && !this.classifier.classify(fact)) {
        reasons.set(i, REASONS.specificity);
      }
    });

    if (enabled("consistency")) {
      const eligible = facts.map((_, i) => i).filter((i) => !reasons.has(i));
      for (const [i, others] of this.findContradictions(facts, eligible)) {
        reasons.set(i, `contradicts fact ${others.join(", ")}`);
      }
    }

    if (enabled("temporal")) {
      facts.forEach((fact, i) => {
        if (!reasons.has(i) && !checkTemporal(fact.text).ok) {
          reasons.set(i, REASONS.temporal);
        }
      });
    }

    const valid: Fact[] = [];
    const invalid: InvalidFact[] = [];
    facts.forEach((fact, i) => {
      const reason = reasons.get(i);
      if (reason === undefined) {
        valid.push(fact);
      } else {
        invalid.push({ fact, reason });
      }
    });

    const result = { valid, invalid, suggestions: this.suggest(facts, invalid) };
    assertPartition(facts, result);
    return result;
  }

  /** Validate and render in one step. */
  report(
    facts: readonly Fact[],
    options: { criteria?: ValidationCriteria; format?: ValidationFormat } = {}
  ): string {
    return formatValidationResult(this.validate(facts, options), options.format);
  }

  /** A leading pronoun, or a leading verb with no subject at all. */
  private hasFloatingSubject(fact: Fact): boolean {
    const first = words(fact.text)[0];
    if (first === undefined) return true;
    const lower = first.toLowerCase().replace(/’/g, "'");
    return (
      FLOATING_PRONOUNS.has(lower) ||
      this.lexicon.implicitPastVerbs.has(lower) ||
      this.lexicon.implicitBaseVerbs.has(lower)
    );
  }

  private relationOf(fact: Fact): Relation | null {
    const text = stripDates(bareText(fact));

    const favorite = FAVORITE.exec(text);
    if (favorite) {
      return {
        subject: favorite[1].toLowerCase(),
        predicate: favorite[2].toLowerCase().replace("favourite", "favorite"),
        object: favorite[3].toLowerCase(),
      };
    }

    const match = findPhrase(text, this.lexicon.exclusivePredicates);
    if (!match || match.index === 0) return null;
    const object = text.slice(match.index + match.length).trim().toLowerCase();
    if (!object) return null;
    return {
      subject: text.slice(0, match.index).trim().toLowerCase(),
      predicate: match.phrase,
      object,
    };
  }

  private polarityOf(fact: Fact): Polarity {
    const text = stripDates(bareText(fact)).toLowerCase();
    const negated = this.lexicon.negations.some((phrase) => containsPhrase(text, phrase));
    if (!negated) return { negated, statement: text };

    const statement = text
      .replace(/\b(?:does not|doesn't) (\p{L}+)/gu, (_, verb: string) => thirdPerson(verb))
      .replace(/\b(?:do not|don't) (\p{L}+)/gu, "$1")
      .replace(/\b(?:is not|isn't)\b/g, "is")
      .replace(/\b(?:never|no longer)\s+/g, "")
      .replace(/\s+/g, " ")
      .trim();
    return { negated, statement };
  }

  private contradicts(a: Fact, b: Fact): boolean {
    const dateA = dateOf(a);
    const dateB = dateOf(b);
    if (dateA && dateB && dateA !== dateB) return false;

    const relA = this.relationOf(a);
    const relB = this.relationOf(b);
    if (
      relA &&
      relB &&
      relA.subject === relB.subject &&
      relA.predicate === relB.predicate &&
      !sameObject(relA.object, relB.object)
    ) {
      return true;
    }

    const polA = this.polarityOf(a);
    const polB = this.polarityOf(b);
    return polA.negated !== polB.negated && polA.statement === polB.statement;
  }

  /** Batch index → indices of the facts it contradicts. Symmetric. */
  private findContradictions(facts: readonly Fact[], eligible: number[]): Map<number, number[]> {
    const found = new Map<number, number[]>();
    const link = (from: number, to: number) => {
      const list = found.get(from) ?? [];
      list.push(to);
      found.set(from, list);
    };

    for (let x = 0; x < eligible.length; x++) {
      for (let y = x + 1; y < eligible.length; y++) {
        const i = eligible[x];
        const j = eligible[y];
        if (this.contradicts(facts[i], facts[j])) {
          link(i, j);
          link(j, i);
        }
      }
    }
    for (const list of found.values()) list.sort((p, q) => p - q);
    return found;
  }

  private suggest(facts: readonly Fact[], invalid: InvalidFact[]): string[] {
    const suggestions: string[] = [];
    const add = (text: string) => {
      if (!suggestions.includes(text)) suggestions.push(text);
    };

    for (const { reason } of invalid) {
      if (reason === REASONS.subject) add(SUGGESTIONS.subject);
      else if (reason === REASONS.specificity) add(SUGGESTIONS.specificity);
      else if (reason === REASONS.temporal) add(SUGGESTIONS.temporal);
      else add(SUGGESTIONS.consistency);
    }

    const relative = [...this.lexicon.dayRelativePhrases, ...this.lexicon.spanRelativePhrases];
    for (const fact of facts) {
      const match = findPhrase(fact.text, relative);
      if (match) {
        add(`Consider specifying dates explicitly instead of relative references such as "${match.phrase}".`);
      }
    }

    return suggestions;
  }
}

function assertPartition(facts: readonly Fact[], result: ValidationResult): void {
  const placed = [...result.valid, ...result.invalid.map((entry) => entry.fact)];
  if (placed.length !== facts.length) {
    throw new ValidationInconsistency(
      `Validation placed ${placed.length} facts but received ${facts.length}`
    );
  }
  const remaining = new Map<Fact, number>();
  for (const fact of facts) remaining.set(fact, (remaining.get(fact) ?? 0) + 1);
  for (const fact of placed) {
    const count = remaining.get(fact) ?? 0;
    if (count === 0) {
      throw new ValidationInconsistency(`Fact "${fact.text}" was placed more often than it was given`);
    }
    remaining.set(fact, count - 1);
  }
}

function section(title: string, lines: string[]): string {
  return [`${title}:`, ...(lines.length ? lines.map((l) => `- ${l}`) : ["(none)"])].join("\n");
}

export function formatValidationResult(
  result: ValidationResult,
  format: ValidationFormat = "sections"
): string {
  if (format === "json") {
    return JSON.stringify(result, null, 2);
  }
  return [
    section("VALID", result.valid.map((f) => f.text)),
    section("INVALID", result.invalid.map(({ fact, reason }) => `${fact.text} (${reason})`)),
    section("SUGGESTIONS", result.suggestions),
  ].join("\n\n");
}

/** Human-readable list of the active rules. */
export function describeCriteria(criteria: ValidationCriteria = {}): string {
  return VALIDATION_RULES.map(
    (rule) => `- ${rule}: ${criteria[rule] === false ? "disabled" : "enabled"}`
  ).join("\n");
}

const FORMAT_INSTRUCTIONS: Record<ValidationFormat, string> = {
  sections: [
    "VALID: one fact per line, or none",
    "INVALID: one fact per line followed by ' (<reason>)', or none",
    "SUGGESTIONS: one suggestion per line, or none",
  ].join("\n"),
  json: '{"valid": [<fact>], "invalid": [{"fact": <fact>, "reason": <reason>}], "suggestions": [<suggestion>]}',
};

/** The `validation/fact_validation` prompt filled in for a model-backed check. */
export function buildValidationPrompt(
  facts: readonly Fact[],
  options: { criteria?: ValidationCriteria; format?: ValidationFormat } = {},
  prompts: PromptManager = new PromptManager()
): string {
  return prompts.getPrompt("validation", "fact_validation", {
    criteria: describeCriteria(options.criteria),
    data: facts.length === 0 ? "none" : facts.map((fact, i) => `${i + 1}. ${fact.text}`).join("\n"),
    format: FORMAT_INSTRUCTIONS[options.format ?? "sections"],
  });
}
