import { getLexicon, type Lexicon } from "./lexicon.js";
import { normalizeWord, stem, words } from "./text.js";

const conceptIndexes = new WeakMap<Lexicon, Map<string, Set<string>>>();

function buildConceptIndex(lexicon: Lexicon): Map<string, Set<string>> {
  const index = new Map<string, Set<string>>();
  for (const [group, members] of lexicon.conceptGroups) {
    for (const member of members) {
      const key = stem(normalizeWord(member));
      const groups = index.get(key) ?? new Set<string>();
      groups.add(group);
      index.set(key, groups);
    }
  }
  return index;
}

function conceptsOf(term: string, lexicon: Lexicon): ReadonlySet<string> {
  let index = conceptIndexes.get(lexicon);
  if (!index) {
    index = buildConceptIndex(lexicon);
    conceptIndexes.set(lexicon, index);
  }
  return index.get(term) ?? new Set<string>();
}

/** True when every concept group of the term is a generic one ("favorite"). */
function isGeneric(term: string, lexicon: Lexicon): boolean {
  const concepts = conceptsOf(term, lexicon);
  if (concepts.size === 0) return false;
  for (const concept of concepts) {
    if (!lexicon.genericConcepts.has(concept)) return false;
  }
  return true;
}

/**
 * Stemmed content terms of a text. Stopwords and any `exclude`d words
 * (typically the user's own name) are dropped.
 */
export function termsOf(
  text: string,
  exclude: ReadonlySet<string> = new Set(),
  lexicon: Lexicon = getLexicon()
): Set<string> {
  const { stopwords } = lexicon;
  const terms = new Set<string>();
  for (const word of words(text)) {
    const normalized = normalizeWord(word);
    if (!normalized || stopwords.has(normalized) || exclude.has(normalized)) continue;
    terms.add(stem(normalized));
  }
  return terms;
}

/**
 * Number of query terms the fact covers, either literally or through a
 * shared concept group ("eat" covers "food").
 *
 * Generic terms ("favorite", "like") only count once a topical term of the
 * query has matched too, so "favorite movie" never selects a fact about a
 * favorite hike. A query made only of generic terms is scored on those.
 */
export function relevanceScore(
  queryTerms: ReadonlySet<string>,
  factTerms: ReadonlySet<string>,
  lexicon: Lexicon = getLexicon()
): number {
  const factConcepts = new Set<string>();
  for (const term of factTerms) {
    for (const concept of conceptsOf(term, lexicon)) factConcepts.add(concept);
  }

  const covers = (term: string): boolean => {
    if (factTerms.has(term)) return true;
    for (const concept of conceptsOf(term, lexicon)) {
      if (factConcepts.has(concept)) return true;
    }
    return false;
  };

  let score = 0;
  let topical = 0;
  let topicalMatched = 0;
  for (const term of queryTerms) {
    const generic = isGeneric(term, lexicon);
    if (!generic) topical += 1;
    if (!covers(term)) continue;
    score += 1;
    if (!generic) topicalMatched += 1;
  }
  return topical > 0 && topicalMatched === 0 ? 0 : score;
}

export interface Ranked<T> {
  item: T;
  score: number;
}

/** Items with a positive score, best first; ties keep input order. */
export function rankByRelevance<T>(
  query: string,
  items: readonly T[],
  textOf: (item: T) => string,
  exclude: ReadonlySet<string> = new Set(),
  lexicon: Lexicon = getLexicon()
): Ranked<T>[] {
  const queryTerms = termsOf(query, exclude, lexicon);
  if (queryTerms.size === 0) return [];

  return items
    .map((item, position) => ({
      item,
      position,
      score: relevanceScore(queryTerms, termsOf(textOf(item), exclude, lexicon), lexicon),
    }))
    .filter((entry) => entry.score > 0)
    .sort((a, b) => b.score - a.score || a.position - b.position)
    .map(({ item, score }) => ({ item, score }));
}
