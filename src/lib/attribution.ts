/**
 * @file src/lib/attribution.ts
 * @description Scores how strongly an article's title, extract and categories point at each
 *              country of its source region and picks the best candidate with a confidence in
 *              [0, 1]. Pure: the gazetteer is the only shared state and it is read-only.
 *
 * Signals per candidate country (all additive):
 *   - whole-word mentions in the analysis text, 10 each;
 *   - per category: name contained (+20), plus a locative form "in X", "X ", "of X" (+30);
 *   - name inside the title (+15) and inside the extract (+5);
 *   - a synonym of the country inside the analysis text (+8 per synonym);
 *   - the fixed disambiguation rules below.
 */

import type { Gazetteer, Region } from '../shared/gazetteer';

export interface AttributionInput {
  title: string;
  extract?: string;
  categories?: readonly string[];
  region: Region;
}

export interface AttributionResult {
  /** `null` when no candidate collected any signal. */
  country: string | null;
  confidence: number;
}

export const MENTION_WEIGHT = 10;
export const CATEGORY_WEIGHT = 20;
export const CATEGORY_LOCATIVE_WEIGHT = 30;
export const TITLE_WEIGHT = 15;
export const EXTRACT_WEIGHT = 5;
export const SYNONYM_WEIGHT = 8;
/** Score that maps to full confidence. */
export const CONFIDENCE_SCALE = 50;

interface RuleAlternative {
  target: string;
  terms: readonly string[];
  boost: number;
}

interface DisambiguationRule {
  /** Restricts the rule to articles sourced from this region. */
  region?: Region;
  /** Checked in order; only the first alternative whose terms appear fires. */
  alternatives: readonly RuleAlternative[];
}

export const DISAMBIGUATION_RULES: readonly DisambiguationRule[] = [
  { alternatives: [{ target: 'Hong Kong', terms: ['hong kong'], boost: 50 }] },
  { alternatives: [{ target: 'Macau', terms: ['macau', 'macao'], boost: 50 }] },
  {
    alternatives: [
      { target: 'Taiwan', terms: ['taiwan', 'republic of china'], boost: 40 },
      { target: 'China', terms: ['mainland china', "people's republic"], boost: 40 },
    ],
  },
  { alternatives: [{ target: 'United Kingdom', terms: ['england', 'english', 'london'], boost: 30 }] },
  {
    alternatives: [
      { target: 'United Kingdom', terms: ['scotland', 'scottish', 'edinburgh'], boost: 30 },
    ],
  },
  { alternatives: [{ target: 'United Kingdom', terms: ['wales', 'welsh', 'cardiff'], boost: 30 }] },
  { alternatives: [{ target: 'United Kingdom', terms: ['northern ireland'], boost: 30 }] },
  {
    region: 'North America',
    alternatives: [
      {
        target: 'United States',
        terms: ['united states', ' usa ', ' us ', 'american'],
        boost: 25,
      },
      { target: 'Canada', terms: ['canada', 'canadian'], boost: 25 },
    ],
  },
];

const escapeRegex = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

export const countWholeWord = (text: string, word: string): number => {
  if (!word) return 0;
  const pattern = new RegExp(`\\b${escapeRegex(word)}\\b`, 'g');
  return Array.from(text.matchAll(pattern)).length;
};

export const buildAnalysisText = (
  title: string,
  extract: string,
  categories: readonly string[],
): string => `${title} ${extract} ${categories.join(' ')}`.toLowerCase();

const scoreCategories = (country: string, categories: readonly string[]): number => {
  let score = 0;
  for (const category of categories) {
    const lower = category.toLowerCase();
    if (!lower.includes(country)) continue;
    score += CATEGORY_WEIGHT;
    if (
      lower.includes(`in ${country}`) ||
      lower.includes(`${country} `) ||
      lower.includes(`of ${country}`)
    ) {
      score += CATEGORY_LOCATIVE_WEIGHT;
    }
  }
  return score;
};

/**
 * Raw per-country scores for the region's candidates. Every candidate appears in the map (in
 * gazetteer order), including those that scored zero.
 */
export const scoreCandidates = (
  input: AttributionInput,
  gazetteer: Gazetteer,
): Map<string, number> => {
  const candidates = gazetteer.countriesFor(input.region);
  const extract = input.extract ?? '';
  const categories = input.categories ?? [];
  const text = buildAnalysisText(input.title, extract, categories);
  const title = input.title.toLowerCase();
  const extractLower = extract.toLowerCase();

  const scores = new Map<string, number>();
  for (const country of candidates) {
    const name = country.toLowerCase();
    let score = countWholeWord(text, name) * MENTION_WEIGHT;
    score += scoreCategories(name, categories);
    if (title.includes(name)) score += TITLE_WEIGHT;
    if (extractLower.includes(name)) score += EXTRACT_WEIGHT;
    scores.set(country, score);
  }

  const add = (country: string, amount: number): void => {
    const current = scores.get(country);
    if (current !== undefined) {
      scores.set(country, current + amount);
    }
  };

  for (const [synonym, canonical] of gazetteer.synonyms) {
    if (text.includes(synonym.toLowerCase())) {
      add(canonical, SYNONYM_WEIGHT);
    }
  }

  for (const rule of DISAMBIGUATION_RULES) {
    if (rule.region && rule.region !== input.region) continue;
    const fired = rule.alternatives.find((alternative) =>
      alternative.terms.some((term) => text.includes(term)),
    );
    if (fired) {
      add(fired.target, fired.boost);
    }
  }

  return scores;
};

/**
 * Best country for one article. Ties go to the candidate registered first for the region.
 * Throws when `input.region` is not in the gazetteer.
 */
export const attributeCountry = (
  input: AttributionInput,
  gazetteer: Gazetteer,
): AttributionResult => {
  let best: string | null = null;
  let bestScore = 0;
  for (const [country, score] of scoreCandidates(input, gazetteer)) {
    if (score > bestScore) {
      best = country;
      bestScore = score;
    }
  }
  if (best === null) {
    return { country: null, confidence: 0 };
  }
  return { country: best, confidence: Math.min(bestScore / CONFIDENCE_SCALE, 1) };
};
