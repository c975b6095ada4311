/**
 * @file src/lib/curiosity.ts
 * @description Keyword tally used to rank articles within a country.
 */

const CURIOSITY_KEYWORDS = [
  'unusual',
  'strange',
  'bizarre',
  'odd',
  'weird',
  'peculiar',
  'mysterious',
  'unexplained',
  'controversial',
  'banned',
  'illegal',
  'cult',
  'conspiracy',
  'hoax',
  'urban legend',
  'phenomenon',
  'extinct',
  'abandoned',
  'secret',
  'hidden',
  'lost',
  'ancient',
] as const;

const BASE_SCORE = 5;
const MAX_SCORE = 10;

export interface CuriosityInput {
  title?: string;
  description?: string;
  categories?: readonly string[];
  country_confidence?: number;
}

export const curiosityScore = (article: CuriosityInput): number => {
  const categories = article.categories ?? [];
  const text = `${article.title ?? ''} ${article.description ?? ''} ${categories.join(' ')}`.toLowerCase();

  let score = BASE_SCORE;
  score += CURIOSITY_KEYWORDS.filter((keyword) => text.includes(keyword)).length;
  if ((article.country_confidence ?? 0) > 0.8) score += 1;
  if (categories.length > 10) {
    score += 2;
  } else if (categories.length > 5) {
    score += 1;
  }
  return Math.min(score, MAX_SCORE);
};
