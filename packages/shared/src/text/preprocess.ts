/**
 * Comment text normalisation
 * Applied to training data and to every text the API scores, so both see the same tokens
 */

import stopwordList from './stopwords.json';

/** Stop words that carry sentiment and are kept */
export const SENTIMENT_STOPWORDS: ReadonlySet<string> = new Set(['not', 'but', 'however', 'no', 'yet']);

export const STOPWORDS: ReadonlySet<string> = new Set(
  stopwordList.filter(word => !SENTIMENT_STOPWORDS.has(word))
);

const URL_PATTERN = /(?:https?:\/\/|www\.)\S+/g;
const MENTION_OR_HASHTAG_PATTERN = /[@#]\w+/g;
const DISALLOWED_CHARS = /[^a-z0-9\s!?.,]/g;
const TOKEN_PATTERN = /\b\w\w+\b/g;

/**
 * Lower-case, strip links, mentions, hashtags and symbols, drop stop words.
 * Idempotent: cleaning a cleaned comment returns it unchanged.
 */
export function cleanComment(text: string): string {
  const normalized = text
    .toLowerCase()
    .trim()
    .replace(/\r?\n/g, ' ')
    .replace(URL_PATTERN, ' ')
    .replace(MENTION_OR_HASHTAG_PATTERN, ' ')
    .replace(DISALLOWED_CHARS, '');

  return normalized
    .split(/\s+/)
    .filter(word => word.length > 0 && !STOPWORDS.has(word))
    .join(' ');
}

/**
 * Word tokens of two or more characters, the units the vectorizer counts
 */
export function tokenize(text: string): string[] {
  return text.toLowerCase().match(TOKEN_PATTERN) ?? [];
}
