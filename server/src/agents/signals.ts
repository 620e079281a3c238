/**
 * Text helpers for turning free-text search snippets into structured
 * artifact fields. Deterministic: same snippets, same output.
 */

import type { SearchResult } from '../tools/types.js';
import type { SourceLink } from './types.js';

const STOPWORDS = new Set([
  'about', 'after', 'also', 'among', 'and', 'based', 'been', 'between', 'both',
  'company', 'companies', 'from', 'have', 'industry', 'into', 'more', 'most',
  'over', 'such', 'than', 'that', 'their', 'them', 'they', 'this', 'through',
  'used', 'using', 'which', 'while', 'with', 'within', 'year', 'years',
]);

export function truncateText(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

export function splitSentences(text: string): string[] {
  return text.split(/[.!?]+/).map((s) => s.trim()).filter(Boolean);
}

function mentions(sentence: string, keywords: string[]): boolean {
  const lower = sentence.toLowerCase();
  return keywords.some((kw) => new RegExp(`\\b${escapeRegExp(kw.toLowerCase())}\\b`).test(lower));
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Sentences mentioning any keyword, deduplicated, in order of appearance. */
export function extractSignals(text: string, keywords: string[], limit = 6): string[] {
  const seen = new Set<string>();
  const signals: string[] = [];
  for (const sentence of splitSentences(text)) {
    if (!mentions(sentence, keywords)) continue;
    const key = sentence.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    signals.push(truncateText(sentence, 150));
    if (signals.length >= limit) break;
  }
  return signals;
}

export function extractFirstSentenceAbout(text: string, keywords: string[]): string | null {
  const match = splitSentences(text).find((s) => mentions(s, keywords));
  return match ? truncateText(match, 200) : null;
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((token) => token.length >= 4 && !/^\d+$/.test(token) && !STOPWORDS.has(token));
}

/**
 * Most frequent terms across the texts, ties broken by first appearance.
 * Tokens in `exclude` (typically the company and industry names) are skipped.
 */
export function extractFocusTerms(texts: string[], exclude: string[], limit = 3): string[] {
  const excluded = new Set(exclude.flatMap((value) => value.toLowerCase().split(/[^a-z0-9]+/)));
  const counts = new Map<string, number>();
  for (const token of texts.flatMap(tokenize)) {
    if (excluded.has(token)) continue;
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  // Map iteration order is insertion order, so a stable sort keeps first appearance on ties
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit)
    .map(([term]) => term);
}

export function joinSnippets(results: SearchResult[]): string {
  return results.map((r) => r.snippet).filter(Boolean).join(' ');
}

export function toSourceLinks(results: SearchResult[]): SourceLink[] {
  const seen = new Set<string>();
  const links: SourceLink[] = [];
  for (const result of results) {
    if (!result.url || seen.has(result.url)) continue;
    seen.add(result.url);
    links.push({ title: result.title, url: result.url });
  }
  return links;
}
