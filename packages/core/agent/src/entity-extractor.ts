/**
 * Deterministic entity extraction for campaign questions.
 * Runs before any model call so canonical phrasings always resolve the same way.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import { METRIC_NAMES, type DateRange, type MetricName, type PredefinedChart, type QueryEntities } from './types.js';

export interface Vocabulary {
  /** Lower-case phrase -> metric */
  metrics: Record<string, MetricName>;
  topics: string[];
  segments: string[];
}

export interface ExtractOptions {
  vocabulary?: Vocabulary;
  /** Reference time for relative dates */
  now?: Date;
}

const vocabularySchema = z.object({
  metrics: z.record(z.enum(METRIC_NAMES)),
  topics: z.array(z.string()),
  segments: z.array(z.string()),
});

let defaultVocabulary: Vocabulary | null = null;

export function loadDefaultVocabulary(): Vocabulary {
  if (!defaultVocabulary) {
    const raw = readFileSync(new URL('./vocabulary.json', import.meta.url), 'utf-8');
    defaultVocabulary = vocabularySchema.parse(JSON.parse(raw));
  }
  return defaultVocabulary;
}

export const MAX_LIMIT = 50;

const NUMBER_WORDS: Record<string, number> = {
  one: 1,
  two: 2,
  three: 3,
  four: 4,
  five: 5,
  six: 6,
  seven: 7,
  eight: 8,
  nine: 9,
  ten: 10,
  fifteen: 15,
  twenty: 20,
};

const MONTHS: Record<string, number> = {
  jan: 0, january: 0,
  feb: 1, february: 1,
  mar: 2, march: 2,
  apr: 3, april: 3,
  may: 4,
  jun: 5, june: 5,
  jul: 6, july: 6,
  aug: 7, august: 7,
  sep: 8, sept: 8, september: 8,
  oct: 9, october: 9,
  nov: 10, november: 10,
  dec: 11, december: 11,
};

const VISUAL_PATTERN = /\b(charts?|graphs?|plot(?:s|ted)?|visuali[sz](?:e|ation))\b/i;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function phrasePattern(phrase: string): RegExp {
  return new RegExp(`(?<![\\w])${escapeRegExp(phrase)}(?![\\w])`, 'gi');
}

function isoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function utcDate(year: number, month: number, day: number): Date {
  return new Date(Date.UTC(year, month, day));
}

function monthRange(year: number, month: number): DateRange {
  return { start: isoDate(utcDate(year, month, 1)), end: isoDate(utcDate(year, month + 1, 0)) };
}

function parseCount(token: string): number | null {
  const word = NUMBER_WORDS[token.toLowerCase()];
  if (word !== undefined) {
    return word;
  }
  const value = Number.parseInt(token, 10);
  return Number.isNaN(value) ? null : value;
}

export function extractCampaignIds(text: string): number[] {
  const ids: number[] = [];
  const add = (value: number): void => {
    if (!ids.includes(value)) {
      ids.push(value);
    }
  };

  const listPattern =
    /\bcampaigns?\s*(?:id\s*)?#?\d+(?:\s*(?:,|and|&|vs\.?|versus|or|with|to)\s*(?:campaign\s*)?#?\d+)*/gi;
  for (const match of text.matchAll(listPattern)) {
    for (const digits of match[0].matchAll(/\d+/g)) {
      add(Number.parseInt(digits[0], 10));
    }
  }

  for (const match of text.matchAll(/(?:^|\s)#(\d+)\b/g)) {
    const digits = match[1];
    if (digits) {
      add(Number.parseInt(digits, 10));
    }
  }

  return ids;
}

export function extractLimit(text: string): number | undefined {
  const numberToken = `(\\d+|${Object.keys(NUMBER_WORDS).join('|')})`;
  const match =
    new RegExp(`\\b(?:top|first|best|worst|bottom)\\s+${numberToken}\\b`, 'i').exec(text) ??
    new RegExp(`\\blimit\\s+(?:to\\s+)?${numberToken}\\b`, 'i').exec(text);

  const count = match?.[1] ? parseCount(match[1]) : null;
  if (count === null || count < 1) {
    return undefined;
  }
  return Math.min(count, MAX_LIMIT);
}

export function extractDateRange(text: string, now: Date = new Date()): DateRange | undefined {
  const iso = /(\d{4}-\d{2}-\d{2})\s*(?:to|through|until|and|-|–)\s*(\d{4}-\d{2}-\d{2})/i.exec(text);
  if (iso?.[1] && iso[2]) {
    const [start, end] = [iso[1], iso[2]].sort();
    return { start: start ?? iso[1], end: end ?? iso[2] };
  }

  const quarter = /\bq([1-4])\s*(?:of\s+)?(\d{4})\b/i.exec(text);
  if (quarter?.[1] && quarter[2]) {
    const year = Number.parseInt(quarter[2], 10);
    const firstMonth = (Number.parseInt(quarter[1], 10) - 1) * 3;
    return {
      start: isoDate(utcDate(year, firstMonth, 1)),
      end: isoDate(utcDate(year, firstMonth + 3, 0)),
    };
  }

  const monthNames = Object.keys(MONTHS).sort((a, b) => b.length - a.length).join('|');
  const month = new RegExp(`\\b(${monthNames})\\.?\\s+(\\d{4})\\b`, 'i').exec(text);
  if (month?.[1] && month[2]) {
    const index = MONTHS[month[1].toLowerCase()];
    if (index !== undefined) {
      return monthRange(Number.parseInt(month[2], 10), index);
    }
  }

  const year = now.getUTCFullYear();
  const today = isoDate(now);

  if (/\blast month\b/i.test(text)) {
    return monthRange(year, now.getUTCMonth() - 1);
  }
  if (/\bthis month\b/i.test(text)) {
    return { start: isoDate(utcDate(year, now.getUTCMonth(), 1)), end: today };
  }
  if (/\blast year\b/i.test(text)) {
    return { start: `${year - 1}-01-01`, end: `${year - 1}-12-31` };
  }
  if (/\bthis year\b/i.test(text)) {
    return { start: `${year}-01-01`, end: today };
  }

  const span = /\b(?:last|past)\s+(\d+)\s+(day|week)s?\b/i.exec(text);
  if (span?.[1] && span[2]) {
    const days = Number.parseInt(span[1], 10) * (span[2].toLowerCase() === 'week' ? 7 : 1);
    const start = utcDate(year, now.getUTCMonth(), now.getUTCDate() - days);
    return { start: isoDate(start), end: today };
  }

  const bareYear = /\b(?:in|during|for|of)\s+((?:19|20)\d{2})\b/i.exec(text);
  if (bareYear?.[1]) {
    return { start: `${bareYear[1]}-01-01`, end: `${bareYear[1]}-12-31` };
  }

  return undefined;
}

interface PhraseMatch<T> {
  value: T;
  start: number;
  end: number;
}

/**
 * Find vocabulary phrases, longest first, without letting a shorter phrase
 * reuse text a longer one already claimed
 */
function matchPhrases<T>(text: string, candidates: { phrase: string; value: T }[]): PhraseMatch<T>[] {
  const claimed: [number, number][] = [];
  const found: PhraseMatch<T>[] = [];
  const ordered = [...candidates].sort((a, b) => b.phrase.length - a.phrase.length);

  for (const candidate of ordered) {
    for (const match of text.matchAll(phrasePattern(candidate.phrase))) {
      const start = match.index ?? 0;
      const end = start + match[0].length;
      if (claimed.some(([from, to]) => start < to && end > from)) {
        continue;
      }
      claimed.push([start, end]);
      found.push({ value: candidate.value, start, end });
    }
  }

  return found.sort((a, b) => a.start - b.start);
}

function unique<T>(values: T[]): T[] {
  return [...new Set(values)];
}

export function extractMetrics(text: string, vocabulary: Vocabulary): MetricName[] {
  const candidates = Object.entries(vocabulary.metrics).map(([phrase, value]) => ({ phrase, value }));
  return unique(matchPhrases(text, candidates).map(match => match.value));
}

type NamedEntity = { kind: 'topic' | 'segment'; name: string };

export function extractTopicsAndSegments(text: string, vocabulary: Vocabulary): { topics: string[]; segments: string[] } {
  const candidates: { phrase: string; value: NamedEntity }[] = [
    ...vocabulary.segments.map(name => ({ phrase: name, value: { kind: 'segment' as const, name } })),
    ...vocabulary.topics.map(name => ({ phrase: name, value: { kind: 'topic' as const, name } })),
  ];
  const matches = matchPhrases(text, candidates).map(match => match.value);

  // Quoted names outside the vocabulary: topic "Spring Gala", segment 'Lapsed Donors'
  for (const match of text.matchAll(/\b(topic|segment)\s+(?:called\s+|named\s+)?["“']([^"”']+)["”']/gi)) {
    const kind = match[1]?.toLowerCase() === 'segment' ? 'segment' : 'topic';
    const name = match[2]?.trim();
    if (name) {
      matches.push({ kind, name });
    }
  }

  return {
    topics: unique(matches.filter(entity => entity.kind === 'topic').map(entity => entity.name)),
    segments: unique(matches.filter(entity => entity.kind === 'segment').map(entity => entity.name)),
  };
}

export function isVisualRequest(text: string): boolean {
  return VISUAL_PATTERN.test(text);
}

/**
 * Pick a predefined chart for a visual request, if one fits the wording
 */
export function chartKindFor(text: string): PredefinedChart | undefined {
  const lower = text.toLowerCase();
  if (/\b(trends?|over time|timeline)\b/.test(lower)) {
    return 'trends';
  }
  if (/\baudience\b/.test(lower) && /\btopics?\b/.test(lower)) {
    return 'audience_by_topic';
  }
  if (/\bsegments?\b/.test(lower)) {
    return 'segment_performance';
  }
  if (/\bconversion/.test(lower)) {
    return 'conversion_rate';
  }
  return undefined;
}

/**
 * Extract every entity the text states outright. Absent entities are left out.
 */
export function extractEntities(text: string, options: ExtractOptions = {}): QueryEntities {
  const vocabulary = options.vocabulary ?? loadDefaultVocabulary();
  const entities: QueryEntities = {};

  const campaignIds = extractCampaignIds(text);
  if (campaignIds.length > 0) {
    entities.campaign_ids = campaignIds;
  }

  const dateRange = extractDateRange(text, options.now);
  if (dateRange) {
    entities.date_range = dateRange;
  }

  const metrics = extractMetrics(text, vocabulary);
  if (metrics.length > 0) {
    entities.metric_names = metrics;
  }

  const { topics, segments } = extractTopicsAndSegments(text, vocabulary);
  if (topics.length > 0) {
    entities.topics = topics;
  }
  if (segments.length > 0) {
    entities.segments = segments;
  }

  const limit = extractLimit(text);
  if (limit !== undefined) {
    entities.limit = limit;
  }

  if (isVisualRequest(text)) {
    entities.visual_requested = true;
    const kind = chartKindFor(text);
    if (kind) {
      entities.chart_kind = kind;
    }
  }

  return entities;
}
