import { normalizeSummary } from './summary';
import { Article } from './types';

/** One item as exposed by the feed parser, before normalization. */
export type RawEntry = Readonly<Record<string, unknown>>;

const DEFAULT_TITLE = 'No title';
const DEFAULT_LINK = '#';
const UNKNOWN_DATE = 'Date unknown';

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

/**
 * Prefix given to Atom <published>/<updated> before parsing, so the raw
 * text reaches us untouched instead of going through the parser's own
 * Date conversion.
 */
export const RAW_DATE_PREFIX = 'raw:';

// ISO date-time without Z or offset, e.g. 2026-10-17T10:00:00
const ISO_LOCAL_DATE_TIME = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?$/;
const ISO_DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const HAS_ZONE = /(?:Z|[+-]\d{2}:?\d{2}|\b(?:GMT|UTC|UT|[ECMP][SD]T)\b)$/i;

/**
 * Field names tried for each logical property, first non-empty wins.
 * RSS and Atom (and the parser's own derived fields) disagree on names,
 * so every lookup goes through this table.
 */
export const ENTRY_FIELDS = {
  title: ['title'],
  link: ['link'],
  summary: ['summary', 'description', 'content'],
  published: [`${RAW_DATE_PREFIX}published`, 'published', 'pubDate', 'dc:date', 'issued'],
  updated: [`${RAW_DATE_PREFIX}updated`, 'updated', 'modified', 'dc:modified'],
} as const;

/** Extra raw elements the parser should copy onto each item. */
export const RAW_ITEM_FIELDS = [
  `${RAW_DATE_PREFIX}published`,
  `${RAW_DATE_PREFIX}updated`,
  'summary',
  'description',
  'issued',
  'modified',
  'dc:modified',
];

// xml2js hands back either a plain string or a node like { _: 'text', $: {...} }
function textOf(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'object' && value !== null && '_' in value) {
    const inner: unknown = value._;
    if (typeof inner === 'string') return inner;
  }
  return undefined;
}

function firstText(entry: RawEntry, fields: readonly string[]): string | undefined {
  for (const field of fields) {
    const text = textOf(entry[field]);
    if (text !== undefined && text.trim() !== '') return text;
  }
  return undefined;
}

/** Parses a feed timestamp, reading it as UTC when it names no zone. */
export function parseUtcTimestamp(text: string): number {
  if (ISO_DATE_ONLY.test(text)) return new Date(text).getTime();
  if (ISO_LOCAL_DATE_TIME.test(text)) return new Date(text.replace(' ', 'T') + 'Z').getTime();
  if (!HAS_ZONE.test(text)) return new Date(text + ' GMT').getTime();
  return new Date(text).getTime();
}

/**
 * Published timestamp of an entry, falling back to its updated timestamp.
 * Values that don't parse are skipped. Precision is cut to whole seconds.
 */
export function resolvePublished(entry: RawEntry): Date | null {
  for (const field of [...ENTRY_FIELDS.published, ...ENTRY_FIELDS.updated]) {
    const text = textOf(entry[field])?.trim();
    if (!text) continue;
    const ms = parseUtcTimestamp(text);
    if (Number.isNaN(ms)) continue;
    return new Date(Math.floor(ms / 1000) * 1000);
  }
  return null;
}

/** "3:07 PM · Oct 17", always in UTC. */
export function formatPublished(date: Date | null): string {
  if (!date) return UNKNOWN_DATE;
  const hours = date.getUTCHours();
  const hour12 = hours % 12 === 0 ? 12 : hours % 12;
  const minutes = String(date.getUTCMinutes()).padStart(2, '0');
  const period = hours < 12 ? 'AM' : 'PM';
  return `${hour12}:${minutes} ${period} · ${MONTHS[date.getUTCMonth()]} ${date.getUTCDate()}`;
}

export function parseEntry(entry: RawEntry, sourceName: string, category: string): Article {
  const published = resolvePublished(entry);
  return {
    title: firstText(entry, ENTRY_FIELDS.title)?.trim() || DEFAULT_TITLE,
    link: firstText(entry, ENTRY_FIELDS.link)?.trim() || DEFAULT_LINK,
    summary: normalizeSummary(firstText(entry, ENTRY_FIELDS.summary) ?? ''),
    published,
    publishedDisplay: formatPublished(published),
    source: sourceName,
    category,
  };
}
