import Parser from 'rss-parser';
import axios from 'axios';
import { TextDecoder } from 'util';
import { parseEntry, RAW_DATE_PREFIX, RAW_ITEM_FIELDS, RawEntry } from './entry';
import { describeError, FeedFetchError } from './errors';
import { log, logError } from './log';
import { Article, FeedReport, FeedSource } from './types';

const FETCH_TIMEOUT_MS = 15000;
const USER_AGENT = 'FeedDigest/1.0';

// Scan past the cap so entries dropped by the age filter can be replaced.
const OVERFETCH_MULTIPLIER = 2;

const HOUR_MS = 60 * 60 * 1000;

const XML_ENCODING = /^\s*<\?xml[^>]*\bencoding\s*=\s*["']([\w.:-]+)["']/i;
const HEADER_CHARSET = /charset\s*=\s*"?([\w.:-]+)/i;

// rss-parser turns Atom dates into Dates itself and throws on bad ones.
const ATOM_DATE_TAG = /<(\/?)(published|updated)(?=[\s>\/])/g;

const rssParser = new Parser({
  customFields: { item: RAW_ITEM_FIELDS },
});

export type FeedDownloader = (url: string) => Promise<string>;

export interface FetchOptions {
  download?: FeedDownloader;
  now?: () => Date;
}

function decoderFor(label: string | undefined): TextDecoder {
  if (label) {
    try {
      return new TextDecoder(label);
    } catch {
      log('fetcher', `Unknown charset "${label}", reading as utf-8`);
    }
  }
  return new TextDecoder('utf-8');
}

/**
 * Decodes a feed body using the charset from the Content-Type header,
 * then the XML declaration, then utf-8.
 */
export function decodeFeedBody(body: Uint8Array, contentType?: string): string {
  const fromHeader = contentType ? HEADER_CHARSET.exec(contentType)?.[1] : undefined;
  const prolog = Buffer.from(body.subarray(0, 256)).toString('latin1');
  const fromProlog = XML_ENCODING.exec(prolog)?.[1];
  return decoderFor(fromHeader ?? fromProlog).decode(body);
}

export async function downloadFeed(url: string): Promise<string> {
  const response = await axios.get<ArrayBuffer>(url, {
    timeout: FETCH_TIMEOUT_MS,
    headers: { 'User-Agent': USER_AGENT },
    responseType: 'arraybuffer',
  });
  const contentType: unknown = response.headers['content-type'];
  return decodeFeedBody(
    new Uint8Array(response.data),
    typeof contentType === 'string' ? contentType : undefined
  );
}

export async function parseFeed(xml: string): Promise<RawEntry[]> {
  const feed = await rssParser.parseString(xml.replace(ATOM_DATE_TAG, `<$1${RAW_DATE_PREFIX}$2`));
  return feed.items || [];
}

export async function fetchFeedReport(
  source: FeedSource,
  maxAgeHours: number,
  maxArticles: number,
  options: FetchOptions = {}
): Promise<FeedReport> {
  const download = options.download ?? downloadFeed;
  const now = options.now ?? (() => new Date());

  log('fetcher', `Fetching: ${source.name}`);

  let xml: string;
  try {
    xml = await download(source.url);
  } catch (err) {
    const error = new FeedFetchError('transport', source.name, describeError(err), { cause: err });
    logError('fetcher', `✗ Error fetching ${source.name}: ${error.message}`);
    return { source, articles: [], error };
  }

  try {
    const entries = await parseFeed(xml);
    if (entries.length === 0) {
      throw new Error('no entries found');
    }

    const cutoff = now().getTime() - maxAgeHours * HOUR_MS;
    const articles: Article[] = [];

    for (const entry of entries.slice(0, maxArticles * OVERFETCH_MULTIPLIER)) {
      const article = parseEntry(entry, source.name, source.category);

      // Undated entries are always kept; some feeds never send dates.
      if (article.published && article.published.getTime() < cutoff) continue;

      articles.push(article);
      if (articles.length >= maxArticles) break;
    }

    log('fetcher', `✓ ${source.name}: ${articles.length} articles`);
    return { source, articles, error: null };
  } catch (err) {
    const error = new FeedFetchError('parse', source.name, describeError(err), { cause: err });
    logError('fetcher', `✗ Could not parse ${source.name}: ${error.message}`);
    return { source, articles: [], error };
  }
}

/** Articles from one feed. Never rejects: a failing feed yields []. */
export async function fetchFeed(
  source: FeedSource,
  maxAgeHours: number,
  maxArticles: number,
  options: FetchOptions = {}
): Promise<Article[]> {
  const report = await fetchFeedReport(source, maxAgeHours, maxArticles, options);
  return report.articles;
}
