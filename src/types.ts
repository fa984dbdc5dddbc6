import type { FeedFetchError } from './errors';

export interface FeedSource {
  readonly url: string;
  readonly name: string;
  readonly category: string;
}

export interface RunSettings {
  readonly maxAgeHours: number;
  readonly maxArticlesPerFeed: number;
  readonly timezone: string;    // IANA zone used for generatedAt
  readonly siteTitle: string;
}

export interface DigestConfig {
  readonly settings: RunSettings;
  readonly feeds: readonly FeedSource[];
}

export interface AppConfig extends DigestConfig {
  readonly outputPath: string;
  readonly concurrency: number;
}

export interface Article {
  readonly title: string;
  readonly link: string;
  readonly summary: string;
  readonly published: Date | null;  // null when the feed gives no usable date
  readonly publishedDisplay: string;
  readonly source: string;
  readonly category: string;
}

export interface FeedReport {
  readonly source: FeedSource;
  readonly articles: Article[];
  readonly error: FeedFetchError | null;
}

export interface Digest {
  readonly title: string;
  readonly generatedAt: string;
  readonly articlesByCategory: ReadonlyMap<string, readonly Article[]>;
  readonly totalCount: number;
  readonly maxAgeHours: number;
}
