import { fetchFeedReport, FetchOptions } from './fetcher';
import { log } from './log';
import { Article, FeedReport, FeedSource, RunSettings } from './types';

// Earliest instant a Date can hold; undated articles sort as this.
const MIN_TIMESTAMP = -8.64e15;

export interface AggregateOptions extends FetchOptions {
  /** Feeds fetched at once. 1 keeps the run strictly sequential. */
  concurrency?: number;
}

export interface AggregateResult {
  articles: Article[];
  articlesByCategory: Map<string, Article[]>;
  categoryCounts: Map<string, number>;
  reports: FeedReport[];
}

function timestampOf(article: Article): number {
  return article.published ? article.published.getTime() : MIN_TIMESTAMP;
}

/** Newest first. Stable: ties keep their input order. */
export function sortByRecency(articles: readonly Article[]): Article[] {
  return [...articles].sort((a, b) => timestampOf(b) - timestampOf(a));
}

/**
 * Buckets by category without re-sorting, so each bucket keeps the
 * order of the input. Categories appear in order of first occurrence.
 */
export function groupByCategory(articles: readonly Article[]): Map<string, Article[]> {
  const grouped = new Map<string, Article[]>();
  for (const article of articles) {
    const bucket = grouped.get(article.category);
    if (bucket) {
      bucket.push(article);
    } else {
      grouped.set(article.category, [article]);
    }
  }
  return grouped;
}

async function fetchReports(
  sources: readonly FeedSource[],
  settings: RunSettings,
  options: AggregateOptions
): Promise<FeedReport[]> {
  const reports = new Array<FeedReport>(sources.length);
  const workers = Math.max(1, Math.min(options.concurrency ?? 1, sources.length));
  let next = 0;

  // Each worker claims the next index; results land by config position.
  async function worker(): Promise<void> {
    while (next < sources.length) {
      const index = next++;
      reports[index] = await fetchFeedReport(
        sources[index],
        settings.maxAgeHours,
        settings.maxArticlesPerFeed,
        options
      );
    }
  }

  await Promise.all(Array.from({ length: workers }, () => worker()));
  return reports;
}

export async function aggregateFeeds(
  sources: readonly FeedSource[],
  settings: RunSettings,
  options: AggregateOptions = {}
): Promise<AggregateResult> {
  const reports = await fetchReports(sources, settings, options);

  const collected: Article[] = [];
  const categoryCounts = new Map<string, number>();

  for (const report of reports) {
    collected.push(...report.articles);
    const category = report.source.category;
    categoryCounts.set(category, (categoryCounts.get(category) ?? 0) + report.articles.length);
  }

  const articles = sortByRecency(collected);
  const failed = reports.filter((r) => r.error !== null).length;

  for (const [category, count] of categoryCounts) {
    log('aggregator', `${category}: ${count} articles`);
  }
  log(
    'aggregator',
    `Total articles collected: ${articles.length} (${reports.length - failed} feeds ok, ${failed} failed)`
  );

  return {
    articles,
    articlesByCategory: groupByCategory(articles),
    categoryCounts,
    reports,
  };
}
