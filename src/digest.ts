import { aggregateFeeds, AggregateOptions } from './aggregator';
import { log } from './log';
import { Digest, DigestConfig } from './types';

/** "Saturday, October 17 2026 · 3:04 PM UTC" in the given IANA zone. */
export function formatGeneratedAt(date: Date, timezone: string): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone: timezone,
    weekday: 'long',
    month: 'long',
    day: 'numeric',
    year: 'numeric',
    hour: 'numeric',
    minute: '2-digit',
    hour12: true,
    timeZoneName: 'short',
  }).formatToParts(date);

  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? '';

  return (
    `${part('weekday')}, ${part('month')} ${part('day')} ${part('year')} · ` +
    `${part('hour')}:${part('minute')} ${part('dayPeriod')} ${part('timeZoneName')}`
  );
}

export async function buildDigest(config: DigestConfig, options: AggregateOptions = {}): Promise<Digest> {
  const { settings } = config;
  const now = options.now ?? (() => new Date());

  log('digest', `Fetching ${config.feeds.length} feeds...`);
  const result = await aggregateFeeds(config.feeds, settings, options);

  return {
    title: settings.siteTitle,
    generatedAt: formatGeneratedAt(now(), settings.timezone),
    articlesByCategory: result.articlesByCategory,
    totalCount: result.articles.length,
    maxAgeHours: settings.maxAgeHours,
  };
}
