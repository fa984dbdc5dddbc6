import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { loadConfig, parseConfig } from './config';

describe('parseConfig', () => {
  it('applies defaults to an empty config', () => {
    expect(parseConfig({})).toEqual({
      settings: { maxAgeHours: 24, maxArticlesPerFeed: 10, timezone: 'UTC', siteTitle: 'Daily Digest' },
      feeds: [],
    });
  });

  it('maps settings and defaults the feed category', () => {
    const config = parseConfig({
      settings: { max_age_hours: 6, max_articles_per_feed: 3, timezone: 'Europe/Berlin', site_title: 'Evening' },
      feeds: [
        { url: 'https://example.com/a.xml', name: 'A' },
        { url: 'https://example.com/b.xml', name: 'B', category: 'Science' },
      ],
    });

    expect(config.settings).toEqual({
      maxAgeHours: 6,
      maxArticlesPerFeed: 3,
      timezone: 'Europe/Berlin',
      siteTitle: 'Evening',
    });
    expect(config.feeds.map((f) => f.category)).toEqual(['General', 'Science']);
  });

  it('rejects a fractional article cap', () => {
    expect(() => parseConfig({ settings: { max_articles_per_feed: 2.5 } })).toThrow(/settings\.max_articles_per_feed/);
  });

  it('rejects an unknown time zone', () => {
    expect(() => parseConfig({ settings: { timezone: 'Mars/Olympus_Mons' } })).toThrow(
      /settings\.timezone: unknown time zone/
    );
  });

  it('rejects a feed without a name', () => {
    expect(() => parseConfig({ feeds: [{ url: 'https://example.com/a.xml' }] })).toThrow(/feeds\.0\.name: Required/);
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'feed-digest-config-'));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads the file named by FEEDS_CONFIG and applies env overrides', () => {
    const file = path.join(dir, 'feeds.json');
    fs.writeFileSync(file, JSON.stringify({ feeds: [{ url: 'https://example.com/a.xml', name: 'A' }] }));
    const output = path.join(dir, 'out', 'digest.html');

    const config = loadConfig({ FEEDS_CONFIG: file, DIGEST_OUTPUT: output, FEED_CONCURRENCY: '4' });

    expect(config.feeds).toEqual([{ url: 'https://example.com/a.xml', name: 'A', category: 'General' }]);
    expect(config.outputPath).toBe(output);
    expect(config.concurrency).toBe(4);
  });

  it('falls back to sequential fetching for a bad concurrency value', () => {
    const file = path.join(dir, 'feeds.json');
    fs.writeFileSync(file, '{}');

    expect(loadConfig({ FEEDS_CONFIG: file, FEED_CONCURRENCY: 'many' }).concurrency).toBe(1);
  });

  it('fails on invalid JSON', () => {
    const file = path.join(dir, 'feeds.json');
    fs.writeFileSync(file, '{ feeds: ');

    expect(() => loadConfig({ FEEDS_CONFIG: file })).toThrow(/is not valid JSON/);
  });

  it('fails when the file cannot be read', () => {
    expect(() => loadConfig({ FEEDS_CONFIG: path.join(dir, 'missing.json') })).toThrow(/Cannot read feed config/);
  });
});
