import * as dotenv from 'dotenv';
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { AppConfig, DigestConfig } from './types';
import { log } from './log';

dotenv.config();

function isValidTimeZone(zone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: zone });
    return true;
  } catch {
    return false;
  }
}

const SettingsSchema = z
  .object({
    max_age_hours: z.number().positive().default(24),
    max_articles_per_feed: z.number().int().positive().default(10),
    timezone: z.string().default('UTC').refine(isValidTimeZone, { message: 'unknown time zone' }),
    site_title: z.string().default('Daily Digest'),
  })
  .default({});

const FeedSchema = z.object({
  url: z.string().min(1),
  name: z.string().min(1),
  category: z.string().default('General'),
});

const ConfigFileSchema = z.object({
  settings: SettingsSchema,
  feeds: z.array(FeedSchema).default([]),
});

export function parseConfig(raw: unknown): DigestConfig {
  const result = ConfigFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid feed config: ${issues}`);
  }

  const { settings, feeds } = result.data;
  return {
    settings: {
      maxAgeHours: settings.max_age_hours,
      maxArticlesPerFeed: settings.max_articles_per_feed,
      timezone: settings.timezone,
      siteTitle: settings.site_title,
    },
    feeds,
  };
}

function findConfigFile(env: NodeJS.ProcessEnv): string {
  if (env.FEEDS_CONFIG) return env.FEEDS_CONFIG;

  const candidates = [
    path.join(__dirname, '..', 'feeds.json'),
    path.join(process.cwd(), 'feeds.json'),
  ];
  for (const p of candidates) {
    if (fs.existsSync(p)) return p;
  }
  throw new Error('feeds.json not found! Tried: ' + candidates.join(', '));
}

function readConfigFile(file: string): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(file, 'utf-8');
  } catch (err) {
    throw new Error(`Cannot read feed config ${file}`, { cause: err });
  }
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new Error(`Feed config ${file} is not valid JSON`, { cause: err });
  }
}

function optionalEnvInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const value = env[key];
  if (!value) return fallback;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) || parsed < 1 ? fallback : parsed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const file = findConfigFile(env);
  log('config', `Using feed config: ${file}`);
  const config = parseConfig(readConfigFile(file));

  return {
    ...config,
    outputPath: path.resolve(env.DIGEST_OUTPUT || 'index.html'),
    concurrency: optionalEnvInt(env, 'FEED_CONCURRENCY', 1),
  };
}
