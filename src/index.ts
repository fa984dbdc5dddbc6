#!/usr/bin/env node
import { loadConfig } from './config';
import { buildDigest } from './digest';
import { describeError } from './errors';
import { log, logError } from './log';
import { writeDigest } from './output';
import { renderDigestHtml } from './renderer';

async function main(): Promise<void> {
  const config = loadConfig();
  log('init', `Feeds: ${config.feeds.length} sources configured`);

  const digest = await buildDigest(config, { concurrency: config.concurrency });
  const html = renderDigestHtml(digest);

  writeDigest(config.outputPath, html);
  log('init', `Digest saved to: ${config.outputPath}`);
}

main().catch((err: unknown) => {
  logError('FATAL', describeError(err));
  if (err instanceof Error && err.stack) logError('FATAL', err.stack);
  process.exitCode = 1;
});
