#!/usr/bin/env node
/**
 * Crawler Entry Point
 * Wires the GitHub fetcher, the crawl core and MongoDB storage, then runs one crawl.
 *
 * Usage: starcrawl [--target <count>]
 */

import { env, parseNonNegativeInt } from './config/env';
import { connectDB, disconnectDB } from './lib/mongo';
import { CrawlOrchestrator, InMemoryDeduplicator } from './lib/crawling';
import { GitHubSearchClient } from './modules/github/github.client';
import { createRepoSearchPartitioner } from './modules/github/github.facets';
import { CrawlService } from './modules/crawl/crawl.service';
import { CrawlResult, CrawlStatus } from './modules/crawl/crawl.types';
import { repoStorage } from './modules/repos/repos.repository';
import { Repo, repoKey } from './modules/repos/repos.types';

/**
 * Read `--target N` (or `--target=N`) from argv
 */
export function parseTarget(args: string[], fallback: number = env.CRAWL_TARGET): number {
  let raw: string | undefined;
  const inline = args.find((arg) => arg.startsWith('--target='));
  if (inline) {
    raw = inline.slice('--target='.length);
  } else {
    const idx = args.indexOf('--target');
    raw = idx >= 0 ? args[idx + 1] : undefined;
  }

  if (raw === undefined) {
    if (!Number.isInteger(fallback) || fallback < 0) {
      throw new Error(`CRAWL_TARGET must be a non-negative integer, got "${fallback}"`);
    }
    return fallback;
  }

  return parseNonNegativeInt(raw, '--target');
}

const run = async (): Promise<CrawlResult> => {
  const token = env.GITHUB_TOKEN;
  if (!token) {
    console.error('GITHUB_TOKEN environment variable is required');
    process.exit(1);
  }

  const target = parseTarget(process.argv.slice(2));

  await connectDB();

  const client = new GitHubSearchClient({
    token,
    circuitBreaker: {
      enabled: env.CIRCUIT_BREAKER_ENABLED,
      timeout: env.CIRCUIT_BREAKER_TIMEOUT,
      errorThresholdPercentage: env.CIRCUIT_BREAKER_ERROR_THRESHOLD,
      resetTimeout: env.CIRCUIT_BREAKER_RESET_TIMEOUT,
      minimumRequests: env.CIRCUIT_BREAKER_MIN_REQUESTS,
    },
  });

  try {
    const partitioner = createRepoSearchPartitioner();
    console.log(`🔎 Query partition: ${partitioner.describe()} (+ fallbacks without year)`);

    const orchestrator = new CrawlOrchestrator<Repo>(
      client,
      partitioner,
      new InMemoryDeduplicator<Repo>(repoKey)
    );
    const service = new CrawlService<Repo>(orchestrator, repoStorage);

    const result = await service.execute(target);

    const stats = orchestrator.getStatistics();
    if (stats) {
      console.log(
        `📊 pages=${stats.pagesFetched} | duplicates=${stats.duplicatesDetected} | abandoned queries=${stats.queriesAbandoned} | cooldowns=${stats.cooldowns}`
      );
    }
    return result;
  } finally {
    client.shutdown();
    await disconnectDB();
  }
};

if (require.main === module) {
  process.on('SIGINT', () => {
    console.log('SIGINT signal received: exiting, persisted batches are kept');
    disconnectDB()
      .catch((error: unknown) => console.error('Disconnect failed:', error))
      .finally(() => process.exit(130));
  });

  run()
    .then((result) => {
      if (result.status === CrawlStatus.SUCCESS) {
        console.log(`✅ Success | ${result.totalEntities} repos | ${(result.elapsedMs / 1000).toFixed(0)}s | run ${result.runId}`);
        process.exit(0);
      }
      console.error(`❌ Failed | ${result.totalEntities} repos collected before failure | error: ${result.errorMessage}`);
      process.exit(1);
    })
    .catch((error: unknown) => {
      console.error('Crawl could not start:', error);
      process.exit(1);
    });
}
