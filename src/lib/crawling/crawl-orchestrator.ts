/**
 * Crawl Orchestrator
 * Drives many bounded queries through a shared concurrency limiter and
 * yields deduplicated batches until a target is reached or input runs out.
 */

import pLimit from 'p-limit';
import { env } from '../../config/env';
import { Sleep, sleep } from '../retry';
import {
  CrawlingConfig,
  CrawlingStatistics,
  IBatchSource,
  IDeduplicator,
  IPageFetcher,
  IQueryPartitioner,
  Page,
  QueryState,
} from './crawling.types';
import { CrawlingStatisticsTracker } from './crawling-statistics';
import { StopSignal } from './stop-signal';

type Limit = ReturnType<typeof pLimit>;

export interface CrawlOrchestratorOptions extends Partial<CrawlingConfig> {
  sleep?: Sleep;
}

/**
 * Everything one collect() call shares between its query loops
 */
interface RunContext<T> {
  target: number;
  limit: Limit;
  stop: StopSignal;
  stats: CrawlingStatisticsTracker;
  out: T[];
}

export class CrawlOrchestrator<T> implements IBatchSource<T> {
  private readonly config: CrawlingConfig;
  private readonly sleep: Sleep;
  private lastStats: CrawlingStatisticsTracker | null = null;

  constructor(
    private readonly fetcher: IPageFetcher<T>,
    private readonly partitioner: IQueryPartitioner,
    private readonly deduplicator: IDeduplicator<T>,
    options: CrawlOrchestratorOptions = {}
  ) {
    this.config = {
      maxConcurrency: options.maxConcurrency ?? env.MAX_CONCURRENCY,
      chunkMultiplier: options.chunkMultiplier ?? env.CHUNK_MULTIPLIER,
      rateLimitLowWater: options.rateLimitLowWater ?? env.RATE_LIMIT_LOW_WATER,
      rateLimitCooldownMs: options.rateLimitCooldownMs ?? env.RATE_LIMIT_COOLDOWN_MS,
    };
    this.sleep = options.sleep ?? sleep;

    const isPositiveInt = (value: number) => Number.isInteger(value) && value >= 1;
    if (!isPositiveInt(this.config.maxConcurrency) || !isPositiveInt(this.config.chunkMultiplier)) {
      throw new Error(
        `maxConcurrency and chunkMultiplier must be integers of at least 1 (got ${this.config.maxConcurrency}, ${this.config.chunkMultiplier})`
      );
    }
    if (!(this.config.rateLimitLowWater >= 0) || !(this.config.rateLimitCooldownMs >= 0)) {
      throw new Error(
        `rateLimitLowWater and rateLimitCooldownMs must be non-negative (got ${this.config.rateLimitLowWater}, ${this.config.rateLimitCooldownMs})`
      );
    }
  }

  get chunkSize(): number {
    return this.config.maxConcurrency * this.config.chunkMultiplier;
  }

  /**
   * Yield batches of fresh entities, one per chunk of queries, until the
   * seen-set reaches `target` or every query is exhausted or abandoned.
   * Each call is a new run with its own stop signal and limiter; the
   * seen-set is whatever deduplicator this orchestrator was given.
   */
  async *collect(target: number): AsyncGenerator<T[], void, undefined> {
    const queries = this.partitioner.generate();
    const chunkSize = this.chunkSize;
    const chunkCount = Math.ceil(queries.length / chunkSize);
    const stats = new CrawlingStatisticsTracker();
    const stop = new StopSignal();
    const limit = pLimit(this.config.maxConcurrency);

    this.lastStats = stats;
    stats.recordQueries(queries.length);

    console.log(
      `Orchestrator: starting crawl | queries=${queries.length} | concurrency=${this.config.maxConcurrency} | chunk=${chunkSize} | target=${target}`
    );

    for (let start = 0, chunkIndex = 1; start < queries.length; start += chunkSize, chunkIndex++) {
      if (this.deduplicator.totalSeen() >= target) {
        stop.set('target reached');
      }
      if (stop.isSet) {
        break;
      }

      const chunk = queries.slice(start, start + chunkSize);
      const context: RunContext<T> = { target, limit, stop, stats, out: [] };

      await Promise.all(chunk.map((query) => this.drainQuery(query, context)));
      stats.recordChunk();

      if (context.out.length > 0) {
        console.log(
          `Orchestrator: chunk ${chunkIndex}/${chunkCount} | +${context.out.length} new | total ${this.deduplicator.totalSeen()}/${target}`
        );
        yield context.out;
      }
    }

    const summary = stats.getStatistics();
    console.log(
      `Orchestrator: crawl finished | unique=${this.deduplicator.totalSeen()} | pages=${summary.pagesFetched} | abandoned=${summary.queriesAbandoned} | ${summary.totalTime}ms`
    );
  }

  /**
   * Statistics of the most recent collect() call
   */
  getStatistics(): CrawlingStatistics | null {
    return this.lastStats ? this.lastStats.getStatistics() : null;
  }

  /**
   * Fetch one query page by page until it is exhausted, fails, or the run stops.
   * Never rejects: a failing query is abandoned and the run continues.
   */
  private async drainQuery(query: string, context: RunContext<T>): Promise<QueryState> {
    const { target, limit, stop, stats, out } = context;
    const state: QueryState = { query, cursor: null, exhausted: false, pagesFetched: 0, freshFound: 0 };

    while (!stop.isSet) {
      let page: Page<T> | null;
      try {
        // The permit covers the fetch only; a fetch granted after the stop does not run
        page = await limit<[], Page<T> | null>(() =>
          stop.isSet ? null : this.fetcher.fetchPage(query, state.cursor)
        );
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        console.warn(`Orchestrator: query abandoned after ${state.pagesFetched} page(s): ${query.slice(0, 80)} | ${message}`);
        stats.recordQueryAbandoned();
        return state;
      }

      if (page === null) {
        break;
      }

      state.pagesFetched++;

      // Filter before handing anything on, so a racing duplicate from another query is excluded
      const fresh = await this.deduplicator.filterFresh(page.items);
      out.push(...fresh);
      state.freshFound += fresh.length;
      stats.recordPage(page.items.length, fresh.length);

      if (this.deduplicator.totalSeen() >= target && stop.set('target reached')) {
        console.log(`Orchestrator: target ${target} reached, stopping all queries`);
      }

      if (page.remainingQuota < this.config.rateLimitLowWater && !stop.isSet) {
        console.log(
          `Orchestrator: rate limit low (${page.remainingQuota} remaining), pausing ${this.config.rateLimitCooldownMs}ms`
        );
        stats.recordCooldown();
        await this.sleep(this.config.rateLimitCooldownMs);
      }

      if (!page.hasNext || page.items.length === 0 || page.nextCursor === null) {
        state.exhausted = true;
        break;
      }

      state.cursor = page.nextCursor;
    }

    stats.recordQueryCompleted();
    return state;
  }
}
