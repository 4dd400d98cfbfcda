/**
 * Crawl Service
 * Top-level use case: collect fresh entities up to a target and persist them
 */

import { IBatchSource } from '../../lib/crawling/crawling.types';
import { CrawlResult, CrawlStatus, IRunStorage } from './crawl.types';

/**
 * Keep the first `remaining` items of a batch
 */
export function trimBatch<T>(batch: T[], remaining: number): T[] {
  if (remaining <= 0) {
    return [];
  }
  return batch.length > remaining ? batch.slice(0, remaining) : batch;
}

export class CrawlService<T> {
  constructor(
    private readonly source: IBatchSource<T>,
    private readonly storage: IRunStorage<T>
  ) {}

  /**
   * Run a full crawl for `target` entities.
   * Failures after the run record exists are reported in the result, with
   * everything persisted up to that point kept.
   */
  async execute(target: number): Promise<CrawlResult> {
    if (!Number.isInteger(target) || target < 0) {
      throw new Error(`target must be a non-negative integer, got ${target}`);
    }

    const startedAt = Date.now();
    const runId = await this.storage.createRun();
    let total = 0;

    console.log(`CrawlService: run ${runId} | target: ${target}`);

    try {
      for await (const batch of this.source.collect(target)) {
        const trimmed = trimBatch(batch, target - total);
        if (trimmed.length > 0) {
          await this.storage.upsertBatch(trimmed);
          total += trimmed.length;

          const elapsed = (Date.now() - startedAt) / 1000;
          const rate = elapsed > 0 ? total / elapsed : 0;
          console.log(`CrawlService: saved ${trimmed.length} | running total: ${total}/${target} | ${rate.toFixed(1)}/sec`);
        }

        if (total >= target) {
          break;
        }
      }

      await this.storage.finishRun(runId, total, CrawlStatus.SUCCESS);
      const elapsedMs = Date.now() - startedAt;
      console.log(`CrawlService: run ${runId} complete | ${total} entities | ${(elapsedMs / 1000).toFixed(0)}s`);

      return {
        runId,
        totalEntities: total,
        status: CrawlStatus.SUCCESS,
        elapsedMs,
      };
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`CrawlService: run ${runId} failed after ${total} entities:`, error);
      await this.storage.finishRun(runId, total, CrawlStatus.FAILED, message);

      return {
        runId,
        totalEntities: total,
        status: CrawlStatus.FAILED,
        elapsedMs: Date.now() - startedAt,
        errorMessage: message,
      };
    }
  }
}
