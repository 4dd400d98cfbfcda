/**
 * Crawl Module Types
 */

export enum CrawlStatus {
  RUNNING = 'running',
  SUCCESS = 'success',
  FAILED = 'failed',
}

export type FinalCrawlStatus = CrawlStatus.SUCCESS | CrawlStatus.FAILED;

/**
 * Summary of one finished crawl run
 */
export interface CrawlResult {
  runId: string;
  totalEntities: number;
  status: FinalCrawlStatus;
  elapsedMs: number;
  errorMessage?: string;
}

/**
 * Persistence the crawl service writes through.
 * upsertBatch must be safe to apply more than once.
 */
export interface IRunStorage<T> {
  createRun(): Promise<string>;
  upsertBatch(items: T[]): Promise<void>;
  finishRun(runId: string, total: number, status: FinalCrawlStatus, error?: string): Promise<void>;
}
