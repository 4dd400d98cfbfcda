/**
 * Crawling Types
 * Contracts between the crawl orchestrator and its collaborators
 */

/**
 * One page of results for a query at a cursor
 */
export interface Page<T> {
  /**
   * Parsed entities, in API order
   */
  items: T[];

  /**
   * Whether the API reports more pages for this query
   */
  hasNext: boolean;

  /**
   * Cursor for the next page (null when absent)
   */
  nextCursor: string | null;

  /**
   * Remaining shared rate-limit budget reported with this page
   */
  remainingQuota: number;
}

/**
 * Fetches pages of a paginated search endpoint.
 * Implementations own retry/backoff and rate-limit sleeping; a rejection
 * means the query cannot make progress.
 */
export interface IPageFetcher<T> {
  fetchPage(query: string, cursor: string | null): Promise<Page<T>>;
}

/**
 * Produces the fixed set of queries for a run
 */
export interface IQueryPartitioner {
  generate(): string[];
}

/**
 * Run-scoped seen-set
 */
export interface IDeduplicator<T> {
  /**
   * Return the items whose identifiers were not seen before and mark them seen
   */
  filterFresh(items: readonly T[]): Promise<T[]>;

  /**
   * Count of identifiers seen so far
   */
  totalSeen(): number;
}

/**
 * Anything that yields batches of fresh entities up to a target
 */
export interface IBatchSource<T> {
  collect(target: number): AsyncIterable<T[]>;
}

/**
 * Orchestrator configuration
 */
export interface CrawlingConfig {
  /**
   * Maximum simultaneous page fetches across the whole run
   */
  maxConcurrency: number;

  /**
   * Queries per chunk = maxConcurrency × chunkMultiplier
   */
  chunkMultiplier: number;

  /**
   * Pause when the remaining quota drops below this
   */
  rateLimitLowWater: number;

  /**
   * Pause length in milliseconds
   */
  rateLimitCooldownMs: number;
}

/**
 * Fetch-loop state of one in-flight query
 */
export interface QueryState {
  query: string;
  cursor: string | null;
  exhausted: boolean;
  pagesFetched: number;
  freshFound: number;
}

/**
 * Crawling statistics interface
 */
export interface CrawlingStatistics {
  /**
   * Queries produced by the partitioner
   */
  queriesTotal: number;

  /**
   * Queries drained to their last page (or stopped by the target)
   */
  queriesCompleted: number;

  /**
   * Queries whose fetch failed after retries
   */
  queriesAbandoned: number;

  chunksProcessed: number;

  pagesFetched: number;

  /**
   * Entities received from the fetcher
   */
  entitiesFetched: number;

  /**
   * Entities that passed deduplication
   */
  freshEntities: number;

  duplicatesDetected: number;

  /**
   * Low-quota pauses taken by workers
   */
  cooldowns: number;

  /**
   * Total crawling time in milliseconds
   */
  totalTime: number;
}
