/**
 * GitHub Search Client
 * Page fetcher for the GraphQL repository search, with retry, backoff and
 * rate-limit sleeping at this boundary.
 */

import { env } from '../../config/env';
import { CircuitBreaker, CircuitBreakerEvent } from '../../lib/circuit-breaker';
import { IPageFetcher, Page } from '../../lib/crawling/crawling.types';
import { FetchErrorType, HttpStatusError } from '../../lib/errors';
import { Sleep, retryWithBackoff, sleep } from '../../lib/retry';
import { Repo } from '../repos/repos.types';
import { mapRepositoryNodes, parseSearchResponse } from './github.mapper';
import { SEARCH_REPOSITORIES_QUERY } from './github.queries';
import { GitHubClientOptions, SearchResponse } from './github.types';

type RequestVariables = { query: string; first: number; after: string | null };

// Search never pages past this many results for one query
export const SEARCH_RESULT_CAP = 1000;

/**
 * Milliseconds to wait from a retry-after or x-ratelimit-reset header
 */
export function parseRetryAfter(headers: Headers, now: number = Date.now()): number | undefined {
  const retryAfter = headers.get('retry-after');
  if (retryAfter !== null) {
    const seconds = Number(retryAfter);
    if (Number.isFinite(seconds) && seconds >= 0) {
      return seconds * 1000;
    }
  }

  const reset = headers.get('x-ratelimit-reset');
  if (reset !== null && headers.get('x-ratelimit-remaining') === '0') {
    const resetAt = Number(reset) * 1000;
    if (Number.isFinite(resetAt) && resetAt > now) {
      return resetAt - now;
    }
  }

  return undefined;
}

export class GitHubSearchClient implements IPageFetcher<Repo> {
  private readonly endpoint: string;
  private readonly pageSize: number;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly rateLimitSleepMs: number;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: Sleep;
  private readonly breaker: CircuitBreaker<[RequestVariables], unknown> | null = null;

  constructor(options: GitHubClientOptions) {
    this.endpoint = options.endpoint ?? env.GITHUB_API_URL;
    this.pageSize = options.pageSize ?? env.GITHUB_PAGE_SIZE;
    this.timeoutMs = options.timeoutMs ?? env.GITHUB_REQUEST_TIMEOUT;
    this.maxRetries = options.maxRetries ?? env.MAX_RETRIES;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? env.RETRY_BACKOFF_BASE;
    this.rateLimitSleepMs = options.rateLimitSleepMs ?? env.RATE_LIMIT_SLEEP_MS;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.sleep = options.sleep ?? sleep;
    this.headers = {
      'Authorization': `Bearer ${options.token}`,
      'Content-Type': 'application/json',
      'User-Agent': 'starcrawl/1.0',
    };

    if (options.circuitBreaker?.enabled) {
      const breaker = new CircuitBreaker((variables: RequestVariables) => this.post(variables), {
        name: 'github-graphql',
        timeout: options.circuitBreaker.timeout,
        errorThresholdPercentage: options.circuitBreaker.errorThresholdPercentage,
        resetTimeout: options.circuitBreaker.resetTimeout,
        minimumRequests: options.circuitBreaker.minimumRequests,
      });
      breaker.on(CircuitBreakerEvent.OPEN, () => console.warn('GitHub: circuit breaker opened'));
      breaker.on(CircuitBreakerEvent.HALF_OPEN, () => console.log('GitHub: circuit breaker half-open'));
      breaker.on(CircuitBreakerEvent.CLOSE, () => console.log('GitHub: circuit breaker closed'));
      this.breaker = breaker;
    }
  }

  /**
   * Fetch one page of search results
   */
  async fetchPage(query: string, cursor: string | null): Promise<Page<Repo>> {
    const variables: RequestVariables = { query, first: this.pageSize, after: cursor };

    const response = await retryWithBackoff(() => this.request(variables), {
      maxRetries: this.maxRetries,
      baseDelay: this.retryBaseDelayMs,
      rateLimitDelay: this.rateLimitSleepMs,
      sleep: this.sleep,
      onRetry: (error, attempt, delay) => {
        if (error.type === FetchErrorType.RATE_LIMITED) {
          console.log(`GitHub: rate limited, sleeping ${delay}ms before retry`);
        } else {
          console.warn(`GitHub: ${error.type} attempt ${attempt}/${this.maxRetries}: ${error.message}, retrying in ${delay}ms`);
        }
      },
    });

    if (response.errors.length > 0) {
      console.warn(
        `GitHub: GraphQL errors for query ${query.slice(0, 60)}: ${response.errors.map((error) => error.message).join('; ')}`
      );
    }

    if (cursor === null) {
      if (response.repositoryCount > SEARCH_RESULT_CAP) {
        console.warn(
          `GitHub: ${response.repositoryCount} repositories match ${query}, only the first ${SEARCH_RESULT_CAP} are reachable`
        );
      } else {
        console.debug(`GitHub: ${response.repositoryCount} repositories match ${query}`);
      }
    }

    const { repos } = mapRepositoryNodes(response.nodes);

    return {
      items: repos,
      hasNext: response.pageInfo.hasNextPage,
      nextCursor: response.pageInfo.endCursor,
      remainingQuota: response.rateLimit.remaining,
    };
  }

  /**
   * Stop the circuit breaker's timers
   */
  shutdown(): void {
    this.breaker?.shutdown();
  }

  /**
   * One attempt: POST and validate the envelope so that retryable GraphQL
   * errors go through the same backoff as transport failures.
   */
  private async request(variables: RequestVariables): Promise<SearchResponse> {
    const body = this.breaker ? await this.breaker.execute(variables) : await this.post(variables);
    return parseSearchResponse(body);
  }

  private async post(variables: RequestVariables): Promise<unknown> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(this.endpoint, {
        method: 'POST',
        headers: this.headers,
        body: JSON.stringify({ query: SEARCH_REPOSITORIES_QUERY, variables }),
        signal: controller.signal,
      });

      if (!response.ok) {
        const text = await response.text();
        const rateLimitExhausted =
          response.headers.get('x-ratelimit-remaining') === '0' ||
          text.toLowerCase().includes('rate limit');
        throw new HttpStatusError(
          response.status,
          `GitHub API returned ${response.status}: ${text.slice(0, 200)}`,
          parseRetryAfter(response.headers),
          rateLimitExhausted
        );
      }

      const json: unknown = await response.json();
      return json;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
