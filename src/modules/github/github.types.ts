/**
 * GitHub Module Types
 * Shapes of the GraphQL search response once its envelope is validated
 */

export interface GraphQLErrorEntry {
  type?: string;
  message: string;
}

export interface RateLimitInfo {
  remaining: number;
  resetAt: string | null;
  cost: number | null;
}

export interface SearchPageInfo {
  hasNextPage: boolean;
  endCursor: string | null;
}

/**
 * Validated envelope; nodes stay unknown until mapped one by one
 */
export interface SearchResponse {
  rateLimit: RateLimitInfo;
  repositoryCount: number;
  pageInfo: SearchPageInfo;
  nodes: unknown[];
  errors: GraphQLErrorEntry[];
}

export interface GitHubClientOptions {
  token: string;
  endpoint?: string;
  pageSize?: number;
  timeoutMs?: number;
  maxRetries?: number;
  retryBaseDelayMs?: number;
  rateLimitSleepMs?: number;
  circuitBreaker?: {
    enabled: boolean;
    timeout?: number;
    errorThresholdPercentage?: number;
    resetTimeout?: number;
    minimumRequests?: number;
  };
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
}
