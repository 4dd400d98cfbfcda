/**
 * Fetch Error Handling
 * Error classes raised at the page-fetch boundary and their retry classification
 */

export enum FetchErrorType {
  NETWORK_ERROR = 'NETWORK_ERROR',
  TIMEOUT = 'TIMEOUT',
  RATE_LIMITED = 'RATE_LIMITED',
  AUTH_REQUIRED = 'AUTH_REQUIRED',
  NOT_FOUND = 'NOT_FOUND',
  SERVER_ERROR = 'SERVER_ERROR',
  GRAPHQL_ERROR = 'GRAPHQL_ERROR',
  PARSE_ERROR = 'PARSE_ERROR',
  CIRCUIT_OPEN = 'CIRCUIT_OPEN',
  UNKNOWN = 'UNKNOWN',
}

export interface FetchError {
  type: FetchErrorType;
  message: string;
  statusCode?: number;
  retryable: boolean;
  retryAfter?: number; // milliseconds, rate limits only
}

/**
 * Non-2xx HTTP response
 */
export class HttpStatusError extends Error {
  constructor(
    readonly statusCode: number,
    message: string,
    readonly retryAfterMs?: number,
    readonly rateLimitExhausted: boolean = false
  ) {
    super(message);
    this.name = 'HttpStatusError';
  }
}

/**
 * Explicit rate-limit signal from the API (not a transport failure)
 */
export class RateLimitedError extends Error {
  constructor(message: string, readonly retryAfterMs?: number) {
    super(message);
    this.name = 'RateLimitedError';
  }
}

/**
 * GraphQL-level error payload. Retryable when the response carried no data.
 */
export class GraphQLResponseError extends Error {
  constructor(message: string, readonly retryable: boolean) {
    super(message);
    this.name = 'GraphQLResponseError';
  }
}

/**
 * Response body that does not have the expected envelope
 */
export class ResponseParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ResponseParseError';
  }
}

/**
 * A single raw record that cannot become an entity. Skipped, never propagated past the page.
 */
export class MalformedRecordError extends Error {
  constructor(message: string, readonly recordId?: string) {
    super(message);
    this.name = 'MalformedRecordError';
  }
}

/**
 * Raised once the retry budget for one request is spent
 */
export class RetryExhaustedError extends Error {
  constructor(message: string, readonly attempts: number, options?: ErrorOptions) {
    super(message, options);
    this.name = 'RetryExhaustedError';
  }
}

const NETWORK_CODES = ['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'EAI_AGAIN', 'EPIPE', 'UND_ERR_SOCKET'];

/**
 * Error code of the error or of its cause chain (undici puts it on `cause`)
 */
function findErrorCode(error: unknown, depth: number = 0): string | undefined {
  if (!(error instanceof Error) || depth > 3) {
    return undefined;
  }
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return findErrorCode(error.cause, depth + 1);
}

/**
 * Classify an error and provide retry guidance
 */
export function classifyError(error: unknown): FetchError {
  const message = error instanceof Error ? error.message : String(error);
  const name = error instanceof Error ? error.name : '';
  const code = findErrorCode(error);

  if (error instanceof RateLimitedError) {
    return {
      type: FetchErrorType.RATE_LIMITED,
      message,
      retryable: true,
      retryAfter: error.retryAfterMs,
    };
  }

  if (error instanceof HttpStatusError) {
    const statusCode = error.statusCode;

    if (statusCode === 429 || (statusCode === 403 && error.rateLimitExhausted)) {
      return {
        type: FetchErrorType.RATE_LIMITED,
        message: 'Rate limited by server',
        statusCode,
        retryable: true,
        retryAfter: error.retryAfterMs,
      };
    }

    if (statusCode === 401 || statusCode === 403) {
      return {
        type: FetchErrorType.AUTH_REQUIRED,
        message: 'Authentication failed',
        statusCode,
        retryable: false,
      };
    }

    if (statusCode === 404) {
      return {
        type: FetchErrorType.NOT_FOUND,
        message: 'Endpoint not found',
        statusCode,
        retryable: false,
      };
    }

    if (statusCode === 408) {
      return {
        type: FetchErrorType.TIMEOUT,
        message: 'Request timed out',
        statusCode,
        retryable: true,
      };
    }

    if (statusCode >= 500) {
      return {
        type: FetchErrorType.SERVER_ERROR,
        message: 'Server error',
        statusCode,
        retryable: true,
      };
    }

    return {
      type: FetchErrorType.UNKNOWN,
      message,
      statusCode,
      retryable: false,
    };
  }

  if (error instanceof GraphQLResponseError) {
    return {
      type: FetchErrorType.GRAPHQL_ERROR,
      message,
      retryable: error.retryable,
    };
  }

  if (error instanceof ResponseParseError) {
    return {
      type: FetchErrorType.PARSE_ERROR,
      message,
      retryable: false,
    };
  }

  // opossum rejects with this code while the circuit is open
  if (code === 'EOPENBREAKER') {
    return {
      type: FetchErrorType.CIRCUIT_OPEN,
      message: 'Circuit breaker is open',
      retryable: true,
    };
  }

  if (
    name === 'AbortError' ||
    name === 'TimeoutError' ||
    code === 'ETIMEDOUT' ||
    message.toLowerCase().includes('timeout') ||
    message.includes('timed out')
  ) {
    return {
      type: FetchErrorType.TIMEOUT,
      message: 'Request timed out',
      retryable: true,
    };
  }

  if (
    (code !== undefined && NETWORK_CODES.includes(code)) ||
    message.includes('fetch failed') ||
    message.includes('network')
  ) {
    return {
      type: FetchErrorType.NETWORK_ERROR,
      message: 'Network connection failed',
      retryable: true,
    };
  }

  return {
    type: FetchErrorType.UNKNOWN,
    message,
    retryable: false,
  };
}
