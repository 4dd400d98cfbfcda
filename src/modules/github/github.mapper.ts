/**
 * GitHub response mapping
 * Translates raw GraphQL payloads into validated envelopes and Repo values.
 * GitHub's field names stop here.
 */

import {
  GraphQLResponseError,
  MalformedRecordError,
  RateLimitedError,
  ResponseParseError,
} from '../../lib/errors';
import { Repo, createRepo } from '../repos/repos.types';
import { GraphQLErrorEntry, SearchResponse } from './github.types';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(node: Record<string, unknown>, field: string): string {
  const value = node[field];
  if (typeof value !== 'string' || value.length === 0) {
    throw new MalformedRecordError(`missing ${field}`);
  }
  return value;
}

function optionalString(node: Record<string, unknown>, field: string): string | null {
  const value = node[field];
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value !== 'string') {
    throw new MalformedRecordError(`${field} is not a string`);
  }
  return value;
}

function optionalDate(node: Record<string, unknown>, field: string): Date | null {
  const value = optionalString(node, field);
  if (value === null || value === '') {
    return null;
  }
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new MalformedRecordError(`${field} is not a timestamp: ${value}`);
  }
  return date;
}

/**
 * Map one search node to a Repo. Throws MalformedRecordError.
 */
export function toRepo(node: unknown): Repo {
  if (!isRecord(node)) {
    throw new MalformedRecordError('node is not an object');
  }

  const owner = node.owner;
  if (!isRecord(owner)) {
    throw new MalformedRecordError('missing owner', typeof node.id === 'string' ? node.id : undefined);
  }

  const language = node.primaryLanguage;
  let primaryLanguage: string | null = null;
  if (isRecord(language)) {
    primaryLanguage = optionalString(language, 'name');
  } else if (language !== null && language !== undefined) {
    throw new MalformedRecordError('primaryLanguage is not an object');
  }

  const stars = node.stargazerCount ?? 0;
  if (typeof stars !== 'number' || !Number.isInteger(stars) || stars < 0) {
    throw new MalformedRecordError(`stargazerCount is invalid: ${String(stars)}`);
  }

  return createRepo({
    nodeId: requireString(node, 'id'),
    nameWithOwner: requireString(node, 'nameWithOwner'),
    name: requireString(node, 'name'),
    ownerLogin: requireString(owner, 'login'),
    description: optionalString(node, 'description'),
    primaryLanguage,
    isPrivate: node.isPrivate === true,
    starCount: stars,
    createdAt: optionalDate(node, 'createdAt'),
    updatedAt: optionalDate(node, 'updatedAt'),
  });
}

/**
 * Map every node of a page, skipping the ones that do not parse
 */
export function mapRepositoryNodes(nodes: unknown[]): { repos: Repo[]; skipped: number } {
  const repos: Repo[] = [];
  let skipped = 0;

  for (const node of nodes) {
    try {
      repos.push(toRepo(node));
    } catch (error: unknown) {
      if (!(error instanceof MalformedRecordError)) {
        throw error;
      }
      skipped++;
      const id = isRecord(node) && typeof node.id === 'string' ? node.id : 'unknown';
      console.debug(`GitHub: skipping malformed node ${id}: ${error.message}`);
    }
  }

  return { repos, skipped };
}

function parseErrors(value: unknown): GraphQLErrorEntry[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter(isRecord).map((entry) => ({
    type: typeof entry.type === 'string' ? entry.type : undefined,
    message: typeof entry.message === 'string' ? entry.message : 'unknown error',
  }));
}

/**
 * Validate the search response envelope.
 * Rate-limit errors become RateLimitedError; errors without data become a
 * retryable GraphQLResponseError; a broken envelope is a ResponseParseError.
 */
export function parseSearchResponse(body: unknown): SearchResponse {
  if (!isRecord(body)) {
    throw new ResponseParseError('Response body is not an object');
  }

  const errors = parseErrors(body.errors);
  if (errors.some((error) => error.type === 'RATE_LIMITED')) {
    throw new RateLimitedError('GraphQL rate limit exceeded');
  }

  const data = body.data;
  const search = isRecord(data) ? data.search : undefined;
  if (!isRecord(data) || !isRecord(search)) {
    if (errors.length > 0) {
      throw new GraphQLResponseError(
        `GraphQL errors without data: ${errors.map((error) => error.message).join('; ')}`,
        true
      );
    }
    throw new ResponseParseError('Response has no search data');
  }

  const rateLimit = data.rateLimit;
  if (!isRecord(rateLimit) || typeof rateLimit.remaining !== 'number') {
    throw new ResponseParseError('Response has no rateLimit.remaining');
  }

  const pageInfo = search.pageInfo;
  if (!isRecord(pageInfo) || typeof pageInfo.hasNextPage !== 'boolean') {
    throw new ResponseParseError('Response has no search.pageInfo');
  }

  if (!Array.isArray(search.nodes)) {
    throw new ResponseParseError('Response has no search.nodes');
  }

  return {
    rateLimit: {
      remaining: rateLimit.remaining,
      resetAt: typeof rateLimit.resetAt === 'string' ? rateLimit.resetAt : null,
      cost: typeof rateLimit.cost === 'number' ? rateLimit.cost : null,
    },
    repositoryCount: typeof search.repositoryCount === 'number' ? search.repositoryCount : 0,
    pageInfo: {
      hasNextPage: pageInfo.hasNextPage,
      endCursor: typeof pageInfo.endCursor === 'string' ? pageInfo.endCursor : null,
    },
    nodes: search.nodes,
    errors,
  };
}
