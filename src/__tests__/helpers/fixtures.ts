/**
 * Test Fixtures
 * Reusable test data
 */

import { Repo, createRepo } from '../../modules/repos/repos.types';

export function makeRepo(nodeId: string, overrides: Partial<Repo> = {}): Repo {
  return createRepo({
    nodeId,
    nameWithOwner: `octo/${nodeId}`,
    name: nodeId,
    ownerLogin: 'octo',
    description: null,
    primaryLanguage: 'TypeScript',
    isPrivate: false,
    starCount: 10,
    createdAt: new Date('2020-01-01T00:00:00Z'),
    updatedAt: new Date('2024-06-01T00:00:00Z'),
    ...overrides,
  });
}

/**
 * A search node as GitHub returns it
 */
export function searchNode(id: string, stars: number = 10): Record<string, unknown> {
  return {
    id,
    nameWithOwner: `octo/${id}`,
    name: id,
    owner: { login: 'octo' },
    description: `Repository ${id}`,
    primaryLanguage: { name: 'Go' },
    isPrivate: false,
    stargazerCount: stars,
    createdAt: '2021-03-04T05:06:07Z',
    updatedAt: '2024-01-02T03:04:05Z',
  };
}

export function searchBody(options: {
  nodes?: unknown[];
  hasNextPage?: boolean;
  endCursor?: string | null;
  remaining?: number;
  repositoryCount?: number;
  errors?: unknown[];
} = {}): Record<string, unknown> {
  const body: Record<string, unknown> = {
    data: {
      rateLimit: { remaining: options.remaining ?? 4000, resetAt: '2030-01-01T00:00:00Z', cost: 1 },
      search: {
        repositoryCount: options.repositoryCount ?? (options.nodes ?? []).length,
        pageInfo: {
          hasNextPage: options.hasNextPage ?? false,
          endCursor: options.endCursor ?? null,
        },
        nodes: options.nodes ?? [],
      },
    },
  };
  if (options.errors) {
    body.errors = options.errors;
  }
  return body;
}

export function jsonResponse(body: unknown, status: number = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json', ...headers },
  });
}
