/**
 * Crawl Integration Tests
 * Client, orchestrator and service wired together against a scripted
 * GraphQL endpoint and in-memory storage.
 */

import { CrawlOrchestrator, InMemoryDeduplicator, MultiDimensionalQueryPartitioner } from '../../lib/crawling';
import { GitHubSearchClient } from '../../modules/github/github.client';
import { isRecord } from '../../modules/github/github.mapper';
import { CrawlService } from '../../modules/crawl/crawl.service';
import { CrawlStatus } from '../../modules/crawl/crawl.types';
import { Repo, repoKey } from '../../modules/repos/repos.types';
import { InMemoryRunStorage } from '../helpers/mocks';
import { jsonResponse, searchBody, searchNode } from '../helpers/fixtures';

type Route = (after: string | null) => Response;

const ROUTES: Record<string, Route> = {
  'language:Go': (after) =>
    after === null
      ? jsonResponse(searchBody({ nodes: [searchNode('R_1'), searchNode('R_2')], hasNextPage: true, endCursor: 'go-2' }))
      : jsonResponse(searchBody({ nodes: [searchNode('R_3')], hasNextPage: false })),
  'language:Rust': () => jsonResponse(searchBody({ nodes: [searchNode('R_2'), searchNode('R_4')], hasNextPage: false })),
};

function variablesOf(init?: RequestInit): { query: string; after: string | null } {
  const payload: unknown = JSON.parse(String(init?.body));
  if (!isRecord(payload) || !isRecord(payload.variables)) {
    throw new Error('unexpected request payload');
  }
  const { query, after } = payload.variables;
  return { query: String(query), after: typeof after === 'string' ? after : null };
}

describe('Crawl Integration Tests', () => {
  let client: GitHubSearchClient;
  let storage: InMemoryRunStorage<Repo>;
  let routes: Record<string, Route>;

  beforeEach(() => {
    routes = { ...ROUTES };
    storage = new InMemoryRunStorage<Repo>();
    client = new GitHubSearchClient({
      token: 'test-secret',
      endpoint: 'https://github.test/graphql',
      maxRetries: 2,
      retryBaseDelayMs: 1,
      sleep: async () => undefined,
      fetchImpl: async (_input, init) => {
        const { query, after } = variablesOf(init);
        const route = routes[query];
        return route ? route(after) : jsonResponse(searchBody());
      },
    });
  });

  afterEach(() => {
    client.shutdown();
  });

  function createService(): CrawlService<Repo> {
    const partitioner = new MultiDimensionalQueryPartitioner([
      { name: 'languages', values: ['language:Go', 'language:Rust'] },
    ]);
    const orchestrator = new CrawlOrchestrator<Repo>(client, partitioner, new InMemoryDeduplicator<Repo>(repoKey), {
      maxConcurrency: 2,
      chunkMultiplier: 2,
      sleep: async () => undefined,
    });
    return new CrawlService<Repo>(orchestrator, storage);
  }

  it('should persist every distinct repository once', async () => {
    const result = await createService().execute(100);

    expect(result).toMatchObject({ status: CrawlStatus.SUCCESS, totalEntities: 4 });
    expect(storage.persisted.map(repoKey).sort()).toEqual(['R_1', 'R_2', 'R_3', 'R_4']);
  });

  it('should stop at the target', async () => {
    const result = await createService().execute(3);

    expect(result).toMatchObject({ status: CrawlStatus.SUCCESS, totalEntities: 3 });
    const keys = storage.persisted.map(repoKey);
    expect(keys).toHaveLength(3);
    expect(new Set(keys).size).toBe(3);
  });

  it('should keep crawling when one query is rejected', async () => {
    routes['language:Rust'] = () => new Response('Bad credentials', { status: 401 });

    const result = await createService().execute(100);

    expect(result).toMatchObject({ status: CrawlStatus.SUCCESS, totalEntities: 3 });
    expect(storage.persisted.map(repoKey).sort()).toEqual(['R_1', 'R_2', 'R_3']);
  });
});
