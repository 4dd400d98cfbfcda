/**
 * Repos Repository
 * MongoDB persistence for crawled repositories
 */

import { IRunStorage, CrawlStatus, FinalCrawlStatus } from '../crawl/crawl.types';
import { CrawlRunModel, RepoStarSnapshotModel, RepositoryModel } from './repos.model';
import { LatestStarCount, Repo } from './repos.types';

const DUPLICATE_KEY_CODE = 11000;

/**
 * True when every failure in a (bulk) write is a unique-index violation
 */
export function isDuplicateKeyError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) {
    return false;
  }

  if ('writeErrors' in error && Array.isArray(error.writeErrors) && error.writeErrors.length > 0) {
    return error.writeErrors.every(
      (writeError: unknown) =>
        typeof writeError === 'object' &&
        writeError !== null &&
        'code' in writeError &&
        writeError.code === DUPLICATE_KEY_CODE
    );
  }

  return 'code' in error && error.code === DUPLICATE_KEY_CODE;
}

export class MongoRepoStorage implements IRunStorage<Repo> {
  /**
   * Create a crawl run record. Returns the run ID.
   */
  async createRun(): Promise<string> {
    const run = await CrawlRunModel.create({
      startedAt: new Date(),
      status: CrawlStatus.RUNNING,
      totalEntities: 0,
    });
    const runId = String(run._id);
    console.debug(`Repository: created crawl run ${runId}`);
    return runId;
  }

  /**
   * Insert new repositories or update existing ones, and record one star
   * snapshot per repository at `recordedAt`. Re-applying a batch never
   * duplicates a repository; re-applying it with the same `recordedAt`
   * leaves the snapshots unchanged.
   */
  async upsertBatch(repos: Repo[], recordedAt: Date = new Date()): Promise<void> {
    if (repos.length === 0) {
      return;
    }

    await RepositoryModel.bulkWrite(
      repos.map((repo) => ({
        updateOne: {
          filter: { nodeId: repo.nodeId },
          update: {
            $set: {
              nameWithOwner: repo.nameWithOwner,
              name: repo.name,
              ownerLogin: repo.ownerLogin,
              description: repo.description,
              primaryLanguage: repo.primaryLanguage,
              isPrivate: repo.isPrivate,
              createdAt: repo.createdAt,
              updatedAt: repo.updatedAt,
              crawledAt: recordedAt,
            },
          },
          upsert: true,
        },
      })),
      { ordered: false }
    );

    try {
      await RepoStarSnapshotModel.bulkWrite(
        repos.map((repo) => ({
          updateOne: {
            filter: { nodeId: repo.nodeId, recordedAt },
            update: { $setOnInsert: { starCount: repo.starCount } },
            upsert: true,
          },
        })),
        { ordered: false }
      );
    } catch (error: unknown) {
      // Two writers upserting the same (nodeId, recordedAt) race on the unique index
      if (!isDuplicateKeyError(error)) {
        throw error;
      }
      console.debug(`Repository: ignored duplicate star snapshots for ${repos.length} repos`);
    }

    console.debug(`Repository: upserted ${repos.length} repos`);
  }

  /**
   * Mark a crawl run as complete with final stats
   */
  async finishRun(runId: string, total: number, status: FinalCrawlStatus, error?: string): Promise<void> {
    await CrawlRunModel.updateOne(
      { _id: runId },
      {
        $set: {
          finishedAt: new Date(),
          totalEntities: total,
          status,
          errorMessage: error,
        },
      }
    );
    console.debug(`Repository: finished crawl run ${runId} | status=${status} | total=${total}`);
  }

  /**
   * Latest star count per repository, highest first
   */
  async *streamLatestStarCounts(): AsyncGenerator<LatestStarCount> {
    const cursor = RepoStarSnapshotModel.aggregate<LatestStarCount>([
      { $sort: { nodeId: 1, recordedAt: -1 } },
      {
        $group: {
          _id: '$nodeId',
          starCount: { $first: '$starCount' },
          recordedAt: { $first: '$recordedAt' },
        },
      },
      {
        $lookup: {
          from: RepositoryModel.collection.name,
          localField: '_id',
          foreignField: 'nodeId',
          as: 'repository',
        },
      },
      { $unwind: '$repository' },
      {
        $project: {
          _id: 0,
          nodeId: '$_id',
          nameWithOwner: '$repository.nameWithOwner',
          ownerLogin: '$repository.ownerLogin',
          name: '$repository.name',
          starCount: 1,
          recordedAt: 1,
        },
      },
      { $sort: { starCount: -1, nodeId: 1 } },
    ])
      .allowDiskUse(true)
      .cursor<LatestStarCount>();

    for await (const row of cursor) {
      yield row;
    }
  }
}

export const repoStorage = new MongoRepoStorage();
