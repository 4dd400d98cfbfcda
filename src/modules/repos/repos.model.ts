/**
 * Repos MongoDB Models
 * Repository rows, append-only star snapshots and crawl run records
 */

import mongoose, { Schema } from 'mongoose';
import { CrawlStatus } from '../crawl/crawl.types';
import { ICrawlRun, IRepoStarSnapshot, IRepositoryRecord } from './repos.types';

const RepositorySchema = new Schema<IRepositoryRecord>(
  {
    nodeId: {
      type: String,
      required: true,
      unique: true,
    },
    nameWithOwner: {
      type: String,
      required: true,
    },
    name: {
      type: String,
      required: true,
    },
    ownerLogin: {
      type: String,
      required: true,
      index: true,
    },
    description: {
      type: String,
      default: null,
    },
    primaryLanguage: {
      type: String,
      default: null,
    },
    isPrivate: {
      type: Boolean,
      default: false,
    },
    // GitHub's timestamps, not ours
    createdAt: Date,
    updatedAt: Date,
    crawledAt: {
      type: Date,
      required: true,
      index: true,
    },
  },
  { collection: 'repositories' }
);

// Snapshots are only ever inserted
const RepoStarSnapshotSchema = new Schema<IRepoStarSnapshot>(
  {
    nodeId: {
      type: String,
      required: true,
    },
    starCount: {
      type: Number,
      required: true,
      min: 0,
    },
    recordedAt: {
      type: Date,
      required: true,
    },
  },
  { collection: 'repository_stars' }
);

RepoStarSnapshotSchema.index({ nodeId: 1, recordedAt: -1 }, { unique: true });

const CrawlRunSchema = new Schema<ICrawlRun>(
  {
    startedAt: {
      type: Date,
      required: true,
    },
    finishedAt: Date,
    totalEntities: {
      type: Number,
      default: 0,
    },
    status: {
      type: String,
      enum: Object.values(CrawlStatus),
      default: CrawlStatus.RUNNING,
      index: true,
    },
    errorMessage: String,
  },
  { collection: 'crawl_runs' }
);

export const RepositoryModel = mongoose.model<IRepositoryRecord>('Repository', RepositorySchema);
export const RepoStarSnapshotModel = mongoose.model<IRepoStarSnapshot>('RepoStarSnapshot', RepoStarSnapshotSchema);
export const CrawlRunModel = mongoose.model<ICrawlRun>('CrawlRun', CrawlRunSchema);
