/**
 * Repos Module Types
 */

/**
 * A GitHub repository as observed by one search page.
 * Frozen on construction; a later observation is a new value.
 */
export interface Repo {
  readonly nodeId: string;
  readonly nameWithOwner: string;
  readonly name: string;
  readonly ownerLogin: string;
  readonly description: string | null;
  readonly primaryLanguage: string | null;
  readonly isPrivate: boolean;
  readonly starCount: number;
  readonly createdAt: Date | null;
  readonly updatedAt: Date | null;
}

export function createRepo(fields: Repo): Repo {
  return Object.freeze({ ...fields });
}

export const repoKey = (repo: Repo): string => repo.nodeId;

/**
 * Latest snapshot per repository
 */
export interface LatestStarCount {
  nodeId: string;
  nameWithOwner: string;
  ownerLogin: string;
  name: string;
  starCount: number;
  recordedAt: Date;
}

// ============================================================================
// Persisted shapes
// ============================================================================

export interface IRepositoryRecord {
  nodeId: string;
  nameWithOwner: string;
  name: string;
  ownerLogin: string;
  description: string | null;
  primaryLanguage: string | null;
  isPrivate: boolean;
  createdAt: Date | null;
  updatedAt: Date | null;
  crawledAt: Date;
}

export interface IRepoStarSnapshot {
  nodeId: string;
  starCount: number;
  recordedAt: Date;
}

export interface ICrawlRun {
  startedAt: Date;
  finishedAt?: Date;
  totalEntities: number;
  status: string;
  errorMessage?: string;
}
