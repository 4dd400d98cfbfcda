/**
 * Query Partitioner
 * Splits an unbounded search space into many queries that each stay under
 * the API's per-query result cap.
 *
 * The partition is static: result counts are never observed, so a bucket
 * that still exceeds the cap is truncated by the API rather than re-split.
 */

import { IQueryPartitioner } from './crawling.types';

/**
 * One facet of the search space
 */
export interface QueryDimension {
  name: string;

  /**
   * Qualifier strings, e.g. `language:Go` or `stars:10..19`
   */
  values: readonly string[];

  /**
   * Metadata for this facet is often missing upstream. Fallback queries
   * leave it out to catch records no fine-grained value matches.
   */
  droppable?: boolean;
}

/**
 * Numeric band walked from `to` down to `from` in `step`-sized buckets
 */
export interface RangeBand {
  from: number;
  to: number;
  step: number;
}

export interface PartitionerOptions {
  separator?: string;
  fallback?: boolean;
}

export class MultiDimensionalQueryPartitioner implements IQueryPartitioner {
  private readonly dimensions: QueryDimension[];
  private readonly separator: string;
  private readonly fallback: boolean;

  constructor(dimensions: QueryDimension[], options: PartitionerOptions = {}) {
    // A facet without values does not partition anything
    this.dimensions = dimensions.filter((dimension) => dimension.values.length > 0);
    this.separator = options.separator ?? ' ';
    this.fallback = options.fallback ?? true;
  }

  /**
   * Primary queries (every dimension combined) followed by fallback
   * queries with the droppable dimensions removed.
   */
  generate(): string[] {
    if (this.dimensions.length === 0) {
      return [];
    }

    const queries = new Set<string>(this.combine(this.dimensions));

    const kept = this.dimensions.filter((dimension) => !dimension.droppable);
    if (this.fallback && kept.length > 0 && kept.length < this.dimensions.length) {
      for (const query of this.combine(kept)) {
        queries.add(query);
      }
    }

    return Array.from(queries);
  }

  /**
   * Describe the partition for logging
   */
  describe(): string {
    return this.dimensions
      .map((dimension) => `${dimension.values.length} ${dimension.name}${dimension.droppable ? ' (droppable)' : ''}`)
      .join(' × ');
  }

  private combine(dimensions: QueryDimension[]): string[] {
    let combinations: string[][] = [[]];

    for (const dimension of dimensions) {
      const next: string[][] = [];
      for (const prefix of combinations) {
        for (const value of dimension.values) {
          next.push([...prefix, value]);
        }
      }
      combinations = next;
    }

    return combinations.map((parts) => parts.join(this.separator));
  }
}

/**
 * Density-adaptive numeric buckets, highest first.
 * `openAbove` adds a `field:>N` bucket on top; a band with step 1 emits
 * exact values (`field:N`), wider steps emit `field:lo..hi`.
 */
export function buildRangeBuckets(field: string, bands: readonly RangeBand[], openAbove?: number): string[] {
  const buckets: string[] = [];

  if (openAbove !== undefined) {
    buckets.push(`${field}:>${openAbove}`);
  }

  const ordered = [...bands].sort((a, b) => b.to - a.to);
  for (const band of ordered) {
    if (band.step < 1 || band.to < band.from) {
      throw new Error(`Invalid range band for ${field}: ${band.from}..${band.to} step ${band.step}`);
    }

    for (let hi = band.to; hi >= band.from; hi -= band.step) {
      const lo = Math.max(band.from, hi - band.step + 1);
      buckets.push(lo === hi ? `${field}:${hi}` : `${field}:${lo}..${hi}`);
    }
  }

  return buckets;
}

/**
 * One bucket per calendar year, newest first, plus everything before `fromYear`
 */
export function buildYearBuckets(field: string, fromYear: number, toYear: number): string[] {
  const buckets: string[] = [];

  for (let year = toYear; year >= fromYear; year--) {
    buckets.push(`${field}:${year}-01-01..${year}-12-31`);
  }
  buckets.push(`${field}:<${fromYear}-01-01`);

  return buckets;
}
