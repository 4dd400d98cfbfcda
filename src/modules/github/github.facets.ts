/**
 * Repository search facets
 * language × stars × created-year, with the year dropped for fallback
 * queries (repos without creation metadata match no year bucket).
 */

import {
  MultiDimensionalQueryPartitioner,
  QueryDimension,
  RangeBand,
  buildRangeBuckets,
  buildYearBuckets,
} from '../../lib/crawling/query-partitioner';
import facets from './search-facets.json';

export interface SearchFacets {
  languages: string[];
  stars: { openAbove?: number; bands: RangeBand[] };
  created?: { fromYear: number; toYear: number };
}

export const defaultSearchFacets: SearchFacets = facets;

/**
 * Language qualifiers; names with spaces are quoted
 */
export function buildLanguageValues(languages: readonly string[]): string[] {
  return languages.map((language) => (language.includes(' ') ? `language:"${language}"` : `language:${language}`));
}

export function buildSearchDimensions(config: SearchFacets = defaultSearchFacets): QueryDimension[] {
  const dimensions: QueryDimension[] = [
    { name: 'languages', values: buildLanguageValues(config.languages) },
    { name: 'star ranges', values: buildRangeBuckets('stars', config.stars.bands, config.stars.openAbove) },
  ];

  if (config.created) {
    dimensions.push({
      name: 'years',
      values: buildYearBuckets('created', config.created.fromYear, config.created.toYear),
      droppable: true,
    });
  }

  return dimensions;
}

export function createRepoSearchPartitioner(config: SearchFacets = defaultSearchFacets): MultiDimensionalQueryPartitioner {
  return new MultiDimensionalQueryPartitioner(buildSearchDimensions(config));
}
