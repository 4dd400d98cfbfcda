/**
 * Crawling System
 * Main export file for the crawl orchestration core
 */

export * from './crawling.types';
export * from './duplicate-detector';
export * from './stop-signal';
export * from './query-partitioner';
export * from './crawling-statistics';
export * from './crawl-orchestrator';
