/**
 * Crawling Statistics Tracker
 * Per-run counters for the crawl orchestrator
 */

import { CrawlingStatistics } from './crawling.types';

export class CrawlingStatisticsTracker {
  private startTime: number;
  private queriesTotal: number = 0;
  private queriesCompleted: number = 0;
  private queriesAbandoned: number = 0;
  private chunksProcessed: number = 0;
  private pagesFetched: number = 0;
  private entitiesFetched: number = 0;
  private freshEntities: number = 0;
  private cooldowns: number = 0;

  constructor() {
    this.startTime = Date.now();
  }

  recordQueries(count: number): void {
    this.queriesTotal += count;
  }

  /**
   * Record a fetched page and how many of its entities were fresh
   */
  recordPage(entities: number, fresh: number): void {
    this.pagesFetched++;
    this.entitiesFetched += entities;
    this.freshEntities += fresh;
  }

  recordQueryCompleted(): void {
    this.queriesCompleted++;
  }

  recordQueryAbandoned(): void {
    this.queriesAbandoned++;
  }

  recordChunk(): void {
    this.chunksProcessed++;
  }

  recordCooldown(): void {
    this.cooldowns++;
  }

  /**
   * Get final statistics
   */
  getStatistics(): CrawlingStatistics {
    return {
      queriesTotal: this.queriesTotal,
      queriesCompleted: this.queriesCompleted,
      queriesAbandoned: this.queriesAbandoned,
      chunksProcessed: this.chunksProcessed,
      pagesFetched: this.pagesFetched,
      entitiesFetched: this.entitiesFetched,
      freshEntities: this.freshEntities,
      duplicatesDetected: this.entitiesFetched - this.freshEntities,
      cooldowns: this.cooldowns,
      totalTime: Date.now() - this.startTime,
    };
  }
}
