import { Injectable } from '@nestjs/common';
import { LookupOutcome } from '../../domain/types/lookup-outcome.type';

export interface RestaurantesMetrics {
  lookups: Record<LookupOutcome, number>;
  rateLimited: number;
  cache: {
    hits: number;
    misses: number;
  };
  lookupTime: {
    p95: number | null;
    samples: number;
  };
}

@Injectable()
export class MetricsService {
  private lookups: Record<LookupOutcome, number> = this.emptyLookups();
  private rateLimited = 0;
  private cacheHits = 0;
  private cacheMisses = 0;

  private lookupTimes: number[] = [];

  // Maximum samples to keep in memory (oldest dropped first)
  private readonly MAX_SAMPLES = 1000;

  /**
   * Resets all in-memory counters and samples. The service is a stateful
   * singleton, so tests call this between cases.
   */
  reset(): void {
    this.lookups = this.emptyLookups();
    this.rateLimited = 0;
    this.cacheHits = 0;
    this.cacheMisses = 0;
    this.lookupTimes = [];
  }

  recordLookup(outcome: LookupOutcome): void {
    this.lookups[outcome]++;
  }

  recordRateLimited(): void {
    this.rateLimited++;
  }

  recordCacheHit(): void {
    this.cacheHits++;
  }

  recordCacheMiss(): void {
    this.cacheMisses++;
  }

  recordLookupTime(ms: number): void {
    this.lookupTimes.push(ms);
    if (this.lookupTimes.length > this.MAX_SAMPLES) {
      this.lookupTimes.shift();
    }
  }

  getMetrics(): RestaurantesMetrics {
    return {
      lookups: { ...this.lookups },
      rateLimited: this.rateLimited,
      cache: {
        hits: this.cacheHits,
        misses: this.cacheMisses,
      },
      lookupTime: {
        p95: this.calculateP95(this.lookupTimes),
        samples: this.lookupTimes.length,
      },
    };
  }

  private emptyLookups(): Record<LookupOutcome, number> {
    return { found: 0, not_found: 0, invalid_input: 0, error: 0 };
  }

  private calculateP95(values: number[]): number | null {
    if (values.length < 20) {
      // Too few samples for a meaningful percentile
      return null;
    }

    const sorted = [...values].sort((a, b) => a - b);
    const index = Math.ceil(sorted.length * 0.95) - 1;
    return sorted[index];
  }
}
