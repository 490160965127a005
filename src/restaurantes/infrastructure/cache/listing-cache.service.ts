import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { addSeconds, isBefore } from 'date-fns';
import { AllConfigType } from '../../../config/config.type';
import { RestaurantListingItem } from '../../application/dto/find-restaurants.dto';

interface CacheEntry {
  items: RestaurantListingItem[];
  expiresAt: Date;
}

/**
 * In-memory TTL cache of lookup results, keyed by the normalised request.
 * Capacity is bounded; once full the oldest entry is evicted first.
 */
@Injectable()
export class ListingCacheService {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly ttlSeconds: number;
  private readonly maxEntries: number;

  constructor(configService: ConfigService<AllConfigType>) {
    this.ttlSeconds = configService.getOrThrow('app.cacheTtlSeconds', {
      infer: true,
    });
    this.maxEntries = configService.getOrThrow('app.cacheMaxEntries', {
      infer: true,
    });
  }

  get(key: string): RestaurantListingItem[] | null {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }

    if (!isBefore(new Date(), entry.expiresAt)) {
      this.entries.delete(key);
      return null;
    }

    return entry.items;
  }

  set(key: string, items: RestaurantListingItem[]): void {
    // Re-inserting moves the key to the newest position
    this.entries.delete(key);
    this.entries.set(key, {
      items,
      expiresAt: addSeconds(new Date(), this.ttlSeconds),
    });

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
