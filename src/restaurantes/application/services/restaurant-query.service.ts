import {
  Injectable,
  BadRequestException,
  NotFoundException,
  Inject,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../../../config/config.type';
import { RestaurantListing } from '../../domain/entities/restaurant-listing.entity';
import { GeoService } from '../../domain/services/geo.service';
import { GeoPoint } from '../../domain/types/geo.type';
import { RestaurantListingRepository as IRestaurantListingRepository } from '../../ports/repositories/restaurant-listing.repository.interface';
import { RESTAURANT_LISTING_REPOSITORY } from '../../tokens';
import { ListingCacheService } from '../../infrastructure/cache/listing-cache.service';
import { MetricsService } from '../../infrastructure/metrics/metrics.service';
import {
  FindRestaurantsQuery,
  FindRestaurantsResponse,
  RestaurantListingItem,
} from '../dto/find-restaurants.dto';
import { toSearchKey } from '../utils/search-key.util';

interface ListingFilters {
  priceRanges: string[];
  cuisines: string[];
  diet: string | null;
  dishes: string[];
}

interface RankedListing {
  listing: RestaurantListing;
  distanceKm: number | null;
}

@Injectable()
export class RestaurantQueryService {
  private readonly defaultLimit: number;
  private readonly searchRadiusKm: number;

  constructor(
    @Inject(RESTAURANT_LISTING_REPOSITORY)
    private readonly listingRepository: IRestaurantListingRepository,
    private readonly geoService: GeoService,
    private readonly cache: ListingCacheService,
    private readonly metricsService: MetricsService,
    configService: ConfigService<AllConfigType>,
  ) {
    this.defaultLimit = configService.getOrThrow('app.resultsLimit', {
      infer: true,
    });
    this.searchRadiusKm = configService.getOrThrow('app.searchRadiusKm', {
      infer: true,
    });
  }

  async findByCity(
    query: FindRestaurantsQuery,
  ): Promise<FindRestaurantsResponse> {
    const cityKey = toSearchKey(query.city);
    if (cityKey.length === 0) {
      // Only combining marks, nothing left after folding
      throw new BadRequestException({
        error: 'invalid_input',
        detail: 'City is required',
      });
    }

    const filters: ListingFilters = {
      priceRanges: query.price_range ?? [],
      cuisines: this.toFilterKeys('cocina', query.cocina),
      diet: query.diet ? this.toFilterKeys('diet', [query.diet])[0] : null,
      dishes: this.toFilterKeys('dish', query.dish),
    };

    const cacheKey = this.buildCacheKey(cityKey, filters, query);
    let resultados = this.cache.get(cacheKey);

    if (resultados) {
      this.metricsService.recordCacheHit();
    } else {
      this.metricsService.recordCacheMiss();
      resultados = await this.lookup(cityKey, filters, query);
      this.cache.set(cacheKey, resultados);
    }

    if (resultados.length === 0) {
      throw new NotFoundException({
        error: 'not_found',
        detail: 'No se encontraron restaurantes',
      });
    }

    return { resultados };
  }

  private async lookup(
    cityKey: string,
    filters: ListingFilters,
    query: FindRestaurantsQuery,
  ): Promise<RestaurantListingItem[]> {
    const center = query.coordenadas;
    const bounds = center
      ? this.geoService.boundingBox(center, this.searchRadiusKm)
      : undefined;

    const listings = await this.listingRepository.findByCityKey(
      cityKey,
      bounds,
    );

    const ranked = listings
      .filter((listing) => this.matches(listing, filters))
      .map((listing) => this.rank(listing, center))
      .filter(
        (item) =>
          !center ||
          (item.distanceKm !== null && item.distanceKm <= this.searchRadiusKm),
      );

    ranked.sort(center ? this.byDistance : this.byRating);

    return ranked
      .slice(0, query.limit ?? this.defaultLimit)
      .map(({ listing }) => this.toItem(listing));
  }

  private matches(
    listing: RestaurantListing,
    filters: ListingFilters,
  ): boolean {
    const { priceRanges, cuisines, diet, dishes } = filters;
    if (priceRanges.length > 0 && !priceRanges.includes(listing.priceRange)) {
      return false;
    }

    const cuisineTags = listing.cuisines.map(toSearchKey);
    if (cuisines.length > 0 && !this.containsAny(cuisineTags, cuisines)) {
      return false;
    }

    // Dietary terms are searched among every category of the listing
    const categoryTags = [
      ...cuisineTags,
      ...listing.dietary.map(toSearchKey),
    ];
    if (diet !== null && !this.containsAny(categoryTags, [diet])) {
      return false;
    }

    return (
      dishes.length === 0 ||
      this.containsAny([toSearchKey(listing.reviews)], dishes)
    );
  }

  private containsAny(haystacks: string[], needles: string[]): boolean {
    return needles.some((needle) =>
      haystacks.some((haystack) => haystack.includes(needle)),
    );
  }

  /**
   * Folds filter terms into search keys. A filter whose terms all fold to
   * nothing (e.g. only combining marks) is rejected rather than ignored.
   */
  private toFilterKeys(field: string, terms: string[] = []): string[] {
    const keys = terms.map(toSearchKey).filter((key) => key.length > 0);
    if (terms.length > 0 && keys.length === 0) {
      throw new BadRequestException({
        error: 'invalid_input',
        detail: `${field} has no searchable terms`,
      });
    }
    return keys;
  }

  private rank(listing: RestaurantListing, center?: GeoPoint): RankedListing {
    if (!center || listing.latitude === null || listing.longitude === null) {
      return { listing, distanceKm: null };
    }

    return {
      listing,
      distanceKm: this.geoService.distanceKm(center, {
        lat: listing.latitude,
        lng: listing.longitude,
      }),
    };
  }

  private byDistance(a: RankedListing, b: RankedListing): number {
    return (a.distanceKm ?? Infinity) - (b.distanceKm ?? Infinity);
  }

  private byRating(a: RankedListing, b: RankedListing): number {
    return (
      b.listing.rating - a.listing.rating ||
      a.listing.title.localeCompare(b.listing.title, 'es')
    );
  }

  private toItem(listing: RestaurantListing): RestaurantListingItem {
    return {
      titulo: listing.title,
      estrellas: listing.rating,
      rango_de_precios: listing.priceRange,
      url_maps: listing.mapsUrl,
    };
  }

  private buildCacheKey(
    cityKey: string,
    filters: ListingFilters,
    query: FindRestaurantsQuery,
  ): string {
    return JSON.stringify({
      city: cityKey,
      priceRanges: [...filters.priceRanges].sort(),
      cuisines: [...filters.cuisines].sort(),
      diet: filters.diet,
      dishes: [...filters.dishes].sort(),
      center: query.coordenadas ?? null,
      limit: query.limit ?? this.defaultLimit,
    });
  }
}
