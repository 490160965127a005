import { RestaurantListing } from '../../domain/entities/restaurant-listing.entity';
import { BoundingBox } from '../../domain/types/geo.type';

export interface RestaurantListingRepository {
  findByCityKey(
    cityKey: string,
    bounds?: BoundingBox,
  ): Promise<RestaurantListing[]>;
}
