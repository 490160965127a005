import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository, Between, FindOptionsWhere } from 'typeorm';
import { RestaurantListing } from '../../../domain/entities/restaurant-listing.entity';
import { BoundingBox } from '../../../domain/types/geo.type';
import { RestaurantListingRepository as IRestaurantListingRepository } from '../../../ports/repositories/restaurant-listing.repository.interface';

@Injectable()
export class RestaurantListingRepository
  implements IRestaurantListingRepository
{
  constructor(
    @InjectRepository(RestaurantListing)
    private readonly repository: Repository<RestaurantListing>,
  ) {}

  async findByCityKey(
    cityKey: string,
    bounds?: BoundingBox,
  ): Promise<RestaurantListing[]> {
    const where: FindOptionsWhere<RestaurantListing> = { cityKey };

    if (bounds) {
      // Rows without coordinates never satisfy BETWEEN, so they drop out here
      where.latitude = Between(bounds.latMin, bounds.latMax);
      where.longitude = Between(bounds.lngMin, bounds.lngMax);
    }

    return this.repository.find({
      where,
      order: {
        rating: 'DESC',
        title: 'ASC',
      },
    });
  }
}
