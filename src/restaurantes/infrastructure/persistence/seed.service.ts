import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository, DataSource } from 'typeorm';
import { RestaurantListing } from '../../domain/entities/restaurant-listing.entity';
import { ListingSeedFileSchema } from '../../application/dto/listing-seed.dto';
import { toSearchKey } from '../../application/utils/search-key.util';
import listingsData from './data/listings.json';

@Injectable()
export class SeedService {
  constructor(
    @InjectRepository(RestaurantListing)
    private readonly listingRepository: Repository<RestaurantListing>,
    private readonly dataSource: DataSource,
  ) {}

  /**
   * Loads the bundled listings when the table is empty.
   * Returns the number of rows inserted.
   */
  async seed(): Promise<number> {
    const existing = await this.listingRepository.count();
    if (existing > 0) {
      return 0; // Already seeded
    }

    const seeds = ListingSeedFileSchema.parse(listingsData);

    // Use transaction for atomicity
    const queryRunner = this.dataSource.createQueryRunner();
    await queryRunner.connect();
    await queryRunner.startTransaction();

    try {
      for (const seed of seeds) {
        const listing = this.listingRepository.create({
          ...seed,
          cityKey: toSearchKey(seed.city),
        });
        await queryRunner.manager.save(listing);
      }

      await queryRunner.commitTransaction();
    } catch (error) {
      await queryRunner.rollbackTransaction();
      throw error;
    } finally {
      await queryRunner.release();
    }

    return seeds.length;
  }
}
