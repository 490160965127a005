import {
  Entity,
  PrimaryColumn,
  Column,
  Index,
  CreateDateColumn,
  UpdateDateColumn,
} from 'typeorm';

@Entity('restaurant_listings')
export class RestaurantListing {
  @PrimaryColumn()
  id!: string;

  @Column()
  city!: string; // Display name, as listed

  @Index()
  @Column()
  cityKey!: string; // Normalised city used for lookups

  @Column()
  title!: string;

  @Column({ type: 'real' })
  rating!: number;

  @Column()
  priceRange!: string;

  @Column()
  mapsUrl!: string;

  @Column('simple-array')
  cuisines!: string[];

  @Column('simple-array')
  dietary!: string[]; // e.g. vegetariano, sin gluten

  @Column({ type: 'text', default: '' })
  reviews!: string; // Review excerpts searched by dish

  @Column({ type: 'real', nullable: true })
  latitude!: number | null;

  @Column({ type: 'real', nullable: true })
  longitude!: number | null;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
