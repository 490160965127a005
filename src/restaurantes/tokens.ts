// Injection tokens for repository interfaces
export const RESTAURANT_LISTING_REPOSITORY = Symbol(
  'RestaurantListingRepository',
);
