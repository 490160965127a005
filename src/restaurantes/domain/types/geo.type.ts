export interface GeoPoint {
  lat: number;
  lng: number;
}

export interface BoundingBox {
  latMin: number;
  latMax: number;
  lngMin: number;
  lngMax: number;
}
