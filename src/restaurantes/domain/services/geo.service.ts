import { Injectable } from '@nestjs/common';
import { BoundingBox, GeoPoint } from '../types/geo.type';

const EARTH_RADIUS_KM = 6367;
// Approximation: one degree of latitude is ~111.32 km everywhere
const KM_PER_DEGREE = 111.32;

@Injectable()
export class GeoService {
  /**
   * Great-circle (haversine) distance between two points, in kilometres.
   */
  distanceKm(from: GeoPoint, to: GeoPoint): number {
    const lat1 = this.toRadians(from.lat);
    const lat2 = this.toRadians(to.lat);
    const dLat = lat2 - lat1;
    const dLng = this.toRadians(to.lng - from.lng);

    const a =
      Math.sin(dLat / 2) ** 2 +
      Math.cos(lat1) * Math.cos(lat2) * Math.sin(dLng / 2) ** 2;

    return 2 * Math.asin(Math.sqrt(a)) * EARTH_RADIUS_KM;
  }

  /**
   * Box enclosing a circle of `radiusKm` around `center`. Degrees of
   * longitude shrink with latitude, so the box is wider in degrees than tall.
   */
  boundingBox(center: GeoPoint, radiusKm: number): BoundingBox {
    const deltaLat = radiusKm / KM_PER_DEGREE;
    const deltaLng =
      radiusKm / (KM_PER_DEGREE * Math.cos(this.toRadians(center.lat)));

    return {
      latMin: center.lat - deltaLat,
      latMax: center.lat + deltaLat,
      lngMin: center.lng - deltaLng,
      lngMax: center.lng + deltaLng,
    };
  }

  private toRadians(degrees: number): number {
    return (degrees * Math.PI) / 180;
  }
}
