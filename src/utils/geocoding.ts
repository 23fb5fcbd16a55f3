/**
 * Geo Utilities
 *
 * This file handles all location-related calculations and API calls:
 * - Haversine formula for straight-line distance (pure, no API needed)
 * - Bounding boxes used as a cheap pre-filter before exact distances
 * - Converting addresses to coordinates (geocoding) and back
 *
 * Two geocoding implementations are provided:
 * 1. GoogleMapsService - Uses @googlemaps/google-maps-services-js (requires API key)
 * 2. MockGeocodingService - Returns deterministic fake data (no API needed)
 */

import { Client, Status } from '@googlemaps/google-maps-services-js';
import { Coordinates, GeocodedLocation } from '../models/types';

// =============================================================================
// SERVICE INTERFACE
// =============================================================================

/**
 * Any service that can convert addresses to/from coordinates.
 */
export interface GeocodingService {
  geocode(address: string): Promise<GeocodedLocation>;
  reverseGeocode(coordinates: Coordinates): Promise<GeocodedLocation>;
}

// =============================================================================
// HAVERSINE FORMULA
// Calculates the "as the crow flies" distance between two points on Earth.
// Only used for ranking, so road distance is never needed.
// =============================================================================

const EARTH_RADIUS_KM = 6371.0;

const toRad = (deg: number): number => deg * Math.PI / 180;

/**
 * Straight-line distance between two coordinates in kilometres.
 * Symmetric, never negative, and zero for identical inputs.
 *
 * @example
 * const distance = haversineDistance(
 *   { lat: 51.5074, lng: -0.1278 },  // Charing Cross
 *   { lat: 51.5155, lng: -0.0922 }   // Bank
 * );
 * // ≈ 2.6 km
 */
export function haversineDistance(coord1: Coordinates, coord2: Coordinates): number {
  const lat1Rad = toRad(coord1.lat);
  const lat2Rad = toRad(coord2.lat);
  const deltaLat = toRad(coord2.lat - coord1.lat);
  const deltaLng = toRad(coord2.lng - coord1.lng);

  const a = Math.sin(deltaLat / 2) * Math.sin(deltaLat / 2) +
            Math.cos(lat1Rad) * Math.cos(lat2Rad) *
            Math.sin(deltaLng / 2) * Math.sin(deltaLng / 2);

  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));

  return EARTH_RADIUS_KM * c;
}

// =============================================================================
// BOUNDING BOXES
// Degree-aligned boxes a store can filter on with plain range comparisons.
// =============================================================================

export interface BoundingBox {
  minLat: number;
  maxLat: number;
  minLng: number;
  maxLng: number;
}

/**
 * Smallest degree box guaranteed to contain every point within `radiusKm`
 * of `center`. Longitude spans the full circle near the poles.
 */
export function boundingBoxAround(center: Coordinates, radiusKm: number): BoundingBox {
  const latDelta = (radiusKm / EARTH_RADIUS_KM) * (180 / Math.PI);
  const minLat = Math.max(-90, center.lat - latDelta);
  const maxLat = Math.min(90, center.lat + latDelta);

  const cosLat = Math.cos(toRad(Math.max(Math.abs(minLat), Math.abs(maxLat))));
  if (cosLat < 1e-6 || minLat === -90 || maxLat === 90) {
    return { minLat, maxLat, minLng: -180, maxLng: 180 };
  }

  const lngDelta = latDelta / cosLat;
  if (lngDelta >= 180) {
    return { minLat, maxLat, minLng: -180, maxLng: 180 };
  }

  return {
    minLat,
    maxLat,
    minLng: center.lng - lngDelta,
    maxLng: center.lng + lngDelta
  };
}

/**
 * Check whether a point is inside a bounding box.
 * Boxes crossing the antimeridian (minLng < -180 or maxLng > 180) wrap.
 */
export function isInsideBoundingBox(point: Coordinates, box: BoundingBox): boolean {
  if (point.lat < box.minLat || point.lat > box.maxLat) return false;

  const candidates = [point.lng, point.lng - 360, point.lng + 360];
  return candidates.some(lng => lng >= box.minLng && lng <= box.maxLng);
}

// =============================================================================
// GOOGLE MAPS SERVICE
// Uses the official @googlemaps/google-maps-services-js client.
// Requires a valid API key with the Geocoding API enabled.
// =============================================================================

export class GoogleMapsService implements GeocodingService {
  private client: Client;
  private apiKey: string;

  constructor(apiKey: string) {
    this.apiKey = apiKey;
    this.client = new Client();
  }

  /**
   * Convert a free-text address to coordinates.
   */
  async geocode(address: string): Promise<GeocodedLocation> {
    const res = await this.client.geocode({
      params: { address, key: this.apiKey },
    });

    const result = res.data.results?.[0];
    if (res.data.status !== Status.OK || !result) {
      throw new Error(
        `Geocoding failed: ${res.data.status} - ${res.data.error_message || 'No results found'}`
      );
    }

    return {
      coordinates: {
        lat: result.geometry.location.lat,
        lng: result.geometry.location.lng,
      },
      formattedAddress: result.formatted_address,
      postcode: this.findPostcode(result.address_components ?? []),
    };
  }

  /**
   * Convert coordinates to a street address.
   */
  async reverseGeocode(coordinates: Coordinates): Promise<GeocodedLocation> {
    const res = await this.client.reverseGeocode({
      params: { latlng: coordinates, key: this.apiKey },
    });

    const result = res.data.results?.[0];
    if (res.data.status !== Status.OK || !result) {
      throw new Error(`Reverse geocoding failed: ${res.data.status}`);
    }

    return {
      coordinates,
      formattedAddress: result.formatted_address,
      postcode: this.findPostcode(result.address_components ?? []),
    };
  }

  /**
   * Pull the postal code out of Google's address_components array.
   */
  private findPostcode(
    components: Array<{ types: readonly string[] | string[]; long_name: string }>
  ): string {
    const component = components.find(c => c.types.includes('postal_code'));
    return component?.long_name || '';
  }
}

// =============================================================================
// MOCK GEOCODING SERVICE
// Fake implementation for development and tests without API calls.
// Same input always produces the same output.
// =============================================================================

export class MockGeocodingService implements GeocodingService {

  /**
   * Return fake coordinates for any address.
   * Uses a hash of the address so different addresses land in different spots.
   */
  async geocode(address: string): Promise<GeocodedLocation> {
    const hash = this.simpleHash(address.trim().toLowerCase());

    // Greater London, roughly 51.3 to 51.7 lat, -0.5 to 0.2 lng
    const lat = 51.3 + (hash % 400) / 1000;
    const lng = -0.5 + (hash % 700) / 1000;

    return {
      coordinates: { lat, lng },
      formattedAddress: address.trim(),
      postcode: this.fakePostcode(hash)
    };
  }

  /**
   * Return a fake address for any coordinates.
   */
  async reverseGeocode(coordinates: Coordinates): Promise<GeocodedLocation> {
    const hash = this.simpleHash(`${coordinates.lat.toFixed(4)},${coordinates.lng.toFixed(4)}`);
    return {
      coordinates,
      formattedAddress: `${(hash % 200) + 1} Mock Street, London`,
      postcode: this.fakePostcode(hash)
    };
  }

  private fakePostcode(hash: number): string {
    return `E${(hash % 20) + 1} ${(hash % 9) + 1}AA`;
  }

  /**
   * Simple hash function to generate consistent fake data.
   */
  private simpleHash(str: string): number {
    let hash = 0;
    for (let i = 0; i < str.length; i++) {
      const char = str.charCodeAt(i);
      hash = ((hash << 5) - hash) + char;
      hash = hash & hash; // Convert to 32-bit integer
    }
    return Math.abs(hash);
  }
}
