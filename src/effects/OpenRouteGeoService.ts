/**
 * Geocoding through Nominatim and driving routes through OpenRouteService.
 * Both answers are validated before anything reads them.
 */

import {Coordinates} from '../domain';
import {GeoService} from '../pure/effects';
import {RouteLookup} from '../pure/types';
import {RoutingConfig} from './types';
import axios, {AxiosInstance} from 'axios';
import {z} from 'zod';

const geocodeResponse = z.array(z.object({
  lat: z.coerce.number(),
  lon: z.coerce.number(),
}));

const routeResponse = z.object({
  features: z.array(z.object({
    properties: z.object({
      summary: z.object({
        distance: z.number().default(0),
        duration: z.number().default(0),
      }),
      segments: z.array(z.object({
        steps: z.array(z.object({instruction: z.string()})).default([]),
      })).default([]),
    }),
    geometry: z.object({
      coordinates: z.array(z.tuple([z.number(), z.number()]).rest(z.number())),
    }),
  })),
});

export function parseGeocodeResponse(data: unknown): Coordinates | null {
  const parsed = geocodeResponse.safeParse(data);
  if (!parsed.success || parsed.data.length === 0) return null;
  const [best] = parsed.data;
  return {latitude: best.lat, longitude: best.lon};
}

/**
 * @return null when the answer holds no route
 * @throws Error when the answer is not a GeoJSON route collection
 */
export function parseRouteResponse(data: unknown): RouteLookup | null {
  const parsed = routeResponse.parse(data);
  if (parsed.features.length === 0) return null;
  const [feature] = parsed.features;
  return {
    distanceMeters: feature.properties.summary.distance,
    durationSeconds: feature.properties.summary.duration,
    instructions: feature.properties.segments.flatMap(segment => segment.steps.map(step => step.instruction)),
    // GeoJSON positions are [longitude, latitude]
    path: feature.geometry.coordinates.map(([longitude, latitude]) => ({latitude, longitude})),
  };
}

export class OpenRouteGeoService implements GeoService {
  private routing: AxiosInstance;
  private geocoder: AxiosInstance;

  constructor(private config: RoutingConfig) {
    this.routing = axios.create({
      baseURL: config.baseUrl,
      timeout: 30000,
      headers: {Authorization: config.apiKey},
    });
    this.geocoder = axios.create({
      baseURL: config.geocoderUrl,
      timeout: 10000,
      headers: {'User-Agent': config.userAgent},
    });
  }

  async geocode(address: string): Promise<Coordinates | null> {
    try {
      const response = await this.geocoder.get('/search', {
        params: {q: address, format: 'json', limit: 1},
      });
      return parseGeocodeResponse(response.data);
    } catch (error) {
      console.error('Geocoding failed:', error);
      throw new Error('Geocoding service unavailable');
    }
  }

  async route(from: Coordinates, to: Coordinates): Promise<RouteLookup | null> {
    if (!this.config.apiKey) {
      throw new Error('Routing service not configured');
    }

    try {
      const response = await this.routing.post('/v2/directions/driving-car/geojson', {
        coordinates: [
          [from.longitude, from.latitude],
          [to.longitude, to.latitude],
        ],
      });
      return parseRouteResponse(response.data);
    } catch (error) {
      console.error('Failed to fetch delivery route:', error);
      throw new Error('Routing service unavailable');
    }
  }
}
