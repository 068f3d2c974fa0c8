import {Coordinates} from '../domain';
import {RouteFailure} from './types';

const EARTH_RADIUS_METERS = 6_371_008.8;

const toRadians = (degrees: number) => degrees * Math.PI / 180;

/**
 * Great-circle distance, used when no road route is available.
 */
export function straightLineMeters(from: Coordinates, to: Coordinates): number {
  const dLat = toRadians(to.latitude - from.latitude);
  const dLon = toRadians(to.longitude - from.longitude);
  const a = Math.sin(dLat / 2) ** 2 +
    Math.cos(toRadians(from.latitude)) * Math.cos(toRadians(to.latitude)) * Math.sin(dLon / 2) ** 2;
  return Math.round(2 * EARTH_RADIUS_METERS * Math.asin(Math.sqrt(a)));
}

export function describeRouteFailure(failure: RouteFailure): string {
  const base = failure.reason === 'not_assigned'
    ? `Order ${failure.orderId} has no assigned delivery yet.`
    : 'Route information is currently unavailable. Please follow the delivery address.';
  if (failure.straightLineMeters === null) return base;
  return `${base} Straight-line distance: ${(failure.straightLineMeters / 1000).toFixed(2)} km.`;
}
