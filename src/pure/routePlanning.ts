/**
 * DELIVERY ROUTE LOOKUP
 *
 * A read-only collaborator of the lifecycle: once an order is assigned, the
 * delivery person gets a road route from the restaurant to the delivery
 * address. Lookup failures are returned as values so callers can show a
 * fallback message; nothing is retried or cached here.
 */

import {Coordinates, DeliveryRoute, Order} from '../domain';
import {AppEffects} from './effects';
import {RouteFailure, RouteFailureReason} from './types';
import {straightLineMeters} from './geo';
import {EitherAsync, Left, Right, Either} from 'purify-ts';

const failure = (
  orderId: string,
  reason: RouteFailureReason,
  from?: Coordinates,
  to?: Coordinates
): RouteFailure => ({
  reason,
  orderId,
  straightLineMeters: from && to ? straightLineMeters(from, to) : null,
});

export function planDeliveryRoute(
  order: Order
): (appEffects: Pick<AppEffects, 'geo' | 'restaurant'>) => Promise<Either<RouteFailure, DeliveryRoute>> {
  return async (appEffects) => {
    if (order.status !== 'assigned') return Left(failure(order.id, 'not_assigned'));

    const origin = appEffects.restaurant.location;
    const geocoded = await EitherAsync(() => appEffects.geo.geocode(order.deliveryAddress)).run();
    if (geocoded.isLeft()) return Left(failure(order.id, 'routing_unavailable'));
    const destination = geocoded.orDefault(null);
    if (!destination) return Left(failure(order.id, 'address_not_found'));

    const routed = await EitherAsync(() => appEffects.geo.route(origin, destination)).run();
    return routed.caseOf<Either<RouteFailure, DeliveryRoute>>({
      Left: () => Left(failure(order.id, 'routing_unavailable', origin, destination)),
      Right: lookup => lookup
        ? Right({orderId: order.id, origin, destination, ...lookup})
        : Left(failure(order.id, 'no_route', origin, destination)),
    });
  };
}
