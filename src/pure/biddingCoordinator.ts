/**
 * BIDDING COORDINATOR
 *
 * Submission and resolution both lock the order row, so a resolution can
 * never interleave with a submission or with another resolution. The state
 * guard then lets exactly one resolution through.
 */

import {Bid, Order} from '../domain';
import {AppEffects} from './effects';
import {BidSelection, OrderingError} from './types';
import {placeBid, resolveBids, sortBids} from './bidding';
import {notFound} from './errors';
import {buildAnalyticsEvent, buildAssignmentEmail} from './businessLogic';
import {performFollowUps} from './followUps';
import {Either, Left, Right} from 'purify-ts';

export function submitBid(
  orderId: string,
  deliveryPersonId: string,
  amount: number
): (appEffects: AppEffects) => Promise<Either<OrderingError, Bid>> {
  return async (appEffects: AppEffects) => {
    const deliveryPerson = await appEffects.deliveryPeople.getById(deliveryPersonId);
    if (!deliveryPerson) return Left(notFound('delivery person', deliveryPersonId));

    const result = await appEffects.unitOfWork.run(async (tx): Promise<Either<OrderingError, Bid>> => {
      const order = await tx.lockOrder(orderId);
      if (!order) return Left(notFound('order', orderId));

      const bids = await tx.listBids(orderId);
      const bid = placeBid(order, bids, deliveryPerson, amount, appEffects.ids.next(), appEffects.clock.now());
      if (bid.isRight()) await tx.insertBid(bid.extract());
      return bid;
    });

    if (result.isRight()) {
      const bid = result.extract();
      await performFollowUps(`order ${orderId}`, [
        () => appEffects.analytics.trackEvent(buildAnalyticsEvent('bid_submitted', orderId, null, bid.amount)),
      ]);
    }
    return result;
  };
}

export type ResolvedBidding = {
  readonly order: Order;
  readonly winner: Bid;
};

/**
 * Assign the order to the bid the manager selected. Losing bids stay on
 * record as inert.
 */
export function resolveBidding(
  orderId: string,
  selection: BidSelection
): (appEffects: AppEffects) => Promise<Either<OrderingError, ResolvedBidding>> {
  return async (appEffects: AppEffects) => {
    const result = await appEffects.unitOfWork.run(async (tx): Promise<Either<OrderingError, ResolvedBidding>> => {
      const order = await tx.lockOrder(orderId);
      if (!order) return Left(notFound('order', orderId));

      const bids = await tx.listBids(orderId);
      const resolution = resolveBids(order, bids, selection, appEffects.clock.now());
      if (resolution.isRight()) {
        const {order: assigned, bids: settled} = resolution.extract();
        await tx.saveOrder(assigned);
        await tx.saveBids(settled);
      }
      return resolution.map(({order: assigned, winner}) => ({order: assigned, winner}));
    });

    if (result.isRight()) {
      const {order, winner} = result.extract();
      await performFollowUps(`order ${order.id}`, [
        async () => {
          const winnerProfile = await appEffects.deliveryPeople.getById(winner.deliveryPersonId);
          if (winnerProfile) {
            await appEffects.notifications.sendEmail(buildAssignmentEmail(winnerProfile.email, order, winner));
          }
        },
        () => appEffects.analytics.trackEvent(
          buildAnalyticsEvent('delivery_assigned', order.id, order.customerId, winner.amount)),
      ]);
    }
    return result;
  };
}

export function listBids(
  orderId: string
): (appEffects: AppEffects) => Promise<Either<OrderingError, Bid[]>> {
  return async (appEffects: AppEffects) => {
    const order = await appEffects.orders.getById(orderId);
    if (!order) return Left(notFound('order', orderId));
    return Right(sortBids(await appEffects.bids.listForOrder(orderId)));
  };
}

/**
 * Orders still open for bidding, oldest first.
 */
export function listBiddableOrders(): (appEffects: AppEffects) => Promise<Order[]> {
  return async (appEffects: AppEffects) => {
    const orders = await appEffects.orders.listByStatus('bidding_open');
    return [...orders].sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime() || a.id.localeCompare(b.id));
  };
}

/**
 * A delivery person's own bids across orders, in submission order, whatever
 * state they ended up in.
 */
export function listOwnBids(
  deliveryPersonId: string
): (appEffects: AppEffects) => Promise<Either<OrderingError, Bid[]>> {
  return async (appEffects: AppEffects) => {
    const deliveryPerson = await appEffects.deliveryPeople.getById(deliveryPersonId);
    if (!deliveryPerson) return Left(notFound('delivery person', deliveryPersonId));
    const bids = await appEffects.bids.listForDeliveryPerson(deliveryPersonId);
    return Right([...bids].sort((a, b) => a.submittedAt.getTime() - b.submittedAt.getTime() || a.id.localeCompare(b.id)));
  };
}
