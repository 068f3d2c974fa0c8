/**
 * DELIVERY BIDDING
 *
 * Bids are collected while an order is open for bidding. The manager picks
 * the winner; there is no automatic lowest or highest choice.
 */

import {Bid, DeliveryPerson, Order} from '../domain';
import {BidSelection, OrderingError} from './types';
import {
  deliveryPersonInactive,
  duplicateBid,
  invalidAmount,
  invalidTransition,
  noBids,
  orderNotBiddable,
  unknownBid,
} from './errors';
import {assign} from './orderLifecycle';
import {isWholeCents} from './money';
import {Either, Left, Right} from 'purify-ts';

export function placeBid(
  order: Order,
  existingBids: readonly Bid[],
  deliveryPerson: DeliveryPerson,
  amount: number,
  bidId: string,
  at: Date
): Either<OrderingError, Bid> {
  if (!isWholeCents(amount) || amount <= 0) return Left(invalidAmount(amount));
  if (!deliveryPerson.isActive) return Left(deliveryPersonInactive(deliveryPerson.id));
  if (order.status !== 'bidding_open') return Left(orderNotBiddable(order.id, order.status));
  if (existingBids.some(bid => bid.deliveryPersonId === deliveryPerson.id)) {
    return Left(duplicateBid(order.id, deliveryPerson.id));
  }

  return Right({
    id: bidId,
    orderId: order.id,
    deliveryPersonId: deliveryPerson.id,
    amount,
    submittedAt: at,
    state: 'open',
    justification: null,
  });
}

export type Resolution = {
  readonly order: Order;
  readonly winner: Bid;
  readonly bids: Bid[];
};

/**
 * Close bidding on the manager's selection. The winning bid is marked
 * selected and every other bid goes inert; none are removed.
 */
export function resolveBids(
  order: Order,
  bids: readonly Bid[],
  selection: BidSelection,
  at: Date
): Either<OrderingError, Resolution> {
  if (order.status !== 'bidding_open') {
    return Left(invalidTransition(order.id, order.status, 'assigned'));
  }
  if (bids.length === 0) return Left(noBids(order.id));

  const chosen = bids.find(bid => bid.deliveryPersonId === selection.deliveryPersonId);
  if (!chosen) return Left(unknownBid(order.id, selection.deliveryPersonId));

  const winner: Bid = {...chosen, state: 'selected', justification: selection.justification ?? null};
  return assign(order, winner.deliveryPersonId, at).map(assigned => ({
    order: assigned,
    winner,
    bids: bids.map(bid => bid.id === winner.id ? winner : {...bid, state: 'inert' as const}),
  }));
}

// Cheapest first, earliest first among equal amounts
export function sortBids(bids: readonly Bid[]): Bid[] {
  return [...bids].sort((a, b) =>
    a.amount - b.amount || a.submittedAt.getTime() - b.submittedAt.getTime());
}
