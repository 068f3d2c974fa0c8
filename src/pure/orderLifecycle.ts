/**
 * ORDER LIFECYCLE
 *
 * draft -> confirmed -> bidding_open -> assigned -> completed
 *   \-> rejected
 *
 * completed and rejected are terminal.
 */

import {Customer, Order, OrderLine, OrderStatus} from '../domain';
import {OrderingError, PricedOrder} from './types';
import {invalidTransition} from './errors';
import {Either, Left, Right} from 'purify-ts';

const transitions: Record<OrderStatus, readonly OrderStatus[]> = {
  draft: ['confirmed', 'rejected'],
  confirmed: ['bidding_open'],
  bidding_open: ['assigned'],
  assigned: ['completed'],
  completed: [],
  rejected: [],
};

export function canTransition(from: OrderStatus, to: OrderStatus): boolean {
  return transitions[from].includes(to);
}

export function isTerminal(status: OrderStatus): boolean {
  return transitions[status].length === 0;
}

export function draftOrder(
  id: string,
  customer: Customer,
  lines: readonly OrderLine[],
  priced: PricedOrder,
  deliveryAddress: string,
  at: Date
): Order {
  return {
    id,
    customerId: customer.id,
    lines,
    subtotal: priced.subtotal,
    discount: priced.discount,
    finalAmount: priced.finalAmount,
    status: 'draft',
    deliveryPersonId: null,
    deliveryAddress,
    createdAt: at,
    history: [{status: 'draft', at}],
  };
}

export function transition(order: Order, to: OrderStatus, at: Date): Either<OrderingError, Order> {
  if (!canTransition(order.status, to)) {
    return Left(invalidTransition(order.id, order.status, to));
  }
  return Right({
    ...order,
    status: to,
    history: [...order.history, {status: to, at}],
  });
}

export const confirm = (order: Order, at: Date) => transition(order, 'confirmed', at);

export const reject = (order: Order, at: Date) => transition(order, 'rejected', at);

export const openBidding = (order: Order, at: Date) => transition(order, 'bidding_open', at);

export function assign(order: Order, deliveryPersonId: string, at: Date): Either<OrderingError, Order> {
  return transition(order, 'assigned', at).map(assigned => ({...assigned, deliveryPersonId}));
}

export const complete = (order: Order, at: Date) => transition(order, 'completed', at);
