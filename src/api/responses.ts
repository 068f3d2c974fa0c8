// Response bodies. Amounts go out as decimal currency, times as ISO strings.

import {Bid, DeliveryRoute, LedgerEntry, Order, OrderReceipt} from '../domain';
import {OrderingError, RouteFailure} from '../pure/types';
import {describeError} from '../pure/errors';
import {describeRouteFailure} from '../pure/geo';
import {toCurrency} from '../pure/money';

export type ApiResponse = {
  readonly status: number;
  readonly body: unknown;
};

export const ok = (body: unknown, status = 200): ApiResponse => ({status, body});

export const errorResponse = (status: number, error: string, message: string): ApiResponse =>
  ({status, body: {error, message}});

export const orderingErrorBody = (error: OrderingError) =>
  error.kind === 'InsufficientFunds'
    ? {error: error.kind, message: describeError(error), warnings: error.warnings}
    : {error: error.kind, message: describeError(error)};

export function presentReceipt(receipt: OrderReceipt) {
  return {
    ...receipt,
    subtotal: toCurrency(receipt.subtotal),
    discount: toCurrency(receipt.discount),
    finalAmount: toCurrency(receipt.finalAmount),
    remainingBalance: toCurrency(receipt.remainingBalance),
  };
}

export function presentOrder(order: Order) {
  return {
    id: order.id,
    customerId: order.customerId,
    status: order.status,
    lines: order.lines.map(line => ({...line, unitPrice: toCurrency(line.unitPrice)})),
    subtotal: toCurrency(order.subtotal),
    discount: toCurrency(order.discount),
    finalAmount: toCurrency(order.finalAmount),
    deliveryPersonId: order.deliveryPersonId,
    deliveryAddress: order.deliveryAddress,
    createdAt: order.createdAt.toISOString(),
    history: order.history.map(change => ({status: change.status, at: change.at.toISOString()})),
  };
}

export function presentBid(bid: Bid) {
  return {
    ...bid,
    amount: toCurrency(bid.amount),
    submittedAt: bid.submittedAt.toISOString(),
  };
}

export function presentLedgerEntry(entry: LedgerEntry) {
  return {
    ...entry,
    amount: toCurrency(entry.amount),
    balanceAfter: toCurrency(entry.balanceAfter),
    createdAt: entry.createdAt.toISOString(),
  };
}

export const presentRoute = (route: DeliveryRoute, restaurantAddress: string) =>
  ({available: true, restaurantAddress, ...route});

// Route lookups that fail still answer 200 with something the driver can use
export const presentRouteFailure = (failure: RouteFailure, restaurantAddress: string) => ({
  available: false,
  restaurantAddress,
  orderId: failure.orderId,
  reason: failure.reason,
  straightLineMeters: failure.straightLineMeters,
  message: describeRouteFailure(failure),
});
