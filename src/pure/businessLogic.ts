/**
 * FOLLOW-UP DATA
 *
 * Everything that leaves the core after a unit of work commits is built
 * here from plain values: receipts, e-mails, cache entries, analytics events
 * and alerts. No effects.
 */

import {Bid, Order, OrderReceipt} from '../domain';
import {CacheEntry, NotificationPayload} from "../types";
import {AnalyticsEvent, LifecycleEventName, OrderingError, PlacedOrder, PlacementOutcome, RejectedOrderAlert} from "./types";
import {formatMoney} from './money';
import {Either, Left, Right} from "purify-ts";

export const RECEIPT_TTL_SECONDS = 3600;

// ============================================================================
// Receipts
// ============================================================================

export function toReceipt(placed: PlacedOrder): OrderReceipt {
  return {
    orderId: placed.order.id,
    customerId: placed.customer.id,
    status: placed.order.status,
    subtotal: placed.order.subtotal,
    discount: placed.order.discount,
    finalAmount: placed.order.finalAmount,
    remainingBalance: placed.customer.balance,
    isVip: placed.customer.isVip,
    vipUpgraded: placed.vipUpgraded,
  };
}

export function toPlacementOutcome(result: Either<OrderingError, PlacedOrder>): PlacementOutcome {
  return result.caseOf<PlacementOutcome>({
    Left: error => ({ok: false, error}),
    Right: placed => ({ok: true, receipt: toReceipt(placed), customerEmail: placed.customer.email}),
  });
}

export function fromPlacementOutcome(outcome: PlacementOutcome): Either<OrderingError, OrderReceipt> {
  return outcome.ok ? Right(outcome.receipt) : Left(outcome.error);
}

// ============================================================================
// Notifications & External Data Preparation
// ============================================================================

export function buildConfirmationEmail(
  customerEmail: string,
  receipt: OrderReceipt
): NotificationPayload {
  const vipLine = receipt.vipUpgraded
    ? '\nCongratulations, you are now a VIP customer! Future orders get 5% off.\n'
    : '';
  return {
    to: customerEmail,
    subject: `Order ${receipt.orderId} Confirmed`,
    body: `
Thank you for your order!

Subtotal: ${formatMoney(receipt.subtotal)}
VIP discount: -${formatMoney(receipt.discount)}
Total charged: ${formatMoney(receipt.finalAmount)}
Remaining balance: ${formatMoney(receipt.remainingBalance)}
${vipLine}`.trim(),
  };
}

export function buildAssignmentEmail(
  deliveryPersonEmail: string,
  order: Order,
  winner: Bid
): NotificationPayload {
  return {
    to: deliveryPersonEmail,
    subject: `Delivery for order ${order.id} assigned to you`,
    body: `
Your bid of ${formatMoney(winner.amount)} was selected.

Deliver to: ${order.deliveryAddress}
Items: ${order.lines.map(line => `${line.quantity} x ${line.dishName}`).join(', ')}
${winner.justification ? `\nManager note: ${winner.justification}` : ''}`.trim(),
  };
}

export function buildCacheEntry(receipt: OrderReceipt): CacheEntry {
  return {
    key: `order-receipt:${receipt.orderId}`,
    value: JSON.stringify(receipt),
    ttlSeconds: RECEIPT_TTL_SECONDS,
  };
}

export function buildAnalyticsEvent(
  event: LifecycleEventName,
  orderId: string,
  customerId: string | null,
  amount: number
): AnalyticsEvent {
  return {event, orderId, customerId, amount};
}

export function buildPlacementEvents(receipt: OrderReceipt): AnalyticsEvent[] {
  const confirmed = buildAnalyticsEvent('order_confirmed', receipt.orderId, receipt.customerId, receipt.finalAmount);
  return receipt.vipUpgraded
    ? [confirmed, buildAnalyticsEvent('vip_upgraded', receipt.orderId, receipt.customerId, receipt.finalAmount)]
    : [confirmed];
}

/**
 * Only a funds rejection that recorded an order raises an alert; other
 * placement errors never reach the ledger.
 */
export function buildRejectedOrderAlert(
  customerId: string,
  error: OrderingError
): RejectedOrderAlert | null {
  if (error.kind !== 'InsufficientFunds' || error.orderId === null) return null;
  return {
    type: 'insufficient_funds',
    orderId: error.orderId,
    customerId,
    required: error.required,
    available: error.available,
  };
}
