/**
 * ORDER PLACEMENT DECISION
 *
 * Given the locked customer and the menu, decide what placing the order does:
 * nothing (invalid cart), a rejected order plus a warning on the customer
 * (not enough balance), or a confirmed order with the charged customer and
 * its ledger entry.
 *
 * The discount uses the customer's VIP status before this order counts. A VIP
 * upgrade earned by this order only applies to the next one.
 */

import {Customer, Dish, Order} from '../domain';
import {OrderingError, PlacedOrder, RequestedLine} from './types';
import {buildOrderLines, priceOrder} from './pricing';
import {confirm, draftOrder, reject} from './orderLifecycle';
import {debit} from './ledger';
import {reevaluateVip} from './vip';
import {Either} from 'purify-ts';

export type PlacementDecision =
  | { readonly kind: 'invalid'; readonly error: OrderingError }
  | { readonly kind: 'rejected'; readonly order: Order; readonly customer: Customer; readonly error: OrderingError }
  | { readonly kind: 'confirmed'; readonly placed: PlacedOrder };

export type PlacementIds = {
  readonly orderId: string;
  readonly entryId: string;
};

const withWarnings = (error: OrderingError, warnings: number): OrderingError =>
  error.kind === 'InsufficientFunds' ? {...error, warnings} : error;

export function decidePlacement(
  customer: Customer,
  requested: readonly RequestedLine[],
  dishes: Record<string, Dish>,
  ids: PlacementIds,
  deliveryAddress: string,
  at: Date
): PlacementDecision {
  const decision = buildOrderLines(requested, dishes, customer)
    .chain(lines => priceOrder(lines, customer.isVip)
      .map(priced => draftOrder(ids.orderId, customer, lines, priced, deliveryAddress, at)))
    .chain(draft => debit(customer, draft.finalAmount, draft.id, ids.entryId, at)
      .caseOf<Either<OrderingError, PlacementDecision>>({
        Left: error => {
          // Balance and counters stay as they were; only the warning is recorded
          const warned = {...customer, warnings: customer.warnings + 1};
          return reject(draft, at).map((order): PlacementDecision =>
            ({kind: 'rejected', order, customer: warned, error: withWarnings(error, warned.warnings)}));
        },
        Right: ({customer: debited, entry}) => {
          const counted = reevaluateVip({...debited, orderCount: debited.orderCount + 1});
          return confirm(draft, at).map((order): PlacementDecision => ({
            kind: 'confirmed',
            placed: {order, customer: counted, entry, vipUpgraded: counted.isVip && !customer.isVip},
          }));
        },
      }));

  return decision.caseOf<PlacementDecision>({
    Left: error => ({kind: 'invalid', error}),
    Right: settled => settled,
  });
}
