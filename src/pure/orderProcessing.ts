/**
 * ORDER PROCESSOR - The Coordinator
 *
 * The thin effectful shell around the order lifecycle:
 * 1. Lock and read the rows an operation changes (unit of work)
 * 2. Hand them to the pure decision functions
 * 3. Write the outcome inside the same unit of work
 * 4. Run the follow-ups once it has committed
 */

import {Order, OrderReceipt} from '../domain';
import {AppEffects, FollowUpEffects, OrderingTransaction} from './effects';
import {OrderingError, PlaceOrderCommand, PlacedOrder, PlacementOutcome} from './types';
import {decidePlacement} from './placement';
import {complete, openBidding} from './orderLifecycle';
import {reevaluateVip} from './vip';
import {notFound} from './errors';
import {
  buildAnalyticsEvent,
  buildCacheEntry,
  buildConfirmationEmail,
  buildPlacementEvents,
  buildRejectedOrderAlert,
  fromPlacementOutcome,
  toPlacementOutcome,
} from './businessLogic';
import {performFollowUps} from './followUps';
import {Either, Left, Right} from 'purify-ts';

/**
 * Place an order: validate the cart, price it, charge the customer and
 * confirm it in one unit of work, then announce the outcome.
 *
 * @return the receipt, or why the order was not placed
 */
export function placeOrder(
  command: PlaceOrderCommand
): (appEffects: AppEffects) => Promise<Either<OrderingError, OrderReceipt>> {
  return async (appEffects: AppEffects) => {
    const result = await placeOrderTransaction(command)(appEffects);
    const outcome = toPlacementOutcome(result);
    await announcePlacement(command.customerId, outcome)(appEffects);
    return fromPlacementOutcome(outcome);
  };
}

/**
 * The transactional half of placement. Dishes are catalog data and are read
 * before the customer row is locked.
 */
export function placeOrderTransaction(
  command: PlaceOrderCommand
): (appEffects: AppEffects) => Promise<Either<OrderingError, PlacedOrder>> {
  return async (appEffects: AppEffects) => {
    const dishIds = [...new Set(command.items.map(item => item.dishId))];
    const dishes = await appEffects.dishes.getByIds(dishIds);

    return appEffects.unitOfWork.run(async (tx): Promise<Either<OrderingError, PlacedOrder>> => {
      const customer = await tx.lockCustomer(command.customerId);
      if (!customer) return Left(notFound('customer', command.customerId));

      const decision = decidePlacement(
        customer,
        command.items,
        dishes,
        {orderId: appEffects.ids.next(), entryId: appEffects.ids.next()},
        command.deliveryAddress ?? appEffects.restaurant.defaultDeliveryAddress,
        appEffects.clock.now()
      );

      switch (decision.kind) {
        case 'invalid':
          return Left(decision.error);
        case 'rejected':
          await tx.saveCustomer(decision.customer);
          await tx.insertOrder(decision.order);
          return Left(decision.error);
        case 'confirmed': {
          const {order, customer: charged, entry} = decision.placed;
          await tx.saveCustomer(charged);
          await tx.insertOrder(order);
          await tx.appendLedgerEntry(entry);
          return Right(decision.placed);
        }
      }
    });
  };
}

/**
 * Follow-ups for a placement outcome. Takes only the follow-up effects so a
 * workflow can supply activity proxies instead.
 */
export function announcePlacement(
  customerId: string,
  outcome: PlacementOutcome
): (effects: FollowUpEffects) => Promise<string[]> {
  return async (effects: FollowUpEffects) => {
    if (outcome.ok) {
      const {receipt, customerEmail} = outcome;
      return performFollowUps(`order ${receipt.orderId}`, [
        () => effects.notifications.sendEmail(buildConfirmationEmail(customerEmail, receipt)),
        () => effects.cache.set(buildCacheEntry(receipt)),
        ...buildPlacementEvents(receipt).map(event => () => effects.analytics.trackEvent(event)),
      ]);
    }

    const alert = buildRejectedOrderAlert(customerId, outcome.error);
    if (!alert) return [];
    return performFollowUps(`order ${alert.orderId}`, [
      () => effects.monitoring.sendAlerts([alert]),
      () => effects.analytics.trackEvent(
        buildAnalyticsEvent('order_rejected', alert.orderId, customerId, alert.required)),
    ]);
  };
}

/**
 * Lock an order, apply one lifecycle step and save the result.
 */
async function updateOrder(
  tx: OrderingTransaction,
  orderId: string,
  step: (order: Order) => Either<OrderingError, Order>
): Promise<Either<OrderingError, Order>> {
  const order = await tx.lockOrder(orderId);
  if (!order) return Left(notFound('order', orderId));
  const next = step(order);
  if (next.isRight()) await tx.saveOrder(next.extract());
  return next;
}

type Completion = {
  readonly order: Order;
  readonly vipUpgraded: boolean;
};

export function openBiddingForOrder(
  orderId: string
): (appEffects: AppEffects) => Promise<Either<OrderingError, Order>> {
  return async (appEffects: AppEffects) => {
    const result = await appEffects.unitOfWork.run(tx =>
      updateOrder(tx, orderId, order => openBidding(order, appEffects.clock.now())));

    if (result.isRight()) {
      const order = result.extract();
      await performFollowUps(`order ${order.id}`, [
        () => appEffects.analytics.trackEvent(
          buildAnalyticsEvent('bidding_opened', order.id, order.customerId, order.finalAmount)),
      ]);
    }
    return result;
  };
}

/**
 * Complete an assigned order and re-run the VIP evaluation for its customer.
 */
export function completeOrder(
  orderId: string
): (appEffects: AppEffects) => Promise<Either<OrderingError, Order>> {
  return async (appEffects: AppEffects) => {
    const result = await appEffects.unitOfWork.run(async (tx): Promise<Either<OrderingError, Completion>> => {
      const completed = await updateOrder(tx, orderId, order => complete(order, appEffects.clock.now()));
      return completed.caseOf<Promise<Either<OrderingError, Completion>>>({
        Left: error => Promise.resolve(Left(error)),
        Right: async order => {
          const customer = await tx.lockCustomer(order.customerId);
          if (!customer) return Left(notFound('customer', order.customerId));
          const reevaluated = reevaluateVip(customer);
          if (reevaluated !== customer) await tx.saveCustomer(reevaluated);
          return Right({order, vipUpgraded: reevaluated !== customer});
        },
      });
    });

    if (result.isRight()) {
      const {order, vipUpgraded} = result.extract();
      const events = [buildAnalyticsEvent('order_completed', order.id, order.customerId, order.finalAmount)];
      if (vipUpgraded) events.push(buildAnalyticsEvent('vip_upgraded', order.id, order.customerId, order.finalAmount));
      await performFollowUps(`order ${order.id}`,
        events.map(event => () => appEffects.analytics.trackEvent(event)));
    }
    return result.map(({order}) => order);
  };
}
