/**
 * PRICING
 *
 * Pure functions: dishes and quantities in, line items and amounts out.
 */

import {Customer, Dish, OrderLine} from '../domain';
import {OrderingError, PricedOrder, RequestedLine} from './types';
import {dishUnavailable, emptyOrder, invalidQuantity, vipOnlyDish} from './errors';
import {scaleHalfUp} from './money';
import {Either, Left, Right} from 'purify-ts';

export const VIP_DISCOUNT_PERCENT = 5;

/**
 * Turn the requested cart lines into priced order lines, checking each dish
 * is on the menu and allowed for this customer.
 */
export function buildOrderLines(
  requested: readonly RequestedLine[],
  dishes: Record<string, Dish>,
  customer: Customer
): Either<OrderingError, OrderLine[]> {
  if (requested.length === 0) return Left(emptyOrder());

  const lines: OrderLine[] = [];
  for (const item of requested) {
    if (!Number.isInteger(item.quantity) || item.quantity <= 0) {
      return Left(invalidQuantity(item.dishId, item.quantity));
    }
    const dish = dishes[item.dishId];
    if (!dish || !dish.isAvailable) {
      return Left(dishUnavailable(item.dishId));
    }
    if (dish.isVipOnly && !customer.isVip) {
      return Left(vipOnlyDish(dish.id, dish.name));
    }
    lines.push({
      dishId: dish.id,
      dishName: dish.name,
      quantity: item.quantity,
      unitPrice: dish.price,
    });
  }
  return Right(lines);
}

export function computeTotal(lines: readonly OrderLine[]): Either<OrderingError, number> {
  if (lines.length === 0) return Left(emptyOrder());
  return Right(lines.reduce((sum, line) => sum + line.quantity * line.unitPrice, 0));
}

/**
 * @return the amount the customer pays
 */
export function applyDiscount(subtotal: number, isVip: boolean): number {
  return isVip ? scaleHalfUp(subtotal, 100 - VIP_DISCOUNT_PERCENT, 100) : subtotal;
}

export function priceOrder(lines: readonly OrderLine[], isVip: boolean): Either<OrderingError, PricedOrder> {
  return computeTotal(lines).map(subtotal => {
    const finalAmount = applyDiscount(subtotal, isVip);
    return {subtotal, discount: subtotal - finalAmount, finalAmount};
  });
}
