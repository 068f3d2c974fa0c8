import {OrderStatus} from '../domain';
import {OrderingError} from './types';
import {formatMoney} from './money';

// ============================================================================
// Error Constructors
// ============================================================================

export const invalidAmount = (amount: number): OrderingError =>
  ({kind: 'InvalidAmount', amount});

export const insufficientFunds = (
  orderId: string | null,
  required: number,
  available: number,
  warnings: number
): OrderingError => ({kind: 'InsufficientFunds', orderId, required, available, warnings});

export const emptyOrder = (): OrderingError => ({kind: 'EmptyOrder'});

export const invalidTransition = (orderId: string, from: OrderStatus, to: OrderStatus): OrderingError =>
  ({kind: 'InvalidTransition', orderId, from, to});

export const orderNotBiddable = (orderId: string, status: OrderStatus): OrderingError =>
  ({kind: 'OrderNotBiddable', orderId, status});

export const duplicateBid = (orderId: string, deliveryPersonId: string): OrderingError =>
  ({kind: 'DuplicateBid', orderId, deliveryPersonId});

export const noBids = (orderId: string): OrderingError => ({kind: 'NoBids', orderId});

export const notFound = (
  entity: 'customer' | 'order' | 'delivery person',
  id: string
): OrderingError => ({kind: 'NotFound', entity, id});

export const invalidQuantity = (dishId: string, quantity: number): OrderingError =>
  ({kind: 'InvalidQuantity', dishId, quantity});

export const dishUnavailable = (dishId: string): OrderingError => ({kind: 'DishUnavailable', dishId});

export const vipOnlyDish = (dishId: string, dishName: string): OrderingError =>
  ({kind: 'VipOnlyDish', dishId, dishName});

export const deliveryPersonInactive = (deliveryPersonId: string): OrderingError =>
  ({kind: 'DeliveryPersonInactive', deliveryPersonId});

export const unknownBid = (orderId: string, deliveryPersonId: string): OrderingError =>
  ({kind: 'UnknownBid', orderId, deliveryPersonId});

// ============================================================================
// Messages
// ============================================================================

export function describeError(error: OrderingError): string {
  switch (error.kind) {
    case 'InvalidAmount':
      return `Amount must be a positive number of cents, got ${error.amount}`;
    case 'InsufficientFunds':
      return `Insufficient funds: ${formatMoney(error.required)} required, ${formatMoney(error.available)} available`;
    case 'EmptyOrder':
      return 'Order has no items';
    case 'InvalidTransition':
      return `Order ${error.orderId} cannot move from ${error.from} to ${error.to}`;
    case 'OrderNotBiddable':
      return `Order ${error.orderId} is not open for bidding (status: ${error.status})`;
    case 'DuplicateBid':
      return `Delivery person ${error.deliveryPersonId} already bid on order ${error.orderId}`;
    case 'NoBids':
      return `Order ${error.orderId} has no bids to resolve`;
    case 'NotFound':
      return `${error.entity[0].toUpperCase()}${error.entity.slice(1)} ${error.id} not found`;
    case 'InvalidQuantity':
      return `Invalid quantity ${error.quantity} for dish ${error.dishId}`;
    case 'DishUnavailable':
      return `Dish ${error.dishId} is not available`;
    case 'VipOnlyDish':
      return `Dish "${error.dishName}" is VIP exclusive`;
    case 'DeliveryPersonInactive':
      return `Delivery person ${error.deliveryPersonId} is not active`;
    case 'UnknownBid':
      return `Delivery person ${error.deliveryPersonId} has no bid on order ${error.orderId}`;
  }
}
