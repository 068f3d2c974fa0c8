/**
 * Role capabilities, checked at the request boundary before any core
 * operation runs. The state machine itself knows nothing about roles.
 */

import {Order} from '../domain';
import {Actor, Role} from '../types';

export type Capability =
  | 'deposit'
  | 'place_order'
  | 'open_bidding'
  | 'submit_bid'
  | 'resolve_bidding'
  | 'complete_order'
  | 'view_route'
  | 'view_bids'
  | 'view_ledger'
  | 'browse_bidding'
  | 'view_own_bids';

const capabilities: Record<Role, readonly Capability[]> = {
  customer: ['deposit', 'place_order', 'view_route', 'view_ledger'],
  chef: ['open_bidding'],
  delivery: ['submit_bid', 'complete_order', 'view_route', 'browse_bidding', 'view_own_bids'],
  manager: [
    'open_bidding', 'resolve_bidding', 'complete_order', 'view_route', 'view_bids', 'view_ledger', 'browse_bidding',
  ],
};

export function can(actor: Actor, capability: Capability): boolean {
  return capabilities[actor.role].includes(capability);
}

// Customers act on their own account only
export function actsForCustomer(actor: Actor, customerId: string): boolean {
  return actor.role !== 'customer' || actor.id === customerId;
}

/**
 * Order-level access on top of the role check: customers see their own
 * orders, delivery people the orders assigned to them, managers everything.
 */
export function canAccessOrder(actor: Actor, order: Order): boolean {
  switch (actor.role) {
    case 'customer':
      return order.customerId === actor.id;
    case 'delivery':
      return order.deliveryPersonId === actor.id;
    case 'chef':
    case 'manager':
      return true;
  }
}
