// Module product types

import {Coordinates, Customer, LedgerEntry, Order, OrderReceipt, OrderStatus} from "../domain";

export type OrderingError =
    | { readonly kind: 'InvalidAmount'; readonly amount: number }
    | { readonly kind: 'InsufficientFunds'; readonly orderId: string | null; readonly required: number; readonly available: number; readonly warnings: number }
    | { readonly kind: 'EmptyOrder' }
    | { readonly kind: 'InvalidTransition'; readonly orderId: string; readonly from: OrderStatus; readonly to: OrderStatus }
    | { readonly kind: 'OrderNotBiddable'; readonly orderId: string; readonly status: OrderStatus }
    | { readonly kind: 'DuplicateBid'; readonly orderId: string; readonly deliveryPersonId: string }
    | { readonly kind: 'NoBids'; readonly orderId: string }
    | { readonly kind: 'NotFound'; readonly entity: 'customer' | 'order' | 'delivery person'; readonly id: string }
    | { readonly kind: 'InvalidQuantity'; readonly dishId: string; readonly quantity: number }
    | { readonly kind: 'DishUnavailable'; readonly dishId: string }
    | { readonly kind: 'VipOnlyDish'; readonly dishId: string; readonly dishName: string }
    | { readonly kind: 'DeliveryPersonInactive'; readonly deliveryPersonId: string }
    | { readonly kind: 'UnknownBid'; readonly orderId: string; readonly deliveryPersonId: string };

export type RequestedLine = {
    readonly dishId: string;
    readonly quantity: number;
};

export type PlaceOrderCommand = {
    readonly customerId: string;
    readonly items: readonly RequestedLine[];
    readonly deliveryAddress?: string;
};

export type BidSelection = {
    readonly deliveryPersonId: string;
    readonly justification?: string;
};

export type PricedOrder = {
    readonly subtotal: number;
    readonly discount: number;
    readonly finalAmount: number;
};

export type LedgerUpdate = {
    readonly customer: Customer;
    readonly entry: LedgerEntry;
};

export type PlacedOrder = {
    readonly order: Order;
    readonly customer: Customer;
    readonly entry: LedgerEntry;
    readonly vipUpgraded: boolean;
};

// Serialisable mirror of Either<OrderingError, OrderReceipt> for workflow payloads
export type PlacementOutcome =
    | { readonly ok: true; readonly receipt: OrderReceipt; readonly customerEmail: string }
    | { readonly ok: false; readonly error: OrderingError };

export type LifecycleEventName =
    | 'order_confirmed'
    | 'order_rejected'
    | 'vip_upgraded'
    | 'bidding_opened'
    | 'bid_submitted'
    | 'delivery_assigned'
    | 'order_completed';

export type AnalyticsEvent = {
    readonly event: LifecycleEventName;
    readonly orderId: string;
    readonly customerId: string | null;
    readonly amount: number;
};

export type RejectedOrderAlert = {
    readonly type: 'insufficient_funds';
    readonly orderId: string;
    readonly customerId: string;
    readonly required: number;
    readonly available: number;
};

export type RouteFailureReason =
    | 'not_assigned'
    | 'address_not_found'
    | 'routing_unavailable'
    | 'no_route';

export type RouteFailure = {
    readonly reason: RouteFailureReason;
    readonly orderId: string;
    readonly straightLineMeters: number | null;
};

export type RouteLookup = {
    readonly distanceMeters: number;
    readonly durationSeconds: number;
    readonly instructions: string[];
    readonly path: Coordinates[];
};
