// Domain types shared across the application
// All money amounts are integer cents.

export type Customer = {
  readonly id: string;
  readonly email: string;
  readonly balance: number;
  readonly totalSpent: number;
  readonly orderCount: number;
  readonly isVip: boolean;
  // Orders rejected for insufficient funds
  readonly warnings: number;
};

export type Dish = {
  readonly id: string;
  readonly name: string;
  readonly price: number;
  readonly isVipOnly: boolean;
  readonly isAvailable: boolean;
};

export type DeliveryPerson = {
  readonly id: string;
  readonly email: string;
  readonly isActive: boolean;
};

export type OrderStatus =
  | 'draft'
  | 'confirmed'
  | 'bidding_open'
  | 'assigned'
  | 'completed'
  | 'rejected';

export type OrderLine = {
  readonly dishId: string;
  readonly dishName: string;
  readonly quantity: number;
  readonly unitPrice: number;
};

export type StatusChange = {
  readonly status: OrderStatus;
  readonly at: Date;
};

export type Order = {
  readonly id: string;
  readonly customerId: string;
  readonly lines: readonly OrderLine[];
  readonly subtotal: number;
  readonly discount: number;
  readonly finalAmount: number;
  readonly status: OrderStatus;
  readonly deliveryPersonId: string | null;
  readonly deliveryAddress: string;
  readonly createdAt: Date;
  readonly history: readonly StatusChange[];
};

export type BidState = 'open' | 'selected' | 'inert';

export type Bid = {
  readonly id: string;
  readonly orderId: string;
  readonly deliveryPersonId: string;
  readonly amount: number;
  readonly submittedAt: Date;
  readonly state: BidState;
  readonly justification: string | null;
};

export type LedgerEntry = {
  readonly id: string;
  readonly customerId: string;
  readonly kind: 'deposit' | 'debit';
  readonly amount: number;
  readonly balanceAfter: number;
  readonly orderId: string | null;
  readonly createdAt: Date;
};

export type Coordinates = {
  readonly latitude: number;
  readonly longitude: number;
};

export type DeliveryRoute = {
  readonly orderId: string;
  readonly distanceMeters: number;
  readonly durationSeconds: number;
  readonly instructions: string[];
  readonly path: Coordinates[];
  readonly origin: Coordinates;
  readonly destination: Coordinates;
};

/**
 * What the customer gets back after placing an order. Plain data only, it
 * travels through workflow payloads and HTTP responses.
 */
export type OrderReceipt = {
  readonly orderId: string;
  readonly customerId: string;
  readonly status: OrderStatus;
  readonly subtotal: number;
  readonly discount: number;
  readonly finalAmount: number;
  readonly remainingBalance: number;
  readonly isVip: boolean;
  readonly vipUpgraded: boolean;
};
