/**
 * EFFECTS LAYER
 *
 * All external IO sits behind these interfaces. Implementations are thin:
 * they move data in and out and never decide anything.
 *
 * Reads that do not need a lock go through the plain repositories. Every
 * state change goes through a unit of work, whose transaction locks the rows
 * it touches until the work settles.
 */

import {Bid, Coordinates, Customer, DeliveryPerson, Dish, LedgerEntry, Order, OrderStatus} from '../domain';
import {CacheEntry, NotificationPayload} from '../types';
import {AnalyticsEvent, RejectedOrderAlert, RouteLookup} from './types';

// ============================================================================
// Effect Interfaces
// ============================================================================

export interface CustomerRepository {
  getById(id: string): Promise<Customer | null>;
}

export interface DishRepository {
  getByIds(ids: string[]): Promise<Record<string, Dish>>;
}

export interface DeliveryPersonRepository {
  getById(id: string): Promise<DeliveryPerson | null>;
}

export interface OrderRepository {
  getById(id: string): Promise<Order | null>;
  listByStatus(status: OrderStatus): Promise<Order[]>;
}

export interface BidRepository {
  listForOrder(orderId: string): Promise<Bid[]>;
  listForDeliveryPerson(deliveryPersonId: string): Promise<Bid[]>;
}

export interface LedgerRepository {
  listForCustomer(customerId: string): Promise<LedgerEntry[]>;
}

/**
 * Writes and locking reads inside one transaction. `lock*` calls hold the
 * row until the transaction ends; lock orders before customers.
 */
export interface OrderingTransaction {
  lockCustomer(id: string): Promise<Customer | null>;
  lockOrder(id: string): Promise<Order | null>;
  listBids(orderId: string): Promise<Bid[]>;
  saveCustomer(customer: Customer): Promise<void>;
  appendLedgerEntry(entry: LedgerEntry): Promise<void>;
  insertOrder(order: Order): Promise<void>;
  saveOrder(order: Order): Promise<void>;
  insertBid(bid: Bid): Promise<void>;
  saveBids(bids: Bid[]): Promise<void>;
}

export interface UnitOfWork {
  /**
   * Commit when `work` resolves, roll back when it throws.
   */
  run<T>(work: (tx: OrderingTransaction) => Promise<T>): Promise<T>;
}

export interface GeoService {
  geocode(address: string): Promise<Coordinates | null>;
  route(from: Coordinates, to: Coordinates): Promise<RouteLookup | null>;
}

export interface CacheService {
  set(entry: CacheEntry): Promise<void>;
}

export interface NotificationService {
  sendEmail(payload: NotificationPayload): Promise<void>;
}

export interface MonitoringService {
  sendAlerts(alerts: RejectedOrderAlert[]): Promise<void>;
}

export interface AnalyticsService {
  trackEvent(event: AnalyticsEvent): Promise<void>;
}

export interface Clock {
  now(): Date;
}

export interface IdGenerator {
  next(): string;
}

export type RestaurantSettings = {
  readonly address: string;
  readonly location: Coordinates;
  readonly defaultDeliveryAddress: string;
};

// ============================================================================
// Combined Dependencies
// ============================================================================

export type AppEffects = {
  readonly customers: CustomerRepository;
  readonly dishes: DishRepository;
  readonly deliveryPeople: DeliveryPersonRepository;
  readonly orders: OrderRepository;
  readonly bids: BidRepository;
  readonly ledger: LedgerRepository;
  readonly unitOfWork: UnitOfWork;
  readonly geo: GeoService;
  readonly cache: CacheService;
  readonly notifications: NotificationService;
  readonly monitoring: MonitoringService;
  readonly analytics: AnalyticsService;
  readonly clock: Clock;
  readonly ids: IdGenerator;
  readonly restaurant: RestaurantSettings;
}

// What post-commit follow-ups need, also satisfiable by workflow activities
export type FollowUpEffects = Pick<AppEffects, 'cache' | 'notifications' | 'monitoring' | 'analytics'>;
