/**
 * In-process stand-in for the PostgreSQL store. Locks are a keyed mutex held
 * until the unit of work settles; writes are staged on the transaction and
 * applied only when the work resolves.
 */

import {Bid, Customer, DeliveryPerson, Dish, LedgerEntry, Order} from '../../domain';
import {AppEffects, OrderingTransaction, UnitOfWork} from '../../pure/effects';

class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  async acquire(key: string): Promise<() => void> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);
    await previous;
    return () => {
      release();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    };
  }
}

class InMemoryTransaction implements OrderingTransaction {
  private held = new Set<string>();
  private releases: Array<() => void> = [];
  private customers = new Map<string, Customer>();
  private orders = new Map<string, Order>();
  private bids = new Map<string, Bid[]>();
  private entries: LedgerEntry[] = [];

  constructor(private store: InMemoryStore, private mutex: KeyedMutex) {}

  async lockCustomer(id: string): Promise<Customer | null> {
    await this.lock(`customer:${id}`);
    return this.customers.get(id) ?? this.store.customers.get(id) ?? null;
  }

  async lockOrder(id: string): Promise<Order | null> {
    await this.lock(`order:${id}`);
    return this.orders.get(id) ?? this.store.orders.get(id) ?? null;
  }

  async listBids(orderId: string): Promise<Bid[]> {
    return this.bids.get(orderId) ?? this.store.bidsFor(orderId);
  }

  async saveCustomer(customer: Customer): Promise<void> {
    this.customers.set(customer.id, customer);
  }

  async appendLedgerEntry(entry: LedgerEntry): Promise<void> {
    this.entries.push(entry);
  }

  async insertOrder(order: Order): Promise<void> {
    if (this.orders.has(order.id) || this.store.orders.has(order.id)) {
      throw new Error(`duplicate key: order ${order.id}`);
    }
    this.orders.set(order.id, order);
  }

  async saveOrder(order: Order): Promise<void> {
    this.orders.set(order.id, order);
  }

  async insertBid(bid: Bid): Promise<void> {
    const current = await this.listBids(bid.orderId);
    if (current.some(existing => existing.deliveryPersonId === bid.deliveryPersonId)) {
      throw new Error(`duplicate key: bid ${bid.orderId}/${bid.deliveryPersonId}`);
    }
    this.bids.set(bid.orderId, [...current, bid]);
  }

  async saveBids(bids: Bid[]): Promise<void> {
    for (const bid of bids) {
      const current = await this.listBids(bid.orderId);
      this.bids.set(bid.orderId, current.map(existing => existing.id === bid.id ? bid : existing));
    }
  }

  commit(): void {
    this.customers.forEach(customer => this.store.customers.set(customer.id, customer));
    this.orders.forEach(order => this.store.orders.set(order.id, order));
    this.bids.forEach((bids, orderId) => this.store.bids.set(orderId, bids));
    this.store.ledger.push(...this.entries);
  }

  release(): void {
    this.releases.forEach(release => release());
    this.releases = [];
  }

  private async lock(key: string): Promise<void> {
    if (this.held.has(key)) return;
    this.held.add(key);
    this.releases.push(await this.mutex.acquire(key));
  }
}

export class InMemoryStore implements UnitOfWork {
  readonly customers = new Map<string, Customer>();
  readonly dishes = new Map<string, Dish>();
  readonly deliveryPeople = new Map<string, DeliveryPerson>();
  readonly orders = new Map<string, Order>();
  readonly bids = new Map<string, Bid[]>();
  readonly ledger: LedgerEntry[] = [];

  private mutex = new KeyedMutex();
  private commitFailure: Error | null = null;

  bidsFor(orderId: string): Bid[] {
    return this.bids.get(orderId) ?? [];
  }

  // The next unit of work throws this instead of committing
  failNextCommit(error: Error): void {
    this.commitFailure = error;
  }

  async run<T>(work: (tx: OrderingTransaction) => Promise<T>): Promise<T> {
    const tx = new InMemoryTransaction(this, this.mutex);
    try {
      const result = await work(tx);
      if (this.commitFailure) {
        const error = this.commitFailure;
        this.commitFailure = null;
        throw error;
      }
      tx.commit();
      return result;
    } finally {
      tx.release();
    }
  }

  addCustomer(customer: Partial<Customer> & Pick<Customer, 'id'>): Customer {
    const full: Customer = {
      email: `${customer.id}@example.com`,
      balance: 0,
      totalSpent: 0,
      orderCount: 0,
      isVip: false,
      warnings: 0,
      ...customer,
    };
    this.customers.set(full.id, full);
    return full;
  }

  addDish(dish: Partial<Dish> & Pick<Dish, 'id' | 'price'>): Dish {
    const full: Dish = {name: dish.id, isVipOnly: false, isAvailable: true, ...dish};
    this.dishes.set(full.id, full);
    return full;
  }

  addDeliveryPerson(person: Partial<DeliveryPerson> & Pick<DeliveryPerson, 'id'>): DeliveryPerson {
    const full: DeliveryPerson = {email: `${person.id}@example.com`, isActive: true, ...person};
    this.deliveryPeople.set(full.id, full);
    return full;
  }
}

export const TEST_NOW = new Date('2024-05-01T12:00:00.000Z');

export const RESTAURANT = {latitude: 40.758, longitude: -73.9855};

export const RESTAURANT_ADDRESS = 'Times Square, New York, NY';

/**
 * AppEffects over the store, with jest.fn() for every outbound service.
 * Ids come out as id-1, id-2, ... in call order.
 */
export function createTestEffects(store: InMemoryStore, overrides: Partial<AppEffects> = {}): AppEffects {
  let sequence = 0;
  return {
    customers: {
      getById: async id => store.customers.get(id) ?? null,
    },
    dishes: {
      getByIds: async ids => {
        const found: Record<string, Dish> = {};
        for (const id of ids) {
          const dish = store.dishes.get(id);
          if (dish) found[id] = dish;
        }
        return found;
      },
    },
    deliveryPeople: {
      getById: async id => store.deliveryPeople.get(id) ?? null,
    },
    orders: {
      getById: async id => store.orders.get(id) ?? null,
      listByStatus: async status => [...store.orders.values()].filter(order => order.status === status),
    },
    bids: {
      listForOrder: async orderId => store.bidsFor(orderId),
      listForDeliveryPerson: async deliveryPersonId =>
        [...store.bids.values()].flat().filter(bid => bid.deliveryPersonId === deliveryPersonId),
    },
    ledger: {
      listForCustomer: async customerId => store.ledger.filter(entry => entry.customerId === customerId),
    },
    unitOfWork: store,
    geo: {
      geocode: jest.fn().mockResolvedValue({latitude: 40.7128, longitude: -74.006}),
      route: jest.fn().mockResolvedValue({
        distanceMeters: 6400,
        durationSeconds: 900,
        instructions: ['Head south on 7th Avenue', 'Arrive at destination'],
        path: [RESTAURANT, {latitude: 40.7128, longitude: -74.006}],
      }),
    },
    cache: {
      set: jest.fn().mockResolvedValue(undefined),
    },
    notifications: {
      sendEmail: jest.fn().mockResolvedValue(undefined),
    },
    monitoring: {
      sendAlerts: jest.fn().mockResolvedValue(undefined),
    },
    analytics: {
      trackEvent: jest.fn().mockResolvedValue(undefined),
    },
    clock: {
      now: () => new Date(TEST_NOW),
    },
    ids: {
      next: () => `id-${++sequence}`,
    },
    restaurant: {
      address: RESTAURANT_ADDRESS,
      location: RESTAURANT,
      defaultDeliveryAddress: 'New York, NY',
    },
    ...overrides,
  };
}
