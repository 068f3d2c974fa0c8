/**
 * POSTGRESQL PERSISTENCE
 *
 * Plain repositories for lock-free reads and a unit of work whose
 * transaction takes `FOR UPDATE` row locks. Tables are defined in
 * db/schema.sql; money columns hold cents.
 */

import {Bid, BidState, Customer, DeliveryPerson, Dish, LedgerEntry, Order, OrderStatus} from '../domain';
import {
  BidRepository,
  CustomerRepository,
  DeliveryPersonRepository,
  DishRepository,
  LedgerRepository,
  OrderRepository,
  OrderingTransaction,
  UnitOfWork,
} from '../pure/effects';
import {Pool, PoolClient} from 'pg';

// ============================================================================
// Rows
// ============================================================================

// BIGINT columns come back from pg as strings
type Int8 = string | number;

type CustomerRow = {
  id: string;
  email: string;
  balance_cents: Int8;
  total_spent_cents: Int8;
  order_count: number;
  is_vip: boolean;
  warnings: number;
};

type DishRow = {
  id: string;
  name: string;
  price_cents: Int8;
  is_vip_only: boolean;
  is_available: boolean;
};

type DeliveryPersonRow = {
  id: string;
  email: string;
  is_active: boolean;
};

type OrderRow = {
  id: string;
  customer_id: string;
  subtotal_cents: Int8;
  discount_cents: Int8;
  final_amount_cents: Int8;
  status: OrderStatus;
  delivery_person_id: string | null;
  delivery_address: string;
  created_at: Date;
  history: Array<{ status: OrderStatus; at: string }>;
};

type OrderLineRow = {
  order_id: string;
  dish_id: string;
  dish_name: string;
  quantity: number;
  unit_price_cents: Int8;
};

type BidRow = {
  id: string;
  order_id: string;
  delivery_person_id: string;
  amount_cents: Int8;
  submitted_at: Date;
  state: BidState;
  justification: string | null;
};

type LedgerRow = {
  id: string;
  customer_id: string;
  kind: 'deposit' | 'debit';
  amount_cents: Int8;
  balance_after_cents: Int8;
  order_id: string | null;
  created_at: Date;
};

const toCustomer = (row: CustomerRow): Customer => ({
  id: row.id,
  email: row.email,
  balance: Number(row.balance_cents),
  totalSpent: Number(row.total_spent_cents),
  orderCount: row.order_count,
  isVip: row.is_vip,
  warnings: row.warnings,
});

const toOrder = (row: OrderRow, lines: OrderLineRow[]): Order => ({
  id: row.id,
  customerId: row.customer_id,
  lines: lines.map(line => ({
    dishId: line.dish_id,
    dishName: line.dish_name,
    quantity: line.quantity,
    unitPrice: Number(line.unit_price_cents),
  })),
  subtotal: Number(row.subtotal_cents),
  discount: Number(row.discount_cents),
  finalAmount: Number(row.final_amount_cents),
  status: row.status,
  deliveryPersonId: row.delivery_person_id,
  deliveryAddress: row.delivery_address,
  createdAt: row.created_at,
  history: row.history.map(change => ({status: change.status, at: new Date(change.at)})),
});

const toBid = (row: BidRow): Bid => ({
  id: row.id,
  orderId: row.order_id,
  deliveryPersonId: row.delivery_person_id,
  amount: Number(row.amount_cents),
  submittedAt: row.submitted_at,
  state: row.state,
  justification: row.justification,
});

const toLedgerEntry = (row: LedgerRow): LedgerEntry => ({
  id: row.id,
  customerId: row.customer_id,
  kind: row.kind,
  amount: Number(row.amount_cents),
  balanceAfter: Number(row.balance_after_cents),
  orderId: row.order_id,
  createdAt: row.created_at,
});

// ============================================================================
// Shared queries
// ============================================================================

async function withClient<T>(pool: Pool, query: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  try {
    return await query(client);
  } finally {
    client.release();
  }
}

const CUSTOMER_COLUMNS = 'id, email, balance_cents, total_spent_cents, order_count, is_vip, warnings';
const ORDER_COLUMNS =
  'id, customer_id, subtotal_cents, discount_cents, final_amount_cents, status, ' +
  'delivery_person_id, delivery_address, created_at, history';
const BID_COLUMNS = 'id, order_id, delivery_person_id, amount_cents, submitted_at, state, justification';

async function selectCustomer(db: PoolClient, id: string, lock: boolean): Promise<Customer | null> {
  const result = await db.query<CustomerRow>(
    `SELECT ${CUSTOMER_COLUMNS} FROM customers WHERE id = $1${lock ? ' FOR UPDATE' : ''}`,
    [id]
  );
  return result.rows.length === 0 ? null : toCustomer(result.rows[0]);
}

async function selectOrder(db: PoolClient, id: string, lock: boolean): Promise<Order | null> {
  const orderResult = await db.query<OrderRow>(
    `SELECT ${ORDER_COLUMNS} FROM orders WHERE id = $1${lock ? ' FOR UPDATE' : ''}`,
    [id]
  );
  if (orderResult.rows.length === 0) {
    return null;
  }

  const linesResult = await db.query<OrderLineRow>(
    'SELECT order_id, dish_id, dish_name, quantity, unit_price_cents FROM order_lines WHERE order_id = $1 ORDER BY position',
    [id]
  );
  return toOrder(orderResult.rows[0], linesResult.rows);
}

async function selectBids(db: PoolClient, orderId: string): Promise<Bid[]> {
  const result = await db.query<BidRow>(
    `SELECT ${BID_COLUMNS} FROM bids WHERE order_id = $1 ORDER BY amount_cents, submitted_at`,
    [orderId]
  );
  return result.rows.map(toBid);
}

const serialiseHistory = (order: Order) =>
  JSON.stringify(order.history.map(change => ({status: change.status, at: change.at.toISOString()})));

// ============================================================================
// PostgreSQL Repositories
// ============================================================================

class PostgresCustomerRepository implements CustomerRepository {
  constructor(private pool: Pool) {}

  getById(id: string): Promise<Customer | null> {
    return withClient(this.pool, client => selectCustomer(client, id, false));
  }
}

class PostgresDishRepository implements DishRepository {
  constructor(private pool: Pool) {}

  async getByIds(ids: string[]): Promise<Record<string, Dish>> {
    if (ids.length === 0) {
      return {};
    }

    const result = await withClient(this.pool, client => client.query<DishRow>(
      'SELECT id, name, price_cents, is_vip_only, is_available FROM dishes WHERE id = ANY($1)',
      [ids]
    ));

    const dishes: Record<string, Dish> = {};
    for (const row of result.rows) {
      dishes[row.id] = {
        id: row.id,
        name: row.name,
        price: Number(row.price_cents),
        isVipOnly: row.is_vip_only,
        isAvailable: row.is_available,
      };
    }
    return dishes;
  }
}

class PostgresDeliveryPersonRepository implements DeliveryPersonRepository {
  constructor(private pool: Pool) {}

  async getById(id: string): Promise<DeliveryPerson | null> {
    const result = await withClient(this.pool, client => client.query<DeliveryPersonRow>(
      'SELECT id, email, is_active FROM delivery_people WHERE id = $1',
      [id]
    ));
    if (result.rows.length === 0) {
      return null;
    }
    const row = result.rows[0];
    return {id: row.id, email: row.email, isActive: row.is_active};
  }
}

class PostgresOrderRepository implements OrderRepository {
  constructor(private pool: Pool) {}

  getById(id: string): Promise<Order | null> {
    return withClient(this.pool, client => selectOrder(client, id, false));
  }

  listByStatus(status: OrderStatus): Promise<Order[]> {
    return withClient(this.pool, async client => {
      const orderResult = await client.query<OrderRow>(
        `SELECT ${ORDER_COLUMNS} FROM orders WHERE status = $1 ORDER BY created_at, id`,
        [status]
      );
      if (orderResult.rows.length === 0) {
        return [];
      }

      const linesResult = await client.query<OrderLineRow>(
        'SELECT order_id, dish_id, dish_name, quantity, unit_price_cents FROM order_lines ' +
        'WHERE order_id = ANY($1) ORDER BY order_id, position',
        [orderResult.rows.map(row => row.id)]
      );
      return orderResult.rows.map(row =>
        toOrder(row, linesResult.rows.filter(line => line.order_id === row.id)));
    });
  }
}

class PostgresBidRepository implements BidRepository {
  constructor(private pool: Pool) {}

  listForOrder(orderId: string): Promise<Bid[]> {
    return withClient(this.pool, client => selectBids(client, orderId));
  }

  async listForDeliveryPerson(deliveryPersonId: string): Promise<Bid[]> {
    const result = await withClient(this.pool, client => client.query<BidRow>(
      `SELECT ${BID_COLUMNS} FROM bids WHERE delivery_person_id = $1 ORDER BY submitted_at, id`,
      [deliveryPersonId]
    ));
    return result.rows.map(toBid);
  }
}

class PostgresLedgerRepository implements LedgerRepository {
  constructor(private pool: Pool) {}

  async listForCustomer(customerId: string): Promise<LedgerEntry[]> {
    const result = await withClient(this.pool, client => client.query<LedgerRow>(
      'SELECT id, customer_id, kind, amount_cents, balance_after_cents, order_id, created_at ' +
      'FROM ledger_entries WHERE customer_id = $1 ORDER BY created_at, id',
      [customerId]
    ));
    return result.rows.map(toLedgerEntry);
  }
}

// ============================================================================
// PostgreSQL Unit of Work
// ============================================================================

class PostgresTransaction implements OrderingTransaction {
  constructor(private client: PoolClient) {}

  lockCustomer(id: string): Promise<Customer | null> {
    return selectCustomer(this.client, id, true);
  }

  lockOrder(id: string): Promise<Order | null> {
    return selectOrder(this.client, id, true);
  }

  listBids(orderId: string): Promise<Bid[]> {
    return selectBids(this.client, orderId);
  }

  async saveCustomer(customer: Customer): Promise<void> {
    await this.client.query(
      'UPDATE customers SET balance_cents = $1, total_spent_cents = $2, order_count = $3, is_vip = $4, warnings = $5 ' +
      'WHERE id = $6',
      [customer.balance, customer.totalSpent, customer.orderCount, customer.isVip, customer.warnings, customer.id]
    );
  }

  async appendLedgerEntry(entry: LedgerEntry): Promise<void> {
    await this.client.query(
      'INSERT INTO ledger_entries (id, customer_id, kind, amount_cents, balance_after_cents, order_id, created_at) ' +
      'VALUES ($1, $2, $3, $4, $5, $6, $7)',
      [entry.id, entry.customerId, entry.kind, entry.amount, entry.balanceAfter, entry.orderId, entry.createdAt]
    );
  }

  async insertOrder(order: Order): Promise<void> {
    await this.client.query(
      `INSERT INTO orders (${ORDER_COLUMNS}) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)`,
      [
        order.id, order.customerId, order.subtotal, order.discount, order.finalAmount, order.status,
        order.deliveryPersonId, order.deliveryAddress, order.createdAt, serialiseHistory(order),
      ]
    );

    for (const [position, line] of order.lines.entries()) {
      await this.client.query(
        'INSERT INTO order_lines (order_id, position, dish_id, dish_name, quantity, unit_price_cents) ' +
        'VALUES ($1, $2, $3, $4, $5, $6)',
        [order.id, position, line.dishId, line.dishName, line.quantity, line.unitPrice]
      );
    }
  }

  // Lines and amounts are fixed once an order exists
  async saveOrder(order: Order): Promise<void> {
    await this.client.query(
      'UPDATE orders SET status = $1, delivery_person_id = $2, history = $3 WHERE id = $4',
      [order.status, order.deliveryPersonId, serialiseHistory(order), order.id]
    );
  }

  async insertBid(bid: Bid): Promise<void> {
    await this.client.query(
      `INSERT INTO bids (${BID_COLUMNS}) VALUES ($1, $2, $3, $4, $5, $6, $7)`,
      [bid.id, bid.orderId, bid.deliveryPersonId, bid.amount, bid.submittedAt, bid.state, bid.justification]
    );
  }

  async saveBids(bids: Bid[]): Promise<void> {
    for (const bid of bids) {
      await this.client.query(
        'UPDATE bids SET state = $1, justification = $2 WHERE id = $3',
        [bid.state, bid.justification, bid.id]
      );
    }
  }
}

class PostgresUnitOfWork implements UnitOfWork {
  constructor(private pool: Pool) {}

  async run<T>(work: (tx: OrderingTransaction) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await work(new PostgresTransaction(client));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }
}

export type PostgresStore = {
  readonly customers: CustomerRepository;
  readonly dishes: DishRepository;
  readonly deliveryPeople: DeliveryPersonRepository;
  readonly orders: OrderRepository;
  readonly bids: BidRepository;
  readonly ledger: LedgerRepository;
  readonly unitOfWork: UnitOfWork;
};

export function createPostgresStore(pool: Pool): PostgresStore {
  return {
    customers: new PostgresCustomerRepository(pool),
    dishes: new PostgresDishRepository(pool),
    deliveryPeople: new PostgresDeliveryPersonRepository(pool),
    orders: new PostgresOrderRepository(pool),
    bids: new PostgresBidRepository(pool),
    ledger: new PostgresLedgerRepository(pool),
    unitOfWork: new PostgresUnitOfWork(pool),
  };
}
