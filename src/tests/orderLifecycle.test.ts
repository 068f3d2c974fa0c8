import {Customer, Order, OrderStatus} from '../domain';
import {
  assign,
  canTransition,
  complete,
  confirm,
  draftOrder,
  isTerminal,
  openBidding,
  reject,
  transition,
} from '../pure/orderLifecycle';

const t0 = new Date('2024-05-01T12:00:00.000Z');
const t1 = new Date('2024-05-01T12:05:00.000Z');

const customer: Customer = {
  id: 'cust-1',
  email: 'cust-1@example.com',
  balance: 10_000,
  totalSpent: 0,
  orderCount: 0,
  isVip: false,
  warnings: 0,
};

const draft: Order = draftOrder(
  'order-1',
  customer,
  [{dishId: 'ramen', dishName: 'Shoyu Ramen', quantity: 1, unitPrice: 1250}],
  {subtotal: 1250, discount: 0, finalAmount: 1250},
  '1 Main St',
  t0
);

describe('draftOrder', () => {
  it('starts in draft with one history entry', () => {
    expect(draft.status).toBe('draft');
    expect(draft.deliveryPersonId).toBeNull();
    expect(draft.history).toEqual([{status: 'draft', at: t0}]);
  });
});

describe('canTransition', () => {
  const allowed: Array<[OrderStatus, OrderStatus]> = [
    ['draft', 'confirmed'],
    ['draft', 'rejected'],
    ['confirmed', 'bidding_open'],
    ['bidding_open', 'assigned'],
    ['assigned', 'completed'],
  ];

  it.each(allowed)('allows %s -> %s', (from, to) => {
    expect(canTransition(from, to)).toBe(true);
  });

  it.each<[OrderStatus, OrderStatus]>([
    ['draft', 'bidding_open'],
    ['confirmed', 'assigned'],
    ['bidding_open', 'bidding_open'],
    ['assigned', 'assigned'],
    ['completed', 'confirmed'],
    ['rejected', 'confirmed'],
  ])('refuses %s -> %s', (from, to) => {
    expect(canTransition(from, to)).toBe(false);
  });

  it('treats completed and rejected as terminal', () => {
    expect(isTerminal('completed')).toBe(true);
    expect(isTerminal('rejected')).toBe(true);
    expect(isTerminal('assigned')).toBe(false);
  });
});

describe('transition', () => {
  it('walks the full happy path and records each step', () => {
    const done = confirm(draft, t1)
      .chain(order => openBidding(order, t1))
      .chain(order => assign(order, 'driver-b', t1))
      .chain(order => complete(order, t1));

    expect(done.isRight()).toBe(true);
    done.ifRight(order => {
      expect(order.status).toBe('completed');
      expect(order.deliveryPersonId).toBe('driver-b');
      expect(order.history.map(change => change.status))
        .toEqual(['draft', 'confirmed', 'bidding_open', 'assigned', 'completed']);
    });
  });

  it('leaves amounts untouched', () => {
    const confirmed = confirm(draft, t1);

    confirmed.ifRight(order => {
      expect(order.finalAmount).toBe(draft.finalAmount);
      expect(order.subtotal).toBe(draft.subtotal);
    });
    expect(confirmed.isRight()).toBe(true);
  });

  it('reports the refused step', () => {
    expect(transition(draft, 'completed', t1).extract()).toEqual({
      kind: 'InvalidTransition',
      orderId: 'order-1',
      from: 'draft',
      to: 'completed',
    });
  });

  it('does not move a rejected order anywhere', () => {
    const rejected = reject(draft, t1);

    expect(rejected.chain(order => confirm(order, t1)).extract()).toEqual({
      kind: 'InvalidTransition',
      orderId: 'order-1',
      from: 'rejected',
      to: 'confirmed',
    });
  });
});
