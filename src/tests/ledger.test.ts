/**
 * Balance changes as values. The coordinator persists them; here we only
 * check the arithmetic and the guards.
 */

import {Customer} from '../domain';
import {debit, deposit} from '../pure/ledger';

const at = new Date('2024-05-01T12:00:00.000Z');

const customer: Customer = {
  id: 'cust-1',
  email: 'cust-1@example.com',
  balance: 5000,
  totalSpent: 0,
  orderCount: 0,
  isVip: false,
  warnings: 0,
};

describe('deposit', () => {
  it('adds to the balance and records the entry', () => {
    const update = deposit(customer, 2500, 'entry-1', at).extract();

    expect(update).toEqual({
      customer: {...customer, balance: 7500},
      entry: {
        id: 'entry-1',
        customerId: 'cust-1',
        kind: 'deposit',
        amount: 2500,
        balanceAfter: 7500,
        orderId: null,
        createdAt: at,
      },
    });
  });

  it.each([0, -100, 12.5, Number.NaN])('rejects %p', amount => {
    expect(deposit(customer, amount, 'entry-1', at).extract()).toEqual({kind: 'InvalidAmount', amount});
  });

  it('does not count deposits as spend', () => {
    const result = deposit(customer, 2500, 'entry-1', at);

    expect(result.map(update => update.customer.totalSpent).extract()).toBe(0);
  });
});

describe('debit', () => {
  it('takes the amount from the balance and adds it to spend', () => {
    const result = debit(customer, 4000, 'order-1', 'entry-2', at);

    expect(result.isRight()).toBe(true);
    result.ifRight(({customer: charged, entry}) => {
      expect(charged.balance).toBe(1000);
      expect(charged.totalSpent).toBe(4000);
      expect(entry).toEqual({
        id: 'entry-2',
        customerId: 'cust-1',
        kind: 'debit',
        amount: 4000,
        balanceAfter: 1000,
        orderId: 'order-1',
        createdAt: at,
      });
    });
  });

  it('can empty the balance exactly', () => {
    const result = debit(customer, 5000, 'order-1', 'entry-2', at);

    result.ifRight(({customer: charged}) => expect(charged.balance).toBe(0));
    expect(result.isRight()).toBe(true);
  });

  it('refuses to overdraw', () => {
    const result = debit(customer, 6000, 'order-1', 'entry-2', at);

    expect(result.extract()).toEqual({
      kind: 'InsufficientFunds',
      orderId: 'order-1',
      required: 6000,
      available: 5000,
      warnings: 0,
    });
  });

  it('rejects fractional cents', () => {
    expect(debit(customer, 99.5, 'order-1', 'entry-2', at).extract())
      .toEqual({kind: 'InvalidAmount', amount: 99.5});
  });
});

describe('balance conservation', () => {
  it('keeps balance equal to deposits minus debits', () => {
    let current = {...customer, balance: 0};
    const deposits = [5000, 2500, 1000];
    const debits = [3000, 4500];

    for (const amount of deposits) {
      current = deposit(current, amount, 'e', at).map(update => update.customer).orDefault(current);
    }
    for (const amount of debits) {
      current = debit(current, amount, 'o', 'e', at).map(update => update.customer).orDefault(current);
    }

    expect(current.balance).toBe(8500 - 7500);
    expect(current.totalSpent).toBe(7500);
  });
});
