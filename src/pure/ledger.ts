/**
 * ACCOUNT LEDGER
 *
 * Balance changes are computed here as values: the updated customer plus the
 * ledger entry that records the change. Persisting both in one unit of work
 * is the coordinator's job.
 */

import {Customer} from '../domain';
import {LedgerUpdate, OrderingError} from './types';
import {insufficientFunds, invalidAmount} from './errors';
import {isWholeCents} from './money';
import {Either, Left, Right} from 'purify-ts';

export function deposit(
  customer: Customer,
  amount: number,
  entryId: string,
  at: Date
): Either<OrderingError, LedgerUpdate> {
  if (!isWholeCents(amount) || amount <= 0) return Left(invalidAmount(amount));

  const balance = customer.balance + amount;
  return Right({
    customer: {...customer, balance},
    entry: {
      id: entryId,
      customerId: customer.id,
      kind: 'deposit',
      amount,
      balanceAfter: balance,
      orderId: null,
      createdAt: at,
    },
  });
}

/**
 * Debit an order's final amount. Spend grows by the same amount; there is no
 * partial debit.
 */
export function debit(
  customer: Customer,
  amount: number,
  orderId: string,
  entryId: string,
  at: Date
): Either<OrderingError, LedgerUpdate> {
  if (!isWholeCents(amount) || amount < 0) return Left(invalidAmount(amount));
  if (customer.balance < amount) return Left(insufficientFunds(orderId, amount, customer.balance, customer.warnings));

  const balance = customer.balance - amount;
  return Right({
    customer: {...customer, balance, totalSpent: customer.totalSpent + amount},
    entry: {
      id: entryId,
      customerId: customer.id,
      kind: 'debit',
      amount,
      balanceAfter: balance,
      orderId,
      createdAt: at,
    },
  });
}
