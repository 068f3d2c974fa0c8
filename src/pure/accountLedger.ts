/**
 * ACCOUNT LEDGER COORDINATOR
 *
 * Locks the customer, computes the balance change with the pure ledger and
 * writes the customer and its ledger entry in the same unit of work.
 */

import {LedgerEntry} from '../domain';
import {AppEffects} from './effects';
import {LedgerUpdate, OrderingError} from './types';
import {deposit} from './ledger';
import {notFound} from './errors';
import {Either, Left, Right} from 'purify-ts';

export function depositFunds(
  customerId: string,
  amount: number
): (appEffects: AppEffects) => Promise<Either<OrderingError, LedgerUpdate>> {
  return async (appEffects: AppEffects) =>
    appEffects.unitOfWork.run(async tx => {
      const customer = await tx.lockCustomer(customerId);
      if (!customer) return Left<OrderingError, LedgerUpdate>(notFound('customer', customerId));

      const update = deposit(customer, amount, appEffects.ids.next(), appEffects.clock.now());
      if (update.isRight()) {
        const {customer: updated, entry} = update.extract();
        await tx.saveCustomer(updated);
        await tx.appendLedgerEntry(entry);
      }
      return update;
    });
}

export function ledgerHistory(
  customerId: string
): (appEffects: AppEffects) => Promise<Either<OrderingError, LedgerEntry[]>> {
  return async (appEffects: AppEffects) => {
    const customer = await appEffects.customers.getById(customerId);
    if (!customer) return Left(notFound('customer', customerId));
    return Right(await appEffects.ledger.listForCustomer(customerId));
  };
}
