import {Customer} from '../domain';

export const VIP_SPEND_THRESHOLD = 10_000;
export const VIP_ORDER_THRESHOLD = 3;

export function evaluateVip(totalSpent: number, orderCount: number): boolean {
  return totalSpent >= VIP_SPEND_THRESHOLD || orderCount >= VIP_ORDER_THRESHOLD;
}

/**
 * Re-run the evaluation for a customer. Status is only ever upgraded here,
 * a VIP customer stays VIP whatever the counters say.
 */
export function reevaluateVip(customer: Customer): Customer {
  const isVip = customer.isVip || evaluateVip(customer.totalSpent, customer.orderCount);
  return isVip === customer.isVip ? customer : {...customer, isVip};
}
