/**
 * TEMPORAL WORKFLOW - Durable order placement
 *
 * The transaction runs once as a single activity. Each follow-up is its own
 * activity with its own retry policy, so a flaky mail server is retried
 * without ever charging the customer twice.
 */
import {announcePlacement} from '../pure/orderProcessing';
import type {FollowUpEffects} from '../pure/effects';
import type {PlaceOrderCommand, PlacementOutcome} from '../pure/types';
import type {Activities} from './activities';
import {ActivityOptions, proxyActivities} from '@temporalio/workflow';

// A retried charge could debit twice; the caller decides what to do instead
const transactionActivityOptions: ActivityOptions = {
  startToCloseTimeout: '60s',
  retry: {
    maximumAttempts: 1,
  },
}

const cacheActivityOptions: ActivityOptions = {
  startToCloseTimeout: '120s',
  retry: {
    initialInterval: 250,
    backoffCoefficient: 2,
    maximumAttempts: 10,
    maximumInterval: 10000,
  },
}

const defaultActivityOptions: ActivityOptions = {
  startToCloseTimeout: '120s',
  retry: {
    initialInterval: 1000,
    backoffCoefficient: 2,
    maximumAttempts: 10,
    maximumInterval: 30000,
  },
}

const {
  placeOrderTransaction,
} = proxyActivities<Pick<Activities, 'placeOrderTransaction'>>(transactionActivityOptions);

const {
  setCacheEntry,
} = proxyActivities<Pick<Activities, 'setCacheEntry'>>(cacheActivityOptions);

const {
  sendEmail,
  sendAlerts,
  trackEvent,
} = proxyActivities<Pick<Activities, 'sendEmail' | 'sendAlerts' | 'trackEvent'>>(defaultActivityOptions);

export async function placeOrderWorkflow(command: PlaceOrderCommand): Promise<PlacementOutcome> {
  const outcome = await placeOrderTransaction(command);

  const temporalFollowUps: FollowUpEffects = {
    cache: {
      set: setCacheEntry,
    },
    notifications: {
      sendEmail: sendEmail,
    },
    monitoring: {
      sendAlerts: sendAlerts,
    },
    analytics: {
      trackEvent: trackEvent,
    },
  };

  await announcePlacement(command.customerId, outcome)(temporalFollowUps);
  return outcome;
}
