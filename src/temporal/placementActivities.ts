import {AppEffects} from '../pure/effects';
import {PlaceOrderCommand} from '../pure/types';
import {placeOrderTransaction} from '../pure/orderProcessing';
import {toPlacementOutcome} from '../pure/businessLogic';
import {Activities} from './activities';

/**
 * The activities the worker registers. Follow-ups are the effect methods
 * themselves, bound to their instances.
 */
export function createActivities(effects: AppEffects): Activities {
  return {
    placeOrderTransaction: async (command: PlaceOrderCommand) =>
      toPlacementOutcome(await placeOrderTransaction(command)(effects)),

    // CacheService methods
    setCacheEntry: effects.cache.set.bind(effects.cache),

    // NotificationService methods
    sendEmail: effects.notifications.sendEmail.bind(effects.notifications),

    // MonitoringService methods
    sendAlerts: effects.monitoring.sendAlerts.bind(effects.monitoring),

    // AnalyticsService methods
    trackEvent: effects.analytics.trackEvent.bind(effects.analytics),
  };
}
