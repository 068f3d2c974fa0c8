/**
 * TEMPORAL ACTIVITIES TYPE DEFINITIONS
 *
 * The activities registered in worker.ts, flattened to unique names so the
 * workflow can proxy them with per-group retry policies.
 */

import {CacheEntry, NotificationPayload} from '../types';
import {AnalyticsEvent, PlaceOrderCommand, PlacementOutcome, RejectedOrderAlert} from '../pure/types';

export interface Activities {
  // The whole placement transaction; its result must serialise to JSON
  readonly placeOrderTransaction: (command: PlaceOrderCommand) => Promise<PlacementOutcome>;

  // CacheService methods
  readonly setCacheEntry: (entry: CacheEntry) => Promise<void>;

  // NotificationService methods
  readonly sendEmail: (payload: NotificationPayload) => Promise<void>;

  // MonitoringService methods
  readonly sendAlerts: (alerts: RejectedOrderAlert[]) => Promise<void>;

  // AnalyticsService methods
  readonly trackEvent: (event: AnalyticsEvent) => Promise<void>;
}
