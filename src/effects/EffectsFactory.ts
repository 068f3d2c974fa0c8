/**
 * PRODUCTION EFFECTS IMPLEMENTATION
 *
 * The real implementations behind AppEffects:
 * - PostgreSQL for customers, dishes, orders, bids and the ledger
 * - Nominatim + OpenRouteService for delivery routes
 * - Redis for order receipts
 * - SMTP (nodemailer) for e-mail
 * - CloudWatch + SNS for rejected-order alerts
 * - Kinesis for lifecycle analytics
 */
import {CacheEntry, NotificationPayload} from "../types";
import {AnalyticsEvent, RejectedOrderAlert} from '../pure/types';
import {
  AnalyticsService,
  AppEffects,
  CacheService,
  Clock,
  IdGenerator,
  MonitoringService,
  NotificationService,
} from '../pure/effects';
import {AwsConfig, EmailConfig, ProductionConfig} from './types';
import {loadConfigFromEnv} from './config';
import {createPostgresStore, PostgresStore} from './PostgresStore';
import {OpenRouteGeoService} from './OpenRouteGeoService';
import {Pool} from 'pg';
import {createClient} from 'redis';
import nodemailer, {Transporter} from 'nodemailer';
import {CloudWatchClient, PutMetricDataCommand} from '@aws-sdk/client-cloudwatch';
import {PublishCommand, SNSClient} from '@aws-sdk/client-sns';
import {KinesisClient, PutRecordCommand} from '@aws-sdk/client-kinesis';
import {monotonicFactory} from 'ulid';

// ============================================================================
// Redis Cache Service
// ============================================================================

class RedisCacheService implements CacheService {
  constructor(private client: ReturnType<typeof createClient>) {}

  async set(entry: CacheEntry): Promise<void> {
    try {
      await this.client.setEx(entry.key, entry.ttlSeconds, entry.value);
    } catch (error) {
      console.error('Failed to set cache entry:', error);
      throw new Error('Cache service unavailable');
    }
  }
}

// ============================================================================
// Nodemailer Notification Service
// ============================================================================

class NodemailerNotificationService implements NotificationService {
  private transporter: Transporter;

  constructor(private config: EmailConfig) {
    this.transporter = nodemailer.createTransport({
      host: config.host,
      port: config.port,
      secure: false,
      ignoreTLS: true,
    });
  }

  async sendEmail(payload: NotificationPayload): Promise<void> {
    try {
      await this.transporter.sendMail({
        from: this.config.from,
        to: payload.to,
        subject: payload.subject,
        text: payload.body,
        html: `<p>${payload.body.replace(/\n/g, '<br>')}</p>`,
      });
      console.log(`📧 Email sent to ${payload.to}: ${payload.subject}`);
    } catch (error) {
      console.error('Failed to send email:', error);
      throw new Error('Email service unavailable');
    }
  }
}

// ============================================================================
// CloudWatch Monitoring Service (CloudWatch + SNS)
// ============================================================================

class CloudWatchMonitoringService implements MonitoringService {
  private cloudwatch: CloudWatchClient;
  private sns: SNSClient;

  constructor(private config: AwsConfig) {
    const clientConfig = {
      region: config.region,
      endpoint: config.monitoringEndpoint,
      credentials: {
        accessKeyId: config.accessKeyId,
        secretAccessKey: config.secretAccessKey,
      },
    };
    this.cloudwatch = new CloudWatchClient(clientConfig);
    this.sns = new SNSClient(clientConfig);
  }

  async sendAlerts(alerts: RejectedOrderAlert[]): Promise<void> {
    if (alerts.length === 0) {
      return;
    }

    try {
      await this.cloudwatch.send(new PutMetricDataCommand({
        Namespace: 'RestaurantOrdering',
        MetricData: [
          {
            MetricName: 'RejectedOrders',
            Value: alerts.length,
            Unit: 'Count',
            Timestamp: new Date(),
          },
        ],
      }));

      const message = alerts
        .map(alert => `Order ${alert.orderId} (customer ${alert.customerId}): ` +
          `required ${alert.required} cents, available ${alert.available} cents`)
        .join('\n');

      await this.sns.send(new PublishCommand({
        TopicArn: this.config.alertTopicArn,
        Subject: 'Ordering Alert: Orders Rejected For Insufficient Funds',
        Message: `The following orders were rejected:\n\n${message}`,
      }));

      console.log(`🚨 Sent ${alerts.length} rejected order alerts to monitoring service`);
    } catch (error) {
      console.error('Failed to send monitoring alerts:', error);
      throw new Error('Monitoring service unavailable');
    }
  }
}

// ============================================================================
// Kinesis Analytics Service
// ============================================================================

class KinesisAnalyticsService implements AnalyticsService {
  private kinesis: KinesisClient;

  constructor(private config: AwsConfig) {
    this.kinesis = new KinesisClient({
      region: config.region,
      endpoint: config.analyticsEndpoint,
      credentials: {
        accessKeyId: config.accessKeyId,
        secretAccessKey: config.secretAccessKey,
      },
    });
  }

  async trackEvent(event: AnalyticsEvent): Promise<void> {
    try {
      await this.kinesis.send(new PutRecordCommand({
        StreamName: this.config.analyticsStream,
        PartitionKey: event.orderId,
        Data: Buffer.from(JSON.stringify({
          ...event,
          timestamp: new Date().toISOString(),
        })),
      }));
    } catch (error) {
      console.error('Failed to track analytics event:', error);
      throw new Error('Analytics service unavailable');
    }
  }
}

// ============================================================================
// Clock & Ids
// ============================================================================

const systemClock: Clock = {
  now: () => new Date(),
};

function ulidGenerator(): IdGenerator {
  const next = monotonicFactory();
  return {next: () => next()};
}

// ============================================================================
// Production EffectsFactory
// ============================================================================

class EffectsFactory {
  private _pool?: Pool;
  private _redisClient?: ReturnType<typeof createClient>;

  constructor(private config: ProductionConfig) {}

  private async getPool(): Promise<Pool> {
    if (!this._pool) {
      this._pool = new Pool({
        host: this.config.database.host,
        port: this.config.database.port,
        user: this.config.database.user,
        password: this.config.database.password,
        database: this.config.database.database,
        max: 20,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
      });

      try {
        const client = await this._pool.connect();
        console.log('✅ Connected to PostgreSQL');
        client.release();
      } catch (error) {
        console.error('❌ Failed to connect to PostgreSQL:', error);
        throw error;
      }
    }
    return this._pool;
  }

  private async getRedisClient(): Promise<ReturnType<typeof createClient>> {
    if (!this._redisClient) {
      this._redisClient = createClient({
        socket: {
          host: this.config.redis.host,
          port: this.config.redis.port,
        },
      });

      this._redisClient.on('error', (err) => console.error('Redis Client Error:', err));

      await this._redisClient.connect();
      console.log('✅ Connected to Redis');
    }
    return this._redisClient;
  }

  /**
   * Open the PostgreSQL pool and the Redis connection, then assemble every
   * effect around them.
   */
  async build(): Promise<AppEffects> {
    const store: PostgresStore = createPostgresStore(await this.getPool());
    const redis = await this.getRedisClient();
    console.log('✅ All production effects initialized');

    return {
      ...store,
      geo: new OpenRouteGeoService(this.config.routing),
      cache: new RedisCacheService(redis),
      notifications: new NodemailerNotificationService(this.config.email),
      monitoring: new CloudWatchMonitoringService(this.config.aws),
      analytics: new KinesisAnalyticsService(this.config.aws),
      clock: systemClock,
      ids: ulidGenerator(),
      restaurant: {
        address: this.config.restaurant.address,
        location: {
          latitude: this.config.restaurant.latitude,
          longitude: this.config.restaurant.longitude,
        },
        defaultDeliveryAddress: this.config.restaurant.defaultDeliveryAddress,
      },
    };
  }
}

export async function makeAppEffects(config?: ProductionConfig): Promise<AppEffects> {
  return new EffectsFactory(config ?? loadConfigFromEnv()).build();
}
