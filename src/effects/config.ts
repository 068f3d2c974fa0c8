import {ProductionConfig} from './types';

type Env = Record<string, string | undefined>;

// Load configuration from environment variables
export function loadConfigFromEnv(env: Env = process.env): ProductionConfig {
  const region = env.AWS_DEFAULT_REGION || 'us-east-1';
  return {
    database: {
      host: env.DATABASE_HOST || 'localhost',
      port: parseInt(env.DATABASE_PORT || '5432', 10),
      user: env.DATABASE_USER || 'appuser',
      password: env.DATABASE_PASSWORD || 'apppassword',
      database: env.DATABASE_NAME || 'restaurantdb',
    },
    redis: {
      host: env.REDIS_HOST || 'localhost',
      port: parseInt(env.REDIS_PORT || '6379', 10),
    },
    routing: {
      baseUrl: env.OPENROUTESERVICE_BASE_URL || 'https://api.openrouteservice.org',
      apiKey: env.OPENROUTESERVICE_API_KEY || '',
      geocoderUrl: env.GEOCODER_URL || 'https://nominatim.openstreetmap.org',
      userAgent: env.GEOCODER_USER_AGENT || 'restaurant-delivery-system',
    },
    restaurant: {
      latitude: parseFloat(env.RESTAURANT_LATITUDE || '40.7580'),
      longitude: parseFloat(env.RESTAURANT_LONGITUDE || '-73.9855'),
      address: env.RESTAURANT_ADDRESS || 'Times Square, New York, NY',
      defaultDeliveryAddress: env.DEFAULT_DELIVERY_ADDRESS || 'New York, NY',
    },
    email: {
      host: env.SMTP_HOST || 'localhost',
      port: parseInt(env.SMTP_PORT || '1025', 10),
      from: env.SMTP_FROM || '"Restaurant Orders" <noreply@example.com>',
    },
    aws: {
      region,
      accessKeyId: env.AWS_ACCESS_KEY_ID || 'test',
      secretAccessKey: env.AWS_SECRET_ACCESS_KEY || 'test',
      monitoringEndpoint: env.AWS_ENDPOINT_MONITORING || 'http://localhost:4566',
      analyticsEndpoint: env.AWS_ENDPOINT_ANALYTICS || 'http://localhost:4567',
      alertTopicArn: env.ALERT_TOPIC_ARN || `arn:aws:sns:${region}:000000000000:order-alerts`,
      analyticsStream: env.ANALYTICS_STREAM || 'order-lifecycle-stream',
    },
  };
}
