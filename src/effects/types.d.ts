// ============================================================================
// Configuration
// ============================================================================

export type DatabaseConfig = {
    readonly host: string;
    readonly port: number;
    readonly user: string;
    readonly password: string;
    readonly database: string;
}

export type RedisConfig = {
    readonly host: string;
    readonly port: number;
}

export type RoutingConfig = {
    readonly baseUrl: string;
    readonly apiKey: string;
    readonly geocoderUrl: string;
    readonly userAgent: string;
}

export type RestaurantConfig = {
    readonly latitude: number;
    readonly longitude: number;
    readonly address: string;
    readonly defaultDeliveryAddress: string;
}

export type EmailConfig = {
    readonly host: string;
    readonly port: number;
    readonly from: string;
}

export type AwsConfig = {
    readonly region: string;
    readonly accessKeyId: string;
    readonly secretAccessKey: string;
    readonly monitoringEndpoint: string;
    readonly analyticsEndpoint: string;
    readonly alertTopicArn: string;
    readonly analyticsStream: string;
}

export type ProductionConfig = {
    readonly database: DatabaseConfig;
    readonly redis: RedisConfig;
    readonly routing: RoutingConfig;
    readonly restaurant: RestaurantConfig;
    readonly email: EmailConfig;
    readonly aws: AwsConfig;
}
