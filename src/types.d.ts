// Non domain types

export type NotificationPayload = {
    readonly to: string;
    readonly subject: string;
    readonly body: string;
};

export type CacheEntry = {
    readonly key: string;
    readonly value: string;
    readonly ttlSeconds: number;
};

export type Actor =
    | { readonly role: 'customer'; readonly id: string }
    | { readonly role: 'chef'; readonly id: string }
    | { readonly role: 'delivery'; readonly id: string }
    | { readonly role: 'manager'; readonly id: string };

export type Role = Actor['role'];
