import config from '../config';
import { getDatabase } from '../config/database';
import { getRedisClient } from '../config/redis';
import { AuthStores } from '../core/auth/stores';
import { createPostgresStores } from '../repositories';
import { AuthService, createAuthService } from './auth.service';
import { createRedisKeyValueStore } from './revocation.service';

export interface Services {
    stores: AuthStores;
    authService: AuthService;
}

let services: Promise<Services> | null = null;

async function createServices(): Promise<Services> {
    const redis = await getRedisClient();
    const stores = createPostgresStores(getDatabase(), createRedisKeyValueStore(redis));

    return { stores, authService: createAuthService(stores, config.auth) };
}

/**
 * Process-wide services over the shared PostgreSQL pools and Redis client,
 * wired on first use. A failed start is not cached.
 */
export function getServices(): Promise<Services> {
    if (!services) {
        services = createServices().catch((error: unknown) => {
            services = null;
            throw error;
        });
    }
    return services;
}

export async function getAuthService(): Promise<AuthService> {
    return (await getServices()).authService;
}

export function resetServices(): void {
    services = null;
}
