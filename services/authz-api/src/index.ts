import { pathToFileURL } from 'node:url';
import { ConfigGuard } from '../../../libs/bootstrap/config-guard.js';
import { MEMORY_STORE_GUARDS, loadServiceConfig } from '../../../libs/bootstrap/config/authz-config.js';
import { DB_CONFIG_GUARDS } from '../../../libs/bootstrap/config/db-config.js';
import { logger } from '../../../libs/logging/logger.js';
import { createAuthzService } from './container.js';
import type { AuthzService } from './container.js';

export { AuthzApi } from './AuthzApi.js';
export { createAuthzService } from './container.js';
export type { AuthzService, ServiceOverrides } from './container.js';

/**
 * Boots the service from the environment.
 * Fails closed: configuration violations exit the process.
 */
export async function bootstrap(env: NodeJS.ProcessEnv = process.env): Promise<AuthzService> {
    ConfigGuard.enforce(MEMORY_STORE_GUARDS, env);
    if ((env.AUTHZ_STORE ?? 'postgres') === 'postgres') {
        ConfigGuard.enforce(DB_CONFIG_GUARDS, env);
    }

    const config = loadServiceConfig(env);
    const service = createAuthzService(config);

    // Readiness probe: one round trip through the configured store.
    await service.store.listGroups();

    logger.info({
        environment: config.environment,
        store: config.store,
        cacheTtlMs: config.cache.ttlMs,
        policyFile: config.policyFile ?? null,
    }, 'Group authorization service initialized');

    return service;
}

async function main(): Promise<void> {
    const service = await bootstrap();
    await service.close();
}

const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
    main().catch(err => {
        logger.fatal(err);
        process.exit(1);
    });
}
