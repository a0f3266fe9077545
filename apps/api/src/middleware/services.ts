import type { HttpMiddleware, Services } from '../types/http';

export function servicesMiddleware(services: Services): HttpMiddleware {
    return async (c, next) => {
        c.set('config', services.config);
        c.set('storage', services.storage);
        c.set('provider', services.provider);
        c.set('compressor', services.compressor);
        await next();
    };
}
