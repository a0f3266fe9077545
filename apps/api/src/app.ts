import { Hono } from 'hono';

import { registerAuthMiddleware } from './middleware/auth';
import { corsMiddleware } from './middleware/cors';
import { servicesMiddleware } from './middleware/services';
import { registerChatRoutes } from './routes/chat';
import { registerCreditRoutes } from './routes/credits';
import { registerKeyRoutes } from './routes/keys';
import { registerRootRoutes } from './routes/root';
import { registerSessionRoutes } from './routes/sessions';
import type { AppEnv, Services } from './types/http';

export function createApp(services: Services) {
    const app = new Hono<AppEnv>();

    app.use('*', corsMiddleware(services.config.CORS_ORIGIN));
    app.use('*', servicesMiddleware(services));

    registerAuthMiddleware(app);
    registerRootRoutes(app);
    registerKeyRoutes(app);
    registerSessionRoutes(app);
    registerChatRoutes(app);
    registerCreditRoutes(app);

    app.onError((error, c) => {
        console.error(`Unhandled error on ${c.req.method} ${c.req.path}: ${error.message}`);
        return c.json({ error: 'Internal server error' }, 500);
    });

    return app;
}
