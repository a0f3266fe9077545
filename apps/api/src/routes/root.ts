import type { HttpApp } from '../types/http';

export function registerRootRoutes(app: HttpApp) {
    app.get('/', (c) => {
        return c.json({
            message: 'Threadkeep API',
            docs: 'Create a session, then POST /sessions/:id/chat.',
        });
    });

    app.get('/health', (c) => c.json({ status: 'ok' }));

    app.get('/models', (c) => {
        const { MODELS, DEFAULT_MODEL } = c.get('config');
        return c.json({
            data: Object.entries(MODELS).map(([alias, id]) => ({ alias, id, default: alias === DEFAULT_MODEL })),
        });
    });
}
