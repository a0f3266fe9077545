import { serve } from '@hono/node-server';

import { createApp } from './app';
import { getApiConfig } from './config';
import { createServices } from './services';

const config = getApiConfig();
const app = createApp(createServices(config));

const port = Number(process.env.PORT ?? 8787);

serve({
    fetch: app.fetch,
    port,
});

console.log(`Threadkeep API listening on http://127.0.0.1:${port} (storage: ${config.DATABASE_PROVIDER})`);
