import { streamSSE } from 'hono/streaming';

import { finishChatTurn, prepareChatTurn } from '../domain/chat';
import type { ChatResponse } from '../types/api';
import type { HttpApp, HttpContext } from '../types/http';
import { parseChatBody } from '../utils/request-parsing';

const PROVIDER_FAILED = 'The model provider is unavailable, please retry';

async function readChatRequest(c: HttpContext) {
    const { MODELS, DEFAULT_MODEL } = c.get('config');
    const body: unknown = await c.req.json().catch(() => null);
    return parseChatBody(body, MODELS, DEFAULT_MODEL);
}

export function registerChatRoutes(app: HttpApp) {
    app.post('/sessions/:id/chat', async (c) => {
        const { accountId } = c.get('auth');
        const parsed = await readChatRequest(c);
        if ('error' in parsed) return c.json({ error: parsed.error }, 400);

        const services = { config: c.get('config'), storage: c.get('storage'), compressor: c.get('compressor') };
        const turn = await prepareChatTurn(services, accountId, c.req.param('id'), parsed.message, parsed.model);
        if (!turn.ok) return c.json(turn.body, turn.status);

        let reply: string;
        try {
            reply = await c.get('provider').complete(turn.request);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.error(`Chat in ${turn.session.public_id} failed: ${message}`);
            return c.json({ error: PROVIDER_FAILED }, 502);
        }

        const usage = await finishChatTurn(services, accountId, turn.session, reply);
        const response: ChatResponse = { response: reply, model: parsed.model, ...usage };
        return c.json(response);
    });

    app.post('/sessions/:id/chat/stream', async (c) => {
        const { accountId } = c.get('auth');
        const parsed = await readChatRequest(c);
        if ('error' in parsed) return c.json({ error: parsed.error }, 400);

        const services = { config: c.get('config'), storage: c.get('storage'), compressor: c.get('compressor') };
        const turn = await prepareChatTurn(services, accountId, c.req.param('id'), parsed.message, parsed.model);
        if (!turn.ok) return c.json(turn.body, turn.status);

        const provider = c.get('provider');
        return streamSSE(c, async (stream) => {
            let reply = '';
            try {
                for await (const delta of provider.stream(turn.request)) {
                    reply += delta;
                    await stream.writeSSE({ data: JSON.stringify({ content: delta }) });
                }
            } catch (error) {
                const message = error instanceof Error ? error.message : String(error);
                console.error(`Streamed chat in ${turn.session.public_id} failed: ${message}`);
                await stream.writeSSE({ data: JSON.stringify({ error: PROVIDER_FAILED }) });
                return;
            }

            if (!reply) {
                await stream.writeSSE({ data: JSON.stringify({ error: PROVIDER_FAILED }) });
                return;
            }

            const usage = await finishChatTurn(services, accountId, turn.session, reply);
            await stream.writeSSE({ data: JSON.stringify({ done: true, ...usage }) });
        });
    });
}
