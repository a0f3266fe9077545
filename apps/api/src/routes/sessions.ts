import { buildModelHistory, toMessage } from '../domain/history';
import { welcomeMessage } from '../domain/prompts';
import { generateSessionId } from '../domain/public-ids';
import { findOwnedSession, toMessageResponse, toSessionResponse } from '../domain/sessions';
import type { StorageAdapter } from '../storage/types';
import type { HttpApp } from '../types/http';
import {
    parseCreateSessionBody,
    parseLimit,
    parseMessagesBody,
    parseUpdateSessionBody,
} from '../utils/request-parsing';

async function rollbackSession(storage: StorageAdapter, publicId: string) {
    try {
        await storage.deleteSession(publicId);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`Rollback failed for session ${publicId}: ${message}`);
    }
}

export function registerSessionRoutes(app: HttpApp) {
    app.post('/sessions', async (c) => {
        const { accountId } = c.get('auth');
        const parsed = parseCreateSessionBody(await c.req.json().catch(() => null));
        if ('error' in parsed) return c.json({ error: parsed.error }, 400);

        const storage = c.get('storage');
        const session = await storage.insertSession({
            public_id: generateSessionId(),
            account_id: accountId,
            topic: parsed.topic,
            collected_data: parsed.collectedData,
        });
        if (!session) return c.json({ error: 'Failed to create session' }, 500);

        try {
            const messages = await storage.insertMessages(session.public_id, [
                { role: 'assistant', content: welcomeMessage(session.topic) },
            ]);
            return c.json({ ...toSessionResponse(session), messages: messages.map(toMessageResponse) }, 201);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.error(`Welcome message failed for session ${session.public_id}: ${message}`);
            await rollbackSession(storage, session.public_id);
            return c.json({ error: 'Failed to create session' }, 500);
        }
    });

    app.get('/sessions', async (c) => {
        const { accountId } = c.get('auth');
        const sessions = await c.get('storage').listSessions(accountId, parseLimit(c.req.query('limit')));
        return c.json({ data: sessions.map(toSessionResponse) });
    });

    app.get('/sessions/:id', async (c) => {
        const { accountId } = c.get('auth');
        const storage = c.get('storage');

        const lookup = await findOwnedSession(storage, accountId, c.req.param('id'));
        if (!lookup.ok) return c.json({ error: lookup.error }, lookup.status);

        const messages = await storage.listMessages(lookup.session.public_id);
        return c.json({ ...toSessionResponse(lookup.session), messages: messages.map(toMessageResponse) });
    });

    app.patch('/sessions/:id', async (c) => {
        const { accountId } = c.get('auth');
        const storage = c.get('storage');

        const parsed = parseUpdateSessionBody(await c.req.json().catch(() => null));
        if ('error' in parsed) return c.json({ error: parsed.error }, 400);

        const lookup = await findOwnedSession(storage, accountId, c.req.param('id'));
        if (!lookup.ok) return c.json({ error: lookup.error }, lookup.status);

        const { session } = lookup;
        const updated = await storage.updateSession(session.public_id, {
            status: parsed.status,
            collected_data: parsed.collectedData ? { ...session.collected_data, ...parsed.collectedData } : undefined,
        });
        if (!updated) return c.json({ error: 'Failed to update session' }, 500);

        return c.json(toSessionResponse(updated));
    });

    app.post('/sessions/:id/messages', async (c) => {
        const { accountId } = c.get('auth');
        const storage = c.get('storage');

        const parsed = parseMessagesBody(await c.req.json().catch(() => null));
        if ('error' in parsed) return c.json({ error: parsed.error }, 400);

        const lookup = await findOwnedSession(storage, accountId, c.req.param('id'));
        if (!lookup.ok) return c.json({ error: lookup.error }, lookup.status);
        if (lookup.session.status === 'archived') return c.json({ error: 'Session is archived' }, 409);

        const inserted = await storage.insertMessages(lookup.session.public_id, parsed.messages);
        return c.json({ data: inserted.map(toMessageResponse) }, 201);
    });

    app.get('/sessions/:id/context', async (c) => {
        const { accountId } = c.get('auth');
        const storage = c.get('storage');
        const config = c.get('config');

        const rawMaxChars = c.req.query('max_chars');
        const maxChars = rawMaxChars === undefined ? config.MAX_HISTORY_CHARS : Number(rawMaxChars);
        if (!Number.isInteger(maxChars) || maxChars <= 0) {
            return c.json({ error: 'max_chars must be a positive integer' }, 400);
        }

        const lookup = await findOwnedSession(storage, accountId, c.req.param('id'));
        if (!lookup.ok) return c.json({ error: lookup.error }, lookup.status);

        const rows = await storage.listMessages(lookup.session.public_id);
        const history = await buildModelHistory(rows.map(toMessage), c.get('compressor'), {
            maxChars,
            topic: lookup.session.topic,
        });

        return c.json({
            compressed: history.compressed,
            total_messages: rows.length,
            data: history.turns,
        });
    });
}
