import { describe, expect, it } from 'vitest';
import { formatSummaryTurn } from '@threadkeep/compression';

import { welcomeMessage } from '../src/domain/prompts';
import { authHeaders, createTestApp } from './helpers';

async function setup() {
    const ctx = await createTestApp();
    const res = await ctx.app.request('/sessions', {
        method: 'POST',
        headers: authHeaders(ctx.account.key),
        body: JSON.stringify({ topic: 'hiring', collected_data: { company: 'Acme' } }),
    });
    const [session] = await ctx.storage.listSessions(ctx.account.account_id, 1);
    if (!session) throw new Error('session was not created');
    return { ...ctx, created: res, sessionId: session.public_id };
}

describe('session routes', () => {
    it('creates a session that opens with the welcome message', async () => {
        const { created, sessionId } = await setup();

        expect(created.status).toBe(201);
        expect(await created.json()).toMatchObject({
            id: sessionId,
            topic: 'hiring',
            status: 'in_progress',
            collected_data: { company: 'Acme' },
            messages: [{ role: 'assistant', content: welcomeMessage('hiring') }],
        });
        expect(sessionId).toMatch(/^ses_[0-9a-f]{24}$/);
    });

    it('rejects a topic that is not a string', async () => {
        const { app, account } = await setup();

        const res = await app.request('/sessions', {
            method: 'POST',
            headers: authHeaders(account.key),
            body: JSON.stringify({ topic: 42 }),
        });

        expect(res.status).toBe(400);
        expect(await res.json()).toEqual({ error: 'topic must be a string' });
    });

    it('requires an account key', async () => {
        const { app } = await setup();

        const res = await app.request('/sessions');

        expect(res.status).toBe(401);
        expect(res.headers.get('WWW-Authenticate')).toBe('Bearer');
    });

    it('lists only the caller’s sessions', async () => {
        const { app, account, sessionId } = await setup();

        const res = await app.request('/sessions', { headers: authHeaders(account.key, false) });

        expect(res.status).toBe(200);
        expect(await res.json()).toMatchObject({ data: [{ id: sessionId, topic: 'hiring' }] });
    });

    it('returns a session with its message log', async () => {
        const { app, account, sessionId } = await setup();

        const res = await app.request(`/sessions/${sessionId}`, { headers: authHeaders(account.key, false) });

        expect(res.status).toBe(200);
        expect(await res.json()).toMatchObject({
            id: sessionId,
            messages: [{ role: 'assistant', content: welcomeMessage('hiring') }],
        });
    });

    it('merges collected data and sets the status', async () => {
        const { app, account, sessionId } = await setup();

        const res = await app.request(`/sessions/${sessionId}`, {
            method: 'PATCH',
            headers: authHeaders(account.key),
            body: JSON.stringify({ status: 'completed', collected_data: { headcount: 12 } }),
        });

        expect(res.status).toBe(200);
        expect(await res.json()).toMatchObject({
            status: 'completed',
            collected_data: { company: 'Acme', headcount: 12 },
        });
    });

    it('rejects an unknown status', async () => {
        const { app, account, sessionId } = await setup();

        const res = await app.request(`/sessions/${sessionId}`, {
            method: 'PATCH',
            headers: authHeaders(account.key),
            body: JSON.stringify({ status: 'paused' }),
        });

        expect(res.status).toBe(400);
        expect(await res.json()).toEqual({ error: 'status must be one of in_progress, completed, archived' });
    });

    it('appends messages without a model call', async () => {
        const { app, account, sessionId, provider, storage } = await setup();

        const res = await app.request(`/sessions/${sessionId}/messages`, {
            method: 'POST',
            headers: authHeaders(account.key),
            body: JSON.stringify([
                { role: 'user', content: 'We have 12 people.' },
                { role: 'assistant', content: 'Noted.' },
            ]),
        });

        expect(res.status).toBe(201);
        expect(await res.json()).toMatchObject({
            data: [
                { role: 'user', content: 'We have 12 people.' },
                { role: 'assistant', content: 'Noted.' },
            ],
        });
        expect(provider.requests).toHaveLength(0);
        expect(await storage.listMessages(sessionId)).toHaveLength(3);
    });

    it('refuses new messages on an archived session', async () => {
        const { app, account, sessionId, storage } = await setup();
        await storage.updateSession(sessionId, { status: 'archived' });

        const res = await app.request(`/sessions/${sessionId}/messages`, {
            method: 'POST',
            headers: authHeaders(account.key),
            body: JSON.stringify({ role: 'user', content: 'Hello?' }),
        });

        expect(res.status).toBe(409);
    });

    it('rejects a message with an unknown role', async () => {
        const { app, account, sessionId } = await setup();

        const res = await app.request(`/sessions/${sessionId}/messages`, {
            method: 'POST',
            headers: authHeaders(account.key),
            body: JSON.stringify({ role: 'tool', content: 'x' }),
        });

        expect(res.status).toBe(400);
        expect(await res.json()).toEqual({ error: 'role must be one of user, assistant, system' });
    });

    describe('GET /sessions/:id/context', () => {
        it('returns the log as is while it fits', async () => {
            const { app, account, sessionId } = await setup();

            const res = await app.request(`/sessions/${sessionId}/context`, { headers: authHeaders(account.key, false) });

            expect(await res.json()).toEqual({
                compressed: false,
                total_messages: 1,
                data: [{ role: 'assistant', content: welcomeMessage('hiring') }],
            });
        });

        it('compresses past max_chars, keeping the head, one summary turn and the recent tail', async () => {
            const { app, account, sessionId, storage, summaryProvider } = await setup();
            const inserted = Array.from({ length: 20 }, (_, i) => ({
                role: i % 2 ? ('assistant' as const) : ('user' as const),
                content: `${i}:`.padEnd(100, 'z'),
            }));
            await storage.insertMessages(sessionId, inserted);

            const res = await app.request(`/sessions/${sessionId}/context?max_chars=1500`, {
                headers: authHeaders(account.key, false),
            });

            expect(res.status).toBe(200);
            expect(summaryProvider.requests).toHaveLength(1);
            expect(await res.json()).toEqual({
                compressed: true,
                total_messages: 21,
                data: [
                    { role: 'assistant', content: welcomeMessage('hiring') },
                    formatSummaryTurn('ok'),
                    ...inserted.slice(12),
                ],
            });
        });

        it('rejects a max_chars that is not a positive integer', async () => {
            const { app, account, sessionId } = await setup();

            const res = await app.request(`/sessions/${sessionId}/context?max_chars=abc`, {
                headers: authHeaders(account.key, false),
            });

            expect(res.status).toBe(400);
            expect(await res.json()).toEqual({ error: 'max_chars must be a positive integer' });
        });
    });
});
