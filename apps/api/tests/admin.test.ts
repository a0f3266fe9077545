import { describe, expect, it } from 'vitest';

import { ADMIN_KEY, authHeaders, createTestApp, field } from './helpers';

describe('service routes', () => {
    it('answers health checks without auth', async () => {
        const { app } = await createTestApp();

        const res = await app.request('/health');

        expect(res.status).toBe(200);
        expect(await res.json()).toEqual({ status: 'ok' });
    });

    it('lists the configured model aliases', async () => {
        const { app } = await createTestApp();

        const res = await app.request('/models');

        expect(await res.json()).toEqual({
            data: [
                { alias: 'flash', id: 'gpt-4o-mini', default: true },
                { alias: 'pro', id: 'gpt-4o', default: false },
            ],
        });
    });

    it('adds CORS headers', async () => {
        const { app } = await createTestApp();

        const res = await app.request('/health', { headers: { Origin: 'https://example.test' } });

        expect(res.headers.get('Access-Control-Allow-Origin')).toBe('*');
    });
});

describe('admin routes', () => {
    it('creates an account with the default balance and a working key', async () => {
        const { app } = await createTestApp();

        const res = await app.request('/v1/keys', {
            method: 'POST',
            headers: authHeaders(ADMIN_KEY),
            body: JSON.stringify({ name: 'Bakery' }),
        });
        expect(res.status).toBe(201);

        const body: unknown = await res.json();
        expect(body).toMatchObject({ credits: 10 });
        const key = String(field(body, 'key'));
        expect(key.startsWith('tk_live_')).toBe(true);
        expect(field(body, 'prefix')).toBe(key.slice(0, 12));

        const credits = await app.request('/credits', { headers: authHeaders(key, false) });
        expect(credits.status).toBe(200);
        expect(await credits.json()).toMatchObject({ credits: 10, credits_per_chat: 2 });
    });

    it('refuses a wrong admin key', async () => {
        const { app } = await createTestApp();

        const res = await app.request('/v1/keys', {
            method: 'POST',
            headers: authHeaders('not-the-admin-key'),
            body: JSON.stringify({ name: 'Bakery' }),
        });

        expect(res.status).toBe(401);
    });

    it('does not accept an account key on admin routes', async () => {
        const { app, account } = await createTestApp();

        const res = await app.request('/v1/keys', {
            method: 'POST',
            headers: authHeaders(account.key),
            body: JSON.stringify({ name: 'Bakery' }),
        });

        expect(res.status).toBe(401);
    });

    it('requires a name', async () => {
        const { app } = await createTestApp();

        const res = await app.request('/v1/keys', {
            method: 'POST',
            headers: authHeaders(ADMIN_KEY),
            body: JSON.stringify({ credits: 5 }),
        });

        expect(res.status).toBe(400);
        expect(await res.json()).toEqual({ error: 'name is required' });
    });

    it('tops up an account and records it in the ledger', async () => {
        const { app, account } = await createTestApp();

        const res = await app.request(`/v1/accounts/${account.account_id}/credits`, {
            method: 'POST',
            headers: authHeaders(ADMIN_KEY),
            body: JSON.stringify({ amount: 5, reason: 'Promo' }),
        });

        expect(res.status).toBe(200);
        expect(await res.json()).toEqual({ account_id: account.account_id, credits: 15 });

        const logs = await app.request('/credits/logs', { headers: authHeaders(account.key, false) });
        expect(await logs.json()).toMatchObject({
            data: [
                { amount: 5, balance: 15, reason: 'Promo' },
                { amount: 10, balance: 10, reason: 'Opening balance' },
            ],
        });
    });

    it('returns 404 when topping up an unknown account', async () => {
        const { app } = await createTestApp();

        const res = await app.request('/v1/accounts/999/credits', {
            method: 'POST',
            headers: authHeaders(ADMIN_KEY),
            body: JSON.stringify({ amount: 5 }),
        });

        expect(res.status).toBe(404);
        expect(await res.json()).toEqual({ error: 'Account not found' });
    });

    it('rejects a non-positive amount', async () => {
        const { app, account } = await createTestApp();

        const res = await app.request(`/v1/accounts/${account.account_id}/credits`, {
            method: 'POST',
            headers: authHeaders(ADMIN_KEY),
            body: JSON.stringify({ amount: 0 }),
        });

        expect(res.status).toBe(400);
        expect(await res.json()).toEqual({ error: 'amount must be a positive integer' });
    });
});
