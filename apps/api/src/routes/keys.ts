import { createAccountWithKey } from '../domain/accounts';
import { addCredits } from '../domain/credits';
import type { HttpApp } from '../types/http';
import { isPlainObject, parseCreditGrantBody } from '../utils/request-parsing';

export function registerKeyRoutes(app: HttpApp) {
    app.post('/v1/keys', async (c) => {
        const body: unknown = await c.req.json().catch(() => ({}));
        const fields: Record<string, unknown> = isPlainObject(body) ? body : {};
        const { name, credits } = fields;

        if (!name || typeof name !== 'string') {
            return c.json({ error: 'name is required' }, 400);
        }

        let openingBalance = c.get('config').DEFAULT_CREDITS;
        if (credits !== undefined) {
            if (typeof credits !== 'number' || !Number.isInteger(credits) || credits < 0) {
                return c.json({ error: 'credits must be a non-negative integer' }, 400);
            }
            openingBalance = credits;
        }

        try {
            const created = await createAccountWithKey(c.get('storage'), name, openingBalance);
            if (!created) return c.json({ error: 'Failed to create account' }, 500);
            return c.json(created, 201);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.error(`Key creation failed for "${name}": ${message}`);
            return c.json({ error: 'Failed to create key' }, 500);
        }
    });

    app.post('/v1/accounts/:id/credits', async (c) => {
        const accountId = Number(c.req.param('id'));
        if (!Number.isInteger(accountId) || accountId <= 0) {
            return c.json({ error: 'Invalid account id' }, 400);
        }

        const parsed = parseCreditGrantBody(await c.req.json().catch(() => null));
        if ('error' in parsed) return c.json({ error: parsed.error }, 400);

        const result = await addCredits(c.get('storage'), accountId, parsed.amount, parsed.reason);
        if (!result.ok) {
            const status = result.reason === 'not_found' ? 404 : result.reason === 'conflict' ? 409 : 500;
            return c.json({ error: result.message }, status);
        }
        return c.json({ account_id: accountId, credits: result.balance });
    });
}
