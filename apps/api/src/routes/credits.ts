import type { HttpApp } from '../types/http';
import { parseLimit } from '../utils/request-parsing';

export function registerCreditRoutes(app: HttpApp) {
    app.get('/credits', async (c) => {
        const { accountId } = c.get('auth');
        const account = await c.get('storage').findAccount(accountId);
        if (!account) return c.json({ error: 'Account not found' }, 404);

        return c.json({
            account_id: account.id,
            credits: account.credits,
            credits_per_chat: c.get('config').CREDITS_PER_CHAT,
        });
    });

    app.get('/credits/logs', async (c) => {
        const { accountId } = c.get('auth');
        const logs = await c.get('storage').listCreditLogs(accountId, parseLimit(c.req.query('limit')));

        return c.json({
            data: logs.map((log) => ({
                amount: log.amount,
                balance: log.balance,
                reason: log.reason,
                created_at: log.created_at,
            })),
        });
    });
}
