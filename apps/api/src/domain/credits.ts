import { setTimeout as sleep } from 'node:timers/promises';

import type { StorageAdapter } from '../storage/types';

export type CreditResult =
    | { ok: true; balance: number }
    | { ok: false; reason: 'not_found' | 'insufficient' | 'conflict' | 'error'; balance: number; message: string };

export type CreditOptions = {
    /** Default: 3. */
    maxAttempts?: number;
    /** Wait before retry n is `backoffMs * n`. Default: 100. */
    backoffMs?: number;
};

const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_BACKOFF_MS = 100;

async function recordChange(storage: StorageAdapter, accountId: number, amount: number, balance: number, reason: string) {
    try {
        await storage.insertCreditLog({ account_id: accountId, amount, balance, reason });
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`Credit log write failed for account ${accountId} (${amount}): ${message}`);
    }
}

// Optimistic concurrency: the write only lands if nobody moved the balance since it was read.
async function adjustCredits(
    storage: StorageAdapter,
    accountId: number,
    delta: number,
    reason: string,
    options: CreditOptions
): Promise<CreditResult> {
    const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    const backoffMs = options.backoffMs ?? DEFAULT_BACKOFF_MS;
    let lastBalance = 0;

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
        const isLast = attempt === maxAttempts - 1;
        try {
            const account = await storage.findAccount(accountId);
            if (!account) return { ok: false, reason: 'not_found', balance: 0, message: 'Account not found' };

            lastBalance = account.credits;
            if (delta < 0 && account.credits < -delta) {
                return {
                    ok: false,
                    reason: 'insufficient',
                    balance: account.credits,
                    message: `Insufficient credits: have ${account.credits}, need ${-delta}`,
                };
            }

            const next = account.credits + delta;
            const applied = await storage.updateCreditsIfUnchanged(accountId, account.credits, next);
            if (applied) {
                await recordChange(storage, accountId, delta, next, reason);
                return { ok: true, balance: next };
            }

            if (isLast) {
                return { ok: false, reason: 'conflict', balance: account.credits, message: 'Concurrent update, please retry' };
            }
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.error(`Credit update attempt ${attempt + 1} for account ${accountId} failed: ${message}`);
            if (isLast) return { ok: false, reason: 'error', balance: lastBalance, message };
        }

        if (backoffMs > 0) await sleep(backoffMs * (attempt + 1));
    }

    return { ok: false, reason: 'conflict', balance: lastBalance, message: 'Concurrent update, please retry' };
}

export function useCredits(storage: StorageAdapter, accountId: number, amount: number, reason: string, options: CreditOptions = {}) {
    return adjustCredits(storage, accountId, -Math.abs(amount), reason, options);
}

export function addCredits(storage: StorageAdapter, accountId: number, amount: number, reason: string, options: CreditOptions = {}) {
    return adjustCredits(storage, accountId, Math.abs(amount), reason, options);
}
