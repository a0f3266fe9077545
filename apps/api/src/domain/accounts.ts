import { KEY_PREFIX_LEN } from '../constants';
import type { StorageAdapter } from '../storage/types';
import { generateKey, hashKey } from './api-keys';

export type CreatedAccount = {
    key: string;
    prefix: string;
    account_id: number;
    credits: number;
};

/** Creates an account with its opening balance and one API key. Returns null when nothing was created. */
export async function createAccountWithKey(storage: StorageAdapter, name: string, credits: number): Promise<CreatedAccount | null> {
    const account = await storage.insertAccount(name, credits);
    if (!account) return null;

    try {
        const raw = generateKey();
        const prefix = raw.slice(0, KEY_PREFIX_LEN);
        const hash = await hashKey(raw);

        await storage.insertApiKey({ account_id: account.id, key_prefix: prefix, key_hash: hash });

        if (credits > 0) {
            try {
                await storage.insertCreditLog({ account_id: account.id, amount: credits, balance: credits, reason: 'Opening balance' });
            } catch (error) {
                const message = error instanceof Error ? error.message : String(error);
                console.error(`Credit log write failed for account ${account.id}: ${message}`);
            }
        }

        return { key: raw, prefix, account_id: account.id, credits: account.credits };
    } catch (error) {
        try {
            await storage.deleteAccount(account.id);
        } catch (rollbackError) {
            const message = rollbackError instanceof Error ? rollbackError.message : String(rollbackError);
            console.error(`Rollback failed for account ${account.id}: ${message}`);
        }
        throw error;
    }
}
