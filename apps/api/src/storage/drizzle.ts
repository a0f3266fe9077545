import { and, asc, desc, eq, sql } from 'drizzle-orm';

import { accounts, api_keys, credit_logs, messages, sessions, type ApiDb } from '../db';
import type {
    AccountRow,
    ApiKeyRow,
    CreditLogInsertRow,
    CreditLogRow,
    MessageInsertRow,
    MessageRow,
    SessionInsertRow,
    SessionRow,
    SessionUpdate,
    StorageAdapter,
} from './types';

// =============================================================================
// DRIZZLE ADAPTER: PostgreSQL through drizzle-orm + postgres.js
// =============================================================================

export class DrizzleAdapter implements StorageAdapter {
    constructor(private db: ApiDb) {}

    // -- accounts -------------------------------------------------------------

    async insertAccount(name: string, credits: number): Promise<AccountRow | null> {
        const rows = await this.db.insert(accounts).values({ name, credits }).returning();
        return rows[0] ?? null;
    }

    async findAccount(id: number): Promise<AccountRow | null> {
        const rows = await this.db.select().from(accounts).where(eq(accounts.id, id)).limit(1);
        return rows[0] ?? null;
    }

    async deleteAccount(id: number) {
        await this.db.delete(accounts).where(eq(accounts.id, id));
    }

    async updateCreditsIfUnchanged(id: number, expected: number, next: number): Promise<boolean> {
        const rows = await this.db
            .update(accounts)
            .set({ credits: next })
            .where(and(eq(accounts.id, id), eq(accounts.credits, expected)))
            .returning({ id: accounts.id });
        return rows.length > 0;
    }

    // -- credit ledger --------------------------------------------------------

    async insertCreditLog(values: CreditLogInsertRow) {
        await this.db.insert(credit_logs).values(values);
    }

    async listCreditLogs(accountId: number, limit: number): Promise<CreditLogRow[]> {
        return this.db
            .select()
            .from(credit_logs)
            .where(eq(credit_logs.account_id, accountId))
            .orderBy(desc(credit_logs.id))
            .limit(limit);
    }

    // -- api keys -------------------------------------------------------------

    async findApiKeyByPrefix(prefix: string): Promise<ApiKeyRow | null> {
        const rows = await this.db
            .select({ id: api_keys.id, account_id: api_keys.account_id, key_hash: api_keys.key_hash })
            .from(api_keys)
            .where(eq(api_keys.key_prefix, prefix))
            .limit(1);
        return rows[0] ?? null;
    }

    async insertApiKey(values: { account_id: number; key_prefix: string; key_hash: string }) {
        await this.db.insert(api_keys).values(values);
    }

    // -- sessions -------------------------------------------------------------

    async insertSession(values: SessionInsertRow): Promise<SessionRow | null> {
        const rows = await this.db.insert(sessions).values(values).returning();
        return rows[0] ?? null;
    }

    async findSession(publicId: string): Promise<SessionRow | null> {
        const rows = await this.db.select().from(sessions).where(eq(sessions.public_id, publicId)).limit(1);
        return rows[0] ?? null;
    }

    async listSessions(accountId: number, limit: number): Promise<SessionRow[]> {
        return this.db
            .select()
            .from(sessions)
            .where(eq(sessions.account_id, accountId))
            .orderBy(desc(sessions.updated_at))
            .limit(limit);
    }

    async updateSession(publicId: string, changes: SessionUpdate): Promise<SessionRow | null> {
        const rows = await this.db
            .update(sessions)
            .set({ ...changes, updated_at: sql`now()` })
            .where(eq(sessions.public_id, publicId))
            .returning();
        return rows[0] ?? null;
    }

    async deleteSession(publicId: string) {
        await this.db.delete(messages).where(eq(messages.session_id, publicId));
        await this.db.delete(sessions).where(eq(sessions.public_id, publicId));
    }

    // -- messages -------------------------------------------------------------

    async insertMessages(sessionId: string, values: MessageInsertRow[]): Promise<MessageRow[]> {
        if (values.length === 0) return [];

        const rows = await this.db
            .insert(messages)
            .values(values.map((m) => ({ session_id: sessionId, role: m.role, content: m.content })))
            .returning();
        await this.db.update(sessions).set({ updated_at: sql`now()` }).where(eq(sessions.public_id, sessionId));
        return rows;
    }

    async listMessages(sessionId: string): Promise<MessageRow[]> {
        return this.db.select().from(messages).where(eq(messages.session_id, sessionId)).orderBy(asc(messages.id));
    }
}
