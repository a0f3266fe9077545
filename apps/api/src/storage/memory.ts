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
// MEMORY ADAPTER: process-local tables for development and tests
// =============================================================================

type ApiKeyRecord = ApiKeyRow & { key_prefix: string };

function now(): string {
    return new Date().toISOString();
}

// Rows are cloned on the way in and out so callers never hold live references.
export class MemoryAdapter implements StorageAdapter {
    private accounts = new Map<number, AccountRow>();
    private apiKeys: ApiKeyRecord[] = [];
    private sessions = new Map<string, SessionRow>();
    private messages = new Map<string, MessageRow[]>();
    private creditLogs: CreditLogRow[] = [];
    private nextId = 1;

    private id(): number {
        return this.nextId++;
    }

    // -- accounts -------------------------------------------------------------

    async insertAccount(name: string, credits: number): Promise<AccountRow | null> {
        const row: AccountRow = { id: this.id(), name, credits, created_at: now() };
        this.accounts.set(row.id, row);
        return { ...row };
    }

    async findAccount(id: number): Promise<AccountRow | null> {
        const row = this.accounts.get(id);
        return row ? { ...row } : null;
    }

    async deleteAccount(id: number) {
        this.accounts.delete(id);
    }

    async updateCreditsIfUnchanged(id: number, expected: number, next: number): Promise<boolean> {
        const row = this.accounts.get(id);
        if (!row || row.credits !== expected) return false;
        row.credits = next;
        return true;
    }

    // -- credit ledger --------------------------------------------------------

    async insertCreditLog(values: CreditLogInsertRow) {
        this.creditLogs.push({ ...values, id: this.id(), created_at: now() });
    }

    async listCreditLogs(accountId: number, limit: number): Promise<CreditLogRow[]> {
        return this.creditLogs
            .filter((log) => log.account_id === accountId)
            .reverse()
            .slice(0, limit)
            .map((log) => ({ ...log }));
    }

    // -- api keys -------------------------------------------------------------

    async findApiKeyByPrefix(prefix: string): Promise<ApiKeyRow | null> {
        const row = this.apiKeys.find((key) => key.key_prefix === prefix);
        return row ? { id: row.id, account_id: row.account_id, key_hash: row.key_hash } : null;
    }

    async insertApiKey(values: { account_id: number; key_prefix: string; key_hash: string }) {
        this.apiKeys.push({ ...values, id: this.id() });
    }

    // -- sessions -------------------------------------------------------------

    async insertSession(values: SessionInsertRow): Promise<SessionRow | null> {
        const timestamp = now();
        const row: SessionRow = {
            ...values,
            collected_data: structuredClone(values.collected_data),
            id: this.id(),
            status: 'in_progress',
            created_at: timestamp,
            updated_at: timestamp,
        };
        this.sessions.set(row.public_id, row);
        this.messages.set(row.public_id, []);
        return structuredClone(row);
    }

    async findSession(publicId: string): Promise<SessionRow | null> {
        const row = this.sessions.get(publicId);
        return row ? structuredClone(row) : null;
    }

    async listSessions(accountId: number, limit: number): Promise<SessionRow[]> {
        return [...this.sessions.values()]
            .filter((row) => row.account_id === accountId)
            .sort((a, b) => b.updated_at.localeCompare(a.updated_at) || b.id - a.id)
            .slice(0, limit)
            .map((row) => structuredClone(row));
    }

    async updateSession(publicId: string, changes: SessionUpdate): Promise<SessionRow | null> {
        const row = this.sessions.get(publicId);
        if (!row) return null;

        if (changes.status !== undefined) row.status = changes.status;
        if (changes.collected_data !== undefined) row.collected_data = structuredClone(changes.collected_data);
        row.updated_at = now();
        return structuredClone(row);
    }

    async deleteSession(publicId: string) {
        this.sessions.delete(publicId);
        this.messages.delete(publicId);
    }

    // -- messages -------------------------------------------------------------

    async insertMessages(sessionId: string, values: MessageInsertRow[]): Promise<MessageRow[]> {
        const log = this.messages.get(sessionId);
        if (!log) throw new Error(`Unknown session: ${sessionId}`);

        const timestamp = now();
        const rows = values.map((m) => ({ id: this.id(), session_id: sessionId, role: m.role, content: m.content, created_at: timestamp }));
        log.push(...rows);

        const session = this.sessions.get(sessionId);
        if (session && rows.length > 0) session.updated_at = timestamp;

        return rows.map((row) => ({ ...row }));
    }

    async listMessages(sessionId: string): Promise<MessageRow[]> {
        return (this.messages.get(sessionId) ?? []).map((row) => ({ ...row }));
    }
}
