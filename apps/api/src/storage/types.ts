import type { Role } from '@threadkeep/compression';

// =============================================================================
// STORAGE ADAPTER: abstracts all DB operations behind a common interface
// =============================================================================

// -- Row types (DB-agnostic) --------------------------------------------------

export type SessionStatus = 'in_progress' | 'completed' | 'archived';

export const SESSION_STATUSES: readonly SessionStatus[] = ['in_progress', 'completed', 'archived'];

export type AccountRow = {
    id: number;
    name: string;
    credits: number;
    created_at: string;
};

export type ApiKeyRow = {
    id: number;
    account_id: number;
    key_hash: string;
};

export type SessionRow = {
    id: number;
    public_id: string;
    account_id: number;
    topic: string;
    status: SessionStatus;
    collected_data: Record<string, unknown>;
    created_at: string;
    updated_at: string;
};

export type SessionInsertRow = {
    public_id: string;
    account_id: number;
    topic: string;
    collected_data: Record<string, unknown>;
};

export type SessionUpdate = {
    status?: SessionStatus;
    collected_data?: Record<string, unknown>;
};

export type MessageRow = {
    id: number;
    session_id: string;
    role: Role;
    content: string;
    created_at: string;
};

export type MessageInsertRow = {
    role: Role;
    content: string;
};

export type CreditLogRow = {
    id: number;
    account_id: number;
    amount: number;
    balance: number;
    reason: string;
    created_at: string;
};

export type CreditLogInsertRow = Omit<CreditLogRow, 'id' | 'created_at'>;

// -- Storage adapter interface ------------------------------------------------

export interface StorageAdapter {
    // accounts
    insertAccount(name: string, credits: number): Promise<AccountRow | null>;
    findAccount(id: number): Promise<AccountRow | null>;
    deleteAccount(id: number): Promise<void>;
    /** Compare-and-set: writes `next` only while the stored balance still equals `expected`. */
    updateCreditsIfUnchanged(id: number, expected: number, next: number): Promise<boolean>;

    // credit ledger
    insertCreditLog(values: CreditLogInsertRow): Promise<void>;
    listCreditLogs(accountId: number, limit: number): Promise<CreditLogRow[]>;

    // api keys
    findApiKeyByPrefix(prefix: string): Promise<ApiKeyRow | null>;
    insertApiKey(values: { account_id: number; key_prefix: string; key_hash: string }): Promise<void>;

    // sessions
    insertSession(values: SessionInsertRow): Promise<SessionRow | null>;
    findSession(publicId: string): Promise<SessionRow | null>;
    listSessions(accountId: number, limit: number): Promise<SessionRow[]>;
    updateSession(publicId: string, changes: SessionUpdate): Promise<SessionRow | null>;
    deleteSession(publicId: string): Promise<void>;

    // messages: append-only, ordered by insertion
    insertMessages(sessionId: string, values: MessageInsertRow[]): Promise<MessageRow[]>;
    listMessages(sessionId: string): Promise<MessageRow[]>;
}
