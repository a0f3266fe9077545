import { createClient, type SupabaseClient } from '@supabase/supabase-js';

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
// SUPABASE ADAPTER: same interface via Supabase REST client
// =============================================================================

const NO_ROWS = 'PGRST116';

export class SupabaseAdapter implements StorageAdapter {
    private client: SupabaseClient;

    constructor(url: string, serviceRoleKey: string) {
        this.client = createClient(url, serviceRoleKey);
    }

    // -- accounts -------------------------------------------------------------

    async insertAccount(name: string, credits: number): Promise<AccountRow | null> {
        const { data, error } = await this.client.from('accounts').insert({ name, credits }).select('*').single();
        if (error) throw error;
        return data;
    }

    async findAccount(id: number): Promise<AccountRow | null> {
        const { data, error } = await this.client.from('accounts').select('*').eq('id', id).limit(1).single();
        if (error && error.code === NO_ROWS) return null;
        if (error) throw error;
        return data;
    }

    async deleteAccount(id: number) {
        const { error } = await this.client.from('accounts').delete().eq('id', id);
        if (error) throw error;
    }

    async updateCreditsIfUnchanged(id: number, expected: number, next: number): Promise<boolean> {
        const { data, error } = await this.client
            .from('accounts')
            .update({ credits: next })
            .eq('id', id)
            .eq('credits', expected)
            .select('id');
        if (error) throw error;
        return (data ?? []).length > 0;
    }

    // -- credit ledger --------------------------------------------------------

    async insertCreditLog(values: CreditLogInsertRow) {
        const { error } = await this.client.from('credit_logs').insert(values);
        if (error) throw error;
    }

    async listCreditLogs(accountId: number, limit: number): Promise<CreditLogRow[]> {
        const { data, error } = await this.client
            .from('credit_logs')
            .select('*')
            .eq('account_id', accountId)
            .order('id', { ascending: false })
            .limit(limit);
        if (error) throw error;
        return data ?? [];
    }

    // -- api keys -------------------------------------------------------------

    async findApiKeyByPrefix(prefix: string): Promise<ApiKeyRow | null> {
        const { data, error } = await this.client
            .from('api_keys')
            .select('id, account_id, key_hash')
            .eq('key_prefix', prefix)
            .limit(1)
            .single();
        if (error && error.code === NO_ROWS) return null;
        if (error) throw error;
        return data;
    }

    async insertApiKey(values: { account_id: number; key_prefix: string; key_hash: string }) {
        const { error } = await this.client.from('api_keys').insert(values);
        if (error) throw error;
    }

    // -- sessions -------------------------------------------------------------

    async insertSession(values: SessionInsertRow): Promise<SessionRow | null> {
        const { data, error } = await this.client.from('sessions').insert(values).select('*').single();
        if (error) throw error;
        return data;
    }

    async findSession(publicId: string): Promise<SessionRow | null> {
        const { data, error } = await this.client
            .from('sessions')
            .select('*')
            .eq('public_id', publicId)
            .limit(1)
            .single();
        if (error && error.code === NO_ROWS) return null;
        if (error) throw error;
        return data;
    }

    async listSessions(accountId: number, limit: number): Promise<SessionRow[]> {
        const { data, error } = await this.client
            .from('sessions')
            .select('*')
            .eq('account_id', accountId)
            .order('updated_at', { ascending: false })
            .limit(limit);
        if (error) throw error;
        return data ?? [];
    }

    async updateSession(publicId: string, changes: SessionUpdate): Promise<SessionRow | null> {
        const { data, error } = await this.client
            .from('sessions')
            .update({ ...changes, updated_at: new Date().toISOString() })
            .eq('public_id', publicId)
            .select('*')
            .single();
        if (error && error.code === NO_ROWS) return null;
        if (error) throw error;
        return data;
    }

    async deleteSession(publicId: string) {
        const { error: messagesError } = await this.client.from('messages').delete().eq('session_id', publicId);
        if (messagesError) throw messagesError;

        const { error } = await this.client.from('sessions').delete().eq('public_id', publicId);
        if (error) throw error;
    }

    // -- messages -------------------------------------------------------------

    async insertMessages(sessionId: string, values: MessageInsertRow[]): Promise<MessageRow[]> {
        if (values.length === 0) return [];

        const rows = values.map((m) => ({ session_id: sessionId, role: m.role, content: m.content }));
        const { data, error } = await this.client.from('messages').insert(rows).select('*').order('id', { ascending: true });
        if (error) throw error;

        const { error: touchError } = await this.client
            .from('sessions')
            .update({ updated_at: new Date().toISOString() })
            .eq('public_id', sessionId);
        if (touchError) throw touchError;

        return data ?? [];
    }

    async listMessages(sessionId: string): Promise<MessageRow[]> {
        const { data, error } = await this.client
            .from('messages')
            .select('*')
            .eq('session_id', sessionId)
            .order('id', { ascending: true });
        if (error) throw error;
        return data ?? [];
    }
}
