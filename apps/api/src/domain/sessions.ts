import type { StorageAdapter, MessageRow, SessionRow } from '../storage/types';
import type { MessageResponse, SessionResponse } from '../types/api';

export type SessionLookup = { ok: true; session: SessionRow } | { ok: false; status: 403 | 404; error: string };

export async function findOwnedSession(storage: StorageAdapter, accountId: number, publicId: string): Promise<SessionLookup> {
    const session = await storage.findSession(publicId);
    if (!session) return { ok: false, status: 404, error: 'Session not found' };
    if (session.account_id !== accountId) return { ok: false, status: 403, error: 'Session belongs to another account' };
    return { ok: true, session };
}

export function toSessionResponse(row: SessionRow): SessionResponse {
    return {
        id: row.public_id,
        topic: row.topic,
        status: row.status,
        collected_data: row.collected_data,
        created_at: row.created_at,
        updated_at: row.updated_at,
    };
}

export function toMessageResponse(row: MessageRow): MessageResponse {
    return { role: row.role, content: row.content, timestamp: row.created_at };
}
