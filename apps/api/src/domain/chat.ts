import type { CompletionRequest } from '@threadkeep/compression';

import { CHAT_MAX_TOKENS, CHAT_TEMPERATURE } from '../constants';
import type { SessionRow } from '../storage/types';
import type { Services } from '../types/http';
import { useCredits } from './credits';
import { buildModelHistory, toMessage } from './history';
import { buildSystemPrompt } from './prompts';
import { findOwnedSession } from './sessions';

type ChatServices = Pick<Services, 'config' | 'storage' | 'compressor'>;

export type ChatRejection = {
    ok: false;
    status: 402 | 403 | 404 | 409;
    body: { error: string; credits_exhausted?: true; remaining_credits?: number };
};

export type PreparedChatTurn = {
    ok: true;
    session: SessionRow;
    request: CompletionRequest;
    /** Whether the model sees a reduced projection of the stored log. */
    compressed: boolean;
};

export type ChatUsage = {
    credits_used: number;
    remaining_credits: number;
};

/**
 * Checks ownership, status and balance, stores the user message and assembles
 * the request the provider should receive. Nothing is debited here.
 */
export async function prepareChatTurn(
    services: ChatServices,
    accountId: number,
    sessionId: string,
    message: string,
    modelAlias: string
): Promise<PreparedChatTurn | ChatRejection> {
    const { config, storage, compressor } = services;

    const lookup = await findOwnedSession(storage, accountId, sessionId);
    if (!lookup.ok) return { ok: false, status: lookup.status, body: { error: lookup.error } };

    const { session } = lookup;
    if (session.status === 'archived') {
        return { ok: false, status: 409, body: { error: 'Session is archived' } };
    }

    const account = await storage.findAccount(accountId);
    const balance = account?.credits ?? 0;
    if (balance < config.CREDITS_PER_CHAT) {
        return {
            ok: false,
            status: 402,
            body: { error: 'Insufficient credits', credits_exhausted: true, remaining_credits: balance },
        };
    }

    await storage.insertMessages(session.public_id, [{ role: 'user', content: message }]);
    const rows = await storage.listMessages(session.public_id);

    const history = await buildModelHistory(rows.map(toMessage), compressor, {
        maxChars: config.MAX_HISTORY_CHARS,
        topic: session.topic,
    });

    return {
        ok: true,
        session,
        compressed: history.compressed,
        request: {
            model: config.MODELS[modelAlias] ?? modelAlias,
            systemPrompt: buildSystemPrompt(session.topic, session.collected_data),
            messages: history.turns,
            temperature: CHAT_TEMPERATURE,
            maxTokens: CHAT_MAX_TOKENS,
        },
    };
}

/** Stores the reply, then debits the turn. A failed debit is logged and reported as zero credits used. */
export async function finishChatTurn(
    services: ChatServices,
    accountId: number,
    session: SessionRow,
    reply: string
): Promise<ChatUsage> {
    const { config, storage } = services;

    await storage.insertMessages(session.public_id, [{ role: 'assistant', content: reply }]);

    const result = await useCredits(storage, accountId, config.CREDITS_PER_CHAT, `Chat in ${session.public_id}`);
    if (!result.ok) {
        console.error(`Debit failed for account ${accountId} after chat in ${session.public_id}: ${result.message}`);
        return { credits_used: 0, remaining_credits: result.balance };
    }
    return { credits_used: config.CREDITS_PER_CHAT, remaining_credits: result.balance };
}
