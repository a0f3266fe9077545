import { simpleTruncate, toTurns, totalChars, type ContextCompressor, type Message, type Turn } from '@threadkeep/compression';

import type { MessageRow } from '../storage/types';

export type ModelHistory = {
    turns: Turn[];
    /** True when the turns are a reduced projection of the stored log. */
    compressed: boolean;
};

export function toMessage(row: MessageRow): Message {
    return { role: row.role, content: row.content, timestamp: row.created_at };
}

/**
 * The history a model call should see. Under `maxChars` the log goes out as
 * is; over it the compressor summarises the middle, and plain truncation
 * stands in when no compressor is wired up or it throws.
 */
export async function buildModelHistory(
    messages: Message[],
    compressor: ContextCompressor | undefined,
    options: { maxChars: number; topic: string }
): Promise<ModelHistory> {
    if (messages.length === 0) return { turns: [], compressed: false };
    if (totalChars(messages) <= options.maxChars) return { turns: toTurns(messages), compressed: false };

    if (compressor) {
        try {
            return { turns: await compressor.compress(messages, options.topic, true), compressed: true };
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.error(`Context compression failed, truncating instead: ${message}`);
        }
    }

    return { turns: simpleTruncate(messages, options.maxChars), compressed: true };
}
