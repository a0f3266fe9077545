import type { MessageInsertRow, SessionStatus } from '../storage/types';
import { SESSION_STATUSES } from '../storage/types';
import { DEFAULT_LIST_LIMIT, MAX_LIST_LIMIT, MAX_MESSAGE_LENGTH, MAX_TOPIC_LENGTH } from '../constants';

type Parsed<T> = T | { error: string };

export function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isRole(value: unknown): value is MessageInsertRow['role'] {
    return value === 'user' || value === 'assistant' || value === 'system';
}

function isStatus(value: unknown): value is SessionStatus {
    return typeof value === 'string' && SESSION_STATUSES.some((status) => status === value);
}

export function parseLimit(raw: string | undefined): number {
    const value = parseInt(raw ?? String(DEFAULT_LIST_LIMIT));
    if (isNaN(value) || value <= 0) return DEFAULT_LIST_LIMIT;
    return Math.min(value, MAX_LIST_LIMIT);
}

export function parseCreateSessionBody(body: unknown): Parsed<{ topic: string; collectedData: Record<string, unknown> }> {
    if (body === undefined || body === null) return { topic: '', collectedData: {} };
    if (!isPlainObject(body)) return { error: 'Request body must be a JSON object' };

    let topic = '';
    if (body.topic !== undefined) {
        if (typeof body.topic !== 'string') return { error: 'topic must be a string' };
        if (body.topic.length > MAX_TOPIC_LENGTH) return { error: `topic must be at most ${MAX_TOPIC_LENGTH} characters` };
        topic = body.topic;
    }

    let collectedData: Record<string, unknown> = {};
    if (body.collected_data !== undefined) {
        if (!isPlainObject(body.collected_data)) return { error: 'collected_data must be an object' };
        collectedData = body.collected_data;
    }

    return { topic, collectedData };
}

export function parseUpdateSessionBody(body: unknown): Parsed<{ status?: SessionStatus; collectedData?: Record<string, unknown> }> {
    if (!isPlainObject(body)) return { error: 'Request body must be a JSON object' };
    if (body.status === undefined && body.collected_data === undefined) {
        return { error: 'Nothing to update: pass status or collected_data' };
    }

    const changes: { status?: SessionStatus; collectedData?: Record<string, unknown> } = {};
    if (body.status !== undefined) {
        if (!isStatus(body.status)) return { error: `status must be one of ${SESSION_STATUSES.join(', ')}` };
        changes.status = body.status;
    }
    if (body.collected_data !== undefined) {
        if (!isPlainObject(body.collected_data)) return { error: 'collected_data must be an object' };
        changes.collectedData = body.collected_data;
    }

    return changes;
}

export function parseMessagesBody(body: unknown): Parsed<{ messages: MessageInsertRow[] }> {
    const items = Array.isArray(body) ? body : [body];
    if (items.length === 0) return { error: 'At least one message is required' };

    const messages: MessageInsertRow[] = [];
    for (const item of items) {
        if (!isPlainObject(item)) return { error: 'Each message must be an object' };
        if (!isRole(item.role)) return { error: 'role must be one of user, assistant, system' };
        if (typeof item.content !== 'string') return { error: 'content must be a string' };
        if (item.content.length > MAX_MESSAGE_LENGTH) {
            return { error: `content must be at most ${MAX_MESSAGE_LENGTH} characters` };
        }
        messages.push({ role: item.role, content: item.content });
    }
    return { messages };
}

export function parseChatBody(body: unknown, models: Record<string, string>, defaultModel: string): Parsed<{ message: string; model: string }> {
    if (!isPlainObject(body)) return { error: 'Request body must be a JSON object' };

    const message = typeof body.message === 'string' ? body.message.trim() : '';
    if (!message) return { error: 'message is required' };
    if (message.length > MAX_MESSAGE_LENGTH) return { error: `message must be at most ${MAX_MESSAGE_LENGTH} characters` };

    const model = body.model ?? defaultModel;
    if (typeof model !== 'string' || !Object.hasOwn(models, model)) {
        return { error: `model must be one of ${Object.keys(models).join(', ')}` };
    }
    return { message, model };
}

export function parseCreditGrantBody(body: unknown): Parsed<{ amount: number; reason: string }> {
    if (!isPlainObject(body)) return { error: 'Request body must be a JSON object' };

    const { amount, reason } = body;
    if (typeof amount !== 'number' || !Number.isInteger(amount) || amount <= 0) {
        return { error: 'amount must be a positive integer' };
    }
    if (reason === undefined) return { amount, reason: 'Manual top-up' };
    if (typeof reason !== 'string') return { error: 'reason must be a string' };
    return { amount, reason: reason || 'Manual top-up' };
}
