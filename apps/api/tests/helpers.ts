import { ContextCompressor, type CompletionRequest } from '@threadkeep/compression';

import { createApp } from '../src/app';
import { parseApiConfig } from '../src/config';
import { createAccountWithKey } from '../src/domain/accounts';
import type { StreamingCompletionProvider } from '../src/llm/types';
import { MemoryAdapter } from '../src/storage/memory';
import { isPlainObject } from '../src/utils/request-parsing';

export const ADMIN_KEY = 'test-admin-key';

export function testConfig(overrides: Record<string, string> = {}) {
    return parseApiConfig({ DATABASE_PROVIDER: 'memory', THREADKEEP_ADMIN_KEY: ADMIN_KEY, ...overrides });
}

/** Answers from a fixed script and records every request it receives. */
export class ScriptedProvider implements StreamingCompletionProvider {
    readonly name = 'scripted';
    readonly requests: CompletionRequest[] = [];

    constructor(private replies: Array<string | Error> = []) {}

    private next(request: CompletionRequest): string {
        this.requests.push(request);
        const reply = this.replies.shift() ?? 'ok';
        if (reply instanceof Error) throw reply;
        return reply;
    }

    async complete(request: CompletionRequest): Promise<string> {
        return this.next(request);
    }

    async *stream(request: CompletionRequest): AsyncGenerator<string> {
        const reply = this.next(request);
        for (const chunk of reply.split(/(?<= )/)) yield chunk;
    }
}

export type TestAppOptions = {
    replies?: Array<string | Error>;
    summaryReplies?: Array<string | Error>;
    env?: Record<string, string>;
    credits?: number;
    withCompressor?: boolean;
};

export async function createTestApp(options: TestAppOptions = {}) {
    const config = testConfig(options.env);
    const storage = new MemoryAdapter();
    const provider = new ScriptedProvider(options.replies);
    const summaryProvider = new ScriptedProvider(options.summaryReplies);
    const compressor =
        options.withCompressor === false
            ? undefined
            : new ContextCompressor(summaryProvider, {
                  maxCharsBeforeCompress: config.COMPRESS_THRESHOLD_CHARS,
                  keepRecentMessages: config.KEEP_RECENT_MESSAGES,
                  summaryModel: config.MODELS[config.SUMMARY_MODEL],
              });

    const app = createApp({ config, storage, provider, compressor });
    const account = await createAccountWithKey(storage, 'Test account', options.credits ?? 10);
    if (!account) throw new Error('test account was not created');

    return { app, config, storage, provider, summaryProvider, account };
}

export function authHeaders(key: string, json = true): Record<string, string> {
    const headers: Record<string, string> = { Authorization: `Bearer ${key}` };
    if (json) headers['Content-Type'] = 'application/json';
    return headers;
}

export function field(body: unknown, name: string): unknown {
    return isPlainObject(body) ? body[name] : undefined;
}

export function parseSseEvents(text: string): unknown[] {
    return text
        .split('\n')
        .filter((line) => line.startsWith('data: '))
        .map((line) => JSON.parse(line.slice('data: '.length)));
}
