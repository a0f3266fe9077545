import { describe, expect, it, vi, afterEach, beforeEach } from 'vitest';
import { ProviderUnavailableError, type CompletionRequest } from '@threadkeep/compression';

import { FallbackProvider, toChatMessages } from '../src/llm';
import type { StreamingCompletionProvider } from '../src/llm/types';

const REQUEST: CompletionRequest = {
    model: 'gpt-4o-mini',
    systemPrompt: 'Be brief.',
    messages: [{ role: 'user', content: 'Hi' }],
};

function fakeProvider(name: string, behaviour: { reply?: string; chunks?: string[]; error?: Error; failAfter?: number }) {
    const provider: StreamingCompletionProvider = {
        name,
        complete: vi.fn(async () => {
            if (behaviour.error) throw behaviour.error;
            return behaviour.reply ?? '';
        }),
        async *stream() {
            const chunks = behaviour.chunks ?? [];
            for (let i = 0; i < chunks.length; i++) {
                if (behaviour.error && behaviour.failAfter === i) throw behaviour.error;
                yield chunks[i];
            }
            if (behaviour.error && behaviour.failAfter === undefined) throw behaviour.error;
        },
    };
    return provider;
}

async function collect(stream: AsyncIterable<string>): Promise<string[]> {
    const out: string[] = [];
    for await (const chunk of stream) out.push(chunk);
    return out;
}

describe('toChatMessages', () => {
    it('puts the system prompt first', () => {
        expect(toChatMessages(REQUEST)).toEqual([
            { role: 'system', content: 'Be brief.' },
            { role: 'user', content: 'Hi' },
        ]);
    });

    it('omits an empty system prompt and keeps summary turns', () => {
        expect(
            toChatMessages({
                systemPrompt: '',
                messages: [
                    { role: 'system', content: 'summary' },
                    { role: 'assistant', content: 'Hello' },
                ],
            })
        ).toEqual([
            { role: 'system', content: 'summary' },
            { role: 'assistant', content: 'Hello' },
        ]);
    });
});

describe('FallbackProvider', () => {
    beforeEach(() => {
        vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('answers from the first provider that succeeds', async () => {
        const primary = fakeProvider('primary', { reply: 'from primary' });
        const backup = fakeProvider('backup', { reply: 'from backup' });

        expect(await new FallbackProvider([primary, backup]).complete(REQUEST)).toBe('from primary');
        expect(backup.complete).not.toHaveBeenCalled();
    });

    it('falls through to the backup when the primary fails', async () => {
        const primary = fakeProvider('primary', { error: new Error('[primary] 503') });
        const backup = fakeProvider('backup', { reply: 'from backup' });

        expect(await new FallbackProvider([primary, backup]).complete(REQUEST)).toBe('from backup');
        expect(console.error).toHaveBeenCalledWith('Completion via primary failed (model gpt-4o-mini): [primary] 503');
    });

    it('reports every failure when all providers fail', async () => {
        const chain = new FallbackProvider([
            fakeProvider('primary', { error: new Error('[primary] 503') }),
            fakeProvider('backup', { error: new Error('[backup] timeout') }),
        ]);

        await expect(chain.complete(REQUEST)).rejects.toThrow(
            new ProviderUnavailableError('All completion providers failed: [primary] 503; [backup] timeout')
        );
    });

    it('fails clearly with no providers', async () => {
        await expect(new FallbackProvider([]).complete(REQUEST)).rejects.toThrow('No completion provider is configured');
    });

    it('streams from the backup when the primary fails before its first delta', async () => {
        const chain = new FallbackProvider([
            fakeProvider('primary', { error: new Error('[primary] refused') }),
            fakeProvider('backup', { chunks: ['a', 'b'] }),
        ]);

        expect(await collect(chain.stream(REQUEST))).toEqual(['a', 'b']);
    });

    it('skips a provider whose stream is empty', async () => {
        const chain = new FallbackProvider([fakeProvider('primary', { chunks: [] }), fakeProvider('backup', { chunks: ['b'] })]);

        expect(await collect(chain.stream(REQUEST))).toEqual(['b']);
    });

    it('does not switch providers once a delta was sent', async () => {
        const backup = fakeProvider('backup', { chunks: ['x'] });
        const chain = new FallbackProvider([
            fakeProvider('primary', { chunks: ['a', 'b'], error: new Error('[primary] reset'), failAfter: 1 }),
            backup,
        ]);

        const seen: string[] = [];
        await expect(
            (async () => {
                for await (const chunk of chain.stream(REQUEST)) seen.push(chunk);
            })()
        ).rejects.toThrow('[primary] reset');
        expect(seen).toEqual(['a']);
    });
});
