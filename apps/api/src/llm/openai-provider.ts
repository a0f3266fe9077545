import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import {
    MalformedProviderResponseError,
    ProviderUnavailableError,
    toError,
    type CompletionRequest,
    type Turn,
} from '@threadkeep/compression';

import type { LlmEndpoint } from '../types/api';
import type { StreamingCompletionProvider } from './types';

function toChatMessage(turn: Turn): ChatCompletionMessageParam {
    switch (turn.role) {
        case 'user':
            return { role: 'user', content: turn.content };
        case 'assistant':
            return { role: 'assistant', content: turn.content };
        case 'system':
            return { role: 'system', content: turn.content };
    }
}

export function toChatMessages(request: Pick<CompletionRequest, 'systemPrompt' | 'messages'>): ChatCompletionMessageParam[] {
    const system: ChatCompletionMessageParam[] = request.systemPrompt ? [{ role: 'system', content: request.systemPrompt }] : [];
    return [...system, ...request.messages.map(toChatMessage)];
}

/** Any endpoint speaking the OpenAI chat-completions protocol. */
export class OpenAICompatibleProvider implements StreamingCompletionProvider {
    readonly name: string;
    private client: OpenAI;

    constructor(endpoint: LlmEndpoint) {
        this.name = endpoint.name;
        this.client = new OpenAI({
            apiKey: endpoint.apiKey,
            baseURL: endpoint.baseUrl,
            timeout: endpoint.timeoutMs,
            maxRetries: 0,
        });
    }

    private unavailable(error: unknown): ProviderUnavailableError {
        return new ProviderUnavailableError(`[${this.name}] ${toError(error).message}`, { cause: error });
    }

    async complete(request: CompletionRequest): Promise<string> {
        let completion: OpenAI.Chat.ChatCompletion;
        try {
            completion = await this.client.chat.completions.create(
                {
                    model: request.model,
                    messages: toChatMessages(request),
                    temperature: request.temperature,
                    max_tokens: request.maxTokens,
                },
                { signal: request.signal }
            );
        } catch (error) {
            throw this.unavailable(error);
        }

        const content = completion.choices[0]?.message?.content;
        if (typeof content !== 'string' || content.length === 0) {
            throw new MalformedProviderResponseError(`[${this.name}] completion carried no text`);
        }
        return content;
    }

    async *stream(request: CompletionRequest): AsyncGenerator<string> {
        let chunks: AsyncIterable<OpenAI.Chat.ChatCompletionChunk>;
        try {
            chunks = await this.client.chat.completions.create(
                {
                    model: request.model,
                    messages: toChatMessages(request),
                    temperature: request.temperature,
                    max_tokens: request.maxTokens,
                    stream: true,
                },
                { signal: request.signal }
            );
        } catch (error) {
            throw this.unavailable(error);
        }

        try {
            for await (const chunk of chunks) {
                const delta = chunk.choices[0]?.delta?.content;
                if (delta) yield delta;
            }
        } catch (error) {
            throw this.unavailable(error);
        }
    }
}
