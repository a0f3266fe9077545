import type { ApiConfig } from '../types/api';
import { FallbackProvider } from './fallback';
import { OpenAICompatibleProvider } from './openai-provider';

export function createProviderChain(config: ApiConfig): FallbackProvider {
    return new FallbackProvider(config.LLM_ENDPOINTS.map((endpoint) => new OpenAICompatibleProvider(endpoint)));
}

export { FallbackProvider } from './fallback';
export { OpenAICompatibleProvider, toChatMessages } from './openai-provider';
export type { StreamingCompletionProvider } from './types';
