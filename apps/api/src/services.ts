import { ContextCompressor, type CompletionProvider } from '@threadkeep/compression';

import { createProviderChain } from './llm';
import { createStorageAdapter } from './storage';
import type { ApiConfig } from './types/api';
import type { Services } from './types/http';

export function createCompressor(config: ApiConfig, provider: CompletionProvider): ContextCompressor {
    return new ContextCompressor(provider, {
        maxCharsBeforeCompress: config.COMPRESS_THRESHOLD_CHARS,
        keepRecentMessages: config.KEEP_RECENT_MESSAGES,
        summaryModel: config.MODELS[config.SUMMARY_MODEL],
        summaryTimeoutMs: config.SUMMARY_TIMEOUT_MS,
        logger: console,
    });
}

export function createServices(config: ApiConfig): Services {
    const provider = createProviderChain(config);
    if (config.LLM_ENDPOINTS.length === 0) {
        console.warn('No LLM endpoint configured: chat requests will fail until PRIMARY_LLM_API_KEY is set');
    }

    return {
        config,
        storage: createStorageAdapter(config),
        provider,
        compressor: createCompressor(config, provider),
    };
}
