import type { Context, Hono, MiddlewareHandler } from 'hono';
import type { ContextCompressor } from '@threadkeep/compression';

import type { StreamingCompletionProvider } from '../llm/types';
import type { StorageAdapter } from '../storage/types';
import type { ApiConfig, Auth } from './api';

export type Services = {
    config: ApiConfig;
    storage: StorageAdapter;
    provider: StreamingCompletionProvider;
    /** Optional: without one, oversized histories are truncated instead of summarised. */
    compressor?: ContextCompressor;
};

export type AppVariables = Services & {
    auth: Auth;
};

export type AppEnv = {
    Variables: AppVariables;
};

export type HttpApp = Hono<AppEnv>;
export type HttpContext = Context<AppEnv>;
export type HttpMiddleware = MiddlewareHandler<AppEnv>;
