import type { Role } from '@threadkeep/compression';

// =============================================================================
// API RESPONSE TYPES
// =============================================================================

export type MessageResponse = {
    role: Role;
    content: string;
    timestamp: string;
};

export type SessionResponse = {
    id: string;
    topic: string;
    status: string;
    collected_data: Record<string, unknown>;
    created_at: string;
    updated_at: string;
};

export type ChatResponse = {
    response: string;
    model: string;
    credits_used: number;
    remaining_credits: number;
};

// =============================================================================
// APP CONFIGURATION TYPES
// =============================================================================

export type StorageConfig =
    | {
          DATABASE_PROVIDER: 'postgres';
          DATABASE_URL: string;
      }
    | {
          DATABASE_PROVIDER: 'supabase';
          SUPABASE_URL: string;
          SUPABASE_SERVICE_ROLE_KEY: string;
      }
    | {
          DATABASE_PROVIDER: 'memory';
      };

export type LlmEndpoint = {
    name: 'primary' | 'backup';
    apiKey: string;
    baseUrl: string;
    timeoutMs: number;
};

export type ApiConfig = StorageConfig & {
    THREADKEEP_ADMIN_KEY: string;
    CORS_ORIGIN: string;
    /** Tried in order; the first endpoint that answers wins. */
    LLM_ENDPOINTS: LlmEndpoint[];
    /** Alias → provider model id, e.g. { flash: 'gpt-4o-mini' }. */
    MODELS: Record<string, string>;
    DEFAULT_MODEL: string;
    SUMMARY_MODEL: string;
    SUMMARY_TIMEOUT_MS: number;
    CREDITS_PER_CHAT: number;
    DEFAULT_CREDITS: number;
    MAX_HISTORY_CHARS: number;
    COMPRESS_THRESHOLD_CHARS: number;
    KEEP_RECENT_MESSAGES: number;
};

export type Auth = { apiKeyId: number; accountId: number };
