import path from 'node:path';
import process from 'node:process';
import { fileURLToPath } from 'node:url';

import dotenv from 'dotenv';

import type { ApiConfig, LlmEndpoint, StorageConfig } from './types/api';

let cachedConfig: ApiConfig | null = null;

const APP_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..');
const REPO_ROOT = path.resolve(APP_ROOT, '..', '..');
const ROOT_ENV_PATH = path.join(REPO_ROOT, '.env');
const APP_LOCAL_ENV_PATH = path.join(APP_ROOT, '.env.local');
const APP_ENV_PATH = path.join(APP_ROOT, '.env');

const DEFAULT_LLM_BASE_URL = 'https://api.openai.com/v1';

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

type Env = Record<string, string | undefined>;

function loadEnv() {
    const explicitPath = String(process.env.DOTENV_CONFIG_PATH ?? '').trim();
    if (explicitPath) {
        dotenv.config({ path: explicitPath, override: true });
        return;
    }

    const rootResult = dotenv.config({ path: ROOT_ENV_PATH, override: true });
    if (!rootResult.error) return;

    const localResult = dotenv.config({ path: APP_LOCAL_ENV_PATH, override: true });
    if (!localResult.error) return;

    dotenv.config({ path: APP_ENV_PATH, override: true });
}

function optionalEnv(env: Env, name: string): string | undefined {
    const value = String(env[name] ?? '').trim();
    return value || undefined;
}

function requireEnv(env: Env, name: string): string {
    const value = optionalEnv(env, name);
    if (!value) throw new ConfigError(`Missing required env var: ${name}`);
    return value;
}

function readPositiveInt(env: Env, name: string, fallback: number): number {
    const raw = optionalEnv(env, name);
    if (raw === undefined) return fallback;

    const value = Number(raw);
    if (!Number.isInteger(value) || value <= 0) {
        throw new ConfigError(`Invalid env var: ${name} (expected a positive integer, got "${raw}")`);
    }
    return value;
}

function readStorageConfig(env: Env): StorageConfig {
    const provider = String(env.DATABASE_PROVIDER ?? '').trim().toLowerCase();

    if (provider === 'postgres') {
        return { DATABASE_PROVIDER: 'postgres', DATABASE_URL: requireEnv(env, 'DATABASE_URL') };
    }
    if (provider === 'supabase') {
        return {
            DATABASE_PROVIDER: 'supabase',
            SUPABASE_URL: requireEnv(env, 'SUPABASE_URL'),
            SUPABASE_SERVICE_ROLE_KEY: requireEnv(env, 'SUPABASE_SERVICE_ROLE_KEY'),
        };
    }
    if (provider === 'memory') {
        return { DATABASE_PROVIDER: 'memory' };
    }
    throw new ConfigError('Missing or invalid env var: DATABASE_PROVIDER (expected "postgres", "supabase" or "memory")');
}

function readEndpoint(env: Env, name: LlmEndpoint['name'], defaultTimeoutMs: number): LlmEndpoint | null {
    const prefix = name.toUpperCase();
    const apiKey = optionalEnv(env, `${prefix}_LLM_API_KEY`);
    if (!apiKey) return null;

    return {
        name,
        apiKey,
        baseUrl: optionalEnv(env, `${prefix}_LLM_BASE_URL`) ?? DEFAULT_LLM_BASE_URL,
        timeoutMs: readPositiveInt(env, `${prefix}_LLM_TIMEOUT_MS`, defaultTimeoutMs),
    };
}

export function parseApiConfig(env: Env): ApiConfig {
    const storage = readStorageConfig(env);

    const endpoints = [readEndpoint(env, 'primary', 30_000), readEndpoint(env, 'backup', 60_000)].filter(
        (endpoint): endpoint is LlmEndpoint => endpoint !== null
    );

    const models: Record<string, string> = {
        flash: optionalEnv(env, 'MODEL_FLASH') ?? 'gpt-4o-mini',
        pro: optionalEnv(env, 'MODEL_PRO') ?? 'gpt-4o',
    };

    const defaultModel = optionalEnv(env, 'DEFAULT_MODEL') ?? 'flash';
    const summaryModel = optionalEnv(env, 'SUMMARY_MODEL') ?? 'flash';
    for (const [name, alias] of [
        ['DEFAULT_MODEL', defaultModel],
        ['SUMMARY_MODEL', summaryModel],
    ]) {
        if (!Object.hasOwn(models, alias)) {
            throw new ConfigError(`Invalid env var: ${name} (expected one of ${Object.keys(models).join(', ')})`);
        }
    }

    return {
        ...storage,
        THREADKEEP_ADMIN_KEY: requireEnv(env, 'THREADKEEP_ADMIN_KEY'),
        CORS_ORIGIN: optionalEnv(env, 'CORS_ORIGIN') ?? '*',
        LLM_ENDPOINTS: endpoints,
        MODELS: models,
        DEFAULT_MODEL: defaultModel,
        SUMMARY_MODEL: summaryModel,
        SUMMARY_TIMEOUT_MS: readPositiveInt(env, 'SUMMARY_TIMEOUT_MS', 15_000),
        CREDITS_PER_CHAT: readPositiveInt(env, 'CREDITS_PER_CHAT', 2),
        DEFAULT_CREDITS: readPositiveInt(env, 'DEFAULT_CREDITS', 10),
        MAX_HISTORY_CHARS: readPositiveInt(env, 'MAX_HISTORY_CHARS', 50_000),
        COMPRESS_THRESHOLD_CHARS: readPositiveInt(env, 'COMPRESS_THRESHOLD_CHARS', 30_000),
        KEEP_RECENT_MESSAGES: readPositiveInt(env, 'KEEP_RECENT_MESSAGES', 8),
    };
}

export function getApiConfig(): ApiConfig {
    if (cachedConfig) return cachedConfig;
    loadEnv();

    cachedConfig = parseApiConfig(process.env);
    return cachedConfig;
}
