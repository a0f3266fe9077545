import { describe, expect, it } from 'vitest';

import { ConfigError, parseApiConfig } from '../src/config';

const BASE = { DATABASE_PROVIDER: 'memory', THREADKEEP_ADMIN_KEY: 'test-admin-key' };

describe('parseApiConfig', () => {
    it('applies defaults', () => {
        const config = parseApiConfig(BASE);

        expect(config).toMatchObject({
            DATABASE_PROVIDER: 'memory',
            CORS_ORIGIN: '*',
            LLM_ENDPOINTS: [],
            MODELS: { flash: 'gpt-4o-mini', pro: 'gpt-4o' },
            DEFAULT_MODEL: 'flash',
            SUMMARY_MODEL: 'flash',
            SUMMARY_TIMEOUT_MS: 15_000,
            CREDITS_PER_CHAT: 2,
            DEFAULT_CREDITS: 10,
            MAX_HISTORY_CHARS: 50_000,
            COMPRESS_THRESHOLD_CHARS: 30_000,
            KEEP_RECENT_MESSAGES: 8,
        });
    });

    it('reads primary and backup endpoints in order', () => {
        const config = parseApiConfig({
            ...BASE,
            PRIMARY_LLM_API_KEY: 'test-primary',
            BACKUP_LLM_API_KEY: 'test-backup',
            BACKUP_LLM_BASE_URL: 'http://localhost:11434/v1',
            BACKUP_LLM_TIMEOUT_MS: '90000',
        });

        expect(config.LLM_ENDPOINTS).toEqual([
            { name: 'primary', apiKey: 'test-primary', baseUrl: 'https://api.openai.com/v1', timeoutMs: 30_000 },
            { name: 'backup', apiKey: 'test-backup', baseUrl: 'http://localhost:11434/v1', timeoutMs: 90_000 },
        ]);
    });

    it('requires postgres settings for the postgres provider', () => {
        expect(() => parseApiConfig({ ...BASE, DATABASE_PROVIDER: 'postgres' })).toThrow(
            new ConfigError('Missing required env var: DATABASE_URL')
        );
    });

    it('rejects an unknown storage provider', () => {
        expect(() => parseApiConfig({ ...BASE, DATABASE_PROVIDER: 'sqlite' })).toThrow(ConfigError);
    });

    it('requires the admin key', () => {
        expect(() => parseApiConfig({ DATABASE_PROVIDER: 'memory' })).toThrow('Missing required env var: THREADKEEP_ADMIN_KEY');
    });

    it('rejects a default model that is not a configured alias', () => {
        expect(() => parseApiConfig({ ...BASE, DEFAULT_MODEL: 'turbo' })).toThrow(
            'Invalid env var: DEFAULT_MODEL (expected one of flash, pro)'
        );
    });

    it('rejects a summary model named after an object builtin', () => {
        expect(() => parseApiConfig({ ...BASE, SUMMARY_MODEL: 'constructor' })).toThrow(
            'Invalid env var: SUMMARY_MODEL (expected one of flash, pro)'
        );
    });

    it('rejects numbers that are not positive integers', () => {
        expect(() => parseApiConfig({ ...BASE, CREDITS_PER_CHAT: '1.5' })).toThrow(
            'Invalid env var: CREDITS_PER_CHAT (expected a positive integer, got "1.5")'
        );
    });
});
