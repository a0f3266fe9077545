import { sql } from 'drizzle-orm';
import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import { bigint, bigserial, integer, jsonb, pgTable, text, timestamp } from 'drizzle-orm/pg-core';
import postgres, { type Sql } from 'postgres';

const GLOBAL_DB_REGISTRY_KEY = '__threadkeepPgRegistry';

export const accounts = pgTable('accounts', {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    name: text('name').notNull(),
    credits: integer('credits').notNull().default(0),
    created_at: timestamp('created_at', { withTimezone: true, mode: 'string' }).defaultNow().notNull(),
});

export const api_keys = pgTable('api_keys', {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    account_id: bigint('account_id', { mode: 'number' }).notNull(),
    key_prefix: text('key_prefix').notNull(),
    key_hash: text('key_hash').notNull(),
    name: text('name'),
    last_used_at: timestamp('last_used_at', { withTimezone: true, mode: 'string' }),
    created_at: timestamp('created_at', { withTimezone: true, mode: 'string' }).defaultNow().notNull(),
});

export const sessions = pgTable('sessions', {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    public_id: text('public_id').notNull(),
    account_id: bigint('account_id', { mode: 'number' }).notNull(),
    topic: text('topic').notNull().default(''),
    status: text('status', { enum: ['in_progress', 'completed', 'archived'] }).notNull().default('in_progress'),
    collected_data: jsonb('collected_data').$type<Record<string, unknown>>().notNull().default(sql`'{}'::jsonb`),
    created_at: timestamp('created_at', { withTimezone: true, mode: 'string' }).defaultNow().notNull(),
    updated_at: timestamp('updated_at', { withTimezone: true, mode: 'string' }).defaultNow().notNull(),
});

export const messages = pgTable('messages', {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    session_id: text('session_id').notNull(),
    role: text('role', { enum: ['user', 'assistant', 'system'] }).notNull(),
    content: text('content').notNull(),
    created_at: timestamp('created_at', { withTimezone: true, mode: 'string' }).defaultNow().notNull(),
});

export const credit_logs = pgTable('credit_logs', {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    account_id: bigint('account_id', { mode: 'number' }).notNull(),
    amount: integer('amount').notNull(),
    balance: integer('balance').notNull(),
    reason: text('reason').notNull(),
    created_at: timestamp('created_at', { withTimezone: true, mode: 'string' }).defaultNow().notNull(),
});

export const schema = {
    accounts,
    api_keys,
    sessions,
    messages,
    credit_logs,
};

export type ApiDb = PostgresJsDatabase<typeof schema>;

type DbRegistry = {
    clients: Map<string, Sql>;
    databases: Map<string, ApiDb>;
};

function resolveDbRegistry(): DbRegistry {
    const globalWithRegistry = globalThis as typeof globalThis & {
        [GLOBAL_DB_REGISTRY_KEY]?: DbRegistry;
    };

    const existing = globalWithRegistry[GLOBAL_DB_REGISTRY_KEY];
    if (existing) return existing;

    const registry: DbRegistry = {
        clients: new Map<string, Sql>(),
        databases: new Map<string, ApiDb>(),
    };
    globalWithRegistry[GLOBAL_DB_REGISTRY_KEY] = registry;
    return registry;
}

export function createDbClient(databaseUrl: string): ApiDb {
    const registry = resolveDbRegistry();
    const existingDb = registry.databases.get(databaseUrl);
    if (existingDb) return existingDb;

    const sqlClient = postgres(databaseUrl, {
        prepare: false,
        max: 5,
        idle_timeout: 20,
        connect_timeout: 10,
    });

    const db = drizzle(sqlClient, { schema });
    registry.clients.set(databaseUrl, sqlClient);
    registry.databases.set(databaseUrl, db);
    return db;
}
