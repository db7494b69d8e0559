/**
 * Connection factories for Postgres and Redis.
 */
import Redis from 'ioredis';
import { Pool } from 'pg';

/**
 * Postgres connection pool:
 * - max: 10 connections (one engine process, a handful of concurrent dialogs)
 * - idleTimeoutMillis: 30s (release idle connections)
 * - connectionTimeoutMillis: 2s (fail fast on connection issues)
 */
export function createPool(connectionString?: string): Pool {
    return new Pool({
        connectionString,
        max: 10,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
    });
}

/** Redis client used for event publication */
export function createRedis(url = 'redis://localhost:6379'): Redis {
    return new Redis(url, { maxRetriesPerRequest: 3 });
}
