/**
 * Connection factories for Postgres and Redis.
 * Both are optional: the engine falls back to in-memory storage and
 * in-process events when the URLs are unset.
 */
import Redis from 'ioredis';
import { Pool } from 'pg';

/**
 * Postgres connection pool:
 * - max: 20 connections
 * - idleTimeoutMillis: 30s (release idle connections)
 * - connectionTimeoutMillis: 2s (fail fast on connection issues)
 */
export function createPool(connectionString: string): Pool {
    return new Pool({
        connectionString,
        max: 20,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
    });
}

/** Redis client for execution event pub/sub */
export function createRedis(url: string): Redis {
    return new Redis(url, { maxRetriesPerRequest: 3 });
}
