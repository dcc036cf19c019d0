import path from 'path';
import { v7 as uuid } from 'uuid';
import { BackoffPolicy, DEFAULT_BACKOFF } from './utils/backoff';

const ENGINE_ROOT = path.join(__dirname, '..');

export interface EngineConfig {
    port: number;
    databaseUrl: string | null;
    redisUrl: string | null;
    agentServiceUrl: string;
    agentsFile: string;
    templatesFile: string;
    stepTimeoutMs: number;
    maxAttempts: number;
    backoff: BackoffPolicy;
    maxInFlight: number;
    relayMentions: boolean;
    heartbeatInterval: number;
    reaperStale: number;  // seconds
    reaperInterval: number;
    workerId: string;
}

const int = (value: string | undefined, fallback: string): number => {
    const parsed = parseInt(value || fallback, 10);
    if (Number.isNaN(parsed)) throw new Error(`Expected an integer, got "${value}"`);
    return parsed;
};

const file = (value: string | undefined, fallback: string): string =>
    path.resolve(ENGINE_ROOT, value || fallback);

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
    return {
        port: int(env.PORT, '50051'),
        databaseUrl: env.DATABASE_URL || null,
        redisUrl: env.REDIS_URL || null,
        agentServiceUrl: env.AGENT_SERVICE_URL || 'http://localhost:8080',
        agentsFile: file(env.ENSEMBLE_AGENTS, 'config/agents.json'),
        templatesFile: file(env.ENSEMBLE_TEMPLATES, 'config/templates.json'),
        stepTimeoutMs: int(env.STEP_TIMEOUT_MS, '60000'),
        maxAttempts: int(env.STEP_MAX_ATTEMPTS, '3'),
        backoff: {
            ...DEFAULT_BACKOFF,
            initialIntervalMs: int(env.RETRY_INITIAL_DELAY_MS, String(DEFAULT_BACKOFF.initialIntervalMs)),
            maxIntervalMs: int(env.RETRY_MAX_DELAY_MS, String(DEFAULT_BACKOFF.maxIntervalMs)),
        },
        maxInFlight: int(env.MAX_IN_FLIGHT, '4'),
        relayMentions: (env.RELAY_MENTIONS || 'true') !== 'false',
        heartbeatInterval: int(env.HEARTBEAT_INTERVAL, '5000'),
        reaperStale: int(env.REAPER_STALE_THRESHOLD, '300'),
        reaperInterval: int(env.REAPER_INTERVAL, '10000'),
        workerId: `orchestrator-${uuid().slice(0, 8)}`,
    };
}
