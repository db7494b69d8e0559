import path from 'path';

export type CompletionBackend = 'echo' | 'openai';

export interface EngineConfig {
    port: number;
    databaseUrl?: string;
    redisUrl: string;
    templatesPath: string;
    eventsChannel: string;
    retryBaseDelayMs: number;
    maxTransitions: number;
    maxTransientRetries: number;
    recoveryStaleSeconds: number;
    recoveryIntervalMs: number;
    openaiApiKey?: string;
    openaiBaseUrl?: string;
    defaultCompletion: CompletionBackend;
}

function int(value: string | undefined, fallback: number, name: string): number {
    if (value === undefined || value === '') return fallback;
    const parsed = parseInt(value, 10);
    if (Number.isNaN(parsed) || parsed < 0) {
        throw new Error(`${name} must be a non-negative integer, got "${value}"`);
    }
    return parsed;
}

function backend(value: string | undefined, hasApiKey: boolean): CompletionBackend {
    if (value === undefined || value === '') return hasApiKey ? 'openai' : 'echo';
    if (value === 'echo' || value === 'openai') return value;
    throw new Error(`DEFAULT_COMPLETION must be "echo" or "openai", got "${value}"`);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
    const openaiApiKey = env.OPENAI_API_KEY || undefined;
    return {
        port: int(env.PORT, 50051, 'PORT'),
        databaseUrl: env.DATABASE_URL || undefined,
        redisUrl: env.REDIS_URL || 'redis://localhost:6379',
        templatesPath: path.resolve(env.PARLEY_TEMPLATES || 'config/dialog_templates.yaml'),
        eventsChannel: env.PARLEY_EVENTS_CHANNEL || 'parley:events',
        retryBaseDelayMs: int(env.RETRY_BASE_DELAY_MS, 0, 'RETRY_BASE_DELAY_MS'),
        maxTransitions: int(env.MAX_TRANSITIONS, 1000, 'MAX_TRANSITIONS'),
        maxTransientRetries: int(env.MAX_TRANSIENT_RETRIES, 3, 'MAX_TRANSIENT_RETRIES'),
        recoveryStaleSeconds: int(env.RECOVERY_STALE_SECONDS, 300, 'RECOVERY_STALE_SECONDS'),
        recoveryIntervalMs: int(env.RECOVERY_INTERVAL_MS, 30_000, 'RECOVERY_INTERVAL_MS'),
        openaiApiKey,
        openaiBaseUrl: env.OPENAI_BASE_URL || undefined,
        defaultCompletion: backend(env.DEFAULT_COMPLETION, openaiApiKey !== undefined),
    };
}
