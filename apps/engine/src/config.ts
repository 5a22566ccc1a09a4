import { FAILURE_POLICIES, FailurePolicy } from './services/workflow-engine';

export interface EngineConfig {
    port: number;
    redisUrl: string;
    statusTtlSeconds: number;
    maxActiveRuns: number;
    maxEventLoopLag: number;
    concurrency: number;
    failurePolicy: FailurePolicy;
    moduleMaxRetries: number;
    moduleTimeoutMs: number;
    triggersFile: string | null;
}

type Env = Record<string, string | undefined>;

function intFrom(env: Env, name: string, fallback: number, min = 0): number {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min) {
        throw new Error(`${name} must be an integer >= ${min}, got "${raw}"`);
    }
    return value;
}

function isFailurePolicy(value: string): value is FailurePolicy {
    return FAILURE_POLICIES.some(p => p === value);
}

// Central Configuration
export function loadConfig(env: Env = process.env): EngineConfig {
    const policy = env.FAILURE_POLICY || 'skip-dependents';
    if (!isFailurePolicy(policy)) {
        throw new Error(`FAILURE_POLICY must be one of ${FAILURE_POLICIES.join(', ')}, got "${policy}"`);
    }

    return {
        port: intFrom(env, 'PORT', 50051, 1),
        redisUrl: env.REDIS_URL || 'redis://localhost:6379',
        statusTtlSeconds: intFrom(env, 'STATUS_TTL_SECONDS', 86400, 1),
        maxActiveRuns: intFrom(env, 'MAX_ACTIVE_RUNS', 100, 1),
        maxEventLoopLag: intFrom(env, 'MAX_EVENT_LOOP_LAG', 100, 1),
        concurrency: intFrom(env, 'ENGINE_CONCURRENCY', 1, 1),
        failurePolicy: policy,
        moduleMaxRetries: intFrom(env, 'MODULE_MAX_RETRIES', 0),
        moduleTimeoutMs: intFrom(env, 'MODULE_TIMEOUT_MS', 0),
        triggersFile: env.TRIGGERS_FILE || null,
    };
}
