/**
 * Lifecycle states for one module inside a run.
 * Modules progress: PENDING → RUNNING → COMPLETED/FAILED,
 * or PENDING → SKIPPED/CANCELLED without ever being dispatched.
 */
export enum moduleStatus {
    PENDING = 'pending',
    RUNNING = 'running',
    COMPLETED = 'completed',
    FAILED = 'failed',
    SKIPPED = 'skipped',
    CANCELLED = 'cancelled'
}

/**
 * Lifecycle states for a workflow run.
 * Runs progress: INITIALIZING → IN_PROGRESS → COMPLETED/FAILED/CANCELLED
 */
export enum runStatus {
    INITIALIZING = 'initializing',
    IN_PROGRESS = 'in_progress',
    COMPLETED = 'completed',
    FAILED = 'failed',
    CANCELLED = 'cancelled'
}

export const TERMINAL_MODULE_STATUSES: ReadonlySet<moduleStatus> = new Set([
    moduleStatus.COMPLETED,
    moduleStatus.FAILED,
    moduleStatus.SKIPPED,
    moduleStatus.CANCELLED,
]);

export const TERMINAL_RUN_STATUSES: ReadonlySet<runStatus> = new Set([
    runStatus.COMPLETED,
    runStatus.FAILED,
    runStatus.CANCELLED,
]);

export interface ModuleStatusEntity {
    status: moduleStatus;
    start_time: string | null;
    end_time: string | null;
    brief_output: Record<string, unknown> | null;
    detailed_output: Record<string, unknown> | null;
}

export interface RunSummary {
    total_modules: number;
    completed_modules: number;
    failed_modules: number;
    skipped_modules: number;
    cancelled_modules: number;
}

/**
 * Status snapshot of one workflow run, as served by the status endpoint.
 * Kept in Redis for a while after the run ends.
 */
export interface RunStatusEntity {
    workflow_id: string;
    workflow_name: string;
    status: runStatus;
    start_time: string;
    end_time: string | null;
    execution_order: string[];
    modules: Record<string, ModuleStatusEntity>;
    summary: RunSummary;
    outputs?: Record<string, unknown>;
    output_errors?: Record<string, string>;
    error?: { message: string; type: string };
    trigger?: { type: string; timestamp: string };
}
