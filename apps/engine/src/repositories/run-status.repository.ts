import { deserialize, payloadSize, serialize } from '@canvasflow/sdk';
import {
    ModuleStatusEntity,
    moduleStatus,
    RunStatusEntity,
    RunSummary,
    runStatus,
    TERMINAL_MODULE_STATUSES,
    TERMINAL_RUN_STATUSES,
} from '../db/run-status.entity';
import { WorkflowNotFoundError } from '../errors';
import { WorkflowDefinition } from '../graph/workflow-definition';

const TAG = '[run-status]';
const KEY_PREFIX = 'canvasflow:workflow:';

export const DEFAULT_STATUS_TTL_SECONDS = 24 * 60 * 60;

// A snapshot is capped at 1MB as a whole; each stored output field gets a slice of that.
export const DEFAULT_MAX_FIELD_BYTES = 128 * 1024;

/** Stored in place of an output too large for the snapshot. */
export type TruncatedOutput = {
    truncated: true;
    size: number;
};

/** The slice of the Redis client the repository needs. */
export interface KeyValueClient {
    get(key: string): Promise<string | null>;
    set(key: string, value: string, mode: 'EX', seconds: number): Promise<unknown>;
    del(key: string): Promise<unknown>;
}

export interface ModuleUpdate {
    brief_output?: Record<string, unknown>;
    detailed_output?: Record<string, unknown>;
}

export type RunUpdate = Pick<RunStatusEntity, 'outputs' | 'output_errors' | 'error'>;

export function statusKey(workflowId: string): string {
    return `${KEY_PREFIX}${workflowId}`;
}

export class RunStatusRepository {
    constructor(
        private readonly client: KeyValueClient,
        private readonly ttlSeconds: number = DEFAULT_STATUS_TTL_SECONDS,
        private readonly maxFieldBytes: number = DEFAULT_MAX_FIELD_BYTES,
    ) { }

    async initialize(
        workflowId: string,
        definition: WorkflowDefinition,
        trigger?: RunStatusEntity['trigger'],
    ): Promise<RunStatusEntity> {
        const modules: Record<string, ModuleStatusEntity> = {};
        for (const id of definition.executionOrder) {
            modules[id] = {
                status: moduleStatus.PENDING,
                start_time: null,
                end_time: null,
                brief_output: null,
                detailed_output: null,
            };
        }

        const entity: RunStatusEntity = {
            workflow_id: workflowId,
            workflow_name: definition.name,
            status: runStatus.INITIALIZING,
            start_time: new Date().toISOString(),
            end_time: null,
            execution_order: definition.executionOrder,
            modules,
            summary: summarize(modules),
        };
        if (trigger) entity.trigger = trigger;

        await this.save(entity);
        console.log(`${TAG} initialized ${workflowId} (${definition.executionOrder.length} modules)`);
        return entity;
    }

    async get(workflowId: string): Promise<RunStatusEntity | null> {
        const raw = await this.client.get(statusKey(workflowId));
        return deserialize<RunStatusEntity>(raw) ?? null;
    }

    async updateModule(
        workflowId: string,
        moduleId: string,
        status: moduleStatus,
        update: ModuleUpdate = {},
    ): Promise<RunStatusEntity> {
        const entity = await this.require(workflowId);
        const module = entity.modules[moduleId];
        if (!module) {
            throw new Error(`Module ${moduleId} not found in workflow ${workflowId}`);
        }

        const now = new Date().toISOString();
        module.status = status;
        if (status === moduleStatus.RUNNING && !module.start_time) module.start_time = now;
        if (TERMINAL_MODULE_STATUSES.has(status)) module.end_time = now;
        if (update.brief_output !== undefined) module.brief_output = update.brief_output;
        if (update.detailed_output !== undefined) {
            module.detailed_output = this.fit(`${moduleId} output`, update.detailed_output);
        }

        entity.summary = summarize(entity.modules);
        await this.save(entity);
        return entity;
    }

    async updateRun(workflowId: string, status: runStatus, update: RunUpdate = {}): Promise<RunStatusEntity> {
        const entity = await this.require(workflowId);

        entity.status = status;
        if (TERMINAL_RUN_STATUSES.has(status)) entity.end_time = new Date().toISOString();
        if (update.outputs !== undefined) {
            const outputs: Record<string, unknown> = {};
            for (const [name, value] of Object.entries(update.outputs)) {
                outputs[name] = this.fit(`output ${name}`, value);
            }
            entity.outputs = outputs;
        }
        if (update.output_errors !== undefined) entity.output_errors = update.output_errors;
        if (update.error !== undefined) entity.error = update.error;

        await this.save(entity);
        console.log(`${TAG} ${workflowId} -> ${status}`);
        return entity;
    }

    async delete(workflowId: string): Promise<void> {
        await this.client.del(statusKey(workflowId));
    }

    private fit<T>(label: string, value: T): T | TruncatedOutput {
        const size = payloadSize(value);
        if (size <= this.maxFieldBytes) return value;
        console.warn(`${TAG} ${label} is ${size} bytes, storing a truncation marker`);
        return { truncated: true, size };
    }

    private async require(workflowId: string): Promise<RunStatusEntity> {
        const entity = await this.get(workflowId);
        if (!entity) throw new WorkflowNotFoundError(workflowId);
        return entity;
    }

    private async save(entity: RunStatusEntity): Promise<void> {
        await this.client.set(statusKey(entity.workflow_id), serialize(entity), 'EX', this.ttlSeconds);
    }
}

export function summarize(modules: Record<string, ModuleStatusEntity>): RunSummary {
    const all = Object.values(modules);
    const count = (status: moduleStatus) => all.filter(m => m.status === status).length;
    return {
        total_modules: all.length,
        completed_modules: count(moduleStatus.COMPLETED),
        failed_modules: count(moduleStatus.FAILED),
        skipped_modules: count(moduleStatus.SKIPPED),
        cancelled_modules: count(moduleStatus.CANCELLED),
    };
}
