import { TaskOutput } from '@canvasflow/sdk';
import { moduleStatus, runStatus } from '../db/run-status.entity';
import { errorMessage } from '../errors';
import { ModuleUpdate, RunStatusRepository, RunUpdate } from '../repositories/run-status.repository';
import { EventBus } from './event-bus';
import { WorkflowObserver, WorkflowResult } from './workflow-engine';

const TAG = '[status]';

/**
 * Short summary of a module's output for status listings. Picks out the
 * well-known metrics document pipelines report.
 */
export function briefOutput(moduleId: string, output: TaskOutput): Record<string, unknown> {
    const brief: Record<string, unknown> = { message: `Module ${moduleId} completed successfully` };
    if ('content_length' in output) brief.size = output.content_length;
    if ('total_chunks' in output) brief.chunks = output.total_chunks;
    if ('total_tokens' in output) brief.tokens = output.total_tokens;
    if (Array.isArray(output.embeddings)) brief.embeddings_count = output.embeddings.length;
    return brief;
}

/**
 * Mirrors one run's progress into the status repository and the event bus.
 * Writes go through a single promise chain so read-modify-write updates of
 * the snapshot never interleave.
 */
export class RunStatusObserver implements WorkflowObserver {
    private chain: Promise<void> = Promise.resolve();

    constructor(
        private readonly workflowId: string,
        private readonly repository: RunStatusRepository,
        private readonly bus: EventBus,
    ) { }

    onModuleStart(moduleId: string): Promise<void> {
        return this.moduleUpdate(moduleId, moduleStatus.RUNNING, {
            brief_output: { message: `Starting module ${moduleId}` },
        });
    }

    onModuleComplete(moduleId: string, output: TaskOutput): Promise<void> {
        return this.moduleUpdate(moduleId, moduleStatus.COMPLETED, {
            brief_output: briefOutput(moduleId, output),
            detailed_output: output,
        });
    }

    onModuleError(moduleId: string, error: string): Promise<void> {
        return this.moduleUpdate(moduleId, moduleStatus.FAILED, {
            brief_output: { message: 'Module execution failed', error },
            detailed_output: { error, type: 'module_error' },
        });
    }

    onModuleSkipped(moduleId: string, reason: string): Promise<void> {
        return this.moduleUpdate(moduleId, moduleStatus.SKIPPED, {
            brief_output: { message: `Skipped: ${reason}` },
        });
    }

    onModuleCancelled(moduleId: string): Promise<void> {
        return this.moduleUpdate(moduleId, moduleStatus.CANCELLED, {
            brief_output: { message: 'Cancelled before it started' },
        });
    }

    runStarted(): Promise<void> {
        return this.runUpdate(runStatus.IN_PROGRESS);
    }

    runFinished(result: WorkflowResult): Promise<void> {
        const update: RunUpdate = { outputs: result.outputs, output_errors: result.outputErrors };
        if (result.status === runStatus.FAILED) {
            const failed = result.executionOrder.find(id => result.modules[id]?.status === moduleStatus.FAILED);
            const report = failed === undefined ? undefined : result.modules[failed];
            update.error = {
                message: report?.error ?? 'One or more modules did not complete',
                type: 'module_error',
            };
        }
        return this.runUpdate(result.status, update);
    }

    runFailed(message: string): Promise<void> {
        return this.runUpdate(runStatus.FAILED, { error: { message, type: 'workflow_error' } });
    }

    /** Resolves once every queued write has been applied. */
    flush(): Promise<void> {
        return this.chain;
    }

    private moduleUpdate(moduleId: string, status: moduleStatus, update: ModuleUpdate): Promise<void> {
        return this.enqueue(async () => {
            try {
                await this.repository.updateModule(this.workflowId, moduleId, status, update);
            } catch (err) {
                console.error(`${TAG} ${this.workflowId}: could not record ${moduleId} as ${status}: ${errorMessage(err)}`);
                await this.retry(`${moduleId} as ${status}`, () =>
                    this.repository.updateModule(this.workflowId, moduleId, status));
            }
            this.bus.publish(this.workflowId, {
                type: 'module_update',
                module_id: moduleId,
                status,
                brief_output: update.brief_output ?? null,
            });
        });
    }

    private runUpdate(status: runStatus, update: RunUpdate = {}): Promise<void> {
        return this.enqueue(async () => {
            let summary: unknown = null;
            try {
                const entity = await this.repository.updateRun(this.workflowId, status, update);
                summary = entity.summary;
            } catch (err) {
                console.error(`${TAG} ${this.workflowId}: could not record run as ${status}: ${errorMessage(err)}`);
                const entity = await this.retry(`run as ${status}`, () =>
                    this.repository.updateRun(this.workflowId, status));
                if (entity) summary = entity.summary;
            }
            this.bus.publish(this.workflowId, {
                type: 'workflow_update',
                status,
                summary,
                ...update,
            });
        });
    }

    // status only, no payload
    private async retry<T>(label: string, write: () => Promise<T>): Promise<T | null> {
        try {
            return await write();
        } catch (err) {
            console.error(`${TAG} ${this.workflowId}: status-only write of ${label} failed: ${errorMessage(err)}`);
            return null;
        }
    }

    private enqueue(write: () => Promise<void>): Promise<void> {
        const next = this.chain.then(write).catch(err => {
            console.error(`${TAG} ${this.workflowId}: status write failed:`, err);
        });
        this.chain = next;
        return next;
    }
}
