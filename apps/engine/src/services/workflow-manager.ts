import { HandlerRegistry } from '@canvasflow/sdk';
import { v7 as uuid } from 'uuid';
import { RunStatusEntity } from '../db/run-status.entity';
import { BackpressureError, errorMessage } from '../errors';
import { buildWorkflowDefinition } from '../graph/graph-builder';
import { WorkflowDefinition } from '../graph/workflow-definition';
import { RunStatusRepository } from '../repositories/run-status.repository';
import { BackpressureGuard } from './backpressure';
import { EventBus, WorkflowEventListener } from './event-bus';
import { RunStatusObserver } from './status-observer';
import { WorkflowEngine } from './workflow-engine';

const TAG = '[manager]';

export interface WorkflowManagerDeps {
    registry: HandlerRegistry;
    engine: WorkflowEngine;
    repository: RunStatusRepository;
    bus: EventBus;
    backpressure?: BackpressureGuard;
}

export interface SubmitOptions {
    trigger?: RunStatusEntity['trigger'];
}

interface ActiveRun {
    controller: AbortController;
    done: Promise<void>;
}

/**
 * Owns the runs of this process: validates and starts submissions, keeps
 * their status snapshots current and lets callers follow, await or cancel them.
 */
export class WorkflowManager {
    private readonly active = new Map<string, ActiveRun>();
    // submissions past the backpressure check whose snapshot is still being written
    private pending = 0;

    constructor(private readonly deps: WorkflowManagerDeps) { }

    get activeCount(): number {
        return this.active.size;
    }

    /**
     * Validates the document and starts it in the background. Rejects with a
     * configuration error before anything runs, or with BackpressureError
     * when the process is saturated.
     */
    async submit(document: unknown, options: SubmitOptions = {}): Promise<string> {
        const definition = buildWorkflowDefinition(document, this.deps.registry);

        const overload = this.deps.backpressure?.check(this.active.size + this.pending);
        if (overload) {
            console.warn(`${TAG} [backpressure] ${overload}`);
            throw new BackpressureError(overload);
        }

        const workflowId = uuid();
        const controller = new AbortController();
        const observer = new RunStatusObserver(workflowId, this.deps.repository, this.deps.bus);

        this.pending++;
        try {
            await this.deps.repository.initialize(workflowId, definition, options.trigger);
        } finally {
            this.pending--;
        }

        const done = this.run(definition, observer, controller.signal)
            .finally(() => this.active.delete(workflowId));
        this.active.set(workflowId, { controller, done });

        console.log(`${TAG} started ${workflowId} (${definition.name})`);
        return workflowId;
    }

    getStatus(workflowId: string): Promise<RunStatusEntity | null> {
        return this.deps.repository.get(workflowId);
    }

    subscribe(workflowId: string, listener: WorkflowEventListener): () => void {
        return this.deps.bus.subscribe(workflowId, listener);
    }

    isActive(workflowId: string): boolean {
        return this.active.has(workflowId);
    }

    /** Requests cancellation. Modules already running finish; the rest are cancelled. */
    cancel(workflowId: string): boolean {
        const run = this.active.get(workflowId);
        if (!run) return false;
        if (!run.controller.signal.aborted) {
            console.log(`${TAG} cancelling ${workflowId}`);
            run.controller.abort();
        }
        return true;
    }

    cancelAll(): void {
        for (const id of Array.from(this.active.keys())) this.cancel(id);
    }

    /** Waits for the run to settle, then returns its final snapshot. */
    async wait(workflowId: string): Promise<RunStatusEntity | null> {
        await this.active.get(workflowId)?.done;
        return this.getStatus(workflowId);
    }

    async drain(): Promise<void> {
        await Promise.all(Array.from(this.active.values(), run => run.done));
    }

    private async run(definition: WorkflowDefinition, observer: RunStatusObserver, signal: AbortSignal): Promise<void> {
        try {
            await observer.runStarted();
            const result = await this.deps.engine.execute(definition, { observer, signal });
            await observer.runFinished(result);
        } catch (err) {
            console.error(`${TAG} run of ${definition.name} crashed:`, err);
            await observer.runFailed(errorMessage(err));
        }
    }
}
