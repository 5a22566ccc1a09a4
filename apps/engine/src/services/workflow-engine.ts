import { HandlerRegistry, TaskInput, TaskOutput } from '@canvasflow/sdk';
import { moduleStatus, runStatus } from '../db/run-status.entity';
import { errorMessage } from '../errors';
import { WorkflowDefinition } from '../graph/workflow-definition';
import { resolve, resolveModuleInput } from '../resolver/references';
import { InMemoryStateStore, StateStore } from '../state/state-store';
import { runTask, TaskOutcome } from '../task-runner';
import { calculateBackOff, DEFAULT_RETRY_POLICY, RetryPolicy, sleep } from '../utils/backoff';

const TAG = '[engine]';

/**
 * - `skip-dependents`: a failure skips everything downstream of it; independent branches keep running.
 * - `fail-fast`: a failure cancels every module not yet dispatched.
 */
export type FailurePolicy = 'skip-dependents' | 'fail-fast';

export const FAILURE_POLICIES: readonly FailurePolicy[] = ['skip-dependents', 'fail-fast'];

export interface EngineOptions {
    failurePolicy?: FailurePolicy;
    /** Modules allowed in flight at once. 1 runs strictly in execution order. */
    concurrency?: number;
    retry?: Partial<RetryPolicy>;
    /** 0 disables the per-module timeout. */
    moduleTimeoutMs?: number;
}

export interface WorkflowObserver {
    onModuleStart?(moduleId: string): void | Promise<void>;
    onModuleComplete?(moduleId: string, output: TaskOutput): void | Promise<void>;
    onModuleError?(moduleId: string, error: string): void | Promise<void>;
    onModuleSkipped?(moduleId: string, reason: string): void | Promise<void>;
    onModuleCancelled?(moduleId: string): void | Promise<void>;
}

export interface ExecuteOptions {
    observer?: WorkflowObserver;
    signal?: AbortSignal;
    store?: StateStore;
}

export interface ModuleReport {
    status: moduleStatus;
    output?: TaskOutput;
    error?: string;
}

export interface WorkflowResult {
    status: runStatus.COMPLETED | runStatus.FAILED | runStatus.CANCELLED;
    outputs: Record<string, unknown>;
    outputErrors: Record<string, string>;
    modules: Record<string, ModuleReport>;
    executionOrder: string[];
}

const BLOCKING = new Set([moduleStatus.FAILED, moduleStatus.SKIPPED, moduleStatus.CANCELLED]);

export class WorkflowEngine {
    private readonly failurePolicy: FailurePolicy;
    private readonly concurrency: number;
    private readonly retry: RetryPolicy;
    private readonly moduleTimeoutMs: number;

    constructor(
        private readonly registry: HandlerRegistry,
        options: EngineOptions = {},
    ) {
        this.failurePolicy = options.failurePolicy ?? 'skip-dependents';
        this.concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
        this.retry = { ...DEFAULT_RETRY_POLICY, ...options.retry };
        this.moduleTimeoutMs = options.moduleTimeoutMs ?? 0;
    }

    /**
     * Runs every module of the definition. A module is dispatched only once
     * all of its predecessors completed; the returned promise settles after
     * every module reached a terminal status. Per-module failures are part of
     * the result, never a rejection.
     */
    async execute(definition: WorkflowDefinition, options: ExecuteOptions = {}): Promise<WorkflowResult> {
        const { observer, signal } = options;
        const store = options.store ?? new InMemoryStateStore();
        const { executionOrder, dependencies } = definition;

        const statuses = new Map<string, moduleStatus>(executionOrder.map(id => [id, moduleStatus.PENDING]));
        const running = new Map<string, Promise<void>>();
        let halted = false;

        console.log(`${TAG} ${definition.name}: starting ${executionOrder.length} modules (policy: ${this.failurePolicy}, concurrency: ${this.concurrency})`);

        for (;;) {
            // executionOrder is topological, so one pass settles skips transitively
            for (const id of executionOrder) {
                if (statuses.get(id) !== moduleStatus.PENDING) continue;

                if (signal?.aborted || halted) {
                    statuses.set(id, moduleStatus.CANCELLED);
                    await this.notify(observer, o => o.onModuleCancelled?.(id));
                    continue;
                }

                const preds = dependencies[id] ?? [];
                const blockedBy = preds.find(p => BLOCKING.has(statuses.get(p) ?? moduleStatus.PENDING));
                if (blockedBy !== undefined) {
                    statuses.set(id, moduleStatus.SKIPPED);
                    console.warn(`${TAG} skipping ${id}: upstream ${blockedBy} is ${statuses.get(blockedBy)}`);
                    await this.notify(observer, o => o.onModuleSkipped?.(id, `upstream module ${blockedBy} did not complete`));
                    continue;
                }

                const ready = preds.every(p => statuses.get(p) === moduleStatus.COMPLETED);
                if (!ready || running.size >= this.concurrency) continue;

                statuses.set(id, moduleStatus.RUNNING);
                const task = this.runModule(definition, id, store, observer, signal)
                    .then(status => {
                        statuses.set(id, status);
                        if (status === moduleStatus.FAILED && this.failurePolicy === 'fail-fast') {
                            halted = true;
                        }
                    })
                    .finally(() => running.delete(id));
                running.set(id, task);
            }

            if (running.size === 0) break;
            await Promise.race(running.values());
        }

        return this.collect(definition, statuses, store, signal);
    }

    private async runModule(
        definition: WorkflowDefinition,
        id: string,
        store: StateStore,
        observer: WorkflowObserver | undefined,
        signal: AbortSignal | undefined,
    ): Promise<moduleStatus> {
        await this.notify(observer, o => o.onModuleStart?.(id));

        let input: TaskInput;
        try {
            input = resolveModuleInput(definition.modules[id], store);
        } catch (err) {
            const message = `Module ${id} input resolution failed: ${errorMessage(err)}`;
            console.error(`${TAG} ${message}`);
            store.setError(id, message);
            await this.notify(observer, o => o.onModuleError?.(id, message));
            return moduleStatus.FAILED;
        }

        let outcome: TaskOutcome = await runTask(this.registry, input, this.moduleTimeoutMs);
        for (let attempt = 1; outcome.status === 'failed' && attempt <= this.retry.maxRetries; attempt++) {
            if (signal?.aborted) break;
            store.setError(id, outcome.error);
            const delay = calculateBackOff(attempt, this.retry);
            console.log(`${TAG} ${id} retry ${attempt}/${this.retry.maxRetries} in ${delay}ms`);
            await sleep(delay, signal);
            if (signal?.aborted) break;
            outcome = await runTask(this.registry, input, this.moduleTimeoutMs);
        }

        if (outcome.status === 'completed') {
            const { output } = outcome;
            store.setOutput(id, output);
            await this.notify(observer, o => o.onModuleComplete?.(id, output));
            return moduleStatus.COMPLETED;
        }

        const { error } = outcome;
        store.setError(id, error);
        await this.notify(observer, o => o.onModuleError?.(id, error));
        return moduleStatus.FAILED;
    }

    private collect(
        definition: WorkflowDefinition,
        statuses: Map<string, moduleStatus>,
        store: StateStore,
        signal: AbortSignal | undefined,
    ): WorkflowResult {
        const modules: Record<string, ModuleReport> = {};
        for (const id of definition.executionOrder) {
            const status = statuses.get(id) ?? moduleStatus.PENDING;
            const report: ModuleReport = { status };
            const output = store.getOutput(id);
            const error = store.getError(id);
            if (status === moduleStatus.COMPLETED && output !== undefined) report.output = output;
            if (status === moduleStatus.FAILED && error !== undefined) report.error = error;
            modules[id] = report;
        }

        const outputs: Record<string, unknown> = {};
        const outputErrors: Record<string, string> = {};
        const mapping = Object.keys(definition.outputs).length > 0
            ? definition.outputs
            : null;

        if (mapping) {
            for (const [name, ref] of Object.entries(mapping)) {
                try {
                    outputs[name] = resolve(ref, store);
                } catch (err) {
                    outputErrors[name] = errorMessage(err);
                    console.warn(`${TAG} output ${name} unresolved: ${outputErrors[name]}`);
                }
            }
        } else {
            // no mapping: surface what the sink modules produced
            const upstream = new Set(definition.dependencyEdges.map(([from]) => from));
            for (const id of definition.executionOrder) {
                const output = store.getOutput(id);
                if (!upstream.has(id) && output !== undefined) outputs[id] = output;
            }
        }

        const allCompleted = definition.executionOrder.every(id => statuses.get(id) === moduleStatus.COMPLETED);
        const status = allCompleted
            ? runStatus.COMPLETED
            : signal?.aborted ? runStatus.CANCELLED : runStatus.FAILED;

        console.log(`${TAG} ${definition.name}: finished with status ${status}`);
        return { status, outputs, outputErrors, modules, executionOrder: definition.executionOrder };
    }

    private async notify(
        observer: WorkflowObserver | undefined,
        fn: (o: WorkflowObserver) => void | Promise<void>,
    ): Promise<void> {
        if (!observer) return;
        try {
            await fn(observer);
        } catch (err) {
            console.error(`${TAG} observer error:`, err);
        }
    }
}
