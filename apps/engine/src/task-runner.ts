import { HandlerRegistry, HandlerResult, TaskInput, TaskOutput } from '@canvasflow/sdk';
import { TaskExecutionError } from './errors';

const TAG = '[task-runner]';

export type TaskOutcome =
    | { status: 'completed'; output: TaskOutput }
    | { status: 'failed'; error: string };

/**
 * Dispatches one resolved module input to its handler. Never throws: a
 * FAILED result, a thrown fault, a malformed result or a timeout all come
 * back as a failed outcome.
 */
export async function runTask(
    registry: HandlerRegistry,
    input: TaskInput,
    timeoutMs = 0,
): Promise<TaskOutcome> {
    const { module_id: moduleId, identifier } = input;
    const handler = registry.get(identifier);

    if (!handler) {
        const registered = registry.list();
        return fail(new TaskExecutionError(moduleId, `No handler registered for "${identifier}". Registered: [${registered.join(', ')}]`));
    }

    console.log(`${TAG} executing ${moduleId} with handler ${identifier}`);

    let result: unknown;
    try {
        result = await withTimeout(Promise.resolve(handler.execute(input)), timeoutMs, moduleId);
    } catch (err) {
        return fail(err instanceof Error ? err : new TaskExecutionError(moduleId, String(err)), moduleId);
    }

    if (!isHandlerResult(result)) {
        return fail(new TaskExecutionError(moduleId, `Module ${moduleId} returned an invalid result; expected { status, output }`));
    }

    if (result.status === 'FAILED') {
        const message = typeof result.output.error === 'string' ? result.output.error : 'Unknown error';
        return fail(new TaskExecutionError(moduleId, `Module ${moduleId} failed: ${message}`));
    }

    console.log(`${TAG} ${moduleId} completed`);
    return { status: 'completed', output: result.output };
}

function fail(err: Error, moduleId?: string): TaskOutcome {
    const message = moduleId ? `Module ${moduleId} execution failed: ${err.message}` : err.message;
    console.error(`${TAG} ${message}`);
    return { status: 'failed', error: message };
}

function withTimeout<T>(promise: Promise<T>, timeoutMs: number, moduleId: string): Promise<T> {
    if (timeoutMs <= 0) return promise;

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(
            () => reject(new TaskExecutionError(moduleId, `timed out after ${timeoutMs}ms`)),
            timeoutMs,
        );
        timer.unref();
    });

    return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

export function isHandlerResult(value: unknown): value is HandlerResult {
    if (typeof value !== 'object' || value === null) return false;
    if (!('status' in value) || !('output' in value)) return false;
    if (value.status !== 'COMPLETED' && value.status !== 'FAILED') return false;
    return typeof value.output === 'object' && value.output !== null && !Array.isArray(value.output);
}
