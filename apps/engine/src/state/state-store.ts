import { TaskOutput } from '@canvasflow/sdk';

export type StateEntry =
    | { kind: 'output'; output: TaskOutput }
    | { kind: 'error'; error: string };

export interface StateReader {
    getOutput(moduleId: string): TaskOutput | undefined;
    getError(moduleId: string): string | undefined;
}

/**
 * Per-run record of what each module produced. One instance per run; the
 * engine is the only writer and writes each module id from a single task.
 * A later write for the same id replaces the earlier one (retries land here).
 */
export interface StateStore extends StateReader {
    setOutput(moduleId: string, output: TaskOutput): void;
    setError(moduleId: string, error: string): void;
    has(moduleId: string): boolean;
    entries(): Array<[string, StateEntry]>;
    clear(): void;
}

export class InMemoryStateStore implements StateStore {
    private state = new Map<string, StateEntry>();

    setOutput(moduleId: string, output: TaskOutput): void {
        this.state.set(moduleId, { kind: 'output', output });
    }

    setError(moduleId: string, error: string): void {
        this.state.set(moduleId, { kind: 'error', error });
    }

    getOutput(moduleId: string): TaskOutput | undefined {
        const entry = this.state.get(moduleId);
        return entry?.kind === 'output' ? entry.output : undefined;
    }

    getError(moduleId: string): string | undefined {
        const entry = this.state.get(moduleId);
        return entry?.kind === 'error' ? entry.error : undefined;
    }

    has(moduleId: string): boolean {
        return this.state.has(moduleId);
    }

    entries(): Array<[string, StateEntry]> {
        return Array.from(this.state.entries());
    }

    clear(): void {
        this.state.clear();
    }
}
