import { errorMessage } from '../errors';

export enum triggerState {
    IDLE = 'idle',
    RUNNING = 'running'
}

export interface TriggerEvent {
    type: string;
    /** ISO-8601 */
    timestamp: string;
    data: Record<string, unknown>;
}

export type TriggerCallback = (event: TriggerEvent) => unknown;

/** Builder options. The built-in triggers read `interval` (ms). */
export type TriggerConfig = Record<string, unknown>;

export abstract class Trigger {
    protected state: triggerState = triggerState.IDLE;
    protected readonly tag: string;

    constructor(
        readonly type: string,
        protected readonly callback: TriggerCallback,
    ) {
        this.tag = `[trigger:${type}]`;
    }

    get isRunning(): boolean {
        return this.state === triggerState.RUNNING;
    }

    abstract start(): void;
    abstract stop(): void;

    /**
     * Hands an event to the callback without waiting on it. Nothing is
     * delivered once the trigger is stopped.
     */
    protected emit(data: Record<string, unknown>): boolean {
        if (this.state !== triggerState.RUNNING) return false;

        const event: TriggerEvent = { type: this.type, timestamp: new Date().toISOString(), data };
        try {
            const result = this.callback(event);
            if (result instanceof Promise) {
                result.catch(err => console.error(`${this.tag} callback error: ${errorMessage(err)}`));
            }
        } catch (err) {
            console.error(`${this.tag} callback error: ${errorMessage(err)}`);
        }
        return true;
    }
}
