import { errorMessage } from '../errors';
import { Trigger, TriggerCallback, triggerState } from './base.trigger';

export const DEFAULT_INTERVAL_MS = 60000;

export type Deliver = (data: Record<string, unknown>) => boolean;

/**
 * Timer-driven trigger: calls `check()` every `interval` ms, first one
 * interval after `start()`. Each start bumps a generation number, so a
 * loop left over from before a stop/start cycle exits on its next tick.
 */
export abstract class PollingTrigger extends Trigger {
    readonly interval: number;
    private currentTimeout: NodeJS.Timeout | null = null;
    private generation = 0;

    constructor(type: string, callback: TriggerCallback, interval: number = DEFAULT_INTERVAL_MS) {
        super(type, callback);
        if (!Number.isFinite(interval) || interval <= 0) {
            throw new RangeError(`${type} trigger interval must be a positive number of ms, got ${interval}`);
        }
        this.interval = interval;
    }

    start(): void {
        if (this.state === triggerState.RUNNING) {
            console.warn(`${this.tag} already running`);
            return;
        }
        this.state = triggerState.RUNNING;
        const generation = ++this.generation;
        console.log(`${this.tag} started (every ${this.interval}ms)`);
        this.schedule(generation);
    }

    stop(): void {
        if (this.state === triggerState.IDLE) return;
        this.state = triggerState.IDLE;
        this.generation++;
        if (this.currentTimeout) {
            clearTimeout(this.currentTimeout);
            this.currentTimeout = null;
        }
        console.log(`${this.tag} stopped`);
    }

    /**
     * One poll. Delivers through `deliver`, which drops the event if the
     * trigger was stopped (or restarted) while the check was in flight.
     */
    protected abstract check(deliver: Deliver): Promise<void> | void;

    private schedule(generation: number): void {
        this.currentTimeout = setTimeout(() => {
            this.currentTimeout = null;
            void this.tick(generation);
        }, this.interval);
    }

    private async tick(generation: number): Promise<void> {
        if (generation !== this.generation) return;

        try {
            await this.check(data => generation === this.generation && this.emit(data));
        } catch (err) {
            console.error(`${this.tag} check failed: ${errorMessage(err)}`);
        }

        if (generation === this.generation && this.state === triggerState.RUNNING) {
            this.schedule(generation);
        }
    }
}
