import { Trigger, TriggerCallback, triggerState } from './base.trigger';

/** Fires when a payload is pushed to it; there is no timer. */
export class WebhookTrigger extends Trigger {
    constructor(callback: TriggerCallback) {
        super('webhook', callback);
    }

    start(): void {
        if (this.state === triggerState.RUNNING) return;
        this.state = triggerState.RUNNING;
        console.log(`${this.tag} listening`);
    }

    stop(): void {
        if (this.state === triggerState.IDLE) return;
        this.state = triggerState.IDLE;
        console.log(`${this.tag} stopped`);
    }

    /** Returns false when the trigger is not running and the payload was dropped. */
    receive(payload: unknown): boolean {
        return this.emit({ payload });
    }
}
