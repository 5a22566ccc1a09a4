import { TriggerError, TriggerNotFoundError } from '../errors';
import { Trigger } from './base.trigger';
import { WebhookTrigger } from './webhook.trigger';

const TAG = '[triggers]';

/** The process's active triggers, keyed by binding id. */
export class TriggerManager {
    private triggers = new Map<string, Trigger>();

    add(id: string, trigger: Trigger): void {
        if (this.triggers.has(id)) throw new TriggerError(`Trigger "${id}" is already registered`);
        this.triggers.set(id, trigger);
    }

    get(id: string): Trigger | undefined {
        return this.triggers.get(id);
    }

    list(): string[] {
        return Array.from(this.triggers.keys());
    }

    startAll(): void {
        for (const trigger of this.triggers.values()) trigger.start();
        console.log(`${TAG} ${this.triggers.size} trigger(s) started`);
    }

    stopAll(): void {
        for (const trigger of this.triggers.values()) trigger.stop();
    }

    /** Pushes a payload into a webhook trigger. Returns whether it was delivered. */
    deliverWebhook(id: string, payload: unknown): boolean {
        const trigger = this.triggers.get(id);
        if (!trigger) throw new TriggerNotFoundError(id);
        if (!(trigger instanceof WebhookTrigger)) {
            throw new TriggerError(`Trigger "${id}" is a ${trigger.type} trigger, not a webhook`);
        }
        return trigger.receive(payload);
    }
}
