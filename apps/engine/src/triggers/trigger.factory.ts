import { TriggerError, UnknownTriggerTypeError } from '../errors';
import { Trigger, TriggerCallback, TriggerConfig } from './base.trigger';
import { EmailTrigger, MailboxSource } from './email.trigger';
import { ScheduleTrigger } from './schedule.trigger';
import { WebhookTrigger } from './webhook.trigger';

export const DEFAULT_TRIGGER_TYPE = 'schedule';

export type TriggerBuilder = (callback: TriggerCallback, config: TriggerConfig) => Trigger;

export class TriggerFactory {
    private builders = new Map<string, TriggerBuilder>();

    register(type: string, builder: TriggerBuilder): this {
        if (!type) throw new TriggerError('Trigger type cannot be empty');
        if (this.builders.has(type)) {
            console.warn(`[triggers] replacing builder for "${type}"`);
        }
        this.builders.set(type, builder);
        return this;
    }

    /** `type` defaults to "schedule". */
    create(type: string | undefined, callback: TriggerCallback, config: TriggerConfig = {}): Trigger {
        const resolved = type ?? DEFAULT_TRIGGER_TYPE;
        const builder = this.builders.get(resolved);
        if (!builder) throw new UnknownTriggerTypeError(resolved, this.list());
        return builder(callback, config);
    }

    list(): string[] {
        return Array.from(this.builders.keys());
    }
}

export interface BuiltinTriggerOptions {
    mailbox?: MailboxSource;
}

export function createTriggerFactory(options: BuiltinTriggerOptions = {}): TriggerFactory {
    return new TriggerFactory()
        .register('schedule', (callback, config) => new ScheduleTrigger(callback, readInterval(config)))
        .register('email', (callback, config) => new EmailTrigger(callback, readInterval(config), options.mailbox))
        .register('webhook', callback => new WebhookTrigger(callback));
}

function readInterval(config: TriggerConfig): number | undefined {
    const { interval } = config;
    if (interval === undefined) return undefined;
    if (typeof interval !== 'number') {
        throw new TriggerError(`Trigger interval must be a number of ms, got ${typeof interval}`);
    }
    return interval;
}
