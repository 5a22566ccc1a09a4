import { TriggerCallback } from './base.trigger';
import { Deliver, PollingTrigger } from './polling.trigger';

export interface MailboxMessage {
    id: string;
    from?: string;
    subject?: string;
    body?: string;
    [key: string]: unknown;
}

/** Where new mail comes from; each call returns messages not seen before. */
export interface MailboxSource {
    fetchNew(): Promise<MailboxMessage[]>;
}

export class EmailTrigger extends PollingTrigger {
    constructor(
        callback: TriggerCallback,
        interval?: number,
        private readonly source?: MailboxSource,
    ) {
        super('email', callback, interval);
    }

    protected async check(deliver: Deliver): Promise<void> {
        if (!this.source) {
            // no mailbox wired: every poll counts as a firing
            deliver({});
            return;
        }

        const messages = await this.source.fetchNew();
        if (messages.length > 0) deliver({ messages });
    }
}
