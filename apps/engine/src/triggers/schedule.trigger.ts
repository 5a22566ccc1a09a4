import { TriggerCallback } from './base.trigger';
import { Deliver, PollingTrigger } from './polling.trigger';

export class ScheduleTrigger extends PollingTrigger {
    constructor(callback: TriggerCallback, interval?: number) {
        super('schedule', callback, interval);
    }

    protected check(deliver: Deliver): void {
        deliver({ interval: this.interval });
    }
}
