import { EmailTrigger, MailboxMessage, MailboxSource } from '../../src/triggers/email.trigger';
import { ScheduleTrigger } from '../../src/triggers/schedule.trigger';
import { WebhookTrigger } from '../../src/triggers/webhook.trigger';
import { TriggerEvent } from '../../src/triggers/base.trigger';

describe('ScheduleTrigger', () => {
    let callback: jest.Mock;
    let trigger: ScheduleTrigger;

    beforeEach(() => {
        jest.useFakeTimers();
        callback = jest.fn();
        trigger = new ScheduleTrigger(callback, 1000);
    });

    afterEach(() => {
        trigger.stop();
        jest.useRealTimers();
    });

    it('fires once per interval, the first one interval after start', async () => {
        trigger.start();

        await jest.advanceTimersByTimeAsync(999);
        expect(callback).not.toHaveBeenCalled();

        await jest.advanceTimersByTimeAsync(2001);
        expect(callback).toHaveBeenCalledTimes(3);

        const event: TriggerEvent = callback.mock.calls[0][0];
        expect(event.type).toBe('schedule');
        expect(event.data).toEqual({ interval: 1000 });
        expect(Number.isNaN(Date.parse(event.timestamp))).toBe(false);
    });

    it('stops delivering after stop()', async () => {
        trigger.start();
        await jest.advanceTimersByTimeAsync(1000);
        trigger.stop();
        await jest.advanceTimersByTimeAsync(5000);

        expect(callback).toHaveBeenCalledTimes(1);
        expect(trigger.isRunning).toBe(false);
    });

    it('treats stop() on an idle trigger as a no-op', () => {
        expect(() => {
            trigger.stop();
            trigger.stop();
        }).not.toThrow();
    });

    it('runs a single loop after a restart', async () => {
        trigger.start();
        trigger.start();
        trigger.stop();
        trigger.start();

        await jest.advanceTimersByTimeAsync(3000);
        expect(callback).toHaveBeenCalledTimes(3);
    });

    it('keeps firing when the callback throws or rejects', async () => {
        callback
            .mockImplementationOnce(() => { throw new Error('sync failure'); })
            .mockRejectedValueOnce(new Error('async failure'));

        trigger.start();
        await jest.advanceTimersByTimeAsync(3000);

        expect(callback).toHaveBeenCalledTimes(3);
    });

    it('defaults to a 60s interval', () => {
        expect(new ScheduleTrigger(callback).interval).toBe(60000);
    });

    it('rejects a non-positive interval', () => {
        expect(() => new ScheduleTrigger(callback, 0)).toThrow(RangeError);
    });
});

describe('EmailTrigger', () => {
    let callback: jest.Mock;

    beforeEach(() => {
        jest.useFakeTimers();
        callback = jest.fn();
    });

    afterEach(() => {
        jest.useRealTimers();
    });

    it('fires with empty data on every poll when no mailbox is wired', async () => {
        const trigger = new EmailTrigger(callback, 500);
        trigger.start();
        await jest.advanceTimersByTimeAsync(1000);
        trigger.stop();

        expect(callback).toHaveBeenCalledTimes(2);
        expect(callback.mock.calls[0][0]).toEqual(expect.objectContaining({ type: 'email', data: {} }));
    });

    it('fires only for polls that returned messages', async () => {
        const message: MailboxMessage = { id: 'msg-1', subject: 'hello' };
        const source: MailboxSource = {
            fetchNew: jest.fn()
                .mockResolvedValueOnce([])
                .mockResolvedValueOnce([message])
                .mockResolvedValue([]),
        };
        const trigger = new EmailTrigger(callback, 500, source);

        trigger.start();
        await jest.advanceTimersByTimeAsync(1500);
        trigger.stop();

        expect(source.fetchNew).toHaveBeenCalledTimes(3);
        expect(callback).toHaveBeenCalledTimes(1);
        expect(callback.mock.calls[0][0].data).toEqual({ messages: [message] });
    });

    it('keeps polling after the mailbox throws', async () => {
        const source: MailboxSource = {
            fetchNew: jest.fn()
                .mockRejectedValueOnce(new Error('imap timeout'))
                .mockResolvedValue([{ id: 'msg-2' }]),
        };
        const trigger = new EmailTrigger(callback, 500, source);

        trigger.start();
        await jest.advanceTimersByTimeAsync(1000);
        trigger.stop();

        expect(callback).toHaveBeenCalledTimes(1);
    });

    it('drops the result of a check that was in flight when stopped', async () => {
        let release: (messages: MailboxMessage[]) => void = () => undefined;
        const source: MailboxSource = {
            fetchNew: () => new Promise(resolve => { release = resolve; }),
        };
        const trigger = new EmailTrigger(callback, 500, source);

        trigger.start();
        await jest.advanceTimersByTimeAsync(500);
        trigger.stop();
        trigger.start();
        release([{ id: 'late' }]);
        await jest.advanceTimersByTimeAsync(0);
        trigger.stop();

        expect(callback).not.toHaveBeenCalled();
    });
});

describe('WebhookTrigger', () => {
    it('forwards payloads only while running', () => {
        const callback = jest.fn();
        const trigger = new WebhookTrigger(callback);

        expect(trigger.receive({ early: true })).toBe(false);

        trigger.start();
        expect(trigger.receive({ order: 42 })).toBe(true);
        trigger.stop();
        expect(trigger.receive({ late: true })).toBe(false);

        expect(callback).toHaveBeenCalledTimes(1);
        expect(callback.mock.calls[0][0]).toEqual(expect.objectContaining({
            type: 'webhook',
            data: { payload: { order: 42 } },
        }));
    });
});
