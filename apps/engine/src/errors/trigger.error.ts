export class TriggerError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'TriggerError';
    }
}

export class UnknownTriggerTypeError extends TriggerError {
    constructor(
        public readonly type: string,
        registered: string[],
    ) {
        super(`Unknown trigger type "${type}". Registered: [${registered.join(', ')}]`);
        this.name = 'UnknownTriggerType';
    }
}
