export class TaskExecutionError extends Error {
    constructor(
        public readonly moduleId: string,
        message: string,
    ) {
        super(message);
        this.name = 'TaskExecutionError';
    }
}

export class BackpressureError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'Backpressure';
    }
}
