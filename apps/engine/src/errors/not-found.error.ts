export class NotFoundError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'NotFoundError';
    }
}

export class WorkflowNotFoundError extends NotFoundError {
    constructor(public readonly workflowId: string) {
        super(`Workflow ${workflowId} not found`);
        this.name = 'WorkflowNotFound';
    }
}

export class TriggerNotFoundError extends NotFoundError {
    constructor(public readonly triggerId: string) {
        super(`Trigger ${triggerId} not found`);
        this.name = 'TriggerNotFound';
    }
}
