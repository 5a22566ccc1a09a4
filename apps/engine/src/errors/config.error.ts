// Raised while building a workflow definition, before any module runs.
// A submission that hits one of these is rejected whole.
export class WorkflowConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'WorkflowConfigError';
    }
}

export class InvalidWorkflowDocumentError extends WorkflowConfigError {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidWorkflowDocument';
    }
}

export class UnknownModuleReferenceError extends WorkflowConfigError {
    constructor(
        public readonly moduleId: string,
        public readonly referencedId: string,
    ) {
        super(`Module "${moduleId}" references unknown module "${referencedId}"`);
        this.name = 'UnknownModuleReference';
    }
}

export class UnknownHandlerTypeError extends WorkflowConfigError {
    constructor(
        public readonly moduleId: string,
        public readonly identifier: string,
    ) {
        super(`Module "${moduleId}" uses unregistered handler "${identifier}"`);
        this.name = 'UnknownHandlerType';
    }
}

export class MissingRequiredFieldError extends WorkflowConfigError {
    constructor(
        public readonly moduleId: string | null,
        public readonly field: string,
    ) {
        super(moduleId === null
            ? `Workflow document is missing required field "${field}"`
            : `Module "${moduleId}" is missing required field "${field}"`);
        this.name = 'MissingRequiredField';
    }
}

export class CircularDependencyError extends WorkflowConfigError {
    constructor(public readonly cycle: string[]) {
        super(`Circular dependency detected: ${cycle.join(' -> ')}`);
        this.name = 'CircularDependency';
    }
}

export class InvalidReferenceSyntaxError extends WorkflowConfigError {
    constructor(
        public readonly detail: string,
        public readonly moduleId?: string,
    ) {
        super(moduleId ? `Module "${moduleId}": ${detail}` : detail);
        this.name = 'InvalidReferenceSyntax';
    }
}
