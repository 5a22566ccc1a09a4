// Raised when a module's input cannot be resolved at dispatch time.
// Recorded as that module's failure; never fatal to the run.
export class ResolutionError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ResolutionError';
    }
}

export class UnresolvedDependencyError extends ResolutionError {
    constructor(public readonly referencedId: string) {
        super(`No output recorded for module "${referencedId}"`);
        this.name = 'UnresolvedDependency';
    }
}

export class MissingOutputKeyError extends ResolutionError {
    constructor(
        public readonly referencedId: string,
        public readonly outputKey: string,
    ) {
        super(`Key "${outputKey}" not found in output of module "${referencedId}"`);
        this.name = 'MissingOutputKey';
    }
}
