/**
 * A value allowed inside a module's `user_config`.
 * References to other modules are ordinary values of this type; the engine
 * recognizes them by shape.
 */
export type ConfigValue =
    | string
    | number
    | boolean
    | null
    | ConfigValue[]
    | ConfigObject;

export interface ConfigObject {
    [key: string]: ConfigValue;
}

/** Structured form of a cross-module reference. */
export interface ModuleReference {
    module_id: string;
    output_key: string;
}

/** What a handler receives: the module's identity plus its fully resolved config. */
export interface TaskInput {
    module_id: string;
    identifier: string;
    user_config: Record<string, unknown>;
}

export type TaskOutput = Record<string, unknown>;

export type HandlerResult =
    | { status: 'COMPLETED'; output: TaskOutput }
    | { status: 'FAILED'; output: TaskOutput & { error: string } };

export interface TaskHandler {
    /** `user_config` keys that must be present before the module may run. */
    readonly requiredFields?: readonly string[];
    execute(input: TaskInput): Promise<HandlerResult> | HandlerResult;
}
