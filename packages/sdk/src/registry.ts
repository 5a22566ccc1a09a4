import { HandlerResult, TaskHandler, TaskInput } from './types';

// Maps a module `identifier` to the handler that runs it. Owned by whoever
// wires the engine; populate it at startup and hand it to the engine.
export class HandlerRegistry {
    private handlers = new Map<string, TaskHandler>();
    private static readonly NAME_PATTERN = /^[a-zA-Z0-9_.-]+$/;
    private static readonly MAX_NAME_LENGTH = 100;

    register(identifier: string, handler: TaskHandler): this {
        if (!identifier || identifier.length === 0) {
            throw new Error('Handler identifier cannot be empty');
        }
        if (identifier.length > HandlerRegistry.MAX_NAME_LENGTH) {
            throw new Error(`Handler identifier exceeds maximum length of ${HandlerRegistry.MAX_NAME_LENGTH} characters`);
        }
        if (!HandlerRegistry.NAME_PATTERN.test(identifier)) {
            throw new Error('Handler identifier must contain only alphanumeric characters, dots, dashes, and underscores');
        }
        if (this.handlers.has(identifier)) {
            throw new Error(`Handler "${identifier}" is already registered.`);
        }
        this.handlers.set(identifier, handler);
        return this;
    }

    get(identifier: string): TaskHandler | undefined {
        return this.handlers.get(identifier);
    }

    has(identifier: string): boolean {
        return this.handlers.has(identifier);
    }

    list(): string[] {
        return Array.from(this.handlers.keys());
    }
}

/**
 * Builds a handler from a plain function.
 *
 * @example
 * registry.register('uppercase', defineHandler(async ({ user_config }) => ({
 *   status: 'COMPLETED',
 *   output: { text: String(user_config.text).toUpperCase() },
 * }), ['text']));
 */
export function defineHandler(
    execute: (input: TaskInput) => Promise<HandlerResult> | HandlerResult,
    requiredFields: readonly string[] = [],
): TaskHandler {
    return { requiredFields, execute };
}

export function completed(output: Record<string, unknown>): HandlerResult {
    return { status: 'COMPLETED', output };
}

export function failed(error: string): HandlerResult {
    return { status: 'FAILED', output: { error } };
}
