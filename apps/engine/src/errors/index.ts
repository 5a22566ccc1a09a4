export * from './config.error';
export * from './not-found.error';
export * from './resolution.error';
export * from './task-execution.error';
export * from './trigger.error';

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
