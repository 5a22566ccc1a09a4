import { completed, defineHandler, failed, HandlerRegistry, TaskInput } from '@canvasflow/sdk';

/**
 * Registry with the handlers most tests need:
 * - `echo` returns its user_config as output
 * - `s3` returns `{ content: 'file-bytes', content_length: 10 }`
 * - `proc` returns `{ processed: <content> }`, requires `content`
 * - `boom` always fails
 */
export function testRegistry(): HandlerRegistry {
    return new HandlerRegistry()
        .register('echo', defineHandler(({ user_config }) => completed({ ...user_config })))
        .register('s3', defineHandler(() => completed({ content: 'file-bytes', content_length: 10 })))
        .register('proc', defineHandler(({ user_config }) => completed({ processed: user_config.content }), ['content']))
        .register('boom', defineHandler(() => failed('exploded')));
}

/** Two-module pipeline: proc reads s3's `content`. */
export function pipelineDocument(procIdentifier = 'proc') {
    return {
        canvas_name: 'doc_pipeline',
        modules: {
            s3: { identifier: 's3', user_config: { bucket: 'test-bucket' } },
            proc: {
                identifier: procIdentifier,
                user_config: { content: { module_id: 's3', output_key: 'content' } },
            },
        },
    };
}

export function inputOf(module_id: string, user_config: Record<string, unknown> = {}, identifier = 'echo'): TaskInput {
    return { module_id, identifier, user_config };
}
