import { completed, defineHandler, failed, HandlerRegistry, TaskInput } from '@canvasflow/sdk';
import { moduleStatus, runStatus } from '../../src/db/run-status.entity';
import { buildWorkflowDefinition } from '../../src/graph/graph-builder';
import { registerExampleHandlers } from '../../src/handlers';
import { RunStatusRepository } from '../../src/repositories/run-status.repository';
import { EventBus } from '../../src/services/event-bus';
import { WorkflowEngine } from '../../src/services/workflow-engine';
import { WorkflowManager } from '../../src/services/workflow-manager';
import { TriggerEvent } from '../../src/triggers/base.trigger';
import { createTriggerFactory } from '../../src/triggers/trigger.factory';
import { loadTriggerBindings } from '../../src/triggers/trigger-loader';
import { MemoryKeyValue } from '../helpers/memory-kv';
import { sleep, waitUntil } from '../helpers/wait';

const downloaded = Buffer.from('line one\nline two\nline three');

function documentPipeline() {
    return {
        canvas_name: 'ingest',
        modules: {
            s3: { identifier: 's3_downloader', user_config: { bucket: 'test-bucket', key: 'docs/a.txt' } },
            proc: {
                identifier: 'document_processor',
                user_config: { input_content: { module_id: 's3', output_key: 'content' } },
            },
            notes: { identifier: 'user_input', user_config: { query: 'standalone' } },
        },
        outputs: { processed: '${proc.output.length}' },
    };
}

describe('document pipeline', () => {
    let registry: HandlerRegistry;
    let procInputs: TaskInput[];
    let s3Fails: boolean;

    beforeEach(() => {
        procInputs = [];
        s3Fails = false;
        registry = registerExampleHandlers(new HandlerRegistry())
            .register('s3_downloader', defineHandler(() => s3Fails
                ? failed('AccessDenied')
                : completed({ content: downloaded, content_length: downloaded.length })))
            .register('document_processor', defineHandler(input => {
                procInputs.push(input);
                const content = input.user_config.input_content;
                return completed({ length: Buffer.isBuffer(content) ? content.length : -1 });
            }));
    });

    it('feeds the downloaded content into the processor', async () => {
        const definition = buildWorkflowDefinition(documentPipeline(), registry);
        const result = await new WorkflowEngine(registry).execute(definition);

        expect(definition.executionOrder).toEqual(['s3', 'proc', 'notes']);
        expect(result.status).toBe(runStatus.COMPLETED);
        expect(procInputs).toHaveLength(1);
        expect(procInputs[0].user_config.input_content).toBe(downloaded);
        expect(result.outputs).toEqual({ processed: downloaded.length });
    });

    it('never dispatches the processor when the download fails', async () => {
        s3Fails = true;
        const definition = buildWorkflowDefinition(documentPipeline(), registry);
        const result = await new WorkflowEngine(registry).execute(definition);

        expect(result.status).toBe(runStatus.FAILED);
        expect(procInputs).toHaveLength(0);
        expect(result.modules.s3).toEqual({ status: moduleStatus.FAILED, error: 'Module s3 failed: AccessDenied' });
        expect(result.modules.proc).toEqual({ status: moduleStatus.SKIPPED });
        expect(result.modules.notes.status).toBe(moduleStatus.COMPLETED);
        expect(result.outputErrors).toEqual({ processed: 'No output recorded for module "proc"' });
    });

    it('serves the run through the manager with Buffers kept in the snapshot', async () => {
        const manager = new WorkflowManager({
            registry,
            engine: new WorkflowEngine(registry, { concurrency: 2 }),
            repository: new RunStatusRepository(new MemoryKeyValue()),
            bus: new EventBus(),
        });

        const id = await manager.submit(documentPipeline());
        const snapshot = await manager.wait(id);

        expect(snapshot?.status).toBe(runStatus.COMPLETED);
        expect(snapshot?.modules.s3.brief_output).toEqual({
            message: 'Module s3 completed successfully',
            size: downloaded.length,
        });
        const stored = snapshot?.modules.s3.detailed_output?.content;
        expect(Buffer.isBuffer(stored) && stored.equals(downloaded)).toBe(true);
    });
});

describe('schedule trigger', () => {
    it('fires about once per interval and goes quiet after stop', async () => {
        const events: TriggerEvent[] = [];
        const trigger = createTriggerFactory().create('schedule', event => {
            events.push(event);
        }, { interval: 50 });

        trigger.start();
        await sleep(170);
        trigger.stop();
        const atStop = events.length;
        await sleep(150);

        expect(atStop).toBeGreaterThanOrEqual(2);
        expect(atStop).toBeLessThanOrEqual(4);
        expect(events).toHaveLength(atStop);
        expect(events.every(e => e.type === 'schedule' && e.data.interval === 50)).toBe(true);
    });

    it('submits its bound workflow on each firing', async () => {
        const registry = registerExampleHandlers(new HandlerRegistry());
        const manager = new WorkflowManager({
            registry,
            engine: new WorkflowEngine(registry),
            repository: new RunStatusRepository(new MemoryKeyValue()),
            bus: new EventBus(),
        });
        const submitted: string[] = [];
        const [{ trigger }] = loadTriggerBindings([{
            id: 'tick',
            interval: 30,
            workflow: {
                canvas_name: 'chunk_on_tick',
                modules: {
                    input: { identifier: 'user_input', user_config: { query: 'a\nb' } },
                    chunk: {
                        identifier: 'line_chunker',
                        user_config: { content: '${input.output.query}', chunk_size: 1 },
                    },
                },
            },
        }], createTriggerFactory(), async (document, options) => {
            const id = await manager.submit(document, options);
            submitted.push(id);
            return id;
        });

        trigger.start();
        await waitUntil(() => submitted.length >= 1);
        trigger.stop();
        await manager.drain();

        const snapshot = await manager.getStatus(submitted[0]);
        expect(snapshot?.status).toBe(runStatus.COMPLETED);
        expect(snapshot?.trigger?.type).toBe('schedule');
        expect(snapshot?.outputs).toEqual({ chunk: { chunks: ['a', 'b'], total_chunks: 2, content_length: 3 } });
    });
});
