import * as grpc from '@grpc/grpc-js';
import { sendUnaryData, ServerErrorResponse, ServerUnaryCall } from '@grpc/grpc-js';
import { toJSONSafe } from '@canvasflow/sdk';
import { RunStatusEntity, TERMINAL_RUN_STATUSES } from '../db/run-status.entity';
import {
    BackpressureError,
    errorMessage,
    InvalidWorkflowDocumentError,
    NotFoundError,
    TriggerError,
    WorkflowConfigError,
    WorkflowNotFoundError,
} from '../errors';
import { WorkflowEvent } from '../services/event-bus';
import { WorkflowManager } from '../services/workflow-manager';
import { TriggerManager } from '../triggers/trigger-manager';

const TAG = '[grpc]';

interface SubmitWorkflowRequest {
    config: Buffer;
}

interface SubmitWorkflowResponse {
    workflow_id: string;
}

interface WorkflowIdRequest {
    workflow_id: string;
}

interface GetWorkflowStatusResponse {
    status: string;
    snapshot: Buffer;
}

interface WorkflowEventMessage {
    type: string;
    data: Buffer;
}

interface CancelWorkflowResponse {
    success: boolean;
}

interface DeliverWebhookRequest {
    trigger_id: string;
    payload: Buffer;
}

interface DeliverWebhookResponse {
    delivered: boolean;
}

type UnaryCall<Req> = Pick<ServerUnaryCall<Req, unknown>, 'request'>;

/** The parts of a server-streaming call the service touches. */
export interface EventStream<Req> {
    request: Req;
    write(message: WorkflowEventMessage): boolean;
    end(): void;
    emit(event: 'error', error: ServerErrorResponse): boolean;
    on(event: 'cancelled', listener: () => void): unknown;
}

export function serviceError(code: grpc.status, message: string): ServerErrorResponse {
    return Object.assign(new Error(message), { code, details: message });
}

export function toServiceError(err: unknown): ServerErrorResponse {
    if (err instanceof WorkflowConfigError) return serviceError(grpc.status.INVALID_ARGUMENT, err.message);
    if (err instanceof BackpressureError) return serviceError(grpc.status.RESOURCE_EXHAUSTED, err.message);
    if (err instanceof NotFoundError) return serviceError(grpc.status.NOT_FOUND, err.message);
    if (err instanceof TriggerError) return serviceError(grpc.status.FAILED_PRECONDITION, err.message);
    return serviceError(grpc.status.INTERNAL, errorMessage(err));
}

function decodeJson(bytes: Buffer | undefined, what: string): unknown {
    const text = bytes ? bytes.toString('utf-8') : '';
    if (text.trim() === '') throw new InvalidWorkflowDocumentError(`${what} is empty`);
    try {
        return JSON.parse(text);
    } catch (err) {
        throw new InvalidWorkflowDocumentError(`${what} is not valid JSON: ${errorMessage(err)}`);
    }
}

function encodeJson(value: unknown): Buffer {
    return Buffer.from(JSON.stringify(toJSONSafe(value)));
}

function isTerminal(status: unknown): boolean {
    return Array.from(TERMINAL_RUN_STATUSES).some(s => s === status);
}

function finalEvent(snapshot: RunStatusEntity): WorkflowEvent {
    const event: WorkflowEvent = {
        type: 'workflow_update',
        timestamp: snapshot.end_time ?? new Date().toISOString(),
        status: snapshot.status,
        summary: snapshot.summary,
    };
    if (snapshot.outputs) event.outputs = snapshot.outputs;
    if (snapshot.output_errors) event.output_errors = snapshot.output_errors;
    if (snapshot.error) event.error = snapshot.error;
    return event;
}

/**
 * gRPC front of the workflow manager. Documents, snapshots and events are
 * exchanged as JSON bytes.
 */
export class WorkflowServiceImpl {
    constructor(
        private readonly manager: WorkflowManager,
        private readonly triggers: TriggerManager,
    ) { }

    /**
     * Validates and starts a workflow. Configuration problems come back as
     * INVALID_ARGUMENT, saturation as RESOURCE_EXHAUSTED.
     */
    async submitWorkflow(
        call: UnaryCall<SubmitWorkflowRequest>,
        callback: sendUnaryData<SubmitWorkflowResponse>,
    ): Promise<void> {
        try {
            const document = decodeJson(call.request.config, 'Workflow document');
            const workflowId = await this.manager.submit(document);
            callback(null, { workflow_id: workflowId });
        } catch (err) {
            console.error(`${TAG} submitWorkflow error: ${errorMessage(err)}`);
            callback(toServiceError(err));
        }
    }

    async getWorkflowStatus(
        call: UnaryCall<WorkflowIdRequest>,
        callback: sendUnaryData<GetWorkflowStatusResponse>,
    ): Promise<void> {
        try {
            const { workflow_id } = call.request;
            const snapshot = await this.manager.getStatus(workflow_id);
            if (!snapshot) throw new WorkflowNotFoundError(workflow_id);

            callback(null, { status: snapshot.status, snapshot: encodeJson(snapshot) });
        } catch (err) {
            console.error(`${TAG} getWorkflowStatus error: ${errorMessage(err)}`);
            callback(toServiceError(err));
        }
    }

    /**
     * Streams module and run events until the run reaches a terminal status.
     * A run that already finished yields one final `workflow_update`.
     */
    async streamWorkflow(call: EventStream<WorkflowIdRequest>): Promise<void> {
        const { workflow_id } = call.request;
        let closed = false;

        const close = () => {
            if (closed) return;
            closed = true;
            unsubscribe();
            call.end();
        };

        const unsubscribe = this.manager.subscribe(workflow_id, event => {
            if (closed) return;
            call.write({ type: event.type, data: encodeJson(event) });
            if (event.type === 'workflow_update' && isTerminal(event.status)) close();
        });
        call.on('cancelled', () => {
            closed = true;
            unsubscribe();
        });

        try {
            const snapshot = await this.manager.getStatus(workflow_id);
            if (!snapshot) throw new WorkflowNotFoundError(workflow_id);
            if (closed) return;

            if (isTerminal(snapshot.status) || !this.manager.isActive(workflow_id)) {
                const event = finalEvent(snapshot);
                call.write({ type: event.type, data: encodeJson(event) });
                close();
            }
        } catch (err) {
            console.error(`${TAG} streamWorkflow error: ${errorMessage(err)}`);
            closed = true;
            unsubscribe();
            call.emit('error', toServiceError(err));
        }
    }

    /** success is false when the run is not active in this process. */
    async cancelWorkflow(
        call: UnaryCall<WorkflowIdRequest>,
        callback: sendUnaryData<CancelWorkflowResponse>,
    ): Promise<void> {
        try {
            const { workflow_id } = call.request;
            if (this.manager.cancel(workflow_id)) {
                return callback(null, { success: true });
            }

            const snapshot = await this.manager.getStatus(workflow_id);
            if (!snapshot) throw new WorkflowNotFoundError(workflow_id);
            callback(null, { success: false });
        } catch (err) {
            console.error(`${TAG} cancelWorkflow error: ${errorMessage(err)}`);
            callback(toServiceError(err));
        }
    }

    async deliverWebhook(
        call: UnaryCall<DeliverWebhookRequest>,
        callback: sendUnaryData<DeliverWebhookResponse>,
    ): Promise<void> {
        try {
            const { trigger_id, payload } = call.request;
            const body = payload && payload.length > 0 ? decodeJson(payload, 'Webhook payload') : {};
            callback(null, { delivered: this.triggers.deliverWebhook(trigger_id, body) });
        } catch (err) {
            console.error(`${TAG} deliverWebhook error: ${errorMessage(err)}`);
            callback(toServiceError(err));
        }
    }
}
