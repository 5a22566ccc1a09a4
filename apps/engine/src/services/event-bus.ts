const TAG = '[event-bus]';

export type WorkflowEventType = 'module_update' | 'workflow_update';

export interface WorkflowEvent {
    type: WorkflowEventType;
    timestamp: string;
    [key: string]: unknown;
}

export type WorkflowEventListener = (event: WorkflowEvent) => void;

/**
 * In-process fan-out of run events, keyed by workflow id.
 * Listeners are called synchronously in subscription order.
 */
export class EventBus {
    private subscribers = new Map<string, Set<WorkflowEventListener>>();

    subscribe(workflowId: string, listener: WorkflowEventListener): () => void {
        let listeners = this.subscribers.get(workflowId);
        if (!listeners) {
            listeners = new Set();
            this.subscribers.set(workflowId, listeners);
        }
        listeners.add(listener);

        return () => {
            const current = this.subscribers.get(workflowId);
            if (!current) return;
            current.delete(listener);
            if (current.size === 0) this.subscribers.delete(workflowId);
        };
    }

    publish(workflowId: string, event: { type: WorkflowEventType; [key: string]: unknown }): void {
        const listeners = this.subscribers.get(workflowId);
        if (!listeners) return;

        const stamped: WorkflowEvent = { timestamp: new Date().toISOString(), ...event };
        for (const listener of Array.from(listeners)) {
            try {
                listener(stamped);
            } catch (err) {
                console.error(`${TAG} listener for ${workflowId} threw:`, err);
            }
        }
    }

    subscriberCount(workflowId: string): number {
        return this.subscribers.get(workflowId)?.size ?? 0;
    }
}
