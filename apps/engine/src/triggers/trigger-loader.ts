import { TriggerError } from '../errors';
import { Trigger, TriggerEvent } from './base.trigger';
import { TriggerFactory } from './trigger.factory';

const TAG = '[triggers]';

/**
 * One entry of the triggers file:
 * `{ "id": "nightly", "type": "schedule", "interval": 60000, "workflow": { ...document } }`
 */
export interface TriggerBinding {
    id: string;
    type?: string;
    interval?: number;
    workflow: unknown;
}

export type SubmitWorkflow = (
    document: unknown,
    options: { trigger: { type: string; timestamp: string } },
) => Promise<string>;

export interface LoadedTrigger {
    id: string;
    trigger: Trigger;
}

export function parseTriggerBindings(raw: unknown): TriggerBinding[] {
    if (!Array.isArray(raw)) throw new TriggerError('Trigger bindings must be a JSON array');

    const seen = new Set<string>();
    return raw.map((entry: unknown, i): TriggerBinding => {
        if (!isRecord(entry)) throw new TriggerError(`Trigger binding #${i} must be an object`);
        const { id, type, interval, workflow } = entry;
        if (typeof id !== 'string' || id.length === 0) {
            throw new TriggerError(`Trigger binding #${i} needs a non-empty string "id"`);
        }
        if (seen.has(id)) throw new TriggerError(`Duplicate trigger id "${id}"`);
        seen.add(id);
        if (type !== undefined && typeof type !== 'string') {
            throw new TriggerError(`Trigger "${id}": "type" must be a string`);
        }
        if (interval !== undefined && typeof interval !== 'number') {
            throw new TriggerError(`Trigger "${id}": "interval" must be a number of ms`);
        }
        if (workflow === undefined) throw new TriggerError(`Trigger "${id}" has no "workflow"`);

        return { id, type, interval, workflow };
    });
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Builds one trigger per binding; each firing submits the binding's
 * workflow document. Triggers are returned idle.
 */
export function loadTriggerBindings(raw: unknown, factory: TriggerFactory, submit: SubmitWorkflow): LoadedTrigger[] {
    return parseTriggerBindings(raw).map(binding => {
        const onEvent = async (event: TriggerEvent): Promise<void> => {
            const workflowId = await submit(binding.workflow, {
                trigger: { type: event.type, timestamp: event.timestamp },
            });
            console.log(`${TAG} ${binding.id} fired, started ${workflowId}`);
        };

        const config = binding.interval === undefined ? {} : { interval: binding.interval };
        return { id: binding.id, trigger: factory.create(binding.type, onEvent, config) };
    });
}
