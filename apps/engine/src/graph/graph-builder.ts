import { ConfigObject, ConfigValue, HandlerRegistry } from '@canvasflow/sdk';
import {
    CircularDependencyError,
    InvalidReferenceSyntaxError,
    InvalidWorkflowDocumentError,
    MissingRequiredFieldError,
    UnknownHandlerTypeError,
    UnknownModuleReferenceError,
} from '../errors';
import { findReferenceSites, ReferenceSite } from '../resolver/references';
import { ModuleDefinition, WorkflowDefinition, WorkflowDocument } from './workflow-definition';

const TAG = '[graph]';
const DEFAULT_WORKFLOW_NAME = 'default_workflow';
// would rewrite the prototype of the object it is assigned into
const RESERVED_KEY = '__proto__';

type Color = 'white' | 'gray' | 'black';

/**
 * Validates a submitted configuration document and turns it into a runnable
 * definition. Throws a WorkflowConfigError subclass on the first problem;
 * nothing is ordered until every module has passed validation.
 */
export function buildWorkflowDefinition(document: unknown, registry: HandlerRegistry): WorkflowDefinition {
    const doc = parseWorkflowDocument(document);
    const ids = Object.keys(doc.modules);

    const dependencies: Record<string, string[]> = {};
    for (const id of ids) {
        dependencies[id] = collectDependencies(doc.modules[id].userConfig, id);
    }

    for (const id of ids) {
        for (const dep of dependencies[id]) {
            if (!hasOwn(doc.modules, dep)) throw new UnknownModuleReferenceError(id, dep);
        }
    }
    for (const [name, ref] of Object.entries(doc.outputs)) {
        for (const dep of collectDependencies(ref, `outputs.${name}`)) {
            if (!hasOwn(doc.modules, dep)) throw new UnknownModuleReferenceError(`outputs.${name}`, dep);
        }
    }

    for (const id of ids) {
        const { identifier, userConfig } = doc.modules[id];
        const handler = registry.get(identifier);
        if (!handler) throw new UnknownHandlerTypeError(id, identifier);

        for (const field of handler.requiredFields ?? []) {
            if (!hasOwn(userConfig, field)) throw new MissingRequiredFieldError(id, field);
        }
    }

    const successors = buildSuccessors(ids, dependencies);
    const cycle = findCycle(ids, successors);
    if (cycle) throw new CircularDependencyError(cycle);

    const executionOrder = topologicalOrder(ids, dependencies, successors);
    const dependencyEdges: Array<[string, string]> = [];
    for (const id of ids) {
        for (const dep of dependencies[id]) dependencyEdges.push([dep, id]);
    }

    console.log(`${TAG} ${doc.name}: ${ids.length} modules, order ${executionOrder.join(' -> ')}`);

    return {
        name: doc.name,
        modules: doc.modules,
        executionOrder,
        dependencies,
        dependencyEdges,
        outputs: doc.outputs,
        outputControl: doc.outputControl,
    };
}

function collectDependencies(config: ConfigValue, owner: string): string[] {
    const sites = referenceSitesOf(config, owner);
    const embedded = sites.find(site => site.embedded);
    if (embedded) {
        throw new InvalidReferenceSyntaxError(
            `template for "${embedded.moduleId}.output.${embedded.outputKey}" is embedded in a longer string; a template must be the whole value`,
            owner,
        );
    }

    return Array.from(new Set(sites.map(site => site.moduleId)));
}

function referenceSitesOf(config: ConfigValue, owner: string): ReferenceSite[] {
    try {
        return findReferenceSites(config);
    } catch (err) {
        if (err instanceof InvalidReferenceSyntaxError && err.moduleId === undefined) {
            throw new InvalidReferenceSyntaxError(err.detail, owner);
        }
        throw err;
    }
}

// successors[M] lists the modules that read from M, in insertion order
function buildSuccessors(ids: string[], dependencies: Record<string, string[]>): Record<string, string[]> {
    const successors: Record<string, string[]> = {};
    for (const id of ids) successors[id] = [];
    for (const id of ids) {
        for (const dep of dependencies[id]) successors[dep].push(id);
    }
    return successors;
}

/**
 * Three-colour DFS. Returns the first cycle found as a closed path
 * (`[a, b, c, a]`, each consecutive pair an edge), or null.
 */
export function findCycle(ids: string[], successors: Record<string, string[]>): string[] | null {
    const color = new Map<string, Color>();
    const stack: string[] = [];

    const visit = (node: string): string[] | null => {
        color.set(node, 'gray');
        stack.push(node);

        for (const next of successors[node] ?? []) {
            const state = color.get(next) ?? 'white';
            if (state === 'gray') {
                return [...stack.slice(stack.indexOf(next)), next];
            }
            if (state === 'white') {
                const found = visit(next);
                if (found) return found;
            }
        }

        stack.pop();
        color.set(node, 'black');
        return null;
    };

    for (const id of ids) {
        if ((color.get(id) ?? 'white') !== 'white') continue;
        const found = visit(id);
        if (found) return found;
    }
    return null;
}

/**
 * Kahn's algorithm. Among modules that are ready at the same time the one
 * declared first runs first, so identical documents always order identically.
 */
export function topologicalOrder(
    ids: string[],
    dependencies: Record<string, string[]>,
    successors: Record<string, string[]>,
): string[] {
    const position = new Map(ids.map((id, i) => [id, i]));
    const indegree = new Map(ids.map(id => [id, dependencies[id].length]));
    const ready = ids.filter(id => indegree.get(id) === 0);
    const order: string[] = [];

    let current: string | undefined;
    while ((current = ready.shift()) !== undefined) {
        order.push(current);
        for (const next of successors[current]) {
            const remaining = (indegree.get(next) ?? 0) - 1;
            indegree.set(next, remaining);
            if (remaining === 0) insertByPosition(ready, next, position);
        }
    }

    if (order.length !== ids.length) {
        const stuck = ids.filter(id => !order.includes(id));
        throw new CircularDependencyError(findCycle(stuck, successors) ?? stuck);
    }
    return order;
}

function insertByPosition(queue: string[], id: string, position: Map<string, number>): void {
    const rank = position.get(id) ?? Number.MAX_SAFE_INTEGER;
    const at = queue.findIndex(other => (position.get(other) ?? Number.MAX_SAFE_INTEGER) > rank);
    if (at === -1) queue.push(id);
    else queue.splice(at, 0, id);
}

/**
 * Shape-checks the configuration document:
 * `{ canvas_name | workflow_name, modules: { <id>: { identifier, user_config } }, outputs?, output_control? }`
 */
export function parseWorkflowDocument(document: unknown): WorkflowDocument {
    if (!isPlainObject(document)) {
        throw new InvalidWorkflowDocumentError('Workflow document must be a JSON object');
    }

    const rawName = document.canvas_name ?? document.workflow_name ?? DEFAULT_WORKFLOW_NAME;
    if (typeof rawName !== 'string' || rawName.length === 0) {
        throw new InvalidWorkflowDocumentError('Workflow name must be a non-empty string');
    }

    if (document.modules === undefined) throw new MissingRequiredFieldError(null, 'modules');
    if (!isPlainObject(document.modules)) {
        throw new InvalidWorkflowDocumentError('"modules" must be an object keyed by module id');
    }
    if (Object.keys(document.modules).length === 0) throw new MissingRequiredFieldError(null, 'modules');

    const modules: Record<string, ModuleDefinition> = {};
    for (const [id, raw] of Object.entries(document.modules)) {
        modules[id] = parseModule(id, raw);
    }

    return {
        name: rawName,
        modules,
        outputs: parseOptionalObject(document.outputs, 'outputs'),
        outputControl: document.output_control === undefined
            ? null
            : parseOptionalObject(document.output_control, 'output_control'),
    };
}

function parseModule(id: string, raw: unknown): ModuleDefinition {
    if (!id) throw new InvalidWorkflowDocumentError('Module ids must be non-empty');
    if (id === RESERVED_KEY) throw new InvalidWorkflowDocumentError(`"${RESERVED_KEY}" is not a valid module id`);
    if (!isPlainObject(raw)) throw new InvalidWorkflowDocumentError(`Module "${id}" must be an object`);

    if (raw.identifier === undefined) throw new MissingRequiredFieldError(id, 'identifier');
    if (typeof raw.identifier !== 'string' || raw.identifier.length === 0) {
        throw new InvalidWorkflowDocumentError(`Module "${id}": "identifier" must be a non-empty string`);
    }

    return {
        id,
        identifier: raw.identifier,
        userConfig: parseOptionalObject(raw.user_config, `modules.${id}.user_config`),
    };
}

function parseOptionalObject(value: unknown, path: string): ConfigObject {
    if (value === undefined) return {};
    if (!isPlainObject(value)) throw new InvalidWorkflowDocumentError(`"${path}" must be an object`);

    const out: ConfigObject = {};
    for (const [key, child] of Object.entries(value)) {
        if (key === RESERVED_KEY) throw new InvalidWorkflowDocumentError(`"${path}" uses the reserved key "${RESERVED_KEY}"`);
        out[key] = parseConfigValue(child, `${path}.${key}`);
    }
    return out;
}

function parseConfigValue(value: unknown, path: string): ConfigValue {
    if (value === null || typeof value === 'string' || typeof value === 'boolean') return value;
    if (typeof value === 'number') {
        if (!Number.isFinite(value)) throw new InvalidWorkflowDocumentError(`"${path}" must be a finite number`);
        return value;
    }
    if (Array.isArray(value)) return value.map((item, i) => parseConfigValue(item, `${path}[${i}]`));
    if (isPlainObject(value)) return parseOptionalObject(value, path);
    throw new InvalidWorkflowDocumentError(`"${path}" holds a value that is not JSON (${typeof value})`);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}

function hasOwn(obj: object, key: string): boolean {
    return Object.prototype.hasOwnProperty.call(obj, key);
}
