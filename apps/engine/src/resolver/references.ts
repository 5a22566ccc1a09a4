import { ConfigObject, ConfigValue, TaskInput } from '@canvasflow/sdk';
import { InvalidReferenceSyntaxError, MissingOutputKeyError, UnresolvedDependencyError } from '../errors';
import { ModuleDefinition } from '../graph/workflow-definition';
import { StateReader } from '../state/state-store';

// ${<module_id>.output.<output_key>}
const TEMPLATE_PATTERN = /\$\{([^.}]+)\.output\.([^}]+)\}/g;
const FULL_TEMPLATE_PATTERN = /^\$\{([^.}]+)\.output\.([^}]+)\}$/;

export interface ReferenceSite {
    moduleId: string;
    outputKey: string;
    form: 'structured' | 'template';
    /** Template that is only part of a longer string. Interpolation is not supported. */
    embedded: boolean;
}

type ReferenceFn = (site: ReferenceSite) => unknown;

/**
 * The one traversal every reference operation goes through. Walks values
 * (never keys) and rebuilds the tree, replacing each reference site with
 * whatever `onReference` returns. Embedded templates are reported but the
 * string is returned unchanged.
 */
export function mapReferences(value: ConfigValue, onReference: ReferenceFn): unknown {
    if (Array.isArray(value)) {
        return value.map(item => mapReferences(item, onReference));
    }
    if (value !== null && typeof value === 'object') {
        const ref = asStructuredReference(value);
        if (ref) return onReference({ ...ref, form: 'structured', embedded: false });
        return mapObject(value, onReference);
    }
    if (typeof value === 'string') {
        return mapTemplate(value, onReference);
    }
    return value;
}

function mapObject(value: ConfigObject, onReference: ReferenceFn): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(value)) {
        out[key] = mapReferences(child, onReference);
    }
    return out;
}

function mapTemplate(value: string, onReference: ReferenceFn): unknown {
    const full = FULL_TEMPLATE_PATTERN.exec(value);
    if (full) {
        return onReference({ moduleId: full[1], outputKey: full[2], form: 'template', embedded: false });
    }
    for (const match of value.matchAll(TEMPLATE_PATTERN)) {
        onReference({ moduleId: match[1], outputKey: match[2], form: 'template', embedded: true });
    }
    return value;
}

function asStructuredReference(value: ConfigObject): { moduleId: string; outputKey: string } | null {
    const keys = Object.keys(value);
    const hasModuleId = Object.prototype.hasOwnProperty.call(value, 'module_id');

    if (keys.length === 2 && hasModuleId && Object.prototype.hasOwnProperty.call(value, 'output_key')) {
        const moduleId = value.module_id;
        const outputKey = value.output_key;
        if (typeof moduleId !== 'string' || typeof outputKey !== 'string' || !moduleId || !outputKey) {
            throw new InvalidReferenceSyntaxError('structured reference needs non-empty string "module_id" and "output_key"');
        }
        return { moduleId, outputKey };
    }
    if (keys.length === 1 && hasModuleId) {
        throw new InvalidReferenceSyntaxError(`reference to "${String(value.module_id)}" is missing "output_key"`);
    }
    return null;
}

/** Every reference site in the tree, in traversal order. */
export function findReferenceSites(value: ConfigValue): ReferenceSite[] {
    const sites: ReferenceSite[] = [];
    mapReferences(value, site => {
        sites.push(site);
        return null;
    });
    return sites;
}

/** Ids of all modules the tree reads from. */
export function detectReferences(value: ConfigValue): Set<string> {
    return new Set(findReferenceSites(value).map(site => site.moduleId));
}

/**
 * Replaces every reference with the referenced output value. A string that is
 * exactly one template resolves to the raw value, whatever its type.
 */
export function resolve(value: ConfigValue, state: StateReader): unknown {
    return mapReferences(value, site => lookup(site, state));
}

export function resolveModuleInput(module: ModuleDefinition, state: StateReader): TaskInput {
    return {
        module_id: module.id,
        identifier: module.identifier,
        user_config: mapObject(module.userConfig, site => lookup(site, state)),
    };
}

function lookup(site: ReferenceSite, state: StateReader): unknown {
    if (site.embedded) {
        throw new InvalidReferenceSyntaxError(
            `template "\${${site.moduleId}.output.${site.outputKey}}" must be the whole string; interpolation is not supported`,
        );
    }

    const output = state.getOutput(site.moduleId);
    if (output === undefined) {
        throw new UnresolvedDependencyError(site.moduleId);
    }
    if (!Object.prototype.hasOwnProperty.call(output, site.outputKey)) {
        throw new MissingOutputKeyError(site.moduleId, site.outputKey);
    }
    return output[site.outputKey];
}
