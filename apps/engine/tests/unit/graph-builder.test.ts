import { HandlerRegistry } from '@canvasflow/sdk';
import {
    CircularDependencyError,
    InvalidReferenceSyntaxError,
    InvalidWorkflowDocumentError,
    MissingRequiredFieldError,
    UnknownHandlerTypeError,
    UnknownModuleReferenceError,
} from '../../src/errors';
import { buildWorkflowDefinition, findCycle, parseWorkflowDocument } from '../../src/graph/graph-builder';
import { pipelineDocument, testRegistry } from '../helpers/fixtures';

function echoModules(refs: Record<string, string[]>) {
    const modules: Record<string, { identifier: string; user_config: Record<string, unknown> }> = {};
    for (const [id, deps] of Object.entries(refs)) {
        const user_config: Record<string, unknown> = {};
        deps.forEach((dep, i) => {
            user_config[`in${i}`] = { module_id: dep, output_key: 'out' };
        });
        modules[id] = { identifier: 'echo', user_config };
    }
    return { canvas_name: 'graph', modules };
}

describe('buildWorkflowDefinition', () => {
    let registry: HandlerRegistry;

    beforeEach(() => {
        registry = testRegistry();
    });

    it('builds the s3 -> proc pipeline', () => {
        const def = buildWorkflowDefinition(pipelineDocument(), registry);

        expect(def.name).toBe('doc_pipeline');
        expect(def.executionOrder).toEqual(['s3', 'proc']);
        expect(def.dependencies).toEqual({ s3: [], proc: ['s3'] });
        expect(def.dependencyEdges).toEqual([['s3', 'proc']]);
        expect(def.outputControl).toBeNull();
    });

    it('orders a module after everything it references, whatever the declaration order', () => {
        const def = buildWorkflowDefinition(echoModules({ d: ['b', 'c'], c: ['a'], b: ['a'], a: [] }), registry);

        expect(def.executionOrder).toEqual(['a', 'c', 'b', 'd']);
        const position = new Map(def.executionOrder.map((id, i) => [id, i]));
        for (const [from, to] of def.dependencyEdges) {
            expect(position.get(from)).toBeLessThan(position.get(to) ?? -1);
        }
    });

    it('breaks ties by declaration order', () => {
        const def = buildWorkflowDefinition(echoModules({ z: [], y: [], x: ['z'] }), registry);
        expect(def.executionOrder).toEqual(['z', 'y', 'x']);
    });

    it('produces the same order for the same document', () => {
        const doc = echoModules({ a: [], b: ['a'], c: ['a'], d: ['c', 'b'] });
        const first = buildWorkflowDefinition(doc, registry).executionOrder;
        const second = buildWorkflowDefinition(doc, registry).executionOrder;
        expect(second).toEqual(first);
    });

    it('picks up template references as edges', () => {
        const def = buildWorkflowDefinition({
            workflow_name: 'templated',
            modules: {
                a: { identifier: 'echo', user_config: { v: 1 } },
                b: { identifier: 'echo', user_config: { v: ['${a.output.v}'] } },
            },
        }, registry);

        expect(def.name).toBe('templated');
        expect(def.dependencyEdges).toEqual([['a', 'b']]);
    });

    it('falls back to default_workflow and an empty user_config', () => {
        const def = buildWorkflowDefinition({ modules: { only: { identifier: 'echo' } } }, registry);
        expect(def.name).toBe('default_workflow');
        expect(def.modules.only.userConfig).toEqual({});
    });

    it('rejects a reference to a module that does not exist', () => {
        const build = () => buildWorkflowDefinition(echoModules({ a: ['ghost'] }), registry);
        expect(build).toThrow(UnknownModuleReferenceError);
        expect(build).toThrow('Module "a" references unknown module "ghost"');
    });

    it('rejects an output mapping that points at a missing module', () => {
        const doc = { ...pipelineDocument(), outputs: { result: '${nope.output.x}' } };
        expect(() => buildWorkflowDefinition(doc, registry))
            .toThrow('Module "outputs.result" references unknown module "nope"');
    });

    it('rejects an unregistered handler', () => {
        const doc = { modules: { a: { identifier: 'teleport', user_config: {} } } };
        expect(() => buildWorkflowDefinition(doc, registry)).toThrow(new UnknownHandlerTypeError('a', 'teleport'));
    });

    it('rejects a module missing a field its handler requires', () => {
        const doc = { modules: { p: { identifier: 'proc', user_config: {} } } };
        expect(() => buildWorkflowDefinition(doc, registry)).toThrow(new MissingRequiredFieldError('p', 'content'));
    });

    it('rejects a module without identifier', () => {
        const doc = { modules: { a: { user_config: {} } } };
        expect(() => buildWorkflowDefinition(doc, registry)).toThrow(MissingRequiredFieldError);
    });

    it('rejects a document without modules', () => {
        expect(() => buildWorkflowDefinition({ canvas_name: 'x' }, registry)).toThrow(MissingRequiredFieldError);
        expect(() => buildWorkflowDefinition({ modules: {} }, registry)).toThrow(MissingRequiredFieldError);
    });

    it('reports a cycle as a closed path of real edges', () => {
        const doc = echoModules({ a: ['c'], b: ['a'], c: ['b'], d: [] });

        let caught: unknown;
        try {
            buildWorkflowDefinition(doc, registry);
        } catch (err) {
            caught = err;
        }

        expect(caught).toBeInstanceOf(CircularDependencyError);
        const { cycle } = caught instanceof CircularDependencyError ? caught : { cycle: [] };
        expect(cycle).toEqual(['a', 'b', 'c', 'a']);
        expect(cycle[0]).toBe(cycle[cycle.length - 1]);
    });

    it('reports a self reference as a cycle', () => {
        expect(() => buildWorkflowDefinition(echoModules({ a: ['a'] }), registry))
            .toThrow('Circular dependency detected: a -> a');
    });

    it('rejects an embedded template, naming the module', () => {
        const doc = { modules: { a: { identifier: 'echo' }, b: { identifier: 'echo', user_config: { v: 'x-${a.output.v}' } } } };
        expect(() => buildWorkflowDefinition(doc, registry)).toThrow(InvalidReferenceSyntaxError);
        expect(() => buildWorkflowDefinition(doc, registry)).toThrow(/^Module "b": /);
    });

    it('rejects a malformed structured reference, naming the module', () => {
        const doc = { modules: { a: { identifier: 'echo', user_config: { v: { module_id: 'b' } } } } };
        expect(() => buildWorkflowDefinition(doc, registry))
            .toThrow('Module "a": reference to "b" is missing "output_key"');
    });

    it('carries output_control through untouched', () => {
        const doc = { ...pipelineDocument(), output_control: { format: 'json', keep: ['proc'] } };
        expect(buildWorkflowDefinition(doc, registry).outputControl).toEqual({ format: 'json', keep: ['proc'] });
    });
});

describe('parseWorkflowDocument', () => {
    it('rejects non-object documents', () => {
        expect(() => parseWorkflowDocument([])).toThrow(InvalidWorkflowDocumentError);
        expect(() => parseWorkflowDocument('{}')).toThrow(InvalidWorkflowDocumentError);
    });

    it('rejects values that are not JSON', () => {
        const doc = { modules: { a: { identifier: 'echo', user_config: { when: new Date(0) } } } };
        expect(() => parseWorkflowDocument(doc)).toThrow('"modules.a.user_config.when" holds a value that is not JSON (object)');
    });

    it('rejects __proto__ as a module id', () => {
        const doc: unknown = JSON.parse('{"modules":{"__proto__":{"identifier":"echo"}}}');
        expect(() => parseWorkflowDocument(doc)).toThrow(new InvalidWorkflowDocumentError('"__proto__" is not a valid module id'));
    });

    it('rejects __proto__ as a config key', () => {
        const doc: unknown = JSON.parse('{"modules":{"a":{"identifier":"echo","user_config":{"__proto__":{"x":1}}}}}');
        expect(() => parseWorkflowDocument(doc))
            .toThrow('"modules.a.user_config" uses the reserved key "__proto__"');
    });

    it('rejects non-finite numbers', () => {
        const doc = { modules: { a: { identifier: 'echo', user_config: { n: Infinity } } } };
        expect(() => parseWorkflowDocument(doc)).toThrow('"modules.a.user_config.n" must be a finite number');
    });
});

describe('findCycle', () => {
    it('returns null for an acyclic graph', () => {
        expect(findCycle(['a', 'b'], { a: ['b'], b: [] })).toBeNull();
    });

    it('returns the cycle starting at the node it closes on', () => {
        expect(findCycle(['x', 'a', 'b'], { x: ['a'], a: ['b'], b: ['a'] })).toEqual(['a', 'b', 'a']);
    });
});
