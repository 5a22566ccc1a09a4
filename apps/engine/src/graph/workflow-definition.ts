import { ConfigObject, ConfigValue } from '@canvasflow/sdk';

export interface ModuleDefinition {
    id: string;
    identifier: string;
    userConfig: ConfigObject;
}

/** Validated module graph plus the order it runs in. */
export interface WorkflowDefinition {
    name: string;
    /** Insertion-ordered, as given in the submitted document. */
    modules: Record<string, ModuleDefinition>;
    executionOrder: string[];
    /** Direct predecessors of each module, in the order they were first referenced. */
    dependencies: Record<string, string[]>;
    /** `[from, to]`: `to` reads an output of `from`. */
    dependencyEdges: Array<[string, string]>;
    /** Final fields to surface, each a reference expression. Empty when the document declares none. */
    outputs: Record<string, ConfigValue>;
    outputControl: ConfigObject | null;
}

/** The parsed, shape-checked form of a submitted configuration document. */
export interface WorkflowDocument {
    name: string;
    modules: Record<string, ModuleDefinition>;
    outputs: Record<string, ConfigValue>;
    outputControl: ConfigObject | null;
}
