export { BackpressureGuard, EventLoopMonitor } from './backpressure';
export type { BackpressureLimits, LagSource } from './backpressure';
export { EventBus } from './event-bus';
export type { WorkflowEvent, WorkflowEventListener, WorkflowEventType } from './event-bus';
export { briefOutput, RunStatusObserver } from './status-observer';
export { FAILURE_POLICIES, WorkflowEngine } from './workflow-engine';
export type {
    EngineOptions,
    ExecuteOptions,
    FailurePolicy,
    ModuleReport,
    WorkflowObserver,
    WorkflowResult,
} from './workflow-engine';
export { WorkflowManager } from './workflow-manager';
export type { SubmitOptions, WorkflowManagerDeps } from './workflow-manager';
