export { Trigger, triggerState } from './base.trigger';
export type { TriggerCallback, TriggerConfig, TriggerEvent } from './base.trigger';
export { DEFAULT_INTERVAL_MS, PollingTrigger } from './polling.trigger';
export type { Deliver } from './polling.trigger';
export { ScheduleTrigger } from './schedule.trigger';
export { EmailTrigger } from './email.trigger';
export type { MailboxMessage, MailboxSource } from './email.trigger';
export { WebhookTrigger } from './webhook.trigger';
export { createTriggerFactory, DEFAULT_TRIGGER_TYPE, TriggerFactory } from './trigger.factory';
export type { BuiltinTriggerOptions, TriggerBuilder } from './trigger.factory';
export { TriggerManager } from './trigger-manager';
export { loadTriggerBindings, parseTriggerBindings } from './trigger-loader';
export type { LoadedTrigger, SubmitWorkflow, TriggerBinding } from './trigger-loader';
