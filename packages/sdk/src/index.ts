// public api for @canvasflow/sdk
// usage:
//   import { HandlerRegistry, defineHandler, completed } from '@canvasflow/sdk';
//   const registry = new HandlerRegistry().register('echo', defineHandler(({ user_config }) => completed(user_config)));

export type {
    ConfigValue,
    ConfigObject,
    ModuleReference,
    TaskInput,
    TaskOutput,
    HandlerResult,
    TaskHandler,
} from './types';
export { HandlerRegistry, defineHandler, completed, failed } from './registry';
export { serialize, deserialize, payloadSize, toJSONSafe, SerializationError } from './utils/serialization';
