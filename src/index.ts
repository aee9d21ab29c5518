export type { Delayed, Logger, Producer, TypeDescriptor } from './types.js';

export { delay, delayObject, force, isDelayed, isForced, defaultRegistry } from './lazy.js';
export { annotate, returns, returnTypeOf } from './annotate.js';
export { DelayedTypeRegistry, type DelayedRegistryEvents, type DelayedType } from './registry.js';
export { operationSet, type Operation } from './introspect.js';
export { DelayError, MissingTypeAnnotationError, ReentrantForceError, UnsupportedTypeError } from './errors.js';
