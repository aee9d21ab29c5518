import type { Producer, TypeDescriptor } from './types.js';

const annotations = new WeakMap<Producer<unknown>, TypeDescriptor>();

/** Record `type` as the return type of `producer` and hand the producer back. */
export function annotate<P extends Producer<unknown>>(producer: P, type: TypeDescriptor): P {
  annotations.set(producer, type);
  return producer;
}

/**
 * Curried form of {@link annotate}, for declaring the return type where the producer is written.
 *
 * @example
 * const answer = returns(Number)(() => 42);
 * const handle = delay(answer);
 */
export function returns(type: TypeDescriptor) {
  return <P extends Producer<unknown>>(producer: P): P => annotate(producer, type);
}

export function returnTypeOf(producer: Producer<unknown>): TypeDescriptor | undefined {
  return annotations.get(producer);
}
