import { findCell } from './cell.js';
import { DelayedTypeRegistry } from './registry.js';
import type { Delayed, Producer, TypeDescriptor } from './types.js';

export const defaultRegistry = new DelayedTypeRegistry();

/**
 * Stand-in for the value `producer` will return. The producer runs on the first operation
 * performed on the handle and its result serves every operation after that.
 *
 * The value's type comes from `type` or, when that is omitted, from the producer's annotation
 * (see `returns`).
 *
 * @example
 * const two = delay(() => 2, Number);
 * two + 2; // 4, producer runs here
 */
export function delay<T>(producer: Producer<T>, type?: TypeDescriptor): Delayed<T> {
  return defaultRegistry.create(producer, type);
}

export function delayObject<T extends object>(producer: Producer<T>): Delayed<T> {
  return defaultRegistry.create(producer, Object);
}

/** The value behind a handle, forcing it if needed. Anything else is returned unchanged. */
export function force<T>(value: Delayed<T>): T {
  const cell = findCell(value);
  if (!cell) return value;
  return cell.force() as T;
}

export function isDelayed(value: unknown): boolean {
  return findCell(value) !== undefined;
}

export function isForced(value: unknown): boolean {
  return findCell(value)?.forced ?? false;
}
