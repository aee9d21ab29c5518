import { UnsupportedTypeError } from './errors.js';
import type { TypeDescriptor } from './types.js';

export type Routine = (this: unknown, ...args: unknown[]) => unknown;

export type Operation =
  | { kind: 'method'; key: string | symbol; method: Routine }
  | { kind: 'accessor'; key: string | symbol; get: (this: unknown) => unknown };

/** Construction and the legacy `Object.prototype` hooks that rewrite an object's own definition. */
export const EXCLUDED_KEYS: ReadonlySet<string | symbol> = new Set([
  'constructor',
  '__proto__',
  '__defineGetter__',
  '__defineSetter__',
  '__lookupGetter__',
  '__lookupSetter__',
]);

export function isRoutine(value: unknown): value is Routine {
  return typeof value === 'function';
}

/**
 * Every routine reachable from `type.prototype`, nearest definition first. Plain data properties
 * and setter-only accessors are left to the handle's property forwarding.
 */
export function operationSet(type: TypeDescriptor): Operation[] {
  if (typeof type !== 'function') {
    throw new UnsupportedTypeError(type, 'descriptor is not a constructor');
  }
  const root: unknown = type.prototype;
  if (typeof root !== 'object' || root === null) {
    throw new UnsupportedTypeError(type, 'it has no prototype to introspect');
  }

  const seen = new Set<string | symbol>();
  const operations: Operation[] = [];

  for (let proto: object | null = root; proto !== null; proto = Reflect.getPrototypeOf(proto)) {
    for (const key of Reflect.ownKeys(proto)) {
      if (seen.has(key)) continue;
      seen.add(key);
      if (EXCLUDED_KEYS.has(key)) continue;

      const descriptor = Reflect.getOwnPropertyDescriptor(proto, key);
      if (!descriptor) continue;

      // writes go straight to the value, so only readable accessors need a forwarder
      if (descriptor.get) {
        operations.push({ kind: 'accessor', key, get: descriptor.get });
        continue;
      }

      const value: unknown = descriptor.value;
      if (isRoutine(value)) operations.push({ kind: 'method', key, method: value });
    }
  }

  return operations;
}
