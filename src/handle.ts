import { cellOf, type DeferredCell } from './cell.js';
import { isRoutine, type Operation, type Routine } from './introspect.js';

interface IteratorLike {
  next(...args: unknown[]): unknown;
  return?(value?: unknown): unknown;
  throw?(error?: unknown): unknown;
}

interface DeferredIterator extends IteratorLike {
  return(value?: unknown): unknown;
  throw(error?: unknown): unknown;
  [Symbol.iterator]?(): DeferredIterator;
  [Symbol.asyncIterator]?(): DeferredIterator;
}

/** What a handle is built from: the synthesized prototype and whether the value is an array. */
export interface HandleShape {
  readonly prototype: object;
  readonly arrayLike: boolean;
}

function isIteratorLike(value: unknown): value is IteratorLike {
  return typeof value === 'object' && value !== null && 'next' in value && typeof value.next === 'function';
}

/** Box primitives the way property access on them does. */
function asObject(value: unknown): object {
  if (typeof value === 'function' || (typeof value === 'object' && value !== null)) return value;
  if (value === null || value === undefined) {
    throw new TypeError(`Cannot access properties of a delayed ${String(value)}`);
  }
  return Object(value);
}

/** Give a wrapper the `name` and `length` of the routine it stands for. */
function signed<F extends Routine>(wrapper: F, like: Routine): F {
  Object.defineProperty(wrapper, 'name', { value: like.name, configurable: true });
  Object.defineProperty(wrapper, 'length', { value: like.length, configurable: true });
  return wrapper;
}

/**
 * An iterator whose underlying iterator is only requested, and the handle only forced, on the
 * first call to `next`. Closing it first means the handle is never forced through it.
 */
function deferredIterator(open: () => unknown, async: boolean): DeferredIterator {
  let inner: IteratorLike | undefined;
  let closed = false;

  const settle = (result: { done: true; value: unknown }) => (async ? Promise.resolve(result) : result);

  const opened = (): IteratorLike => {
    if (inner === undefined) {
      const candidate = open();
      if (!isIteratorLike(candidate)) throw new TypeError('Result of the iteration method is not an iterator');
      inner = candidate;
    }
    return inner;
  };

  const iterator: DeferredIterator = {
    next: (...args: unknown[]) => {
      if (closed && inner === undefined) return settle({ done: true, value: undefined });
      return opened().next(...args);
    },
    return: (value?: unknown) => {
      closed = true;
      const it = inner;
      if (it?.return) return it.return(value);
      return settle({ done: true, value });
    },
    throw: (error?: unknown) => {
      if (closed && inner === undefined) {
        if (async) return Promise.reject(error);
        throw error;
      }
      const it = opened();
      if (it.throw) return it.throw(error);
      throw error;
    },
  };

  if (async) iterator[Symbol.asyncIterator] = () => iterator;
  else iterator[Symbol.iterator] = () => iterator;
  return iterator;
}

/**
 * The routine the value itself answers to under `key`, so subclass and own overrides win. The
 * type's routine is the fallback for values that do not carry one.
 */
function resolve(value: unknown, key: string | symbol, fallback: Routine): Routine {
  const own: unknown = Reflect.get(asObject(value), key);
  return isRoutine(own) ? own : fallback;
}

function forwardMethod(key: string | symbol, method: Routine): Routine {
  if (key === Symbol.iterator || key === Symbol.asyncIterator) {
    const async = key === Symbol.asyncIterator;
    return signed(function (this: unknown, ...args: unknown[]) {
      const cell = cellOf(this);
      return deferredIterator(() => {
        const value = cell.force();
        return resolve(value, key, method).apply(value, args);
      }, async);
    }, method);
  }
  return signed(function (this: unknown, ...args: unknown[]) {
    const value = cellOf(this).force();
    return resolve(value, key, method).apply(value, args);
  }, method);
}

/** Property descriptor to install on a synthesized prototype for one operation of the delayed type. */
export function forwarder(operation: Operation): PropertyDescriptor {
  if (operation.kind === 'method') {
    return { configurable: true, writable: true, value: forwardMethod(operation.key, operation.method) };
  }

  const { key, get } = operation;
  return {
    configurable: true,
    get: signed(function (this: unknown) {
      const value = cellOf(this).force();
      const object = asObject(value);
      return key in object ? Reflect.get(object, key) : get.call(value);
    }, get),
  };
}

/**
 * Make the proxy target carry the value's prototype and own properties and stop it growing, so a
 * non-extensible value can be reported through the proxy.
 */
function mirrorShape(target: object, object: object) {
  Reflect.setPrototypeOf(target, Reflect.getPrototypeOf(object));
  for (const key of Reflect.ownKeys(object)) {
    const descriptor = Reflect.getOwnPropertyDescriptor(object, key);
    if (descriptor) Reflect.defineProperty(target, key, descriptor);
  }
  Reflect.preventExtensions(target);
}

/** Copy a property onto the target once it is fixed on the value, or whenever the target holds it already. */
function pin(target: object, object: object, prop: string | symbol) {
  const descriptor = Reflect.getOwnPropertyDescriptor(object, prop);
  if (descriptor && (!descriptor.configurable || Object.hasOwn(target, prop))) {
    Reflect.defineProperty(target, prop, descriptor);
  }
  return descriptor;
}

/**
 * Build a handle. Operations found on the synthesized prototype run through the forwarders; every
 * other property access forces the cell and acts on the value. Functions read from the value are
 * bound to it.
 */
export function createHandle(shape: HandleShape, cell: DeferredCell<unknown>): object {
  const { prototype } = shape;
  const target: object = shape.arrayLike ? [] : {};
  Reflect.setPrototypeOf(target, prototype);

  let boxed: object | undefined;
  const value = () => (boxed ??= asObject(cell.force()));

  const bound = new WeakMap<Routine, Routine>();
  const bind = (fn: Routine): Routine => {
    let wrapper = bound.get(fn);
    if (!wrapper) {
      wrapper = signed(function (this: unknown, ...args: unknown[]): unknown {
        if (new.target) return Reflect.construct(fn, args);
        return fn.apply(this === handle ? cell.force() : this, args);
      }, fn);
      bound.set(fn, wrapper);
    }
    return wrapper;
  };

  const toJSON = () => cell.force();

  const handle: object = new Proxy(target, {
    get(target, prop, receiver) {
      const fixed = Reflect.getOwnPropertyDescriptor(target, prop);
      if (fixed === undefined && prop in prototype) return Reflect.get(prototype, prop, receiver);

      const result: unknown = Reflect.get(value(), prop);
      // a frozen property has to read back exactly as the target holds it
      if (fixed && !fixed.configurable && fixed.writable === false) return result;
      if (isRoutine(result)) return bind(result);
      if (result === undefined && prop === 'toJSON') return toJSON;
      return result;
    },
    set(_target, prop, newValue) {
      return Reflect.set(value(), prop, newValue);
    },
    has(_target, prop) {
      return Reflect.has(value(), prop);
    },
    deleteProperty(target, prop) {
      if (!Reflect.deleteProperty(value(), prop)) return false;
      Reflect.deleteProperty(target, prop);
      return true;
    },
    defineProperty(target, prop, descriptor) {
      const object = value();
      if (!Reflect.defineProperty(object, prop, descriptor)) return false;
      pin(target, object, prop);
      return true;
    },
    ownKeys() {
      return Reflect.ownKeys(value());
    },
    getOwnPropertyDescriptor(target, prop) {
      return pin(target, value(), prop);
    },
    getPrototypeOf() {
      return Reflect.getPrototypeOf(value());
    },
    setPrototypeOf(_target, proto) {
      return Reflect.setPrototypeOf(value(), proto);
    },
    isExtensible(target) {
      const object = value();
      const extensible = Reflect.isExtensible(object);
      if (!extensible && Reflect.isExtensible(target)) mirrorShape(target, object);
      return extensible;
    },
    preventExtensions(target) {
      const object = value();
      if (!Reflect.preventExtensions(object)) return false;
      if (Reflect.isExtensible(target)) mirrorShape(target, object);
      return true;
    },
  });

  return handle;
}
