import { EventEmitter } from 'eventemitter3';
import { returnTypeOf } from './annotate.js';
import { bindCell, DeferredCell } from './cell.js';
import { MissingTypeAnnotationError } from './errors.js';
import { createHandle, forwarder } from './handle.js';
import { operationSet, type Operation } from './introspect.js';
import type { Delayed, Logger, Producer, TypeDescriptor } from './types.js';

export interface DelayedType {
  /** `Delayed(<type name>)` */
  readonly name: string;
  readonly type: TypeDescriptor;
  readonly operations: readonly Operation[];
  readonly handleClass: new () => object;
  /** Prototype carrying the forwarders; every handle of this type inherits from it. */
  readonly prototype: object;
  /** Whether the type's values are arrays, in which case handles are built on an array. */
  readonly arrayLike: boolean;
}

export interface DelayedRegistryEvents {
  'type-registered': (delayedType: DelayedType, totalTypes: number) => void;
  forced: (typeName: string) => void;
  'producer-failed': (typeName: string, error: unknown) => void;
}

/**
 * Synthesizes one forwarding class per delayed type and hands out handles built on it. Classes
 * are kept for the registry's lifetime.
 */
export class DelayedTypeRegistry {
  private readonly types = new Map<TypeDescriptor, DelayedType>();
  public readonly events = new EventEmitter<DelayedRegistryEvents>();

  constructor(
    public readonly name = 'default',
    protected readonly logger: Logger = () => {
      /* default no-op logger */
    },
  ) {
    // nothing to do here
  }

  /** Number of types with a synthesized class */
  get size() {
    return this.types.size;
  }

  public has(type: TypeDescriptor) {
    return this.types.has(type);
  }

  public typeFor(type: TypeDescriptor): DelayedType {
    const existing = this.types.get(type);
    if (existing) return existing;

    const delayedType = this.synthesize(type);
    this.types.set(type, delayedType);
    this.log(`Registered ${delayedType.name} with ${delayedType.operations.length} operations`);
    this.events.emit('type-registered', delayedType, this.types.size);
    return delayedType;
  }

  /**
   * @param type overrides the type annotated on `producer`
   */
  public create<T>(producer: Producer<T>, type?: TypeDescriptor): Delayed<T> {
    const resolved = type ?? returnTypeOf(producer);
    if (!resolved) throw new MissingTypeAnnotationError();

    const delayedType = this.typeFor(resolved);
    const cell = new DeferredCell(delayedType.name, producer, {
      forced: (typeName) => {
        this.log(`Forced ${typeName}`);
        this.events.emit('forced', typeName);
      },
      failed: (typeName, error) => {
        this.log(`Producer for ${typeName} failed`);
        this.events.emit('producer-failed', typeName, error);
      },
    });

    const handle = createHandle(delayedType, cell);
    bindCell(handle, cell);
    return handle as T;
  }

  private synthesize(type: TypeDescriptor): DelayedType {
    const operations = operationSet(type);
    const root: unknown = type.prototype;
    const arrayLike = root === Array.prototype || root instanceof Array;
    const name = `Delayed(${type.name || '<anonymous>'})`;

    const handleClass = class {};
    const prototype: object = handleClass.prototype;
    Object.defineProperty(handleClass, 'name', { value: name });
    Object.setPrototypeOf(prototype, null);
    for (const operation of operations) {
      Object.defineProperty(prototype, operation.key, forwarder(operation));
    }

    return { name, type, operations, handleClass, prototype, arrayLike };
  }

  private log(message: string) {
    this.logger(`Registry[${this.name}]: ${message}`);
  }
}
