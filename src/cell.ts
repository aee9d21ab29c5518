import { ReentrantForceError } from './errors.js';
import type { Producer } from './types.js';

export type CellState<T> =
  | { status: 'unforced'; producer: Producer<T> }
  | { status: 'forcing' }
  | { status: 'forced'; value: T };

export interface CellHooks {
  forced: (typeName: string) => void;
  failed: (typeName: string, error: unknown) => void;
}

/**
 * Holds a producer until first use, then the value it produced. A producer that throws leaves the
 * cell unforced, so the next use runs it again.
 */
export class DeferredCell<T> {
  private state: CellState<T>;

  constructor(
    public readonly typeName: string,
    producer: Producer<T>,
    private readonly hooks: CellHooks,
  ) {
    this.state = { status: 'unforced', producer };
  }

  get forced() {
    return this.state.status === 'forced';
  }

  force(): T {
    const state = this.state;
    if (state.status === 'forced') return state.value;
    if (state.status === 'forcing') throw new ReentrantForceError(this.typeName);

    const { producer } = state;
    this.state = { status: 'forcing' };

    let value: T;
    try {
      value = producer();
    } catch (err) {
      this.state = { status: 'unforced', producer };
      this.hooks.failed(this.typeName, err);
      throw err;
    }

    this.state = { status: 'forced', value };
    this.hooks.forced(this.typeName);
    return value;
  }
}

const cells = new WeakMap<object, DeferredCell<unknown>>();

export function bindCell(handle: object, cell: DeferredCell<unknown>) {
  cells.set(handle, cell);
}

export function findCell(value: unknown): DeferredCell<unknown> | undefined {
  if (typeof value === 'function' || (typeof value === 'object' && value !== null)) return cells.get(value);
  return undefined;
}

export function cellOf(receiver: unknown): DeferredCell<unknown> {
  const cell = findCell(receiver);
  if (!cell) throw new TypeError('Delayed operation called on an object that is not a delayed handle');
  return cell;
}
