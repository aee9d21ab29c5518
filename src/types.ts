export type Producer<T> = () => T;

/**
 * Anything with a runtime prototype to introspect: a class, or a built-in constructor such as
 * `Number`, `Array` or `Promise`.
 */
export interface TypeDescriptor {
  readonly name: string;
  readonly prototype: unknown;
}

/** A handle is typed as the value it stands in for. */
export type Delayed<T> = T;

export type Logger = (...args: unknown[]) => void;
