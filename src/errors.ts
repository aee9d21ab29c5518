export class DelayError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class MissingTypeAnnotationError extends DelayError {
  constructor() {
    super('delay can only be called on annotated producers; pass a type or wrap the producer with returns()');
  }
}

export class UnsupportedTypeError extends DelayError {
  constructor(
    public readonly type: unknown,
    reason: string,
  ) {
    super(`Cannot delay values of type ${describe(type)}: ${reason}`);
  }
}

export class ReentrantForceError extends DelayError {
  constructor(public readonly typeName: string) {
    super(`${typeName} was forced while its own producer was running`);
  }
}

function describe(type: unknown): string {
  if (typeof type === 'function') return type.name || '<anonymous>';
  return String(type);
}
