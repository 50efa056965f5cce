/**
 * Base class for every error raised by the factory engine.
 * Errors thrown by models, persistence hooks or post-generation callbacks are
 * never wrapped; they reach the caller unchanged.
 *
 * @example
 * ```typescript
 * try {
 *   UserFactory.build();
 * } catch (error) {
 *   if (error instanceof FactoryError) {
 *     console.log(error.code, error.details);
 *   }
 * }
 * ```
 */
export class FactoryError extends Error {
  /** Type discriminator for runtime type checking */
  public readonly isFactoryError = true;
  /** Stable machine-readable error code */
  public readonly code: string;
  /** Additional context: factory name, attribute, path... */
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options: {
      code?: string;
      details?: Record<string, unknown>;
      cause?: unknown;
    } = {},
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = options.code ?? 'FACTORY_ERROR';
    this.details = options.details;

    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
      stack: this.stack,
    };
  }
}

// Configuration errors

/**
 * A factory is defined or wired in a way that can never work.
 * Raised when the factory is defined or first used.
 */
export class ConfigurationError extends FactoryError {
  constructor(message: string, details?: Record<string, unknown>, code = 'CONFIGURATION_ERROR') {
    super(message, { code, details });
  }
}

/**
 * Raised when building or creating from an abstract factory, including one
 * that has no model anywhere in its chain.
 */
export class AbstractFactoryError extends ConfigurationError {
  constructor(factory: string) {
    super(
      `Cannot generate instances of abstract factory ${factory}; set a model or mark it abstract and extend it.`,
      { factory },
      'ABSTRACT_FACTORY',
    );
  }
}

/**
 * Raised when resetting the sequence of a factory that shares its counter
 * with an ancestor, without `force`.
 */
export class SequenceResetError extends ConfigurationError {
  constructor(factory: string, root: string) {
    super(
      `Can't reset a sequence on descendant factory ${factory}; reset sequence on ${root} or use \`force: true\`.`,
      { factory, root },
      'SEQUENCE_RESET',
    );
  }
}

/**
 * Raised when a lookup climbs above the outermost resolver.
 */
export class ParentResolverError extends ConfigurationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details, 'PARENT_RESOLVER');
  }
}

/**
 * Raised for declarations that contradict each other: deep overrides for
 * unknown fields, post-generation declarations shadowing regular ones,
 * `maybe()` branches of different phases.
 */
export class InvalidDeclarationError extends ConfigurationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details, 'INVALID_DECLARATION');
  }
}

// Resolution errors

/**
 * A single generate call could not resolve its attributes.
 * Always raised before the object is instantiated.
 */
export class ResolutionError extends FactoryError {
  constructor(message: string, details?: Record<string, unknown>, code = 'RESOLUTION_ERROR') {
    super(message, { code, details });
  }
}

export class UnknownAttributeError extends ResolutionError {
  constructor(name: string, known: string[]) {
    super(
      `The parameter ${JSON.stringify(name)} is unknown. Declared attributes are ${JSON.stringify(known)}.`,
      { name, known },
      'UNKNOWN_ATTRIBUTE',
    );
  }
}

/**
 * Raised when resolving an attribute requires its own value.
 */
export class CyclicDefinitionError extends ResolutionError {
  constructor(name: string, pending: string[]) {
    super(
      `Cyclic lazy attribute definition for ${JSON.stringify(name)}; cycle found in ${JSON.stringify(pending)}.`,
      { name, pending },
      'CYCLIC_DEFINITION',
    );
  }
}

export class InvalidOverrideError extends ResolutionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details, 'INVALID_OVERRIDE');
  }
}

/**
 * Raised by a non-cycling `iterator()` once every value has been used.
 */
export class IteratorExhaustedError extends ResolutionError {
  constructor(consumed: number) {
    super(
      `Iterator exhausted after ${consumed} value(s); use cycle: true or reset() it.`,
      { consumed },
      'ITERATOR_EXHAUSTED',
    );
  }
}

export class UnknownStrategyError extends FactoryError {
  constructor(strategy: unknown) {
    super(`Unknown strategy: ${String(strategy)}`, {
      code: 'UNKNOWN_STRATEGY',
      details: { strategy },
    });
  }
}
