import {
  BaseDeclaration,
  DeclarationKind,
  type FactoryLike,
  type FactoryRef,
  type PostGenerationContext,
  toLazyFactory,
} from './declarations';
import { BuilderPhase, Strategy } from './enums';
import { InvalidDeclarationError, InvalidOverrideError } from './errors';
import { logger } from './logger';
import type { BuildStep } from './StepBuilder';
import { type Attributes, type Lazy, readProperty } from './utils';

/**
 * Base class of declarations running once the object exists.
 */
export abstract class PostGenerationDeclaration extends BaseDeclaration {
  get phase(): BuilderPhase {
    return BuilderPhase.PostInstantiation;
  }

  evaluate(): never {
    throw new InvalidDeclarationError(
      `A ${this.kind} declaration only runs after instantiation.`,
      { kind: this.kind },
    );
  }

  abstract call(
    instance: unknown,
    step: BuildStep,
    context: PostGenerationContext,
  ): unknown;
}

export type PostGenerationFunction<T = any> = (
  instance: T,
  create: boolean,
  extracted: unknown,
  kwargs: Attributes,
  context: PostGenerationContext,
) => unknown;

/**
 * Runs `fn` on the generated object.
 *
 * @example
 * ```typescript
 * tags: postGeneration((post: Post, create, extracted) => {
 *   if (Array.isArray(extracted)) post.tags.push(...extracted);
 * }),
 * // PostFactory.build({ tags: ['a', 'b'] })
 * ```
 */
export class PostGeneration<T = any> extends PostGenerationDeclaration {
  readonly kind = DeclarationKind.PostGeneration;

  constructor(private readonly fn: PostGenerationFunction<T>) {
    super();
  }

  call(instance: T, step: BuildStep, context: PostGenerationContext): unknown {
    return this.fn(
      instance,
      step.strategy === Strategy.Create,
      context.value,
      context.extra,
      context,
    );
  }
}

export type RelatedFactoryOptions = {
  /** Strategy of the related generation, the enclosing one by default */
  strategy?: Strategy;
};

/**
 * Generates another object once this one exists, pointing back at it
 * through `relatedName`.
 *
 * A call-time value under the declaration's own name replaces the related
 * object and nothing is generated.
 */
export class RelatedFactory extends PostGenerationDeclaration {
  readonly kind: DeclarationKind = DeclarationKind.RelatedFactory;
  protected unrollContextBeforeEvaluation = false;
  private readonly factory: Lazy<FactoryLike>;
  protected readonly strategy?: Strategy;

  constructor(
    factory: FactoryRef,
    readonly relatedName = '',
    defaults: Attributes = {},
    options: RelatedFactoryOptions = {},
  ) {
    super();
    this.factory = toLazyFactory(factory);
    this.defaults = defaults;
    this.strategy = options.strategy;
  }

  getFactory(): FactoryLike {
    return this.factory.get();
  }

  call(instance: unknown, step: BuildStep, context: PostGenerationContext): unknown {
    if (context.valueProvided) {
      logger.debug(
        { related: this.getFactory().meta.name },
        'Related factory skipped: value provided',
      );
      return context.value;
    }
    return this.generateOne(instance, step, context.extra);
  }

  protected generateOne(instance: unknown, step: BuildStep, extra: Attributes): unknown {
    const passed: Attributes = { ...extra };
    if (this.relatedName) {
      passed[this.relatedName] = instance;
    }
    return step.recurse(this.getFactory().meta, passed, this.strategy);
  }
}

/**
 * {@link RelatedFactory} generating `size` objects.
 */
export class RelatedFactoryList extends RelatedFactory {
  readonly kind = DeclarationKind.RelatedFactoryList;

  constructor(
    factory: FactoryRef,
    relatedName = '',
    private readonly size: number | (() => number) = 2,
    defaults: Attributes = {},
    options: RelatedFactoryOptions = {},
  ) {
    super(factory, relatedName, defaults, options);
  }

  call(instance: unknown, step: BuildStep, context: PostGenerationContext): unknown {
    if (context.valueProvided) {
      return context.value;
    }
    const size = typeof this.size === 'function' ? this.size() : this.size;
    return Array.from({ length: size }, () =>
      this.generateOne(instance, step, context.extra),
    );
  }
}

/**
 * Calls a method of the generated object.
 *
 * @example
 * ```typescript
 * password: postGenerationMethodCall('setPassword', ['test-secret']),
 * // UserFactory.build({ password: 'other' }) calls setPassword('other')
 * ```
 */
export class PostGenerationMethodCall extends PostGenerationDeclaration {
  readonly kind = DeclarationKind.PostGenerationMethodCall;

  constructor(
    readonly method: string,
    private readonly args: unknown[] = [],
    kwargs: Attributes = {},
  ) {
    super();
    this.defaults = kwargs;
  }

  call(instance: unknown, _step: BuildStep, context: PostGenerationContext): unknown {
    let args: unknown[] = this.args;
    if (context.valueProvided) {
      if (this.args.length <= 1) {
        args = [context.value];
      } else if (Array.isArray(context.value)) {
        args = context.value;
      } else {
        throw new InvalidOverrideError(
          `${this.method}() takes ${this.args.length} arguments: override it with an array.`,
          { method: this.method, value: context.value },
        );
      }
    }

    const { value: method } = readProperty(instance, this.method);
    if (typeof method !== 'function') {
      throw new InvalidDeclarationError(
        `${this.method} is not a method of the generated object.`,
        { method: this.method },
      );
    }

    const callArgs =
      Object.keys(context.extra).length > 0 ? [...args, context.extra] : args;
    return Reflect.apply(method, instance, callArgs);
  }
}
