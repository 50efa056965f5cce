import { type DeclarationSet, parseDeclarations } from './DeclarationSet';
import { SKIP, isDeclaration } from './declarations';
import { SEQUENCE_OVERRIDE, Strategy, isStrategy } from './enums';
import { InvalidDeclarationError, InvalidOverrideError, UnknownStrategyError } from './errors';
import type { FactoryOptions } from './FactoryOptions';
import { logger } from './logger';
import { Resolver } from './Resolver';
import type { Attributes } from './utils';

/**
 * One object being generated: its sequence number, resolver and the step
 * of the object holding it.
 */
export class BuildStep {
  readonly resolver: Resolver;

  constructor(
    readonly builder: StepBuilder,
    readonly sequence: number,
    declarations: DeclarationSet,
    readonly parent?: BuildStep,
  ) {
    this.resolver = new Resolver(declarations, this);
  }

  get strategy(): Strategy {
    return this.builder.strategy;
  }

  /** This step's resolver followed by every enclosing one, outermost last */
  get chain(): Resolver[] {
    return this.parent ? [this.resolver, ...this.parent.chain] : [this.resolver];
  }

  get depth(): number {
    return this.chain.length;
  }

  /**
   * Resolves `names`, dropping skipped values.
   */
  resolve(names: string[]): Attributes {
    const attributes: Attributes = {};
    for (const name of names) {
      const value = this.resolver.get(name);
      if (value !== SKIP) {
        attributes[name] = value;
      }
    }
    return attributes;
  }

  /**
   * Generates a nested object with another factory, this step as parent.
   */
  recurse(meta: FactoryOptions, extras: Attributes, strategy = this.strategy): unknown {
    return new StepBuilder(meta, extras, strategy).build(this);
  }

  /**
   * Evaluates a plain set of declarations in a scope nested below this one,
   * sharing this step's sequence number.
   */
  unroll(context: Attributes): Attributes {
    const [pre, post] = parseDeclarations(context);
    if (post.names().length > 0) {
      throw new InvalidDeclarationError(
        `Post-generation declarations cannot be nested in a plain container: ${JSON.stringify(post.names())}.`,
        { names: post.names() },
      );
    }
    return new BuildStep(this.builder, this.sequence, pre, this).resolve(pre.names());
  }
}

/**
 * Generates one object from a factory.
 *
 * Goes through merging the call-time overrides, resolving attributes,
 * instantiating with the strategy, then running post-generation
 * declarations.
 */
export class StepBuilder {
  private readonly extras: Attributes;
  private readonly forcedSequence?: number;

  constructor(
    readonly meta: FactoryOptions,
    extras: Attributes,
    readonly strategy: Strategy,
  ) {
    const { [SEQUENCE_OVERRIDE]: forced, ...rest } = extras;
    if (forced !== undefined && typeof forced !== 'number') {
      throw new InvalidOverrideError(`${SEQUENCE_OVERRIDE} must be a number.`, {
        value: forced,
      });
    }
    this.forcedSequence = forced;
    this.extras = rest;
  }

  build(parent?: BuildStep): unknown {
    if (!isStrategy(this.strategy)) {
      throw new UnknownStrategyError(this.strategy);
    }
    this.meta.assertCanGenerate(this.strategy);

    const [pre, post] = parseDeclarations(
      this.extras,
      this.meta.preDeclarations,
      this.meta.postDeclarations,
    );

    const sequence = this.forcedSequence ?? this.meta.nextSequence();
    const step = new BuildStep(this, sequence, pre, parent);
    logger.debug(
      {
        factory: this.meta.name,
        strategy: this.strategy,
        sequence,
        depth: step.depth,
        overrides: Object.keys(this.extras),
      },
      'Generating object',
    );

    const attributes = step.resolve(pre.names());
    const [args, kwargs] = this.meta.prepareArguments(attributes);
    const instance = this.meta.instantiate(this.strategy, args, kwargs);

    const results: Attributes = {};
    for (const name of post.sorted()) {
      const { declaration, context } = post.get(name);
      if (!isDeclaration(declaration)) {
        results[name] = declaration;
        continue;
      }
      const { ['']: value, ...extra } = context;
      logger.debug(
        { factory: this.meta.name, declaration: name, kind: declaration.kind },
        'Running post-generation declaration',
      );
      results[name] = declaration.call(instance, step, {
        valueProvided: '' in context,
        value,
        extra: declaration.unrollContext(step, extra),
      });
    }

    this.meta.afterPostGeneration(instance, this.strategy === Strategy.Create, results);
    return instance;
  }
}
