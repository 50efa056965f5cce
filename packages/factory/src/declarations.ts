import { BuilderPhase } from './enums';
import {
  InvalidDeclarationError,
  IteratorExhaustedError,
  ParentResolverError,
  UnknownAttributeError,
} from './errors';
import type { FactoryOptions } from './FactoryOptions';
import type { Resolver } from './Resolver';
import type { BuildStep } from './StepBuilder';
import {
  type Attributes,
  Lazy,
  isRecord,
  nextCreationCounter,
  readProperty,
} from './utils';

/**
 * Marks a value that must not reach the model, e.g. the "no" branch of a
 * trait that has nothing to fall back to.
 */
export const SKIP: unique symbol = Symbol('fixturekit.skip');

export enum DeclarationKind {
  Sequence = 'sequence',
  LazyFunction = 'lazy_function',
  LazyAttribute = 'lazy_attribute',
  LazyAttributeSequence = 'lazy_attribute_sequence',
  SelfAttribute = 'self_attribute',
  ContainerAttribute = 'container_attribute',
  Iterator = 'iterator',
  Transformer = 'transformer',
  SubFactory = 'sub_factory',
  Dict = 'dict',
  List = 'list',
  Maybe = 'maybe',
  Faker = 'faker',
  RelatedFactory = 'related_factory',
  RelatedFactoryList = 'related_factory_list',
  PostGeneration = 'post_generation',
  PostGenerationMethodCall = 'post_generation_method_call',
}

/**
 * What a declaration sees while it is evaluated.
 */
export interface EvaluationContext {
  /** Resolver of the object being built; reads sibling attributes */
  resolver: Resolver;
  step: BuildStep;
  /** Deep overrides routed to this declaration (`name__sub` as `sub`) */
  extra: Attributes;
}

/**
 * What a post-generation declaration receives besides the instance.
 */
export interface PostGenerationContext {
  /** Whether the caller passed a value under the declaration's own name */
  valueProvided: boolean;
  /** That value, `undefined` when not provided */
  value: unknown;
  /** Every `name__sub` override, keyed by `sub` */
  extra: Attributes;
}

/**
 * Anything exposing factory options: a {@link Factory}, or the container
 * factories.
 */
export interface FactoryLike {
  readonly meta: FactoryOptions;
}

export type FactoryRef = FactoryLike | (() => FactoryLike);

export function toLazyFactory(ref: FactoryRef): Lazy<FactoryLike> {
  return new Lazy(typeof ref === 'function' ? ref : () => ref);
}

/**
 * Base class of every attribute rule.
 *
 * A declaration is created once, when its factory is defined, and never
 * mutated afterwards (iterators excepted); each evaluation returns a fresh
 * value.
 */
export abstract class BaseDeclaration {
  abstract readonly kind: DeclarationKind;

  /**
   * Global ordering stamp; post-generation declarations run in ascending
   * stamp order.
   */
  readonly creationCounter: number;

  /** Values merged under the deep overrides routed to this declaration */
  protected defaults: Attributes = {};

  /**
   * Evaluate declarations found in the deep context before handing it to
   * {@link evaluate}. Factory-like declarations forward it untouched.
   */
  protected unrollContextBeforeEvaluation = true;

  constructor(creationCounter = nextCreationCounter()) {
    this.creationCounter = creationCounter;
  }

  get phase(): BuilderPhase {
    return BuilderPhase.AttributeResolution;
  }

  /** Values held by this declaration that may be declarations themselves */
  children(): unknown[] {
    return Object.values(this.defaults);
  }

  /**
   * Merges the declaration defaults with the deep overrides it received,
   * evaluating nested declarations when needed.
   */
  unrollContext(step: BuildStep, context: Attributes): Attributes {
    const full: Attributes = { ...this.defaults };
    for (const [key, value] of Object.entries(context)) {
      // A trait routed down here falls back to the default it replaces.
      full[key] =
        value instanceof Maybe && key in this.defaults
          ? value.withFallback(this.defaults[key])
          : value;
    }
    if (!this.unrollContextBeforeEvaluation) {
      return full;
    }
    if (!Object.values(full).some(isDeclaration)) {
      return full;
    }
    return step.unroll(full);
  }

  abstract evaluate(context: EvaluationContext): unknown;

  /**
   * Post-instantiation entry point. Only post-generation declarations
   * implement it.
   */
  call(
    _instance: unknown,
    _step: BuildStep,
    _context: PostGenerationContext,
  ): unknown {
    throw new InvalidDeclarationError(
      `A ${this.kind} declaration cannot run after instantiation.`,
      { kind: this.kind },
    );
  }
}

export function isDeclaration(value: unknown): value is BaseDeclaration {
  return value instanceof BaseDeclaration;
}

/**
 * Phase of a declared value; raw values have none.
 */
export function phaseOf(value: unknown): BuilderPhase | undefined {
  return isDeclaration(value) ? value.phase : undefined;
}

// Attribute resolution declarations

export class LazyFunction<V = unknown> extends BaseDeclaration {
  readonly kind = DeclarationKind.LazyFunction;

  constructor(private readonly fn: () => V) {
    super();
  }

  evaluate(): V {
    return this.fn();
  }
}

export class LazyAttribute<V = unknown> extends BaseDeclaration {
  readonly kind = DeclarationKind.LazyAttribute;

  constructor(private readonly fn: (resolver: Resolver) => V) {
    super();
  }

  evaluate({ resolver }: EvaluationContext): V {
    return this.fn(resolver);
  }
}

export class Sequence<V = unknown> extends BaseDeclaration {
  readonly kind = DeclarationKind.Sequence;

  constructor(private readonly fn: (n: number) => V) {
    super();
  }

  evaluate({ step }: EvaluationContext): V {
    return this.fn(step.sequence);
  }
}

export class LazyAttributeSequence<V = unknown> extends BaseDeclaration {
  readonly kind = DeclarationKind.LazyAttributeSequence;

  constructor(private readonly fn: (resolver: Resolver, n: number) => V) {
    super();
  }

  evaluate({ resolver, step }: EvaluationContext): V {
    return this.fn(resolver, step.sequence);
  }
}

const NO_DEFAULT: unique symbol = Symbol('fixturekit.no-default');

/**
 * Reads a dotted path, starting from a resolver or a plain value.
 */
function deepGet(target: unknown, path: string, fallback: unknown): unknown {
  let current = target;
  for (const segment of path.split('.')) {
    if (isResolverLike(current)) {
      if (!current.has(segment)) {
        if (fallback !== NO_DEFAULT) {
          return fallback;
        }
        throw new UnknownAttributeError(segment, current.names());
      }
      current = current.get(segment);
      continue;
    }

    const { found, value } = readProperty(current, segment);
    if (!found) {
      if (fallback !== NO_DEFAULT) {
        return fallback;
      }
      throw new UnknownAttributeError(segment, isRecord(current) ? Object.keys(current) : []);
    }
    current = value;
  }

  if (current === SKIP && fallback !== NO_DEFAULT) {
    return fallback;
  }
  return current;
}

interface ResolverLike {
  has(name: string): boolean;
  get(name: string): unknown;
  names(): string[];
}

function isResolverLike(value: unknown): value is ResolverLike {
  return (
    isRecord(value) &&
    typeof value.has === 'function' &&
    typeof value.get === 'function' &&
    typeof value.names === 'function'
  );
}

/**
 * Copies the value of another attribute.
 *
 * `'name'` and `'.name'` read the current object, `'..name'` the object
 * holding it through a sub-factory, `'...name'` the one above, and so on.
 */
export class SelfAttribute extends BaseDeclaration {
  readonly kind = DeclarationKind.SelfAttribute;
  readonly depth: number;
  readonly attributeName: string;
  private readonly fallback: unknown;

  constructor(readonly path: string, ...fallback: [value?: unknown]) {
    super();
    this.fallback = fallback.length > 0 ? fallback[0] : NO_DEFAULT;
    const stripped = path.replace(/^\.+/, '');
    this.depth = path.length - stripped.length;
    this.attributeName = stripped;
  }

  evaluate({ resolver, step }: EvaluationContext): unknown {
    let target: Resolver = resolver;
    if (this.depth > 1) {
      const chain = step.chain;
      const ancestor = chain[this.depth - 1];
      if (!ancestor) {
        throw new ParentResolverError(
          `Cannot resolve ${JSON.stringify(this.path)}: only ${chain.length} level(s) of factories are available.`,
          { path: this.path, available: chain.length },
        );
      }
      target = ancestor;
    }

    if (!this.attributeName) {
      return target;
    }
    return deepGet(target, this.attributeName, this.fallback);
  }
}

/**
 * Like {@link LazyAttribute}, but also receives the resolvers of the
 * enclosing factories, innermost first.
 */
export class ContainerAttribute<V = unknown> extends BaseDeclaration {
  readonly kind = DeclarationKind.ContainerAttribute;

  constructor(
    private readonly fn: (resolver: Resolver, containers: Resolver[]) => V,
    private readonly strict = true,
  ) {
    super();
  }

  evaluate({ resolver, step }: EvaluationContext): V {
    const containers = step.chain.slice(1);
    if (this.strict && containers.length === 0) {
      throw new ParentResolverError(
        'A strict container attribute can only be used within a sub-factory.',
      );
    }
    return this.fn(resolver, containers);
  }
}

export type IteratorOptions<E, V> = {
  /** Start over once every value has been used, true by default */
  cycle?: boolean;
  /** Maps each produced element to the attribute value */
  getter?: (element: E) => V;
};

/**
 * Hands out the values of an iterable, one per generated object.
 *
 * The cursor belongs to the declaration, so every factory sharing it (its
 * descendants included) advances the same cursor. Values are kept once read,
 * so restarting never re-reads the source.
 */
export class Iterator<E = unknown, V = E> extends BaseDeclaration {
  readonly kind = DeclarationKind.Iterator;
  private source?: globalThis.Iterator<E>;
  private readonly consumed: E[] = [];
  private sourceDone = false;
  private cursor = 0;
  private readonly cycle: boolean;
  private readonly getter?: (element: E) => V;

  constructor(
    private readonly values: Iterable<E>,
    options: IteratorOptions<E, V> = {},
  ) {
    super();
    this.cycle = options.cycle ?? true;
    this.getter = options.getter;
  }

  evaluate(): E | V {
    const element = this.nextElement();
    return this.getter ? this.getter(element) : element;
  }

  /**
   * Rewinds to the first value.
   */
  reset(): void {
    this.cursor = 0;
  }

  private nextElement(): E {
    if (this.cursor < this.consumed.length) {
      return this.consumed[this.cursor++];
    }

    if (!this.sourceDone) {
      this.source ??= this.values[Symbol.iterator]();
      const result = this.source.next();
      if (!result.done) {
        this.consumed.push(result.value);
        this.cursor++;
        return result.value;
      }
      this.sourceDone = true;
    }

    if (this.cycle && this.consumed.length > 0) {
      this.cursor = 1;
      return this.consumed[0];
    }
    throw new IteratorExhaustedError(this.consumed.length);
  }
}

/**
 * Wraps an override so a {@link Transformer} passes it through untouched.
 */
export class ForcedValue {
  constructor(readonly value: unknown) {}
}

// Method syntax keeps the parameter bivariant: callbacks may narrow their input.
export type TransformFn<V> = { transform(value: unknown): V }['transform'];

/**
 * Applies `transform` to the declared value and to any value given for the
 * same attribute at call time.
 *
 * @example
 * ```typescript
 * password: transformer('secret', (raw) => hash(raw)),
 * // UserFactory.build({ password: 'other' }) stores hash('other')
 * // UserFactory.build({ password: Transformer.force('raw') }) stores 'raw'
 * ```
 */
export class Transformer<V = unknown> extends BaseDeclaration {
  readonly kind = DeclarationKind.Transformer;

  constructor(
    readonly value: unknown,
    private readonly transform: TransformFn<V>,
  ) {
    super();
  }

  children(): unknown[] {
    return [this.value];
  }

  static force(value: unknown): ForcedValue {
    return new ForcedValue(value);
  }

  /**
   * Same transform, another input: what a call-time override becomes.
   */
  withValue(value: unknown): Transformer<V> {
    return new Transformer(value, this.transform);
  }

  evaluate(context: EvaluationContext): V {
    const raw = isDeclaration(this.value)
      ? this.value.evaluate({
          ...context,
          extra: this.value.unrollContext(context.step, context.extra),
        })
      : this.value;
    return this.transform(raw);
  }
}

/**
 * Builds a nested object with another factory, using the strategy of the
 * enclosing call.
 */
export class SubFactory extends BaseDeclaration {
  readonly kind = DeclarationKind.SubFactory;
  protected unrollContextBeforeEvaluation = false;
  private readonly factory: Lazy<FactoryLike>;

  constructor(factory: FactoryRef, defaults: Attributes = {}) {
    super();
    this.factory = toLazyFactory(factory);
    this.defaults = defaults;
  }

  getFactory(): FactoryLike {
    return this.factory.get();
  }

  evaluate({ step, extra }: EvaluationContext): unknown {
    return step.recurse(this.getFactory().meta, extra);
  }
}

/**
 * Plain object whose values are themselves declarations.
 * Resolved in a scope of its own: `..name` reaches the enclosing factory.
 */
export class Dict extends BaseDeclaration {
  readonly kind = DeclarationKind.Dict;
  protected unrollContextBeforeEvaluation = false;

  constructor(params: Attributes) {
    super();
    this.defaults = params;
  }

  evaluate({ step, extra }: EvaluationContext): Attributes {
    return step.unroll(extra);
  }
}

/**
 * Array whose items are declarations; `name__1` overrides the second item.
 */
export class List extends BaseDeclaration {
  readonly kind = DeclarationKind.List;
  protected unrollContextBeforeEvaluation = false;

  constructor(items: unknown[]) {
    super();
    this.defaults = Object.fromEntries(
      items.map((item, index) => [String(index), item]),
    );
  }

  evaluate({ step, extra }: EvaluationContext): unknown[] {
    const resolved = step.unroll(extra);
    return Object.keys(resolved)
      .sort((a, b) => Number(a) - Number(b))
      .map((key) => resolved[key]);
  }
}

/**
 * Picks one of two values depending on another attribute.
 *
 * The decider is resolved first; exactly one branch is then evaluated.
 */
export class Maybe extends BaseDeclaration {
  readonly kind = DeclarationKind.Maybe;
  protected unrollContextBeforeEvaluation = false;
  readonly decider: BaseDeclaration;
  private readonly branchPhase: BuilderPhase;

  constructor(
    decider: string | BaseDeclaration,
    readonly yes: unknown,
    readonly no: unknown,
    creationCounter?: number,
  ) {
    super(creationCounter);
    this.decider =
      typeof decider === 'string' ? new SelfAttribute(decider) : decider;

    const phases = new Set(
      [phaseOf(yes), phaseOf(no)].filter(
        (phase): phase is BuilderPhase => phase !== undefined,
      ),
    );
    if (phases.size > 1) {
      throw new InvalidDeclarationError(
        'Inconsistent phases for maybe(): both branches must resolve before instantiation, or both after.',
        { phases: [...phases] },
      );
    }
    this.branchPhase = [...phases][0] ?? BuilderPhase.AttributeResolution;
  }

  get phase(): BuilderPhase {
    return this.branchPhase;
  }

  children(): unknown[] {
    return [this.yes, this.no];
  }

  /**
   * Same decision, with `no` replacing a skipped "no" branch.
   */
  withFallback(no: unknown): Maybe {
    if (this.no !== SKIP) {
      return this;
    }
    return new Maybe(this.decider, this.yes, no, this.creationCounter);
  }

  evaluate(context: EvaluationContext): unknown {
    const target = this.decide(context.resolver, context.step) ? this.yes : this.no;
    if (!isDeclaration(target)) {
      return target;
    }
    return target.evaluate({
      ...context,
      extra: target.unrollContext(context.step, context.extra),
    });
  }

  call(instance: unknown, step: BuildStep, context: PostGenerationContext): unknown {
    const target = this.decide(step.resolver, step) ? this.yes : this.no;
    if (isDeclaration(target)) {
      return target.call(instance, step, {
        ...context,
        extra: target.unrollContext(step, context.extra),
      });
    }
    return target;
  }

  private decide(resolver: Resolver, step: BuildStep): boolean {
    const decision = this.decider.evaluate({
      resolver,
      step,
      extra: {},
    });
    return decision !== SKIP && Boolean(decision);
  }
}

/**
 * Named bundle of overrides, enabled through a boolean parameter of the
 * same name. Only meaningful inside a factory's `params`.
 *
 * @example
 * ```typescript
 * const UserFactory = new Factory({
 *   model: User,
 *   declarations: { role: 'member', active: true },
 *   params: { admin: trait({ role: 'admin' }) },
 * });
 *
 * UserFactory.build({ admin: true }).role; // 'admin'
 * ```
 */
export class Trait {
  constructor(readonly overrides: Attributes) {}

  /**
   * Rewrites every overridden field into a {@link Maybe} deciding on the
   * trait flag, falling back to the current declaration.
   *
   * @param name - The trait flag
   * @param current - Current declaration of a field, {@link SKIP} if none
   */
  asDeclarations(name: string, current: (field: string) => unknown): Attributes {
    const declarations: Attributes = {};
    for (const [field, value] of Object.entries(this.overrides)) {
      // `owner__name` lives one factory down: climb back up to read the flag.
      const levels = field.split('__').length - 1;
      const decider = new SelfAttribute(`${'.'.repeat(levels)}.${name}`, false);
      declarations[field] = new Maybe(decider, value, current(field));
    }
    return declarations;
  }
}
