import {
  ContainerAttribute,
  Dict,
  type FactoryRef,
  Iterator,
  type IteratorOptions,
  LazyAttribute,
  LazyAttributeSequence,
  LazyFunction,
  List,
  Maybe,
  type BaseDeclaration,
  SelfAttribute,
  SKIP,
  Sequence,
  SubFactory,
  Trait,
  Transformer,
  type TransformFn,
} from './declarations';
import type { Strategy } from './enums';
import { type BatchOverrides, Factory } from './Factory';
import type { ModelClass, StubObject } from './FactoryOptions';
import {
  PostGeneration,
  type PostGenerationFunction,
  PostGenerationMethodCall,
  RelatedFactory,
  RelatedFactoryList,
  type RelatedFactoryOptions,
} from './postGeneration';
import type { Resolver } from './Resolver';
import type { Attributes } from './utils';

// Declarations

export const sequence = <V>(fn: (n: number) => V) => new Sequence(fn);

export const lazyFunction = <V>(fn: () => V) => new LazyFunction(fn);

export const lazyAttribute = <V>(fn: (resolver: Resolver) => V) => new LazyAttribute(fn);

export const lazyAttributeSequence = <V>(fn: (resolver: Resolver, n: number) => V) =>
  new LazyAttributeSequence(fn);

export const selfAttribute = (path: string, ...fallback: [value?: unknown]) =>
  new SelfAttribute(path, ...fallback);

export const containerAttribute = <V>(
  fn: (resolver: Resolver, containers: Resolver[]) => V,
  options: { strict?: boolean } = {},
) => new ContainerAttribute(fn, options.strict ?? true);

export const iterator = <E, V = E>(values: Iterable<E>, options?: IteratorOptions<E, V>) =>
  new Iterator(values, options);

export const transformer = <V>(value: unknown, transform: TransformFn<V>) =>
  new Transformer(value, transform);

export const subFactory = (factory: FactoryRef, defaults?: Attributes) =>
  new SubFactory(factory, defaults);

export const dict = (params: Attributes) => new Dict(params);

export const list = (items: unknown[]) => new List(items);

/**
 * Without a `no` value, the attribute is left out when the decider is falsy.
 * An explicit `undefined` is kept.
 */
export const maybe = (
  decider: string | BaseDeclaration,
  yes: unknown,
  ...no: [no?: unknown]
) => new Maybe(decider, yes, no.length > 0 ? no[0] : SKIP);

export const trait = (overrides: Attributes) => new Trait(overrides);

export const relatedFactory = (
  factory: FactoryRef,
  relatedName = '',
  defaults: Attributes = {},
  options: RelatedFactoryOptions = {},
) => new RelatedFactory(factory, relatedName, defaults, options);

export const relatedFactoryList = (
  factory: FactoryRef,
  relatedName = '',
  size: number | (() => number) = 2,
  defaults: Attributes = {},
  options: RelatedFactoryOptions = {},
) => new RelatedFactoryList(factory, relatedName, size, defaults, options);

export const postGeneration = <T = any>(fn: PostGenerationFunction<T>) =>
  new PostGeneration<T>(fn);

export const postGenerationMethodCall = (
  method: string,
  args: unknown[] = [],
  kwargs: Attributes = {},
) => new PostGenerationMethodCall(method, args, kwargs);

// One-shot factories

/**
 * Factory for `model`, extending `base` when given.
 *
 * @example
 * ```typescript
 * const PointFactory = makeFactory(Point, { x: 0, y: sequence((n) => n) });
 * ```
 */
export function makeFactory<T>(
  model: ModelClass<T>,
  declarations: Attributes = {},
  base?: Factory<unknown>,
): Factory<T> {
  const definition = { model, declarations };
  return base ? base.extend<T>(definition) : new Factory<T>(definition);
}

export function build<T>(model: ModelClass<T>, declarations: Attributes = {}): T {
  return makeFactory(model, declarations).build();
}

export function create<T>(model: ModelClass<T>, declarations: Attributes = {}): T {
  return makeFactory(model, declarations).create();
}

export function stub<T>(model: ModelClass<T>, declarations: Attributes = {}): StubObject {
  return makeFactory(model, declarations).stub();
}

export function generate<T>(
  model: ModelClass<T>,
  strategy: Strategy,
  declarations: Attributes = {},
): T | StubObject {
  return makeFactory(model, declarations).generate(strategy);
}

export function simpleGenerate<T>(
  model: ModelClass<T>,
  create: boolean,
  declarations: Attributes = {},
): T {
  return makeFactory(model, declarations).simpleGenerate(create);
}

export function buildBatch<T>(
  model: ModelClass<T>,
  size: number,
  declarations: Attributes = {},
  overrides?: BatchOverrides,
): T[] {
  return makeFactory(model, declarations).buildBatch(size, overrides);
}

export function createBatch<T>(
  model: ModelClass<T>,
  size: number,
  declarations: Attributes = {},
  overrides?: BatchOverrides,
): T[] {
  return makeFactory(model, declarations).createBatch(size, overrides);
}

export function stubBatch<T>(
  model: ModelClass<T>,
  size: number,
  declarations: Attributes = {},
  overrides?: BatchOverrides,
): StubObject[] {
  return makeFactory(model, declarations).stubBatch(size, overrides);
}

export function generateBatch<T>(
  model: ModelClass<T>,
  strategy: Strategy,
  size: number,
  declarations: Attributes = {},
  overrides?: BatchOverrides,
): Array<T | StubObject> {
  return makeFactory(model, declarations).generateBatch(strategy, size, overrides);
}

export function simpleGenerateBatch<T>(
  model: ModelClass<T>,
  create: boolean,
  size: number,
  declarations: Attributes = {},
  overrides?: BatchOverrides,
): T[] {
  return makeFactory(model, declarations).simpleGenerateBatch(create, size, overrides);
}
