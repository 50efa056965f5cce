import type { FactoryLike } from './declarations';
import { Strategy } from './enums';
import { FactoryError, UnknownStrategyError } from './errors';
import {
  type FactoryDefinition,
  FactoryOptions,
  StubObject,
} from './FactoryOptions';
import { StepBuilder } from './StepBuilder';
import type { Attributes } from './utils';

/**
 * Overrides of a batch call: the same for every object, or computed from
 * the object's index.
 */
export type BatchOverrides = Attributes | ((index: number) => Attributes);

export type ResetSequenceOptions = {
  /** Reset the shared counter from a factory that doesn't own it */
  force?: boolean;
};

/**
 * Generates objects of type `T` from a set of declarations.
 *
 * @template T - Type of the objects built and created
 *
 * @example
 * ```typescript
 * const UserFactory = new Factory<User>({
 *   model: User,
 *   declarations: {
 *     username: sequence((n) => `user${n}`),
 *     email: lazyAttribute((o) => `${o.get('username')}@example.com`),
 *   },
 * });
 *
 * const AdminFactory = UserFactory.extend({ declarations: { role: 'admin' } });
 *
 * UserFactory.build().email;             // 'user0@example.com'
 * AdminFactory.build({ username: 'root' }); // shares UserFactory's counter
 * ```
 */
export class Factory<T = unknown> implements FactoryLike {
  readonly meta: FactoryOptions;

  constructor(definition: FactoryDefinition<T> = {}, parent?: FactoryLike) {
    this.meta = new FactoryOptions(definition, parent?.meta);
  }

  get name(): string {
    return this.meta.name;
  }

  /**
   * Child factory inheriting every declaration, parameter and hook.
   */
  extend<U = T>(definition: FactoryDefinition<U> = {}): Factory<U> {
    return new Factory<U>(definition, this);
  }

  private run(strategy: Strategy, overrides: Attributes): unknown {
    return new StepBuilder(this.meta, overrides, strategy).build();
  }

  /** Object built in memory */
  build(overrides: Attributes = {}): T {
    // Hooks and model are declared for T; the engine itself is untyped.
    return this.run(Strategy.Build, overrides) as T;
  }

  /** Object built, then persisted */
  create(overrides: Attributes = {}): T {
    return this.run(Strategy.Create, overrides) as T;
  }

  stub(overrides: Attributes = {}): StubObject {
    const stub = this.run(Strategy.Stub, overrides);
    if (!(stub instanceof StubObject)) {
      throw new FactoryError(`${this.name} returned a non-stub object from the stub strategy.`);
    }
    return stub;
  }

  /**
   * @throws UnknownStrategyError when `strategy` is none of build, create or stub
   */
  generate(strategy: Strategy, overrides: Attributes = {}): T | StubObject {
    switch (strategy) {
      case Strategy.Build:
        return this.build(overrides);
      case Strategy.Create:
        return this.create(overrides);
      case Strategy.Stub:
        return this.stub(overrides);
      default:
        throw new UnknownStrategyError(strategy);
    }
  }

  /** Object generated with the factory's default strategy */
  make(overrides: Attributes = {}): T | StubObject {
    return this.generate(this.meta.strategy, overrides);
  }

  /**
   * Create when `create` is true, build otherwise.
   */
  simpleGenerate(create: boolean, overrides: Attributes = {}): T {
    return create ? this.create(overrides) : this.build(overrides);
  }

  // Batches

  buildBatch(size: number, overrides: BatchOverrides = {}): T[] {
    return batch(size, overrides, (attrs) => this.build(attrs));
  }

  /**
   * @example
   * ```typescript
   * UserFactory.createBatch(3, (i) => ({ username: `member${i}` }));
   * ```
   */
  createBatch(size: number, overrides: BatchOverrides = {}): T[] {
    return batch(size, overrides, (attrs) => this.create(attrs));
  }

  stubBatch(size: number, overrides: BatchOverrides = {}): StubObject[] {
    return batch(size, overrides, (attrs) => this.stub(attrs));
  }

  generateBatch(
    strategy: Strategy,
    size: number,
    overrides: BatchOverrides = {},
  ): Array<T | StubObject> {
    return batch(size, overrides, (attrs) => this.generate(strategy, attrs));
  }

  makeBatch(size: number, overrides: BatchOverrides = {}): Array<T | StubObject> {
    return this.generateBatch(this.meta.strategy, size, overrides);
  }

  simpleGenerateBatch(create: boolean, size: number, overrides: BatchOverrides = {}): T[] {
    return batch(size, overrides, (attrs) => this.simpleGenerate(create, attrs));
  }

  // Counters

  /**
   * Restarts the sequence counter, at `value` or at the factory's initial
   * value.
   *
   * @throws SequenceResetError on a factory sharing an ancestor's counter,
   * unless `force` is set; the ancestor's counter is then reset
   */
  resetSequence(value?: number, options: ResetSequenceOptions = {}): void {
    this.meta.resetSequence(value, options.force);
  }

  /** Rewinds every `iterator()` declaration of this factory */
  resetIterators(): void {
    this.meta.resetIterators();
  }
}

function batch<R>(
  size: number,
  overrides: BatchOverrides,
  generate: (attrs: Attributes) => R,
): R[] {
  return Array.from({ length: size }, (_, index) =>
    generate(typeof overrides === 'function' ? overrides(index) : overrides),
  );
}

/**
 * Builds plain objects out of declarations.
 *
 * @example
 * ```typescript
 * DictFactory.build({ id: sequence((n) => n), label: 'x' }); // { id: 0, label: 'x' }
 * ```
 */
export const DictFactory = new Factory<Attributes>({
  name: 'DictFactory',
  construct: ({ kwargs }) => ({ ...kwargs }),
});

/**
 * Builds arrays out of declarations keyed by index.
 *
 * @example
 * ```typescript
 * ListFactory.build({ 0: 'a', 1: sequence((n) => n) }); // ['a', 0]
 * ```
 */
export const ListFactory = new Factory<unknown[]>({
  name: 'ListFactory',
  construct: ({ kwargs }) =>
    Object.keys(kwargs)
      .sort((a, b) => Number(a) - Number(b))
      .map((key) => kwargs[key]),
});
