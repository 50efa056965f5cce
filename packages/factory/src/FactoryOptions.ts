import { DeclarationSet, parseDeclarations } from './DeclarationSet';
import { BaseDeclaration, Iterator, SKIP, Trait } from './declarations';
import { Strategy, isStrategy } from './enums';
import {
  AbstractFactoryError,
  InvalidDeclarationError,
  SequenceResetError,
  UnknownAttributeError,
  UnknownStrategyError,
} from './errors';
import { type SequenceRegistry, type SequenceRoot, defaultSequenceRegistry } from './sequences';
import { type Attributes, Lazy, readProperty, splitKey } from './utils';

// Any model constructor, whatever its parameters.
export type ModelClass<T = unknown> = new (...args: any[]) => T;

/** A model class, or a `lazy()` cell resolving to one */
export type ModelRef<T = unknown> = ModelClass<T> | Lazy<ModelClass<T>>;

/**
 * What construction and persistence hooks receive.
 */
export interface BuildTarget {
  /** Name of the factory generating the object */
  readonly factory: string;
  /** Positional arguments, from `inlineArgs` */
  readonly args: unknown[];
  readonly kwargs: Attributes;
  /**
   * @throws AbstractFactoryError when no model is declared
   */
  model(): ModelClass;
  /**
   * What the hook replaces would do: `new Model(...)` for `construct`, the
   * factory's construction for `persist`.
   */
  build(): unknown;
}

/**
 * Overridable steps of a factory; each is inherited by `extend()` unless
 * redeclared.
 */
export interface FactoryHooks<T = unknown> {
  /** Builds the object, `new Model(...args, kwargs)` by default */
  construct?(target: BuildTarget): T;
  /** Builds and stores the object; by default constructs then calls `save()` */
  persist?(target: BuildTarget): T;
  /** First sequence number of the factory's counter, 0 by default */
  setupNextSequence?(): number;
  /** Last chance to rewrite the resolved attributes */
  adjustKwargs?(kwargs: Attributes): Attributes;
  /** Receives the post-generation results by declaration name */
  afterPostGeneration?(instance: T, create: boolean, results: Attributes): void;
}

export interface FactoryDefinition<T = unknown> extends FactoryHooks<T> {
  /** Used in logs and errors; derived from the model by default */
  name?: string;
  model?: ModelRef<T>;
  /** Abstract factories only serve as a base for `extend()` */
  abstract?: boolean;
  /** Strategy of `make()`, build by default */
  strategy?: Strategy;
  declarations?: Attributes;
  /** Traits and parameters: available to declarations, never passed to the model */
  params?: Attributes;
  /** Attributes resolved but not passed to the model */
  exclude?: string[];
  /** Attribute name to model argument name */
  rename?: Record<string, string>;
  /** Attributes passed as positional arguments, in this order */
  inlineArgs?: string[];
  /** Registry holding the sequence counter, the process-wide one by default */
  sequences?: SequenceRegistry;
}

type HookName = keyof FactoryHooks;

/**
 * Resolved metadata of a factory: its definition merged with every
 * ancestor's.
 */
export class FactoryOptions implements SequenceRoot {
  readonly name: string;
  readonly abstract: boolean;
  readonly strategy: Strategy;
  readonly exclude: readonly string[];
  readonly rename: Readonly<Record<string, string>>;
  readonly inlineArgs: readonly string[];
  readonly sequences: SequenceRegistry;
  /** Simple parameters and traits, ancestors' included */
  readonly parameters: Attributes;
  readonly preDeclarations: DeclarationSet;
  readonly postDeclarations: DeclarationSet;

  /** Declarations before traits are applied; what children extend */
  private readonly basePre: DeclarationSet;
  private readonly basePost: DeclarationSet;
  private readonly model?: Lazy<ModelClass>;

  constructor(
    private readonly definition: FactoryDefinition = {},
    readonly parent?: FactoryOptions,
  ) {
    for (const [name, value] of Object.entries(definition.declarations ?? {})) {
      if (value instanceof Trait) {
        throw new InvalidDeclarationError(
          `Trait ${JSON.stringify(name)} must be declared in params.`,
          { name },
        );
      }
    }

    const strategy = definition.strategy ?? parent?.strategy ?? Strategy.Build;
    if (!isStrategy(strategy)) {
      throw new UnknownStrategyError(strategy);
    }
    this.strategy = strategy;

    const model = definition.model;
    this.model =
      model === undefined
        ? parent?.model
        : new Lazy(() => (model instanceof Lazy ? model.get() : model));

    const ownsModel = model !== undefined || definition.construct !== undefined;
    this.abstract = definition.abstract ?? (ownsModel ? false : (parent?.abstract ?? false));
    this.name =
      definition.name ??
      (typeof model === 'function' ? `${model.name}Factory` : (parent?.name ?? 'Factory'));

    this.exclude = definition.exclude ?? parent?.exclude ?? [];
    this.rename = definition.rename ?? parent?.rename ?? {};
    this.inlineArgs = definition.inlineArgs ?? parent?.inlineArgs ?? [];
    this.sequences = definition.sequences ?? parent?.sequences ?? defaultSequenceRegistry;

    [this.basePre, this.basePost] = parseDeclarations(
      definition.declarations ?? {},
      parent?.basePre,
      parent?.basePost,
    );
    this.parameters = { ...parent?.parameters, ...definition.params };
    [this.preDeclarations, this.postDeclarations] = parseDeclarations(
      this.parameterDeclarations(),
      this.basePre,
      this.basePost,
    );
  }

  /**
   * Turns parameters into declarations; each trait wraps the fields it
   * overrides.
   */
  private parameterDeclarations(): Attributes {
    const extra: Attributes = {};
    const current = (field: string): unknown => {
      if (field in extra) {
        return extra[field];
      }
      const [root, sub] = splitKey(field);
      for (const set of [this.basePre, this.basePost]) {
        if (!set.has(root)) {
          continue;
        }
        const { declaration, context } = set.get(root);
        if (sub === undefined) {
          return declaration;
        }
        return sub in context ? context[sub] : SKIP;
      }
      return SKIP;
    };

    for (const [name, value] of Object.entries(this.parameters)) {
      if (value instanceof Trait) {
        Object.assign(extra, value.asDeclarations(name, current));
      } else {
        extra[name] = value;
      }
    }
    return extra;
  }

  /** Model class, resolving a `lazy()` reference on first call */
  getModel(): ModelClass | undefined {
    return this.model?.get();
  }

  /**
   * Nearest definition, this one or an ancestor's, declaring `hook`.
   */
  private findHook(hook: HookName): FactoryHooks | undefined {
    if (this.definition[hook] !== undefined) {
      return this.definition;
    }
    return this.parent?.findHook(hook);
  }

  /** Whether build and create have nothing to instantiate */
  get isImplicitlyAbstract(): boolean {
    return this.model === undefined && this.findHook('construct') === undefined;
  }

  /**
   * @throws AbstractFactoryError for abstract factories, and for
   * build or create without a model
   */
  assertCanGenerate(strategy: Strategy): void {
    if (this.abstract || (strategy !== Strategy.Stub && this.isImplicitlyAbstract)) {
      throw new AbstractFactoryError(this.name);
    }
  }

  // Sequences

  /**
   * Factory owning the counter: the root of the chain of ancestors building
   * the same model, or a parent class of it.
   */
  get counterReference(): FactoryOptions {
    if (!this.parent) {
      return this;
    }
    const model = this.getModel();
    const parentModel = this.parent.getModel();
    if (
      model &&
      parentModel &&
      (model === parentModel || model.prototype instanceof parentModel)
    ) {
      return this.parent.counterReference;
    }
    return this;
  }

  setupNextSequence(): number {
    const owner = this.findHook('setupNextSequence');
    if (owner?.setupNextSequence) {
      return owner.setupNextSequence();
    }
    return 0;
  }

  nextSequence(): number {
    const root = this.counterReference;
    return root.sequences.next(root);
  }

  /**
   * @throws SequenceResetError when this factory borrows its counter,
   * unless `force` is set
   */
  resetSequence(value?: number, force = false): void {
    const root = this.counterReference;
    if (root !== this && !force) {
      throw new SequenceResetError(this.name, root.name);
    }
    root.sequences.reset(root, value);
  }

  /**
   * Rewinds every iterator declared, in traits and deep overrides included.
   */
  resetIterators(): void {
    const visit = (value: unknown): void => {
      if (value instanceof Iterator) {
        value.reset();
      }
      if (value instanceof BaseDeclaration) {
        value.children().forEach(visit);
      }
    };
    for (const set of [this.preDeclarations, this.postDeclarations]) {
      for (const value of set.values()) {
        visit(value);
      }
    }
  }

  // Instantiation

  /**
   * Turns resolved attributes into constructor arguments.
   */
  prepareArguments(attributes: Attributes): [unknown[], Attributes] {
    const owner = this.findHook('adjustKwargs');
    const adjusted = owner?.adjustKwargs
      ? owner.adjustKwargs({ ...attributes })
      : { ...attributes };

    const kwargs: Attributes = {};
    for (const [key, value] of Object.entries(adjusted)) {
      if (this.exclude.includes(key) || key in this.parameters || value === SKIP) {
        continue;
      }
      kwargs[this.rename[key] ?? key] = value;
    }

    const args = this.inlineArgs.map((name) => {
      if (!(name in kwargs)) {
        throw new UnknownAttributeError(name, Object.keys(kwargs));
      }
      const value = kwargs[name];
      delete kwargs[name];
      return value;
    });

    return [args, kwargs];
  }

  private requireModel(): ModelClass {
    const model = this.getModel();
    if (!model) {
      throw new AbstractFactoryError(this.name);
    }
    return model;
  }

  private target(args: unknown[], kwargs: Attributes, build: () => unknown): BuildTarget {
    return {
      factory: this.name,
      args,
      kwargs,
      model: () => this.requireModel(),
      build,
    };
  }

  construct(args: unknown[], kwargs: Attributes): unknown {
    const target = this.target(args, kwargs, () => {
      const model = this.requireModel();
      if (args.length > 0 && Object.keys(kwargs).length === 0) {
        return new model(...args);
      }
      return new model(...args, kwargs);
    });

    const owner = this.findHook('construct');
    if (owner?.construct) {
      return owner.construct(target);
    }
    return target.build();
  }

  persist(args: unknown[], kwargs: Attributes): unknown {
    const target = this.target(args, kwargs, () => this.construct(args, kwargs));

    const owner = this.findHook('persist');
    if (owner?.persist) {
      return owner.persist(target);
    }

    const instance = target.build();
    const { value: save } = readProperty(instance, 'save');
    if (typeof save === 'function') {
      Reflect.apply(save, instance, []);
    }
    return instance;
  }

  instantiate(strategy: Strategy, args: unknown[], kwargs: Attributes): unknown {
    switch (strategy) {
      case Strategy.Build:
        return this.construct(args, kwargs);
      case Strategy.Create:
        return this.persist(args, kwargs);
      case Strategy.Stub:
        return new StubObject(kwargs);
      default:
        throw new UnknownStrategyError(strategy);
    }
  }

  afterPostGeneration(instance: unknown, create: boolean, results: Attributes): void {
    const owner = this.findHook('afterPostGeneration');
    if (owner?.afterPostGeneration) {
      owner.afterPostGeneration(instance, create, results);
    }
  }
}

/**
 * Plain holder of resolved attributes, what the stub strategy returns.
 */
export class StubObject {
  [attribute: string]: unknown;

  constructor(attributes: Attributes) {
    Object.assign(this, attributes);
  }
}
