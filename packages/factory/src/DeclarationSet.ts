import {
  ForcedValue,
  Maybe,
  Transformer,
  isDeclaration,
  phaseOf,
} from './declarations';
import { BuilderPhase } from './enums';
import { InvalidDeclarationError } from './errors';
import { type Attributes, joinKey, splitKey } from './utils';

export interface DeclarationEntry {
  name: string;
  declaration: unknown;
  /** Deep overrides routed to this declaration */
  context: Attributes;
}

/**
 * Declarations by name, with the deep overrides aimed at each of them.
 *
 * @example
 * ```typescript
 * const set = new DeclarationSet({ owner: subFactory(UserFactory) });
 * set.update({ owner__firstName: 'Jack' });
 * set.get('owner').context; // { firstName: 'Jack' }
 * ```
 */
export class DeclarationSet {
  private readonly declarations = new Map<string, unknown>();
  private readonly contexts = new Map<string, Attributes>();

  constructor(initial: Attributes = {}) {
    this.update(initial);
  }

  /**
   * Adds or replaces declarations; `root__sub` keys extend the context of
   * `root`, which must then be declared.
   *
   * @throws InvalidDeclarationError for deep overrides of undeclared names
   */
  update(values: Attributes): void {
    for (const [key, value] of Object.entries(values)) {
      const [root, sub] = splitKey(key);
      if (sub === undefined) {
        this.declarations.set(root, value);
        continue;
      }
      const context = this.contexts.get(root) ?? {};
      context[sub] = value;
      this.contexts.set(root, context);
    }

    const unknown = [...this.contexts.keys()].filter(
      (root) => !this.declarations.has(root),
    );
    if (unknown.length > 0) {
      throw new InvalidDeclarationError(
        `Received deep context for unknown fields: ${JSON.stringify(unknown)} (known: ${JSON.stringify(this.names())}).`,
        { unknown, known: this.names() },
      );
    }
  }

  has(name: string): boolean {
    return this.declarations.has(name);
  }

  get(name: string): DeclarationEntry {
    return {
      name,
      declaration: this.declarations.get(name),
      context: { ...this.contexts.get(name) },
    };
  }

  names(): string[] {
    return [...this.declarations.keys()];
  }

  /** Names in declaration-creation order; raw values come first */
  sorted(): string[] {
    const order = (name: string) => {
      const declaration = this.declarations.get(name);
      return isDeclaration(declaration) ? declaration.creationCounter : -1;
    };
    return this.names().sort((a, b) => order(a) - order(b));
  }

  /**
   * Keys of `values` whose root is declared here.
   */
  filter(values: Attributes): string[] {
    return Object.keys(values).filter((key) => this.has(splitKey(key)[0]));
  }

  /** Flat form, `root__sub` keys included; feeds a new set unchanged */
  asRecord(): Attributes {
    const record: Attributes = Object.fromEntries(this.declarations);
    for (const [root, context] of this.contexts) {
      for (const [sub, value] of Object.entries(context)) {
        record[joinKey(root, sub)] = value;
      }
    }
    return record;
  }

  copy(): DeclarationSet {
    return new DeclarationSet(this.asRecord());
  }

  /** Every declared value and deep override */
  *values(): Generator<unknown> {
    yield* this.declarations.values();
    for (const context of this.contexts.values()) {
      yield* Object.values(context);
    }
  }
}

/**
 * Adapts a value replacing an existing pre-instantiation declaration.
 */
function overrideOf(base: DeclarationSet, name: string, value: unknown): unknown {
  if (value instanceof ForcedValue) {
    return value.value;
  }
  if (!base.has(name)) {
    return value;
  }

  const { declaration } = base.get(name);
  if (value instanceof Maybe) {
    return value.withFallback(declaration);
  }
  if (declaration instanceof Transformer) {
    return declaration.withValue(value);
  }
  return value;
}

/**
 * Splits `declarations` into pre- and post-instantiation sets, layered over
 * `basePre` and `basePost`.
 *
 * A raw value given for a post-generation declaration becomes its extracted
 * value (`name__`); deep keys follow their root.
 *
 * @throws InvalidDeclarationError when a post-generation declaration shadows
 * a regular one
 */
export function parseDeclarations(
  declarations: Attributes,
  basePre?: DeclarationSet,
  basePost?: DeclarationSet,
): [DeclarationSet, DeclarationSet] {
  const pre = basePre ? basePre.copy() : new DeclarationSet();
  const post = basePost ? basePost.copy() : new DeclarationSet();

  const extraPost: Attributes = {};
  const extraMaybeNonPost: Attributes = {};

  for (const [key, value] of Object.entries(declarations)) {
    if (phaseOf(value) === BuilderPhase.PostInstantiation) {
      if (pre.has(key)) {
        throw new InvalidDeclarationError(
          `Post-generation declaration ${JSON.stringify(key)} shadows a regular declaration of the same name.`,
          { name: key },
        );
      }
      extraPost[key] =
        value instanceof Maybe && post.has(key)
          ? value.withFallback(post.get(key).declaration)
          : value;
    } else if (post.has(key)) {
      extraPost[joinKey(key, '')] = value;
    } else {
      extraMaybeNonPost[key] = overrideOf(pre, key, value);
    }
  }

  const postRoots = new Set([
    ...post.names(),
    ...Object.keys(extraPost).map((key) => splitKey(key)[0]),
  ]);
  const extraPre: Attributes = {};
  for (const [key, value] of Object.entries(extraMaybeNonPost)) {
    if (postRoots.has(splitKey(key)[0])) {
      extraPost[key] = value;
    } else {
      extraPre[key] = value;
    }
  }

  pre.update(extraPre);
  post.update(extraPost);
  return [pre, post];
}
