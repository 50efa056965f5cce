import { type Faker as FakerInstance, allFakers, faker } from '@faker-js/faker';
import { BaseDeclaration, DeclarationKind, type EvaluationContext } from './declarations';
import { InvalidDeclarationError } from './errors';
import { randomState } from './random';
import { readProperty } from './utils';

const localeFakers = new Map<string, FakerInstance>(Object.entries(allFakers));

/**
 * Faker instance for `locale`, registered with the random state so seeding
 * reaches it.
 */
export function fakerFor(locale?: string): FakerInstance {
  if (locale === undefined) {
    return faker;
  }
  const instance = localeFakers.get(locale);
  if (!instance) {
    throw new InvalidDeclarationError(`Unknown faker locale ${JSON.stringify(locale)}.`, {
      locale,
      available: [...localeFakers.keys()],
    });
  }
  return randomState.register(instance);
}

/**
 * Draws a value from a `@faker-js/faker` method.
 *
 * `name__locale` selects a locale at call time; any other `name__key` is
 * merged into the options object passed as first argument.
 */
export class Faker extends BaseDeclaration {
  readonly kind = DeclarationKind.Faker;
  private readonly args: unknown[];

  constructor(
    readonly provider: string,
    args: unknown[] = [],
    private readonly locale?: string,
  ) {
    super();
    const [first, ...rest] = args;
    if (isOptions(first)) {
      this.defaults = first;
      this.args = rest;
    } else {
      this.args = args;
    }
  }

  evaluate({ extra }: EvaluationContext): unknown {
    const { locale, ...options } = extra;
    const instance = fakerFor(typeof locale === 'string' ? locale : this.locale);

    let owner: unknown = instance;
    let method: unknown = instance;
    for (const segment of this.provider.split('.')) {
      owner = method;
      const { found, value } = readProperty(method, segment);
      if (!found) {
        throw new InvalidDeclarationError(
          `Unknown faker provider ${JSON.stringify(this.provider)}.`,
          { provider: this.provider },
        );
      }
      method = value;
    }

    if (typeof method !== 'function') {
      throw new InvalidDeclarationError(
        `Faker provider ${JSON.stringify(this.provider)} is not a method.`,
        { provider: this.provider },
      );
    }

    const args = Object.keys(options).length > 0 ? [options, ...this.args] : this.args;
    return Reflect.apply(method, owner, args);
  }
}

function isOptions(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

/**
 * @example
 * ```typescript
 * declarations: {
 *   firstName: fake('person.firstName'),
 *   age: fake('number.int', { min: 18, max: 99 }),
 * }
 * // UserFactory.build({ age__max: 30 })
 * ```
 */
export function fake(provider: string, ...args: unknown[]): Faker {
  return new Faker(provider, args);
}

/** {@link fake} drawing from a locale instance, e.g. `'fr'` or `'de_CH'` */
fake.locale = (locale: string, provider: string, ...args: unknown[]): Faker =>
  new Faker(provider, args, locale);
