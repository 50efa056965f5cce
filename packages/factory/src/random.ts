import { type Faker, faker } from '@faker-js/faker';
import { config } from './config';

/**
 * Seed shared by every faker instance the engine draws values from.
 *
 * Locale instances used by `fake()` register themselves on first use and
 * pick up the current seed.
 *
 * @example
 * ```typescript
 * randomState.reseed(42);
 * const first = UserFactory.build();
 * randomState.reseed(42);
 * UserFactory.resetSequence();
 * UserFactory.build(); // same values as `first`
 * ```
 */
export class RandomState {
  private readonly fakers = new Set<Faker>();
  private seed?: number;

  constructor(fakers: Faker[] = []) {
    for (const instance of fakers) {
      this.fakers.add(instance);
    }
  }

  /**
   * Adds a faker instance, seeding it when a seed is already set.
   */
  register(instance: Faker): Faker {
    if (!this.fakers.has(instance)) {
      this.fakers.add(instance);
      if (this.seed !== undefined) {
        instance.seed(this.seed);
      }
    }
    return instance;
  }

  /** Last seed applied, `undefined` while unseeded */
  get(): number | undefined {
    return this.seed;
  }

  /**
   * Restores a state captured with {@link get}.
   */
  set(seed: number): void {
    this.seed = seed;
    for (const instance of this.fakers) {
      instance.seed(seed);
    }
  }

  /**
   * Seeds every registered instance; draws a fresh seed when none is given.
   *
   * @returns The seed applied
   */
  reseed(seed?: number): number {
    const next = seed ?? faker.number.int({ min: 0, max: 2 ** 31 - 1 });
    this.set(next);
    return next;
  }
}

export const randomState = new RandomState([faker]);

if (config.randomSeed !== undefined) {
  randomState.set(config.randomSeed);
}
