/**
 * Counter handing out consecutive integers.
 *
 * @example
 * ```typescript
 * const counter = new SequenceCounter(100);
 * counter.next(); // 100
 * counter.next(); // 101
 * counter.peek(); // 102
 * counter.reset(7);
 * counter.next(); // 7
 * ```
 */
export class SequenceCounter {
  constructor(private value = 0) {}

  /**
   * Returns the current value and advances the counter.
   */
  next(): number {
    // Single-threaded event loop: read-then-increment cannot interleave.
    return this.value++;
  }

  /** The value the next call to {@link next} will return */
  peek(): number {
    return this.value;
  }

  reset(value = 0): void {
    this.value = value;
  }
}

/**
 * Owner of a shared counter: the factory at the top of a chain of factories
 * building the same model.
 */
export interface SequenceRoot {
  readonly name: string;
  /** Initial value of the counter, called once on first use */
  setupNextSequence(): number;
}

/**
 * Holds one counter per sequence root.
 *
 * There is no synchronization: worker threads sharing a registry must
 * serialize their generate calls, or give each worker its own registry.
 *
 * @example
 * ```typescript
 * const registry = new SequenceRegistry();
 * const UserFactory = new Factory({ model: User, sequences: registry, ... });
 *
 * afterEach(() => registry.clear());
 * ```
 */
export class SequenceRegistry {
  private readonly counters = new Map<SequenceRoot, SequenceCounter>();

  /**
   * Counter of `root`, created from `root.setupNextSequence()` on first use.
   */
  counterFor(root: SequenceRoot): SequenceCounter {
    let counter = this.counters.get(root);
    if (!counter) {
      counter = new SequenceCounter(root.setupNextSequence());
      this.counters.set(root, counter);
    }
    return counter;
  }

  next(root: SequenceRoot): number {
    return this.counterFor(root).next();
  }

  /**
   * Resets the counter of `root`. Without a value, the root computes a fresh
   * starting point.
   */
  reset(root: SequenceRoot, value?: number): void {
    const next = value ?? root.setupNextSequence();
    const counter = this.counters.get(root);
    if (counter) {
      counter.reset(next);
    } else {
      this.counters.set(root, new SequenceCounter(next));
    }
  }

  /** Whether `root` has used its counter yet */
  has(root: SequenceRoot): boolean {
    return this.counters.has(root);
  }

  /**
   * Forgets every counter; each root starts over from its initial value.
   */
  clear(): void {
    this.counters.clear();
  }
}

/** Process-wide registry used by factories that don't bring their own */
export const defaultSequenceRegistry = new SequenceRegistry();
