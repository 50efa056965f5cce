import { SPLITTER } from './enums';

export type Attributes = Record<string, unknown>;

/**
 * Splits a declaration name into its root and the sub-key it forwards.
 *
 * @example
 * ```typescript
 * splitKey('owner');               // ['owner', undefined]
 * splitKey('owner__name');         // ['owner', 'name']
 * splitKey('owner__address__city'); // ['owner', 'address__city']
 * splitKey('tags__');              // ['tags', '']
 * ```
 */
export function splitKey(entry: string): [string, string | undefined] {
  const index = entry.indexOf(SPLITTER);
  if (index === -1) {
    return [entry, undefined];
  }
  return [entry.slice(0, index), entry.slice(index + SPLITTER.length)];
}

/** Inverse of {@link splitKey}: `joinKey(...splitKey(x)) === x` */
export function joinKey(root: string, sub: string | undefined): string {
  if (sub === undefined) {
    return root;
  }
  return `${root}${SPLITTER}${sub}`;
}

/**
 * Collects every `prefix__key` entry of `values` as `key`.
 */
export function extractPrefixed(prefix: string, values: Attributes): Attributes {
  const fullPrefix = `${prefix}${SPLITTER}`;
  const extracted: Attributes = {};
  for (const [key, value] of Object.entries(values)) {
    if (key.startsWith(fullPrefix)) {
      extracted[key.slice(fullPrefix.length)] = value;
    }
  }
  return extracted;
}

let creationCounter = 0;

/**
 * Global, strictly increasing stamp. Declarations take one when constructed
 * so post-generation hooks run in the order they were written.
 */
export function nextCreationCounter(): number {
  return creationCounter++;
}

/**
 * Write-once cell computing its value on first access. Lets factories and
 * models refer to each other before both are defined.
 *
 * @example
 * ```typescript
 * const ParentFactory = new Factory({
 *   model: Node,
 *   declarations: { child: subFactory(() => ChildFactory) },
 * });
 * ```
 */
export class Lazy<T> {
  private cell?: { value: T };

  constructor(private readonly init: () => T) {}

  get(): T {
    if (!this.cell) {
      this.cell = { value: this.init() };
    }
    return this.cell.value;
  }
}

export function lazy<T>(init: () => T): Lazy<T> {
  return new Lazy(init);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Reads `name` from `target`, or `undefined` with `found: false` when it
 * doesn't exist.
 */
export function readProperty(
  target: unknown,
  name: string,
): { found: boolean; value?: unknown } {
  if (!isRecord(target) && typeof target !== 'function') {
    return { found: false };
  }
  if (!(name in Object(target))) {
    return { found: false };
  }
  return { found: true, value: Reflect.get(Object(target), name) };
}
