/**
 * How a factory turns resolved attributes into an object.
 */
export enum Strategy {
  /** Construct the model in memory */
  Build = 'build',
  /** Construct the model, then persist it through the factory's hook */
  Create = 'create',
  /** Return a {@link StubObject} holding the attributes; no model involved */
  Stub = 'stub',
}

/**
 * When a declaration is evaluated relative to instantiation.
 */
export enum BuilderPhase {
  AttributeResolution = 'attribute_resolution',
  PostInstantiation = 'post_instantiation',
}

/** Separates a declaration name from the sub-key it forwards to, `owner__name` */
export const SPLITTER = '__';

/** Override key that forces the sequence number of a single call */
export const SEQUENCE_OVERRIDE = '__sequence';

export function isStrategy(value: unknown): value is Strategy {
  return (
    value === Strategy.Build ||
    value === Strategy.Create ||
    value === Strategy.Stub
  );
}
