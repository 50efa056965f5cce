export { DeclarationSet, parseDeclarations } from './DeclarationSet';
export type { DeclarationEntry } from './DeclarationSet';
export {
  BaseDeclaration,
  ContainerAttribute,
  DeclarationKind,
  Dict,
  ForcedValue,
  Iterator,
  LazyAttribute,
  LazyAttributeSequence,
  LazyFunction,
  List,
  Maybe,
  SelfAttribute,
  Sequence,
  SKIP,
  SubFactory,
  Trait,
  Transformer,
  isDeclaration,
} from './declarations';
export type {
  EvaluationContext,
  FactoryLike,
  FactoryRef,
  IteratorOptions,
  PostGenerationContext,
  TransformFn,
} from './declarations';
export { BuilderPhase, Strategy } from './enums';
export {
  AbstractFactoryError,
  ConfigurationError,
  CyclicDefinitionError,
  FactoryError,
  InvalidDeclarationError,
  InvalidOverrideError,
  IteratorExhaustedError,
  ParentResolverError,
  ResolutionError,
  SequenceResetError,
  UnknownAttributeError,
  UnknownStrategyError,
} from './errors';
export { DictFactory, Factory, ListFactory } from './Factory';
export type { BatchOverrides, ResetSequenceOptions } from './Factory';
export { FactoryOptions, StubObject } from './FactoryOptions';
export type {
  BuildTarget,
  FactoryDefinition,
  FactoryHooks,
  ModelClass,
  ModelRef,
} from './FactoryOptions';
export { Faker, fake, fakerFor } from './faker';
export * from './helpers';
export { config, parseConfig } from './config';
export type { FactoryConfig } from './config';
export { debug, logger } from './logger';
export {
  PostGeneration,
  PostGenerationDeclaration,
  PostGenerationMethodCall,
  RelatedFactory,
  RelatedFactoryList,
} from './postGeneration';
export type {
  PostGenerationFunction,
  RelatedFactoryOptions,
} from './postGeneration';
export { RandomState, randomState } from './random';
export { Resolver } from './Resolver';
export { SequenceCounter, SequenceRegistry, defaultSequenceRegistry } from './sequences';
export type { SequenceRoot } from './sequences';
export { BuildStep, StepBuilder } from './StepBuilder';
export { Lazy, lazy } from './utils';
export type { Attributes } from './utils';
