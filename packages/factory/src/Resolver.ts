import type { DeclarationSet } from './DeclarationSet';
import { isDeclaration } from './declarations';
import { BuilderPhase } from './enums';
import { CyclicDefinitionError, UnknownAttributeError } from './errors';
import { logger } from './logger';
import type { BuildStep } from './StepBuilder';

/**
 * Resolves the attributes of one object being generated.
 *
 * Each attribute is evaluated at most once per call, on first read;
 * declarations read their siblings through {@link get}.
 *
 * @example
 * ```typescript
 * email: lazyAttribute((o) => `${o.get('username')}@example.com`),
 * ownerName: lazyAttribute((o) => o.parent?.get('name')),
 * ```
 */
export class Resolver {
  private readonly values = new Map<string, unknown>();
  private readonly pending: string[] = [];

  constructor(
    private readonly declarations: DeclarationSet,
    readonly step: BuildStep,
  ) {}

  /** Sequence number of the current call */
  get sequence(): number {
    return this.step.sequence;
  }

  /** Resolver of the object holding this one, through a sub-factory */
  get parent(): Resolver | undefined {
    return this.step.parent?.resolver;
  }

  has(name: string): boolean {
    return this.declarations.has(name);
  }

  names(): string[] {
    return this.declarations.names();
  }

  /**
   * Value of `name`, evaluating its declaration on first access.
   *
   * @throws CyclicDefinitionError when `name` is needed to compute itself
   * @throws UnknownAttributeError when nothing declares `name`
   */
  get(name: string): unknown {
    if (this.pending.includes(name)) {
      throw new CyclicDefinitionError(name, [...this.pending]);
    }
    if (this.values.has(name)) {
      return this.values.get(name);
    }
    if (!this.declarations.has(name)) {
      throw new UnknownAttributeError(name, this.names());
    }

    const { declaration, context } = this.declarations.get(name);
    let value = declaration;
    if (
      isDeclaration(declaration) &&
      declaration.phase === BuilderPhase.AttributeResolution
    ) {
      logger.trace({ attribute: name, kind: declaration.kind }, 'Resolving attribute');
      this.pending.push(name);
      try {
        value = declaration.evaluate({
          resolver: this,
          step: this.step,
          extra: declaration.unrollContext(this.step, context),
        });
      } finally {
        this.pending.pop();
      }
    }

    this.values.set(name, value);
    return value;
  }
}
