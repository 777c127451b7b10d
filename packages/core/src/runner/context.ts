/**
 * Execution Context
 *
 * Parameter store for one scenario invocation. A child context reads through
 * to its parent but writes only to its own layer, so parameters set inside an
 * invoked scenario never leak back to the caller.
 */

import type { ParameterSource, Value } from '../expression/types.js';

/**
 * Options for creating an execution context.
 */
export interface ExecutionContextOptions {
  /** Scenario this context belongs to */
  scenarioId: string;
  /** Read-only view inherited from the invoking scenario */
  parent?: ParameterSource & { snapshot?(): Record<string, Value> };
  /** Initial parameters of the writable layer */
  parameters?: Record<string, Value>;
}

/**
 * Execution context for a scenario invocation.
 */
export class ExecutionContext implements ParameterSource {
  readonly scenarioId: string;
  private readonly parent?: ExecutionContextOptions['parent'];
  private readonly own = new Map<string, Value>();

  constructor(options: ExecutionContextOptions) {
    this.scenarioId = options.scenarioId;
    this.parent = options.parent;
    for (const [name, value] of Object.entries(options.parameters ?? {})) {
      this.own.set(name, value);
    }
  }

  /**
   * Resolve a parameter: own layer first, then the inherited view.
   */
  get(name: string): Value | undefined {
    return this.own.has(name) ? this.own.get(name) : this.parent?.get(name);
  }

  has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  set(name: string, value: Value): void {
    this.own.set(name, value);
  }

  /**
   * Set several parameters at once.
   */
  merge(parameters: Record<string, Value>): void {
    for (const [name, value] of Object.entries(parameters)) {
      this.own.set(name, value);
    }
  }

  /**
   * Create a context for an invoked scenario.
   */
  child(scenarioId: string): ExecutionContext {
    return new ExecutionContext({ scenarioId, parent: this });
  }

  /**
   * Parameters set in this layer.
   */
  ownEntries(): Record<string, Value> {
    return Object.fromEntries(this.own);
  }

  /**
   * Every visible parameter, own values winning over inherited ones.
   */
  snapshot(): Record<string, Value> {
    return { ...(this.parent?.snapshot?.() ?? {}), ...this.ownEntries() };
  }
}
