/**
 * Invocation Stack
 *
 * Scenario ids on the current invoke_scenario call chain.
 */

import { CycleError } from '../errors.js';

export class InvocationStack {
  private readonly frames: string[] = [];

  has(scenarioId: string): boolean {
    return this.frames.includes(scenarioId);
  }

  get depth(): number {
    return this.frames.length;
  }

  /**
   * @throws CycleError if the scenario is already on the chain
   */
  push(scenarioId: string): void {
    if (this.has(scenarioId)) {
      throw new CycleError([...this.frames, scenarioId]);
    }
    this.frames.push(scenarioId);
  }

  pop(scenarioId: string): void {
    const top = this.frames[this.frames.length - 1];
    if (top !== scenarioId) {
      throw new Error(`Invocation stack out of order: expected "${scenarioId}" on top, found "${top ?? '<empty>'}"`);
    }
    this.frames.pop();
  }

  /**
   * Run `fn` with the scenario pushed; it is popped on every exit path.
   */
  async enter<T>(scenarioId: string, fn: () => Promise<T>): Promise<T> {
    this.push(scenarioId);
    try {
      return await fn();
    } finally {
      this.pop(scenarioId);
    }
  }

  toArray(): string[] {
    return [...this.frames];
  }
}
