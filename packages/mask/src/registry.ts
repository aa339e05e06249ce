/**
 * Ordered strategy lookup.
 *
 * The registry is immutable: `register()` returns a new registry and
 * leaves the receiver untouched, so a mask pass that captured a
 * registry keeps seeing exactly the list it started with.
 */

import type { MaskingStrategy } from "./strategies.js";

export class StrategyRegistry {
  private readonly strategies: readonly MaskingStrategy[];

  constructor(strategies: Iterable<MaskingStrategy> = []) {
    this.strategies = Object.freeze([...strategies]);
  }

  /** Frozen snapshot in registration order. */
  get list(): readonly MaskingStrategy[] {
    return this.strategies;
  }

  get size(): number {
    return this.strategies.length;
  }

  /**
   * First registered strategy whose `matches` accepts the field name.
   * Earlier registrations win when several could apply.
   */
  find(fieldName: string): MaskingStrategy | undefined {
    for (const strategy of this.strategies) {
      if (strategy.matches(fieldName)) return strategy;
    }
    return undefined;
  }

  /** Copy-on-write append. */
  register(strategy: MaskingStrategy): StrategyRegistry {
    return new StrategyRegistry([...this.strategies, strategy]);
  }
}
