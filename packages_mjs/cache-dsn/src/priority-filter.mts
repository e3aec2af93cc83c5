/**
 * Inclusive [min, max] priority acceptance for SRV targets
 */

import { DEFAULT_PRIORITY_FILTER, validatePriorityFilter } from './config.mjs';
import type { PriorityFilterSpec } from './types.mjs';

export class PriorityFilter {
  readonly spec: PriorityFilterSpec;

  /**
   * @throws InvalidPriorityRangeError for out-of-range or inverted bounds
   */
  constructor(spec: PriorityFilterSpec = DEFAULT_PRIORITY_FILTER) {
    this.spec = validatePriorityFilter(spec);
  }

  withinThreshold(priority: number): boolean {
    return this.spec.min <= priority && priority <= this.spec.max;
  }

  toString(): string {
    return `[${this.spec.min}, ${this.spec.max}]`;
  }
}

export function createPriorityFilter(spec?: Partial<PriorityFilterSpec>): PriorityFilter {
  return new PriorityFilter({
    min: spec?.min ?? DEFAULT_PRIORITY_FILTER.min,
    max: spec?.max ?? DEFAULT_PRIORITY_FILTER.max,
  });
}

export default PriorityFilter;
