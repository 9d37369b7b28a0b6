/**
 * Hierarchical Compatibility Adjuster
 *
 * Turns the level gap between candidate and position into a multiplicative
 * penalty on the aggregate score. Overqualification costs more per level than
 * underqualification; a gap beyond the mismatch threshold flags the pair for
 * review.
 */

import type { HierarchicalAdjustment, HierarchyDirection } from '../../domain/entities/Matching.js';
import { ConfigurationError } from '../errors.js';

export interface HierarchyRules {
  overqualificationRate: number;
  underqualificationRate: number;
  mismatchThreshold: number;
}

export const DEFAULT_HIERARCHY_RULES: Readonly<HierarchyRules> = Object.freeze({
  overqualificationRate: 0.15,
  underqualificationRate: 0.08,
  mismatchThreshold: 2,
});

export class HierarchicalCompatibilityAdjuster {
  readonly rules: Readonly<HierarchyRules>;

  constructor(rules: Partial<HierarchyRules> = {}) {
    const merged: HierarchyRules = { ...DEFAULT_HIERARCHY_RULES, ...rules };

    for (const [name, value] of Object.entries(merged)) {
      if (!Number.isFinite(value) || value < 0) {
        throw new ConfigurationError(`Hierarchy rule ${name} must be a non-negative number`, 'INVALID_HIERARCHY_RULES', {
          [name]: value,
        });
      }
    }
    if (merged.overqualificationRate < merged.underqualificationRate) {
      throw new ConfigurationError(
        'Overqualification rate must be at least the underqualification rate',
        'INVALID_HIERARCHY_RULES',
        { ...merged }
      );
    }

    this.rules = Object.freeze(merged);
  }

  adjust(candidateLevel: number, positionLevel: number, rawScore: number): HierarchicalAdjustment {
    const gap = candidateLevel - positionLevel;
    const direction: HierarchyDirection = gap > 0 ? 'overqualified' : gap < 0 ? 'underqualified' : 'aligned';

    const rate = direction === 'overqualified' ? this.rules.overqualificationRate : this.rules.underqualificationRate;
    const multiplier = gap === 0 ? 1 : Math.max(0, 1 - rate * Math.abs(gap));
    const adjustedScore = Math.max(0, rawScore * multiplier);

    return {
      gap,
      direction,
      multiplier,
      penalty: 1 - multiplier,
      adjustedScore,
      mismatch: Math.abs(gap) > this.rules.mismatchThreshold,
    };
  }
}
