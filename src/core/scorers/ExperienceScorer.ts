/**
 * Experience Scorer
 */

import type { CandidateRecord, PositionRecord } from '../../domain/entities/Matching.js';
import { BaseScorer, degraded, type ScorerEvaluation } from './BaseScorer.js';

export class ExperienceScorer extends BaseScorer {
  readonly component = 'experience' as const;

  protected evaluate(candidate: CandidateRecord, position: PositionRecord): ScorerEvaluation {
    const years = candidate.yearsOfExperience;
    const min = position.minYearsExperience;
    const max = position.maxYearsExperience;

    if (years === undefined) {
      return degraded('missing_candidate_experience');
    }
    if (min === undefined && max === undefined) {
      return degraded('missing_position_requirements', { years });
    }

    let rawScore = 1;
    let band = 'within_range';

    if (max !== undefined && years > max) {
      band = years <= max * 1.5 ? 'slightly_above' : 'well_above';
      rawScore = band === 'slightly_above' ? 0.8 : 0.6;
    } else if (min !== undefined && years < min) {
      band = years >= min * 0.7 ? 'slightly_below' : 'well_below';
      rawScore = band === 'slightly_below' ? 0.6 : 0.3;
    }

    return {
      rawScore,
      confidence: min !== undefined && max !== undefined ? 0.9 : 0.7,
      details: {
        years,
        minYears: min ?? null,
        maxYears: max ?? null,
        band,
      },
    };
  }
}
