/**
 * Work Modality Scorer
 */

import type { CandidateRecord, PositionRecord, WorkModality } from '../../domain/entities/Matching.js';
import { BaseScorer, degraded, type ScorerEvaluation } from './BaseScorer.js';

// Candidate preference -> position modality
const MODALITY_MATRIX: Record<WorkModality, Record<WorkModality, number>> = {
  remote: { remote: 1.0, hybrid: 0.6, onsite: 0.1, flexible: 0.9 },
  hybrid: { remote: 0.8, hybrid: 1.0, onsite: 0.4, flexible: 0.95 },
  onsite: { remote: 0.4, hybrid: 0.8, onsite: 1.0, flexible: 0.9 },
  flexible: { remote: 0.9, hybrid: 1.0, onsite: 0.8, flexible: 1.0 },
};

const MISSING_DAY_PENALTY = 0.1;

export class WorkModalityScorer extends BaseScorer {
  readonly component = 'work_modality' as const;

  protected evaluate(candidate: CandidateRecord, position: PositionRecord): ScorerEvaluation {
    const wanted = candidate.preferredModality;
    const offered = position.workModality;

    if (!wanted || !offered) {
      return degraded('missing_modality');
    }

    let rawScore = MODALITY_MATRIX[wanted][offered];
    let missingDays = 0;

    if (
      offered === 'hybrid' &&
      candidate.remoteDaysWanted !== undefined &&
      position.remoteDaysOffered !== undefined
    ) {
      missingDays = Math.max(0, candidate.remoteDaysWanted - position.remoteDaysOffered);
      rawScore -= missingDays * MISSING_DAY_PENALTY;
    }

    return {
      rawScore,
      confidence: 0.85,
      details: {
        preferred: wanted,
        offered,
        missingRemoteDays: missingDays,
      },
    };
  }
}
