/**
 * Salary Scorer
 *
 * Candidate's salary floor (desired, else current) against the position ceiling.
 */

import type { CandidateRecord, PositionRecord } from '../../domain/entities/Matching.js';
import { BaseScorer, degraded, round, type ScorerEvaluation } from './BaseScorer.js';

const SALARY_BANDS = [
  { ratio: 1.0, score: 1.0 },
  { ratio: 1.2, score: 0.7 },
  { ratio: 1.5, score: 0.4 },
] as const;

const OUT_OF_BAND_SCORE = 0.1;

export class SalaryScorer extends BaseScorer {
  readonly component = 'salary' as const;

  protected evaluate(candidate: CandidateRecord, position: PositionRecord): ScorerEvaluation {
    const floor = candidate.desiredSalary ?? candidate.currentSalary;
    const ceiling = position.salaryMax;

    if (floor === undefined) {
      return degraded('missing_candidate_salary');
    }
    if (ceiling === undefined || ceiling <= 0) {
      return degraded('missing_position_salary');
    }

    const ratio = floor / ceiling;
    const band = SALARY_BANDS.find((entry) => ratio <= entry.ratio);

    return {
      rawScore: band ? band.score : OUT_OF_BAND_SCORE,
      confidence: candidate.desiredSalary !== undefined ? 0.9 : 0.7,
      details: {
        candidateFloor: floor,
        positionCeiling: ceiling,
        ratio: round(ratio),
        belowPositionMinimum: position.salaryMin !== undefined && floor < position.salaryMin,
      },
    };
  }
}
