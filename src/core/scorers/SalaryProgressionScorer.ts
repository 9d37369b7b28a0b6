/**
 * Salary Progression Scorer
 *
 * Compares the raise the candidate expects with the raise the position can
 * offer at its ceiling, both relative to the current salary. A position
 * without a ceiling offers no progression.
 */

import type { CandidateRecord, PositionRecord } from '../../domain/entities/Matching.js';
import { BaseScorer, degraded, round, type ScorerEvaluation } from './BaseScorer.js';

const DEFAULT_PROGRESSION_EXPECTATIONS = 3;
const MODEST_EXPECTATION_BONUS = 0.1;
const MODEST_PROGRESSION_RATE = 0.15;
const PARTIAL_FLOOR = 0.4;
const NO_PROGRESSION_SCORE = 0.2;

export class SalaryProgressionScorer extends BaseScorer {
  readonly component = 'salary_progression' as const;

  protected evaluate(candidate: CandidateRecord, position: PositionRecord): ScorerEvaluation {
    let expected = 0;
    let offered = 0;

    const current = candidate.currentSalary;
    const desired = candidate.desiredSalary;
    const ceiling = position.salaryMax ?? 0;

    if (current === undefined || desired === undefined) {
      return degraded('missing_salary_data', {
        expectedProgressionPct: expected,
        offeredProgressionPct: offered,
      });
    }
    if (current <= 0) {
      return degraded('invalid_current_salary', {
        expectedProgressionPct: expected,
        offeredProgressionPct: offered,
      });
    }

    expected = (desired - current) / current;
    offered = ceiling > current ? (ceiling - current) / current : 0;

    let rawScore: number;
    if (offered >= expected) {
      rawScore = 1;
    } else if (offered > 0) {
      rawScore = Math.max(PARTIAL_FLOOR, offered / expected);
    } else {
      rawScore = NO_PROGRESSION_SCORE;
    }

    const expectations = candidate.progressionExpectations ?? DEFAULT_PROGRESSION_EXPECTATIONS;
    const modest = expectations <= DEFAULT_PROGRESSION_EXPECTATIONS && expected <= MODEST_PROGRESSION_RATE;
    if (modest) {
      rawScore = Math.min(1, rawScore + MODEST_EXPECTATION_BONUS);
    }

    return {
      rawScore,
      confidence: candidate.progressionExpectations === undefined ? 0.7 : 0.9,
      details: {
        expectedProgressionPct: round(expected * 100, 2),
        offeredProgressionPct: round(offered * 100, 2),
        progressionExpectations: expectations,
        modestExpectationBonus: modest,
      },
    };
  }
}
