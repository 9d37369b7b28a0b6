/**
 * Timing Compatibility Scorer
 *
 * When the candidate can start against when the position needs someone. The
 * position's urgency (1 = urgent, 5 = can wait) sets how many weeks of delay
 * are tolerated.
 */

import type { CandidateRecord, PositionRecord } from '../../domain/entities/Matching.js';
import { ScorerInputError } from '../errors.js';
import { BaseScorer, degraded, round, type ScorerEvaluation } from './BaseScorer.js';

const MS_PER_WEEK = 7 * 24 * 60 * 60 * 1000;
const DEFAULT_URGENCY = 3;

export const URGENCY_TOLERANCE_WEEKS: Readonly<Record<number, number>> = {
  1: 2,
  2: 4,
  3: 6,
  4: 10,
  5: 14,
};

function parseDate(value: string, field: string): number {
  const time = Date.parse(value);
  if (Number.isNaN(time)) {
    throw new ScorerInputError(`Invalid date for ${field}: "${value}"`, field);
  }
  return time;
}

export function toleranceWeeks(urgency: number | undefined): number {
  const level = Math.min(5, Math.max(1, Math.round(urgency ?? DEFAULT_URGENCY)));
  return URGENCY_TOLERANCE_WEEKS[level] ?? URGENCY_TOLERANCE_WEEKS[DEFAULT_URGENCY];
}

export class TimingCompatibilityScorer extends BaseScorer {
  readonly component = 'timing_compatibility' as const;

  protected evaluate(candidate: CandidateRecord, position: PositionRecord): ScorerEvaluation {
    const tolerance = toleranceWeeks(position.urgency);

    let delayWeeks: number;
    let basis: string;
    if (candidate.availableFrom !== undefined && position.startDate !== undefined) {
      const available = parseDate(candidate.availableFrom, 'availableFrom');
      const start = parseDate(position.startDate, 'startDate');
      delayWeeks = Math.max(0, (available - start) / MS_PER_WEEK);
      basis = 'dates';
    } else if (candidate.noticePeriodWeeks !== undefined) {
      delayWeeks = Math.max(0, candidate.noticePeriodWeeks);
      basis = 'notice_period';
    } else {
      return degraded('missing_availability', { toleranceWeeks: tolerance });
    }

    let rawScore: number;
    if (delayWeeks === 0) {
      rawScore = 1;
    } else if (delayWeeks <= tolerance) {
      rawScore = 1 - 0.2 * (delayWeeks / tolerance);
    } else if (delayWeeks <= tolerance * 2) {
      rawScore = 0.5;
    } else {
      rawScore = 0.2;
    }

    return {
      rawScore,
      confidence: basis === 'dates' ? 0.9 : 0.6,
      details: {
        basis,
        delayWeeks: round(delayWeeks, 2),
        toleranceWeeks: tolerance,
      },
    };
  }
}
