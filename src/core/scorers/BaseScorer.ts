/**
 * Base Scorer - Common Contract for Component Scorers
 *
 * Each scorer owns one factor of the match and implements `evaluate()`:
 * - read the fields it needs from the two records
 * - return a raw score in [0, 1], a confidence and an explanation
 *
 * `score()` wraps the evaluation with weighting, quality classification and
 * timing. A scorer never throws out of `score()`: missing input degrades to a
 * neutral, zero-confidence score and malformed input is reported in the
 * details of the same neutral score.
 */

import type {
  CandidateRecord,
  ComponentId,
  ComponentScore,
  ComponentWeight,
  MatchContext,
  PositionRecord,
  QualityTier,
  ScoreDetailValue,
} from '../../domain/entities/Matching.js';

// =============================================================================
// TYPES
// =============================================================================

export type ScoreDetails = Record<string, ScoreDetailValue>;

export interface ScorerEvaluation {
  rawScore: number;
  confidence: number;
  details: ScoreDetails;
}

export type Clock = () => number;

export interface ComponentScorer {
  readonly component: ComponentId;
  score(
    candidate: CandidateRecord,
    position: PositionRecord,
    weight: ComponentWeight,
    context?: MatchContext,
    clock?: Clock
  ): ComponentScore;
}

// =============================================================================
// CONSTANTS
// =============================================================================

export const NEUTRAL_SCORE = 0.5;

export const QUALITY_THRESHOLDS = {
  EXCELLENT: 0.8,
  GOOD: 0.6,
  ACCEPTABLE: 0.3,
} as const;

// =============================================================================
// HELPERS
// =============================================================================

export function classifyQuality(score: number): QualityTier {
  if (score > QUALITY_THRESHOLDS.EXCELLENT) return 'EXCELLENT';
  if (score > QUALITY_THRESHOLDS.GOOD) return 'GOOD';
  if (score >= QUALITY_THRESHOLDS.ACCEPTABLE) return 'ACCEPTABLE';
  return 'POOR';
}

export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/**
 * Neutral evaluation for a factor that cannot be judged from the records.
 */
export function degraded(reason: string, details: ScoreDetails = {}): ScorerEvaluation {
  return {
    rawScore: NEUTRAL_SCORE,
    confidence: 0,
    details: { ...details, degradedReason: reason },
  };
}

export function round(value: number, digits = 4): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function normalizeText(value: string | undefined): string {
  return (value ?? '').trim().toLowerCase();
}

// =============================================================================
// BASE SCORER
// =============================================================================

export abstract class BaseScorer implements ComponentScorer {
  abstract readonly component: ComponentId;

  /**
   * Judge the factor for one candidate/position pair
   */
  protected abstract evaluate(
    candidate: CandidateRecord,
    position: PositionRecord,
    context: MatchContext
  ): ScorerEvaluation;

  score(
    candidate: CandidateRecord,
    position: PositionRecord,
    weight: ComponentWeight,
    context: MatchContext = {},
    clock: Clock = Date.now
  ): ComponentScore {
    const startedAt = clock();

    let evaluation: ScorerEvaluation;
    try {
      evaluation = this.evaluate(candidate, position, context);
    } catch (error) {
      evaluation = {
        rawScore: NEUTRAL_SCORE,
        confidence: 0,
        details: { error: error instanceof Error ? error.message : String(error) },
      };
    }

    const rawScore = clamp01(evaluation.rawScore);

    return Object.freeze({
      component: this.component,
      rawScore,
      weightedScore: rawScore * weight.weight,
      weight: weight.weight,
      baseWeight: weight.baseWeight,
      boostApplied: weight.weight - weight.baseWeight,
      quality: classifyQuality(rawScore),
      confidence: clamp01(evaluation.confidence),
      details: Object.freeze({ ...evaluation.details }),
      processingTimeMs: Math.max(0, clock() - startedAt),
    });
  }
}
