/**
 * Motivations Scorer
 *
 * Rank-weighted overlap: with n ranked motivations, the i-th (0-based) weighs
 * n - i. Matching the top motivation earns a small bonus.
 */

import type { CandidateRecord, PositionRecord } from '../../domain/entities/Matching.js';
import { BaseScorer, degraded, round, type ScorerEvaluation } from './BaseScorer.js';

const TOP_MOTIVATION_BONUS = 0.1;

export class MotivationsScorer extends BaseScorer {
  readonly component = 'motivations' as const;

  protected evaluate(candidate: CandidateRecord, position: PositionRecord): ScorerEvaluation {
    const ranked = [...new Set(candidate.motivations ?? [])];
    const offered = new Set(position.offeredMotivations ?? []);

    if (ranked.length === 0) {
      return degraded('missing_candidate_motivations');
    }
    if (offered.size === 0) {
      return degraded('missing_offered_motivations');
    }

    const n = ranked.length;
    let total = 0;
    let matchedWeight = 0;
    const matched: string[] = [];

    ranked.forEach((motivation, index) => {
      const weight = n - index;
      total += weight;
      if (offered.has(motivation)) {
        matchedWeight += weight;
        matched.push(motivation);
      }
    });

    const overlap = matchedWeight / total;
    const topMatched = offered.has(ranked[0]);
    const rawScore = Math.min(1, overlap + (topMatched ? TOP_MOTIVATION_BONUS : 0));

    return {
      rawScore,
      confidence: n >= 3 ? 0.8 : 0.6,
      details: {
        overlap: round(overlap),
        topMotivationMatched: topMatched,
        matchedMotivations: matched,
      },
    };
  }
}
