/**
 * Contract Flexibility Scorer
 */

import type { CandidateRecord, PositionRecord } from '../../domain/entities/Matching.js';
import { BaseScorer, degraded, type ScorerEvaluation } from './BaseScorer.js';

const RANK_SCORES = [1.0, 0.75, 0.5, 0.25] as const;
const UNLISTED_SCORE = 0.2;

export class ContractFlexibilityScorer extends BaseScorer {
  readonly component = 'contract_flexibility' as const;

  protected evaluate(candidate: CandidateRecord, position: PositionRecord): ScorerEvaluation {
    const offered = position.contractType;
    const preferences = candidate.contractPreferences ?? [];

    if (!offered) {
      return degraded('missing_position_contract');
    }
    if (preferences.length === 0) {
      return degraded('missing_contract_preferences', { contractType: offered });
    }

    const rank = preferences.indexOf(offered);
    const exclusive = candidate.exclusiveContractSearch === true || preferences.length === 1;

    if (exclusive) {
      return {
        rawScore: rank >= 0 ? 1 : 0,
        confidence: 0.95,
        details: { contractType: offered, exclusive, rank: rank >= 0 ? rank + 1 : null },
      };
    }

    if (rank < 0) {
      return {
        rawScore: UNLISTED_SCORE,
        confidence: 0.3,
        details: { contractType: offered, exclusive, rank: null },
      };
    }

    return {
      rawScore: RANK_SCORES[Math.min(rank, RANK_SCORES.length - 1)],
      confidence: 0.85,
      details: { contractType: offered, exclusive, rank: rank + 1 },
    };
  }
}
