/**
 * Listening Reason Scorer
 *
 * Self-consistency of the reason a candidate gave for listening to offers:
 * does the rest of the candidate's own record back it up? The position is not
 * read; how well a position answers the reason is left to the salary,
 * modality and motivation factors.
 */

import type { AdaptiveListeningReason, CandidateRecord } from '../../domain/entities/Matching.js';
import { BaseScorer, degraded, type ScorerEvaluation } from './BaseScorer.js';

const BASE_COHERENCE = 0.5;
const COMPATIBLE_SECONDARY_BOOST = 0.1;
const INCOHERENT_SECONDARY_PENALTY = 0.05;
const SECONDARY_FACTOR = 0.5;
const MULTIPLE_REASONS_BONUS = 0.1;
const SIGNIFICANT_RAISE = 10000;
const SHORT_COMMUTE_MINUTES = 30;

interface CoherenceCheck {
  boost: number;
  factors: string[];
}

type PrimaryCheck = (candidate: CandidateRecord) => CoherenceCheck;

function check(rules: Array<[boolean, number, string]>): CoherenceCheck {
  const applied = rules.filter(([holds]) => holds);
  return {
    boost: applied.reduce((sum, [, boost]) => sum + boost, 0),
    factors: applied.map(([, , factor]) => factor),
  };
}

const PRIMARY_CHECKS: Record<AdaptiveListeningReason, PrimaryCheck> = {
  compensation: (candidate) => {
    const { currentSalary, desiredSalary } = candidate;
    const raise =
      currentSalary !== undefined && desiredSalary !== undefined ? desiredSalary - currentSalary : 0;
    return check([
      [raise > SIGNIFICANT_RAISE, 0.3, 'significant_raise_sought'],
      [candidate.status === 'employed', 0.2, 'employed'],
    ]);
  },
  growth_prospects: (candidate) =>
    check([
      [candidate.status === 'employed', 0.3, 'employed'],
      [(candidate.motivations ?? []).includes('career_growth'), 0.2, 'career_growth_motivation'],
    ]),
  flexibility: (candidate) =>
    check([
      [candidate.preferredModality === 'hybrid' || candidate.preferredModality === 'remote', 0.3, 'remote_preference'],
      [candidate.status === 'employed', 0.1, 'employed'],
    ]),
  location: (candidate) => {
    const maxCommute = candidate.location?.maxCommuteMinutes;
    return check([
      [maxCommute !== undefined && maxCommute < SHORT_COMMUTE_MINUTES, 0.3, 'short_commute_limit'],
      [candidate.preferredModality === 'remote', 0.2, 'full_remote_preference'],
    ]);
  },
  role_mismatch: (candidate) => check([[candidate.status === 'employed', 0.2, 'employed']]),
};

const COMPATIBLE_REASONS: Record<AdaptiveListeningReason, readonly AdaptiveListeningReason[]> = {
  compensation: ['growth_prospects'],
  growth_prospects: ['compensation', 'role_mismatch'],
  role_mismatch: ['growth_prospects'],
  location: ['flexibility'],
  flexibility: ['location'],
};

export class ListeningReasonScorer extends BaseScorer {
  readonly component = 'listening_reason' as const;

  protected evaluate(candidate: CandidateRecord): ScorerEvaluation {
    const reason = candidate.listeningReason;
    if (reason === undefined || reason === 'unspecified') {
      return degraded('unspecified_listening_reason');
    }

    const primary = PRIMARY_CHECKS[reason](candidate);

    const compatible: string[] = [];
    const incoherent: string[] = [];
    for (const secondary of new Set(candidate.secondaryListeningReasons ?? [])) {
      if (secondary === reason || secondary === 'unspecified') continue;
      if (COMPATIBLE_REASONS[reason].includes(secondary)) {
        compatible.push(secondary);
      } else {
        incoherent.push(secondary);
      }
    }

    const secondaryBoost =
      (compatible.length * COMPATIBLE_SECONDARY_BOOST - incoherent.length * INCOHERENT_SECONDARY_PENALTY) *
      SECONDARY_FACTOR;
    const multiple = compatible.length + incoherent.length > 0;

    return {
      rawScore: Math.min(1, BASE_COHERENCE + primary.boost + secondaryBoost + (multiple ? MULTIPLE_REASONS_BONUS : 0)),
      confidence: 0.7,
      details: {
        reason,
        primaryBoost: primary.boost,
        coherenceFactors: primary.factors,
        compatibleSecondaryReasons: compatible,
        incoherentSecondaryReasons: incoherent,
      },
    };
  }
}
