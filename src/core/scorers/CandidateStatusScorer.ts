/**
 * Candidate Status Scorer
 *
 * Employment status against how urgently the position needs filling. Blends:
 * - status vs recruitment urgency (40%)
 * - notice period vs urgency, employed candidates only (25%)
 * - status vs contract on offer (20%)
 * - mutual flexibility (15%)
 */

import type { CandidateRecord, CandidateStatus, ContractType, PositionRecord } from '../../domain/entities/Matching.js';
import { BaseScorer, degraded, round, type ScorerEvaluation } from './BaseScorer.js';

// =============================================================================
// TABLES
// =============================================================================

export type RecruitmentUrgency = 'critical' | 'urgent' | 'normal' | 'flexible';

const PART_WEIGHTS = {
  statusUrgency: 0.4,
  noticePeriod: 0.25,
  contractFit: 0.2,
  flexibility: 0.15,
} as const;

const STATUS_URGENCY_FIT: Record<CandidateStatus, Record<RecruitmentUrgency, number>> = {
  job_seeker: { critical: 1.0, urgent: 1.0, normal: 0.9, flexible: 0.8 },
  freelance: { critical: 0.9, urgent: 0.85, normal: 0.8, flexible: 0.9 },
  student: { critical: 0.7, urgent: 0.75, normal: 0.85, flexible: 0.9 },
  employed: { critical: 0.3, urgent: 0.5, normal: 0.8, flexible: 0.9 },
};

// [notice weeks, impact], ascending; interpolated between points, flat past the last
const NOTICE_IMPACT: Record<RecruitmentUrgency, ReadonlyArray<readonly [number, number]>> = {
  critical: [[0, 1.0], [1, 0.8], [2, 0.6], [4, 0.3], [8, 0.1], [12, 0.05]],
  urgent: [[0, 1.0], [1, 0.9], [2, 0.85], [4, 0.7], [8, 0.4], [12, 0.2]],
  normal: [[0, 1.0], [1, 0.95], [2, 0.9], [4, 0.85], [8, 0.7], [12, 0.5]],
  flexible: [[0, 1.0], [1, 0.95], [2, 0.95], [4, 0.9], [8, 0.85], [12, 0.8]],
};

const STATUS_CONTRACT_FIT: Record<CandidateStatus, Record<ContractType, number>> = {
  employed: { permanent: 0.9, fixed_term: 0.5, freelance: 0.5, temporary: 0.3, internship: 0.1 },
  job_seeker: { permanent: 1.0, fixed_term: 0.85, freelance: 0.6, temporary: 0.8, internship: 0.3 },
  student: { permanent: 0.6, fixed_term: 0.7, freelance: 0.4, temporary: 0.7, internship: 1.0 },
  freelance: { permanent: 0.5, fixed_term: 0.7, freelance: 1.0, temporary: 0.7, internship: 0.1 },
};

const STATUS_FLEXIBILITY: Record<CandidateStatus, number> = {
  job_seeker: 0.3,
  freelance: 0.2,
  student: 0,
  employed: 0,
};

const DEFAULT_CONTRACT_FIT = 0.7;
const DEFAULT_NOTICE_WEEKS = 4;
const URGENCY_ALIGNMENT_FLEXIBILITY = 0.3;

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Position urgency runs 1 (urgent) to 5 (can wait); unknown reads as normal.
 */
export function recruitmentUrgency(urgency: number | undefined): RecruitmentUrgency {
  if (urgency === undefined) return 'normal';
  if (urgency <= 1) return 'critical';
  if (urgency <= 2) return 'urgent';
  if (urgency <= 3) return 'normal';
  return 'flexible';
}

export function noticeImpact(weeks: number, urgency: RecruitmentUrgency): number {
  const points = NOTICE_IMPACT[urgency];
  let previous = points[0];
  if (weeks <= previous[0]) return previous[1];

  for (const point of points.slice(1)) {
    if (weeks === point[0]) return point[1];
    if (weeks < point[0]) {
      const ratio = (weeks - previous[0]) / (point[0] - previous[0]);
      return previous[1] + (point[1] - previous[1]) * ratio;
    }
    previous = point;
  }
  return previous[1];
}

// =============================================================================
// SCORER
// =============================================================================

export class CandidateStatusScorer extends BaseScorer {
  readonly component = 'candidate_status' as const;

  protected evaluate(candidate: CandidateRecord, position: PositionRecord): ScorerEvaluation {
    const status = candidate.status;
    if (!status) {
      return degraded('missing_candidate_status');
    }

    const urgency = recruitmentUrgency(position.urgency);
    const statusUrgency = STATUS_URGENCY_FIT[status][urgency];

    // Only an employed candidate serves a notice period
    const noticeAssumed = status === 'employed' && candidate.noticePeriodWeeks === undefined;
    const noticeWeeks = status === 'employed' ? candidate.noticePeriodWeeks ?? DEFAULT_NOTICE_WEEKS : 0;
    const notice = noticeImpact(noticeWeeks, urgency);

    const contractFit = position.contractType
      ? STATUS_CONTRACT_FIT[status][position.contractType]
      : DEFAULT_CONTRACT_FIT;

    // Urgent candidate (4-5) meeting an urgent position (1-2)
    const urgencyAligned =
      candidate.searchUrgency !== undefined &&
      position.urgency !== undefined &&
      candidate.searchUrgency >= 4 &&
      position.urgency <= 2;
    const flexibility = Math.min(
      1,
      STATUS_FLEXIBILITY[status] + (urgencyAligned ? URGENCY_ALIGNMENT_FLEXIBILITY : 0)
    );

    const rawScore =
      statusUrgency * PART_WEIGHTS.statusUrgency +
      notice * PART_WEIGHTS.noticePeriod +
      contractFit * PART_WEIGHTS.contractFit +
      flexibility * PART_WEIGHTS.flexibility;

    let confidence = 0.8;
    if (position.urgency === undefined || !position.contractType) confidence = 0.6;
    if (noticeAssumed) confidence = Math.min(confidence, 0.6);

    return {
      rawScore,
      confidence,
      details: {
        status,
        recruitmentUrgency: urgency,
        statusUrgencyFit: statusUrgency,
        noticePeriodWeeks: noticeWeeks,
        noticePeriodAssumed: noticeAssumed,
        noticeImpact: round(notice),
        contractType: position.contractType ?? null,
        contractFit,
        urgencyAligned,
        flexibility: round(flexibility),
      },
    };
  }
}
