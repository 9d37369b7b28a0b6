/**
 * Semantic Scorer
 *
 * Coverage of the required skills by the candidate's skills, blended with the
 * token overlap between the two titles. Skills are compared as normalized
 * labels; no free-text understanding happens here.
 */

import type { CandidateRecord, PositionRecord } from '../../domain/entities/Matching.js';
import { BaseScorer, degraded, normalizeText, round, type ScorerEvaluation } from './BaseScorer.js';

const COVERAGE_WEIGHT = 0.75;
const TITLE_WEIGHT = 0.25;
const WELL_SPECIFIED_SKILL_COUNT = 3;

function tokenize(value: string | undefined): Set<string> {
  return new Set(
    normalizeText(value)
      .split(/[^\p{L}\p{N}+#]+/u)
      .filter((token) => token.length > 1)
  );
}

function titleOverlap(a: string | undefined, b: string | undefined): number | null {
  const left = tokenize(a);
  const right = tokenize(b);
  if (left.size === 0 || right.size === 0) return null;

  let shared = 0;
  for (const token of left) {
    if (right.has(token)) shared++;
  }
  return shared / Math.min(left.size, right.size);
}

export class SemanticScorer extends BaseScorer {
  readonly component = 'semantic' as const;

  protected evaluate(candidate: CandidateRecord, position: PositionRecord): ScorerEvaluation {
    const required = [...new Set((position.requiredSkills ?? []).map(normalizeText).filter(Boolean))];
    const owned = new Set((candidate.skills ?? []).map(normalizeText).filter(Boolean));

    if (required.length === 0) {
      return degraded('missing_required_skills');
    }
    if (owned.size === 0) {
      return degraded('missing_candidate_skills', { requiredSkills: required.length });
    }

    const matched = required.filter((skill) => owned.has(skill));
    const missing = required.filter((skill) => !owned.has(skill));
    const coverage = matched.length / required.length;
    const overlap = titleOverlap(candidate.title, position.title);

    const rawScore = overlap === null ? coverage : COVERAGE_WEIGHT * coverage + TITLE_WEIGHT * overlap;

    return {
      rawScore,
      confidence: required.length >= WELL_SPECIFIED_SKILL_COUNT ? 0.8 : 0.6,
      details: {
        coverage: round(coverage),
        titleOverlap: overlap === null ? null : round(overlap),
        matchedSkills: matched,
        missingSkills: missing,
      },
    };
  }
}
