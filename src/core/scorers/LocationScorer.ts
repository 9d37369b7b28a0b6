/**
 * Location Scorer
 *
 * A fully remote position never involves a commute. Otherwise uses the
 * travel time supplied in the match context when there is one, and falls back
 * to comparing city and postal area.
 */

import type { CandidateRecord, MatchContext, PositionRecord } from '../../domain/entities/Matching.js';
import { BaseScorer, degraded, normalizeText, type ScorerEvaluation } from './BaseScorer.js';

const DEFAULT_MAX_COMMUTE_MINUTES = 60;
const POSTAL_AREA_LENGTH = 2;

export class LocationScorer extends BaseScorer {
  readonly component = 'location' as const;

  protected evaluate(candidate: CandidateRecord, position: PositionRecord, context: MatchContext): ScorerEvaluation {
    const relocation = candidate.location?.acceptsRelocation === true;

    if (position.workModality === 'remote') {
      return { rawScore: 1, confidence: 0.8, details: { basis: 'full_remote' } };
    }

    if (context.travelTimeMinutes !== undefined) {
      return this.scoreTravelTime(context.travelTimeMinutes, candidate, relocation);
    }

    const candidateCity = normalizeText(candidate.location?.city);
    const positionCity = normalizeText(position.location?.city);
    const candidatePostal = normalizeText(candidate.location?.postalCode);
    const positionPostal = normalizeText(position.location?.postalCode);

    if ((!candidateCity && !candidatePostal) || (!positionCity && !positionPostal)) {
      return degraded('missing_location');
    }

    if (candidateCity && candidateCity === positionCity) {
      return { rawScore: 0.9, confidence: 0.6, details: { basis: 'same_city' } };
    }

    if (
      candidatePostal.length >= POSTAL_AREA_LENGTH &&
      candidatePostal.slice(0, POSTAL_AREA_LENGTH) === positionPostal.slice(0, POSTAL_AREA_LENGTH)
    ) {
      return { rawScore: 0.75, confidence: 0.5, details: { basis: 'same_postal_area' } };
    }

    if (relocation) {
      return { rawScore: 0.6, confidence: 0.5, details: { basis: 'relocation' } };
    }

    return { rawScore: 0.3, confidence: 0.5, details: { basis: 'distant' } };
  }

  private scoreTravelTime(minutes: number, candidate: CandidateRecord, relocation: boolean): ScorerEvaluation {
    const maxCommute = candidate.location?.maxCommuteMinutes ?? DEFAULT_MAX_COMMUTE_MINUTES;
    if (!Number.isFinite(minutes) || minutes < 0) {
      return degraded('invalid_travel_time');
    }

    let rawScore: number;
    if (minutes <= maxCommute * 0.5) {
      rawScore = 1;
    } else if (minutes <= maxCommute) {
      rawScore = 0.8;
    } else if (minutes <= maxCommute * 1.5) {
      rawScore = 0.5;
    } else {
      rawScore = relocation ? 0.6 : 0.2;
    }

    return {
      rawScore,
      confidence: 0.9,
      details: {
        basis: 'travel_time',
        travelTimeMinutes: minutes,
        maxCommuteMinutes: maxCommute,
        relocation,
      },
    };
  }
}
