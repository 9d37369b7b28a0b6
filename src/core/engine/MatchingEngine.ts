/**
 * Matching Engine - Adaptive Multi-Factor Aggregation
 *
 * One evaluation:
 * 1. Resolve the weight matrix for the candidate's listening reason
 * 2. Run every component scorer with its weight
 * 3. Sum the weighted scores into the raw score
 * 4. Detect both hierarchical levels and apply the gap adjustment
 * 5. Classify the adjusted score and assemble a frozen result
 *
 * The engine holds no per-call state. Evaluation is synchronous and, with a
 * fixed clock, fully deterministic.
 */

import {
  COMPONENT_IDS,
  type CandidateRecord,
  type ComponentScore,
  type HierarchyAssessment,
  type ListeningReason,
  type MatchAlert,
  type MatchContext,
  type MatchResult,
  type PositionRecord,
  type RankedMatches,
} from '../../domain/entities/Matching.js';
import type { WeightMatrixRegistry } from '../weights/WeightMatrixRegistry.js';
import {
  HierarchicalCompatibilityAdjuster,
  loadHierarchicalLevelDetector,
  type HierarchicalLevelDetector,
} from '../hierarchy/index.js';
import { classifyQuality, clamp01, createScorers, type Clock, type ScorerRegistry } from '../scorers/index.js';

// =============================================================================
// TYPES
// =============================================================================

export interface MatchingEngineOptions {
  registry: WeightMatrixRegistry;
  detector?: HierarchicalLevelDetector;
  adjuster?: HierarchicalCompatibilityAdjuster;
  scorers?: ScorerRegistry;
  clock?: Clock;
}

export const LOW_CONFIDENCE_THRESHOLD = 0.5;
export const SALARY_MISMATCH_RATIO = 1.2;

// =============================================================================
// ENGINE
// =============================================================================

export class MatchingEngine {
  private readonly registry: WeightMatrixRegistry;
  private readonly detector: HierarchicalLevelDetector;
  private readonly adjuster: HierarchicalCompatibilityAdjuster;
  private readonly scorers: ScorerRegistry;
  private readonly clock: Clock;

  constructor(options: MatchingEngineOptions) {
    this.registry = options.registry;
    this.detector = options.detector ?? loadHierarchicalLevelDetector();
    this.adjuster = options.adjuster ?? new HierarchicalCompatibilityAdjuster();
    this.scorers = options.scorers ?? createScorers();
    this.clock = options.clock ?? Date.now;
  }

  evaluate(candidate: CandidateRecord, position: PositionRecord, context: MatchContext = {}): MatchResult {
    const startedAt = this.clock();

    const listeningReason: ListeningReason = candidate.listeningReason ?? 'unspecified';
    const { source, matrix } = this.registry.resolve(listeningReason);

    const components: ComponentScore[] = COMPONENT_IDS.map((component) =>
      this.scorers[component].score(
        candidate,
        position,
        this.registry.weightFor(matrix, component),
        context,
        this.clock
      )
    );

    const rawScore = clamp01(components.reduce((total, entry) => total + entry.weightedScore, 0));

    const candidateLevel = this.detector.detectCandidateLevel(candidate);
    const positionLevel = this.detector.detectPositionLevel(position);
    const adjustment = this.adjuster.adjust(candidateLevel.level, positionLevel.level, rawScore);
    const hierarchy: HierarchyAssessment = {
      ...adjustment,
      candidate: candidateLevel,
      position: positionLevel,
    };

    const confidence = aggregateConfidence(components);

    return Object.freeze({
      candidateId: candidate.id,
      positionId: position.id,
      listeningReason,
      matrixSource: source,
      rawScore,
      score: adjustment.adjustedScore,
      quality: classifyQuality(adjustment.adjustedScore),
      components: Object.freeze(components),
      hierarchy: Object.freeze(hierarchy),
      mismatchFlag: adjustment.mismatch,
      confidence,
      alerts: Object.freeze(buildAlerts(candidate, position, hierarchy, confidence)),
      processingTimeMs: Math.max(0, this.clock() - startedAt),
    });
  }

  /**
   * Evaluate one candidate against several positions. Pairs flagged for a
   * hierarchical mismatch are kept out of the ranking and returned for review.
   */
  rank(candidate: CandidateRecord, positions: readonly PositionRecord[], context: MatchContext = {}): RankedMatches {
    const results = positions.map((position) => this.evaluate(candidate, position, context));

    const ranked = results
      .filter((result) => !result.mismatchFlag)
      .sort((a, b) => b.score - a.score || a.positionId.localeCompare(b.positionId));
    const review = results.filter((result) => result.mismatchFlag);

    console.log(
      `[MatchingEngine] Ranked ${ranked.length} positions for candidate ${candidate.id}, ${review.length} held for review`
    );

    return { ranked, review };
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export function aggregateConfidence(components: readonly ComponentScore[]): number {
  let weighted = 0;
  let totalWeight = 0;
  for (const component of components) {
    weighted += component.weight * component.confidence;
    totalWeight += component.weight;
  }
  return totalWeight > 0 ? weighted / totalWeight : 0;
}

function buildAlerts(
  candidate: CandidateRecord,
  position: PositionRecord,
  hierarchy: HierarchyAssessment,
  confidence: number
): MatchAlert[] {
  const alerts: MatchAlert[] = [];
  const levels = `candidate ${hierarchy.candidate.tier} vs position ${hierarchy.position.tier}`;

  if (hierarchy.direction === 'overqualified') {
    alerts.push(
      hierarchy.mismatch
        ? { type: 'CRITICAL_MISMATCH', severity: 'critical', message: `Critical hierarchical mismatch: ${levels}` }
        : { type: 'OVERQUALIFICATION', severity: 'warning', message: `Candidate overqualified: ${levels}` }
    );
  } else if (hierarchy.direction === 'underqualified' && hierarchy.mismatch) {
    alerts.push({ type: 'UNDERQUALIFICATION', severity: 'warning', message: `Candidate underqualified: ${levels}` });
  }

  const floor = candidate.desiredSalary ?? candidate.currentSalary;
  if (floor !== undefined && position.salaryMax !== undefined && floor > position.salaryMax * SALARY_MISMATCH_RATIO) {
    alerts.push({
      type: 'SALARY_MISMATCH',
      severity: 'warning',
      message: `Candidate expects ${floor}, position ceiling is ${position.salaryMax}`,
    });
  }

  if (confidence < LOW_CONFIDENCE_THRESHOLD) {
    alerts.push({
      type: 'LOW_CONFIDENCE',
      severity: 'info',
      message: `Low confidence in the match (${confidence.toFixed(2)})`,
    });
  }

  return alerts;
}
