/**
 * Component Scorers
 */

import type { ComponentId } from '../../domain/entities/Matching.js';
import type { ComponentScorer } from './BaseScorer.js';
import { CandidateStatusScorer } from './CandidateStatusScorer.js';
import { ContractFlexibilityScorer } from './ContractFlexibilityScorer.js';
import { ExperienceScorer } from './ExperienceScorer.js';
import { ListeningReasonScorer } from './ListeningReasonScorer.js';
import { LocationScorer } from './LocationScorer.js';
import { MotivationsScorer } from './MotivationsScorer.js';
import { SalaryProgressionScorer } from './SalaryProgressionScorer.js';
import { SalaryScorer } from './SalaryScorer.js';
import { loadSectorConnections, SectorCompatibilityScorer, type SectorConnections } from './SectorCompatibilityScorer.js';
import { SemanticScorer } from './SemanticScorer.js';
import { TimingCompatibilityScorer } from './TimingCompatibilityScorer.js';
import { WorkModalityScorer } from './WorkModalityScorer.js';

export * from './BaseScorer.js';
export { SemanticScorer } from './SemanticScorer.js';
export { SalaryScorer } from './SalaryScorer.js';
export { SalaryProgressionScorer } from './SalaryProgressionScorer.js';
export { ExperienceScorer } from './ExperienceScorer.js';
export { LocationScorer } from './LocationScorer.js';
export * from './SectorCompatibilityScorer.js';
export { ContractFlexibilityScorer } from './ContractFlexibilityScorer.js';
export { TimingCompatibilityScorer, toleranceWeeks, URGENCY_TOLERANCE_WEEKS } from './TimingCompatibilityScorer.js';
export { WorkModalityScorer } from './WorkModalityScorer.js';
export { MotivationsScorer } from './MotivationsScorer.js';
export { ListeningReasonScorer } from './ListeningReasonScorer.js';
export { CandidateStatusScorer, noticeImpact, recruitmentUrgency } from './CandidateStatusScorer.js';

export type ScorerRegistry = Readonly<Record<ComponentId, ComponentScorer>>;

export interface ScorerOptions {
  sectorConnections?: SectorConnections;
}

/**
 * One scorer per component. Adding a component to COMPONENT_IDS without a
 * scorer here is a type error.
 */
export function createScorers(options: ScorerOptions = {}): ScorerRegistry {
  const scorers: Record<ComponentId, ComponentScorer> = {
    semantic: new SemanticScorer(),
    salary: new SalaryScorer(),
    salary_progression: new SalaryProgressionScorer(),
    experience: new ExperienceScorer(),
    location: new LocationScorer(),
    sector_compatibility: new SectorCompatibilityScorer(options.sectorConnections ?? loadSectorConnections()),
    contract_flexibility: new ContractFlexibilityScorer(),
    timing_compatibility: new TimingCompatibilityScorer(),
    work_modality: new WorkModalityScorer(),
    motivations: new MotivationsScorer(),
    listening_reason: new ListeningReasonScorer(),
    candidate_status: new CandidateStatusScorer(),
  };
  return Object.freeze(scorers);
}
