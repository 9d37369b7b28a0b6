/**
 * Matching - Candidate/Position Compatibility Model
 *
 * Structured inputs consumed by the scoring core and the explainable result it
 * produces. Records are owned by the ingestion side and treated as read-only
 * for the duration of one evaluation.
 */

// =============================================================================
// COMPONENTS
// =============================================================================

/**
 * The closed set of scored factors, in the order they appear in a result.
 */
export const COMPONENT_IDS = [
  'semantic',
  'salary',
  'salary_progression',
  'experience',
  'location',
  'sector_compatibility',
  'contract_flexibility',
  'timing_compatibility',
  'work_modality',
  'motivations',
  'listening_reason',
  'candidate_status',
] as const;

export type ComponentId = (typeof COMPONENT_IDS)[number];

export type WeightMatrix = Readonly<Record<ComponentId, number>>;

// =============================================================================
// LISTENING REASONS
// =============================================================================

export const LISTENING_REASONS = [
  'compensation',
  'role_mismatch',
  'location',
  'flexibility',
  'growth_prospects',
  'unspecified',
] as const;

export type ListeningReason = (typeof LISTENING_REASONS)[number];

// Reasons that may carry their own weight matrix
export type AdaptiveListeningReason = Exclude<ListeningReason, 'unspecified'>;

export function isListeningReason(value: unknown): value is ListeningReason {
  return LISTENING_REASONS.some((reason) => reason === value);
}

// =============================================================================
// RECORD VOCABULARIES
// =============================================================================

export const CONTRACT_TYPES = ['permanent', 'fixed_term', 'freelance', 'temporary', 'internship'] as const;
export type ContractType = (typeof CONTRACT_TYPES)[number];

export const WORK_MODALITIES = ['remote', 'hybrid', 'onsite', 'flexible'] as const;
export type WorkModality = (typeof WORK_MODALITIES)[number];

export const MOTIVATIONS = [
  'technical_challenge',
  'career_growth',
  'autonomy',
  'business_impact',
  'learning',
  'leadership',
  'innovation',
  'work_life_balance',
] as const;
export type Motivation = (typeof MOTIVATIONS)[number];

export const CANDIDATE_STATUSES = ['employed', 'job_seeker', 'student', 'freelance'] as const;
export type CandidateStatus = (typeof CANDIDATE_STATUSES)[number];

// =============================================================================
// RECORDS
// =============================================================================

export interface CandidateLocation {
  city?: string;
  postalCode?: string;
  maxCommuteMinutes?: number;
  acceptsRelocation?: boolean;
}

export interface CandidateRecord {
  id: string;

  // Seniority signals
  title?: string;
  summary?: string;
  yearsOfExperience?: number;

  skills?: string[];

  // Compensation
  currentSalary?: number;
  desiredSalary?: number;
  progressionExpectations?: number; // 1-5, 5 = very ambitious

  location?: CandidateLocation;

  // Sector
  currentSector?: string;
  preferredSectors?: string[];
  avoidedSectors?: string[];
  sectorTransitionOpenness?: number; // 1-5

  // Contracts, ranked most preferred first
  contractPreferences?: ContractType[];
  exclusiveContractSearch?: boolean;

  // Timing
  availableFrom?: string; // ISO date
  noticePeriodWeeks?: number;

  preferredModality?: WorkModality;
  remoteDaysWanted?: number;

  // Ranked most important first
  motivations?: Motivation[];

  listeningReason?: ListeningReason;
  secondaryListeningReasons?: ListeningReason[];

  status?: CandidateStatus;
  searchUrgency?: number; // 1-5, 5 = must move now
}

export interface PositionLocation {
  city?: string;
  postalCode?: string;
}

export interface PositionRecord {
  id: string;
  title?: string;
  description?: string;

  requiredSkills?: string[];
  minYearsExperience?: number;
  maxYearsExperience?: number;

  salaryMin?: number;
  salaryMax?: number;

  location?: PositionLocation;
  sector?: string;
  contractType?: ContractType;

  startDate?: string; // ISO date
  urgency?: number; // 1 = urgent, 5 = can wait

  workModality?: WorkModality;
  remoteDaysOffered?: number;

  offeredMotivations?: Motivation[];
}

/**
 * Pair-level facts computed by external collaborators (e.g. a travel-time
 * lookup) and handed to the core alongside the two records.
 */
export interface MatchContext {
  travelTimeMinutes?: number;
}

// =============================================================================
// SCORES
// =============================================================================

export type QualityTier = 'EXCELLENT' | 'GOOD' | 'ACCEPTABLE' | 'POOR';

export type ScoreDetailValue = string | number | boolean | null | string[];

export interface ComponentWeight {
  weight: number;
  baseWeight: number;
}

export interface ComponentScore {
  readonly component: ComponentId;
  readonly rawScore: number;
  readonly weightedScore: number;
  readonly weight: number;
  readonly baseWeight: number;
  readonly boostApplied: number;
  readonly quality: QualityTier;
  readonly confidence: number;
  readonly details: Readonly<Record<string, ScoreDetailValue>>;
  readonly processingTimeMs: number;
}

// =============================================================================
// HIERARCHY
// =============================================================================

export const HIERARCHICAL_LEVELS = {
  JUNIOR: 1,
  INTERMEDIATE: 2,
  SENIOR: 3,
  MANAGER: 4,
  EXECUTIVE: 5,
} as const;

export type HierarchicalTier = keyof typeof HIERARCHICAL_LEVELS;
export type HierarchicalLevel = (typeof HIERARCHICAL_LEVELS)[HierarchicalTier];

export type LevelSignal = 'title' | 'scope' | 'years' | 'default';

export interface LevelDetection {
  level: HierarchicalLevel;
  tier: HierarchicalTier;
  signal: LevelSignal;
  matched?: string;
}

export type HierarchyDirection = 'aligned' | 'overqualified' | 'underqualified';

export interface HierarchicalAdjustment {
  gap: number;
  direction: HierarchyDirection;
  multiplier: number;
  penalty: number;
  adjustedScore: number;
  mismatch: boolean;
}

export interface HierarchyAssessment extends HierarchicalAdjustment {
  candidate: LevelDetection;
  position: LevelDetection;
}

// =============================================================================
// RESULT
// =============================================================================

export type MatchAlertType =
  | 'CRITICAL_MISMATCH'
  | 'OVERQUALIFICATION'
  | 'UNDERQUALIFICATION'
  | 'SALARY_MISMATCH'
  | 'LOW_CONFIDENCE';

export interface MatchAlert {
  type: MatchAlertType;
  severity: 'info' | 'warning' | 'critical';
  message: string;
}

export type MatrixSource = 'base' | AdaptiveListeningReason;

export interface MatchResult {
  readonly candidateId: string;
  readonly positionId: string;
  readonly listeningReason: ListeningReason;
  readonly matrixSource: MatrixSource;
  readonly rawScore: number;
  readonly score: number;
  readonly quality: QualityTier;
  readonly components: readonly ComponentScore[];
  readonly hierarchy: Readonly<HierarchyAssessment>;
  readonly mismatchFlag: boolean;
  readonly confidence: number;
  readonly alerts: readonly MatchAlert[];
  readonly processingTimeMs: number;
}

export interface RankedMatches {
  ranked: MatchResult[];
  review: MatchResult[];
}
