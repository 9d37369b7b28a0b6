/**
 * Weight Matrix Registry - Adaptive Weighting by Listening Reason
 *
 * Holds the base matrix plus one complete replacement matrix per listening
 * reason. Every matrix is validated once, at construction:
 * - all twelve components present, nothing else
 * - each weight in [0, 1]
 * - weights sum to 1.0 within WEIGHT_SUM_TOLERANCE
 *
 * Overrides are never expressed as deltas on the base matrix.
 * A registry that constructed successfully is frozen and safe to share.
 */

import { z } from 'zod';
import {
  COMPONENT_IDS,
  LISTENING_REASONS,
  type AdaptiveListeningReason,
  type ComponentId,
  type ComponentWeight,
  type MatrixSource,
  type WeightMatrix,
} from '../../domain/entities/Matching.js';
import { readJsonConfig, resolveConfigPath } from '../../config/files.js';
import { WeightMatrixConfigError } from '../errors.js';

// =============================================================================
// SCHEMAS
// =============================================================================

export const WEIGHT_SUM_TOLERANCE = 1e-6;

const weightSchema = z.number().finite().min(0).max(1);

const matrixShape: Record<ComponentId, typeof weightSchema> = {
  semantic: weightSchema,
  salary: weightSchema,
  salary_progression: weightSchema,
  experience: weightSchema,
  location: weightSchema,
  sector_compatibility: weightSchema,
  contract_flexibility: weightSchema,
  timing_compatibility: weightSchema,
  work_modality: weightSchema,
  motivations: weightSchema,
  listening_reason: weightSchema,
  candidate_status: weightSchema,
};

const weightMatrixSchema = z.object(matrixShape).strict();

const weightMatrixConfigSchema = z
  .object({
    base: weightMatrixSchema,
    overrides: z
      .object({
        compensation: weightMatrixSchema.optional(),
        role_mismatch: weightMatrixSchema.optional(),
        location: weightMatrixSchema.optional(),
        flexibility: weightMatrixSchema.optional(),
        growth_prospects: weightMatrixSchema.optional(),
      })
      .strict()
      .default({}),
  })
  .strict();

// =============================================================================
// TYPES
// =============================================================================

export interface ResolvedWeightMatrix {
  source: MatrixSource;
  matrix: WeightMatrix;
}

const ADAPTIVE_REASONS = LISTENING_REASONS.filter(
  (reason): reason is AdaptiveListeningReason => reason !== 'unspecified'
);

// =============================================================================
// VALIDATION
// =============================================================================

export function sumWeights(matrix: WeightMatrix): number {
  let total = 0;
  for (const component of COMPONENT_IDS) {
    total += matrix[component];
  }
  return total;
}

function checkedMatrix(name: string, matrix: Record<ComponentId, number>): WeightMatrix {
  const total = sumWeights(matrix);
  if (Math.abs(total - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new WeightMatrixConfigError(
      `Weight matrix "${name}" sums to ${total.toFixed(6)}, expected 1.000000`,
      name,
      { total }
    );
  }
  return Object.freeze({ ...matrix });
}

function describeIssue(issue: z.ZodIssue): { matrix: string; message: string } {
  const [head, reason] = issue.path;
  let matrix = 'root';
  if (head === 'base') {
    matrix = 'base';
  } else if (head === 'overrides') {
    matrix = typeof reason === 'string' ? reason : 'overrides';
  }
  const field = issue.path.join('.') || '(root)';
  return { matrix, message: `${field}: ${issue.message}` };
}

// =============================================================================
// REGISTRY
// =============================================================================

export class WeightMatrixRegistry {
  private readonly base: WeightMatrix;
  private readonly overrides: ReadonlyMap<AdaptiveListeningReason, WeightMatrix>;

  constructor(config: unknown) {
    const parsed = weightMatrixConfigSchema.safeParse(config);
    if (!parsed.success) {
      const first = describeIssue(parsed.error.issues[0]);
      throw new WeightMatrixConfigError(`Invalid weight matrix configuration - ${first.message}`, first.matrix, {
        issues: parsed.error.issues.map((issue) => describeIssue(issue).message),
      });
    }

    this.base = checkedMatrix('base', parsed.data.base);

    const overrides = new Map<AdaptiveListeningReason, WeightMatrix>();
    for (const reason of ADAPTIVE_REASONS) {
      const matrix = parsed.data.overrides[reason];
      if (matrix) {
        overrides.set(reason, checkedMatrix(reason, matrix));
      }
    }
    this.overrides = overrides;

    Object.freeze(this);
  }

  /**
   * Matrix for a listening reason; the base matrix for unknown, missing or
   * unspecified reasons.
   */
  getMatrix(reason?: string | null): WeightMatrix {
    return this.resolve(reason).matrix;
  }

  resolve(reason?: string | null): ResolvedWeightMatrix {
    const adaptive = ADAPTIVE_REASONS.find((candidate) => candidate === reason);
    const override = adaptive ? this.overrides.get(adaptive) : undefined;
    if (adaptive && override) {
      return { source: adaptive, matrix: override };
    }
    return { source: 'base', matrix: this.base };
  }

  getBaseMatrix(): WeightMatrix {
    return this.base;
  }

  /**
   * Weight assigned to a component by the given matrix, alongside the base
   * weight it replaces.
   */
  weightFor(matrix: WeightMatrix, component: ComponentId): ComponentWeight {
    return {
      weight: matrix[component],
      baseWeight: this.base[component],
    };
  }

  listMatrices(): ResolvedWeightMatrix[] {
    const entries: ResolvedWeightMatrix[] = [{ source: 'base', matrix: this.base }];
    for (const [source, matrix] of this.overrides) {
      entries.push({ source, matrix });
    }
    return entries;
  }

  hasOverride(reason: AdaptiveListeningReason): boolean {
    return this.overrides.has(reason);
  }
}

// =============================================================================
// LOADING
// =============================================================================

export const DEFAULT_WEIGHT_MATRICES_FILE = 'weight-matrices.json';

export function loadWeightMatrixRegistry(
  filePath: string = resolveConfigPath(DEFAULT_WEIGHT_MATRICES_FILE)
): WeightMatrixRegistry {
  const registry = new WeightMatrixRegistry(readJsonConfig(filePath));
  console.log(`[Registry] Loaded ${registry.listMatrices().length} weight matrices from ${filePath}`);
  return registry;
}
