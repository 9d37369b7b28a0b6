/**
 * Matching API Routes
 *
 * Thin HTTP surface over the matching engine: evaluate one pair, rank a
 * candidate against several positions, and inspect the weight matrices.
 */

import { Router } from 'express';
import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import {
  CANDIDATE_STATUSES,
  COMPONENT_IDS,
  CONTRACT_TYPES,
  LISTENING_REASONS,
  MOTIVATIONS,
  WORK_MODALITIES,
  isListeningReason,
  type WeightMatrix,
} from '../../domain/entities/index.js';
import type { MatchingEngine } from '../../core/engine/MatchingEngine.js';
import type { ResolvedWeightMatrix, WeightMatrixRegistry } from '../../core/weights/WeightMatrixRegistry.js';
import { NotFoundError } from '../middleware/errorHandler.js';

// =============================================================================
// VALIDATION SCHEMAS
// =============================================================================

const MAX_POSITIONS_PER_RANKING = 200;

const isoDate = z.string().refine((value) => !Number.isNaN(Date.parse(value)), 'Invalid ISO date');
const scale = z.number().int().min(1).max(5);
const amount = z.number().nonnegative();

const candidateSchema = z.object({
  id: z.string().min(1),
  title: z.string().optional(),
  summary: z.string().optional(),
  yearsOfExperience: z.number().nonnegative().optional(),
  skills: z.array(z.string()).optional(),
  currentSalary: amount.optional(),
  desiredSalary: amount.optional(),
  progressionExpectations: scale.optional(),
  location: z
    .object({
      city: z.string().optional(),
      postalCode: z.string().optional(),
      maxCommuteMinutes: z.number().positive().optional(),
      acceptsRelocation: z.boolean().optional(),
    })
    .optional(),
  currentSector: z.string().optional(),
  preferredSectors: z.array(z.string()).optional(),
  avoidedSectors: z.array(z.string()).optional(),
  sectorTransitionOpenness: scale.optional(),
  contractPreferences: z.array(z.enum(CONTRACT_TYPES)).optional(),
  exclusiveContractSearch: z.boolean().optional(),
  availableFrom: isoDate.optional(),
  noticePeriodWeeks: z.number().nonnegative().optional(),
  preferredModality: z.enum(WORK_MODALITIES).optional(),
  remoteDaysWanted: z.number().int().min(0).max(5).optional(),
  motivations: z.array(z.enum(MOTIVATIONS)).optional(),
  listeningReason: z.enum(LISTENING_REASONS).optional(),
  secondaryListeningReasons: z.array(z.enum(LISTENING_REASONS)).optional(),
  status: z.enum(CANDIDATE_STATUSES).optional(),
  searchUrgency: scale.optional(),
});

const positionSchema = z.object({
  id: z.string().min(1),
  title: z.string().optional(),
  description: z.string().optional(),
  requiredSkills: z.array(z.string()).optional(),
  minYearsExperience: z.number().nonnegative().optional(),
  maxYearsExperience: z.number().nonnegative().optional(),
  salaryMin: amount.optional(),
  salaryMax: amount.optional(),
  location: z
    .object({
      city: z.string().optional(),
      postalCode: z.string().optional(),
    })
    .optional(),
  sector: z.string().optional(),
  contractType: z.enum(CONTRACT_TYPES).optional(),
  startDate: isoDate.optional(),
  urgency: scale.optional(),
  workModality: z.enum(WORK_MODALITIES).optional(),
  remoteDaysOffered: z.number().int().min(0).max(5).optional(),
  offeredMotivations: z.array(z.enum(MOTIVATIONS)).optional(),
});

const contextSchema = z
  .object({
    travelTimeMinutes: z.number().nonnegative().optional(),
  })
  .default({});

const evaluateSchema = z.object({
  candidate: candidateSchema,
  position: positionSchema,
  context: contextSchema,
});

const rankSchema = z.object({
  candidate: candidateSchema,
  positions: z.array(positionSchema).min(1).max(MAX_POSITIONS_PER_RANKING),
  context: contextSchema,
});

// =============================================================================
// HELPERS
// =============================================================================

function explainMatrix(resolved: ResolvedWeightMatrix, base: WeightMatrix) {
  return {
    source: resolved.source,
    weights: COMPONENT_IDS.map((component) => ({
      component,
      weight: resolved.matrix[component],
      baseWeight: base[component],
      boost: resolved.matrix[component] - base[component],
    })),
  };
}

// =============================================================================
// ROUTES
// =============================================================================

export function createMatchingRoutes(engine: MatchingEngine, registry: WeightMatrixRegistry): Router {
  const router = Router();

  /**
   * GET /matching/weights - All registered weight matrices
   */
  router.get('/weights', (_req, res, next) => {
    try {
      const base = registry.getBaseMatrix();
      const matrices = registry.listMatrices().map((entry) => explainMatrix(entry, base));

      res.json({ data: matrices, count: matrices.length });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /matching/weights/:reason - Matrix applied for one listening reason
   */
  router.get('/weights/:reason', (req, res, next) => {
    try {
      const { reason } = req.params;
      if (!isListeningReason(reason)) {
        throw new NotFoundError('Listening reason', reason);
      }

      res.json({
        reason,
        ...explainMatrix(registry.resolve(reason), registry.getBaseMatrix()),
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /matching/evaluate - Score one candidate against one position
   */
  router.post('/evaluate', (req, res, next) => {
    try {
      const { candidate, position, context } = evaluateSchema.parse(req.body);
      const result = engine.evaluate(candidate, position, context);

      res.json({ data: result });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /matching/rank - Rank positions for a candidate
   */
  router.post('/rank', (req, res, next) => {
    try {
      const { candidate, positions, context } = rankSchema.parse(req.body);
      const evaluationId = uuidv4();
      const { ranked, review } = engine.rank(candidate, positions, context);

      console.log(
        `[API] Ranking ${evaluationId}: ${positions.length} positions for candidate ${candidate.id}`
      );

      res.json({
        evaluationId,
        data: { ranked, review },
        count: ranked.length,
        reviewCount: review.length,
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
