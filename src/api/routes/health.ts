/**
 * Health Check Routes
 */

import { Router } from 'express';
import type { WeightMatrixRegistry } from '../../core/weights/WeightMatrixRegistry.js';
import { LISTENING_REASONS, type AdaptiveListeningReason } from '../../domain/entities/Matching.js';

export function createHealthRoutes(registry: WeightMatrixRegistry): Router {
  const router = Router();

  /**
   * Basic health check
   */
  router.get('/', (_req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      service: 'adaptive-match-engine',
    });
  });

  /**
   * Readiness: the registry is built at startup, so a running process has one
   */
  router.get('/ready', (_req, res) => {
    res.json({
      status: 'ready',
      timestamp: new Date().toISOString(),
      checks: {
        weightMatrices: {
          status: 'healthy',
          count: registry.listMatrices().length,
          overrides: LISTENING_REASONS.filter(
            (reason): reason is AdaptiveListeningReason => reason !== 'unspecified' && registry.hasOverride(reason)
          ),
        },
      },
    });
  });

  /**
   * Liveness probe (Kubernetes)
   */
  router.get('/live', (_req, res) => {
    res.json({ status: 'live' });
  });

  return router;
}
