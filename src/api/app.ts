/**
 * Express Application - Adaptive Match Engine API
 */

import { randomUUID } from 'node:crypto';
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';

import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { createHealthRoutes, createMatchingRoutes } from './routes/index.js';
import type { MatchingEngine } from '../core/engine/MatchingEngine.js';
import type { WeightMatrixRegistry } from '../core/weights/WeightMatrixRegistry.js';

export interface AppDependencies {
  engine: MatchingEngine;
  registry: WeightMatrixRegistry;
  corsOrigin?: string;
}

// =============================================================================
// CREATE APP
// =============================================================================

export function createApp({ engine, registry, corsOrigin = '*' }: AppDependencies) {
  const app = express();

  // ===========================================================================
  // GLOBAL MIDDLEWARE
  // ===========================================================================

  // Security headers
  app.use(helmet());

  // CORS
  app.use(
    cors({
      origin: corsOrigin,
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'X-Request-Id'],
    })
  );

  // Body parsing
  app.use(express.json({ limit: '2mb' }));

  // Request ID
  app.use((req, res, next) => {
    const header = req.headers['x-request-id'];
    const requestId = (Array.isArray(header) ? header[0] : header) || randomUUID();
    req.headers['x-request-id'] = requestId;
    res.setHeader('X-Request-Id', requestId);
    next();
  });

  // ===========================================================================
  // ROUTES
  // ===========================================================================

  // Health checks
  app.use('/health', createHealthRoutes(registry));

  // Matching API
  app.use('/api/matching', createMatchingRoutes(engine, registry));

  // ===========================================================================
  // ERROR HANDLING
  // ===========================================================================

  // 404 handler
  app.use(notFoundHandler);

  // Error handler
  app.use(errorHandler);

  return app;
}

export default createApp;
