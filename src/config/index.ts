/**
 * Configuration - environment variables parsed once at startup
 */

import path from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';
import { resolveConfigPath } from './files.js';

export { readJsonConfig, resolveConfigPath } from './files.js';

// =============================================================================
// SCHEMA
// =============================================================================

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  CORS_ORIGIN: z.string().min(1).default('*'),
  WEIGHT_MATRICES_PATH: z.string().min(1).optional(),
  SENIORITY_VOCABULARY_PATH: z.string().min(1).optional(),
  SECTOR_CONNECTIONS_PATH: z.string().min(1).optional(),
  HIERARCHY_OVERQUALIFICATION_RATE: z.coerce.number().nonnegative().default(0.15),
  HIERARCHY_UNDERQUALIFICATION_RATE: z.coerce.number().nonnegative().default(0.08),
  HIERARCHY_MISMATCH_THRESHOLD: z.coerce.number().nonnegative().default(2),
});

// =============================================================================
// TYPES
// =============================================================================

export interface AppConfig {
  nodeEnv: 'development' | 'test' | 'production';
  port: number;
  corsOrigin: string;
  weightMatricesPath: string;
  seniorityVocabularyPath: string;
  sectorConnectionsPath: string;
  hierarchy: {
    overqualificationRate: number;
    underqualificationRate: number;
    mismatchThreshold: number;
  };
}

// =============================================================================
// LOADING
// =============================================================================

function configFile(override: string | undefined, fileName: string): string {
  return override ? path.resolve(override) : resolveConfigPath(fileName);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid environment configuration', 'INVALID_ENV', {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  const vars = parsed.data;
  return {
    nodeEnv: vars.NODE_ENV,
    port: vars.PORT,
    corsOrigin: vars.CORS_ORIGIN,
    weightMatricesPath: configFile(vars.WEIGHT_MATRICES_PATH, 'weight-matrices.json'),
    seniorityVocabularyPath: configFile(vars.SENIORITY_VOCABULARY_PATH, 'seniority-vocabulary.json'),
    sectorConnectionsPath: configFile(vars.SECTOR_CONNECTIONS_PATH, 'sector-connections.json'),
    hierarchy: {
      overqualificationRate: vars.HIERARCHY_OVERQUALIFICATION_RATE,
      underqualificationRate: vars.HIERARCHY_UNDERQUALIFICATION_RATE,
      mismatchThreshold: vars.HIERARCHY_MISMATCH_THRESHOLD,
    },
  };
}
