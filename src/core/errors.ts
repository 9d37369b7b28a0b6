/**
 * Core Errors
 *
 * Configuration errors are fatal and raised while the engine is being built.
 * Scorer input errors never escape a scorer; they are turned into a neutral,
 * zero-confidence component score.
 */

export type ConfigurationErrorCode =
  | 'INVALID_ENV'
  | 'INVALID_WEIGHT_MATRIX'
  | 'INVALID_VOCABULARY'
  | 'INVALID_HIERARCHY_RULES'
  | 'CONFIG_NOT_FOUND'
  | 'CONFIG_PARSE_ERROR';

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public code: ConfigurationErrorCode,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class WeightMatrixConfigError extends ConfigurationError {
  constructor(
    message: string,
    public matrix: string,
    details?: Record<string, unknown>
  ) {
    super(message, 'INVALID_WEIGHT_MATRIX', { matrix, ...details });
    this.name = 'WeightMatrixConfigError';
  }
}

export class ScorerInputError extends Error {
  constructor(
    message: string,
    public field: string
  ) {
    super(message);
    this.name = 'ScorerInputError';
  }
}
