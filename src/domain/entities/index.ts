/**
 * Domain Entities - Adaptive Match Engine
 *
 * Candidate and position records, component scores and the match result.
 */

export * from './Matching.js';
