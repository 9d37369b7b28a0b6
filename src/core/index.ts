/**
 * Core Module - Adaptive Matching
 *
 * Weights: full replacement matrices selected by listening reason
 * Scorers: one stateless scorer per component
 * Hierarchy: seniority detection and gap adjustment
 * Engine: aggregation into an explainable match result
 */

export * from './errors.js';

// Weights
export * from './weights/WeightMatrixRegistry.js';

// Scorers
export * from './scorers/index.js';

// Hierarchy
export * from './hierarchy/index.js';

// Engine
export * from './engine/index.js';
