export * from './HierarchicalLevelDetector.js';
export * from './HierarchicalCompatibilityAdjuster.js';
