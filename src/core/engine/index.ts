export * from './MatchingEngine.js';
