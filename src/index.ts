/**
 * Adaptive Match Engine - Main Entry Point
 *
 * Loads and validates the scoring configuration, then serves the matching API.
 */

import 'dotenv/config';
import { createApp } from './api/app.js';
import { loadConfig } from './config/index.js';
import {
  HierarchicalCompatibilityAdjuster,
  MatchingEngine,
  createScorers,
  loadHierarchicalLevelDetector,
  loadSectorConnections,
  loadWeightMatrixRegistry,
} from './core/index.js';

// =============================================================================
// STARTUP
// =============================================================================

function start() {
  const config = loadConfig();

  console.log(`Environment: ${config.nodeEnv}`);
  console.log('Starting Adaptive Match Engine...\n');

  // Configuration errors are fatal: nothing is served with an invalid matrix
  console.log('Loading weight matrices...');
  const registry = loadWeightMatrixRegistry(config.weightMatricesPath);

  console.log('Loading seniority vocabulary and sector connections...');
  const detector = loadHierarchicalLevelDetector(config.seniorityVocabularyPath);
  const scorers = createScorers({ sectorConnections: loadSectorConnections(config.sectorConnectionsPath) });
  const adjuster = new HierarchicalCompatibilityAdjuster(config.hierarchy);

  const engine = new MatchingEngine({ registry, detector, adjuster, scorers });

  const app = createApp({ engine, registry, corsOrigin: config.corsOrigin });

  const server = app.listen(config.port, () => {
    console.log(`\nAdaptive Match Engine API running on http://localhost:${config.port}`);
    console.log(`Health check: http://localhost:${config.port}/health`);
    console.log(`API base: http://localhost:${config.port}/api/matching\n`);
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    console.log(`\n${signal} received. Starting graceful shutdown...`);

    server.close((error) => {
      if (error) {
        console.error('Error during shutdown:', error);
        process.exit(1);
      }
      console.log('HTTP server closed');
      console.log('Shutdown complete');
      process.exit(0);
    });

    // Force exit after timeout
    setTimeout(() => {
      console.error('Forced shutdown after timeout');
      process.exit(1);
    }, 30000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

// =============================================================================
// RUN
// =============================================================================

try {
  start();
} catch (error) {
  console.error('Failed to start Adaptive Match Engine:', error);
  process.exit(1);
}
