/**
 * Config Files - locate and read the JSON configuration shipped in config/
 */

import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { ConfigurationError } from '../core/errors.js';

// Same depth under src/ and dist/, so this resolves to <root>/config either way
const CONFIG_DIR = path.resolve(__dirname, '../../config');

export function resolveConfigPath(fileName: string): string {
  return path.join(CONFIG_DIR, fileName);
}

export function readJsonConfig(filePath: string): unknown {
  if (!existsSync(filePath)) {
    throw new ConfigurationError(`Configuration file not found: ${filePath}`, 'CONFIG_NOT_FOUND', {
      filePath,
    });
  }

  const raw = readFileSync(filePath, 'utf8');
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (error) {
    throw new ConfigurationError(`Configuration file is not valid JSON: ${filePath}`, 'CONFIG_PARSE_ERROR', {
      filePath,
      cause: error instanceof Error ? error.message : String(error),
    });
  }
}
