/**
 * Sector Compatibility Scorer
 *
 * Exact and preferred sectors first, then the sector connection graph from
 * config/sector-connections.json. Transition openness (1-5) shifts every
 * non-exact match up or down.
 */

import { z } from 'zod';
import type { CandidateRecord, PositionRecord } from '../../domain/entities/Matching.js';
import { readJsonConfig, resolveConfigPath } from '../../config/files.js';
import { ConfigurationError } from '../errors.js';
import { BaseScorer, degraded, normalizeText, round, type ScorerEvaluation } from './BaseScorer.js';

// =============================================================================
// CONNECTIONS
// =============================================================================

const sectorConnectionsSchema = z.record(
  z.string(),
  z
    .object({
      direct: z.array(z.string()).default([]),
      natural: z.array(z.string()).default([]),
      distant: z.array(z.string()).default([]),
    })
    .strict()
);

export type SectorConnections = z.output<typeof sectorConnectionsSchema>;

export type SectorRelation = 'direct' | 'natural' | 'distant' | 'none';

export const DEFAULT_SECTOR_CONNECTIONS_FILE = 'sector-connections.json';

export function parseSectorConnections(raw: unknown): SectorConnections {
  const parsed = sectorConnectionsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid sector connections', 'INVALID_VOCABULARY', {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return parsed.data;
}

export function loadSectorConnections(
  filePath: string = resolveConfigPath(DEFAULT_SECTOR_CONNECTIONS_FILE)
): SectorConnections {
  return parseSectorConnections(readJsonConfig(filePath));
}

// =============================================================================
// SCORER
// =============================================================================

const RELATION_SCORES: Record<SectorRelation, number> = {
  direct: 0.8,
  natural: 0.65,
  distant: 0.45,
  none: 0.3,
};

const AVOIDED_SCORE = 0.1;
const CURRENT_SCORE = 1.0;
const PREFERRED_SCORE = 0.95;
const NEUTRAL_OPENNESS = 3;
const OPENNESS_STEP = 0.05;

export class SectorCompatibilityScorer extends BaseScorer {
  readonly component = 'sector_compatibility' as const;

  private readonly connections: ReadonlyMap<string, SectorConnections[string]>;

  constructor(connections: SectorConnections) {
    super();
    this.connections = new Map(
      Object.entries(connections).map(([sector, links]) => [
        normalizeText(sector),
        {
          direct: links.direct.map(normalizeText),
          natural: links.natural.map(normalizeText),
          distant: links.distant.map(normalizeText),
        },
      ])
    );
  }

  relation(from: string, to: string): SectorRelation {
    const forward = this.lookup(from, to);
    if (forward !== 'none') return forward;
    return this.lookup(to, from);
  }

  protected evaluate(candidate: CandidateRecord, position: PositionRecord): ScorerEvaluation {
    const target = normalizeText(position.sector);
    if (!target) {
      return degraded('missing_position_sector');
    }

    const avoided = (candidate.avoidedSectors ?? []).map(normalizeText);
    if (avoided.includes(target)) {
      return { rawScore: AVOIDED_SCORE, confidence: 0.9, details: { sector: target, basis: 'avoided' } };
    }

    const current = normalizeText(candidate.currentSector);
    if (current && current === target) {
      return { rawScore: CURRENT_SCORE, confidence: 0.9, details: { sector: target, basis: 'current' } };
    }

    const openness = candidate.sectorTransitionOpenness ?? NEUTRAL_OPENNESS;
    const shift = (openness - NEUTRAL_OPENNESS) * OPENNESS_STEP;

    const preferred = (candidate.preferredSectors ?? []).map(normalizeText);
    if (preferred.includes(target)) {
      return {
        rawScore: PREFERRED_SCORE + shift,
        confidence: 0.85,
        details: { sector: target, basis: 'preferred', opennessShift: round(shift) },
      };
    }

    if (!current) {
      return degraded('missing_candidate_sector', { sector: target });
    }

    const relation = this.relation(current, target);
    return {
      rawScore: RELATION_SCORES[relation] + shift,
      confidence: relation === 'none' ? 0.5 : 0.7,
      details: {
        sector: target,
        currentSector: current,
        basis: relation,
        opennessShift: round(shift),
      },
    };
  }

  private lookup(from: string, to: string): SectorRelation {
    const links = this.connections.get(from);
    if (!links) return 'none';
    if (links.direct.includes(to)) return 'direct';
    if (links.natural.includes(to)) return 'natural';
    if (links.distant.includes(to)) return 'distant';
    return 'none';
  }
}
