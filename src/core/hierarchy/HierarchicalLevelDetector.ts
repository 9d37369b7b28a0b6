/**
 * Hierarchical Level Detector
 *
 * Maps seniority signals on a candidate or position to an ordinal level
 * 1 (JUNIOR) .. 5 (EXECUTIVE). The rules are data, loaded from
 * config/seniority-vocabulary.json. Signals are read strongest first: every
 * tier's title patterns (in table order: EXECUTIVE, MANAGER, SENIOR, JUNIOR),
 * then every tier's scope patterns, then the years rules. An explicit title
 * therefore outranks scope text from a description. A tier's title exclusions
 * ("assistant to the CFO") stop its title patterns from matching.
 * Nothing matching means INTERMEDIATE.
 */

import { z } from 'zod';
import {
  HIERARCHICAL_LEVELS,
  type CandidateRecord,
  type HierarchicalTier,
  type LevelDetection,
  type PositionRecord,
} from '../../domain/entities/Matching.js';
import { readJsonConfig, resolveConfigPath } from '../../config/files.js';
import { ConfigurationError } from '../errors.js';

// =============================================================================
// SCHEMAS
// =============================================================================

const tierSchema = z.enum(['JUNIOR', 'INTERMEDIATE', 'SENIOR', 'MANAGER', 'EXECUTIVE']);

const tierRuleSchema = z
  .object({
    tier: tierSchema,
    level: z.number().int().min(1).max(5),
    titlePatterns: z.array(z.string()).default([]),
    titleExclusions: z.array(z.string()).default([]),
    scopePatterns: z.array(z.string()).default([]),
    minYears: z.number().nonnegative().optional(),
    maxYears: z.number().nonnegative().optional(),
  })
  .strict();

const seniorityVocabularySchema = z
  .object({
    tiers: z.array(tierRuleSchema).min(1),
    default: z.object({ tier: tierSchema, level: z.number().int().min(1).max(5) }).strict(),
  })
  .strict();

export type SeniorityVocabulary = z.input<typeof seniorityVocabularySchema>;

// =============================================================================
// TYPES
// =============================================================================

/**
 * The signals a detector reads, whichever side of the match they come from.
 */
export interface SenioritySignals {
  title?: string;
  scopeText?: string;
  years?: number;
}

interface CompiledTier {
  tier: HierarchicalTier;
  titlePatterns: RegExp[];
  titleExclusions: RegExp[];
  scopePatterns: RegExp[];
  minYears?: number;
  maxYears?: number;
}

export const DEFAULT_SENIORITY_VOCABULARY_FILE = 'seniority-vocabulary.json';

// =============================================================================
// DETECTOR
// =============================================================================

export class HierarchicalLevelDetector {
  private readonly tiers: readonly CompiledTier[];
  private readonly fallback: HierarchicalTier;

  constructor(vocabulary: unknown) {
    const parsed = seniorityVocabularySchema.safeParse(vocabulary);
    if (!parsed.success) {
      throw new ConfigurationError('Invalid seniority vocabulary', 'INVALID_VOCABULARY', {
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }

    for (const rule of [...parsed.data.tiers, parsed.data.default]) {
      if (HIERARCHICAL_LEVELS[rule.tier] !== rule.level) {
        throw new ConfigurationError(
          `Tier ${rule.tier} must have level ${HIERARCHICAL_LEVELS[rule.tier]}, got ${rule.level}`,
          'INVALID_VOCABULARY',
          { tier: rule.tier }
        );
      }
    }

    this.tiers = parsed.data.tiers.map((rule) => ({
      tier: rule.tier,
      titlePatterns: rule.titlePatterns.map((pattern) => compilePattern(pattern, rule.tier)),
      titleExclusions: rule.titleExclusions.map((pattern) => compilePattern(pattern, rule.tier)),
      scopePatterns: rule.scopePatterns.map((pattern) => compilePattern(pattern, rule.tier)),
      minYears: rule.minYears,
      maxYears: rule.maxYears,
    }));
    this.fallback = parsed.data.default.tier;
  }

  detectCandidateLevel(candidate: CandidateRecord): LevelDetection {
    return this.detect({
      title: candidate.title,
      scopeText: candidate.summary,
      years: candidate.yearsOfExperience,
    });
  }

  detectPositionLevel(position: PositionRecord): LevelDetection {
    return this.detect({
      title: position.title,
      scopeText: position.description,
      years: position.minYearsExperience,
    });
  }

  detect(signals: SenioritySignals): LevelDetection {
    const title = (signals.title ?? '').toLowerCase();
    const scope = (signals.scopeText ?? '').toLowerCase();

    if (title) {
      for (const rule of this.tiers) {
        if (rule.titleExclusions.some((pattern) => pattern.test(title))) continue;
        const titleMatch = firstMatch(rule.titlePatterns, title);
        if (titleMatch !== undefined) {
          return detection(rule.tier, 'title', titleMatch);
        }
      }
    }

    if (scope) {
      for (const rule of this.tiers) {
        const scopeMatch = firstMatch(rule.scopePatterns, scope);
        if (scopeMatch !== undefined) {
          return detection(rule.tier, 'scope', scopeMatch);
        }
      }
    }

    const years = signals.years;
    if (years !== undefined) {
      const rule = this.tiers.find((candidate) => matchesYears(candidate, years));
      if (rule) {
        return detection(rule.tier, 'years', `${years} years`);
      }
    }

    return detection(this.fallback, 'default');
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function compilePattern(pattern: string, tier: HierarchicalTier): RegExp {
  try {
    return new RegExp(pattern, 'iu');
  } catch (error) {
    throw new ConfigurationError(`Invalid pattern for tier ${tier}: ${pattern}`, 'INVALID_VOCABULARY', {
      tier,
      pattern,
      cause: error instanceof Error ? error.message : String(error),
    });
  }
}

function firstMatch(patterns: RegExp[], text: string): string | undefined {
  for (const pattern of patterns) {
    const match = pattern.exec(text);
    if (match) return match[0];
  }
  return undefined;
}

function matchesYears(rule: CompiledTier, years: number): boolean {
  if (rule.minYears === undefined && rule.maxYears === undefined) return false;
  if (rule.minYears !== undefined && years < rule.minYears) return false;
  if (rule.maxYears !== undefined && years > rule.maxYears) return false;
  return true;
}

function detection(tier: HierarchicalTier, signal: LevelDetection['signal'], matched?: string): LevelDetection {
  return matched === undefined
    ? { tier, level: HIERARCHICAL_LEVELS[tier], signal }
    : { tier, level: HIERARCHICAL_LEVELS[tier], signal, matched };
}

export function loadHierarchicalLevelDetector(
  filePath: string = resolveConfigPath(DEFAULT_SENIORITY_VOCABULARY_FILE)
): HierarchicalLevelDetector {
  return new HierarchicalLevelDetector(readJsonConfig(filePath));
}
