/**
 * Component Scorer Tests
 *
 * Each scorer is exercised on hand-built records; the wrapper contract
 * (weighting, quality, degradation) is checked once on the base class.
 */

import { describe, it, expect } from '@jest/globals';
import {
  CandidateStatusScorer,
  ContractFlexibilityScorer,
  ExperienceScorer,
  ListeningReasonScorer,
  LocationScorer,
  MotivationsScorer,
  SalaryProgressionScorer,
  SalaryScorer,
  SectorCompatibilityScorer,
  SemanticScorer,
  TimingCompatibilityScorer,
  WorkModalityScorer,
  classifyQuality,
  createScorers,
  loadSectorConnections,
  noticeImpact,
  recruitmentUrgency,
  toleranceWeeks,
} from '../../core/scorers/index.js';
import { COMPONENT_IDS, type ComponentWeight } from '../../domain/entities/Matching.js';
import { buildCandidate, buildPosition } from '../helpers/records.js';

const WEIGHT: ComponentWeight = { weight: 0.1, baseWeight: 0.1 };

describe('Component scorers', () => {
  describe('BaseScorer contract', () => {
    it('should compute weighted score and boost from the supplied weight', () => {
      const result = new SalaryScorer().score(buildCandidate(), buildPosition(), { weight: 0.32, baseWeight: 0.19 });

      expect(result.component).toBe('salary');
      expect(result.rawScore).toBe(1);
      expect(result.weightedScore).toBe(result.rawScore * 0.32);
      expect(result.boostApplied).toBeCloseTo(0.13, 10);
      expect(result.quality).toBe('EXCELLENT');
    });

    it('should measure processing time with the supplied clock', () => {
      let now = 100;
      const clock = () => (now += 5);

      const result = new SalaryScorer().score(buildCandidate(), buildPosition(), WEIGHT, {}, clock);

      expect(result.processingTimeMs).toBe(5);
    });

    it('should return frozen scores', () => {
      const result = new ExperienceScorer().score(buildCandidate(), buildPosition(), WEIGHT);

      expect(Object.isFrozen(result)).toBe(true);
      expect(Object.isFrozen(result.details)).toBe(true);
    });

    it('should classify quality tiers on the raw score', () => {
      expect(classifyQuality(0.81)).toBe('EXCELLENT');
      expect(classifyQuality(0.8)).toBe('GOOD');
      expect(classifyQuality(0.61)).toBe('GOOD');
      expect(classifyQuality(0.6)).toBe('ACCEPTABLE');
      expect(classifyQuality(0.3)).toBe('ACCEPTABLE');
      expect(classifyQuality(0.29)).toBe('POOR');
    });

    it('should register exactly one scorer per component', () => {
      const scorers = createScorers();

      for (const component of COMPONENT_IDS) {
        expect(scorers[component].component).toBe(component);
      }
    });
  });

  describe('SalaryProgressionScorer', () => {
    const scorer = new SalaryProgressionScorer();

    it('should degrade to a neutral, zero-confidence score when salaries are missing', () => {
      const result = scorer.score(buildCandidate({ currentSalary: undefined }), buildPosition(), WEIGHT);

      expect(result.rawScore).toBe(0.5);
      expect(result.confidence).toBe(0);
      expect(result.details.degradedReason).toBe('missing_salary_data');
      expect(result.details.expectedProgressionPct).toBe(0);
      expect(result.details.offeredProgressionPct).toBe(0);
    });

    it('should treat a missing ceiling as no progression on offer', () => {
      const result = scorer.score(
        buildCandidate({ currentSalary: 50000, desiredSalary: 60000 }),
        buildPosition({ salaryMax: undefined }),
        WEIGHT
      );

      expect(result.rawScore).toBe(0.2);
      expect(result.confidence).toBe(0.9);
      expect(result.details.expectedProgressionPct).toBe(20);
      expect(result.details.offeredProgressionPct).toBe(0);
    });

    it('should still add the modest expectation bonus without a ceiling', () => {
      const result = scorer.score(buildCandidate(), buildPosition({ salaryMax: undefined }), WEIGHT);

      expect(result.rawScore).toBeCloseTo(0.3, 10);
      expect(result.details.modestExpectationBonus).toBe(true);
    });

    it('should score 1.0 when the offered raise covers the expected raise', () => {
      const result = scorer.score(
        buildCandidate({ currentSalary: 50000, desiredSalary: 55000 }),
        buildPosition({ salaryMax: 60000 }),
        WEIGHT
      );

      expect(result.rawScore).toBe(1);
      expect(result.details.expectedProgressionPct).toBe(10);
      expect(result.details.offeredProgressionPct).toBe(20);
    });

    it('should score the covered share of an ambitious raise', () => {
      const result = scorer.score(
        buildCandidate({ currentSalary: 50000, desiredSalary: 60000 }),
        buildPosition({ salaryMax: 55000 }),
        WEIGHT
      );

      expect(result.rawScore).toBeCloseTo(0.5, 10);
      expect(result.details.modestExpectationBonus).toBe(false);
    });

    it('should floor a partial raise at 0.4 and add the bonus for modest expectations', () => {
      const candidate = buildCandidate({ currentSalary: 50000, desiredSalary: 56000 });
      const position = buildPosition({ salaryMax: 52000 });

      expect(scorer.score(candidate, position, WEIGHT).rawScore).toBeCloseTo(0.5, 10);
      expect(
        scorer.score({ ...candidate, progressionExpectations: 5 }, position, WEIGHT).rawScore
      ).toBeCloseTo(0.4, 10);
    });

    it('should score 0.2 when the ceiling is below the current salary', () => {
      const result = scorer.score(
        buildCandidate({ currentSalary: 50000, desiredSalary: 60000 }),
        buildPosition({ salaryMax: 48000 }),
        WEIGHT
      );

      expect(result.rawScore).toBe(0.2);
      expect(result.details.offeredProgressionPct).toBe(0);
    });
  });

  describe('SalaryScorer', () => {
    const scorer = new SalaryScorer();
    const position = buildPosition({ salaryMax: 48000 });

    const cases: Array<[number, number]> = [
      [44000, 1.0],
      [55000, 0.7],
      [70000, 0.4],
      [80000, 0.1],
    ];

    it.each(cases)('should score a desired salary of %d at %s', (desiredSalary, expected) => {
      expect(scorer.score(buildCandidate({ desiredSalary }), position, WEIGHT).rawScore).toBe(expected);
    });

    it('should fall back to the current salary', () => {
      const result = scorer.score(buildCandidate({ desiredSalary: undefined, currentSalary: 30000 }), position, WEIGHT);

      expect(result.rawScore).toBe(1);
      expect(result.details.candidateFloor).toBe(30000);
      expect(result.details.belowPositionMinimum).toBe(true);
    });
  });

  describe('ExperienceScorer', () => {
    const scorer = new ExperienceScorer();
    const position = buildPosition({ minYearsExperience: 3, maxYearsExperience: 7 });

    const cases: Array<[number, number, string]> = [
      [5, 1.0, 'within_range'],
      [10, 0.8, 'slightly_above'],
      [12, 0.6, 'well_above'],
      [2.5, 0.6, 'slightly_below'],
      [1, 0.3, 'well_below'],
    ];

    it.each(cases)('should score %d years at %s', (yearsOfExperience, expected, band) => {
      const result = scorer.score(buildCandidate({ yearsOfExperience }), position, WEIGHT);

      expect(result.rawScore).toBe(expected);
      expect(result.details.band).toBe(band);
    });

    it('should degrade without any requirement on the position', () => {
      const result = scorer.score(
        buildCandidate(),
        buildPosition({ minYearsExperience: undefined, maxYearsExperience: undefined }),
        WEIGHT
      );

      expect(result.confidence).toBe(0);
      expect(result.details.degradedReason).toBe('missing_position_requirements');
    });
  });

  describe('LocationScorer', () => {
    const scorer = new LocationScorer();

    const cases: Array<[number, number]> = [
      [20, 1.0],
      [40, 0.8],
      [60, 0.5],
      [90, 0.2],
    ];

    it.each(cases)('should score a %d minute commute at %s', (travelTimeMinutes, expected) => {
      const result = scorer.score(buildCandidate(), buildPosition(), WEIGHT, { travelTimeMinutes });

      expect(result.rawScore).toBe(expected);
      expect(result.details.basis).toBe('travel_time');
    });

    it('should soften a long commute when the candidate would relocate', () => {
      const candidate = buildCandidate({
        location: { city: 'Lyon', postalCode: '69003', maxCommuteMinutes: 45, acceptsRelocation: true },
      });

      expect(scorer.score(candidate, buildPosition(), WEIGHT, { travelTimeMinutes: 90 }).rawScore).toBe(0.6);
    });

    it('should compare cities and postal areas without travel time', () => {
      expect(scorer.score(buildCandidate(), buildPosition(), WEIGHT).rawScore).toBe(0.9);

      const neighbour = buildCandidate({ location: { city: 'Villeurbanne', postalCode: '69100' } });
      expect(scorer.score(neighbour, buildPosition(), WEIGHT).rawScore).toBe(0.75);

      const distant = buildCandidate({ location: { city: 'Paris', postalCode: '75001' } });
      expect(scorer.score(distant, buildPosition(), WEIGHT).rawScore).toBe(0.3);
    });

    it('should treat a fully remote position as compatible', () => {
      const distant = buildCandidate({ location: { city: 'Paris', postalCode: '75001' } });

      expect(scorer.score(distant, buildPosition({ workModality: 'remote' }), WEIGHT).rawScore).toBe(1);
    });

    it('should ignore travel time for a fully remote position', () => {
      const result = scorer.score(buildCandidate(), buildPosition({ workModality: 'remote' }), WEIGHT, {
        travelTimeMinutes: 120,
      });

      expect(result.rawScore).toBe(1);
      expect(result.confidence).toBe(0.8);
      expect(result.details.basis).toBe('full_remote');
    });
  });

  describe('SectorCompatibilityScorer', () => {
    const scorer = new SectorCompatibilityScorer(loadSectorConnections());

    it('should score the current sector at 1.0', () => {
      expect(scorer.score(buildCandidate(), buildPosition({ sector: 'Accounting' }), WEIGHT).rawScore).toBe(1);
    });

    it('should score avoided sectors lowest', () => {
      const result = scorer.score(buildCandidate(), buildPosition({ sector: 'retail' }), WEIGHT);

      expect(result.rawScore).toBe(0.1);
      expect(result.details.basis).toBe('avoided');
    });

    it('should score preferred sectors just below the current one', () => {
      expect(scorer.score(buildCandidate(), buildPosition({ sector: 'audit' }), WEIGHT).rawScore).toBe(0.95);
    });

    it('should follow the sector graph and shift by openness', () => {
      const position = buildPosition({ sector: 'consulting' });

      const neutral = scorer.score(buildCandidate(), position, WEIGHT);
      expect(neutral.rawScore).toBe(0.65);
      expect(neutral.details.basis).toBe('natural');

      const open = scorer.score(buildCandidate({ sectorTransitionOpenness: 5 }), position, WEIGHT);
      expect(open.rawScore).toBeCloseTo(0.75, 10);
    });

    it('should score unrelated sectors at 0.3', () => {
      expect(scorer.score(buildCandidate(), buildPosition({ sector: 'healthcare' }), WEIGHT).rawScore).toBe(0.3);
    });

    it('should look up relations in both directions', () => {
      expect(scorer.relation('finance', 'accounting')).toBe('direct');
      expect(scorer.relation('public sector', 'accounting')).toBe('distant');
    });
  });

  describe('ContractFlexibilityScorer', () => {
    const scorer = new ContractFlexibilityScorer();

    it('should score by preference rank', () => {
      expect(scorer.score(buildCandidate(), buildPosition({ contractType: 'permanent' }), WEIGHT).rawScore).toBe(1);
      expect(scorer.score(buildCandidate(), buildPosition({ contractType: 'fixed_term' }), WEIGHT).rawScore).toBe(0.75);
    });

    it('should score an unlisted contract low with low confidence', () => {
      const result = scorer.score(buildCandidate(), buildPosition({ contractType: 'freelance' }), WEIGHT);

      expect(result.rawScore).toBe(0.2);
      expect(result.confidence).toBe(0.3);
    });

    it('should treat an exclusive search as all-or-nothing', () => {
      const candidate = buildCandidate({ contractPreferences: ['permanent'] });

      expect(scorer.score(candidate, buildPosition({ contractType: 'freelance' }), WEIGHT).rawScore).toBe(0);
      expect(scorer.score(candidate, buildPosition({ contractType: 'permanent' }), WEIGHT).rawScore).toBe(1);
    });
  });

  describe('TimingCompatibilityScorer', () => {
    const scorer = new TimingCompatibilityScorer();

    it('should map urgency to a tolerance in weeks', () => {
      expect(toleranceWeeks(1)).toBe(2);
      expect(toleranceWeeks(3)).toBe(6);
      expect(toleranceWeeks(5)).toBe(14);
      expect(toleranceWeeks(undefined)).toBe(6);
    });

    it('should score an immediate start at 1.0', () => {
      expect(scorer.score(buildCandidate(), buildPosition(), WEIGHT).rawScore).toBe(1);
    });

    it('should scale a delay within the tolerance', () => {
      const result = scorer.score(buildCandidate({ availableFrom: '2026-04-12' }), buildPosition(), WEIGHT);

      expect(result.details.delayWeeks).toBe(6);
      expect(result.rawScore).toBeCloseTo(0.8, 10);
    });

    it('should penalize the same delay on an urgent position', () => {
      const result = scorer.score(buildCandidate({ availableFrom: '2026-04-12' }), buildPosition({ urgency: 1 }), WEIGHT);

      expect(result.rawScore).toBe(0.2);
    });

    it('should fall back to the notice period when dates are missing', () => {
      const result = scorer.score(buildCandidate({ availableFrom: undefined }), buildPosition(), WEIGHT);

      expect(result.details.basis).toBe('notice_period');
      expect(result.rawScore).toBe(0.5);
    });

    it('should report an unparseable date without throwing', () => {
      const result = scorer.score(buildCandidate({ availableFrom: 'soon' }), buildPosition(), WEIGHT);

      expect(result.rawScore).toBe(0.5);
      expect(result.confidence).toBe(0);
      expect(result.details.error).toBe('Invalid date for availableFrom: "soon"');
    });
  });

  describe('WorkModalityScorer', () => {
    const scorer = new WorkModalityScorer();

    it('should score matching modalities at 1.0', () => {
      expect(scorer.score(buildCandidate(), buildPosition(), WEIGHT).rawScore).toBe(1);
    });

    it('should penalize missing remote days on a hybrid position', () => {
      const result = scorer.score(buildCandidate({ remoteDaysWanted: 3 }), buildPosition({ remoteDaysOffered: 1 }), WEIGHT);

      expect(result.rawScore).toBeCloseTo(0.8, 10);
      expect(result.details.missingRemoteDays).toBe(2);
    });

    it('should score remote preference against onsite low', () => {
      const result = scorer.score(
        buildCandidate({ preferredModality: 'remote' }),
        buildPosition({ workModality: 'onsite' }),
        WEIGHT
      );

      expect(result.rawScore).toBe(0.1);
      expect(result.quality).toBe('POOR');
    });
  });

  describe('MotivationsScorer', () => {
    const scorer = new MotivationsScorer();

    it('should weight overlap by rank and reward the top motivation', () => {
      const result = scorer.score(buildCandidate(), buildPosition(), WEIGHT);

      expect(result.rawScore).toBeCloseTo(5 / 6 + 0.1, 10);
      expect(result.details.matchedMotivations).toEqual(['career_growth', 'autonomy']);
    });

    it('should score a low-ranked overlap without bonus', () => {
      const result = scorer.score(buildCandidate(), buildPosition({ offeredMotivations: ['learning'] }), WEIGHT);

      expect(result.rawScore).toBeCloseTo(1 / 6, 10);
      expect(result.details.topMotivationMatched).toBe(false);
    });
  });

  describe('ListeningReasonScorer', () => {
    const scorer = new ListeningReasonScorer();

    it('should degrade for an unspecified reason', () => {
      const result = scorer.score(buildCandidate({ listeningReason: 'unspecified' }), buildPosition(), WEIGHT);

      expect(result.rawScore).toBe(0.5);
      expect(result.details.degradedReason).toBe('unspecified_listening_reason');
    });

    it('should back a compensation motive with the candidate being employed', () => {
      const result = scorer.score(buildCandidate(), buildPosition(), WEIGHT);

      expect(result.rawScore).toBeCloseTo(0.7, 10);
      expect(result.details.coherenceFactors).toEqual(['employed']);
    });

    it('should add coherence for a significant raise sought', () => {
      const candidate = buildCandidate({ currentSalary: 40000, desiredSalary: 52000 });

      expect(scorer.score(candidate, buildPosition(), WEIGHT).rawScore).toBeCloseTo(1, 10);
    });

    it('should not depend on the position', () => {
      const candidate = buildCandidate();
      const generous = scorer.score(candidate, buildPosition({ salaryMax: 60000 }), WEIGHT);
      const modest = scorer.score(
        candidate,
        buildPosition({ salaryMax: 30000, workModality: 'onsite', offeredMotivations: [] }),
        WEIGHT
      );

      expect(modest.rawScore).toBe(generous.rawScore);
      expect(modest.details).toEqual(generous.details);
    });

    it('should check growth prospects against status and motivations', () => {
      expect(
        scorer.score(buildCandidate({ listeningReason: 'growth_prospects' }), buildPosition(), WEIGHT).rawScore
      ).toBeCloseTo(1, 10);
      expect(
        scorer.score(
          buildCandidate({ listeningReason: 'growth_prospects', status: 'job_seeker', motivations: ['autonomy'] }),
          buildPosition(),
          WEIGHT
        ).rawScore
      ).toBe(0.5);
    });

    it('should check location against commute limit and remote preference', () => {
      const candidate = buildCandidate({
        listeningReason: 'location',
        preferredModality: 'remote',
        location: { city: 'Lyon', maxCommuteMinutes: 20 },
      });

      expect(scorer.score(candidate, buildPosition(), WEIGHT).rawScore).toBeCloseTo(1, 10);
    });

    it('should reward compatible secondary reasons and penalize the others', () => {
      const result = scorer.score(
        buildCandidate({ listeningReason: 'role_mismatch', secondaryListeningReasons: ['growth_prospects', 'location'] }),
        buildPosition(),
        WEIGHT
      );

      expect(result.rawScore).toBeCloseTo(0.825, 10);
      expect(result.details.compatibleSecondaryReasons).toEqual(['growth_prospects']);
      expect(result.details.incoherentSecondaryReasons).toEqual(['location']);
    });
  });

  describe('CandidateStatusScorer', () => {
    const scorer = new CandidateStatusScorer();

    it('should map position urgency to a recruitment urgency', () => {
      expect(recruitmentUrgency(1)).toBe('critical');
      expect(recruitmentUrgency(2)).toBe('urgent');
      expect(recruitmentUrgency(3)).toBe('normal');
      expect(recruitmentUrgency(5)).toBe('flexible');
      expect(recruitmentUrgency(undefined)).toBe('normal');
    });

    it('should interpolate the notice period impact', () => {
      expect(noticeImpact(0, 'critical')).toBe(1);
      expect(noticeImpact(4, 'critical')).toBe(0.3);
      expect(noticeImpact(6, 'urgent')).toBeCloseTo(0.55, 10);
      expect(noticeImpact(20, 'normal')).toBe(0.5);
    });

    it('should blend status, notice period, contract and flexibility', () => {
      const result = scorer.score(buildCandidate(), buildPosition(), WEIGHT);

      expect(result.rawScore).toBeCloseTo(0.675, 10);
      expect(result.details.statusUrgencyFit).toBe(0.8);
      expect(result.details.noticeImpact).toBe(0.7);
    });

    it('should penalize a long notice period on an urgent position', () => {
      const position = buildPosition({ urgency: 1 });
      const free = scorer.score(buildCandidate({ noticePeriodWeeks: 0 }), position, WEIGHT);
      const bound = scorer.score(buildCandidate({ noticePeriodWeeks: 12 }), position, WEIGHT);

      expect(free.rawScore).toBeCloseTo(0.55, 10);
      expect(bound.rawScore).toBeCloseTo(0.3125, 10);
    });

    it('should ignore the notice period of a candidate who is not employed', () => {
      const result = scorer.score(
        buildCandidate({ status: 'job_seeker', noticePeriodWeeks: 12 }),
        buildPosition({ urgency: 1 }),
        WEIGHT
      );

      expect(result.details.noticePeriodWeeks).toBe(0);
      expect(result.details.noticeImpact).toBe(1);
    });

    it('should note when an urgent search meets an urgent position', () => {
      const result = scorer.score(
        buildCandidate({ status: 'job_seeker', searchUrgency: 5 }),
        buildPosition({ urgency: 1, contractType: 'fixed_term' }),
        WEIGHT
      );

      expect(result.rawScore).toBeCloseTo(0.91, 10);
      expect(result.details.urgencyAligned).toBe(true);
    });

    it('should lower confidence when the notice period has to be assumed', () => {
      const result = scorer.score(buildCandidate({ noticePeriodWeeks: undefined }), buildPosition(), WEIGHT);

      expect(result.confidence).toBe(0.6);
      expect(result.details.noticePeriodAssumed).toBe(true);
      expect(result.details.noticePeriodWeeks).toBe(4);
    });
  });

  describe('SemanticScorer', () => {
    const scorer = new SemanticScorer();

    it('should score full skill coverage with matching titles at 1.0', () => {
      expect(scorer.score(buildCandidate(), buildPosition(), WEIGHT).rawScore).toBe(1);
    });

    it('should blend skill coverage with title overlap', () => {
      const result = scorer.score(buildCandidate({ skills: ['excel'] }), buildPosition(), WEIGHT);

      expect(result.rawScore).toBeCloseTo(0.75 / 3 + 0.25, 10);
      expect(result.details.missingSkills).toEqual(['sap', 'fiscalite']);
    });

    it('should use coverage alone when a title is missing', () => {
      const result = scorer.score(buildCandidate({ skills: ['excel', 'sap'], title: undefined }), buildPosition(), WEIGHT);

      expect(result.rawScore).toBeCloseTo(2 / 3, 10);
      expect(result.details.titleOverlap).toBeNull();
    });

    it('should degrade when the position lists no skills', () => {
      const result = scorer.score(buildCandidate(), buildPosition({ requiredSkills: [] }), WEIGHT);

      expect(result.confidence).toBe(0);
    });
  });
});
