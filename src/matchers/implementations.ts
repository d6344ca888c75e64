/**
 * Scorer Implementations
 *
 * One class per scoring criterion. The PairwiseScorer runs them in
 * declaration order and sums their points:
 *
 * - LocationScorer:       0-30  (destination + crags)
 * - DateOverlapScorer:    0-20  (shared days)
 * - DisciplineScorer:     0-20  (shared climbing styles)
 * - GradeScorer:          0-15  (comfortable grade overlap)
 * - RiskToleranceScorer: -10-10 (the only criterion that can subtract)
 * - AvailabilityScorer:   0-5   (shared time blocks)
 *
 * Ranges above are for DEFAULT_CONFIG; all point values come from the config.
 */

import { BaseScorer, ScorerContext, SubScore } from './BaseScorer';
import {
  AvailabilityBlock,
  DisciplineProfile,
  Discipline,
  MatchingConfig,
  ScorerType,
  TimeBlock,
  Trip,
  getOverlapWindow,
  riskDifference
} from '../models/types';

// =============================================================================
// LOCATION SCORER
// =============================================================================
/**
 * LocationScorer rewards climbing in the same place.
 *
 * Candidate retrieval already guarantees the same destination, so what is
 * left to decide is how well the crag plans line up:
 *   - at least one crag in common        → overlappingCrags (30)
 *   - either side has no crag preference → flexible (25)
 *   - both chose crags, none in common   → differentCrags (20)
 *
 * A different destination should never get here; it scores 0.
 */
export class LocationScorer extends BaseScorer {
  readonly type = ScorerType.LOCATION;

  maxPoints(config: MatchingConfig): number {
    const { overlappingCrags, flexible, differentCrags } = config.points.location;
    return Math.max(overlappingCrags, flexible, differentCrags);
  }

  score(context: ScorerContext): SubScore {
    const { viewerTrip, candidateTrip, config } = context;

    if (viewerTrip.destination.id !== candidateTrip.destination.id) {
      return this.none();
    }

    const points = this.cragPoints(viewerTrip, candidateTrip, config);
    return this.award(points, points > 0 ? `Both in ${viewerTrip.destination.name}` : undefined);
  }

  private cragPoints(a: Trip, b: Trip, config: MatchingConfig): number {
    const { overlappingCrags, flexible, differentCrags } = config.points.location;

    if (a.preferredCragIds.length === 0 || b.preferredCragIds.length === 0) {
      return flexible;
    }
    if (this.intersect(a.preferredCragIds, b.preferredCragIds).size > 0) {
      return overlappingCrags;
    }
    return differentCrags;
  }
}

// =============================================================================
// DATE OVERLAP SCORER
// =============================================================================
/**
 * DateOverlapScorer rewards trips that share more days.
 *
 * Overlap is inclusive: trips ending and starting on the same day share
 * one day. Points = min(max, days * perDay), so with the defaults five
 * shared days already earn the full 20.
 */
export class DateOverlapScorer extends BaseScorer {
  readonly type = ScorerType.DATE_OVERLAP;

  maxPoints(config: MatchingConfig): number {
    return config.points.dateOverlap.max;
  }

  score(context: ScorerContext): SubScore {
    const { perDay, max } = context.config.points.dateOverlap;
    const { days } = getOverlapWindow(context.viewerTrip, context.candidateTrip);

    if (days <= 0) {
      return this.none();
    }

    const points = Math.min(max, days * perDay);
    return this.award(points, points > 0 ? `${days} day overlap` : undefined);
  }
}

// =============================================================================
// DISCIPLINE SCORER
// =============================================================================
/**
 * DisciplineScorer rewards wanting to climb the same way.
 *
 *   T = disciplines both TRIPS list
 *   U = T ∩ disciplines both CLIMBERS have a profile for
 *
 *   T empty      → 0
 *   U non-empty  → sharedProfile (20)
 *   otherwise    → tripPreferenceOnly (5)
 *
 * U is precomputed into the context (sharedDisciplines) because the grade
 * scorer compares profiles for one of those disciplines.
 */
export class DisciplineScorer extends BaseScorer {
  readonly type = ScorerType.DISCIPLINE;

  maxPoints(config: MatchingConfig): number {
    const { sharedProfile, tripPreferenceOnly } = config.points.discipline;
    return Math.max(sharedProfile, tripPreferenceOnly);
  }

  score(context: ScorerContext): SubScore {
    const { sharedProfile, tripPreferenceOnly } = context.config.points.discipline;
    const tripDisciplines = this.tripDisciplines(context.viewerTrip, context.candidateTrip);

    if (tripDisciplines.length === 0) {
      return this.none();
    }

    if (context.sharedDisciplines.length > 0) {
      return this.award(sharedProfile, this.reasonFor(sharedProfile, context.sharedDisciplines));
    }

    return this.award(tripPreferenceOnly, this.reasonFor(tripPreferenceOnly, tripDisciplines));
  }

  /**
   * Disciplines both trips list, sorted by name.
   */
  tripDisciplines(a: Trip, b: Trip): Discipline[] {
    return [...this.intersect(a.preferredDisciplines, b.preferredDisciplines)].sort();
  }

  /**
   * U for a pair: trip overlap narrowed to disciplines both climbers have a
   * profile for, sorted by name.
   */
  sharedDisciplines(context: Omit<ScorerContext, 'sharedDisciplines'>): Discipline[] {
    const viewerProfiles = this.profileDisciplines(context.viewer);
    const candidateProfiles = this.profileDisciplines(context.candidate);

    return this.tripDisciplines(context.viewerTrip, context.candidateTrip)
      .filter(d => viewerProfiles.has(d) && candidateProfiles.has(d));
  }

  private reasonFor(points: number, disciplines: readonly Discipline[]): string | undefined {
    return points > 0 ? `Both climb ${disciplines.join(', ')}` : undefined;
  }
}

// =============================================================================
// GRADE SCORER
// =============================================================================

/**
 * Intersection of two comfortable grade ranges.
 */
export interface GradeOverlap {
  start: number;
  end: number;

  /** Overlap length over the average range length, clamped to [0, 1] */
  ratio: number;
}

/**
 * GradeScorer rewards climbers who are comfortable at the same grades.
 *
 * Only one discipline is compared: the alphabetically first one in U (see
 * DisciplineScorer). With no shared discipline this scores 0.
 *
 *   overlap = [max(min1, min2), min(max1, max2)]
 *   ratio   = overlap length / average of both range lengths
 *   points  = floor(max * ratio)
 *
 * Disjoint ranges score 0. A non-positive average (both climbers pinned to a
 * single grade, or inverted ranges from bad data) counts as ratio 0.
 */
export class GradeScorer extends BaseScorer {
  readonly type = ScorerType.GRADE;

  maxPoints(config: MatchingConfig): number {
    return config.points.grade.max;
  }

  score(context: ScorerContext): SubScore {
    const discipline = context.sharedDisciplines[0];
    if (discipline === undefined) {
      return this.none();
    }

    const mine = this.findProfile(context.viewer.disciplines, discipline);
    const theirs = this.findProfile(context.candidate.disciplines, discipline);
    if (!mine || !theirs) {
      return this.none();
    }

    const points = this.pointsFor(mine, theirs, context.config.points.grade.max);
    return this.award(points, points > 0 ? 'Similar grades' : undefined);
  }

  /**
   * Compare two profiles' comfortable ranges. Returns null when disjoint.
   */
  compareProfiles(a: DisciplineProfile, b: DisciplineProfile): GradeOverlap | null {
    const start = Math.max(a.comfortableGradeMinScore, b.comfortableGradeMinScore);
    const end = Math.min(a.comfortableGradeMaxScore, b.comfortableGradeMaxScore);

    if (start > end) {
      return null;
    }

    const avgRange = this.averageRange(a, b);
    const ratio = avgRange > 0 ? this.clampRatio((end - start) / avgRange) : 0;
    return { start, end, ratio };
  }

  findProfile(profiles: DisciplineProfile[], discipline: Discipline): DisciplineProfile | undefined {
    return profiles.find(p => p.discipline === discipline);
  }

  private pointsFor(a: DisciplineProfile, b: DisciplineProfile, max: number): number {
    const overlap = this.compareProfiles(a, b);
    if (!overlap || overlap.ratio <= 0) {
      return 0;
    }
    if (overlap.ratio >= 1) {
      return max;
    }

    // Integer numerator keeps e.g. 15 * 10 / 15 exact instead of 15 * 0.666…
    const avgRange = this.averageRange(a, b);
    return Math.max(0, Math.floor((max * (overlap.end - overlap.start)) / avgRange));
  }

  private averageRange(a: DisciplineProfile, b: DisciplineProfile): number {
    return (
      (a.comfortableGradeMaxScore - a.comfortableGradeMinScore) +
      (b.comfortableGradeMaxScore - b.comfortableGradeMinScore)
    ) / 2;
  }
}

// =============================================================================
// RISK TOLERANCE SCORER
// =============================================================================
/**
 * RiskToleranceScorer compares how cautious the two climbers are.
 *
 *   same tolerance            → same (10), "Same risk tolerance"
 *   one step apart            → adjacent (3), no reason
 *   conservative + aggressive → opposite (-10)
 *
 * This is a soft penalty, never a cutoff: a conservative/aggressive pair
 * that scores well elsewhere still clears the threshold.
 */
export class RiskToleranceScorer extends BaseScorer {
  readonly type = ScorerType.RISK_TOLERANCE;

  maxPoints(config: MatchingConfig): number {
    const { same, adjacent, opposite } = config.points.riskTolerance;
    return Math.max(same, adjacent, opposite);
  }

  score(context: ScorerContext): SubScore {
    const { same, adjacent, opposite } = context.config.points.riskTolerance;
    const diff = riskDifference(context.viewer.riskTolerance, context.candidate.riskTolerance);

    if (diff === 0) {
      return this.award(same, 'Same risk tolerance');
    }
    if (diff === 1) {
      return this.award(adjacent);
    }
    return this.award(opposite);
  }
}

// =============================================================================
// AVAILABILITY SCORER
// =============================================================================

const TIME_BLOCK_ORDER: TimeBlock[] = [
  TimeBlock.MORNING,
  TimeBlock.AFTERNOON,
  TimeBlock.FULL_DAY,
  TimeBlock.REST
];

/**
 * AvailabilityScorer counts (date, time block) slots both trips declare.
 * Rest days are ignored on both sides. One point per shared slot, capped.
 */
export class AvailabilityScorer extends BaseScorer {
  readonly type = ScorerType.AVAILABILITY;

  maxPoints(config: MatchingConfig): number {
    return config.points.availability.max;
  }

  score(context: ScorerContext): SubScore {
    const shared = this.sharedSlots(context.viewerTrip, context.candidateTrip).length;
    const points = Math.min(context.config.points.availability.max, shared);

    if (points <= 0) {
      return this.none();
    }
    return this.award(points, `${shared} overlapping availability ${shared === 1 ? 'block' : 'blocks'}`);
  }

  /**
   * Non-rest slots present in both trips, ordered by date then time of day.
   */
  sharedSlots(a: Trip, b: Trip): AvailabilityBlock[] {
    const theirs = new Set(b.availability.filter(isClimbingBlock).map(slotKey));
    const shared = new Map<string, AvailabilityBlock>();

    for (const slot of a.availability.filter(isClimbingBlock)) {
      const key = slotKey(slot);
      if (theirs.has(key)) {
        shared.set(key, { date: slot.date, timeBlock: slot.timeBlock });
      }
    }

    return [...shared.values()].sort((x, y) =>
      x.date === y.date
        ? TIME_BLOCK_ORDER.indexOf(x.timeBlock) - TIME_BLOCK_ORDER.indexOf(y.timeBlock)
        : x.date < y.date ? -1 : 1
    );
  }
}

function isClimbingBlock(slot: AvailabilityBlock): boolean {
  return slot.timeBlock !== TimeBlock.REST;
}

function slotKey(slot: AvailabilityBlock): string {
  return `${slot.date}|${slot.timeBlock}`;
}

// =============================================================================
// FACTORY FUNCTION
// =============================================================================

/**
 * Create all scorer instances, keyed by type.
 */
export const createScorers = () => ({
  [ScorerType.LOCATION]: new LocationScorer(),
  [ScorerType.DATE_OVERLAP]: new DateOverlapScorer(),
  [ScorerType.DISCIPLINE]: new DisciplineScorer(),
  [ScorerType.GRADE]: new GradeScorer(),
  [ScorerType.RISK_TOLERANCE]: new RiskToleranceScorer(),
  [ScorerType.AVAILABILITY]: new AvailabilityScorer()
});

export type ScorerMap = ReturnType<typeof createScorers>;
