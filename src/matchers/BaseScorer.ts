/**
 * BaseScorer - Foundation for all partner scoring criteria
 *
 * Each scorer evaluates ONE aspect of viewer-candidate compatibility:
 * - LocationScorer: Same destination, shared crags
 * - DateOverlapScorer: How many days the trips share
 * - DisciplineScorer: Shared climbing styles
 * - GradeScorer: Overlap of comfortable grade ranges
 * - RiskToleranceScorer: How similar the climbers' appetite for risk is
 * - AvailabilityScorer: Shared (date, time block) slots
 *
 * Each scorer returns a whole number of points and, when it has something
 * worth telling the viewer, a reason string. Scorers never throw on dirty
 * data; they clamp instead.
 */

import {
  Climber,
  Discipline,
  MatchingConfig,
  ScorerType,
  Trip
} from '../models/types';

// =============================================================================
// SCORER CONTEXT
// =============================================================================

/**
 * Everything a scorer may look at for one pair.
 * Shared by all scorers for the duration of a single pair evaluation.
 */
export interface ScorerContext {
  viewer: Climber;
  viewerTrip: Trip;
  candidate: Climber;
  candidateTrip: Trip;
  config: MatchingConfig;

  /**
   * Disciplines both trips list AND both climbers have a profile for,
   * sorted by name. Filled in by the discipline step; the grade step reads it.
   */
  sharedDisciplines: readonly Discipline[];
}

// =============================================================================
// SUB-SCORE
// =============================================================================

export interface SubScore {
  points: number;

  /** Present only when the criterion is worth mentioning */
  reason?: string;
}

// =============================================================================
// SCORER INTERFACE
// =============================================================================

export interface IScorer {
  readonly type: ScorerType;

  /** Highest number of points this scorer can award under the given config */
  maxPoints(config: MatchingConfig): number;

  score(context: ScorerContext): SubScore;
}

// =============================================================================
// ABSTRACT BASE CLASS
// =============================================================================

export abstract class BaseScorer implements IScorer {
  abstract readonly type: ScorerType;

  abstract maxPoints(config: MatchingConfig): number;

  abstract score(context: ScorerContext): SubScore;

  // ===========================================================================
  // UTILITY METHODS
  // ===========================================================================

  protected award(points: number, reason?: string): SubScore {
    return reason === undefined ? { points } : { points, reason };
  }

  protected none(): SubScore {
    return { points: 0 };
  }

  /**
   * Clamp a ratio to [0, 1]. NaN becomes 0.
   */
  protected clampRatio(value: number): number {
    if (Number.isNaN(value)) return 0;
    return Math.max(0, Math.min(1, value));
  }

  protected intersect<T>(a: Iterable<T>, b: Iterable<T>): Set<T> {
    const right = new Set(b);
    const result = new Set<T>();
    for (const item of a) {
      if (right.has(item)) result.add(item);
    }
    return result;
  }

  protected profileDisciplines(climber: Climber): Set<Discipline> {
    return new Set(climber.disciplines.map(d => d.discipline));
  }
}
