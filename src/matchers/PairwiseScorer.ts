/**
 * PairwiseScorer - one viewer trip against one candidate trip
 *
 * Runs the six scorers in a fixed order and freezes the result. Pure: the
 * same inputs always give the same breakdown, and nothing is mutated.
 */

import { ScorerContext, SubScore } from './BaseScorer';
import { createScorers, ScorerMap } from './implementations';
import { Climber, MatchingConfig, ScoreBreakdown, ScorerType, Trip } from '../models/types';
import { DEFAULT_CONFIG } from '../config/config';

export interface PairInput {
  viewer: Climber;
  viewerTrip: Trip;
  candidate: Climber;
  candidateTrip: Trip;
}

/** Evaluation order; reasons come out in this order too */
export const SCORER_ORDER: readonly ScorerType[] = [
  ScorerType.LOCATION,
  ScorerType.DATE_OVERLAP,
  ScorerType.DISCIPLINE,
  ScorerType.GRADE,
  ScorerType.RISK_TOLERANCE,
  ScorerType.AVAILABILITY
];

export class PairwiseScorer {
  readonly scorers: ScorerMap;

  constructor(scorers: ScorerMap = createScorers()) {
    this.scorers = scorers;
  }

  score(input: PairInput, config: MatchingConfig = DEFAULT_CONFIG): ScoreBreakdown {
    const context = this.buildContext(input, config);

    const results = new Map<ScorerType, SubScore>();
    for (const type of SCORER_ORDER) {
      results.set(type, this.scorers[type].score(context));
    }

    const points = (type: ScorerType): number => results.get(type)?.points ?? 0;
    const reasons = SCORER_ORDER
      .map(type => results.get(type)?.reason)
      .filter((reason): reason is string => reason !== undefined);

    const breakdown: ScoreBreakdown = {
      location: points(ScorerType.LOCATION),
      dateOverlap: points(ScorerType.DATE_OVERLAP),
      discipline: points(ScorerType.DISCIPLINE),
      grade: points(ScorerType.GRADE),
      riskTolerance: points(ScorerType.RISK_TOLERANCE),
      availability: points(ScorerType.AVAILABILITY),
      total: SCORER_ORDER.reduce((sum, type) => sum + points(type), 0),
      reasons: Object.freeze(reasons)
    };

    return Object.freeze(breakdown);
  }

  /**
   * Highest total reachable under a config.
   */
  maxTotal(config: MatchingConfig = DEFAULT_CONFIG): number {
    return SCORER_ORDER.reduce((sum, type) => sum + this.scorers[type].maxPoints(config), 0);
  }

  buildContext(input: PairInput, config: MatchingConfig): ScorerContext {
    const base = { ...input, config };
    return {
      ...base,
      sharedDisciplines: Object.freeze(this.scorers[ScorerType.DISCIPLINE].sharedDisciplines(base))
    };
  }
}

const defaultScorer = new PairwiseScorer();

/**
 * Score a single pair with the default scorer set.
 */
export function scorePair(input: PairInput, config: MatchingConfig = DEFAULT_CONFIG): ScoreBreakdown {
  return defaultScorer.score(input, config);
}
