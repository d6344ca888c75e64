/**
 * MatchingEngine - Ranks climbing partners for one of a viewer's trips
 *
 * KEY DESIGN DECISIONS:
 *
 * 1. Privacy First: The block exclusion set is computed once, handed to
 *    candidate retrieval, and re-applied to whatever the store returns
 *    BEFORE anything is scored. Thresholds and sorting can't undo it.
 *
 * 2. Hard Constraints Are Filters: Same destination, overlapping dates,
 *    visible and verified profile, not the viewer. A pair failing any of
 *    these is never scored, so it can't surface through a high score.
 *
 * 3. Deterministic Ranking: Score descending, then candidate id ascending,
 *    so repeated calls and tests see the same order.
 *
 * 4. Read Only: The engine never writes. Concurrent calls need no locking.
 */

import {
  Climber,
  MatchDetail,
  MatchResult,
  MatchingConfig,
  Trip,
  GradeCompatibility,
  GradeCompatibilityLevel,
  AvailabilityOverlap,
  Discipline,
  ScorerType,
  getOverlapWindow,
  toClimberProfile,
  toTripSummary,
  tripsOverlap
} from '../models/types';
import { PartnerStore, Candidate } from '../store/partnerStore';
import { computeExclusionSet } from './PrivacyFilter';
import { PairwiseScorer } from './PairwiseScorer';
import { ConfigManager, DEFAULT_CONFIG } from '../config/config';
import { NotFoundError } from '../utils/errors';

export const ALGORITHM_VERSION = '1.0.0';

export interface MatchingEngineOptions {
  /** Fixed configuration. Takes precedence over configManager. */
  config?: MatchingConfig;

  /** Live configuration source; read on every call */
  configManager?: ConfigManager;
  configId?: string;

  scorer?: PairwiseScorer;
}

export class MatchingEngine {
  private store: PartnerStore;
  private scorer: PairwiseScorer;
  private options: MatchingEngineOptions;

  constructor(store: PartnerStore, options: MatchingEngineOptions = {}) {
    this.store = store;
    this.scorer = options.scorer ?? new PairwiseScorer();
    this.options = options;
  }

  /**
   * The configuration the next call will use.
   */
  getConfig(): MatchingConfig {
    if (this.options.config) {
      return this.options.config;
    }
    if (this.options.configManager) {
      return this.options.configManager.getConfig(this.options.configId);
    }
    return DEFAULT_CONFIG;
  }

  /**
   * Requested limits above the configured maximum are clamped, not rejected.
   */
  clampLimit(limit: number, config: MatchingConfig = this.getConfig()): number {
    return Math.min(limit, config.maxLimit);
  }

  /**
   * Highest total a pair can reach under the active configuration.
   */
  maxScore(config: MatchingConfig = this.getConfig()): number {
    return this.scorer.maxTotal(config);
  }

  // ===========================================================================
  // MAIN ENTRY POINTS
  // ===========================================================================

  /**
   * Ranked partners for a viewer's trip.
   *
   * @throws NotFoundError if the viewer doesn't exist, or the trip doesn't
   *         exist or isn't theirs (the two cases are indistinguishable)
   */
  async getMatches(viewerId: string, tripId: string, limit: number): Promise<MatchResult[]> {
    const { viewer, trip } = await this.loadViewerTrip(viewerId, tripId);
    return this.match(viewer, trip, limit);
  }

  /**
   * Resolve the trip a request is about. Without an explicit id this is the
   * viewer's soonest upcoming active trip.
   *
   * @param today - YYYY-MM-DD; trips starting on or after it count as upcoming
   */
  async resolveTrip(viewerId: string, tripId: string | undefined, today: string): Promise<Trip> {
    if (tripId) {
      return (await this.loadViewerTrip(viewerId, tripId)).trip;
    }

    const trip = await this.store.findNextUpcomingTrip(viewerId, today);
    if (!trip) {
      throw new NotFoundError('No upcoming trips');
    }
    return trip;
  }

  /**
   * One candidate's match against a viewer's trip, with the detail shown on
   * the partner page. The candidate must be in the viewer's ranked results
   * (at the maximum limit), otherwise this is "not found".
   */
  async getMatchDetail(viewerId: string, tripId: string, candidateId: string): Promise<MatchDetail> {
    const config = this.getConfig();
    const { viewer, trip } = await this.loadViewerTrip(viewerId, tripId);
    const matches = await this.match(viewer, trip, config.maxLimit);

    const match = matches.find(m => m.candidate.id === candidateId);
    if (!match) {
      throw new NotFoundError('Match not found');
    }

    const candidate = await this.store.getClimber(candidateId);
    const candidateTrip = await this.store.getTrip(match.trip.id);
    if (!candidate || !candidateTrip) {
      throw new NotFoundError('Match not found');
    }

    return this.buildDetail(match, viewer, trip, candidate, candidateTrip);
  }

  /**
   * Run the matching pipeline for an already-resolved viewer and trip.
   *
   * Steps:
   * 1. Exclusion set (blocks in either direction)
   * 2. Candidate retrieval (hard constraints), re-checked here
   * 3. Score every (viewer trip, candidate, candidate trip)
   * 4. Keep scores strictly above config.minimumScore
   * 5. Sort: score desc, candidate id asc
   * 6. Truncate to the clamped limit
   */
  async match(viewer: Climber, trip: Trip, limit: number): Promise<MatchResult[]> {
    const startTime = Date.now();
    const config = this.getConfig();
    const appliedLimit = this.clampLimit(limit, config);

    // STEP 1: Who must never be shown
    const excluded = await computeExclusionSet(this.store, viewer.id);

    // STEP 2: Candidates, with the hard constraints enforced on our side too
    const retrieved = await this.store.findCandidates({
      trip,
      viewerId: viewer.id,
      excludeUserIds: excluded
    });
    const candidates = this.filterEligible(retrieved, viewer, trip, excluded);

    // STEPS 3-4: Score and apply threshold
    const scored: MatchResult[] = [];
    for (const { climber, trip: candidateTrip } of candidates) {
      const breakdown = this.scorer.score(
        { viewer, viewerTrip: trip, candidate: climber, candidateTrip },
        config
      );

      console.debug(
        `[MatchingEngine] ${climber.id}: total=${breakdown.total} ` +
        `location=${breakdown.location} date=${breakdown.dateOverlap} ` +
        `discipline=${breakdown.discipline} grade=${breakdown.grade} ` +
        `risk=${breakdown.riskTolerance} availability=${breakdown.availability}`
      );

      // Written so a NaN total never passes
      if (!(breakdown.total > config.minimumScore)) {
        continue;
      }

      scored.push({
        candidate: toClimberProfile(climber),
        trip: toTripSummary(candidateTrip),
        score: breakdown.total,
        reasons: [...breakdown.reasons],
        overlap: getOverlapWindow(trip, candidateTrip),
        breakdown
      });
    }

    // STEP 5: Rank
    scored.sort(compareMatches);

    this.logSummary(trip, scored, retrieved.length, Date.now() - startTime);

    // STEP 6: Truncate
    return scored.slice(0, Math.max(0, appliedLimit));
  }

  // ===========================================================================
  // HELPERS
  // ===========================================================================

  private async loadViewerTrip(viewerId: string, tripId: string): Promise<{ viewer: Climber; trip: Trip }> {
    const viewer = await this.store.getClimber(viewerId);
    if (!viewer) {
      throw new NotFoundError('Climber not found');
    }

    const trip = await this.store.getTrip(tripId);
    if (!trip || trip.userId !== viewerId) {
      throw new NotFoundError('Trip not found');
    }

    return { viewer, trip };
  }

  /**
   * Drop anything the store should not have returned. One entry per climber.
   */
  private filterEligible(
    candidates: Candidate[],
    viewer: Climber,
    trip: Trip,
    excluded: ReadonlySet<string>
  ): Candidate[] {
    const seen = new Set<string>();

    return candidates.filter(({ climber, trip: candidateTrip }) => {
      const eligible =
        climber.id !== viewer.id &&
        !excluded.has(climber.id) &&
        !seen.has(climber.id) &&
        climber.profileVisible &&
        climber.emailVerified &&
        candidateTrip.userId === climber.id &&
        candidateTrip.isActive &&
        candidateTrip.destination.id === trip.destination.id &&
        tripsOverlap(trip, candidateTrip);

      if (eligible) {
        seen.add(climber.id);
      }
      return eligible;
    });
  }

  private buildDetail(
    match: MatchResult,
    viewer: Climber,
    trip: Trip,
    candidate: Climber,
    candidateTrip: Trip
  ): MatchDetail {
    const gradeScorer = this.scorer.scorers[ScorerType.GRADE];
    const sharedDisciplines = this.scorer.scorers[ScorerType.DISCIPLINE].sharedDisciplines({
      viewer,
      viewerTrip: trip,
      candidate,
      candidateTrip,
      config: this.getConfig()
    });

    const gradeCompatibility: Partial<Record<Discipline, GradeCompatibility>> = {};
    for (const discipline of sharedDisciplines) {
      const mine = gradeScorer.findProfile(viewer.disciplines, discipline);
      const theirs = gradeScorer.findProfile(candidate.disciplines, discipline);
      const overlap = mine && theirs ? gradeScorer.compareProfiles(mine, theirs) : null;
      if (overlap) {
        gradeCompatibility[discipline] = {
          overlapRange: `${overlap.start}-${overlap.end}`,
          compatibility: compatibilityLevel(overlap.ratio)
        };
      }
    }

    const availabilityOverlap: AvailabilityOverlap[] = [];
    for (const slot of this.scorer.scorers[ScorerType.AVAILABILITY].sharedSlots(trip, candidateTrip)) {
      const last = availabilityOverlap[availabilityOverlap.length - 1];
      if (last && last.date === slot.date) {
        last.timeBlocks.push(slot.timeBlock);
      } else {
        availabilityOverlap.push({ date: slot.date, timeBlocks: [slot.timeBlock] });
      }
    }

    return {
      ...match,
      sharedDisciplines,
      availabilityOverlap,
      gradeCompatibility
    };
  }

  private logSummary(trip: Trip, matches: MatchResult[], candidateCount: number, durationMs: number): void {
    if (matches.length === 0) {
      console.log(
        `[MatchingEngine] No matches found for trip ${trip.id} ` +
        `(${candidateCount} candidates, ${durationMs}ms)`
      );
      return;
    }

    const avgScore = matches.reduce((sum, m) => sum + m.score, 0) / matches.length;
    console.log(
      `[MatchingEngine] Generated ${matches.length} matches for trip ${trip.id}. ` +
      `Avg score: ${avgScore.toFixed(1)}, Top score: ${matches[0].score}, ` +
      `Candidates: ${candidateCount}, ${durationMs}ms`
    );
  }
}

/**
 * Score descending, then candidate id ascending.
 */
export function compareMatches(a: MatchResult, b: MatchResult): number {
  if (b.score !== a.score) {
    return b.score - a.score;
  }
  return a.candidate.id < b.candidate.id ? -1 : a.candidate.id > b.candidate.id ? 1 : 0;
}

export function compatibilityLevel(ratio: number): GradeCompatibilityLevel {
  if (ratio >= 0.75) return 'high';
  if (ratio >= 0.4) return 'medium';
  return 'low';
}
