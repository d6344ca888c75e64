/**
 * Partner Store
 *
 * The read-only data the matcher needs from the rest of the application:
 * - Block relations (for the privacy filter)
 * - Candidate climbers with an overlapping trip to the same destination
 * - Climber and trip lookups (for resolving the viewer's request)
 *
 * The production system backs these with its relational store. This file
 * provides the interfaces plus an in-memory implementation used by the
 * development server and the tests.
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import {
  Block,
  Climber,
  Trip,
  SeedData,
  SeedDataSchema,
  tripsOverlap
} from '../models/types';
import { ValidationError } from '../utils/errors';

// =============================================================================
// STORE INTERFACES
// =============================================================================

/**
 * Anything that can list block relations touching a climber.
 */
export interface BlockLookup {
  /** Every block where the climber is either the blocker or the blocked party */
  listBlocksInvolving(climberId: string): Promise<Block[]>;
}

/**
 * Filter for a candidate search. All conditions are hard.
 */
export interface CandidateCriteria {
  /** The viewer's trip; candidates need an active trip overlapping it at the same destination */
  trip: Trip;

  /** Never returned, whatever their trips look like */
  viewerId: string;

  /** Privacy exclusions computed before retrieval */
  excludeUserIds: ReadonlySet<string>;
}

/**
 * A climber eligible for scoring together with the trip that made them eligible.
 */
export interface Candidate {
  climber: Climber;
  trip: Trip;
}

/**
 * Anything that can find matching candidates for a trip.
 */
export interface CandidateQuery {
  /**
   * Visible, verified climbers (other than the viewer and not excluded) who
   * own an active trip overlapping `criteria.trip` at the same destination.
   * Each climber appears once, paired with their FIRST such trip.
   */
  findCandidates(criteria: CandidateCriteria): Promise<Candidate[]>;
}

/**
 * Anything that can look up climbers and trips by id.
 */
export interface ProfileLookup {
  getClimber(climberId: string): Promise<Climber | undefined>;
  getTrip(tripId: string): Promise<Trip | undefined>;

  /** The climber's active trip with the earliest start on or after `onOrAfter` */
  findNextUpcomingTrip(climberId: string, onOrAfter: string): Promise<Trip | undefined>;
}

export type PartnerStore = BlockLookup & CandidateQuery & ProfileLookup;

// =============================================================================
// IN-MEMORY IMPLEMENTATION
// =============================================================================

/**
 * Array-backed store. Trips are considered in insertion order, which is what
 * "first matching trip" means for this implementation.
 */
export class InMemoryPartnerStore implements PartnerStore {
  private climbers = new Map<string, Climber>();
  private trips: Trip[] = [];
  private blocks: Block[] = [];

  constructor(seed?: Partial<SeedData>) {
    seed?.climbers?.forEach(c => this.addClimber(c));
    seed?.trips?.forEach(t => this.addTrip(t));
    seed?.blocks?.forEach(b => this.addBlock(b));
  }

  addClimber(climber: Climber): void {
    this.climbers.set(climber.id, climber);
  }

  addTrip(trip: Trip): void {
    this.trips.push(trip);
  }

  addBlock(block: Block): void {
    if (block.blockerId === block.blockedId) {
      throw new ValidationError('A climber cannot block themselves');
    }
    const exists = this.blocks.some(
      b => b.blockerId === block.blockerId && b.blockedId === block.blockedId
    );
    if (!exists) {
      this.blocks.push(block);
    }
  }

  removeBlock(blockerId: string, blockedId: string): void {
    this.blocks = this.blocks.filter(b => !(b.blockerId === blockerId && b.blockedId === blockedId));
  }

  async listBlocksInvolving(climberId: string): Promise<Block[]> {
    return this.blocks.filter(b => b.blockerId === climberId || b.blockedId === climberId);
  }

  async findCandidates(criteria: CandidateCriteria): Promise<Candidate[]> {
    const { trip, viewerId, excludeUserIds } = criteria;
    const candidates: Candidate[] = [];
    const seen = new Set<string>();

    for (const other of this.trips) {
      if (seen.has(other.userId)) continue;
      if (other.userId === viewerId || excludeUserIds.has(other.userId)) continue;
      if (!other.isActive) continue;
      if (other.destination.id !== trip.destination.id) continue;
      if (!tripsOverlap(trip, other)) continue;

      const climber = this.climbers.get(other.userId);
      if (!climber || !climber.profileVisible || !climber.emailVerified) continue;

      seen.add(climber.id);
      candidates.push({ climber, trip: other });
    }

    return candidates;
  }

  async getClimber(climberId: string): Promise<Climber | undefined> {
    return this.climbers.get(climberId);
  }

  async getTrip(tripId: string): Promise<Trip | undefined> {
    return this.trips.find(t => t.id === tripId);
  }

  async findNextUpcomingTrip(climberId: string, onOrAfter: string): Promise<Trip | undefined> {
    return this.trips
      .filter(t => t.userId === climberId && t.isActive && t.startDate >= onOrAfter)
      .reduce<Trip | undefined>(
        (soonest, t) => (!soonest || t.startDate < soonest.startDate ? t : soonest),
        undefined
      );
  }
}

// =============================================================================
// SEED LOADING
// =============================================================================

/**
 * Read and validate a JSON seed file. Relative paths resolve against cwd.
 */
export async function loadSeedData(filePath: string): Promise<SeedData> {
  const absolute = path.resolve(filePath);
  const raw = await readFile(absolute, 'utf8');

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(
      `Seed file ${absolute} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const parsed = SeedDataSchema.safeParse(json);
  if (!parsed.success) {
    throw new ValidationError(`Seed file ${absolute} failed validation`, parsed.error.flatten());
  }

  console.log(
    `[PartnerStore] Loaded ${parsed.data.climbers.length} climbers, ` +
    `${parsed.data.trips.length} trips, ${parsed.data.blocks.length} blocks from ${filePath}`
  );

  return parsed.data;
}

export async function createSeededStore(filePath: string): Promise<InMemoryPartnerStore> {
  return new InMemoryPartnerStore(await loadSeedData(filePath));
}
