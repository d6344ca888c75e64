import { z } from 'zod';

// =============================================================================
// ENUMS & CONSTANTS
// =============================================================================

/**
 * How much risk a climber is willing to take on a route or approach.
 * Ordered from most to least cautious.
 */
export enum RiskTolerance {
  CONSERVATIVE = 'conservative',
  BALANCED = 'balanced',
  AGGRESSIVE = 'aggressive'
}

/**
 * Climbing styles a trip or a profile can declare.
 */
export enum Discipline {
  SPORT = 'sport',
  TRAD = 'trad',
  BOULDERING = 'bouldering',
  MULTIPITCH = 'multipitch',
  GYM = 'gym'
}

/**
 * Part of a day a climber is available on a trip.
 * REST days are declared but never count towards shared availability.
 */
export enum TimeBlock {
  MORNING = 'morning',
  AFTERNOON = 'afternoon',
  FULL_DAY = 'full_day',
  REST = 'rest'
}

/**
 * The six independent criteria a candidate pair is scored on.
 * Declaration order is evaluation order (and therefore reason order).
 */
export enum ScorerType {
  LOCATION = 'location',
  DATE_OVERLAP = 'date_overlap',
  DISCIPLINE = 'discipline',
  GRADE = 'grade',
  RISK_TOLERANCE = 'risk_tolerance',
  AVAILABILITY = 'availability'
}

/** Numeric position of each tolerance on the caution scale. */
export const RISK_LEVELS: Record<RiskTolerance, number> = {
  [RiskTolerance.CONSERVATIVE]: 0,
  [RiskTolerance.BALANCED]: 1,
  [RiskTolerance.AGGRESSIVE]: 2
};

// =============================================================================
// CLIMBER TYPES
// =============================================================================

/**
 * A climber's comfort zone in one discipline.
 * Grade scores are normalized so that different grading systems compare.
 */
export interface DisciplineProfile {
  discipline: Discipline;
  comfortableGradeMinScore: number;
  comfortableGradeMaxScore: number;
  yearsExperience?: number;
  canLead?: boolean;
  canBelay?: boolean;
}

/**
 * A registered user as the matcher sees them.
 * The engine never writes to a climber.
 */
export interface Climber {
  id: string;
  displayName: string;
  bio: string;
  homeLocation: string;
  riskTolerance: RiskTolerance;

  /** Hidden profiles are never offered as candidates */
  profileVisible: boolean;

  /** Unverified accounts are never offered as candidates */
  emailVerified: boolean;

  disciplines: DisciplineProfile[];
  experienceTags: string[];
}

/**
 * What other climbers get to see about a candidate.
 */
export type ClimberProfile = Pick<
  Climber,
  'id' | 'displayName' | 'bio' | 'homeLocation' | 'riskTolerance' | 'disciplines' | 'experienceTags'
>;

// =============================================================================
// TRIP TYPES
// =============================================================================

export interface Destination {
  /** Slug, e.g. "red-river-gorge" */
  id: string;
  name: string;
}

/**
 * One slot of declared availability within a trip.
 */
export interface AvailabilityBlock {
  /** Calendar date, YYYY-MM-DD */
  date: string;
  timeBlock: TimeBlock;
}

/**
 * A planned climbing trip. Dates are inclusive calendar days.
 */
export interface Trip {
  id: string;
  userId: string;
  destination: Destination;
  startDate: string;
  endDate: string;
  isActive: boolean;
  preferredDisciplines: Discipline[];

  /** Empty means the climber is flexible about where they climb */
  preferredCragIds: string[];

  availability: AvailabilityBlock[];
}

/**
 * Public projection of a trip, as shown next to a match.
 */
export type TripSummary = Pick<Trip, 'id' | 'destination' | 'startDate' | 'endDate' | 'preferredDisciplines'>;

/**
 * Directed block relation. Matching treats it as symmetric.
 */
export interface Block {
  blockerId: string;
  blockedId: string;
}

// =============================================================================
// MATCHING RESULT TYPES
// =============================================================================

/**
 * Inclusive intersection of two trips' date ranges.
 */
export interface OverlapWindow {
  start: string;
  end: string;
  days: number;
}

/**
 * Points awarded by each scorer plus the derived total and reasons.
 */
export interface ScoreBreakdown {
  readonly location: number;
  readonly dateOverlap: number;
  readonly discipline: number;
  readonly grade: number;
  readonly riskTolerance: number;
  readonly availability: number;
  readonly total: number;
  readonly reasons: readonly string[];
}

/**
 * One ranked partner suggestion.
 */
export interface MatchResult {
  candidate: ClimberProfile;
  trip: TripSummary;
  score: number;
  reasons: string[];
  overlap: OverlapWindow;
  breakdown: ScoreBreakdown;
}

export type GradeCompatibilityLevel = 'high' | 'medium' | 'low';

export interface GradeCompatibility {
  /** Shared comfortable range on the normalized scale, "lo-hi" */
  overlapRange: string;
  compatibility: GradeCompatibilityLevel;
}

export interface AvailabilityOverlap {
  date: string;
  timeBlocks: TimeBlock[];
}

/**
 * A single match with the extra detail shown on the partner page.
 */
export interface MatchDetail extends MatchResult {
  sharedDisciplines: Discipline[];
  availabilityOverlap: AvailabilityOverlap[];
  gradeCompatibility: Partial<Record<Discipline, GradeCompatibility>>;
}

// =============================================================================
// MATCHING CONFIGURATION
// =============================================================================

/**
 * Point values and thresholds for the matcher.
 * Defaults live in config/config.ts.
 */
export interface MatchingConfig {
  id: string;
  name: string;

  /** A pair must score strictly more than this to be returned */
  minimumScore: number;

  /** Limit used when the caller does not ask for one */
  defaultLimit: number;

  /** Requested limits above this are clamped, not rejected */
  maxLimit: number;

  points: {
    location: {
      overlappingCrags: number;
      flexible: number;
      differentCrags: number;
    };
    dateOverlap: {
      perDay: number;
      max: number;
    };
    discipline: {
      sharedProfile: number;
      tripPreferenceOnly: number;
    };
    grade: {
      max: number;
    };
    riskTolerance: {
      same: number;
      adjacent: number;
      opposite: number;
    };
    availability: {
      max: number;
    };
  };

  isDefault: boolean;
  createdAt: Date;
  updatedAt: Date;
}

// =============================================================================
// API RESPONSE TYPES
// =============================================================================

export interface ApiError {
  code: string;
  message: string;
  details?: unknown;
}

export interface MatchListResponse {
  success: boolean;
  trip?: TripSummary;
  matches?: MatchResult[];
  metadata?: {
    requestedLimit: number;
    appliedLimit: number;
    returned: number;
    matchingDurationMs: number;
    algorithmVersion: string;

    /** Highest total the active configuration can award */
    maxScore: number;
  };
  error?: ApiError;
}

export interface MatchDetailResponse {
  success: boolean;
  match?: MatchDetail;
  error?: ApiError;
}

// =============================================================================
// ZOD VALIDATION SCHEMAS
// =============================================================================

const isoDate = z.string().date('Expected a YYYY-MM-DD calendar date');

export const MatchQuerySchema = z.object({
  trip: z.string().min(1).optional(),
  limit: z.coerce.number().int().positive().optional()
});

const nonNegative = z.number().int().min(0);

export const MatchingConfigSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  minimumScore: z.number().int(),
  defaultLimit: z.number().int().positive(),
  maxLimit: z.number().int().positive(),
  points: z.object({
    location: z.object({
      overlappingCrags: nonNegative,
      flexible: nonNegative,
      differentCrags: nonNegative
    }),
    dateOverlap: z.object({
      perDay: nonNegative,
      max: nonNegative
    }),
    discipline: z.object({
      sharedProfile: nonNegative,
      tripPreferenceOnly: nonNegative
    }),
    grade: z.object({
      max: nonNegative
    }),
    riskTolerance: z.object({
      same: z.number().int(),
      adjacent: z.number().int(),
      opposite: z.number().int()
    }),
    availability: z.object({
      max: nonNegative
    })
  }),
  isDefault: z.boolean()
});

export const ConfigUpdateSchema = MatchingConfigSchema.omit({ id: true }).deepPartial();

export const DisciplineProfileSchema = z.object({
  discipline: z.nativeEnum(Discipline),
  comfortableGradeMinScore: z.number().int(),
  comfortableGradeMaxScore: z.number().int(),
  yearsExperience: z.number().int().min(0).optional(),
  canLead: z.boolean().optional(),
  canBelay: z.boolean().optional()
});

export const ClimberSchema = z.object({
  id: z.string().min(1),
  displayName: z.string().min(1),
  bio: z.string().default(''),
  homeLocation: z.string().default(''),
  riskTolerance: z.nativeEnum(RiskTolerance).default(RiskTolerance.BALANCED),
  profileVisible: z.boolean().default(true),
  emailVerified: z.boolean().default(true),
  disciplines: z.array(DisciplineProfileSchema).default([]),
  experienceTags: z.array(z.string()).default([])
});

export const TripSchema = z.object({
  id: z.string().min(1),
  userId: z.string().min(1),
  destination: z.object({
    id: z.string().min(1),
    name: z.string().min(1)
  }),
  startDate: isoDate,
  endDate: isoDate,
  isActive: z.boolean().default(true),
  preferredDisciplines: z.array(z.nativeEnum(Discipline)).default([]),
  preferredCragIds: z.array(z.string()).default([]),
  availability: z.array(z.object({
    date: isoDate,
    timeBlock: z.nativeEnum(TimeBlock)
  })).default([])
}).refine(trip => trip.endDate >= trip.startDate, {
  message: 'endDate must not be before startDate',
  path: ['endDate']
});

export const BlockSchema = z.object({
  blockerId: z.string().min(1),
  blockedId: z.string().min(1)
}).refine(block => block.blockerId !== block.blockedId, {
  message: 'A climber cannot block themselves'
});

export const SeedDataSchema = z.object({
  climbers: z.array(ClimberSchema),
  trips: z.array(TripSchema),
  blocks: z.array(BlockSchema).default([])
});

export type SeedData = z.infer<typeof SeedDataSchema>;

// =============================================================================
// UTILITY FUNCTIONS
// =============================================================================

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Whole days from `from` to `to` (both YYYY-MM-DD). Negative if `to` is earlier.
 * Dates are treated as UTC calendar days so the local timezone never shifts them.
 */
export function daysBetween(from: string, to: string): number {
  return Math.round((toUtcDay(to) - toUtcDay(from)) / MS_PER_DAY);
}

/**
 * Epoch milliseconds for a YYYY-MM-DD date, or NaN when it is not a real
 * calendar day (2026-02-30 does not roll over into March).
 */
function toUtcDay(value: string): number {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!match) return NaN;

  const [, year, month, day] = match.map(Number);
  const time = Date.UTC(year, month - 1, day);
  const date = new Date(time);
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day
    ? time
    : NaN;
}

/**
 * Inclusive overlap of two trips. `days` is 0 when they don't meet or when
 * either bound of the window is not a real date.
 */
export function getOverlapWindow(
  a: Pick<Trip, 'startDate' | 'endDate'>,
  b: Pick<Trip, 'startDate' | 'endDate'>
): OverlapWindow {
  const start = a.startDate > b.startDate ? a.startDate : b.startDate;
  const end = a.endDate < b.endDate ? a.endDate : b.endDate;
  const span = daysBetween(start, end);
  return {
    start,
    end,
    days: Number.isFinite(span) ? Math.max(0, span + 1) : 0
  };
}

/**
 * True when two trips share at least one calendar day.
 */
export function tripsOverlap(
  a: Pick<Trip, 'startDate' | 'endDate'>,
  b: Pick<Trip, 'startDate' | 'endDate'>
): boolean {
  return getOverlapWindow(a, b).days > 0;
}

/**
 * Distance between two tolerances on the caution scale (0, 1 or 2).
 */
export function riskDifference(a: RiskTolerance, b: RiskTolerance): number {
  return Math.abs(RISK_LEVELS[a] - RISK_LEVELS[b]);
}

export function toClimberProfile(climber: Climber): ClimberProfile {
  return {
    id: climber.id,
    displayName: climber.displayName,
    bio: climber.bio,
    homeLocation: climber.homeLocation,
    riskTolerance: climber.riskTolerance,
    disciplines: climber.disciplines.map(d => ({ ...d })),
    experienceTags: [...climber.experienceTags]
  };
}

export function toTripSummary(trip: Trip): TripSummary {
  return {
    id: trip.id,
    destination: { ...trip.destination },
    startDate: trip.startDate,
    endDate: trip.endDate,
    preferredDisciplines: [...trip.preferredDisciplines]
  };
}
