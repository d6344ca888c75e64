/**
 * Test data factories.
 * Each returns a valid object with sensible defaults; pass overrides for
 * whatever a test cares about.
 */

import {
  Climber,
  Discipline,
  DisciplineProfile,
  RiskTolerance,
  TimeBlock,
  Trip,
  AvailabilityBlock
} from '../src/models/types';

let sequence = 0;

const nextId = (prefix: string): string => {
  sequence += 1;
  return `${prefix}-${String(sequence).padStart(4, '0')}`;
};

export const RED_RIVER_GORGE = { id: 'red-river-gorge', name: 'Red River Gorge' };
export const SMITH_ROCK = { id: 'smith-rock', name: 'Smith Rock' };

export const createProfile = (overrides: Partial<DisciplineProfile> = {}): DisciplineProfile => ({
  discipline: Discipline.SPORT,
  comfortableGradeMinScore: 40,
  comfortableGradeMaxScore: 55,
  ...overrides
});

/**
 * A visible, verified, balanced sport climber.
 */
export const createClimber = (overrides: Partial<Climber> = {}): Climber => ({
  id: nextId('climber'),
  displayName: 'Test Climber',
  bio: '',
  homeLocation: 'Lexington, USA',
  riskTolerance: RiskTolerance.BALANCED,
  profileVisible: true,
  emailVerified: true,
  disciplines: [createProfile()],
  experienceTags: [],
  ...overrides
});

/**
 * An active sport trip to the Red River Gorge, 2026-01-16 to 2026-01-20,
 * flexible about crags, with no declared availability.
 */
export const createTrip = (userId: string, overrides: Partial<Trip> = {}): Trip => ({
  id: nextId('trip'),
  userId,
  destination: RED_RIVER_GORGE,
  startDate: '2026-01-16',
  endDate: '2026-01-20',
  isActive: true,
  preferredDisciplines: [Discipline.SPORT],
  preferredCragIds: [],
  availability: [],
  ...overrides
});

export const slot = (date: string, timeBlock: TimeBlock = TimeBlock.FULL_DAY): AvailabilityBlock => ({
  date,
  timeBlock
});
