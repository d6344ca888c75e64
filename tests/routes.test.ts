/**
 * HTTP API tests.
 *
 * Boots the real express app on an ephemeral port, seeded from
 * data/seed.json, and talks to it with fetch. "Today" is pinned to
 * 2027-01-01 so Ada's Red River Gorge trip is her next upcoming trip.
 *
 * Seeded scores for Ada's trip:
 *   Bo  = 25 + 20 + 20 + 10 + 10 + 1 = 86
 *   Cam = 20 +  8 + 20 +  6 +  3 + 0 = 57
 *   Dee is hidden, Eli is at another destination.
 */

import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import type { Server } from 'node:http';
import { createApp } from '../src/app';
import { ConfigManager, EnvironmentConfig } from '../src/config/config';
import { createSeededStore } from '../src/store/partnerStore';

const env: EnvironmentConfig = {
  port: 0,
  nodeEnv: 'test',
  allowedOrigins: ['http://localhost:5173'],
  seedDataPath: 'data/seed.json',
  matchConfigId: 'default'
};

interface RequestOptions {
  method?: string;
  climberId?: string;
  body?: unknown;
}

interface ApiResponse {
  status: number;
  headers: Headers;
  body: unknown;
}

let server: Server;
let baseUrl = '';

beforeAll(async () => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'debug').mockImplementation(() => undefined);

  const store = await createSeededStore(env.seedDataPath);
  const app = createApp({
    store,
    configManager: new ConfigManager(),
    env,
    today: () => '2027-01-01'
  });

  await new Promise<void>(resolve => {
    server = app.listen(0, '127.0.0.1', () => resolve());
  });
  const addr = server.address();
  const port = typeof addr === 'string' || addr === null ? 80 : addr.port;
  baseUrl = `http://127.0.0.1:${port}`;
});

afterAll(async () => {
  vi.restoreAllMocks();
  if (server) {
    await new Promise<void>((resolve, reject) => {
      server.close(err => (err ? reject(err) : resolve()));
    });
  }
});

async function request(path: string, options: RequestOptions = {}): Promise<ApiResponse> {
  const headers: Record<string, string> = { Accept: 'application/json' };
  if (options.climberId) {
    headers['X-Climber-Id'] = options.climberId;
  }
  if (options.body !== undefined) {
    headers['Content-Type'] = 'application/json';
  }

  const res = await fetch(`${baseUrl}${path}`, {
    method: options.method ?? 'GET',
    headers,
    body: options.body === undefined ? undefined : JSON.stringify(options.body)
  });

  return { status: res.status, headers: res.headers, body: await res.json() };
}

describe('API', () => {

  // ===========================================================================
  // HEALTH & PLUMBING
  // ===========================================================================

  describe('Health', () => {
    it('should report healthy', async () => {
      const res = await request('/api/health');

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ status: 'healthy', version: '1.0.0' });
    });

    it('should tag every response with a request id', async () => {
      const res = await request('/api/health');

      expect(res.headers.get('x-request-id')).toMatch(/^[0-9a-f-]{36}$/);
    });

    it('should answer unknown endpoints with a 404 envelope', async () => {
      const res = await request('/api/nope');

      expect(res.status).toBe(404);
      expect(res.body).toEqual({
        success: false,
        error: { code: 'NOT_FOUND', message: 'Endpoint GET /api/nope not found' }
      });
    });
  });

  // ===========================================================================
  // MATCH LIST
  // ===========================================================================

  describe('GET /api/matches', () => {
    it('should require a caller identity', async () => {
      const res = await request('/api/matches');

      expect(res.status).toBe(401);
      expect(res.body).toEqual({
        success: false,
        error: { code: 'UNAUTHENTICATED', message: 'Missing climber identity' }
      });
    });

    it('should reject a non-positive limit', async () => {
      const res = await request('/api/matches?limit=0', { climberId: 'climber-ada' });

      expect(res.status).toBe(400);
      expect(res.body).toMatchObject({
        success: false,
        error: { code: 'VALIDATION_ERROR', message: 'Invalid query parameters' }
      });
    });

    it('should reject a non-numeric limit', async () => {
      const res = await request('/api/matches?limit=lots', { climberId: 'climber-ada' });

      expect(res.status).toBe(400);
    });

    /**
     * No trip given: the soonest upcoming trip is used.
     */
    it("should rank partners for the caller's next trip", async () => {
      const res = await request('/api/matches', { climberId: 'climber-ada' });

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        success: true,
        trip: {
          id: 'trip-ada-rrg',
          destination: { id: 'red-river-gorge', name: 'Red River Gorge' },
          startDate: '2027-04-10',
          endDate: '2027-04-16'
        },
        matches: [
          {
            candidate: { id: 'climber-bo', displayName: 'Bo' },
            trip: { id: 'trip-bo-rrg' },
            score: 86,
            overlap: { start: '2027-04-12', end: '2027-04-16', days: 5 },
            reasons: [
              'Both in Red River Gorge',
              '5 day overlap',
              'Both climb sport',
              'Similar grades',
              'Same risk tolerance',
              '1 overlapping availability block'
            ]
          },
          {
            candidate: { id: 'climber-cam' },
            score: 57,
            reasons: ['Both in Red River Gorge', '2 day overlap', 'Both climb trad', 'Similar grades']
          }
        ],
        metadata: {
          requestedLimit: 10,
          appliedLimit: 10,
          returned: 2,
          algorithmVersion: '1.0.0',
          maxScore: 100
        }
      });
    });

    it('should honour an explicit trip and limit', async () => {
      const res = await request('/api/matches?trip=trip-ada-rrg&limit=1', { climberId: 'climber-ada' });

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        matches: [{ candidate: { id: 'climber-bo' }, score: 86 }],
        metadata: { requestedLimit: 1, appliedLimit: 1, returned: 1 }
      });
    });

    it('should clamp an oversized limit', async () => {
      const res = await request('/api/matches?limit=1000', { climberId: 'climber-ada' });

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        metadata: { requestedLimit: 1000, appliedLimit: 50, returned: 2 }
      });
    });

    /**
     * Eli is the only climber at Smith Rock.
     */
    it('should return an empty list when nobody matches', async () => {
      const res = await request('/api/matches', { climberId: 'climber-eli' });

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ success: true, matches: [], metadata: { returned: 0 } });
    });

    it("should not reveal another climber's trip", async () => {
      const res = await request('/api/matches?trip=trip-bo-rrg', { climberId: 'climber-ada' });

      expect(res.status).toBe(404);
      expect(res.body).toEqual({
        success: false,
        error: { code: 'NOT_FOUND', message: 'Trip not found' }
      });
    });

    it('should 404 an unknown caller', async () => {
      const res = await request('/api/matches?trip=trip-ada-rrg', { climberId: 'climber-nobody' });

      expect(res.status).toBe(404);
      expect(res.body).toMatchObject({ error: { message: 'Climber not found' } });
    });

    it('should 404 when the caller has no upcoming trip', async () => {
      const res = await request('/api/matches', { climberId: 'climber-nobody' });

      expect(res.status).toBe(404);
      expect(res.body).toMatchObject({ error: { message: 'No upcoming trips' } });
    });
  });

  // ===========================================================================
  // MATCH DETAIL
  // ===========================================================================

  describe('GET /api/matches/:climberId/detail', () => {
    it('should describe one match', async () => {
      const res = await request('/api/matches/climber-bo/detail', { climberId: 'climber-ada' });

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        success: true,
        match: {
          candidate: { id: 'climber-bo' },
          score: 86,
          sharedDisciplines: ['sport'],
          gradeCompatibility: {
            sport: { overlapRange: '45-55', compatibility: 'medium' }
          },
          availabilityOverlap: [{ date: '2027-04-12', timeBlocks: ['morning'] }]
        }
      });
    });

    it('should 404 a hidden climber', async () => {
      const res = await request('/api/matches/climber-dee/detail', { climberId: 'climber-ada' });

      expect(res.status).toBe(404);
      expect(res.body).toEqual({
        success: false,
        error: { code: 'NOT_FOUND', message: 'Match not found' }
      });
    });
  });

  // ===========================================================================
  // CONFIGURATION
  // ===========================================================================

  describe('Configuration', () => {
    it('should list the default configuration', async () => {
      const res = await request('/api/config');

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        success: true,
        configs: [{ id: 'default', isDefault: true, minimumScore: 20 }]
      });
    });

    it('should 404 an unknown configuration', async () => {
      const res = await request('/api/config/missing');

      expect(res.status).toBe(404);
      expect(res.body).toMatchObject({ error: { message: 'Configuration missing not found' } });
    });

    it('should create a configuration from partial values', async () => {
      const res = await request('/api/config/weekend', {
        method: 'PUT',
        body: { name: 'Weekend', points: { availability: { max: 8 } } }
      });

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        success: true,
        config: {
          id: 'weekend',
          name: 'Weekend',
          isDefault: false,
          minimumScore: 20,
          points: { availability: { max: 8 }, grade: { max: 15 } }
        }
      });
    });

    it('should reject an invalid configuration', async () => {
      const res = await request('/api/config/weekend', {
        method: 'PUT',
        body: { maxLimit: -1 }
      });

      expect(res.status).toBe(400);
      expect(res.body).toMatchObject({ success: false, error: { code: 'CONFIG_ERROR' } });
    });

    it('should reject a default limit above the maximum', async () => {
      const res = await request('/api/config/weekend', {
        method: 'PUT',
        body: { defaultLimit: 100 }
      });

      expect(res.status).toBe(400);
      expect(res.body).toMatchObject({
        error: { code: 'CONFIG_ERROR', message: 'defaultLimit (100) cannot exceed maxLimit (50)' }
      });
    });

    /**
     * Raising the bar on the active configuration drops Cam (57) on the
     * next request.
     */
    it('should not let the default configuration lose its flag', async () => {
      const res = await request('/api/config/default', {
        method: 'PUT',
        body: { isDefault: false }
      });

      expect(res.status).toBe(400);
      expect(res.body).toMatchObject({ error: { code: 'CONFIG_ERROR' } });
    });

    it('should apply configuration changes to later requests', async () => {
      const update = await request('/api/config/default', {
        method: 'PUT',
        body: { minimumScore: 60 }
      });
      expect(update.status).toBe(200);

      const res = await request('/api/matches', { climberId: 'climber-ada' });

      expect(res.body).toMatchObject({
        matches: [{ candidate: { id: 'climber-bo' } }],
        metadata: { returned: 1 }
      });
    });
  });
});
