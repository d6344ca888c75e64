/**
 * API Routes for Partner Matching
 *
 * GET  /api/health                        - Health check
 * GET  /api/matches?trip=&limit=          - Ranked partners for a trip
 * GET  /api/matches/:climberId/detail     - One match with extra detail
 * GET  /api/config                        - List scoring configurations
 * GET  /api/config/:configId              - Get a configuration
 * PUT  /api/config/:configId              - Create or update a configuration
 *
 * The caller's identity arrives in the X-Climber-Id header, set by the
 * authentication gateway in front of this service.
 */

import { Router, Request, Response, NextFunction } from 'express';
import {
  MatchDetailResponse,
  MatchListResponse,
  MatchQuerySchema,
  toTripSummary
} from '../models/types';
import { MatchingEngine, ALGORITHM_VERSION } from '../matchers/MatchingEngine';
import { ConfigManager } from '../config/config';
import { NotFoundError, UnauthenticatedError, ValidationError } from '../utils/errors';

export const CLIMBER_ID_HEADER = 'x-climber-id';

export interface MatchRouterDeps {
  engine: MatchingEngine;
  configManager: ConfigManager;

  /** Today's date as YYYY-MM-DD (UTC by default) */
  today?: () => string;
}

const utcToday = (): string => new Date().toISOString().slice(0, 10);

export function createMatchRouter(deps: MatchRouterDeps): Router {
  const { engine, configManager } = deps;
  const today = deps.today ?? utcToday;
  const router = Router();

  // ===========================================================================
  // HEALTH CHECK ENDPOINT
  // ===========================================================================

  router.get('/health', (req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      version: ALGORITHM_VERSION,
      timestamp: new Date().toISOString()
    });
  });

  // ===========================================================================
  // MATCH LIST
  // ===========================================================================

  router.get('/matches', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const startTime = Date.now();
      const viewerId = requireClimberId(req);
      const query = parseMatchQuery(req.query);

      const config = engine.getConfig();
      const requestedLimit = query.limit ?? config.defaultLimit;
      const appliedLimit = engine.clampLimit(requestedLimit, config);

      const trip = await engine.resolveTrip(viewerId, query.trip, today());
      const matches = await engine.getMatches(viewerId, trip.id, appliedLimit);

      const body: MatchListResponse = {
        success: true,
        trip: toTripSummary(trip),
        matches,
        metadata: {
          requestedLimit,
          appliedLimit,
          returned: matches.length,
          matchingDurationMs: Date.now() - startTime,
          algorithmVersion: ALGORITHM_VERSION,
          maxScore: engine.maxScore(config)
        }
      };
      res.json(body);
    } catch (error) {
      next(error);
    }
  });

  // ===========================================================================
  // MATCH DETAIL
  // ===========================================================================

  router.get('/matches/:climberId/detail', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const viewerId = requireClimberId(req);
      const query = parseMatchQuery(req.query);

      const trip = await engine.resolveTrip(viewerId, query.trip, today());
      const match = await engine.getMatchDetail(viewerId, trip.id, req.params.climberId);

      const body: MatchDetailResponse = { success: true, match };
      res.json(body);
    } catch (error) {
      next(error);
    }
  });

  // ===========================================================================
  // CONFIGURATION ENDPOINTS
  // ===========================================================================

  router.get('/config', (req: Request, res: Response) => {
    res.json({ success: true, configs: configManager.listConfigs() });
  });

  router.get('/config/:configId', (req: Request, res: Response, next: NextFunction) => {
    const { configId } = req.params;
    if (!configManager.hasConfig(configId)) {
      next(new NotFoundError(`Configuration ${configId} not found`));
      return;
    }
    res.json({ success: true, config: configManager.getConfig(configId) });
  });

  router.put('/config/:configId', (req: Request, res: Response, next: NextFunction) => {
    try {
      const config = configManager.updateConfig(req.params.configId, req.body);
      res.json({ success: true, config });
    } catch (error) {
      next(error);
    }
  });

  return router;
}

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

function requireClimberId(req: Request): string {
  const value = req.header(CLIMBER_ID_HEADER);
  if (!value || value.trim() === '') {
    throw new UnauthenticatedError();
  }
  return value.trim();
}

function parseMatchQuery(query: unknown) {
  const parsed = MatchQuerySchema.safeParse(query);
  if (!parsed.success) {
    throw new ValidationError('Invalid query parameters', parsed.error.flatten().fieldErrors);
  }
  return parsed.data;
}
