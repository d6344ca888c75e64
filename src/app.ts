import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { v4 as uuidv4 } from 'uuid';
import { createMatchRouter } from './routes/matchRoutes';
import { MatchingEngine } from './matchers/MatchingEngine';
import { ConfigManager, EnvironmentConfig } from './config/config';
import { PartnerStore } from './store/partnerStore';
import { isMatcherError } from './utils/errors';

export interface AppDeps {
  store: PartnerStore;
  configManager: ConfigManager;
  env: EnvironmentConfig;
  today?: () => string;
}

export function createApp(deps: AppDeps): Express {
  const { store, configManager, env } = deps;
  const app = express();

  const engine = new MatchingEngine(store, {
    configManager,
    configId: env.matchConfigId
  });

  // ===========================================================================
  // MIDDLEWARE
  // ===========================================================================

  app.use(cors({
    origin: env.allowedOrigins,
    methods: ['GET', 'PUT', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Climber-Id'],
    exposedHeaders: ['X-Request-Id'],
    credentials: true
  }));

  app.use(express.json({ limit: '1mb' }));

  // Request id on every response
  app.use((req, res, next) => {
    res.setHeader('X-Request-Id', uuidv4());
    next();
  });

  // Request logging (development)
  if (env.nodeEnv === 'development') {
    app.use((req, res, next) => {
      console.log(`${new Date().toISOString()} ${req.method} ${req.path} [${res.getHeader('X-Request-Id')}]`);
      next();
    });
  }

  // ===========================================================================
  // ROUTES
  // ===========================================================================

  app.use('/api', createMatchRouter({ engine, configManager, today: deps.today }));

  app.get('/', (req, res) => {
    res.json({
      name: 'Climbing Partner Matcher',
      version: '1.0.0',
      description: 'Ranks climbing partners for planned trips',
      endpoints: {
        health: 'GET /api/health',
        matches: 'GET /api/matches?trip=:tripId&limit=:n',
        matchDetail: 'GET /api/matches/:climberId/detail?trip=:tripId',
        listConfigs: 'GET /api/config',
        getConfig: 'GET /api/config/:configId',
        updateConfig: 'PUT /api/config/:configId'
      }
    });
  });

  // ===========================================================================
  // ERROR HANDLING
  // ===========================================================================

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({
      success: false,
      error: {
        code: 'NOT_FOUND',
        message: `Endpoint ${req.method} ${req.path} not found`
      }
    });
  });

  // Global error handler
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (isMatcherError(err)) {
      res.status(err.statusCode).json({
        success: false,
        error: {
          code: err.code,
          message: err.message,
          ...(err.details === undefined ? {} : { details: err.details })
        }
      });
      return;
    }

    console.error('[Server] Unhandled error:', err);
    res.status(500).json({
      success: false,
      error: {
        code: 'INTERNAL_ERROR',
        message: env.nodeEnv === 'development' && err instanceof Error ? err.message : 'Internal server error'
      }
    });
  });

  return app;
}
