import express from 'express';
import cors from 'cors';
import { createSimulationRouter } from './routes/simulationRoutes';
import { type ConfigManager, type EnvironmentConfig, configManager } from './config/config';

/**
 * Build the express application without binding a port, so the server
 * entry point and the tests share one setup.
 */
export function createApp(envConfig: EnvironmentConfig, manager: ConfigManager = configManager): express.Express {
  const app = express();

  // ===========================================================================
  // MIDDLEWARE
  // ===========================================================================

  app.use(cors({
    origin: envConfig.allowedOrigins,
    methods: ['GET', 'POST', 'PUT', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
    credentials: true
  }));

  // Event scripts can be long
  app.use(express.json({ limit: '10mb' }));

  if (envConfig.nodeEnv === 'development') {
    app.use((req, res, next) => {
      console.log(`${new Date().toISOString()} ${req.method} ${req.path}`);
      next();
    });
  }

  // ===========================================================================
  // ROUTES
  // ===========================================================================

  app.use('/api', createSimulationRouter(manager));

  app.get('/', (req, res) => {
    res.json({
      name: 'Ride Dispatch Simulator',
      version: '1.0.0',
      description: 'Discrete-event simulation of rider and driver dispatch on a grid',
      endpoints: {
        health: 'GET /api/health',
        simulate: 'POST /api/simulations',
        getResult: 'GET /api/simulations/:resultId',
        listConfigs: 'GET /api/config',
        getConfig: 'GET /api/config/:configId',
        updateConfig: 'PUT /api/config/:configId'
      }
    });
  });

  // ===========================================================================
  // ERROR HANDLING
  // ===========================================================================

  app.use((req, res) => {
    res.status(404).json({
      success: false,
      error: {
        code: 'NOT_FOUND',
        message: `Endpoint ${req.method} ${req.path} not found`
      }
    });
  });

  // Malformed JSON bodies arrive here from express.json()
  app.use((err: Error, req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({
        success: false,
        error: { code: 'VALIDATION_ERROR', message: 'Request body is not valid JSON' }
      });
      return;
    }

    console.error('Unhandled error:', err);
    res.status(500).json({
      success: false,
      error: {
        code: 'INTERNAL_ERROR',
        message: envConfig.nodeEnv === 'development' ? err.message : 'Internal server error'
      }
    });
  });

  return app;
}
