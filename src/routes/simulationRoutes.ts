/**
 * API Routes for the Dispatch Simulator
 *
 * GET  /api/health                  - Health check
 * POST /api/simulations             - Run a simulation from a script or event list
 * GET  /api/simulations/:resultId   - Get a previous simulation result
 * GET  /api/config                  - List all configurations
 * GET  /api/config/:configId        - Get a specific configuration
 * PUT  /api/config/:configId        - Create or update a configuration
 */

import { Router, type Request, type Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { ZodError } from 'zod';
import {
  type SimulationConfig,
  SimulationConfigSchema,
  SimulationRequestSchema,
  type SimulationResponse,
  type SimulationResult
} from '../models/types';
import { EventLimitError, InsufficientDataError, ParseError, SimulationError } from '../models/errors';
import { type ConfigManager, configManager } from '../config/config';
import { Simulation } from '../simulation/Simulation';
import type { SimulationEvent } from '../simulation/events';
import { createEventsFromInputs, formatZodError, parseEventScript } from '../utils/eventScript';

const ConfigUpdateSchema = SimulationConfigSchema.omit({ id: true }).partial();

/**
 * Build the API router. Each router keeps its own in-memory result store;
 * configurations live in `manager`.
 */
export function createSimulationRouter(manager: ConfigManager = configManager): Router {
  const router = Router();
  const resultsStore = new Map<string, SimulationResult>();

  // ===========================================================================
  // HEALTH CHECK ENDPOINT
  // ===========================================================================

  router.get('/health', (req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      version: '1.0.0',
      features: ['event-script', 'json-events', 'shared-dispatch', 'reserve-dispatch', 'trace'],
      timestamp: new Date().toISOString()
    });
  });

  // ===========================================================================
  // RUN A SIMULATION
  // ===========================================================================

  router.post('/simulations', (req: Request, res: Response) => {
    const parsed = SimulationRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return sendError(res, 400, 'VALIDATION_ERROR', formatZodError(parsed.error), parsed.error.issues);
    }
    const request = parsed.data;

    if (request.configId !== undefined && !manager.hasConfig(request.configId)) {
      return sendError(res, 404, 'NOT_FOUND', `Configuration ${request.configId} not found`);
    }

    const baseConfig = manager.getConfig(request.configId);
    const config = request.configOverrides
      ? manager.applyOverrides(baseConfig, request.configOverrides)
      : baseConfig;

    try {
      const initialEvents = request.script !== undefined
        ? parseEventScript(request.script)
        : createEventsFromInputs(request.events ?? []);

      const result = runSimulation(initialEvents, config);
      resultsStore.set(result.id, result);

      const body: SimulationResponse = { success: true, result };
      return res.json(body);
    } catch (error) {
      const failure = describeFailure(error);
      if (failure.status === 500) {
        console.error('[Simulation] Run failed:', error);
      }
      return sendError(res, failure.status, failure.code, failure.message, failure.details);
    }
  });

  // ===========================================================================
  // GET SIMULATION RESULT
  // ===========================================================================

  router.get('/simulations/:resultId', (req: Request, res: Response) => {
    const { resultId } = req.params;
    const result = resultsStore.get(resultId);

    if (!result) {
      return sendError(res, 404, 'NOT_FOUND', `Simulation result ${resultId} not found`);
    }

    const body: SimulationResponse = { success: true, result };
    return res.json(body);
  });

  // ===========================================================================
  // CONFIGURATION ENDPOINTS
  // ===========================================================================

  router.get('/config', (req: Request, res: Response) => {
    res.json({ success: true, configs: manager.listConfigs() });
  });

  router.get('/config/:configId', (req: Request, res: Response) => {
    const { configId } = req.params;
    if (!manager.hasConfig(configId)) {
      return sendError(res, 404, 'NOT_FOUND', `Configuration ${configId} not found`);
    }
    return res.json({ success: true, config: manager.getConfig(configId) });
  });

  /**
   * Merge the body into an existing configuration, or create a new one
   * based on the default. A new configuration only becomes the default
   * when the body says so.
   */
  router.put('/config/:configId', (req: Request, res: Response) => {
    const { configId } = req.params;
    const updates = ConfigUpdateSchema.safeParse(req.body);
    if (!updates.success) {
      return sendError(res, 400, 'VALIDATION_ERROR', formatZodError(updates.error), updates.error.issues);
    }

    const existing: SimulationConfig = manager.hasConfig(configId)
      ? manager.getConfig(configId)
      : { ...manager.getDefaultConfig(), name: configId, isDefault: false };

    try {
      const config = manager.saveConfig({ ...existing, ...updates.data, id: configId });
      return res.json({ success: true, config });
    } catch (error) {
      return sendError(res, 400, 'CONFIG_ERROR', error instanceof Error ? error.message : 'Unknown error');
    }
  });

  return router;
}

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

/**
 * Run a fresh simulation and package its outcome for storage.
 */
export function runSimulation(initialEvents: SimulationEvent[], config: SimulationConfig): SimulationResult {
  const startTime = Date.now();
  const simulation = new Simulation(config);
  const report = simulation.run(initialEvents);

  const result: SimulationResult = {
    id: uuidv4(),
    report,
    dispatcher: simulation.dispatcher.snapshot(),
    metadata: {
      configId: config.id,
      dispatchPolicy: config.dispatchPolicy,
      initialEvents: initialEvents.length,
      eventsProcessed: simulation.eventsProcessed,
      finalTime: simulation.currentTime,
      durationMs: Date.now() - startTime
    },
    createdAt: new Date()
  };

  if (config.recordTrace) {
    result.trace = simulation.getTrace();
  }
  return result;
}

interface Failure {
  status: number;
  code: string;
  message: string;
  details?: unknown;
}

/**
 * Map an error thrown while building or running a simulation to a response.
 */
export function describeFailure(error: unknown): Failure {
  if (error instanceof ParseError) {
    return {
      status: 400,
      code: 'VALIDATION_ERROR',
      message: error.message,
      details: error.line === undefined ? undefined : { line: error.line }
    };
  }
  if (error instanceof ZodError) {
    return { status: 400, code: 'VALIDATION_ERROR', message: formatZodError(error), details: error.issues };
  }
  if (error instanceof InsufficientDataError) {
    return { status: 422, code: error.code, message: error.message, details: { statistic: error.statistic } };
  }
  if (error instanceof EventLimitError) {
    return { status: 422, code: error.code, message: error.message, details: { limit: error.limit } };
  }
  if (error instanceof SimulationError) {
    return { status: 500, code: 'SIMULATION_ERROR', message: error.message, details: { cause: error.code } };
  }
  return {
    status: 500,
    code: 'SIMULATION_ERROR',
    message: error instanceof Error ? error.message : 'Unknown error'
  };
}

function sendError(res: Response, status: number, code: string, message: string, details?: unknown): Response {
  const body: SimulationResponse = {
    success: false,
    error: details === undefined ? { code, message } : { code, message, details }
  };
  return res.status(status).json(body);
}
