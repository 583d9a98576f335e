/**
 * SignalRadar — Control Server
 *
 * Minimal Express app for operating the pipeline by hand or from a scheduler.
 *
 * Endpoints:
 * - GET  /health              — Health check for monitoring
 * - POST /cycles              — Run one cycle now (409 while one is running, 503 if the store is down)
 * - GET  /cycles/last         — Summary of the last completed cycle
 * - POST /items/:id/rescore   — Recompute one item's score from its feedback
 *
 * Run with: npm run server
 */

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { pathToFileURL } from 'url';
import { z } from 'zod';
import { loadConfig, loadEnv } from '../config';
import { createRadarContext, type RadarContext } from '../pipeline';
import { rescoreItem } from '../scoring';
import { logger } from '../lib/logger';

const SERVICE = 'signal-radar-control';
const VERSION = '1.0.0';

const CycleRequestSchema = z
  .object({
    dryRun: z.boolean().optional(),
    sources: z.array(z.string().min(1)).optional(),
  })
  .strict();

// ============================================================
// EXPRESS APP
// ============================================================

export function createControlApp(context: RadarContext): Express {
  const app = express();
  app.use(express.json());

  // ============================================================
  // HEALTH ENDPOINT
  // ============================================================

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      service: SERVICE,
      version: VERSION,
    });
  });

  // ============================================================
  // CYCLES
  // ============================================================

  app.post('/cycles', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = CycleRequestSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        res.status(400).json({ error: 'Invalid request body', issues: parsed.error.issues.map(i => i.message) });
        return;
      }

      if (context.orchestrator.isRunning) {
        res.status(409).json({ error: 'A cycle is already running' });
        return;
      }

      logger.info('Cycle requested', { dryRun: parsed.data.dryRun ?? false });
      const summary = await context.orchestrator.runCycle(parsed.data);
      res.status(summary.failed ? 503 : 200).json(summary);
    } catch (error) {
      next(error);
    }
  });

  app.get('/cycles/last', (_req: Request, res: Response) => {
    const summary = context.orchestrator.lastSummary;
    if (!summary) {
      res.status(404).json({ error: 'No cycle has completed yet' });
      return;
    }
    res.json(summary);
  });

  // ============================================================
  // RESCORING
  // ============================================================

  app.post('/items/:id/rescore', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const item = await rescoreItem(context, req.params.id, context.clock());
      if (!item) {
        res.status(404).json({ error: 'Item not found' });
        return;
      }
      res.status(200).json(item);
    } catch (error) {
      next(error);
    }
  });

  // ============================================================
  // ERROR HANDLER
  // ============================================================

  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    logger.error('Unhandled error in control server', { error: err.message });
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

// ============================================================
// SERVER START
// ============================================================

export function startServer(): void {
  const env = loadEnv();
  const context = createRadarContext({ config: loadConfig(), env });
  const app = createControlApp(context);

  app.listen(env.CONTROL_PORT, () => {
    logger.info(`Control server listening on port ${env.CONTROL_PORT}`);
  });
}

// Start if run directly
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  startServer();
}
