/**
 * Health Endpoint
 *
 * GET /health reports liveness plus a few counters for operators.
 */

import type { Router, Request, Response } from 'express';
import { Router as createRouter } from 'express';

export interface HealthSource {
  activeConnections(): number;
  readonly modelName: string;
  readonly startedAt: Date;
}

export function createHealthRouter(source: HealthSource): Router {
  const router = createRouter();

  router.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      model: source.modelName,
      connections: source.activeConnections(),
      uptime_ms: Date.now() - source.startedAt.getTime(),
    });
  });

  return router;
}
