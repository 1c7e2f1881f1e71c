import { Router, Request, Response } from 'express';
import type { HealthInfo } from '../../services/whisper/types';

export function createHealthRoutes(health: HealthInfo): Router {
  const router = Router();

  /** GET /healthz - resolved model and whisper.cpp settings */
  router.get('/', (_req: Request, res: Response) => {
    res.json(health);
  });

  return router;
}
