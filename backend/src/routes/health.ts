import { Router, Request, Response } from 'express';
import type { AppMode } from '../types/config';
import type { NodeStateStore } from '../services/NodeStateStore';

export interface HealthDeps {
  mode: AppMode;
  store: NodeStateStore;
  configuredNodes: number;
  version: string;
  startedAt?: Date;
  now?: () => Date;
}

export const SERVICE_NAME = 'speedwatch-master';
export const APP_VERSION = '1.0.0';

// Counts only; never report contents
export function createHealthRouter(deps: HealthDeps): Router {
  const router = Router();
  const startedAt = deps.startedAt ?? new Date();
  const now = deps.now ?? (() => new Date());

  router.get('/', (req: Request, res: Response) => {
    const current = now();
    res.json({
      status: 'ok',
      mode: deps.mode,
      service: SERVICE_NAME,
      version: deps.version,
      uptime_seconds: Math.max(0, Math.floor((current.getTime() - startedAt.getTime()) / 1000)),
      timestamp: current.toISOString(),
      nodes: {
        configured: deps.configuredNodes,
        reporting: deps.store.size(),
      },
    });
  });

  return router;
}

export default createHealthRouter;
