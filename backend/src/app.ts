import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import { asRequestBodyError } from './errors';
import createHealthRouter, { type HealthDeps } from './routes/health';
import createReportRouter from './routes/report';
import type { ReportIngestor } from './services/ReportIngestor';
import { log } from './utils/logger';

export interface AppDeps {
  ingestor: ReportIngestor;
  health: HealthDeps;
}

export function createApp(deps: AppDeps): Express {
  const app = express();

  // Middleware
  app.use(cors());

  // Routes
  app.use('/health', createHealthRouter(deps.health));
  app.use('/api/v1/report', createReportRouter(deps.ingestor));

  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Express recognises error middleware by its four parameters
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    const bodyError = asRequestBodyError(error);
    if (bodyError) {
      return res.status(bodyError.status).json({ error: 'Bad request' });
    }
    log.error(`Unhandled error on ${req.method} ${req.path}:`, 'app', error);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

export default createApp;
