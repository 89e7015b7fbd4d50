import express, { Router, Request, Response, NextFunction } from 'express';
import { asRequestBodyError, AuthenticationError, ValidationError, type RequestBodyError } from '../errors';
import type { ReportIngestor } from '../services/ReportIngestor';
import { log } from '../utils/logger';

export const REPORT_BODY_LIMIT = '64kb';

function headerToken(req: Request): string | undefined {
  const authorization = req.get('authorization');
  if (authorization) {
    const match = /^Bearer\s+(.+)$/i.exec(authorization.trim());
    if (match) return match[1].trim();
  }

  const token = req.get('x-api-token');
  return token ? token.trim() : undefined;
}

/**
 * Bearer header first, then X-API-Token, then a "token" field in the body
 */
export function extractToken(req: Request): string | undefined {
  const fromHeader = headerToken(req);
  if (fromHeader !== undefined) return fromHeader;

  const body: unknown = req.body;
  if (typeof body === 'object' && body !== null && 'token' in body && typeof body.token === 'string') {
    return body.token;
  }
  return undefined;
}

function bodyErrorMessage(error: RequestBodyError): string {
  if (error.type === 'entity.parse.failed') return 'Invalid JSON';
  if (error.status === 413) return 'Payload too large';
  if (error.status === 415) return 'Unsupported media type';
  return 'Bad request';
}

export function createReportRouter(ingestor: ReportIngestor): Router {
  const router = Router();

  const unauthorized = (req: Request, res: Response) => {
    log.warn(`Rejected report from ${req.ip ?? 'unknown address'}: bad or missing token`, 'report');
    return res.status(401).json({ error: 'Unauthorized' });
  };

  // A header token is checked before the body is read
  router.use((req: Request, res: Response, next: NextFunction) => {
    const presented = headerToken(req);
    if (presented !== undefined && !ingestor.authorizes(presented)) {
      return unauthorized(req, res);
    }
    next();
  });

  router.use(express.json({ limit: REPORT_BODY_LIMIT }));

  // POST /api/v1/report - Submit one speed measurement
  router.post('/', (req: Request, res: Response) => {
    try {
      const { nodeId, receivedAt } = ingestor.ingest(extractToken(req), req.body);
      res.json({ status: 'ok', node_id: nodeId, received_at: receivedAt.toISOString() });
    } catch (error) {
      if (error instanceof AuthenticationError) {
        return unauthorized(req, res);
      }
      if (error instanceof ValidationError) {
        log.warn(`Rejected report: ${error.reason}`, 'report');
        return res.status(400).json({ error: 'Invalid report', reason: error.reason });
      }
      log.error('Error recording report:', 'report', error);
      res.status(500).json({ error: 'Failed to record report' });
    }
  });

  // Body parser failures; callers without a valid header token learn nothing about the body
  router.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    const bodyError = asRequestBodyError(error);
    if (!bodyError) {
      return next(error);
    }
    if (!ingestor.authorizes(headerToken(req))) {
      return unauthorized(req, res);
    }
    log.warn(`Rejected report body: ${bodyError.type}`, 'report');
    res.status(bodyError.status).json({ error: bodyErrorMessage(bodyError) });
  });

  return router;
}

export default createReportRouter;
