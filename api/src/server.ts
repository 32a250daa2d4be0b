import express, { NextFunction, Request, RequestHandler, Response, Router } from 'express';
import cors from 'cors';
import morgan from 'morgan';
import swaggerUi from 'swagger-ui-express';
import {
  AppError,
  ConflictError,
  NotFoundError,
  SignatureError,
  errorMeta,
  logger,
  verifyPayload,
  verifyRaw,
} from '@lotbatch/shared';
import { BatchOrchestrator, DeliveryMonitor } from '@lotbatch/worker';
import { openapiSpec } from './openapi';
import { parseCreateJobBody, parseHours, parseLimit, parseListQuery } from './validation';

export interface ServerDeps {
  orchestrator: BatchOrchestrator;
  monitor: DeliveryMonitor;
  sharedKey: string;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function wrap(fn: AsyncHandler): RequestHandler {
  return (req, res, next) => {
    fn(req, res).catch(next);
  };
}

/** Read routes sign the request path with its query string, e.g. `/api/v1/jobs?limit=5`. */
export function requireSignature(sharedKey: string): RequestHandler {
  return (req, _res, next) => {
    const provided = req.get('X-Signature');
    if (!verifyRaw(req.originalUrl, provided, sharedKey)) {
      next(new SignatureError());
      return;
    }
    next();
  };
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof AppError && err.status < 500) {
    res.status(err.status).json({ error: err.message });
    return;
  }
  if (err instanceof SyntaxError) {
    res.status(400).json({ error: 'Malformed JSON body' });
    return;
  }
  logger.error('Unhandled API error', { method: req.method, path: req.originalUrl, ...errorMeta(err) });
  res.status(500).json({ error: 'Internal server error' });
}

export function createRouter({ orchestrator, monitor, sharedKey }: ServerDeps): Router {
  const router = Router();
  const signed = requireSignature(sharedKey);

  // POST /api/v1/jobs
  router.post(
    '/v1/jobs',
    wrap(async (req, res) => {
      const body = parseCreateJobBody(req.body);
      if (!verifyPayload(body.rawLots, body.signature, sharedKey)) throw new SignatureError();
      const jobId = await orchestrator.createJob(body.lots, body.languages, { webhookUrl: body.webhookUrl });
      const snapshot = await orchestrator.checkBatchStatus(jobId);
      res.status(202).json({
        job_id: jobId,
        status: snapshot ? snapshot.status : 'pending',
        error_message: snapshot ? snapshot.errorMessage : null,
      });
    })
  );

  router.get(
    '/v1/jobs',
    signed,
    wrap(async (req, res) => {
      const query = parseListQuery(req.query);
      const jobs = await orchestrator.listJobs(query);
      res.json({ jobs, limit: query.limit, offset: query.offset });
    })
  );

  router.get(
    '/v1/jobs/:id/status',
    signed,
    wrap(async (req, res) => {
      const snapshot = await orchestrator.checkBatchStatus(req.params.id);
      if (!snapshot) throw new NotFoundError('Job', req.params.id);
      res.json(snapshot);
    })
  );

  router.get(
    '/v1/jobs/:id/results',
    signed,
    wrap(async (req, res) => {
      const results = await orchestrator.getJobResults(req.params.id);
      if (!results) throw new NotFoundError('Job', req.params.id);
      if (!results.ready) {
        res.status(202).json({ job_id: results.jobId, status: results.status, message: 'Job not completed yet' });
        return;
      }
      res.json({
        job_id: results.jobId,
        status: results.status,
        completed_at: results.completedAt,
        languages: results.languages,
        lots: results.lots,
      });
    })
  );

  router.post(
    '/v1/jobs/:id/cancel',
    signed,
    wrap(async (req, res) => {
      const body: unknown = req.body;
      const reason =
        typeof body === 'object' && body !== null && 'reason' in body && typeof body.reason === 'string' && body.reason.trim()
          ? body.reason.trim()
          : undefined;
      const outcome = await orchestrator.cancelJob(req.params.id, reason);
      if (outcome === 'not_found') throw new NotFoundError('Job', req.params.id);
      if (outcome === 'not_cancellable') throw new ConflictError('Job can no longer be cancelled');
      res.json({ job_id: req.params.id, status: 'cancelled' });
    })
  );

  router.get(
    '/v1/webhooks/metrics',
    signed,
    wrap(async (req, res) => {
      res.json(await monitor.getDeliveryMetrics(parseHours(req.query.hours)));
    })
  );

  router.get(
    '/v1/webhooks/failures',
    signed,
    wrap(async (req, res) => {
      res.json({ failures: await monitor.getFailedDeliveries(parseLimit(req.query.limit)) });
    })
  );

  router.get(
    '/v1/webhooks/endpoints',
    signed,
    wrap(async (_req, res) => {
      res.json({ endpoints: await monitor.getEndpointHealth() });
    })
  );

  router.get(
    '/v1/webhooks/alerts',
    signed,
    wrap(async (_req, res) => {
      res.json({ alerts: await monitor.checkAlerts() });
    })
  );

  return router;
}

export function createApp(deps: ServerDeps): express.Express {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: '25mb' }));
  app.use(morgan('dev'));

  app.use('/api', createRouter(deps));

  // OpenAPI JSON and Swagger UI
  app.get('/api/openapi.json', (_req: Request, res: Response) => {
    res.json(openapiSpec);
  });
  app.use('/api/docs', swaggerUi.serve, swaggerUi.setup(openapiSpec));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ ok: true });
  });
  app.use(errorHandler);
  return app;
}
