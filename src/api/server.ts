import express, { Request, Response, Router, NextFunction, RequestHandler } from 'express';
import type { Server } from 'http';
import { ScanPipeline } from '../core';
import { Logger, defaultLogger } from '../core/logger';

const VERSION = '1.0.0';

/**
 * Create the scan status router
 */
export function createScanRouter(pipeline: ScanPipeline): Router {
  const router = Router();

  /**
   * GET /scan/status
   * Live counters of the scan in progress, or of the last one
   */
  const statusHandler: RequestHandler = (_req: Request, res: Response): void => {
    res.json(pipeline.getStatus());
  };
  router.get('/status', statusHandler);

  /**
   * GET /scan/reports
   * Reports of completed targets
   */
  const reportsHandler: RequestHandler = (_req: Request, res: Response): void => {
    const reports = pipeline.getReports();
    res.json({ reports, count: reports.length });
  };
  router.get('/reports', reportsHandler);

  /**
   * GET /scan/reports/:id
   */
  const reportHandler: RequestHandler = (req: Request, res: Response): void => {
    const report = pipeline.getReport(req.params.id);
    if (report) {
      res.json(report);
    } else {
      res.status(404).json({
        error: 'Not found',
        message: `No report with id ${req.params.id}`,
      });
    }
  };
  router.get('/reports/:id', reportHandler);

  return router;
}

/**
 * Create the Express application serving scan status
 */
export function createApp(pipeline: ScanPipeline, logger: Logger = defaultLogger): express.Application {
  const app = express();

  app.use('/scan', createScanRouter(pipeline));

  const healthHandler: RequestHandler = (_req: Request, res: Response): void => {
    res.json({ status: 'ok', service: 's3-tidy' });
  };
  app.get('/health', healthHandler);

  const rootHandler: RequestHandler = (_req: Request, res: Response): void => {
    res.json({
      name: 's3-tidy',
      version: VERSION,
      description: 'Object store header and content audit',
      endpoints: {
        status: 'GET /scan/status',
        reports: 'GET /scan/reports',
        report: 'GET /scan/reports/:id',
      },
    });
  };
  app.get('/', rootHandler);

  const errorHandler = (err: Error, _req: Request, res: Response, _next: NextFunction): void => {
    logger.error(`[s3-tidy] Error: ${err.message}`);
    const isDevelopment = process.env.NODE_ENV !== 'production';
    res.status(500).json({
      error: 'Internal server error',
      message: isDevelopment ? err.message : 'An unexpected error occurred',
    });
  };
  app.use(errorHandler);

  return app;
}

/**
 * Start the status server
 */
export function startServer(
  port: number,
  pipeline: ScanPipeline,
  logger: Logger = defaultLogger
): Promise<Server> {
  return new Promise((resolve, reject) => {
    const app = createApp(pipeline, logger);
    const server = app.listen(port, () => {
      server.off('error', reject);
      logger.log(`[s3-tidy] Status available at http://localhost:${port}/scan/status`);
      resolve(server);
    });
    server.once('error', reject);
  });
}
