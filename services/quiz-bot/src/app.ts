import express from 'express';
import helmet from 'helmet';
import { createHealthRoutes, HealthSource } from './routes/health-routes';
import { logger } from './utils/logger';
import { registry } from './utils/metrics';

/**
 * Operational HTTP surface: health probes and Prometheus metrics
 */
export function createApp(health: HealthSource): express.Express {
  const app = express();

  app.use(helmet());

  app.use('/health', createHealthRoutes(health));

  app.get('/metrics', async (req: express.Request, res: express.Response, next: express.NextFunction) => {
    try {
      res.set('Content-Type', registry.contentType);
      res.end(await registry.metrics());
    } catch (error) {
      next(error);
    }
  });

  app.use((req: express.Request, res: express.Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use((error: Error, req: express.Request, res: express.Response, next: express.NextFunction) => {
    logger.error('Unhandled error:', error);
    res.status(500).json({
      error: 'Internal server error',
      message: process.env.NODE_ENV === 'development' ? error.message : 'Something went wrong'
    });
  });

  return app;
}
