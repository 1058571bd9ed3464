import { Router, Request, Response } from 'express';

export interface HealthSource {
  isReady(): boolean;
  vocabularySize(): number;
  pendingWrites(): number;
  activeRounds(): number;
}

const SERVICE = 'quiz-bot';

export function createHealthRoutes(source: HealthSource): Router {
  const healthRoutes = Router();

  /**
   * Basic health check
   * GET /health
   */
  healthRoutes.get('/', (req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      service: SERVICE,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      checks: {
        vocabularyItems: source.vocabularySize(),
        activeRounds: source.activeRounds(),
        pendingWrites: source.pendingWrites()
      }
    });
  });

  /**
   * Readiness: the word list has been loaded
   * GET /health/ready
   */
  healthRoutes.get('/ready', (req: Request, res: Response) => {
    if (!source.isReady()) {
      res.status(503).json({
        status: 'not_ready',
        reason: 'vocabulary not loaded',
        timestamp: new Date().toISOString()
      });
      return;
    }
    res.json({
      status: 'ready',
      timestamp: new Date().toISOString()
    });
  });

  /**
   * Liveness probe
   * GET /health/live
   */
  healthRoutes.get('/live', (req: Request, res: Response) => {
    res.json({
      status: 'alive',
      timestamp: new Date().toISOString()
    });
  });

  return healthRoutes;
}
