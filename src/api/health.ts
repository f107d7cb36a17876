import { Router, Request, Response } from 'express';
import logger from '@/utils/logger';
import { getErrorMessage } from '@/utils/error-handler';
import { MetricsStore } from '@/loaders/metrics-store';

interface HealthStatus {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  version: string;
  environment: string;
  services: {
    database: 'up' | 'down' | 'disabled';
    memory: {
      used: number;
      total: number;
      percentage: number;
    };
    uptime: number;
  };
}

export interface HealthRouterOptions {
  store: MetricsStore | null;
  environment: string;
  version?: string;
}

async function checkDatabase(store: MetricsStore | null): Promise<'up' | 'down' | 'disabled'> {
  if (!store) {
    return 'disabled';
  }
  try {
    await store.getCheckpoint('campaign');
    return 'up';
  } catch (error) {
    logger.warn('Database health check failed', { error: getErrorMessage(error) });
    return 'down';
  }
}

export function createHealthRouter(options: HealthRouterOptions): Router {
  const router = Router();
  const version = options.version ?? process.env.npm_package_version ?? '1.0.0';

  router.get('/', async (req: Request, res: Response) => {
    const startTime = Date.now();
    const database = await checkDatabase(options.store);

    // Memory usage
    const memUsage = process.memoryUsage();

    const healthStatus: HealthStatus = {
      status: database === 'down' ? 'unhealthy' : 'healthy',
      timestamp: new Date().toISOString(),
      version,
      environment: options.environment,
      services: {
        database,
        memory: {
          used: Math.round(memUsage.heapUsed / 1024 / 1024), // MB
          total: Math.round(memUsage.heapTotal / 1024 / 1024), // MB
          percentage: Math.round((memUsage.heapUsed / memUsage.heapTotal) * 100)
        },
        uptime: Math.round(process.uptime())
      }
    };

    logger.info('Health check completed', {
      status: healthStatus.status,
      responseTime: Date.now() - startTime,
      databaseStatus: database
    });

    res.status(healthStatus.status === 'healthy' ? 200 : 503).json(healthStatus);
  });

  // Liveness (simpler check)
  router.get('/live', (req: Request, res: Response) => {
    res.status(200).json({
      status: 'alive',
      timestamp: new Date().toISOString()
    });
  });

  // Readiness
  router.get('/ready', async (req: Request, res: Response) => {
    const database = await checkDatabase(options.store);

    if (database === 'down') {
      res.status(503).json({
        status: 'not_ready',
        reason: 'database_unavailable',
        timestamp: new Date().toISOString()
      });
      return;
    }

    res.status(200).json({
      status: 'ready',
      timestamp: new Date().toISOString()
    });
  });

  return router;
}

export default createHealthRouter;
