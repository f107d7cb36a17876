import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import logger from '@/utils/logger';
import { MetricsStore } from '@/loaders/metrics-store';
import { PipelineRequest, PipelineResult, RequestOverrides } from '@/pipeline/report-pipeline';
import { ReportType } from '@/utils/types';

// Import routes
import createHealthRouter from '@/api/health';
import createReportsRouter from '@/api/reports';
import createCheckpointsRouter from '@/api/checkpoints';

// Import middleware
import { createAuthMiddleware } from '@/api/middleware/auth';
import { errorHandler } from '@/api/middleware/error-handler';

export interface AppOptions {
  apiKey: string;
  environment: string;
  store: MetricsStore | null;
  buildRequest: (reportType: ReportType, overrides: RequestOverrides) => PipelineRequest | Promise<PipelineRequest>;
  runReport: (request: PipelineRequest) => Promise<PipelineResult>;
  allowedOrigins?: string[];
}

export function createApp(options: AppOptions): Express {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors({
    origin: options.allowedOrigins ?? ['http://localhost:3000'],
    credentials: true
  }));

  // Performance middleware
  app.use(compression());

  // Body parsing middleware
  app.use(express.json({ limit: '1mb' }));

  // Logging middleware
  app.use((req, res, next) => {
    logger.info(`${req.method} ${req.path}`, {
      ip: req.ip,
      userAgent: req.get('User-Agent'),
      requestId: req.headers['x-request-id']
    });
    next();
  });

  // Routes
  const auth = createAuthMiddleware(options.apiKey);
  app.use('/health', createHealthRouter({ store: options.store, environment: options.environment }));
  app.use('/api', auth, createReportsRouter({ buildRequest: options.buildRequest, runReport: options.runReport }));
  app.use('/api', auth, createCheckpointsRouter(options.store));

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({
      error: 'Not Found',
      message: `Route ${req.method} ${req.originalUrl} not found`
    });
  });

  // Error handling middleware
  app.use(errorHandler);

  return app;
}

export default createApp;
