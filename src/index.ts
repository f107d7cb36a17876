// Must be first import to set up module aliases
import 'module-alias/register';

import { AppConfig, getConfig } from '@/utils/config';
import logger from '@/utils/logger';
import { ConfigError, getErrorMessage } from '@/utils/error-handler';
import {
  PipelineRequest,
  RequestOverrides,
  createReportPipeline
} from '@/pipeline/report-pipeline';
import ReportScheduler from '@/scheduler/report-scheduler';
import { ReportType } from '@/utils/types';
import createApp from '@/app';

function startServer(config: AppConfig): void {
  const apiKey = config.etlApiKey;
  if (!apiKey) {
    throw new ConfigError(['ETL_API_KEY: is required to run the HTTP service']);
  }

  const pipeline = createReportPipeline(config);
  // Shared with the routes; the pipeline closes it
  const store = pipeline.metricsStore;

  const runReport = (request: PipelineRequest) => pipeline.run(request);
  const buildRequest = (reportType: ReportType, overrides: RequestOverrides) =>
    pipeline.buildRequest(reportType, overrides, config);

  const app = createApp({
    apiKey,
    environment: config.nodeEnv,
    store,
    buildRequest,
    runReport,
    allowedOrigins: config.allowedOrigins
  });

  const scheduler = config.schedule.enabled
    ? new ReportScheduler(async reportType => {
        await runReport(await buildRequest(reportType, {}));
      }, config.schedule)
    : null;

  const server = app.listen(config.port, () => {
    logger.info('Ads report ETL service started', {
      port: config.port,
      environment: config.nodeEnv,
      version: process.env.npm_package_version || '1.0.0'
    });

    if (scheduler) {
      try {
        scheduler.start();
      } catch (error) {
        logger.error('Failed to start report scheduler', { error: getErrorMessage(error) });
      }
    }
  });

  // Handle server errors
  server.on('error', (error: NodeJS.ErrnoException) => {
    if (error.syscall !== 'listen') {
      throw error;
    }

    switch (error.code) {
      case 'EACCES':
        logger.error(`Port ${config.port} requires elevated privileges`);
        process.exit(1);
        break;
      case 'EADDRINUSE':
        logger.error(`Port ${config.port} is already in use`);
        process.exit(1);
        break;
      default:
        throw error;
    }
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down gracefully`);
    scheduler?.stop();
    server.close(() => {
      pipeline.close()
        .catch(error => logger.error('Failed to close the database pool', { error: getErrorMessage(error) }))
        .finally(() => process.exit(0));
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

if (require.main === module) {
  try {
    startServer(getConfig());
  } catch (error) {
    logger.error('Service failed to start', { error: getErrorMessage(error) });
    process.exit(1);
  }
}
