import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { asyncHandler } from '@/api/middleware/error-handler';
import { PipelineRequest, PipelineResult, RequestOverrides } from '@/pipeline/report-pipeline';
import logger from '@/utils/logger';
import { ValidationError } from '@/utils/error-handler';
import { ENTITY_TYPES, RANK_METRICS, REPORT_TYPES, ReportType } from '@/utils/types';

const reportBodySchema = z.object({
  startDate: z.string().optional(),
  endDate: z.string().optional(),
  days: z.number().int().positive().optional(),
  limit: z.number().int().positive().optional(),
  entityType: z.enum(ENTITY_TYPES).optional(),
  rankBy: z.enum(RANK_METRICS).optional()
}).strict();

export interface ReportsRouterOptions {
  buildRequest: (reportType: ReportType, overrides: RequestOverrides) => PipelineRequest | Promise<PipelineRequest>;
  runReport: (request: PipelineRequest) => Promise<PipelineResult>;
}

function parseReportType(value: string): ReportType {
  const match = REPORT_TYPES.find(type => type === value);
  if (!match) {
    throw new ValidationError(`Invalid report type "${value}". Must be one of: ${REPORT_TYPES.join(', ')}`);
  }
  return match;
}

export function createReportsRouter(options: ReportsRouterOptions): Router {
  const router = Router();

  // Run one report cycle synchronously and return its summary
  router.post('/reports/:type', asyncHandler(async (req: Request, res: Response) => {
    const reportType = parseReportType(req.params.type);

    const parsed = reportBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      throw new ValidationError(
        `Invalid report request: ${parsed.error.issues.map(issue => `${issue.path.join('.') || 'body'} ${issue.message}`).join('; ')}`
      );
    }

    const request = await options.buildRequest(reportType, parsed.data);

    logger.info('Report request received', {
      reportType,
      dateRange: request.dateRange,
      entityType: request.entityType,
      requestId: req.headers['x-request-id']
    });

    const result = await options.runReport(request);

    res.json({
      success: true,
      reportType,
      dateRange: result.report.dateRange,
      totals: {
        impressions: result.report.totalImpressions,
        clicks: result.report.totalClicks,
        spend: result.report.totalSpendCents / 100,
        currency: result.account.currency,
        conversions: result.report.totalConversions
      },
      comparison: result.comparison,
      entityCount: result.report.entities.length,
      alerts: result.alerts,
      delivery: result.delivery.legs,
      checkpoint: result.checkpoint,
      stats: result.stats
    });
  }));

  return router;
}

export default createReportsRouter;
