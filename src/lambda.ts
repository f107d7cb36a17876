// Must be first import to set up module aliases
import 'module-alias/register';

import { z } from 'zod';
import { getConfig } from '@/utils/config';
import logger from '@/utils/logger';
import { ValidationError, getErrorDetails } from '@/utils/error-handler';
import { ReportPipeline, createReportPipeline } from '@/pipeline/report-pipeline';
import { ENTITY_TYPES, RANK_METRICS, REPORT_TYPES } from '@/utils/types';

const eventSchema = z.object({
  reportType: z.enum(REPORT_TYPES).default('daily'),
  startDate: z.string().optional(),
  endDate: z.string().optional(),
  days: z.number().int().positive().optional(),
  limit: z.number().int().positive().optional(),
  entityType: z.enum(ENTITY_TYPES).optional(),
  rankBy: z.enum(RANK_METRICS).optional()
});

export type ReportEvent = z.input<typeof eventSchema>;

export interface HandlerResponse {
  statusCode: number;
  body: string;
}

// Reused across warm invocations of the same container
let pipeline: ReportPipeline | null = null;

function getPipeline(): ReportPipeline {
  if (!pipeline) {
    pipeline = createReportPipeline(getConfig());
  }
  return pipeline;
}

/**
 * Scheduled-event entry point. Failures are logged and rethrown so the
 * platform records the invocation as failed.
 */
export async function handler(event: unknown = {}): Promise<HandlerResponse> {
  const parsed = eventSchema.safeParse(event ?? {});

  try {
    if (!parsed.success) {
      throw new ValidationError(
        `Invalid event: ${parsed.error.issues.map(issue => `${issue.path.join('.') || 'event'} ${issue.message}`).join('; ')}`
      );
    }

    const { reportType, ...overrides } = parsed.data;
    const request = await getPipeline().buildRequest(reportType, overrides, getConfig());
    const result = await getPipeline().run(request);

    return {
      statusCode: 200,
      body: JSON.stringify({
        success: true,
        reportType,
        dateRange: result.report.dateRange,
        currency: result.account.currency,
        entityCount: result.report.entities.length,
        alertCount: result.alerts.length,
        messageCount: result.delivery.messages.length,
        delivery: result.delivery.legs.map(leg => ({ destination: leg.destination, status: leg.status }))
      })
    };
  } catch (error) {
    const details = getErrorDetails(error);
    logger.error('Report invocation failed', { errorName: details.name, error: details.message, stack: details.stack });
    throw error;
  }
}

export default handler;
