import MetricsFetcher from '@/extractors/meta/fetcher';
import MetaAdsClient from '@/extractors/meta/client';
import MetaEntitiesExtractor from '@/extractors/meta/entities';
import MetaAdsInsightsExtractor from '@/extractors/meta/insights';
import { FileResponseCache } from '@/cache/response-cache';
import { aggregate, comparePeriods } from '@/reports/aggregator';
import { evaluateAlerts } from '@/reports/alerts';
import { buildExports, formatReportText } from '@/reports/formatter';
import DeliverySink, { DeliveryReport } from '@/delivery/delivery-sink';
import TelegramClient from '@/delivery/telegram-client';
import { ExportSink, LocalExportSink, createSupabaseExportSink } from '@/delivery/export-sink';
import { MetricsStore } from '@/loaders/metrics-store';
import PostgresMetricsStore from '@/loaders/postgres-store';
import CheckpointManager from '@/loaders/checkpoint-manager';
import logger from '@/utils/logger';
import { AppConfig } from '@/utils/config';
import { DEFAULT_WINDOWS, DateWindowOptions, previousDateRange, resolveDateRange } from '@/utils/dates';
import { DeliveryFailed, EtlError, getErrorMessage } from '@/utils/error-handler';
import {
  Account,
  AggregateReport,
  AlertEvent,
  AlertThresholds,
  Checkpoint,
  EntityStatus,
  EntityType,
  ExportFormat,
  MetricRow,
  PeriodComparison,
  RankMetric,
  ReportRequest,
  ReportType
} from '@/utils/types';

export interface PipelineRequest extends ReportRequest {
  /** Defaults to the report type. */
  templateName?: string;
}

export interface PipelineResult {
  account: Account;
  report: AggregateReport;
  comparison: PeriodComparison | null;
  alerts: AlertEvent[];
  text: string;
  delivery: DeliveryReport;
  checkpoint: Checkpoint | null;
  stats: {
    rowCount: number;
    pageCount: number;
    malformedCount: number;
    duplicateCount: number;
    resumed: boolean;
  };
}

export interface ReportPipelineOptions {
  fetcher: MetricsFetcher;
  delivery: DeliverySink;
  store?: MetricsStore | null;
  thresholds: AlertThresholds;
  exportFormats: ExportFormat[];
  checkpointStaleMinutes?: number;
  now?: () => Date;
}

export class ReportPipeline {
  private fetcher: MetricsFetcher;
  private delivery: DeliverySink;
  private store: MetricsStore | null;
  private thresholds: AlertThresholds;
  private exportFormats: ExportFormat[];
  private checkpointStaleMinutes: number;
  private now: () => Date;
  private account: Account | null = null;

  constructor(options: ReportPipelineOptions) {
    this.fetcher = options.fetcher;
    this.delivery = options.delivery;
    this.store = options.store ?? null;
    this.thresholds = options.thresholds;
    this.exportFormats = options.exportFormats;
    this.checkpointStaleMinutes = options.checkpointStaleMinutes ?? 60;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * One report cycle: fetch, aggregate, compare, alert, format, deliver, persist.
   * Each fetched page is stored and checkpointed before the next is
   * requested. The checkpoint only reaches COMPLETE when every delivery leg
   * and every write succeeded.
   */
  async run(request: PipelineRequest): Promise<PipelineResult> {
    const { entityType, dateRange } = request;
    const context = { entityType, dateRange, reportType: request.reportType };
    const startTime = Date.now();

    logger.info('Starting report run', { ...context, rankBy: request.rankBy, limit: request.limit });

    const store = this.store;
    const checkpoints = store ? new CheckpointManager(store, this.checkpointStaleMinutes, this.now) : null;

    let resumeCursor: string | null = null;
    let previousStatuses = new Map<string, EntityStatus>();

    if (checkpoints) {
      // Refusal to start leaves the other run's checkpoint untouched
      try {
        resumeCursor = (await checkpoints.begin(entityType, dateRange)).resumeCursor;
      } catch (error) {
        if (error instanceof EtlError) throw error.withContext(context);
        throw error;
      }
    }

    try {
      const account = await this.getAccount();

      if (store) {
        previousStatuses = await store.getEntityStatuses(entityType);
      }

      const fetched = await this.fetcher.fetch(
        { entityType, dateRange },
        {
          startCursor: resumeCursor,
          onPage: async page => {
            if (store) {
              await store.upsertMetricRows(page.rows);
            }
            if (checkpoints) {
              await checkpoints.progress({
                rowCount: page.rows.length,
                rawCount: page.rawCount,
                lastProcessedId: page.rows.length > 0 ? page.rows[page.rows.length - 1].entityId : null,
                nextCursor: page.nextCursor
              });
            }
          }
        }
      );

      // Pages stored by the interrupted run are not in this run's stream
      const rows: MetricRow[] = resumeCursor && store
        ? await store.listMetricRows(entityType, dateRange)
        : fetched.rows;

      const report = aggregate(rows, { dateRange, rankBy: request.rankBy, entities: fetched.entities });
      const comparison = store ? await this.compareWithPrevious(store, request, report) : null;
      const alerts = evaluateAlerts(report, this.thresholds, { previousStatuses, entities: fetched.entities });
      const text = formatReportText(report, alerts, request.templateName ?? request.reportType, {
        limit: request.limit,
        entityType,
        currency: account.currency,
        comparison
      });
      const exports = buildExports(report, alerts, text, this.exportFormats, {
        reportType: request.reportType,
        entityType,
        generatedAt: this.now(),
        account,
        comparison
      });

      logger.info('Report built', {
        ...context,
        entityCount: report.entities.length,
        alertCount: alerts.length,
        exportCount: exports.length
      });

      const delivery = await this.delivery.deliver({ text, exports });

      if (store) {
        await store.upsertEntities(fetched.entities);
      }

      if (delivery.failedLegs.length > 0) {
        throw new DeliveryFailed(
          `Report delivery failed for ${delivery.failedLegs.join(', ')}`,
          delivery.failedLegs,
          { context: { legs: delivery.legs } }
        );
      }

      const checkpoint = checkpoints ? await checkpoints.complete() : null;

      logger.info('Report run completed', {
        ...context,
        rowCount: rows.length,
        alertCount: alerts.length,
        messageCount: delivery.messages.length,
        durationMs: Date.now() - startTime
      });

      return {
        account,
        report,
        comparison,
        alerts,
        text,
        delivery,
        checkpoint,
        stats: {
          rowCount: rows.length,
          pageCount: fetched.pageCount,
          malformedCount: fetched.malformedCount,
          duplicateCount: fetched.duplicateCount,
          resumed: resumeCursor !== null
        }
      };

    } catch (error) {
      logger.error('Report run failed', { ...context, error: getErrorMessage(error), durationMs: Date.now() - startTime });

      if (checkpoints) {
        try {
          await checkpoints.fail(error);
        } catch (checkpointError) {
          // Keep the original failure
          logger.error('Could not mark checkpoint as failed', { ...context, error: getErrorMessage(checkpointError) });
        }
      }

      if (error instanceof EtlError) {
        throw error.withContext(context);
      }
      throw error;
    }
  }

  /** Fetched once per pipeline instance. */
  async getAccount(): Promise<Account> {
    if (!this.account) {
      this.account = await this.fetcher.fetchAccount();
    }
    return this.account;
  }

  /** Resolves the report window in the ad account's time zone. */
  async buildRequest(reportType: ReportType, overrides: RequestOverrides, config: AppConfig): Promise<PipelineRequest> {
    const account = await this.getAccount();
    return buildReportRequest(reportType, overrides, config, this.now(), account.timezone);
  }

  /** Totals of the preceding window from the store; null when nothing is stored for it. */
  private async compareWithPrevious(
    store: MetricsStore,
    request: PipelineRequest,
    report: AggregateReport
  ): Promise<PeriodComparison | null> {
    const previousRange = previousDateRange(request.dateRange);
    const previousRows = await store.listMetricRows(request.entityType, previousRange);

    if (previousRows.length === 0) {
      return null;
    }
    return comparePeriods(report, aggregate(previousRows, { dateRange: previousRange, rankBy: request.rankBy }));
  }

  get metricsStore(): MetricsStore | null {
    return this.store;
  }

  async close(): Promise<void> {
    if (this.store) {
      await this.store.close();
    }
  }
}

export interface RequestOverrides extends DateWindowOptions {
  limit?: number | null;
  entityType?: EntityType | null;
  rankBy?: RankMetric | null;
}

/**
 * Resolves the report window and options: explicit overrides first, then the
 * configured defaults, then the report type's default window.
 */
export function buildReportRequest(
  reportType: ReportType,
  overrides: RequestOverrides,
  config: AppConfig,
  now: Date = new Date(),
  timeZone?: string | null
): PipelineRequest {
  const hasWindow = Boolean(overrides.startDate || overrides.endDate)
    || (overrides.days !== undefined && overrides.days !== null);
  const window: DateWindowOptions = hasWindow
    ? overrides
    : { startDate: config.report.startDate, endDate: config.report.endDate, days: config.report.days };

  return {
    reportType,
    dateRange: resolveDateRange(window, DEFAULT_WINDOWS[reportType], now, timeZone),
    entityType: overrides.entityType ?? config.report.entityType,
    rankBy: overrides.rankBy ?? config.report.rankBy,
    limit: overrides.limit ?? config.report.topLimit
  };
}

function createExportSink(config: AppConfig): ExportSink | null {
  if (config.exports.formats.length === 0) {
    return null;
  }
  if (config.exports.storage) {
    return createSupabaseExportSink(config.exports.storage);
  }
  return new LocalExportSink(config.exports.reportsDir);
}

export function createReportPipeline(config: AppConfig): ReportPipeline {
  const client = new MetaAdsClient({
    accessToken: config.meta.accessToken,
    adAccountId: config.meta.adAccountId,
    appSecret: config.meta.appSecret,
    apiVersion: config.meta.apiVersion,
    timeoutMs: config.meta.requestTimeoutMs,
    maxRetries: config.meta.maxRetries,
    retryDelayMs: config.meta.retryDelayMs,
    cache: config.cache.enabled ? new FileResponseCache(config.cache.directory, config.cache.ttlSeconds) : null
  });

  const fetcher = new MetricsFetcher(
    new MetaEntitiesExtractor(client, config.meta.pageSize),
    new MetaAdsInsightsExtractor(client, config.report.conversionActionTypes, config.meta.pageSize),
    config.report.malformedTolerance
  );

  const delivery = new DeliverySink({
    telegram: config.telegram
      ? {
          client: new TelegramClient({ botToken: config.telegram.botToken }),
          chatId: config.telegram.chatId,
          messageLimit: config.telegram.messageLimit
        }
      : null,
    exportSink: createExportSink(config),
    maxRetries: config.telegram?.maxRetries,
    retryDelayMs: config.telegram?.retryDelayMs
  });

  return new ReportPipeline({
    fetcher,
    delivery,
    store: config.database ? PostgresMetricsStore.fromConfig(config.database) : null,
    thresholds: config.thresholds,
    exportFormats: config.exports.formats,
    checkpointStaleMinutes: config.checkpointStaleMinutes
  });
}

export default ReportPipeline;
