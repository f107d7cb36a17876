import MetaEntitiesExtractor from './entities';
import MetaAdsInsightsExtractor, { InsightsRequest, MetricPage } from './insights';
import logger from '@/utils/logger';
import { EtlError, MalformedDataError, getErrorMessage } from '@/utils/error-handler';
import { Account, Entity, MetricRow } from '@/utils/types';

export interface FetchOptions {
  startCursor?: string | null;
  /** Awaited before the next page is requested. */
  onPage?: (page: MetricPage) => Promise<void>;
}

export interface FetchResult {
  entities: Entity[];
  rows: MetricRow[];
  pageCount: number;
  rawCount: number;
  malformedCount: number;
  duplicateCount: number;
}

export class MetricsFetcher {
  constructor(
    private entitiesExtractor: MetaEntitiesExtractor,
    private insightsExtractor: MetaAdsInsightsExtractor,
    private malformedTolerance: number = 0.1
  ) {}

  async fetchAccount(): Promise<Account> {
    return this.entitiesExtractor.extractAccount();
  }

  async fetch(request: InsightsRequest, options: FetchOptions = {}): Promise<FetchResult> {
    const context = { entityType: request.entityType, dateRange: request.dateRange };

    try {
      const entities = await this.entitiesExtractor.extractEntities(request.entityType);
      const rows: MetricRow[] = [];
      let pageCount = 0;
      let rawCount = 0;
      let malformedCount = 0;
      let duplicateCount = 0;

      for await (const page of this.insightsExtractor.streamMetricRows(request, options.startCursor ?? null)) {
        pageCount++;
        rawCount += page.rawCount;
        malformedCount += page.malformedCount;
        duplicateCount += page.duplicateCount;
        rows.push(...page.rows);

        // Checked before the page is handed on, so no page past the tolerance is stored
        if (rawCount > 0 && malformedCount / rawCount > this.malformedTolerance) {
          throw new MalformedDataError(malformedCount, rawCount, this.malformedTolerance, { ...context, pageCount });
        }

        if (options.onPage) {
          await options.onPage(page);
        }
      }

      logger.info('Metrics fetch completed', {
        ...context,
        entityCount: entities.length,
        rowCount: rows.length,
        pageCount,
        malformedCount,
        duplicateCount
      });

      return { entities, rows, pageCount, rawCount, malformedCount, duplicateCount };

    } catch (error) {
      logger.error('Metrics fetch failed', { ...context, error: getErrorMessage(error) });
      if (error instanceof EtlError) {
        throw error.withContext(context);
      }
      throw error;
    }
  }
}

export default MetricsFetcher;
