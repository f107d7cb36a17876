import MetaAdsClient, { GraphRecord } from './client';
import { Parsed, parseConversions, parseCount, parseMoneyToCents, readString } from './fields';
import logger from '@/utils/logger';
import { DateRange, EntityType, MetricRow } from '@/utils/types';

export interface InsightsRequest {
  entityType: EntityType;
  dateRange: DateRange;
}

export interface MetricPage {
  rows: MetricRow[];
  /** Cursor that fetched this page; null for the first page. */
  cursor: string | null;
  nextCursor: string | null;
  rawCount: number;
  malformedCount: number;
  duplicateCount: number;
}

export type InsightTransform = { ok: true; row: MetricRow } | { ok: false; reason: string };

function collectFailure(...results: Parsed<number>[]): string | null {
  for (const result of results) {
    if (!result.ok) return result.reason;
  }
  return null;
}

export function transformInsight(
  insight: GraphRecord,
  entityType: EntityType,
  conversionActionTypes: ReadonlySet<string>
): InsightTransform {
  const entityId = readString(insight, `${entityType}_id`);
  const date = readString(insight, 'date_start');

  if (!entityId) {
    return { ok: false, reason: `missing ${entityType}_id` };
  }
  if (!date || !/^\d{4}-\d{2}-\d{2}$/.test(date)) {
    return { ok: false, reason: 'missing or invalid date_start' };
  }

  const impressions = parseCount(insight, 'impressions');
  const clicks = parseCount(insight, 'clicks');
  const spendCents = parseMoneyToCents(insight, 'spend');
  const conversions = parseConversions(insight, conversionActionTypes);

  if (!impressions.ok || !clicks.ok || !spendCents.ok || !conversions.ok) {
    return { ok: false, reason: collectFailure(impressions, clicks, spendCents, conversions) ?? 'invalid metric' };
  }

  return {
    ok: true,
    row: {
      entityId,
      entityType,
      entityName: readString(insight, `${entityType}_name`) ?? entityId,
      date,
      impressions: impressions.value,
      clicks: clicks.value,
      spendCents: spendCents.value,
      conversions: conversions.value
    }
  };
}

export class MetaAdsInsightsExtractor {
  private conversionActionTypes: ReadonlySet<string>;

  constructor(
    private client: MetaAdsClient,
    conversionActionTypes: string[],
    private pageSize: number = 100
  ) {
    this.conversionActionTypes = new Set(conversionActionTypes);
  }

  /**
   * Daily insight rows at the requested level, one page at a time. Records
   * that cannot be normalised are skipped and counted, never thrown.
   */
  async *streamMetricRows(request: InsightsRequest, startCursor: string | null = null): AsyncGenerator<MetricPage> {
    const { entityType, dateRange } = request;
    const seen = new Set<string>();

    logger.info(`Starting Meta ${entityType} insights extraction`, {
      dateRange: `${dateRange.start} to ${dateRange.end}`,
      resumeFrom: startCursor
    });

    const params = {
      level: entityType,
      fields: [
        `${entityType}_id`,
        `${entityType}_name`,
        'date_start',
        'impressions',
        'clicks',
        'spend',
        'actions',
        'conversions'
      ].join(','),
      time_range: JSON.stringify({ since: dateRange.start, until: dateRange.end }),
      time_increment: 1,
      limit: this.pageSize
    };

    for await (const page of this.client.paginate(`/${this.client.adAccountId}/insights`, params, startCursor)) {
      const rows: MetricRow[] = [];
      let malformedCount = 0;
      let duplicateCount = 0;

      for (const insight of page.data) {
        const result = transformInsight(insight, entityType, this.conversionActionTypes);

        if (!result.ok) {
          malformedCount++;
          logger.warn(`Skipping malformed Meta ${entityType} insight`, {
            reason: result.reason,
            entityId: insight[`${entityType}_id`],
            date: insight.date_start
          });
          continue;
        }

        const uniqueKey = `${result.row.entityId}:${result.row.date}`;
        if (seen.has(uniqueKey)) {
          duplicateCount++;
          logger.warn(`Skipping duplicate Meta ${entityType} insight`, { uniqueKey });
          continue;
        }

        seen.add(uniqueKey);
        rows.push(result.row);
      }

      logger.debug(`Meta ${entityType} insights page normalised`, {
        rawCount: page.data.length,
        rowCount: rows.length,
        malformedCount,
        duplicateCount
      });

      yield {
        rows,
        cursor: page.cursor,
        nextCursor: page.nextCursor,
        rawCount: page.data.length,
        malformedCount,
        duplicateCount
      };
    }
  }
}

export default MetaAdsInsightsExtractor;
