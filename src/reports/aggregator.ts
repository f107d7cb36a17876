import {
  AggregateReport,
  ComparedMetric,
  DailyTotals,
  DateRange,
  DerivedMetrics,
  Entity,
  EntitySummary,
  MetricRow,
  PeriodComparison,
  RankMetric
} from '@/utils/types';

export interface AggregateOptions {
  dateRange: DateRange;
  rankBy: RankMetric;
  /** Entity metadata (name, status, budgets); rows without a match keep their own name. */
  entities?: Entity[];
}

/** Percentage of impressions that were clicked; 0 without impressions. */
export function computeCtr(clicks: number, impressions: number): number {
  return impressions > 0 ? (clicks / impressions) * 100 : 0;
}

/** Cost per click in major currency units; 0 without clicks. */
export function computeCpc(spendCents: number, clicks: number): number {
  return clicks > 0 ? spendCents / clicks / 100 : 0;
}

/** Cost per conversion in major currency units; 0 without conversions. */
export function computeCostPerConversion(spendCents: number, conversions: number): number {
  return conversions > 0 ? spendCents / conversions / 100 : 0;
}

function deriveMetrics(impressions: number, clicks: number, spendCents: number, conversions: number): DerivedMetrics {
  return {
    ctr: computeCtr(clicks, impressions),
    cpc: computeCpc(spendCents, clicks),
    costPerConversion: computeCostPerConversion(spendCents, conversions)
  };
}

function metricValue(summary: EntitySummary, metric: RankMetric): number {
  switch (metric) {
    case 'spend':
      return summary.spendCents;
    case 'impressions':
      return summary.impressions;
    case 'clicks':
      return summary.clicks;
    case 'conversions':
      return summary.conversions;
    case 'ctr':
      return summary.ctr;
    case 'cpc':
      return summary.cpc;
    case 'costPerConversion':
      return summary.costPerConversion;
  }
}

/**
 * Descending by metric, ties by entity id ascending, so identical input
 * always produces identical order.
 */
export function rankEntities(summaries: EntitySummary[], metric: RankMetric): EntitySummary[] {
  return [...summaries].sort((a, b) => {
    const diff = metricValue(b, metric) - metricValue(a, metric);
    if (diff !== 0) return diff;
    if (a.entityId === b.entityId) return 0;
    return a.entityId < b.entityId ? -1 : 1;
  });
}

export function aggregate(rows: MetricRow[], options: AggregateOptions): AggregateReport {
  const metadata = new Map((options.entities ?? []).map(entity => [entity.id, entity]));
  const perEntity = new Map<string, EntitySummary>();
  const perDate = new Map<string, DailyTotals>();

  let totalImpressions = 0;
  let totalClicks = 0;
  let totalSpendCents = 0;
  let totalConversions = 0;

  for (const row of rows) {
    totalImpressions += row.impressions;
    totalClicks += row.clicks;
    totalSpendCents += row.spendCents;
    totalConversions += row.conversions;

    let summary = perEntity.get(row.entityId);
    if (!summary) {
      const entity = metadata.get(row.entityId);
      summary = {
        entityId: row.entityId,
        entityType: row.entityType,
        name: entity?.name ?? row.entityName,
        status: entity?.status ?? 'UNKNOWN',
        impressions: 0,
        clicks: 0,
        spendCents: 0,
        conversions: 0,
        ctr: 0,
        cpc: 0,
        costPerConversion: 0,
        dailyBudgetCents: entity?.dailyBudgetCents ?? null,
        lifetimeBudgetCents: entity?.lifetimeBudgetCents ?? null
      };
      perEntity.set(row.entityId, summary);
    }
    summary.impressions += row.impressions;
    summary.clicks += row.clicks;
    summary.spendCents += row.spendCents;
    summary.conversions += row.conversions;

    let day = perDate.get(row.date);
    if (!day) {
      day = { date: row.date, impressions: 0, clicks: 0, spendCents: 0, conversions: 0 };
      perDate.set(row.date, day);
    }
    day.impressions += row.impressions;
    day.clicks += row.clicks;
    day.spendCents += row.spendCents;
    day.conversions += row.conversions;
  }

  const summaries = [...perEntity.values()].map(summary => ({
    ...summary,
    ...deriveMetrics(summary.impressions, summary.clicks, summary.spendCents, summary.conversions)
  }));

  return {
    dateRange: options.dateRange,
    totalImpressions,
    totalClicks,
    totalSpendCents,
    totalConversions,
    totals: deriveMetrics(totalImpressions, totalClicks, totalSpendCents, totalConversions),
    rankedBy: options.rankBy,
    entities: rankEntities(summaries, options.rankBy),
    daily: [...perDate.values()].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0))
  };
}

/** Percent change rounded to 2 decimals; null without a previous value to compare against. */
export function percentChange(current: number, previous: number): number | null {
  if (previous === 0) {
    return null;
  }
  return Math.round(((current - previous) / previous) * 10000) / 100;
}

function comparedValues(report: AggregateReport): Record<ComparedMetric, number> {
  return {
    spend: report.totalSpendCents / 100,
    impressions: report.totalImpressions,
    clicks: report.totalClicks,
    ctr: report.totals.ctr,
    conversions: report.totalConversions
  };
}

export function comparePeriods(current: AggregateReport, previous: AggregateReport): PeriodComparison {
  const now = comparedValues(current);
  const before = comparedValues(previous);

  return {
    previousRange: previous.dateRange,
    previous: before,
    changes: {
      spend: percentChange(current.totalSpendCents, previous.totalSpendCents),
      impressions: percentChange(now.impressions, before.impressions),
      clicks: percentChange(now.clicks, before.clicks),
      ctr: percentChange(now.ctr, before.ctr),
      conversions: percentChange(now.conversions, before.conversions)
    }
  };
}
