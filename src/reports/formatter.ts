import { stringify } from 'csv-stringify/sync';
import {
  ALERT_TEMPLATES,
  REPORT_TEMPLATES,
  ReportTemplate,
  TemplateValues,
  renderTemplate
} from './templates';
import { ValidationError } from '@/utils/error-handler';
import { daysInRange, formatDateRange } from '@/utils/dates';
import {
  Account,
  AggregateReport,
  AlertEvent,
  DailyTotals,
  EntitySummary,
  EntityType,
  ExportFormat,
  PeriodComparison,
  ReportType
} from '@/utils/types';

export interface FormatOptions {
  /** Number of ranked entities listed in the text. */
  limit: number;
  entityType: EntityType;
  /** ISO code of the ad account currency, printed beside spend. */
  currency: string;
  comparison?: PeriodComparison | null;
}

const ENTITY_LABELS: Record<EntityType, string> = {
  campaign: 'campaigns',
  adset: 'ad sets',
  ad: 'ads'
};

const RANK_LABELS: Record<AggregateReport['rankedBy'], string> = {
  spend: 'spend',
  impressions: 'impressions',
  clicks: 'clicks',
  conversions: 'conversions',
  ctr: 'CTR',
  cpc: 'CPC',
  costPerConversion: 'cost per conversion'
};

export function getTemplate(name: string): ReportTemplate {
  if (!Object.prototype.hasOwnProperty.call(REPORT_TEMPLATES, name)) {
    throw new ValidationError(`Unknown report template "${name}"`, {
      available: Object.keys(REPORT_TEMPLATES)
    });
  }
  return REPORT_TEMPLATES[name];
}

const toMajor = (cents: number): number => cents / 100;

function totalsValues(report: AggregateReport): TemplateValues {
  return {
    period: formatDateRange(report.dateRange),
    day_count: daysInRange(report.dateRange),
    spend: toMajor(report.totalSpendCents),
    impressions: report.totalImpressions,
    clicks: report.totalClicks,
    conversions: report.totalConversions,
    ctr: report.totals.ctr,
    cpc: report.totals.cpc,
    cost_per_conversion: report.totals.costPerConversion
  };
}

function entityValues(summary: EntitySummary, rank: number): TemplateValues {
  return {
    rank,
    name: summary.name,
    status: summary.status,
    spend: toMajor(summary.spendCents),
    impressions: summary.impressions,
    clicks: summary.clicks,
    conversions: summary.conversions,
    ctr: summary.ctr,
    cpc: summary.cpc,
    cost_per_conversion: summary.costPerConversion
  };
}

function dailyValues(day: DailyTotals): TemplateValues {
  return {
    date: day.date,
    spend: toMajor(day.spendCents),
    impressions: day.impressions,
    clicks: day.clicks,
    conversions: day.conversions
  };
}

function comparisonValues(comparison: PeriodComparison): TemplateValues {
  return {
    previous_period: formatDateRange(comparison.previousRange),
    previous_spend: comparison.previous.spend,
    previous_impressions: comparison.previous.impressions,
    previous_clicks: comparison.previous.clicks,
    previous_ctr: comparison.previous.ctr,
    previous_conversions: comparison.previous.conversions,
    spend_change: comparison.changes.spend,
    impressions_change: comparison.changes.impressions,
    clicks_change: comparison.changes.clicks,
    ctr_change: comparison.changes.ctr,
    conversions_change: comparison.changes.conversions
  };
}

export function alertValues(alert: AlertEvent): TemplateValues {
  const values: TemplateValues = { name: alert.entity.name, deviation: alert.percentDeviation };

  switch (alert.kind) {
    case 'HIGH_CPC':
      return { ...values, cpc: alert.observed, threshold_cpc: alert.threshold };
    case 'LOW_CTR':
      return { ...values, ctr: alert.observed, threshold_ctr: alert.threshold };
    case 'BUDGET_DEPLETED':
      return { ...values, budget_used: alert.observed, threshold_budget: alert.threshold };
    case 'CAMPAIGN_STOPPED':
      return { ...values, previous_status: alert.previousStatus, current_status: alert.currentStatus };
  }
}

export function formatAlertLine(alert: AlertEvent): string {
  return renderTemplate(ALERT_TEMPLATES[alert.kind], alertValues(alert));
}

/**
 * Full report text. Sections are paragraphs separated by a blank line so the
 * message splitter can cut between them.
 */
export function formatReportText(
  report: AggregateReport,
  alerts: AlertEvent[],
  templateName: string,
  options: FormatOptions
): string {
  const template = getTemplate(templateName);
  const shared: TemplateValues = {
    entity_label: ENTITY_LABELS[options.entityType],
    rank_by: RANK_LABELS[report.rankedBy],
    alert_count: alerts.length,
    currency: options.currency
  };

  const paragraphs: string[] = [renderTemplate(template.header, { ...shared, ...totalsValues(report) })];

  if (template.comparison && options.comparison) {
    paragraphs.push(renderTemplate(template.comparison, { ...shared, ...comparisonValues(options.comparison) }));
  }

  const top = report.entities.slice(0, options.limit);
  if (top.length === 0) {
    paragraphs.push(renderTemplate(template.emptyEntities, shared));
  } else {
    paragraphs.push([
      renderTemplate(template.entitiesTitle, { ...shared, limit: top.length }),
      ...top.map((summary, index) => renderTemplate(template.entityLine, entityValues(summary, index + 1)))
    ].join('\n'));
  }

  if (template.dailyTitle && template.dailyLine && report.daily.length > 1) {
    const dailyLine = template.dailyLine;
    paragraphs.push([
      renderTemplate(template.dailyTitle, shared),
      ...report.daily.map(day => renderTemplate(dailyLine, dailyValues(day)))
    ].join('\n'));
  }

  if (alerts.length === 0) {
    paragraphs.push(renderTemplate(template.noAlerts, shared));
  } else {
    paragraphs.push([
      renderTemplate(template.alertsTitle, shared),
      ...alerts.map(formatAlertLine)
    ].join('\n'));
  }

  return paragraphs.join('\n\n');
}

const round2 = (value: number): number => Math.round(value * 100) / 100;

export interface ReportExportMeta {
  reportType: ReportType;
  entityType: EntityType;
  generatedAt: Date;
  account: Account;
  comparison?: PeriodComparison | null;
}

export function buildJsonExport(report: AggregateReport, alerts: AlertEvent[], meta: ReportExportMeta) {
  return {
    reportType: meta.reportType,
    entityType: meta.entityType,
    generatedAt: meta.generatedAt.toISOString(),
    account: {
      id: meta.account.id,
      name: meta.account.name,
      currency: meta.account.currency,
      timezone: meta.account.timezone ?? null
    },
    dateRange: report.dateRange,
    totals: {
      impressions: report.totalImpressions,
      clicks: report.totalClicks,
      spend: toMajor(report.totalSpendCents),
      conversions: report.totalConversions,
      ctr: round2(report.totals.ctr),
      cpc: round2(report.totals.cpc),
      costPerConversion: round2(report.totals.costPerConversion)
    },
    rankedBy: report.rankedBy,
    entities: report.entities.map((summary, index) => ({
      rank: index + 1,
      id: summary.entityId,
      type: summary.entityType,
      name: summary.name,
      status: summary.status,
      impressions: summary.impressions,
      clicks: summary.clicks,
      spend: toMajor(summary.spendCents),
      conversions: summary.conversions,
      ctr: round2(summary.ctr),
      cpc: round2(summary.cpc),
      costPerConversion: round2(summary.costPerConversion)
    })),
    daily: report.daily.map(day => ({
      date: day.date,
      impressions: day.impressions,
      clicks: day.clicks,
      spend: toMajor(day.spendCents),
      conversions: day.conversions
    })),
    comparison: meta.comparison
      ? {
          previousRange: meta.comparison.previousRange,
          previous: { ...meta.comparison.previous, ctr: round2(meta.comparison.previous.ctr) },
          changes: meta.comparison.changes
        }
      : null,
    alerts
  };
}

export type JsonExport = ReturnType<typeof buildJsonExport>;

export const CSV_COLUMNS = [
  'rank',
  'entity_id',
  'entity_type',
  'name',
  'status',
  'impressions',
  'clicks',
  'spend',
  'conversions',
  'ctr',
  'cpc',
  'cost_per_conversion'
] as const;

/** One row per ranked entity, header first. */
export function buildCsvExport(report: AggregateReport): string {
  const records = report.entities.map((summary, index) => [
    index + 1,
    summary.entityId,
    summary.entityType,
    summary.name,
    summary.status,
    summary.impressions,
    summary.clicks,
    toMajor(summary.spendCents).toFixed(2),
    summary.conversions,
    summary.ctr.toFixed(2),
    summary.cpc.toFixed(2),
    summary.costPerConversion.toFixed(2)
  ]);

  return stringify(records, { header: true, columns: [...CSV_COLUMNS] });
}

const EXTENSIONS: Record<ExportFormat, string> = {
  csv: 'csv',
  json: 'json',
  txt: 'txt'
};

/** `<type>/<YYYY-MM-DD>/<entity>_report.<ext>`, relative to the export root. */
export function exportFileName(reportType: ReportType, date: string, format: ExportFormat, entityType: EntityType = 'campaign'): string {
  return `${reportType}/${date}/${entityType}_report.${EXTENSIONS[format]}`;
}

export interface ExportFile {
  path: string;
  format: ExportFormat;
  contentType: string;
  content: string;
}

const CONTENT_TYPES: Record<ExportFormat, string> = {
  csv: 'text/csv',
  json: 'application/json',
  txt: 'text/plain'
};

export function buildExports(
  report: AggregateReport,
  alerts: AlertEvent[],
  text: string,
  formats: ExportFormat[],
  meta: ReportExportMeta
): ExportFile[] {
  // Files are dated by the last day they cover
  const date = report.dateRange.end;

  const render = (format: ExportFormat): string => {
    switch (format) {
      case 'csv':
        return buildCsvExport(report);
      case 'json':
        return JSON.stringify(buildJsonExport(report, alerts, meta), null, 2);
      case 'txt':
        return text;
    }
  };

  return formats.map(format => ({
    path: exportFileName(meta.reportType, date, format, meta.entityType),
    format,
    contentType: CONTENT_TYPES[format],
    content: render(format)
  }));
}
