// Common types for the reporting pipeline

export const ENTITY_TYPES = ['campaign', 'adset', 'ad'] as const;

export type EntityType = typeof ENTITY_TYPES[number];

export type EntityStatus = 'ACTIVE' | 'PAUSED' | 'DELETED' | 'ARCHIVED' | 'UNKNOWN';

export const STOPPED_STATUSES: ReadonlySet<EntityStatus> = new Set<EntityStatus>(['PAUSED', 'DELETED', 'ARCHIVED']);

export interface DateRange {
  start: string; // YYYY-MM-DD, inclusive
  end: string; // YYYY-MM-DD, inclusive
}

export interface Account {
  id: string;
  name: string;
  currency: string;
  timezone?: string;
}

export interface Entity {
  id: string;
  entityType: EntityType;
  name: string;
  status: EntityStatus;
  dailyBudgetCents: number | null;
  lifetimeBudgetCents: number | null;
  createdTime: string | null;
  updatedTime: string | null;
}

export interface MetricRow {
  entityId: string;
  entityType: EntityType;
  entityName: string;
  date: string;
  impressions: number;
  clicks: number;
  spendCents: number;
  conversions: number;
}

export const RANK_METRICS = [
  'spend',
  'impressions',
  'clicks',
  'conversions',
  'ctr',
  'cpc',
  'costPerConversion'
] as const;

export type RankMetric = typeof RANK_METRICS[number];

export interface DerivedMetrics {
  ctr: number;
  cpc: number;
  costPerConversion: number;
}

export interface EntitySummary extends DerivedMetrics {
  entityId: string;
  entityType: EntityType;
  name: string;
  status: EntityStatus;
  impressions: number;
  clicks: number;
  spendCents: number;
  conversions: number;
  dailyBudgetCents: number | null;
  lifetimeBudgetCents: number | null;
}

export interface DailyTotals {
  date: string;
  impressions: number;
  clicks: number;
  spendCents: number;
  conversions: number;
}

export interface AggregateReport {
  dateRange: DateRange;
  totalImpressions: number;
  totalClicks: number;
  totalSpendCents: number;
  totalConversions: number;
  totals: DerivedMetrics;
  rankedBy: RankMetric;
  entities: EntitySummary[];
  daily: DailyTotals[];
}

export const COMPARED_METRICS = ['spend', 'impressions', 'clicks', 'ctr', 'conversions'] as const;

export type ComparedMetric = typeof COMPARED_METRICS[number];

/** Totals of the window of equal length that ends the day before the report starts. */
export interface PeriodComparison {
  previousRange: DateRange;
  previous: Record<ComparedMetric, number>;
  /** Percent change from the previous window; null when the previous value is 0. */
  changes: Record<ComparedMetric, number | null>;
}

export type AlertKind = 'HIGH_CPC' | 'LOW_CTR' | 'BUDGET_DEPLETED' | 'CAMPAIGN_STOPPED';

export const ALERT_EVALUATION_ORDER: readonly AlertKind[] = [
  'HIGH_CPC',
  'LOW_CTR',
  'BUDGET_DEPLETED',
  'CAMPAIGN_STOPPED'
];

export interface EntityRef {
  id: string;
  name: string;
  type: EntityType;
}

export interface AlertEvent {
  kind: AlertKind;
  entity: EntityRef;
  observed: number | null;
  threshold: number | null;
  percentDeviation: number | null;
  previousStatus?: EntityStatus;
  currentStatus?: EntityStatus;
}

export type AlertThresholds = Partial<Record<Exclude<AlertKind, 'CAMPAIGN_STOPPED'>, number>>;

export type CheckpointStatus = 'PENDING' | 'IN_PROGRESS' | 'COMPLETE' | 'FAILED';

export interface Checkpoint {
  entityType: EntityType;
  lastProcessedId: string | null;
  processedCount: number;
  totalCount: number;
  status: CheckpointStatus;
  cursor: string | null;
  dateRange: DateRange | null;
  errorMessage: string | null;
  updatedAt: Date;
}

export const REPORT_TYPES = ['daily', 'weekly', 'spend', 'performance'] as const;

export type ReportType = typeof REPORT_TYPES[number];

export const EXPORT_FORMATS = ['csv', 'json', 'txt'] as const;

export type ExportFormat = typeof EXPORT_FORMATS[number];

export interface ReportRequest {
  reportType: ReportType;
  dateRange: DateRange;
  entityType: EntityType;
  rankBy: RankMetric;
  limit: number;
}
