import { AlertKind } from '@/utils/types';

export type FieldKind = 'count' | 'currency' | 'percent' | 'change' | 'text';

export type TemplateValue = string | number | null | undefined;
export type TemplateValues = Record<string, TemplateValue>;

/** Kind of every field a template may reference; drives formatting and defaults. */
export const FIELD_KINDS: Record<string, FieldKind> = {
  impressions: 'count',
  clicks: 'count',
  conversions: 'count',
  rank: 'count',
  limit: 'count',
  entity_count: 'count',
  alert_count: 'count',
  day_count: 'count',
  previous_impressions: 'count',
  previous_clicks: 'count',
  previous_conversions: 'count',

  spend: 'currency',
  cpc: 'currency',
  cost_per_conversion: 'currency',
  threshold_cpc: 'currency',
  budget: 'currency',
  previous_spend: 'currency',

  ctr: 'percent',
  threshold_ctr: 'percent',
  budget_used: 'percent',
  threshold_budget: 'percent',
  deviation: 'percent',
  previous_ctr: 'percent',

  spend_change: 'change',
  impressions_change: 'change',
  clicks_change: 'change',
  ctr_change: 'change',
  conversions_change: 'change',

  title: 'text',
  period: 'text',
  previous_period: 'text',
  currency: 'text',
  name: 'text',
  status: 'text',
  date: 'text',
  entity_label: 'text',
  rank_by: 'text',
  previous_status: 'text',
  current_status: 'text'
};

const DEFAULTS: Record<FieldKind, string> = {
  count: '0',
  currency: '0.00',
  percent: '0.00',
  change: 'n/a',
  text: 'n/a'
};

export const UNKNOWN_FIELD_PLACEHOLDER = 'n/a';

export interface ReportTemplate {
  header: string;
  entitiesTitle: string;
  entityLine: string;
  emptyEntities: string;
  /** Totals against the preceding window; shown when its rows are stored. */
  comparison?: string;
  /** Per-day breakdown; omitted for single-day reports. */
  dailyTitle?: string;
  dailyLine?: string;
  alertsTitle: string;
  noAlerts: string;
}

const COMPARISON = [
  'Compared with {previous_period}:',
  'Spend: {spend_change} (was {previous_spend} {currency})',
  'Impressions: {impressions_change} (was {previous_impressions})',
  'Clicks: {clicks_change} (was {previous_clicks})',
  'CTR: {ctr_change} (was {previous_ctr}%)',
  'Conversions: {conversions_change} (was {previous_conversions})'
].join('\n');

const ENTITY_LINE = '{rank}. {name} [{status}] spend {spend}, impressions {impressions}, clicks {clicks}, CTR {ctr}%, CPC {cpc}, conversions {conversions}';

export const REPORT_TEMPLATES: Record<string, ReportTemplate> = {
  daily: {
    header: [
      'Daily ads report',
      'Period: {period}',
      '',
      'Spend: {spend} {currency}',
      'Impressions: {impressions}',
      'Clicks: {clicks}',
      'CTR: {ctr}%',
      'CPC: {cpc}',
      'Conversions: {conversions}',
      'Cost per conversion: {cost_per_conversion}'
    ].join('\n'),
    comparison: COMPARISON,
    entitiesTitle: 'Top {limit} {entity_label} by {rank_by}:',
    entityLine: ENTITY_LINE,
    emptyEntities: 'No {entity_label} with activity in this period.',
    alertsTitle: 'Alerts ({alert_count}):',
    noAlerts: 'No alerts.'
  },

  weekly: {
    header: [
      'Weekly ads report',
      'Period: {period} ({day_count} days)',
      '',
      'Spend: {spend} {currency}',
      'Impressions: {impressions}',
      'Clicks: {clicks}',
      'CTR: {ctr}%',
      'CPC: {cpc}',
      'Conversions: {conversions}',
      'Cost per conversion: {cost_per_conversion}'
    ].join('\n'),
    comparison: COMPARISON,
    entitiesTitle: 'Top {limit} {entity_label} by {rank_by}:',
    entityLine: ENTITY_LINE,
    emptyEntities: 'No {entity_label} with activity in this period.',
    dailyTitle: 'By day:',
    dailyLine: '{date}: spend {spend}, impressions {impressions}, clicks {clicks}, conversions {conversions}',
    alertsTitle: 'Alerts ({alert_count}):',
    noAlerts: 'No alerts.'
  },

  spend: {
    header: [
      'Spend check',
      'Period: {period}',
      '',
      'Spend so far: {spend} {currency}',
      'Clicks: {clicks}',
      'CPC: {cpc}'
    ].join('\n'),
    entitiesTitle: 'Spend by {entity_label}:',
    entityLine: '{rank}. {name} [{status}] spend {spend}, CPC {cpc}',
    emptyEntities: 'Nothing spent yet in this period.',
    alertsTitle: 'Alerts ({alert_count}):',
    noAlerts: 'No alerts.'
  },

  performance: {
    header: [
      'Performance report',
      'Period: {period} ({day_count} days)',
      '',
      'Spend: {spend} {currency}',
      'Impressions: {impressions}',
      'Clicks: {clicks}',
      'CTR: {ctr}%',
      'CPC: {cpc}',
      'Conversions: {conversions}',
      'Cost per conversion: {cost_per_conversion}'
    ].join('\n'),
    entitiesTitle: 'Top {limit} {entity_label} by {rank_by}:',
    entityLine: '{rank}. {name} [{status}] conversions {conversions}, cost per conversion {cost_per_conversion}, CTR {ctr}%, spend {spend}',
    emptyEntities: 'No {entity_label} with activity in this period.',
    alertsTitle: 'Alerts ({alert_count}):',
    noAlerts: 'No alerts.'
  }
};

export const ALERT_TEMPLATES: Record<AlertKind, string> = {
  HIGH_CPC: 'High CPC: {name} at {cpc} (threshold {threshold_cpc}, {deviation}% over)',
  LOW_CTR: 'Low CTR: {name} at {ctr}% (threshold {threshold_ctr}%, {deviation}% under)',
  BUDGET_DEPLETED: 'Budget nearly spent: {name} used {budget_used}% (threshold {threshold_budget}%)',
  CAMPAIGN_STOPPED: 'Stopped: {name} went from {previous_status} to {current_status}'
};

const countFormat = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });
const decimalFormat = new Intl.NumberFormat('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });

export function formatCount(value: number): string {
  return countFormat.format(Math.round(value));
}

/** Major currency units, 2 decimals, grouped thousands. */
export function formatCurrency(value: number): string {
  return decimalFormat.format(value);
}

export function formatPercent(value: number): string {
  return decimalFormat.format(value);
}

/** Signed percent change, `+12.50%` or `-3.00%`. */
export function formatChange(value: number): string {
  const rounded = Math.round(value * 100) / 100;
  return `${rounded > 0 ? '+' : ''}${decimalFormat.format(rounded === 0 ? 0 : rounded)}%`;
}

export function fieldKind(field: string): FieldKind | undefined {
  return Object.prototype.hasOwnProperty.call(FIELD_KINDS, field) ? FIELD_KINDS[field] : undefined;
}

function formatField(field: string, value: TemplateValue): string {
  const kind = fieldKind(field);

  if (value === null || value === undefined || (typeof value === 'number' && !Number.isFinite(value))) {
    return kind ? DEFAULTS[kind] : UNKNOWN_FIELD_PLACEHOLDER;
  }
  if (typeof value === 'string') {
    return value.length > 0 ? value : (kind ? DEFAULTS[kind] : UNKNOWN_FIELD_PLACEHOLDER);
  }

  switch (kind) {
    case 'count':
      return formatCount(value);
    case 'currency':
      return formatCurrency(value);
    case 'percent':
      return formatPercent(value);
    case 'change':
      return formatChange(value);
    default:
      return String(value);
  }
}

/**
 * Plain `{field}` substitution. A field without a value gets its kind's
 * placeholder, so no `{field}` token survives rendering.
 */
export function renderTemplate(template: string, values: TemplateValues): string {
  return template.replace(/\{(\w+)\}/g, (_token, field: string) =>
    formatField(field, Object.prototype.hasOwnProperty.call(values, field) ? values[field] : undefined)
  );
}

/** Field names referenced by a template, in order of first appearance. */
export function templateFields(template: string): string[] {
  const fields: string[] = [];
  for (const match of template.matchAll(/\{(\w+)\}/g)) {
    if (!fields.includes(match[1])) {
      fields.push(match[1]);
    }
  }
  return fields;
}
