import { describe, it, expect } from 'vitest';
import { parse } from 'csv-parse/sync';
import { aggregate } from '@/reports/aggregator';
import {
  buildCsvExport,
  buildExports,
  buildJsonExport,
  exportFileName,
  formatAlertLine,
  formatReportText,
  FormatOptions,
  getTemplate
} from '@/reports/formatter';
import { ValidationError } from '@/utils/error-handler';
import { Account, AlertEvent, PeriodComparison } from '@/utils/types';
import { entity, row } from '../helpers/fixtures';

const range = { start: '2024-01-01', end: '2024-01-01' };

const report = aggregate(
  [
    row({ entityId: 'A', impressions: 1000, clicks: 50, spendCents: 2500, conversions: 5 }),
    row({ entityId: 'B' })
  ],
  {
    dateRange: range,
    rankBy: 'spend',
    entities: [entity({ id: 'A', name: 'Brand' }), entity({ id: 'B', name: 'Generic', status: 'PAUSED' })]
  }
);

const options: FormatOptions = { limit: 5, entityType: 'campaign', currency: 'USD' };
const account: Account = { id: '1', name: 'Test account', currency: 'USD', timezone: 'UTC' };

const comparison: PeriodComparison = {
  previousRange: { start: '2023-12-31', end: '2023-12-31' },
  previous: { spend: 20, impressions: 1000, clicks: 40, ctr: 4, conversions: 0 },
  changes: { spend: 25, impressions: 0, clicks: 25, ctr: 25, conversions: null }
};

const highCpc: AlertEvent = {
  kind: 'HIGH_CPC',
  entity: { id: 'A', name: 'Brand', type: 'campaign' },
  observed: 1.01,
  threshold: 1,
  percentDeviation: 1
};

const stopped: AlertEvent = {
  kind: 'CAMPAIGN_STOPPED',
  entity: { id: 'B', name: 'Generic', type: 'campaign' },
  observed: null,
  threshold: null,
  percentDeviation: null,
  previousStatus: 'ACTIVE',
  currentStatus: 'PAUSED'
};

describe('formatReportText', () => {
  it('renders the daily report', () => {
    const text = formatReportText(report, [], 'daily', options);

    expect(text).toBe([
      'Daily ads report',
      'Period: 2024-01-01',
      '',
      'Spend: 25.00 USD',
      'Impressions: 1,000',
      'Clicks: 50',
      'CTR: 5.00%',
      'CPC: 0.50',
      'Conversions: 5',
      'Cost per conversion: 5.00',
      '',
      'Top 2 campaigns by spend:',
      '1. Brand [ACTIVE] spend 25.00, impressions 1,000, clicks 50, CTR 5.00%, CPC 0.50, conversions 5',
      '2. Generic [PAUSED] spend 0.00, impressions 0, clicks 0, CTR 0.00%, CPC 0.00, conversions 0',
      '',
      'No alerts.'
    ].join('\n'));
  });

  it('compares with the previous window after the totals', () => {
    const text = formatReportText(report, [], 'daily', { ...options, comparison });

    expect(text).toContain([
      'Cost per conversion: 5.00',
      '',
      'Compared with 2023-12-31:',
      'Spend: +25.00% (was 20.00 USD)',
      'Impressions: 0.00% (was 1,000)',
      'Clicks: +25.00% (was 40)',
      'CTR: +25.00% (was 4.00%)',
      'Conversions: n/a (was 0)',
      '',
      'Top 2 campaigns by spend:'
    ].join('\n'));
  });

  it('leaves the comparison out of templates without one', () => {
    expect(formatReportText(report, [], 'spend', { ...options, comparison })).not.toContain('Compared with');
    expect(formatReportText(report, [], 'daily', options)).not.toContain('Compared with');
  });

  it('lists at most limit entities', () => {
    const text = formatReportText(report, [], 'daily', { ...options, limit: 1 });

    expect(text).toContain('Top 1 campaigns by spend:\n1. Brand [ACTIVE]');
    expect(text).not.toContain('Generic');
  });

  it('renders alerts in evaluation order', () => {
    const text = formatReportText(report, [highCpc, stopped], 'daily', options);

    expect(text.endsWith([
      'Alerts (2):',
      'High CPC: Brand at 1.01 (threshold 1.00, 1.00% over)',
      'Stopped: Generic went from ACTIVE to PAUSED'
    ].join('\n'))).toBe(true);
  });

  it('says so when nothing is ranked', () => {
    const empty = aggregate([], { dateRange: range, rankBy: 'spend' });

    expect(formatReportText(empty, [], 'daily', { ...options, entityType: 'adset' }))
      .toContain('\n\nNo ad sets with activity in this period.\n\n');
    expect(formatReportText(empty, [], 'spend', options))
      .toContain('\n\nNothing spent yet in this period.\n\n');
  });

  it('adds a per-day section to multi-day weekly reports', () => {
    const weekly = aggregate(
      [
        row({ entityId: 'A', date: '2024-01-01', spendCents: 150, clicks: 3 }),
        row({ entityId: 'A', date: '2024-01-02', spendCents: 50, clicks: 1 })
      ],
      { dateRange: { start: '2024-01-01', end: '2024-01-02' }, rankBy: 'clicks' }
    );

    const text = formatReportText(weekly, [], 'weekly', options);

    expect(text.startsWith('Weekly ads report\nPeriod: 2024-01-01 - 2024-01-02 (2 days)\n')).toBe(true);
    expect(text).toContain('Top 1 campaigns by clicks:');
    expect(text).toContain([
      'By day:',
      '2024-01-01: spend 1.50, impressions 0, clicks 3, conversions 0',
      '2024-01-02: spend 0.50, impressions 0, clicks 1, conversions 0'
    ].join('\n'));
  });

  it('rejects an unknown template', () => {
    expect(() => formatReportText(report, [], 'monthly', options)).toThrow(ValidationError);
    expect(() => getTemplate('monthly')).toThrow('Unknown report template "monthly"');
  });
});

describe('formatAlertLine', () => {
  it('renders each alert kind', () => {
    expect(formatAlertLine({ ...highCpc, kind: 'LOW_CTR', observed: 0.5, percentDeviation: 50 }))
      .toBe('Low CTR: Brand at 0.50% (threshold 1.00%, 50.00% under)');
    expect(formatAlertLine({ ...highCpc, kind: 'BUDGET_DEPLETED', observed: 95, threshold: 90, percentDeviation: 5.56 }))
      .toBe('Budget nearly spent: Brand used 95.00% (threshold 90.00%)');
  });
});

describe('exports', () => {
  it('writes one CSV row per ranked entity', () => {
    const records: Array<Record<string, string>> = parse(buildCsvExport(report), { columns: true });

    expect(records).toEqual([
      {
        rank: '1',
        entity_id: 'A',
        entity_type: 'campaign',
        name: 'Brand',
        status: 'ACTIVE',
        impressions: '1000',
        clicks: '50',
        spend: '25.00',
        conversions: '5',
        ctr: '5.00',
        cpc: '0.50',
        cost_per_conversion: '5.00'
      },
      {
        rank: '2',
        entity_id: 'B',
        entity_type: 'campaign',
        name: 'Generic',
        status: 'PAUSED',
        impressions: '0',
        clicks: '0',
        spend: '0.00',
        conversions: '0',
        ctr: '0.00',
        cpc: '0.00',
        cost_per_conversion: '0.00'
      }
    ]);
  });

  it('quotes names containing commas', () => {
    const quoted = aggregate([row({ entityId: 'A', entityName: 'Sale, winter', spendCents: 1 })], {
      dateRange: range,
      rankBy: 'spend'
    });

    const records: Array<Record<string, string>> = parse(buildCsvExport(quoted), { columns: true });
    expect(records[0].name).toBe('Sale, winter');
  });

  it('builds the JSON document in major units', () => {
    const json = buildJsonExport(report, [highCpc], {
      reportType: 'daily',
      entityType: 'campaign',
      generatedAt: new Date('2024-01-02T08:00:00Z'),
      account,
      comparison
    });

    expect(json.generatedAt).toBe('2024-01-02T08:00:00.000Z');
    expect(json.account).toEqual({ id: '1', name: 'Test account', currency: 'USD', timezone: 'UTC' });
    expect(json.comparison).toEqual(comparison);
    expect(json.totals).toEqual({
      impressions: 1000,
      clicks: 50,
      spend: 25,
      conversions: 5,
      ctr: 5,
      cpc: 0.5,
      costPerConversion: 5
    });
    expect(json.entities.map(e => [e.rank, e.id])).toEqual([[1, 'A'], [2, 'B']]);
    expect(json.alerts).toEqual([highCpc]);
  });

  it('names files by report type, end date and entity type', () => {
    expect(exportFileName('daily', '2024-01-01', 'csv')).toBe('daily/2024-01-01/campaign_report.csv');
    expect(exportFileName('weekly', '2024-01-07', 'json', 'adset')).toBe('weekly/2024-01-07/adset_report.json');
  });

  it('builds one file per configured format', () => {
    const files = buildExports(report, [], 'report text', ['txt', 'json'], {
      reportType: 'spend',
      entityType: 'ad',
      generatedAt: new Date('2024-01-01T12:00:00Z'),
      account
    });

    expect(files.map(file => [file.path, file.contentType])).toEqual([
      ['spend/2024-01-01/ad_report.txt', 'text/plain'],
      ['spend/2024-01-01/ad_report.json', 'application/json']
    ]);
    expect(files[0].content).toBe('report text');
    expect(JSON.parse(files[1].content)).toMatchObject({ reportType: 'spend', comparison: null });
  });
});
