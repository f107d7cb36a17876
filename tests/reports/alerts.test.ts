import { describe, it, expect } from 'vitest';
import { aggregate } from '@/reports/aggregator';
import { budgetUsagePercent, evaluateAlerts, percentDeviation } from '@/reports/alerts';
import { EntityStatus, MetricRow, Entity } from '@/utils/types';
import { entity, row } from '../helpers/fixtures';

function reportOf(rows: MetricRow[], entities: Entity[] = [], range = { start: '2024-01-01', end: '2024-01-01' }) {
  return aggregate(rows, { dateRange: range, rankBy: 'spend', entities });
}

describe('evaluateAlerts', () => {
  describe('HIGH_CPC', () => {
    it('stays quiet below the threshold', () => {
      const report = reportOf([row({ entityId: 'A', clicks: 50, spendCents: 2500 })]);
      expect(evaluateAlerts(report, { HIGH_CPC: 1 })).toEqual([]);
    });

    it('stays quiet at exactly the threshold', () => {
      const report = reportOf([row({ entityId: 'A', clicks: 1, spendCents: 100 })]);
      expect(evaluateAlerts(report, { HIGH_CPC: 1 })).toEqual([]);
    });

    it('fires just above the threshold with the deviation in percent', () => {
      const report = reportOf([row({ entityId: 'A', entityName: 'Brand', clicks: 1, spendCents: 101 })]);

      const [event, ...rest] = evaluateAlerts(report, { HIGH_CPC: 1 });

      expect(rest).toEqual([]);
      expect(event.kind).toBe('HIGH_CPC');
      expect(event.entity).toEqual({ id: 'A', name: 'Brand', type: 'campaign' });
      expect(event.observed).toBeCloseTo(1.01, 10);
      expect(event.threshold).toBe(1);
      expect(event.percentDeviation).toBe(1);
    });

    it('ignores entities without clicks', () => {
      const report = reportOf([row({ entityId: 'A', impressions: 100, spendCents: 5000 })]);
      expect(evaluateAlerts(report, { HIGH_CPC: 1 })).toEqual([]);
    });
  });

  describe('LOW_CTR', () => {
    it('fires below the threshold', () => {
      const report = reportOf([row({ entityId: 'A', impressions: 200, clicks: 1 })]);

      const [event] = evaluateAlerts(report, { LOW_CTR: 1 });

      expect(event.kind).toBe('LOW_CTR');
      expect(event.observed).toBeCloseTo(0.5, 10);
      expect(event.percentDeviation).toBe(50);
    });

    it('ignores entities without impressions', () => {
      const report = reportOf([row({ entityId: 'A', spendCents: 100 })]);
      expect(evaluateAlerts(report, { LOW_CTR: 1 })).toEqual([]);
    });
  });

  describe('BUDGET_DEPLETED', () => {
    it('measures spend against the daily budget over the window', () => {
      const report = reportOf(
        [
          row({ entityId: 'A', date: '2024-01-01', spendCents: 1000 }),
          row({ entityId: 'A', date: '2024-01-02', spendCents: 900 })
        ],
        [entity({ id: 'A', dailyBudgetCents: 1000 })],
        { start: '2024-01-01', end: '2024-01-02' }
      );

      const [event] = evaluateAlerts(report, { BUDGET_DEPLETED: 90 });

      expect(event.kind).toBe('BUDGET_DEPLETED');
      expect(event.observed).toBe(95);
      expect(event.threshold).toBe(90);
      expect(event.percentDeviation).toBe(5.56);
    });

    it('falls back to the lifetime budget', () => {
      const report = reportOf(
        [row({ entityId: 'A', spendCents: 8000 })],
        [entity({ id: 'A', lifetimeBudgetCents: 10000 })]
      );

      expect(evaluateAlerts(report, { BUDGET_DEPLETED: 75 }).map(event => event.observed)).toEqual([80]);
      expect(evaluateAlerts(report, { BUDGET_DEPLETED: 90 })).toEqual([]);
    });

    it('skips entities without a budget', () => {
      const report = reportOf([row({ entityId: 'A', spendCents: 8000 })]);
      expect(evaluateAlerts(report, { BUDGET_DEPLETED: 1 })).toEqual([]);
    });
  });

  describe('CAMPAIGN_STOPPED', () => {
    const previous = new Map<string, EntityStatus>([
      ['A', 'ACTIVE'],
      ['B', 'PAUSED'],
      ['C', 'ACTIVE']
    ]);

    it('fires when an active entity is now stopped', () => {
      const entities = [entity({ id: 'A', status: 'PAUSED' }), entity({ id: 'B', status: 'PAUSED' })];
      const report = reportOf([row({ entityId: 'A', spendCents: 10 }), row({ entityId: 'B', spendCents: 5 })], entities);

      const events = evaluateAlerts(report, {}, { previousStatuses: previous, entities });

      expect(events).toEqual([
        {
          kind: 'CAMPAIGN_STOPPED',
          entity: { id: 'A', name: 'Campaign A', type: 'campaign' },
          observed: null,
          threshold: null,
          percentDeviation: null,
          previousStatus: 'ACTIVE',
          currentStatus: 'PAUSED'
        }
      ]);
    });

    it('covers entities with no rows in the window after the ranked ones', () => {
      const entities = [
        entity({ id: 'C', status: 'ARCHIVED' }),
        entity({ id: 'A', status: 'DELETED' })
      ];
      const report = reportOf([row({ entityId: 'A', spendCents: 10 })], entities);

      const events = evaluateAlerts(report, {}, { previousStatuses: previous, entities });

      expect(events.map(event => [event.entity.id, event.currentStatus])).toEqual([
        ['A', 'DELETED'],
        ['C', 'ARCHIVED']
      ]);
    });

    it('needs a previous observation', () => {
      const entities = [entity({ id: 'A', status: 'PAUSED' })];
      const report = reportOf([row({ entityId: 'A' })], entities);

      expect(evaluateAlerts(report, {}, { entities })).toEqual([]);
      expect(evaluateAlerts(report, {}, { previousStatuses: new Map<string, EntityStatus>([['Z', 'ACTIVE']]), entities })).toEqual([]);
    });
  });

  it('emits rules in a fixed order', () => {
    const entities = [entity({ id: 'A', status: 'PAUSED', lifetimeBudgetCents: 1000 })];
    const report = reportOf([row({ entityId: 'A', impressions: 1000, clicks: 1, spendCents: 1000 })], entities);

    const events = evaluateAlerts(
      report,
      { LOW_CTR: 1, BUDGET_DEPLETED: 50, HIGH_CPC: 2 },
      { previousStatuses: new Map<string, EntityStatus>([['A', 'ACTIVE']]), entities }
    );

    expect(events.map(event => event.kind)).toEqual(['HIGH_CPC', 'LOW_CTR', 'BUDGET_DEPLETED', 'CAMPAIGN_STOPPED']);
  });

  it('runs no threshold rule without its threshold', () => {
    const report = reportOf([row({ entityId: 'A', impressions: 1000, clicks: 1, spendCents: 1000 })]);
    expect(evaluateAlerts(report, {})).toEqual([]);
  });
});

describe('percentDeviation', () => {
  it('is relative to the threshold and rounded to two decimals', () => {
    expect(percentDeviation(1.5, 1)).toBe(50);
    expect(percentDeviation(2, 3)).toBe(33.33);
  });

  it('is 0 for a zero threshold', () => {
    expect(percentDeviation(5, 0)).toBe(0);
  });
});

describe('budgetUsagePercent', () => {
  it('returns null for a zero budget', () => {
    const [summary] = reportOf([row({ entityId: 'A', spendCents: 10 })], [entity({ id: 'A', dailyBudgetCents: 0 })]).entities;
    expect(budgetUsagePercent(summary, 1)).toBeNull();
  });
});
