import { Entity, MetricRow } from '@/utils/types';

export function entity(overrides: Partial<Entity> & Pick<Entity, 'id'>): Entity {
  return {
    entityType: 'campaign',
    name: `Campaign ${overrides.id}`,
    status: 'ACTIVE',
    dailyBudgetCents: null,
    lifetimeBudgetCents: null,
    createdTime: null,
    updatedTime: null,
    ...overrides
  };
}

export function row(overrides: Partial<MetricRow> & Pick<MetricRow, 'entityId'>): MetricRow {
  return {
    entityType: 'campaign',
    entityName: `Campaign ${overrides.entityId}`,
    date: '2024-01-01',
    impressions: 0,
    clicks: 0,
    spendCents: 0,
    conversions: 0,
    ...overrides
  };
}
