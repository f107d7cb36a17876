import { daysInRange } from '@/utils/dates';
import {
  AggregateReport,
  AlertEvent,
  AlertKind,
  AlertThresholds,
  Entity,
  EntityRef,
  EntityStatus,
  EntitySummary,
  STOPPED_STATUSES
} from '@/utils/types';

export interface AlertInputs {
  /** Status of each entity at the previous observation, keyed by entity id. */
  previousStatuses?: ReadonlyMap<string, EntityStatus>;
  /** Current entity snapshot; covers entities with no rows in the period. */
  entities?: Entity[];
}

export function percentDeviation(observed: number, threshold: number): number {
  if (threshold === 0) return 0;
  return Math.round((Math.abs(observed - threshold) / threshold) * 100 * 100) / 100;
}

function refOf(summary: { entityId: string; name: string; entityType: EntityRef['type'] }): EntityRef {
  return { id: summary.entityId, name: summary.name, type: summary.entityType };
}

function thresholdEvent(kind: AlertKind, summary: EntitySummary, observed: number, threshold: number): AlertEvent {
  return {
    kind,
    entity: refOf(summary),
    observed,
    threshold,
    percentDeviation: percentDeviation(observed, threshold)
  };
}

function highCpc(report: AggregateReport, threshold: number): AlertEvent[] {
  return report.entities
    .filter(summary => summary.clicks > 0 && summary.cpc > threshold)
    .map(summary => thresholdEvent('HIGH_CPC', summary, summary.cpc, threshold));
}

function lowCtr(report: AggregateReport, threshold: number): AlertEvent[] {
  return report.entities
    .filter(summary => summary.impressions > 0 && summary.ctr < threshold)
    .map(summary => thresholdEvent('LOW_CTR', summary, summary.ctr, threshold));
}

/**
 * Spend as a percentage of the budget available over the report window:
 * daily budget times the number of days, else the lifetime budget.
 */
export function budgetUsagePercent(summary: EntitySummary, days: number): number | null {
  const budgetCents = summary.dailyBudgetCents !== null
    ? summary.dailyBudgetCents * days
    : summary.lifetimeBudgetCents;

  if (budgetCents === null || budgetCents <= 0) return null;
  return (summary.spendCents / budgetCents) * 100;
}

function budgetDepleted(report: AggregateReport, threshold: number): AlertEvent[] {
  const days = daysInRange(report.dateRange);
  const events: AlertEvent[] = [];

  for (const summary of report.entities) {
    const usage = budgetUsagePercent(summary, days);
    if (usage !== null && usage >= threshold) {
      events.push(thresholdEvent('BUDGET_DEPLETED', summary, Math.round(usage * 100) / 100, threshold));
    }
  }
  return events;
}

function campaignStopped(report: AggregateReport, inputs: AlertInputs): AlertEvent[] {
  const previous = inputs.previousStatuses;
  if (!previous || previous.size === 0) return [];

  // Ranked entities first, then entities with no activity in the window by id
  const candidates: Array<{ ref: EntityRef; status: EntityStatus }> = report.entities.map(summary => ({
    ref: refOf(summary),
    status: summary.status
  }));
  const ranked = new Set(report.entities.map(summary => summary.entityId));
  const idle = (inputs.entities ?? [])
    .filter(entity => !ranked.has(entity.id))
    .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  for (const entity of idle) {
    candidates.push({ ref: { id: entity.id, name: entity.name, type: entity.entityType }, status: entity.status });
  }

  const current = new Map((inputs.entities ?? []).map(entity => [entity.id, entity.status]));
  const events: AlertEvent[] = [];

  for (const candidate of candidates) {
    const before = previous.get(candidate.ref.id);
    const now = current.get(candidate.ref.id) ?? candidate.status;

    if (before !== undefined && !STOPPED_STATUSES.has(before) && STOPPED_STATUSES.has(now)) {
      events.push({
        kind: 'CAMPAIGN_STOPPED',
        entity: candidate.ref,
        observed: null,
        threshold: null,
        percentDeviation: null,
        previousStatus: before,
        currentStatus: now
      });
    }
  }
  return events;
}

/**
 * Rules run in a fixed order (HIGH_CPC, LOW_CTR, BUDGET_DEPLETED,
 * CAMPAIGN_STOPPED) and share no state; a rule without a threshold is off.
 */
export function evaluateAlerts(
  report: AggregateReport,
  thresholds: AlertThresholds,
  inputs: AlertInputs = {}
): AlertEvent[] {
  const events: AlertEvent[] = [];

  if (thresholds.HIGH_CPC !== undefined) {
    events.push(...highCpc(report, thresholds.HIGH_CPC));
  }
  if (thresholds.LOW_CTR !== undefined) {
    events.push(...lowCtr(report, thresholds.LOW_CTR));
  }
  if (thresholds.BUDGET_DEPLETED !== undefined) {
    events.push(...budgetDepleted(report, thresholds.BUDGET_DEPLETED));
  }
  events.push(...campaignStopped(report, inputs));

  return events;
}
