import { GraphRecord } from './client';

/** Graph API returns numbers as strings; absent metrics read as 0. */
export type Parsed<T> = { ok: true; value: T } | { ok: false; reason: string };

export function readString(record: GraphRecord, key: string): string | null {
  const value = record[key];
  if (typeof value === 'string' && value.trim() !== '') {
    return value;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return null;
}

function toNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function parseCount(record: GraphRecord, key: string): Parsed<number> {
  const raw = record[key];
  if (raw === undefined || raw === null || raw === '') {
    return { ok: true, value: 0 };
  }
  const value = toNumber(raw);
  if (value === null || value < 0) {
    return { ok: false, reason: `${key} is not a non-negative number` };
  }
  return { ok: true, value: Math.round(value) };
}

/** Currency amount in major units ("25.00") to integer minor units. */
export function parseMoneyToCents(record: GraphRecord, key: string): Parsed<number> {
  const raw = record[key];
  if (raw === undefined || raw === null || raw === '') {
    return { ok: true, value: 0 };
  }
  const value = toNumber(raw);
  if (value === null || value < 0) {
    return { ok: false, reason: `${key} is not a non-negative amount` };
  }
  return { ok: true, value: Math.round(value * 100) };
}

/** Budgets come back already in minor units, as strings. */
export function parseBudgetAmount(value: unknown): number | null {
  const numericValue = toNumber(value);
  return numericValue === null || numericValue <= 0 ? null : Math.round(numericValue);
}

export function parseDateTime(value: unknown): string | null {
  if (typeof value !== 'string' || value === '') return null;

  const date = new Date(value);
  return isNaN(date.getTime()) ? null : date.toISOString();
}

interface ActionValue {
  action_type: string;
  value: number;
}

function readActions(value: unknown): ActionValue[] | null {
  if (!Array.isArray(value)) return null;

  const actions: ActionValue[] = [];
  for (const item of value) {
    if (typeof item !== 'object' || item === null) continue;
    const type = 'action_type' in item ? item.action_type : undefined;
    const amount = toNumber('value' in item ? item.value : undefined);
    if (typeof type === 'string' && amount !== null && amount >= 0) {
      actions.push({ action_type: type, value: amount });
    }
  }
  return actions;
}

/**
 * Conversions are the configured action types summed from `actions`. When
 * none of them is present the `conversions` field is used instead (a plain
 * number on older API versions, an action list on newer ones).
 */
export function parseConversions(record: GraphRecord, actionTypes: ReadonlySet<string>): Parsed<number> {
  const matching = (readActions(record.actions) ?? []).filter(action => actionTypes.has(action.action_type));
  if (matching.length > 0) {
    const total = matching.reduce((sum, action) => sum + action.value, 0);
    return { ok: true, value: Math.round(total) };
  }

  const conversionActions = readActions(record.conversions);
  if (conversionActions) {
    const total = conversionActions.reduce((sum, action) => sum + action.value, 0);
    return { ok: true, value: Math.round(total) };
  }

  return parseCount(record, 'conversions');
}
