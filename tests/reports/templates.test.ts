import { describe, it, expect } from 'vitest';
import {
  REPORT_TEMPLATES,
  fieldKind,
  formatCount,
  formatChange,
  formatCurrency,
  renderTemplate,
  templateFields
} from '@/reports/templates';

describe('renderTemplate', () => {
  it('formats values by field kind', () => {
    expect(renderTemplate('{impressions} | {spend} | {ctr}% | {name}', {
      impressions: 1234567,
      spend: 1234.5,
      ctr: 3.14159,
      name: 'Brand search'
    })).toBe('1,234,567 | 1,234.50 | 3.14% | Brand search');
  });

  it('fills missing values with the kind default', () => {
    expect(renderTemplate('{clicks} {spend} {ctr} {status}', {})).toBe('0 0.00 0.00 n/a');
  });

  it('treats null, empty and non-finite values as missing', () => {
    expect(renderTemplate('{cpc}|{name}|{ctr}', { cpc: null, name: '', ctr: Number.NaN })).toBe('0.00|n/a|0.00');
  });

  it('renders unknown fields as n/a', () => {
    expect(renderTemplate('[{mystery}]', { mystery: undefined })).toBe('[n/a]');
    expect(renderTemplate('[{mystery}]', { mystery: 7 })).toBe('[7]');
  });

  it('leaves no placeholder in any report template rendered without values', () => {
    for (const template of Object.values(REPORT_TEMPLATES)) {
      for (const part of Object.values(template)) {
        expect(renderTemplate(part, {})).not.toMatch(/\{\w+\}/);
      }
    }
  });
});

describe('templateFields', () => {
  it('lists fields once in order of appearance', () => {
    expect(templateFields('{spend} of {budget}, {spend} again')).toEqual(['spend', 'budget']);
  });

  it('knows the kind of every field the report templates use', () => {
    for (const template of Object.values(REPORT_TEMPLATES)) {
      for (const part of Object.values(template)) {
        for (const field of templateFields(part)) {
          expect(fieldKind(field), field).toBeDefined();
        }
      }
    }
  });
});

describe('number formatting', () => {
  it('rounds counts and groups thousands', () => {
    expect(formatCount(1499.6)).toBe('1,500');
  });

  it('signs percent changes', () => {
    expect(formatChange(12.5)).toBe('+12.50%');
    expect(formatChange(-3)).toBe('-3.00%');
    expect(formatChange(-0.001)).toBe('0.00%');
    expect(renderTemplate('{spend_change}', { spend_change: null })).toBe('n/a');
  });

  it('keeps two decimals for currency', () => {
    expect(formatCurrency(0.5)).toBe('0.50');
    expect(formatCurrency(1000)).toBe('1,000.00');
  });
});
