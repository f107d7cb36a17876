#!/usr/bin/env node
// Must be first import to set up module aliases
import 'module-alias/register';

import { getConfig, isEntityType, isRankMetric } from '@/utils/config';
import logger from '@/utils/logger';
import { ValidationError, formatErrorLine } from '@/utils/error-handler';
import { createReportPipeline, RequestOverrides } from '@/pipeline/report-pipeline';
import { REPORT_TYPES, ReportType } from '@/utils/types';

const USAGE = `Usage: ads-report <${REPORT_TYPES.join('|')}> [options]

Options:
  --start YYYY-MM-DD   First day of the window
  --end YYYY-MM-DD     Last day of the window
  --days N             The N days before today
  --limit N            Number of ranked entities in the text
  --entity TYPE        campaign, adset or ad
  --rank-by METRIC     spend, impressions, clicks, conversions, ctr, cpc, costPerConversion`;

export interface CliArgs {
  reportType: ReportType;
  overrides: RequestOverrides;
}

function positiveInt(flag: string, value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value) || !Number.isInteger(parsed) || parsed < 1) {
    throw new ValidationError(`${flag} expects a positive integer, got "${value}"`);
  }
  return parsed;
}

export function parseCliArgs(argv: string[]): CliArgs {
  const [command, ...rest] = argv;
  const reportType = REPORT_TYPES.find(type => type === command);
  if (!reportType) {
    throw new ValidationError(command ? `Unknown report type "${command}"\n${USAGE}` : USAGE);
  }

  const overrides: RequestOverrides = {};

  for (let i = 0; i < rest.length; i++) {
    const flag = rest[i];
    const value = rest[i + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new ValidationError(`${flag} expects a value`);
    }
    i++;

    switch (flag) {
      case '--start':
        overrides.startDate = value;
        break;
      case '--end':
        overrides.endDate = value;
        break;
      case '--days':
        overrides.days = positiveInt(flag, value);
        break;
      case '--limit':
        overrides.limit = positiveInt(flag, value);
        break;
      case '--entity':
        if (!isEntityType(value)) {
          throw new ValidationError(`--entity expects campaign, adset or ad, got "${value}"`);
        }
        overrides.entityType = value;
        break;
      case '--rank-by':
        if (!isRankMetric(value)) {
          throw new ValidationError(`--rank-by got an unknown metric "${value}"`);
        }
        overrides.rankBy = value;
        break;
      default:
        throw new ValidationError(`Unknown option ${flag}\n${USAGE}`);
    }
  }

  return { reportType, overrides };
}

/** Runs one report; resolves with the process exit code. */
export async function main(argv: string[]): Promise<number> {
  try {
    const args = parseCliArgs(argv);
    const config = getConfig();
    const pipeline = createReportPipeline(config);

    try {
      const request = await pipeline.buildRequest(args.reportType, args.overrides, config);
      const result = await pipeline.run(request);
      logger.info('Report finished', {
        reportType: args.reportType,
        dateRange: result.report.dateRange,
        messages: result.delivery.messages.length,
        alerts: result.alerts.length
      });
      return 0;
    } finally {
      await pipeline.close();
    }
  } catch (error) {
    process.stderr.write(`${formatErrorLine(error)}\n`);
    return 1;
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then(code => process.exit(code))
    .catch(error => {
      process.stderr.write(`${formatErrorLine(error)}\n`);
      process.exit(1);
    });
}
