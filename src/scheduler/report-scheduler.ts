import cron, { ScheduledTask } from 'node-cron';
import logger from '@/utils/logger';
import { ConfigError, getErrorMessage } from '@/utils/error-handler';
import { ReportType } from '@/utils/types';

export interface ReportSchedule {
  dailyCron: string;
  weeklyCron: string;
  timezone: string;
}

export type ReportRunner = (reportType: ReportType) => Promise<void>;

/**
 * In-process cron for the daily and weekly reports. A tick is skipped while
 * the previous run of the same report is still going.
 */
export class ReportScheduler {
  private tasks: ScheduledTask[] = [];
  private running = new Set<ReportType>();

  constructor(
    private runner: ReportRunner,
    private schedule: ReportSchedule
  ) {}

  get isScheduled(): boolean {
    return this.tasks.length > 0;
  }

  start(): void {
    if (this.isScheduled) {
      logger.warn('Report scheduler is already running');
      return;
    }

    const entries: Array<[ReportType, string]> = [
      ['daily', this.schedule.dailyCron],
      ['weekly', this.schedule.weeklyCron]
    ];

    for (const [reportType, expression] of entries) {
      if (!cron.validate(expression)) {
        throw new ConfigError([`Invalid cron expression for the ${reportType} report: "${expression}"`]);
      }
    }

    this.tasks = entries.map(([reportType, expression]) =>
      cron.schedule(expression, () => this.trigger(reportType), { timezone: this.schedule.timezone })
    );

    logger.info('Report scheduler started', {
      daily: this.schedule.dailyCron,
      weekly: this.schedule.weeklyCron,
      timezone: this.schedule.timezone
    });
  }

  stop(): void {
    for (const task of this.tasks) {
      task.stop();
    }
    this.tasks = [];
    logger.info('Report scheduler stopped');
  }

  /** Runs one report; failures are logged, never thrown into the cron loop. */
  async trigger(reportType: ReportType): Promise<boolean> {
    if (this.running.has(reportType)) {
      logger.warn(`Skipping scheduled ${reportType} report, previous run still in progress`);
      return false;
    }

    this.running.add(reportType);
    try {
      logger.info(`Starting scheduled ${reportType} report`);
      await this.runner(reportType);
      return true;
    } catch (error) {
      logger.error(`Scheduled ${reportType} report failed`, {
        error: getErrorMessage(error),
        scheduled_task: reportType
      });
      return false;
    } finally {
      this.running.delete(reportType);
    }
  }
}

export default ReportScheduler;
