import { Pool, PoolConfig } from 'pg';
import { MetricsStore } from './metrics-store';
import logger from '@/utils/logger';
import { PersistenceError, getErrorMessage } from '@/utils/error-handler';
import {
  Checkpoint,
  CheckpointStatus,
  DateRange,
  Entity,
  EntityStatus,
  EntityType,
  MetricRow
} from '@/utils/types';

export interface SqlStatement {
  text: string;
  values: unknown[];
}

const BATCH_SIZE = 500;

/** Later duplicates win, matching what a sequence of single upserts would store. */
function lastWins<T>(items: T[], keyOf: (item: T) => string): T[] {
  const byKey = new Map<string, T>();
  for (const item of items) {
    byKey.delete(keyOf(item));
    byKey.set(keyOf(item), item);
  }
  return [...byKey.values()];
}

function placeholders(rowCount: number, columnCount: number): string {
  const rows: string[] = [];
  for (let row = 0; row < rowCount; row++) {
    const cells: string[] = [];
    for (let column = 0; column < columnCount; column++) {
      cells.push(`$${row * columnCount + column + 1}`);
    }
    rows.push(`(${cells.join(', ')})`);
  }
  return rows.join(', ');
}

export function buildEntityUpsert(entities: Entity[]): SqlStatement {
  const unique = lastWins(entities, entity => `${entity.entityType}:${entity.id}`);
  return {
    text: `INSERT INTO ad_entities
      (entity_id, entity_type, name, status, daily_budget_cents, lifetime_budget_cents, created_time, updated_time)
      VALUES ${placeholders(unique.length, 8)}
      ON CONFLICT (entity_type, entity_id) DO UPDATE SET
        name = EXCLUDED.name,
        status = EXCLUDED.status,
        daily_budget_cents = EXCLUDED.daily_budget_cents,
        lifetime_budget_cents = EXCLUDED.lifetime_budget_cents,
        created_time = EXCLUDED.created_time,
        updated_time = EXCLUDED.updated_time,
        synced_at = NOW()`,
    values: unique.flatMap(entity => [
      entity.id,
      entity.entityType,
      entity.name,
      entity.status,
      entity.dailyBudgetCents,
      entity.lifetimeBudgetCents,
      entity.createdTime,
      entity.updatedTime
    ])
  };
}

export function buildMetricRowUpsert(rows: MetricRow[]): SqlStatement {
  const unique = lastWins(rows, row => `${row.entityId}:${row.date}`);
  return {
    text: `INSERT INTO ad_metrics_daily
      (entity_id, date, entity_type, entity_name, impressions, clicks, spend_cents, conversions)
      VALUES ${placeholders(unique.length, 8)}
      ON CONFLICT (entity_id, date) DO UPDATE SET
        entity_type = EXCLUDED.entity_type,
        entity_name = EXCLUDED.entity_name,
        impressions = EXCLUDED.impressions,
        clicks = EXCLUDED.clicks,
        spend_cents = EXCLUDED.spend_cents,
        conversions = EXCLUDED.conversions,
        updated_at = NOW()`,
    values: unique.flatMap(row => [
      row.entityId,
      row.date,
      row.entityType,
      row.entityName,
      row.impressions,
      row.clicks,
      row.spendCents,
      row.conversions
    ])
  };
}

export function buildCheckpointUpsert(checkpoint: Checkpoint): SqlStatement {
  return {
    text: `INSERT INTO sync_checkpoints
      (entity_type, last_processed_id, processed_count, total_count, status, cursor, range_start, range_end, error_message, updated_at)
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
      ON CONFLICT (entity_type) DO UPDATE SET
        last_processed_id = EXCLUDED.last_processed_id,
        processed_count = EXCLUDED.processed_count,
        total_count = EXCLUDED.total_count,
        status = EXCLUDED.status,
        cursor = EXCLUDED.cursor,
        range_start = EXCLUDED.range_start,
        range_end = EXCLUDED.range_end,
        error_message = EXCLUDED.error_message,
        updated_at = EXCLUDED.updated_at`,
    values: [
      checkpoint.entityType,
      checkpoint.lastProcessedId,
      checkpoint.processedCount,
      checkpoint.totalCount,
      checkpoint.status,
      checkpoint.cursor,
      checkpoint.dateRange?.start ?? null,
      checkpoint.dateRange?.end ?? null,
      checkpoint.errorMessage,
      checkpoint.updatedAt
    ]
  };
}

interface MetricRowRecord {
  entity_id: string;
  entity_type: EntityType;
  entity_name: string;
  date: string;
  impressions: string;
  clicks: string;
  spend_cents: string;
  conversions: string;
}

interface CheckpointRecord {
  entity_type: EntityType;
  last_processed_id: string | null;
  processed_count: number;
  total_count: number;
  status: CheckpointStatus;
  cursor: string | null;
  range_start: string | null;
  range_end: string | null;
  error_message: string | null;
  updated_at: Date;
}

export class PostgresMetricsStore implements MetricsStore {
  constructor(private pool: Pool) {}

  static fromConfig(config: {
    host: string;
    port: number;
    database: string;
    user: string;
    password: string;
    ssl: boolean;
  }): PostgresMetricsStore {
    const poolConfig: PoolConfig = {
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.user,
      password: config.password,
      ssl: config.ssl ? { rejectUnauthorized: false } : undefined,
      max: 5,
      idleTimeoutMillis: 30_000,
      connectionTimeoutMillis: 10_000
    };
    return new PostgresMetricsStore(new Pool(poolConfig));
  }

  private async run(operation: string, statement: SqlStatement): Promise<number> {
    try {
      const result = await this.pool.query(statement.text, statement.values);
      return result.rowCount ?? 0;
    } catch (error) {
      logger.error(`Database ${operation} failed`, { error: getErrorMessage(error) });
      throw new PersistenceError(`Database ${operation} failed: ${getErrorMessage(error)}`, {
        cause: error,
        context: { operation }
      });
    }
  }

  async upsertEntities(entities: Entity[]): Promise<number> {
    let written = 0;
    for (let i = 0; i < entities.length; i += BATCH_SIZE) {
      written += await this.run('entity upsert', buildEntityUpsert(entities.slice(i, i + BATCH_SIZE)));
    }
    logger.debug('Entities upserted', { count: written });
    return written;
  }

  async upsertMetricRows(rows: MetricRow[]): Promise<number> {
    let written = 0;
    for (let i = 0; i < rows.length; i += BATCH_SIZE) {
      written += await this.run('metric row upsert', buildMetricRowUpsert(rows.slice(i, i + BATCH_SIZE)));
    }
    logger.debug('Metric rows upserted', { count: written });
    return written;
  }

  async listMetricRows(entityType: EntityType, range: DateRange): Promise<MetricRow[]> {
    try {
      const result = await this.pool.query<MetricRowRecord>(
        `SELECT entity_id, entity_type, entity_name, to_char(date, 'YYYY-MM-DD') AS date,
                impressions::text, clicks::text, spend_cents::text, conversions::text
           FROM ad_metrics_daily
          WHERE entity_type = $1 AND date BETWEEN $2 AND $3
          ORDER BY date, entity_id`,
        [entityType, range.start, range.end]
      );

      return result.rows.map(record => ({
        entityId: record.entity_id,
        entityType: record.entity_type,
        entityName: record.entity_name,
        date: record.date,
        impressions: Number(record.impressions),
        clicks: Number(record.clicks),
        spendCents: Number(record.spend_cents),
        conversions: Number(record.conversions)
      }));
    } catch (error) {
      throw new PersistenceError(`Database metric row read failed: ${getErrorMessage(error)}`, {
        cause: error,
        context: { entityType, dateRange: range }
      });
    }
  }

  async getEntityStatuses(entityType: EntityType): Promise<Map<string, EntityStatus>> {
    try {
      const result = await this.pool.query<{ entity_id: string; status: EntityStatus }>(
        'SELECT entity_id, status FROM ad_entities WHERE entity_type = $1',
        [entityType]
      );
      return new Map(result.rows.map(record => [record.entity_id, record.status]));
    } catch (error) {
      throw new PersistenceError(`Database entity status read failed: ${getErrorMessage(error)}`, {
        cause: error,
        context: { entityType }
      });
    }
  }

  async getCheckpoint(entityType: EntityType): Promise<Checkpoint | null> {
    try {
      const result = await this.pool.query<CheckpointRecord>(
        `SELECT entity_type, last_processed_id, processed_count, total_count, status, cursor,
                to_char(range_start, 'YYYY-MM-DD') AS range_start,
                to_char(range_end, 'YYYY-MM-DD') AS range_end,
                error_message, updated_at
           FROM sync_checkpoints
          WHERE entity_type = $1`,
        [entityType]
      );

      const record = result.rows[0];
      if (!record) return null;

      return {
        entityType: record.entity_type,
        lastProcessedId: record.last_processed_id,
        processedCount: record.processed_count,
        totalCount: record.total_count,
        status: record.status,
        cursor: record.cursor,
        dateRange: record.range_start && record.range_end ? { start: record.range_start, end: record.range_end } : null,
        errorMessage: record.error_message,
        updatedAt: record.updated_at
      };
    } catch (error) {
      throw new PersistenceError(`Database checkpoint read failed: ${getErrorMessage(error)}`, {
        cause: error,
        context: { entityType }
      });
    }
  }

  async saveCheckpoint(checkpoint: Checkpoint): Promise<void> {
    await this.run('checkpoint upsert', buildCheckpointUpsert(checkpoint));
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

export default PostgresMetricsStore;
