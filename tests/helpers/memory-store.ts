import { MetricsStore } from '@/loaders/metrics-store';
import { PersistenceError } from '@/utils/error-handler';
import { Checkpoint, DateRange, Entity, EntityStatus, EntityType, MetricRow } from '@/utils/types';

/** MetricsStore kept in maps, with switchable failures. */
export class InMemoryMetricsStore implements MetricsStore {
  entities = new Map<string, Entity>();
  rows = new Map<string, MetricRow>();
  checkpoints = new Map<EntityType, Checkpoint>();
  checkpointHistory: Checkpoint[] = [];
  failRowWrites = false;
  failEntityWrites = false;
  closed = false;

  async upsertEntities(entities: Entity[]): Promise<number> {
    if (this.failEntityWrites) {
      throw new PersistenceError('entity write refused');
    }
    for (const entity of entities) {
      this.entities.set(`${entity.entityType}:${entity.id}`, { ...entity });
    }
    return entities.length;
  }

  async upsertMetricRows(rows: MetricRow[]): Promise<number> {
    if (this.failRowWrites) {
      throw new PersistenceError('row write refused');
    }
    for (const row of rows) {
      this.rows.set(`${row.entityId}:${row.date}`, { ...row });
    }
    return rows.length;
  }

  async listMetricRows(entityType: EntityType, range: DateRange): Promise<MetricRow[]> {
    return [...this.rows.values()]
      .filter(row => row.entityType === entityType && row.date >= range.start && row.date <= range.end)
      .sort((a, b) => (a.date + a.entityId).localeCompare(b.date + b.entityId));
  }

  async getEntityStatuses(entityType: EntityType): Promise<Map<string, EntityStatus>> {
    const statuses = new Map<string, EntityStatus>();
    for (const entity of this.entities.values()) {
      if (entity.entityType === entityType) {
        statuses.set(entity.id, entity.status);
      }
    }
    return statuses;
  }

  async getCheckpoint(entityType: EntityType): Promise<Checkpoint | null> {
    const checkpoint = this.checkpoints.get(entityType);
    return checkpoint ? { ...checkpoint } : null;
  }

  async saveCheckpoint(checkpoint: Checkpoint): Promise<void> {
    this.checkpoints.set(checkpoint.entityType, { ...checkpoint });
    this.checkpointHistory.push({ ...checkpoint });
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
