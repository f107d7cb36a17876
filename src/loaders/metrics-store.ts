import { Checkpoint, DateRange, Entity, EntityStatus, EntityType, MetricRow } from '@/utils/types';

/**
 * Relational store behind the pipeline. Every write is an upsert: a second
 * write of the same key replaces all non-key fields.
 */
export interface MetricsStore {
  /** Keyed by (entity type, entity id). */
  upsertEntities(entities: Entity[]): Promise<number>;
  /** Keyed by (entity id, date). */
  upsertMetricRows(rows: MetricRow[]): Promise<number>;
  listMetricRows(entityType: EntityType, range: DateRange): Promise<MetricRow[]>;
  /** Last stored status of every entity of the type. */
  getEntityStatuses(entityType: EntityType): Promise<Map<string, EntityStatus>>;
  getCheckpoint(entityType: EntityType): Promise<Checkpoint | null>;
  /** Keyed by entity type. */
  saveCheckpoint(checkpoint: Checkpoint): Promise<void>;
  close(): Promise<void>;
}
