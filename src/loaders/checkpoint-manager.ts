import { MetricsStore } from './metrics-store';
import logger from '@/utils/logger';
import { CheckpointStateError, SyncInProgressError, getErrorMessage } from '@/utils/error-handler';
import { Checkpoint, CheckpointStatus, DateRange, EntityType } from '@/utils/types';

export interface CheckpointProgress {
  /** Rows stored from the page. */
  rowCount: number;
  /** Records received from the page, valid or not. */
  rawCount: number;
  lastProcessedId: string | null;
  /** Cursor of the next page; null once the stream is exhausted. */
  nextCursor: string | null;
}

export interface BeginResult {
  checkpoint: Checkpoint;
  /** Set when an interrupted run for the same window left a cursor behind. */
  resumeCursor: string | null;
}

function sameRange(a: DateRange | null, b: DateRange): boolean {
  return a !== null && a.start === b.start && a.end === b.end;
}

/**
 * Sync state machine for one entity type:
 * PENDING -> IN_PROGRESS -> COMPLETE | FAILED.
 */
export class CheckpointManager {
  private current: Checkpoint | null = null;

  constructor(
    private store: MetricsStore,
    private staleMinutes: number = 60,
    private now: () => Date = () => new Date()
  ) {}

  get checkpoint(): Checkpoint | null {
    return this.current;
  }

  async begin(entityType: EntityType, dateRange: DateRange): Promise<BeginResult> {
    if (this.current && this.current.status === 'IN_PROGRESS') {
      throw new CheckpointStateError('A sync cycle is already running on this manager', { entityType });
    }

    const existing = await this.store.getCheckpoint(entityType);

    if (existing && existing.status === 'IN_PROGRESS') {
      const ageMs = this.now().getTime() - existing.updatedAt.getTime();
      if (ageMs < this.staleMinutes * 60_000) {
        throw new SyncInProgressError(entityType, existing.updatedAt);
      }
      logger.warn('Taking over stale checkpoint', {
        entityType,
        lastUpdate: existing.updatedAt.toISOString(),
        staleMinutes: this.staleMinutes
      });
    }

    const resumable = existing !== null
      && existing.status !== 'COMPLETE'
      && existing.cursor !== null
      && sameRange(existing.dateRange, dateRange);

    if (resumable && existing) {
      logger.info('Resuming interrupted sync', {
        entityType,
        cursor: existing.cursor,
        processedCount: existing.processedCount
      });
      await this.write({ ...existing, status: 'IN_PROGRESS', errorMessage: null });
    } else {
      await this.write({
        entityType,
        lastProcessedId: null,
        processedCount: 0,
        totalCount: 0,
        status: 'PENDING',
        cursor: null,
        dateRange,
        errorMessage: null,
        updatedAt: this.now()
      });
      await this.transition(['PENDING'], 'IN_PROGRESS');
    }

    const checkpoint = this.require();
    return { checkpoint, resumeCursor: resumable ? checkpoint.cursor : null };
  }

  async progress(page: CheckpointProgress): Promise<Checkpoint> {
    const checkpoint = this.require();
    if (checkpoint.status !== 'IN_PROGRESS') {
      throw new CheckpointStateError(`Cannot record progress on a ${checkpoint.status} checkpoint`, {
        entityType: checkpoint.entityType
      });
    }

    await this.write({
      ...checkpoint,
      processedCount: checkpoint.processedCount + page.rowCount,
      totalCount: checkpoint.totalCount + page.rawCount,
      lastProcessedId: page.lastProcessedId ?? checkpoint.lastProcessedId,
      cursor: page.nextCursor
    });
    return this.require();
  }

  async complete(): Promise<Checkpoint> {
    await this.transition(['IN_PROGRESS'], 'COMPLETE', { cursor: null });
    const checkpoint = this.require();
    logger.info('Checkpoint complete', {
      entityType: checkpoint.entityType,
      processedCount: checkpoint.processedCount,
      totalCount: checkpoint.totalCount
    });
    return checkpoint;
  }

  async fail(error: unknown): Promise<Checkpoint> {
    await this.transition(['PENDING', 'IN_PROGRESS'], 'FAILED', { errorMessage: getErrorMessage(error) });
    return this.require();
  }

  private require(): Checkpoint {
    if (!this.current) {
      throw new CheckpointStateError('No sync cycle has begun');
    }
    return this.current;
  }

  private async transition(
    from: CheckpointStatus[],
    to: CheckpointStatus,
    changes: Partial<Pick<Checkpoint, 'cursor' | 'errorMessage'>> = {}
  ): Promise<void> {
    const checkpoint = this.require();
    if (!from.includes(checkpoint.status)) {
      throw new CheckpointStateError(`Illegal checkpoint transition ${checkpoint.status} -> ${to}`, {
        entityType: checkpoint.entityType
      });
    }
    await this.write({ ...checkpoint, ...changes, status: to });
  }

  private async write(checkpoint: Checkpoint): Promise<void> {
    const next = { ...checkpoint, updatedAt: this.now() };
    await this.store.saveCheckpoint(next);
    this.current = next;
    logger.debug('Checkpoint saved', {
      entityType: next.entityType,
      status: next.status,
      processedCount: next.processedCount,
      cursor: next.cursor
    });
  }
}

export default CheckpointManager;
