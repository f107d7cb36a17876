import { Router, Request, Response } from 'express';
import { asyncHandler } from '@/api/middleware/error-handler';
import { MetricsStore } from '@/loaders/metrics-store';
import { ValidationError } from '@/utils/error-handler';
import { ENTITY_TYPES } from '@/utils/types';

export function createCheckpointsRouter(store: MetricsStore | null): Router {
  const router = Router();

  // Get the sync checkpoint for an entity type
  router.get('/checkpoints/:entityType', asyncHandler(async (req: Request, res: Response) => {
    const entityType = ENTITY_TYPES.find(type => type === req.params.entityType);
    if (!entityType) {
      throw new ValidationError(
        `Invalid entity type "${req.params.entityType}". Must be one of: ${ENTITY_TYPES.join(', ')}`
      );
    }

    if (!store) {
      res.status(503).json({
        success: false,
        error: 'Checkpoint store is not configured'
      });
      return;
    }

    const checkpoint = await store.getCheckpoint(entityType);
    if (!checkpoint) {
      res.status(404).json({
        success: false,
        error: `No checkpoint recorded for ${entityType}`
      });
      return;
    }

    res.json({
      success: true,
      checkpoint: {
        ...checkpoint,
        updatedAt: checkpoint.updatedAt.toISOString()
      }
    });
  }));

  return router;
}

export default createCheckpointsRouter;
