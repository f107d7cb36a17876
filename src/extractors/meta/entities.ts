import MetaAdsClient, { GraphRecord } from './client';
import { parseBudgetAmount, parseDateTime, readString } from './fields';
import logger from '@/utils/logger';
import { getErrorMessage } from '@/utils/error-handler';
import { Account, Entity, EntityStatus, EntityType } from '@/utils/types';

const EDGES: Record<EntityType, string> = {
  campaign: 'campaigns',
  adset: 'adsets',
  ad: 'ads'
};

const FIELDS: Record<EntityType, string[]> = {
  campaign: ['id', 'name', 'status', 'daily_budget', 'lifetime_budget', 'created_time', 'updated_time'],
  adset: ['id', 'name', 'status', 'campaign_id', 'daily_budget', 'lifetime_budget', 'created_time', 'updated_time'],
  ad: ['id', 'name', 'status', 'adset_id', 'campaign_id', 'created_time', 'updated_time']
};

export function normalizeStatus(status: string | null): EntityStatus {
  switch (status?.toUpperCase()) {
    case 'ACTIVE':
      return 'ACTIVE';
    case 'PAUSED':
      return 'PAUSED';
    case 'DELETED':
      return 'DELETED';
    case 'ARCHIVED':
      return 'ARCHIVED';
    default:
      return 'UNKNOWN';
  }
}

export function transformEntity(record: GraphRecord, entityType: EntityType): Entity | null {
  const id = readString(record, 'id');
  if (!id) {
    return null;
  }

  return {
    id,
    entityType,
    name: readString(record, 'name') ?? id,
    status: normalizeStatus(readString(record, 'status')),
    dailyBudgetCents: parseBudgetAmount(record.daily_budget),
    lifetimeBudgetCents: parseBudgetAmount(record.lifetime_budget),
    createdTime: parseDateTime(record.created_time),
    updatedTime: parseDateTime(record.updated_time)
  };
}

export class MetaEntitiesExtractor {
  constructor(
    private client: MetaAdsClient,
    private pageSize: number = 100
  ) {}

  async extractEntities(entityType: EntityType): Promise<Entity[]> {
    try {
      logger.info(`Starting Meta ${entityType} extraction`);

      const entities: Entity[] = [];
      const seen = new Set<string>();
      const endpoint = `/${this.client.adAccountId}/${EDGES[entityType]}`;

      for await (const page of this.client.paginate(endpoint, {
        fields: FIELDS[entityType].join(','),
        limit: this.pageSize
      })) {
        for (const record of page.data) {
          const entity = transformEntity(record, entityType);

          if (!entity) {
            logger.warn(`Skipping Meta ${entityType} without an id`, { record });
            continue;
          }
          if (seen.has(entity.id)) {
            continue;
          }

          seen.add(entity.id);
          entities.push(entity);
        }
      }

      logger.info(`Extracted ${entities.length} Meta ${entityType} entities`);
      return entities;

    } catch (error) {
      logger.error(`Meta ${entityType} extraction failed`, { error: getErrorMessage(error) });
      throw error;
    }
  }

  /** The ad account itself: its currency and reporting time zone. */
  async extractAccount(): Promise<Account> {
    return this.client.getAccount();
  }
}

export default MetaEntitiesExtractor;
