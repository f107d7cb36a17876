import { describe, it, expect } from 'vitest';
import MetaAdsClient from '@/extractors/meta/client';
import MetaEntitiesExtractor from '@/extractors/meta/entities';
import MetaAdsInsightsExtractor from '@/extractors/meta/insights';
import MetricsFetcher from '@/extractors/meta/fetcher';
import { MalformedDataError } from '@/utils/error-handler';
import { GraphRecord } from '@/extractors/meta/client';
import { noSleep } from '../../helpers/fake-axios';
import { graphApi, insight } from '../../helpers/graph-api';

const range = { start: '2024-01-01', end: '2024-01-02' };

function fetcherFor(insightPages: GraphRecord[][], tolerance = 0.1) {
  const transport = graphApi({
    entities: [{ id: 'A', name: 'Alpha', status: 'ACTIVE' }, { id: 'B', name: 'Beta', status: 'PAUSED' }],
    insightPages
  });
  const client = new MetaAdsClient({ accessToken: 'test-token', adAccountId: 'act_1', adapter: transport.adapter, sleep: noSleep });
  const fetcher = new MetricsFetcher(
    new MetaEntitiesExtractor(client),
    new MetaAdsInsightsExtractor(client, ['purchase']),
    tolerance
  );
  return { fetcher, calls: transport.calls };
}

describe('MetricsFetcher', () => {
  it('collects entities and every insights page', async () => {
    const { fetcher } = fetcherFor([
      [insight('A', '2024-01-01'), insight('B', '2024-01-01')],
      [insight('A', '2024-01-02', { spend: '2.50' })]
    ]);
    const seenPages: Array<[string | null, number]> = [];

    const result = await fetcher.fetch(
      { entityType: 'campaign', dateRange: range },
      { onPage: async page => { seenPages.push([page.nextCursor, page.rows.length]); } }
    );

    expect(result.entities.map(entity => [entity.id, entity.status])).toEqual([['A', 'ACTIVE'], ['B', 'PAUSED']]);
    expect(result.rows.map(row => [row.entityId, row.date, row.spendCents])).toEqual([
      ['A', '2024-01-01', 100],
      ['B', '2024-01-01', 100],
      ['A', '2024-01-02', 250]
    ]);
    expect(result.pageCount).toBe(2);
    expect(seenPages).toEqual([['1', 2], [null, 1]]);
  });

  it('requests daily rows at the entity level for the window', async () => {
    const { fetcher, calls } = fetcherFor([[]]);

    await fetcher.fetch({ entityType: 'campaign', dateRange: range });

    const insightsCall = calls.find(call => call.url === '/act_1/insights');
    expect(insightsCall?.params).toMatchObject({
      level: 'campaign',
      time_increment: 1,
      time_range: '{"since":"2024-01-01","until":"2024-01-02"}'
    });
  });

  it('skips duplicates and tolerated malformed rows', async () => {
    const rows = [
      ...Array.from({ length: 9 }, (_, i) => insight(`C${i}`, '2024-01-01')),
      insight('C0', '2024-01-01'),
      { campaign_id: 'X', date_start: 'yesterday' }
    ];
    const { fetcher } = fetcherFor([rows]);

    const result = await fetcher.fetch({ entityType: 'campaign', dateRange: range });

    expect(result.rows).toHaveLength(9);
    expect(result.rawCount).toBe(11);
    expect(result.duplicateCount).toBe(1);
    expect(result.malformedCount).toBe(1);
  });

  it('fails when too many records are malformed', async () => {
    const { fetcher } = fetcherFor([[insight('A', '2024-01-01'), { campaign_id: 'B' }]]);

    const error = await fetcher.fetch({ entityType: 'campaign', dateRange: range }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(MalformedDataError);
    expect(error).toMatchObject({
      message: '1 of 2 records were malformed, above the tolerance of 10.0%',
      context: { entityType: 'campaign', dateRange: range }
    });
  });

  it('stops at the first page past the tolerance without handing it on', async () => {
    const { fetcher, calls } = fetcherFor([
      [insight('A', '2024-01-01'), { campaign_id: 'B' }],
      [insight('C', '2024-01-02')]
    ]);
    const handedOn: number[] = [];

    const error = await fetcher
      .fetch({ entityType: 'campaign', dateRange: range }, { onPage: async page => { handedOn.push(page.rows.length); } })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(MalformedDataError);
    expect(error).toMatchObject({ context: { pageCount: 1 } });
    expect(handedOn).toEqual([]);
    expect(calls.filter(call => call.url === '/act_1/insights')).toHaveLength(1);
  });

  it('resumes insights from a cursor', async () => {
    const { fetcher, calls } = fetcherFor([[insight('A', '2024-01-01')], [insight('B', '2024-01-02')]]);

    const result = await fetcher.fetch({ entityType: 'campaign', dateRange: range }, { startCursor: '1' });

    expect(result.rows.map(row => row.entityId)).toEqual(['B']);
    expect(calls.filter(call => call.url === '/act_1/insights')).toHaveLength(1);
  });
});
