import { FeedSource, MAX_SCAN_LIMIT, feedOrder, fetchCandidates, overFetchLimit } from '../../../src/repository/pageFetcher';
import { DocumentScanner, OrderedItem, RawRecord, SortOrder } from '../../../src/types/pagination';

interface NamedItem extends OrderedItem {
  name: string;
}

function makeSource(records: RawRecord[], sortOrder?: SortOrder) {
  const scan = jest.fn<ReturnType<DocumentScanner['scan']>, Parameters<DocumentScanner['scan']>>();
  scan.mockResolvedValue(records);
  const source: FeedSource<NamedItem> = {
    name: 'things',
    scanner: { scan },
    sortField: 'rank',
    sortOrder,
    toItem: (record) => ({
      sortKey: record.sortKey,
      tieBreakId: record.id,
      name: `thing-${record.id}`,
    }),
  };
  return { source, scan };
}

function ranked(id: string, rank: number): RawRecord {
  return { id, data: { rank }, sortKey: rank };
}

describe('overFetchLimit', () => {
  it('asks for one extra item without a cursor', () => {
    expect(overFetchLimit(12, false)).toBe(13);
    expect(overFetchLimit(100, false)).toBe(101);
  });

  it('asks for three pages worth with a cursor, capped at the scan limit', () => {
    expect(overFetchLimit(2, true)).toBe(6);
    expect(overFetchLimit(12, true)).toBe(36);
    expect(overFetchLimit(50, true)).toBe(MAX_SCAN_LIMIT);
  });

  it('never asks for fewer than pageSize + 1 with a cursor', () => {
    expect(overFetchLimit(100, true)).toBe(101);
  });
});

describe('feedOrder', () => {
  it('defaults to ascending', () => {
    expect(feedOrder(makeSource([]).source)).toBe('asc');
    expect(feedOrder(makeSource([], 'desc').source)).toBe('desc');
  });
});

describe('fetchCandidates', () => {
  it('scans ascending from the start for a first forward page', async () => {
    const { source, scan } = makeSource([ranked('a', 1)]);

    const items = await fetchCandidates(source, [], null, 'next', 13);

    expect(scan).toHaveBeenCalledWith([], { field: 'rank', order: 'asc' }, null, 13);
    expect(items).toEqual([{ sortKey: 1, tieBreakId: 'a', name: 'thing-a' }]);
  });

  it('scans descending from the cursor for a backward page', async () => {
    const filters = [{ kind: 'equals' as const, field: 'kind', value: 'x' }];
    const { source, scan } = makeSource([]);

    await fetchCandidates(source, filters, { sortKey: 7, id: 'g' }, 'prev', 36);

    expect(scan).toHaveBeenCalledWith(filters, { field: 'rank', order: 'desc' }, { sortKey: 7, tieBreakId: 'g' }, 36);
  });

  it('scans a descending feed descending forward and ascending backward', async () => {
    const { source, scan } = makeSource([], 'desc');

    await fetchCandidates(source, [], null, 'next', 13);
    await fetchCandidates(source, [], { sortKey: 7, id: 'g' }, 'prev', 36);

    expect(scan).toHaveBeenNthCalledWith(1, [], { field: 'rank', order: 'desc' }, null, 13);
    expect(scan).toHaveBeenNthCalledWith(2, [], { field: 'rank', order: 'asc' }, { sortKey: 7, tieBreakId: 'g' }, 36);
  });

  it('takes the sort key the store read, not the display data', async () => {
    const { source } = makeSource([{ id: 'a', data: { rank: 'shown as text' }, sortKey: 3 }]);

    const items = await fetchCandidates(source, [], null, 'next', 2);

    expect(items).toEqual([{ sortKey: 3, tieBreakId: 'a', name: 'thing-a' }]);
  });

  it('keeps at most limit records even if the store returns more', async () => {
    const { source } = makeSource([
      ranked('a', 1),
      ranked('b', 2),
      ranked('c', 3),
    ]);

    const items = await fetchCandidates(source, [], null, 'next', 2);

    expect(items.map((i) => i.tieBreakId)).toEqual(['a', 'b']);
  });

  it('lets scanner failures propagate', async () => {
    const { source, scan } = makeSource([]);
    scan.mockRejectedValueOnce(new Error('boom'));

    await expect(fetchCandidates(source, [], null, 'next', 2)).rejects.toThrow('boom');
  });
});
