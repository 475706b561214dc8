import { OrderedItem } from '../../../../src/types/pagination';
import { filterByCursor } from '../../../../src/utils/pagination/boundaryFilter';

const a: OrderedItem = { sortKey: null, tieBreakId: 'a' };
const b: OrderedItem = { sortKey: '2025-01-01', tieBreakId: 'b' };
const c: OrderedItem = { sortKey: '2025-01-01', tieBreakId: 'c' };
const d: OrderedItem = { sortKey: '2025-02-01', tieBreakId: 'd' };

describe('filterByCursor', () => {
  it('keeps only items strictly after the cursor going forward', () => {
    expect(filterByCursor([a, b, c, d], { sortKey: '2025-01-01', id: 'b' }, 'next')).toEqual([c, d]);
  });

  it('keeps only items strictly before the cursor going backward', () => {
    expect(filterByCursor([d, c, b, a], { sortKey: '2025-01-01', id: 'c' }, 'prev')).toEqual([b, a]);
  });

  it('handles a cursor with a null sort key', () => {
    expect(filterByCursor([a, b, c, d], { sortKey: null, id: 'a' }, 'next')).toEqual([b, c, d]);
    expect(filterByCursor([a, b, c, d], { sortKey: null, id: 'a' }, 'prev')).toEqual([]);
  });

  it('keeps items after the cursor in a descending feed going forward', () => {
    expect(filterByCursor([d, c, b, a], { sortKey: '2025-01-01', id: 'c' }, 'next', 'desc')).toEqual([b, a]);
  });

  it('keeps items before the cursor in a descending feed going backward', () => {
    expect(filterByCursor([a, b, c, d], { sortKey: '2025-01-01', id: 'c' }, 'prev', 'desc')).toEqual([d]);
  });

  it('is idempotent', () => {
    const cursor = { sortKey: '2025-01-01', id: 'b' };
    const once = filterByCursor([a, b, c, d], cursor, 'next');
    expect(filterByCursor(once, cursor, 'next')).toEqual(once);
  });

  it('leaves its input untouched', () => {
    const input = [a, b, c, d];
    filterByCursor(input, { sortKey: '2025-01-01', id: 'c' }, 'next');
    expect(input).toEqual([a, b, c, d]);
  });
});
