import { createCursorCodec } from '../../../src/utils/cursorUtils';

function rawToken(payload: unknown): string {
  return Buffer.from(JSON.stringify(payload), 'utf-8').toString('base64url');
}

describe('cursorUtils', () => {
  describe('unsigned tokens', () => {
    const cursors = createCursorCodec();

    it('encodes the sort key and id as base64url JSON', () => {
      const token = cursors.encode({ sortKey: '2025-01-01', id: 'b' });
      expect(token).toBe(rawToken({ sortKey: '2025-01-01', id: 'b' }));
      expect(token).toMatch(/^[A-Za-z0-9_-]+$/);
    });

    it('decodes what it encodes, including null, numeric and boolean keys', () => {
      expect(cursors.decode(cursors.encode({ sortKey: '2025-03-04T18:30:00.000Z', id: 'evt_1' }))).toEqual({
        sortKey: '2025-03-04T18:30:00.000Z',
        id: 'evt_1',
      });
      expect(cursors.decode(cursors.encode({ sortKey: null, id: 'a' }))).toEqual({ sortKey: null, id: 'a' });
      expect(cursors.decode(cursors.encode({ sortKey: 42, id: 'n' }))).toEqual({ sortKey: 42, id: 'n' });
      expect(cursors.decode(cursors.encode({ sortKey: false, id: 'f' }))).toEqual({ sortKey: false, id: 'f' });
    });

    it('keeps timestamp keys as seconds and nanoseconds', () => {
      const token = cursors.encode({ sortKey: { seconds: 1741113000, nanoseconds: 500 }, id: 'evt_2' });

      expect(cursors.decode(token)).toEqual({ sortKey: { seconds: 1741113000, nanoseconds: 500 }, id: 'evt_2' });
    });

    it('returns null for missing or empty tokens', () => {
      expect(cursors.decode(undefined)).toBeNull();
      expect(cursors.decode(null)).toBeNull();
      expect(cursors.decode('')).toBeNull();
    });

    it('returns null for tokens that are not cursor JSON', () => {
      expect(cursors.decode('not a cursor!!')).toBeNull();
      expect(cursors.decode(rawToken(['2025-01-01', 'b']))).toBeNull();
      expect(cursors.decode(rawToken({ sortKey: '2025-01-01' }))).toBeNull();
      expect(cursors.decode(rawToken({ id: 'b' }))).toBeNull();
      expect(cursors.decode(rawToken({ sortKey: '2025-01-01', id: '' }))).toBeNull();
      expect(cursors.decode(rawToken({ sortKey: { nested: true }, id: 'b' }))).toBeNull();
      expect(cursors.decode(rawToken({ sortKey: '2025-01-01', id: 7 }))).toBeNull();
    });

    it('returns null for malformed timestamp keys', () => {
      expect(cursors.decode(rawToken({ sortKey: { seconds: 1.5, nanoseconds: 0 }, id: 'b' }))).toBeNull();
      expect(cursors.decode(rawToken({ sortKey: { seconds: 10, nanoseconds: -1 }, id: 'b' }))).toBeNull();
      expect(cursors.decode(rawToken({ sortKey: { seconds: 10, nanoseconds: 1e9 }, id: 'b' }))).toBeNull();
      expect(cursors.decode(rawToken({ sortKey: { seconds: '10', nanoseconds: 0 }, id: 'b' }))).toBeNull();
      expect(cursors.decode(rawToken({ sortKey: [10, 0], id: 'b' }))).toBeNull();
    });
  });

  describe('signed tokens', () => {
    const codec = createCursorCodec({ secret: 'test-secret' });

    it('round-trips a cursor through a payload.tag token', () => {
      const token = codec.encode({ sortKey: '2025-01-01', id: 'b' });
      expect(token.split('.')).toHaveLength(2);
      expect(codec.decode(token)).toEqual({ sortKey: '2025-01-01', id: 'b' });
    });

    it('rejects a payload paired with another payload tag', () => {
      const token = codec.encode({ sortKey: '2025-01-01', id: 'b' });
      const tag = token.split('.')[1];
      const forged = `${rawToken({ sortKey: '2025-01-01', id: 'z' })}.${tag}`;
      expect(codec.decode(forged)).toBeNull();
    });

    it('rejects unsigned tokens and tokens signed with another secret', () => {
      expect(codec.decode(rawToken({ sortKey: '2025-01-01', id: 'b' }))).toBeNull();

      const other = createCursorCodec({ secret: 'other-secret' });
      expect(codec.decode(other.encode({ sortKey: '2025-01-01', id: 'b' }))).toBeNull();
    });

    it('treats an empty secret as no signing', () => {
      const plain = createCursorCodec({ secret: '' });
      expect(plain.encode({ sortKey: null, id: 'a' })).toBe(rawToken({ sortKey: null, id: 'a' }));
    });
  });
});
