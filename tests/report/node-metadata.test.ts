/**
 * Tests for NodeMetadata
 */
import { IDList } from '../../src/report/id-list';
import { NodeMetadata } from '../../src/report/node-metadata';

describe('NodeMetadata', () => {
  describe('make', () => {
    it('should start with the given labels and nothing else', () => {
      const nmd = NodeMetadata.make({ role: 'db' });

      expect(nmd.metadata).toEqual(new Map([['role', 'db']]));
      expect(nmd.counters.size).toBe(0);
      expect(nmd.adjacency.size).toBe(0);
    });
  });

  describe('merge', () => {
    it('should let the other side win on conflicting labels', () => {
      const a = NodeMetadata.make({ x: '1', keep: 'yes' });
      const b = NodeMetadata.make({ x: '2' });

      expect(a.merge(b).metadata).toEqual(new Map([['x', '2'], ['keep', 'yes']]));
    });

    it('should sum counters', () => {
      const a = NodeMetadata.make().withCounters(new Map([['conns', 3], ['only_a', 1]]));
      const b = NodeMetadata.make().withCounters(new Map([['conns', 4], ['only_b', 2]]));

      expect(a.merge(b).counters).toEqual(new Map([['conns', 7], ['only_a', 1], ['only_b', 2]]));
    });

    it('should union adjacency', () => {
      const a = NodeMetadata.make().withAdjacency(IDList.make('B', 'C'));
      const b = NodeMetadata.make().withAdjacency(IDList.make('C', 'D'));

      expect(a.merge(b).adjacency.toArray()).toEqual(['B', 'C', 'D']);
    });

    it('should stay uninitialized only when both label maps are', () => {
      const none = NodeMetadata.make().withMetadata(null);

      expect(none.merge(none).metadata).toBeNull();
      expect(none.merge(NodeMetadata.make({ a: 'b' })).metadata).toEqual(new Map([['a', 'b']]));
      expect(NodeMetadata.make({ a: 'b' }).merge(none).metadata).toEqual(new Map([['a', 'b']]));
    });

    it('should not modify either operand', () => {
      const a = NodeMetadata.make({ x: '1' }).withCounters(new Map([['n', 1]]));
      const b = NodeMetadata.make({ x: '2' }).withCounters(new Map([['n', 1]])).withAdjacent('B');

      a.merge(b);

      expect(a.metadata).toEqual(new Map([['x', '1']]));
      expect(a.counters.get('n')).toBe(1);
      expect(a.adjacency.size).toBe(0);
      expect(b.counters.get('n')).toBe(1);
    });
  });

  describe('copy', () => {
    it('should deep copy labels, counters and adjacency', () => {
      const original = NodeMetadata.make({ x: '1' }).withCounters(new Map([['n', 1]])).withAdjacent('B');
      const cp = original.copy();

      cp.metadata?.set('x', '9');
      cp.counters.set('n', 99);

      expect(cp.adjacency).not.toBe(original.adjacency);
      expect(original.metadata?.get('x')).toBe('1');
      expect(original.counters.get('n')).toBe(1);
      expect(original.adjacency.toArray()).toEqual(['B']);
    });

    it('should keep an uninitialized label map uninitialized', () => {
      expect(NodeMetadata.make().withMetadata(null).copy().metadata).toBeNull();
    });
  });

  describe('with*', () => {
    it('should replace one field and copy the supplied value', () => {
      const labels = new Map([['role', 'web']]);
      const nmd = NodeMetadata.make({ role: 'db' }).withMetadata(labels);
      labels.set('role', 'changed');

      expect(nmd.metadata?.get('role')).toBe('web');
    });

    it('should add a single adjacent ID idempotently', () => {
      const base = NodeMetadata.make();
      const once = base.withAdjacent('B');
      const twice = once.withAdjacent('B');

      expect(base.adjacency.size).toBe(0);
      expect(once.adjacency.toArray()).toEqual(['B']);
      expect(twice).toEqual(once);
    });

    it('should keep the other fields when replacing counters', () => {
      const nmd = NodeMetadata.make({ a: 'b' }).withAdjacent('B').withCounters(new Map([['n', 2]]));

      expect(nmd.metadata).toEqual(new Map([['a', 'b']]));
      expect(nmd.adjacency.toArray()).toEqual(['B']);
      expect(nmd.counters.get('n')).toBe(2);
    });
  });
});
