/**
 * Tests for the report wire codec
 */
import { v4 as uuidv4 } from 'uuid';
import {
  decodeEdgeMetadata,
  decodeReport,
  decodeTopology,
  encodeEdgeMetadata,
  encodeReport,
  encodeTopology,
} from '../../src/report/codec';
import { EdgeMetadata } from '../../src/report/edge-metadata';
import { NodeMetadata } from '../../src/report/node-metadata';
import { Topology } from '../../src/report/topology';
import { SchemaValidationError } from '../../src/utils/schema-validator';

describe('codec', () => {
  describe('edge metadata', () => {
    it('should encode only measured counters', () => {
      const wire = encodeEdgeMetadata(new EdgeMetadata({ egressPacketCount: 0n, maxConnCountTCP: 2n }));

      expect(wire).toEqual({ egress_packet_count: 0, max_conn_count_tcp: 2 });
    });

    it('should encode large counters as strings', () => {
      const wire = encodeEdgeMetadata(new EdgeMetadata({ ingressByteCount: 2n ** 63n }));

      expect(wire).toEqual({ ingress_byte_count: '9223372036854775808' });
    });

    it('should decode numbers and strings', () => {
      const emd = decodeEdgeMetadata({ egress_byte_count: 12, ingress_byte_count: '18446744073709551615' });

      expect(emd).toEqual(new EdgeMetadata({ egressByteCount: 12n, ingressByteCount: 18446744073709551615n }));
    });

    it('should reject counters outside 64 bits', () => {
      expect(() => decodeEdgeMetadata({ egress_byte_count: '18446744073709551616' }, '/e'))
        .toThrow(SchemaValidationError);
    });
  });

  describe('topology', () => {
    it('should encode nodes and edges', () => {
      const t = Topology.make()
        .withNode('A', NodeMetadata.make({ role: 'web' }).withCounters(new Map([['conns', 2]])).withAdjacent('B'))
        .withNode('B', NodeMetadata.make().withMetadata(null))
        .withEdge('A', 'B', new EdgeMetadata({ egressPacketCount: 5n }));

      expect(encodeTopology(t)).toEqual({
        edge_metadatas: {
          'A|B': { egress_packet_count: 5 },
        },
        node_metadatas: {
          A: { metadata: { role: 'web' }, counters: { conns: 2 }, adjacency: ['B'] },
          B: { metadata: null, counters: {}, adjacency: [] },
        },
      });
    });

    it('should decode what it encodes', () => {
      const t = Topology.make()
        .withNode('A', NodeMetadata.make({ role: 'web' }).withAdjacent('B'))
        .withNode('B', NodeMetadata.make())
        .withEdge('A', 'B', new EdgeMetadata({ egressPacketCount: 5n, maxConnCountTCP: 1n }));

      expect(decodeTopology(encodeTopology(t))).toEqual(t);
    });

    it('should keep IDs that collide with object prototype keys', () => {
      const t = Topology.make()
        .withNode('__proto__', NodeMetadata.make({ role: 'web' }).withAdjacent('constructor'))
        .withNode('constructor', NodeMetadata.make())
        .withEdge('__proto__', 'constructor', new EdgeMetadata({ egressPacketCount: 1n }));

      const wire = encodeTopology(t);

      expect(t.validate()).toBeNull();
      expect(Object.keys(wire.node_metadatas).sort()).toEqual(['__proto__', 'constructor']);
      expect(Object.keys(wire.edge_metadatas)).toEqual(['__proto__|constructor']);
      expect(decodeTopology(wire)).toEqual(t);
    });

    it('should default missing counters and adjacency', () => {
      const t = decodeTopology({ edge_metadatas: {}, node_metadatas: { A: { metadata: {} } } });

      expect(t.nodeMetadatas.get('A')).toEqual(NodeMetadata.make());
    });
  });

  describe('report', () => {
    it('should validate and decode a report message', () => {
      const reportId = uuidv4();
      const report = decodeReport({
        report_id: reportId,
        probe_id: 'probe-1',
        timestamp: '2026-10-19T12:00:00.000Z',
        topology: {
          edge_metadatas: { 'A|B': { egress_packet_count: 3 } },
          node_metadatas: { A: { metadata: {}, adjacency: ['B'] }, B: { metadata: {} } },
        },
      });

      expect(report.reportId).toBe(reportId);
      expect(report.probeId).toBe('probe-1');
      expect(report.timestamp.getTime()).toBe(Date.parse('2026-10-19T12:00:00.000Z'));
      expect(report.topology.edgeMetadatas.get('A|B')?.egressPacketCount).toBe(3n);
      expect(report.topology.validate()).toBeNull();
      expect(encodeReport(report).timestamp).toBe('2026-10-19T12:00:00.000Z');
    });

    it('should reject malformed messages', () => {
      expect(() => decodeReport({ report_id: 'nope' })).toThrow(SchemaValidationError);
    });
  });
});
