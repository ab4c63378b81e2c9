/**
 * Conversion between topologies and their JSON wire form.
 */
import { EdgeMetadata, EdgeMetadataFields } from './edge-metadata';
import { EdgeMetadatas } from './edge-metadatas';
import { IDList } from './id-list';
import { NodeMetadata } from './node-metadata';
import { NodeMetadatas } from './node-metadatas';
import { OptionalCounter, formatCounter, parseCounter } from './numeric';
import { Topology } from './topology';
import { CounterV1, EdgeMetadataV1, NodeMetadataV1, ReportV1, TopologyV1 } from '../types/report.v1';
import { SchemaValidationError, validateReportMessage } from '../utils/schema-validator';

export interface Report {
  reportId: string;
  probeId: string;
  timestamp: Date;
  topology: Topology;
}

// Wire field name for each EdgeMetadata counter
const EDGE_FIELDS = [
  ['egressPacketCount', 'egress_packet_count'],
  ['ingressPacketCount', 'ingress_packet_count'],
  ['egressByteCount', 'egress_byte_count'],
  ['ingressByteCount', 'ingress_byte_count'],
  ['maxConnCountTCP', 'max_conn_count_tcp'],
] as const;

export function encodeEdgeMetadata(emd: EdgeMetadata): EdgeMetadataV1 {
  const out: EdgeMetadataV1 = {};
  for (const [field, wire] of EDGE_FIELDS) {
    const value = emd[field];
    if (value !== undefined) {
      out[wire] = formatCounter(value);
    }
  }
  return out;
}

export function decodeEdgeMetadata(wire: EdgeMetadataV1, path = ''): EdgeMetadata {
  const fields: EdgeMetadataFields = {};
  for (const [field, name] of EDGE_FIELDS) {
    fields[field] = decodeCounter(wire[name], `${path}/${name}`);
  }
  return new EdgeMetadata(fields);
}

function decodeCounter(value: CounterV1 | undefined, path: string): OptionalCounter {
  if (value === undefined) {
    return undefined;
  }
  const parsed = parseCounter(value);
  if (parsed === undefined) {
    throw new SchemaValidationError('Invalid counter', [
      { path, message: `${value} is not an unsigned 64-bit integer` },
    ]);
  }
  return parsed;
}

export function encodeNodeMetadata(nmd: NodeMetadata): NodeMetadataV1 {
  return {
    metadata: nmd.metadata === null ? null : Object.fromEntries(nmd.metadata),
    counters: Object.fromEntries(nmd.counters),
    adjacency: nmd.adjacency.toArray(),
  };
}

export function decodeNodeMetadata(wire: NodeMetadataV1): NodeMetadata {
  return new NodeMetadata(
    wire.metadata === null ? null : new Map(Object.entries(wire.metadata)),
    new Map(Object.entries(wire.counters ?? {})),
    IDList.make(...(wire.adjacency ?? []))
  );
}

export function encodeTopology(t: Topology): TopologyV1 {
  return {
    edge_metadatas: Object.fromEntries(Array.from(t.edgeMetadatas, ([id, emd]): [string, EdgeMetadataV1] => [id, encodeEdgeMetadata(emd)])),
    node_metadatas: Object.fromEntries(Array.from(t.nodeMetadatas, ([id, nmd]): [string, NodeMetadataV1] => [id, encodeNodeMetadata(nmd)])),
  };
}

export function decodeTopology(wire: TopologyV1): Topology {
  const edges = Object.entries(wire.edge_metadatas).map(
    ([id, emd]): [string, EdgeMetadata] => [id, decodeEdgeMetadata(emd, `/topology/edge_metadatas/${id}`)]
  );
  const nodes = Object.entries(wire.node_metadatas).map(
    ([id, nmd]): [string, NodeMetadata] => [id, decodeNodeMetadata(nmd)]
  );
  return new Topology(new EdgeMetadatas(edges), new NodeMetadatas(nodes));
}

/**
 * Validate an incoming report message and decode it.
 * @throws SchemaValidationError when the message does not match the schema
 */
export function decodeReport(message: unknown): Report {
  const wire = validateReportMessage(message);
  return {
    reportId: wire.report_id,
    probeId: wire.probe_id,
    timestamp: new Date(wire.timestamp),
    topology: decodeTopology(wire.topology),
  };
}

export function encodeReport(report: Report): ReportV1 {
  return {
    report_id: report.reportId,
    probe_id: report.probeId,
    timestamp: report.timestamp.toISOString(),
    topology: encodeTopology(report.topology),
  };
}
