/**
 * Public entry point for the topology merge library
 */
export { OptionalCounter, Reducer, WireCounter, sum, max, mergeCounter, parseCounter, formatCounter } from './report/numeric';
export {
  IDCodec,
  EdgeEndpoints,
  NodeIDParts,
  EDGE_DELIMITER,
  SCOPE_DELIMITER,
  defaultIDCodec,
  makeEdgeID,
  makeNodeID,
  parseEdgeID,
  parseNodeID,
} from './report/id';
export { IDList } from './report/id-list';
export { EdgeMetadata, EdgeMetadataFields } from './report/edge-metadata';
export { NodeMetadata } from './report/node-metadata';
export { EdgeMetadatas } from './report/edge-metadatas';
export { NodeMetadatas } from './report/node-metadatas';
export { Topology, ValidateOptions } from './report/topology';
export { TopologyValidationError } from './report/errors';
export {
  Report,
  decodeReport,
  encodeReport,
  decodeTopology,
  encodeTopology,
  decodeEdgeMetadata,
  encodeEdgeMetadata,
  decodeNodeMetadata,
  encodeNodeMetadata,
} from './report/codec';
export { ReportCollector, AddStatus } from './collector';
export { SchemaValidationError, ValidationError, validateReportMessage } from './utils/schema-validator';
export { getMetrics } from './metrics/metrics';
export * from './types/report.v1';
