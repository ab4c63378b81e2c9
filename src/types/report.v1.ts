/* Type definitions for the report wire format (report.v1.schema.json) */

/**
 * Counter as sent on the wire: an integer, or a decimal string for values
 * too large for a JSON number.
 */
export type CounterV1 = number | string;

export interface EdgeMetadataV1 {
  egress_packet_count?: CounterV1;
  ingress_packet_count?: CounterV1;
  egress_byte_count?: CounterV1;
  ingress_byte_count?: CounterV1;
  max_conn_count_tcp?: CounterV1;
}

export interface NodeMetadataV1 {
  /**
   * Free-form labels; null when the probe never initialized them
   */
  metadata: Record<string, string> | null;
  counters?: Record<string, number>;
  /**
   * IDs of nodes this node has an edge towards
   */
  adjacency?: string[];
}

export interface TopologyV1 {
  /**
   * Keyed by edge ID ("<src>|<dst>")
   */
  edge_metadatas: Record<string, EdgeMetadataV1>;
  node_metadatas: Record<string, NodeMetadataV1>;
}

export interface ReportV1 {
  /**
   * UUID minted by the probe; retries reuse it
   */
  report_id: string;
  probe_id: string;
  /**
   * ISO 8601 time the snapshot was taken
   */
  timestamp: string;
  topology: TopologyV1;
}
