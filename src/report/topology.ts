/**
 * Topology - one view of a network
 *
 * A topology pairs metadata about directed edges with metadata about nodes.
 * Edges also appear in the adjacency list of their source node; keeping the
 * two in step is up to whoever builds the topology, and `validate` checks it.
 *
 * Topologies are values. Every operation returns a new topology and leaves
 * its receiver and arguments untouched, so one instance can be shared freely
 * between callers without locking.
 */
import { EdgeMetadata } from './edge-metadata';
import { EdgeMetadatas } from './edge-metadatas';
import { TopologyValidationError } from './errors';
import { IDCodec, defaultIDCodec, makeEdgeID } from './id';
import { NodeMetadata } from './node-metadata';
import { NodeMetadatas } from './node-metadatas';

export interface ValidateOptions {
  codec?: IDCodec;
  /**
   * Also require edge metadata for every adjacency entry, not only an
   * adjacency entry for every edge.
   */
  requireEdgeMetadata?: boolean;
}

export class Topology {
  constructor(
    readonly edgeMetadatas: EdgeMetadatas = new EdgeMetadatas(),
    readonly nodeMetadatas: NodeMetadatas = new NodeMetadatas()
  ) {}

  static make(): Topology {
    return new Topology();
  }

  /**
   * A copy of this topology with nmd stored under nodeID. If a node already
   * exists there, the stored value is `nmd.merge(existing)`: the existing
   * labels win on conflict, and counters and adjacency accumulate.
   */
  withNode(nodeID: string, nmd: NodeMetadata): Topology {
    const existing = this.nodeMetadatas.get(nodeID);
    const node = existing === undefined ? nmd : nmd.merge(existing);
    return new Topology(this.edgeMetadatas.copy(), this.nodeMetadatas.with(nodeID, node));
  }

  /**
   * A copy of this topology with edge metadata for src -> dst merged in.
   * Adjacency is left alone; pair this with `withNode` and
   * `NodeMetadata.withAdjacent` on the source node.
   */
  withEdge(src: string, dst: string, emd: EdgeMetadata): Topology {
    const edgeID = makeEdgeID(src, dst);
    const existing = this.edgeMetadatas.get(edgeID);
    const edge = existing === undefined ? emd : existing.merge(emd);
    return new Topology(this.edgeMetadatas.with(edgeID, edge), this.nodeMetadatas.copy());
  }

  copy(): Topology {
    return new Topology(this.edgeMetadatas.copy(), this.nodeMetadatas.copy());
  }

  merge(other: Topology): Topology {
    return new Topology(
      this.edgeMetadatas.merge(other.edgeMetadatas),
      this.nodeMetadatas.merge(other.nodeMetadatas)
    );
  }

  /**
   * Check the topology for inconsistencies. Returns null when there are
   * none, otherwise a single error listing all of them, in key order.
   */
  validate(options: ValidateOptions = {}): TopologyValidationError | null {
    const codec = options.codec ?? defaultIDCodec;
    const violations: string[] = [];

    // Every edge must start at a known node that lists the destination
    for (const edgeID of this.edgeMetadatas.keys().sort()) {
      const endpoints = codec.parseEdgeID(edgeID);
      if (endpoints === null) {
        violations.push(`invalid edge ID "${edgeID}"`);
        continue;
      }
      const src = this.nodeMetadatas.get(endpoints.src);
      if (src === undefined) {
        violations.push(`node "${endpoints.src}" metadata missing for edge "${edgeID}"`);
      } else if (!src.adjacency.contains(endpoints.dst)) {
        violations.push(`node "${endpoints.src}" adjacency missing "${endpoints.dst}" for edge "${edgeID}"`);
      }
    }

    for (const nodeID of this.nodeMetadatas.keys().sort()) {
      const nmd = this.nodeMetadatas.get(nodeID);
      if (nmd === undefined) {
        continue;
      }
      if (nmd.metadata === null) {
        violations.push(`node "${nodeID}" has no metadata map`);
      }
      if (codec.parseNodeID(nodeID) === null) {
        violations.push(`invalid node ID "${nodeID}"`);
      }
      for (const dst of nmd.adjacency) {
        if (!this.nodeMetadatas.has(dst)) {
          violations.push(`node metadata missing for adjacency "${nodeID}" -> "${dst}"`);
        }
        if (options.requireEdgeMetadata && !this.edgeMetadatas.has(makeEdgeID(nodeID, dst))) {
          violations.push(`edge metadata missing for adjacency "${nodeID}" -> "${dst}"`);
        }
      }
    }

    return violations.length > 0 ? new TopologyValidationError(violations) : null;
  }
}
