import { IDList } from './id-list';

/**
 * Metadata a probe may collect about one node: free-form labels, event
 * counters and the IDs of nodes it has an edge towards.
 *
 * `metadata` is `null` only for a node whose label map was never
 * initialized; `Topology.validate` reports such nodes.
 */
export class NodeMetadata {
  constructor(
    readonly metadata: Map<string, string> | null = new Map(),
    readonly counters: Map<string, number> = new Map(),
    readonly adjacency: IDList = IDList.make()
  ) {}

  /**
   * New node metadata carrying the given labels and nothing else.
   */
  static make(labels: Record<string, string> = {}): NodeMetadata {
    return new NodeMetadata(new Map(Object.entries(labels)));
  }

  copy(): NodeMetadata {
    return new NodeMetadata(
      this.metadata === null ? null : new Map(this.metadata),
      new Map(this.counters),
      this.adjacency.copy()
    );
  }

  /**
   * Merge other into a copy of this node. Labels from other win on
   * conflict, counters are summed and adjacency is the union of both.
   */
  merge(other: NodeMetadata): NodeMetadata {
    let metadata: Map<string, string> | null = null;
    if (this.metadata !== null || other.metadata !== null) {
      metadata = new Map<string, string>(this.metadata);
      for (const [k, v] of other.metadata ?? new Map<string, string>()) {
        metadata.set(k, v); // other takes precedence
      }
    }

    const counters = new Map(this.counters);
    for (const [k, v] of other.counters) {
      counters.set(k, (this.counters.get(k) ?? 0) + v);
    }

    return new NodeMetadata(metadata, counters, this.adjacency.merge(other.adjacency));
  }

  withMetadata(metadata: Map<string, string> | null): NodeMetadata {
    return new NodeMetadata(
      metadata === null ? null : new Map(metadata),
      new Map(this.counters),
      this.adjacency.copy()
    );
  }

  withCounters(counters: Map<string, number>): NodeMetadata {
    const cp = this.copy();
    return new NodeMetadata(cp.metadata, new Map(counters), cp.adjacency);
  }

  withAdjacency(adjacency: IDList): NodeMetadata {
    const cp = this.copy();
    return new NodeMetadata(cp.metadata, cp.counters, adjacency.copy());
  }

  withAdjacent(id: string): NodeMetadata {
    const cp = this.copy();
    return new NodeMetadata(cp.metadata, cp.counters, cp.adjacency.add(id));
  }
}
