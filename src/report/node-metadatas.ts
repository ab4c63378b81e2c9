import { MetadataMap, OwnedEntries } from './metadata-map';
import { NodeMetadata } from './node-metadata';

/**
 * Metadata about each node in a topology, keyed by node ID.
 */
export class NodeMetadatas extends MetadataMap<NodeMetadata, NodeMetadatas> {
  constructor(entries: Iterable<[string, NodeMetadata]> | OwnedEntries<NodeMetadata> = []) {
    super(entries);
  }

  protected create(entries: Map<string, NodeMetadata>): NodeMetadatas {
    return new NodeMetadatas(new OwnedEntries(entries));
  }

  /**
   * Add the nodes of other that this collection lacks. Nodes already present
   * here are kept exactly as they are: this does not call
   * `NodeMetadata.merge`, so conflicting labels from other are dropped and
   * counters are not summed.
   */
  merge(other: NodeMetadatas): NodeMetadatas {
    const out = new Map(this.copiedEntries());
    for (const [k, v] of other.entries) {
      if (!out.has(k)) {
        // don't overwrite
        out.set(k, v.copy());
      }
    }
    return this.create(out);
  }
}
