import { EdgeMetadata } from './edge-metadata';
import { MetadataMap, OwnedEntries } from './metadata-map';

/**
 * Metadata about each edge in a topology, keyed by edge ID.
 */
export class EdgeMetadatas extends MetadataMap<EdgeMetadata, EdgeMetadatas> {
  constructor(entries: Iterable<[string, EdgeMetadata]> | OwnedEntries<EdgeMetadata> = []) {
    super(entries);
  }

  protected create(entries: Map<string, EdgeMetadata>): EdgeMetadatas {
    return new EdgeMetadatas(new OwnedEntries(entries));
  }

  /**
   * Deep merge: every edge in other is merged into the matching edge here,
   * or into an empty edge when there is none. Neither side is modified.
   */
  merge(other: EdgeMetadatas): EdgeMetadatas {
    const out = new Map(this.copiedEntries());
    for (const [k, v] of other.entries) {
      out.set(k, (out.get(k) ?? new EdgeMetadata()).merge(v));
    }
    return this.create(out);
  }
}
