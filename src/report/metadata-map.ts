/**
 * Copy-on-write keyed collection shared by EdgeMetadatas and NodeMetadatas.
 * Subclasses decide how two collections merge.
 */
export interface Copyable<V> {
  copy(): V;
}

/**
 * Entries a collection built itself and may keep without copying.
 */
export class OwnedEntries<V> {
  constructor(readonly map: Map<string, V>) {}
}

export abstract class MetadataMap<V extends Copyable<V>, Self extends MetadataMap<V, Self>>
  implements Iterable<[string, V]>
{
  protected readonly entries: Map<string, V>;

  // Values from callers are copied; the caller keeps no handle on stored values
  protected constructor(entries: Iterable<[string, V]> | OwnedEntries<V> = []) {
    this.entries = entries instanceof OwnedEntries
      ? entries.map
      : new Map(Array.from(entries, ([k, v]): [string, V] => [k, v.copy()]));
  }

  /**
   * Wrap a map built by this class, without copying it again.
   */
  protected abstract create(entries: Map<string, V>): Self;

  abstract merge(other: Self): Self;

  get size(): number {
    return this.entries.size;
  }

  get(key: string): V | undefined {
    return this.entries.get(key)?.copy();
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  /**
   * Deep copy: every value is copied as well.
   */
  copy(): Self {
    return this.create(new Map(this.copiedEntries()));
  }

  /**
   * A copy with value stored under key, replacing whatever was there.
   */
  with(key: string, value: V): Self {
    const entries = new Map(this.copiedEntries());
    entries.set(key, value.copy());
    return this.create(entries);
  }

  *[Symbol.iterator](): Iterator<[string, V]> {
    yield* this.copiedEntries();
  }

  protected *copiedEntries(): Generator<[string, V]> {
    for (const [k, v] of this.entries) {
      yield [k, v.copy()];
    }
  }
}
