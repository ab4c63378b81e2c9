/**
 * Sorted, duplicate-free list of node IDs. Instances are never modified;
 * `add` and `merge` return new lists.
 */
export class IDList implements Iterable<string> {
  private constructor(private readonly ids: readonly string[]) {}

  static make(...ids: string[]): IDList {
    return new IDList(Array.from(new Set(ids)).sort(compare));
  }

  get size(): number {
    return this.ids.length;
  }

  /**
   * Add an ID. Adding one that is already present returns an equal list.
   */
  add(id: string): IDList {
    const idx = this.search(id);
    if (idx < this.ids.length && this.ids[idx] === id) {
      return this.copy();
    }
    const next = this.ids.slice();
    next.splice(idx, 0, id);
    return new IDList(next);
  }

  contains(id: string): boolean {
    const idx = this.search(id);
    return idx < this.ids.length && this.ids[idx] === id;
  }

  copy(): IDList {
    return new IDList(this.ids.slice());
  }

  /**
   * Union of both lists, kept sorted.
   */
  merge(other: IDList): IDList {
    const out: string[] = [];
    let i = 0;
    let j = 0;
    while (i < this.ids.length && j < other.ids.length) {
      const a = this.ids[i];
      const b = other.ids[j];
      if (a === b) {
        out.push(a);
        i++;
        j++;
      } else if (a < b) {
        out.push(a);
        i++;
      } else {
        out.push(b);
        j++;
      }
    }
    return new IDList(out.concat(this.ids.slice(i), other.ids.slice(j)));
  }

  toArray(): string[] {
    return this.ids.slice();
  }

  [Symbol.iterator](): Iterator<string> {
    return this.ids[Symbol.iterator]();
  }

  // Index of the first element not less than id
  private search(id: string): number {
    let lo = 0;
    let hi = this.ids.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.ids[mid] < id) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo;
  }
}

function compare(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}
