/**
 * Case-insensitive header mapping that keeps insertion order.
 *
 * Header order is part of a client's fingerprint, so the first spelling and
 * position of a name are kept when its value is later replaced.
 */
export class HeaderMap implements Iterable<[string, string]> {
  private entries_ = new Map<string, { name: string; value: string }>();

  constructor(init?: HeaderInit) {
    if (init) {
      this.update(init);
    }
  }

  get size(): number {
    return this.entries_.size;
  }

  get(name: string): string | undefined {
    return this.entries_.get(name.toLowerCase())?.value;
  }

  has(name: string): boolean {
    return this.entries_.has(name.toLowerCase());
  }

  set(name: string, value: string): this {
    const key = name.toLowerCase();
    const existing = this.entries_.get(key);
    if (existing) {
      existing.value = value;
    } else {
      this.entries_.set(key, { name, value });
    }
    return this;
  }

  delete(name: string): boolean {
    return this.entries_.delete(name.toLowerCase());
  }

  clear(): void {
    this.entries_.clear();
  }

  /**
   * Merge headers in, keeping positions of names already present
   */
  update(headers: HeaderInit): this {
    for (const [name, value] of toPairs(headers)) {
      this.set(name, value);
    }
    return this;
  }

  /**
   * Drop everything and take these headers, in their order
   */
  replace(headers: HeaderInit): this {
    this.clear();
    return this.update(headers);
  }

  /**
   * Reorder so names listed in `order` come first, in that order
   */
  reorder(order: readonly string[]): this {
    const next = new Map<string, { name: string; value: string }>();
    for (const name of order) {
      const key = name.toLowerCase();
      const entry = this.entries_.get(key);
      if (entry) {
        next.set(key, entry);
      }
    }
    for (const [key, entry] of this.entries_) {
      if (!next.has(key)) {
        next.set(key, entry);
      }
    }
    this.entries_ = next;
    return this;
  }

  clone(): HeaderMap {
    return new HeaderMap(this);
  }

  *[Symbol.iterator](): IterableIterator<[string, string]> {
    for (const { name, value } of this.entries_.values()) {
      yield [name, value];
    }
  }

  toRecord(): Record<string, string> {
    return Object.fromEntries(this);
  }

  toJSON(): Record<string, string> {
    return this.toRecord();
  }
}

export type HeaderInit = Record<string, string> | HeaderMap | Array<[string, string]>;

function toPairs(headers: HeaderInit): Iterable<[string, string]> {
  if (headers instanceof HeaderMap || Array.isArray(headers)) {
    return headers;
  }
  return Object.entries(headers);
}
