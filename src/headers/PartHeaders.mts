interface HeaderEntry {
  _name: string;
  _value: string;
}

/**
 * The headers of a single part.
 *
 * Lookups are case-insensitive. Iterating yields `[name, value]` pairs in the order they were
 * received, with the names in their original casing (so that they can be re-encoded as-is).
 * Use `entries()` for lower-cased names.
 */
export class PartHeaders implements Iterable<[string, string]> {
  /** @internal */ declare private readonly _entries: Map<string, HeaderEntry>;

  constructor(init?: Iterable<readonly [string, string]>) {
    this._entries = new Map();
    if (init) {
      for (const [name, value] of init) {
        this.append(name, value);
      }
    }
  }

  /**
   * Adds a header value. Repeated names are combined into a single comma-separated value.
   */
  append(name: string, value: string) {
    const key = name.toLowerCase();
    const existing = this._entries.get(key);
    if (existing) {
      existing._value += ', ' + value;
    } else {
      this._entries.set(key, { _name: name, _value: value });
    }
  }

  get(name: string): string | undefined {
    return this._entries.get(name.toLowerCase())?._value;
  }

  has(name: string): boolean {
    return this._entries.has(name.toLowerCase());
  }

  get size(): number {
    return this._entries.size;
  }

  keys(): IterableIterator<string> {
    return this._entries.keys();
  }

  *entries(): Generator<[string, string], void, undefined> {
    for (const [key, { _value }] of this._entries) {
      yield [key, _value];
    }
  }

  *rawEntries(): Generator<[string, string], void, undefined> {
    for (const { _name, _value } of this._entries.values()) {
      yield [_name, _value];
    }
  }

  [Symbol.iterator](): Iterator<[string, string], void, undefined> {
    return this.rawEntries();
  }
}
