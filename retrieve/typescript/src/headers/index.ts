/**
 * Case-insensitive HTTP header map.
 *
 * Keys are looked up case-insensitively. Each key remembers the casing of its
 * last write, which is what `keys()`, `toObject()` and serialization show.
 * Keys keep the position of their first insertion.
 */

interface HeaderEntry {
  /** Casing of the last write. */
  name: string;
  /** Values in arrival order. */
  values: string[];
}

export type HeaderInit =
  | HeaderMap
  | Record<string, string | readonly string[]>
  | Iterable<readonly [string, string]>;

export class HeaderMap implements Iterable<[string, string]> {
  private readonly store = new Map<string, HeaderEntry>();

  constructor(init?: HeaderInit) {
    if (init === undefined) {
      return;
    }
    if (init instanceof HeaderMap) {
      for (const [name, value] of init.lines()) {
        this.append(name, value);
      }
    } else if (isIterable(init)) {
      for (const [name, value] of init) {
        this.append(name, value);
      }
    } else {
      for (const [name, value] of Object.entries(init)) {
        this.set(name, value);
      }
    }
  }

  /**
   * Returns the value for `name`, joining repeated fields with ", ".
   */
  get(name: string): string | undefined {
    const entry = this.store.get(normalize(name));
    return entry ? entry.values.join(', ') : undefined;
  }

  /**
   * Returns every value received for `name`.
   */
  getAll(name: string): string[] {
    return [...(this.store.get(normalize(name))?.values ?? [])];
  }

  has(name: string): boolean {
    return this.store.has(normalize(name));
  }

  /**
   * Replaces all values for `name`.
   */
  set(name: string, value: string | readonly string[]): this {
    const key = normalize(name);
    const values = typeof value === 'string' ? [value] : [...value];
    const existing = this.store.get(key);
    if (existing) {
      existing.name = name;
      existing.values = values;
    } else {
      this.store.set(key, { name, values });
    }
    return this;
  }

  /**
   * Adds a value for `name`, keeping any earlier ones.
   */
  append(name: string, value: string): this {
    const key = normalize(name);
    const existing = this.store.get(key);
    if (existing) {
      existing.name = name;
      existing.values.push(value);
    } else {
      this.store.set(key, { name, values: [value] });
    }
    return this;
  }

  delete(name: string): boolean {
    return this.store.delete(normalize(name));
  }

  get size(): number {
    return this.store.size;
  }

  /**
   * Header names with their display casing.
   */
  keys(): string[] {
    return [...this.store.values()].map((entry) => entry.name);
  }

  /**
   * One `[name, value]` pair per header line.
   */
  lines(): Array<[string, string]> {
    const result: Array<[string, string]> = [];
    for (const entry of this.store.values()) {
      for (const value of entry.values) {
        result.push([entry.name, value]);
      }
    }
    return result;
  }

  *[Symbol.iterator](): Iterator<[string, string]> {
    for (const entry of this.store.values()) {
      yield [entry.name, entry.values.join(', ')];
    }
  }

  toObject(): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [name, value] of this) {
      result[name] = value;
    }
    return result;
  }

  toJSON(): Record<string, string> {
    return this.toObject();
  }

  toString(): string {
    return JSON.stringify(this.toObject());
  }
}

function normalize(name: string): string {
  return name.toLowerCase();
}

function isIterable(value: object): value is Iterable<readonly [string, string]> {
  return Symbol.iterator in value;
}
