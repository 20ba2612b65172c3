export const ACCEPT_ENCODING = 'Accept-Encoding';
export const CONTENT_ENCODING = 'Content-Encoding';

type HeaderRecordValue = string | number | readonly string[] | undefined;

// Node's IncomingHttpHeaders and OutgoingHttpHeaders both fit in there.
export type HeaderRecord = Readonly<Record<string, HeaderRecordValue>>;

/**
 * A minimal multi-valued header map. Names are case-insensitive and keep the
 * casing they were first inserted with.
 */
export class Headers implements Iterable<[name: string, values: string[]]> {
  #entries = new Map<string, { name: string; values: string[] }>();

  static from(record: HeaderRecord): Headers {
    let headers = new Headers();
    for (let [name, value] of Object.entries(record)) {
      if (value === undefined) continue;
      if (typeof value === 'string' || typeof value === 'number') {
        headers.append(name, String(value));
      } else {
        for (let v of value) headers.append(name, v);
      }
    }
    return headers;
  }

  /**
   * Returns every occurrence of the header, in insertion order, or undefined
   * if the header was never set.
   */
  get(name: string): string[] | undefined {
    let entry = this.#entries.get(name.toLowerCase());
    return entry == null ? undefined : [...entry.values];
  }

  has(name: string) {
    return this.#entries.has(name.toLowerCase());
  }

  /**
   * Sets a header, replacing any existing occurrence.
   */
  insert(name: string, value: string | readonly string[]) {
    this.#entries.set(name.toLowerCase(), {
      name,
      values: typeof value === 'string' ? [value] : [...value],
    });
    return this;
  }

  append(name: string, value: string) {
    let entry = this.#entries.get(name.toLowerCase());
    if (entry == null) {
      return this.insert(name, value);
    }
    entry.values.push(value);
    return this;
  }

  remove(name: string) {
    return this.#entries.delete(name.toLowerCase());
  }

  *[Symbol.iterator](): IterableIterator<[name: string, values: string[]]> {
    for (let { name, values } of this.#entries.values()) {
      yield [name, [...values]];
    }
  }

  toRecord(): Record<string, string> {
    let record: Record<string, string> = {};
    for (let [name, values] of this) {
      record[name] = values.join(', ');
    }
    return record;
  }
}
