/**
 * @spanwise/tracing - Carrier
 * Case-insensitive header views used by propagators
 */

/**
 * Read/write access to a set of headers
 */
export interface Carrier {
  /** Get a header value; lookup ignores case */
  get(name: string): string | undefined;
  /** Set a header value, replacing any existing value */
  set(name: string, value: string): void;
  /** Header names present in the carrier */
  keys(): string[];
}

/** Plain header object, e.g. Node's `IncomingHttpHeaders` */
export type HeaderRecord = Record<string, string | string[] | undefined>;

/**
 * Carrier over a Fetch API `Headers` instance
 */
export class HeadersCarrier implements Carrier {
  constructor(private readonly headers: Headers) {}

  get(name: string): string | undefined {
    return this.headers.get(name) ?? undefined;
  }

  set(name: string, value: string): void {
    this.headers.set(name, value);
  }

  keys(): string[] {
    return Array.from(this.headers.keys());
  }
}

/**
 * Carrier over a plain header object.
 * Array values yield their first entry.
 */
export class RecordCarrier implements Carrier {
  constructor(private readonly record: HeaderRecord) {}

  get(name: string): string | undefined {
    const key = this.findKey(name);
    if (key === undefined) return undefined;

    const value = this.record[key];
    return Array.isArray(value) ? value[0] : value;
  }

  set(name: string, value: string): void {
    const existing = this.findKey(name);
    if (existing !== undefined) {
      delete this.record[existing];
    }
    this.record[name.toLowerCase()] = value;
  }

  keys(): string[] {
    return Object.keys(this.record).filter((key) => this.record[key] !== undefined);
  }

  private findKey(name: string): string | undefined {
    const lower = name.toLowerCase();
    return Object.keys(this.record).find((key) => key.toLowerCase() === lower);
  }
}

/**
 * Wrap headers in the matching carrier
 */
export function toCarrier(headers: Headers | HeaderRecord): Carrier {
  return headers instanceof Headers ? new HeadersCarrier(headers) : new RecordCarrier(headers);
}
