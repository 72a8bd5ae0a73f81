/**
 * A single header line
 */
export interface HttpHeaderField {
  readonly name: string;
  readonly value: string;
}

export type HttpHeadersInit = HttpHeaders | readonly HttpHeaderField[] | Record<string, string>;

export const CRLF = '\r\n';

/**
 * Well known header names
 */
export const HeaderNames = {
  ACCESS_CONTROL_ALLOW_ORIGIN: 'Access-Control-Allow-Origin',
  AUTHORIZATION: 'Authorization',
  CONTENT_TYPE: 'Content-Type',
  COOKIE: 'Cookie',
  HOST: 'Host',
  LOCATION: 'Location',
  SET_COOKIE: 'Set-Cookie',
  X_FRAME_OPTIONS: 'X-Frame-Options',
} as const;

/**
 * Ordered, immutable header list with case-insensitive lookups.
 * Duplicate names are kept in their original order.
 */
export class HttpHeaders implements Iterable<HttpHeaderField> {
  private readonly fields: readonly HttpHeaderField[];

  constructor(init: HttpHeadersInit = []) {
    if (init instanceof HttpHeaders) {
      this.fields = init.fields;
    } else if (isFieldList(init)) {
      this.fields = Object.freeze(init.map((f) => Object.freeze({ name: f.name, value: f.value })));
    } else {
      this.fields = Object.freeze(
        Object.entries(init).map(([name, value]) => Object.freeze({ name, value }))
      );
    }
  }

  get size(): number {
    return this.fields.length;
  }

  /**
   * First value for the header, or undefined when absent
   */
  get(name: string): string | undefined {
    const lower = name.toLowerCase();
    return this.fields.find((f) => f.name.toLowerCase() === lower)?.value;
  }

  getAll(name: string): string[] {
    const lower = name.toLowerCase();
    return this.fields.filter((f) => f.name.toLowerCase() === lower).map((f) => f.value);
  }

  has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  entries(): readonly HttpHeaderField[] {
    return this.fields;
  }

  /**
   * New header list with the field appended
   */
  with(name: string, value: string): HttpHeaders {
    return new HttpHeaders([...this.fields, { name, value }]);
  }

  /**
   * New header list where every field with this name is replaced by a single one
   */
  set(name: string, value: string): HttpHeaders {
    return this.without(name).with(name, value);
  }

  without(name: string): HttpHeaders {
    const lower = name.toLowerCase();
    return new HttpHeaders(this.fields.filter((f) => f.name.toLowerCase() !== lower));
  }

  [Symbol.iterator](): Iterator<HttpHeaderField> {
    return this.fields[Symbol.iterator]();
  }

  /**
   * Header lines in wire format, each terminated by CRLF
   */
  toString(): string {
    return this.fields.map((f) => `${f.name}: ${f.value}${CRLF}`).join('');
  }
}

/**
 * Lower-cased media type of a Content-Type value, without parameters
 */
export function mediaType(contentType: string | undefined): string {
  if (!contentType) return '';
  return contentType.split(';')[0].trim().toLowerCase();
}

function isFieldList(value: HttpHeadersInit): value is readonly HttpHeaderField[] {
  return Array.isArray(value);
}
