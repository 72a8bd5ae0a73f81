import { CRLF, HeaderNames, HttpHeaders, HttpHeadersInit, mediaType } from './HttpHeaders';
import { RequestCookie, ResponseCookie, parseCookieHeader, parseSetCookieHeader } from './cookies';

export const DEFAULT_HTTP_VERSION = 'HTTP/1.1';

/**
 * Name/value pair taken from a query string or form body
 */
export interface HttpParameter {
  readonly name: string;
  readonly value: string;
}

export interface HttpRequestInit {
  method?: string;
  uri: string;
  version?: string;
  headers?: HttpHeadersInit;
  body?: Buffer | string;
}

export interface HttpResponseInit {
  version?: string;
  statusCode: number;
  reasonPhrase?: string;
  headers?: HttpHeadersInit;
  body?: Buffer | string;
}

function toBuffer(body: Buffer | string | undefined): Buffer {
  if (body === undefined) return Buffer.alloc(0);
  return typeof body === 'string' ? Buffer.from(body, 'utf8') : Buffer.from(body);
}

/**
 * Split `a=1&b=2` into raw pairs. Values are not decoded.
 */
export function splitParameters(query: string): HttpParameter[] {
  const params: HttpParameter[] = [];
  for (const part of query.split('&')) {
    if (!part) continue;
    const eq = part.indexOf('=');
    params.push(
      eq === -1 ? { name: part, value: '' } : { name: part.substring(0, eq), value: part.substring(eq + 1) }
    );
  }
  return params;
}

/**
 * Immutable HTTP request
 */
export class HttpRequest {
  readonly method: string;
  readonly uri: string;
  readonly version: string;
  readonly headers: HttpHeaders;
  readonly body: Buffer;

  constructor(init: HttpRequestInit) {
    this.method = (init.method ?? 'GET').toUpperCase();
    this.uri = init.uri;
    this.version = init.version ?? DEFAULT_HTTP_VERSION;
    this.headers = new HttpHeaders(init.headers);
    this.body = toBuffer(init.body);
    Object.freeze(this);
  }

  /**
   * Parsed uri, or null when it is not an absolute URL
   */
  get url(): URL | null {
    try {
      return new URL(this.uri);
    } catch {
      return null;
    }
  }

  /**
   * Raw query string without the leading `?`, empty when absent
   */
  get query(): string {
    const start = this.uri.indexOf('?');
    if (start === -1) return '';
    const end = this.uri.indexOf('#', start);
    return this.uri.substring(start + 1, end === -1 ? undefined : end);
  }

  get headerBlock(): string {
    return `${this.method} ${this.uri} ${this.version}${CRLF}${this.headers.toString()}${CRLF}`;
  }

  get contentType(): string | undefined {
    return this.headers.get(HeaderNames.CONTENT_TYPE);
  }

  getCookies(): RequestCookie[] {
    return this.headers.getAll(HeaderNames.COOKIE).flatMap((value) => parseCookieHeader(value));
  }

  /**
   * Query parameters as they appear in the uri
   */
  getUrlParams(): HttpParameter[] {
    return splitParameters(this.query);
  }

  /**
   * Decoded `application/x-www-form-urlencoded` body parameters
   */
  getFormParams(): HttpParameter[] {
    if (mediaType(this.contentType) !== 'application/x-www-form-urlencoded') {
      return [];
    }
    const params: HttpParameter[] = [];
    new URLSearchParams(this.bodyText()).forEach((value, name) => params.push({ name, value }));
    return params;
  }

  bodyText(): string {
    return this.body.toString('utf8');
  }
}

/**
 * Immutable HTTP response
 */
export class HttpResponse {
  readonly version: string;
  readonly statusCode: number;
  readonly reasonPhrase: string;
  readonly headers: HttpHeaders;
  readonly body: Buffer;

  constructor(init: HttpResponseInit) {
    this.version = init.version ?? DEFAULT_HTTP_VERSION;
    this.statusCode = init.statusCode;
    this.reasonPhrase = init.reasonPhrase ?? '';
    this.headers = new HttpHeaders(init.headers);
    this.body = toBuffer(init.body);
    Object.freeze(this);
  }

  get headerBlock(): string {
    return `${this.version} ${this.statusCode} ${this.reasonPhrase}${CRLF}${this.headers.toString()}${CRLF}`;
  }

  get contentType(): string | undefined {
    return this.headers.get(HeaderNames.CONTENT_TYPE);
  }

  get isHtml(): boolean {
    return mediaType(this.contentType).includes('html');
  }

  /**
   * True for textual content types. A missing content type counts as text.
   */
  get isText(): boolean {
    const type = mediaType(this.contentType);
    if (!type) return true;
    return (
      type.startsWith('text/') ||
      type.includes('json') ||
      type.includes('xml') ||
      type.includes('javascript') ||
      type.includes('ecmascript')
    );
  }

  get isJavaScript(): boolean {
    const type = mediaType(this.contentType);
    return type.includes('javascript') || type.includes('ecmascript');
  }

  get isSuccess(): boolean {
    return this.statusCode >= 200 && this.statusCode < 300;
  }

  getCookies(): ResponseCookie[] {
    const cookies: ResponseCookie[] = [];
    for (const value of this.headers.getAll(HeaderNames.SET_COOKIE)) {
      const cookie = parseSetCookieHeader(value);
      if (cookie) cookies.push(cookie);
    }
    return cookies;
  }

  bodyText(): string {
    return this.body.toString('utf8');
  }
}

/**
 * Request together with its response, once received
 */
export class HttpTransaction {
  readonly request: HttpRequest;
  readonly response?: HttpResponse;

  constructor(request: HttpRequest, response?: HttpResponse) {
    this.request = request;
    this.response = response;
    Object.freeze(this);
  }

  get method(): string {
    return this.request.method;
  }

  get uri(): string {
    return this.request.uri;
  }

  withResponse(response: HttpResponse): HttpTransaction {
    return new HttpTransaction(this.request, response);
  }
}
