import { HeaderNames, HttpHeaders } from '../core/http/HttpHeaders';
import { HttpTransaction } from '../core/http/HttpMessage';
import { Initiator } from '../types/enums';
import { globalLogger, Logger } from '../utils/logger/Logger';
import { isRelevantToAuthDiagnostics } from './relevance';

/**
 * Receives one transcript block per relevant transaction
 */
export interface DiagnosticSink {
  log(block: string): void;
}

export const FAKE_USERNAME = 'FakeUserName@example.com';
export const FAKE_PASSWORD = 'F4keP4ssw0rd';
export const JSON_PARSE_FAILURE = '<<Failed to parse JSON>>';

interface SanitizationState {
  readonly hosts: Map<string, string>;
  readonly tokens: Map<string, string>;
  nextHostId: number;
  nextTokenId: number;
}

/**
 * Builds sanitized transcripts of proxied traffic so login problems can be shared
 * without leaking hosts, tokens or credentials. Pseudonyms are stable for the
 * lifetime of the collector, until `reset()`.
 */
export class AuthDiagnosticCollector {
  private readonly logger: Logger;
  private readonly state: SanitizationState = {
    hosts: new Map(),
    tokens: new Map(),
    nextHostId: 0,
    nextTokenId: 0,
  };
  private enabled = false;
  private sink: DiagnosticSink | null = null;
  private username: string | null = null;
  private password: string | null = null;

  constructor(logger: Logger = globalLogger) {
    this.logger = logger.child('AuthDiagnostics');
  }

  setSink(sink: DiagnosticSink | null): void {
    this.sink = sink;
  }

  setCredentials(username?: string, password?: string): void {
    this.username = username || null;
    this.password = password || null;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Disabling also forgets the credentials and every pseudonym handed out so far
   */
  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
    if (!enabled) {
      this.username = null;
      this.password = null;
      this.reset();
    }
  }

  reset(): void {
    this.guarded((state) => {
      state.hosts.clear();
      state.tokens.clear();
      state.nextHostId = 0;
      state.nextTokenId = 0;
    });
  }

  onResponseReceived(tx: HttpTransaction, initiator: Initiator): void {
    const sink = this.sink;
    if (!this.enabled || !sink || initiator !== Initiator.PROXY || !tx.response) {
      return;
    }
    if (!isRelevantToAuthDiagnostics(tx)) {
      this.logger.debug(`Skipping ${tx.uri}`);
      return;
    }

    sink.log(this.transcript(tx));
  }

  getSanitizedHost(host: string): string {
    return this.guarded((state) => {
      let pseudonym = state.hosts.get(host);
      if (pseudonym === undefined) {
        pseudonym = `https://example${state.nextHostId++}/`;
        state.hosts.set(host, pseudonym);
      }
      return pseudonym;
    });
  }

  getSanitizedToken(token: string): string {
    if (this.username !== null && token === this.username) {
      return FAKE_USERNAME;
    }
    if (this.password !== null && token === this.password) {
      return FAKE_PASSWORD;
    }
    return this.guarded((state) => {
      let pseudonym = state.tokens.get(token);
      if (pseudonym === undefined) {
        pseudonym = `sanitizedtoken${state.nextTokenId++}`;
        state.tokens.set(token, pseudonym);
      }
      return pseudonym;
    });
  }

  /**
   * Single entry point to the pseudonym maps. Regions are synchronous, so each one
   * runs to completion before another can start.
   */
  private guarded<T>(region: (state: SanitizationState) => T): T {
    return region(this.state);
  }

  private transcript(tx: HttpTransaction): string {
    const { request } = tx;
    const lines: string[] = ['>>>>>\n'];

    const url = request.url;
    const host = this.getSanitizedHost(url ? url.host : '');
    const path = url ? url.pathname.replace(/^\//, '') : '';
    lines.push(`${request.method} ${host}${path}\n`);

    lines.push(...exactHeaders(request.headers, HeaderNames.CONTENT_TYPE));
    lines.push(...this.sanitizedAuthorization(request.headers));
    for (const cookie of request.getCookies()) {
      lines.push(`${HeaderNames.COOKIE}: ${cookie.name}=${this.getSanitizedToken(cookie.value)}\n`);
    }
    if (isJson(request.contentType)) {
      lines.push(this.sanitizedJsonBlock(request.bodyText()));
    } else if (request.method === 'POST') {
      const params = [...request.getFormParams()].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
      if (params.length > 0) {
        lines.push(`\n${params.map((p) => `${p.name}=${this.getSanitizedToken(p.value)}&`).join('')}\n`);
      }
    }

    const response = tx.response;
    if (response) {
      lines.push('<<<\n');
      lines.push(`${response.version} ${response.statusCode} ${response.reasonPhrase}\n`);
      lines.push(...exactHeaders(response.headers, HeaderNames.CONTENT_TYPE));
      lines.push(...this.sanitizedAuthorization(response.headers));
      for (const cookie of response.getCookies()) {
        const domain = cookie.domain ? `; Domain=${this.getSanitizedHost(cookie.domain)}` : '';
        lines.push(`${HeaderNames.SET_COOKIE}: ${cookie.name}=${this.getSanitizedToken(cookie.value)}${domain}\n`);
      }
      if (isJson(response.contentType)) {
        lines.push(this.sanitizedJsonBlock(response.bodyText()));
      }
    }

    return lines.join('');
  }

  private sanitizedAuthorization(headers: HttpHeaders): string[] {
    return headers.getAll(HeaderNames.AUTHORIZATION).map((value) => {
      if (!value.toLowerCase().startsWith('bearer')) {
        return `${HeaderNames.AUTHORIZATION}: ${this.getSanitizedToken(value)}\n`;
      }
      let offset = value.indexOf(' ');
      if (offset === -1) {
        offset = value.indexOf(':');
      }
      if (offset === -1) {
        return `${HeaderNames.AUTHORIZATION}: ${this.getSanitizedToken(value)}\n`;
      }
      const token = this.getSanitizedToken(value.substring(offset + 1));
      return `${HeaderNames.AUTHORIZATION}: ${value.substring(0, offset)} ${token}\n`;
    });
  }

  private sanitizedJsonBlock(body: string): string {
    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch (error) {
      this.logger.debug(`Body is not valid JSON: ${error}`);
      return `\n${JSON_PARSE_FAILURE}\n`;
    }
    if (parsed === null || typeof parsed !== 'object') {
      return `\n${JSON_PARSE_FAILURE}\n`;
    }
    return `\n${JSON.stringify(this.sanitizeJson(parsed))}\n`;
  }

  private sanitizeJson(value: unknown): unknown {
    if (typeof value === 'string') {
      return this.getSanitizedToken(value);
    }
    if (Array.isArray(value)) {
      return value.map((item: unknown) => this.sanitizeJson(item));
    }
    if (value !== null && typeof value === 'object') {
      // fromEntries defines own properties, so a `__proto__` key stays a key
      return Object.fromEntries(
        Object.entries(value).map(([key, child]: [string, unknown]) => [key, this.sanitizeJson(child)])
      );
    }
    return value;
  }
}

function exactHeaders(headers: HttpHeaders, name: string): string[] {
  return headers.getAll(name).map((value) => `${name}: ${value}\n`);
}

function isJson(contentType: string | undefined): boolean {
  return (contentType ?? '').toLowerCase().includes('json');
}
