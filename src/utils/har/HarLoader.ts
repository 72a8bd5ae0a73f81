import * as fs from 'fs';

import { HttpHeaderField } from '../../core/http/HttpHeaders';
import { DEFAULT_HTTP_VERSION, HttpRequest, HttpResponse, HttpTransaction } from '../../core/http/HttpMessage';

/**
 * Subset of the HAR 1.2 entry format read by the loader
 */
export interface HarEntry {
  request: {
    method: string;
    url: string;
    httpVersion: string;
    headers: HttpHeaderField[];
    postData?: { mimeType?: string; text?: string };
  };
  response: {
    status: number;
    statusText: string;
    httpVersion: string;
    headers: HttpHeaderField[];
    content: { mimeType?: string; text?: string; encoding?: string };
  };
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(obj: JsonObject, key: string, fallback = ''): string {
  const value = obj[key];
  return typeof value === 'string' ? value : fallback;
}

function readHeaders(value: unknown): HttpHeaderField[] {
  if (!Array.isArray(value)) return [];
  const headers: HttpHeaderField[] = [];
  for (const item of value) {
    if (!isObject(item)) continue;
    const name = stringField(item, 'name');
    // HTTP/2 pseudo headers have no HTTP/1.1 equivalent
    if (!name || name.startsWith(':')) continue;
    headers.push({ name, value: stringField(item, 'value') });
  }
  return headers;
}

function httpVersion(value: string): string {
  const upper = value.toUpperCase();
  if (upper.startsWith('HTTP/')) return upper;
  if (upper === 'H2' || upper === 'H3') return `HTTP/${upper.substring(1)}`;
  return DEFAULT_HTTP_VERSION;
}

/**
 * Turns one HAR entry into a transaction. Entries recorded without a response (status 0)
 * keep only their request.
 */
export function harEntryToTransaction(entry: unknown, index = 0): HttpTransaction {
  if (!isObject(entry) || !isObject(entry.request)) {
    throw new Error(`Invalid HAR entry ${index}: missing request`);
  }
  const req = entry.request;
  const url = stringField(req, 'url');
  if (!url) {
    throw new Error(`Invalid HAR entry ${index}: missing request.url`);
  }

  const postData = isObject(req.postData) ? req.postData : undefined;
  const request = new HttpRequest({
    method: stringField(req, 'method', 'GET'),
    uri: url,
    version: httpVersion(stringField(req, 'httpVersion')),
    headers: readHeaders(req.headers),
    body: postData ? stringField(postData, 'text') : undefined,
  });

  const res = entry.response;
  if (!isObject(res) || typeof res.status !== 'number' || res.status <= 0) {
    return new HttpTransaction(request);
  }

  const content = isObject(res.content) ? res.content : {};
  const text = stringField(content, 'text');
  const body = stringField(content, 'encoding') === 'base64' ? Buffer.from(text, 'base64') : text;

  const response = new HttpResponse({
    version: httpVersion(stringField(res, 'httpVersion')),
    statusCode: res.status,
    reasonPhrase: stringField(res, 'statusText'),
    headers: readHeaders(res.headers),
    body,
  });
  return new HttpTransaction(request, response);
}

/**
 * Parses a HAR document into transactions, in capture order
 */
export function parseHar(json: string): HttpTransaction[] {
  let doc: unknown;
  try {
    doc = JSON.parse(json);
  } catch (error) {
    throw new Error(`Invalid HAR: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (!isObject(doc) || !isObject(doc.log) || !Array.isArray(doc.log.entries)) {
    throw new Error('Invalid HAR: expected log.entries');
  }
  return doc.log.entries.map((entry: unknown, i: number) => harEntryToTransaction(entry, i));
}

export async function loadHarFile(filePath: string): Promise<HttpTransaction[]> {
  const content = await fs.promises.readFile(filePath, 'utf-8');
  return parseHar(content);
}
