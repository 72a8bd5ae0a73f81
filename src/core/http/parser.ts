import { HttpHeaderField } from './HttpHeaders';
import { HttpRequest, HttpResponse } from './HttpMessage';

function splitHead(head: string): { startLine: string; fields: HttpHeaderField[] } {
  const lines = head.split(/\r?\n/);
  const startLine = (lines.shift() ?? '').trim();
  const fields: HttpHeaderField[] = [];

  for (const line of lines) {
    if (!line.trim()) break;
    const colon = line.indexOf(':');
    if (colon <= 0) {
      throw new Error(`Malformed header line: ${line}`);
    }
    fields.push({ name: line.substring(0, colon).trim(), value: line.substring(colon + 1).trim() });
  }

  return { startLine, fields };
}

/**
 * Parse a raw request head (`GET /x HTTP/1.1` + header lines).
 * A relative request target is resolved against the Host header.
 */
export function parseRequestHead(head: string, body?: Buffer | string, scheme = 'https'): HttpRequest {
  const { startLine, fields } = splitHead(head);
  const match = /^(\S+)\s+(\S+)(?:\s+(HTTP\/\d(?:\.\d)?))?$/i.exec(startLine);
  if (!match) {
    throw new Error(`Malformed request line: ${startLine}`);
  }

  let uri = match[2];
  if (uri.startsWith('/')) {
    const host = fields.find((f) => f.name.toLowerCase() === 'host')?.value;
    if (!host) {
      throw new Error('Relative request target without a Host header');
    }
    uri = `${scheme}://${host}${uri}`;
  }

  return new HttpRequest({ method: match[1], uri, version: match[3], headers: fields, body });
}

/**
 * Parse a raw response head (`HTTP/1.1 200 OK` + header lines)
 */
export function parseResponseHead(head: string, body?: Buffer | string): HttpResponse {
  const { startLine, fields } = splitHead(head);
  const match = /^(HTTP\/\d(?:\.\d)?)\s+(\d{3})(?:\s+(.*))?$/i.exec(startLine);
  if (!match) {
    throw new Error(`Malformed status line: ${startLine}`);
  }

  return new HttpResponse({
    version: match[1],
    statusCode: Number(match[2]),
    reasonPhrase: match[3] ?? '',
    headers: fields,
    body,
  });
}
