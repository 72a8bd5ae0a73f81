/**
 * Cookie sent by the client in a Cookie header
 */
export interface RequestCookie {
  readonly name: string;
  readonly value: string;
}

/**
 * Cookie attribute from a Set-Cookie header (Path, Domain, HttpOnly...)
 */
export interface CookieAttribute {
  readonly name: string;
  readonly value?: string;
}

/**
 * Cookie set by the server in a Set-Cookie header
 */
export interface ResponseCookie extends RequestCookie {
  readonly attributes: readonly CookieAttribute[];
  readonly domain?: string;
}

/**
 * Parse a Cookie header value (`a=1; b=2`).
 * Pairs without a name are dropped, values are kept exactly as sent.
 */
export function parseCookieHeader(header: string): RequestCookie[] {
  const cookies: RequestCookie[] = [];
  for (const part of header.split(';')) {
    const pair = splitPair(part);
    if (pair && pair.name) {
      cookies.push(pair);
    }
  }
  return cookies;
}

/**
 * Parse a Set-Cookie header value. Returns null when there is no name=value pair.
 */
export function parseSetCookieHeader(header: string): ResponseCookie | null {
  const [first, ...rest] = header.split(';');
  const pair = splitPair(first);
  if (!pair || !pair.name) {
    return null;
  }

  const attributes: CookieAttribute[] = [];
  for (const part of rest) {
    const trimmed = part.trim();
    if (!trimmed) continue;
    const eq = trimmed.indexOf('=');
    attributes.push(
      eq === -1
        ? { name: trimmed }
        : { name: trimmed.substring(0, eq).trim(), value: trimmed.substring(eq + 1).trim() }
    );
  }

  const domain = attributes.find((a) => a.name.toLowerCase() === 'domain')?.value;
  return { ...pair, attributes, domain: domain || undefined };
}

function splitPair(part: string): RequestCookie | null {
  const trimmed = part.trim();
  if (!trimmed) return null;
  const eq = trimmed.indexOf('=');
  if (eq === -1) {
    return null;
  }
  return { name: trimmed.substring(0, eq).trim(), value: trimmed.substring(eq + 1).trim() };
}
