import { mediaType } from '../core/http/HttpHeaders';
import { HttpTransaction } from '../core/http/HttpMessage';

const IGNORED_MEDIA_PREFIXES: readonly string[] = Object.freeze(['image/', 'font/', 'audio/', 'video/']);

const IGNORED_MEDIA_TYPES: readonly string[] = Object.freeze([
  'text/css',
  'text/javascript',
  'application/javascript',
  'application/x-javascript',
  'application/ecmascript',
  'application/font-woff',
  'application/font-woff2',
  'application/vnd.ms-fontobject',
]);

const STATIC_EXTENSION_PATTERN =
  /\.(?:css|js|mjs|map|png|jpe?g|gif|svg|ico|webp|bmp|avif|woff2?|ttf|otf|eot|mp3|mp4|wav|ogg|webm)$/i;

/**
 * Browser background traffic that never takes part in a login flow
 */
export const TELEMETRY_HOSTS: readonly string[] = Object.freeze([
  'safebrowsing.googleapis.com',
  'update.googleapis.com',
  'clientservices.googleapis.com',
  'optimizationguide-pa.googleapis.com',
  'content-autofill.googleapis.com',
  'incoming.telemetry.mozilla.org',
  'firefox.settings.services.mozilla.com',
  'content-signature-2.cdn.mozilla.net',
  'location.services.mozilla.com',
  'detectportal.firefox.com',
]);

/**
 * False for static assets and telemetry, which only add noise to auth transcripts
 */
export function isRelevantToAuthDiagnostics(tx: HttpTransaction): boolean {
  const url = tx.request.url;
  if (url) {
    if (TELEMETRY_HOSTS.includes(url.hostname.toLowerCase())) return false;
    if (STATIC_EXTENSION_PATTERN.test(url.pathname)) return false;
  }

  const type = mediaType(tx.response?.contentType);
  if (IGNORED_MEDIA_PREFIXES.some((prefix) => type.startsWith(prefix))) return false;
  return !IGNORED_MEDIA_TYPES.includes(type);
}
