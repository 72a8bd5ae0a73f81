/**
 * Lookup tables for relative path confusion analysis
 */

/** Matches every element */
export const ANY_ELEMENT = '*';

/** Stands for the element body instead of an attribute */
export const ELEMENT_BODY = '';

const MEDIA_TAGS = ['img', 'iframe', 'frame', 'embed', 'script', 'input', 'audio', 'video', 'source'] as const;

/**
 * Attributes that make the browser load a resource, with the tags that carry them.
 * Checked in this order.
 */
export const RELATIVE_LOADING_ATTRIBUTES: ReadonlyArray<readonly [string, readonly string[]]> = Object.freeze([
  ['href', ['link', 'a', 'area']],
  ['src', MEDIA_TAGS],
  ['lowersrc', MEDIA_TAGS],
  ['dynsrc', MEDIA_TAGS],
  ['action', ['form']],
  ['data', ['object']],
  ['codebase', ['applet', 'object']],
  ['cite', ['blockquote', 'del', 'ins', 'q']],
  ['background', ['body']],
  ['longdesc', ['frame', 'iframe', 'img']],
  ['profile', ['head']],
  ['usemap', ['img', 'input', 'object']],
  ['classid', ['object']],
  ['formaction', ['button']],
  ['icon', ['command', 'input']],
  ['manifest', ['html']],
  ['poster', ['video']],
  ['archive', ['object', 'applet']],
  ['style', [ANY_ELEMENT]],
  [ELEMENT_BODY, ['style']],
] as const);

/**
 * Doctype public ids that put browsers into quirks mode
 */
export const QUIRKS_MODE_DOCTYPE_PUBLIC_IDS: readonly string[] = Object.freeze([
  '-//W3C//DTD HTML 3.2 Final//EN',
  '-//W3C//DTD HTML 4.01//EN',
  '-//W3C//DTD HTML 4.0 Transitional//EN',
  '-//W3C//DTD HTML 4.01 Transitional//EN',
  '-//W3C//DTD XHTML 1.0 Transitional//EN',
  '-//W3C//DTD XHTML 1.1//EN',
  '-//W3C//DTD XHTML Basic 1.0//EN',
  '-//W3C//DTD XHTML 1.0 Strict//EN',
  'ISO/IEC 15445:2000//DTD HTML//EN',
  'ISO/IEC 15445:2000//DTD HyperText Markup Language//EN',
  'ISO/IEC 15445:1999//DTD HTML//EN',
  'ISO/IEC 15445:1999//DTD HyperText Markup Language//EN',
]);

/**
 * CSS property loading a relative url, e.g. `background: url(image.png)`.
 * Absolute, root relative and fragment targets do not match.
 */
export const STYLE_RELATIVE_URL_PATTERN = /[a-z_-]*\s*:\s*url\s*\(\s*['"]?(?!https?:|\/|#)[^)'"][^)]*\)/i;

/**
 * True when a loading attribute value resolves against the document path
 */
export function isRelativeReference(value: string): boolean {
  const upper = value.trim().toUpperCase();
  return !(upper.startsWith('HTTP://') || upper.startsWith('HTTPS://') || upper.startsWith('/') || upper.startsWith('#'));
}
