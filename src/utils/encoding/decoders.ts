/**
 * Lenient decoders used by signature matching. Each returns null instead of throwing
 * when its input is not in the expected encoding.
 */

const BASE64_PATTERN = /^[A-Za-z0-9+/\-_]+={0,2}$/;

/**
 * Decode standard or URL-safe base64, with or without padding
 */
export function decodeBase64(text: string): Buffer | null {
  if (!text || !BASE64_PATTERN.test(text)) {
    return null;
  }
  const unpadded = text.replace(/=+$/, '');
  if (unpadded.length % 4 === 1) {
    return null;
  }
  const decoded = Buffer.from(unpadded.replace(/-/g, '+').replace(/_/g, '/'), 'base64');
  return decoded.length > 0 ? decoded : null;
}

/**
 * Percent-decode to raw bytes. `+` is a space. Characters that are not escaped
 * contribute their UTF-8 bytes. A malformed escape makes the whole value invalid.
 */
export function percentDecodeBytes(text: string): Buffer | null {
  if (!text.includes('%') && !text.includes('+')) {
    return null;
  }

  const bytes: number[] = [];
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '%') {
      const hex = text.substring(i + 1, i + 3);
      if (!/^[0-9a-fA-F]{2}$/.test(hex)) {
        return null;
      }
      bytes.push(parseInt(hex, 16));
      i += 2;
    } else if (ch === '+') {
      bytes.push(0x20);
    } else {
      bytes.push(...Buffer.from(ch, 'utf8'));
    }
  }
  return Buffer.from(bytes);
}

/**
 * Percent-decode and interpret the bytes as UTF-8 text, mapped back to latin1 code units.
 * `%C2%AC` therefore yields the single byte 0xAC.
 */
export function percentDecodeUtf8(text: string): Buffer | null {
  const bytes = percentDecodeBytes(text);
  if (!bytes) return null;
  const decoded = bytes.toString('utf8');
  if ([...decoded].some((c) => (c.codePointAt(0) ?? 0) > 0xff)) {
    return null;
  }
  return Buffer.from(decoded, 'latin1');
}

export function startsWithBytes(value: Buffer, prefix: Buffer): boolean {
  return value.length >= prefix.length && value.subarray(0, prefix.length).equals(prefix);
}
