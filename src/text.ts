export const DEFAULT_ENCODING = 'utf-8';

/**
 * Convert raw input to a string.
 *
 * Strings pass through. Bytes are decoded with `encoding`; when that
 * encoding is unknown or the bytes are not valid in it, they are decoded
 * as UTF-8 with U+FFFD replacement characters instead.
 */
export function toText(value: string | Uint8Array, encoding: string = DEFAULT_ENCODING): string {
  if (typeof value === 'string') return value;
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(encoding, { fatal: true });
  } catch (err) {
    if (!(err instanceof RangeError)) throw err;
    return new TextDecoder(DEFAULT_ENCODING).decode(value);
  }
  try {
    return decoder.decode(value);
  } catch (err) {
    if (!(err instanceof TypeError)) throw err;
    return new TextDecoder(DEFAULT_ENCODING).decode(value);
  }
}
