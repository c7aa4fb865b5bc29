/**
 * Character classes of the RFC 5322 addr-spec grammar, widened by the
 * RFC 6531 / RFC 6532 UTF8-non-ascii extension.
 *
 * Every predicate takes a single code point (from `codePointAt`).
 */

import { UTF8_START } from '../constants.js';

const ATEXT_SPECIALS = new Set<number>(
  Array.from("!#$%&'*+-/=?^_`{|}~", (ch) => ch.charCodeAt(0)),
);

function isAsciiAlphanumeric(code: number): boolean {
  return (
    (code >= 0x30 && code <= 0x39) || // 0-9
    (code >= 0x41 && code <= 0x5a) || // A-Z
    (code >= 0x61 && code <= 0x7a) // a-z
  );
}

/**
 * UTF8-non-ascii: anything from U+0080 upwards.
 *
 * Surrogate code points only show up for ill-formed UTF-16 input and are not
 * scalar values, so they never count.
 */
export function isUChar(code: number): boolean {
  return code >= UTF8_START && !(code >= 0xd800 && code <= 0xdfff);
}

/** atext: letters, digits, the atom punctuation set and UTF8-non-ascii. */
export function isAText(code: number): boolean {
  return isAsciiAlphanumeric(code) || ATEXT_SPECIALS.has(code) || isUChar(code);
}

/** VCHAR: printable US-ASCII. */
export function isVChar(code: number): boolean {
  return code >= 0x21 && code <= 0x7e;
}

/** WSP: space or horizontal tab. */
export function isWsp(code: number): boolean {
  return code === 0x20 || code === 0x09;
}

/** qtext: printable US-ASCII except `"` and `\`, plus UTF8-non-ascii. */
export function isQTextChar(code: number): boolean {
  return (
    code === 0x21 ||
    (code >= 0x23 && code <= 0x5b) ||
    (code >= 0x5d && code <= 0x7e) ||
    isUChar(code)
  );
}

/** dtext: printable US-ASCII except `[`, `]` and `\`. */
export function isDTextChar(code: number): boolean {
  return (code >= 0x21 && code <= 0x5a) || (code >= 0x5e && code <= 0x7e);
}
