/**
 * Recognizers for the addr-spec tokens built from the character classes.
 */

import { DOT, ESC } from '../constants.js';
import { codePoints } from '../util/string.js';
import { isAText, isDTextChar, isQTextChar, isVChar, isWsp } from './chars.js';

const ESC_CODE = ESC.charCodeAt(0);

/** atom: one or more atext characters. */
export function isAtom(s: string): boolean {
  return s.length > 0 && codePoints(s).every(isAText);
}

/**
 * dot-atom-text: atoms joined by single dots, so no leading, trailing or
 * doubled dot and never the empty string.
 */
export function isDotAtomText(s: string): boolean {
  return s.split(DOT).every(isAtom);
}

/**
 * The content of a quoted-string with the quotes removed: qtext, WSP and
 * quoted-pairs (`\` followed by a VCHAR). The empty string is accepted.
 */
export function isQContent(s: string): boolean {
  const points = codePoints(s);
  let i = 0;
  while (i < points.length) {
    const code = points[i];
    if (code === ESC_CODE) {
      const next: number | undefined = points[i + 1];
      if (next === undefined || !isVChar(next)) {
        return false;
      }
      i += 2;
      continue;
    }
    if (!(isWsp(code) || isQTextChar(code))) {
      return false;
    }
    i += 1;
  }
  return true;
}

/**
 * The body of a domain-literal with the brackets removed. Only the dtext class
 * is checked, so an empty body passes and IP address forms are not examined.
 */
export function isDomainLiteralBody(s: string): boolean {
  return codePoints(s).every(isDTextChar);
}
