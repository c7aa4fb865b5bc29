/**
 * Limits and delimiters of the addr-spec grammar.
 *
 * Lengths are counted in Unicode code points.
 */

export const LOCAL_PART_MAX_LENGTH = 64;

// RFC 3696 erratum 1690: 256 octets of path minus the enclosing angle brackets.
export const DOMAIN_MAX_LENGTH = 254;

export const SUB_DOMAIN_MAX_LENGTH = 63;

export const AT = '@';
export const DOT = '.';
export const DQUOTE = '"';
export const ESC = '\\';
export const LBRACKET = '[';
export const RBRACKET = ']';
export const LT = '<';
export const GT = '>';

export const UTF8_START = 0x80;

export const MAILTO_URI_PREFIX = 'mailto:';

/** Characters percent-encoded when an address is written into a `mailto:` URI. */
export const URI_RESERVED: ReadonlySet<string> = new Set<string>([
  '!', '#', '$', '%', '&', "'", '(', ')', '*', '+',
  ',', '/', ':', ';', '=', '?', '@', '[', ']',
]);
