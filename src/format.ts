/**
 * String forms of an already validated address.
 */

import type { EmailAddress } from './address.js';
import { AT, MAILTO_URI_PREFIX, URI_RESERVED } from './constants.js';

/**
 * Percent-encodes the URI-reserved characters of a string. Everything else,
 * non-ASCII included, is left alone.
 *
 * @example
 * ```typescript
 * encodeUriReserved('name@example.org') // 'name%40example.org'
 * ```
 */
export function encodeUriReserved(value: string): string {
  let encoded = '';
  for (const ch of value) {
    if (URI_RESERVED.has(ch)) {
      encoded += `%${ch.charCodeAt(0).toString(16).toUpperCase().padStart(2, '0')}`;
    } else {
      encoded += ch;
    }
  }
  return encoded;
}

/** `local@domain`, exactly as parsed. */
export function toCanonicalString(address: EmailAddress): string {
  return `${address.local}${AT}${address.domain}`;
}

/**
 * The address as a `mailto:` URI.
 *
 * @example
 * ```typescript
 * toUri(EmailAddress.parse('name@example.org')) // 'mailto:name%40example.org'
 * ```
 */
export function toUri(address: EmailAddress): string {
  return `${MAILTO_URI_PREFIX}${encodeUriReserved(toCanonicalString(address))}`;
}

/**
 * The address with a display name, as used in mail headers. The name is
 * written as given, without quoting.
 */
export function toDisplay(address: EmailAddress, displayName: string): string {
  return `${displayName} <${toCanonicalString(address)}>`;
}
