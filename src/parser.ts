/**
 * Validators for the local-part, the domain and the full addr-spec.
 *
 * Each validator reports the first rule the input breaks; none of them throw.
 */

import {
  AT,
  DOMAIN_MAX_LENGTH,
  DOT,
  DQUOTE,
  GT,
  LBRACKET,
  LOCAL_PART_MAX_LENGTH,
  LT,
  RBRACKET,
  SUB_DOMAIN_MAX_LENGTH,
} from './constants.js';
import type { ErrorKind } from './errors.js';
import { isDomainLiteralBody, isDotAtomText, isQContent } from './grammar/tokens.js';
import { err, ok, type Result } from './result.js';
import { codePointLength } from './util/string.js';

/** The two exact substrings around the separator. */
export interface AddressParts {
  local: string;
  domain: string;
}

function isEnclosedBy(part: string, open: string, close: string): boolean {
  return part.length >= 2 && part.startsWith(open) && part.endsWith(close);
}

/**
 * Validates a local-part on its own.
 *
 * A part wrapped in double quotes is read as a quoted-string; anything else
 * must be a dot-atom. A stray quote anywhere else is simply not atext.
 */
export function parseLocalPart(part: string): Result<string, ErrorKind> {
  if (part.length === 0) {
    return err('LocalPartEmpty');
  }
  if (codePointLength(part) > LOCAL_PART_MAX_LENGTH) {
    return err('LocalPartTooLong');
  }
  if (isEnclosedBy(part, DQUOTE, DQUOTE)) {
    if (part.length === 2) {
      return err('LocalPartEmpty');
    }
    return isQContent(part.slice(1, -1)) ? ok(part) : err('InvalidCharacter');
  }
  return isDotAtomText(part) ? ok(part) : err('InvalidCharacter');
}

/**
 * Validates a domain on its own: either a bracketed domain-literal or a
 * dot-atom whose labels fit the sub-domain limit.
 */
export function parseDomain(part: string): Result<string, ErrorKind> {
  if (part.length === 0) {
    return err('DomainEmpty');
  }
  if (codePointLength(part) > DOMAIN_MAX_LENGTH) {
    return err('DomainTooLong');
  }
  if (isEnclosedBy(part, LBRACKET, RBRACKET)) {
    // Only the dtext class is checked; `[]` and non-IP bodies pass.
    return isDomainLiteralBody(part.slice(1, -1)) ? ok(part) : err('InvalidCharacter');
  }
  if (!isDotAtomText(part)) {
    return err('InvalidCharacter');
  }
  for (const label of part.split(DOT)) {
    if (codePointLength(label) > SUB_DOMAIN_MAX_LENGTH) {
      return err('SubDomainTooLong');
    }
  }
  return ok(part);
}

/**
 * Splits a full address into validated parts.
 *
 * An enclosing `<` `>` pair is dropped first. The split happens at the last
 * `@`, since a quoted local-part may itself contain one while a domain never
 * can.
 */
export function parseAddress(address: string): Result<AddressParts, ErrorKind> {
  const bare = isEnclosedBy(address, LT, GT) ? address.slice(1, -1) : address;

  const separator = bare.lastIndexOf(AT);
  if (separator === -1) {
    return err('MissingSeparator');
  }

  const local = parseLocalPart(bare.slice(0, separator));
  if (!local.ok) {
    return local;
  }
  const domain = parseDomain(bare.slice(separator + AT.length));
  if (!domain.ok) {
    return domain;
  }

  return ok({ local: local.value, domain: domain.value });
}
