/**
 * addrspec - RFC 5322 / RFC 6531 email address validation
 *
 * @example
 * ```typescript
 * import { describeError, validate, toUri } from 'addrspec';
 *
 * const result = validate('用户@例子.广告');
 * if (result.ok) {
 *   console.log(toUri(result.value)); // 'mailto:用户%40例子.广告'
 * } else {
 *   console.log(describeError(result.error));
 * }
 * ```
 */

import { EmailAddress } from './address.js';
import type { ErrorKind } from './errors.js';
import type { Result } from './result.js';

export { EmailAddress } from './address.js';

export {
  AddressError,
  ERROR_KINDS,
  describeError,
  type ErrorKind,
} from './errors.js';

export { ok, err, type Result } from './result.js';

export { parseAddress, parseDomain, parseLocalPart, type AddressParts } from './parser.js';

export { encodeUriReserved, toCanonicalString, toDisplay, toUri } from './format.js';

export {
  isAText,
  isDTextChar,
  isQTextChar,
  isUChar,
  isVChar,
  isWsp,
} from './grammar/chars.js';

export { isAtom, isDomainLiteralBody, isDotAtomText, isQContent } from './grammar/tokens.js';

export {
  DOMAIN_MAX_LENGTH,
  LOCAL_PART_MAX_LENGTH,
  SUB_DOMAIN_MAX_LENGTH,
} from './constants.js';

/** Parses and validates a full address. */
export function validate(address: string): Result<EmailAddress, ErrorKind> {
  return EmailAddress.validate(address);
}

/** True iff {@link validate} succeeds. */
export function isValid(address: string): boolean {
  return EmailAddress.isValid(address);
}

/** True iff `part` would be a valid local-part. */
export function isValidLocalPart(part: string): boolean {
  return EmailAddress.isValidLocalPart(part);
}

/** True iff `part` would be a valid domain. */
export function isValidDomain(part: string): boolean {
  return EmailAddress.isValidDomain(part);
}
