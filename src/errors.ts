import {
  AT,
  DOMAIN_MAX_LENGTH,
  DOT,
  LOCAL_PART_MAX_LENGTH,
  SUB_DOMAIN_MAX_LENGTH,
} from './constants.js';

export const ERROR_KINDS = [
  'InvalidCharacter',
  'MissingSeparator',
  'LocalPartEmpty',
  'LocalPartTooLong',
  'DomainEmpty',
  'DomainTooLong',
  'SubDomainTooLong',
  // Reserved: no validator produces the tags below yet.
  'DomainTooFew',
  'DomainInvalidSeparator',
  'UnbalancedQuotes',
  'InvalidComment',
  'InvalidIPAddress',
  // Internal invariant violation.
  'CantHappen',
] as const;

/** Why an address, local-part or domain was rejected. */
export type ErrorKind = (typeof ERROR_KINDS)[number];

const ERROR_MESSAGES: Record<ErrorKind, string> = {
  InvalidCharacter: 'Invalid character.',
  MissingSeparator: `Missing separator character '${AT}'.`,
  LocalPartEmpty: 'Local part is empty.',
  LocalPartTooLong: `Local part is too long. Length limit: ${LOCAL_PART_MAX_LENGTH}`,
  DomainEmpty: 'Domain is empty.',
  DomainTooLong: `Domain is too long. Length limit: ${DOMAIN_MAX_LENGTH}`,
  SubDomainTooLong: `A sub-domain is too long. Length limit: ${SUB_DOMAIN_MAX_LENGTH}`,
  DomainTooFew: 'Too few parts in the domain.',
  DomainInvalidSeparator: `Invalid placement of the domain separator '${DOT}'.`,
  UnbalancedQuotes: 'Quotes around the local-part are unbalanced.',
  InvalidComment: 'A comment was badly formed.',
  InvalidIPAddress: 'Invalid IP address specified for domain.',
  CantHappen: 'An impossible error was encountered.',
};

export function describeError(kind: ErrorKind): string {
  return ERROR_MESSAGES[kind];
}

/**
 * Thrown by the throwing conveniences (`EmailAddress.parse`,
 * `EmailAddress.fromJSON`). The result-returning API never throws.
 */
export class AddressError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind) {
    super(describeError(kind));
    this.name = 'AddressError';
    this.kind = kind;
  }
}
