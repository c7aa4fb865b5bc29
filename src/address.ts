/**
 * EmailAddress - Immutable, validated addr-spec
 */

import { AddressError, type ErrorKind } from './errors.js';
import { toCanonicalString, toDisplay, toUri } from './format.js';
import { parseAddress, parseDomain, parseLocalPart } from './parser.js';
import { ok, type Result } from './result.js';

/**
 * A syntactically valid email address, split into the exact local-part and
 * domain substrings that were parsed (quotes and brackets kept).
 *
 * Instances only come from {@link EmailAddress.validate},
 * {@link EmailAddress.parse} or {@link EmailAddress.fromJSON}.
 *
 * @example
 * ```typescript
 * const result = EmailAddress.validate('"Abc@def"@example.com');
 * if (result.ok) {
 *   result.value.local;  // '"Abc@def"'
 *   result.value.domain; // 'example.com'
 * }
 * ```
 */
export class EmailAddress {
  /** Everything before the separator */
  readonly local: string;

  /** Everything after the separator */
  readonly domain: string;

  private constructor(local: string, domain: string) {
    this.local = local;
    this.domain = domain;
    Object.freeze(this);
  }

  // ============================================
  // Construction
  // ============================================

  static validate(address: string): Result<EmailAddress, ErrorKind> {
    const parts = parseAddress(address);
    if (!parts.ok) {
      return parts;
    }
    return ok(new EmailAddress(parts.value.local, parts.value.domain));
  }

  /**
   * Like {@link EmailAddress.validate}, but throws.
   * @throws AddressError carrying the first rule the input broke
   */
  static parse(address: string): EmailAddress {
    const result = EmailAddress.validate(address);
    if (!result.ok) {
      throw new AddressError(result.error);
    }
    return result.value;
  }

  /**
   * Revives a value written by {@link EmailAddress.toJSON}.
   * @throws AddressError when the value is not a string or not a valid address
   */
  static fromJSON(value: unknown): EmailAddress {
    if (typeof value !== 'string') {
      throw new AddressError('InvalidCharacter');
    }
    return EmailAddress.parse(value);
  }

  // ============================================
  // Partial validity
  // ============================================

  static isValid(address: string): boolean {
    return EmailAddress.validate(address).ok;
  }

  static isValidLocalPart(part: string): boolean {
    return parseLocalPart(part).ok;
  }

  static isValidDomain(part: string): boolean {
    return parseDomain(part).ok;
  }

  // ============================================
  // Comparison
  // ============================================

  equals(other: EmailAddress): boolean {
    return this.local === other.local && this.domain === other.domain;
  }

  /** 32-bit hash of the canonical form; equal addresses hash equally. */
  hashCode(): number {
    const canonical = toCanonicalString(this);
    let hash = 0;
    for (let i = 0; i < canonical.length; i++) {
      hash = (Math.imul(31, hash) + canonical.charCodeAt(i)) | 0;
    }
    return hash;
  }

  // ============================================
  // Formatting
  // ============================================

  toUri(): string {
    return toUri(this);
  }

  toDisplay(displayName: string): string {
    return toDisplay(this, displayName);
  }

  toString(): string {
    return toCanonicalString(this);
  }

  toJSON(): string {
    return toCanonicalString(this);
  }
}
