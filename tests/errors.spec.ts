import { describe, expect, it } from 'vitest';
import { AddressError, ERROR_KINDS, describeError } from '../src/errors.js';

describe('describeError', () => {
  it('has a one-line message for every kind', () => {
    for (const kind of ERROR_KINDS) {
      const message = describeError(kind);
      expect(message.length, kind).toBeGreaterThan(0);
      expect(message, kind).not.toContain('\n');
    }
  });

  it('names the limits in length errors', () => {
    expect(describeError('LocalPartTooLong')).toBe('Local part is too long. Length limit: 64');
    expect(describeError('DomainTooLong')).toBe('Domain is too long. Length limit: 254');
    expect(describeError('SubDomainTooLong')).toBe('A sub-domain is too long. Length limit: 63');
  });

  it('names the separator', () => {
    expect(describeError('MissingSeparator')).toBe("Missing separator character '@'.");
    expect(describeError('DomainInvalidSeparator')).toBe("Invalid placement of the domain separator '.'.");
  });
});

describe('AddressError', () => {
  it('carries the kind and its message', () => {
    const error = new AddressError('LocalPartEmpty');
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('AddressError');
    expect(error.kind).toBe('LocalPartEmpty');
    expect(error.message).toBe('Local part is empty.');
  });
});
