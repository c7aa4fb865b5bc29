import { describe, expect, it } from 'vitest';
import {
  isAText,
  isDTextChar,
  isQTextChar,
  isUChar,
  isVChar,
  isWsp,
} from '../../src/grammar/chars.js';

const code = (ch: string): number => {
  const point = ch.codePointAt(0);
  if (point === undefined) {
    throw new Error('empty character');
  }
  return point;
};

describe('isAText', () => {
  it('accepts letters, digits and the atom punctuation set', () => {
    for (const ch of "aZ09!#$%&'*+-/=?^_`{|}~") {
      expect(isAText(code(ch)), ch).toBe(true);
    }
  });

  it('rejects specials and whitespace', () => {
    for (const ch of '()<>[]:;@\\,." \t') {
      expect(isAText(code(ch)), ch).toBe(false);
    }
  });

  it('accepts non-ASCII characters', () => {
    expect(isAText(code('ü'))).toBe(true);
    expect(isAText(code('用'))).toBe(true);
    expect(isAText(code('😀'))).toBe(true);
  });
});

describe('isUChar', () => {
  it('starts at U+0080', () => {
    expect(isUChar(0x7f)).toBe(false);
    expect(isUChar(0x80)).toBe(true);
    expect(isUChar(0x10ffff)).toBe(true);
  });

  it('excludes surrogate code points', () => {
    expect(isUChar(0xd800)).toBe(false);
    expect(isUChar(0xdfff)).toBe(false);
    expect(isUChar(0xe000)).toBe(true);
  });
});

describe('isVChar', () => {
  it('covers printable US-ASCII only', () => {
    expect(isVChar(0x20)).toBe(false);
    expect(isVChar(0x21)).toBe(true);
    expect(isVChar(0x7e)).toBe(true);
    expect(isVChar(0x7f)).toBe(false);
    expect(isVChar(code('é'))).toBe(false);
  });
});

describe('isWsp', () => {
  it('accepts space and tab only', () => {
    expect(isWsp(0x20)).toBe(true);
    expect(isWsp(0x09)).toBe(true);
    expect(isWsp(0x0a)).toBe(false);
    expect(isWsp(0x0d)).toBe(false);
  });
});

describe('isQTextChar', () => {
  it('excludes the double quote and backslash', () => {
    expect(isQTextChar(code('"'))).toBe(false);
    expect(isQTextChar(code('\\'))).toBe(false);
  });

  it('accepts the rest of printable ASCII and non-ASCII', () => {
    for (const ch of '!#@[]().,~') {
      expect(isQTextChar(code(ch)), ch).toBe(true);
    }
    expect(isQTextChar(code('ß'))).toBe(true);
  });

  it('rejects space and control characters', () => {
    expect(isQTextChar(0x20)).toBe(false);
    expect(isQTextChar(0x00)).toBe(false);
    expect(isQTextChar(0x7f)).toBe(false);
  });
});

describe('isDTextChar', () => {
  it('excludes brackets and backslash', () => {
    expect(isDTextChar(code('['))).toBe(false);
    expect(isDTextChar(code(']'))).toBe(false);
    expect(isDTextChar(code('\\'))).toBe(false);
  });

  it('accepts the characters of IP literals', () => {
    for (const ch of '0123456789.:IPv6abcdef') {
      expect(isDTextChar(code(ch)), ch).toBe(true);
    }
  });

  it('rejects non-ASCII and space', () => {
    expect(isDTextChar(code('é'))).toBe(false);
    expect(isDTextChar(0x20)).toBe(false);
  });
});
