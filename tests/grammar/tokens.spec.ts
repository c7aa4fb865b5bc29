import { describe, expect, it } from 'vitest';
import {
  isAtom,
  isDomainLiteralBody,
  isDotAtomText,
  isQContent,
} from '../../src/grammar/tokens.js';

describe('isAtom', () => {
  it('requires at least one character', () => {
    expect(isAtom('')).toBe(false);
    expect(isAtom('a')).toBe(true);
  });

  it('rejects a dot', () => {
    expect(isAtom('a.b')).toBe(false);
  });
});

describe('isDotAtomText', () => {
  it('accepts dot-separated atoms', () => {
    expect(isDotAtomText('very.common')).toBe(true);
    expect(isDotAtomText("!#$%&'*+-/=?^_`.{|}~")).toBe(true);
    expect(isDotAtomText('例子.广告')).toBe(true);
  });

  it('rejects empty segments', () => {
    expect(isDotAtomText('')).toBe(false);
    expect(isDotAtomText('.user')).toBe(false);
    expect(isDotAtomText('user.')).toBe(false);
    expect(isDotAtomText('user..name')).toBe(false);
  });

  it('rejects characters outside atext', () => {
    expect(isDotAtomText('just"not"right')).toBe(false);
    expect(isDotAtomText('a b')).toBe(false);
  });
});

describe('isQContent', () => {
  it('accepts the empty string', () => {
    expect(isQContent('')).toBe(true);
  });

  it('accepts spaces, dots and separators', () => {
    expect(isQContent(' ')).toBe(true);
    expect(isQContent('john..doe')).toBe(true);
    expect(isQContent('Abc@def')).toBe(true);
    expect(isQContent('much.more unusual')).toBe(true);
    expect(isQContent('a\tb')).toBe(true);
  });

  it('accepts quoted-pairs', () => {
    expect(isQContent('Joe.\\\\Blow')).toBe(true);
    expect(isQContent('say \\"hi\\"')).toBe(true);
  });

  it('rejects a bare double quote or backslash', () => {
    expect(isQContent('a"b')).toBe(false);
    expect(isQContent('trailing\\')).toBe(false);
  });

  it('rejects a quoted-pair whose second character is not VCHAR', () => {
    expect(isQContent('a\\ b')).toBe(false);
    expect(isQContent('a\\é')).toBe(false);
  });

  it('accepts non-ASCII text', () => {
    expect(isQContent('Dörte Sörensen')).toBe(true);
  });
});

describe('isDomainLiteralBody', () => {
  it('accepts IP literal shapes by character class alone', () => {
    expect(isDomainLiteralBody('192.168.2.1')).toBe(true);
    expect(isDomainLiteralBody('IPv6:2001:db8::1')).toBe(true);
    expect(isDomainLiteralBody('not-an-ip')).toBe(true);
  });

  it('accepts the empty body', () => {
    expect(isDomainLiteralBody('')).toBe(true);
  });

  it('rejects brackets, backslash and spaces', () => {
    expect(isDomainLiteralBody('1.2[3')).toBe(false);
    expect(isDomainLiteralBody('a\\b')).toBe(false);
    expect(isDomainLiteralBody('1.2 3.4')).toBe(false);
  });
});
