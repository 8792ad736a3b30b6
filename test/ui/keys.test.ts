import { describe, expect, it } from 'vitest';
import { keySymbol } from '../../src/ui/keys.ts';

describe('keySymbol', () => {
  it('uses printable characters as they are typed', () => {
    expect(keySymbol('j', { full: 'j' })).toBe('j');
    expect(keySymbol('G', { full: 'S-g' })).toBe('G');
    expect(keySymbol("'", { full: "'" })).toBe("'");
    expect(keySymbol(' ', { full: 'space' })).toBe(' ');
  });

  it('names control and navigation keys', () => {
    expect(keySymbol('\u0003', { full: 'C-c', ctrl: true })).toBe('C-c');
    expect(keySymbol('f', { full: 'C-f', ctrl: true })).toBe('C-f');
    expect(keySymbol(undefined, { full: 'down' })).toBe('down');
    expect(keySymbol(undefined, { full: 'pagedown' })).toBe('pagedown');
    expect(keySymbol('\r', { full: 'enter' })).toBe('enter');
  });

  it('keeps meta chords apart from the plain key', () => {
    expect(keySymbol('l', { full: 'M-l', meta: true })).toBe('M-l');
  });

  it('falls back to the character, then to nothing', () => {
    expect(keySymbol('\t', undefined)).toBe('\t');
    expect(keySymbol(undefined, undefined)).toBe('');
  });
});
