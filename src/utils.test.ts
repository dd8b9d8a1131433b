import { describe, expect, it } from 'vitest';
import { decodeText } from './utils.js';

describe('decodeText', () => {
  const latin1 = Buffer.from([0x63, 0x61, 0x66, 0xe9]);

  it('uses the declared charset', () => {
    expect(decodeText(latin1, 'text/html; charset="ISO-8859-1"')).toBe('café');
    expect(decodeText(Buffer.from('café'), 'text/html; charset=utf-8')).toBe('café');
  });

  it('falls back to UTF-8 without a charset or with an unknown one', () => {
    const utf8 = Buffer.from('café');
    expect(decodeText(utf8)).toBe('café');
    expect(decodeText(utf8, 'text/html; charset=x-unknown')).toBe('café');
  });
});
