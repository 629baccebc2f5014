import { describe, it, expect } from 'vitest';
import {
  decodePasswords,
  encodePasswords,
  splitPasswords,
} from '../../../src/modules/records/helpers/password-list';

describe('splitPasswords', () => {
  it('splits on commas and trims each entry', () => {
    expect(splitPasswords(' 111 ,222,  333')).toEqual(['111', '222', '333']);
  });

  it('drops empty entries', () => {
    expect(splitPasswords('a, ,b')).toEqual(['a', 'b']);
    expect(splitPasswords(',,,')).toEqual([]);
    expect(splitPasswords('')).toEqual([]);
  });

  it('keeps order and duplicates', () => {
    expect(splitPasswords('z,a,z')).toEqual(['z', 'a', 'z']);
  });
});

describe('encodePasswords / decodePasswords', () => {
  it('encodes as a JSON array', () => {
    expect(encodePasswords(['111', '222'])).toBe('["111","222"]');
  });

  it('decodes what it encodes, including commas and quotes inside entries', () => {
    const list = ['a"b', 'c;d', 'é'];
    expect(decodePasswords(encodePasswords(list))).toEqual({ ok: true, passwords: list });
  });

  it('rejects text that is not JSON', () => {
    expect(decodePasswords('not-json').ok).toBe(false);
  });

  it('rejects JSON that is not a list of 1..5 non-empty strings', () => {
    expect(decodePasswords('{"a":1}').ok).toBe(false);
    expect(decodePasswords('[]').ok).toBe(false);
    expect(decodePasswords('["a",""]').ok).toBe(false);
    expect(decodePasswords('["a",2]').ok).toBe(false);
    expect(decodePasswords('["1","2","3","4","5","6"]').ok).toBe(false);
  });
});
