/**
 * Authorization code extraction tests
 */

import {
  DEFAULT_CODE_KEYS,
  extractCode,
  extractState,
  findValue,
} from '../../../src/relay/extractor.js';

describe('extractor', () => {
  describe('extractCode', () => {
    it('should extract code with default keys', () => {
      expect(extractCode({ code: 'ABC', state: 's1' })).toBe('ABC');
    });

    it('should match keys case-insensitively', () => {
      expect(extractCode({ CODE: 'upper' })).toBe('upper');
      expect(extractCode({ Authorization_Code: 'mixed' })).toBe('mixed');
    });

    it('should follow candidate priority order', () => {
      const payload = { authorization_code: 'second', code: 'first' };

      expect(extractCode(payload)).toBe('first');
      expect(extractCode(payload, ['authorization_code', 'code'])).toBe('second');
    });

    it('should fall back to later candidates when earlier ones are missing', () => {
      expect(extractCode({ authorization_code: 'XYZ' })).toBe('XYZ');
    });

    it('should use custom candidate keys', () => {
      expect(extractCode({ auth: 'custom', code: 'default' }, ['auth'])).toBe('custom');
      expect(extractCode({ code: 'default' }, ['auth'])).toBeUndefined();
    });

    it('should take the first element of a multi-valued field', () => {
      expect(extractCode({ code: ['one', 'two'] })).toBe('one');
    });

    it('should treat empty values as absent', () => {
      expect(extractCode({ code: '' })).toBeUndefined();
      expect(extractCode({ code: [] })).toBeUndefined();
    });

    it('should return undefined when no candidate is present', () => {
      expect(extractCode({ error: 'access_denied' })).toBeUndefined();
      expect(extractCode({})).toBeUndefined();
    });

    it('should expose the default candidates', () => {
      expect(DEFAULT_CODE_KEYS).toEqual(['code', 'authorization_code']);
    });
  });

  describe('extractState', () => {
    it('should extract state case-insensitively', () => {
      expect(extractState({ state: 's1' })).toBe('s1');
      expect(extractState({ STATE: 's2' })).toBe('s2');
    });

    it('should return undefined without state', () => {
      expect(extractState({ code: 'ABC' })).toBeUndefined();
      expect(extractState({ state: '' })).toBeUndefined();
    });
  });

  describe('findValue', () => {
    it('should let the key inserted last win among case variants', () => {
      expect(findValue({ code: 'lower', CODE: 'upper' }, ['code'])).toBe('upper');
      expect(findValue({ CODE: 'upper', code: 'lower' }, ['code'])).toBe('lower');
    });

    it('should match candidates given in any case', () => {
      expect(findValue({ code: 'ABC' }, ['Code'])).toBe('ABC');
    });
  });
});
