import { envBool, envInt, envList, envString } from './env';

describe('env', () => {
  describe('envBool', () => {
    it('returns the default when unset or blank', () => {
      expect(envBool('FLAG', true, {})).toBe(true);
      expect(envBool('FLAG', false, { FLAG: '  ' })).toBe(false);
    });

    it('parses the usual spellings', () => {
      expect(envBool('FLAG', true, { FLAG: 'off' })).toBe(false);
      expect(envBool('FLAG', true, { FLAG: 'No' })).toBe(false);
      expect(envBool('FLAG', false, { FLAG: 'YES' })).toBe(true);
      expect(envBool('FLAG', false, { FLAG: '1' })).toBe(true);
    });

    it('keeps the default for anything else', () => {
      expect(envBool('FLAG', true, { FLAG: 'maybe' })).toBe(true);
    });
  });

  describe('envString', () => {
    it('trims and falls back on blank', () => {
      expect(envString('NAME', 'lang', { NAME: ' locale ' })).toBe('locale');
      expect(envString('NAME', 'lang', { NAME: '' })).toBe('lang');
      expect(envString('NAME', 'lang', {})).toBe('lang');
    });
  });

  describe('envList', () => {
    it('splits on commas and drops blanks', () => {
      expect(envList('LIST', [], { LIST: 'en, zh-CN,, fr ' })).toEqual([
        'en',
        'zh-CN',
        'fr',
      ]);
    });

    it('distinguishes unset from empty', () => {
      expect(envList('LIST', ['a'], {})).toEqual(['a']);
      expect(envList('LIST', ['a'], { LIST: '' })).toEqual([]);
    });
  });

  describe('envInt', () => {
    it('parses integers and ignores garbage', () => {
      expect(envInt('N', 5, { N: '-1' })).toBe(-1);
      expect(envInt('N', 5, { N: '60' })).toBe(60);
      expect(envInt('N', 5, { N: '1.5' })).toBe(5);
      expect(envInt('N', 5, {})).toBe(5);
    });
  });
});
