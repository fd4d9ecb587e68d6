import { LocaleIdentifier } from './locale-identifier';
import {
  extractFirstLocale,
  getPlatformDefaultLocale,
  isValidLocaleFormat,
  normalizeLocaleString,
  parseLocale,
  parseLocaleSafely,
  tryParseLocale,
} from './locale-tag.parser';

describe('LocaleTagParser', () => {
  const platformDefault = getPlatformDefaultLocale();

  describe('parseLocale', () => {
    it.each([undefined, null, '', '   ', '\t'])(
      'returns the platform default for blank input %p',
      (raw) => {
        expect(parseLocale(raw)).toBe(platformDefault);
      },
    );

    it.each(['*', '!!', 'en--US', '123', 'e', ';q=0.9', ',en'])(
      'returns the platform default for malformed input %p',
      (raw) => {
        expect(() => parseLocale(raw)).not.toThrow();
        expect(parseLocale(raw)).toBe(platformDefault);
      },
    );

    it('treats underscores and dashes alike', () => {
      const underscore = parseLocale('zh_CN');
      const dash = parseLocale('zh-CN');
      expect(underscore.tag).toBe('zh-CN');
      expect(underscore.equals(dash)).toBe(true);
    });

    it('takes the first candidate of a weighted list', () => {
      const locale = parseLocale('zh-CN,zh;q=0.9,en;q=0.8');
      expect(locale.tag).toBe('zh-CN');
      expect(locale.language).toBe('zh');
      expect(locale.region).toBe('CN');
    });

    it('drops a quality value on a single candidate', () => {
      expect(parseLocale('fr-CA;q=0.7').tag).toBe('fr-CA');
    });

    it('canonicalises casing', () => {
      expect(parseLocale('ZH-cn').tag).toBe('zh-CN');
      expect(parseLocale(' EN ').tag).toBe('en');
    });

    it('keeps tags outside the language-REGION shape', () => {
      // Permissive: the shape check does not gate construction.
      expect(isValidLocaleFormat('zh-Hant-TW')).toBe(false);
      expect(parseLocale('zh_Hant_TW').tag).toBe('zh-Hant-TW');
      expect(isValidLocaleFormat('fil')).toBe(false);
      expect(parseLocale('fil').tag).toBe('fil');
    });
  });

  describe('tryParseLocale', () => {
    it('reports failure as undefined', () => {
      expect(tryParseLocale('*')).toBeUndefined();
      expect(tryParseLocale('')).toBeUndefined();
      expect(tryParseLocale('en_GB')?.tag).toBe('en-GB');
    });
  });

  describe('parseLocaleSafely', () => {
    const german = LocaleIdentifier.of('de-DE');

    it('uses the fallback for blank or malformed input', () => {
      expect(parseLocaleSafely('', german)).toBe(german);
      expect(parseLocaleSafely('*', german)).toBe(german);
      expect(parseLocaleSafely('!!', 'pt_BR').tag).toBe('pt-BR');
    });

    it('ignores the fallback when the input parses', () => {
      expect(parseLocaleSafely('ja-JP', german).tag).toBe('ja-JP');
    });

    it('uses the platform default when the fallback is blank too', () => {
      expect(parseLocaleSafely(undefined, '  ')).toBe(platformDefault);
      expect(parseLocaleSafely('*', null)).toBe(platformDefault);
    });
  });

  describe('helpers', () => {
    it('extracts the first locale', () => {
      expect(extractFirstLocale(' en-US , fr;q=0.5')).toBe('en-US');
      expect(extractFirstLocale('de;q=1')).toBe('de');
    });

    it('normalizes underscores', () => {
      expect(normalizeLocaleString(' zh_Hans_CN ')).toBe('zh-Hans-CN');
    });

    it('validates the language-REGION shape after re-casing', () => {
      expect(isValidLocaleFormat('en')).toBe(true);
      expect(isValidLocaleFormat('zh-cn')).toBe(true);
      expect(isValidLocaleFormat('EN')).toBe(false);
      expect(isValidLocaleFormat('en-USA')).toBe(false);
      expect(isValidLocaleFormat('')).toBe(false);
    });
  });
});
