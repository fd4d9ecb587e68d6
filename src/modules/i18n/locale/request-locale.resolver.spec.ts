import { buildI18nOptions } from '../testing/i18n-options';
import { LocaleIdentifier } from './locale-identifier';
import { fromHttpRequest, fromRecords } from './locale-source';
import { RequestLocaleResolver } from './request-locale.resolver';

describe('RequestLocaleResolver', () => {
  const open = new RequestLocaleResolver(buildI18nOptions());
  const gated = new RequestLocaleResolver(
    buildI18nOptions({ defaultLocale: 'zh_CN', supportLocales: ['en', 'zh-cn'] }),
  );

  it('prefers the header over the parameter', () => {
    const locale = open.resolve(
      fromRecords({ 'Accept-Language': 'en-US' }, { lang: 'fr-FR' }),
    );
    expect(locale.tag).toBe('en-US');
  });

  it('falls back to the parameter when the header is missing or blank', () => {
    expect(open.resolve(fromRecords({}, { lang: 'fr_FR' })).tag).toBe('fr-FR');
    expect(
      open.resolve(fromRecords({ 'accept-language': '  ' }, { lang: 'de' }))
        .tag,
    ).toBe('de');
  });

  it('returns the default when nothing is provided', () => {
    expect(open.resolve(fromRecords({})).tag).toBe('en');
  });

  it('reads the first entry of a weighted header', () => {
    const locale = gated.resolve(
      fromRecords({ 'accept-language': 'zh-CN,zh;q=0.9,en;q=0.8' }),
    );
    expect(locale.tag).toBe('zh-CN');
  });

  it('redirects unsupported locales to the default', () => {
    const locale = gated.resolve(fromRecords({ 'Accept-Language': 'fr-FR' }));
    expect(locale).toBe(gated.defaultLocale);
    expect(locale.tag).toBe('zh-CN');
  });

  it('accepts a locale whose language alone is supported', () => {
    expect(
      gated.resolve(fromRecords({ 'Accept-Language': 'en-AU' })).tag,
    ).toBe('en-AU');
  });

  it('does not gate the parameter differently from the header', () => {
    expect(gated.resolve(fromRecords({}, { lang: 'ja' })).tag).toBe('zh-CN');
  });

  it('never checks the default against the support list', () => {
    const resolver = new RequestLocaleResolver(
      buildI18nOptions({ defaultLocale: 'de-DE', supportLocales: ['en'] }),
    );
    expect(resolver.resolve(fromRecords({})).tag).toBe('de-DE');
  });

  it('honours configured header and parameter names', () => {
    const resolver = new RequestLocaleResolver(
      buildI18nOptions({ headerName: 'X-Locale', paramName: 'locale' }),
    );
    expect(
      resolver.resolve(
        fromRecords({ 'accept-language': 'fr', 'x-locale': 'it' }),
      ).tag,
    ).toBe('it');
    expect(resolver.resolve(fromRecords({}, { lang: 'fr', locale: 'pt' })).tag).toBe(
      'pt',
    );
  });

  it('is idempotent for identical input', () => {
    const source = fromRecords({ 'accept-language': 'en-GB;q=0.8' });
    expect(gated.resolve(source).tag).toBe(gated.resolve(source).tag);
  });

  it('normalizes the support list', () => {
    const resolver = new RequestLocaleResolver(
      buildI18nOptions({ supportLocales: [' zh_CN ', ''] }),
    );
    expect([...resolver.supportSet]).toEqual(['zh-cn']);
  });

  it('matches deprecated aliases in the support list with their canonical tags', () => {
    const resolver = new RequestLocaleResolver(
      buildI18nOptions({ supportLocales: ['en', 'iw', 'sh', 'de-DD'] }),
    );
    expect([...resolver.supportSet]).toEqual(['en', 'he', 'sr-latn', 'de-de']);
    expect(resolver.resolve(fromRecords({ 'Accept-Language': 'iw' })).tag).toBe(
      'he',
    );
    expect(resolver.resolve(fromRecords({ 'Accept-Language': 'he' })).tag).toBe(
      'he',
    );
    expect(resolver.resolve(fromRecords({}, { lang: 'sh' })).tag).toBe(
      'sr-Latn',
    );
  });

  describe('fromHttpRequest', () => {
    it('reads the query string before the body', () => {
      const source = fromHttpRequest({
        headers: {},
        query: { lang: ['ko', 'ja'] },
        body: { lang: 'fr' },
      });
      expect(source.param('lang')).toBe('ko');
    });

    it('reads a form field when the query has none', () => {
      const source = fromHttpRequest({
        headers: { 'accept-language': 'en' },
        query: {},
        body: { lang: 'fr' },
      });
      expect(source.param('lang')).toBe('fr');
      expect(source.header('Accept-Language')).toBe('en');
    });
  });

  describe('setLocale', () => {
    it('announces a supported locale on the configured header', () => {
      const setHeader = jest.fn();
      gated.setLocale({ setHeader }, LocaleIdentifier.of('en-US'));
      expect(setHeader).toHaveBeenCalledWith('Accept-Language', 'en-US');
    });

    it('ignores unsupported or missing locales', () => {
      const setHeader = jest.fn();
      gated.setLocale({ setHeader }, LocaleIdentifier.of('fr'));
      gated.setLocale({ setHeader }, undefined);
      expect(setHeader).not.toHaveBeenCalled();
    });
  });
});
