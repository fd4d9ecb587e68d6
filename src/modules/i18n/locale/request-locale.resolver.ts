import { Inject, Injectable } from '@nestjs/common';
import { i18nConfig } from '../i18n.config';
import type { I18nOptions } from '../types/i18n.types';
import type { LocaleIdentifier } from './locale-identifier';
import type { LocaleSource } from './locale-source';
import { localeKey, parseLocale } from './locale-tag.parser';

export interface HeaderWriter {
  setHeader(name: string, value: string): unknown;
}

/**
 * Picks the effective locale of a request: header, then parameter, gated by
 * the support list, else the configured default. Stateless after
 * construction.
 */
@Injectable()
export class RequestLocaleResolver {
  readonly defaultLocale: LocaleIdentifier;
  readonly supportSet: ReadonlySet<string>;

  constructor(@Inject(i18nConfig.KEY) private readonly options: I18nOptions) {
    this.defaultLocale = parseLocale(options.defaultLocale);
    this.supportSet = new Set(
      options.supportLocales
        .map(localeKey)
        .filter((tag) => tag.length > 0),
    );
  }

  resolve(source: LocaleSource): LocaleIdentifier {
    const candidate =
      this.read(source.header.bind(source), this.options.headerName) ??
      this.read(source.param.bind(source), this.options.paramName);

    // The default is trusted as configured and never gated.
    return candidate && this.isSupported(candidate)
      ? candidate
      : this.defaultLocale;
  }

  isSupported(locale: LocaleIdentifier): boolean {
    return locale.isIn(this.supportSet);
  }

  /**
   * Announces an explicitly chosen locale on the response, for callers that
   * manage the request lifecycle themselves. Unsupported locales are ignored.
   */
  setLocale(
    response: HeaderWriter | null | undefined,
    locale: LocaleIdentifier | null | undefined,
  ): void {
    if (!response || !locale || !this.isSupported(locale)) return;
    response.setHeader(this.options.headerName, locale.tag);
  }

  private read(
    lookup: (name: string) => string | undefined,
    name: string,
  ): LocaleIdentifier | undefined {
    if (!name.trim()) return undefined;
    const raw = lookup(name);
    if (!raw || !raw.trim()) return undefined;
    return parseLocale(raw);
  }
}
