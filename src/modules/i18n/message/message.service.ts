import { Inject, Injectable, Logger } from '@nestjs/common';
import { describeError } from '../errors';
import { i18nConfig } from '../i18n.config';
import type { LocaleIdentifier } from '../locale/locale-identifier';
import { fromHttpRequest, type HttpRequestLike } from '../locale/locale-source';
import { parseLocale, tryParseLocale } from '../locale/locale-tag.parser';
import { LocaleContext } from '../locale/locale.context';
import { RequestLocaleResolver } from '../locale/request-locale.resolver';
import type { I18nOptions, MessageArgs } from '../types/i18n.types';
import { MessageCatalog } from './message-catalog';

/**
 * How a message was produced:
 * - `catalog`: translation found
 * - `default`: caller-supplied default after a miss (or for a blank code)
 * - `code`: the code itself after a miss
 * - `empty`: nothing to return
 * - `error`: the catalog failed; text is the default or the code
 */
export type MessageDisposition =
  | 'catalog'
  | 'default'
  | 'code'
  | 'empty'
  | 'error';

export interface ResolvedMessage {
  readonly text: string;
  readonly disposition: MessageDisposition;
}

@Injectable()
export class MessageService {
  private readonly logger = new Logger(MessageService.name);

  constructor(
    private readonly catalog: MessageCatalog,
    private readonly resolver: RequestLocaleResolver,
    private readonly localeContext: LocaleContext,
    @Inject(i18nConfig.KEY) private readonly options: I18nOptions,
  ) {}

  /**
   * Looks `code` up in `locale` (the request locale when omitted). Never
   * throws: a miss falls back to `defaultMessage`, then to the code or an
   * empty string depending on `useCodeAsDefaultMessage`; a catalog failure
   * falls back to `defaultMessage`, then to the code.
   */
  resolve(
    code: string | null | undefined,
    args?: MessageArgs | null,
    defaultMessage?: string | null,
    locale?: LocaleIdentifier | null,
  ): ResolvedMessage {
    const fallback = defaultMessage ?? undefined;
    if (!code || !code.trim()) {
      return fallback !== undefined
        ? { text: fallback, disposition: 'default' }
        : { text: '', disposition: 'empty' };
    }

    const target = locale ?? this.currentLocale();
    try {
      const text = this.catalog.lookup(code, args ?? [], target);
      if (text !== undefined) return { text, disposition: 'catalog' };
    } catch (e) {
      this.logger.error(
        `Error retrieving message for code '${code}': ${describeError(e)}`,
      );
      return { text: fallback ?? code, disposition: 'error' };
    }

    this.logger.debug(
      `No message found for code '${code}' with locale '${target.tag}'`,
    );
    if (fallback !== undefined) return { text: fallback, disposition: 'default' };
    return this.options.messageSource.useCodeAsDefaultMessage
      ? { text: code, disposition: 'code' }
      : { text: '', disposition: 'empty' };
  }

  getMessage(
    code: string | null | undefined,
    args?: MessageArgs | null,
    defaultMessage?: string | null,
    locale?: LocaleIdentifier | null,
  ): string {
    return this.resolve(code, args, defaultMessage, locale).text;
  }

  exists(
    code: string | null | undefined,
    locale?: LocaleIdentifier | null,
  ): boolean {
    if (!code || !code.trim()) return false;
    try {
      return (
        this.catalog.lookup(code, [], locale ?? this.currentLocale()) !==
        undefined
      );
    } catch (e) {
      this.logger.error(
        `Error checking message for code '${code}': ${describeError(e)}`,
      );
      return false;
    }
  }

  /**
   * Resolves each distinct code once, without args or default, keeping the
   * first-seen order.
   */
  resolveBatch(
    codes: Iterable<string> | null | undefined,
    locale?: LocaleIdentifier | null,
  ): Map<string, string> {
    const messages = new Map<string, string>();
    if (!codes) return messages;

    const target = locale ?? this.currentLocale();
    for (const code of codes) {
      if (!messages.has(code)) {
        messages.set(code, this.getMessage(code, null, null, target));
      }
    }
    return messages;
  }

  /**
   * Configured support list, or just the default locale when none is
   * declared. Unparsable entries are dropped, duplicates removed.
   */
  supportedLocales(): LocaleIdentifier[] {
    const declared = this.options.supportLocales;
    if (declared.length === 0) return [parseLocale(this.options.defaultLocale)];

    const byTag = new Map<string, LocaleIdentifier>();
    for (const tag of declared) {
      const locale = tryParseLocale(tag);
      if (locale && !byTag.has(locale.tag)) byTag.set(locale.tag, locale);
    }
    return [...byTag.values()];
  }

  currentLocale(): LocaleIdentifier {
    return this.localeContext.currentOrDefault();
  }

  /**
   * Resolves the locale of a request that did not go through the locale
   * middleware.
   */
  localeOf(request: HttpRequestLike | null | undefined): LocaleIdentifier {
    if (!request) return this.currentLocale();
    return this.resolver.resolve(fromHttpRequest(request));
  }
}
