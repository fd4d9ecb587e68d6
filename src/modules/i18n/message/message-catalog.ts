import type { LocaleIdentifier } from '../locale/locale-identifier';
import type { MessageArgs } from '../types/i18n.types';

/**
 * Store of translated templates keyed by (code, locale).
 *
 * `lookup` returns the formatted text, `undefined` when the code has no
 * translation for the locale, and throws for any other failure.
 */
export abstract class MessageCatalog {
  abstract lookup(
    code: string,
    args: MessageArgs,
    locale: LocaleIdentifier,
  ): string | undefined;
}
