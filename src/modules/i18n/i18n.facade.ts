import { describeError, I18nUnavailableError } from './errors';
import { LocaleIdentifier } from './locale/locale-identifier';
import { parseLocale } from './locale/locale-tag.parser';
import type { MessageService } from './message/message.service';
import type { MessageArgs } from './types/i18n.types';

/**
 * Looks the service up in the application container, e.g.
 * `() => moduleRef.get(MessageService, { strict: false })`.
 */
export type MessageServiceLocator = () => MessageService | undefined;

type LocaleInput = LocaleIdentifier | string | null | undefined;

function toLocale(locale: LocaleInput): LocaleIdentifier | undefined {
  if (!locale) return undefined;
  return locale instanceof LocaleIdentifier ? locale : parseLocale(locale);
}

/**
 * Process-wide access to {@link MessageService} for code that is not
 * constructed by the container (pipes built in decorators, plain helpers).
 * Prefer injecting `MessageService` wherever possible.
 *
 * The service is located on first use and kept for the life of the process.
 * Binding is synchronous, so it happens at most once.
 */
export class I18n {
  private static locator?: MessageServiceLocator;
  private static service?: MessageService;

  /**
   * Registers the container lookup. Done by `I18nModule` on init.
   */
  static useContainer(locator: MessageServiceLocator): void {
    I18n.locator = locator;
    I18n.service = undefined;
  }

  /** Forgets the container and the bound service. */
  static reset(): void {
    I18n.locator = undefined;
    I18n.service = undefined;
  }

  private static messages(): MessageService {
    if (I18n.service) return I18n.service;

    if (!I18n.locator) throw new I18nUnavailableError('no container registered');
    let service: MessageService | undefined;
    try {
      service = I18n.locator();
    } catch (e) {
      throw new I18nUnavailableError(describeError(e));
    }
    if (!service) throw new I18nUnavailableError();

    I18n.service = service;
    return service;
  }

  static get(
    code: string | null | undefined,
    args?: MessageArgs | null,
    locale?: LocaleInput,
  ): string {
    if (!code) return '';
    return I18n.messages().getMessage(code, args, null, toLocale(locale));
  }

  /** Shorthand for {@link I18n.get}. */
  static $(
    code: string | null | undefined,
    args?: MessageArgs | null,
    locale?: LocaleInput,
  ): string {
    return I18n.get(code, args, locale);
  }

  /**
   * `defaultValue` unless the catalog has a translation for `code`.
   */
  static getOrDefault(
    code: string | null | undefined,
    defaultValue: string,
    args?: MessageArgs | null,
    locale?: LocaleInput,
  ): string {
    if (!code) return defaultValue;
    const resolved = I18n.messages().resolve(
      code,
      args,
      null,
      toLocale(locale),
    );
    return resolved.disposition === 'catalog' ? resolved.text : defaultValue;
  }

  static exists(code: string | null | undefined, locale?: LocaleInput): boolean {
    if (!code || !code.trim()) return false;
    return I18n.messages().exists(code, toLocale(locale));
  }

  static batch(
    codes: Iterable<string> | null | undefined,
    locale?: LocaleInput,
  ): Map<string, string> {
    if (!codes) return new Map();
    return I18n.messages().resolveBatch(codes, toLocale(locale));
  }

  static currentLocale(): LocaleIdentifier {
    return I18n.messages().currentLocale();
  }
}
