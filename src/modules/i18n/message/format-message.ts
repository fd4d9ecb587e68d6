import type { LocaleIdentifier } from '../locale/locale-identifier';
import type { MessageArgs } from '../types/i18n.types';

const PLACEHOLDER = /''|\{(\d+)\}/g;

function formatArg(value: unknown, locale: LocaleIdentifier): string {
  if (typeof value === 'number' || typeof value === 'bigint') {
    return new Intl.NumberFormat(locale.tag).format(value);
  }
  if (value instanceof Date) {
    return new Intl.DateTimeFormat(locale.tag, {
      dateStyle: 'short',
      timeStyle: 'short',
    }).format(value);
  }
  return String(value);
}

/**
 * Positional `{0}`, `{1}` substitution with locale-aware numbers and dates.
 *
 * Without args the template is returned as stored, so `''` only collapses to
 * a single quote when formatting actually happens. Placeholders without a
 * matching argument are left in place.
 */
export function formatMessage(
  template: string,
  args: MessageArgs,
  locale: LocaleIdentifier,
): string {
  if (args.length === 0) return template;
  return template.replace(PLACEHOLDER, (match, index?: string) => {
    if (index === undefined) return "'";
    const position = Number(index);
    return position < args.length ? formatArg(args[position], locale) : match;
  });
}
