import { Logger } from '@nestjs/common';
import { LocaleIdentifier } from './locale-identifier';

const logger = new Logger('LocaleTagParser');

/** `language` or `language-REGION`, after re-casing. */
const LOCALE_PATTERN = /^[a-z]{2}(-[A-Z]{2})?$/;
const LANGUAGE_ONLY_PATTERN = /^[a-z]{2}$/;

const LOCALE_SEPARATOR = ',';
const QUALITY_VALUE_SEPARATOR = ';';

const FALLBACK_PLATFORM_TAG = 'en';

let platformDefault: LocaleIdentifier | undefined;

/**
 * Locale of the running process (from the ICU default), `en` when the
 * runtime reports something `Intl.Locale` cannot build.
 */
export function getPlatformDefaultLocale(): LocaleIdentifier {
  if (!platformDefault) {
    try {
      platformDefault = LocaleIdentifier.of(
        Intl.DateTimeFormat().resolvedOptions().locale,
      );
    } catch {
      platformDefault = LocaleIdentifier.of(FALLBACK_PLATFORM_TAG);
    }
  }
  return platformDefault;
}

/**
 * First candidate of a weighted list, without its quality value:
 * `zh-CN,zh;q=0.9,en;q=0.8` -> `zh-CN`, `en;q=0.5` -> `en`.
 */
export function extractFirstLocale(raw: string): string {
  let candidate = raw.trim();
  const listEnd = candidate.indexOf(LOCALE_SEPARATOR);
  if (listEnd >= 0) candidate = candidate.substring(0, listEnd).trim();
  const weightStart = candidate.indexOf(QUALITY_VALUE_SEPARATOR);
  if (weightStart >= 0) candidate = candidate.substring(0, weightStart).trim();
  return candidate;
}

export function normalizeLocaleString(raw: string): string {
  return raw.replace(/_/g, '-').trim();
}

/**
 * Shape check only. Parsing does not depend on it: tags such as `fil`,
 * `zh-Hant-TW` or `EN` fail here and are still built.
 */
export function isValidLocaleFormat(normalized: string): boolean {
  if (!normalized) return false;
  if (LANGUAGE_ONLY_PATTERN.test(normalized)) return true;
  const parts = normalized.split('-');
  if (parts.length === 2) {
    const recased = `${parts[0].toLowerCase()}-${parts[1].toUpperCase()}`;
    return LOCALE_PATTERN.test(recased);
  }
  return false;
}

/**
 * Same pipeline as {@link parseLocale} but reports failure as `undefined`.
 */
export function tryParseLocale(
  raw: string | null | undefined,
): LocaleIdentifier | undefined {
  if (!raw || !raw.trim()) return undefined;
  try {
    const normalized = normalizeLocaleString(extractFirstLocale(raw));
    if (!isValidLocaleFormat(normalized)) {
      logger.debug(
        `Locale '${normalized}' is not in language-REGION form, parsing it as a language tag`,
      );
    }
    return LocaleIdentifier.of(normalized);
  } catch (e) {
    logger.debug(
      `Failed to parse locale string '${raw}': ${e instanceof Error ? e.message : String(e)}`,
    );
    return undefined;
  }
}

/**
 * Lowercase canonical tag used to compare configured or stored locales with
 * parsed ones, so aliases meet (`iw` and `he` both give `he`). Unparsable
 * input keeps its normalized spelling.
 */
export function localeKey(raw: string): string {
  return (tryParseLocale(raw)?.tag ?? normalizeLocaleString(raw)).toLowerCase();
}

/**
 * Never throws. Blank or unparsable input yields the platform default.
 */
export function parseLocale(raw: string | null | undefined): LocaleIdentifier {
  return tryParseLocale(raw) ?? getPlatformDefaultLocale();
}

/**
 * Like {@link parseLocale}, with `fallback` in place of the platform default.
 * A blank or unparsable `fallback` means the platform default.
 */
export function parseLocaleSafely(
  raw: string | null | undefined,
  fallback: LocaleIdentifier | string | null | undefined,
): LocaleIdentifier {
  const parsed = tryParseLocale(raw);
  if (parsed) return parsed;
  if (fallback instanceof LocaleIdentifier) return fallback;
  return tryParseLocale(fallback) ?? getPlatformDefaultLocale();
}
