import { normalizeLocaleString } from '../locale/locale-tag.parser';

export interface BundleFile {
  readonly baseName: string;
  /** `undefined` for the base bundle (`messages.json`). */
  readonly locale?: string;
}

const BUNDLE_FILE_PATTERN =
  /^([A-Za-z0-9-]+)(?:_([A-Za-z]{2,3}(?:_[A-Za-z0-9]{2,8})*))?\.json$/;

/**
 * `messages_zh_CN.json` -> `{ baseName: 'messages', locale: 'zh-CN' }`.
 */
export function parseBundleFileName(fileName: string): BundleFile | undefined {
  const match = BUNDLE_FILE_PATTERN.exec(fileName);
  if (!match) return undefined;
  const [, baseName, locale] = match;
  return locale === undefined
    ? { baseName }
    : { baseName, locale: normalizeLocaleString(locale) };
}

/**
 * Whether a bundle belongs to one of the configured base names. Compared
 * case-insensitively, the way catalog namespaces are stored. An empty list
 * selects every bundle.
 */
export function isConfiguredBaseName(
  baseNames: readonly string[],
  baseName: string,
): boolean {
  if (baseNames.length === 0) return true;
  const wanted = baseName.toLowerCase();
  return baseNames.some((name) => name.toLowerCase() === wanted);
}

/**
 * Flattens nested bundle JSON into `code -> template`, joining keys with
 * dots. Numbers and booleans are stringified; other values are skipped.
 */
export function flattenBundle(
  value: unknown,
  prefix = '',
  into: Map<string, string> = new Map(),
): Map<string, string> {
  if (!value || typeof value !== 'object' || Array.isArray(value)) return into;

  const entries: Array<[string, unknown]> = Object.entries(value);
  for (const [key, child] of entries) {
    const code = prefix ? `${prefix}.${key}` : key;
    if (typeof child === 'string') into.set(code, child);
    else if (typeof child === 'number' || typeof child === 'boolean') {
      into.set(code, String(child));
    } else flattenBundle(child, code, into);
  }
  return into;
}
