import type { LocaleIdentifier } from '../locale/locale-identifier';
import { localeKey } from '../locale/locale-tag.parser';

export interface CatalogEntry {
  readonly locale: string;
  readonly code: string;
  readonly template: string;
}

/**
 * Immutable in-memory index `locale -> code -> template`.
 */
export class MessageSnapshot {
  private readonly templates = new Map<string, Map<string, string>>();
  private readonly entryCount: number;

  constructor(
    entries: Iterable<CatalogEntry>,
    private readonly fallback?: LocaleIdentifier,
  ) {
    let count = 0;
    for (const entry of entries) {
      const key = localeKey(entry.locale);
      let byCode = this.templates.get(key);
      if (!byCode) {
        byCode = new Map();
        this.templates.set(key, byCode);
      }
      if (!byCode.has(entry.code)) count++;
      byCode.set(entry.code, entry.template);
    }
    this.entryCount = count;
  }

  get size(): number {
    return this.entryCount;
  }

  get locales(): string[] {
    return [...this.templates.keys()];
  }

  /**
   * Lookup order: the requested tag, its language-region and language
   * forms, then the same for the fallback locale.
   */
  static candidateKeys(
    locale: LocaleIdentifier,
    fallback?: LocaleIdentifier,
  ): string[] {
    const keys = new Set<string>();
    for (const l of fallback ? [locale, fallback] : [locale]) {
      keys.add(l.tag.toLowerCase());
      if (l.region) keys.add(`${l.language}-${l.region}`.toLowerCase());
      keys.add(l.language.toLowerCase());
    }
    return [...keys];
  }

  find(code: string, locale: LocaleIdentifier): string | undefined {
    for (const key of MessageSnapshot.candidateKeys(locale, this.fallback)) {
      const template = this.templates.get(key)?.get(code);
      if (template !== undefined) return template;
    }
    return undefined;
  }
}
