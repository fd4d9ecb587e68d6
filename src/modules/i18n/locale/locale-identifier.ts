/**
 * Immutable language (+ optional script and region) value.
 *
 * Built on `Intl.Locale`, which canonicalises casing (`zh-cn` -> `zh-CN`) and
 * rejects structurally broken tags with a `RangeError`.
 */
export class LocaleIdentifier {
  readonly language: string;
  readonly script?: string;
  readonly region?: string;
  /** Canonical dash form, e.g. `en`, `zh-CN`, `zh-Hant-TW`. */
  readonly tag: string;

  private constructor(locale: Intl.Locale) {
    this.language = locale.language;
    this.script = locale.script;
    this.region = locale.region;
    this.tag = [locale.language, locale.script, locale.region]
      .filter((part): part is string => !!part)
      .join('-');
    Object.freeze(this);
  }

  /**
   * Throws `RangeError` when `tag` is not a well-formed language tag.
   */
  static of(tag: string): LocaleIdentifier {
    return new LocaleIdentifier(new Intl.Locale(tag));
  }

  equals(other: LocaleIdentifier | null | undefined): boolean {
    return !!other && other.tag.toLowerCase() === this.tag.toLowerCase();
  }

  /**
   * Support-list membership: an empty set accepts everything, otherwise the
   * lowercase full tag or the lowercase language must be listed.
   */
  isIn(supportSet: ReadonlySet<string>): boolean {
    if (supportSet.size === 0) return true;
    return (
      supportSet.has(this.tag.toLowerCase()) ||
      supportSet.has(this.language.toLowerCase())
    );
  }

  toString(): string {
    return this.tag;
  }

  toJSON(): string {
    return this.tag;
  }
}
