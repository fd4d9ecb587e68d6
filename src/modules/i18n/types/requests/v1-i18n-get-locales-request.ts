export interface V1I18nGetLocalesResponseBody {
  /**
   * Effective locale of this request.
   */
  readonly locale: string;
  readonly defaultLocale: string;
  readonly supported: readonly string[];
}
