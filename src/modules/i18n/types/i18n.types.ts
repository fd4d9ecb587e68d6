export interface MessageSourceOptions {
  /**
   * Catalog namespaces to load, e.g. `errors`, `messages`.
   * Empty means every active translation.
   */
  readonly baseNames: readonly string[];
  /**
   * Encoding of the bundle files imported into the catalog.
   */
  readonly encoding: BufferEncoding;
  /**
   * Snapshot refresh period. Zero or less loads the catalog once.
   */
  readonly cacheSeconds: number;
  /**
   * Answer a catalog miss with the code itself instead of an empty string.
   */
  readonly useCodeAsDefaultMessage: boolean;
}

export interface I18nOptions {
  readonly enabled: boolean;
  readonly defaultLocale: string;
  /**
   * Locale tags accepted from requests. Empty accepts everything.
   */
  readonly supportLocales: readonly string[];
  readonly headerName: string;
  readonly paramName: string;
  readonly messageSource: MessageSourceOptions;
}

export type MessageArgs = readonly unknown[];
