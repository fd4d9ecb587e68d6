export class CatalogUnavailableError extends Error {
  constructor(message = 'Message catalog has not been loaded') {
    super(message);
    this.name = CatalogUnavailableError.name;
  }
}

export class I18nUnavailableError extends Error {
  constructor(reason?: string) {
    super(
      `MessageService not available. Please ensure I18nModule is imported and the application is initialised${reason ? ` (${reason})` : ''}.`,
    );
    this.name = I18nUnavailableError.name;
  }
}

export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
