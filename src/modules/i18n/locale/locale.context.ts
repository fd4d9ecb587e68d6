import { AsyncLocalStorage } from 'async_hooks';
import { Injectable } from '@nestjs/common';
import type { LocaleIdentifier } from './locale-identifier';
import { getPlatformDefaultLocale } from './locale-tag.parser';

interface LocaleStore {
  locale?: LocaleIdentifier;
}

/**
 * A bound locale. `run` executes work (and everything it schedules) with the
 * locale visible through {@link LocaleContext.current}; `release` unbinds it
 * for any continuation still holding the scope.
 */
export interface LocaleScope {
  readonly locale: LocaleIdentifier | undefined;
  run<T>(fn: () => T): T;
  release(): void;
}

/**
 * Per-request "current locale", carried by async context rather than a
 * global so concurrent requests never see each other's value.
 */
@Injectable()
export class LocaleContext {
  private readonly storage = new AsyncLocalStorage<LocaleStore>();

  open(locale: LocaleIdentifier): LocaleScope {
    const store: LocaleStore = { locale };
    const storage = this.storage;
    return {
      get locale() {
        return store.locale;
      },
      run: (fn) => storage.run(store, fn),
      release: () => {
        store.locale = undefined;
      },
    };
  }

  run<T>(locale: LocaleIdentifier, fn: () => T): T {
    return this.storage.run({ locale }, fn);
  }

  current(): LocaleIdentifier | undefined {
    return this.storage.getStore()?.locale;
  }

  currentOrDefault(): LocaleIdentifier {
    return this.current() ?? getPlatformDefaultLocale();
  }
}
