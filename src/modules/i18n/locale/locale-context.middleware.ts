import { Injectable, Logger, type NestMiddleware } from '@nestjs/common';
import type { NextFunction, Request, Response } from 'express';
import type { LocaleIdentifier } from './locale-identifier';
import { LocaleContext } from './locale.context';
import { fromHttpRequest, type HttpRequestLike } from './locale-source';
import {
  type HeaderWriter,
  RequestLocaleResolver,
} from './request-locale.resolver';

export const LOCALE_ATTRIBUTE = 'locale';
export const LANG_ATTRIBUTE = 'lang';
export const CONTENT_LANGUAGE_HEADER = 'Content-Language';

export interface LocaleAttributes {
  [LOCALE_ATTRIBUTE]?: LocaleIdentifier;
  [LANG_ATTRIBUTE]?: string;
}

export type LocaleAwareRequest = HttpRequestLike & LocaleAttributes;

export interface RequestLocaleBinding {
  readonly locale: LocaleIdentifier;
  run<T>(fn: () => T): T;
  /** Idempotent; only the first call has an effect. */
  release(): void;
}

/**
 * Binds the resolved locale for the lifetime of one request.
 *
 * Entry: resolve, bind the ambient locale, set `req.locale` / `req.lang`,
 * announce `Content-Language`. Exit (`finish` or `close`, whichever comes
 * first): unbind and remove both attributes.
 */
@Injectable()
export class LocaleContextMiddleware implements NestMiddleware {
  private readonly logger = new Logger(LocaleContextMiddleware.name);

  constructor(
    private readonly resolver: RequestLocaleResolver,
    private readonly localeContext: LocaleContext,
  ) {}

  use(req: Request & LocaleAttributes, res: Response, next: NextFunction): void {
    const binding = this.bind(req, res);
    res.once('finish', binding.release);
    res.once('close', binding.release);
    binding.run(() => next());
  }

  bind(req: LocaleAwareRequest, res: HeaderWriter): RequestLocaleBinding {
    const locale = this.resolveSafely(req);
    const scope = this.localeContext.open(locale);

    req[LOCALE_ATTRIBUTE] = locale;
    req[LANG_ATTRIBUTE] = locale.tag;
    res.setHeader(CONTENT_LANGUAGE_HEADER, locale.tag);

    let released = false;
    return {
      locale,
      run: (fn) => scope.run(fn),
      release: () => {
        if (released) return;
        released = true;
        scope.release();
        delete req[LOCALE_ATTRIBUTE];
        delete req[LANG_ATTRIBUTE];
      },
    };
  }

  private resolveSafely(req: LocaleAwareRequest): LocaleIdentifier {
    try {
      return this.resolver.resolve(fromHttpRequest(req));
    } catch (e) {
      this.logger.warn(
        `Locale resolution failed, using ${this.resolver.defaultLocale.tag}: ${e instanceof Error ? e.message : String(e)}`,
      );
      return this.resolver.defaultLocale;
    }
  }
}
