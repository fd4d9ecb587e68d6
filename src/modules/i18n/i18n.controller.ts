import {
  BadRequestException,
  Controller,
  Get,
  Param,
  Query,
  Version,
} from '@nestjs/common';
import type { LocaleIdentifier } from './locale/locale-identifier';
import { parseLocaleSafely } from './locale/locale-tag.parser';
import { RequestLocaleResolver } from './locale/request-locale.resolver';
import { MessageService } from './message/message.service';
import { createLocalizedValidationPipe } from './pipes/localized-validation.pipe';
import type { V1I18nGetLocalesResponseBody } from './types/requests/v1-i18n-get-locales-request';
import {
  type V1I18nGetMessageResponseBody,
  V1I18nGetMessagesRequestQuery,
  type V1I18nGetMessagesResponseBody,
} from './types/requests/v1-i18n-get-messages-request';

const MAX_CODES = 100;
const CODE_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]{0,127}$/;

@Controller('i18n')
export class I18nController {
  constructor(
    private readonly messageService: MessageService,
    private readonly resolver: RequestLocaleResolver,
  ) {}

  @Version('1')
  @Get('locales')
  getLocalesV1(): V1I18nGetLocalesResponseBody {
    return {
      locale: this.messageService.currentLocale().tag,
      defaultLocale: this.resolver.defaultLocale.tag,
      supported: this.messageService.supportedLocales().map((l) => l.tag),
    };
  }

  @Version('1')
  @Get('messages')
  getMessagesV1(
    @Query(createLocalizedValidationPipe())
    query: V1I18nGetMessagesRequestQuery,
  ): V1I18nGetMessagesResponseBody {
    const codes = I18nController.parseCodesQuery(query.codes);
    const locale = this.explicitLocale(query.locale);
    const messages = this.messageService.resolveBatch(codes, locale);
    return {
      locale: locale.tag,
      messages: Object.fromEntries(messages),
    };
  }

  @Version('1')
  @Get('messages/:code')
  getMessageV1(
    @Param('code') code: string,
    @Query(createLocalizedValidationPipe())
    query: V1I18nGetMessagesRequestQuery,
  ): V1I18nGetMessageResponseBody {
    if (!CODE_PATTERN.test(code)) {
      throw new BadRequestException('error.i18n.invalid_code');
    }
    const locale = this.explicitLocale(query.locale);
    return {
      code,
      locale: locale.tag,
      exists: this.messageService.exists(code, locale),
      message: this.messageService.getMessage(code, null, null, locale),
    };
  }

  private explicitLocale(raw: string | undefined): LocaleIdentifier {
    return parseLocaleSafely(raw, this.messageService.currentLocale());
  }

  private static parseCodesQuery(codesQuery: string | undefined): string[] {
    if (codesQuery === undefined) return [];

    const unique = [
      ...new Set(
        codesQuery
          .split(',')
          .map((item) => item.trim())
          .filter((item) => item.length > 0),
      ),
    ];

    if (unique.length > MAX_CODES) {
      throw new BadRequestException('error.i18n.too_many_codes');
    }
    if (unique.some((code) => !CODE_PATTERN.test(code))) {
      throw new BadRequestException('error.i18n.invalid_code');
    }
    return unique;
  }
}
