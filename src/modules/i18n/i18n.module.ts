import {
  ConsoleLogger,
  Global,
  Inject,
  type MiddlewareConsumer,
  Module,
  type NestModule,
  type OnModuleInit,
} from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_FILTER, ModuleRef } from '@nestjs/core';
import { MongooseModule } from '@nestjs/mongoose';
import { LocalizedExceptionFilter } from './filters/localized-exception.filter';
import { i18nConfig } from './i18n.config';
import { I18nController } from './i18n.controller';
import { I18n } from './i18n.facade';
import { LocaleContext } from './locale/locale.context';
import { LocaleContextMiddleware } from './locale/locale-context.middleware';
import { RequestLocaleResolver } from './locale/request-locale.resolver';
import { MessageCatalog } from './message/message-catalog';
import { MessageService } from './message/message.service';
import { TranslationCatalog } from './message/translation.catalog';
import { Translation, TranslationSchema } from './message/translation.schema';
import type { I18nOptions } from './types/i18n.types';

@Global()
@Module({
  imports: [
    ConfigModule.forFeature(i18nConfig),
    MongooseModule.forFeature([
      { name: Translation.name, schema: TranslationSchema },
    ]),
  ],
  controllers: [I18nController],
  providers: [
    LocaleContext,
    RequestLocaleResolver,
    TranslationCatalog,
    { provide: MessageCatalog, useExisting: TranslationCatalog },
    MessageService,
    LocaleContextMiddleware,
    ConsoleLogger,
    { provide: APP_FILTER, useClass: LocalizedExceptionFilter },
  ],
  exports: [LocaleContext, RequestLocaleResolver, MessageService],
})
export class I18nModule implements NestModule, OnModuleInit {
  constructor(
    private readonly moduleRef: ModuleRef,
    @Inject(i18nConfig.KEY) private readonly options: I18nOptions,
  ) {}

  onModuleInit() {
    I18n.useContainer(() =>
      this.moduleRef.get(MessageService, { strict: false }),
    );
  }

  configure(consumer: MiddlewareConsumer) {
    if (!this.options.enabled) return;
    consumer.apply(LocaleContextMiddleware).forRoutes('*');
  }
}
