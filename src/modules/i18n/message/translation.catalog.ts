import {
  Inject,
  Injectable,
  Logger,
  type OnModuleDestroy,
  type OnModuleInit,
} from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { SchedulerRegistry } from '@nestjs/schedule';
import type { Model } from 'mongoose';
import { CatalogUnavailableError, describeError } from '../errors';
import { i18nConfig } from '../i18n.config';
import type { LocaleIdentifier } from '../locale/locale-identifier';
import { parseLocale } from '../locale/locale-tag.parser';
import type { I18nOptions, MessageArgs } from '../types/i18n.types';
import { formatMessage } from './format-message';
import { MessageCatalog } from './message-catalog';
import { MessageSnapshot } from './message-snapshot';
import { Translation, type TranslationDocument } from './translation.schema';

/**
 * Catalog over the `translations` collection. Lookups are served from an
 * in-memory snapshot; the snapshot is reloaded every `cacheSeconds`.
 */
@Injectable()
export class TranslationCatalog
  extends MessageCatalog
  implements OnModuleInit, OnModuleDestroy
{
  static readonly REFRESH_INTERVAL = 'i18n-catalog-refresh';

  private readonly logger = new Logger(TranslationCatalog.name);
  private readonly fallbackLocale: LocaleIdentifier;
  private snapshot?: MessageSnapshot;
  private pendingRefresh?: Promise<void>;

  constructor(
    @InjectModel(Translation.name)
    private readonly translationModel: Model<TranslationDocument>,
    private readonly schedulerRegistry: SchedulerRegistry,
    @Inject(i18nConfig.KEY) private readonly options: I18nOptions,
  ) {
    super();
    this.fallbackLocale = parseLocale(options.defaultLocale);
  }

  async onModuleInit(): Promise<void> {
    await this.refresh();

    const seconds = this.options.messageSource.cacheSeconds;
    if (seconds > 0) {
      const interval = setInterval(() => {
        this.refresh().catch((e) => this.logger.error(e));
      }, seconds * 1000);
      interval.unref();
      this.schedulerRegistry.addInterval(
        TranslationCatalog.REFRESH_INTERVAL,
        interval,
      );
    }
  }

  onModuleDestroy(): void {
    if (
      this.schedulerRegistry.doesExist(
        'interval',
        TranslationCatalog.REFRESH_INTERVAL,
      )
    ) {
      this.schedulerRegistry.deleteInterval(TranslationCatalog.REFRESH_INTERVAL);
    }
  }

  get loaded(): boolean {
    return this.snapshot !== undefined;
  }

  /**
   * Reloads the snapshot. A failed reload keeps serving the previous one.
   * Calls made while a reload is running share it.
   */
  refresh(): Promise<void> {
    if (!this.pendingRefresh) {
      this.pendingRefresh = this.reload().finally(() => {
        this.pendingRefresh = undefined;
      });
    }
    return this.pendingRefresh;
  }

  private async reload(): Promise<void> {
    const namespaces = this.options.messageSource.baseNames.map((name) =>
      name.toLowerCase(),
    );

    try {
      const docs = await this.translationModel
        .find(
          namespaces.length > 0
            ? { isActive: true, namespace: { $in: namespaces } }
            : { isActive: true },
          { _id: 0, key: 1, locale: 1, value: 1 },
        )
        .lean<
          Array<{
            readonly key: string;
            readonly locale: string;
            readonly value: string;
          }>
        >()
        .exec();

      const snapshot = new MessageSnapshot(
        docs.map((doc) => ({
          locale: doc.locale,
          code: doc.key,
          template: doc.value,
        })),
        this.fallbackLocale,
      );
      this.snapshot = snapshot;
      this.logger.log(
        `Message catalog refreshed: ${snapshot.size} message(s) in ${snapshot.locales.length} locale(s).`,
      );
    } catch (e) {
      this.logger.error(
        `Message catalog refresh failed${this.snapshot ? ', keeping the previous snapshot' : ''}: ${describeError(e)}`,
        e instanceof Error ? e.stack : undefined,
      );
    }
  }

  lookup(
    code: string,
    args: MessageArgs,
    locale: LocaleIdentifier,
  ): string | undefined {
    if (!this.snapshot) throw new CatalogUnavailableError();
    const template = this.snapshot.find(code, locale);
    return template === undefined
      ? undefined
      : formatMessage(template, args, locale);
  }
}
