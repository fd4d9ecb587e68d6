import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import type { HydratedDocument } from 'mongoose';

@Schema({ timestamps: true })
export class Translation {
  /**
   * Message code, e.g. `error.i18n.too_many_codes`.
   */
  @Prop({ type: String, required: true })
  key!: string;

  /**
   * Locale tag (BCP 47), e.g. "en", "zh-cn", "pt-br".
   * Stored in lowercase for easier matching (client headers may vary in case).
   */
  @Prop({ type: String, required: true, lowercase: true, trim: true })
  locale!: string;

  /**
   * Catalog base name the message was imported from (e.g. "errors", "messages").
   */
  @Prop({ type: String, required: false, lowercase: true, trim: true })
  namespace?: string;

  /**
   * Template with positional `{0}` placeholders.
   */
  @Prop({ type: String, required: true })
  value!: string;

  @Prop({ type: Boolean, default: true })
  isActive!: boolean;
}

export type TranslationDocument = HydratedDocument<Translation>;
export const TranslationSchema = SchemaFactory.createForClass(Translation);

TranslationSchema.index({ locale: 1, key: 1 }, { unique: true });
TranslationSchema.index({ locale: 1, namespace: 1, key: 1 });
