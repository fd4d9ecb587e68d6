import mongoose from 'mongoose';
import * as dotenv from 'dotenv';
import { readdirSync, readFileSync } from 'fs';
import { join } from 'path';
import { i18nOptionsFromEnv } from '../src/modules/i18n/i18n.config';
import {
  flattenBundle,
  isConfiguredBaseName,
  parseBundleFileName,
} from '../src/modules/i18n/message/bundle-file';
import { TranslationSchema } from '../src/modules/i18n/message/translation.schema';

dotenv.config();

const { MONGO_URI } = process.env;
const BUNDLE_DIR = process.env.I18N_BUNDLE_DIR ?? join(__dirname, '..', 'i18n');

const Translation = mongoose.model('Translation', TranslationSchema);

/**
 * Upserts every `<baseName>_<locale>.json` bundle under `i18n/` into the
 * translations collection. The base bundle (`<baseName>.json`) is imported
 * under the default locale.
 */
export async function up(): Promise<void> {
  if (!MONGO_URI) {
    throw new Error('MONGO_URI not found in process.env');
  }
  const options = i18nOptionsFromEnv();
  const { baseNames, encoding } = options.messageSource;

  const operations = readdirSync(BUNDLE_DIR).flatMap((fileName) => {
    const bundle = parseBundleFileName(fileName);
    if (!bundle) return [];
    if (!isConfiguredBaseName(baseNames, bundle.baseName)) return [];

    const locale = (bundle.locale ?? options.defaultLocale).toLowerCase();
    const namespace = bundle.baseName.toLowerCase();
    const content: unknown = JSON.parse(
      readFileSync(join(BUNDLE_DIR, fileName), { encoding }),
    );

    return [...flattenBundle(content)].map(([key, value]) => ({
      updateOne: {
        filter: { locale, key }, // Unique per (locale, key)
        update: {
          $set: { value, namespace, isActive: true },
        },
        upsert: true,
      },
    }));
  });

  await mongoose.connect(MONGO_URI);
  try {
    if (operations.length > 0) await Translation.bulkWrite(operations);
  } finally {
    await mongoose.disconnect();
  }
}

if (require.main === module) {
  up().catch((e) => {
    console.error(e);
    process.exitCode = 1;
  });
}
