import { registerAs } from '@nestjs/config';
import { plainToInstance } from 'class-transformer';
import {
  IsIn,
  IsOptional,
  IsString,
  Matches,
  validateSync,
} from 'class-validator';
import {
  type Env,
  envBool,
  envInt,
  envList,
  envString,
} from '../../shared/utils/env';
import type { I18nOptions } from './types/i18n.types';

const BOOLEAN_VALUES = ['true', 'false', '1', '0', 'yes', 'no', 'on', 'off'];

const ENCODINGS: readonly BufferEncoding[] = [
  'utf8',
  'utf-8',
  'utf16le',
  'latin1',
  'ascii',
];

export function i18nOptionsFromEnv(env: Env = process.env): I18nOptions {
  const encoding = envString('I18N_ENCODING', 'utf8', env).toLowerCase();
  return {
    enabled: envBool('I18N_ENABLED', true, env),
    defaultLocale: envString('I18N_DEFAULT_LOCALE', 'en', env),
    supportLocales: envList('I18N_SUPPORT_LOCALES', [], env),
    headerName: envString('I18N_HEADER_NAME', 'Accept-Language', env),
    paramName: envString('I18N_PARAM_NAME', 'lang', env),
    messageSource: {
      baseNames: envList('I18N_BASE_NAMES', ['errors', 'messages'], env),
      encoding: Buffer.isEncoding(encoding) ? encoding : 'utf8',
      cacheSeconds: envInt('I18N_CACHE_SECONDS', 30 * 60, env),
      useCodeAsDefaultMessage: envBool(
        'I18N_USE_CODE_AS_DEFAULT_MESSAGE',
        true,
        env,
      ),
    },
  };
}

export const i18nConfig = registerAs('i18n', () => i18nOptionsFromEnv());

class EnvironmentVariables {
  @IsOptional()
  @IsString()
  MONGO_URI?: string;

  @IsOptional()
  @Matches(/^\d*$/)
  PORT?: string;

  @IsOptional()
  @IsIn(BOOLEAN_VALUES)
  I18N_ENABLED?: string;

  @IsOptional()
  @IsString()
  I18N_DEFAULT_LOCALE?: string;

  @IsOptional()
  @IsIn(ENCODINGS)
  I18N_ENCODING?: string;

  @IsOptional()
  @Matches(/^-?\d+$/)
  I18N_CACHE_SECONDS?: string;

  @IsOptional()
  @IsIn(BOOLEAN_VALUES)
  I18N_USE_CODE_AS_DEFAULT_MESSAGE?: string;
}

/**
 * `ConfigModule.forRoot({ validate })` hook. Fails startup on values that
 * would otherwise be silently replaced by defaults.
 */
export function validateEnvironment(
  config: Record<string, unknown>,
): Record<string, unknown> {
  const normalized = Object.fromEntries(
    Object.entries(config).map(([key, value]): [string, unknown] => {
      if (!key.startsWith('I18N_') || typeof value !== 'string') {
        return [key, value];
      }
      const v = value.trim().toLowerCase();
      return [key, v === '' ? undefined : v];
    }),
  );
  const validated = plainToInstance(EnvironmentVariables, normalized);
  const errors = validateSync(validated);
  if (errors.length > 0) {
    const details = errors.map(
      (e) => `${e.property} (${Object.values(e.constraints ?? {}).join(', ')})`,
    );
    throw new Error(`Invalid environment: ${details.join('; ')}`);
  }
  return config;
}
