import {
  BadRequestException,
  ValidationPipe,
  type ValidationError,
} from '@nestjs/common';
import { I18n } from '../i18n.facade';

function listProperties(errors: ValidationError[], prefix = ''): string[] {
  return errors.flatMap((error) => {
    const path = prefix ? `${prefix}.${error.property}` : error.property;
    return error.children?.length
      ? listProperties(error.children, path)
      : [path];
  });
}

/**
 * `ValidationPipe` whose 400 message comes from the catalog
 * (`error.validation.failed`, `{0}` = offending properties).
 */
export function createLocalizedValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    transform: true,
    exceptionFactory: (errors) => {
      const properties = listProperties(errors).join(', ');
      return new BadRequestException({
        statusCode: 400,
        error: 'Bad Request',
        code: 'error.validation.failed',
        message: I18n.getOrDefault(
          'error.validation.failed',
          `Invalid request: ${properties}`,
          [properties],
        ),
      });
    },
  });
}
