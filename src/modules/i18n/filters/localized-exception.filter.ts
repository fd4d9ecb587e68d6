import {
  type ArgumentsHost,
  Catch,
  ConsoleLogger,
  type ExceptionFilter,
  HttpException,
  HttpStatus,
  Inject,
  Injectable,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { i18nConfig } from '../i18n.config';
import { MessageService } from '../message/message.service';
import type { I18nOptions } from '../types/i18n.types';

const MESSAGE_CODE_PATTERN = /^[a-z0-9][\w-]*(\.[\w-]+)+$/i;

interface LocalizedMessage {
  readonly message: string | string[];
  readonly code?: string;
}

function readField(body: object, key: string): unknown {
  return Object.prototype.hasOwnProperty.call(body, key)
    ? Reflect.get(body, key)
    : undefined;
}

/**
 * Shapes every error response and translates messages that are catalog
 * codes (`throw new BadRequestException('error.i18n.invalid_code')`) into
 * the request locale.
 */
@Catch()
@Injectable()
export class LocalizedExceptionFilter implements ExceptionFilter {
  constructor(
    private readonly logger: ConsoleLogger,
    private readonly messageService: MessageService,
    @Inject(i18nConfig.KEY) private readonly options: I18nOptions,
  ) {
    this.logger.setContext(LocalizedExceptionFilter.name);
  }

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const status =
      exception instanceof HttpException
        ? exception.getStatus()
        : HttpStatus.INTERNAL_SERVER_ERROR;

    const { message, code } = this.localize(
      exception instanceof HttpException
        ? exception.getResponse()
        : 'Internal server error',
    );

    const errorResponse = {
      statusCode: status,
      timestamp: new Date().toISOString(),
      path: request.url,
      method: request.method,
      message,
      ...(code ? { code } : {}),
    };

    if (status >= 500) {
      this.logger.error(
        `Internal Server Error: ${JSON.stringify(errorResponse)}`,
        exception instanceof Error ? exception.stack : undefined,
      );
    } else {
      this.logger.warn(`Client Error: ${JSON.stringify(errorResponse)}`);
    }

    response.status(status).json(errorResponse);
  }

  localize(body: string | object): LocalizedMessage {
    if (typeof body === 'string') return this.translate(body);

    const message = readField(body, 'message');
    const code = readField(body, 'code');
    if (typeof message === 'string' && typeof code === 'string') {
      return { message, code };
    }
    if (typeof message === 'string') return this.translate(message);
    if (
      Array.isArray(message) &&
      message.every((item): item is string => typeof item === 'string')
    ) {
      return { message };
    }
    return { message: 'An error occurred' };
  }

  private translate(message: string): LocalizedMessage {
    if (
      !this.options.enabled ||
      !MESSAGE_CODE_PATTERN.test(message) ||
      !this.messageService.exists(message)
    ) {
      return { message };
    }
    return { message: this.messageService.getMessage(message), code: message };
  }
}
