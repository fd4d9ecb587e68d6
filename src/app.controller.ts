import { Controller, Get } from '@nestjs/common';
import { MessageService } from './modules/i18n/message/message.service';

export interface AppStatusResponseBody {
  readonly ok: boolean;
  readonly service: string;
  readonly locale: string;
  readonly message: string;
}

@Controller()
export class AppController {
  constructor(private readonly messageService: MessageService) {}

  @Get()
  getStatus(): AppStatusResponseBody {
    return {
      ok: true,
      service: 'locale-messages-api',
      locale: this.messageService.currentLocale().tag,
      message: this.messageService.getMessage('app.welcome'),
    };
  }
}
