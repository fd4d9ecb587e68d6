import { IsOptional, IsString, MaxLength } from 'class-validator';

export class V1I18nGetMessagesRequestQuery {
  /**
   * Comma separated message codes, e.g. `app.welcome,app.bye`.
   */
  @IsOptional()
  @IsString()
  @MaxLength(8000)
  codes?: string;

  /**
   * Explicit locale override; the request locale is used when absent.
   */
  @IsOptional()
  @IsString()
  @MaxLength(64)
  locale?: string;
}

export interface V1I18nGetMessagesResponseBody {
  /**
   * Locale the messages were resolved in.
   */
  readonly locale: string;
  readonly messages: Readonly<Record<string, string>>;
}

export interface V1I18nGetMessageResponseBody {
  readonly code: string;
  readonly locale: string;
  readonly exists: boolean;
  readonly message: string;
}
