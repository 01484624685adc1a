import { IsString, Matches } from 'class-validator';

export class SessionRequestDto {
  @IsString()
  @Matches(/^[\w-]{1,64}$/, { message: 'sessionId may only contain letters, digits, underscores and hyphens' })
  sessionId!: string;
}
