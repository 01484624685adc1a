import { ChatRequestPayload } from '@cottage-concierge/shared-types';
import { IsNotEmpty, IsString, Matches, MaxLength } from 'class-validator';

export class ChatRequestDto implements ChatRequestPayload {
  @IsString()
  @Matches(/^[\w-]{1,64}$/, { message: 'sessionId may only contain letters, digits, underscores and hyphens' })
  sessionId!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(2000)
  message!: string;
}
