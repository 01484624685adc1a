import { Module } from '@nestjs/common';

import { ConversationModule } from '../conversation/conversation.module';
import { SessionRegistry } from './session-registry.service';

@Module({
  imports: [ConversationModule],
  providers: [SessionRegistry],
  exports: [SessionRegistry],
})
export class SessionsModule {}
