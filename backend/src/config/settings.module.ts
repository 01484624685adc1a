import { Global, Module } from '@nestjs/common';

import { Clock, SystemClock } from '../common/clock';
import { ConversationSettings } from './conversation-settings.service';

@Global()
@Module({
  providers: [ConversationSettings, { provide: Clock, useClass: SystemClock }],
  exports: [ConversationSettings, Clock],
})
export class SettingsModule {}
