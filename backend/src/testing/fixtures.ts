import { ConfigService } from '@nestjs/config';

import { FixedClock } from '../common/clock';
import { ConversationSettings } from '../config/conversation-settings.service';

/** Monday 11 March 2024, local noon. */
export const MONDAY_MARCH_11 = new Date(2024, 2, 11, 12, 0, 0);

export const fixedClock = (instant: Date = MONDAY_MARCH_11) => new FixedClock(instant);

export const buildSettings = (values: Record<string, string> = {}) =>
  new ConversationSettings(
    new ConfigService({
      PROPERTY_NAME: 'Hillside Cottages',
      CONTACT_URL: 'https://example.com/book',
      CONTACT_PHONE: '+00 000 0000000',
      ...values,
    }),
  );
