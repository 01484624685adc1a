export const INTENT_TYPES = [
  'greeting',
  'help',
  'faq_question',
  'statement',
  'affirmative',
  'negative',
  'clarification_needed',
  'pricing',
  'availability',
  'booking',
  'rooms',
  'safety',
  'facilities',
  'location',
  'unknown',
] as const;

export type IntentType = (typeof INTENT_TYPES)[number];

/** Intents that route through structured handlers and retrieval. */
export const TOPIC_INTENTS = [
  'faq_question',
  'pricing',
  'availability',
  'booking',
  'rooms',
  'safety',
  'facilities',
  'location',
] as const satisfies readonly IntentType[];

export type TopicIntent = (typeof TOPIC_INTENTS)[number];

export const CONVERSATION_STATES = [
  'browsing',
  'comparing',
  'inquiring',
  'ready_to_book',
  'booking',
  'completed',
] as const;

export type ConversationState = (typeof CONVERSATION_STATES)[number];

export const COTTAGE_IDS = ['7', '9', '11'] as const;

export type CottageId = (typeof COTTAGE_IDS)[number];

export type CottageChoice = CottageId | 'any';

export const SEASONS = ['weekday', 'weekend', 'peak', 'off-peak'] as const;

export type Season = (typeof SEASONS)[number];

export interface StayNight {
  /** ISO calendar date, yyyy-MM-dd */
  date: string;
  isWeekend: boolean;
}

export interface DateRangeView {
  start: string;
  end: string;
  nights: number;
  weekdayNights: number;
  weekendNights: number;
  stayNights: StayNight[];
}

export interface SlotView {
  guests: number | null;
  cottageId: CottageChoice | null;
  dates: DateRangeView | null;
  family: boolean | null;
  nights: number | null;
  season: Season | null;
  budget: string | null;
  preferences: string | null;
}

export interface ChatRequestPayload {
  sessionId: string;
  message: string;
}

export interface ChatReplyPayload {
  sessionId: string;
  intent: IntentType;
  answer: string;
  suggestions: string[];
  slots: SlotView;
  state: ConversationState;
  sources: string[];
}

export const EMPTY_SLOT_VIEW: SlotView = {
  guests: null,
  cottageId: null,
  dates: null,
  family: null,
  nights: null,
  season: null,
  budget: null,
  preferences: null,
};
