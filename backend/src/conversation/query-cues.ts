const MONTH_NAME =
  /\b(?:jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)\b/;

const CALCULATION_CUES =
  /\b(?:price|pricing|cost|costs|rate|rates|how much|total|calculate|book|booking|reserve|reservation|nights?|days?|guests?|people|persons?|members?|check-?in|check-?out|weekdays?|weekends?)\b/;

const GENERAL_INFORMATION =
  /^(?:what\s+is|what\s+are|what's|tell\s+me\s+about|is\s+there|are\s+there|do\s+you\s+have|does\s+it\s+have|describe)\b/;

/** Booking, pricing, date or head-count cues. */
export const isSpecificCalculation = (query: string): boolean => {
  const normalized = query.toLowerCase();
  return CALCULATION_CUES.test(normalized) || MONTH_NAME.test(normalized);
};

/** "what is…", "tell me about…", "is there…" and similar. */
export const isGeneralInformation = (query: string): boolean =>
  GENERAL_INFORMATION.test(query.toLowerCase().trim());

export const mentionsMonth = (query: string): boolean => MONTH_NAME.test(query.toLowerCase());

const BOOKING_VERB = /\b(?:book|booking|reserve|reservation)\b/;

const BOOKING_REQUEST =
  /\b(?:for me|for us|i want|i need|i'd like|can you|could you|please|make a (?:booking|reservation))\b|^(?:book|reserve)\b/;

/** "book cottage 9 for us", "can you reserve…": asks us to do the booking rather than explain it. */
export const isDirectBookingRequest = (query: string): boolean => {
  const normalized = query.toLowerCase().trim();
  return BOOKING_VERB.test(normalized) && BOOKING_REQUEST.test(normalized);
};
