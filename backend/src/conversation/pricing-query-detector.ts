const EXCLUSIONS = [
  'golf rate',
  'golf course',
  'golf package',
  'occupancy rate',
  'capacity rate',
  'exchange rate',
  'interest rate',
  'discount rate',
];

const PRIMARY_KEYWORDS = [
  'price',
  'pricing',
  'cost',
  'how much',
  'pkr',
  'per night',
  'weekday',
  'weekend',
  'total cost',
  'total price',
  'booking cost',
  'stay cost',
  'calculate cost',
];

const DATE_RANGE_FOLLOW_UPS = [
  /\bfrom\s+\d+\s+(?:jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)[a-z]*\s+to\s+\d+/,
  /\b\d+\s+(?:jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)[a-z]*\s+to\s+\d+/,
];

const RATE_CONTEXT = [
  'cottage',
  'booking',
  'stay',
  'night',
  'weekday',
  'weekend',
  'guest',
  'accommodation',
];

const PRICING_QUESTIONS = [
  /\bwhat\s+(?:will\s+be|is)\s+(?:the\s+)?(?:price|cost|rate)/,
  /\btell\s+me\s+(?:the\s+)?(?:price|cost|rate)/,
  /\bhow\s+much\s+(?:will\s+it\s+be|is\s+it|does\s+it\s+cost)/,
  /\bwhat\s+are\s+(?:the\s+|your\s+)?(?:prices|rates|charges)\b/,
];

const NON_PRICING_RATE_WORDS = /\b(?:golf|occupancy|capacity|exchange|interest|discount)\b/;

const startsWord = (text: string, keyword: string): boolean =>
  new RegExp(`\\b${keyword.replace(/\s+/g, '\\s+')}`).test(text);

/**
 * Whether a question asks about money for a stay. Rates of other kinds (golf, occupancy,
 * exchange) never count.
 */
export const isPricingQuery = (question: string): boolean => {
  const normalized = question.toLowerCase();

  if (EXCLUSIONS.some((phrase) => startsWord(normalized, phrase))) {
    return false;
  }

  if (PRIMARY_KEYWORDS.some((keyword) => startsWord(normalized, keyword))) {
    return true;
  }

  if (DATE_RANGE_FOLLOW_UPS.some((pattern) => pattern.test(normalized))) {
    return true;
  }

  if (/\brates?\b/.test(normalized) && RATE_CONTEXT.some((word) => startsWord(normalized, word))) {
    return true;
  }

  return (
    PRICING_QUESTIONS.some((pattern) => pattern.test(normalized)) &&
    !NON_PRICING_RATE_WORDS.test(normalized)
  );
};
