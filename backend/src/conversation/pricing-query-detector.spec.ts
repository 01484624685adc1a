import { isPricingQuery } from './pricing-query-detector';

describe('isPricingQuery', () => {
  it.each([
    'what is the price of cottage 9',
    'how much for 3 nights',
    'cottage 7 for 3 nights, weekdays only',
    'i will stay from 10 march to 19 march',
    'what are the rates for a weekend stay',
    'what is the rate',
  ])('treats "%s" as pricing', (question) => {
    expect(isPricingQuery(question)).toBe(true);
  });

  it.each([
    'is it safe',
    'what are the golf rates nearby',
    'what is the occupancy rate in summer',
    'tell me about the rates of exchange',
    'where is the cottage',
  ])('does not treat "%s" as pricing', (question) => {
    expect(isPricingQuery(question)).toBe(false);
  });
});
