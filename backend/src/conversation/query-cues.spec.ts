import { isDirectBookingRequest, isGeneralInformation, isSpecificCalculation, mentionsMonth } from './query-cues';

describe('query cues', () => {
  it('spots calculation cues and month names', () => {
    expect(isSpecificCalculation('how much for 3 nights')).toBe(true);
    expect(isSpecificCalculation('staying in december')).toBe(true);
    expect(isSpecificCalculation('is there a kitchen')).toBe(false);
  });

  it('spots general information openers', () => {
    expect(isGeneralInformation('  What is the check-in time')).toBe(true);
    expect(isGeneralInformation('book cottage 9')).toBe(false);
  });

  it('reads month names', () => {
    expect(mentionsMonth('from 5 Aug')).toBe(true);
    expect(mentionsMonth('from the 5th')).toBe(false);
  });

  describe('isDirectBookingRequest', () => {
    it.each(['Can you book cottage 9 for us?', 'book cottage 11 for the weekend', 'I want to make a reservation'])(
      'treats "%s" as a request',
      (query) => {
        expect(isDirectBookingRequest(query)).toBe(true);
      },
    );

    it.each(['How does booking work?', 'what is the cancellation policy', 'can you tell me about the kitchen'])(
      'treats "%s" as a question',
      (query) => {
        expect(isDirectBookingRequest(query)).toBe(false);
      },
    );
  });
});
