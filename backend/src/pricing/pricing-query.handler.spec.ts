import { format } from 'date-fns';

import { CottageCatalog } from '../catalog/cottage-catalog.service';
import { DateExtractor } from '../conversation/date-extractor';
import { NumberExtractor } from '../conversation/number-extractor';
import { SlotState, emptySlotState } from '../conversation/slot-definitions';
import { SlotExtractionService } from '../conversation/slot-extraction.service';
import { SlotManager } from '../conversation/slot-manager';
import { DisabledCompletionClient } from '../llm/disabled-completion.client';
import { RetrievedDocument, syntheticDocument } from '../retrieval/retrieved-document';
import { buildSettings, fixedClock } from '../testing/fixtures';
import { PricingCalculator } from './pricing-calculator.service';
import { PRICING_ANALYSIS_SOURCE, PricingQueryHandler, PricingResult } from './pricing-query.handler';

describe('PricingQueryHandler', () => {
  const build = (now?: Date) => {
    const catalog = new CottageCatalog(buildSettings());
    const dates = new DateExtractor(fixedClock(now));
    return {
      dates,
      handler: new PricingQueryHandler(new PricingCalculator(catalog), catalog, new NumberExtractor(), dates),
    };
  };
  const { handler, dates } = build();

  const slots = (values: Partial<SlotState>): SlotState => ({ ...emptySlotState(), ...values });

  const computed = (result: PricingResult) => {
    if (result.status !== 'computed') {
      throw new Error(`expected a computed quote, got ${result.status}`);
    }
    return result.quote;
  };

  const nightDates = (result: PricingResult) =>
    computed(result).range.stayNights.map((night) => format(night.date, 'yyyy-MM-dd'));

  it('delegates pricing detection', () => {
    expect(handler.isPricingQuery('how much for cottage 9')).toBe(true);
    expect(handler.isPricingQuery('is it safe')).toBe(false);
  });

  it('prices "cottage 7 for 3 nights, weekdays only" as three weekday nights', () => {
    const question = 'cottage 7 for 3 nights, weekdays only';

    const result = handler.processPricingQuery(question, slots({ cottageId: '7', nights: 3 }), []);

    const quote = computed(result);
    expect(quote.totalPrice).toBe(3 * 22000);
    expect(quote.weekendNights).toBe(0);
    expect(quote.range.stayNights.every((night) => !night.isWeekend)).toBe(true);
    expect(nightDates(result)).toEqual(['2024-03-11', '2024-03-12', '2024-03-13']);
    expect(quote.guests).toBe(6);
    expect(result.answer.split('\n')[0]).toBe(
      'For 3 nights at Cottage 7 (March 11, 2024 to March 14, 2024), the total cost is PKR 66,000.',
    );
  });

  it('skips the weekend when a weekday-only stay starts on a Saturday', () => {
    const saturday = build(new Date(2024, 2, 16, 12)).handler;

    const result = saturday.processPricingQuery(
      'cottage 9 for 2 nights on weekdays',
      slots({ cottageId: '9', nights: 2 }),
      [],
    );

    expect(nightDates(result)).toEqual(['2024-03-18', '2024-03-19']);
    expect(computed(result).totalPrice).toBe(66000);
  });

  it('anchors a night count at today', () => {
    const result = handler.processPricingQuery('cottage 9 for 2 nights', slots({ cottageId: '9', nights: 2 }), []);

    expect(nightDates(result)).toEqual(['2024-03-11', '2024-03-12']);
  });

  it('anchors "next week" at the following Monday', () => {
    const result = handler.processPricingQuery(
      'cottage 11 for 2 nights next week',
      slots({ cottageId: '11', nights: 2 }),
      [],
    );

    expect(nightDates(result)).toEqual(['2024-03-18', '2024-03-19']);
    expect(computed(result).totalPrice).toBe(52000);
  });

  it('re-anchors dates that disagree with the requested night count', () => {
    const range = dates.extractDateRange('march 20 to march 22');

    const result = handler.processPricingQuery(
      'price for cottage 9 for 4 nights',
      slots({ cottageId: '9', nights: 4, dates: range }),
      [],
    );

    const quote = computed(result);
    expect(nightDates(result)).toEqual(['2024-03-20', '2024-03-21', '2024-03-22', '2024-03-23']);
    expect(quote.weekdayNights).toBe(3);
    expect(quote.weekendNights).toBe(1);
    expect(quote.totalPrice).toBe(3 * 33000 + 38000);
  });

  it('uses the guest slot before the question and base occupancy', () => {
    const range = dates.extractDateRange('march 20 to march 22');

    const result = handler.processPricingQuery(
      'price for cottage 11 for 5 people',
      slots({ cottageId: '11', dates: range, guests: 8 }),
      [],
    );

    expect(computed(result).guests).toBe(8);
  });

  it('asks for dates and cottage instead of inventing them', () => {
    const result = handler.processPricingQuery('how much would it cost for my stay', slots({}), []);

    expect(result).toMatchObject({
      status: 'missing_information',
      missingSlots: ['dates or nights', 'cottageId'],
      answer:
        "To calculate pricing, I need the dates of your stay (check-in and check-out dates) and which cottage you're interested in (Cottage 7, 9, or 11).",
    });
    expect(result.template).toContain('Missing slots: dates or nights, cottageId');
  });

  it('asks only for dates when the cottage is known', () => {
    const result = handler.processPricingQuery(
      'price for cottage 9 for 4 guests',
      slots({ cottageId: '9', guests: 4 }),
      [],
    );

    expect(result).toMatchObject({
      status: 'missing_information',
      missingSlots: ['dates or nights'],
      answer:
        'To calculate pricing, I need either the dates of your stay (check-in and check-out dates) or the number of nights.',
    });
  });

  it('asks only for the cottage when dates are known', () => {
    const result = handler.processPricingQuery(
      'price for march 20 to march 22',
      slots({ dates: dates.extractDateRange('march 20 to march 22') }),
      [],
    );

    expect(result).toMatchObject({
      status: 'missing_information',
      missingSlots: ['cottageId'],
      answer: "To calculate pricing, I need to know which cottage you're interested in (Cottage 7, 9, or 11).",
    });
  });

  it('ignores an "any cottage" slot and falls back to the question', () => {
    const result = handler.processPricingQuery(
      'price for cottage 9 for 2 nights',
      slots({ cottageId: 'any', nights: 2 }),
      [],
    );

    expect(computed(result).cottage).toBe('9');
  });

  it('answers general rate questions from the catalog', () => {
    const result = handler.processPricingQuery('what are your rates', slots({}), []);

    expect(result.status).toBe('general_rates');
    expect(result.answer).toBe(
      [
        'Here are the nightly rates:',
        '- Cottage 9: PKR 33,000 per night on weekdays, PKR 38,000 per night on weekends',
        '- Cottage 11: PKR 26,000 per night on weekdays, PKR 32,000 per night on weekends',
        '',
        'Rates are for up to 6 guests. Exact pricing depends on your dates and number of guests.',
      ].join('\n'),
    );
  });

  it('treats "prices for cottage N" as a general question about that cottage', () => {
    expect(handler.isGeneralRatesQuery('prices for cottage 7')).toBe(true);
    expect(handler.isGeneralRatesQuery('price for 4 guests in march')).toBe(false);

    const result = handler.processPricingQuery('prices for cottage 7', slots({}), []);

    expect(result).toMatchObject({
      status: 'general_rates',
      cottage: '7',
      rates: [{ cottage: '7', rates: { weekday: 22000, weekend: 27000 } }],
    });
  });

  it('reads rates from retrieved documents when the catalog has none', () => {
    const documents: RetrievedDocument[] = [
      syntheticDocument('Cottage 5 costs PKR 30,000 per night on weekdays and PKR 35,000 per night on weekends.', {
        source: 'faq',
      }),
    ];

    const result = handler.processPricingQuery('prices for cottage 5', slots({}), documents);

    expect(result).toMatchObject({
      status: 'general_rates',
      rates: [{ cottage: '5', rates: { weekday: 30000, weekend: 35000 } }],
    });
  });

  it('reports a cottage without rates as an error outcome', () => {
    const result = handler.processPricingQuery('price for cottage 5 for 2 nights', slots({ nights: 2 }), []);

    expect(result.status).toBe('error');
    expect(result.answer).toBe('Pricing for Cottage 5 is not available in the system.');
  });

  it('prepends the analysis as a synthetic document', () => {
    const existing = syntheticDocument('Cottage 7 has panoramic views.', { source: 'faq' });
    const result = handler.processPricingQuery(
      'cottage 7 for 3 nights, weekdays only',
      slots({ cottageId: '7', nights: 3 }),
      [existing],
    );

    const enhanced = handler.enhanceContext([existing], result);

    expect(enhanced).toHaveLength(2);
    expect(enhanced[0].metadata).toEqual({
      source: PRICING_ANALYSIS_SOURCE,
      type: 'pricing_analysis',
      totalPrice: 66000,
      cottage: '7',
      guests: 6,
    });
    expect(enhanced[0].content).toContain('TOTAL COST FOR 3 NIGHTS: PKR 66,000');
    expect(enhanced[1]).toBe(existing);
  });

  describe('across turns of one session', () => {
    const clock = fixedClock();
    const numbers = new NumberExtractor();
    const manager = new SlotManager('session-1', {
      extraction: new SlotExtractionService(numbers, dates, new DisabledCompletionClient()),
      numbers,
      dates,
      clock,
    });

    const quote = async (question: string) => {
      manager.updateSlots(await manager.extractSlots(question, 'pricing'));
      return computed(handler.processPricingQuery(question, manager.getSlots(), []));
    };

    it('quotes the stay the guest asked for last', async () => {
      const first = await quote('price for cottage 9 for 3 nights');
      expect([first.nights, first.totalPrice]).toEqual([3, 99000]);

      const dated = await quote('price for cottage 9 from 20 march to 22 march');
      expect(dated.nights).toBe(2);
      expect(format(dated.range.end, 'yyyy-MM-dd')).toBe('2024-03-22');
      expect(dated.totalPrice).toBe(66000);

      const longer = await quote('actually how much for 5 nights');
      expect(longer.nights).toBe(5);
      expect(format(longer.range.start, 'yyyy-MM-dd')).toBe('2024-03-20');
      expect(format(longer.range.end, 'yyyy-MM-dd')).toBe('2024-03-25');
      expect(longer.totalPrice).toBe(175000);
    });
  });
});
