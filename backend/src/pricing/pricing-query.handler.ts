import { Injectable, Logger } from '@nestjs/common';
import { addDays, format } from 'date-fns';

import { CottageCatalog, NightlyRates } from '../catalog/cottage-catalog.service';
import { DateExtractor, DateRange } from '../conversation/date-extractor';
import { NumberExtractor } from '../conversation/number-extractor';
import { isPricingQuery } from '../conversation/pricing-query-detector';
import { SlotState } from '../conversation/slot-definitions';
import { RetrievedDocument, syntheticDocument } from '../retrieval/retrieved-document';
import { PriceQuote, PricingCalculator, formatPkr } from './pricing-calculator.service';

export type MissingPricingSlot = 'dates or nights' | 'cottageId';

/**
 * Outcome of a pricing turn. `answer` is shown to the guest when no completion backend
 * is available; `template` is injected ahead of the retrieved documents otherwise.
 */
export type PricingResult =
  | {
      status: 'missing_information';
      missingSlots: MissingPricingSlot[];
      answer: string;
      template: string;
    }
  | {
      status: 'general_rates';
      cottage: string | null;
      rates: Array<{ cottage: string; rates: NightlyRates }>;
      answer: string;
      template: string;
    }
  | { status: 'computed'; quote: PriceQuote; answer: string; template: string }
  | { status: 'error'; cottage: string; answer: string; template: string };

export const PRICING_ANALYSIS_SOURCE = 'structured_pricing_analysis';

const GENERAL_PATTERNS = [
  'what is the pricing',
  'tell me the pricing',
  'tell me pricing',
  'pricing of',
  'what are the prices',
  'pricing per night',
  'rates',
  'how much',
  'what are prices',
  'prices for cottage',
  'pricing for cottage',
  'what is the price',
  'price of',
];

const CALCULATION_PATTERNS = ['pricing for', 'price for', 'cost for', 'calculate', 'with', 'dates', 'guests'];

const CALCULATION_DETAILS = [
  'dates',
  'guests',
  'people',
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
];

const WEEKDAYS_ONLY = /\bweek\s?days?\b/;

const RATE_IN_DOCUMENT = (kind: 'weekday' | 'weekend') =>
  new RegExp(`pkr\\s+([\\d,]+)\\s+per\\s+night\\s+on\\s+${kind}s?`, 'i');

const MISSING_MESSAGES = {
  both: "To calculate pricing, I need the dates of your stay (check-in and check-out dates) and which cottage you're interested in (Cottage 7, 9, or 11).",
  dates:
    'To calculate pricing, I need either the dates of your stay (check-in and check-out dates) or the number of nights.',
  cottage:
    "To calculate pricing, I need to know which cottage you're interested in (Cottage 7, 9, or 11).",
} as const;

@Injectable()
export class PricingQueryHandler {
  private readonly logger = new Logger(PricingQueryHandler.name);

  constructor(
    private readonly calculator: PricingCalculator,
    private readonly catalog: CottageCatalog,
    private readonly numbers: NumberExtractor,
    private readonly dates: DateExtractor,
  ) {}

  isPricingQuery(question: string): boolean {
    return isPricingQuery(question);
  }

  /**
   * Asking for rates in general, as opposed to a quote for particular dates or guests.
   * "prices for cottage 9" stays general; "price for 4 guests" does not.
   */
  isGeneralRatesQuery(question: string): boolean {
    const normalized = question.toLowerCase();
    const matchesGeneral = GENERAL_PATTERNS.some((phrase) => normalized.includes(phrase));
    if (!matchesGeneral) {
      return false;
    }

    if (!CALCULATION_PATTERNS.some((phrase) => normalized.includes(phrase))) {
      return true;
    }
    if (CALCULATION_DETAILS.some((word) => normalized.includes(word))) {
      return false;
    }
    return normalized.includes('prices for cottage') || normalized.includes('pricing for cottage');
  }

  processPricingQuery(question: string, slots: SlotState, documents: RetrievedDocument[]): PricingResult {
    const cottage = this.resolveCottage(question, slots);
    const guests =
      slots.guests ?? this.numbers.extractGroupSize(question) ?? this.catalog.baseOccupancy;
    const range = this.resolveRange(question, slots.dates, slots.nights);

    this.logger.log(
      `Pricing query: guests=${guests}, cottage=${cottage ?? 'unknown'}, nights=${range?.nights ?? 'unknown'}`,
    );

    if (!range || !cottage) {
      const missingSlots: MissingPricingSlot[] = [];
      if (!range) {
        missingSlots.push('dates or nights');
      }
      if (!cottage) {
        missingSlots.push('cottageId');
      }

      if (this.isGeneralRatesQuery(question)) {
        return this.generalRates(cottage, documents);
      }
      return this.missingInformation(missingSlots);
    }

    const quote = this.calculator.calculate(guests, range, cottage);
    if (!quote.ok) {
      return {
        status: 'error',
        cottage,
        answer: quote.error.breakdown,
        template: [
          'STRUCTURED PRICING ANALYSIS:',
          `Cottage: ${cottage}`,
          `Guests: ${guests}`,
          `Dates: ${this.dates.describe(range)}`,
          `Error: ${quote.error.message}`,
        ].join('\n'),
      };
    }

    return {
      status: 'computed',
      quote: quote.value,
      answer: this.quoteAnswer(quote.value),
      template: this.quoteTemplate(quote.value),
    };
  }

  /** Puts the structured analysis in front of whatever retrieval returned. */
  enhanceContext(documents: RetrievedDocument[], result: PricingResult): RetrievedDocument[] {
    const metadata: Record<string, unknown> = { source: PRICING_ANALYSIS_SOURCE, type: 'pricing_analysis' };
    if (result.status === 'computed') {
      metadata.totalPrice = result.quote.totalPrice;
      metadata.cottage = result.quote.cottage;
      metadata.guests = result.quote.guests;
    }
    return [syntheticDocument(result.template, metadata), ...documents];
  }

  private resolveCottage(question: string, slots: SlotState): string | null {
    if (slots.cottageId && slots.cottageId !== 'any') {
      return slots.cottageId;
    }
    return this.numbers.extractCottageNumber(question);
  }

  /**
   * Dates come from the slots. A night count alone anchors a stay at today (or next
   * Monday for "next week"); that is the only place a range is synthesized.
   */
  private resolveRange(question: string, dates: DateRange | null, nights: number | null): DateRange | null {
    if (nights === null || nights <= 0) {
      return dates;
    }

    const weekdaysOnly = WEEKDAYS_ONLY.test(question.toLowerCase());
    if (dates) {
      if (dates.nights === nights) {
        return dates;
      }
      this.logger.warn(`Dates cover ${dates.nights} nights but ${nights} were requested; re-anchoring`);
      return weekdaysOnly
        ? this.dates.buildWeekdayRange(dates.start, nights)
        : this.dates.withNights(dates, nights);
    }

    const anchor = this.dates.stayAnchor(question);
    return weekdaysOnly
      ? this.dates.buildWeekdayRange(anchor, nights)
      : this.dates.buildRange(anchor, addDays(anchor, nights));
  }

  private missingInformation(missingSlots: MissingPricingSlot[]): PricingResult {
    const message =
      missingSlots.length === 2
        ? MISSING_MESSAGES.both
        : missingSlots.includes('dates or nights')
          ? MISSING_MESSAGES.dates
          : MISSING_MESSAGES.cottage;

    return {
      status: 'missing_information',
      missingSlots,
      answer: message,
      template: [
        'STRUCTURED PRICING ANALYSIS:',
        'Status: Missing required information',
        `Missing slots: ${missingSlots.join(', ')}`,
        `Note: ${message}`,
        '',
        'INSTRUCTIONS:',
        '1. Do not assume or invent dates, night counts or example dates.',
        '2. Ask the guest for the missing information before quoting a total.',
        '3. If dates are missing, only per-night rates may be mentioned.',
      ].join('\n'),
    };
  }

  private generalRates(cottage: string | null, documents: RetrievedDocument[]): PricingResult {
    const named = cottage ? this.catalog.getCottage(cottage) : undefined;
    const candidates: string[] = named
      ? [named.id]
      : cottage
        ? [cottage]
        : this.catalog.listForQuery('').map((info) => info.id);

    const rates = candidates.flatMap((id) => {
      const found = this.catalog.getRates(id) ?? this.ratesFromDocuments(id, documents);
      return found ? [{ cottage: id, rates: found }] : [];
    });

    if (rates.length === 0) {
      this.logger.warn(`No rates found for ${cottage ? `Cottage ${cottage}` : 'any cottage'}`);
      return this.missingInformation(cottage ? ['dates or nights'] : ['dates or nights', 'cottageId']);
    }

    const lines = rates.map(
      ({ cottage: id, rates: nightly }) =>
        `- Cottage ${id}: ${formatPkr(nightly.weekday)} per night on weekdays, ${formatPkr(nightly.weekend)} per night on weekends`,
    );
    const occupancy = `Rates are for up to ${this.catalog.baseOccupancy} guests. Exact pricing depends on your dates and number of guests.`;

    return {
      status: 'general_rates',
      cottage,
      rates,
      answer: ['Here are the nightly rates:', ...lines, '', occupancy].join('\n'),
      template: [
        'GENERAL PRICING INFORMATION (all prices in PKR):',
        ...lines,
        '',
        'INSTRUCTIONS:',
        '1. Provide the per-night rates above; never convert currency.',
        '2. Mention that exact pricing depends on dates and number of guests.',
        '3. Do not list cottage descriptions or facilities.',
      ].join('\n'),
    };
  }

  private ratesFromDocuments(cottage: string, documents: RetrievedDocument[]): NightlyRates | null {
    const mentionsCottage = new RegExp(`\\bcottage\\s*${cottage}\\b`, 'i');
    for (const document of documents) {
      if (!mentionsCottage.test(document.content)) {
        continue;
      }
      const weekday = RATE_IN_DOCUMENT('weekday').exec(document.content);
      const weekend = RATE_IN_DOCUMENT('weekend').exec(document.content);
      if (weekday && weekend) {
        return {
          weekday: Number.parseInt(weekday[1].replace(/,/g, ''), 10),
          weekend: Number.parseInt(weekend[1].replace(/,/g, ''), 10),
        };
      }
    }
    return null;
  }

  private quoteAnswer(quote: PriceQuote): string {
    return [
      `For ${quote.nights} nights at Cottage ${quote.cottage} (${this.dates.describe(quote.range)}), the total cost is ${formatPkr(quote.totalPrice)}.`,
      '',
      quote.breakdown,
    ].join('\n');
  }

  private quoteTemplate(quote: PriceQuote): string {
    return [
      `STRUCTURED PRICING ANALYSIS FOR COTTAGE ${quote.cottage} (all prices in PKR):`,
      `- Guests: ${quote.guests}`,
      `- Check-in: ${format(quote.range.start, 'MMMM d, yyyy')}`,
      `- Check-out: ${format(quote.range.end, 'MMMM d, yyyy')}`,
      `- Total Nights: ${quote.nights} (${quote.weekdayNights} weekday nights, ${quote.weekendNights} weekend nights)`,
      `- Weekday Rate: ${formatPkr(quote.rates.weekday)} per night`,
      `- Weekend Rate: ${formatPkr(quote.rates.weekend)} per night`,
      '',
      'DETAILED BREAKDOWN:',
      quote.breakdown,
      '',
      `TOTAL COST FOR ${quote.nights} NIGHTS: ${formatPkr(quote.totalPrice)}`,
      '',
      'INSTRUCTIONS:',
      `1. The total cost is ${formatPkr(quote.totalPrice)}; do not recalculate it.`,
      '2. Keep the listed dates and their weekday or weekend classification exactly as given.',
      '3. Never convert to another currency.',
    ].join('\n');
  }
}
