import { Injectable, Logger } from '@nestjs/common';
import { CottageId } from '@cottage-concierge/shared-types';
import { format } from 'date-fns';

import { CottageCatalog, NightlyRates } from '../catalog/cottage-catalog.service';
import { Result, err, ok } from '../common/result';
import { DateRange, StayNightDate } from '../conversation/date-extractor';

export interface PriceQuote {
  cottage: CottageId;
  guests: number;
  range: DateRange;
  rates: NightlyRates;
  nights: number;
  weekdayNights: number;
  weekendNights: number;
  totalPrice: number;
  breakdown: string;
}

export interface PricingError {
  message: string;
  breakdown: string;
}

export const formatPkr = (amount: number): string => `PKR ${amount.toLocaleString('en-US')}`;

const formatStayNight = (night: StayNightDate, rate: number) =>
  `  - ${format(night.date, 'MMMM d, yyyy (EEEE)')}: ${formatPkr(rate)}`;

@Injectable()
export class PricingCalculator {
  private readonly logger = new Logger(PricingCalculator.name);

  constructor(private readonly catalog: CottageCatalog) {}

  getRates(cottage: string): NightlyRates | null {
    return this.catalog.getRates(cottage);
  }

  calculate(guests: number, range: DateRange, cottage: string): Result<PriceQuote, PricingError> {
    const info = this.catalog.getCottage(cottage);
    const rates = info?.rates;
    if (!info || !rates) {
      this.logger.warn(`No rates for Cottage ${cottage}`);
      return err({
        message: `Pricing for Cottage ${cottage} not available`,
        breakdown: `Pricing for Cottage ${cottage} is not available in the system.`,
      });
    }

    const weekdays = range.stayNights.filter((night) => !night.isWeekend);
    const weekends = range.stayNights.filter((night) => night.isWeekend);
    const weekdayTotal = weekdays.length * rates.weekday;
    const weekendTotal = weekends.length * rates.weekend;
    const totalPrice = weekdayTotal + weekendTotal;

    const lines: string[] = [];
    if (weekdays.length > 0) {
      lines.push(
        `**Weekday Nights (${weekdays.length} nights) at ${formatPkr(rates.weekday)} per night:**`,
        ...weekdays.map((night) => formatStayNight(night, rates.weekday)),
        `  Subtotal: ${formatPkr(weekdayTotal)}`,
      );
    }
    if (weekends.length > 0) {
      lines.push(
        `\n**Weekend Nights (${weekends.length} nights) at ${formatPkr(rates.weekend)} per night:**`,
        ...weekends.map((night) => formatStayNight(night, rates.weekend)),
        `  Subtotal: ${formatPkr(weekendTotal)}`,
      );
    }

    let breakdown = lines.join('\n');
    const baseOccupancy = this.catalog.baseOccupancy;
    if (guests > baseOccupancy) {
      breakdown += `\n\nNote: Base pricing is for up to ${baseOccupancy} guests. For ${guests} guests, prior confirmation and adjusted pricing may apply.`;
    }

    this.logger.log(
      `Cottage ${info.id}: ${range.nights} nights (${weekdays.length} weekday, ${weekends.length} weekend) = ${formatPkr(totalPrice)}`,
    );

    return ok({
      cottage: info.id,
      guests,
      range,
      rates,
      nights: range.nights,
      weekdayNights: weekdays.length,
      weekendNights: weekends.length,
      totalPrice,
      breakdown,
    });
  }
}
