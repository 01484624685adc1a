import { CottageCatalog } from '../catalog/cottage-catalog.service';
import { DateExtractor } from '../conversation/date-extractor';
import { buildSettings, fixedClock } from '../testing/fixtures';
import { PricingCalculator, formatPkr } from './pricing-calculator.service';

describe('PricingCalculator', () => {
  const dates = new DateExtractor(fixedClock());
  const calculatorWith = (values: Record<string, string> = {}) =>
    new PricingCalculator(new CottageCatalog(buildSettings(values)));
  const calculator = calculatorWith();

  it('formats amounts with thousands separators', () => {
    expect(formatPkr(137000)).toBe('PKR 137,000');
  });

  it('prices a weekday-only stay night by night', () => {
    const result = calculator.calculate(4, dates.buildRange(new Date(2024, 2, 11), new Date(2024, 2, 14)), '7');

    if (!result.ok) {
      throw new Error(result.error.message);
    }
    expect(result.value.totalPrice).toBe(66000);
    expect(result.value.weekdayNights).toBe(3);
    expect(result.value.weekendNights).toBe(0);
    expect(result.value.breakdown).toBe(
      [
        '**Weekday Nights (3 nights) at PKR 22,000 per night:**',
        '  - March 11, 2024 (Monday): PKR 22,000',
        '  - March 12, 2024 (Tuesday): PKR 22,000',
        '  - March 13, 2024 (Wednesday): PKR 22,000',
        '  Subtotal: PKR 66,000',
      ].join('\n'),
    );
  });

  it('charges weekend nights at the weekend rate using the real calendar', () => {
    const result = calculator.calculate(4, dates.buildRange(new Date(2024, 2, 15), new Date(2024, 2, 18)), '9');

    if (!result.ok) {
      throw new Error(result.error.message);
    }
    expect(result.value.totalPrice).toBe(33000 + 2 * 38000);
    expect(result.value.weekdayNights + result.value.weekendNights).toBe(result.value.nights);
    expect(result.value.breakdown).toBe(
      [
        '**Weekday Nights (1 nights) at PKR 33,000 per night:**',
        '  - March 15, 2024 (Friday): PKR 33,000',
        '  Subtotal: PKR 33,000',
        '',
        '**Weekend Nights (2 nights) at PKR 38,000 per night:**',
        '  - March 16, 2024 (Saturday): PKR 38,000',
        '  - March 17, 2024 (Sunday): PKR 38,000',
        '  Subtotal: PKR 76,000',
      ].join('\n'),
    );
  });

  it('notes groups above base occupancy without changing the total', () => {
    const range = dates.buildRange(new Date(2024, 2, 11), new Date(2024, 2, 12));
    const result = calculator.calculate(8, range, '11');

    if (!result.ok) {
      throw new Error(result.error.message);
    }
    expect(result.value.totalPrice).toBe(26000);
    expect(result.value.breakdown.endsWith(
      '\n\nNote: Base pricing is for up to 6 guests. For 8 guests, prior confirmation and adjusted pricing may apply.',
    )).toBe(true);
  });

  it('takes base occupancy from configuration', () => {
    const range = dates.buildRange(new Date(2024, 2, 11), new Date(2024, 2, 12));
    const result = calculatorWith({ BASE_OCCUPANCY: '8' }).calculate(8, range, '11');

    expect(result.ok).toBe(true);
    expect(result.ok && result.value.breakdown.includes('Note:')).toBe(false);
  });

  it('reports cottages without rates as an error value', () => {
    const result = calculator.calculate(4, dates.buildRange(new Date(2024, 2, 11), new Date(2024, 2, 12)), '5');

    expect(result).toEqual({
      ok: false,
      error: {
        message: 'Pricing for Cottage 5 not available',
        breakdown: 'Pricing for Cottage 5 is not available in the system.',
      },
    });
  });
});
