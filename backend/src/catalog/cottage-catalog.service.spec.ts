import { buildSettings } from '../testing/fixtures';
import { CottageCatalog, joinCottageIds } from './cottage-catalog.service';

describe('CottageCatalog', () => {
  const catalog = new CottageCatalog(buildSettings());

  it('looks cottages up by bare or prefixed id', () => {
    expect(catalog.getCottage('9')?.bedrooms).toBe(3);
    expect(catalog.getCottage('Cottage 7')?.bedrooms).toBe(2);
    expect(catalog.getCottage('3')).toBeUndefined();
  });

  it('returns configured nightly rates and null for unknown cottages', () => {
    expect(catalog.getRates('9')).toEqual({ weekday: 33000, weekend: 38000 });
    expect(catalog.getRates('11')).toEqual({ weekday: 26000, weekend: 32000 });
    expect(catalog.getRates('3')).toBeNull();
  });

  it('hides cottage 7 from default listings', () => {
    expect(catalog.listForQuery('what cottages do you have').map((c) => c.id)).toEqual([
      '9',
      '11',
    ]);
    expect(catalog.hiddenByDefault()).toEqual(['7']);
  });

  it('lists named cottages and bedroom filters', () => {
    expect(catalog.listForQuery('tell me about cottage 7').map((c) => c.id)).toEqual(['7']);
    expect(catalog.listForQuery('any 2 bedroom options?').map((c) => c.id)).toEqual(['7']);
    expect(catalog.listForQuery('three-bedroom please').map((c) => c.id)).toEqual(['9', '11']);
  });

  it('judges suitability against base and maximum capacity', () => {
    expect(catalog.isSuitable(5, '9')).toEqual({
      suitable: true,
      reason: '5 guests ≤ 6 base capacity (comfortable at standard capacity)',
    });
    expect(catalog.isSuitable(8, '11')).toEqual({
      suitable: true,
      reason: '8 guests ≤ 9 max capacity (possible with prior confirmation and adjusted pricing)',
    });
    expect(catalog.isSuitable(12, '9').suitable).toBe(false);
  });

  it('formats a capacity summary', () => {
    expect(catalog.capacitySummary('7')).toBe(
      'Cottage 7: 2-bedroom cottage, accommodates up to 6 guests at standard capacity, up to 9 guests with prior confirmation',
    );
  });

  it('opens the total listing with the property name', () => {
    const listing = catalog.formatCottageList('', true);

    expect(listing.split('\n')[0]).toBe('**Hillside Cottages has 7 cottages in the neighborhood.**');
    expect(listing).toContain('**Cottage 11** - 3-bedroom, two-storey cottage with unique attic space');
    expect(listing).not.toContain('**Cottage 7**');
  });
});

describe('joinCottageIds', () => {
  it('joins one, two and three ids', () => {
    expect(joinCottageIds(['9'], 'or')).toBe('9');
    expect(joinCottageIds(['9', '11'], 'and')).toBe('9 and 11');
    expect(joinCottageIds(['7', '9', '11'], 'or')).toBe('7, 9, or 11');
  });
});
