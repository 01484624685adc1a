import { DisabledCompletionClient } from '../llm/disabled-completion.client';
import { CompletionClient } from '../llm/completion-client';
import { FakeCompletionClient } from '../testing/fake-completion-client';
import { fixedClock } from '../testing/fixtures';
import { DateExtractor } from './date-extractor';
import { NumberExtractor } from './number-extractor';
import { SlotExtractionService } from './slot-extraction.service';
import { SlotManager } from './slot-manager';

describe('SlotManager', () => {
  const clock = fixedClock();
  const numbers = new NumberExtractor();
  const dates = new DateExtractor(clock);

  const deps = (completion: CompletionClient = new DisabledCompletionClient()) => ({
    extraction: new SlotExtractionService(numbers, dates, completion),
    numbers,
    dates,
    clock,
  });

  const build = (completion?: CompletionClient) => new SlotManager('session-1', deps(completion));

  const turn = async (manager: SlotManager, query: string, intent: Parameters<SlotManager['extractSlots']>[1]) => {
    const extracted = await manager.extractSlots(query, intent);
    manager.updateSlots(extracted);
    return extracted;
  };

  it('extracts cottage and group size independently', async () => {
    const manager = build();

    const extracted = await manager.extractSlots('cottage 9 for 4 guests', 'pricing');

    expect(extracted).toEqual({ guests: 4, cottageId: '9' });
  });

  it('lists missing slots in priority order until valid values arrive', async () => {
    const manager = build();
    expect(manager.getMissingSlots('pricing')).toEqual([
      'guests',
      'cottageId',
      'dates',
      'nights',
      'season',
    ]);

    await turn(manager, 'cottage 9 for 4 guests', 'pricing');

    expect(manager.getMissingSlots('pricing')).toEqual(['dates', 'nights', 'season']);
    expect(manager.getMostImportantMissingSlot('pricing')).toBe('dates');
    expect(manager.getMissingSlots('safety')).toEqual([]);
  });

  it('discards invalid values', () => {
    const manager = build();

    manager.updateSlots({ guests: 12, nights: 0 });

    expect(manager.getSlot('guests')).toBeNull();
    expect(manager.getSlot('nights')).toBeNull();
    expect(manager.getMissingSlots('booking')).toEqual([
      'guests',
      'cottageId',
      'dates',
      'family',
      'nights',
    ]);
  });

  it('rejects a stay longer than thirty nights', async () => {
    const manager = build();

    await turn(manager, 'from 1 march to 15 april', 'availability');

    expect(manager.getSlot('dates')).toBeNull();
  });

  it('is idempotent for repeated updates', () => {
    const manager = build();

    manager.updateSlots({ guests: 4, cottageId: '9' });
    const first = manager.getSlots();
    manager.updateSlots({ guests: 4, cottageId: '9' });

    expect(manager.getSlots()).toEqual(first);
    expect(manager.getHistory().map((entry) => entry.slot)).toEqual(['guests', 'cottageId']);
  });

  it('keeps a stored cottage for non-calculation follow-ups', async () => {
    const manager = build();
    await turn(manager, 'tell me about cottage 9', 'rooms');

    const extracted = await turn(manager, 'and cottage 11?', 'faq_question');

    expect(extracted).toEqual({});
    expect(manager.getSlot('cottageId')).toBe('9');
    expect(manager.getCurrentCottage()).toBe('11');
  });

  it('switches cottage when a calculation names a different one', async () => {
    const manager = build();
    await turn(manager, 'tell me about cottage 9', 'rooms');

    await turn(manager, 'price for cottage 11 for 2 nights', 'pricing');

    expect(manager.getSlot('cottageId')).toBe('11');
    expect(manager.getSlot('nights')).toBe(2);
  });

  it('replaces stored dates with a new explicit range in a pricing turn', async () => {
    const manager = build();
    await turn(manager, 'march 15 to march 18', 'pricing');

    await turn(manager, 'actually march 20 to march 22', 'pricing');

    expect(manager.getSlot('dates')?.start).toEqual(new Date(2024, 2, 20));
    expect(manager.getSlot('dates')?.nights).toBe(2);
  });

  it('takes a new night count in a pricing turn', async () => {
    const manager = build();
    await turn(manager, 'price for cottage 9 for 3 nights', 'pricing');

    await turn(manager, 'actually how much for 5 nights', 'pricing');

    expect(manager.getSlot('nights')).toBe(5);
  });

  it('keeps the stored night count outside calculations', async () => {
    const manager = build();
    await turn(manager, 'price for cottage 9 for 3 nights', 'pricing');

    await turn(manager, 'is breakfast included for 4 nights', 'facilities');

    expect(manager.getSlot('nights')).toBe(3);
  });

  it('lets new dates set the night count when the turn gives none', async () => {
    const manager = build();
    await turn(manager, 'price for cottage 9 for 3 nights', 'pricing');

    const extracted = await turn(manager, 'price for cottage 9 from 20 march to 22 march', 'pricing');

    expect(extracted.nights).toBe(2);
    expect(manager.getSlot('nights')).toBe(2);
    expect(manager.getSlot('dates')?.nights).toBe(2);
  });

  describe('cottage contamination guard', () => {
    it('does not carry a cottage into a general safety question', async () => {
      const manager = build();
      await turn(manager, 'tell me about cottage 9', 'rooms');

      expect(manager.shouldUseCurrentCottage('is it safe', 'safety')).toBe(false);
      expect(manager.cottageFor('is it safe', 'safety')).toBeNull();
    });

    it('carries the cottage into a pricing calculation', async () => {
      const manager = build();
      await turn(manager, 'tell me about cottage 9', 'rooms');

      expect(manager.cottageFor('how much for 3 nights', 'pricing')).toBe('9');
    });

    it('does not carry the cottage into a general pricing question', async () => {
      const manager = build();
      await turn(manager, 'tell me about cottage 9', 'rooms');

      expect(manager.shouldUseCurrentCottage('what is the price per night', 'pricing')).toBe(false);
    });

    it('always honours an explicitly named cottage', () => {
      const manager = build();

      expect(manager.shouldUseCurrentCottage('is cottage 11 safe', 'safety')).toBe(true);
      expect(manager.cottageFor('is cottage 11 safe', 'safety')).toBe('11');
    });
  });

  it('needs two of guests, dates and cottage before a booking nudge', () => {
    const manager = build();
    manager.updateSlots({ guests: 4 });
    expect(manager.hasEnoughBookingInfo()).toBe(false);

    manager.updateSlots({ cottageId: '11' });
    expect(manager.hasEnoughBookingInfo()).toBe(true);
  });

  it('clears every slot and the history', async () => {
    const manager = build();
    await turn(manager, 'cottage 9 for 4 guests', 'pricing');

    manager.clearSlots();

    expect(manager.getSlot('guests')).toBeNull();
    expect(manager.getCurrentCottage()).toBeNull();
    expect(manager.getHistory()).toEqual([]);
  });

  it('restores from a snapshot', async () => {
    const manager = build();
    await turn(manager, 'cottage 9 for 4 guests from march 15 to march 18', 'pricing');

    const restored = SlotManager.restore('session-1', manager.snapshot(), deps());

    expect(restored.getSlot('guests')).toBe(4);
    expect(restored.getSlot('cottageId')).toBe('9');
    expect(restored.getSlot('dates')?.start).toEqual(new Date(2024, 2, 15));
    expect(restored.getSlot('dates')?.weekdayNights).toBe(1);
    expect(restored.getCurrentCottage()).toBe('9');
    expect(restored.getHistory()).toHaveLength(3);
  });

  describe('completion fallback', () => {
    it('re-reads a fenced JSON guess through the extractors', async () => {
      const completion = new FakeCompletionClient([
        '```json\n{"guests": 5, "cottage": "cottage_11", "dates": null, "family": true, "season": "weekend", "nights": 2}\n```',
      ]);
      const manager = build(completion);

      const extracted = await manager.extractSlots('something vague about our trip', 'booking');

      expect(extracted).toEqual({
        guests: 5,
        cottageId: '11',
        family: true,
        season: 'weekend',
        nights: 2,
      });
      expect(completion.prompts).toHaveLength(1);
    });

    it('keeps pattern results when the reply is not JSON', async () => {
      const manager = build(new FakeCompletionClient(['not json']));

      expect(await manager.extractSlots('we are 4 people', 'booking')).toEqual({ guests: 4 });
    });

    it('keeps pattern results when the backend fails', async () => {
      const manager = build(new FakeCompletionClient([new Error('connection reset')]));

      expect(await manager.extractSlots('we are 4 people', 'booking')).toEqual({ guests: 4 });
    });

    it('does not ask when patterns found enough', async () => {
      const completion = new FakeCompletionClient(['{}']);
      const manager = build(completion);

      await manager.extractSlots('cottage 9 for 4 guests', 'pricing');

      expect(completion.prompts).toEqual([]);
    });
  });
});
