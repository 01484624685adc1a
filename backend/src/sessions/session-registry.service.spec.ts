import { ConfigService } from '@nestjs/config';

import { DateExtractor } from '../conversation/date-extractor';
import { NumberExtractor } from '../conversation/number-extractor';
import { SlotExtractionService } from '../conversation/slot-extraction.service';
import { DisabledCompletionClient } from '../llm/disabled-completion.client';
import { LoggingService } from '../logging/logging.service';
import { buildSettings, fixedClock } from '../testing/fixtures';
import { SessionRegistry } from './session-registry.service';

describe('SessionRegistry', () => {
  let registry: SessionRegistry;
  let loggingService: LoggingService;

  beforeEach(() => {
    const clock = fixedClock();
    const dates = new DateExtractor(clock);
    const numbers = new NumberExtractor();
    loggingService = new LoggingService(new ConfigService({ NODE_ENV: 'test' }));
    jest.spyOn(loggingService, 'logSessionEvent').mockImplementation(() => undefined);

    registry = new SessionRegistry(
      buildSettings(),
      loggingService,
      new SlotExtractionService(numbers, dates, new DisabledCompletionClient()),
      numbers,
      dates,
      clock,
    );
  });

  it('creates a session once and hands back the same one', () => {
    const first = registry.getOrCreate('guest-1');

    expect(registry.getOrCreate('guest-1')).toBe(first);
    expect(registry.size).toBe(1);
    expect(loggingService.logSessionEvent).toHaveBeenCalledTimes(1);
    expect(loggingService.logSessionEvent).toHaveBeenCalledWith('guest-1', 'created');
  });

  it('runs turns for the same session one at a time', async () => {
    const order: string[] = [];
    let releaseFirst: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = registry.withSession('guest-1', async () => {
      order.push('first:start');
      await gate;
      order.push('first:end');
    });
    const second = registry.withSession('guest-1', () => {
      order.push('second');
    });
    const other = registry.withSession('guest-2', () => {
      order.push('other');
    });

    await other;
    expect(order).toEqual(['first:start', 'other']);

    releaseFirst();
    await Promise.all([first, second]);
    expect(order).toEqual(['first:start', 'other', 'first:end', 'second']);
  });

  it('passes a failed turn to its caller and keeps serving the session', async () => {
    await expect(
      registry.withSession('guest-1', () => {
        throw new Error('turn failed');
      }),
    ).rejects.toThrow('turn failed');

    await expect(registry.withSession('guest-1', (session) => session.id)).resolves.toBe('guest-1');
  });

  it('clears history, slots and context but keeps the session', async () => {
    const session = registry.getOrCreate('guest-1');
    session.history.append('how many bedrooms', 'Three.');
    session.slots.setSlot('guests', 4);
    session.context.addIntent('pricing');

    await expect(registry.clear('guest-1')).resolves.toBe(true);

    expect(registry.getOrCreate('guest-1')).toBe(session);
    expect(session.history.length).toBe(0);
    expect(session.slots.getSlot('guests')).toBeNull();
    expect(session.context.getState()).toBe('browsing');
  });

  it('reports unknown sessions on clear and delete', async () => {
    await expect(registry.clear('nobody')).resolves.toBe(false);
    await expect(registry.delete('nobody')).resolves.toBe(false);
    expect(registry.has('nobody')).toBe(false);
  });

  it('deletes a session', async () => {
    registry.getOrCreate('guest-1');

    await expect(registry.delete('guest-1')).resolves.toBe(true);
    expect(registry.has('guest-1')).toBe(false);
    expect(loggingService.logSessionEvent).toHaveBeenLastCalledWith('guest-1', 'deleted');
  });

  it('restores a session from its snapshot', () => {
    const session = registry.getOrCreate('guest-1');
    session.history.append('is it safe', 'Yes.');
    session.slots.setSlot('guests', 5);
    session.slots.setSlot('cottageId', '11');
    session.context.addIntent('pricing');
    const snapshot = registry.snapshot('guest-1');
    if (!snapshot) {
      throw new Error('expected a snapshot');
    }

    const restored = registry.restore(snapshot);

    expect(restored).not.toBe(session);
    expect(restored.history.turns()).toEqual([{ question: 'is it safe', answer: 'Yes.' }]);
    expect(restored.slots.getSlot('guests')).toBe(5);
    expect(restored.slots.getSlot('cottageId')).toBe('11');
    expect(restored.context.getState()).toBe('inquiring');
  });

  it('returns no snapshot for an unknown session', () => {
    expect(registry.snapshot('nobody')).toBeNull();
  });

  it('migrates a legacy session when restoring it', () => {
    const restored = registry.restore({
      session_id: 'legacy-1',
      chat_history: ['question: how much is cottage 9, answer: PKR 33,000 per night'],
      slots: { guests: 4, room_type: 'cottage_9', num_nights: 2, dates: { start_date: '2024-03-15', end_date: '2024-03-17' } },
      current_cottage: 'cottage_9',
    });

    expect(restored.id).toBe('legacy-1');
    expect(restored.slots.getSlot('cottageId')).toBe('9');
    expect(restored.slots.getSlot('guests')).toBe(4);
    expect(restored.slots.getSlot('nights')).toBe(2);
    expect(restored.slots.getSlot('dates')?.weekendNights).toBe(1);
    expect(restored.slots.getCurrentCottage()).toBe('9');
    expect(restored.history.turns()).toEqual([{ question: 'how much is cottage 9', answer: 'PKR 33,000 per night' }]);
    expect(loggingService.logSessionEvent).toHaveBeenLastCalledWith('legacy-1', 'restored');
  });
});
