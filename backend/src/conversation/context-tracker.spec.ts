import { ContextTracker } from './context-tracker';

describe('ContextTracker', () => {
  it('starts out browsing', () => {
    expect(new ContextTracker('s').getState()).toBe('browsing');
  });

  it('moves to inquiring on the first enquiry', () => {
    const tracker = new ContextTracker('s');
    tracker.addIntent('pricing');

    expect(tracker.getState()).toBe('inquiring');
  });

  it('moves to comparing when recent enquiries differ', () => {
    const tracker = new ContextTracker('s');
    tracker.addIntent('rooms');
    tracker.addIntent('pricing');

    expect(tracker.getState()).toBe('comparing');
  });

  it('stays inquiring on repeated enquiries of one kind', () => {
    const tracker = new ContextTracker('s');
    tracker.addIntent('pricing');
    tracker.addIntent('pricing');
    tracker.addIntent('pricing');

    expect(tracker.getState()).toBe('inquiring');
  });

  it('is ready to book after asking about prices', () => {
    const tracker = new ContextTracker('s');
    tracker.addIntent('pricing');
    tracker.addIntent('booking');

    expect(tracker.getState()).toBe('ready_to_book');
    expect(tracker.isReadyToBook()).toBe(true);
  });

  it('books straight away without prior enquiries', () => {
    const tracker = new ContextTracker('s');
    tracker.addIntent('safety');
    tracker.addIntent('booking');

    expect(tracker.getState()).toBe('booking');
    expect(tracker.isReadyToBook()).toBe(false);
  });

  it('keeps a window of ten intents', () => {
    const tracker = new ContextTracker('s');
    tracker.addIntent('greeting');
    for (let i = 0; i < 10; i += 1) {
      tracker.addIntent('location');
    }

    expect(tracker.getRecentIntents(20)).toHaveLength(10);
    expect(tracker.getRecentIntents(20)).not.toContain('greeting');
    expect(tracker.getLastIntent()).toBe('location');
  });

  it('summarises the latest points', () => {
    const tracker = new ContextTracker('s');
    for (let i = 1; i <= 22; i += 1) {
      tracker.addToSummary(`point ${i}`);
    }

    expect(tracker.getSummary(2)).toBe('point 21\npoint 22');
    expect(tracker.snapshot().summary).toHaveLength(20);
  });

  it('describes what is known about the guest for the answer prompt', () => {
    const tracker = new ContextTracker('s');
    expect(tracker.describeGuest()).toBe('');

    tracker.updatePreferences({ guests: 4, family: true });
    tracker.addKeyPoint('quotedCottage', '9');
    tracker.addToSummary('pricing: price for cottage 9');

    expect(tracker.describeGuest()).toBe(
      'Preferences: guests: 4, family: true\nKey points: quotedCottage: 9\nRecent topics:\npricing: price for cottage 9',
    );
  });

  it('restores preferences and key points', () => {
    const tracker = new ContextTracker('s');
    tracker.updatePreferences({ view: 'valley' });
    tracker.addKeyPoint('cottage', '9');
    tracker.addIntent('rooms');

    const restored = ContextTracker.restore('s', tracker.snapshot());

    expect(restored.getPreference('view')).toBe('valley');
    expect(restored.getKeyPoint('cottage')).toBe('9');
    expect(restored.getState()).toBe('inquiring');
  });

  it('clears back to browsing', () => {
    const tracker = new ContextTracker('s');
    tracker.addIntent('booking');
    tracker.clear();

    expect(tracker.getState()).toBe('browsing');
    expect(tracker.getLastIntent()).toBeNull();
  });
});
