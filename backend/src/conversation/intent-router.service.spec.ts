import { DisabledCompletionClient } from '../llm/disabled-completion.client';
import { FakeCompletionClient } from '../testing/fake-completion-client';
import { buildSettings } from '../testing/fixtures';
import { ChatHistory } from './chat-history';
import { IntentRouter, levenshtein } from './intent-router.service';

describe('IntentRouter', () => {
  const router = new IntentRouter(new DisabledCompletionClient(), buildSettings());

  it.each([
    ['hi', 'greeting'],
    ['good morning', 'greeting'],
    ['hey there!', 'greeting'],
    ['how can you help', 'help'],
    ['what can you do?', 'help'],
    ['no', 'negative'],
    ['nope, thanks', 'negative'],
    ['yes please', 'affirmative'],
    ['thanks', 'statement'],
    ['thanks for booking', 'statement'],
    ['so it is in pakistan', 'statement'],
    ['price please', 'clarification_needed'],
    ['facilities please', 'clarification_needed'],
  ])('classifies "%s" as %s', async (query, intent) => {
    expect(await router.classify(query)).toBe(intent);
  });

  it.each([
    ['hello, what are your rates?', 'pricing'],
    ['cottage 7 for 3 nights, weekdays only', 'pricing'],
    ['how can i book', 'booking'],
    ['how to reach the cottages', 'location'],
    ['and what about parking', 'facilities'],
    ['is it safe', 'safety'],
    ['are the cottages in a gated community with guards', 'safety'],
    ['is cottage 9 available next week', 'availability'],
    ['where is it located', 'location'],
    ['tell me about cottage 9', 'rooms'],
    ['which cottage is best for 6 people', 'rooms'],
    ['pricing', 'pricing'],
    ['we are 6 people', 'faq_question'],
  ])('refines the information request "%s" to %s', async (query, intent) => {
    expect(await router.classify(query)).toBe(intent);
  });

  it.each([
    ['no thank you', 'negative'],
    ['nothing else', 'negative'],
    ['sure thanks', 'affirmative'],
  ])('takes the whole of "%s" as a reply', async (query, intent) => {
    expect(await router.classify(query)).toBe(intent);
  });

  it.each(['no parking?', 'no pets allowed?', 'nothing for kids?', 'yes but is there wifi?'])(
    'keeps the question in "%s"',
    async (query) => {
      const intent = await router.classify(query);

      expect(intent).not.toBe('negative');
      expect(intent).not.toBe('affirmative');
    },
  );

  it('never routes a safety question to pricing', async () => {
    expect(await router.classify('is it safe')).not.toBe('pricing');
  });

  it('accepts a misspelt acknowledgment after an "anything else" prompt', async () => {
    const history = new ChatHistory(2);
    history.append('where is it', "It's in the hills. Is there anything else you'd like to know?");

    expect(await router.classify('thnks', history)).toBe('statement');
    expect(await router.classify('thnks')).toBe('faq_question');
  });

  it('uses the configured default intent when nothing matches', async () => {
    const configured = new IntentRouter(
      new DisabledCompletionClient(),
      buildSettings({ DEFAULT_INTENT: 'unknown' }),
    );

    expect(await configured.classify('namaste')).toBe('unknown');
  });

  describe('completion fallback', () => {
    it('asks the backend about short unmatched utterances', async () => {
      const completion = new FakeCompletionClient(['Greeting']);
      const withBackend = new IntentRouter(completion, buildSettings());

      expect(await withBackend.classify('namaste')).toBe('greeting');
      expect(completion.prompts[0]).toContain('User query: "namaste"');
    });

    it('falls back to a question when the backend fails', async () => {
      const withBackend = new IntentRouter(
        new FakeCompletionClient([new Error('timeout')]),
        buildSettings(),
      );

      expect(await withBackend.classify('namaste')).toBe('faq_question');
    });

    it('skips the backend when patterns already decided', async () => {
      const completion = new FakeCompletionClient(['statement']);
      const withBackend = new IntentRouter(completion, buildSettings());

      expect(await withBackend.classify('is it safe')).toBe('safety');
      expect(completion.prompts).toEqual([]);
    });
  });

  describe('getClarificationQuestion', () => {
    it('asks for pricing details', () => {
      expect(router.getClarificationQuestion('price please')).toBe(
        'Which cottage (9 or 11), which dates (weekday/weekend), and how many guests?',
      );
    });

    it('asks which facilities', () => {
      expect(router.getClarificationQuestion('facilities please')).toBe(
        'Which type of facilities are you interested in? (e.g., kitchen, parking, BBQ, WiFi, etc.)',
      );
    });

    it('falls back to a generic prompt', () => {
      expect(router.getClarificationQuestion('hmm')).toBe('Could you please provide more details?');
    });
  });

  it('measures edit distance', () => {
    expect(levenshtein('thnks', 'thanks')).toBe(1);
    expect(levenshtein('ok', 'okay')).toBe(2);
  });
});
