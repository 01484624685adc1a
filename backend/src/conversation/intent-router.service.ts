import { Injectable, Logger } from '@nestjs/common';
import { IntentType, TopicIntent } from '@cottage-concierge/shared-types';

import { ConversationSettings } from '../config/conversation-settings.service';
import { CompletionClient } from '../llm/completion-client';
import { ChatHistory } from './chat-history';
import vocabulary from './intent-vocabulary.json';
import { isPricingQuery } from './pricing-query-detector';

interface TopicRule {
  intent: TopicIntent;
  matches: (query: string) => boolean;
}

const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

const phrasePattern = (phrase: string) =>
  new RegExp(`\\b${escapeRegExp(phrase).replace(/\s+/g, '\\s+')}\\b`);

const containsPhrase = (text: string, phrase: string) => phrasePattern(phrase).test(text);

const containsAny = (text: string, phrases: readonly string[]) =>
  phrases.some((phrase) => containsPhrase(text, phrase));

const startsWithPhrase = (text: string, phrase: string) =>
  text === phrase || text.startsWith(`${phrase} `);

const COURTESY_TAIL = /(?:\s+(?:thanks|thank\s+you|thx|please))+$/;

/** The whole utterance is one of the phrases, give or take a trailing "thanks" or "please". */
const isExactReply = (text: string, phrases: readonly string[]) =>
  phrases.includes(text.replace(COURTESY_TAIL, '').trim());

const TOPIC_RULES: TopicRule[] = [
  {
    intent: 'safety',
    matches: (q) =>
      /\b(?:safe|safety|secure|security|guards?|gated|crime|dangerous|emergenc(?:y|ies)|theft|police)\b/.test(q),
  },
  { intent: 'pricing', matches: isPricingQuery },
  {
    intent: 'booking',
    matches: (q) =>
      /\b(?:book|booking|reserve|reservations?|advance\s+payment|payment|pay|deposit|cancel|cancellation)\b/.test(q),
  },
  {
    intent: 'availability',
    matches: (q) =>
      /\b(?:availability|vacanc(?:y|ies)|vacant|fully\s+booked)\b/.test(q) ||
      /\bavailable\s+(?:on|for|from|in|next|this|between|during|at)\b/.test(q) ||
      /\b(?:is|are)\s+(?:it|they|any|cottage\s*\d+|there\s+any\s+cottages?)\s+(?:still\s+)?available\b/.test(q),
  },
  {
    intent: 'location',
    matches: (q) =>
      /\b(?:where|location|located|address|directions?|distance|how\s+far|nearby|near|attractions?|murree|bhurban|reach|route|map)\b/.test(q),
  },
  {
    intent: 'facilities',
    matches: (q) =>
      /\b(?:facilit(?:y|ies)|amenit(?:y|ies)|kitchen|wi-?fi|internet|parking|bbq|barbecue|heat(?:er|ing)|generator|electricity|tv|terrace|balcony|hot\s+water|geyser|cook|chef|breakfast|food|meals?|pets?|towels?|linen)\b/.test(q),
  },
  {
    intent: 'rooms',
    matches: (q) =>
      /\b(?:cottages?|rooms?|bedrooms?|property|properties|accommodate|accommodation|capacity|beds?|layout|view|suitable|suit|fit)\b/.test(q) ||
      /\bhow\s+many\s+(?:people|guests|persons)\b/.test(q),
  },
];

const PRICING_CLARIFY = ['price', 'pricing', 'cost', 'how much', 'rate', 'rates'];
const PRICING_CONTEXT = ['cottage', 'cottages', 'property', 'stay', 'booking', 'rent'];
const FACILITIES_CLARIFY = ['facilities', 'amenities', 'what is available', 'what do you have'];
const FACILITIES_CONTEXT = ['cottage', 'room', 'kitchen', 'parking', 'bbq', 'wifi', 'available', 'what'];

const HELP_REQUEST_PHRASES = [
  'how can you',
  'how you can',
  'what can you',
  'what you can',
  'how do you',
  'what do you',
  'can you help',
  'can you assist',
];
const SHORT_HELP_PHRASES = ['how can', 'what can', 'how do', 'what do', 'can you'];

const FALLBACK_MAX_WORDS = 8;
const FALLBACK_MAX_TOKENS = 10;
const ACKNOWLEDGMENT_MAX_DISTANCE = 2;

export const levenshtein = (a: string, b: string): number => {
  let previous = Array.from({ length: b.length + 1 }, (_, index) => index);
  for (let i = 1; i <= a.length; i += 1) {
    const current = [i];
    for (let j = 1; j <= b.length; j += 1) {
      const substitution = previous[j - 1] + (a[i - 1] === b[j - 1] ? 0 : 1);
      current.push(Math.min(previous[j] + 1, current[j - 1] + 1, substitution));
    }
    previous = current;
  }
  return previous[b.length];
};

/**
 * Decides what an utterance is for. Pattern rules run first; the completion backend only sees
 * short utterances nothing else could place. Anything still ambiguous is treated as a question.
 */
@Injectable()
export class IntentRouter {
  private readonly logger = new Logger(IntentRouter.name);

  constructor(
    private readonly completion: CompletionClient,
    private readonly settings: ConversationSettings,
  ) {}

  async classify(query: string, history?: ChatHistory): Promise<IntentType> {
    const normalized = this.normalize(query);
    const words = normalized.split(/\s+/).filter(Boolean);
    if (words.length === 0) {
      return 'unknown';
    }

    const matched = this.patternMatch(normalized, words, history);
    if (matched === 'faq_question') {
      return this.refineTopic(normalized);
    }
    if (matched) {
      return matched;
    }

    if (this.completion.available && words.length <= FALLBACK_MAX_WORDS) {
      const classified = await this.classifyWithCompletion(query, history);
      this.logger.debug(`Completion classified "${query}" as ${classified}`);
      return classified === 'faq_question' ? this.refineTopic(normalized) : classified;
    }

    this.logger.debug(`Default classification for "${query}"`);
    return this.refineTopic(normalized);
  }

  /** Maps an information request onto its topic, or the configured default. */
  refineTopic(query: string): IntentType {
    const normalized = this.normalize(query);
    return TOPIC_RULES.find((rule) => rule.matches(normalized))?.intent ?? this.settings.defaultIntent;
  }

  getClarificationQuestion(query: string): string {
    const normalized = this.normalize(query);
    if (containsAny(normalized, PRICING_CLARIFY)) {
      return 'Which cottage (9 or 11), which dates (weekday/weekend), and how many guests?';
    }
    if (containsAny(normalized, FACILITIES_CLARIFY)) {
      return 'Which type of facilities are you interested in? (e.g., kitchen, parking, BBQ, WiFi, etc.)';
    }
    return 'Could you please provide more details?';
  }

  /** Lower-cased, punctuation other than apostrophes, slashes and hyphens removed. */
  private normalize(query: string): string {
    return query
      .toLowerCase()
      .replace(/[^\w\s'/-]/g, ' ')
      .replace(/\s+/g, ' ')
      .trim();
  }

  private patternMatch(
    normalized: string,
    words: string[],
    history: ChatHistory | undefined,
  ): IntentType | null {
    const greeting = this.matchGreeting(normalized, words);
    if (greeting !== undefined) {
      return greeting;
    }

    for (const starter of vocabulary.followUpStarters) {
      if (normalized.startsWith(`${starter} `)) {
        const rest = normalized.slice(starter.length).trim();
        if (rest.split(/\s+/).length >= 2) {
          return 'faq_question';
        }
        break;
      }
    }

    if (/(?:^|\s)how\s+to\s/.test(normalized)) {
      return 'faq_question';
    }

    if (this.isHelpRequest(normalized)) {
      return 'help';
    }

    if (isExactReply(normalized, vocabulary.negative)) {
      return 'negative';
    }
    if (isExactReply(normalized, vocabulary.affirmative)) {
      return 'affirmative';
    }

    if (containsAny(normalized, vocabulary.confirmations) && !this.asksSomething(normalized)) {
      return 'statement';
    }

    if (containsAny(normalized, vocabulary.topicKeywords)) {
      const justThanks = containsAny(normalized, vocabulary.thanksIndicators) && words.length <= 4;
      if (!justThanks) {
        return this.needsClarification(normalized, words) ? 'clarification_needed' : 'faq_question';
      }
    }

    const statement = this.matchStatement(normalized, words, history);
    if (statement) {
      return statement;
    }

    if (this.isAskingForInformation(normalized, words)) {
      return 'faq_question';
    }

    return null;
  }

  /** undefined means "not a greeting, keep going". */
  private matchGreeting(normalized: string, words: string[]): IntentType | null | undefined {
    const greeting = vocabulary.greetings.find(
      (candidate) => startsWithPhrase(normalized, candidate) || normalized.includes(` ${candidate} `),
    );
    if (!greeting) {
      return undefined;
    }

    const rest = normalized.replace(greeting, '').replace(/^[\s,!]+/, '').trim();
    if (containsAny(rest, vocabulary.greetingQuestionWords)) {
      return undefined;
    }
    if (words.length <= 3 || (words.length <= 4 && rest.length === 0)) {
      return 'greeting';
    }
    return undefined;
  }

  private isHelpRequest(normalized: string): boolean {
    for (const pattern of vocabulary.helpPatterns) {
      if (!normalized.includes(pattern)) {
        continue;
      }

      const afterFor = normalized.split(' for ')[1];
      const afterAbout = normalized.split(' about ')[1];
      if ((afterFor && afterFor.trim().split(/\s+/).length > 1) || (afterAbout && afterAbout.trim().split(/\s+/).length > 1)) {
        continue;
      }
      if (containsAny(normalized, vocabulary.topicKeywords)) {
        continue;
      }
      return true;
    }
    return false;
  }

  /** Interrogatives anywhere, or an auxiliary verb opening the sentence. */
  private asksSomething(normalized: string): boolean {
    return (
      containsAny(normalized, vocabulary.interrogatives) ||
      vocabulary.auxiliaryOpeners.some((word) => normalized.startsWith(`${word} `))
    );
  }

  private needsClarification(normalized: string, words: string[]): boolean {
    if (words.length === 1) {
      return false;
    }
    if (words.length > 3) {
      return false;
    }

    if (containsAny(normalized, PRICING_CLARIFY) && !containsAny(normalized, PRICING_CONTEXT)) {
      return true;
    }
    return containsAny(normalized, FACILITIES_CLARIFY) && !containsAny(normalized, FACILITIES_CONTEXT);
  }

  private matchStatement(
    normalized: string,
    words: string[],
    history: ChatHistory | undefined,
  ): IntentType | null {
    if (words.length > 3) {
      return null;
    }
    if (vocabulary.followUpStarters.some((starter) => normalized.startsWith(`${starter} `))) {
      return null;
    }
    if (vocabulary.prepositions.some((preposition) => normalized.startsWith(`${preposition} `))) {
      return null;
    }
    if (containsAny(normalized, vocabulary.statementQuestionWords)) {
      return null;
    }

    if (
      vocabulary.statements.includes(normalized) ||
      vocabulary.statementOpeners.some((opener) => startsWithPhrase(normalized, opener))
    ) {
      return 'statement';
    }

    if (words.length === 1 && this.lastAnswerAskedForMore(history)) {
      const close = vocabulary.statements.some(
        (candidate) => !candidate.includes(' ') && levenshtein(normalized, candidate) <= ACKNOWLEDGMENT_MAX_DISTANCE,
      );
      if (close) {
        return 'statement';
      }
    }

    return null;
  }

  lastAnswerAskedForMore(history: ChatHistory | undefined): boolean {
    const answer = history?.lastAnswer()?.toLowerCase();
    return answer !== undefined && vocabulary.anythingElsePrompts.some((prompt) => answer.includes(prompt));
  }

  private isAskingForInformation(normalized: string, words: string[]): boolean {
    if (containsAny(normalized, vocabulary.informationQuestionWords)) {
      const offersHelp = /\bhow\s+(?:can\s+you|you\s+can)\b/.test(normalized) && /\b(?:help|assist)\b/.test(normalized);
      return !offersHelp;
    }

    if (containsAny(normalized, vocabulary.actionVerbs)) {
      return true;
    }

    const afterFor = normalized.split(' for ')[1]?.trim();
    if (afterFor && !['help', 'assist', 'support'].includes(afterFor)) {
      return true;
    }
    if (normalized.split(' about ')[1]?.trim()) {
      return true;
    }

    const helpLike = SHORT_HELP_PHRASES.some((phrase) => normalized.includes(phrase));
    if (/\d/.test(normalized) && !helpLike) {
      return true;
    }
    if (words.length > 2 && !HELP_REQUEST_PHRASES.some((phrase) => normalized.includes(phrase))) {
      return true;
    }
    return words.length >= 2 && words.length <= 3 && !helpLike;
  }

  private async classifyWithCompletion(query: string, history?: ChatHistory): Promise<IntentType> {
    const prompt = `You are an intent classifier. Classify the user query into ONE of these categories:
- greeting: simple greetings like "hi", "hello", "hey"
- help: asking what the assistant can do, like "how can you help"
- question: asking FOR information about a topic (booking, pricing, facilities, location, etc.)
- statement: acknowledgments like "thanks", "ok", "got it", "understood"

When in doubt, answer question.

User query: "${query}"

Previous conversation:
${history && history.length > 0 ? history.toString() : 'None'}

Respond with ONLY the category name (greeting, help, question, or statement):`;

    const reply = await this.completion.generate(prompt, FALLBACK_MAX_TOKENS);
    if (!reply.ok) {
      this.logger.warn(`Intent classification fell back to default: ${reply.error.message}`);
      return 'faq_question';
    }

    const label = reply.value.trim().toLowerCase();
    if (label.includes('statement')) {
      return 'statement';
    }
    if (label.startsWith('greet') || label.includes('greeting')) {
      return 'greeting';
    }
    if (label.includes('help') && !label.includes('question')) {
      return 'help';
    }
    return 'faq_question';
  }
}
