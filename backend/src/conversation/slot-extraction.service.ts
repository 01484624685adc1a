import { Injectable, Logger } from '@nestjs/common';
import { CottageChoice, IntentType } from '@cottage-concierge/shared-types';

import { isCottageId } from '../catalog/cottage-catalog.service';
import { CompletionClient, extractJsonFromMarkdown } from '../llm/completion-client';
import { DateExtractor } from './date-extractor';
import { NumberExtractor } from './number-extractor';
import { isSpecificCalculation } from './query-cues';
import { ExtractedSlots, isSeason, requiredSlotsFor, SlotState } from './slot-definitions';

const FAMILY_IN_GROUP = /\bin\s+which\s+\d+\s+are\s+(?:children|kids|child)\b/;
const FAMILY_WORDS = /\b(?:family|families|kids?|child|children)\b/;
const FRIENDS_WORDS = /\b(?:friends|colleagues|group)\b/;

const NIGHTS_PATTERNS: RegExp[] = [
  /\bif\s+stay\s+(\d+)\s+nights?\b/,
  /\bstay\s+(\d+)\s+nights?\b/,
  /\b(\d+)\s+nights?\s+stay\b/,
  /\b(\d+)\s+nights?\b/,
  /\bfor\s+(\d+)\s+nights?\b/,
  /\b(\d+)\s+days?\s+stay\b/,
  /\bstay\s+(\d+)\s+days?\b/,
];

const BUDGET = /\b(?:budget|afford)\b\D{0,20}?((?:pkr\s*)?\d[\d,]*k?)\b/;
const PREFERENCE = /\b(?:prefer|prefers|preferably|would\s+like)\s+(?:a\s+|an\s+|the\s+|to\s+have\s+)?([a-z][a-z -]*[a-z])/;
const PREFERENCE_STOP = /\s+(?:for|with|and|in|on|from|if|but|please)\b/;

const DATE_SLOT_INTENTS: readonly IntentType[] = ['pricing', 'booking', 'availability'];

const FALLBACK_THRESHOLD = 2;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

@Injectable()
export class SlotExtractionService {
  private readonly logger = new Logger(SlotExtractionService.name);

  constructor(
    private readonly numbers: NumberExtractor,
    private readonly dates: DateExtractor,
    private readonly completion: CompletionClient,
  ) {}

  /**
   * Looks only for slots that are still empty, except in calculations: a calculation that names
   * a different cottage switches the cottage, and in pricing, booking or availability turns an
   * explicit range or night count replaces the stored one.
   */
  async extract(query: string, intent: IntentType, current: SlotState): Promise<ExtractedSlots> {
    const extracted = this.extractWithPatterns(query, intent, current);

    if (this.completion.available && Object.keys(extracted).length < FALLBACK_THRESHOLD) {
      const guessed = await this.extractWithCompletion(query, intent, current);
      return { ...guessed, ...extracted };
    }

    return extracted;
  }

  extractWithPatterns(query: string, intent: IntentType, current: SlotState): ExtractedSlots {
    const normalized = query.toLowerCase();
    const extracted: ExtractedSlots = {};

    if (current.guests === null) {
      const guests = this.numbers.extractGroupSize(normalized);
      if (guests !== null) {
        extracted.guests = guests;
      }
    }

    const cottage = this.numbers.extractCottageNumber(normalized);
    if (cottage !== null) {
      const choice: CottageChoice = isCottageId(cottage) ? cottage : 'any';
      const switching =
        current.cottageId !== null && current.cottageId !== choice && isSpecificCalculation(normalized);
      if (current.cottageId === null || switching) {
        extracted.cottageId = choice;
      }
    }

    if (current.dates === null || DATE_SLOT_INTENTS.includes(intent)) {
      const range = this.dates.extractDateRange(normalized);
      if (range) {
        extracted.dates = range;
      }
    }

    if (current.family === null) {
      const family = this.extractFamily(normalized);
      if (family !== null) {
        extracted.family = family;
      }
    }

    if (current.season === null) {
      const season = this.extractSeason(normalized);
      if (season !== null) {
        extracted.season = season;
      }
    }

    if (current.nights === null || DATE_SLOT_INTENTS.includes(intent)) {
      const nights = this.extractNights(normalized);
      if (nights !== null) {
        extracted.nights = nights;
      }
    }
    // New dates without a night count: the dates decide the length of the stay.
    if (extracted.dates && extracted.nights === undefined && current.nights !== null) {
      extracted.nights = extracted.dates.nights;
    }

    if (current.budget === null) {
      const budget = BUDGET.exec(normalized)?.[1];
      if (budget) {
        extracted.budget = budget;
      }
    }

    if (current.preferences === null) {
      const preference = PREFERENCE.exec(normalized)?.[1];
      if (preference) {
        extracted.preferences = preference.split(PREFERENCE_STOP)[0].trim();
      }
    }

    if (Object.keys(extracted).length > 0) {
      this.logger.debug(`Pattern slots for "${query}": ${Object.keys(extracted).join(', ')}`);
    }

    return extracted;
  }

  extractFamily(normalized: string): boolean | null {
    if (FAMILY_IN_GROUP.test(normalized) || FAMILY_WORDS.test(normalized)) {
      return true;
    }
    if (FRIENDS_WORDS.test(normalized)) {
      return false;
    }
    return null;
  }

  extractSeason(normalized: string): SlotState['season'] {
    if (/\bweek\s?days?\b/.test(normalized)) {
      return 'weekday';
    }
    if (/\bweek\s?ends?\b/.test(normalized)) {
      return 'weekend';
    }
    if (/\boff[\s-]peak\b/.test(normalized)) {
      return 'off-peak';
    }
    if (/\bpeak\b/.test(normalized)) {
      return 'peak';
    }
    return null;
  }

  extractNights(normalized: string): number | null {
    for (const pattern of NIGHTS_PATTERNS) {
      const match = pattern.exec(normalized);
      if (!match) {
        continue;
      }
      const nights = Number.parseInt(match[1], 10);
      if (nights > 0) {
        return nights;
      }
    }
    return null;
  }

  /**
   * Asks the completion backend for a coarse guess, then re-reads every field through the
   * deterministic extractors. Nothing from the reply is stored verbatim.
   */
  private async extractWithCompletion(
    query: string,
    intent: IntentType,
    current: SlotState,
  ): Promise<ExtractedSlots> {
    const prompt = `Extract booking details from a guest message for a cottage rental.

Guest message: "${query}"
Detected intent: ${intent}
Slots needed for this intent: ${requiredSlotsFor(intent).join(', ') || 'none'}

Respond with a JSON object containing only the fields clearly mentioned:
{
  "guests": <integer 1-9 or null>,
  "cottage": "<7|9|11|any|null>",
  "dates": {"start": "<day month>", "end": "<day month>"} or null,
  "family": <true|false|null>,
  "season": "<weekday|weekend|peak|off-peak|null>",
  "nights": <integer or null>
}`;

    const reply = await this.completion.generate(prompt, 256);
    if (!reply.ok) {
      this.logger.debug(`Completion slot extraction skipped: ${reply.error.message}`);
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(extractJsonFromMarkdown(reply.value));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Completion slot extraction returned non-JSON output: ${reason}`);
      return {};
    }

    if (!isRecord(parsed)) {
      return {};
    }

    return this.revalidate(parsed, current);
  }

  private revalidate(guess: Record<string, unknown>, current: SlotState): ExtractedSlots {
    const extracted: ExtractedSlots = {};

    if (current.guests === null && typeof guess.guests === 'number') {
      const guests = this.numbers.extractGroupSize(`${Math.trunc(guess.guests)} guests`);
      if (guests !== null) {
        extracted.guests = guests;
      }
    }

    if (current.cottageId === null && (typeof guess.cottage === 'string' || typeof guess.cottage === 'number')) {
      const raw = String(guess.cottage).toLowerCase().replace(/^cottage[_\s]*/, '');
      if (raw === 'any') {
        extracted.cottageId = 'any';
      } else {
        const cottage = this.numbers.extractCottageNumber(`cottage ${raw}`);
        if (cottage !== null && isCottageId(cottage)) {
          extracted.cottageId = cottage;
        }
      }
    }

    if (current.dates === null && isRecord(guess.dates)) {
      const { start, end } = guess.dates;
      if (typeof start === 'string' && typeof end === 'string') {
        const range = this.dates.extractDateRange(`${start} to ${end}`);
        if (range) {
          extracted.dates = range;
        }
      }
    }

    if (current.family === null && typeof guess.family === 'boolean') {
      extracted.family = guess.family;
    }

    if (current.season === null && typeof guess.season === 'string' && isSeason(guess.season)) {
      extracted.season = guess.season;
    }

    if (current.nights === null && typeof guess.nights === 'number') {
      const nights = this.extractNights(`${Math.trunc(guess.nights)} nights`);
      if (nights !== null) {
        extracted.nights = nights;
      }
    }

    return extracted;
  }
}
