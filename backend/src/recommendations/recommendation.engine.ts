import { Injectable, Logger } from '@nestjs/common';
import { ConversationState, IntentType } from '@cottage-concierge/shared-types';

import { CottageCatalog, joinCottageIds } from '../catalog/cottage-catalog.service';
import { ConversationSettings } from '../config/conversation-settings.service';
import { ChatHistory } from '../conversation/chat-history';
import { ContextTracker } from '../conversation/context-tracker';
import { MAX_GUESTS_PER_COTTAGE, SlotState } from '../conversation/slot-definitions';
import suggestionData from './suggestions.json';

export const SUGGESTION_TIERS = ['informational', 'exploratory', 'transactional'] as const;

export type SuggestionTier = (typeof SUGGESTION_TIERS)[number];

interface SuggestionEntry {
  id: string;
  text: string;
  withGuests?: string;
  withCottage?: string;
  keywords: string[];
}

export const MAX_SUGGESTIONS = 5;

const isTier = (value: string): value is SuggestionTier =>
  (SUGGESTION_TIERS as readonly string[]).includes(value);

const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

const mentionsAny = (text: string, keywords: readonly string[]) =>
  keywords.some((keyword) => new RegExp(`\\b${escapeRegExp(keyword)}\\b`).test(text));

const IMAGE_WORDS = ['image', 'images', 'photo', 'photos', 'picture', 'pictures', 'show me', 'see', 'view', 'gallery', 'visual'];

interface CrossRule {
  keywords: string[];
  message: (propertyName: string) => string;
  intent?: IntentType;
}

const CROSS_RULES: CrossRule[] = [
  {
    keywords: ['kitchen', 'cook', 'cooking', 'prepare food', 'make food'],
    message: () =>
      "**Related Service:** Did you know we also offer chef services? You can have freshly prepared meals at an additional cost if you'd rather not cook yourself.",
  },
  {
    keywords: ['chef', 'chief', 'cooking service', 'meal service'],
    message: () =>
      '**Related Facility:** All cottages come with fully equipped kitchens, so you can also cook your own meals if you prefer.',
  },
  {
    keywords: ['wifi', 'wi-fi', 'internet', 'network', 'connection', 'online'],
    message: () =>
      '**Related Amenities:** In addition to Wi-Fi, all cottages include a smart TV with Netflix for streaming during your stay.',
  },
  {
    keywords: ['parking', 'park', 'car', 'vehicle', 'drive'],
    message: (propertyName) =>
      `**Location Info:** ${propertyName} is in a secure gated community with easy access to nearby attractions.`,
  },
  {
    keywords: ['food', 'dining', 'meal', 'meals', 'eat', 'restaurant', 'dinner', 'lunch', 'breakfast'],
    message: () =>
      '**Food Options:** You can cook in the fully equipped kitchen, order delivery from nearby restaurants, use the BBQ facilities, or book chef services at an additional cost.',
  },
  {
    keywords: ['bbq', 'barbecue', 'grill', 'outdoor cooking'],
    message: () =>
      "**Related Service:** If you'd prefer not to cook, we also offer chef services for freshly prepared meals at an additional cost.",
  },
  {
    keywords: ['facility', 'facilities', 'amenity', 'amenities', 'what'],
    intent: 'facilities',
    message: () =>
      '**Popular Amenities:** All cottages include fully equipped kitchens, Wi-Fi, a smart TV with Netflix, BBQ facilities, outdoor sitting areas and secure parking. Chef services are also available at an additional cost.',
  },
];

/**
 * Follow-up suggestions and short tips appended to answers. Suggestions come in three tiers
 * (informational, exploratory, transactional) ordered by how far along the guest is.
 */
@Injectable()
export class RecommendationEngine {
  private readonly logger = new Logger(RecommendationEngine.name);
  private readonly tiers: Record<SuggestionTier, SuggestionEntry[]> = suggestionData.tiers;
  private readonly quota: readonly number[] = suggestionData.tierQuota;

  constructor(
    private readonly catalog: CottageCatalog,
    private readonly settings: ConversationSettings,
  ) {}

  priorityFor(state: ConversationState): SuggestionTier[] {
    const order: readonly string[] = suggestionData.statePriority[state];
    const tiers = order.filter(isTier);
    // Any tier the table leaves out still gets a turn, last.
    return [...tiers, ...SUGGESTION_TIERS.filter((tier) => !tiers.includes(tier))];
  }

  generateContextualSuggestions(
    tracker: ContextTracker,
    slots: SlotState,
    history: ChatHistory,
    maxSuggestions = MAX_SUGGESTIONS,
  ): string[] {
    const covered = history
      .turns()
      .map((turn) => turn.question.toLowerCase())
      .join('\n');
    const limit = Math.min(maxSuggestions, MAX_SUGGESTIONS);

    const pools = this.priorityFor(tracker.getState()).map((tier) =>
      this.tiers[tier]
        .filter((entry) => !mentionsAny(covered, entry.keywords))
        .map((entry) => this.personalize(entry, slots)),
    );

    const picked: string[] = [];
    pools.forEach((pool, index) => {
      picked.push(...pool.slice(0, this.quota[index] ?? 0));
    });
    for (const suggestion of pools.flat()) {
      if (!picked.includes(suggestion)) {
        picked.push(suggestion);
      }
    }

    this.logger.debug(`Suggestions for state ${tracker.getState()}: ${picked.length} candidates`);
    return picked.slice(0, limit);
  }

  generateGentleRecommendation(intent: IntentType, slots: SlotState): string | null {
    switch (intent) {
      case 'pricing':
        return this.pricingTips(slots);
      case 'rooms':
        return this.roomTips(slots);
      case 'safety':
        return `**Tip:** ${this.settings.propertyName} prioritizes guest safety and security. All cottages have safety measures in place and emergency contacts are available. If you have specific concerns, feel free to ask or contact our team directly.`;
      default:
        return null;
    }
  }

  /**
   * Needs two of guests, dates and cottage, plus booking or availability interest in the
   * current intent or recent history.
   */
  generateBookingNudge(slots: SlotState, tracker?: ContextTracker, intent?: IntentType): string | null {
    if (tracker) {
      const recent = tracker.getRecentIntents(5);
      const interested =
        tracker.isReadyToBook() ||
        recent.includes('booking') ||
        recent.includes('availability') ||
        intent === 'booking' ||
        intent === 'availability';
      if (!interested) {
        return null;
      }
    }

    const hasGuests = slots.guests !== null;
    const hasDates = slots.dates !== null;
    const hasCottage = slots.cottageId !== null;
    if ([hasGuests, hasDates, hasCottage].filter(Boolean).length < 2) {
      return null;
    }

    let status: string;
    if (hasGuests && hasDates && hasCottage) {
      status = 'You have all the key information! Would you like to proceed with booking?';
    } else if (hasGuests && hasDates) {
      status = "You've shared your group size and dates. Would you like to explore booking options?";
    } else if (hasGuests) {
      status = "You've shared your group size and preferred cottage. Would you like to check availability?";
    } else {
      status = "You've shared your dates and preferred cottage. Would you like to proceed with booking?";
    }

    const cottage = slots.cottageId;
    return [
      `**Ready to book?** ${status} I can help you with the booking process or answer any other questions you have.`,
      '',
      '**To proceed with booking, you can:**',
      `- Contact us: ${this.settings.contactUrl}`,
      `- Call the cottage manager: ${this.settings.contactPhone}`,
      cottage && cottage !== 'any'
        ? `- Mention Cottage ${cottage} when you get in touch`
        : '- Ask us to help you choose a cottage',
    ].join('\n');
  }

  generateAlternativeSuggestion(intent: IntentType, slots: SlotState): string | null {
    const current = slots.cottageId;
    if (intent !== 'availability' || !current || current === 'any') {
      return null;
    }

    const chosen = this.catalog.getCottage(current);
    if (!chosen) {
      return '**Alternative:** Other cottages might be available. Would you like me to check different dates?';
    }

    const others = this.catalog.all().filter((cottage) => cottage.id !== chosen.id);
    const larger = others.filter((cottage) => cottage.bedrooms > chosen.bedrooms);
    if (larger.length > 0) {
      const ids = larger.map((cottage) => cottage.id);
      return `**Alternative:** Cottage ${joinCottageIds(ids, 'and')} ${ids.length > 1 ? 'are' : 'is'} also worth checking, with ${larger[0].bedrooms}-bedroom options and more space.`;
    }

    const smaller = others.filter((cottage) => cottage.bedrooms < chosen.bedrooms);
    if (smaller.length > 0) {
      return `**Alternative:** Cottage ${smaller[0].id} is a ${smaller[0].bedrooms}-bedroom option that might be available for your dates.`;
    }
    return '**Alternative:** Other cottages might be available. Would you like me to check different dates?';
  }

  generateImageRecommendation(query: string, slots: SlotState, intent?: IntentType): string | null {
    const normalized = query.toLowerCase();
    if (mentionsAny(normalized, IMAGE_WORDS)) {
      return null;
    }

    let mention: string | null = null;
    if (slots.cottageId === 'any') {
      mention = 'the cottages';
    } else if (slots.cottageId) {
      mention = `Cottage ${slots.cottageId}`;
    } else {
      const named = this.catalog
        .all()
        .find((cottage) => new RegExp(`\\bcottage\\s?${cottage.id}\\b`).test(normalized));
      mention = named ? `Cottage ${named.id}` : null;
    }
    if (!mention) {
      return null;
    }

    const relevant =
      intent === 'rooms' ||
      intent === 'pricing' ||
      (normalized.includes('cottage') && intent !== 'booking' && intent !== 'availability');
    return relevant
      ? `**Would you like to see images of ${mention.toLowerCase()}?** Just ask and I can show you photos!`
      : null;
  }

  generateCrossRecommendation(query: string, intent: IntentType): string | null {
    const normalized = query.toLowerCase();
    const rule = CROSS_RULES.find(
      (candidate) =>
        (candidate.intent === undefined || candidate.intent === intent) &&
        mentionsAny(normalized, candidate.keywords),
    );
    return rule ? rule.message(this.settings.propertyName) : null;
  }

  generateProactiveSuggestion(tracker: ContextTracker, slots: SlotState): string | null {
    const recent = tracker.getRecentIntents(3);
    if (recent.includes('booking')) {
      return null;
    }
    if (recent.includes('pricing') && slots.guests !== null && slots.dates !== null) {
      return '**Next step:** Would you like to know more about the booking process or check availability?';
    }
    if (recent.includes('availability') && slots.dates !== null) {
      return '**Next step:** Would you like to know about pricing for these dates or proceed with booking?';
    }
    return null;
  }

  /** The single most actionable extra for an answer, if any. */
  composeFollowUp(query: string, intent: IntentType, slots: SlotState, tracker: ContextTracker): string | null {
    return (
      this.generateBookingNudge(slots, tracker, intent) ??
      this.generateProactiveSuggestion(tracker, slots) ??
      this.generateAlternativeSuggestion(intent, slots) ??
      this.generateCrossRecommendation(query, intent) ??
      this.generateImageRecommendation(query, slots, intent) ??
      this.generateGentleRecommendation(intent, slots)
    );
  }

  private personalize(entry: SuggestionEntry, slots: SlotState): string {
    if (entry.withGuests && slots.guests !== null) {
      return entry.withGuests.replace('{guests}', String(slots.guests));
    }
    if (entry.withCottage && slots.cottageId && slots.cottageId !== 'any') {
      return entry.withCottage.replace('{cottage}', slots.cottageId);
    }
    return entry.text;
  }

  private pricingTips(slots: SlotState): string {
    const tips: string[] = [];
    const base = this.settings.baseOccupancy;

    if (slots.season === 'weekday') {
      tips.push('**Tip:** Weekday rates are lower than weekend rates, making them a great value option.');
    } else if (slots.season === 'weekend') {
      tips.push("**Tip:** Weekend rates are slightly higher, but you'll enjoy the full weekend experience.");
    } else if (slots.season === 'peak') {
      tips.push('**Tip:** Peak season rates apply, so booking in advance is recommended.');
    }

    if (slots.guests !== null && slots.guests <= base) {
      tips.push(`**Tip:** For groups of ${base} or fewer, you can book at the base price. All cottages accommodate up to ${base} guests comfortably.`);
    } else if (slots.guests !== null && slots.guests <= MAX_GUESTS_PER_COTTAGE) {
      tips.push(
        `**Tip:** For groups of ${base + 1}-${MAX_GUESTS_PER_COTTAGE} guests, prior confirmation and adjusted pricing apply. All cottages can accommodate up to ${MAX_GUESTS_PER_COTTAGE} guests.`,
      );
    }

    if (tips.length === 0) {
      tips.push('**Tip:** Weekday rates are lower than weekend rates. Advance payment is required to confirm your booking.');
    }
    return tips.join('\n');
  }

  private roomTips(slots: SlotState): string {
    const tips = new Set<string>();
    const base = this.settings.baseOccupancy;
    const roomy = this.catalog
      .all()
      .filter((cottage) => cottage.bedrooms >= 3)
      .map((cottage) => cottage.id);
    const roomyLabel = `Cottage ${joinCottageIds(roomy, 'and')}`;
    const chosen = slots.cottageId && slots.cottageId !== 'any' ? this.catalog.getCottage(slots.cottageId) : undefined;

    if (chosen && chosen.bedrooms >= 3) {
      tips.add(`**Tip:** ${roomyLabel} are 3-bedroom cottages, perfect for families or larger groups.`);
    } else if (chosen) {
      tips.add(`**Tip:** Cottage ${chosen.id} is a ${chosen.bedrooms}-bedroom cottage, ideal for smaller groups or couples.`);
    }

    if (slots.guests !== null && slots.guests <= base) {
      if (!chosen) {
        const all = this.catalog.all().map((cottage) => cottage.id);
        tips.add(`**Tip:** For groups of ${base} or fewer, any cottage (Cottage ${joinCottageIds(all, 'or')}) is suitable at base price.`);
      }
      if (slots.family && (!chosen || chosen.bedrooms >= 3)) {
        tips.add(`**Tip:** ${roomyLabel} are 3-bedroom cottages with more space, ideal for families.`);
      }
    } else if (slots.guests !== null && slots.guests <= MAX_GUESTS_PER_COTTAGE) {
      tips.add(
        `**Tip:** All cottages can accommodate up to ${MAX_GUESTS_PER_COTTAGE} guests with prior confirmation. ${roomyLabel} offer more space for larger groups.`,
      );
    }

    if (tips.size === 0) {
      tips.add(`**Tip:** All cottages offer comfortable accommodation. ${roomyLabel} are 3-bedroom options with more space.`);
    }
    return [...tips].join('\n');
  }
}
