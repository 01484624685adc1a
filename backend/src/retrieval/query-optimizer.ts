import { Injectable, Logger } from '@nestjs/common';
import { CottageId, IntentType } from '@cottage-concierge/shared-types';

import { CottageCatalog } from '../catalog/cottage-catalog.service';
import { ConversationSettings } from '../config/conversation-settings.service';
import { CompletionClient } from '../llm/completion-client';

export interface RetrievalEntities {
  cottageId: CottageId | null;
  groupSize: number | null;
  dates: string | null;
}

export interface RetrievalFilter {
  intent: IntentType;
  cottageId?: CottageId;
}

const INTENT_TERMS: Partial<Record<IntentType, string[]>> = {
  pricing: ['PKR', 'weekday', 'weekend', 'per night', 'rate', 'cost', 'pricing'],
  availability: ['available', 'booking', 'vacancy', 'dates', 'availability'],
  safety: ['security', 'guards', 'gated community', 'safe', 'safety'],
  rooms: ['cottage', 'bedroom', 'property', 'accommodation', 'cottage type'],
  facilities: ['facility', 'amenity', 'kitchen', 'terrace', 'amenities'],
  location: ['location', 'nearby', 'attractions', 'directions', 'area'],
  booking: ['book', 'booking', 'reserve', 'reservation'],
};

const MAX_ADDED_TERMS = 3;

const GROUP_PATTERNS = [
  /(\d+)\s*(?:people|guests|members|persons|person)/,
  /(?:people|guests|members|persons|person)\s*(\d+)/,
  /(\d+)\s*(?:adults|adult)/,
  /(?:adults|adult)\s*(\d+)/,
];

const DATE_PATTERNS = [
  /\d{1,2}[/-]\d{1,2}[/-]\d{2,4}/,
  /\d{4}[/-]\d{1,2}[/-]\d{1,2}/,
  /(?:january|february|march|april|may|june|july|august|september|october|november|december)\s+\d{1,2}/,
];

const EXPANDING_WORDS = [
  'payment',
  'price',
  'pricing',
  'cost',
  'rate',
  'methods',
  'book',
  'booking',
  'reserve',
  'member',
  'people',
  'person',
  'guest',
  'group',
  'suitable',
  'best for',
  'accommodate',
  'capacity',
];

const REWRITE_PREFIXES = ['optimized query:', 'optimized:', 'rewritten query:', 'rewritten:', 'query:'];
const REWRITE_MAX_TOKENS = 128;

const rewritePrompt = (query: string) =>
  [
    'Rewrite the guest question below as a search query for a cottage rental knowledge base.',
    'Keep its meaning. Say "N guests" for head counts and "cottage N" for cottage numbers.',
    'Reply with the rewritten query only.',
    '',
    `Question: ${query}`,
  ].join('\n');

const COMPLEXITY_PATTERNS = [
  /\d+/,
  /\b(?:which|what|how|when|where|why)\b/,
  /\b(?:best|better|compare|difference|versus|vs)\b/,
  /\b(?:and|or|but)\b/,
];

/** Rule-based query rewriting and retrieval depth for the document store. */
@Injectable()
export class QueryOptimizer {
  private readonly logger = new Logger(QueryOptimizer.name);

  constructor(
    private readonly catalog: CottageCatalog,
    private readonly settings: ConversationSettings,
    private readonly completion: CompletionClient,
  ) {}

  /**
   * The rule-based rewrite, handed to the completion backend for a second pass when the
   * question is complex. Any unusable rewrite keeps the rule-based one.
   */
  async refine(query: string, intent: IntentType): Promise<string> {
    const enhanced = this.optimize(query, intent, this.extractEntities(query));
    if (!this.completion.available || !this.isComplexQuery(query)) {
      return enhanced;
    }

    const reply = await this.completion.generate(rewritePrompt(enhanced), REWRITE_MAX_TOKENS);
    if (!reply.ok) {
      this.logger.warn(`Query rewrite failed (${reply.error.reason}), using rule-based query`);
      return enhanced;
    }

    let rewritten = reply.value.trim();
    for (const prefix of REWRITE_PREFIXES) {
      if (rewritten.toLowerCase().startsWith(prefix)) {
        rewritten = rewritten.slice(prefix.length).trim();
      }
    }

    if (rewritten.length < 3 || rewritten.length > enhanced.length * 3) {
      this.logger.warn(`Discarding rewrite of ${rewritten.length} characters`);
      return enhanced;
    }
    return rewritten;
  }

  extractEntities(query: string): RetrievalEntities {
    const normalized = query.toLowerCase();

    const cottage = this.catalog
      .all()
      .find((info) => normalized.includes(`cottage ${info.id}`) || normalized.includes(`cottage${info.id}`));

    let groupSize: number | null = null;
    for (const pattern of GROUP_PATTERNS) {
      const match = pattern.exec(normalized);
      if (match) {
        groupSize = Number.parseInt(match[1], 10);
        break;
      }
    }

    const dates = DATE_PATTERNS.map((pattern) => pattern.exec(normalized)).find((match) => match !== null);

    return {
      cottageId: cottage ? cottage.id : null,
      groupSize,
      dates: dates ? dates[0] : null,
    };
  }

  /** Appends up to three intent terms the query lacks, then the cottage and head count. */
  optimize(query: string, intent: IntentType, entities: RetrievalEntities): string {
    if (!query.trim()) {
      return query;
    }

    let enhanced = query;
    const normalized = query.toLowerCase();
    const missing = (INTENT_TERMS[intent] ?? []).filter((term) => !normalized.includes(term.toLowerCase()));
    if (missing.length > 0) {
      enhanced = `${query} ${missing.slice(0, MAX_ADDED_TERMS).join(' ')}`;
    }

    if (entities.cottageId) {
      const cottageTerm = `cottage ${entities.cottageId}`;
      if (!enhanced.toLowerCase().includes(cottageTerm)) {
        enhanced = `${enhanced} ${cottageTerm}`;
      }
    }

    if (entities.groupSize !== null) {
      const groupTerm = `${entities.groupSize} guests`;
      if (!enhanced.toLowerCase().includes(groupTerm)) {
        enhanced = `${enhanced} ${groupTerm}`;
      }
    }

    if (enhanced !== query) {
      this.logger.debug(`Optimized query: "${query}" -> "${enhanced}"`);
    }
    return enhanced;
  }

  buildFilter(intent: IntentType, entities: RetrievalEntities): RetrievalFilter {
    return entities.cottageId ? { intent, cottageId: entities.cottageId } : { intent };
  }

  isComplexQuery(query: string): boolean {
    const normalized = query.toLowerCase();
    const indicators = COMPLEXITY_PATTERNS.filter((pattern) => pattern.test(normalized)).length;
    return indicators >= 2 || query.length > 50 || (/\d+/.test(normalized) && !normalized.includes('cottage'));
  }

  /** Pricing, booking, cottage and group questions need more passages than general ones. */
  retrievalDepth(query: string): number {
    const normalized = query.toLowerCase();
    const base = this.settings.retrievalDefaultK;
    const expanded = Math.max(base, this.settings.retrievalExpandedK);

    const namesCottage = this.catalog
      .all()
      .some((info) => normalized.includes(`cottage ${info.id}`) || normalized.includes(`cottage${info.id}`));
    if (namesCottage || EXPANDING_WORDS.some((word) => normalized.includes(word))) {
      return expanded;
    }
    return base;
  }
}
