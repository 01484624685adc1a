import { Injectable, Logger } from '@nestjs/common';
import { CottageId } from '@cottage-concierge/shared-types';

import { CottageCatalog, isCottageId } from '../catalog/cottage-catalog.service';
import { ConversationSettings } from '../config/conversation-settings.service';
import profile from './property-profile.json';
import { RetrievedDocument } from './retrieved-document';

export type RelevanceOutcome =
  | { status: 'accepted'; documents: RetrievedDocument[] }
  | { status: 'rejected'; reason: string };

const PRICING_QUERY = /\b(?:price|prices|pricing|cost|costs|rate|rates|pkr|charges?|tariff|budget|per night|how much)\b/;
const PRICING_TERMS = /\b(?:pkr|per night|price|prices|pricing|rates?|cost|tariff)\b/g;
const PRICING_HEAVY_THRESHOLD = 2;

const SAFETY_QUERY = /\b(?:safe|safety|secure|security|guards?|gated)\b/;
const SAFETY_TERMS = /\b(?:guards?|gated|security)\b/;

const CAPACITY_QUERY =
  /\b(?:members?|people|persons?|guests?|group|suitable|accommodate|capacity)\b|best for|which cottage/;

const COTTAGE_MENTION = /\bcottage\s*(\d+)\b/g;

const includesWord = (text: string, word: string) =>
  new RegExp(`\\b${word.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')}\\b`).test(text);

/**
 * Post-retrieval passes over the document list. Each pass takes and returns a list; the
 * last one may reject the whole set when the question is about somewhere else.
 */
@Injectable()
export class DocumentRelevanceFilter {
  private readonly logger = new Logger(DocumentRelevanceFilter.name);
  private readonly locationConflicts: Record<string, string[]> = profile.locationConflicts;

  constructor(
    private readonly catalog: CottageCatalog,
    private readonly settings: ConversationSettings,
  ) {}

  filterAndPrioritize(documents: RetrievedDocument[], query: string): RelevanceOutcome {
    const normalized = query.toLowerCase();

    let filtered = this.scopeToCottages(documents, normalized);
    filtered = this.suppressPricing(filtered, normalized);
    filtered = this.promoteSafety(filtered, normalized);

    const mismatch = this.locationMismatch(filtered, normalized);
    if (mismatch) {
      this.logger.log(`Rejected ${filtered.length} documents: ${mismatch}`);
      return { status: 'rejected', reason: mismatch };
    }

    if (filtered.length !== documents.length) {
      this.logger.debug(`Relevance filter kept ${filtered.length} of ${documents.length} documents`);
    }
    return { status: 'accepted', documents: filtered };
  }

  /**
   * Moves documents about the cottages a question names to the front. Capacity questions
   * that name none favour documents mentioning any cottage.
   */
  prioritizeCottageDocuments(documents: RetrievedDocument[], query: string): RetrievedDocument[] {
    const normalized = query.toLowerCase();
    const named = this.namedCottages(normalized);

    let matches: (document: RetrievedDocument) => boolean;
    if (named.length > 0) {
      matches = (document) => this.mentionedCottages(document).some((id) => named.includes(id));
    } else if (CAPACITY_QUERY.test(normalized)) {
      matches = (document) => this.mentionedCottages(document).length > 0;
    } else {
      return documents;
    }

    return [...documents.filter(matches), ...documents.filter((document) => !matches(document))];
  }

  private scopeToCottages(documents: RetrievedDocument[], query: string): RetrievedDocument[] {
    const named = this.namedCottages(query);
    const excluded: readonly string[] = named.length > 0 ? [] : this.catalog.hiddenByDefault();

    return documents.filter((document) => {
      const mentioned = this.mentionedCottages(document);
      if (mentioned.length === 0) {
        return true;
      }
      if (named.length > 0) {
        return mentioned.some((id) => named.includes(id));
      }
      return !mentioned.every((id) => excluded.includes(id));
    });
  }

  private suppressPricing(documents: RetrievedDocument[], query: string): RetrievedDocument[] {
    if (PRICING_QUERY.test(query)) {
      return documents;
    }

    const heavy = (document: RetrievedDocument) =>
      (document.content.toLowerCase().match(PRICING_TERMS) ?? []).length >= PRICING_HEAVY_THRESHOLD;
    return [...documents.filter((document) => !heavy(document)), ...documents.filter(heavy)];
  }

  private promoteSafety(documents: RetrievedDocument[], query: string): RetrievedDocument[] {
    if (!SAFETY_QUERY.test(query)) {
      return documents;
    }

    const safety = (document: RetrievedDocument) => SAFETY_TERMS.test(document.content.toLowerCase());
    return [...documents.filter(safety), ...documents.filter((document) => !safety(document))];
  }

  private locationMismatch(documents: RetrievedDocument[], query: string): string | null {
    if (documents.length === 0) {
      return null;
    }
    const text = documents.map((document) => document.content.toLowerCase()).join(' ');

    for (const [place, conflicts] of Object.entries(this.locationConflicts)) {
      if (!includesWord(query, place) || text.includes(place)) {
        continue;
      }
      const conflict = conflicts.find((candidate) => text.includes(candidate));
      if (conflict) {
        return `Your question mentions '${place}', but the retrieved documents are about '${conflict}'. These don't match.`;
      }
    }

    const anchors = [this.settings.propertyName.toLowerCase(), ...profile.anchorTerms];
    const anchored = anchors.some((anchor) => text.includes(anchor));
    if (!anchored && profile.worldKnowledgePhrases.some((phrase) => query.includes(phrase))) {
      return `Your question is about general knowledge, but the retrieved documents are not about ${this.settings.propertyName}. These don't match.`;
    }

    return null;
  }

  private namedCottages(query: string): CottageId[] {
    return this.catalog
      .all()
      .map((cottage) => cottage.id)
      .filter((id) => new RegExp(`\\bcottage\\s*${id}\\b`).test(query));
  }

  private mentionedCottages(document: RetrievedDocument): CottageId[] {
    const ids = new Set<CottageId>();
    for (const match of document.content.toLowerCase().matchAll(COTTAGE_MENTION)) {
      const id = match[1];
      if (isCottageId(id)) {
        ids.add(id);
      }
    }

    const tagged = document.metadata.cottage_id ?? document.metadata.cottageId;
    if (typeof tagged === 'string' || typeof tagged === 'number') {
      const id = String(tagged);
      if (isCottageId(id)) {
        ids.add(id);
      }
    }
    return [...ids];
  }
}
