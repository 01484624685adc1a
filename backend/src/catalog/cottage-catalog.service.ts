import { Injectable, Logger } from '@nestjs/common';
import { COTTAGE_IDS, CottageId } from '@cottage-concierge/shared-types';

import { ConversationSettings } from '../config/conversation-settings.service';
import catalogFile from './cottages.json';

export interface NightlyRates {
  weekday: number;
  weekend: number;
}

export interface CottageInfo {
  id: CottageId;
  bedrooms: number;
  baseCapacity: number;
  maxCapacity: number;
  description: string;
  features: string[];
  recommended: boolean;
  showByDefault: boolean;
  rates: NightlyRates | null;
}

export interface Suitability {
  suitable: boolean;
  reason: string;
}

export const isCottageId = (value: string): value is CottageId =>
  (COTTAGE_IDS as readonly string[]).includes(value);

/** "7", "9 and 11", "7, 9, or 11" */
export const joinCottageIds = (ids: readonly string[], conjunction: 'and' | 'or'): string => {
  if (ids.length <= 1) {
    return ids.join('');
  }
  if (ids.length === 2) {
    return `${ids[0]} ${conjunction} ${ids[1]}`;
  }
  return `${ids.slice(0, -1).join(', ')}, ${conjunction} ${ids[ids.length - 1]}`;
};

@Injectable()
export class CottageCatalog {
  private readonly logger = new Logger(CottageCatalog.name);
  private readonly cottages = new Map<CottageId, CottageInfo>();
  readonly totalCottages: number = catalogFile.totalCottages;
  readonly sharedAmenities: readonly string[] = catalogFile.sharedAmenities;

  constructor(private readonly settings: ConversationSettings) {
    for (const entry of catalogFile.cottages) {
      if (!isCottageId(entry.id)) {
        this.logger.warn(`Skipping catalog entry for unknown cottage id ${entry.id}`);
        continue;
      }

      this.cottages.set(entry.id, { ...entry, id: entry.id });
      if (!entry.rates) {
        this.logger.warn(`No nightly rates configured for Cottage ${entry.id}`);
      }
    }

    this.logger.log(`Loaded catalog with ${this.cottages.size} cottages`);
  }

  get baseOccupancy(): number {
    return this.settings.baseOccupancy;
  }

  getCottage(id: string): CottageInfo | undefined {
    const key = id.trim().toLowerCase().replace(/^cottage\s*/, '');
    return isCottageId(key) ? this.cottages.get(key) : undefined;
  }

  all(): CottageInfo[] {
    return [...this.cottages.values()];
  }

  recommended(): CottageInfo[] {
    return this.all().filter((cottage) => cottage.recommended);
  }

  hiddenByDefault(): CottageId[] {
    return this.all()
      .filter((cottage) => !cottage.showByDefault)
      .map((cottage) => cottage.id);
  }

  getRates(id: string): NightlyRates | null {
    return this.getCottage(id)?.rates ?? null;
  }

  /**
   * Cottages to present for a free-form question. Named cottages win, then bedroom
   * filters; otherwise only the ones shown by default.
   */
  listForQuery(query: string): CottageInfo[] {
    const normalized = query.toLowerCase();
    const mentioned = this.all().filter((cottage) =>
      new RegExp(`\\bcottage\\s*${cottage.id}\\b`).test(normalized),
    );
    if (mentioned.length > 0) {
      return mentioned;
    }

    if (/\b(2|two)[-\s]bedroom/.test(normalized)) {
      return this.all().filter((cottage) => cottage.bedrooms === 2);
    }
    if (/\b(3|three)[-\s]bedroom/.test(normalized)) {
      return this.all().filter((cottage) => cottage.bedrooms === 3);
    }

    return this.all().filter((cottage) => cottage.showByDefault);
  }

  isSuitable(groupSize: number, id: string): Suitability {
    const cottage = this.getCottage(id);
    if (!cottage) {
      return { suitable: false, reason: `Cottage ${id} capacity information not available` };
    }

    const { baseCapacity, maxCapacity } = cottage;
    if (groupSize <= baseCapacity) {
      return {
        suitable: true,
        reason: `${groupSize} guests ≤ ${baseCapacity} base capacity (comfortable at standard capacity)`,
      };
    }
    if (groupSize <= maxCapacity) {
      return {
        suitable: true,
        reason: `${groupSize} guests ≤ ${maxCapacity} max capacity (possible with prior confirmation and adjusted pricing)`,
      };
    }

    return {
      suitable: false,
      reason: `${groupSize} guests > ${maxCapacity} max capacity (not suitable: no more than ${maxCapacity} guests are allowed in a single cottage, larger groups must book multiple cottages)`,
    };
  }

  capacitySummary(id: string): string {
    const cottage = this.getCottage(id);
    if (!cottage) {
      return `Cottage ${id}: Capacity information not available`;
    }

    return `Cottage ${cottage.id}: ${cottage.bedrooms}-bedroom cottage, accommodates up to ${cottage.baseCapacity} guests at standard capacity, up to ${cottage.maxCapacity} guests with prior confirmation`;
  }

  formatCottageList(query = '', showTotal = false): string {
    const cottages = showTotal ? this.recommended() : this.listForQuery(query);
    const lines: string[] = [];

    if (showTotal) {
      lines.push(
        `**${this.settings.propertyName} has ${this.totalCottages} cottages in the neighborhood.**`,
        `**I recommend these ${cottages.length} cottages as the best options:**`,
        '',
      );
    } else {
      lines.push(`**${this.settings.propertyName} offers the following cottages:**`, '');
    }

    for (const cottage of cottages) {
      lines.push(
        `**Cottage ${cottage.id}** - ${cottage.description}`,
        `- Base capacity: Up to ${cottage.baseCapacity} guests (standard capacity)`,
        `- Maximum capacity: ${cottage.maxCapacity} guests (with prior confirmation)`,
        `- Bedrooms: ${cottage.bedrooms}`,
        '',
      );
    }

    if (showTotal) {
      lines.push('All cottages include:', ...this.sharedAmenities.map((item) => `- ${item}`));
    }

    return lines.join('\n').trim();
  }
}
