import { Injectable, Logger } from '@nestjs/common';
import { CottageId } from '@cottage-concierge/shared-types';

import { CottageCatalog, CottageInfo, isCottageId, joinCottageIds } from '../catalog/cottage-catalog.service';
import { ConversationSettings } from '../config/conversation-settings.service';
import { DateExtractor } from '../conversation/date-extractor';
import { NumberExtractor } from '../conversation/number-extractor';
import { RetrievedDocument, syntheticDocument } from '../retrieval/retrieved-document';

export type CapacityResult =
  | { status: 'all_cottages'; answer: string; template: string }
  | { status: 'cottage_only'; cottages: CottageId[]; answer: string; template: string }
  | { status: 'group_only'; groupSize: number; suitable: boolean; answer: string; template: string }
  | {
      status: 'compared';
      groupSize: number;
      cottage: CottageId;
      suitable: boolean;
      reason: string;
      answer: string;
      template: string;
    };

export const CAPACITY_ANALYSIS_SOURCE = 'structured_capacity_analysis';

const FAMILY = /\bfamil(?:y|ies)\b/;

const directAnswerTemplate = (heading: string, answer: string, analysis: string[]) =>
  [
    heading,
    'DIRECT ANSWER:',
    answer,
    'END OF ANSWER TEXT',
    '',
    'Start the response with the direct answer above and do not contradict it.',
    '',
    'DETAILED ANALYSIS (context only):',
    ...analysis,
  ].join('\n');

@Injectable()
export class CapacityQueryHandler {
  private readonly logger = new Logger(CapacityQueryHandler.name);

  constructor(
    private readonly catalog: CottageCatalog,
    private readonly numbers: NumberExtractor,
    private readonly dates: DateExtractor,
    private readonly settings: ConversationSettings,
  ) {}

  isCapacityQuery(question: string): boolean {
    return this.numbers.isCapacityQuery(question);
  }

  processCapacityQuery(question: string): CapacityResult {
    const { groupSize, cottageNumber } = this.numbers.extractAll(question);
    const cottage = cottageNumber !== null && isCottageId(cottageNumber) ? cottageNumber : null;

    if (cottageNumber !== null && cottage === null) {
      this.logger.debug(`Cottage ${cottageNumber} is not in the catalog; answering for the group only`);
    }

    if (groupSize !== null && cottage !== null) {
      return this.compare(groupSize, cottage);
    }
    if (groupSize !== null) {
      return this.groupOnly(groupSize, question);
    }
    if (cottage !== null) {
      return this.cottageOnly(question, cottage);
    }
    return this.allCottages();
  }

  enhanceContext(documents: RetrievedDocument[], result: CapacityResult): RetrievedDocument[] {
    return [
      syntheticDocument(result.template, {
        source: CAPACITY_ANALYSIS_SOURCE,
        type: 'capacity_analysis',
        groupSize: result.status === 'group_only' || result.status === 'compared' ? result.groupSize : null,
        cottage: result.status === 'compared' ? result.cottage : null,
      }),
      ...documents,
    ];
  }

  private get maxCapacity(): number {
    return Math.max(...this.catalog.all().map((cottage) => cottage.maxCapacity));
  }

  private capacityLine(cottage: CottageInfo): string {
    const line = `- **Cottage ${cottage.id}** (${cottage.bedrooms}-bedroom): Accommodates up to ${cottage.baseCapacity} guests at standard capacity, up to ${cottage.maxCapacity} guests with prior confirmation.`;
    return cottage.bedrooms >= 3 ? `${line} Ideal for families with more space.` : line;
  }

  private allCottages(): CapacityResult {
    const cottages = this.catalog.all();
    const answer = [
      `${this.settings.propertyName} offers ${cottages.length} cottages with the following capacity:`,
      ...cottages.map((cottage) => this.capacityLine(cottage)),
      '',
      `All cottages have a maximum capacity of ${this.maxCapacity} guests per cottage.`,
      'How many guests will be staying, and do you have a cottage in mind?',
    ].join('\n');

    return {
      status: 'all_cottages',
      answer,
      template: directAnswerTemplate('STRUCTURED CAPACITY INFORMATION FOR ALL COTTAGES:', answer, [
        `Base capacity: ${this.catalog.baseOccupancy} guests per cottage`,
        `Maximum capacity: ${this.maxCapacity} guests per cottage with prior confirmation`,
      ]),
    };
  }

  /** Capacity facts only; without a group size there is no suitability verdict. */
  private cottageOnly(question: string, cottage: CottageId): CapacityResult {
    const mentioned = this.numbers.extractCottageNumbers(question).filter(isCottageId);
    const ids = mentioned.length > 0 ? mentioned : [cottage];
    const cottages = ids.flatMap((id) => {
      const info = this.catalog.getCottage(id);
      return info ? [info] : [];
    });

    let answer: string;
    if (cottages.length === 1) {
      const [info] = cottages;
      answer = [
        `Cottage ${info.id} (${info.bedrooms}-bedroom) can accommodate up to ${info.baseCapacity} guests at standard capacity and up to ${info.maxCapacity} guests with prior confirmation.`,
        `To check whether Cottage ${info.id} suits your group, please tell me how many guests will be staying.`,
      ].join('\n\n');
    } else {
      answer = [
        'Cottage capacity information:',
        ...cottages.map((info) => this.capacityLine(info)),
        '',
        'To check which cottage suits your group, please tell me how many guests will be staying.',
      ].join('\n');
    }

    return {
      status: 'cottage_only',
      cottages: cottages.map((info) => info.id),
      answer,
      template: directAnswerTemplate('STRUCTURED CAPACITY INFORMATION:', answer, [
        'No group size was given: do not say whether a cottage is suitable.',
      ]),
    };
  }

  private groupOnly(groupSize: number, question: string): CapacityResult {
    const normalized = question.toLowerCase();
    const family = FAMILY.test(normalized);
    const base = this.catalog.baseOccupancy;
    const max = this.maxCapacity;
    const allIds = this.catalog.all().map((cottage) => cottage.id);
    const roomy = this.catalog
      .all()
      .filter((cottage) => cottage.bedrooms >= 3)
      .map((cottage) => cottage.id);
    const datesGiven = this.dates.extractDateRange(question) !== null;

    let answer: string;
    let nextStep: string | null = datesGiven
      ? null
      : 'To recommend the best cottage for your stay, please share your check-in and check-out dates and any preferences you have.';

    if (groupSize <= base && family) {
      answer = `Yes, for your family of ${groupSize}, I recommend Cottage ${joinCottageIds(roomy, 'or')}. These are 3-bedroom cottages with more space, ideal for families, and can accommodate up to ${base} guests comfortably at standard capacity.`;
    } else if (groupSize <= base) {
      answer = `Yes, your group of ${groupSize} guests can stay in any cottage (Cottage ${joinCottageIds(allIds, 'or')}) at standard capacity. All cottages can accommodate up to ${base} guests comfortably.`;
    } else if (groupSize <= max) {
      answer = `Yes, your group of ${groupSize} guests can stay in any cottage (Cottage ${joinCottageIds(allIds, 'or')}) with prior confirmation. Cottages ${joinCottageIds(roomy, 'and')} are 3-bedroom cottages with more space, ideal for larger groups. All cottages have a maximum capacity of ${max} guests per cottage.`;
    } else {
      answer = `No, your group of ${groupSize} guests exceeds the maximum capacity of ${max} guests per cottage. You must book multiple cottages.`;
      nextStep = 'Contact the manager to arrange multiple cottage bookings.';
    }

    if (nextStep) {
      answer = `${answer}\n\n${nextStep}`;
    }

    return {
      status: 'group_only',
      groupSize,
      suitable: groupSize <= max,
      answer,
      template: directAnswerTemplate('STRUCTURED CAPACITY ANALYSIS:', answer, [
        `Group Size: ${groupSize} guests (already provided, do not ask again)`,
        'Cottage: not specified',
        `Base capacity: ${base} guests per cottage`,
        `Maximum capacity: ${max} guests per cottage with prior confirmation`,
      ]),
    };
  }

  private compare(groupSize: number, cottage: CottageId): CapacityResult {
    const { suitable, reason } = this.catalog.isSuitable(groupSize, cottage);
    const info = this.catalog.getCottage(cottage);
    const base = info?.baseCapacity ?? this.catalog.baseOccupancy;
    const max = info?.maxCapacity ?? this.maxCapacity;

    let answer: string;
    if (groupSize <= base) {
      answer = `Yes, your group of ${groupSize} guests can stay in Cottage ${cottage} comfortably at standard capacity. Cottage ${cottage} can accommodate up to ${base} guests at standard capacity.`;
    } else if (groupSize <= max) {
      answer = `Yes, your group of ${groupSize} guests can stay in Cottage ${cottage} with prior confirmation. Cottage ${cottage} can accommodate up to ${max} guests maximum.`;
    } else {
      answer = `No, your group of ${groupSize} guests exceeds the maximum capacity of ${max} guests for Cottage ${cottage}. Groups larger than ${max} guests must book multiple cottages.`;
    }

    this.logger.log(`Cottage ${cottage} for ${groupSize} guests: ${suitable ? 'suitable' : 'not suitable'}`);

    return {
      status: 'compared',
      groupSize,
      cottage,
      suitable,
      reason,
      answer,
      template: directAnswerTemplate('STRUCTURED CAPACITY ANALYSIS:', answer, [
        `Group Size: ${groupSize} guests`,
        `Cottage: ${cottage}${info ? ` (${info.bedrooms}-bedroom)` : ''}`,
        `Base Capacity: ${base} guests`,
        `Max Capacity: ${max} guests`,
        `Result: ${suitable ? 'SUITABLE' : 'NOT SUITABLE'}`,
        `Reason: ${reason}`,
      ]),
    };
  }
}
