import { Logger } from '@nestjs/common';
import { CottageChoice, CottageId, IntentType, SlotView } from '@cottage-concierge/shared-types';

import { isCottageId } from '../catalog/cottage-catalog.service';
import { Clock } from '../common/clock';
import { DateExtractor, DateRange } from './date-extractor';
import { NumberExtractor } from './number-extractor';
import { isGeneralInformation, isSpecificCalculation } from './query-cues';
import {
  emptySlotState,
  ExtractedSlots,
  isCottageChoice,
  isSeason,
  requiredSlotsFor,
  SLOT_NAMES,
  SlotName,
  SlotState,
  SlotValues,
  validateSlot,
} from './slot-definitions';
import { SlotExtractionService } from './slot-extraction.service';

export interface SlotHistoryEntry {
  slot: SlotName;
  value: string;
  timestamp: string;
}

export interface SlotSnapshot {
  slots: SlotView;
  currentCottage: CottageId | null;
  history: SlotHistoryEntry[];
}

export interface SlotManagerDeps {
  extraction: SlotExtractionService;
  numbers: NumberExtractor;
  dates: DateExtractor;
  clock: Clock;
}

const BOOKING_KEY_SLOTS: readonly SlotName[] = ['guests', 'dates', 'cottageId'];

const sameRange = (a: DateRange, b: DateRange): boolean =>
  a.start.getTime() === b.start.getTime() && a.end.getTime() === b.end.getTime();

/** Slot memory for one session. */
export class SlotManager {
  private readonly logger = new Logger(SlotManager.name);
  private slots: SlotState = emptySlotState();
  private history: SlotHistoryEntry[] = [];
  private currentCottage: CottageId | null = null;

  constructor(
    readonly sessionId: string,
    private readonly deps: SlotManagerDeps,
  ) {}

  static restore(sessionId: string, snapshot: SlotSnapshot, deps: SlotManagerDeps): SlotManager {
    const manager = new SlotManager(sessionId, deps);
    manager.currentCottage = snapshot.currentCottage;
    manager.history = snapshot.history.map((entry) => ({ ...entry }));
    manager.slots = manager.fromView(snapshot.slots);
    return manager;
  }

  async extractSlots(query: string, intent: IntentType): Promise<ExtractedSlots> {
    const named = this.deps.numbers.extractCottageNumber(query);
    if (named !== null && isCottageId(named)) {
      this.currentCottage = named;
    }

    return this.deps.extraction.extract(query, intent, this.getSlots());
  }

  /** Commits valid candidates. Invalid ones are logged and dropped. */
  updateSlots(extracted: ExtractedSlots): void {
    for (const name of SLOT_NAMES) {
      this.commit(name, extracted[name]);
    }
  }

  /**
   * The cottage a turn may speak about. A cottage mentioned earlier only carries over into
   * booking or pricing calculations, never into general questions.
   */
  shouldUseCurrentCottage(query: string, intent: IntentType): boolean {
    if (this.deps.numbers.extractCottageNumber(query) !== null) {
      return true;
    }

    return (
      requiredSlotsFor(intent).includes('cottageId') &&
      isSpecificCalculation(query) &&
      !isGeneralInformation(query)
    );
  }

  cottageFor(query: string, intent: IntentType): CottageChoice | null {
    const named = this.deps.numbers.extractCottageNumber(query);
    if (named !== null) {
      return isCottageId(named) ? named : null;
    }
    if (!this.shouldUseCurrentCottage(query, intent)) {
      return null;
    }
    return this.slots.cottageId ?? this.currentCottage;
  }

  getCurrentCottage(): CottageId | null {
    return this.currentCottage;
  }

  getRequiredSlots(intent: IntentType): SlotName[] {
    return requiredSlotsFor(intent);
  }

  getMissingSlots(intent: IntentType): SlotName[] {
    return requiredSlotsFor(intent).filter((name) => this.slots[name] === null);
  }

  getMostImportantMissingSlot(intent: IntentType): SlotName | null {
    return this.getMissingSlots(intent)[0] ?? null;
  }

  hasEnoughBookingInfo(): boolean {
    return BOOKING_KEY_SLOTS.filter((name) => this.slots[name] !== null).length >= 2;
  }

  clearSlots(): void {
    this.slots = emptySlotState();
    this.history = [];
    this.currentCottage = null;
    this.logger.log(`Cleared all slots for session ${this.sessionId}`);
  }

  getSlots(): SlotState {
    return { ...this.slots };
  }

  getSlot<K extends SlotName>(name: K): SlotState[K] {
    return this.slots[name];
  }

  setSlot<K extends SlotName>(name: K, value: SlotValues[K] | null): boolean {
    if (value !== null && !validateSlot(name, value, this.deps.dates)) {
      this.logger.warn(`Invalid slot value for ${name}: ${this.describe(name, value)}`);
      return false;
    }

    this.slots[name] = value;
    return true;
  }

  getHistory(): SlotHistoryEntry[] {
    return this.history.map((entry) => ({ ...entry }));
  }

  toView(): SlotView {
    const { dates, ...rest } = this.slots;
    return { ...rest, dates: dates ? this.deps.dates.toView(dates) : null };
  }

  snapshot(): SlotSnapshot {
    return {
      slots: this.toView(),
      currentCottage: this.currentCottage,
      history: this.getHistory(),
    };
  }

  private commit<K extends SlotName>(name: K, value: SlotValues[K] | undefined): void {
    if (value === undefined) {
      return;
    }

    const previous = this.slots[name];
    if (!this.setSlot(name, value)) {
      return;
    }

    if (previous === null || !this.sameValue(previous, value)) {
      const described = this.describe(name, value);
      this.history.push({
        slot: name,
        value: described,
        timestamp: this.deps.clock.now().toISOString(),
      });
      this.logger.log(`Updated slot ${name} for session ${this.sessionId}: ${described}`);
    }
  }

  private sameValue(previous: unknown, next: unknown): boolean {
    if (this.isRange(previous) && this.isRange(next)) {
      return sameRange(previous, next);
    }
    return previous === next;
  }

  private isRange(value: unknown): value is DateRange {
    return typeof value === 'object' && value !== null && 'stayNights' in value;
  }

  private describe(name: SlotName, value: unknown): string {
    if (name === 'dates' && this.isRange(value)) {
      return this.deps.dates.describe(value);
    }
    return String(value);
  }

  private fromView(view: SlotView): SlotState {
    const state = emptySlotState();
    const dates = view.dates ? this.deps.dates.fromView(view.dates) : null;

    state.guests = view.guests;
    state.cottageId = view.cottageId !== null && isCottageChoice(view.cottageId) ? view.cottageId : null;
    state.dates = dates;
    state.family = view.family;
    state.nights = view.nights;
    state.season = view.season !== null && isSeason(view.season) ? view.season : null;
    state.budget = view.budget;
    state.preferences = view.preferences;
    return state;
  }
}
