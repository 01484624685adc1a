import { CottageChoice, IntentType, Season, SEASONS } from '@cottage-concierge/shared-types';

import { isCottageId } from '../catalog/cottage-catalog.service';
import { DateExtractor, DateRange } from './date-extractor';

export interface SlotValues {
  guests: number;
  cottageId: CottageChoice;
  dates: DateRange;
  family: boolean;
  nights: number;
  season: Season;
  budget: string;
  preferences: string;
}

export type SlotName = keyof SlotValues;

export type SlotState = { [K in SlotName]: SlotValues[K] | null };

export type ExtractedSlots = Partial<SlotValues>;

export type SlotType = 'integer' | 'enum' | 'date-range' | 'boolean' | 'optional';

export interface SlotDefinition<K extends SlotName> {
  type: SlotType;
  requiredFor: readonly IntentType[];
  /** Lower is asked first. */
  priority: number;
  validate: (value: SlotValues[K], dates: DateExtractor) => boolean;
}

export const MAX_GUESTS_PER_COTTAGE = 9;

export const isSeason = (value: string): value is Season =>
  (SEASONS as readonly string[]).includes(value);

export const isCottageChoice = (value: string): value is CottageChoice =>
  value === 'any' || isCottageId(value);

export const SLOT_DEFINITIONS: { [K in SlotName]: SlotDefinition<K> } = {
  guests: {
    type: 'integer',
    requiredFor: ['pricing', 'booking', 'availability', 'rooms'],
    priority: 1,
    validate: (value) => Number.isInteger(value) && value >= 1 && value <= MAX_GUESTS_PER_COTTAGE,
  },
  cottageId: {
    type: 'enum',
    requiredFor: ['pricing', 'booking', 'availability', 'rooms'],
    priority: 2,
    validate: (value) => isCottageChoice(value),
  },
  dates: {
    type: 'date-range',
    requiredFor: ['pricing', 'booking', 'availability'],
    priority: 3,
    validate: (value, dates) => dates.validateDateRange(value.start, value.end).valid,
  },
  family: {
    type: 'boolean',
    requiredFor: ['booking'],
    priority: 4,
    validate: (value) => typeof value === 'boolean',
  },
  nights: {
    type: 'integer',
    requiredFor: ['pricing', 'booking'],
    priority: 4,
    validate: (value) => Number.isInteger(value) && value > 0,
  },
  season: {
    type: 'enum',
    requiredFor: ['pricing'],
    priority: 5,
    validate: (value) => isSeason(value),
  },
  budget: {
    type: 'optional',
    requiredFor: [],
    priority: 6,
    validate: (value) => value.trim().length > 0,
  },
  preferences: {
    type: 'optional',
    requiredFor: [],
    priority: 7,
    validate: (value) => value.trim().length > 0,
  },
};

export const SLOT_NAMES: readonly SlotName[] = [
  'guests',
  'cottageId',
  'dates',
  'family',
  'nights',
  'season',
  'budget',
  'preferences',
];

export const emptySlotState = (): SlotState => ({
  guests: null,
  cottageId: null,
  dates: null,
  family: null,
  nights: null,
  season: null,
  budget: null,
  preferences: null,
});

export const validateSlot = <K extends SlotName>(
  name: K,
  value: SlotValues[K],
  dates: DateExtractor,
): boolean => SLOT_DEFINITIONS[name].validate(value, dates);

/** Slots an intent needs, highest priority first. */
export const requiredSlotsFor = (intent: IntentType): SlotName[] =>
  SLOT_NAMES.filter((name) => SLOT_DEFINITIONS[name].requiredFor.includes(intent)).sort(
    (a, b) => SLOT_DEFINITIONS[a].priority - SLOT_DEFINITIONS[b].priority,
  );
