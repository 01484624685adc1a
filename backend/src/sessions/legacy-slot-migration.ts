import { Logger } from '@nestjs/common';
import { CottageChoice, CottageId, EMPTY_SLOT_VIEW, SlotView } from '@cottage-concierge/shared-types';
import { isValid, parseISO } from 'date-fns';

import { isCottageId } from '../catalog/cottage-catalog.service';
import { ChatTurn } from '../conversation/chat-history';
import { ContextSnapshot } from '../conversation/context-tracker';
import { DateExtractor } from '../conversation/date-extractor';
import { isCottageChoice, isSeason } from '../conversation/slot-definitions';
import { LegacySessionSnapshot, SESSION_SNAPSHOT_VERSION, SessionSnapshot } from './session';

const logger = new Logger('LegacySlotMigration');

type SlotKey = keyof SlotView;

const LEGACY_KEY_NAMES: Record<string, SlotKey> = {
  room_type: 'cottageId',
  cottage_id: 'cottageId',
  group_size: 'guests',
  num_guests: 'guests',
  num_nights: 'nights',
  is_family: 'family',
};

const hasOwn = (record: object, key: string) => Object.prototype.hasOwnProperty.call(record, key);

const isSlotKey = (key: string): key is SlotKey => hasOwn(EMPTY_SLOT_VIEW, key);

const HISTORY_LINE = /^question:\s*([\s\S]*?),\s*answer:\s*([\s\S]*)$/;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const toInteger = (value: unknown): number | null => {
  const parsed = typeof value === 'string' ? Number.parseInt(value, 10) : value;
  return typeof parsed === 'number' && Number.isInteger(parsed) && parsed > 0 ? parsed : null;
};

const toText = (value: unknown): string | null => (typeof value === 'string' && value.trim() ? value : null);

/** "cottage_9", "Cottage 9", 9 and "9" all become "9". */
export const toCottageChoice = (value: unknown): CottageChoice | null => {
  if (typeof value !== 'string' && typeof value !== 'number') {
    return null;
  }
  const candidate = String(value).trim().toLowerCase().replace(/^cottage[_\s]*/, '');
  return isCottageChoice(candidate) ? candidate : null;
};

const toCottageId = (value: unknown): CottageId | null => {
  const choice = toCottageChoice(value);
  return choice !== null && isCottageId(choice) ? choice : null;
};

const toDateRange = (value: unknown, dates: DateExtractor): SlotView['dates'] => {
  if (!isRecord(value)) {
    return null;
  }
  const start = toText(value.start) ?? toText(value.start_date) ?? toText(value.check_in);
  const end = toText(value.end) ?? toText(value.end_date) ?? toText(value.check_out);
  if (!start || !end) {
    return null;
  }

  const checkIn = parseISO(start);
  const checkOut = parseISO(end);
  if (!isValid(checkIn) || !isValid(checkOut)) {
    return null;
  }
  return dates.toView(dates.buildRange(checkIn, checkOut));
};

/**
 * Maps a stored slot record onto the current slot names. Values that do not fit the current
 * types are dropped with a warning rather than failing the restore.
 */
export function migrateLegacySlots(raw: Record<string, unknown>, dates: DateExtractor): SlotView {
  const slots: SlotView = { ...EMPTY_SLOT_VIEW };

  for (const [key, value] of Object.entries(raw)) {
    const name = hasOwn(LEGACY_KEY_NAMES, key) ? LEGACY_KEY_NAMES[key] : isSlotKey(key) ? key : undefined;
    if (!name) {
      logger.warn(`Dropping unknown legacy slot ${key}`);
      continue;
    }
    if (value === null || value === undefined) {
      continue;
    }

    switch (name) {
      case 'guests':
      case 'nights':
        slots[name] = toInteger(value);
        break;
      case 'cottageId':
        slots.cottageId = toCottageChoice(value);
        break;
      case 'family':
        slots.family = typeof value === 'boolean' ? value : value === 'true' ? true : value === 'false' ? false : null;
        break;
      case 'season':
        slots.season = typeof value === 'string' && isSeason(value) ? value : null;
        break;
      case 'dates':
        slots.dates = toDateRange(value, dates);
        break;
      case 'budget':
      case 'preferences':
        slots[name] = toText(value);
        break;
    }

    if (slots[name] === null) {
      logger.warn(`Dropping legacy slot ${key}: ${JSON.stringify(value)} does not fit ${name}`);
    }
  }

  return slots;
}

const parseHistoryLine = (line: string): ChatTurn[] => {
  const match = HISTORY_LINE.exec(line);
  return match ? [{ question: match[1], answer: match[2] }] : [];
};

const FRESH_CONTEXT: ContextSnapshot = {
  state: 'browsing',
  intentHistory: [],
  preferences: {},
  keyPoints: {},
  summary: [],
};

/** Lifts a pre-rename session record into the current snapshot shape. */
export function migrateLegacySnapshot(legacy: LegacySessionSnapshot, dates: DateExtractor): SessionSnapshot {
  const slots = migrateLegacySlots(legacy.slots ?? {}, dates);
  const history = (legacy.chat_history ?? []).flatMap(parseHistoryLine);

  logger.log(`Migrated legacy session ${legacy.session_id} (${history.length} turns)`);

  return {
    version: SESSION_SNAPSHOT_VERSION,
    sessionId: legacy.session_id,
    history,
    slots: {
      slots,
      currentCottage: toCottageId(legacy.current_cottage),
      history: [],
    },
    context: { ...FRESH_CONTEXT },
  };
}
